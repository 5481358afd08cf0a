/**
 * Readiness report for a running ledger service: reserve prices, the health
 * monitor and the accounts currently open to liquidation
 * Usage: tsx scripts/health-check.ts [url]
 *
 * URL priority: CLI arg > LEDGER_URL env > default (localhost:9100)
 */
import 'dotenv/config';

const DEFAULT_URL = 'http://localhost:9100';
const url = process.argv[2] || process.env.LEDGER_URL || DEFAULT_URL;

interface Readiness {
  ready: boolean;
  issues: string[];
  reserves: number;
  priced: number;
  liquidatable: number;
}

interface LiquidatableAccount {
  user: string;
  account: { healthFactor: string; totalDebtValue: string };
}

function isReadiness(value: unknown): value is Readiness {
  return typeof value === 'object' && value !== null && 'ready' in value && 'issues' in value;
}

function isLiquidatableList(value: unknown): value is { accounts: LiquidatableAccount[] } {
  return typeof value === 'object' && value !== null && 'accounts' in value && Array.isArray(value.accounts);
}

async function report() {
  const readyResponse = await fetch(`${url}/ready`);
  const readiness: unknown = await readyResponse.json();
  if (!isReadiness(readiness)) {
    throw new Error(`Unexpected /ready response: ${JSON.stringify(readiness)}`);
  }

  console.log(`Reserves priced: ${readiness.priced}/${readiness.reserves}`);
  for (const issue of readiness.issues) {
    console.error(`  ! ${issue}`);
  }

  if (readiness.liquidatable > 0) {
    const list: unknown = await (await fetch(`${url}/liquidatable`)).json();
    if (isLiquidatableList(list)) {
      console.log(`Liquidatable accounts: ${list.accounts.length}`);
      for (const { user, account } of list.accounts) {
        console.log(`  ${user} hf=${account.healthFactor} debtValue=${account.totalDebtValue}`);
      }
    }
  } else {
    console.log('Liquidatable accounts: 0');
  }

  return readiness.ready;
}

console.log(`Checking ledger at: ${url}`);
report()
  .then((ready) => process.exit(ready ? 0 : 1))
  .catch((error: unknown) => {
    console.error('Health check failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
