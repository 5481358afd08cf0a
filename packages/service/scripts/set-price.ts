/**
 * Set the oracle price of a reserve
 * Usage: tsx scripts/set-price.ts <reserveId> <price> [url]
 * Example: tsx scripts/set-price.ts 0 2500.50
 *
 * URL priority: CLI arg > LEDGER_URL env > default (localhost:9100)
 * LEDGER_API_KEY is sent as X-API-Key when set
 */
import 'dotenv/config';
import { ORACLE_DECIMALS } from '@spoke-ledger/core/constants';

const DEFAULT_URL = 'http://localhost:9100';

const reserveId = process.argv[2];
const price = process.argv[3];
const url = process.argv[4] || process.env.LEDGER_URL || DEFAULT_URL;

/**
 * "2500.5" -> 250050000000 with ORACLE_DECIMALS fractional digits
 */
function toOraclePrice(value: string): string | undefined {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value);
  if (!match) return undefined;
  const [, whole = '0', fraction = ''] = match;
  if (fraction.length > ORACLE_DECIMALS) return undefined;
  return BigInt(whole + fraction.padEnd(ORACLE_DECIMALS, '0')).toString();
}

const oraclePrice = price ? toOraclePrice(price) : undefined;

if (!reserveId || !/^\d+$/.test(reserveId) || !oraclePrice || oraclePrice === '0') {
  console.error('Usage: tsx scripts/set-price.ts <reserveId> <price> [url]');
  console.error('Example: tsx scripts/set-price.ts 0 2500.50');
  console.error('');
  console.error('URL priority: CLI arg > LEDGER_URL env > default (localhost:9100)');
  process.exit(1);
}

async function setPrice() {
  console.log(`Setting reserve ${reserveId} price to $${price} at: ${url}`);

  try {
    const response = await fetch(`${url}/prices/${reserveId}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(process.env.LEDGER_API_KEY ? { 'X-API-Key': process.env.LEDGER_API_KEY } : {}),
      },
      body: JSON.stringify({ price: oraclePrice }),
    });

    const data: unknown = await response.json();

    if (response.ok) {
      console.log(`Reserve ${reserveId} price set to $${price}`);
      console.log(JSON.stringify(data, null, 2));
      process.exit(0);
    } else {
      console.error('Failed to set price');
      console.error(JSON.stringify(data, null, 2));
      process.exit(1);
    }
  } catch (error) {
    console.error('Request failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void setPrice();
