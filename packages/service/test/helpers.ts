import { pino, type Logger } from 'pino';
import { WAD } from '@spoke-ledger/core';
import { bootstrapMarket, type MarketDefinition } from '../src/bootstrap';
import { AccountStorage } from '../src/storage';
import { HealthMonitor } from '../src/health-monitor';
import { createLedgerAPI } from '../src/api';

export const LP = '0xlp';
export const USER = '0xuser';
export const LIQUIDATOR = '0xliquidator';

/**
 * WETH ($2000, cf 80%, tier 5%) and USDC ($1, 6 decimals, cf 85%, tier 0%).
 * The liquidation bonus is always the max bonus.
 */
export function testMarketDefinition(): MarketDefinition {
  return {
    liquidationConfig: {
      targetHealthFactor: WAD,
      healthFactorForMaxBonus: 0n,
      liquidationBonusFactor: 10_000n,
    },
    reserves: [
      {
        symbol: 'WETH',
        decimals: 18,
        price: 2_000n * 10n ** 8n,
        config: { paused: false, frozen: false, borrowable: true, collateralRisk: 500n },
        dynamicConfig: { collateralFactor: 8_000n, maxLiquidationBonus: 10_500n, liquidationFee: 1_000n },
      },
      {
        symbol: 'USDC',
        decimals: 6,
        price: 10n ** 8n,
        config: { paused: false, frozen: false, borrowable: true, collateralRisk: 0n },
        dynamicConfig: { collateralFactor: 8_500n, maxLiquidationBonus: 10_400n, liquidationFee: 500n },
      },
    ],
  };
}

/**
 * Logger writing JSON lines into `lines`
 */
export function captureLogger(lines: string[], level: string = 'info'): Logger {
  return pino({ level }, { write: (line: string) => { lines.push(line); } });
}

export function createTestService(logger: Logger = pino({ level: 'silent' }), apiKey?: string) {
  const market = bootstrapMarket(testMarketDefinition(), { logger, clock: () => 0n });
  const storage = new AccountStorage();
  const monitor = new HealthMonitor(market.spoke, storage, { checkInterval: 3_600_000 }, logger);
  const app = createLedgerAPI({ market, storage, monitor, logger, apiKey });
  return { app, market, storage, monitor };
}

export type TestService = ReturnType<typeof createTestService>;

export function post(service: TestService, path: string, body: unknown): Response | Promise<Response> {
  return service.app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}
