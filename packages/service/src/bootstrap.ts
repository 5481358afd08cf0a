import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  InMemoryHub,
  InMemoryOracle,
  Spoke,
  type Clock,
  type DynamicReserveConfig,
  type LiquidationConfig,
  type ReserveConfig,
} from '@spoke-ledger/core';
import { isRecord, parseUnsigned, parseBoolean } from './utils';

export interface ReserveDefinition {
  symbol: string;
  decimals: number;
  price: bigint;
  config: ReserveConfig;
  dynamicConfig: DynamicReserveConfig;
}

export interface MarketDefinition {
  liquidationConfig: LiquidationConfig;
  reserves: ReserveDefinition[];
}

export interface Market {
  hub: InMemoryHub;
  oracle: InMemoryOracle;
  spoke: Spoke;
  /** reserveId -> symbol */
  symbols: Map<number, string>;
}

export interface BootstrapOptions {
  logger: Logger;
  drawnRateBps?: bigint;
  clock?: Clock;
}

function record(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`);
  }
  return value;
}

function parseReserveDefinition(value: unknown, path: string): ReserveDefinition {
  const raw = record(value, path);
  const config = record(raw.config, `${path}.config`);
  const dynamicConfig = record(raw.dynamicConfig, `${path}.dynamicConfig`);

  if (typeof raw.symbol !== 'string' || !/^[A-Z0-9]{2,10}$/.test(raw.symbol)) {
    throw new Error(`${path}.symbol must be 2-10 uppercase letters or digits`);
  }
  if (typeof raw.decimals !== 'number' || !Number.isInteger(raw.decimals) || raw.decimals < 0 || raw.decimals > 36) {
    throw new Error(`${path}.decimals must be an integer between 0 and 36`);
  }

  return {
    symbol: raw.symbol,
    decimals: raw.decimals,
    price: parseUnsigned(raw.price, `${path}.price`),
    config: {
      paused: parseBoolean(config.paused, `${path}.config.paused`),
      frozen: parseBoolean(config.frozen, `${path}.config.frozen`),
      borrowable: parseBoolean(config.borrowable, `${path}.config.borrowable`),
      collateralRisk: parseUnsigned(config.collateralRisk, `${path}.config.collateralRisk`),
    },
    dynamicConfig: {
      collateralFactor: parseUnsigned(dynamicConfig.collateralFactor, `${path}.dynamicConfig.collateralFactor`),
      maxLiquidationBonus: parseUnsigned(dynamicConfig.maxLiquidationBonus, `${path}.dynamicConfig.maxLiquidationBonus`),
      liquidationFee: parseUnsigned(dynamicConfig.liquidationFee, `${path}.dynamicConfig.liquidationFee`),
    },
  };
}

/**
 * Validate the shape of a parsed reserves file. Config values are range
 * checked later by the spoke itself.
 */
export function parseMarketDefinition(value: unknown): MarketDefinition {
  const raw = record(value, 'market');
  const liquidationConfig = record(raw.liquidationConfig, 'liquidationConfig');
  if (!Array.isArray(raw.reserves) || raw.reserves.length === 0) {
    throw new Error('reserves must be a non-empty array');
  }

  const reserves = raw.reserves.map((reserve, index) => parseReserveDefinition(reserve, `reserves[${index}]`));
  const symbols = new Set(reserves.map((reserve) => reserve.symbol));
  if (symbols.size !== reserves.length) {
    throw new Error('reserve symbols must be unique');
  }

  return {
    liquidationConfig: {
      targetHealthFactor: parseUnsigned(liquidationConfig.targetHealthFactor, 'liquidationConfig.targetHealthFactor'),
      healthFactorForMaxBonus: parseUnsigned(liquidationConfig.healthFactorForMaxBonus, 'liquidationConfig.healthFactorForMaxBonus'),
      liquidationBonusFactor: parseUnsigned(liquidationConfig.liquidationBonusFactor, 'liquidationConfig.liquidationBonusFactor'),
    },
    reserves,
  };
}

export async function loadMarketDefinition(path: string): Promise<MarketDefinition> {
  const contents = await readFile(path, 'utf-8');
  try {
    return parseMarketDefinition(JSON.parse(contents));
  } catch (error) {
    throw new Error(`Invalid reserves file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * List every reserve of `definition` on a fresh hub, oracle and spoke
 */
export function bootstrapMarket(definition: MarketDefinition, options: BootstrapOptions): Market {
  const { logger } = options;
  const hub = new InMemoryHub({ clock: options.clock });
  const oracle = new InMemoryOracle();
  const spoke = new Spoke({ oracle, logger: logger.child({ module: 'spoke' }) });
  const symbols = new Map<number, string>();

  spoke.updateLiquidationConfig(definition.liquidationConfig);

  for (const reserve of definition.reserves) {
    const assetId = hub.addAsset(reserve.decimals, options.drawnRateBps ?? 0n);
    const reserveId = spoke.addReserve(hub, assetId, reserve.config, reserve.dynamicConfig);
    oracle.setReservePrice(reserveId, reserve.price);
    symbols.set(reserveId, reserve.symbol);

    logger.info(
      { reserveId, assetId, symbol: reserve.symbol, decimals: reserve.decimals },
      'Reserve listed'
    );
  }

  return { hub, oracle, spoke, symbols };
}
