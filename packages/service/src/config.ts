import { fileURLToPath } from 'node:url';
import type { LevelWithSilent } from 'pino';
import {
  DEFAULT_HEALTH_CHECK_INTERVAL,
  DEFAULT_LOG_LEVEL,
  DEFAULT_PORT,
} from './constants';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const DEFAULT_RESERVES_FILE = fileURLToPath(new URL('../config/reserves.json', import.meta.url));

export interface ServiceConfig {
  port: number;
  logLevel: LevelWithSilent;
  logPretty: boolean;
  reservesFile: string;
  healthCheckInterval: number; // milliseconds
  drawnRateBps: bigint; // yearly drawn rate applied to every hub asset
  apiKey?: string; // required on POST routes when set
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function parseInteger(name: string, raw: string, min: number, max: number): number {
  const value = parseInt(raw, 10);
  if (isNaN(value) || String(value) !== raw.trim() || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

/**
 * Read the service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const port = parseInteger(
    'PORT',
    env.LEDGER_PORT || env.PORT || String(DEFAULT_PORT),
    1,
    65_535
  );

  const logLevel = (env.LOG_LEVEL || DEFAULT_LOG_LEVEL).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  const healthCheckInterval = parseInteger(
    'HEALTH_CHECK_INTERVAL',
    env.HEALTH_CHECK_INTERVAL || String(DEFAULT_HEALTH_CHECK_INTERVAL),
    100,
    86_400_000
  );

  const drawnRateBps = parseInteger('HUB_DRAWN_RATE_BPS', env.HUB_DRAWN_RATE_BPS || '0', 0, 1_000_000);

  return {
    port,
    logLevel,
    logPretty: env.LOG_PRETTY !== 'false',
    reservesFile: env.RESERVES_FILE || DEFAULT_RESERVES_FILE,
    healthCheckInterval,
    drawnRateBps: BigInt(drawnRateBps),
    apiKey: env.LEDGER_API_KEY || undefined,
  };
}
