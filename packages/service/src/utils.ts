import {
  ERROR_CODES,
  MAX_UINT256,
  type LedgerError,
  type LedgerErrorCode,
} from '@spoke-ledger/core';
import { SERVICE_ERROR_CODES } from './constants';

export type ServiceErrorCode = LedgerErrorCode | (typeof SERVICE_ERROR_CODES)[keyof typeof SERVICE_ERROR_CODES];

export interface ServiceError {
  code: ServiceErrorCode;
  message: string;
  timestamp: number;
}

export type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

/**
 * Malformed request input, answered with 400
 */
export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

export function createError(code: ServiceErrorCode, message: string): ServiceError {
  return {
    code,
    message,
    timestamp: Date.now(),
  };
}

const NOT_FOUND_CODES: ReadonlySet<LedgerErrorCode> = new Set([
  ERROR_CODES.RESERVE_NOT_LISTED,
  ERROR_CODES.ASSET_NOT_LISTED,
  ERROR_CODES.DYNAMIC_CONFIG_KEY_NOT_FOUND,
  ERROR_CODES.PRICE_NOT_SET,
]);

const CONFLICT_CODES: ReadonlySet<LedgerErrorCode> = new Set([
  ERROR_CODES.RESERVE_EXISTS,
  ERROR_CODES.RESERVE_PAUSED,
  ERROR_CODES.RESERVE_FROZEN,
  ERROR_CODES.RESERVE_NOT_BORROWABLE,
]);

const BAD_REQUEST_CODES: ReadonlySet<LedgerErrorCode> = new Set([
  ERROR_CODES.INVALID_AMOUNT,
  ERROR_CODES.SELF_LIQUIDATION,
]);

/**
 * HTTP status for a ledger failure
 */
export function statusForLedgerError(error: LedgerError): ErrorStatus {
  if (error.kind === 'authorization') return 403;
  if (NOT_FOUND_CODES.has(error.code)) return 404;
  if (CONFLICT_CODES.has(error.code)) return 409;
  if (BAD_REQUEST_CODES.has(error.code) || error.kind === 'configuration') return 400;
  return 422;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate address format (non-empty, no whitespace)
 */
export function isValidAddress(address: string): boolean {
  return /^\S{1,128}$/.test(address);
}

/**
 * Parse a non-negative integer given as a decimal string or a safe integer
 */
export function parseUnsigned(value: unknown, field: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d{1,78}$/.test(value)) {
    return BigInt(value);
  }
  throw new RequestError(`${field} must be a non-negative integer or decimal string`);
}

/**
 * Like parseUnsigned, "max" selects the whole balance
 */
export function parseAmount(value: unknown, field: string): bigint {
  if (value === 'max') return MAX_UINT256;
  return parseUnsigned(value, field);
}

export function parseReserveId(value: unknown, field: string = 'reserveId'): number {
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new RequestError(`${field} must be a non-negative integer`);
  }
  return parsed;
}

export function parseAddress(value: unknown, field: string): string {
  if (typeof value !== 'string' || !isValidAddress(value)) {
    throw new RequestError(`${field} must be a valid address`);
  }
  return value;
}

export function parseBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new RequestError(`${field} must be a boolean`);
  }
  return value;
}
