import { ERROR_CODES } from "./constants";

export type LedgerErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type LedgerErrorKind = "configuration" | "state" | "policy" | "authorization";

const CONFIGURATION_ERRORS: ReadonlySet<LedgerErrorCode> = new Set([
    ERROR_CODES.INVALID_COLLATERAL_FACTOR,
    ERROR_CODES.INVALID_LIQUIDATION_BONUS,
    ERROR_CODES.INVALID_LIQUIDATION_FEE,
    ERROR_CODES.INCOMPATIBLE_COLLATERAL_FACTOR_AND_BONUS,
    ERROR_CODES.INVALID_COLLATERAL_RISK,
    ERROR_CODES.INVALID_LIQUIDATION_CONFIG,
    ERROR_CODES.RESERVE_EXISTS,
    ERROR_CODES.RESERVE_NOT_LISTED,
    ERROR_CODES.ASSET_NOT_LISTED,
    ERROR_CODES.DYNAMIC_CONFIG_KEY_NOT_FOUND,
    ERROR_CODES.MAXIMUM_DYNAMIC_CONFIG_KEY_REACHED,
]);

/**
 * Typed failure raised by the ledger. Nothing is persisted when one escapes a
 * state-mutating call.
 */
export class LedgerError extends Error {
    readonly code: LedgerErrorCode;
    readonly details?: unknown;

    constructor(code: LedgerErrorCode, message: string, details?: unknown) {
        super(`${code}: ${message}`);
        this.name = "LedgerError";
        this.code = code;
        this.details = details;
    }

    get kind(): LedgerErrorKind {
        if (CONFIGURATION_ERRORS.has(this.code)) return "configuration";
        if (this.code === ERROR_CODES.MUST_NOT_LEAVE_DUST) return "policy";
        if (this.code === ERROR_CODES.UNAUTHORIZED) return "authorization";
        return "state";
    }
}

/**
 * Create and throw a ledger error
 */
export function fail(code: keyof typeof ERROR_CODES, message: string, details?: unknown): never {
    throw new LedgerError(ERROR_CODES[code], message, details);
}

export function isLedgerError(error: unknown): error is LedgerError {
    return error instanceof LedgerError;
}
