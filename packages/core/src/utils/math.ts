import {
    WAD,
    RAY,
    PERCENTAGE_FACTOR,
    MAX_UINT256,
} from "../constants";

export enum Rounding {
    Floor = "floor",
    Ceil = "ceil",
}

export function min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
    return a > b ? a : b;
}

export function absDiff(a: bigint, b: bigint): bigint {
    return a > b ? a - b : b - a;
}

/**
 * Full precision (x * y) / denominator with explicit rounding.
 * @notice operands are expected to be non-negative
 */
export function mulDiv(x: bigint, y: bigint, denominator: bigint, rounding: Rounding = Rounding.Floor): bigint {
    if (denominator === 0n) {
        throw new RangeError("mulDiv: division by zero");
    }
    const product = x * y;
    const quotient = product / denominator;
    if (rounding === Rounding.Ceil && product % denominator !== 0n) {
        return quotient + 1n;
    }
    return quotient;
}

export function mulDivUp(x: bigint, y: bigint, denominator: bigint): bigint {
    return mulDiv(x, y, denominator, Rounding.Ceil);
}

export function mulDivDown(x: bigint, y: bigint, denominator: bigint): bigint {
    return mulDiv(x, y, denominator, Rounding.Floor);
}

export function wadMulDown(a: bigint, b: bigint): bigint {
    return mulDivDown(a, b, WAD);
}

export function wadMulUp(a: bigint, b: bigint): bigint {
    return mulDivUp(a, b, WAD);
}

export function wadDivDown(a: bigint, b: bigint): bigint {
    return mulDivDown(a, WAD, b);
}

export function wadDivUp(a: bigint, b: bigint): bigint {
    return mulDivUp(a, WAD, b);
}

export function rayMulDown(a: bigint, b: bigint): bigint {
    return mulDivDown(a, b, RAY);
}

export function rayMulUp(a: bigint, b: bigint): bigint {
    return mulDivUp(a, b, RAY);
}

export function rayDivDown(a: bigint, b: bigint): bigint {
    return mulDivDown(a, RAY, b);
}

export function rayDivUp(a: bigint, b: bigint): bigint {
    return mulDivUp(a, RAY, b);
}

/**
 * Apply a basis point percentage to a value
 * @param value - value to scale
 * @param percentage - percentage in PERCENTAGE_FACTOR (10000 = 100%)
 */
export function percentMulDown(value: bigint, percentage: bigint): bigint {
    return mulDivDown(value, percentage, PERCENTAGE_FACTOR);
}

export function percentMulUp(value: bigint, percentage: bigint): bigint {
    return mulDivUp(value, percentage, PERCENTAGE_FACTOR);
}

export function percentDivDown(value: bigint, percentage: bigint): bigint {
    return mulDivDown(value, PERCENTAGE_FACTOR, percentage);
}

export function percentDivUp(value: bigint, percentage: bigint): bigint {
    return mulDivUp(value, PERCENTAGE_FACTOR, percentage);
}

/**
 * Strip the basis point scale from a value that was multiplied by a bps factor
 */
export function fromBpsDown(value: bigint): bigint {
    return value / PERCENTAGE_FACTOR;
}

export function bpsToWad(bps: bigint): bigint {
    return (bps * WAD) / PERCENTAGE_FACTOR;
}

/**
 * Value of an asset amount in the base currency (WAD scaled, oracle priced)
 * @param amount - amount in asset units
 * @param price - oracle price (ORACLE_DECIMALS)
 * @param assetUnit - 10 ** asset decimals
 * @param rounding - collateral rounds down, debt rounds up
 */
export function toValue(amount: bigint, price: bigint, assetUnit: bigint, rounding: Rounding): bigint {
    return mulDiv(amount * price, WAD, assetUnit, rounding);
}

/**
 * Inverse of `toValue`: asset amount worth `value` in the base currency
 */
export function fromValue(value: bigint, price: bigint, assetUnit: bigint, rounding: Rounding): bigint {
    if (value === MAX_UINT256) return MAX_UINT256;
    return mulDiv(value, assetUnit, price * WAD, rounding);
}
