export * as math from "./math";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function precision(n: bigint = 1n, decimals: bigint = 18n): bigint {
    return n * 10n ** decimals;
}

/**
 * Render a fixed point bigint as a decimal string (used for log lines only)
 * @param value - scaled value
 * @param decimals - number of fractional digits in `value`
 */
export function formatUnits(value: bigint, decimals: number): string {
    const negative = value < 0n;
    const abs = negative ? -value : value;
    const base = 10n ** BigInt(decimals);
    const whole = abs / base;
    const fraction = (abs % base).toString().padStart(decimals, "0").replace(/0+$/, "");
    const rendered = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
    return negative ? `-${rendered}` : rendered;
}

/**
 * Replace every bigint in a plain object tree with its decimal string so it can
 * be handed to JSON.stringify or a pino log line. Functions and undefined
 * entries are dropped.
 */
export function stringifyBigInts(value: unknown): JsonValue {
    if (typeof value === "bigint") return value.toString();
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
    if (Array.isArray(value)) return value.map(stringifyBigInts);
    if (value instanceof Map) {
        const out: { [key: string]: JsonValue } = {};
        for (const [key, entry] of value) out[String(key)] = stringifyBigInts(entry);
        return out;
    }
    if (value !== null && typeof value === "object") {
        const out: { [key: string]: JsonValue } = {};
        for (const [key, entry] of Object.entries(value)) {
            if (entry === undefined || typeof entry === "function") continue;
            out[key] = stringifyBigInts(entry);
        }
        return out;
    }
    return null;
}

/**
 * `stringifyBigInts` for a flat record, typed for log field objects
 */
export function stringifyFields(fields: object): { [key: string]: JsonValue } {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(fields)) {
        if (entry === undefined || typeof entry === "function") continue;
        out[key] = stringifyBigInts(entry);
    }
    return out;
}
