import { MAX_COLLATERAL_RISK } from "../constants";
import { fail } from "../errors";

export type KeyValueEntry = {
    key: bigint,
    value: bigint,
}

/**
 * Fixed capacity, append only list of (key, value) pairs.
 * Sorting orders by key ascending; equal keys keep insertion order.
 */
export class KeyValueList {
    private entries: KeyValueEntry[] = [];
    readonly capacity: number;

    constructor(capacity: number) {
        this.capacity = capacity;
    }

    get length(): number {
        return this.entries.length;
    }

    add(key: bigint, value: bigint): void {
        if (this.entries.length >= this.capacity) {
            fail("KEY_VALUE_LIST_FULL", `list capacity ${this.capacity} reached`);
        }
        if (key < 0n || key > MAX_COLLATERAL_RISK) {
            fail("INVALID_COLLATERAL_RISK", `key ${key} out of range`);
        }
        this.entries.push({ key, value });
    }

    get(index: number): KeyValueEntry {
        const entry = this.entries[index];
        if (!entry) {
            throw new RangeError(`KeyValueList: index ${index} out of bounds (length ${this.entries.length})`);
        }
        return entry;
    }

    sortByKey(): void {
        // Array.prototype.sort is stable
        this.entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    }

    [Symbol.iterator](): Iterator<KeyValueEntry> {
        return this.entries[Symbol.iterator]();
    }
}
