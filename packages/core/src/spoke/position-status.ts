import { MAX_RESERVES_PER_WORD } from "../constants";

export const NOT_FOUND = -1;

export type StatusCursor = {
    reserveId: number,
    borrowing: boolean,
    collateral: boolean,
}

const WORD_BITS = MAX_RESERVES_PER_WORD * 2;

// bit 2i: borrowing, bit 2i+1: using as collateral
const BORROWING_MASK = (() => {
    let mask = 0n;
    for (let i = 0; i < MAX_RESERVES_PER_WORD; i++) mask |= 1n << BigInt(i * 2);
    return mask;
})();
const COLLATERAL_MASK = BORROWING_MASK << 1n;

function bucketOf(reserveId: number): number {
    return Math.floor(reserveId / MAX_RESERVES_PER_WORD);
}

function bitOf(reserveId: number): bigint {
    return BigInt((reserveId % MAX_RESERVES_PER_WORD) * 2);
}

function bitLength(word: bigint): number {
    return word === 0n ? 0 : word.toString(2).length;
}

function popCount(word: bigint): number {
    let count = 0;
    let rest = word;
    while (rest !== 0n) {
        rest &= rest - 1n;
        count++;
    }
    return count;
}

/**
 * Per user bitmap of which reserves are supplied as collateral and which are
 * borrowed, two bits per reserve packed into 256 bit words
 */
export class PositionStatusMap {
    private words: Map<number, bigint>;
    hasPositiveRiskPremium: boolean;

    constructor(words: Map<number, bigint> = new Map(), hasPositiveRiskPremium = false) {
        this.words = words;
        this.hasPositiveRiskPremium = hasPositiveRiskPremium;
    }

    isUsingAsCollateral(reserveId: number): boolean {
        return ((this.word(reserveId) >> (bitOf(reserveId) + 1n)) & 1n) === 1n;
    }

    isBorrowing(reserveId: number): boolean {
        return ((this.word(reserveId) >> bitOf(reserveId)) & 1n) === 1n;
    }

    isUsingAsCollateralOrBorrowing(reserveId: number): boolean {
        return ((this.word(reserveId) >> bitOf(reserveId)) & 3n) !== 0n;
    }

    setUsingAsCollateral(reserveId: number, usingAsCollateral: boolean): void {
        this.setBit(reserveId, bitOf(reserveId) + 1n, usingAsCollateral);
    }

    setBorrowing(reserveId: number, borrowing: boolean): void {
        this.setBit(reserveId, bitOf(reserveId), borrowing);
    }

    /**
     * Greatest reserve id below `startReserveId` flagged as collateral or debt.
     * Walk a user's reserves by starting at the reserve count and feeding the
     * returned id back in until `NOT_FOUND`.
     */
    next(startReserveId: number): StatusCursor {
        const reserveId = this.findPrevious(startReserveId, BORROWING_MASK | COLLATERAL_MASK);
        if (reserveId === NOT_FOUND) {
            return { reserveId, borrowing: false, collateral: false };
        }
        return {
            reserveId,
            borrowing: this.isBorrowing(reserveId),
            collateral: this.isUsingAsCollateral(reserveId),
        };
    }

    /**
     * Greatest borrowed reserve id below `startReserveId`, or `NOT_FOUND`
     */
    nextBorrowing(startReserveId: number): number {
        return this.findPrevious(startReserveId, BORROWING_MASK);
    }

    /**
     * Number of collateral flags among reserve ids below `reserveCount`
     */
    collateralCount(reserveCount: number): number {
        let count = 0;
        for (const [bucket, word] of this.words) {
            const first = bucket * MAX_RESERVES_PER_WORD;
            if (first >= reserveCount) continue;
            const inRange = Math.min(MAX_RESERVES_PER_WORD, reserveCount - first);
            const rangeMask = inRange === MAX_RESERVES_PER_WORD
                ? (1n << BigInt(WORD_BITS)) - 1n
                : (1n << BigInt(inRange * 2)) - 1n;
            count += popCount(word & COLLATERAL_MASK & rangeMask);
        }
        return count;
    }

    clone(): PositionStatusMap {
        return new PositionStatusMap(new Map(this.words), this.hasPositiveRiskPremium);
    }

    private word(reserveId: number): bigint {
        return this.words.get(bucketOf(reserveId)) ?? 0n;
    }

    private setBit(reserveId: number, bit: bigint, value: boolean): void {
        const bucket = bucketOf(reserveId);
        const word = this.words.get(bucket) ?? 0n;
        const next = value ? word | (1n << bit) : word & ~(1n << bit);
        if (next === 0n) {
            this.words.delete(bucket);
        } else {
            this.words.set(bucket, next);
        }
    }

    private findPrevious(startReserveId: number, mask: bigint): number {
        let reserveId = startReserveId - 1;
        while (reserveId >= 0) {
            const bucket = bucketOf(reserveId);
            const word = (this.words.get(bucket) ?? 0n) & mask;
            // keep the pair of bits for `reserveId` and everything below it
            const keep = (1n << (bitOf(reserveId) + 2n)) - 1n;
            const candidates = word & keep;
            if (candidates !== 0n) {
                const highestBit = bitLength(candidates) - 1;
                return bucket * MAX_RESERVES_PER_WORD + (highestBit >> 1);
            }
            reserveId = bucket * MAX_RESERVES_PER_WORD - 1;
        }
        return NOT_FOUND;
    }
}
