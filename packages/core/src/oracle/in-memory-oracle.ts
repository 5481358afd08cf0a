import type { IOracle } from "../interfaces";
import { fail } from "../errors";

/**
 * Settable price feed, one price per reserve with ORACLE_DECIMALS
 */
export class InMemoryOracle implements IOracle {
    private prices: Map<number, bigint> = new Map();

    setReservePrice(reserveId: number, price: bigint): void {
        if (price <= 0n) {
            fail("INVALID_AMOUNT", `price for reserve ${reserveId} must be positive`, { reserveId, price });
        }
        this.prices.set(reserveId, price);
    }

    getReservePrice(reserveId: number): bigint {
        const price = this.prices.get(reserveId);
        if (price === undefined) {
            return fail("PRICE_NOT_SET", `no price for reserve ${reserveId}`, { reserveId });
        }
        return price;
    }

    getPrices(): Map<number, bigint> {
        return new Map(this.prices);
    }
}
