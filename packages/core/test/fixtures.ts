import { expect } from "expect";
import {
    InMemoryHub,
    InMemoryOracle,
    LedgerError,
    PRICE_BASE,
    Spoke,
    WAD,
    isLedgerError,
    type DynamicReserveConfig,
    type LedgerErrorCode,
    type ReserveConfig,
    type SpokeEvent,
} from "../src";

export const LP = "0xlp";
export const USER = "0xuser";
export const LIQUIDATOR = "0xliquidator";
export const MANAGER = "0xmanager";

// fixed clock so the drawn index only moves through setDrawnIndex
export const NOW = 1_000n;

export function units(amount: bigint, decimals = 18n): bigint {
    return amount * 10n ** decimals;
}

export function usd(amount: bigint): bigint {
    return amount * PRICE_BASE;
}

export function reserveConfig(overrides: Partial<ReserveConfig> = {}): ReserveConfig {
    return { paused: false, frozen: false, borrowable: true, collateralRisk: 0n, ...overrides };
}

export function dynamicConfig(overrides: Partial<DynamicReserveConfig> = {}): DynamicReserveConfig {
    return { collateralFactor: 8000n, maxLiquidationBonus: 10500n, liquidationFee: 0n, ...overrides };
}

/**
 * Three 18 decimal reserves on one hub:
 * A $50,000 cf 90% tier 5%, B $10,000 cf 50% tier 0%, C $1 cf 80% tier 10%.
 * The liquidation bonus is always the max bonus; LP supplies 1,000,000 C and 10 B.
 */
export function createMarket() {
    const hub = new InMemoryHub({ clock: () => NOW });
    const oracle = new InMemoryOracle();
    const spoke = new Spoke({ oracle });
    const events: SpokeEvent[] = [];
    spoke.onEvent((event) => events.push(event));

    const assets = {
        A: hub.addAsset(18),
        B: hub.addAsset(18),
        C: hub.addAsset(18),
    };

    const reserves = {
        A: spoke.addReserve(hub, assets.A, reserveConfig({ collateralRisk: 500n }), dynamicConfig({ collateralFactor: 9000n })),
        B: spoke.addReserve(hub, assets.B, reserveConfig({ collateralRisk: 0n }), dynamicConfig({ collateralFactor: 5000n })),
        C: spoke.addReserve(hub, assets.C, reserveConfig({ collateralRisk: 1000n }), dynamicConfig({ collateralFactor: 8000n })),
    };

    oracle.setReservePrice(reserves.A, usd(50_000n));
    oracle.setReservePrice(reserves.B, usd(10_000n));
    oracle.setReservePrice(reserves.C, usd(1n));

    spoke.updateLiquidationConfig({
        targetHealthFactor: WAD,
        healthFactorForMaxBonus: 0n,
        liquidationBonusFactor: 10_000n,
    });

    spoke.supply(LP, reserves.C, units(1_000_000n), LP);
    spoke.supply(LP, reserves.B, units(10n), LP);

    return { hub, oracle, spoke, assets, reserves, events };
}

export type Market = ReturnType<typeof createMarket>;

/**
 * USER supplies 1 A and 1 B as collateral and borrows 40,000 C
 */
export function openPosition(market: Market): void {
    const { spoke, reserves } = market;
    spoke.supply(USER, reserves.A, units(1n), USER);
    spoke.supply(USER, reserves.B, units(1n), USER);
    spoke.setUsingAsCollateral(USER, reserves.A, true, USER);
    spoke.setUsingAsCollateral(USER, reserves.B, true, USER);
    spoke.borrow(USER, reserves.C, units(40_000n), USER);
}

/**
 * Run `action` and return the LedgerError it throws
 */
export function catchLedgerError(action: () => unknown): LedgerError {
    try {
        action();
    } catch (error) {
        if (isLedgerError(error)) return error;
        throw error;
    }
    throw new Error("expected a LedgerError to be thrown");
}

export function expectLedgerError(action: () => unknown, code: LedgerErrorCode): LedgerError {
    const error = catchLedgerError(action);
    expect(error.code).toBe(code);
    return error;
}
