import { describe, test, beforeEach } from "node:test";
import { expect } from "expect";
import { MAX_UINT256, VALUE_BASE } from "../src/constants";
import { KeyValueList } from "../src/spoke/key-value-list";
import { calculateRiskPremium, calculateUserAccountData } from "../src/spoke/account-data";
import { PositionStatusMap } from "../src/spoke/position-status";
import { emptyPosition } from "../src/spoke/store";
import { LP, USER, createMarket, dynamicConfig, openPosition, units, usd, type Market } from "./fixtures";

function riskPremiumOf(entries: Array<[bigint, bigint]>, totalDebtValue: bigint): bigint {
    const list = new KeyValueList(entries.length);
    for (const [key, value] of entries) list.add(key, value);
    return calculateRiskPremium(list, totalDebtValue);
}

describe("risk premium", () => {

    const entries: Array<[bigint, bigint]> = [
        [500n, 5n * 10n ** 30n],
        [0n, 10n ** 30n],
        [1000n, 2n * 10n ** 30n],
    ];

    test("consumes the lowest tiers first", () => {
        // 1e30 at 0%, 5e30 at 5%, 1e30 at 10%
        expect(riskPremiumOf(entries, 7n * 10n ** 30n)).toBe(500n);
    });

    test("is independent of insertion order", () => {
        const permutations = [
            [entries[0], entries[1], entries[2]],
            [entries[0], entries[2], entries[1]],
            [entries[1], entries[0], entries[2]],
            [entries[1], entries[2], entries[0]],
            [entries[2], entries[0], entries[1]],
            [entries[2], entries[1], entries[0]],
        ];
        for (const permutation of permutations) {
            const list = permutation.flatMap((entry) => (entry ? [entry] : []));
            expect(riskPremiumOf(list, 7n * 10n ** 30n)).toBe(500n);
        }
    });

    test("divides by the debt actually covered and rounds up", () => {
        // 8e30 of collateral covers 8e30 of the 10e30 debt
        expect(riskPremiumOf(entries, 10n ** 31n)).toBe(563n);
    });

    test("is zero without debt or collateral", () => {
        expect(riskPremiumOf(entries, 0n)).toBe(0n);
        expect(riskPremiumOf([], 10n ** 30n)).toBe(0n);
    });
});

describe("user account data", () => {

    let market: Market;

    beforeEach(() => {
        market = createMarket();
        openPosition(market);
    });

    test("aggregates collateral and debt across reserves", () => {
        expect(market.spoke.getUserAccountData(USER)).toEqual({
            riskPremium: 375n,
            avgCollateralFactor: 833_333_333_333_333_333n,
            healthFactor: 1_250_000_000_000_000_000n,
            totalCollateralValue: 60_000n * VALUE_BASE,
            totalDebtValue: 40_000n * VALUE_BASE,
            activeCollateralCount: 2,
            borrowedCount: 1,
        });
    });

    test("an account without debt is infinitely healthy", () => {
        const data = market.spoke.getUserAccountData(LP);
        expect(data.healthFactor).toBe(MAX_UINT256);
        expect(data.totalDebtValue).toBe(0n);
        expect(data.riskPremium).toBe(0n);
        // LP never enabled collateral
        expect(data.totalCollateralValue).toBe(0n);
        expect(data.activeCollateralCount).toBe(0);
    });

    test("collateral with a zero collateral factor is ignored", () => {
        const { spoke, reserves } = market;
        spoke.addDynamicReserveConfig(reserves.B, dynamicConfig({ collateralFactor: 0n }));
        spoke.updateUserDynamicConfig(USER, USER);

        const data = spoke.getUserAccountData(USER);
        expect(data.activeCollateralCount).toBe(1);
        expect(data.totalCollateralValue).toBe(50_000n * VALUE_BASE);
        expect(data.healthFactor).toBe(1_125_000_000_000_000_000n);
        expect(data.riskPremium).toBe(500n);
    });

    test("the pure variant keeps pinned config keys and the refresh variant re-pins", () => {
        const { spoke, reserves, events } = market;
        const key = spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ collateralFactor: 8000n }));
        expect(key).toBe(1);

        expect(spoke.getUserAccountData(USER).healthFactor).toBe(1_250_000_000_000_000_000n);
        expect(spoke.getUserPosition(reserves.A, USER).configKey).toBe(0);

        events.length = 0;
        spoke.updateUserDynamicConfig(USER, USER);

        expect(spoke.getUserPosition(reserves.A, USER).configKey).toBe(1);
        expect(spoke.getUserAccountData(USER).healthFactor).toBe(1_125_000_000_000_000_000n);
        expect(events[0]).toEqual({ type: "RefreshDynamicConfig", user: USER, reserveId: reserves.A, dynamicConfigKey: 1 });
    });

    test("calculateUserAccountData returns the new pins without writing them", () => {
        const { spoke, reserves, oracle } = market;
        spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ collateralFactor: 8000n }));

        const status = new PositionStatusMap();
        status.setUsingAsCollateral(reserves.A, true);
        const position = { ...emptyPosition(), suppliedShares: spoke.getUserSuppliedShares(reserves.A, USER) };

        const input = {
            status,
            reserveCount: spoke.getReserveCount(),
            getReserve: (reserveId: number) => spoke.getReserve(reserveId),
            getPosition: () => position,
            getDynamicConfig: (reserveId: number, key: number) => spoke.getDynamicReserveConfig(reserveId, key),
            oracle,
        };

        const pure = calculateUserAccountData({ ...input, refreshConfig: false });
        const refreshed = calculateUserAccountData({ ...input, refreshConfig: true });

        expect(pure.configKeyUpdates.size).toBe(0);
        expect(pure.weightedCollateralFactor).toBe(9000n * 50_000n * VALUE_BASE);
        expect(Array.from(refreshed.configKeyUpdates)).toEqual([[reserves.A, 1]]);
        expect(refreshed.weightedCollateralFactor).toBe(8000n * 50_000n * VALUE_BASE);
        expect(position.configKey).toBe(0);
    });

    test("a price move changes value and health but not the position", () => {
        const { spoke, oracle, reserves } = market;
        oracle.setReservePrice(reserves.A, usd(25_000n));

        const data = spoke.getUserAccountData(USER);
        expect(data.totalCollateralValue).toBe(35_000n * VALUE_BASE);
        expect(data.healthFactor).toBe(687_500_000_000_000_000n);
        expect(spoke.getUserSuppliedAssets(reserves.A, USER)).toBe(units(1n));
    });
});
