import { describe, test, beforeEach } from "node:test";
import { expect } from "expect";
import { pino } from "pino";
import {
    ERROR_CODES,
    MAX_UINT256,
    RAY,
    VALUE_BASE,
    WAD,
} from "../src/constants";
import { InMemoryHub } from "../src/hub/in-memory-hub";
import { InMemoryOracle } from "../src/oracle/in-memory-oracle";
import { Spoke } from "../src/spoke/spoke";
import type { SpokeEvent } from "../src/spoke/events";
import {
    LIQUIDATOR,
    LP,
    MANAGER,
    USER,
    createMarket,
    dynamicConfig,
    expectLedgerError,
    openPosition,
    reserveConfig,
    units,
    usd,
    type Market,
} from "./fixtures";

describe("Spoke", () => {

    let market: Market;

    beforeEach(() => {
        market = createMarket();
    });

    describe("configuration", () => {

        test("lists reserves with the hub's decimals and emits their configs", () => {
            const { spoke, reserves, assets, events } = market;
            expect(spoke.getReserveCount()).toBe(3);
            expect(spoke.getReserve(reserves.B)).toMatchObject({ reserveId: 1, assetId: assets.B, decimals: 18, dynamicConfigKey: 0 });
            expect(events.slice(0, 2)).toEqual([
                { type: "AddReserve", reserveId: reserves.A, assetId: assets.A, decimals: 18 },
                { type: "AddDynamicReserveConfig", reserveId: reserves.A, dynamicConfigKey: 0, config: dynamicConfig({ collateralFactor: 9000n }) },
            ]);
        });

        test("an asset is listed once per hub", () => {
            const { spoke, hub, assets } = market;
            expectLedgerError(
                () => spoke.addReserve(hub, assets.A, reserveConfig(), dynamicConfig()),
                ERROR_CODES.RESERVE_EXISTS,
            );
            expectLedgerError(
                () => spoke.addReserve(hub, 9, reserveConfig(), dynamicConfig()),
                ERROR_CODES.ASSET_NOT_LISTED,
            );
        });

        test("rejects invalid dynamic configs", () => {
            const { spoke, reserves } = market;
            expectLedgerError(
                () => spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ collateralFactor: 10_000n })),
                ERROR_CODES.INVALID_COLLATERAL_FACTOR,
            );
            expectLedgerError(
                () => spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ maxLiquidationBonus: 9_999n })),
                ERROR_CODES.INVALID_LIQUIDATION_BONUS,
            );
            expectLedgerError(
                () => spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ liquidationFee: 10_001n })),
                ERROR_CODES.INVALID_LIQUIDATION_FEE,
            );
            expectLedgerError(
                () => spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ collateralFactor: 9_600n })),
                ERROR_CODES.INCOMPATIBLE_COLLATERAL_FACTOR_AND_BONUS,
            );
            expect(spoke.getReserve(reserves.A).dynamicConfigKey).toBe(0);
        });

        test("an existing config version keeps a non-zero collateral factor", () => {
            const { spoke, reserves } = market;
            expectLedgerError(
                () => spoke.updateDynamicReserveConfig(reserves.A, 0, dynamicConfig({ collateralFactor: 0n })),
                ERROR_CODES.INVALID_COLLATERAL_FACTOR,
            );
            expectLedgerError(
                () => spoke.updateDynamicReserveConfig(reserves.A, 4, dynamicConfig()),
                ERROR_CODES.DYNAMIC_CONFIG_KEY_NOT_FOUND,
            );

            spoke.updateDynamicReserveConfig(reserves.A, 0, dynamicConfig({ collateralFactor: 7_000n }));
            expect(spoke.getDynamicReserveConfig(reserves.A, 0).collateralFactor).toBe(7_000n);
        });

        test("rejects invalid reserve and liquidation configs", () => {
            const { spoke, reserves } = market;
            expectLedgerError(
                () => spoke.updateReserveConfig(reserves.A, reserveConfig({ collateralRisk: 100_001n })),
                ERROR_CODES.INVALID_COLLATERAL_RISK,
            );
            expectLedgerError(
                () => spoke.updateLiquidationConfig({
                    targetHealthFactor: WAD - 1n,
                    healthFactorForMaxBonus: 0n,
                    liquidationBonusFactor: 0n,
                }),
                ERROR_CODES.INVALID_LIQUIDATION_CONFIG,
            );
            expectLedgerError(() => spoke.getReserve(3), ERROR_CODES.RESERVE_NOT_LISTED);
        });
    });

    describe("supply and borrow", () => {

        test("borrowing is bounded by the weighted collateral", () => {
            const { spoke, reserves, hub, assets, events } = market;
            spoke.supply(USER, reserves.A, units(1n), USER);
            spoke.setUsingAsCollateral(USER, reserves.A, true, USER);
            events.length = 0;

            expectLedgerError(
                () => spoke.borrow(USER, reserves.C, units(45_001n), USER),
                ERROR_CODES.HEALTH_FACTOR_BELOW_THRESHOLD,
            );
            expect(events).toEqual([]);
            expect(spoke.isBorrowing(reserves.C, USER)).toBe(false);
            expect(hub.getAsset(assets.C).liquidity).toBe(units(1_000_000n));
            expect(hub.getAccountFlow(USER, assets.C)).toBe(0n);

            spoke.borrow(USER, reserves.C, units(45_000n), USER);
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(WAD);
            expect(hub.getAccountFlow(USER, assets.C)).toBe(units(45_000n));
        });

        test("borrow applies the risk premium to the drawn shares", () => {
            openPosition(market);
            const { spoke, reserves, hub, assets } = market;

            expect(spoke.hasPositiveRiskPremium(USER)).toBe(true);
            expect(spoke.getUserPosition(reserves.C, USER)).toEqual({
                suppliedShares: 0n,
                drawnShares: units(40_000n),
                premiumShares: units(1_500n),
                premiumOffset: units(1_500n),
                realizedPremium: 0n,
                configKey: 0,
            });
            expect(hub.getAsset(assets.C).premiumShares).toBe(units(1_500n));
            expect(spoke.getUserDebt(reserves.C, USER)).toEqual({ drawnDebt: units(40_000n), premiumDebt: 0n });
        });

        test("supplying credits shares without touching the risk premium", () => {
            const { spoke, reserves, events } = market;
            events.length = 0;
            expect(spoke.supply(USER, reserves.A, units(1n), USER)).toBe(units(1n));
            expect(events).toEqual([
                { type: "Supply", reserveId: reserves.A, caller: USER, user: USER, suppliedShares: units(1n), suppliedAmount: units(1n) },
            ]);
            expect(spoke.isUsingAsCollateral(reserves.A, USER)).toBe(false);
        });

        test("rejects zero amounts and unborrowable, frozen or paused reserves", () => {
            const { spoke, reserves } = market;
            spoke.supply(USER, reserves.A, units(1n), USER);
            spoke.setUsingAsCollateral(USER, reserves.A, true, USER);

            expectLedgerError(() => spoke.supply(USER, reserves.A, 0n, USER), ERROR_CODES.INVALID_AMOUNT);

            spoke.updateReserveConfig(reserves.C, reserveConfig({ collateralRisk: 1000n, borrowable: false }));
            expectLedgerError(() => spoke.borrow(USER, reserves.C, units(1n), USER), ERROR_CODES.RESERVE_NOT_BORROWABLE);

            spoke.updateReserveConfig(reserves.C, reserveConfig({ collateralRisk: 1000n, frozen: true }));
            expectLedgerError(() => spoke.borrow(USER, reserves.C, units(1n), USER), ERROR_CODES.RESERVE_FROZEN);
            expectLedgerError(() => spoke.supply(USER, reserves.C, units(1n), USER), ERROR_CODES.RESERVE_FROZEN);

            spoke.updateReserveConfig(reserves.C, reserveConfig({ collateralRisk: 1000n, paused: true }));
            expectLedgerError(() => spoke.supply(USER, reserves.C, units(1n), USER), ERROR_CODES.RESERVE_PAUSED);
        });

        test("a frozen reserve can still be repaid", () => {
            openPosition(market);
            const { spoke, reserves } = market;
            spoke.updateReserveConfig(reserves.C, reserveConfig({ collateralRisk: 1000n, frozen: true }));

            expect(spoke.repay(USER, reserves.C, units(1_000n), USER)).toBe(units(1_000n));
            expect(spoke.getUserTotalDebt(reserves.C, USER)).toBe(units(39_000n));
        });
    });

    describe("withdraw and collateral", () => {

        beforeEach(() => {
            openPosition(market);
        });

        test("withdrawing collateral must keep the position healthy", () => {
            const { spoke, reserves } = market;
            expectLedgerError(
                () => spoke.withdraw(USER, reserves.A, units(1n) / 2n, USER),
                ERROR_CODES.HEALTH_FACTOR_BELOW_THRESHOLD,
            );
            expect(spoke.getUserSuppliedAssets(reserves.A, USER)).toBe(units(1n));

            expect(spoke.withdraw(USER, reserves.B, MAX_UINT256, USER)).toBe(units(1n));
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(1_125_000_000_000_000_000n);
        });

        test("withdrawing everything clears the collateral flag", () => {
            const { spoke, reserves } = market;
            spoke.withdraw(USER, reserves.B, MAX_UINT256, USER);

            expect(spoke.isUsingAsCollateral(reserves.B, USER)).toBe(false);
            expect(spoke.isUsingAsCollateral(reserves.A, USER)).toBe(true);
            expect(spoke.getUserAccountData(USER).activeCollateralCount).toBe(1);
        });

        test("withdraw of an empty position fails", () => {
            const { spoke, reserves } = market;
            expectLedgerError(() => spoke.withdraw(USER, reserves.C, units(1n), USER), ERROR_CODES.INSUFFICIENT_SUPPLY);
        });

        test("disabling collateral re-checks health and re-prices the premium", () => {
            const { spoke, reserves } = market;
            expectLedgerError(
                () => spoke.setUsingAsCollateral(USER, reserves.A, false, USER),
                ERROR_CODES.HEALTH_FACTOR_BELOW_THRESHOLD,
            );
            expect(spoke.isUsingAsCollateral(reserves.A, USER)).toBe(true);

            spoke.setUsingAsCollateral(USER, reserves.B, false, USER);
            expect(spoke.isUsingAsCollateral(reserves.B, USER)).toBe(false);
            expect(spoke.getUserAccountData(USER).riskPremium).toBe(500n);
            expect(spoke.getUserPosition(reserves.C, USER).premiumShares).toBe(units(2_000n));
        });

        test("setting the current collateral flag again is a no-op", () => {
            const { spoke, reserves, events } = market;
            events.length = 0;
            spoke.setUsingAsCollateral(USER, reserves.A, true, USER);
            expect(events).toEqual([]);
        });
    });

    describe("repay", () => {

        beforeEach(() => {
            openPosition(market);
            market.hub.setDrawnIndex(market.assets.C, 11n * RAY / 10n);
        });

        test("premium debt is repaid before drawn debt", () => {
            const { spoke, reserves, hub, assets, events } = market;
            expect(spoke.getUserDebt(reserves.C, USER)).toEqual({ drawnDebt: units(44_000n), premiumDebt: units(150n) });
            events.length = 0;

            expect(spoke.repay(USER, reserves.C, units(100n), USER)).toBe(units(100n));

            expect(events[0]).toEqual({
                type: "Repay",
                reserveId: reserves.C,
                caller: USER,
                user: USER,
                drawnShares: 0n,
                drawnAmount: 0n,
                premiumAmount: units(100n),
            });
            expect(events[1]).toEqual({ type: "UpdateUserRiskPremium", user: USER, riskPremium: 387n });
            expect(spoke.getUserPosition(reserves.C, USER)).toMatchObject({
                drawnShares: units(40_000n),
                premiumShares: units(1_548n),
                premiumOffset: 1_702_800_000_000_000_000_000n,
                realizedPremium: units(50n),
            });
            expect(spoke.getUserDebt(reserves.C, USER)).toEqual({ drawnDebt: units(44_000n), premiumDebt: units(50n) });
            expect(hub.getAsset(assets.C).premiumDebt).toBe(units(50n));
        });

        test("repaying everything clears the borrow", () => {
            const { spoke, reserves, hub, assets } = market;
            expect(spoke.repay(USER, reserves.C, MAX_UINT256, USER)).toBe(units(44_150n));

            expect(spoke.isBorrowing(reserves.C, USER)).toBe(false);
            expect(spoke.hasPositiveRiskPremium(USER)).toBe(false);
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(MAX_UINT256);

            const asset = hub.getAsset(assets.C);
            expect(asset.drawnShares).toBe(0n);
            expect(asset.premiumShares).toBe(0n);
            expect(asset.premiumOffset).toBe(0n);
            expect(asset.realizedPremium).toBe(0n);
            expect(hub.getAccountFlow(USER, assets.C)).toBe(-units(4_150n));
        });

        test("repaying a reserve that is not borrowed fails", () => {
            const { spoke, reserves } = market;
            expectLedgerError(() => spoke.repay(USER, reserves.A, units(1n), USER), ERROR_CODES.RESERVE_NOT_BORROWED);
        });
    });

    describe("risk premium and dynamic config", () => {

        beforeEach(() => {
            openPosition(market);
        });

        test("updateUserRiskPremium re-prices premium after a collateral price move", () => {
            const { spoke, reserves, oracle } = market;
            oracle.setReservePrice(reserves.B, usd(5_000n));

            expect(spoke.updateUserRiskPremium(USER, USER)).toBe(438n);
            expect(spoke.getUserPosition(reserves.C, USER).premiumShares).toBe(units(1_752n));
        });

        test("a riskier config version only applies once the user refreshes", () => {
            const { spoke, reserves, events } = market;
            spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ collateralFactor: 8_000n }));
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(1_250_000_000_000_000_000n);

            events.length = 0;
            spoke.updateUserDynamicConfig(USER, USER);

            expect(spoke.getUserPosition(reserves.A, USER).configKey).toBe(1);
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(1_125_000_000_000_000_000n);
            expect(events.map((event) => event.type)).toEqual(["RefreshDynamicConfig", "UpdateUserRiskPremium"]);
        });

        test("a refresh that would make the user unhealthy is rejected", () => {
            const { spoke, reserves } = market;
            spoke.addDynamicReserveConfig(reserves.A, dynamicConfig({ collateralFactor: 1_000n }));

            expectLedgerError(() => spoke.updateUserDynamicConfig(USER, USER), ERROR_CODES.HEALTH_FACTOR_BELOW_THRESHOLD);
            expect(spoke.getUserPosition(reserves.A, USER).configKey).toBe(0);
        });
    });

    describe("position managers", () => {

        test("a manager acts for a user only while active and approved", () => {
            const { spoke, reserves, hub, assets } = market;
            expectLedgerError(() => spoke.supply(MANAGER, reserves.A, units(1n), USER), ERROR_CODES.UNAUTHORIZED);

            spoke.updatePositionManager(MANAGER, true);
            expectLedgerError(() => spoke.supply(MANAGER, reserves.A, units(1n), USER), ERROR_CODES.UNAUTHORIZED);

            spoke.setUserPositionManager(USER, MANAGER, true);
            expect(spoke.isPositionManager(USER, MANAGER)).toBe(true);
            spoke.supply(MANAGER, reserves.A, units(1n), USER);
            expect(spoke.getUserSuppliedShares(reserves.A, USER)).toBe(units(1n));
            expect(hub.getAccountFlow(MANAGER, assets.A)).toBe(-units(1n));

            spoke.updatePositionManager(MANAGER, false);
            expect(spoke.isPositionManager(USER, MANAGER)).toBe(false);
            expectLedgerError(() => spoke.withdraw(MANAGER, reserves.A, units(1n), USER), ERROR_CODES.UNAUTHORIZED);
        });
    });

    describe("liquidation", () => {

        test("liquidates an unhealthy position across two collaterals", () => {
            openPosition(market);
            const { spoke, reserves, oracle, hub, assets, events } = market;
            oracle.setReservePrice(reserves.A, usd(25_000n));
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(687_500_000_000_000_000n);
            events.length = 0;

            const outcome = spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, MAX_UINT256);

            expect(outcome).toEqual({
                debtToLiquidate: 23_809_523_809_523_809_523_809n,
                collateralToLiquidate: units(1n),
                collateralToLiquidator: units(1n),
                protocolFee: 0n,
                liquidationBonus: 10_500n,
                isCollateralExhausted: true,
                hasDeficit: false,
            });
            expect(events.map((event) => event.type)).toEqual(["LiquidationCall", "UpdateUserRiskPremium"]);

            expect(spoke.isUsingAsCollateral(reserves.A, USER)).toBe(false);
            expect(spoke.getUserTotalDebt(reserves.C, USER)).toBe(16_190_476_190_476_190_476_191n);
            expect(spoke.getUserAccountData(USER)).toEqual({
                riskPremium: 0n,
                avgCollateralFactor: 500_000_000_000_000_000n,
                healthFactor: 308_823_529_411_764_705n,
                totalCollateralValue: 10_000n * VALUE_BASE,
                totalDebtValue: 1_619_047_619_047_619_047_619_100_000_000n,
                activeCollateralCount: 1,
                borrowedCount: 1,
            });
            expect(hub.getAccountFlow(LIQUIDATOR, assets.A)).toBe(units(1n));
            expect(hub.getAccountFlow(LIQUIDATOR, assets.C)).toBe(-23_809_523_809_523_809_523_809n);
        });

        test("a partial liquidation stops at the target health factor", () => {
            const { spoke, reserves, oracle } = market;
            spoke.supply(USER, reserves.A, units(1n), USER);
            spoke.supply(USER, reserves.B, units(3n), USER);
            spoke.setUsingAsCollateral(USER, reserves.A, true, USER);
            spoke.setUsingAsCollateral(USER, reserves.B, true, USER);
            spoke.borrow(USER, reserves.C, units(40_000n), USER);
            oracle.setReservePrice(reserves.A, usd(20_000n));

            const healthFactorBefore = spoke.getUserAccountData(USER).healthFactor;
            expect(healthFactorBefore).toBe(825_000_000_000_000_000n);

            const outcome = spoke.liquidationCall(LIQUIDATOR, reserves.B, reserves.C, USER, MAX_UINT256);

            expect(outcome.debtToLiquidate).toBe(14_736_842_105_263_157_894_737n);
            expect(outcome.collateralToLiquidate).toBe(1_547_368_421_052_631_579n);
            expect(outcome.isCollateralExhausted).toBe(false);
            expect(spoke.isUsingAsCollateral(reserves.B, USER)).toBe(true);

            const { healthFactor } = spoke.getUserAccountData(USER);
            expect(healthFactor).toBe(999_999_999_999_999_999n);
            expect(healthFactor).toBeGreaterThan(healthFactorBefore);
            expect(healthFactor).toBeLessThanOrEqual(spoke.getLiquidationConfig().targetHealthFactor);
        });

        test("precondition failures", () => {
            openPosition(market);
            const { spoke, reserves } = market;

            expectLedgerError(
                () => spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, MAX_UINT256),
                ERROR_CODES.HEALTH_FACTOR_NOT_BELOW_THRESHOLD,
            );
            expectLedgerError(
                () => spoke.liquidationCall(USER, reserves.A, reserves.C, USER, MAX_UINT256),
                ERROR_CODES.SELF_LIQUIDATION,
            );
            expectLedgerError(
                () => spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, 0n),
                ERROR_CODES.INVALID_AMOUNT,
            );
            expectLedgerError(
                () => spoke.liquidationCall(LIQUIDATOR, reserves.C, reserves.C, USER, MAX_UINT256),
                ERROR_CODES.RESERVE_NOT_ENABLED_AS_COLLATERAL,
            );
            expectLedgerError(
                () => spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.B, USER, MAX_UINT256),
                ERROR_CODES.RESERVE_NOT_BORROWED,
            );

            spoke.addDynamicReserveConfig(reserves.B, dynamicConfig({ collateralFactor: 0n }));
            spoke.updateUserDynamicConfig(USER, USER);
            expectLedgerError(
                () => spoke.liquidationCall(LIQUIDATOR, reserves.B, reserves.C, USER, MAX_UINT256),
                ERROR_CODES.COLLATERAL_CANNOT_BE_LIQUIDATED,
            );

            spoke.updateReserveConfig(reserves.C, reserveConfig({ collateralRisk: 1000n, paused: true }));
            expectLedgerError(
                () => spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, MAX_UINT256),
                ERROR_CODES.RESERVE_PAUSED,
            );
        });

        describe("dust", () => {

            beforeEach(() => {
                const { spoke, reserves, oracle } = market;
                spoke.supply(USER, reserves.A, units(2n), USER);
                spoke.setUsingAsCollateral(USER, reserves.A, true, USER);
                spoke.borrow(USER, reserves.C, units(40_000n), USER);
                spoke.updateLiquidationConfig({
                    targetHealthFactor: 3n * WAD,
                    healthFactorForMaxBonus: 0n,
                    liquidationBonusFactor: 10_000n,
                });
                oracle.setReservePrice(reserves.A, usd(22_000n));
            });

            test("a debt left below the dust threshold is liquidated in full", () => {
                const { spoke, reserves } = market;
                expect(spoke.getUserAccountData(USER).healthFactor).toBe(990_000_000_000_000_000n);

                const outcome = spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, MAX_UINT256);

                expect(outcome.debtToLiquidate).toBe(units(40_000n));
                expect(outcome.collateralToLiquidate).toBe(1_909_090_909_090_909_091n);
                expect(outcome.isCollateralExhausted).toBe(false);
                expect(spoke.isBorrowing(reserves.C, USER)).toBe(false);
                expect(spoke.getUserSuppliedShares(reserves.A, USER)).toBe(90_909_090_909_090_909n);
            });

            test("a cover that would leave dust is rejected and nothing moves", () => {
                const { spoke, reserves, hub, assets, events } = market;
                events.length = 0;

                expectLedgerError(
                    () => spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, units(39_100n)),
                    ERROR_CODES.MUST_NOT_LEAVE_DUST,
                );
                expect(events).toEqual([]);
                expect(spoke.getUserTotalDebt(reserves.C, USER)).toBe(units(40_000n));
                expect(spoke.getUserSuppliedShares(reserves.A, USER)).toBe(units(2n));
                expect(hub.getAccountFlow(LIQUIDATOR, assets.C)).toBe(0n);
            });
        });

        test("emptying the last collateral of an insolvent user reports every debt as deficit", () => {
            const { spoke, reserves, oracle, hub, assets, events } = market;
            spoke.supply(USER, reserves.A, units(1n), USER);
            spoke.setUsingAsCollateral(USER, reserves.A, true, USER);
            spoke.borrow(USER, reserves.C, units(40_000n), USER);
            spoke.borrow(USER, reserves.B, units(1n) / 10n, USER);
            expect(spoke.getUserPosition(reserves.C, USER).premiumShares).toBe(units(2_000n));
            expect(spoke.getUserPosition(reserves.B, USER).premiumShares).toBe(units(1n) / 200n);

            oracle.setReservePrice(reserves.A, usd(30_000n));
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(658_536_585_365_853_658n);
            events.length = 0;

            const outcome = spoke.liquidationCall(LIQUIDATOR, reserves.A, reserves.C, USER, MAX_UINT256);

            expect(outcome.hasDeficit).toBe(true);
            expect(outcome.debtToLiquidate).toBe(28_571_428_571_428_571_428_571n);
            expect(events).toEqual([
                {
                    type: "LiquidationCall",
                    collateralReserveId: reserves.A,
                    debtReserveId: reserves.C,
                    user: USER,
                    liquidator: LIQUIDATOR,
                    debtToLiquidate: 28_571_428_571_428_571_428_571n,
                    collateralToLiquidate: units(1n),
                    collateralToLiquidator: units(1n),
                    protocolFee: 0n,
                    hasDeficit: true,
                },
                {
                    type: "ReportDeficit",
                    reserveId: reserves.C,
                    user: USER,
                    drawnAmount: 11_428_571_428_571_428_571_429n,
                    premiumAmount: 0n,
                    deficitShares: 11_428_571_428_571_428_571_429n,
                },
                {
                    type: "ReportDeficit",
                    reserveId: reserves.B,
                    user: USER,
                    drawnAmount: units(1n) / 10n,
                    premiumAmount: 0n,
                    deficitShares: units(1n) / 10n,
                },
                { type: "UpdateUserRiskPremium", user: USER, riskPremium: 0n },
            ]);

            expect(spoke.isBorrowing(reserves.C, USER)).toBe(false);
            expect(spoke.isBorrowing(reserves.B, USER)).toBe(false);
            expect(spoke.hasPositiveRiskPremium(USER)).toBe(false);
            expect(spoke.getUserAccountData(USER).healthFactor).toBe(MAX_UINT256);
            expect(hub.getAsset(assets.C).deficit).toBe(11_428_571_428_571_428_571_429n);
            expect(hub.getAsset(assets.C).premiumShares).toBe(0n);
            expect(hub.getAsset(assets.B).premiumShares).toBe(0n);
        });
    });

    describe("events", () => {

        test("a failing listener is logged and the others still run", () => {
            const lines: string[] = [];
            const logger = pino({ level: "error" }, { write: (line: string) => { lines.push(line); } });
            const hub = new InMemoryHub({ clock: () => 0n });
            const oracle = new InMemoryOracle();
            const spoke = new Spoke({ oracle, logger });
            const received: SpokeEvent[] = [];

            spoke.onEvent(() => {
                throw new Error("listener down");
            });
            const unsubscribe = spoke.onEvent((event) => received.push(event));

            const reserveId = spoke.addReserve(hub, hub.addAsset(6), reserveConfig(), dynamicConfig());
            expect(reserveId).toBe(0);
            expect(received.map((event) => event.type)).toEqual(["AddReserve", "AddDynamicReserveConfig"]);
            expect(lines).toHaveLength(2);
            expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "Event listener failed", event: "AddReserve" });

            unsubscribe();
            spoke.supply(LP, reserveId, 1_000_000n, LP);
            expect(received).toHaveLength(2);
        });
    });
});
