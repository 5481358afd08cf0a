import { pino, type Logger } from "pino";
import type { IHub, IOracle } from "../interfaces";
import { isCheckpointable } from "../interfaces";
import type {
    Address,
    DynamicReserveConfig,
    LiquidationConfig,
    LiquidationOutcome,
    Reserve,
    ReserveConfig,
    UserAccountData,
    UserDebt,
    UserPosition,
} from "../types";
import {
    HEALTH_FACTOR_LIQUIDATION_THRESHOLD,
    MAX_DYNAMIC_CONFIG_KEY,
} from "../constants";
import { Rounding, min, toValue } from "../utils/math";
import { stringifyFields } from "../utils";
import { fail } from "../errors";
import { LedgerStore } from "./store";
import { NOT_FOUND } from "./position-status";
import { calculateUserAccountData, type AccountDataResult } from "./account-data";
import {
    clearPositionPremium,
    getPositionDebt,
    refreshPositionPremium,
    settlePositionPremium,
    splitDrawnFirst,
    splitPremiumFirst,
} from "./premium";
import {
    calculateDebtToTargetHealthFactor,
    calculateLiquidationAmounts,
    calculateLiquidationBonus,
    estimateHealthFactorAfter,
    isDeficit,
} from "./liquidation";
import {
    validateDynamicReserveConfig,
    validateLiquidationConfig,
    validateReserveConfig,
} from "./validation";
import type { SpokeEvent, SpokeEventListener } from "./events";

export interface SpokeOptions {
    oracle: IOracle;
    logger?: Logger;
    store?: LedgerStore;
}

function unitOf(reserve: Reserve): bigint {
    return 10n ** BigInt(reserve.decimals);
}

/**
 * Position ledger for the reserves listed on it. Every state-mutating call is
 * all-or-nothing: a thrown error rolls back the ledger and every checkpointable
 * hub, and discards the call's events.
 */
export class Spoke {
    private store: LedgerStore;
    private oracle: IOracle;
    private logger: Logger;
    private listeners: Set<SpokeEventListener> = new Set();
    private pendingEvents?: SpokeEvent[];

    constructor(options: SpokeOptions) {
        this.oracle = options.oracle;
        this.store = options.store ?? new LedgerStore();
        this.logger = options.logger ?? pino({ level: "silent" });
    }

    /**
     * Subscribe to committed events
     * @returns unsubscribe function
     */
    onEvent(listener: SpokeEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // ==================== Configuration ====================

    addReserve(hub: IHub, assetId: number, config: ReserveConfig, dynamicConfig: DynamicReserveConfig): number {
        return this.atomic(() => {
            if (this.store.findReserveId(hub, assetId) !== undefined) {
                fail("RESERVE_EXISTS", `asset ${assetId} is already listed for this hub`, { assetId });
            }
            validateReserveConfig(config);
            validateDynamicReserveConfig(dynamicConfig, false);

            const decimals = hub.getAssetDecimals(assetId);
            const reserve = this.store.addReserve({
                paused: config.paused,
                frozen: config.frozen,
                borrowable: config.borrowable,
                collateralRisk: config.collateralRisk,
                hub,
                assetId,
                decimals,
                dynamicConfigKey: 0,
            });
            const dynamicConfigKey = this.store.appendDynamicConfig(reserve.reserveId, dynamicConfig);

            this.emit({ type: "AddReserve", reserveId: reserve.reserveId, assetId, decimals });
            this.emit({ type: "AddDynamicReserveConfig", reserveId: reserve.reserveId, dynamicConfigKey, config: { ...dynamicConfig } });
            return reserve.reserveId;
        });
    }

    updateReserveConfig(reserveId: number, config: ReserveConfig): void {
        this.atomic(() => {
            const reserve = this.store.getReserve(reserveId);
            validateReserveConfig(config);

            reserve.paused = config.paused;
            reserve.frozen = config.frozen;
            reserve.borrowable = config.borrowable;
            reserve.collateralRisk = config.collateralRisk;

            this.emit({ type: "UpdateReserveConfig", reserveId, config: { ...config } });
        });
    }

    /**
     * Append a dynamic config version and make it current for the reserve
     * @returns key of the new version
     */
    addDynamicReserveConfig(reserveId: number, dynamicConfig: DynamicReserveConfig): number {
        return this.atomic(() => {
            const reserve = this.store.getReserve(reserveId);
            if (this.store.getDynamicConfigs(reserveId).length > MAX_DYNAMIC_CONFIG_KEY) {
                fail("MAXIMUM_DYNAMIC_CONFIG_KEY_REACHED", `reserve ${reserveId} has no config keys left`, { reserveId });
            }
            validateDynamicReserveConfig(dynamicConfig, false);

            const dynamicConfigKey = this.store.appendDynamicConfig(reserveId, dynamicConfig);
            reserve.dynamicConfigKey = dynamicConfigKey;

            this.emit({ type: "AddDynamicReserveConfig", reserveId, dynamicConfigKey, config: { ...dynamicConfig } });
            return dynamicConfigKey;
        });
    }

    updateDynamicReserveConfig(reserveId: number, dynamicConfigKey: number, dynamicConfig: DynamicReserveConfig): void {
        this.atomic(() => {
            this.store.getReserve(reserveId);
            this.store.getDynamicConfig(reserveId, dynamicConfigKey);
            validateDynamicReserveConfig(dynamicConfig, true);

            this.store.setDynamicConfig(reserveId, dynamicConfigKey, dynamicConfig);
            this.emit({ type: "UpdateDynamicReserveConfig", reserveId, dynamicConfigKey, config: { ...dynamicConfig } });
        });
    }

    updateLiquidationConfig(config: LiquidationConfig): void {
        this.atomic(() => {
            validateLiquidationConfig(config);
            this.store.setLiquidationConfig(config);
            this.emit({ type: "UpdateLiquidationConfig", config: { ...config } });
        });
    }

    updatePositionManager(positionManager: Address, active: boolean): void {
        this.atomic(() => {
            this.store.setPositionManager(positionManager, active);
            this.emit({ type: "UpdatePositionManager", positionManager, active });
        });
    }

    // ==================== User actions ====================

    /**
     * Approve or revoke `positionManager` acting for `user`
     */
    setUserPositionManager(user: Address, positionManager: Address, approve: boolean): void {
        this.atomic(() => {
            this.store.setApproval(user, positionManager, approve);
            this.emit({ type: "SetUserPositionManager", user, positionManager, approve });
        });
    }

    /**
     * @returns added shares credited to `onBehalfOf`
     */
    supply(caller: Address, reserveId: number, amount: bigint, onBehalfOf: Address): bigint {
        return this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const reserve = this.store.getReserve(reserveId);
            this.requireNotPaused(reserve);
            this.requireNotFrozen(reserve);
            this.requirePositive(amount);

            const suppliedShares = reserve.hub.add(reserve.assetId, amount, caller);
            this.store.position(onBehalfOf, reserveId).suppliedShares += suppliedShares;
            // status record exists for every user that ever held a position
            this.store.status(onBehalfOf);

            this.emit({ type: "Supply", reserveId, caller, user: onBehalfOf, suppliedShares, suppliedAmount: amount });
            return suppliedShares;
        });
    }

    /**
     * @param amount - capped to the supplied balance; MAX_UINT256 withdraws everything
     * @returns amount withdrawn
     */
    withdraw(caller: Address, reserveId: number, amount: bigint, onBehalfOf: Address): bigint {
        return this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const reserve = this.store.getReserve(reserveId);
            this.requireNotPaused(reserve);
            this.requirePositive(amount);

            const position = this.store.position(onBehalfOf, reserveId);
            const supplied = reserve.hub.previewRemoveByShares(reserve.assetId, position.suppliedShares);
            if (supplied === 0n) {
                fail("INSUFFICIENT_SUPPLY", `user has nothing supplied in reserve ${reserveId}`, { reserveId, user: onBehalfOf });
            }
            const withdrawnAmount = min(amount, supplied);

            const withdrawnShares = reserve.hub.remove(reserve.assetId, withdrawnAmount, caller);
            position.suppliedShares -= withdrawnShares;

            this.emit({ type: "Withdraw", reserveId, caller, user: onBehalfOf, withdrawnShares, withdrawnAmount });

            const status = this.store.status(onBehalfOf);
            if (status.isUsingAsCollateral(reserveId)) {
                if (position.suppliedShares === 0n) {
                    status.setUsingAsCollateral(reserveId, false);
                }
                const { accountData } = this.refreshAccountData(onBehalfOf);
                this.requireHealthy(accountData);
                this.applyRiskPremium(onBehalfOf, accountData.riskPremium);
            }
            return withdrawnAmount;
        });
    }

    /**
     * @returns drawn shares added to the position
     */
    borrow(caller: Address, reserveId: number, amount: bigint, onBehalfOf: Address): bigint {
        return this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const reserve = this.store.getReserve(reserveId);
            this.requireNotPaused(reserve);
            this.requireNotFrozen(reserve);
            if (!reserve.borrowable) {
                fail("RESERVE_NOT_BORROWABLE", `reserve ${reserveId} is not borrowable`, { reserveId });
            }
            this.requirePositive(amount);

            const drawnShares = reserve.hub.draw(reserve.assetId, amount, caller);
            this.store.position(onBehalfOf, reserveId).drawnShares += drawnShares;
            this.store.status(onBehalfOf).setBorrowing(reserveId, true);

            this.emit({ type: "Borrow", reserveId, caller, user: onBehalfOf, drawnShares, drawnAmount: amount });

            const { accountData } = this.refreshAccountData(onBehalfOf);
            this.requireHealthy(accountData);
            this.applyRiskPremium(onBehalfOf, accountData.riskPremium);
            return drawnShares;
        });
    }

    /**
     * Premium debt is repaid before drawn debt
     * @param amount - capped to the total debt; MAX_UINT256 repays everything
     * @returns amount repaid
     */
    repay(caller: Address, reserveId: number, amount: bigint, onBehalfOf: Address): bigint {
        return this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const reserve = this.store.getReserve(reserveId);
            this.requireNotPaused(reserve);
            this.requirePositive(amount);

            const status = this.store.status(onBehalfOf);
            if (!status.isBorrowing(reserveId)) {
                fail("RESERVE_NOT_BORROWED", `user is not borrowing reserve ${reserveId}`, { reserveId, user: onBehalfOf });
            }

            const position = this.store.position(onBehalfOf, reserveId);
            const debt = getPositionDebt(reserve.hub, reserve.assetId, position);
            const repaidAmount = min(amount, debt.drawnDebt + debt.premiumDebt);
            const { drawnRestored, premiumRestored } = splitPremiumFirst(debt, repaidAmount);

            const drawnShares = this.restoreDebt(reserve, position, drawnRestored, premiumRestored, caller);
            if (position.drawnShares === 0n && position.realizedPremium === 0n) {
                status.setBorrowing(reserveId, false);
            }

            this.emit({
                type: "Repay",
                reserveId,
                caller,
                user: onBehalfOf,
                drawnShares,
                drawnAmount: drawnRestored,
                premiumAmount: premiumRestored,
            });

            const { accountData } = this.currentAccountData(onBehalfOf);
            this.applyRiskPremium(onBehalfOf, accountData.riskPremium);
            return repaidAmount;
        });
    }

    setUsingAsCollateral(caller: Address, reserveId: number, usingAsCollateral: boolean, onBehalfOf: Address): void {
        this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const reserve = this.store.getReserve(reserveId);
            this.requireNotPaused(reserve);

            const status = this.store.status(onBehalfOf);
            if (status.isUsingAsCollateral(reserveId) === usingAsCollateral) return;

            if (usingAsCollateral) {
                this.requireNotFrozen(reserve);
                status.setUsingAsCollateral(reserveId, true);
                this.pinConfigKey(onBehalfOf, reserve);
                this.emit({ type: "SetUsingAsCollateral", reserveId, caller, user: onBehalfOf, usingAsCollateral });
                return;
            }

            status.setUsingAsCollateral(reserveId, false);
            this.emit({ type: "SetUsingAsCollateral", reserveId, caller, user: onBehalfOf, usingAsCollateral });

            const { accountData } = this.refreshAccountData(onBehalfOf);
            this.requireHealthy(accountData);
            this.applyRiskPremium(onBehalfOf, accountData.riskPremium);
        });
    }

    /**
     * Re-derive the user's premium shares from the current risk premium
     * @returns the risk premium applied
     */
    updateUserRiskPremium(caller: Address, onBehalfOf: Address): bigint {
        return this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const { accountData } = this.currentAccountData(onBehalfOf);
            this.applyRiskPremium(onBehalfOf, accountData.riskPremium);
            return accountData.riskPremium;
        });
    }

    /**
     * Pin every collateral position of the user to its reserve's current
     * dynamic config; the result must stay healthy
     */
    updateUserDynamicConfig(caller: Address, onBehalfOf: Address): void {
        this.atomic(() => {
            this.authorize(caller, onBehalfOf);
            const { accountData } = this.refreshAccountData(onBehalfOf);
            this.requireHealthy(accountData);
            this.applyRiskPremium(onBehalfOf, accountData.riskPremium);
        });
    }

    /**
     * Repay up to `debtToCover` of `user`'s debt in `debtReserveId` and seize
     * the matching collateral plus bonus from `collateralReserveId`.
     * When the user's last collateral is emptied while insolvent, every
     * remaining debt of the user is reported to its hub as deficit.
     */
    liquidationCall(
        caller: Address,
        collateralReserveId: number,
        debtReserveId: number,
        user: Address,
        debtToCover: bigint,
    ): LiquidationOutcome {
        return this.atomic(() => {
            const collateralReserve = this.store.getReserve(collateralReserveId);
            const debtReserve = this.store.getReserve(debtReserveId);
            this.requireNotPaused(collateralReserve);
            this.requireNotPaused(debtReserve);
            if (caller === user) {
                fail("SELF_LIQUIDATION", "users cannot liquidate themselves", { user });
            }
            this.requirePositive(debtToCover);

            const status = this.store.status(user);
            if (!status.isUsingAsCollateral(collateralReserveId)) {
                fail("RESERVE_NOT_ENABLED_AS_COLLATERAL", `reserve ${collateralReserveId} is not collateral for the user`, {
                    reserveId: collateralReserveId,
                    user,
                });
            }
            if (!status.isBorrowing(debtReserveId)) {
                fail("RESERVE_NOT_BORROWED", `user is not borrowing reserve ${debtReserveId}`, { reserveId: debtReserveId, user });
            }

            const collateralPosition = this.store.position(user, collateralReserveId);
            const collateralConfig = this.store.getDynamicConfig(collateralReserveId, collateralPosition.configKey);
            const collateralBalance = collateralReserve.hub.previewRemoveByShares(
                collateralReserve.assetId,
                collateralPosition.suppliedShares,
            );
            if (collateralConfig.collateralFactor === 0n || collateralBalance === 0n) {
                fail("COLLATERAL_CANNOT_BE_LIQUIDATED", `reserve ${collateralReserveId} backs none of the user's debt`, {
                    reserveId: collateralReserveId,
                    user,
                });
            }

            // snapshot taken once, before any balance moves
            const snapshot = this.currentAccountData(user);
            const { healthFactor } = snapshot.accountData;
            if (healthFactor >= HEALTH_FACTOR_LIQUIDATION_THRESHOLD) {
                fail("HEALTH_FACTOR_NOT_BELOW_THRESHOLD", "user is not liquidatable", { user, healthFactor });
            }

            const liquidationConfig = this.store.getLiquidationConfig();
            const collateralAssetPrice = this.oracle.getReservePrice(collateralReserveId);
            const debtAssetPrice = this.oracle.getReservePrice(debtReserveId);
            const collateralAssetUnit = unitOf(collateralReserve);
            const debtAssetUnit = unitOf(debtReserve);

            const liquidationBonus = calculateLiquidationBonus(
                liquidationConfig,
                healthFactor,
                collateralConfig.maxLiquidationBonus,
            );

            const debtPosition = this.store.position(user, debtReserveId);
            const debt = getPositionDebt(debtReserve.hub, debtReserve.assetId, debtPosition);

            const debtToTarget = calculateDebtToTargetHealthFactor({
                totalDebtValue: snapshot.accountData.totalDebtValue,
                healthFactor,
                targetHealthFactor: liquidationConfig.targetHealthFactor,
                liquidationBonus,
                collateralFactor: collateralConfig.collateralFactor,
                debtAssetPrice,
                debtAssetUnit,
            });

            const amounts = calculateLiquidationAmounts({
                reserveDebt: debt.drawnDebt + debt.premiumDebt,
                collateralBalance,
                debtToCover,
                debtToTarget,
                liquidationBonus,
                liquidationFee: collateralConfig.liquidationFee,
                collateralAssetPrice,
                collateralAssetUnit,
                debtAssetPrice,
                debtAssetUnit,
            });

            const healthFactorAfter = estimateHealthFactorAfter({
                weightedCollateralFactor: snapshot.weightedCollateralFactor,
                totalDebtValue: snapshot.accountData.totalDebtValue,
                collateralFactor: collateralConfig.collateralFactor,
                collateralValueRemoved: toValue(amounts.collateralToLiquidate, collateralAssetPrice, collateralAssetUnit, Rounding.Ceil),
                debtValueRemoved: toValue(amounts.debtToLiquidate, debtAssetPrice, debtAssetUnit, Rounding.Floor),
            });

            const hasDeficit = isDeficit({
                activeCollateralCount: snapshot.accountData.activeCollateralCount,
                isCollateralExhausted: amounts.isCollateralExhausted,
                totalCollateralValue: snapshot.accountData.totalCollateralValue,
                totalDebtValue: snapshot.accountData.totalDebtValue,
                healthFactorBefore: healthFactor,
                healthFactorAfter,
            });

            this.seizeCollateral(collateralReserve, collateralPosition, amounts.collateralToLiquidator, amounts.protocolFee, amounts.isCollateralExhausted, caller);
            if (collateralPosition.suppliedShares === 0n) {
                status.setUsingAsCollateral(collateralReserveId, false);
            }

            const { drawnRestored, premiumRestored } = splitDrawnFirst(debt, amounts.debtToLiquidate);
            this.restoreDebt(debtReserve, debtPosition, drawnRestored, premiumRestored, caller);
            if (debtPosition.drawnShares === 0n && debtPosition.realizedPremium === 0n) {
                status.setBorrowing(debtReserveId, false);
            }

            const outcome: LiquidationOutcome = { ...amounts, hasDeficit };
            this.emit({
                type: "LiquidationCall",
                collateralReserveId,
                debtReserveId,
                user,
                liquidator: caller,
                debtToLiquidate: amounts.debtToLiquidate,
                collateralToLiquidate: amounts.collateralToLiquidate,
                collateralToLiquidator: amounts.collateralToLiquidator,
                protocolFee: amounts.protocolFee,
                hasDeficit,
            });

            if (hasDeficit) {
                this.reportDeficits(user);
            } else {
                const { accountData } = this.currentAccountData(user);
                this.applyRiskPremium(user, accountData.riskPremium);
            }
            return outcome;
        });
    }

    // ==================== Reads ====================

    getUserAccountData(user: Address): UserAccountData {
        return this.computeAccountData(user, false, false).accountData;
    }

    getUserSuppliedShares(reserveId: number, user: Address): bigint {
        this.store.getReserve(reserveId);
        return this.store.peekPosition(user, reserveId).suppliedShares;
    }

    getUserSuppliedAssets(reserveId: number, user: Address): bigint {
        const reserve = this.store.getReserve(reserveId);
        return reserve.hub.previewRemoveByShares(reserve.assetId, this.store.peekPosition(user, reserveId).suppliedShares);
    }

    getUserDebt(reserveId: number, user: Address): UserDebt {
        const reserve = this.store.getReserve(reserveId);
        return getPositionDebt(reserve.hub, reserve.assetId, this.store.peekPosition(user, reserveId));
    }

    getUserTotalDebt(reserveId: number, user: Address): bigint {
        const { drawnDebt, premiumDebt } = this.getUserDebt(reserveId, user);
        return drawnDebt + premiumDebt;
    }

    getUserPosition(reserveId: number, user: Address): UserPosition {
        this.store.getReserve(reserveId);
        return { ...this.store.peekPosition(user, reserveId) };
    }

    getReserve(reserveId: number): Reserve {
        return { ...this.store.getReserve(reserveId) };
    }

    getReserves(): Reserve[] {
        return this.store.getAllReserves().map((reserve) => ({ ...reserve }));
    }

    getReserveConfig(reserveId: number): ReserveConfig {
        const { paused, frozen, borrowable, collateralRisk } = this.store.getReserve(reserveId);
        return { paused, frozen, borrowable, collateralRisk };
    }

    getReserveCount(): number {
        return this.store.reserveCount;
    }

    /**
     * @param dynamicConfigKey - defaults to the reserve's current key
     */
    getDynamicReserveConfig(reserveId: number, dynamicConfigKey?: number): DynamicReserveConfig {
        const reserve = this.store.getReserve(reserveId);
        return { ...this.store.getDynamicConfig(reserveId, dynamicConfigKey ?? reserve.dynamicConfigKey) };
    }

    getLiquidationConfig(): LiquidationConfig {
        return this.store.getLiquidationConfig();
    }

    isUsingAsCollateral(reserveId: number, user: Address): boolean {
        return this.store.peekStatus(user).isUsingAsCollateral(reserveId);
    }

    isBorrowing(reserveId: number, user: Address): boolean {
        return this.store.peekStatus(user).isBorrowing(reserveId);
    }

    hasPositiveRiskPremium(user: Address): boolean {
        return this.store.peekStatus(user).hasPositiveRiskPremium;
    }

    /**
     * Whether `positionManager` may currently act for `user`
     */
    isPositionManager(user: Address, positionManager: Address): boolean {
        return this.store.isPositionManagerActive(positionManager) && this.store.isApproved(user, positionManager);
    }

    getUsers(): Address[] {
        return this.store.getUsers();
    }

    // ==================== Internals ====================

    /**
     * Run `operation` as one unit: on throw the ledger and every checkpointable
     * hub are restored and buffered events dropped; on success the events are
     * delivered in order.
     */
    private atomic<T>(operation: () => T): T {
        if (this.pendingEvents) return operation();

        const rollbacks = [this.store.checkpoint()];
        for (const hub of new Set(this.store.getAllReserves().map((reserve) => reserve.hub))) {
            if (isCheckpointable(hub)) rollbacks.push(hub.checkpoint());
        }

        this.pendingEvents = [];
        let result: T;
        try {
            result = operation();
        } catch (error) {
            this.pendingEvents = undefined;
            for (const rollback of rollbacks.reverse()) rollback();
            throw error;
        }

        const events = this.pendingEvents;
        this.pendingEvents = undefined;
        this.publish(events);
        return result;
    }

    private emit(event: SpokeEvent): void {
        if (!this.pendingEvents) {
            throw new Error("Spoke: events can only be emitted inside an atomic operation");
        }
        this.pendingEvents.push(event);
    }

    private publish(events: SpokeEvent[]): void {
        for (const event of events) {
            const fields = stringifyFields(event);
            if (event.type === "ReportDeficit") {
                this.logger.warn(fields, "Deficit reported");
            } else if (event.type === "LiquidationCall") {
                this.logger.info(fields, "Liquidation executed");
            } else {
                this.logger.debug(fields, event.type);
            }

            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (error) {
                    this.logger.error({ error, event: event.type }, "Event listener failed");
                }
            }
        }
    }

    private authorize(caller: Address, onBehalfOf: Address): void {
        if (caller === onBehalfOf) return;
        if (!this.isPositionManager(onBehalfOf, caller)) {
            fail("UNAUTHORIZED", `${caller} may not act for ${onBehalfOf}`, { caller, onBehalfOf });
        }
    }

    private requireNotPaused(reserve: Reserve): void {
        if (reserve.paused) {
            fail("RESERVE_PAUSED", `reserve ${reserve.reserveId} is paused`, { reserveId: reserve.reserveId });
        }
    }

    private requireNotFrozen(reserve: Reserve): void {
        if (reserve.frozen) {
            fail("RESERVE_FROZEN", `reserve ${reserve.reserveId} is frozen`, { reserveId: reserve.reserveId });
        }
    }

    private requirePositive(amount: bigint): void {
        if (amount <= 0n) {
            fail("INVALID_AMOUNT", "amount must be positive", { amount });
        }
    }

    private requireHealthy(accountData: UserAccountData): void {
        if (accountData.healthFactor < HEALTH_FACTOR_LIQUIDATION_THRESHOLD) {
            fail("HEALTH_FACTOR_BELOW_THRESHOLD", "action would leave the position unhealthy", {
                healthFactor: accountData.healthFactor,
            });
        }
    }

    private pinConfigKey(user: Address, reserve: Reserve): void {
        const position = this.store.position(user, reserve.reserveId);
        if (position.configKey === reserve.dynamicConfigKey) return;
        position.configKey = reserve.dynamicConfigKey;
        this.emit({ type: "RefreshDynamicConfig", user, reserveId: reserve.reserveId, dynamicConfigKey: reserve.dynamicConfigKey });
    }

    private computeAccountData(user: Address, refreshConfig: boolean, createRecords: boolean): AccountDataResult {
        return calculateUserAccountData({
            status: createRecords ? this.store.status(user) : this.store.peekStatus(user),
            reserveCount: this.store.reserveCount,
            getReserve: (reserveId) => this.store.getReserve(reserveId),
            getPosition: (reserveId) => createRecords
                ? this.store.position(user, reserveId)
                : this.store.peekPosition(user, reserveId),
            getDynamicConfig: (reserveId, key) => this.store.getDynamicConfig(reserveId, key),
            oracle: this.oracle,
            refreshConfig,
        });
    }

    /** account data over the config keys positions are already pinned to */
    private currentAccountData(user: Address): AccountDataResult {
        return this.computeAccountData(user, false, true);
    }

    /** account data over the reserves' current config keys, persisting the new pins */
    private refreshAccountData(user: Address): AccountDataResult {
        const result = this.computeAccountData(user, true, true);
        for (const reserveId of result.configKeyUpdates.keys()) {
            this.pinConfigKey(user, this.store.getReserve(reserveId));
        }
        return result;
    }

    /**
     * Re-derive premium shares on every borrowed reserve for a new risk premium
     */
    private applyRiskPremium(user: Address, riskPremium: bigint): void {
        const status = this.store.status(user);
        if (riskPremium === 0n && !status.hasPositiveRiskPremium) return;

        let reserveId = status.nextBorrowing(this.store.reserveCount);
        while (reserveId !== NOT_FOUND) {
            const reserve = this.store.getReserve(reserveId);
            const position = this.store.position(user, reserveId);
            const premiumDelta = refreshPositionPremium(reserve.hub, reserve.assetId, position, riskPremium);
            reserve.hub.refreshPremium(reserve.assetId, premiumDelta);
            reserveId = status.nextBorrowing(reserveId);
        }

        status.hasPositiveRiskPremium = riskPremium > 0n;
        this.emit({ type: "UpdateUserRiskPremium", user, riskPremium });
    }

    /**
     * Settle premium and hand `drawnAmount + premiumAmount` back to the hub
     * @returns drawn shares burned
     */
    private restoreDebt(
        reserve: Reserve,
        position: UserPosition,
        drawnAmount: bigint,
        premiumAmount: bigint,
        from: Address,
    ): bigint {
        const premiumDelta = settlePositionPremium(reserve.hub, reserve.assetId, position, premiumAmount);
        const drawnShares = reserve.hub.restore(reserve.assetId, drawnAmount, premiumAmount, premiumDelta, from);
        if (drawnShares > position.drawnShares) {
            fail("INVALID_PREMIUM_STATE", "hub burned more drawn shares than the position holds", {
                reserveId: reserve.reserveId,
                drawnShares,
                positionDrawnShares: position.drawnShares,
            });
        }
        position.drawnShares -= drawnShares;
        return drawnShares;
    }

    /**
     * Send `toLiquidator` to the liquidator and move the fee to the hub's fee
     * receiver as added shares
     */
    private seizeCollateral(
        reserve: Reserve,
        position: UserPosition,
        toLiquidator: bigint,
        protocolFee: bigint,
        isCollateralExhausted: boolean,
        liquidator: Address,
    ): void {
        const { hub, assetId } = reserve;
        const removedShares = toLiquidator > 0n ? hub.remove(assetId, toLiquidator, liquidator) : 0n;
        if (removedShares > position.suppliedShares) {
            fail("INSUFFICIENT_SUPPLY", "collateral seized exceeds the user's supply", {
                reserveId: reserve.reserveId,
                removedShares,
                suppliedShares: position.suppliedShares,
            });
        }
        position.suppliedShares -= removedShares;

        const feeShares = isCollateralExhausted
            ? position.suppliedShares
            : min(hub.previewAddByAssets(assetId, protocolFee), position.suppliedShares);
        if (feeShares > 0n) {
            hub.payFee(assetId, feeShares);
            position.suppliedShares -= feeShares;
        }
    }

    /**
     * Write off every remaining debt of `user` after its last collateral was
     * seized, then clear the risk premium
     */
    private reportDeficits(user: Address): void {
        const status = this.store.status(user);

        let reserveId = status.nextBorrowing(this.store.reserveCount);
        while (reserveId !== NOT_FOUND) {
            const reserve = this.store.getReserve(reserveId);
            const position = this.store.position(user, reserveId);
            const { drawnDebt, premiumDebt } = getPositionDebt(reserve.hub, reserve.assetId, position);

            const premiumDelta = clearPositionPremium(position);
            const deficitShares = reserve.hub.reportDeficit(reserve.assetId, drawnDebt, premiumDebt, premiumDelta);
            position.drawnShares = 0n;
            status.setBorrowing(reserveId, false);

            this.emit({ type: "ReportDeficit", reserveId, user, drawnAmount: drawnDebt, premiumAmount: premiumDebt, deficitShares });
            reserveId = status.nextBorrowing(reserveId);
        }

        status.hasPositiveRiskPremium = false;
        this.emit({ type: "UpdateUserRiskPremium", user, riskPremium: 0n });
    }
}
