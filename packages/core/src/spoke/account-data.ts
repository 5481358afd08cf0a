import type { IOracle } from "../interfaces";
import type { DynamicReserveConfig, Reserve, UserAccountData, UserPosition } from "../types";
import { MAX_UINT256 } from "../constants";
import { Rounding, fromBpsDown, mulDivUp, min, toValue, wadDivDown } from "../utils/math";
import { KeyValueList } from "./key-value-list";
import { NOT_FOUND, type PositionStatusMap } from "./position-status";
import { getPositionDebt } from "./premium";

export type AccountDataInput = {
    status: PositionStatusMap,
    reserveCount: number,
    getReserve: (reserveId: number) => Reserve,
    getPosition: (reserveId: number) => UserPosition,
    getDynamicConfig: (reserveId: number, key: number) => DynamicReserveConfig,
    oracle: IOracle,
    /** pin every scanned collateral position to its reserve's current config key */
    refreshConfig: boolean,
}

export type AccountDataResult = {
    accountData: UserAccountData,
    /** Σ collateralFactor (bps) × collateral value */
    weightedCollateralFactor: bigint,
    /** reserveId -> config key the caller should persist (refresh variant only) */
    configKeyUpdates: Map<number, number>,
}

function assetUnit(reserve: Reserve): bigint {
    return 10n ** BigInt(reserve.decimals);
}

/**
 * Base currency value of a user's collateral in a reserve, rounded down
 */
export function collateralValue(reserve: Reserve, position: UserPosition, price: bigint): bigint {
    const supplied = reserve.hub.previewRemoveByShares(reserve.assetId, position.suppliedShares);
    return toValue(supplied, price, assetUnit(reserve), Rounding.Floor);
}

/**
 * Base currency value of a user's drawn + premium debt in a reserve, rounded up
 */
export function debtValue(reserve: Reserve, position: UserPosition, price: bigint): bigint {
    const { drawnDebt, premiumDebt } = getPositionDebt(reserve.hub, reserve.assetId, position);
    return toValue(drawnDebt + premiumDebt, price, assetUnit(reserve), Rounding.Ceil);
}

/**
 * @param weightedCollateralFactor - Σ collateralFactor (bps) × collateral value
 * @returns WAD scaled health factor, MAX_UINT256 without debt
 */
export function healthFactorOf(weightedCollateralFactor: bigint, totalDebtValue: bigint): bigint {
    if (totalDebtValue === 0n) return MAX_UINT256;
    return fromBpsDown(wadDivDown(weightedCollateralFactor, totalDebtValue));
}

/**
 * Walk every reserve the user supplies as collateral or borrows, highest id
 * first, and derive health factor, average collateral factor and risk premium.
 *
 * Performs no writes: in the refresh variant the new config key pins are
 * returned in `configKeyUpdates` for the caller to persist.
 */
export function calculateUserAccountData(input: AccountDataInput): AccountDataResult {
    const { status, reserveCount, oracle, refreshConfig } = input;
    const configKeyUpdates = new Map<number, number>();

    const collaterals = new KeyValueList(status.collateralCount(reserveCount));
    let totalCollateralValue = 0n;
    let totalDebtValue = 0n;
    let weightedCollateralFactor = 0n; // bps * value
    let activeCollateralCount = 0;
    let borrowedCount = 0;

    let cursor = status.next(reserveCount);
    while (cursor.reserveId !== NOT_FOUND) {
        const reserveId = cursor.reserveId;
        const reserve = input.getReserve(reserveId);
        const position = input.getPosition(reserveId);

        if (cursor.collateral) {
            let configKey = position.configKey;
            if (refreshConfig && configKey !== reserve.dynamicConfigKey) {
                configKey = reserve.dynamicConfigKey;
                configKeyUpdates.set(reserveId, configKey);
            }
            const { collateralFactor } = input.getDynamicConfig(reserveId, configKey);

            if (collateralFactor > 0n && position.suppliedShares > 0n) {
                const value = collateralValue(reserve, position, oracle.getReservePrice(reserveId));
                totalCollateralValue += value;
                weightedCollateralFactor += collateralFactor * value;
                collaterals.add(reserve.collateralRisk, value);
                activeCollateralCount++;
            }
        }

        if (cursor.borrowing) {
            totalDebtValue += debtValue(reserve, position, oracle.getReservePrice(reserveId));
            borrowedCount++;
        }

        cursor = status.next(reserveId);
    }

    const healthFactor = healthFactorOf(weightedCollateralFactor, totalDebtValue);

    const avgCollateralFactor = totalCollateralValue === 0n
        ? 0n
        : fromBpsDown(wadDivDown(weightedCollateralFactor, totalCollateralValue));

    return {
        accountData: {
            riskPremium: calculateRiskPremium(collaterals, totalDebtValue),
            avgCollateralFactor,
            healthFactor,
            totalCollateralValue,
            totalDebtValue,
            activeCollateralCount,
            borrowedCount,
        },
        weightedCollateralFactor,
        configKeyUpdates,
    };
}

/**
 * Debt weighted average risk tier of the collateral backing `totalDebtValue`,
 * consuming the lowest tiers first. Sorts `collaterals` in place.
 * @returns risk premium in bps, rounded up
 */
export function calculateRiskPremium(collaterals: KeyValueList, totalDebtValue: bigint): bigint {
    if (totalDebtValue === 0n || collaterals.length === 0) return 0n;

    collaterals.sortByKey();

    let debtLeftToCover = totalDebtValue;
    let weightedRisk = 0n;
    for (const { key: collateralRisk, value } of collaterals) {
        if (debtLeftToCover === 0n) break;
        const covered = min(value, debtLeftToCover);
        weightedRisk += collateralRisk * covered;
        debtLeftToCover -= covered;
    }

    const debtCovered = totalDebtValue - debtLeftToCover;
    if (debtCovered === 0n) return 0n;
    return mulDivUp(weightedRisk, 1n, debtCovered);
}
