import type { LiquidationConfig, LiquidationOutcome } from "../types";
import {
    DUST_LIQUIDATION_THRESHOLD,
    MAX_UINT256,
    PERCENTAGE_FACTOR,
    WAD,
} from "../constants";
import {
    Rounding,
    bpsToWad,
    fromValue,
    min,
    mulDiv,
    mulDivDown,
    mulDivUp,
    percentDivDown,
    percentMulDown,
    toValue,
} from "../utils/math";
import { fail } from "../errors";
import { healthFactorOf } from "./account-data";

export type DebtToTargetParams = {
    totalDebtValue: bigint,
    healthFactor: bigint,
    targetHealthFactor: bigint,
    liquidationBonus: bigint, // bps
    collateralFactor: bigint, // bps
    debtAssetPrice: bigint,
    debtAssetUnit: bigint,
}

export type LiquidationAmountsParams = {
    /** drawn + premium debt of the user in the debt reserve */
    reserveDebt: bigint,
    /** assets the user holds in the collateral reserve */
    collateralBalance: bigint,
    debtToCover: bigint,
    debtToTarget: bigint,
    liquidationBonus: bigint, // bps
    liquidationFee: bigint, // bps
    collateralAssetPrice: bigint,
    collateralAssetUnit: bigint,
    debtAssetPrice: bigint,
    debtAssetUnit: bigint,
}

export type LiquidationAmounts = Omit<LiquidationOutcome, "hasDeficit">;

export type DeficitParams = {
    activeCollateralCount: number,
    isCollateralExhausted: boolean,
    totalCollateralValue: bigint,
    totalDebtValue: bigint,
    healthFactorBefore: bigint,
    healthFactorAfter: bigint,
}

export type HealthFactorAfterParams = {
    weightedCollateralFactor: bigint,
    totalDebtValue: bigint,
    collateralFactor: bigint, // bps
    collateralValueRemoved: bigint,
    debtValueRemoved: bigint,
}

/**
 * Variable liquidation bonus. Scales linearly from the minimum bonus at a
 * health factor of 1.0 up to `maxLiquidationBonus` at
 * `healthFactorForMaxBonus` and below.
 * @param healthFactor - current health factor, expected below 1.0
 * @returns bonus in bps (10000 = no bonus)
 */
export function calculateLiquidationBonus(
    config: LiquidationConfig,
    healthFactor: bigint,
    maxLiquidationBonus: bigint,
): bigint {
    if (healthFactor <= config.healthFactorForMaxBonus) {
        return maxLiquidationBonus;
    }
    const minLiquidationBonus =
        percentMulDown(maxLiquidationBonus - PERCENTAGE_FACTOR, config.liquidationBonusFactor) + PERCENTAGE_FACTOR;

    if (healthFactor >= WAD) return minLiquidationBonus;

    return minLiquidationBonus + mulDivDown(
        maxLiquidationBonus - minLiquidationBonus,
        WAD - healthFactor,
        WAD - config.healthFactorForMaxBonus,
    );
}

/**
 * Debt amount whose repayment, with the matching collateral seized at the
 * bonus, brings the health factor to `targetHealthFactor`.
 * @returns debt asset amount rounded up, 0 when already at or above target,
 * MAX_UINT256 when the target cannot be reached
 */
export function calculateDebtToTargetHealthFactor(params: DebtToTargetParams): bigint {
    const { totalDebtValue, healthFactor, targetHealthFactor } = params;
    if (healthFactor >= targetHealthFactor) return 0n;

    // WAD scaled health factor lost per unit of debt value removed
    const liquidationPenalty = mulDivUp(bpsToWad(params.liquidationBonus), params.collateralFactor, PERCENTAGE_FACTOR);
    if (targetHealthFactor <= liquidationPenalty) return MAX_UINT256;

    const debtValueToTarget = mulDivUp(
        totalDebtValue,
        targetHealthFactor - healthFactor,
        targetHealthFactor - liquidationPenalty,
    );
    return fromValue(debtValueToTarget, params.debtAssetPrice, params.debtAssetUnit, Rounding.Ceil);
}

/**
 * Collateral asset amount worth `debtAmount` of the debt asset plus the bonus
 */
export function collateralForDebt(params: LiquidationAmountsParams, debtAmount: bigint, rounding: Rounding): bigint {
    return mulDiv(
        debtAmount * params.debtAssetPrice * params.collateralAssetUnit,
        params.liquidationBonus,
        params.collateralAssetPrice * params.debtAssetUnit * PERCENTAGE_FACTOR,
        rounding,
    );
}

/**
 * Debt asset amount a `collateralAmount` seizure pays for at the bonus
 */
export function debtForCollateral(params: LiquidationAmountsParams, collateralAmount: bigint, rounding: Rounding): bigint {
    return mulDiv(
        collateralAmount * params.collateralAssetPrice * params.debtAssetUnit,
        PERCENTAGE_FACTOR,
        params.debtAssetPrice * params.collateralAssetUnit * params.liquidationBonus,
        rounding,
    );
}

/**
 * Debt to restore, collateral to seize and protocol fee for one liquidation.
 *
 * Neither the debt reserve nor the collateral reserve is left holding between
 * 0 and DUST_LIQUIDATION_THRESHOLD of value unless the collateral reserve is
 * emptied: when the requested cover is below the reserve debt the call fails
 * with MustNotLeaveDust, otherwise the amount grows to the whole reserve debt.
 */
export function calculateLiquidationAmounts(params: LiquidationAmountsParams): LiquidationAmounts {
    const { reserveDebt, debtToCover, debtToTarget, collateralBalance } = params;

    let debtToLiquidate = min(min(debtToCover, reserveDebt), debtToTarget);
    let collateralToLiquidate = collateralForDebt(params, debtToLiquidate, Rounding.Ceil);

    const remainingDebt = reserveDebt - debtToLiquidate;
    const leavesDebtDust = remainingDebt > 0n
        && toValue(remainingDebt, params.debtAssetPrice, params.debtAssetUnit, Rounding.Ceil) < DUST_LIQUIDATION_THRESHOLD;
    const leavesCollateralDust = collateralToLiquidate < collateralBalance
        && toValue(
            collateralBalance - collateralToLiquidate,
            params.collateralAssetPrice,
            params.collateralAssetUnit,
            Rounding.Floor,
        ) < DUST_LIQUIDATION_THRESHOLD;

    let leavesDustFromCover = false;
    if (leavesDebtDust || leavesCollateralDust) {
        // never charge more than the liquidator asked to cover
        if (debtToCover >= reserveDebt) {
            debtToLiquidate = reserveDebt;
            collateralToLiquidate = collateralForDebt(params, debtToLiquidate, Rounding.Ceil);
        } else {
            leavesDustFromCover = true;
        }
    }

    let isCollateralExhausted = false;
    if (collateralToLiquidate >= collateralBalance) {
        collateralToLiquidate = collateralBalance;
        debtToLiquidate = min(debtToLiquidate, debtForCollateral(params, collateralBalance, Rounding.Floor));
        isCollateralExhausted = true;
    }

    if (leavesDustFromCover && !isCollateralExhausted) {
        fail("MUST_NOT_LEAVE_DUST", "requested cover leaves dust in the debt or collateral reserve", {
            debtToCover,
            reserveDebt,
            collateralBalance,
        });
    }

    const bonusCollateral = collateralToLiquidate - percentDivDown(collateralToLiquidate, params.liquidationBonus);
    const protocolFee = percentMulDown(bonusCollateral, params.liquidationFee);

    return {
        debtToLiquidate,
        collateralToLiquidate,
        collateralToLiquidator: collateralToLiquidate - protocolFee,
        protocolFee,
        liquidationBonus: params.liquidationBonus,
        isCollateralExhausted,
    };
}

/**
 * A liquidation leaves a deficit when it empties the user's last active
 * collateral while the user was insolvent or got less healthy
 */
export function isDeficit(params: DeficitParams): boolean {
    return params.activeCollateralCount === 1
        && params.isCollateralExhausted
        && (params.totalCollateralValue < params.totalDebtValue
            || params.healthFactorAfter < params.healthFactorBefore);
}

export function estimateHealthFactorAfter(params: HealthFactorAfterParams): bigint {
    const weightedRemoved = params.collateralFactor * params.collateralValueRemoved;
    const weighted = params.weightedCollateralFactor > weightedRemoved
        ? params.weightedCollateralFactor - weightedRemoved
        : 0n;
    const debt = params.totalDebtValue > params.debtValueRemoved
        ? params.totalDebtValue - params.debtValueRemoved
        : 0n;
    return healthFactorOf(weighted, debt);
}
