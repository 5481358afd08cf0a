import type { DynamicReserveConfig, LiquidationConfig, ReserveConfig } from "../types";
import {
    HEALTH_FACTOR_LIQUIDATION_THRESHOLD,
    MAX_COLLATERAL_RISK,
    PERCENTAGE_FACTOR,
} from "../constants";
import { percentMulUp } from "../utils/math";
import { fail } from "../errors";

export function validateReserveConfig(config: ReserveConfig): void {
    if (config.collateralRisk < 0n || config.collateralRisk > MAX_COLLATERAL_RISK) {
        fail("INVALID_COLLATERAL_RISK", `collateral risk ${config.collateralRisk} out of range`, {
            collateralRisk: config.collateralRisk,
        });
    }
}

/**
 * @param requireCollateralFactor - existing versions may not drop to a zero collateral factor
 */
export function validateDynamicReserveConfig(config: DynamicReserveConfig, requireCollateralFactor: boolean): void {
    const { collateralFactor, maxLiquidationBonus, liquidationFee } = config;

    if (collateralFactor < 0n || collateralFactor >= PERCENTAGE_FACTOR) {
        fail("INVALID_COLLATERAL_FACTOR", `collateral factor ${collateralFactor} must be below 100%`, { collateralFactor });
    }
    if (requireCollateralFactor && collateralFactor === 0n) {
        fail("INVALID_COLLATERAL_FACTOR", "collateral factor of an existing config cannot be zero", { collateralFactor });
    }
    if (maxLiquidationBonus < PERCENTAGE_FACTOR) {
        fail("INVALID_LIQUIDATION_BONUS", `max liquidation bonus ${maxLiquidationBonus} must be at least 100%`, {
            maxLiquidationBonus,
        });
    }
    if (liquidationFee < 0n || liquidationFee > PERCENTAGE_FACTOR) {
        fail("INVALID_LIQUIDATION_FEE", `liquidation fee ${liquidationFee} must be at most 100%`, { liquidationFee });
    }
    // seizing debt × bonus must stay within the collateral the debt was opened against
    if (percentMulUp(maxLiquidationBonus, collateralFactor) >= PERCENTAGE_FACTOR) {
        fail("INCOMPATIBLE_COLLATERAL_FACTOR_AND_BONUS", "collateral factor × max liquidation bonus must be below 100%", {
            collateralFactor,
            maxLiquidationBonus,
        });
    }
}

export function validateLiquidationConfig(config: LiquidationConfig): void {
    if (
        config.targetHealthFactor < HEALTH_FACTOR_LIQUIDATION_THRESHOLD
        || config.healthFactorForMaxBonus < 0n
        || config.healthFactorForMaxBonus >= HEALTH_FACTOR_LIQUIDATION_THRESHOLD
        || config.liquidationBonusFactor < 0n
        || config.liquidationBonusFactor > PERCENTAGE_FACTOR
    ) {
        fail("INVALID_LIQUIDATION_CONFIG", "invalid liquidation config", config);
    }
}
