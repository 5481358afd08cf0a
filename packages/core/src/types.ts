import type { IHub } from "./interfaces";

export type Address = string;

export type ReserveConfig = {
    paused: boolean,
    frozen: boolean,
    borrowable: boolean,
    collateralRisk: bigint, // bps, 0..MAX_COLLATERAL_RISK
}

export type DynamicReserveConfig = {
    collateralFactor: bigint, // bps, < 100%
    maxLiquidationBonus: bigint, // bps, >= 100%
    liquidationFee: bigint, // bps, share of the bonus paid to the fee receiver
}

export type Reserve = ReserveConfig & {
    reserveId: number,
    hub: IHub,
    assetId: number,
    decimals: number,
    dynamicConfigKey: number,
}

export type UserPosition = {
    suppliedShares: bigint,
    drawnShares: bigint,
    premiumShares: bigint,
    premiumOffset: bigint,
    realizedPremium: bigint,
    configKey: number,
}

export type LiquidationConfig = {
    targetHealthFactor: bigint, // WAD, >= 1.0
    healthFactorForMaxBonus: bigint, // WAD, < 1.0
    liquidationBonusFactor: bigint, // bps
}

export type UserAccountData = {
    riskPremium: bigint, // bps
    avgCollateralFactor: bigint, // WAD
    healthFactor: bigint, // WAD
    totalCollateralValue: bigint,
    totalDebtValue: bigint,
    activeCollateralCount: number,
    borrowedCount: number,
}

/**
 * Signed change to a position's premium accounting, mirrored by the hub
 */
export type PremiumDelta = {
    sharesDelta: bigint,
    offsetDelta: bigint,
    realizedDelta: bigint,
}

export type UserDebt = {
    drawnDebt: bigint,
    premiumDebt: bigint,
}

export type LiquidationOutcome = {
    debtToLiquidate: bigint,
    collateralToLiquidate: bigint,
    collateralToLiquidator: bigint,
    protocolFee: bigint,
    liquidationBonus: bigint,
    isCollateralExhausted: boolean,
    hasDeficit: boolean,
}
