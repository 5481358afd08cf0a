import type {
    Address,
    DynamicReserveConfig,
    LiquidationConfig,
    ReserveConfig,
} from "../types";

export type SpokeEvent =
    | { type: "AddReserve", reserveId: number, assetId: number, decimals: number }
    | { type: "UpdateReserveConfig", reserveId: number, config: ReserveConfig }
    | { type: "AddDynamicReserveConfig", reserveId: number, dynamicConfigKey: number, config: DynamicReserveConfig }
    | { type: "UpdateDynamicReserveConfig", reserveId: number, dynamicConfigKey: number, config: DynamicReserveConfig }
    | { type: "RefreshDynamicConfig", user: Address, reserveId: number, dynamicConfigKey: number }
    | { type: "UpdateLiquidationConfig", config: LiquidationConfig }
    | { type: "UpdatePositionManager", positionManager: Address, active: boolean }
    | { type: "SetUserPositionManager", user: Address, positionManager: Address, approve: boolean }
    | { type: "Supply", reserveId: number, caller: Address, user: Address, suppliedShares: bigint, suppliedAmount: bigint }
    | { type: "Withdraw", reserveId: number, caller: Address, user: Address, withdrawnShares: bigint, withdrawnAmount: bigint }
    | { type: "Borrow", reserveId: number, caller: Address, user: Address, drawnShares: bigint, drawnAmount: bigint }
    | {
        type: "Repay",
        reserveId: number,
        caller: Address,
        user: Address,
        drawnShares: bigint,
        drawnAmount: bigint,
        premiumAmount: bigint,
    }
    | { type: "SetUsingAsCollateral", reserveId: number, caller: Address, user: Address, usingAsCollateral: boolean }
    | {
        type: "LiquidationCall",
        collateralReserveId: number,
        debtReserveId: number,
        user: Address,
        liquidator: Address,
        debtToLiquidate: bigint,
        collateralToLiquidate: bigint,
        collateralToLiquidator: bigint,
        protocolFee: bigint,
        hasDeficit: boolean,
    }
    | { type: "ReportDeficit", reserveId: number, user: Address, drawnAmount: bigint, premiumAmount: bigint, deficitShares: bigint }
    | { type: "UpdateUserRiskPremium", user: Address, riskPremium: bigint };

export type SpokeEventType = SpokeEvent["type"];

export type SpokeEventListener = (event: SpokeEvent) => void;
