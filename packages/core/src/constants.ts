export const WAD = 10n ** 18n;
export const RAY = 10n ** 27n;
export const PERCENTAGE_FACTOR = 10_000n; // 100.00%

export const MAX_UINT256 = 2n ** 256n - 1n;

export const ORACLE_DECIMALS = 8;
export const PRICE_BASE = 10n ** BigInt(ORACLE_DECIMALS);

// value units: amount * price * WAD / assetUnit, so $1 = 1e26
export const VALUE_BASE = PRICE_BASE * WAD;

export const HEALTH_FACTOR_LIQUIDATION_THRESHOLD = WAD;
export const DUST_LIQUIDATION_THRESHOLD = 1_000n * VALUE_BASE; // $1000

export const MAX_COLLATERAL_RISK = 100_000n; // 1000.00%
export const MAX_DYNAMIC_CONFIG_KEY = 65_535;
export const MAX_RESERVES_PER_WORD = 128;

// virtual offsets on the hub's added share conversion
export const VIRTUAL_ASSETS = 10n ** 6n;
export const VIRTUAL_SHARES = 10n ** 6n;

export const SECONDS_PER_YEAR = 31_536_000n;

export const DEFAULT_LIQUIDATION_CONFIG = {
    targetHealthFactor: HEALTH_FACTOR_LIQUIDATION_THRESHOLD,
    healthFactorForMaxBonus: 0n,
    liquidationBonusFactor: 0n,
} as const;

export const ERROR_CODES = {
    // configuration
    INVALID_COLLATERAL_FACTOR: "InvalidCollateralFactor",
    INVALID_LIQUIDATION_BONUS: "InvalidLiquidationBonus",
    INVALID_LIQUIDATION_FEE: "InvalidLiquidationFee",
    INCOMPATIBLE_COLLATERAL_FACTOR_AND_BONUS: "IncompatibleCollateralFactorAndBonus",
    INVALID_COLLATERAL_RISK: "InvalidCollateralRisk",
    INVALID_LIQUIDATION_CONFIG: "InvalidLiquidationConfig",
    RESERVE_EXISTS: "ReserveExists",
    RESERVE_NOT_LISTED: "ReserveNotListed",
    ASSET_NOT_LISTED: "AssetNotListed",
    DYNAMIC_CONFIG_KEY_NOT_FOUND: "DynamicConfigKeyNotFound",
    MAXIMUM_DYNAMIC_CONFIG_KEY_REACHED: "MaximumDynamicConfigKeyReached",
    // state
    RESERVE_PAUSED: "ReservePaused",
    RESERVE_FROZEN: "ReserveFrozen",
    RESERVE_NOT_BORROWABLE: "ReserveNotBorrowable",
    RESERVE_NOT_ENABLED_AS_COLLATERAL: "ReserveNotEnabledAsCollateral",
    COLLATERAL_CANNOT_BE_LIQUIDATED: "CollateralCannotBeLiquidated",
    RESERVE_NOT_BORROWED: "ReserveNotBorrowed",
    HEALTH_FACTOR_BELOW_THRESHOLD: "HealthFactorBelowThreshold",
    HEALTH_FACTOR_NOT_BELOW_THRESHOLD: "HealthFactorNotBelowThreshold",
    INSUFFICIENT_LIQUIDITY: "InsufficientLiquidity",
    INSUFFICIENT_SUPPLY: "InsufficientSupply",
    INVALID_AMOUNT: "InvalidAmount",
    SELF_LIQUIDATION: "SelfLiquidation",
    INVALID_PREMIUM_STATE: "InvalidPremiumState",
    PRICE_NOT_SET: "PriceNotSet",
    KEY_VALUE_LIST_FULL: "KeyValueListFull",
    // policy
    MUST_NOT_LEAVE_DUST: "MustNotLeaveDust",
    // authorization
    UNAUTHORIZED: "Unauthorized",
} as const;
