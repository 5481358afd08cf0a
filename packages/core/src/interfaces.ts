import type { Address, PremiumDelta } from "./types";

/**
 * Pool / interest engine the spoke draws liquidity from.
 * Owns every share <-> asset conversion; the spoke only consumes them.
 */
export interface IHub {
    getAssetDecimals(assetId: number): number;

    /** @returns added shares minted for `amount` */
    add(assetId: number, amount: bigint, from: Address): bigint;
    /** @returns added shares burned for `amount` */
    remove(assetId: number, amount: bigint, to: Address): bigint;
    /** @returns drawn shares minted for `amount` */
    draw(assetId: number, amount: bigint, to: Address): bigint;
    /** @returns drawn shares burned for `drawnAmount` */
    restore(
        assetId: number,
        drawnAmount: bigint,
        premiumAmount: bigint,
        premiumDelta: PremiumDelta,
        from: Address,
    ): bigint;

    refreshPremium(assetId: number, premiumDelta: PremiumDelta): void;
    /** @returns drawn shares written off */
    reportDeficit(assetId: number, drawnAmount: bigint, premiumAmount: bigint, premiumDelta: PremiumDelta): bigint;
    payFee(assetId: number, shares: bigint): void;

    previewAddByAssets(assetId: number, assets: bigint): bigint;
    previewRemoveByAssets(assetId: number, assets: bigint): bigint;
    previewRemoveByShares(assetId: number, shares: bigint): bigint;
    previewDrawByShares(assetId: number, shares: bigint): bigint;
    previewRestoreByShares(assetId: number, shares: bigint): bigint;
}

export interface IOracle {
    /** @returns price with ORACLE_DECIMALS */
    getReservePrice(reserveId: number): bigint;
}

/**
 * Collaborator state that can join a spoke operation's all-or-nothing unit
 */
export interface Checkpointable {
    /** @returns a function restoring the state captured at this call */
    checkpoint(): () => void;
}

export function isCheckpointable(value: unknown): value is Checkpointable {
    return typeof value === "object"
        && value !== null
        && "checkpoint" in value
        && typeof value.checkpoint === "function";
}
