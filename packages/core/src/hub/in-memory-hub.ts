import type { Checkpointable, IHub } from "../interfaces";
import type { Address, PremiumDelta } from "../types";
import {
    PERCENTAGE_FACTOR,
    RAY,
    SECONDS_PER_YEAR,
    VIRTUAL_ASSETS,
    VIRTUAL_SHARES,
} from "../constants";
import {
    Rounding,
    mulDiv,
    mulDivDown,
    rayDivDown,
    rayDivUp,
    rayMulDown,
    rayMulUp,
} from "../utils/math";
import { fail } from "../errors";

// premium debt may round up by this much on a refresh
const PREMIUM_REFRESH_TOLERANCE = 2n;

export type Clock = () => bigint; // unix seconds

export interface InMemoryHubOptions {
    clock?: Clock;
}

type AssetState = {
    decimals: number,
    liquidity: bigint,
    addedShares: bigint,
    drawnShares: bigint,
    drawnIndex: bigint, // RAY, as of lastUpdateTimestamp
    drawnRate: bigint, // bps per year, simple interest
    lastUpdateTimestamp: bigint,
    premiumShares: bigint,
    premiumOffset: bigint,
    realizedPremium: bigint,
    deficit: bigint,
    feeShares: bigint,
}

export type HubAssetSnapshot = Readonly<AssetState> & {
    assetId: number,
    totalAddedAssets: bigint,
    drawnDebt: bigint,
    premiumDebt: bigint,
}

const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

/**
 * Reference liquidity hub kept in memory. Holds per asset liquidity, added
 * shares, drawn shares over a linearly growing drawn index and the premium
 * aggregates its spokes report.
 */
export class InMemoryHub implements IHub, Checkpointable {
    private assets: AssetState[] = [];
    // account -> assetId -> net amount received from the hub
    private flows: Map<Address, Map<number, bigint>> = new Map();
    private clock: Clock;

    constructor(options: InMemoryHubOptions = {}) {
        this.clock = options.clock ?? systemClock;
    }

    // ==================== Admin ====================

    /**
     * @param drawnRate - yearly drawn rate in bps
     * @returns the new asset id
     */
    addAsset(decimals: number, drawnRate: bigint = 0n): number {
        if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
            throw new RangeError(`InMemoryHub: invalid decimals ${decimals}`);
        }
        this.assets.push({
            decimals,
            liquidity: 0n,
            addedShares: 0n,
            drawnShares: 0n,
            drawnIndex: RAY,
            drawnRate,
            lastUpdateTimestamp: this.clock(),
            premiumShares: 0n,
            premiumOffset: 0n,
            realizedPremium: 0n,
            deficit: 0n,
            feeShares: 0n,
        });
        return this.assets.length - 1;
    }

    setDrawnRate(assetId: number, drawnRate: bigint): void {
        const asset = this.accrue(assetId);
        asset.drawnRate = drawnRate;
    }

    /**
     * Jump the drawn index; the index may only grow
     */
    setDrawnIndex(assetId: number, drawnIndex: bigint): void {
        const asset = this.accrue(assetId);
        if (drawnIndex < asset.drawnIndex) {
            throw new RangeError("InMemoryHub: drawn index cannot decrease");
        }
        asset.drawnIndex = drawnIndex;
    }

    // ==================== IHub ====================

    getAssetDecimals(assetId: number): number {
        return this.asset(assetId).decimals;
    }

    add(assetId: number, amount: bigint, from: Address): bigint {
        const asset = this.accrue(assetId);
        const shares = this.previewAddByAssets(assetId, amount);
        if (amount <= 0n || shares === 0n) {
            fail("INVALID_AMOUNT", "add mints no shares", { assetId, amount });
        }
        asset.liquidity += amount;
        asset.addedShares += shares;
        this.recordFlow(from, assetId, -amount);
        return shares;
    }

    remove(assetId: number, amount: bigint, to: Address): bigint {
        const asset = this.accrue(assetId);
        this.requireLiquidity(assetId, asset, amount);
        const shares = this.previewRemoveByAssets(assetId, amount);
        if (shares > asset.addedShares - asset.feeShares) {
            fail("INSUFFICIENT_SUPPLY", "remove exceeds added shares", { assetId, shares, addedShares: asset.addedShares });
        }
        asset.liquidity -= amount;
        asset.addedShares -= shares;
        this.recordFlow(to, assetId, amount);
        return shares;
    }

    draw(assetId: number, amount: bigint, to: Address): bigint {
        const asset = this.accrue(assetId);
        this.requireLiquidity(assetId, asset, amount);
        const shares = rayDivUp(amount, asset.drawnIndex);
        asset.liquidity -= amount;
        asset.drawnShares += shares;
        this.recordFlow(to, assetId, amount);
        return shares;
    }

    restore(
        assetId: number,
        drawnAmount: bigint,
        premiumAmount: bigint,
        premiumDelta: PremiumDelta,
        from: Address,
    ): bigint {
        const asset = this.accrue(assetId);
        const shares = this.burnDrawnShares(assetId, asset, drawnAmount);
        this.applyPremiumDelta(assetId, asset, premiumDelta);

        const total = drawnAmount + premiumAmount;
        asset.liquidity += total;
        this.recordFlow(from, assetId, -total);
        return shares;
    }

    refreshPremium(assetId: number, premiumDelta: PremiumDelta): void {
        const asset = this.accrue(assetId);
        const { premiumShares, premiumOffset, realizedPremium } = asset;
        const before = this.premiumDebtOf(asset);
        this.applyPremiumDelta(assetId, asset, premiumDelta);
        const after = this.premiumDebtOf(asset);
        if (after > before + PREMIUM_REFRESH_TOLERANCE) {
            asset.premiumShares = premiumShares;
            asset.premiumOffset = premiumOffset;
            asset.realizedPremium = realizedPremium;
            fail("INVALID_PREMIUM_STATE", "premium refresh increased premium debt", { assetId, before, after });
        }
    }

    reportDeficit(assetId: number, drawnAmount: bigint, premiumAmount: bigint, premiumDelta: PremiumDelta): bigint {
        const asset = this.accrue(assetId);
        const shares = this.burnDrawnShares(assetId, asset, drawnAmount);
        this.applyPremiumDelta(assetId, asset, premiumDelta);
        asset.deficit += drawnAmount + premiumAmount;
        return shares;
    }

    payFee(assetId: number, shares: bigint): void {
        const asset = this.accrue(assetId);
        if (shares < 0n || asset.feeShares + shares > asset.addedShares) {
            fail("INSUFFICIENT_SUPPLY", "fee shares exceed added shares", { assetId, shares });
        }
        asset.feeShares += shares;
    }

    previewAddByAssets(assetId: number, assets: bigint): bigint {
        const asset = this.asset(assetId);
        return mulDiv(assets, asset.addedShares + VIRTUAL_SHARES, this.totalAddedAssetsOf(asset) + VIRTUAL_ASSETS, Rounding.Floor);
    }

    previewRemoveByAssets(assetId: number, assets: bigint): bigint {
        const asset = this.asset(assetId);
        return mulDiv(assets, asset.addedShares + VIRTUAL_SHARES, this.totalAddedAssetsOf(asset) + VIRTUAL_ASSETS, Rounding.Ceil);
    }

    previewRemoveByShares(assetId: number, shares: bigint): bigint {
        const asset = this.asset(assetId);
        return mulDiv(shares, this.totalAddedAssetsOf(asset) + VIRTUAL_ASSETS, asset.addedShares + VIRTUAL_SHARES, Rounding.Floor);
    }

    previewDrawByShares(assetId: number, shares: bigint): bigint {
        return rayMulDown(shares, this.currentIndex(this.asset(assetId)));
    }

    previewRestoreByShares(assetId: number, shares: bigint): bigint {
        return rayMulUp(shares, this.currentIndex(this.asset(assetId)));
    }

    // ==================== Reads ====================

    getAssetCount(): number {
        return this.assets.length;
    }

    getAsset(assetId: number): HubAssetSnapshot {
        const asset = this.asset(assetId);
        return {
            ...asset,
            assetId,
            drawnIndex: this.currentIndex(asset),
            totalAddedAssets: this.totalAddedAssetsOf(asset),
            drawnDebt: rayMulUp(asset.drawnShares, this.currentIndex(asset)),
            premiumDebt: this.premiumDebtOf(asset),
        };
    }

    /**
     * Net amount of `assetId` the account received from the hub (negative when it paid in)
     */
    getAccountFlow(account: Address, assetId: number): bigint {
        return this.flows.get(account)?.get(assetId) ?? 0n;
    }

    // ==================== Checkpoint ====================

    checkpoint(): () => void {
        const assets = this.assets.map((asset) => ({ ...asset }));
        const flows = new Map(Array.from(this.flows, ([account, byAsset]) => [account, new Map(byAsset)] as const));
        return () => {
            this.assets = assets;
            this.flows = flows;
        };
    }

    // ==================== Internals ====================

    private asset(assetId: number): AssetState {
        const asset = this.assets[assetId];
        if (!asset) {
            return fail("ASSET_NOT_LISTED", `asset ${assetId} is not listed on the hub`, { assetId });
        }
        return asset;
    }

    private currentIndex(asset: AssetState): bigint {
        const elapsed = this.clock() - asset.lastUpdateTimestamp;
        if (elapsed <= 0n || asset.drawnRate === 0n) return asset.drawnIndex;
        const rate = mulDivDown(asset.drawnRate, RAY, PERCENTAGE_FACTOR); // RAY per year
        const growth = mulDivDown(rate, elapsed, SECONDS_PER_YEAR);
        return rayMulDown(asset.drawnIndex, RAY + growth);
    }

    private accrue(assetId: number): AssetState {
        const asset = this.asset(assetId);
        asset.drawnIndex = this.currentIndex(asset);
        asset.lastUpdateTimestamp = this.clock();
        return asset;
    }

    private premiumDebtOf(asset: AssetState): bigint {
        return rayMulUp(asset.premiumShares, this.currentIndex(asset)) - asset.premiumOffset + asset.realizedPremium;
    }

    private totalAddedAssetsOf(asset: AssetState): bigint {
        const drawn = rayMulUp(asset.drawnShares, this.currentIndex(asset));
        return asset.liquidity + drawn + this.premiumDebtOf(asset) + asset.deficit;
    }

    private requireLiquidity(assetId: number, asset: AssetState, amount: bigint): void {
        if (amount < 0n) {
            fail("INVALID_AMOUNT", "amount cannot be negative", { assetId, amount });
        }
        if (amount > asset.liquidity) {
            fail("INSUFFICIENT_LIQUIDITY", `hub holds ${asset.liquidity} of asset ${assetId}`, {
                assetId,
                amount,
                liquidity: asset.liquidity,
            });
        }
    }

    private burnDrawnShares(assetId: number, asset: AssetState, drawnAmount: bigint): bigint {
        const shares = rayDivDown(drawnAmount, asset.drawnIndex);
        if (drawnAmount < 0n || shares > asset.drawnShares) {
            fail("INVALID_AMOUNT", "restore exceeds drawn debt", { assetId, drawnAmount, drawnShares: asset.drawnShares });
        }
        asset.drawnShares -= shares;
        return shares;
    }

    private applyPremiumDelta(assetId: number, asset: AssetState, delta: PremiumDelta): void {
        const premiumShares = asset.premiumShares + delta.sharesDelta;
        const premiumOffset = asset.premiumOffset + delta.offsetDelta;
        const realizedPremium = asset.realizedPremium + delta.realizedDelta;
        if (premiumShares < 0n || premiumOffset < 0n || realizedPremium < 0n) {
            fail("INVALID_PREMIUM_STATE", "premium aggregates cannot go negative", {
                assetId,
                premiumShares,
                premiumOffset,
                realizedPremium,
            });
        }
        asset.premiumShares = premiumShares;
        asset.premiumOffset = premiumOffset;
        asset.realizedPremium = realizedPremium;
    }

    private recordFlow(account: Address, assetId: number, amount: bigint): void {
        let byAsset = this.flows.get(account);
        if (!byAsset) {
            byAsset = new Map();
            this.flows.set(account, byAsset);
        }
        byAsset.set(assetId, (byAsset.get(assetId) ?? 0n) + amount);
    }
}
