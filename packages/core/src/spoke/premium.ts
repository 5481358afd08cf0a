import type { IHub } from "../interfaces";
import type { PremiumDelta, UserDebt, UserPosition } from "../types";
import { percentMulUp } from "../utils/math";
import { fail } from "../errors";

/**
 * Premium accrued on the position's premium shares since they were last set
 */
export function accruedPremium(hub: IHub, assetId: number, position: UserPosition): bigint {
    const accrued = hub.previewRestoreByShares(assetId, position.premiumShares) - position.premiumOffset;
    if (accrued < 0n) {
        fail("INVALID_PREMIUM_STATE", "premium offset exceeds premium shares value", {
            assetId,
            premiumShares: position.premiumShares,
            premiumOffset: position.premiumOffset,
        });
    }
    return accrued;
}

export function getPositionDebt(hub: IHub, assetId: number, position: UserPosition): UserDebt {
    return {
        drawnDebt: hub.previewRestoreByShares(assetId, position.drawnShares),
        premiumDebt: accruedPremium(hub, assetId, position) + position.realizedPremium,
    };
}

/**
 * Re-derive the position's premium shares and offset for a new risk premium,
 * folding what accrued so far into the realized premium.
 * Mutates `position` and returns the delta the hub must mirror.
 */
export function refreshPositionPremium(
    hub: IHub,
    assetId: number,
    position: UserPosition,
    riskPremium: bigint,
): PremiumDelta {
    const oldShares = position.premiumShares;
    const oldOffset = position.premiumOffset;
    const accrued = accruedPremium(hub, assetId, position);

    const newShares = percentMulUp(position.drawnShares, riskPremium);
    // the offset is a virtual liability, so it rounds the opposite way to debt
    const newOffset = hub.previewDrawByShares(assetId, newShares);

    position.premiumShares = newShares;
    position.premiumOffset = newOffset;
    position.realizedPremium += accrued;

    return {
        sharesDelta: newShares - oldShares,
        offsetDelta: newOffset - oldOffset,
        realizedDelta: accrued,
    };
}

/**
 * Zero the premium shares and offset after `premiumRestored` of premium debt
 * was paid. Mutates `position`.
 */
export function settlePositionPremium(
    hub: IHub,
    assetId: number,
    position: UserPosition,
    premiumRestored: bigint,
): PremiumDelta {
    const accrued = accruedPremium(hub, assetId, position);
    const premiumDebt = accrued + position.realizedPremium;
    if (premiumRestored > premiumDebt) {
        fail("INVALID_PREMIUM_STATE", "premium restored exceeds premium debt", { assetId, premiumRestored, premiumDebt });
    }

    const delta: PremiumDelta = {
        sharesDelta: -position.premiumShares,
        offsetDelta: -position.premiumOffset,
        realizedDelta: accrued - premiumRestored,
    };

    position.premiumShares = 0n;
    position.premiumOffset = 0n;
    position.realizedPremium = premiumDebt - premiumRestored;

    return delta;
}

/**
 * Zero every premium component when the whole premium debt is written off as
 * deficit. Mutates `position`.
 */
export function clearPositionPremium(position: UserPosition): PremiumDelta {
    const delta: PremiumDelta = {
        sharesDelta: -position.premiumShares,
        offsetDelta: -position.premiumOffset,
        realizedDelta: -position.realizedPremium,
    };

    position.premiumShares = 0n;
    position.premiumOffset = 0n;
    position.realizedPremium = 0n;

    return delta;
}

/**
 * Split a repayment: premium debt first, then drawn debt
 */
export function splitPremiumFirst(debt: UserDebt, amount: bigint): { drawnRestored: bigint, premiumRestored: bigint } {
    if (amount <= debt.premiumDebt) {
        return { drawnRestored: 0n, premiumRestored: amount };
    }
    const drawnRestored = amount - debt.premiumDebt;
    if (drawnRestored > debt.drawnDebt) {
        fail("INVALID_AMOUNT", "restore amount exceeds total debt", { amount, ...debt });
    }
    return { drawnRestored, premiumRestored: debt.premiumDebt };
}

/**
 * Split a liquidation: drawn debt first, the remainder from premium debt
 */
export function splitDrawnFirst(debt: UserDebt, amount: bigint): { drawnRestored: bigint, premiumRestored: bigint } {
    const drawnRestored = amount < debt.drawnDebt ? amount : debt.drawnDebt;
    const premiumRestored = amount - drawnRestored;
    if (premiumRestored > debt.premiumDebt) {
        fail("INVALID_AMOUNT", "restore amount exceeds total debt", { amount, ...debt });
    }
    return { drawnRestored, premiumRestored };
}
