import type { IHub, Checkpointable } from "../interfaces";
import type {
    Address,
    DynamicReserveConfig,
    LiquidationConfig,
    Reserve,
    UserPosition,
} from "../types";
import { DEFAULT_LIQUIDATION_CONFIG } from "../constants";
import { fail } from "../errors";
import { PositionStatusMap } from "./position-status";

export function emptyPosition(): UserPosition {
    return {
        suppliedShares: 0n,
        drawnShares: 0n,
        premiumShares: 0n,
        premiumOffset: 0n,
        realizedPremium: 0n,
        configKey: 0,
    };
}

/**
 * In-memory repository behind a spoke: reserves, their dynamic config
 * versions, user positions, position status bitmaps and position managers.
 * Records are created on first use and never deleted.
 */
export class LedgerStore implements Checkpointable {
    private reserves: Reserve[] = [];
    private reserveIds: Map<IHub, Map<number, number>> = new Map();
    private dynamicConfigs: Map<number, DynamicReserveConfig[]> = new Map();
    private positions: Map<Address, Map<number, UserPosition>> = new Map();
    private statuses: Map<Address, PositionStatusMap> = new Map();
    private positionManagers: Map<Address, boolean> = new Map();
    private approvals: Map<Address, Set<Address>> = new Map();
    private liquidationConfig: LiquidationConfig = { ...DEFAULT_LIQUIDATION_CONFIG };

    // ==================== Reserves ====================

    get reserveCount(): number {
        return this.reserves.length;
    }

    findReserveId(hub: IHub, assetId: number): number | undefined {
        return this.reserveIds.get(hub)?.get(assetId);
    }

    addReserve(reserve: Omit<Reserve, "reserveId">): Reserve {
        const stored: Reserve = { ...reserve, reserveId: this.reserves.length };
        this.reserves.push(stored);

        let byAsset = this.reserveIds.get(reserve.hub);
        if (!byAsset) {
            byAsset = new Map();
            this.reserveIds.set(reserve.hub, byAsset);
        }
        byAsset.set(reserve.assetId, stored.reserveId);
        return stored;
    }

    getReserve(reserveId: number): Reserve {
        const reserve = this.reserves[reserveId];
        if (!reserve) {
            return fail("RESERVE_NOT_LISTED", `reserve ${reserveId} is not listed`, { reserveId });
        }
        return reserve;
    }

    getAllReserves(): Reserve[] {
        return [...this.reserves];
    }

    // ==================== Dynamic configs ====================

    getDynamicConfigs(reserveId: number): DynamicReserveConfig[] {
        return this.dynamicConfigs.get(reserveId) ?? [];
    }

    getDynamicConfig(reserveId: number, key: number): DynamicReserveConfig {
        const config = this.dynamicConfigs.get(reserveId)?.[key];
        if (!config) {
            return fail("DYNAMIC_CONFIG_KEY_NOT_FOUND", `reserve ${reserveId} has no dynamic config ${key}`, { reserveId, key });
        }
        return config;
    }

    /**
     * @returns key of the appended version
     */
    appendDynamicConfig(reserveId: number, config: DynamicReserveConfig): number {
        let versions = this.dynamicConfigs.get(reserveId);
        if (!versions) {
            versions = [];
            this.dynamicConfigs.set(reserveId, versions);
        }
        versions.push({ ...config });
        return versions.length - 1;
    }

    setDynamicConfig(reserveId: number, key: number, config: DynamicReserveConfig): void {
        const versions = this.dynamicConfigs.get(reserveId);
        if (!versions || !versions[key]) {
            fail("DYNAMIC_CONFIG_KEY_NOT_FOUND", `reserve ${reserveId} has no dynamic config ${key}`, { reserveId, key });
        }
        versions[key] = { ...config };
    }

    // ==================== Positions ====================

    /**
     * Live position record, created zeroed on first access
     */
    position(user: Address, reserveId: number): UserPosition {
        let byReserve = this.positions.get(user);
        if (!byReserve) {
            byReserve = new Map();
            this.positions.set(user, byReserve);
        }
        let position = byReserve.get(reserveId);
        if (!position) {
            position = emptyPosition();
            byReserve.set(reserveId, position);
        }
        return position;
    }

    peekPosition(user: Address, reserveId: number): UserPosition {
        return this.positions.get(user)?.get(reserveId) ?? emptyPosition();
    }

    status(user: Address): PositionStatusMap {
        let status = this.statuses.get(user);
        if (!status) {
            status = new PositionStatusMap();
            this.statuses.set(user, status);
        }
        return status;
    }

    peekStatus(user: Address): PositionStatusMap {
        return this.statuses.get(user) ?? new PositionStatusMap();
    }

    getUsers(): Address[] {
        return Array.from(this.statuses.keys());
    }

    // ==================== Position managers ====================

    setPositionManager(manager: Address, active: boolean): void {
        this.positionManagers.set(manager, active);
    }

    isPositionManagerActive(manager: Address): boolean {
        return this.positionManagers.get(manager) ?? false;
    }

    setApproval(user: Address, manager: Address, approved: boolean): void {
        let managers = this.approvals.get(user);
        if (!managers) {
            managers = new Set();
            this.approvals.set(user, managers);
        }
        if (approved) {
            managers.add(manager);
        } else {
            managers.delete(manager);
        }
    }

    isApproved(user: Address, manager: Address): boolean {
        return this.approvals.get(user)?.has(manager) ?? false;
    }

    // ==================== Liquidation config ====================

    getLiquidationConfig(): LiquidationConfig {
        return { ...this.liquidationConfig };
    }

    setLiquidationConfig(config: LiquidationConfig): void {
        this.liquidationConfig = { ...config };
    }

    // ==================== Checkpoint ====================

    checkpoint(): () => void {
        const reserves = this.reserves.map((reserve) => ({ ...reserve }));
        const reserveIds = new Map(Array.from(this.reserveIds, ([hub, byAsset]) => [hub, new Map(byAsset)] as const));
        const dynamicConfigs = new Map(
            Array.from(this.dynamicConfigs, ([reserveId, versions]) => [reserveId, versions.map((v) => ({ ...v }))] as const),
        );
        const positions = new Map(
            Array.from(this.positions, ([user, byReserve]) => [
                user,
                new Map(Array.from(byReserve, ([reserveId, position]) => [reserveId, { ...position }] as const)),
            ] as const),
        );
        const statuses = new Map(Array.from(this.statuses, ([user, status]) => [user, status.clone()] as const));
        const positionManagers = new Map(this.positionManagers);
        const approvals = new Map(Array.from(this.approvals, ([user, managers]) => [user, new Set(managers)] as const));
        const liquidationConfig = { ...this.liquidationConfig };

        return () => {
            this.reserves = reserves;
            this.reserveIds = reserveIds;
            this.dynamicConfigs = dynamicConfigs;
            this.positions = positions;
            this.statuses = statuses;
            this.positionManagers = positionManagers;
            this.approvals = approvals;
            this.liquidationConfig = liquidationConfig;
        };
    }
}
