import type { Address, UserAccountData } from '@spoke-ledger/core';

export interface AccountSnapshot {
  user: Address;
  accountData: UserAccountData;
  isLiquidatable: boolean;
  updatedAt: number; // timestamp
}

/**
 * In-memory registry of the accounts the service has seen and their latest
 * health snapshot
 */
export class AccountStorage {
  private users: Set<Address> = new Set();
  private snapshots: Map<Address, AccountSnapshot> = new Map();
  private liquidatable: Set<Address> = new Set();

  /**
   * @returns false when the user was already tracked
   */
  trackUser(user: Address): boolean {
    if (this.users.has(user)) {
      return false;
    }
    this.users.add(user);
    return true;
  }

  isTracked(user: Address): boolean {
    return this.users.has(user);
  }

  getAllUsers(): Address[] {
    return Array.from(this.users);
  }

  /**
   * Store a snapshot and keep the liquidatable index in step
   * @returns whether the user's liquidatable flag changed
   */
  updateSnapshot(snapshot: AccountSnapshot): boolean {
    this.trackUser(snapshot.user);
    const wasLiquidatable = this.liquidatable.has(snapshot.user);
    this.snapshots.set(snapshot.user, snapshot);

    if (snapshot.isLiquidatable) {
      this.liquidatable.add(snapshot.user);
    } else {
      this.liquidatable.delete(snapshot.user);
    }
    return wasLiquidatable !== snapshot.isLiquidatable;
  }

  getSnapshot(user: Address): AccountSnapshot | undefined {
    return this.snapshots.get(user);
  }

  /**
   * Liquidatable accounts, least healthy first
   */
  getLiquidatable(): AccountSnapshot[] {
    return Array.from(this.liquidatable)
      .map((user) => this.snapshots.get(user))
      .filter((snapshot): snapshot is AccountSnapshot => snapshot !== undefined)
      .sort((a, b) => {
        const left = a.accountData.healthFactor;
        const right = b.accountData.healthFactor;
        return left < right ? -1 : left > right ? 1 : 0;
      });
  }

  getStats() {
    return {
      trackedUsers: this.users.size,
      snapshots: this.snapshots.size,
      liquidatable: this.liquidatable.size,
    };
  }
}
