import type { Logger } from 'pino';
import {
  HEALTH_FACTOR_LIQUIDATION_THRESHOLD,
  MAX_UINT256,
  type Address,
  type Spoke,
  type SpokeEvent,
} from '@spoke-ledger/core';
import { formatUnits } from '@spoke-ledger/core/utils';
import type { AccountSnapshot, AccountStorage } from './storage';

export interface HealthMonitorConfig {
  checkInterval: number; // milliseconds
}

export interface HealthCheckResult {
  checked: number;
  liquidatable: number;
  errors: number;
}

function formatHealthFactor(healthFactor: bigint): string {
  return healthFactor === MAX_UINT256 ? 'max' : formatUnits(healthFactor, 18);
}

/**
 * Health Monitor
 * Tracks every account the spoke reports on, re-checks health after each of
 * their actions, on price updates and on a fixed interval, and keeps the set of
 * liquidatable accounts in storage
 */
export class HealthMonitor {
  private spoke: Spoke;
  private storage: AccountStorage;
  private config: HealthMonitorConfig;
  private logger: Logger;
  private intervalId?: NodeJS.Timeout;
  private unsubscribe?: () => void;
  private isRunning: boolean = false;
  private lastCheckAt?: number;

  constructor(
    spoke: Spoke,
    storage: AccountStorage,
    config: HealthMonitorConfig,
    logger: Logger
  ) {
    this.spoke = spoke;
    this.storage = storage;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Subscribe to spoke events and start the periodic health check
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('Health monitor is already running');
      return;
    }

    this.logger.info({ interval: this.config.checkInterval }, 'Starting health monitor');
    this.isRunning = true;
    this.unsubscribe = this.spoke.onEvent((event) => this.handleEvent(event));
    for (const user of this.spoke.getUsers()) {
      this.trackUser(user);
    }

    // Run immediately then on interval
    this.runHealthCheck();

    this.intervalId = setInterval(() => {
      this.runHealthCheck();
    }, this.config.checkInterval);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = undefined;
    }

    this.isRunning = false;
    this.logger.info('Health monitor stopped');
  }

  trackUser(user: Address): void {
    if (this.storage.trackUser(user)) {
      this.logger.debug({ user }, 'Tracking user');
    }
  }

  /**
   * Recompute one account's health and record it
   */
  checkUser(user: Address): AccountSnapshot {
    const accountData = this.spoke.getUserAccountData(user);
    const snapshot: AccountSnapshot = {
      user,
      accountData,
      isLiquidatable: accountData.healthFactor < HEALTH_FACTOR_LIQUIDATION_THRESHOLD,
      updatedAt: Date.now(),
    };

    if (this.storage.updateSnapshot(snapshot)) {
      const fields = { user, healthFactor: formatHealthFactor(accountData.healthFactor) };
      if (snapshot.isLiquidatable) {
        this.logger.warn(fields, 'Account became liquidatable');
      } else {
        this.logger.info(fields, 'Account no longer liquidatable');
      }
    }
    return snapshot;
  }

  runHealthCheck(): HealthCheckResult {
    const result = this.checkUsers(this.storage.getAllUsers());
    this.lastCheckAt = Date.now();
    this.logger.debug({ ...result }, 'Health check complete');
    return result;
  }

  /**
   * Re-check every tracked account holding the reserve as collateral or debt
   */
  handlePriceUpdate(reserveId: number): HealthCheckResult {
    const affected = this.storage
      .getAllUsers()
      .filter((user) => this.spoke.isUsingAsCollateral(reserveId, user) || this.spoke.isBorrowing(reserveId, user));

    const result = this.checkUsers(affected);
    this.logger.info({ reserveId, ...result }, 'Price update processed');
    return result;
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      checkInterval: this.config.checkInterval,
      lastCheckAt: this.lastCheckAt ?? null,
      ...this.storage.getStats(),
    };
  }

  private handleEvent(event: SpokeEvent): void {
    if (!('user' in event)) return;
    this.trackUser(event.user);
    this.checkUsers([event.user]);
  }

  private checkUsers(users: Address[]): HealthCheckResult {
    const result: HealthCheckResult = { checked: 0, liquidatable: 0, errors: 0 };

    for (const user of users) {
      try {
        const snapshot = this.checkUser(user);
        result.checked++;
        if (snapshot.isLiquidatable) result.liquidatable++;
      } catch (error) {
        result.errors++;
        this.logger.error({ error, user }, 'Failed to check account health');
      }
    }
    return result;
  }
}
