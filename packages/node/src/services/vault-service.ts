/**
 * VaultService — composition root for the sandbox vault.
 *
 * Route handlers delegate to this service; they never build vault
 * collaborators themselves. The service owns one vault wired to the
 * reference collaborators: an in-memory token bank, a strategy
 * directory that gives every new controller a constant-product
 * strategy, and a role authorizer with a single admin.
 */

import type { Address, PoolRecord, StrategyType } from "@poolvault/types";
import type { EventLogIntegrityResult, SubscriberErrorHandler } from "@poolvault/event-store";
import {
  ConstantProductStrategy,
  InMemoryTokenBank,
  RoleAuthorizer,
  StaticStrategyDirectory,
  Vault,
} from "@poolvault/vault";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly vaultAddress: Address;
  readonly adminAddress: Address;
  /** 18-decimal fixed point */
  readonly swapFee?: bigint;
  readonly flashLoanFee?: bigint;
  readonly withdrawFee?: bigint;
  /** Smallest balance a constant-product swap may leave in a pool */
  readonly minPoolBalance?: bigint;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
  readonly onSubscriberError?: SubscriberErrorHandler;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: Vault;
  readonly bank: InMemoryTokenBank;
  readonly strategies: StaticStrategyDirectory;
  readonly authorizer: RoleAuthorizer;
  readonly admin: Address;

  private readonly _minPoolBalance: bigint;
  private _ready = false;

  constructor(config: VaultServiceConfig) {
    this.admin = config.adminAddress;
    this._minPoolBalance = config.minPoolBalance ?? 1n;
    this.bank = new InMemoryTokenBank(config.vaultAddress);
    this.strategies = new StaticStrategyDirectory();
    this.authorizer = new RoleAuthorizer(config.adminAddress);
    this.vault = new Vault({
      address: config.vaultAddress,
      transfers: this.bank,
      strategies: this.strategies,
      authorizer: this.authorizer,
      ...(config.clock !== undefined ? { clock: config.clock } : {}),
      ...(config.idGenerator !== undefined ? { idGenerator: config.idGenerator } : {}),
      ...(config.onSubscriberError !== undefined ? { onSubscriberError: config.onSubscriberError } : {}),
    });

    if (config.swapFee !== undefined && config.swapFee > 0n) {
      this.vault.setSwapFee(this.admin, config.swapFee);
    }
    if (config.flashLoanFee !== undefined && config.flashLoanFee > 0n) {
      this.vault.setFlashLoanFee(this.admin, config.flashLoanFee);
    }
    if (config.withdrawFee !== undefined && config.withdrawFee > 0n) {
      this.vault.setWithdrawFee(this.admin, config.withdrawFee);
    }

    this._ready = true;
  }

  // ─── Pools ─────────────────────────────────────────────────────────

  /**
   * Register a pool. A controller seen for the first time gets a
   * constant-product strategy.
   */
  createPool(caller: Address, controller: Address, strategy: StrategyType): PoolRecord {
    if (this.strategies.resolve(controller) === undefined) {
      this.strategies.register(
        controller,
        new ConstantProductStrategy({ minBalance: this._minPoolBalance }),
      );
    }
    return this.vault.newPool(caller, controller, strategy);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  checkEventLog(): EventLogIntegrityResult {
    return this.vault.events.verifyIntegrity();
  }

  stop(): void {
    this._ready = false;
  }
}
