/**
 * Pool Registry — pools, liquidity and investment managers.
 *
 * Pools move from nonexistent to registered and never back. Each pool is
 * governed by its controller: only the controller adds or removes
 * liquidity and assigns investment managers. An investment manager may
 * take a pool token's cash under management and must return it before
 * it can be replaced or revoked.
 */

import type { Address, PoolId, PoolRecord, StrategyType, TokenAddress } from "@poolvault/types";
import type { Journal, PoolBalanceLedger, UserBalanceLedger } from "@poolvault/ledger";
import {
  assertAmount,
  encodePoolId,
  formatAmount,
  isZeroAddress,
  MAX_POOL_INDEX,
  normalizePoolId,
  toAddress,
  totalBalance,
} from "@poolvault/ledger";
import type { Custody } from "./custody.js";
import type { ProtocolFeesCollector } from "./protocol-fees.js";
import type {
  AddLiquidityRequest,
  OperationContext,
  PoolTokenInfo,
  PoolTokens,
  RemoveLiquidityRequest,
} from "./types.js";
import { VaultError } from "./types.js";

export interface PoolRegistryDeps {
  readonly journal: Journal;
  readonly pools: PoolBalanceLedger;
  readonly users: UserBalanceLedger;
  readonly custody: Custody;
  readonly fees: ProtocolFeesCollector;
}

function managerKey(poolId: PoolId, token: TokenAddress): string {
  return `${poolId}:${token}`;
}

export class PoolRegistry {
  private readonly _records = new Map<PoolId, PoolRecord>();
  private readonly _managers = new Map<string, Address>();
  private _nextIndex = 0;

  constructor(private readonly _deps: PoolRegistryDeps) {}

  // ====================================================================
  // Registration
  // ====================================================================

  /**
   * Register a pool. The creation index increases with every pool, so ids
   * are never reused.
   */
  newPool(ctx: OperationContext, controller: Address, strategy: StrategyType): PoolRecord {
    const owner = toAddress(controller, "controller");
    if (isZeroAddress(owner)) {
      throw new VaultError("INVALID_CONTROLLER", "The zero address cannot control a pool");
    }
    const index = this._nextIndex;
    if (index > MAX_POOL_INDEX) {
      throw new VaultError("DUPLICATE_POOL_ID", "Pool creation index space is exhausted");
    }

    const id = encodePoolId({ controller: owner, strategy, index });
    if (this._records.has(id)) {
      throw new VaultError("DUPLICATE_POOL_ID", `Pool ${id} is already registered`);
    }

    const record: PoolRecord = {
      id,
      controller: owner,
      strategy,
      index,
      registeredAtBlock: ctx.block,
    };
    this._records.set(id, record);
    this._nextIndex = index + 1;
    this._deps.journal.record(() => {
      this._records.delete(id);
      this._nextIndex = index;
    });

    ctx.emit("pool.registered", { poolId: id, controller: owner, strategy, index });
    return record;
  }

  // ====================================================================
  // Liquidity
  // ====================================================================

  /**
   * Add tokens to a pool. The caller must be the pool's controller and an
   * agent of `from`. Per token, `from`'s user balance is drawn first when
   * requested and the remainder is pulled.
   */
  addLiquidity(ctx: OperationContext, request: AddLiquidityRequest): void {
    const pool = this.requirePool(request.poolId);
    requireSameLength(request.tokens, request.amounts);
    this._requireController(ctx.caller, pool);
    const from = toAddress(request.from, "from");
    if (!this._deps.users.isAgentFor(from, ctx.caller)) {
      throw new VaultError("SENDER_NOT_AGENT", `${ctx.caller} is not an agent of ${from}`);
    }

    const tokens: TokenAddress[] = [];
    const fromUserBalance: string[] = [];
    request.tokens.forEach((raw, i) => {
      const token = toAddress(raw, "token");
      const amount = request.amounts[i] ?? 0n;
      assertAmount(amount);
      tokens.push(token);

      let drawn = 0n;
      if (amount > 0n) {
        drawn = request.useUserBalance ? this._deps.users.debitUpTo(from, token, amount) : 0n;
        this._deps.custody.pull(token, from, amount - drawn);
        this._deps.pools.increaseCash(pool.id, token, amount, ctx.block);
      }
      fromUserBalance.push(formatAmount(drawn));
    });

    ctx.emit("liquidity.added", {
      poolId: pool.id,
      from,
      tokens,
      amounts: request.amounts.map(formatAmount),
      fromUserBalance,
    });
  }

  /**
   * Remove tokens from a pool. Only the controller may call. Tokens are
   * credited to `to`'s user balance, or pushed out less the withdraw fee.
   */
  removeLiquidity(ctx: OperationContext, request: RemoveLiquidityRequest): void {
    const pool = this.requirePool(request.poolId);
    requireSameLength(request.tokens, request.amounts);
    this._requireController(ctx.caller, pool);
    const to = toAddress(request.to, "to");

    const tokens: TokenAddress[] = [];
    const fees: string[] = [];
    request.tokens.forEach((raw, i) => {
      const token = toAddress(raw, "token");
      const amount = request.amounts[i] ?? 0n;
      assertAmount(amount);
      tokens.push(token);

      let fee = 0n;
      if (amount > 0n) {
        this._deps.pools.decreaseCash(pool.id, token, amount, ctx.block);
        if (request.depositToUserBalance) {
          this._deps.users.deposit(to, token, amount);
        } else {
          fee = this._deps.fees.withdrawFeeAmount(amount);
          this._deps.fees.collect(token, fee);
          this._deps.custody.push(token, to, amount - fee);
        }
      }
      fees.push(formatAmount(fee));
    });

    ctx.emit("liquidity.removed", {
      poolId: pool.id,
      to,
      tokens,
      amounts: request.amounts.map(formatAmount),
      fees,
      toUserBalance: request.depositToUserBalance,
    });
  }

  // ====================================================================
  // Investment Managers
  // ====================================================================

  /**
   * Assign the investment manager of a pool token. Rejected while any of
   * the token is under management.
   */
  authorizePoolInvestmentManager(
    ctx: OperationContext,
    poolId: PoolId,
    token: TokenAddress,
    manager: Address,
  ): void {
    const pool = this.requirePool(poolId);
    this._requireController(ctx.caller, pool);
    const tokenKey = toAddress(token, "token");
    const managerAddress = toAddress(manager, "manager");
    if (isZeroAddress(managerAddress)) {
      throw new VaultError("INVALID_MANAGER", "The zero address cannot be an investment manager");
    }
    this._requireNothingManaged(pool.id, tokenKey);

    this._setManager(pool.id, tokenKey, managerAddress);
    ctx.emit("manager.authorized", { poolId: pool.id, token: tokenKey, manager: managerAddress });
  }

  revokePoolInvestmentManager(ctx: OperationContext, poolId: PoolId, token: TokenAddress): void {
    const pool = this.requirePool(poolId);
    this._requireController(ctx.caller, pool);
    const tokenKey = toAddress(token, "token");
    const manager = this._managers.get(managerKey(pool.id, tokenKey));
    if (manager === undefined) {
      throw new VaultError("MANAGER_NOT_SET", `No investment manager for ${tokenKey} in ${pool.id}`);
    }
    this._requireNothingManaged(pool.id, tokenKey);

    this._setManager(pool.id, tokenKey, undefined);
    ctx.emit("manager.revoked", { poolId: pool.id, token: tokenKey, manager });
  }

  /**
   * Hand pool cash to the token's manager.
   */
  investPoolBalance(ctx: OperationContext, poolId: PoolId, token: TokenAddress, amount: bigint): void {
    const { pool, tokenKey, manager } = this._requireManager(ctx, poolId, token);
    this._deps.pools.invest(pool.id, tokenKey, amount, ctx.block);
    this._deps.custody.push(tokenKey, manager, amount);
    ctx.emit("investment.invested", {
      poolId: pool.id,
      token: tokenKey,
      manager,
      amount: formatAmount(amount),
      fee: "0",
    });
  }

  /**
   * Take funds back from the manager. The withdraw fee is taken from what
   * returns to cash.
   */
  divestPoolBalance(ctx: OperationContext, poolId: PoolId, token: TokenAddress, amount: bigint): void {
    const { pool, tokenKey, manager } = this._requireManager(ctx, poolId, token);
    this._deps.pools.divest(pool.id, tokenKey, amount, ctx.block);
    this._deps.custody.pull(tokenKey, manager, amount);

    const fee = this._deps.fees.withdrawFeeAmount(amount);
    if (fee > 0n) {
      this._deps.pools.decreaseCash(pool.id, tokenKey, fee, ctx.block);
      this._deps.fees.collect(tokenKey, fee);
    }
    ctx.emit("investment.divested", {
      poolId: pool.id,
      token: tokenKey,
      manager,
      amount: formatAmount(amount),
      fee: formatAmount(fee),
    });
  }

  /**
   * Record the managed amount the manager now reports (absolute).
   */
  updateInvested(ctx: OperationContext, poolId: PoolId, token: TokenAddress, managed: bigint): void {
    const { pool, tokenKey, manager } = this._requireManager(ctx, poolId, token);
    this._deps.pools.setManaged(pool.id, tokenKey, managed, ctx.block);
    ctx.emit("investment.updated", {
      poolId: pool.id,
      token: tokenKey,
      manager,
      managed: formatAmount(managed),
    });
  }

  // ====================================================================
  // Queries
  // ====================================================================

  getPool(poolId: PoolId): PoolRecord | undefined {
    return this._records.get(normalizePoolId(poolId));
  }

  /**
   * Throws POOL_NOT_FOUND for ids that were never registered.
   */
  requirePool(poolId: PoolId): PoolRecord {
    const record = this.getPool(poolId);
    if (record === undefined) {
      throw new VaultError("POOL_NOT_FOUND", `Pool ${poolId} is not registered`);
    }
    return record;
  }

  /** Pools in creation order. */
  listPools(): readonly PoolRecord[] {
    return [...this._records.values()];
  }

  getPoolTokens(poolId: PoolId): PoolTokens {
    const pool = this.requirePool(poolId);
    const entries = this._deps.pools.getBalances(pool.id);
    return {
      tokens: entries.map((e) => e.token),
      balances: entries.map((e) => totalBalance(e.balance)),
      maxBlockNumber: entries.reduce((max, e) => Math.max(max, e.balance.lastChangeBlock), 0),
    };
  }

  getPoolTokenInfo(poolId: PoolId, token: TokenAddress): PoolTokenInfo {
    const pool = this.requirePool(poolId);
    const tokenKey = toAddress(token, "token");
    if (!this._deps.pools.hasToken(pool.id, tokenKey)) {
      throw new VaultError("TOKEN_NOT_IN_POOL", `${tokenKey} is not in pool ${pool.id}`);
    }
    return this._tokenInfo(pool.id, tokenKey);
  }

  /**
   * Like getPoolTokenInfo, but a token the pool does not hold reads as a
   * zero balance instead of failing.
   */
  getPoolTokenState(poolId: PoolId, token: TokenAddress): PoolTokenInfo {
    const pool = this.requirePool(poolId);
    return this._tokenInfo(pool.id, toAddress(token, "token"));
  }

  getInvestmentManager(poolId: PoolId, token: TokenAddress): Address | undefined {
    const pool = this.requirePool(poolId);
    return this._managers.get(managerKey(pool.id, toAddress(token, "token")));
  }

  // ====================================================================
  // Internals
  // ====================================================================

  private _tokenInfo(poolId: PoolId, tokenKey: TokenAddress): PoolTokenInfo {
    const balance = this._deps.pools.getBalance(poolId, tokenKey);
    return {
      cash: balance.cash,
      managed: balance.managed,
      lastChangeBlock: balance.lastChangeBlock,
      manager: this._managers.get(managerKey(poolId, tokenKey)),
    };
  }

  private _requireController(caller: Address, pool: PoolRecord): void {
    if (toAddress(caller, "caller") !== pool.controller) {
      throw new VaultError(
        "CALLER_NOT_CONTROLLER",
        `${caller} is not the controller of pool ${pool.id}`,
      );
    }
  }

  private _requireNothingManaged(poolId: PoolId, token: TokenAddress): void {
    const { managed } = this._deps.pools.getBalance(poolId, token);
    if (managed !== 0n) {
      throw new VaultError(
        "MANAGED_BALANCE_NOT_ZERO",
        `${managed.toString()} of ${token} in pool ${poolId} is still under management`,
      );
    }
  }

  private _requireManager(
    ctx: OperationContext,
    poolId: PoolId,
    token: TokenAddress,
  ): { pool: PoolRecord; tokenKey: TokenAddress; manager: Address } {
    const pool = this.requirePool(poolId);
    const tokenKey = toAddress(token, "token");
    const manager = this._managers.get(managerKey(pool.id, tokenKey));
    if (manager === undefined || manager !== toAddress(ctx.caller, "caller")) {
      throw new VaultError(
        "CALLER_NOT_MANAGER",
        `${ctx.caller} is not the investment manager of ${tokenKey} in pool ${pool.id}`,
      );
    }
    return { pool, tokenKey, manager };
  }

  private _setManager(poolId: PoolId, token: TokenAddress, manager: Address | undefined): void {
    const key = managerKey(poolId, token);
    const previous = this._managers.get(key);
    if (manager === undefined) {
      this._managers.delete(key);
    } else {
      this._managers.set(key, manager);
    }
    this._deps.journal.record(() => {
      if (previous === undefined) {
        this._managers.delete(key);
      } else {
        this._managers.set(key, previous);
      }
    });
  }
}

function requireSameLength(tokens: readonly unknown[], amounts: readonly unknown[]): void {
  if (tokens.length !== amounts.length) {
    throw new VaultError(
      "LENGTH_MISMATCH",
      `Got ${tokens.length} tokens and ${amounts.length} amounts`,
    );
  }
}
