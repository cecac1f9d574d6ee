/**
 * @poolvault/ledger — Pool balance ledger.
 *
 * (poolId, token) → CashManagedBalance, plus each pool's token set.
 *
 * The layout is read from the pool id itself (no registry lookup):
 * - pair pools hold at most two tokens. A token takes a slot on its first
 *   non-zero balance, slots stay in ascending address order, and a slot
 *   is never released.
 * - tuple pools hold any number of tokens. A token joins the set on its
 *   first non-zero total and leaves it when the total returns to zero.
 *
 * Membership is stored next to the balances and updated in the same step,
 * never recomputed by scanning.
 */

import type { PoolId, StrategyType, TokenAddress } from "@poolvault/types";
import { compareAddresses, toAddress } from "./address.js";
import {
  decreaseCash,
  divest,
  increaseCash,
  invest,
  isZeroBalance,
  setManaged,
  totalBalance,
  zeroBalance,
} from "./cash-managed.js";
import { Journal } from "./journal.js";
import { decodePoolId, normalizePoolId } from "./pool-id.js";
import type { CashManagedBalance, PoolTokenBalance } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Balances of one pool. Map order is the pool's token order.
 */
interface PoolLayout {
  readonly strategy: StrategyType;
  balances: Map<TokenAddress, CashManagedBalance>;
}

type BalanceUpdate = (balance: CashManagedBalance) => CashManagedBalance;

export class PoolBalanceLedger {
  private readonly _pools: Map<PoolId, PoolLayout> = new Map();
  private readonly _journal: Journal;

  constructor(journal?: Journal) {
    this._journal = journal ?? new Journal();
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Balance of a token in a pool. Zero for tokens the pool never held.
   */
  getBalance(poolId: PoolId, token: TokenAddress): CashManagedBalance {
    const layout = this._pools.get(normalizePoolId(poolId));
    return layout?.balances.get(toAddress(token, "token")) ?? zeroBalance();
  }

  hasToken(poolId: PoolId, token: TokenAddress): boolean {
    const layout = this._pools.get(normalizePoolId(poolId));
    return layout?.balances.has(toAddress(token, "token")) === true;
  }

  /**
   * The pool's tokens: pair slots in address order, tuple members in
   * order of arrival.
   */
  getTokens(poolId: PoolId): readonly TokenAddress[] {
    const layout = this._pools.get(normalizePoolId(poolId));
    return layout === undefined ? [] : [...layout.balances.keys()];
  }

  getBalances(poolId: PoolId): readonly PoolTokenBalance[] {
    const layout = this._pools.get(normalizePoolId(poolId));
    if (layout === undefined) {
      return [];
    }
    return [...layout.balances].map(([token, balance]) => ({ token, balance }));
  }

  /**
   * Sum of every pool's cash of a token.
   */
  cashOf(token: TokenAddress): bigint {
    const key = toAddress(token, "token");
    let sum = 0n;
    for (const layout of this._pools.values()) {
      sum += layout.balances.get(key)?.cash ?? 0n;
    }
    return sum;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  increaseCash(poolId: PoolId, token: TokenAddress, amount: bigint, block: number): CashManagedBalance {
    return this._update(poolId, token, (b) => increaseCash(b, amount, block));
  }

  /**
   * Throws INSUFFICIENT_CASH if amount exceeds the pool's cash.
   */
  decreaseCash(poolId: PoolId, token: TokenAddress, amount: bigint, block: number): CashManagedBalance {
    return this._update(poolId, token, (b) => decreaseCash(b, amount, block));
  }

  invest(poolId: PoolId, token: TokenAddress, amount: bigint, block: number): CashManagedBalance {
    return this._update(poolId, token, (b) => invest(b, amount, block));
  }

  divest(poolId: PoolId, token: TokenAddress, amount: bigint, block: number): CashManagedBalance {
    return this._update(poolId, token, (b) => divest(b, amount, block));
  }

  setManaged(poolId: PoolId, token: TokenAddress, managed: bigint, block: number): CashManagedBalance {
    return this._update(poolId, token, (b) => setManaged(b, managed, block));
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _update(poolId: PoolId, token: TokenAddress, apply: BalanceUpdate): CashManagedBalance {
    const id = normalizePoolId(poolId);
    const tokenKey = toAddress(token, "token");
    const layout = this._layoutFor(id);
    const previous = layout.balances.get(tokenKey);
    const next = apply(previous ?? zeroBalance());

    if (previous !== undefined) {
      if (layout.strategy === "tuple" && isZeroBalance(next)) {
        this._replaceMembership(layout, () => {
          layout.balances.delete(tokenKey);
        });
      } else {
        layout.balances.set(tokenKey, next);
        this._journal.record(() => {
          layout.balances.set(tokenKey, previous);
        });
      }
      return next;
    }

    // Token not yet in the pool: only a non-zero total brings it in.
    if (totalBalance(next) === 0n) {
      return next;
    }

    if (layout.strategy === "pair") {
      if (layout.balances.size >= 2) {
        throw new LedgerError(
          "PAIR_TOKEN_LIMIT",
          `Pair pool ${id} already holds ${[...layout.balances.keys()].join(" and ")}`,
        );
      }
      this._replaceMembership(layout, () => {
        const entries: [TokenAddress, CashManagedBalance][] = [...layout.balances, [tokenKey, next]];
        entries.sort(([a], [b]) => compareAddresses(a, b));
        layout.balances = new Map(entries);
      });
    } else {
      this._replaceMembership(layout, () => {
        layout.balances.set(tokenKey, next);
      });
    }
    return next;
  }

  /**
   * Apply a membership change, journaling the whole map so a rollback
   * restores token order as well as balances.
   */
  private _replaceMembership(layout: PoolLayout, change: () => void): void {
    const before = new Map(layout.balances);
    change();
    this._journal.record(() => {
      layout.balances = before;
    });
  }

  private _layoutFor(id: PoolId): PoolLayout {
    let layout = this._pools.get(id);
    if (layout === undefined) {
      const created: PoolLayout = { strategy: decodePoolId(id).strategy, balances: new Map() };
      this._pools.set(id, created);
      this._journal.record(() => {
        this._pools.delete(id);
      });
      layout = created;
    }
    return layout;
  }
}
