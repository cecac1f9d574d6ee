/**
 * @poolvault/ledger — Cash / managed balance primitive.
 *
 * A pool's balance of one token is the pair (cash, managed):
 * - cash: held by the vault, immediately transferable
 * - managed: delegated to an investment manager
 *
 * Every operation returns a new value; inputs are never mutated.
 * Each component and the total stay below 2^112, and no component
 * ever goes negative.
 */

import { assertAmount, checkedSub, UINT112_MAX } from "./amount-math.js";
import type { CashManagedBalance } from "./types.js";
import { LedgerError } from "./types.js";

const MAX_BLOCK = 0xffff_ffff;

function assertBlock(block: number): void {
  if (!Number.isInteger(block) || block < 0 || block > MAX_BLOCK) {
    throw new LedgerError("INVALID_BLOCK", `Invalid block number: ${String(block)}`);
  }
}

/**
 * Build a balance, enforcing the width of each component and of the total.
 */
function toBalance(cash: bigint, managed: bigint, block: number): CashManagedBalance {
  assertBlock(block);
  if (cash > UINT112_MAX || managed > UINT112_MAX || cash + managed > UINT112_MAX) {
    throw new LedgerError(
      "BALANCE_OVERFLOW",
      `Balance total exceeds 112 bits: cash=${cash.toString()}, managed=${managed.toString()}`,
    );
  }
  return { cash, managed, lastChangeBlock: block };
}

/**
 * The balance of a token a pool has never held.
 */
export function zeroBalance(): CashManagedBalance {
  return { cash: 0n, managed: 0n, lastChangeBlock: 0 };
}

/**
 * cash + managed: what the pool owns, whether or not the vault holds it.
 */
export function totalBalance(balance: CashManagedBalance): bigint {
  return balance.cash + balance.managed;
}

export function isZeroBalance(balance: CashManagedBalance): boolean {
  return totalBalance(balance) === 0n;
}

export function increaseCash(
  balance: CashManagedBalance,
  amount: bigint,
  block: number,
): CashManagedBalance {
  assertAmount(amount);
  return toBalance(balance.cash + amount, balance.managed, block);
}

export function decreaseCash(
  balance: CashManagedBalance,
  amount: bigint,
  block: number,
): CashManagedBalance {
  assertAmount(amount);
  const cash = checkedSub(balance.cash, amount, "INSUFFICIENT_CASH");
  return toBalance(cash, balance.managed, block);
}

/**
 * Move amount from cash to managed. Total is unchanged.
 */
export function invest(
  balance: CashManagedBalance,
  amount: bigint,
  block: number,
): CashManagedBalance {
  assertAmount(amount);
  const cash = checkedSub(balance.cash, amount, "INSUFFICIENT_CASH");
  return toBalance(cash, balance.managed + amount, block);
}

/**
 * Move amount from managed back to cash. Total is unchanged.
 */
export function divest(
  balance: CashManagedBalance,
  amount: bigint,
  block: number,
): CashManagedBalance {
  assertAmount(amount);
  const managed = checkedSub(balance.managed, amount, "INSUFFICIENT_MANAGED");
  return toBalance(balance.cash + amount, managed, block);
}

/**
 * Overwrite the managed component with an absolute value reported by the
 * investment manager (yield or loss). Not a delta.
 */
export function setManaged(
  balance: CashManagedBalance,
  managed: bigint,
  block: number,
): CashManagedBalance {
  assertAmount(managed, "managed amount");
  return toBalance(balance.cash, managed, block);
}
