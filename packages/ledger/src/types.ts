/**
 * @poolvault/ledger — Internal types for the balance ledgers.
 *
 * Rules:
 * - All value types are readonly
 * - Balances are unsigned; going below zero is a thrown error
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { ErrorCategory, TokenAddress } from "@poolvault/types";

// ─── Balance Types ───────────────────────────────────────────────────────

/**
 * A pool's holding of one token, split into what the vault holds
 * directly (cash) and what an investment manager holds (managed).
 *
 * Invariant: cash, managed, and cash + managed are all below 2^112.
 */
export interface CashManagedBalance {
  /** Immediately transferable by the vault */
  readonly cash: bigint;
  /** Delegated to the pool's investment manager */
  readonly managed: bigint;
  /** Vault block number of the last change */
  readonly lastChangeBlock: number;
}

/**
 * One token line of a pool's balances.
 */
export interface PoolTokenBalance {
  readonly token: TokenAddress;
  readonly balance: CashManagedBalance;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_POOL_ID"
  | "INVALID_POOL_INDEX"
  | "INVALID_BLOCK"
  | "INSUFFICIENT_CASH"
  | "INSUFFICIENT_MANAGED"
  | "INSUFFICIENT_USER_BALANCE"
  | "BALANCE_OVERFLOW"
  | "PAIR_TOKEN_LIMIT"
  | "CANNOT_REMOVE_SELF_AGENT"
  | "UNIVERSAL_AGENT_NOT_REMOVABLE"
  | "AGENT_NOT_FOUND"
  | "UNIVERSAL_AGENT_NOT_FOUND"
  | "UNIVERSAL_AGENT_MANAGER_NOT_FOUND"
  | "JOURNAL_STATE";

const LEDGER_ERROR_CATEGORIES: Readonly<Record<LedgerErrorCode, ErrorCategory>> = {
  INVALID_AMOUNT: "InvalidInput",
  INVALID_ADDRESS: "InvalidInput",
  INVALID_POOL_ID: "InvalidInput",
  INVALID_POOL_INDEX: "InvalidInput",
  INVALID_BLOCK: "InvalidInput",
  INSUFFICIENT_CASH: "InsufficientFunds",
  INSUFFICIENT_MANAGED: "InsufficientFunds",
  INSUFFICIENT_USER_BALANCE: "InsufficientFunds",
  BALANCE_OVERFLOW: "InvariantViolation",
  PAIR_TOKEN_LIMIT: "InvalidInput",
  CANNOT_REMOVE_SELF_AGENT: "InvalidInput",
  UNIVERSAL_AGENT_NOT_REMOVABLE: "Unauthorized",
  AGENT_NOT_FOUND: "NotFound",
  UNIVERSAL_AGENT_NOT_FOUND: "NotFound",
  UNIVERSAL_AGENT_MANAGER_NOT_FOUND: "NotFound",
  JOURNAL_STATE: "InvariantViolation",
};

/**
 * Structured error from the ledgers.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.category = LEDGER_ERROR_CATEGORIES[code];
  }
}
