/**
 * @poolvault/ledger — Balance accounting primitives.
 *
 * A pure TypeScript ledger with no runtime dependencies beyond
 * @poolvault/types. Provides:
 * - PoolId encoding (controller + strategy + creation index)
 * - The cash / managed balance primitive with 112-bit checks
 * - Per-user balances and agent relations
 * - Per-pool balances with pair / tuple token layouts
 * - An undo journal shared by the ledgers for all-or-nothing operations
 *
 * Design rules:
 * - All arithmetic uses bigint (no floating point)
 * - Balances are unsigned; underflow throws
 * - Fail-closed: invalid input throws, never silently succeeds
 */

// Pool identity
export {
  encodePoolId,
  decodePoolId,
  unpackPoolId,
  poolIndexOf,
  normalizePoolId,
  STRATEGY_CODES,
  MAX_POOL_INDEX,
} from "./pool-id.js";

// Cash / managed balance
export {
  zeroBalance,
  totalBalance,
  isZeroBalance,
  increaseCash,
  decreaseCash,
  invest,
  divest,
  setManaged,
} from "./cash-managed.js";

// Ledgers
export { UserBalanceLedger } from "./user-balances.js";
export { PoolBalanceLedger } from "./pool-balances.js";
export { Journal } from "./journal.js";
export type { UndoAction } from "./journal.js";

// Addresses
export { toAddress, isZeroAddress, compareAddresses } from "./address.js";

// Amount arithmetic
export {
  UINT112_MAX,
  UINT256_MAX,
  ONE,
  parseAmount,
  formatAmount,
  assertAmount,
  checkedAdd,
  checkedSub,
  minAmount,
  mulDown,
  mulUp,
  divDown,
  divUp,
  parsePercentage,
} from "./amount-math.js";

// Types
export type {
  CashManagedBalance,
  PoolTokenBalance,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
