/**
 * @poolvault/vault — Multi-pool asset vault.
 *
 * One vault holds the tokens of every pool and every user and settles
 * batched swaps with a single transfer per token.
 *
 * Subsystems:
 * - Registry: pools, liquidity, investment managers
 * - Settlement: batched swaps with net settlement
 * - Flash loans: lent and repaid within one operation
 * - Users: deposited balances and agents
 * - Protocol fees: swap, flash-loan and withdraw fees
 *
 * Design rules:
 * - Every mutating call is all-or-nothing
 * - No call may re-enter the vault while another is running
 * - The ledgers never account for more than custody received
 */

// Top-level vault
export { Vault } from "./vault.js";
export type { VaultOptions } from "./vault.js";

// Subsystems
export { PoolRegistry } from "./pool-registry.js";
export type { PoolRegistryDeps } from "./pool-registry.js";
export { SettlementEngine } from "./settlement.js";
export type { SettlementDeps } from "./settlement.js";
export { FlashLoanDesk } from "./flash-loans.js";
export { UserOperations } from "./user-operations.js";
export {
  ProtocolFeesCollector,
  MAX_SWAP_FEE,
  MAX_FLASH_LOAN_FEE,
  MAX_WITHDRAW_FEE,
} from "./protocol-fees.js";
export type { FeeKind } from "./protocol-fees.js";
export { ReentrancyGuard } from "./reentrancy.js";
export { Custody, callCollaborator } from "./custody.js";

// Reference collaborators
export { InMemoryTokenBank } from "./reference/token-bank.js";
export { ConstantProductStrategy } from "./reference/constant-product.js";
export type { ConstantProductOptions } from "./reference/constant-product.js";
export { StaticStrategyDirectory } from "./reference/strategy-directory.js";
export { RoleAuthorizer } from "./reference/role-authorizer.js";

// Types
export { VaultError, VAULT_ACTIONS } from "./types.js";
export type {
  TokenTransfers,
  SwapKind,
  SwapRequest,
  SwapQuote,
  PoolStrategy,
  StrategyDirectory,
  FlashLoanReceiver,
  VaultAction,
  Authorizer,
  AddLiquidityRequest,
  RemoveLiquidityRequest,
  SwapStep,
  FundManagement,
  BatchSwapRequest,
  QueryBatchSwapRequest,
  FlashLoanRequest,
  DepositRequest,
  WithdrawRequest,
  TransferUserBalanceRequest,
  PoolTokens,
  PoolTokenInfo,
  SwapResult,
  BatchSwapResult,
  FlashLoanResult,
  ProtocolFees,
  OperationContext,
  VaultErrorCode,
} from "./types.js";
