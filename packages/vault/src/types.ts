/**
 * Vault Types
 *
 * Domain types for the multi-pool vault.
 * The vault coordinates four subsystems over shared ledgers:
 *
 * 1. Registry — pools, liquidity, investment managers
 * 2. Settlement — batched swaps with net settlement
 * 3. Flash loans — uncollateralized same-operation loans
 * 4. Protocol fees — fee percentages and collected fees
 *
 * Rules:
 * - Amounts are bigint in base units (never floats)
 * - Every mutating call names the account performing it (the caller)
 * - Token movement goes through the TokenTransfers collaborator only
 */

import type {
  Address,
  ErrorCategory,
  PoolId,
  TokenAddress,
} from "@poolvault/types";
import type { VaultEventPayloads, VaultEventType } from "@poolvault/event-store";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Physical token custody.
 *
 * `pull` moves tokens from an account into the vault, `push` moves them
 * out. Withdrawal fees are deducted by the vault before `push`, which
 * always receives the net amount. The collaborator is transactional: the
 * vault opens a transaction per operation and commits or rolls it back
 * together with its own ledgers.
 */
export interface TokenTransfers {
  pull(token: TokenAddress, from: Address, amount: bigint): void;
  push(token: TokenAddress, to: Address, amount: bigint): void;
  balanceOf(token: TokenAddress, account: Address): bigint;
  begin(): void;
  commit(): void;
  rollback(): void;
}

export type SwapKind = "givenIn" | "givenOut";

/**
 * What a pool's strategy is asked to price.
 *
 * For givenIn, `amount` is what the pool receives after the protocol fee
 * and the strategy returns the amount out. For givenOut, `amount` is the
 * amount out and the strategy returns what the pool must receive.
 */
export interface SwapRequest {
  readonly kind: SwapKind;
  readonly poolId: PoolId;
  readonly tokenIn: TokenAddress;
  readonly tokenOut: TokenAddress;
  readonly amount: bigint;
  /** Pool total (cash + managed) of tokenIn */
  readonly balanceIn: bigint;
  /** Pool total (cash + managed) of tokenOut */
  readonly balanceOut: bigint;
  readonly from: Address;
  readonly to: Address;
  readonly userData: string;
}

export interface SwapQuote {
  readonly amount: bigint;
  /** false when the trade would take the pool outside its own limits */
  readonly withinBounds: boolean;
}

/**
 * Swap math of a pool. Implemented by the pool's controller.
 */
export interface PoolStrategy {
  onSwap(request: SwapRequest): SwapQuote;
}

/**
 * Finds the strategy a controller implements.
 */
export interface StrategyDirectory {
  resolve(controller: Address): PoolStrategy | undefined;
}

/**
 * Borrower side of a flash loan. `receiveFlashLoan` runs while the vault
 * operation is open and must return amount + fee of each token to the
 * vault before it returns.
 */
export interface FlashLoanReceiver {
  readonly address: Address;
  receiveFlashLoan(
    tokens: readonly TokenAddress[],
    amounts: readonly bigint[],
    feeAmounts: readonly bigint[],
    data: string,
  ): void;
}

export type VaultAction =
  | "setSwapFee"
  | "setFlashLoanFee"
  | "setWithdrawFee"
  | "withdrawCollectedFees"
  | "manageUniversalAgents";

export const VAULT_ACTIONS: readonly VaultAction[] = [
  "setSwapFee",
  "setFlashLoanFee",
  "setWithdrawFee",
  "withdrawCollectedFees",
  "manageUniversalAgents",
];

/**
 * Answers whether an account may perform an administrative action.
 */
export interface Authorizer {
  canPerform(action: VaultAction, account: Address): boolean;
}

// =============================================================================
// Requests
// =============================================================================

export interface AddLiquidityRequest {
  readonly poolId: PoolId;
  /** Account whose funds are added */
  readonly from: Address;
  readonly tokens: readonly TokenAddress[];
  readonly amounts: readonly bigint[];
  /** Draw from `from`'s user balance before pulling */
  readonly useUserBalance: boolean;
}

export interface RemoveLiquidityRequest {
  readonly poolId: PoolId;
  readonly to: Address;
  readonly tokens: readonly TokenAddress[];
  readonly amounts: readonly bigint[];
  /** Credit `to`'s user balance instead of pushing tokens out */
  readonly depositToUserBalance: boolean;
}

export interface SwapStep {
  readonly poolId: PoolId;
  readonly assetInIndex: number;
  readonly assetOutIndex: number;
  /** 0 after the first step: use the previous step's computed amount */
  readonly amount: bigint;
  readonly userData?: string;
}

export interface FundManagement {
  readonly sender: Address;
  /** Take positive deltas from the sender's user balance first */
  readonly fromUserBalance: boolean;
  readonly recipient: Address;
  /** Credit negative deltas to the recipient's user balance */
  readonly toUserBalance: boolean;
}

export interface BatchSwapRequest {
  readonly kind: SwapKind;
  readonly steps: readonly SwapStep[];
  readonly assets: readonly TokenAddress[];
  readonly funds: FundManagement;
  /** Per asset, the largest delta accepted (negative: at least that much out) */
  readonly limits?: readonly bigint[];
}

export type QueryBatchSwapRequest = Pick<BatchSwapRequest, "kind" | "steps" | "assets">;

export interface FlashLoanRequest {
  readonly receiver: FlashLoanReceiver;
  readonly tokens: readonly TokenAddress[];
  readonly amounts: readonly bigint[];
  readonly data?: string;
}

export interface DepositRequest {
  readonly user: Address;
  readonly token: TokenAddress;
  readonly amount: bigint;
}

export interface WithdrawRequest extends DepositRequest {
  readonly recipient: Address;
}

export interface TransferUserBalanceRequest {
  readonly from: Address;
  readonly to: Address;
  readonly token: TokenAddress;
  readonly amount: bigint;
}

// =============================================================================
// Results
// =============================================================================

export interface PoolTokens {
  readonly tokens: readonly TokenAddress[];
  /** Totals (cash + managed), in token order */
  readonly balances: readonly bigint[];
  /** Latest lastChangeBlock across the pool's tokens */
  readonly maxBlockNumber: number;
}

export interface PoolTokenInfo {
  readonly cash: bigint;
  readonly managed: bigint;
  readonly lastChangeBlock: number;
  readonly manager: Address | undefined;
}

export interface SwapResult {
  readonly poolId: PoolId;
  readonly tokenIn: TokenAddress;
  readonly tokenOut: TokenAddress;
  /** Paid by the trader, fee included */
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  /** Protocol swap fee, in tokenIn */
  readonly fee: bigint;
}

export interface BatchSwapResult {
  /** Per asset: positive flows into the vault, negative flows out */
  readonly deltas: readonly bigint[];
  readonly swaps: readonly SwapResult[];
}

export interface FlashLoanResult {
  readonly feeAmounts: readonly bigint[];
  /** What came back above the pre-loan balance, per token */
  readonly collected: readonly bigint[];
}

export interface ProtocolFees {
  readonly swapFee: bigint;
  readonly flashLoanFee: bigint;
  readonly withdrawFee: bigint;
}

// =============================================================================
// Operation Context
// =============================================================================

/**
 * Handed to every subsystem for the duration of one vault operation.
 */
export interface OperationContext {
  readonly caller: Address;
  /** Vault block number of this operation */
  readonly block: number;
  readonly correlationId: string;
  /** Buffer an event; it reaches the log only if the operation commits. */
  emit<T extends VaultEventType>(type: T, payload: VaultEventPayloads[T]): void;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  // Registry
  | "POOL_NOT_FOUND"
  | "LENGTH_MISMATCH"
  | "CALLER_NOT_CONTROLLER"
  | "SENDER_NOT_AGENT"
  | "INVALID_CONTROLLER"
  | "INVALID_MANAGER"
  | "DUPLICATE_POOL_ID"
  | "MANAGED_BALANCE_NOT_ZERO"
  | "MANAGER_NOT_SET"
  | "CALLER_NOT_MANAGER"
  // Settlement
  | "TOKEN_NOT_IN_POOL"
  | "SWAP_REJECTED_BY_POOL"
  | "INSUFFICIENT_POOL_LIQUIDITY"
  | "CANNOT_SWAP_SAME_TOKEN"
  | "INDEX_OUT_OF_RANGE"
  | "DUPLICATE_ASSET"
  | "UNKNOWN_AMOUNT_IN_FIRST_SWAP"
  | "MALFORMED_SWAP_CHAIN"
  | "SWAP_LIMIT_EXCEEDED"
  // Flash loans
  | "FLASH_LOAN_NOT_REPAID"
  | "INSUFFICIENT_FLASH_LOAN_BALANCE"
  | "FLASH_LOAN_RECEIVER_FAILED"
  // Fees and administration
  | "FEE_TOO_HIGH"
  | "INSUFFICIENT_COLLECTED_FEES"
  | "SENDER_NOT_ALLOWED"
  | "CALLER_NOT_UNIVERSAL_AGENT_MANAGER"
  // Custody
  | "INSUFFICIENT_TOKEN_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "TOKEN_TRANSFER_FAILED"
  | "TRANSACTION_STATE"
  // Execution
  | "REENTRANCY_BLOCKED"
  | "UNCATALOGED_EVENT";

const CATEGORY_BY_CODE: Readonly<Record<VaultErrorCode, ErrorCategory>> = {
  POOL_NOT_FOUND: "NotFound",
  LENGTH_MISMATCH: "InvalidInput",
  CALLER_NOT_CONTROLLER: "Unauthorized",
  SENDER_NOT_AGENT: "Unauthorized",
  INVALID_CONTROLLER: "InvalidInput",
  INVALID_MANAGER: "InvalidInput",
  DUPLICATE_POOL_ID: "InvariantViolation",
  MANAGED_BALANCE_NOT_ZERO: "InvariantViolation",
  MANAGER_NOT_SET: "NotFound",
  CALLER_NOT_MANAGER: "Unauthorized",
  TOKEN_NOT_IN_POOL: "InvalidInput",
  SWAP_REJECTED_BY_POOL: "ExternalCallFailed",
  INSUFFICIENT_POOL_LIQUIDITY: "InsufficientFunds",
  CANNOT_SWAP_SAME_TOKEN: "InvalidInput",
  INDEX_OUT_OF_RANGE: "InvalidInput",
  DUPLICATE_ASSET: "InvalidInput",
  UNKNOWN_AMOUNT_IN_FIRST_SWAP: "InvalidInput",
  MALFORMED_SWAP_CHAIN: "InvalidInput",
  SWAP_LIMIT_EXCEEDED: "InvalidInput",
  FLASH_LOAN_NOT_REPAID: "ExternalCallFailed",
  INSUFFICIENT_FLASH_LOAN_BALANCE: "InsufficientFunds",
  FLASH_LOAN_RECEIVER_FAILED: "ExternalCallFailed",
  FEE_TOO_HIGH: "InvariantViolation",
  INSUFFICIENT_COLLECTED_FEES: "InsufficientFunds",
  SENDER_NOT_ALLOWED: "Unauthorized",
  CALLER_NOT_UNIVERSAL_AGENT_MANAGER: "Unauthorized",
  INSUFFICIENT_TOKEN_BALANCE: "InsufficientFunds",
  INSUFFICIENT_ALLOWANCE: "InsufficientFunds",
  TOKEN_TRANSFER_FAILED: "ExternalCallFailed",
  TRANSACTION_STATE: "InvariantViolation",
  REENTRANCY_BLOCKED: "ReentrancyBlocked",
  UNCATALOGED_EVENT: "InvariantViolation",
};

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
  }
}
