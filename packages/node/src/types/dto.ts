/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts travel as decimal integer strings and become bigint once
 * parsed. Responses turn every bigint back into a string.
 */

import { z } from "zod";
import type { PoolRecord, TokenAddress } from "@poolvault/types";
import type { StoredEvent } from "@poolvault/event-store";
import type {
  BatchSwapResult,
  PoolTokenInfo,
  PoolTokens,
  ProtocolFees,
  SwapResult,
} from "@poolvault/vault";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "Expected 0x followed by 40 hex digits")
  .transform((v) => v.toLowerCase());

export const PoolIdSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, "Expected 0x followed by 64 hex digits")
  .transform((v) => v.toLowerCase());

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal integer string")
  .transform((v) => BigInt(v));

/** Swap limits may be negative: at least that much must come out. */
export const SignedAmountSchema = z
  .string()
  .regex(/^-?\d+$/, "Expected a signed decimal integer string")
  .transform((v) => BigInt(v));

/** Comma-separated token list in a query string. */
export const TokenListSchema = z
  .string()
  .transform((v) => v.split(",").map((t) => t.trim()))
  .pipe(z.array(AddressSchema).min(1));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Pool DTOs
// =============================================================================

export const CreatePoolSchema = z.object({
  controller: AddressSchema,
  strategy: z.enum(["tuple", "pair"]),
});

export type CreatePoolDto = z.infer<typeof CreatePoolSchema>;

export const AddLiquiditySchema = z.object({
  from: AddressSchema,
  tokens: z.array(AddressSchema).min(1),
  amounts: z.array(AmountSchema).min(1),
  useUserBalance: z.boolean().default(false),
});

export type AddLiquidityDto = z.infer<typeof AddLiquiditySchema>;

export const RemoveLiquiditySchema = z.object({
  to: AddressSchema,
  tokens: z.array(AddressSchema).min(1),
  amounts: z.array(AmountSchema).min(1),
  depositToUserBalance: z.boolean().default(false),
});

export type RemoveLiquidityDto = z.infer<typeof RemoveLiquiditySchema>;

export const SetManagerSchema = z.object({
  manager: AddressSchema,
});

export const InvestmentAmountSchema = z.object({
  amount: AmountSchema,
});

export const UpdateInvestedSchema = z.object({
  managed: AmountSchema,
});

// =============================================================================
// User DTOs
// =============================================================================

export const DepositSchema = z.object({
  token: AddressSchema,
  amount: AmountSchema,
});

export const WithdrawSchema = DepositSchema.extend({
  /** Default: the user */
  recipient: AddressSchema.optional(),
});

export const TransferUserBalanceSchema = DepositSchema.extend({
  to: AddressSchema,
});

export const AgentSchema = z.object({
  agent: AddressSchema,
});

export const ManagerSchema = z.object({
  manager: AddressSchema,
});

// =============================================================================
// Swap DTOs
// =============================================================================

const SwapStepSchema = z.object({
  poolId: PoolIdSchema,
  assetInIndex: z.number().int().min(0),
  assetOutIndex: z.number().int().min(0),
  amount: AmountSchema,
  userData: z.string().optional(),
});

export const QueryBatchSwapSchema = z.object({
  kind: z.enum(["givenIn", "givenOut"]),
  steps: z.array(SwapStepSchema).min(1),
  assets: z.array(AddressSchema).min(1),
});

export type QueryBatchSwapDto = z.infer<typeof QueryBatchSwapSchema>;

export const BatchSwapSchema = QueryBatchSwapSchema.extend({
  funds: z.object({
    sender: AddressSchema,
    fromUserBalance: z.boolean().default(false),
    recipient: AddressSchema,
    toUserBalance: z.boolean().default(false),
  }),
  limits: z.array(SignedAmountSchema).optional(),
});

export type BatchSwapDto = z.infer<typeof BatchSwapSchema>;

// =============================================================================
// Fee and Token DTOs
// =============================================================================

export const FeeKindSchema = z.enum(["swap", "flash-loan", "withdraw"]);

export const SetFeeSchema = z.object({
  /** 18-decimal fixed point: "1000000000000000" is 0.1% */
  fee: AmountSchema,
});

export const WithdrawFeesSchema = z.object({
  tokens: z.array(AddressSchema).min(1),
  amounts: z.array(AmountSchema).min(1),
  recipient: AddressSchema,
});

export const MintSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export const ApproveSchema = z.object({
  amount: AmountSchema,
});

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  type: z.string().optional(),
  poolId: PoolIdSchema.optional(),
  correlationId: z.string().optional(),
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Response Mapping
// =============================================================================

export interface PoolView {
  readonly id: string;
  readonly controller: string;
  readonly strategy: string;
  readonly index: number;
  readonly registeredAtBlock: number;
}

export function toPoolView(pool: PoolRecord): PoolView {
  return {
    id: pool.id,
    controller: pool.controller,
    strategy: pool.strategy,
    index: pool.index,
    registeredAtBlock: pool.registeredAtBlock,
  };
}

export function toPoolTokensView(tokens: PoolTokens) {
  return {
    tokens: tokens.tokens,
    balances: tokens.balances.map(String),
    maxBlockNumber: tokens.maxBlockNumber,
  };
}

export function toPoolTokenInfoView(token: TokenAddress, info: PoolTokenInfo) {
  return {
    token,
    cash: info.cash.toString(),
    managed: info.managed.toString(),
    lastChangeBlock: info.lastChangeBlock,
    manager: info.manager ?? null,
  };
}

function toSwapView(swap: SwapResult) {
  return {
    poolId: swap.poolId,
    tokenIn: swap.tokenIn,
    tokenOut: swap.tokenOut,
    amountIn: swap.amountIn.toString(),
    amountOut: swap.amountOut.toString(),
    fee: swap.fee.toString(),
  };
}

export function toBatchSwapView(result: BatchSwapResult) {
  return {
    deltas: result.deltas.map(String),
    swaps: result.swaps.map(toSwapView),
  };
}

export function toFeesView(fees: ProtocolFees) {
  return {
    swapFee: fees.swapFee.toString(),
    flashLoanFee: fees.flashLoanFee.toString(),
    withdrawFee: fees.withdrawFee.toString(),
  };
}

export function toTokenAmounts(tokens: readonly TokenAddress[], amounts: readonly bigint[]) {
  return tokens.map((token, i) => ({ token, amount: (amounts[i] ?? 0n).toString() }));
}

export function toEventView(stored: StoredEvent) {
  return {
    position: stored.position,
    type: stored.event.type,
    metadata: stored.event.metadata,
    payload: stored.event.payload,
    appendedAt: stored.appendedAt,
    hash: stored.hash,
    previousHash: stored.previousHash,
  };
}
