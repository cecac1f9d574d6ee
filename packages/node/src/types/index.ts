/**
 * Type barrel — re-exports all public types from @poolvault/node.
 */

// DTOs
export {
  AddressSchema,
  PoolIdSchema,
  AmountSchema,
  SignedAmountSchema,
  TokenListSchema,
  PaginationQuerySchema,
  CreatePoolSchema,
  AddLiquiditySchema,
  RemoveLiquiditySchema,
  SetManagerSchema,
  InvestmentAmountSchema,
  UpdateInvestedSchema,
  DepositSchema,
  WithdrawSchema,
  TransferUserBalanceSchema,
  AgentSchema,
  ManagerSchema,
  QueryBatchSwapSchema,
  BatchSwapSchema,
  FeeKindSchema,
  SetFeeSchema,
  WithdrawFeesSchema,
  MintSchema,
  ApproveSchema,
  ListEventsQuerySchema,
  toPoolView,
  toPoolTokensView,
  toPoolTokenInfoView,
  toBatchSwapView,
  toFeesView,
  toTokenAmounts,
  toEventView,
} from "./dto.js";
export type {
  CreatePoolDto,
  AddLiquidityDto,
  RemoveLiquidityDto,
  QueryBatchSwapDto,
  BatchSwapDto,
  ListEventsQuery,
  PoolView,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
