/**
 * @poolvault/types — Shared domain types for the pool vault stack.
 *
 * These types are used across all packages:
 * - Address and amount primitives
 * - Pool identity (strategy type, pool id, pool record)
 * - Event architecture
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Primitive types
export type {
  Address,
  TokenAddress,
  AmountString,
  FixedPointString,
} from "./primitives.js";
export { ZERO_ADDRESS } from "./primitives.js";

// Pool types
export type {
  StrategyType,
  PoolId,
  PoolIdentity,
  PoolKey,
  PoolRecord,
} from "./pool.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Error taxonomy
export type { ErrorCategory } from "./errors.js";
export { ERROR_CATEGORIES } from "./errors.js";

// Runtime type guards
export {
  isAddress,
  isAmountString,
  isFixedPointString,
  isStrategyType,
  isPoolId,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
  isErrorCategory,
} from "./guards.js";
