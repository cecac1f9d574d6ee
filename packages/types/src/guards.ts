/**
 * Runtime Type Guards
 *
 * Narrowing functions for vault domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized events, collaborator results).
 */

import type { Address, AmountString, FixedPointString } from "./primitives.js";
import type { PoolId, StrategyType } from "./pool.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { ErrorCategory } from "./errors.js";
import { ERROR_CATEGORIES } from "./errors.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const POOL_ID_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const UINT_PATTERN = /^(0|[1-9]\d*)$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isAmountString(value: unknown): value is AmountString {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

export function isFixedPointString(value: unknown): value is FixedPointString {
  return isAmountString(value);
}

// =============================================================================
// Pool guards
// =============================================================================

const STRATEGY_TYPES = new Set<string>(["tuple", "pair"]);

export function isStrategyType(value: unknown): value is StrategyType {
  return typeof value === "string" && STRATEGY_TYPES.has(value);
}

/**
 * Shape check only. Reserved bits and strategy codes are checked by
 * decodePoolId in @poolvault/ledger.
 */
export function isPoolId(value: unknown): value is PoolId {
  return typeof value === "string" && POOL_ID_PATTERN.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "registry", "settlement", "users", "fees", "flash-loans",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.blockNumber === "number" &&
    Number.isInteger(v.blockNumber) &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}

// =============================================================================
// Error guards
// =============================================================================

const CATEGORY_SET = new Set<string>(ERROR_CATEGORIES);

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === "string" && CATEGORY_SET.has(value);
}
