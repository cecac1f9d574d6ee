/**
 * @poolvault/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only vault event log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - The log is append-only (no UPDATE, no DELETE)
 * - Every event has a strictly increasing position
 * - Every event is hash-chained to its predecessor
 * - Subscriptions enable reactive consumers
 */

import type { DomainEvent, ErrorCategory, EventSource } from "@poolvault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the log.
 *
 * Wraps a DomainEvent with log-level metadata:
 * - position: 1-based, strictly increasing across the log
 * - hash / previousHash: the tamper-evident chain
 */
export interface StoredEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Position in the log (1-based, strictly increasing) */
  readonly position: number;

  /** When this event was persisted (log-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this event chained to its predecessor */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH for position 1 */
  readonly previousHash: string;
}

/**
 * The fields of a StoredEvent that are covered by its hash.
 */
export type ChainedContent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * Result of an append operation.
 */
export interface AppendResult {
  /** Position of the first event appended */
  readonly fromPosition: number;

  /** Position of the last event appended (current head) */
  readonly toPosition: number;

  /** Number of events appended */
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

/**
 * Filter for reading events. Every given field must match.
 */
export interface EventQuery {
  /** Exact event type ("swap.executed") */
  readonly type?: string;

  /** Emitting subsystem */
  readonly source?: EventSource;

  /** Events whose payload names this pool */
  readonly poolId?: string;

  /** Events of one vault operation */
  readonly correlationId?: string;

  /** Start from this position (inclusive). Default: 1 forward, head backward */
  readonly fromPosition?: number;

  /** Maximum number of events to return. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions. Called synchronously on append.
 */
export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives what a subscriber threw. The event it was handling is
 * already committed to the log.
 */
export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

/** A subscriber exception kept by the log. */
export interface SubscriberFailure {
  readonly position: number;
  readonly error: unknown;
}

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventLogIntegrityResult {
  readonly valid: boolean;
  /** Position of the last event whose hash was checked */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Log Interface
// =============================================================================

/**
 * Append-only, hash-chained event log.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Positions are contiguous (1, 2, 3, ...) with no gaps
 * - event[n].previousHash = event[n-1].hash
 * - Subscribers see events in position order
 */
export interface EventLog {
  /**
   * Append events in order. All or nothing: if any event is rejected,
   * none is stored.
   *
   * @throws EventStoreError for an empty batch or a payload the catalog rejects
   */
  append(events: readonly DomainEvent[]): AppendResult;

  read(query?: EventQuery): readonly StoredEvent[];

  /** The event at a position, if any. */
  get(position: number): StoredEvent | undefined;

  subscribe(handler: EventHandler): Subscription;

  /** Position of the last event, or 0 if the log is empty. */
  position(): number;

  /** Hash of the last event, or GENESIS_HASH if the log is empty. */
  headHash(): string;

  verifyIntegrity(): EventLogIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "EMPTY_APPEND"
  | "INVALID_POSITION"
  | "UNKNOWN_EVENT_TYPE"
  | "INVALID_EVENT_PAYLOAD"
  | "CATALOG_CONFLICT";

const CATEGORY_BY_CODE: Readonly<Record<EventStoreErrorCode, ErrorCategory>> = {
  EMPTY_APPEND: "InvalidInput",
  INVALID_POSITION: "InvalidInput",
  UNKNOWN_EVENT_TYPE: "InvalidInput",
  INVALID_EVENT_PAYLOAD: "InvalidInput",
  CATALOG_CONFLICT: "InvariantViolation",
};

/**
 * Error thrown by event log and catalog operations.
 */
export class EventStoreError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "EventStoreError";
    this.category = CATEGORY_BY_CODE[code];
  }
}
