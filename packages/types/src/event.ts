/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed vault operation is captured as one or more DomainEvents.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payloads are JSON-safe (amounts as decimal strings)
 * - Events of a failed operation are never recorded
 */

/**
 * Which vault subsystem emitted an event.
 */
export type EventSource =
  | "registry"
  | "settlement"
  | "users"
  | "fees"
  | "flash-loans";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Account that invoked the operation */
  readonly actor: string;

  /** Vault block number of the operation */
  readonly blockNumber: number;

  /** Shared by every event of one operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "pool.registered", "swap.executed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload */
  readonly payload: Readonly<Record<string, unknown>>;
}
