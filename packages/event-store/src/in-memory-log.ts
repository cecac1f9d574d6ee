/**
 * @poolvault/event-store — In-memory EventLog implementation.
 *
 * Stores events in a plain array. Suitable for:
 * - Unit and integration tests
 * - The sandbox HTTP service and the demo
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) filtered read
 * - Synchronous subscription dispatch; a throwing subscriber never
 *   fails the append
 * - Stored records are frozen copies
 * - No durability guarantees
 */

import type { DomainEvent } from "@poolvault/types";
import type { EventCatalog } from "./catalog.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  AppendResult,
  EventHandler,
  EventLog,
  EventLogIntegrityResult,
  EventQuery,
  StoredEvent,
  SubscriberErrorHandler,
  SubscriberFailure,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export interface InMemoryEventLogOptions {
  /** When given, every appended event must be a known type with a valid payload. */
  readonly catalog?: EventCatalog;

  /** Source of `appendedAt`. Default: the system clock. */
  readonly clock?: () => Date;

  /** Called for each subscriber exception. Failures are kept either way. */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

export class InMemoryEventLog implements EventLog {
  private readonly _events: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _clock: () => Date;
  private readonly _onSubscriberError: SubscriberErrorHandler | undefined;
  private readonly _subscriberFailures: SubscriberFailure[] = [];

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventLogOptions = {}) {
    this._catalog = options.catalog;
    this._clock = options.clock ?? (() => new Date());
    this._onSubscriberError = options.onSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(events: readonly DomainEvent[]): AppendResult {
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events");
    }

    for (const event of events) {
      this._validate(event);
    }

    const fromPosition = this._events.length + 1;
    const appendedAt = this._clock().toISOString();
    const stored: StoredEvent[] = [];

    for (const [offset, event] of events.entries()) {
      const content = {
        event: deepFreeze({
          type: event.type,
          metadata: structuredClone(event.metadata),
          payload: structuredClone(event.payload),
        }),
        position: fromPosition + offset,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(content, previousHash);
      const record: StoredEvent = Object.freeze({ ...content, hash, previousHash });

      this._lastHash = hash;
      this._events.push(record);
      stored.push(record);
    }

    this._dispatch(stored);

    return {
      fromPosition,
      toPosition: fromPosition + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(query: EventQuery = {}): readonly StoredEvent[] {
    const direction = query.direction ?? "forward";
    const fromPosition = query.fromPosition ?? (direction === "forward" ? 1 : this._events.length);

    if (!Number.isInteger(fromPosition) || fromPosition < 0) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `fromPosition must be a non-negative integer, got ${fromPosition}`,
      );
    }

    let result =
      direction === "forward"
        ? this._events.filter((e) => e.position >= fromPosition)
        : this._events.filter((e) => e.position <= fromPosition).reverse();

    result = result.filter((e) => matches(e, query));

    if (query.maxCount !== undefined && query.maxCount >= 0) {
      result = result.slice(0, query.maxCount);
    }
    return result;
  }

  get(position: number): StoredEvent | undefined {
    return this._events[position - 1];
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  /** Subscriber exceptions seen so far, in dispatch order. */
  subscriberFailures(): readonly SubscriberFailure[] {
    return [...this._subscriberFailures];
  }

  // ─── Query ──────────────────────────────────────────────────────────

  position(): number {
    return this._events.length;
  }

  headHash(): string {
    return this._lastHash;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventLogIntegrityResult {
    return verifyHashChain(this._events);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(stored: readonly StoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const record of stored) {
        try {
          handler(record);
        } catch (error: unknown) {
          this._subscriberFailures.push({ position: record.position, error });
          this._onSubscriberError?.(error, record);
        }
      }
    }
  }

  private _validate(event: DomainEvent): void {
    if (this._catalog === undefined) {
      return;
    }
    if (!this._catalog.has(event.type)) {
      throw new EventStoreError("UNKNOWN_EVENT_TYPE", `Unknown event type "${event.type}"`);
    }
    if (!this._catalog.validate(event.type, event.payload)) {
      throw new EventStoreError(
        "INVALID_EVENT_PAYLOAD",
        `Payload of "${event.type}" does not match its schema`,
      );
    }
  }
}

function matches(stored: StoredEvent, query: EventQuery): boolean {
  const { event } = stored;
  if (query.type !== undefined && event.type !== query.type) {
    return false;
  }
  if (query.source !== undefined && event.metadata.source !== query.source) {
    return false;
  }
  if (query.correlationId !== undefined && event.metadata.correlationId !== query.correlationId) {
    return false;
  }
  if (query.poolId !== undefined && event.payload["poolId"] !== query.poolId.toLowerCase()) {
    return false;
  }
  return true;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
