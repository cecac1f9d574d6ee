/**
 * @poolvault/event-store — Event Catalog.
 *
 * Formalizes every vault event into one catalog with:
 * - The event type string and the subsystem that emits it
 * - The payload keys every event of that type carries
 * - Runtime payload validation
 *
 * Unknown event types are reported, never guessed.
 */

import type { EventSource } from "@poolvault/types";
import { EventStoreError } from "./types.js";

// =============================================================================
// Event Schema Definition
// =============================================================================

/**
 * Kind of value a payload key must hold.
 *
 * - string: any string (addresses, pool ids, decimal amounts)
 * - strings: array of strings
 * - number / boolean: primitive of that type
 */
export type PayloadFieldKind = "string" | "strings" | "number" | "boolean";

export interface EventSchema {
  /** Event type string (e.g., "swap.executed") */
  readonly type: string;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** Keys every payload of this type must carry, with the kind of each */
  readonly fields: Readonly<Record<string, PayloadFieldKind>>;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Registry of all vault event types.
 *
 * The catalog serves as:
 * 1. Documentation: what events exist in the system
 * 2. Validation: runtime payload checking before append
 * 3. Discovery: listing event types by source
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering an identical schema is a
   * no-op; a different schema under the same type is CATALOG_CONFLICT.
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined) {
      if (sameSchema(existing, schema)) {
        return;
      }
      throw new EventStoreError(
        "CATALOG_CONFLICT",
        `Event type "${schema.type}" is already registered with a different schema`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /**
   * All registered event types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Check a payload against its registered schema.
   *
   * @returns false if the type is unregistered or a field is missing or mistyped
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined || !isRecord(payload)) {
      return false;
    }
    return Object.entries(schema.fields).every(([key, kind]) => hasKind(payload[key], kind));
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasKind(value: unknown, kind: PayloadFieldKind): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "strings":
      return Array.isArray(value) && value.every((v) => typeof v === "string");
    case "number":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
  }
}

function sameSchema(a: EventSchema, b: EventSchema): boolean {
  const aKeys = Object.keys(a.fields).sort();
  const bKeys = Object.keys(b.fields).sort();
  return (
    a.source === b.source &&
    aKeys.length === bKeys.length &&
    aKeys.every((key, i) => key === bKeys[i] && a.fields[key] === b.fields[key])
  );
}
