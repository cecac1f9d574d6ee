/**
 * Tests for the event log hash chain.
 */

import { describe, it, expect } from "vitest";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import { InMemoryEventLog } from "../src/in-memory-log.js";
import type { ChainedContent, StoredEvent } from "../src/types.js";
import { fixedClock, makeEvent } from "./helpers.js";

function content(payload: Record<string, unknown> = {}): ChainedContent {
  return {
    event: makeEvent("pool.registered", payload),
    position: 1,
    appendedAt: "2025-01-01T00:00:00.000Z",
  };
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(content(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    const c = content({ x: "1" });
    expect(computeEventHash(c, GENESIS_HASH)).toBe(computeEventHash(c, GENESIS_HASH));
  });

  it("ignores key order in the payload", () => {
    const base = content();
    const a = { ...base, event: { ...base.event, payload: { a: "1", b: "2" } } };
    const b = { ...base, event: { ...base.event, payload: { b: "2", a: "1" } } };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when event content changes", () => {
    const base = content();
    const modified = { ...base, event: { ...base.event, payload: { tampered: true } } };
    expect(computeEventHash(base, GENESIS_HASH)).not.toBe(computeEventHash(modified, GENESIS_HASH));
  });

  it("changes when previousHash changes", () => {
    const c = content();
    expect(computeEventHash(c, GENESIS_HASH)).not.toBe(computeEventHash(c, "a".repeat(64)));
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  function buildLog(count: number): readonly StoredEvent[] {
    const log = new InMemoryEventLog({ clock: fixedClock });
    for (let i = 0; i < count; i++) {
      log.append([makeEvent("pool.registered", { index: i })]);
    }
    return log.read();
  }

  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts an untouched chain", () => {
    const result = verifyHashChain(buildLog(5));
    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(5);
  });

  it("detects a modified payload", () => {
    const [first, ...rest] = buildLog(3);
    if (first === undefined) throw new Error("empty log");
    const tampered: StoredEvent = {
      ...first,
      event: { ...first.event, payload: { index: 99 } },
    };

    const result = verifyHashChain([tampered, ...rest]);

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.position).toBe(1);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 1/);
  });

  it("detects a removed event", () => {
    const events = buildLog(3);
    const result = verifyHashChain(events.filter((e) => e.position !== 2));

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([3, 3]);
    expect(result.errors[0]?.reason).toBe("Position gap: expected 2, got 3");
  });

  it("detects a rehashed event whose successor still links to the old hash", () => {
    const [first, second] = buildLog(2);
    if (first === undefined || second === undefined) throw new Error("short log");
    const edited = { ...first, event: { ...first.event, payload: { index: 42 } } };
    const rehashed: StoredEvent = { ...edited, hash: computeEventHash(edited, GENESIS_HASH) };

    const result = verifyHashChain([rehashed, second]);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.position).toBe(2);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 2/);
  });
});
