/**
 * Runtime type guard tests for @poolvault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isAmountString,
  isFixedPointString,
  isStrategyType,
  isPoolId,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
  isErrorCategory,
} from "../src/guards.js";
import { ZERO_ADDRESS } from "../src/primitives.js";

const ALICE = "0x00000000000000000000000000000000000a11ce";

// =============================================================================
// Primitive guards
// =============================================================================

describe("isAddress", () => {
  it("accepts a 20-byte hex address", () => {
    expect(isAddress(ALICE)).toBe(true);
  });

  it("accepts the zero address", () => {
    expect(isAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("accepts mixed case", () => {
    expect(isAddress("0xABCDEF0123456789abcdef0123456789ABCDEF01")).toBe(true);
  });

  it("rejects missing prefix", () => {
    expect(isAddress("00000000000000000000000000000000000a11ce")).toBe(false);
  });

  it("rejects wrong length", () => {
    expect(isAddress("0x1234")).toBe(false);
    expect(isAddress(`${ALICE}00`)).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(null)).toBe(false);
    expect(isAddress(42)).toBe(false);
    expect(isAddress(undefined)).toBe(false);
  });
});

describe("isAmountString", () => {
  it("accepts zero and positive integers", () => {
    expect(isAmountString("0")).toBe(true);
    expect(isAmountString("1000000")).toBe(true);
  });

  it("rejects leading zeros, signs, and decimals", () => {
    expect(isAmountString("007")).toBe(false);
    expect(isAmountString("-1")).toBe(false);
    expect(isAmountString("1.5")).toBe(false);
    expect(isAmountString("")).toBe(false);
  });

  it("rejects numbers (must be string)", () => {
    expect(isAmountString(100)).toBe(false);
  });

  it("fixed-point strings follow the same rule", () => {
    expect(isFixedPointString("5000000000000000")).toBe(true);
    expect(isFixedPointString("0.5")).toBe(false);
  });
});

// =============================================================================
// Pool guards
// =============================================================================

describe("isStrategyType", () => {
  it("accepts tuple and pair", () => {
    expect(isStrategyType("tuple")).toBe(true);
    expect(isStrategyType("pair")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isStrategyType("weighted")).toBe(false);
    expect(isStrategyType(0)).toBe(false);
  });
});

describe("isPoolId", () => {
  it("accepts a 32-byte hex word", () => {
    expect(isPoolId(`0x${"0".repeat(24)}${ALICE.slice(2)}`)).toBe(true);
  });

  it("rejects an address-length value", () => {
    expect(isPoolId(ALICE)).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isPoolId(`0x${"g".repeat(64)}`)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const validMetadata = {
  eventId: "evt-1",
  timestamp: "2025-01-01T00:00:00.000Z",
  actor: ALICE,
  blockNumber: 3,
  correlationId: "op-3",
  source: "registry",
};

describe("isEventSource", () => {
  it("accepts every subsystem", () => {
    for (const source of ["registry", "settlement", "users", "fees", "flash-loans"]) {
      expect(isEventSource(source)).toBe(true);
    }
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("treasury")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(validMetadata)).toBe(true);
  });

  it("rejects a fractional block number", () => {
    expect(isEventMetadata({ ...validMetadata, blockNumber: 1.5 })).toBe(false);
  });

  it("rejects a missing correlation id", () => {
    const { correlationId: _omit, ...rest } = validMetadata;
    expect(isEventMetadata(rest)).toBe(false);
  });

  it("rejects null", () => {
    expect(isEventMetadata(null)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "pool.registered", metadata: validMetadata, payload: { poolId: "0x" } }),
    ).toBe(true);
  });

  it("rejects an empty type", () => {
    expect(isDomainEvent({ type: "", metadata: validMetadata, payload: {} })).toBe(false);
  });

  it("rejects an array payload", () => {
    expect(isDomainEvent({ type: "x", metadata: validMetadata, payload: [] })).toBe(false);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "x", metadata: validMetadata, payload: null })).toBe(false);
  });
});

// =============================================================================
// Error guards
// =============================================================================

describe("isErrorCategory", () => {
  it("accepts taxonomy members", () => {
    expect(isErrorCategory("InsufficientFunds")).toBe(true);
    expect(isErrorCategory("ReentrancyBlocked")).toBe(true);
  });

  it("rejects codes that are not categories", () => {
    expect(isErrorCategory("INSUFFICIENT_CASH")).toBe(false);
  });
});
