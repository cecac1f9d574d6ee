/**
 * Tests for PoolId encoding.
 *
 * Covers:
 * - Bit layout of encoded ids
 * - decode / unpack inverses
 * - Rejection of malformed ids, reserved bits, unknown codes
 * - Index range checks
 */

import { describe, it, expect } from "vitest";
import {
  decodePoolId,
  encodePoolId,
  MAX_POOL_INDEX,
  normalizePoolId,
  poolIndexOf,
  unpackPoolId,
} from "../src/pool-id.js";
import { LedgerError } from "../src/types.js";
import { ALICE, BOB, thrown } from "./fixtures.js";

const ALICE_HEX = ALICE.slice(2);

describe("encodePoolId", () => {
  it("places the controller in the low 160 bits", () => {
    const id = encodePoolId({ controller: ALICE, strategy: "tuple", index: 0 });
    expect(id).toBe(`0x${"0".repeat(24)}${ALICE_HEX}`);
  });

  it("places strategy code and index above the controller", () => {
    const id = encodePoolId({ controller: ALICE, strategy: "pair", index: 5 });
    expect(id).toBe(`0x${"0".repeat(12)}00000005` + `0001${ALICE_HEX}`);
  });

  it("lowercases the controller", () => {
    const upper = "0x00000000000000000000000000000000000A11CE";
    expect(encodePoolId({ controller: upper, strategy: "tuple", index: 1 })).toBe(
      encodePoolId({ controller: ALICE, strategy: "tuple", index: 1 }),
    );
  });

  it("accepts the largest index", () => {
    const id = encodePoolId({ controller: ALICE, strategy: "tuple", index: MAX_POOL_INDEX });
    expect(id.slice(2, 22)).toBe(`${"0".repeat(12)}ffffffff`);
    expect(poolIndexOf(id)).toBe(MAX_POOL_INDEX);
  });

  it("rejects an index beyond 32 bits", () => {
    expect(() =>
      encodePoolId({ controller: ALICE, strategy: "tuple", index: MAX_POOL_INDEX + 1 }),
    ).toThrow(/Pool index/);
  });

  it("rejects negative and fractional indexes", () => {
    expect(() => encodePoolId({ controller: ALICE, strategy: "tuple", index: -1 })).toThrow(LedgerError);
    expect(() => encodePoolId({ controller: ALICE, strategy: "tuple", index: 1.5 })).toThrow(LedgerError);
  });

  it("rejects a malformed controller", () => {
    const err = thrown(() => encodePoolId({ controller: "0x1234", strategy: "tuple", index: 0 }));
    expect(err).toBeInstanceOf(LedgerError);
    expect(err).toMatchObject({ code: "INVALID_ADDRESS", category: "InvalidInput" });
  });

  it("gives distinct ids for distinct indexes of the same controller and strategy", () => {
    const a = encodePoolId({ controller: ALICE, strategy: "pair", index: 7 });
    const b = encodePoolId({ controller: ALICE, strategy: "pair", index: 8 });
    expect(a).not.toBe(b);
  });
});

describe("decodePoolId", () => {
  it("recovers controller and strategy", () => {
    const id = encodePoolId({ controller: BOB, strategy: "pair", index: 42 });
    expect(decodePoolId(id)).toEqual({ controller: BOB, strategy: "pair" });
  });

  it("does not return the index", () => {
    const id = encodePoolId({ controller: BOB, strategy: "tuple", index: 42 });
    expect(Object.keys(decodePoolId(id))).toEqual(["controller", "strategy"]);
  });

  it("unpackPoolId returns every field", () => {
    const id = encodePoolId({ controller: BOB, strategy: "tuple", index: 42 });
    expect(unpackPoolId(id)).toEqual({ controller: BOB, strategy: "tuple", index: 42 });
  });

  it("rejects ids with reserved bits set", () => {
    const id = `0x1${"0".repeat(63)}`;
    expect(() => decodePoolId(id)).toThrow(/reserved bits/);
  });

  it("rejects unknown strategy codes", () => {
    const id = `0x${"0".repeat(20)}0007${ALICE_HEX}`;
    expect(() => decodePoolId(id)).toThrow(/Unknown strategy code 7/);
  });

  it("rejects malformed ids", () => {
    expect(() => decodePoolId("0x1234")).toThrow(/Malformed pool id/);
  });
});

describe("normalizePoolId", () => {
  it("lowercases a valid id", () => {
    const id = encodePoolId({ controller: ALICE, strategy: "tuple", index: 0xabc });
    expect(normalizePoolId(id.toUpperCase().replace("0X", "0x"))).toBe(id);
  });
});
