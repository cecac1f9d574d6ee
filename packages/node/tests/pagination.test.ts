/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads what encodeCursor wrote", () => {
    expect(decodeCursor(encodeCursor("position", 12))).toEqual({
      field: "position",
      value: 12,
    });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when the key is missing or not an integer", () => {
    const missing = Buffer.from(JSON.stringify({ f: "position" })).toString("base64url");
    expect(decodeCursor(missing)).toBeUndefined();

    const text = Buffer.from(JSON.stringify({ f: "position", v: "3" })).toString("base64url");
    expect(decodeCursor(text)).toBeUndefined();

    const fraction = Buffer.from(JSON.stringify({ f: "position", v: 1.5 })).toString("base64url");
    expect(decodeCursor(fraction)).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    const num = Buffer.from(JSON.stringify(42)).toString("base64url");
    expect(decodeCursor(num)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

interface Item {
  readonly n: number;
}

const items: Item[] = [2, 9, 10, 11, 30].map((n) => ({ n }));
const key = (item: Item): number => item.n;

describe("paginate", () => {
  it("returns the first page with a cursor when more items exist", () => {
    const result = paginate(items, { limit: 2 }, key, "n");

    expect(result.data).toEqual([{ n: 2 }, { n: 9 }]);
    expect(result.pagination.hasMore).toBe(true);
    expect(result.pagination.cursor).toBe(encodeCursor("n", 9));
  });

  it("compares keys numerically", () => {
    const result = paginate(items, { cursor: encodeCursor("n", 9), limit: 2 }, key, "n");

    expect(result.data).toEqual([{ n: 10 }, { n: 11 }]);
    expect(result.pagination.hasMore).toBe(true);
  });

  it("ends with a null cursor", () => {
    const result = paginate(items, { cursor: encodeCursor("n", 11), limit: 10 }, key, "n");

    expect(result.data).toEqual([{ n: 30 }]);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores an invalid cursor or one for another field", () => {
    expect(paginate(items, { cursor: "garbage", limit: 1 }, key, "n").data).toEqual([{ n: 2 }]);
    expect(paginate(items, { cursor: encodeCursor("index", 10), limit: 1 }, key, "n").data).toEqual([
      { n: 2 },
    ]);
  });

  it("returns an empty page for no items", () => {
    expect(paginate([], { limit: 5 }, key, "n")).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});
