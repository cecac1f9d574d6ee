/**
 * Tests for batch swap and query routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  actingAs,
  ALICE,
  BOB,
  createTestApp,
  fund,
  jsonRequest,
  seedPool,
  TOKEN_A,
  TOKEN_B,
} from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;
let poolId: string;

beforeEach(async () => {
  instance = createTestApp();
  poolId = await seedPool(instance);
  await fund(instance, ALICE, TOKEN_A, "100");
});

function swapBody(extra: Record<string, unknown> = {}) {
  return {
    kind: "givenIn",
    steps: [{ poolId, assetInIndex: 0, assetOutIndex: 1, amount: "100" }],
    assets: [TOKEN_A, TOKEN_B],
    funds: { sender: ALICE, recipient: ALICE },
    ...extra,
  };
}

describe("POST /api/v1/swaps/batch", () => {
  it("swaps against the pool and settles with the sender", async () => {
    const { app, service } = instance;

    const res = await app.request(jsonRequest("/api/v1/swaps/batch", "POST", swapBody(), actingAs(ALICE)));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        deltas: ["100", "-90"],
        swaps: [
          { poolId, tokenIn: TOKEN_A, tokenOut: TOKEN_B, amountIn: "100", amountOut: "90", fee: "0" },
        ],
      },
    });
    expect(service.bank.balanceOf(TOKEN_A, ALICE)).toBe(0n);
    expect(service.bank.balanceOf(TOKEN_B, ALICE)).toBe(90n);
    expect(service.vault.getPoolTokens(poolId).balances).toEqual([1100n, 910n]);
  });

  it("pays out to the recipient's internal balance", async () => {
    const { app, service } = instance;

    await app.request(
      jsonRequest(
        "/api/v1/swaps/batch",
        "POST",
        swapBody({ funds: { sender: ALICE, recipient: BOB, toUserBalance: true } }),
        actingAs(ALICE),
      ),
    );

    expect(service.vault.getUserBalance(BOB, TOKEN_B)).toBe(90n);
    expect(service.bank.balanceOf(TOKEN_B, BOB)).toBe(0n);
  });

  it("rejects a batch that breaks its limits and changes nothing", async () => {
    const { app, service } = instance;

    const res = await app.request(
      jsonRequest("/api/v1/swaps/batch", "POST", swapBody({ limits: ["100", "-91"] }), actingAs(ALICE)),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("SWAP_LIMIT_EXCEEDED");
    expect(service.vault.getPoolTokens(poolId).balances).toEqual([1000n, 1000n]);
    expect(service.vault.events.position()).toBe(2);
  });

  it("requires the caller to be the sender's agent", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/swaps/batch", "POST", swapBody(), actingAs(BOB)),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("SENDER_NOT_AGENT");
  });

  it("rejects an unknown swap kind", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/swaps/batch", "POST", swapBody({ kind: "sideways" }), actingAs(ALICE)),
    );

    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/swaps/query", () => {
  it("returns the deltas without applying them", async () => {
    const { app, service } = instance;

    const res = await app.request(
      jsonRequest("/api/v1/swaps/query", "POST", {
        kind: "givenIn",
        steps: [{ poolId, assetInIndex: 0, assetOutIndex: 1, amount: "100" }],
        assets: [TOKEN_A, TOKEN_B],
      }),
    );

    expect(await res.json()).toEqual({ data: { deltas: ["100", "-90"] } });
    expect(service.vault.getPoolTokens(poolId).balances).toEqual([1000n, 1000n]);
    expect(service.vault.events.position()).toBe(2);
  });

  it("prices an exact-output swap", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/swaps/query", "POST", {
        kind: "givenOut",
        steps: [{ poolId, assetInIndex: 0, assetOutIndex: 1, amount: "90" }],
        assets: [TOKEN_A, TOKEN_B],
      }),
    );

    // ceil(1000 * 90 / 910) = 99
    expect(await res.json()).toEqual({ data: { deltas: ["99", "-90"] } });
  });
});
