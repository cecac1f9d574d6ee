/**
 * Tests for protocol fee routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ONE } from "@poolvault/ledger";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import {
  actingAs,
  ADMIN,
  ALICE,
  BOB,
  createTestApp,
  fund,
  jsonRequest,
  seedPool,
  TOKEN_A,
  TOKEN_B,
  VAULT,
} from "./setup.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

async function errorCode(res: Response): Promise<string> {
  const body = (await res.json()) as { error: { code: string } };
  return body.error.code;
}

describe("fee percentages", () => {
  it("start at zero", async () => {
    const res = await instance.app.request("/api/v1/fees");

    expect(await res.json()).toEqual({
      data: { swapFee: "0", flashLoanFee: "0", withdrawFee: "0" },
    });
  });

  it("admin sets each kind", async () => {
    const { app } = instance;

    await app.request(jsonRequest("/api/v1/fees/swap", "PUT", { fee: "3000000000000000" }, actingAs(ADMIN)));
    await app.request(jsonRequest("/api/v1/fees/flash-loan", "PUT", { fee: "1000000000000000" }, actingAs(ADMIN)));
    const res = await app.request(
      jsonRequest("/api/v1/fees/withdraw", "PUT", { fee: "5000000000000000" }, actingAs(ADMIN)),
    );

    expect(await res.json()).toEqual({
      data: {
        swapFee: "3000000000000000",
        flashLoanFee: "1000000000000000",
        withdrawFee: "5000000000000000",
      },
    });
  });

  it("rejects callers without the permission", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/fees/swap", "PUT", { fee: "1" }, actingAs(ALICE)),
    );

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("SENDER_NOT_ALLOWED");
  });

  it("rejects a swap fee above 50%", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/fees/swap", "PUT", { fee: "500000000000000001" }, actingAs(ADMIN)),
    );

    expect(res.status).toBe(409);
    expect(await errorCode(res)).toBe("FEE_TOO_HIGH");
  });

  it("rejects an unknown fee kind", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/fees/deposit", "PUT", { fee: "1" }, actingAs(ADMIN)),
    );

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });

  it("applies fees passed in the service configuration", async () => {
    const { app, service } = createApp({
      serviceConfig: { vaultAddress: VAULT, adminAddress: ADMIN, swapFee: ONE / 1000n },
    });

    const res = await app.request("/api/v1/fees");

    expect(await res.json()).toEqual({
      data: { swapFee: "1000000000000000", flashLoanFee: "0", withdrawFee: "0" },
    });
    expect(service.vault.events.position()).toBe(1);
  });
});

describe("collected fees", () => {
  it("collects the swap fee in the input token and pays it out", async () => {
    const { app, service } = instance;
    const poolId = await seedPool(instance);
    await fund(instance, ALICE, TOKEN_A, "100");
    await app.request(jsonRequest("/api/v1/fees/swap", "PUT", { fee: "10000000000000000" }, actingAs(ADMIN)));

    const swap = await app.request(
      jsonRequest(
        "/api/v1/swaps/batch",
        "POST",
        {
          kind: "givenIn",
          steps: [{ poolId, assetInIndex: 0, assetOutIndex: 1, amount: "100" }],
          assets: [TOKEN_A, TOKEN_B],
          funds: { sender: ALICE, recipient: ALICE },
        },
        actingAs(ALICE),
      ),
    );
    // 1% of 100 is kept; 99 is priced: 1000 * 99 / 1099 = 90
    expect(await swap.json()).toEqual({
      data: {
        deltas: ["100", "-90"],
        swaps: [
          { poolId, tokenIn: TOKEN_A, tokenOut: TOKEN_B, amountIn: "100", amountOut: "90", fee: "1" },
        ],
      },
    });

    const collected = await app.request(`/api/v1/fees/collected?tokens=${TOKEN_A},${TOKEN_B}`);
    expect(await collected.json()).toEqual({
      data: [
        { token: TOKEN_A, amount: "1" },
        { token: TOKEN_B, amount: "0" },
      ],
    });

    const withdrawn = await app.request(
      jsonRequest(
        "/api/v1/fees/withdraw",
        "POST",
        { tokens: [TOKEN_A], amounts: ["1"], recipient: BOB },
        actingAs(ADMIN),
      ),
    );
    expect(await withdrawn.json()).toEqual({ data: [{ token: TOKEN_A, amount: "0" }] });
    expect(service.bank.balanceOf(TOKEN_A, BOB)).toBe(1n);
    expect(service.vault.getPoolTokens(poolId).balances).toEqual([1099n, 910n]);
  });

  it("charges the withdraw fee on user withdrawals", async () => {
    const { app, service } = instance;
    await fund(instance, ALICE, TOKEN_A, "500");
    await app.request(jsonRequest("/api/v1/fees/withdraw", "PUT", { fee: "5000000000000000" }, actingAs(ADMIN)));
    await app.request(
      jsonRequest(`/api/v1/users/${ALICE}/deposit`, "POST", { token: TOKEN_A, amount: "500" }, actingAs(ALICE)),
    );

    const res = await app.request(
      jsonRequest(
        `/api/v1/users/${ALICE}/withdraw`,
        "POST",
        { token: TOKEN_A, amount: "200", recipient: BOB },
        actingAs(ALICE),
      ),
    );

    // 0.5% of 200
    expect(await res.json()).toEqual({ data: { token: TOKEN_A, fee: "1", balance: "300" } });
    expect(service.bank.balanceOf(TOKEN_A, BOB)).toBe(199n);
    expect(service.vault.getCollectedFees([TOKEN_A])).toEqual([1n]);
  });

  it("cannot pay out more than was collected", async () => {
    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/fees/withdraw",
        "POST",
        { tokens: [TOKEN_A], amounts: ["1"], recipient: BOB },
        actingAs(ADMIN),
      ),
    );

    expect(res.status).toBe(422);
    expect(await errorCode(res)).toBe("INSUFFICIENT_COLLECTED_FEES");
  });
});
