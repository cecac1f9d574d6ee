/**
 * Tests for user balance, agent and universal agent routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  actingAs,
  ADMIN,
  ALICE,
  BOB,
  createTestApp,
  fund,
  jsonRequest,
  MANAGER,
  TOKEN_A,
  TOKEN_B,
} from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(async () => {
  instance = createTestApp();
  await fund(instance, ALICE, TOKEN_A, "500");
});

async function errorCode(res: Response): Promise<string> {
  const body = (await res.json()) as { error: { code: string } };
  return body.error.code;
}

// =============================================================================
// Balances
// =============================================================================

describe("user balances", () => {
  it("deposits, withdraws and reports balances", async () => {
    const { app, service } = instance;

    const deposited = await app.request(
      jsonRequest(`/api/v1/users/${ALICE}/deposit`, "POST", { token: TOKEN_A, amount: "500" }, actingAs(ALICE)),
    );
    expect(await deposited.json()).toEqual({ data: { token: TOKEN_A, balance: "500" } });

    const withdrawn = await app.request(
      jsonRequest(
        `/api/v1/users/${ALICE}/withdraw`,
        "POST",
        { token: TOKEN_A, amount: "200", recipient: BOB },
        actingAs(ALICE),
      ),
    );
    expect(await withdrawn.json()).toEqual({ data: { token: TOKEN_A, fee: "0", balance: "300" } });
    expect(service.bank.balanceOf(TOKEN_A, BOB)).toBe(200n);

    const res = await app.request(`/api/v1/users/${ALICE}/balances?tokens=${TOKEN_A},${TOKEN_B}`);
    expect(await res.json()).toEqual({
      data: [
        { token: TOKEN_A, balance: "300" },
        { token: TOKEN_B, balance: "0" },
      ],
    });
  });

  it("transfers internal balance between users", async () => {
    const { app, service } = instance;
    await app.request(
      jsonRequest(`/api/v1/users/${ALICE}/deposit`, "POST", { token: TOKEN_A, amount: "500" }, actingAs(ALICE)),
    );

    const res = await app.request(
      jsonRequest(`/api/v1/users/${ALICE}/transfer`, "POST", { to: BOB, token: TOKEN_A, amount: "120" }, actingAs(ALICE)),
    );

    expect(await res.json()).toEqual({ data: { token: TOKEN_A, balance: "380" } });
    expect(service.vault.getUserBalance(BOB, TOKEN_A)).toBe(120n);
  });

  it("rejects a withdrawal above the balance", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/users/${ALICE}/withdraw`, "POST", { token: TOKEN_A, amount: "1" }, actingAs(ALICE)),
    );

    expect(res.status).toBe(422);
    expect(await errorCode(res)).toBe("INSUFFICIENT_USER_BALANCE");
  });

  it("rejects acting for a user without being their agent", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/users/${ALICE}/deposit`, "POST", { token: TOKEN_A, amount: "1" }, actingAs(BOB)),
    );

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("SENDER_NOT_AGENT");
  });

  it("requires a token list for balances", async () => {
    const res = await instance.app.request(`/api/v1/users/${ALICE}/balances`);

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });

  it("rejects amounts that are not decimal integer strings", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/users/${ALICE}/deposit`, "POST", { token: TOKEN_A, amount: "1.5" }, actingAs(ALICE)),
    );

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// Agents
// =============================================================================

describe("agents", () => {
  it("adds and removes the caller's agents", async () => {
    const { app } = instance;

    const added = await app.request(jsonRequest("/api/v1/agents", "POST", { agent: BOB }, actingAs(ALICE)));
    expect(await added.json()).toEqual({ data: { agents: [BOB] } });

    const listed = await app.request(`/api/v1/users/${ALICE}/agents`);
    expect(await listed.json()).toEqual({ data: { agents: [BOB], universalAgents: [] } });

    const removed = await app.request(jsonRequest(`/api/v1/agents/${BOB}`, "DELETE", undefined, actingAs(ALICE)));
    expect(await removed.json()).toEqual({ data: { agents: [] } });
  });

  it("an agent may deposit for the user", async () => {
    const { app, service } = instance;
    await app.request(jsonRequest("/api/v1/agents", "POST", { agent: BOB }, actingAs(ALICE)));

    const res = await app.request(
      jsonRequest(`/api/v1/users/${ALICE}/deposit`, "POST", { token: TOKEN_A, amount: "50" }, actingAs(BOB)),
    );

    expect(res.status).toBe(200);
    expect(service.vault.getUserBalance(ALICE, TOKEN_A)).toBe(50n);
  });

  it("a user cannot remove itself", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/agents/${ALICE}`, "DELETE", undefined, actingAs(ALICE)),
    );

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("CANNOT_REMOVE_SELF_AGENT");
  });
});

describe("universal agents", () => {
  it("admin adds a manager who adds a universal agent", async () => {
    const { app, service } = instance;

    const managers = await app.request(
      jsonRequest("/api/v1/universal-agents/managers", "POST", { manager: MANAGER }, actingAs(ADMIN)),
    );
    expect(await managers.json()).toEqual({ data: [MANAGER] });

    const agents = await app.request(
      jsonRequest("/api/v1/universal-agents", "POST", { agent: BOB }, actingAs(MANAGER)),
    );
    expect(await agents.json()).toEqual({ data: [BOB] });
    expect(service.vault.isAgentFor(ALICE, BOB)).toBe(true);

    const removed = await app.request(
      jsonRequest(`/api/v1/universal-agents/${BOB}`, "DELETE", undefined, actingAs(MANAGER)),
    );
    expect(await removed.json()).toEqual({ data: [] });
  });

  it("only managers change universal agents", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/universal-agents", "POST", { agent: BOB }, actingAs(ALICE)),
    );

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("CALLER_NOT_UNIVERSAL_AGENT_MANAGER");
  });

  it("only authorized accounts change managers", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/universal-agents/managers", "POST", { manager: MANAGER }, actingAs(ALICE)),
    );

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("SENDER_NOT_ALLOWED");

    const list = await instance.app.request("/api/v1/universal-agents/managers");
    expect(await list.json()).toEqual({ data: [] });
  });
});
