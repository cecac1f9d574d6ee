import { describe, it, expect, beforeEach } from "vitest";
import { ONE } from "@poolvault/ledger";
import type { Harness } from "./helpers.js";
import {
  ADMIN,
  ALICE,
  BOB,
  CAROL,
  createHarness,
  fund,
  MANAGER,
  thrown,
  TOKEN_A,
  VAULT,
} from "./helpers.js";

describe("user operations", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    fund(h, ALICE, TOKEN_A, 1000n);
  });

  // ─── Balances ──────────────────────────────────────────────────────

  describe("deposit and withdraw", () => {
    it("deposit pulls tokens into the user's balance", () => {
      expect(h.vault.deposit(ALICE, { user: ALICE, token: TOKEN_A, amount: 1000n })).toBe(1000n);
      expect(h.vault.getUserBalance(ALICE, TOKEN_A)).toBe(1000n);
      expect(h.bank.balanceOf(TOKEN_A, VAULT)).toBe(1000n);
    });

    it("withdraw pushes the amount less the withdraw fee", () => {
      h.vault.setWithdrawFee(ADMIN, ONE / 200n);
      h.vault.deposit(ALICE, { user: ALICE, token: TOKEN_A, amount: 1000n });

      const fee = h.vault.withdraw(ALICE, { user: ALICE, token: TOKEN_A, amount: 400n, recipient: BOB });

      expect(fee).toBe(2n);
      expect(h.vault.getUserBalance(ALICE, TOKEN_A)).toBe(600n);
      expect(h.bank.balanceOf(TOKEN_A, BOB)).toBe(398n);
      expect(h.vault.getCollectedFees([TOKEN_A])).toEqual([2n]);
      expect(h.vault.accountedBalanceOf(TOKEN_A)).toBe(h.bank.balanceOf(TOKEN_A, VAULT));
    });

    it("withdrawing more than the balance fails and moves nothing", () => {
      h.vault.deposit(ALICE, { user: ALICE, token: TOKEN_A, amount: 100n });
      expect(
        thrown(() => h.vault.withdraw(ALICE, { user: ALICE, token: TOKEN_A, amount: 101n, recipient: ALICE })),
      ).toMatchObject({ code: "INSUFFICIENT_USER_BALANCE", category: "InsufficientFunds" });
      expect(h.bank.balanceOf(TOKEN_A, VAULT)).toBe(100n);
    });

    it("an agent may move the user's funds", () => {
      expect(thrown(() => h.vault.deposit(BOB, { user: ALICE, token: TOKEN_A, amount: 10n }))).toMatchObject({
        code: "SENDER_NOT_AGENT",
      });

      h.vault.addAgent(ALICE, BOB);
      h.vault.deposit(BOB, { user: ALICE, token: TOKEN_A, amount: 10n });
      h.vault.withdraw(BOB, { user: ALICE, token: TOKEN_A, amount: 10n, recipient: BOB });

      expect(h.bank.balanceOf(TOKEN_A, BOB)).toBe(10n);
      expect(h.bank.balanceOf(TOKEN_A, ALICE)).toBe(990n);
    });

    it("transferUserBalance moves ledger balance only", () => {
      h.vault.deposit(ALICE, { user: ALICE, token: TOKEN_A, amount: 300n });
      h.vault.transferUserBalance(ALICE, { from: ALICE, to: CAROL, token: TOKEN_A, amount: 120n });

      expect(h.vault.getUserBalances(ALICE, [TOKEN_A])).toEqual([180n]);
      expect(h.vault.getUserBalances(CAROL, [TOKEN_A])).toEqual([120n]);
      expect(h.bank.balanceOf(TOKEN_A, VAULT)).toBe(300n);
    });
  });

  // ─── Agents ────────────────────────────────────────────────────────

  describe("agents", () => {
    it("adds and removes explicit agents", () => {
      h.vault.addAgent(ALICE, BOB);
      expect(h.vault.getAgents(ALICE)).toEqual([BOB]);

      h.vault.removeAgent(ALICE, BOB);
      expect(h.vault.getAgents(ALICE)).toEqual([]);
      expect(h.vault.isAgentFor(ALICE, BOB)).toBe(false);
    });

    it("a user is always its own agent", () => {
      expect(h.vault.isAgentFor(ALICE, ALICE)).toBe(true);
      expect(thrown(() => h.vault.removeAgent(ALICE, ALICE))).toMatchObject({
        code: "CANNOT_REMOVE_SELF_AGENT",
      });
    });

    it("adding an existing agent emits nothing", () => {
      h.vault.addAgent(ALICE, BOB);
      const before = h.vault.events.position();
      h.vault.addAgent(ALICE, BOB);
      expect(h.vault.events.position()).toBe(before);
    });
  });

  // ─── Universal agents ──────────────────────────────────────────────

  describe("universal agents", () => {
    beforeEach(() => {
      h.vault.addUniversalAgentManager(ADMIN, MANAGER);
    });

    it("a universal agent acts for every user", () => {
      h.vault.addUniversalAgent(MANAGER, BOB);

      expect(h.vault.getUniversalAgents()).toEqual([BOB]);
      expect(h.vault.isAgentFor(ALICE, BOB)).toBe(true);
      expect(h.vault.isAgentFor(CAROL, BOB)).toBe(true);
    });

    it("users cannot remove a universal agent", () => {
      h.vault.addUniversalAgent(MANAGER, BOB);
      expect(thrown(() => h.vault.removeAgent(ALICE, BOB))).toMatchObject({
        code: "UNIVERSAL_AGENT_NOT_REMOVABLE",
        category: "Unauthorized",
      });

      h.vault.removeUniversalAgent(MANAGER, BOB);
      expect(h.vault.isAgentFor(ALICE, BOB)).toBe(false);
    });

    it("only universal-agent managers change the universal set", () => {
      expect(thrown(() => h.vault.addUniversalAgent(ALICE, BOB))).toMatchObject({
        code: "CALLER_NOT_UNIVERSAL_AGENT_MANAGER",
        category: "Unauthorized",
      });
    });

    it("managers are granted through the authorizer", () => {
      expect(thrown(() => h.vault.addUniversalAgentManager(ALICE, CAROL))).toMatchObject({
        code: "SENDER_NOT_ALLOWED",
      });

      h.authorizer.grant("manageUniversalAgents", ALICE);
      h.vault.addUniversalAgentManager(ALICE, CAROL);
      expect(h.vault.getUniversalAgentManagers()).toEqual([MANAGER, CAROL]);

      h.vault.removeUniversalAgentManager(ADMIN, MANAGER);
      expect(h.vault.getUniversalAgentManagers()).toEqual([CAROL]);
    });
  });
});
