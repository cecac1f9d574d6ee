/**
 * Tests for UserBalanceLedger.
 *
 * Covers:
 * - Deposits, withdrawals, capped debits
 * - Explicit agents, self-agency, universal agents
 * - Universal-agent managers
 * - Journal rollback
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Journal } from "../src/journal.js";
import { UserBalanceLedger } from "../src/user-balances.js";
import { ALICE, BOB, CAROL, TOKEN_A, TOKEN_B, thrown } from "./fixtures.js";

const ZERO = "0x0000000000000000000000000000000000000000";

describe("UserBalanceLedger", () => {
  let ledger: UserBalanceLedger;

  beforeEach(() => {
    ledger = new UserBalanceLedger();
  });

  // ===========================================================================
  // Balances
  // ===========================================================================

  describe("balances", () => {
    it("starts at zero", () => {
      expect(ledger.getBalance(ALICE, TOKEN_A)).toBe(0n);
      expect(ledger.getBalances(ALICE).size).toBe(0);
    });

    it("deposit credits and returns the new balance", () => {
      expect(ledger.deposit(ALICE, TOKEN_A, 100n)).toBe(100n);
      expect(ledger.deposit(ALICE, TOKEN_A, 50n)).toBe(150n);
      expect(ledger.getBalance(ALICE, TOKEN_A)).toBe(150n);
    });

    it("treats addresses case-insensitively", () => {
      ledger.deposit(ALICE.toUpperCase().replace("0X", "0x"), TOKEN_A, 5n);
      expect(ledger.getBalance(ALICE, TOKEN_A)).toBe(5n);
    });

    it("withdraw debits", () => {
      ledger.deposit(ALICE, TOKEN_A, 100n);
      expect(ledger.withdraw(ALICE, TOKEN_A, 30n)).toBe(70n);
    });

    it("withdraw beyond the balance fails", () => {
      ledger.deposit(ALICE, TOKEN_A, 10n);
      expect(thrown(() => ledger.withdraw(ALICE, TOKEN_A, 11n))).toMatchObject({
        code: "INSUFFICIENT_USER_BALANCE",
        category: "InsufficientFunds",
      });
      expect(ledger.getBalance(ALICE, TOKEN_A)).toBe(10n);
    });

    it("drops emptied entries from getBalances", () => {
      ledger.deposit(ALICE, TOKEN_A, 10n);
      ledger.deposit(ALICE, TOKEN_B, 20n);
      ledger.withdraw(ALICE, TOKEN_A, 10n);
      expect([...ledger.getBalances(ALICE)]).toEqual([[TOKEN_B, 20n]]);
    });

    it("debitUpTo takes at most the balance", () => {
      ledger.deposit(ALICE, TOKEN_A, 40n);
      expect(ledger.debitUpTo(ALICE, TOKEN_A, 100n)).toBe(40n);
      expect(ledger.getBalance(ALICE, TOKEN_A)).toBe(0n);
      expect(ledger.debitUpTo(ALICE, TOKEN_A, 100n)).toBe(0n);
    });

    it("totalOf sums every user", () => {
      ledger.deposit(ALICE, TOKEN_A, 40n);
      ledger.deposit(BOB, TOKEN_A, 2n);
      ledger.deposit(BOB, TOKEN_B, 7n);
      expect(ledger.totalOf(TOKEN_A)).toBe(42n);
    });

    it("rejects malformed users", () => {
      expect(thrown(() => ledger.deposit("alice", TOKEN_A, 1n))).toMatchObject({
        code: "INVALID_ADDRESS",
      });
    });
  });

  // ===========================================================================
  // Agents
  // ===========================================================================

  describe("agents", () => {
    it("a user is always its own agent", () => {
      expect(ledger.isAgentFor(ALICE, ALICE)).toBe(true);
      expect(ledger.addAgent(ALICE, ALICE)).toBe(false);
      expect(ledger.getAgents(ALICE)).toEqual([]);
    });

    it("adds and removes explicit agents", () => {
      expect(ledger.addAgent(ALICE, BOB)).toBe(true);
      expect(ledger.addAgent(ALICE, BOB)).toBe(false);
      expect(ledger.isAgentFor(ALICE, BOB)).toBe(true);
      expect(ledger.isAgentFor(BOB, ALICE)).toBe(false);

      ledger.removeAgent(ALICE, BOB);
      expect(ledger.isAgentFor(ALICE, BOB)).toBe(false);
    });

    it("rejects the zero address as an agent", () => {
      expect(thrown(() => ledger.addAgent(ALICE, ZERO))).toMatchObject({ code: "INVALID_ADDRESS" });
    });

    it("refuses to remove self-agency", () => {
      expect(thrown(() => ledger.removeAgent(ALICE, ALICE))).toMatchObject({
        code: "CANNOT_REMOVE_SELF_AGENT",
      });
    });

    it("removing an unknown agent fails", () => {
      expect(thrown(() => ledger.removeAgent(ALICE, BOB))).toMatchObject({
        code: "AGENT_NOT_FOUND",
        category: "NotFound",
      });
    });

    it("a universal agent acts for everyone but cannot be removed per user", () => {
      ledger.addUniversalAgent(CAROL);
      expect(ledger.isAgentFor(ALICE, CAROL)).toBe(true);
      expect(ledger.isAgentFor(BOB, CAROL)).toBe(true);
      expect(thrown(() => ledger.removeAgent(ALICE, CAROL))).toMatchObject({
        code: "UNIVERSAL_AGENT_NOT_REMOVABLE",
        category: "Unauthorized",
      });
    });

    it("removing a universal agent revokes it everywhere", () => {
      ledger.addUniversalAgent(CAROL);
      ledger.removeUniversalAgent(CAROL);
      expect(ledger.isAgentFor(ALICE, CAROL)).toBe(false);
      expect(ledger.getUniversalAgents()).toEqual([]);
    });

    it("removing an unknown universal agent fails", () => {
      expect(thrown(() => ledger.removeUniversalAgent(CAROL))).toMatchObject({
        code: "UNIVERSAL_AGENT_NOT_FOUND",
      });
    });
  });

  // ===========================================================================
  // Universal-agent managers
  // ===========================================================================

  describe("universal-agent managers", () => {
    it("adds, lists and removes managers", () => {
      expect(ledger.addUniversalAgentManager(BOB)).toBe(true);
      expect(ledger.addUniversalAgentManager(BOB)).toBe(false);
      expect(ledger.isUniversalAgentManager(BOB)).toBe(true);
      expect(ledger.getUniversalAgentManagers()).toEqual([BOB]);

      ledger.removeUniversalAgentManager(BOB);
      expect(ledger.isUniversalAgentManager(BOB)).toBe(false);
    });

    it("removing an unknown manager fails", () => {
      expect(thrown(() => ledger.removeUniversalAgentManager(BOB))).toMatchObject({
        code: "UNIVERSAL_AGENT_MANAGER_NOT_FOUND",
      });
    });
  });

  // ===========================================================================
  // Rollback
  // ===========================================================================

  describe("rollback", () => {
    it("restores balances and agents to their state at begin()", () => {
      const journal = new Journal();
      const journaled = new UserBalanceLedger(journal);
      journaled.deposit(ALICE, TOKEN_A, 100n);
      journaled.addAgent(ALICE, BOB);

      journal.begin();
      journaled.withdraw(ALICE, TOKEN_A, 100n);
      journaled.deposit(BOB, TOKEN_B, 5n);
      journaled.removeAgent(ALICE, BOB);
      journaled.addAgent(ALICE, CAROL);
      journaled.addUniversalAgent(CAROL);
      journal.rollback();

      expect(journaled.getBalance(ALICE, TOKEN_A)).toBe(100n);
      expect(journaled.getBalances(BOB).size).toBe(0);
      expect(journaled.getAgents(ALICE)).toEqual([BOB]);
      expect(journaled.isUniversalAgent(CAROL)).toBe(false);
    });
  });
});
