/**
 * @poolvault/ledger — User balance ledger.
 *
 * Tracks, independently of any pool:
 * - (user, token) → deposited balance
 * - user → explicitly authorized agents
 * - universal agents (authorized for every user)
 * - universal-agent managers (who may add or remove universal agents)
 *
 * Who may call the universal operations is decided by the caller of this
 * ledger (the Vault). This class only keeps the relations consistent.
 */

import type { Address, TokenAddress } from "@poolvault/types";
import { isZeroAddress, toAddress } from "./address.js";
import { assertAmount, checkedAdd, checkedSub, minAmount } from "./amount-math.js";
import { Journal } from "./journal.js";
import { LedgerError } from "./types.js";

export class UserBalanceLedger {
  private readonly _balances: Map<Address, Map<TokenAddress, bigint>> = new Map();
  private readonly _agents: Map<Address, Set<Address>> = new Map();
  private readonly _universalAgents: Set<Address> = new Set();
  private readonly _universalAgentManagers: Set<Address> = new Set();
  private readonly _journal: Journal;

  constructor(journal?: Journal) {
    this._journal = journal ?? new Journal();
  }

  // ─── Balances ────────────────────────────────────────────────────────

  getBalance(user: Address, token: TokenAddress): bigint {
    return this._balances.get(toAddress(user, "user"))?.get(toAddress(token, "token")) ?? 0n;
  }

  /**
   * Non-zero balances of a user, in first-deposit order.
   */
  getBalances(user: Address): ReadonlyMap<TokenAddress, bigint> {
    return new Map(this._balances.get(toAddress(user, "user")) ?? []);
  }

  /**
   * Sum of every user's balance of a token.
   */
  totalOf(token: TokenAddress): bigint {
    const key = toAddress(token, "token");
    let sum = 0n;
    for (const tokens of this._balances.values()) {
      sum += tokens.get(key) ?? 0n;
    }
    return sum;
  }

  /**
   * Credit a user. Returns the new balance.
   */
  deposit(user: Address, token: TokenAddress, amount: bigint): bigint {
    assertAmount(amount);
    const current = this.getBalance(user, token);
    const next = checkedAdd(current, amount);
    this._setBalance(user, token, next);
    return next;
  }

  /**
   * Debit a user. Throws INSUFFICIENT_USER_BALANCE if amount exceeds the
   * balance. Returns the new balance.
   */
  withdraw(user: Address, token: TokenAddress, amount: bigint): bigint {
    assertAmount(amount);
    const current = this.getBalance(user, token);
    const next = checkedSub(current, amount, "INSUFFICIENT_USER_BALANCE");
    this._setBalance(user, token, next);
    return next;
  }

  /**
   * Debit up to amount, capped at the balance. Returns what was taken.
   */
  debitUpTo(user: Address, token: TokenAddress, amount: bigint): bigint {
    assertAmount(amount);
    const current = this.getBalance(user, token);
    const taken = minAmount(current, amount);
    if (taken > 0n) {
      this._setBalance(user, token, current - taken);
    }
    return taken;
  }

  private _setBalance(user: Address, token: TokenAddress, value: bigint): void {
    const userKey = toAddress(user, "user");
    const tokenKey = toAddress(token, "token");
    let tokens = this._balances.get(userKey);
    const existed = tokens !== undefined;
    const previous = tokens?.get(tokenKey);

    if (tokens === undefined) {
      tokens = new Map();
      this._balances.set(userKey, tokens);
    }

    if (value === 0n) {
      tokens.delete(tokenKey);
    } else {
      tokens.set(tokenKey, value);
    }

    const touched = tokens;
    this._journal.record(() => {
      if (previous === undefined) {
        touched.delete(tokenKey);
      } else {
        touched.set(tokenKey, previous);
      }
      if (!existed) {
        this._balances.delete(userKey);
      }
    });
  }

  // ─── Agents ──────────────────────────────────────────────────────────

  /**
   * Authorize agent to act for user. A user is always its own agent, so
   * adding the user itself is a no-op. Returns whether the set changed.
   */
  addAgent(user: Address, agent: Address): boolean {
    const userKey = toAddress(user, "user");
    const agentKey = toAddress(agent, "agent");
    if (isZeroAddress(agentKey)) {
      throw new LedgerError("INVALID_ADDRESS", "The zero address cannot be an agent");
    }
    if (agentKey === userKey) {
      return false;
    }

    let agents = this._agents.get(userKey);
    if (agents?.has(agentKey) === true) {
      return false;
    }
    const existed = agents !== undefined;
    if (agents === undefined) {
      agents = new Set();
      this._agents.set(userKey, agents);
    }
    agents.add(agentKey);

    const touched = agents;
    this._journal.record(() => {
      touched.delete(agentKey);
      if (!existed) {
        this._agents.delete(userKey);
      }
    });
    return true;
  }

  /**
   * Revoke an explicit agent. The user's implicit self-agency and
   * universal agents cannot be revoked here.
   */
  removeAgent(user: Address, agent: Address): void {
    const userKey = toAddress(user, "user");
    const agentKey = toAddress(agent, "agent");

    if (agentKey === userKey) {
      throw new LedgerError("CANNOT_REMOVE_SELF_AGENT", `A user is always its own agent: "${userKey}"`);
    }

    const agents = this._agents.get(userKey);
    if (agents === undefined || !agents.has(agentKey)) {
      if (this._universalAgents.has(agentKey)) {
        throw new LedgerError(
          "UNIVERSAL_AGENT_NOT_REMOVABLE",
          `"${agentKey}" is a universal agent; only a universal-agent manager can remove it`,
        );
      }
      throw new LedgerError("AGENT_NOT_FOUND", `"${agentKey}" is not an agent of "${userKey}"`);
    }

    agents.delete(agentKey);
    this._journal.record(() => {
      agents.add(agentKey);
    });
  }

  /**
   * True if candidate is the user, an explicit agent of the user, or a
   * universal agent.
   */
  isAgentFor(user: Address, candidate: Address): boolean {
    const userKey = toAddress(user, "user");
    const candidateKey = toAddress(candidate, "agent");
    return (
      candidateKey === userKey ||
      this._agents.get(userKey)?.has(candidateKey) === true ||
      this._universalAgents.has(candidateKey)
    );
  }

  /**
   * Explicit agents of a user, in authorization order.
   */
  getAgents(user: Address): readonly Address[] {
    return [...(this._agents.get(toAddress(user, "user")) ?? [])];
  }

  // ─── Universal Agents ────────────────────────────────────────────────

  addUniversalAgent(agent: Address): boolean {
    return this._addToSet(this._universalAgents, toAddress(agent, "agent"), "universal agent");
  }

  removeUniversalAgent(agent: Address): void {
    const key = toAddress(agent, "agent");
    if (!this._universalAgents.has(key)) {
      throw new LedgerError("UNIVERSAL_AGENT_NOT_FOUND", `"${key}" is not a universal agent`);
    }
    this._removeFromSet(this._universalAgents, key);
  }

  isUniversalAgent(agent: Address): boolean {
    return this._universalAgents.has(toAddress(agent, "agent"));
  }

  getUniversalAgents(): readonly Address[] {
    return [...this._universalAgents];
  }

  addUniversalAgentManager(manager: Address): boolean {
    return this._addToSet(
      this._universalAgentManagers,
      toAddress(manager, "manager"),
      "universal-agent manager",
    );
  }

  removeUniversalAgentManager(manager: Address): void {
    const key = toAddress(manager, "manager");
    if (!this._universalAgentManagers.has(key)) {
      throw new LedgerError(
        "UNIVERSAL_AGENT_MANAGER_NOT_FOUND",
        `"${key}" is not a universal-agent manager`,
      );
    }
    this._removeFromSet(this._universalAgentManagers, key);
  }

  isUniversalAgentManager(manager: Address): boolean {
    return this._universalAgentManagers.has(toAddress(manager, "manager"));
  }

  getUniversalAgentManagers(): readonly Address[] {
    return [...this._universalAgentManagers];
  }

  private _addToSet(set: Set<Address>, key: Address, label: string): boolean {
    if (isZeroAddress(key)) {
      throw new LedgerError("INVALID_ADDRESS", `The zero address cannot be a ${label}`);
    }
    if (set.has(key)) {
      return false;
    }
    set.add(key);
    this._journal.record(() => {
      set.delete(key);
    });
    return true;
  }

  private _removeFromSet(set: Set<Address>, key: Address): void {
    set.delete(key);
    this._journal.record(() => {
      set.add(key);
    });
  }
}
