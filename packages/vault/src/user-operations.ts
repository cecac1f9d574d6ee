/**
 * User Operations — the vault's user-balance and agent entry points.
 *
 * Balances are moved by the user or one of its agents. Agent sets are
 * changed by the user itself; the universal agent set by a universal-agent
 * manager; the managers by accounts the Authorizer allows.
 */

import type { Address } from "@poolvault/types";
import type { UserBalanceLedger } from "@poolvault/ledger";
import { assertAmount, formatAmount, toAddress } from "@poolvault/ledger";
import type { Custody } from "./custody.js";
import type { ProtocolFeesCollector } from "./protocol-fees.js";
import type {
  Authorizer,
  DepositRequest,
  OperationContext,
  TransferUserBalanceRequest,
  WithdrawRequest,
} from "./types.js";
import { VaultError } from "./types.js";

export class UserOperations {
  constructor(
    private readonly _users: UserBalanceLedger,
    private readonly _custody: Custody,
    private readonly _fees: ProtocolFeesCollector,
    private readonly _authorizer: Authorizer,
  ) {}

  // ─── Balances ────────────────────────────────────────────────────────

  deposit(ctx: OperationContext, request: DepositRequest): bigint {
    const user = this._requireAgent(ctx, request.user);
    const token = toAddress(request.token, "token");
    assertAmount(request.amount);
    this._custody.pull(token, user, request.amount);
    const balance = this._users.deposit(user, token, request.amount);
    ctx.emit("user-balance.deposited", { user, token, amount: formatAmount(request.amount) });
    return balance;
  }

  /**
   * Debit the user and push the amount less the withdraw fee to the
   * recipient. Returns the fee charged.
   */
  withdraw(ctx: OperationContext, request: WithdrawRequest): bigint {
    const user = this._requireAgent(ctx, request.user);
    const token = toAddress(request.token, "token");
    const recipient = toAddress(request.recipient, "recipient");
    this._users.withdraw(user, token, request.amount);

    const fee = this._fees.withdrawFeeAmount(request.amount);
    this._fees.collect(token, fee);
    this._custody.push(token, recipient, request.amount - fee);
    ctx.emit("user-balance.withdrawn", {
      user,
      recipient,
      token,
      amount: formatAmount(request.amount),
      fee: formatAmount(fee),
    });
    return fee;
  }

  /** Move balance between users without touching custody. */
  transferUserBalance(ctx: OperationContext, request: TransferUserBalanceRequest): void {
    const from = this._requireAgent(ctx, request.from);
    const to = toAddress(request.to, "to");
    const token = toAddress(request.token, "token");
    this._users.withdraw(from, token, request.amount);
    this._users.deposit(to, token, request.amount);
    ctx.emit("user-balance.transferred", { from, to, token, amount: formatAmount(request.amount) });
  }

  // ─── Agents ──────────────────────────────────────────────────────────

  addAgent(ctx: OperationContext, agent: Address): void {
    const agentKey = toAddress(agent, "agent");
    if (this._users.addAgent(ctx.caller, agentKey)) {
      ctx.emit("agent.added", { user: ctx.caller, agent: agentKey });
    }
  }

  removeAgent(ctx: OperationContext, agent: Address): void {
    const agentKey = toAddress(agent, "agent");
    this._users.removeAgent(ctx.caller, agentKey);
    ctx.emit("agent.removed", { user: ctx.caller, agent: agentKey });
  }

  addUniversalAgent(ctx: OperationContext, agent: Address): void {
    this._requireUniversalAgentManager(ctx.caller);
    const agentKey = toAddress(agent, "agent");
    if (this._users.addUniversalAgent(agentKey)) {
      ctx.emit("universal-agent.added", { agent: agentKey });
    }
  }

  removeUniversalAgent(ctx: OperationContext, agent: Address): void {
    this._requireUniversalAgentManager(ctx.caller);
    const agentKey = toAddress(agent, "agent");
    this._users.removeUniversalAgent(agentKey);
    ctx.emit("universal-agent.removed", { agent: agentKey });
  }

  addUniversalAgentManager(ctx: OperationContext, manager: Address): void {
    this._requireManageAction(ctx.caller);
    const managerKey = toAddress(manager, "manager");
    if (this._users.addUniversalAgentManager(managerKey)) {
      ctx.emit("universal-agent-manager.added", { manager: managerKey });
    }
  }

  removeUniversalAgentManager(ctx: OperationContext, manager: Address): void {
    this._requireManageAction(ctx.caller);
    const managerKey = toAddress(manager, "manager");
    this._users.removeUniversalAgentManager(managerKey);
    ctx.emit("universal-agent-manager.removed", { manager: managerKey });
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _requireAgent(ctx: OperationContext, user: Address): Address {
    const userKey = toAddress(user, "user");
    if (!this._users.isAgentFor(userKey, ctx.caller)) {
      throw new VaultError("SENDER_NOT_AGENT", `${ctx.caller} is not an agent of ${userKey}`);
    }
    return userKey;
  }

  private _requireUniversalAgentManager(caller: Address): void {
    if (!this._users.isUniversalAgentManager(caller)) {
      throw new VaultError(
        "CALLER_NOT_UNIVERSAL_AGENT_MANAGER",
        `${caller} is not a universal-agent manager`,
      );
    }
  }

  private _requireManageAction(caller: Address): void {
    if (!this._authorizer.canPerform("manageUniversalAgents", caller)) {
      throw new VaultError("SENDER_NOT_ALLOWED", `${caller} may not manageUniversalAgents`);
    }
  }
}
