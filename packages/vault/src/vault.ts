/**
 * Vault — multi-pool vault top-level coordinator.
 *
 * Composes:
 * - PoolRegistry (pools, liquidity, investment managers)
 * - SettlementEngine (batched swaps, net settlement)
 * - FlashLoanDesk (same-operation loans)
 * - UserOperations (user balances, agents)
 * - ProtocolFeesCollector (fee percentages, collected fees)
 *
 * Every mutating call is one operation: it holds the reentrancy guard,
 * runs inside one Journal unit and one TokenTransfers transaction, and
 * buffers its events. The operation either commits all of it or none.
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent, PoolId, PoolRecord, StrategyType, TokenAddress } from "@poolvault/types";
import { ZERO_ADDRESS } from "@poolvault/types";
import { Journal, PoolBalanceLedger, toAddress, UserBalanceLedger } from "@poolvault/ledger";
import type {
  EventLog,
  SubscriberErrorHandler,
  VaultEventPayloads,
  VaultEventType,
} from "@poolvault/event-store";
import { createVaultCatalog, InMemoryEventLog } from "@poolvault/event-store";
import { Custody } from "./custody.js";
import { FlashLoanDesk } from "./flash-loans.js";
import { PoolRegistry } from "./pool-registry.js";
import { ProtocolFeesCollector } from "./protocol-fees.js";
import { ReentrancyGuard } from "./reentrancy.js";
import { SettlementEngine } from "./settlement.js";
import type {
  AddLiquidityRequest,
  Authorizer,
  BatchSwapRequest,
  BatchSwapResult,
  DepositRequest,
  FlashLoanRequest,
  FlashLoanResult,
  OperationContext,
  PoolTokenInfo,
  PoolTokens,
  ProtocolFees,
  QueryBatchSwapRequest,
  RemoveLiquidityRequest,
  StrategyDirectory,
  TokenTransfers,
  TransferUserBalanceRequest,
  WithdrawRequest,
} from "./types.js";
import { VaultError } from "./types.js";
import { UserOperations } from "./user-operations.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultOptions {
  /** Account under which the vault holds tokens */
  readonly address: Address;
  readonly transfers: TokenTransfers;
  readonly strategies: StrategyDirectory;
  readonly authorizer: Authorizer;
  /** Default: an in-memory log validating against the vault catalog */
  readonly eventLog?: EventLog;
  /** Event timestamps. Default: the system clock. */
  readonly clock?: () => Date;
  /** Event ids and correlation ids. Default: random UUIDs. */
  readonly idGenerator?: () => string;
  /**
   * Receives event subscriber exceptions from the default log. The
   * operation has committed by then and still returns normally.
   */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

type OperationMode = "commit" | "dryRun";

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly address: Address;
  readonly events: EventLog;

  private readonly _journal = new Journal();
  private readonly _guard = new ReentrancyGuard();
  private readonly _catalog = createVaultCatalog();
  private readonly _pools: PoolBalanceLedger;
  private readonly _users: UserBalanceLedger;
  private readonly _custody: Custody;
  private readonly _fees: ProtocolFeesCollector;
  private readonly _registry: PoolRegistry;
  private readonly _settlement: SettlementEngine;
  private readonly _flashLoans: FlashLoanDesk;
  private readonly _userOps: UserOperations;
  private readonly _clock: () => Date;
  private readonly _newId: () => string;
  private _block = 0;

  constructor(options: VaultOptions) {
    this.address = toAddress(options.address, "vault address");
    this._clock = options.clock ?? (() => new Date());
    this._newId = options.idGenerator ?? randomUUID;
    this.events = options.eventLog ?? new InMemoryEventLog({
        catalog: this._catalog,
        clock: this._clock,
        onSubscriberError: options.onSubscriberError,
      });

    this._pools = new PoolBalanceLedger(this._journal);
    this._users = new UserBalanceLedger(this._journal);
    this._custody = new Custody(options.transfers, this.address);
    this._fees = new ProtocolFeesCollector(this._journal, options.authorizer, this._custody);
    this._registry = new PoolRegistry({
      journal: this._journal,
      pools: this._pools,
      users: this._users,
      custody: this._custody,
      fees: this._fees,
    });
    this._settlement = new SettlementEngine({
      registry: this._registry,
      pools: this._pools,
      users: this._users,
      custody: this._custody,
      fees: this._fees,
      strategies: options.strategies,
    });
    this._flashLoans = new FlashLoanDesk(this._custody, this._fees);
    this._userOps = new UserOperations(this._users, this._custody, this._fees, options.authorizer);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pools
  // ───────────────────────────────────────────────────────────────────────

  newPool(caller: Address, controller: Address, strategy: StrategyType): PoolRecord {
    return this._run("newPool", caller, (ctx) => this._registry.newPool(ctx, controller, strategy));
  }

  addLiquidity(caller: Address, request: AddLiquidityRequest): void {
    this._run("addLiquidity", caller, (ctx) => {
      this._registry.addLiquidity(ctx, request);
    });
  }

  removeLiquidity(caller: Address, request: RemoveLiquidityRequest): void {
    this._run("removeLiquidity", caller, (ctx) => {
      this._registry.removeLiquidity(ctx, request);
    });
  }

  authorizePoolInvestmentManager(caller: Address, poolId: PoolId, token: TokenAddress, manager: Address): void {
    this._run("authorizePoolInvestmentManager", caller, (ctx) => {
      this._registry.authorizePoolInvestmentManager(ctx, poolId, token, manager);
    });
  }

  revokePoolInvestmentManager(caller: Address, poolId: PoolId, token: TokenAddress): void {
    this._run("revokePoolInvestmentManager", caller, (ctx) => {
      this._registry.revokePoolInvestmentManager(ctx, poolId, token);
    });
  }

  investPoolBalance(caller: Address, poolId: PoolId, token: TokenAddress, amount: bigint): void {
    this._run("investPoolBalance", caller, (ctx) => {
      this._registry.investPoolBalance(ctx, poolId, token, amount);
    });
  }

  divestPoolBalance(caller: Address, poolId: PoolId, token: TokenAddress, amount: bigint): void {
    this._run("divestPoolBalance", caller, (ctx) => {
      this._registry.divestPoolBalance(ctx, poolId, token, amount);
    });
  }

  updateInvested(caller: Address, poolId: PoolId, token: TokenAddress, managed: bigint): void {
    this._run("updateInvested", caller, (ctx) => {
      this._registry.updateInvested(ctx, poolId, token, managed);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Swaps and flash loans
  // ───────────────────────────────────────────────────────────────────────

  batchSwap(caller: Address, request: BatchSwapRequest): BatchSwapResult {
    return this._run("batchSwap", caller, (ctx) => this._settlement.batchSwap(ctx, request));
  }

  /**
   * Deltas the batch would produce right now. Leaves no trace: every
   * ledger change is rolled back and nothing is transferred.
   */
  queryBatchSwap(request: QueryBatchSwapRequest): readonly bigint[] {
    return this._run(
      "queryBatchSwap",
      ZERO_ADDRESS,
      (ctx) => this._settlement.queryBatchSwap(ctx, request),
      "dryRun",
    );
  }

  flashLoan(caller: Address, request: FlashLoanRequest): FlashLoanResult {
    return this._run("flashLoan", caller, (ctx) => this._flashLoans.flashLoan(ctx, request));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Users and agents
  // ───────────────────────────────────────────────────────────────────────

  /** Returns the user's new balance. */
  deposit(caller: Address, request: DepositRequest): bigint {
    return this._run("deposit", caller, (ctx) => this._userOps.deposit(ctx, request));
  }

  /** Returns the withdraw fee charged. */
  withdraw(caller: Address, request: WithdrawRequest): bigint {
    return this._run("withdraw", caller, (ctx) => this._userOps.withdraw(ctx, request));
  }

  transferUserBalance(caller: Address, request: TransferUserBalanceRequest): void {
    this._run("transferUserBalance", caller, (ctx) => {
      this._userOps.transferUserBalance(ctx, request);
    });
  }

  addAgent(caller: Address, agent: Address): void {
    this._run("addAgent", caller, (ctx) => {
      this._userOps.addAgent(ctx, agent);
    });
  }

  removeAgent(caller: Address, agent: Address): void {
    this._run("removeAgent", caller, (ctx) => {
      this._userOps.removeAgent(ctx, agent);
    });
  }

  addUniversalAgent(caller: Address, agent: Address): void {
    this._run("addUniversalAgent", caller, (ctx) => {
      this._userOps.addUniversalAgent(ctx, agent);
    });
  }

  removeUniversalAgent(caller: Address, agent: Address): void {
    this._run("removeUniversalAgent", caller, (ctx) => {
      this._userOps.removeUniversalAgent(ctx, agent);
    });
  }

  addUniversalAgentManager(caller: Address, manager: Address): void {
    this._run("addUniversalAgentManager", caller, (ctx) => {
      this._userOps.addUniversalAgentManager(ctx, manager);
    });
  }

  removeUniversalAgentManager(caller: Address, manager: Address): void {
    this._run("removeUniversalAgentManager", caller, (ctx) => {
      this._userOps.removeUniversalAgentManager(ctx, manager);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Protocol fees
  // ───────────────────────────────────────────────────────────────────────

  setSwapFee(caller: Address, fee: bigint): void {
    this._run("setSwapFee", caller, (ctx) => {
      this._fees.setFee(ctx, "swap", fee);
    });
  }

  setFlashLoanFee(caller: Address, fee: bigint): void {
    this._run("setFlashLoanFee", caller, (ctx) => {
      this._fees.setFee(ctx, "flashLoan", fee);
    });
  }

  setWithdrawFee(caller: Address, fee: bigint): void {
    this._run("setWithdrawFee", caller, (ctx) => {
      this._fees.setFee(ctx, "withdraw", fee);
    });
  }

  withdrawCollectedFees(
    caller: Address,
    tokens: readonly TokenAddress[],
    amounts: readonly bigint[],
    recipient: Address,
  ): void {
    this._run("withdrawCollectedFees", caller, (ctx) => {
      this._fees.withdrawCollectedFees(ctx, tokens, amounts, recipient);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** Vault block number of the last committed operation. */
  get blockNumber(): number {
    return this._block;
  }

  getPool(poolId: PoolId): PoolRecord | undefined {
    return this._registry.getPool(poolId);
  }

  listPools(): readonly PoolRecord[] {
    return this._registry.listPools();
  }

  getPoolTokens(poolId: PoolId): PoolTokens {
    return this._registry.getPoolTokens(poolId);
  }

  getPoolTokenInfo(poolId: PoolId, token: TokenAddress): PoolTokenInfo {
    return this._registry.getPoolTokenInfo(poolId, token);
  }

  /** Zero balance for a token the pool does not hold. */
  getPoolTokenState(poolId: PoolId, token: TokenAddress): PoolTokenInfo {
    return this._registry.getPoolTokenState(poolId, token);
  }

  getInvestmentManager(poolId: PoolId, token: TokenAddress): Address | undefined {
    return this._registry.getInvestmentManager(poolId, token);
  }

  getUserBalance(user: Address, token: TokenAddress): bigint {
    return this._users.getBalance(user, token);
  }

  getUserBalances(user: Address, tokens: readonly TokenAddress[]): readonly bigint[] {
    return tokens.map((token) => this._users.getBalance(user, token));
  }

  isAgentFor(user: Address, agent: Address): boolean {
    return this._users.isAgentFor(user, agent);
  }

  getAgents(user: Address): readonly Address[] {
    return this._users.getAgents(user);
  }

  getUniversalAgents(): readonly Address[] {
    return this._users.getUniversalAgents();
  }

  getUniversalAgentManagers(): readonly Address[] {
    return this._users.getUniversalAgentManagers();
  }

  getProtocolFees(): ProtocolFees {
    return this._fees.getProtocolFees();
  }

  getCollectedFees(tokens: readonly TokenAddress[]): readonly bigint[] {
    return this._fees.getCollectedFees(tokens);
  }

  /**
   * What the ledgers say the vault holds of a token: pool cash, user
   * balances and collected fees. Equals the vault's token balance unless
   * tokens were sent to it outside an operation.
   */
  accountedBalanceOf(token: TokenAddress): bigint {
    return this._pools.cashOf(token) + this._users.totalOf(token) + this._fees.getCollectedFee(token);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operation scope
  // ───────────────────────────────────────────────────────────────────────

  private _run<T>(
    operation: string,
    caller: Address,
    body: (ctx: OperationContext) => T,
    mode: OperationMode = "commit",
  ): T {
    const actor = toAddress(caller, "caller");
    return this._guard.run(operation, () => {
      this._journal.begin();
      try {
        this._custody.begin();
      } catch (err) {
        this._journal.rollback();
        throw err;
      }

      const pending: DomainEvent[] = [];
      try {
        const previousBlock = this._block;
        this._block = previousBlock + 1;
        this._journal.record(() => {
          this._block = previousBlock;
        });

        const result = body(this._context(actor, this._block, pending));

        if (mode === "dryRun") {
          this._abort();
          return result;
        }
        this._custody.commit();
        this._journal.commit();
        if (pending.length > 0) {
          this.events.append(pending);
        }
        return result;
      } catch (err) {
        if (this._journal.active) {
          this._abort();
        }
        throw err;
      }
    });
  }

  private _abort(): void {
    this._journal.rollback();
    this._custody.rollback();
  }

  private _context(caller: Address, block: number, pending: DomainEvent[]): OperationContext {
    const correlationId = this._newId();
    return {
      caller,
      block,
      correlationId,
      emit: <K extends VaultEventType>(type: K, payload: VaultEventPayloads[K]): void => {
        const schema = this._catalog.getSchema(type);
        if (schema === undefined || !this._catalog.validate(type, payload)) {
          throw new VaultError("UNCATALOGED_EVENT", `Event "${type}" does not match the vault catalog`);
        }
        pending.push({
          type,
          metadata: {
            eventId: this._newId(),
            timestamp: this._clock().toISOString(),
            actor: caller,
            blockNumber: block,
            correlationId,
            source: schema.source,
          },
          payload,
        });
      },
    };
  }
}
