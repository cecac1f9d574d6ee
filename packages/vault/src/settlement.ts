/**
 * Settlement Engine — batched swaps with net settlement.
 *
 * Steps run strictly in order against the pool ledgers. Each step only
 * moves accounting: the pool's cash changes and the step's amounts are
 * folded into one signed delta per asset. Physical movement happens once
 * per asset after the last step:
 *
 *   delta > 0  the sender owes the vault (user balance first, then pull)
 *   delta < 0  the vault owes the recipient (user balance or push)
 *
 * A batch whose steps net to zero or negative for every asset is valid.
 * Each step has already been priced by its own pool.
 */

import type { Address, PoolRecord, TokenAddress } from "@poolvault/types";
import { ZERO_ADDRESS } from "@poolvault/types";
import type { PoolBalanceLedger, UserBalanceLedger } from "@poolvault/ledger";
import { assertAmount, formatAmount, toAddress, totalBalance } from "@poolvault/ledger";
import type { Custody } from "./custody.js";
import { callCollaborator } from "./custody.js";
import type { PoolRegistry } from "./pool-registry.js";
import type { ProtocolFeesCollector } from "./protocol-fees.js";
import type {
  BatchSwapRequest,
  BatchSwapResult,
  FundManagement,
  OperationContext,
  QueryBatchSwapRequest,
  StrategyDirectory,
  SwapKind,
  SwapResult,
  SwapStep,
} from "./types.js";
import { VaultError } from "./types.js";

export interface SettlementDeps {
  readonly registry: PoolRegistry;
  readonly pools: PoolBalanceLedger;
  readonly users: UserBalanceLedger;
  readonly custody: Custody;
  readonly fees: ProtocolFeesCollector;
  readonly strategies: StrategyDirectory;
}

/** A step with its tokens resolved and its amount known. */
interface ResolvedStep {
  readonly pool: PoolRecord;
  readonly inIndex: number;
  readonly outIndex: number;
  readonly tokenIn: TokenAddress;
  readonly tokenOut: TokenAddress;
  readonly amount: bigint;
  readonly userData: string;
}

interface PricedStep {
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly fee: bigint;
}

export class SettlementEngine {
  constructor(private readonly _deps: SettlementDeps) {}

  /**
   * Run every step, then settle the net deltas with the sender and
   * recipient named in `funds`.
   */
  batchSwap(ctx: OperationContext, request: BatchSwapRequest): BatchSwapResult {
    const assets = normalizeAssets(request.assets);
    if (request.limits !== undefined && request.limits.length !== assets.length) {
      throw new VaultError(
        "LENGTH_MISMATCH",
        `Got ${assets.length} assets and ${request.limits.length} limits`,
      );
    }
    const sender = toAddress(request.funds.sender, "sender");
    if (!this._deps.users.isAgentFor(sender, ctx.caller)) {
      throw new VaultError("SENDER_NOT_AGENT", `${ctx.caller} is not an agent of ${sender}`);
    }
    const recipient = toAddress(request.funds.recipient, "recipient");

    const { deltas, swaps } = this._runSteps(ctx, request.kind, request.steps, assets, sender, recipient);

    if (request.limits !== undefined) {
      checkLimits(assets, deltas, request.limits);
    }
    this._settle(assets, deltas, { ...request.funds, sender, recipient });

    ctx.emit("batch.settled", {
      kind: request.kind,
      sender,
      recipient,
      assets,
      deltas: deltas.map((d) => d.toString()),
    });
    return { deltas, swaps };
  }

  /**
   * Price a batch without settling it. The caller is expected to discard
   * the operation's ledger changes afterwards.
   */
  queryBatchSwap(ctx: OperationContext, request: QueryBatchSwapRequest): readonly bigint[] {
    const assets = normalizeAssets(request.assets);
    return this._runSteps(ctx, request.kind, request.steps, assets, ZERO_ADDRESS, ZERO_ADDRESS).deltas;
  }

  // ====================================================================
  // Steps
  // ====================================================================

  private _runSteps(
    ctx: OperationContext,
    kind: SwapKind,
    steps: readonly SwapStep[],
    assets: readonly TokenAddress[],
    from: Address,
    to: Address,
  ): BatchSwapResult {
    const deltas: bigint[] = assets.map(() => 0n);
    const swaps: SwapResult[] = [];
    let previous: { step: ResolvedStep; priced: PricedStep } | undefined;

    steps.forEach((step, position) => {
      const resolved = this._resolveStep(kind, step, position, assets, previous);
      const priced = this._price(kind, resolved, from, to);
      this._apply(ctx, resolved, priced);

      deltas[resolved.inIndex] = (deltas[resolved.inIndex] ?? 0n) + priced.amountIn;
      deltas[resolved.outIndex] = (deltas[resolved.outIndex] ?? 0n) - priced.amountOut;
      swaps.push({
        poolId: resolved.pool.id,
        tokenIn: resolved.tokenIn,
        tokenOut: resolved.tokenOut,
        amountIn: priced.amountIn,
        amountOut: priced.amountOut,
        fee: priced.fee,
      });
      previous = { step: resolved, priced };
    });

    return { deltas, swaps };
  }

  private _resolveStep(
    kind: SwapKind,
    step: SwapStep,
    position: number,
    assets: readonly TokenAddress[],
    previous: { step: ResolvedStep; priced: PricedStep } | undefined,
  ): ResolvedStep {
    const tokenIn = assetAt(assets, step.assetInIndex, position);
    const tokenOut = assetAt(assets, step.assetOutIndex, position);
    if (step.assetInIndex === step.assetOutIndex) {
      throw new VaultError("CANNOT_SWAP_SAME_TOKEN", `Step ${position} swaps ${tokenIn} for itself`);
    }
    const pool = this._deps.registry.requirePool(step.poolId);
    assertAmount(step.amount, `step ${position} amount`);

    let amount = step.amount;
    if (amount === 0n) {
      if (previous === undefined) {
        throw new VaultError(
          "UNKNOWN_AMOUNT_IN_FIRST_SWAP",
          "The first step of a batch must name its amount",
        );
      }
      amount = chainedAmount(kind, step, position, previous);
    }

    for (const token of [tokenIn, tokenOut]) {
      if (!this._deps.pools.hasToken(pool.id, token)) {
        throw new VaultError("TOKEN_NOT_IN_POOL", `${token} is not in pool ${pool.id}`);
      }
    }

    return {
      pool,
      inIndex: step.assetInIndex,
      outIndex: step.assetOutIndex,
      tokenIn,
      tokenOut,
      amount,
      userData: step.userData ?? "",
    };
  }

  /**
   * Ask the pool's strategy for the counter-amount and split out the
   * protocol swap fee, which is always taken in tokenIn.
   */
  private _price(kind: SwapKind, step: ResolvedStep, from: Address, to: Address): PricedStep {
    const { pool, tokenIn, tokenOut } = step;
    const strategy = this._deps.strategies.resolve(pool.controller);
    if (strategy === undefined) {
      throw new VaultError(
        "SWAP_REJECTED_BY_POOL",
        `No strategy is known for controller ${pool.controller}`,
      );
    }

    const balanceIn = totalBalance(this._deps.pools.getBalance(pool.id, tokenIn));
    const balanceOut = totalBalance(this._deps.pools.getBalance(pool.id, tokenOut));

    let fee: bigint;
    let quoted: bigint;
    if (kind === "givenIn") {
      fee = this._deps.fees.swapFeeAmount(step.amount);
      quoted = step.amount - fee;
    } else {
      fee = 0n;
      quoted = step.amount;
    }

    const quote = callCollaborator("SWAP_REJECTED_BY_POOL", `Swap pricing in pool ${pool.id}`, () =>
      strategy.onSwap({
        kind,
        poolId: pool.id,
        tokenIn,
        tokenOut,
        amount: quoted,
        balanceIn,
        balanceOut,
        from,
        to,
        userData: step.userData,
      }),
    );
    if (typeof quote.amount !== "bigint" || quote.amount < 0n) {
      throw new VaultError(
        "SWAP_REJECTED_BY_POOL",
        `Pool ${pool.id} returned an invalid amount: ${String(quote.amount)}`,
      );
    }
    if (!quote.withinBounds) {
      throw new VaultError(
        "INSUFFICIENT_POOL_LIQUIDITY",
        `Pool ${pool.id} rejected the trade as outside its bounds`,
      );
    }

    let amountIn: bigint;
    let amountOut: bigint;
    if (kind === "givenIn") {
      amountIn = step.amount;
      amountOut = quote.amount;
    } else {
      amountIn = this._deps.fees.grossUpForSwapFee(quote.amount);
      amountOut = step.amount;
      fee = amountIn - quote.amount;
    }

    const cashOut = this._deps.pools.getBalance(pool.id, tokenOut).cash;
    if (amountOut > cashOut) {
      throw new VaultError(
        "INSUFFICIENT_POOL_LIQUIDITY",
        `Pool ${pool.id} holds ${cashOut.toString()} of ${tokenOut} in cash, ${amountOut.toString()} requested`,
      );
    }
    return { amountIn, amountOut, fee };
  }

  private _apply(ctx: OperationContext, step: ResolvedStep, priced: PricedStep): void {
    const { pool, tokenIn, tokenOut } = step;
    this._deps.pools.increaseCash(pool.id, tokenIn, priced.amountIn - priced.fee, ctx.block);
    this._deps.pools.decreaseCash(pool.id, tokenOut, priced.amountOut, ctx.block);
    this._deps.fees.collect(tokenIn, priced.fee);

    ctx.emit("swap.executed", {
      poolId: pool.id,
      tokenIn,
      tokenOut,
      amountIn: formatAmount(priced.amountIn),
      amountOut: formatAmount(priced.amountOut),
      fee: formatAmount(priced.fee),
    });
  }

  // ====================================================================
  // Settlement
  // ====================================================================

  private _settle(assets: readonly TokenAddress[], deltas: readonly bigint[], funds: FundManagement): void {
    assets.forEach((token, i) => {
      const delta = deltas[i] ?? 0n;
      if (delta > 0n) {
        const drawn = funds.fromUserBalance
          ? this._deps.users.debitUpTo(funds.sender, token, delta)
          : 0n;
        this._deps.custody.pull(token, funds.sender, delta - drawn);
      } else if (delta < 0n) {
        const owed = -delta;
        if (funds.toUserBalance) {
          this._deps.users.deposit(funds.recipient, token, owed);
        } else {
          this._deps.custody.push(token, funds.recipient, owed);
        }
      }
    });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function normalizeAssets(assets: readonly TokenAddress[]): TokenAddress[] {
  const seen = new Set<TokenAddress>();
  return assets.map((raw) => {
    const token = toAddress(raw, "asset");
    if (seen.has(token)) {
      throw new VaultError("DUPLICATE_ASSET", `${token} appears more than once in the asset list`);
    }
    seen.add(token);
    return token;
  });
}

function assetAt(assets: readonly TokenAddress[], index: number, position: number): TokenAddress {
  const token = Number.isInteger(index) ? assets[index] : undefined;
  if (token === undefined) {
    throw new VaultError(
      "INDEX_OUT_OF_RANGE",
      `Step ${position} refers to asset ${index}; there are ${assets.length} assets`,
    );
  }
  return token;
}

/**
 * Amount of a step that continues the previous one. givenIn passes the
 * previous amount out forward; givenOut passes the previous amount in
 * backward.
 */
function chainedAmount(
  kind: SwapKind,
  step: SwapStep,
  position: number,
  previous: { step: ResolvedStep; priced: PricedStep },
): bigint {
  const continues =
    kind === "givenIn"
      ? previous.step.outIndex === step.assetInIndex
      : previous.step.inIndex === step.assetOutIndex;
  if (!continues) {
    throw new VaultError(
      "MALFORMED_SWAP_CHAIN",
      `Step ${position} does not continue the token of step ${position - 1}`,
    );
  }
  return kind === "givenIn" ? previous.priced.amountOut : previous.priced.amountIn;
}

function checkLimits(
  assets: readonly TokenAddress[],
  deltas: readonly bigint[],
  limits: readonly bigint[],
): void {
  assets.forEach((token, i) => {
    const delta = deltas[i] ?? 0n;
    const limit = limits[i] ?? 0n;
    if (delta > limit) {
      throw new VaultError(
        "SWAP_LIMIT_EXCEEDED",
        `Net ${delta.toString()} of ${token} exceeds the limit ${limit.toString()}`,
      );
    }
  });
}
