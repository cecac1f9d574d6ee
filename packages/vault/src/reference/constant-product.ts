/**
 * ConstantProductStrategy — reference pool strategy (x · y = k).
 *
 * Prices against the balances the vault passes in and charges no fee of
 * its own. A trade that would leave less than `minBalance` of the token
 * out is reported as out of bounds.
 */

import type { PoolStrategy, SwapQuote, SwapRequest } from "../types.js";

export interface ConstantProductOptions {
  /** Smallest balance of the token out a trade may leave. Default: 1. */
  readonly minBalance?: bigint;
}

export class ConstantProductStrategy implements PoolStrategy {
  readonly minBalance: bigint;

  constructor(options: ConstantProductOptions = {}) {
    this.minBalance = options.minBalance ?? 1n;
  }

  onSwap(request: SwapRequest): SwapQuote {
    const { balanceIn, balanceOut, amount } = request;
    if (balanceIn === 0n || balanceOut === 0n) {
      throw new Error(`Pool ${request.poolId} has no liquidity for this pair`);
    }

    if (request.kind === "givenIn") {
      const amountOut = (balanceOut * amount) / (balanceIn + amount);
      return { amount: amountOut, withinBounds: balanceOut - amountOut >= this.minBalance };
    }

    if (amount >= balanceOut) {
      return { amount: 0n, withinBounds: false };
    }
    const numerator = balanceIn * amount;
    const denominator = balanceOut - amount;
    const amountIn = (numerator + denominator - 1n) / denominator;
    return { amount: amountIn, withinBounds: balanceOut - amount >= this.minBalance };
  }
}
