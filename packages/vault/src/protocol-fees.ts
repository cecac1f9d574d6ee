/**
 * Protocol Fees — fee percentages and the fees the vault has collected.
 *
 * Three percentages, 18-decimal fixed point:
 * - swap fee: charged on the amount in of every swap step
 * - flash-loan fee: charged on every amount lent
 * - withdraw fee: charged on every amount leaving the vault through
 *   withdraw, removeLiquidity (when pushed out) or divest
 *
 * Fee amounts round up. Changing a percentage and paying out collected
 * fees are gated by the Authorizer.
 */

import type { Address, TokenAddress } from "@poolvault/types";
import type { Journal } from "@poolvault/ledger";
import { assertAmount, checkedAdd, divUp, formatAmount, mulUp, ONE, toAddress } from "@poolvault/ledger";
import type { Custody } from "./custody.js";
import type { Authorizer, OperationContext, ProtocolFees, VaultAction } from "./types.js";
import { VaultError } from "./types.js";

/** 50% */
export const MAX_SWAP_FEE = ONE / 2n;

/** 1% */
export const MAX_FLASH_LOAN_FEE = ONE / 100n;

/** 0.5% */
export const MAX_WITHDRAW_FEE = ONE / 200n;

export type FeeKind = "swap" | "flashLoan" | "withdraw";

const FEE_LIMITS: Readonly<Record<FeeKind, { readonly max: bigint; readonly action: VaultAction }>> = {
  swap: { max: MAX_SWAP_FEE, action: "setSwapFee" },
  flashLoan: { max: MAX_FLASH_LOAN_FEE, action: "setFlashLoanFee" },
  withdraw: { max: MAX_WITHDRAW_FEE, action: "setWithdrawFee" },
};

export class ProtocolFeesCollector {
  private readonly _fees: Record<FeeKind, bigint> = { swap: 0n, flashLoan: 0n, withdraw: 0n };
  private readonly _collected = new Map<TokenAddress, bigint>();

  constructor(
    private readonly _journal: Journal,
    private readonly _authorizer: Authorizer,
    private readonly _custody: Custody,
  ) {}

  // ─── Percentages ─────────────────────────────────────────────────────

  getProtocolFees(): ProtocolFees {
    return {
      swapFee: this._fees.swap,
      flashLoanFee: this._fees.flashLoan,
      withdrawFee: this._fees.withdraw,
    };
  }

  /**
   * Set one fee percentage. Throws SENDER_NOT_ALLOWED without the matching
   * action, FEE_TOO_HIGH above its maximum.
   */
  setFee(ctx: OperationContext, kind: FeeKind, fee: bigint): void {
    const { max, action } = FEE_LIMITS[kind];
    this._requireAction(ctx.caller, action);
    assertAmount(fee, `${kind} fee`);
    if (fee > max) {
      throw new VaultError(
        "FEE_TOO_HIGH",
        `The ${kind} fee ${fee.toString()} exceeds the maximum ${max.toString()}`,
      );
    }

    const previous = this._fees[kind];
    this._fees[kind] = fee;
    this._journal.record(() => {
      this._fees[kind] = previous;
    });
    ctx.emit("fees.updated", { kind, fee: formatAmount(fee) });
  }

  // ─── Fee amounts ─────────────────────────────────────────────────────

  /** Fee on the amount in of a swap whose amount in is known. */
  swapFeeAmount(amountIn: bigint): bigint {
    return mulUp(amountIn, this._fees.swap);
  }

  /**
   * Gross amount in such that what remains after the swap fee covers
   * `netIn`.
   */
  grossUpForSwapFee(netIn: bigint): bigint {
    if (this._fees.swap === 0n) {
      return netIn;
    }
    return divUp(netIn, ONE - this._fees.swap);
  }

  flashLoanFeeAmount(amount: bigint): bigint {
    return mulUp(amount, this._fees.flashLoan);
  }

  withdrawFeeAmount(amount: bigint): bigint {
    return mulUp(amount, this._fees.withdraw);
  }

  // ─── Collected fees ──────────────────────────────────────────────────

  getCollectedFee(token: TokenAddress): bigint {
    return this._collected.get(toAddress(token, "token")) ?? 0n;
  }

  getCollectedFees(tokens: readonly TokenAddress[]): readonly bigint[] {
    return tokens.map((token) => this.getCollectedFee(token));
  }

  /**
   * Record fee tokens that are already in vault custody.
   */
  collect(token: TokenAddress, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    const key = toAddress(token, "token");
    this._set(key, checkedAdd(this.getCollectedFee(key), amount));
  }

  /**
   * Pay collected fees out to a recipient.
   */
  withdrawCollectedFees(
    ctx: OperationContext,
    tokens: readonly TokenAddress[],
    amounts: readonly bigint[],
    recipient: Address,
  ): void {
    this._requireAction(ctx.caller, "withdrawCollectedFees");
    if (tokens.length !== amounts.length) {
      throw new VaultError(
        "LENGTH_MISMATCH",
        `Got ${tokens.length} tokens and ${amounts.length} amounts`,
      );
    }
    const to = toAddress(recipient, "recipient");

    tokens.forEach((token, i) => {
      const amount = amounts[i] ?? 0n;
      assertAmount(amount);
      const key = toAddress(token, "token");
      const available = this.getCollectedFee(key);
      if (amount > available) {
        throw new VaultError(
          "INSUFFICIENT_COLLECTED_FEES",
          `Cannot withdraw ${amount.toString()} of ${key}: ${available.toString()} collected`,
        );
      }
      this._set(key, available - amount);
      this._custody.push(key, to, amount);
      ctx.emit("fees.withdrawn", { token: key, amount: formatAmount(amount), recipient: to });
    });
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _requireAction(caller: Address, action: VaultAction): void {
    if (!this._authorizer.canPerform(action, caller)) {
      throw new VaultError("SENDER_NOT_ALLOWED", `${caller} may not ${action}`);
    }
  }

  private _set(token: TokenAddress, value: bigint): void {
    const previous = this._collected.get(token);
    if (value === 0n) {
      this._collected.delete(token);
    } else {
      this._collected.set(token, value);
    }
    this._journal.record(() => {
      if (previous === undefined) {
        this._collected.delete(token);
      } else {
        this._collected.set(token, previous);
      }
    });
  }
}
