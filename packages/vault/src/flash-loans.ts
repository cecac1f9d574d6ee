/**
 * Flash Loans — uncollateralized loans repaid within the same operation.
 *
 * The vault lends out of its own token balance, hands control to the
 * receiver, and checks afterwards that each balance came back with the
 * fee on top. The operation scope stays open during the callback, so a
 * receiver calling back into the vault is refused.
 */

import type { TokenAddress } from "@poolvault/types";
import { assertAmount, formatAmount, toAddress } from "@poolvault/ledger";
import type { Custody } from "./custody.js";
import { callCollaborator } from "./custody.js";
import type { ProtocolFeesCollector } from "./protocol-fees.js";
import type { FlashLoanRequest, FlashLoanResult, OperationContext } from "./types.js";
import { VaultError } from "./types.js";

export class FlashLoanDesk {
  constructor(
    private readonly _custody: Custody,
    private readonly _fees: ProtocolFeesCollector,
  ) {}

  flashLoan(ctx: OperationContext, request: FlashLoanRequest): FlashLoanResult {
    const { receiver } = request;
    if (request.tokens.length !== request.amounts.length) {
      throw new VaultError(
        "LENGTH_MISMATCH",
        `Got ${request.tokens.length} tokens and ${request.amounts.length} amounts`,
      );
    }
    const borrower = toAddress(receiver.address, "receiver");

    const tokens: TokenAddress[] = [];
    const seen = new Set<TokenAddress>();
    for (const raw of request.tokens) {
      const token = toAddress(raw, "token");
      if (seen.has(token)) {
        throw new VaultError("DUPLICATE_ASSET", `${token} is borrowed more than once`);
      }
      seen.add(token);
      tokens.push(token);
    }

    const amounts = request.amounts;
    const feeAmounts: bigint[] = [];
    const before: bigint[] = [];
    tokens.forEach((token, i) => {
      const amount = amounts[i] ?? 0n;
      assertAmount(amount);
      const held = this._custody.balance(token);
      if (amount > held) {
        throw new VaultError(
          "INSUFFICIENT_FLASH_LOAN_BALANCE",
          `Cannot lend ${amount.toString()} of ${token}: the vault holds ${held.toString()}`,
        );
      }
      feeAmounts.push(this._fees.flashLoanFeeAmount(amount));
      before.push(held);
      this._custody.push(token, borrower, amount);
    });

    callCollaborator("FLASH_LOAN_RECEIVER_FAILED", `Flash loan receiver ${borrower}`, () => {
      receiver.receiveFlashLoan(tokens, amounts, feeAmounts, request.data ?? "");
    });

    const collected = tokens.map((token, i) => {
      const start = before[i] ?? 0n;
      const fee = feeAmounts[i] ?? 0n;
      const after = this._custody.balance(token);
      if (after < start + fee) {
        throw new VaultError(
          "FLASH_LOAN_NOT_REPAID",
          `${token}: expected at least ${(start + fee).toString()} back, the vault holds ${after.toString()}`,
        );
      }
      const received = after - start;
      this._fees.collect(token, received);
      ctx.emit("flash-loan.executed", {
        receiver: borrower,
        token,
        amount: formatAmount(amounts[i] ?? 0n),
        fee: formatAmount(received),
      });
      return received;
    });

    return { feeAmounts, collected };
  }
}
