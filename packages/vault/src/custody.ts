/**
 * Custody — the vault's side of the TokenTransfers collaborator.
 *
 * Every physical token movement goes through here so that collaborator
 * failures surface as VaultErrors with the original error as `cause`.
 * Zero amounts never reach the collaborator.
 */

import type { Address, TokenAddress } from "@poolvault/types";
import type { TokenTransfers, VaultErrorCode } from "./types.js";
import { VaultError } from "./types.js";

/**
 * Run a collaborator call. VaultErrors pass through untouched (a
 * collaborator re-entering the vault, or a reference collaborator
 * reporting its own failure); anything else is wrapped under `code`.
 */
export function callCollaborator<T>(code: VaultErrorCode, what: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof VaultError) {
      throw err;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new VaultError(code, `${what} failed: ${reason}`, { cause: err });
  }
}

export class Custody {
  constructor(
    private readonly _transfers: TokenTransfers,
    readonly address: Address,
  ) {}

  pull(token: TokenAddress, from: Address, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    callCollaborator("TOKEN_TRANSFER_FAILED", `Pull of ${token} from ${from}`, () => {
      this._transfers.pull(token, from, amount);
    });
  }

  push(token: TokenAddress, to: Address, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    callCollaborator("TOKEN_TRANSFER_FAILED", `Push of ${token} to ${to}`, () => {
      this._transfers.push(token, to, amount);
    });
  }

  /** Tokens the vault physically holds. */
  balance(token: TokenAddress): bigint {
    return callCollaborator("TOKEN_TRANSFER_FAILED", `Balance of ${token}`, () =>
      this._transfers.balanceOf(token, this.address),
    );
  }

  begin(): void {
    callCollaborator("TOKEN_TRANSFER_FAILED", "Transfer transaction begin", () => {
      this._transfers.begin();
    });
  }

  commit(): void {
    callCollaborator("TOKEN_TRANSFER_FAILED", "Transfer transaction commit", () => {
      this._transfers.commit();
    });
  }

  rollback(): void {
    callCollaborator("TOKEN_TRANSFER_FAILED", "Transfer transaction rollback", () => {
      this._transfers.rollback();
    });
  }
}
