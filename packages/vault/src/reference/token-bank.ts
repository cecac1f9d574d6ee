/**
 * InMemoryTokenBank — reference TokenTransfers collaborator.
 *
 * Holds per-token account balances and allowances toward one custodian
 * (the vault). Transactions snapshot the whole bank on begin() and
 * restore it on rollback(). Transactions do not nest.
 */

import type { Address, TokenAddress } from "@poolvault/types";
import { assertAmount, checkedAdd, toAddress } from "@poolvault/ledger";
import type { TokenTransfers } from "../types.js";
import { VaultError } from "../types.js";

type Book = Map<TokenAddress, Map<Address, bigint>>;

interface BankState {
  readonly balances: Book;
  readonly allowances: Book;
}

function copyBook(book: Book): Book {
  return new Map([...book].map(([token, accounts]) => [token, new Map(accounts)]));
}

export class InMemoryTokenBank implements TokenTransfers {
  readonly custodian: Address;
  private _balances: Book = new Map();
  private _allowances: Book = new Map();
  private _snapshot: BankState | undefined;

  constructor(custodian: Address) {
    this.custodian = toAddress(custodian, "custodian");
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /** Create tokens out of nothing. Sandbox and test use only. */
  mint(token: TokenAddress, to: Address, amount: bigint): void {
    assertAmount(amount);
    const account = toAddress(to, "to");
    this._setBalance(token, account, checkedAdd(this.balanceOf(token, account), amount));
  }

  /** Let the custodian pull up to `amount` of `owner`'s tokens. */
  approve(token: TokenAddress, owner: Address, amount: bigint): void {
    assertAmount(amount);
    this._set(this._allowances, token, toAddress(owner, "owner"), amount);
  }

  allowance(token: TokenAddress, owner: Address): bigint {
    return this._get(this._allowances, token, toAddress(owner, "owner"));
  }

  balanceOf(token: TokenAddress, account: Address): bigint {
    return this._get(this._balances, token, toAddress(account, "account"));
  }

  /** Direct account-to-account transfer, outside the custodian. */
  transfer(token: TokenAddress, from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const source = toAddress(from, "from");
    const target = toAddress(to, "to");
    const held = this.balanceOf(token, source);
    if (amount > held) {
      throw new VaultError(
        "INSUFFICIENT_TOKEN_BALANCE",
        `${source} holds ${held.toString()} of ${token}, ${amount.toString()} requested`,
      );
    }
    this._setBalance(token, source, held - amount);
    this._setBalance(token, target, checkedAdd(this.balanceOf(token, target), amount));
  }

  // ─── TokenTransfers ──────────────────────────────────────────────────

  pull(token: TokenAddress, from: Address, amount: bigint): void {
    const owner = toAddress(from, "from");
    const allowed = this.allowance(token, owner);
    if (amount > allowed) {
      throw new VaultError(
        "INSUFFICIENT_ALLOWANCE",
        `${owner} allows ${allowed.toString()} of ${token}, ${amount.toString()} requested`,
      );
    }
    this.transfer(token, owner, this.custodian, amount);
    this._set(this._allowances, token, owner, allowed - amount);
  }

  push(token: TokenAddress, to: Address, amount: bigint): void {
    this.transfer(token, this.custodian, to, amount);
  }

  begin(): void {
    if (this._snapshot !== undefined) {
      throw new VaultError("TRANSACTION_STATE", "A token bank transaction is already open");
    }
    this._snapshot = { balances: copyBook(this._balances), allowances: copyBook(this._allowances) };
  }

  commit(): void {
    if (this._snapshot === undefined) {
      throw new VaultError("TRANSACTION_STATE", "No token bank transaction to commit");
    }
    this._snapshot = undefined;
  }

  rollback(): void {
    const snapshot = this._snapshot;
    if (snapshot === undefined) {
      throw new VaultError("TRANSACTION_STATE", "No token bank transaction to roll back");
    }
    this._balances = snapshot.balances;
    this._allowances = snapshot.allowances;
    this._snapshot = undefined;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _setBalance(token: TokenAddress, account: Address, value: bigint): void {
    this._set(this._balances, token, account, value);
  }

  private _get(book: Book, token: TokenAddress, account: Address): bigint {
    return book.get(toAddress(token, "token"))?.get(account) ?? 0n;
  }

  private _set(book: Book, token: TokenAddress, account: Address, value: bigint): void {
    const key = toAddress(token, "token");
    let accounts = book.get(key);
    if (accounts === undefined) {
      accounts = new Map();
      book.set(key, accounts);
    }
    if (value === 0n) {
      accounts.delete(account);
    } else {
      accounts.set(account, value);
    }
  }
}
