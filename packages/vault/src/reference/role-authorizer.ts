/**
 * RoleAuthorizer — reference Authorizer.
 *
 * Grants individual vault actions to accounts. An optional admin may
 * perform every action.
 */

import type { Address } from "@poolvault/types";
import { toAddress } from "@poolvault/ledger";
import type { Authorizer, VaultAction } from "../types.js";

export class RoleAuthorizer implements Authorizer {
  private readonly _grants = new Map<VaultAction, Set<Address>>();
  private readonly _admin: Address | undefined;

  constructor(admin?: Address) {
    this._admin = admin === undefined ? undefined : toAddress(admin, "admin");
  }

  grant(action: VaultAction, account: Address): void {
    let holders = this._grants.get(action);
    if (holders === undefined) {
      holders = new Set();
      this._grants.set(action, holders);
    }
    holders.add(toAddress(account, "account"));
  }

  revoke(action: VaultAction, account: Address): void {
    this._grants.get(action)?.delete(toAddress(account, "account"));
  }

  canPerform(action: VaultAction, account: Address): boolean {
    const key = toAddress(account, "account");
    return key === this._admin || this._grants.get(action)?.has(key) === true;
  }
}
