import type { Address } from "@poolvault/types";
import { toAddress } from "@poolvault/ledger";
import type { PoolStrategy, StrategyDirectory } from "../types.js";

/**
 * Strategies registered by controller address.
 */
export class StaticStrategyDirectory implements StrategyDirectory {
  private readonly _strategies = new Map<Address, PoolStrategy>();

  register(controller: Address, strategy: PoolStrategy): void {
    this._strategies.set(toAddress(controller, "controller"), strategy);
  }

  resolve(controller: Address): PoolStrategy | undefined {
    return this._strategies.get(toAddress(controller, "controller"));
  }
}
