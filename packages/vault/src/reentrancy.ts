/**
 * Reentrancy Guard — one vault operation at a time.
 *
 * Every mutating vault entry point enters the guard before touching any
 * state and exits it on every path out. A second entry while the guard is
 * held (a collaborator calling back into the vault) fails immediately.
 */

import { VaultError } from "./types.js";

export class ReentrancyGuard {
  private _operation: string | undefined;

  get locked(): boolean {
    return this._operation !== undefined;
  }

  /** Name of the operation holding the guard, if any. */
  get operation(): string | undefined {
    return this._operation;
  }

  enter(operation: string): void {
    if (this._operation !== undefined) {
      throw new VaultError(
        "REENTRANCY_BLOCKED",
        `Cannot start ${operation} while ${this._operation} is in progress`,
      );
    }
    this._operation = operation;
  }

  exit(): void {
    this._operation = undefined;
  }

  /**
   * Run fn holding the guard. The guard is released however fn exits.
   */
  run<T>(operation: string, fn: () => T): T {
    this.enter(operation);
    try {
      return fn();
    } finally {
      this.exit();
    }
  }
}
