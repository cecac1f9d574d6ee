/**
 * @poolvault/ledger — Undo journal.
 *
 * The ledgers record an undo action for every mutation made while a
 * journal is open. Rolling back replays those actions newest-first, which
 * restores every touched entry to its state at begin(). Outside an open
 * journal, mutations are not recorded.
 *
 * One journal is shared by every ledger taking part in an operation, so a
 * single rollback() covers them all.
 */

import { LedgerError } from "./types.js";

export type UndoAction = () => void;

export class Journal {
  private _undo: UndoAction[] | undefined;

  /**
   * Whether a unit of work is open.
   */
  get active(): boolean {
    return this._undo !== undefined;
  }

  /**
   * Number of undo actions recorded in the open unit of work.
   */
  get depth(): number {
    return this._undo?.length ?? 0;
  }

  /**
   * Open a unit of work. Units do not nest.
   */
  begin(): void {
    if (this._undo !== undefined) {
      throw new LedgerError("JOURNAL_STATE", "Journal already has an open unit of work");
    }
    this._undo = [];
  }

  /**
   * Record how to revert a mutation that has just been applied.
   */
  record(undo: UndoAction): void {
    this._undo?.push(undo);
  }

  /**
   * Keep every mutation made since begin().
   */
  commit(): void {
    if (this._undo === undefined) {
      throw new LedgerError("JOURNAL_STATE", "No open unit of work to commit");
    }
    this._undo = undefined;
  }

  /**
   * Revert every mutation made since begin(), newest first.
   */
  rollback(): void {
    const undo = this._undo;
    if (undo === undefined) {
      throw new LedgerError("JOURNAL_STATE", "No open unit of work to roll back");
    }
    this._undo = undefined;
    for (let i = undo.length - 1; i >= 0; i--) {
      undo[i]?.();
    }
  }
}
