/**
 * Undo group: the reciprocals recorded for one user-level edit.
 */

import type { Selection } from '../cursor/selection';
import { isNoOp } from '../document/transaction';
import type { Transaction } from '../document/transaction';

export interface UndoGroup {
  /** Reciprocals in the order their forward edits were applied. */
  transactions: Transaction[];
  /** When the last transaction joined the group (ms since epoch). */
  timestamp: number;
  /**
   * The selection list the reciprocals were recorded against. Their
   * targets index into this list and mean nothing once it changes.
   */
  selections: readonly Selection[];
}

export function createUndoGroup(
  transactions: Transaction[],
  timestamp: number,
  selections: readonly Selection[],
): UndoGroup {
  return { transactions: [...transactions], timestamp, selections: [...selections] };
}

export function sameSelections(a: readonly Selection[], b: readonly Selection[]): boolean {
  return a.length === b.length && a.every((s, n) => s.equals(b[n]));
}

/** The same edit with no selection to re-anchor. */
export function untargeted(transaction: Transaction): Transaction {
  return { ...transaction, target: undefined };
}

/** Reciprocals of no-op edits carry nothing to undo. */
export function recordable(transactions: readonly Transaction[]): Transaction[] {
  return transactions.filter(t => !isNoOp(t));
}
