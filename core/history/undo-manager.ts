/**
 * Undo/redo stack management with time-based coalescing.
 *
 * Record behavior:
 * 1. Each applied transaction yields a reciprocal; reciprocals of one
 *    user-level edit are recorded together.
 * 2. Coalescing: if the previous edit was within the coalesce window and no
 *    group boundary was requested since, join the current group.
 * 3. Clear redo stack on new edit.
 * 4. Drop oldest group if stack exceeds maxUndoDepth.
 *
 * Undo replays a group's reciprocals in reverse order through
 * TextDocument.fulfill; what fulfill returns becomes the redo group.
 * A group replayed after the selection list changed (carets added, merged
 * or replaced) drops its targets, so every selection is re-anchored as a
 * sibling instead of overwriting whatever now sits at the recorded index.
 */

import type { Selection } from '../cursor/selection';
import type { TextDocument } from '../document/text-document';
import type { Transaction } from '../document/transaction';
import { logger } from '../logger';
import { DEFAULT_OPTIONS } from '../options';
import type { EditorOptions } from '../options';
import { createUndoGroup, recordable, sameSelections, untargeted } from './undo-group';
import type { UndoGroup } from './undo-group';

export type UndoOptions = Pick<EditorOptions, 'coalesceWindowMs' | 'maxUndoDepth'>;

/** Builds the transaction for selection `n`, or null to skip it. */
export type TransactionBuilder = (selection: Selection, n: number) => Transaction | null;

export class UndoManager {
  private undoStack: UndoGroup[] = [];
  private redoStack: UndoGroup[] = [];
  private groupOpen = false;
  private lastEditAt = 0;
  private readonly document: TextDocument;
  private readonly coalesceWindowMs: number;
  private readonly maxUndoDepth: number;

  constructor(document: TextDocument, options: Partial<UndoOptions> = {}) {
    this.document = document;
    this.coalesceWindowMs = options.coalesceWindowMs ?? DEFAULT_OPTIONS.coalesceWindowMs;
    this.maxUndoDepth = options.maxUndoDepth ?? DEFAULT_OPTIONS.maxUndoDepth;
  }

  /** Apply one transaction and record its reciprocal. */
  perform(transaction: Transaction): Transaction {
    const reciprocal = this.document.fulfill(transaction);
    this.record([reciprocal]);
    return reciprocal;
  }

  /**
   * One keystroke at every selection. Each transaction is built from the
   * live selection, after earlier edits have re-anchored it, and all of
   * them land in one group.
   */
  performAtSelections(build: TransactionBuilder): Transaction[] {
    const reciprocals: Transaction[] = [];
    for (let n = 0; n < this.document.numSelections; n++) {
      const transaction = build(this.document.getSelection(n), n);
      if (transaction) reciprocals.push(this.document.fulfill(transaction));
    }
    this.record(reciprocals);
    return reciprocals;
  }

  /** The next recorded edit starts a new group. */
  beginNewGroup(): void {
    this.groupOpen = false;
  }

  /**
   * Undo the last group.
   * @returns false if there was nothing to undo.
   */
  undo(): boolean {
    const group = this.undoStack.pop();
    if (!group) return false;
    this.redoStack.push(this.replay(group));
    this.groupOpen = false;
    return true;
  }

  /**
   * Redo the last undone group.
   * @returns false if there was nothing to redo.
   */
  redo(): boolean {
    const group = this.redoStack.pop();
    if (!group) return false;
    this.undoStack.push(this.replay(group));
    this.groupOpen = false;
    return true;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  /** Clear all history. */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.groupOpen = false;
  }

  private record(reciprocals: readonly Transaction[]): void {
    const transactions = recordable(reciprocals);
    if (transactions.length === 0) return;

    const now = Date.now();
    this.redoStack = [];

    const current = this.undoStack[this.undoStack.length - 1];
    if (current && this.groupOpen && now - this.lastEditAt <= this.coalesceWindowMs) {
      current.transactions.push(...transactions);
      current.timestamp = now;
      current.selections = this.document.getSelections();
    } else {
      this.undoStack.push(createUndoGroup(transactions, now, this.document.getSelections()));
      logger.debug(`undo group ${this.undoStack.length} opened`);
      if (this.undoStack.length > this.maxUndoDepth) {
        this.undoStack.shift();
        logger.debug(`undo history trimmed to ${this.maxUndoDepth} groups`);
      }
    }

    this.groupOpen = true;
    this.lastEditAt = now;
  }

  private replay(group: UndoGroup): UndoGroup {
    const stale = !sameSelections(group.selections, this.document.getSelections());
    if (stale) logger.debug('selections changed since the edit; replaying untargeted');

    const inverse: Transaction[] = [];
    for (let i = group.transactions.length - 1; i >= 0; i--) {
      const transaction = group.transactions[i];
      inverse.push(this.document.fulfill(stale ? untargeted(transaction) : transaction));
    }
    return createUndoGroup(inverse, Date.now(), this.document.getSelections());
  }
}
