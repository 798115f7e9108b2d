/**
 * Transactions: an edit request (target selection + replacement text).
 *
 * A transaction is an immutable value. Applying one through
 * TextDocument.fulfill yields its reciprocal, another transaction that
 * exactly undoes it; the history only ever stores reciprocals.
 */

import type { Index, Selection } from '../cursor/selection';

/** Special single-character edit codes produced by the host's key layer. */
export const EditCode = {
  backspace: '\b',
  delete: '\x7f',
  tab: '\t',
} as const;

export type TransactionDirection = 'forward' | 'reverse';

/** Opaque invalidation hint for the presentation layer. */
export interface AffectedArea {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const UNBOUNDED_AREA: Readonly<AffectedArea> = Object.freeze({
  x: 0,
  y: 0,
  width: Infinity,
  height: Infinity,
});

export interface Transaction {
  readonly selection: Selection;
  /** Replacement text; '\n' splits it into rows. */
  readonly content: string;
  readonly direction: TransactionDirection;
  /** Index of the document selection this edit was built from. */
  readonly target?: number;
  readonly affectedArea?: Readonly<AffectedArea>;
}

export function createTransaction(
  selection: Selection,
  content: string,
  target?: number,
): Transaction {
  return { selection, content, direction: 'forward', target };
}

export function flipDirection(direction: TransactionDirection): TransactionDirection {
  return direction === 'forward' ? 'reverse' : 'forward';
}

/** A transaction that changes nothing: singular selection, empty content. */
export function isNoOp(transaction: Transaction): boolean {
  return transaction.selection.isSingular() && transaction.content.length === 0;
}

/** Index stepping used to widen a caret for backspace/delete. */
export interface CharacterStepper {
  prev(at: Index): Index;
  nextWithinDocument(at: Index): Index;
}

/**
 * Rewrite a trailing special code as plain replacement semantics:
 * - tab becomes `tabSize` spaces;
 * - backspace clears the content and, on a caret, widens the selection one
 *   position back;
 * - delete does the same one position forward.
 */
export function normalizeTransaction(
  transaction: Transaction,
  stepper: CharacterStepper,
  tabSize: number,
): Transaction {
  const { content, selection } = transaction;
  const last = content.slice(-1);

  if (last === EditCode.tab) {
    return { ...transaction, content: content.slice(0, -1) + ' '.repeat(tabSize) };
  }
  if (last === EditCode.backspace) {
    const widened = selection.isSingular() ? selection.withHead(stepper.prev(selection.head)) : selection;
    return { ...transaction, selection: widened, content: '' };
  }
  if (last === EditCode.delete) {
    const widened = selection.isSingular()
      ? selection.withHead(stepper.nextWithinDocument(selection.head))
      : selection;
    return { ...transaction, selection: widened, content: '' };
  }
  return transaction;
}
