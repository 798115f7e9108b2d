/**
 * TextDocument: one LineStore, an ordered list of selections and a style
 * token per character.
 *
 * `fulfill` is the only method that changes text. Navigation is pure and
 * returns new selection arrays; the stored list changes only through
 * setSelections and as a side effect of `fulfill` re-anchoring siblings.
 */

import { LineStore, splitLines } from '../buffer/line-store';
import { assertColumn, assertRow, BufferRangeError } from '../errors';
import { logger } from '../logger';
import { DEFAULT_OPTIONS } from '../options';
import { Selection, index, indexEquals } from '../cursor/selection';
import type { ColumnRange, Index, RowMeasure, SelectionTuple } from '../cursor/selection';
import type { Navigation } from '../cursor/navigation';
import { getWordAtColumn, isWhitespace } from '../cursor/word-boundary';
import { UNBOUNDED_AREA, flipDirection, normalizeTransaction } from './transaction';
import type { CharacterStepper, Transaction } from './transaction';

export type DocumentChange =
  | { type: 'reset' }
  /** Rows [row, row + removed) were replaced by `inserted` rows. */
  | { type: 'rows'; row: number; removed: number; inserted: number }
  /** Style tokens changed on rows [fromRow, toRow]. */
  | { type: 'style'; fromRow: number; toRow: number };

export type DocumentChangeListener = (change: DocumentChange) => void;

/** Everything needed to restore a document exactly. */
export interface DocumentState {
  lines: string[];
  selections: SelectionTuple[];
}

export interface RowColumnRange extends ColumnRange {
  row: number;
}

export interface TextDocumentOptions {
  tabSize: number;
}

export class TextDocument implements RowMeasure, CharacterStepper {
  private readonly lines: LineStore;
  private tokens: number[][];
  private selections: Selection[];
  private listeners: DocumentChangeListener[] = [];
  private readonly tabSize: number;

  constructor(content: string = '', options: Partial<TextDocumentOptions> = {}) {
    this.tabSize = options.tabSize ?? DEFAULT_OPTIONS.tabSize;
    this.lines = LineStore.fromText(content);
    this.tokens = this.lines.toArray().map(line => zeros(line.length));
    this.selections = [Selection.caret(index(0, 0))];
  }

  // === Content ===

  /** Replace the whole document and reseed a single caret at the start. */
  replaceAll(content: string): void {
    const rows = splitLines(content);
    this.lines.reset(rows);
    this.tokens = rows.map(line => zeros(line.length));
    this.selections = [Selection.caret(index(0, 0))];
    logger.debug(`document reset to ${rows.length} rows`);
    this.emit({ type: 'reset' });
  }

  get numRows(): number {
    return this.lines.numRows;
  }

  getNumColumns(row: number): number {
    return this.lines.getNumColumns(row);
  }

  getLine(row: number): string {
    return this.lines.getLine(row);
  }

  getText(): string {
    return this.lines.getText();
  }

  /** One past the last character: (numRows, 0). */
  getEnd(): Index {
    return index(this.lines.numRows, 0);
  }

  isEnd(at: Index): boolean {
    return indexEquals(at, this.getEnd());
  }

  /** Character at `at`; a virtual '\n' at line ends and at the end sentinel. */
  getCharacter(at: Index): string {
    this.assertIndex(at, true);
    if (at.row === this.lines.numRows) return '\n';
    const line = this.lines.getLine(at.row);
    return at.column === line.length ? '\n' : line[at.column];
  }

  // === Selections ===

  get numSelections(): number {
    return this.selections.length;
  }

  getSelection(n: number): Selection {
    if (!Number.isInteger(n) || n < 0 || n >= this.selections.length) {
      throw new RangeError(`selection ${n} out of range [0, ${this.selections.length})`);
    }
    return this.selections[n];
  }

  /**
   * Current selections, or, given a navigation, the selections that
   * navigation would produce. Never mutates the document.
   */
  getSelections(navigation: Navigation = 'identity', fixingTail: boolean = false): Selection[] {
    if (navigation === 'identity') {
      return this.selections.map(s => new Selection(s.head, s.tail));
    }
    return this.selections.map(s => this.navigateSelection(s, navigation, fixingTail));
  }

  setSelections(selections: readonly Selection[]): void {
    if (selections.length === 0) {
      throw new RangeError('a document needs at least one selection');
    }
    for (const s of selections) this.assertSelection(s);
    this.selections = [...selections];
  }

  setSelection(n: number, selection: Selection): void {
    this.getSelection(n);
    this.assertSelection(selection);
    this.selections[n] = selection;
  }

  addSelection(selection: Selection): void {
    this.assertSelection(selection);
    this.selections.push(selection);
  }

  /** Literal text spanned by `selection`, rows joined with '\n'. */
  getSelectionContent(selection: Selection): string {
    const s = selection.oriented();
    this.assertSelection(s);

    if (s.isSingleLine()) {
      return this.lines.getLine(s.head.row).slice(s.head.column, s.tail.column);
    }

    const parts = [this.lines.getLine(s.head.row).slice(s.head.column)];
    for (let row = s.head.row + 1; row < s.tail.row; row++) {
      parts.push(this.lines.getLine(row));
    }
    parts.push(this.lines.getLine(s.tail.row).slice(0, s.tail.column));
    return parts.join('\n');
  }

  /** Per-row column spans covered by `selection`, top to bottom. */
  getColumnRanges(selection: Selection): RowColumnRange[] {
    const s = selection.oriented();
    this.assertSelection(s);
    const ranges: RowColumnRange[] = [];
    for (let row = s.head.row; row <= s.tail.row; row++) {
      const range = s.getColumnRangeOnRow(row, this.lines.getNumColumns(row));
      if (range) ranges.push({ row, ...range });
    }
    return ranges;
  }

  // === Index stepping ===

  next(at: Index): Index {
    if (at.row >= this.lines.numRows) return at;
    if (at.column < this.lines.getNumColumns(at.row)) return index(at.row, at.column + 1);
    return index(at.row + 1, 0);
  }

  prev(at: Index): Index {
    if (at.column > 0) return index(at.row, at.column - 1);
    if (at.row === 0) return at;
    return index(at.row - 1, this.lines.getNumColumns(at.row - 1));
  }

  /** Like next, but never onto the end sentinel. */
  nextWithinDocument(at: Index): Index {
    const stepped = this.next(at);
    return this.isEnd(stepped) ? at : stepped;
  }

  /** Skip whitespace, then advance to the next whitespace character. */
  nextWord(at: Index): Index {
    let i = at;
    while (!this.isEnd(i) && isWhitespace(this.getCharacter(i))) i = this.next(i);
    while (!this.isEnd(i) && !isWhitespace(this.getCharacter(i))) i = this.next(i);
    return i;
  }

  prevWord(at: Index): Index {
    let i = at;
    while (!isStart(i) && isWhitespace(this.getCharacter(this.prev(i)))) i = this.prev(i);
    while (!isStart(i) && !isWhitespace(this.getCharacter(this.prev(i)))) i = this.prev(i);
    return i;
  }

  /** Same column one row down, clamped; past the last row is the end sentinel. */
  nextRow(at: Index): Index {
    if (at.row + 1 >= this.lines.numRows) return this.getEnd();
    return index(at.row + 1, Math.min(at.column, this.lines.getNumColumns(at.row + 1)));
  }

  prevRow(at: Index): Index {
    if (at.row === 0) return index(0, 0);
    return index(at.row - 1, Math.min(at.column, this.lines.getNumColumns(at.row - 1)));
  }

  /** Clamp host-supplied coordinates into the document. */
  clampIndex(at: Index): Index {
    const r = Math.max(0, Math.min(Math.trunc(at.row), this.lines.numRows - 1));
    const c = Math.max(0, Math.min(Math.trunc(at.column), this.lines.getNumColumns(r)));
    return index(r, c);
  }

  // === Style tokens ===

  getTokens(row: number): readonly number[] {
    assertRow(row, this.lines.numRows);
    return this.tokens[row];
  }

  applyTokens(selection: Selection, token: number): void {
    const s = selection.oriented();
    this.assertSelection(s);
    for (let row = s.head.row; row <= s.tail.row; row++) {
      const range = s.getColumnRangeOnRow(row, this.lines.getNumColumns(row));
      if (range) this.tokens[row].fill(token, range.start, range.end);
    }
    this.emit({ type: 'style', fromRow: s.head.row, toRow: s.tail.row });
  }

  clearTokens(): void {
    for (const row of this.tokens) row.fill(0);
    this.emit({ type: 'style', fromRow: 0, toRow: this.lines.numRows - 1 });
  }

  // === Editing ===

  /**
   * Apply `transaction` and return its reciprocal.
   *
   * Whole lines touched by the selection are cut out, spliced with the new
   * content and put back. Every sibling selection is pulled by the removed
   * span then pushed by the inserted one. Applying the reciprocal restores
   * the text and the siblings exactly.
   */
  fulfill(transaction: Transaction): Transaction {
    const t = normalizeTransaction(transaction, this, this.tabSize);
    const s = t.selection.oriented();
    this.assertSelection(s);

    const firstRow = s.head.row;
    const rowCount = s.tail.row - s.head.row + 1;
    const cut = this.getSelectionContent(s.horizontallyMaximized(this));
    const i = s.head.column;
    const j = cut.lastIndexOf('\n') + s.tail.column + 1;
    const spliced = cut.slice(0, i) + t.content + cut.slice(j);

    const oldTokens = this.joinTokenRows(firstRow, rowCount);
    const newTokens = [...oldTokens.slice(0, i), ...zeros(t.content.length), ...oldTokens.slice(j)];

    const inserted = Selection.measuring(t.content).startingFrom(s.head);
    const target = t.target !== undefined && t.target >= 0 && t.target < this.selections.length
      ? t.target
      : undefined;

    this.selections = this.selections.map((existing, n) =>
      n === target ? existing : existing.pullBy(s).pushBy(inserted),
    );

    const rows = spliced.split('\n');
    const tokenRows: number[][] = [];
    let offset = 0;
    for (const row of rows) {
      tokenRows.push(newTokens.slice(offset, offset + row.length));
      offset += row.length + 1;
    }
    this.lines.replaceRows(firstRow, rowCount, rows);
    this.tokens.splice(firstRow, rowCount, ...tokenRows);

    const reciprocal: Transaction = {
      selection: inserted,
      content: cut.slice(i, j),
      direction: flipDirection(t.direction),
      target: t.target,
      affectedArea: UNBOUNDED_AREA,
    };

    if (target !== undefined) {
      this.selections[target] = reciprocal.direction === 'reverse'
        ? Selection.caret(inserted.tail)
        : inserted;
    }

    this.emit({ type: 'rows', row: firstRow, removed: rowCount, inserted: rows.length });
    return reciprocal;
  }

  // === Persistence ===

  toState(): DocumentState {
    return {
      lines: this.lines.toArray(),
      selections: this.selections.map(s => s.toTuple()),
    };
  }

  /**
   * Restore a state produced by toState. Validates before touching anything.
   * @throws BufferRangeError when a selection does not fit the lines.
   */
  restoreState(state: DocumentState): void {
    if (state.lines.length === 0) {
      throw new BufferRangeError('a document needs at least one row');
    }
    if (state.lines.some(line => line.includes('\n'))) {
      throw new BufferRangeError('rows may not contain line breaks');
    }
    if (state.selections.length === 0) {
      throw new RangeError('a document needs at least one selection');
    }

    const store = new LineStore(state.lines);
    const selections = state.selections.map(tuple => Selection.fromTuple(tuple));
    for (const s of selections) assertSelectionIn(store, s);

    this.lines.reset(state.lines);
    this.tokens = state.lines.map(line => zeros(line.length));
    this.selections = selections;
    logger.debug(`document restored: ${state.lines.length} rows, ${selections.length} selections`);
    this.emit({ type: 'reset' });
  }

  // === Events ===

  onChange(listener: DocumentChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  private emit(change: DocumentChange): void {
    for (const listener of this.listeners) listener(change);
  }

  // === Internals ===

  private navigateSelection(s: Selection, navigation: Navigation, fixingTail: boolean): Selection {
    switch (navigation) {
      case 'wholeDocument': {
        const head = this.settle(this.getEnd());
        return new Selection(head, fixingTail ? s.tail : index(0, 0));
      }
      case 'wholeLine': {
        const row = s.head.row;
        const head = index(row, this.lines.getNumColumns(row));
        return new Selection(head, fixingTail ? s.tail : index(row, 0));
      }
      case 'wholeWord': {
        const row = s.head.row;
        const [start, end] = getWordAtColumn(this.lines.getLine(row), s.head.column);
        return new Selection(index(row, end), fixingTail ? s.tail : index(row, start));
      }
      default: {
        const head = this.settle(this.move(s.head, navigation));
        return new Selection(head, fixingTail ? s.tail : head);
      }
    }
  }

  private move(at: Index, navigation: Navigation): Index {
    switch (navigation) {
      case 'forwardByChar': return this.next(at);
      case 'backwardByChar': return this.prev(at);
      case 'forwardByWord': return this.nextWord(at);
      case 'backwardByWord': return this.prevWord(at);
      case 'forwardByLine': return this.nextRow(at);
      case 'backwardByLine': return this.prevRow(at);
      case 'toLineStart': return index(at.row, 0);
      case 'toLineEnd': return index(at.row, this.lines.getNumColumns(at.row));
      default: return at;
    }
  }

  /** A head on the end sentinel steps back onto the last real position. */
  private settle(head: Index): Index {
    return this.isEnd(head) ? this.prev(head) : head;
  }

  /** Token rows [firstRow, firstRow + count) joined with a 0 per line break. */
  private joinTokenRows(firstRow: number, count: number): number[] {
    const joined: number[] = [];
    for (let row = firstRow; row < firstRow + count; row++) {
      if (row > firstRow) joined.push(0);
      joined.push(...this.tokens[row]);
    }
    return joined;
  }

  private assertIndex(at: Index, allowEnd: boolean): void {
    if (allowEnd && this.isEnd(at)) return;
    assertIndexIn(this.lines, at);
  }

  private assertSelection(s: Selection): void {
    assertSelectionIn(this.lines, s);
  }
}

function assertIndexIn(store: LineStore, at: Index): void {
  assertRow(at.row, store.numRows);
  assertColumn(at.row, at.column, store.getNumColumns(at.row));
}

function assertSelectionIn(store: LineStore, s: Selection): void {
  assertIndexIn(store, s.head);
  assertIndexIn(store, s.tail);
}

function isStart(at: Index): boolean {
  return at.row === 0 && at.column === 0;
}

function zeros(length: number): number[] {
  return new Array<number>(length).fill(0);
}
