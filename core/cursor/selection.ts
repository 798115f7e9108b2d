/**
 * Buffer indices and selections, plus the pull/push algebra that re-anchors
 * one selection when the text spanned by another disappears or appears.
 *
 * A selection is a (head, tail) pair; the caret renders at the head.
 * Selections are immutable: every operation returns a new value.
 */

export interface Index {
  readonly row: number;
  readonly column: number;
}

export interface ColumnRange {
  start: number;
  end: number;
}

/** Anything that can report a row's length. */
export interface RowMeasure {
  getNumColumns(row: number): number;
}

export function index(row: number, column: number): Index {
  return { row, column };
}

/**
 * Compare two indices in row-major order.
 * Negative if a < b, 0 if equal, positive if a > b.
 */
export function compareIndex(a: Index, b: Index): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.column - b.column;
}

export function indexEquals(a: Index, b: Index): boolean {
  return a.row === b.row && a.column === b.column;
}

export type SelectionTuple = [headRow: number, headColumn: number, tailRow: number, tailColumn: number];

export class Selection {
  readonly head: Index;
  readonly tail: Index;

  constructor(head: Index, tail: Index = head) {
    this.head = { row: head.row, column: head.column };
    this.tail = { row: tail.row, column: tail.column };
  }

  static caret(at: Index): Selection {
    return new Selection(at, at);
  }

  static between(head: Index, tail: Index): Selection {
    return new Selection(head, tail);
  }

  static fromTuple([headRow, headColumn, tailRow, tailColumn]: SelectionTuple): Selection {
    return new Selection(index(headRow, headColumn), index(tailRow, tailColumn));
  }

  /**
   * A selection shaped like `content`, anchored at (0, 0): it spans as many
   * rows as the text has lines and ends at the length of its last line.
   */
  static measuring(content: string): Selection {
    const lines = content.split('\n');
    return new Selection(index(0, 0), index(lines.length - 1, lines[lines.length - 1].length));
  }

  toTuple(): SelectionTuple {
    return [this.head.row, this.head.column, this.tail.row, this.tail.column];
  }

  withHead(head: Index): Selection {
    return new Selection(head, this.tail);
  }

  withTail(tail: Index): Selection {
    return new Selection(this.head, tail);
  }

  equals(other: Selection): boolean {
    return indexEquals(this.head, other.head) && indexEquals(this.tail, other.tail);
  }

  isOriented(): boolean {
    return compareIndex(this.head, this.tail) <= 0;
  }

  isSingular(): boolean {
    return indexEquals(this.head, this.tail);
  }

  isSingleLine(): boolean {
    return this.head.row === this.tail.row;
  }

  /** Copy with head <= tail. */
  oriented(): Selection {
    return this.isOriented() ? this : new Selection(this.tail, this.head);
  }

  /** Copy with head and tail swapped. */
  swapped(): Selection {
    return new Selection(this.tail, this.head);
  }

  intersectsRow(row: number): boolean {
    const s = this.oriented();
    return s.head.row <= row && row <= s.tail.row;
  }

  /**
   * Columns this selection covers on `row`, a row `numColumns` long.
   * Interior rows of a multi-line selection are covered in full.
   */
  getColumnRangeOnRow(row: number, numColumns: number): ColumnRange | null {
    if (!this.intersectsRow(row)) return null;
    const s = this.oriented();

    if (s.isSingleLine()) return { start: s.head.column, end: s.tail.column };
    if (row === s.head.row) return { start: s.head.column, end: numColumns };
    if (row === s.tail.row) return { start: 0, end: s.tail.column };
    return { start: 0, end: numColumns };
  }

  /**
   * Push the earlier endpoint to the start of its line and the later one to
   * the end of its line, keeping the orientation.
   */
  horizontallyMaximized(measure: RowMeasure): Selection {
    if (this.isOriented()) {
      return new Selection(
        index(this.head.row, 0),
        index(this.tail.row, measure.getNumColumns(this.tail.row)),
      );
    }
    return new Selection(
      index(this.head.row, measure.getNumColumns(this.head.row)),
      index(this.tail.row, 0),
    );
  }

  /** Same shape, translated so the head sits at `at`. */
  startingFrom(at: Index): Selection {
    const tail = this.head.row === this.tail.row
      ? index(at.row, at.column + this.tail.column - this.head.column)
      : index(at.row + this.tail.row - this.head.row, this.tail.column);
    return new Selection(at, tail);
  }

  /**
   * Where `target` ends up once the text spanned by this selection is removed.
   * Indices inside the span collapse onto its start.
   */
  pull(target: Index): Index {
    const s = this.oriented();

    if (compareIndex(target, s.head) <= 0) return target;
    if (compareIndex(target, s.tail) < 0) return s.head;

    const column = target.row === s.tail.row
      ? target.column - s.tail.column + s.head.column
      : target.column;
    return index(target.row - (s.tail.row - s.head.row), column);
  }

  /**
   * Where `target` ends up once text shaped like this selection is inserted
   * at its head. Indices at the insertion point move past the new text.
   *
   * A caret sitting on the head of a replaced range is therefore not
   * restored when the replacement is undone: it ends after the restored
   * text. Pull collapses the head and tail cases onto one index, so no
   * guard here can tell them apart afterwards.
   */
  push(target: Index): Index {
    const s = this.oriented();

    if (compareIndex(target, s.head) < 0) return target;

    const column = target.row === s.head.row
      ? target.column - s.head.column + s.tail.column
      : target.column;
    return index(target.row + (s.tail.row - s.head.row), column);
  }

  pullBy(other: Selection): Selection {
    return new Selection(other.pull(this.head), other.pull(this.tail));
  }

  pushBy(other: Selection): Selection {
    return new Selection(other.push(this.head), other.push(this.tail));
  }

  toString(): string {
    return `(${this.head.row},${this.head.column})-(${this.tail.row},${this.tail.column})`;
  }
}

/**
 * Sort selections and merge those that coincide or overlap.
 * A merged selection keeps the orientation of the later one.
 */
export function mergeSelections(selections: readonly Selection[]): Selection[] {
  if (selections.length <= 1) return [...selections];

  const sorted = [...selections].sort(
    (a, b) => compareIndex(a.oriented().head, b.oriented().head),
  );

  const merged: Selection[] = [sorted[0]];
  for (let i = 1; i < sorted.length; i++) {
    const prev = merged[merged.length - 1];
    const curr = sorted[i];
    const p = prev.oriented();
    const c = curr.oriented();

    const touches = compareIndex(c.head, p.tail) < 0 || indexEquals(c.head, p.head);
    if (!touches) {
      merged.push(curr);
      continue;
    }

    const start = p.head;
    const end = compareIndex(c.tail, p.tail) > 0 ? c.tail : p.tail;
    merged[merged.length - 1] = curr.isOriented()
      ? new Selection(start, end)
      : new Selection(end, start);
  }
  return merged;
}
