/**
 * Ordered sequence of line strings.
 *
 * The store knows nothing about selections or tokens. It only guards its
 * own index bounds; structural rules (never empty, etc.) are the document's job.
 */

import { assertRow, BufferRangeError } from '../errors';

export class LineStore {
  private lines: string[];

  constructor(lines: readonly string[] = ['']) {
    this.lines = [...lines];
  }

  /** Split text on newlines, normalizing \r\n and \r first. */
  static fromText(text: string): LineStore {
    return new LineStore(splitLines(text));
  }

  get numRows(): number {
    return this.lines.length;
  }

  /** Length of a row, excluding the line break. */
  getNumColumns(row: number): number {
    assertRow(row, this.lines.length);
    return this.lines[row].length;
  }

  getLine(row: number): string {
    assertRow(row, this.lines.length);
    return this.lines[row];
  }

  /**
   * Replace `count` rows starting at `start` with `rows`.
   * `start` may equal numRows to append.
   */
  replaceRows(start: number, count: number, rows: readonly string[]): void {
    if (!Number.isInteger(start) || start < 0 || start > this.lines.length) {
      throw new BufferRangeError(`row ${start} out of range [0, ${this.lines.length}]`);
    }
    if (!Number.isInteger(count) || count < 0 || start + count > this.lines.length) {
      throw new BufferRangeError(`cannot remove ${count} rows at ${start} of ${this.lines.length}`);
    }
    this.lines.splice(start, count, ...rows);
  }

  reset(lines: readonly string[]): void {
    this.lines = [...lines];
  }

  toArray(): string[] {
    return [...this.lines];
  }

  getText(): string {
    return this.lines.join('\n');
  }
}

export function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
}
