/**
 * Contract-violation errors for out-of-range buffer access.
 *
 * Row/column bounds are a caller contract, not a runtime condition to recover
 * from. Everything inside the core fails fast through these assertions;
 * clamping happens only where host input enters (see TextDocument.clampIndex).
 */

export class BufferRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'BufferRangeError';
  }
}

/** Assert 0 <= row < numRows. */
export function assertRow(row: number, numRows: number): void {
  if (!Number.isInteger(row) || row < 0 || row >= numRows) {
    throw new BufferRangeError(`row ${row} out of range [0, ${numRows})`);
  }
}

/** Assert 0 <= column <= numColumns. */
export function assertColumn(row: number, column: number, numColumns: number): void {
  if (!Number.isInteger(column) || column < 0 || column > numColumns) {
    throw new BufferRangeError(`column ${column} out of range [0, ${numColumns}] on row ${row}`);
  }
}
