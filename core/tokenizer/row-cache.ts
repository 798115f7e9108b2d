/**
 * Row-keyed cache over a TextDocument.
 *
 * Entries are computed on demand and dropped exactly for the rows a change
 * event names: a `rows` change splices the cache the same way fulfill
 * spliced the lines, a `style` change drops its span, a reset drops all.
 */

import { assertRow } from '../errors';
import type { DocumentChange, TextDocument } from '../document/text-document';

interface Entry<T> {
  value: T;
}

export class RowCache<T> {
  private entries: (Entry<T> | null)[];
  private readonly unsubscribe: () => void;
  private readonly document: TextDocument;
  private readonly compute: (row: number) => T;

  constructor(document: TextDocument, compute: (row: number) => T) {
    this.document = document;
    this.compute = compute;
    this.entries = emptyEntries<T>(document.numRows);
    this.unsubscribe = document.onChange(change => this.onDocumentChange(change));
  }

  get(row: number): T {
    assertRow(row, this.document.numRows);
    const cached = this.entries[row];
    if (cached) return cached.value;
    const value = this.compute(row);
    this.entries[row] = { value };
    return value;
  }

  isCached(row: number): boolean {
    return this.entries[row] != null;
  }

  /** Number of cached rows. */
  get size(): number {
    return this.entries.filter(e => e !== null).length;
  }

  invalidateAll(): void {
    this.entries = emptyEntries<T>(this.document.numRows);
  }

  /** Stop listening to the document and drop everything. */
  dispose(): void {
    this.unsubscribe();
    this.entries = [];
  }

  private onDocumentChange(change: DocumentChange): void {
    switch (change.type) {
      case 'reset':
        this.invalidateAll();
        break;
      case 'rows':
        this.entries.splice(change.row, change.removed, ...emptyEntries<T>(change.inserted));
        break;
      case 'style':
        for (let row = change.fromRow; row <= change.toRow && row < this.entries.length; row++) {
          this.entries[row] = null;
        }
        break;
    }
  }
}

function emptyEntries<T>(count: number): (Entry<T> | null)[] {
  return new Array<Entry<T> | null>(count).fill(null);
}
