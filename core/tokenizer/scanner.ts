/**
 * Regex scanner over a TextDocument.
 *
 * Walks the document row by row. On each row the earliest match of any
 * registered pattern becomes the next zone; when two patterns match at the
 * same column the one added first wins. Matches never span rows.
 */

import { Selection, index } from '../cursor/selection';
import type { Index } from '../cursor/selection';
import type { TextDocument } from '../document/text-document';

interface ScanPattern {
  token: number;
  regex: RegExp;
}

interface ScanMatch {
  token: number;
  start: number;
  end: number;
}

export class Scanner {
  private patterns: ScanPattern[] = [];
  private current: Index = index(0, 0);
  private currentZone: Selection = Selection.caret(index(0, 0));
  private currentToken = 0;
  private readonly document: TextDocument;

  constructor(document: TextDocument) {
    this.document = document;
  }

  addPattern(token: number, pattern: RegExp | string): void {
    this.patterns.push({ token, regex: toGlobal(pattern) });
  }

  /** Drop every pattern and rewind. */
  clear(): void {
    this.patterns = [];
    this.reset();
  }

  /** Rewind to the start of the document. */
  reset(): void {
    this.current = index(0, 0);
    this.currentZone = Selection.caret(this.current);
    this.currentToken = 0;
  }

  /** Token of the last match. */
  get token(): number {
    return this.currentToken;
  }

  /** Where the next scan starts. */
  get index(): Index {
    return this.current;
  }

  /** Span of the last match, head at its start. */
  get zone(): Selection {
    return this.currentZone;
  }

  /**
   * Advance to the next match.
   * @returns false once the document is exhausted.
   */
  next(): boolean {
    for (let row = this.current.row; row < this.document.numRows; row++) {
      const from = row === this.current.row ? this.current.column : 0;
      const match = this.earliestMatch(this.document.getLine(row), from);
      if (match) {
        this.currentToken = match.token;
        this.currentZone = new Selection(index(row, match.start), index(row, match.end));
        this.current = index(row, match.end);
        return true;
      }
    }
    this.current = this.document.getEnd();
    return false;
  }

  private earliestMatch(line: string, from: number): ScanMatch | null {
    let best: ScanMatch | null = null;
    for (const { token, regex } of this.patterns) {
      const found = findNonEmpty(regex, line, from);
      if (found && (!best || found.start < best.start)) {
        best = { token, ...found };
      }
    }
    return best;
  }
}

/**
 * Clear the document's tokens and apply every zone the scanner finds.
 * @returns the number of zones applied.
 */
export function applyScannerTokens(document: TextDocument, scanner: Scanner): number {
  scanner.reset();
  document.clearTokens();
  let count = 0;
  while (scanner.next()) {
    document.applyTokens(scanner.zone, scanner.token);
    count++;
  }
  return count;
}

function toGlobal(pattern: RegExp | string): RegExp {
  if (typeof pattern === 'string') return new RegExp(pattern, 'g');
  const flags = pattern.flags.replace('y', '');
  return new RegExp(pattern.source, flags.includes('g') ? flags : flags + 'g');
}

function findNonEmpty(regex: RegExp, line: string, from: number): { start: number; end: number } | null {
  regex.lastIndex = from;
  let m = regex.exec(line);
  while (m && m[0].length === 0) {
    regex.lastIndex = m.index + 1;
    if (regex.lastIndex > line.length) return null;
    m = regex.exec(line);
  }
  return m ? { start: m.index, end: m.index + m[0].length } : null;
}
