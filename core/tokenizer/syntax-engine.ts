/**
 * Lezer parser integration: parse the document, turn highlight tags into
 * per-character style tokens.
 */

import type { Parser, Tree } from '@lezer/common';
import { highlightTree } from '@lezer/highlight';
import { Selection, index } from '../cursor/selection';
import type { Index } from '../cursor/selection';
import type { TextDocument } from '../document/text-document';
import { logger } from '../logger';
import { BUILTIN_GRAMMARS } from './grammars/typescript';
import { StyleToken, styleHighlighter, styleTokenForClasses } from './style-tokens';

interface TokenSpan {
  from: number;
  to: number;
  token: number;
}

export class SyntaxEngine {
  private parsers: Map<string, Parser> = new Map();
  private currentLanguageId: string = '';
  private currentParser: Parser | null = null;
  private currentTree: Tree | null = null;

  constructor() {
    for (const [languageId, parser] of BUILTIN_GRAMMARS) {
      this.registerGrammar(languageId, parser);
    }
  }

  registerGrammar(languageId: string, parser: Parser): void {
    this.parsers.set(languageId, parser);
  }

  /**
   * Set the language for parsing. An unknown id disables highlighting.
   * @returns whether a grammar is registered for `languageId`.
   */
  setLanguage(languageId: string): boolean {
    this.currentLanguageId = languageId;
    this.currentParser = this.parsers.get(languageId) ?? null;
    this.currentTree = null;
    if (!this.currentParser && languageId !== '') {
      logger.warn(`no grammar registered for "${languageId}"`);
    }
    return this.currentParser !== null;
  }

  get languageId(): string {
    return this.currentLanguageId;
  }

  getSupportedLanguages(): string[] {
    return Array.from(this.parsers.keys());
  }

  hasLanguage(languageId: string): boolean {
    return this.parsers.has(languageId);
  }

  /** Full parse of the document text. */
  parse(document: TextDocument): Tree | null {
    if (!this.currentParser) return null;
    this.currentTree = this.currentParser.parse(document.getText());
    return this.currentTree;
  }

  getTree(): Tree | null {
    return this.currentTree;
  }

  /**
   * Re-parse and replace the document's style tokens.
   * @returns false when no language is set.
   */
  highlight(document: TextDocument): boolean {
    const tree = this.parse(document);
    if (!tree) return false;

    const spans: TokenSpan[] = [];
    highlightTree(tree, styleHighlighter, (from, to, classes) => {
      const token = styleTokenForClasses(classes);
      if (token !== StyleToken.plain) spans.push({ from, to, token });
    });

    const rowStarts = computeRowStarts(document);
    document.clearTokens();
    for (const span of spans) {
      const head = offsetToIndex(rowStarts, span.from);
      const tail = offsetToIndex(rowStarts, span.to);
      document.applyTokens(new Selection(head, tail), span.token);
    }
    logger.debug(`highlighted ${spans.length} spans as ${this.currentLanguageId}`);
    return true;
  }
}

function computeRowStarts(document: TextDocument): number[] {
  const starts: number[] = [];
  let offset = 0;
  for (let row = 0; row < document.numRows; row++) {
    starts.push(offset);
    offset += document.getNumColumns(row) + 1;
  }
  return starts;
}

/** Binary search for the row containing `offset`. */
function offsetToIndex(rowStarts: readonly number[], offset: number): Index {
  let lo = 0;
  let hi = rowStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (rowStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return index(lo, offset - rowStarts[lo]);
}
