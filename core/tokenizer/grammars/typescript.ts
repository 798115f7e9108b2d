import type { Parser } from '@lezer/common';
import { parser as jsParser } from '@lezer/javascript';

export const typescriptParser: Parser = jsParser.configure({
  dialect: 'ts jsx',
});

export const javascriptParser: Parser = jsParser.configure({
  dialect: 'jsx',
});

/** Grammars every SyntaxEngine starts with, keyed by language id. */
export const BUILTIN_GRAMMARS: ReadonlyArray<readonly [string, Parser]> = [
  ['typescript', typescriptParser],
  ['javascript', javascriptParser],
];
