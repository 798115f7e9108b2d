/**
 * Style token ids: the integer stored per character by TextDocument.
 *
 * Lezer highlight tags resolve to a class name through `styleHighlighter`,
 * and the class name resolves to one of these ids. What an id looks like
 * on screen is the renderer's business.
 */

import { tags, tagHighlighter } from '@lezer/highlight';

export const StyleToken = {
  plain: 0,
  keyword: 1,
  string: 2,
  comment: 3,
  number: 4,
  operator: 5,
  punctuation: 6,
  variableName: 7,
  definition: 8,
  functionName: 9,
  typeName: 10,
  className: 11,
  property: 12,
  regexp: 13,
  bool: 14,
  atom: 15,
  builtin: 16,
  meta: 17,
  invalid: 18,
} as const;

export type StyleTokenName = keyof typeof StyleToken;

/** A run of equal tokens on one row, columns [start, end). */
export interface StyleRun {
  start: number;
  end: number;
  token: number;
}

function isStyleTokenName(name: string): name is StyleTokenName {
  return Object.prototype.hasOwnProperty.call(StyleToken, name);
}

export const styleHighlighter = tagHighlighter([
  { tag: tags.keyword, class: 'keyword' },
  { tag: tags.modifier, class: 'keyword' },
  { tag: tags.self, class: 'keyword' },
  { tag: tags.null, class: 'keyword' },
  { tag: tags.string, class: 'string' },
  { tag: tags.character, class: 'string' },
  { tag: tags.comment, class: 'comment' },
  { tag: tags.number, class: 'number' },
  { tag: tags.operator, class: 'operator' },
  { tag: tags.punctuation, class: 'punctuation' },
  { tag: tags.variableName, class: 'variableName' },
  { tag: tags.definition(tags.variableName), class: 'definition' },
  { tag: tags.function(tags.variableName), class: 'functionName' },
  { tag: tags.definition(tags.function(tags.variableName)), class: 'functionName' },
  { tag: tags.typeName, class: 'typeName' },
  { tag: tags.className, class: 'className' },
  { tag: tags.definition(tags.typeName), class: 'className' },
  { tag: tags.propertyName, class: 'property' },
  { tag: tags.regexp, class: 'regexp' },
  { tag: tags.bool, class: 'bool' },
  { tag: tags.atom, class: 'atom' },
  { tag: tags.special(tags.variableName), class: 'builtin' },
  { tag: tags.standard(tags.variableName), class: 'builtin' },
  { tag: tags.meta, class: 'meta' },
  { tag: tags.invalid, class: 'invalid' },
]);

/** Token id for a highlighter class string; the first known class wins. */
export function styleTokenForClasses(classes: string): number {
  for (const name of classes.split(' ')) {
    if (isStyleTokenName(name)) return StyleToken[name];
  }
  return StyleToken.plain;
}

/** Collapse a row's per-character tokens into runs. */
export function toStyleRuns(tokens: readonly number[]): StyleRun[] {
  const runs: StyleRun[] = [];
  for (let col = 0; col < tokens.length; col++) {
    const last = runs[runs.length - 1];
    if (last && last.token === tokens[col]) {
      last.end = col + 1;
    } else {
      runs.push({ start: col, end: col + 1, token: tokens[col] });
    }
  }
  return runs;
}
