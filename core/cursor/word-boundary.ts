/**
 * Whitespace-delimited word boundaries.
 *
 * Words are maximal runs of non-whitespace. There is no punctuation class:
 * `foo.bar(x)` is a single word.
 */

/** Space, tab, line breaks and the other JS whitespace code points. */
export function isWhitespace(ch: string): boolean {
  return ch.length > 0 && /\s/.test(ch);
}

/**
 * Columns [start, end) of the word around `column` on `line`.
 * On whitespace the range covers just that one character.
 */
export function getWordAtColumn(line: string, column: number): [number, number] {
  if (line.length === 0) return [0, 0];
  const col = Math.min(Math.max(0, column), line.length - 1);
  if (isWhitespace(line[col])) return [col, col + 1];

  let start = col;
  let end = col + 1;
  while (start > 0 && !isWhitespace(line[start - 1])) start--;
  while (end < line.length && !isWhitespace(line[end])) end++;
  return [start, end];
}
