/**
 * Navigation values driven by the host's key layer.
 *
 * The core never sees key codes; the host maps shift to `fixingTail`,
 * alt to the by-word values and the command modifier to the whole-* values.
 */

export const NAVIGATIONS = [
  'identity',
  'wholeDocument',
  'wholeLine',
  'wholeWord',
  'forwardByChar',
  'backwardByChar',
  'forwardByWord',
  'backwardByWord',
  'forwardByLine',
  'backwardByLine',
  'toLineStart',
  'toLineEnd',
] as const;

export type Navigation = typeof NAVIGATIONS[number];

/** Navigations that select a whole unit rather than move the caret. */
export function isWholeUnit(navigation: Navigation): boolean {
  return navigation === 'wholeDocument' || navigation === 'wholeLine' || navigation === 'wholeWord';
}
