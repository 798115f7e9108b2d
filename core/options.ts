/**
 * Editor configuration: defaults, merging, validation.
 */

import type { LogLevel } from './logger';

export interface EditorOptions {
  /** Spaces inserted for a tab code. */
  tabSize: number;
  /** Edits closer together than this join the same undo group. */
  coalesceWindowMs: number;
  /** Oldest undo groups are dropped past this depth. */
  maxUndoDepth: number;
  logLevel: LogLevel;
}

export const DEFAULT_OPTIONS: Readonly<EditorOptions> = Object.freeze({
  tabSize: 4,
  coalesceWindowMs: 400,
  maxUndoDepth: 10000,
  logLevel: 'warn',
});

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Merge user options over the defaults.
 * @throws RangeError when a numeric option is out of range or the log level is unknown.
 */
export function resolveOptions(overrides: Partial<EditorOptions> = {}): EditorOptions {
  const options: EditorOptions = { ...DEFAULT_OPTIONS, ...overrides };

  if (!Number.isInteger(options.tabSize) || options.tabSize < 1) {
    throw new RangeError(`tabSize must be a positive integer, got ${options.tabSize}`);
  }
  if (!Number.isFinite(options.coalesceWindowMs) || options.coalesceWindowMs < 0) {
    throw new RangeError(`coalesceWindowMs must be >= 0, got ${options.coalesceWindowMs}`);
  }
  if (!Number.isInteger(options.maxUndoDepth) || options.maxUndoDepth < 1) {
    throw new RangeError(`maxUndoDepth must be a positive integer, got ${options.maxUndoDepth}`);
  }
  if (!LOG_LEVELS.includes(options.logLevel)) {
    throw new RangeError(`unknown logLevel "${options.logLevel}"`);
  }
  return options;
}
