/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { LineStore, splitLines } from './buffer/line-store';

// Document
export {
  TextDocument,
  type DocumentChange, type DocumentChangeListener, type DocumentState,
  type RowColumnRange, type TextDocumentOptions,
} from './document/text-document';
export {
  EditCode, UNBOUNDED_AREA,
  createTransaction, flipDirection, isNoOp, normalizeTransaction,
  type Transaction, type TransactionDirection, type AffectedArea, type CharacterStepper,
} from './document/transaction';

// Cursor
export {
  Selection, index, compareIndex, indexEquals, mergeSelections,
  type Index, type ColumnRange, type RowMeasure, type SelectionTuple,
} from './cursor/selection';
export { NAVIGATIONS, isWholeUnit, type Navigation } from './cursor/navigation';
export { getWordAtColumn, isWhitespace } from './cursor/word-boundary';

// Commands
export { CommandRegistry, type CommandHandler, type CommandContext, type CommandArgs } from './commands/registry';
export { registerEditingCommands } from './commands/editing';
export { registerNavigationCommands } from './commands/navigation';
export { registerSelectionCommands } from './commands/selection-cmds';
export { registerClipboardCommands, MemoryClipboard, type ClipboardStore } from './commands/clipboard';
export { registerMulticursorCommands } from './commands/multicursor';

// History
export { UndoManager, type UndoOptions, type TransactionBuilder } from './history/undo-manager';
export { type UndoGroup } from './history/undo-group';

// Tokenizer / Syntax
export { SyntaxEngine } from './tokenizer/syntax-engine';
export { Scanner, applyScannerTokens } from './tokenizer/scanner';
export { RowCache } from './tokenizer/row-cache';
export { StyleToken, styleHighlighter, styleTokenForClasses, toStyleRuns, type StyleRun, type StyleTokenName } from './tokenizer/style-tokens';
export { typescriptParser, javascriptParser } from './tokenizer/grammars/typescript';

// Ambient
export { BufferRangeError, assertRow, assertColumn } from './errors';
export { logger, setLogLevel, getLogLevel, type LogLevel } from './logger';
export { DEFAULT_OPTIONS, resolveOptions, type EditorOptions } from './options';
