/**
 * Main ViewModel: the headless editor facade.
 *
 * Ties one TextDocument to its undo history, command registry and syntax
 * engine. The rendering layer reads selections and style runs from here and
 * listens for changes; it never touches document internals.
 */

import { CommandRegistry } from '../core/commands/registry';
import type { CommandArgs, CommandContext } from '../core/commands/registry';
import { registerEditingCommands } from '../core/commands/editing';
import { registerNavigationCommands } from '../core/commands/navigation';
import { registerSelectionCommands } from '../core/commands/selection-cmds';
import { MemoryClipboard, registerClipboardCommands } from '../core/commands/clipboard';
import type { ClipboardStore } from '../core/commands/clipboard';
import { registerMulticursorCommands } from '../core/commands/multicursor';
import { mergeSelections } from '../core/cursor/selection';
import type { Selection } from '../core/cursor/selection';
import type { Navigation } from '../core/cursor/navigation';
import { TextDocument } from '../core/document/text-document';
import { createTransaction } from '../core/document/transaction';
import { UndoManager } from '../core/history/undo-manager';
import { setLogLevel } from '../core/logger';
import { resolveOptions } from '../core/options';
import type { EditorOptions } from '../core/options';
import { RowCache } from '../core/tokenizer/row-cache';
import { toStyleRuns } from '../core/tokenizer/style-tokens';
import type { StyleRun } from '../core/tokenizer/style-tokens';
import { SyntaxEngine } from '../core/tokenizer/syntax-engine';
import { resolveKeybinding } from './keybindings';
import type { KeyEvent } from './keybindings';

type ChangeListener = () => void;

export class EditorViewModel {
  // Core subsystems
  readonly document: TextDocument;
  readonly undoManager: UndoManager;
  readonly commandRegistry: CommandRegistry;
  readonly syntax: SyntaxEngine;
  readonly clipboard: ClipboardStore;
  readonly options: EditorOptions;

  private _styleRuns: RowCache<StyleRun[]>;
  private _listeners: ChangeListener[] = [];
  private _highlighting: boolean = false;
  private _batchDepth: number = 0;

  constructor(content: string = '', options: Partial<EditorOptions> = {}, clipboard?: ClipboardStore) {
    this.options = resolveOptions(options);
    setLogLevel(this.options.logLevel);

    this.document = new TextDocument(content, { tabSize: this.options.tabSize });
    this.undoManager = new UndoManager(this.document, this.options);
    this.commandRegistry = new CommandRegistry();
    this.syntax = new SyntaxEngine();
    this.clipboard = clipboard ?? new MemoryClipboard();
    this._styleRuns = new RowCache(this.document, row => toStyleRuns(this.document.getTokens(row)));

    // Register all command groups
    registerEditingCommands(this.commandRegistry);
    registerNavigationCommands(this.commandRegistry);
    registerSelectionCommands(this.commandRegistry);
    registerClipboardCommands(this.commandRegistry);
    registerMulticursorCommands(this.commandRegistry);
  }

  get selections(): Selection[] {
    return this.document.getSelections();
  }

  get text(): string {
    return this.document.getText();
  }

  /** Replace the content and forget the history. */
  setText(content: string): void {
    this.document.replaceAll(content);
    this.undoManager.clear();
    this.afterEdit();
  }

  onChange(listener: ChangeListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx !== -1) this._listeners.splice(idx, 1);
    };
  }

  private notifyChange(): void {
    if (this._batchDepth > 0) return;
    for (const listener of this._listeners) {
      listener();
    }
  }

  // === Editing ===

  /** Replace every selection with `text`, as one keystroke. */
  insert(text: string): void {
    this.undoManager.performAtSelections((selection, n) => createTransaction(selection, text, n));
    this.afterEdit();
  }

  /** Replace selection n with texts[n]; selections past the list are left alone. */
  insertPerSelection(texts: readonly string[]): void {
    this.undoManager.performAtSelections((selection, n) =>
      n < texts.length ? createTransaction(selection, texts[n], n) : null,
    );
    this.afterEdit();
  }

  undo(): boolean {
    const undone = this.undoManager.undo();
    if (undone) this.afterHistoryStep();
    return undone;
  }

  redo(): boolean {
    const redone = this.undoManager.redo();
    if (redone) this.afterHistoryStep();
    return redone;
  }

  // === Selections ===

  /** Move (or extend, fixing the tails) every selection, then merge overlaps. */
  navigate(navigation: Navigation, extend: boolean = false): void {
    this.setSelections(this.document.getSelections(navigation, extend));
  }

  setSelections(selections: readonly Selection[]): void {
    this.document.setSelections(mergeSelections(selections));
    this.undoManager.beginNewGroup();
    this.notifyChange();
  }

  addSelections(selections: readonly Selection[]): void {
    if (selections.length === 0) return;
    this.setSelections([...this.document.getSelections(), ...selections]);
  }

  // === Commands and input ===

  executeCommand(commandId: string, args: CommandArgs = {}): boolean {
    const ctx: CommandContext = { editor: this };
    this._batchDepth++;
    let result = false;
    try {
      result = this.commandRegistry.execute(commandId, ctx, args);
    } finally {
      this._batchDepth--;
    }
    if (result) {
      this.notifyChange();
    }
    return result;
  }

  /** Handle keyboard input. */
  onKeyDown(event: KeyEvent): boolean {
    const cmd = resolveKeybinding(event);
    if (cmd) {
      return this.executeCommand(cmd);
    }

    // Regular text input
    if (event.key.length === 1 && !event.ctrlKey && !event.metaKey) {
      return this.executeCommand('editor.action.type', { text: event.key });
    }

    return false;
  }

  /** Handle text input (IME result). */
  onTextInput(text: string): void {
    this.executeCommand('editor.action.type', { text });
  }

  // === Syntax ===

  /**
   * Highlight with the grammar registered for `languageId`. An unknown id
   * clears the style tokens.
   */
  setLanguage(languageId: string): boolean {
    this._highlighting = this.syntax.setLanguage(languageId);
    if (this._highlighting) {
      this.syntax.highlight(this.document);
    } else {
      this.document.clearTokens();
    }
    this.notifyChange();
    return this._highlighting;
  }

  /** Runs of equal style tokens on `row`, cached until the row changes. */
  getStyleRuns(row: number): StyleRun[] {
    return this._styleRuns.get(row);
  }

  destroy(): void {
    this._styleRuns.dispose();
    this._listeners = [];
  }

  // === Private ===

  /** Replayed edits can leave carets on top of each other. */
  private afterHistoryStep(): void {
    this.document.setSelections(mergeSelections(this.document.getSelections()));
    this.afterEdit();
  }

  /** Called after any edit. */
  private afterEdit(): void {
    if (this._highlighting) {
      this.syntax.highlight(this.document);
    }
    this.notifyChange();
  }
}
