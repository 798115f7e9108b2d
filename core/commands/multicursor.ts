/**
 * Multi-cursor commands: add cursor above/below, add cursor at a position.
 */

import { Selection, index } from '../cursor/selection';
import type { CommandRegistry } from './registry';

export function registerMulticursorCommands(registry: CommandRegistry): void {
  registry.register('editor.action.addCursorAbove', (ctx) => {
    const { editor } = ctx;
    const added = editor.document.getSelections()
      .filter(s => s.head.row > 0)
      .map(s => Selection.caret(editor.document.prevRow(s.head)));
    editor.addSelections(added);
  });

  registry.register('editor.action.addCursorBelow', (ctx) => {
    const { editor } = ctx;
    const { document } = editor;
    const added = document.getSelections()
      .filter(s => s.head.row < document.numRows - 1)
      .map(s => Selection.caret(document.nextRow(s.head)));
    editor.addSelections(added);
  });

  registry.register('editor.action.addCursorAt', (ctx, args) => {
    const { editor } = ctx;
    const at = editor.document.clampIndex(index(args.row ?? 0, args.column ?? 0));
    editor.addSelections([Selection.caret(at)]);
  });
}
