/**
 * Core editing commands: type, delete left/right, tab, line break, undo, redo.
 *
 * Every command edits at all selections at once; the special codes are
 * turned into plain replacements by TextDocument.fulfill.
 */

import { EditCode } from '../document/transaction';
import type { CommandRegistry } from './registry';

export function registerEditingCommands(registry: CommandRegistry): void {
  registry.register('editor.action.type', (ctx, args) => {
    ctx.editor.insert(args.text ?? '');
  });

  registry.register('editor.action.deleteLeft', (ctx) => {
    ctx.editor.insert(EditCode.backspace);
  });

  registry.register('editor.action.deleteRight', (ctx) => {
    ctx.editor.insert(EditCode.delete);
  });

  registry.register('editor.action.tab', (ctx) => {
    ctx.editor.insert(EditCode.tab);
  });

  registry.register('editor.action.insertLineBreak', (ctx) => {
    ctx.editor.insert('\n');
  });

  registry.register('editor.action.undo', (ctx) => {
    ctx.editor.undo();
  });

  registry.register('editor.action.redo', (ctx) => {
    ctx.editor.redo();
  });
}
