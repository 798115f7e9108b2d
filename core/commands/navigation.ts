/**
 * Navigation commands: move or extend by char, word, line and to line edges.
 */

import type { CommandRegistry } from './registry';

export function registerNavigationCommands(registry: CommandRegistry): void {
  // Basic cursor movement
  registry.register('editor.action.moveCursorLeft', (ctx) => {
    ctx.editor.navigate('backwardByChar', false);
  });

  registry.register('editor.action.moveCursorRight', (ctx) => {
    ctx.editor.navigate('forwardByChar', false);
  });

  registry.register('editor.action.moveCursorUp', (ctx) => {
    ctx.editor.navigate('backwardByLine', false);
  });

  registry.register('editor.action.moveCursorDown', (ctx) => {
    ctx.editor.navigate('forwardByLine', false);
  });

  // Cursor movement with selection
  registry.register('editor.action.selectLeft', (ctx) => {
    ctx.editor.navigate('backwardByChar', true);
  });

  registry.register('editor.action.selectRight', (ctx) => {
    ctx.editor.navigate('forwardByChar', true);
  });

  registry.register('editor.action.selectUp', (ctx) => {
    ctx.editor.navigate('backwardByLine', true);
  });

  registry.register('editor.action.selectDown', (ctx) => {
    ctx.editor.navigate('forwardByLine', true);
  });

  // Word movement
  registry.register('editor.action.moveCursorWordLeft', (ctx) => {
    ctx.editor.navigate('backwardByWord', false);
  });

  registry.register('editor.action.moveCursorWordRight', (ctx) => {
    ctx.editor.navigate('forwardByWord', false);
  });

  registry.register('editor.action.selectWordLeft', (ctx) => {
    ctx.editor.navigate('backwardByWord', true);
  });

  registry.register('editor.action.selectWordRight', (ctx) => {
    ctx.editor.navigate('forwardByWord', true);
  });

  // Line start/end
  registry.register('editor.action.moveCursorToLineStart', (ctx) => {
    ctx.editor.navigate('toLineStart', false);
  });

  registry.register('editor.action.moveCursorToLineEnd', (ctx) => {
    ctx.editor.navigate('toLineEnd', false);
  });

  registry.register('editor.action.selectToLineStart', (ctx) => {
    ctx.editor.navigate('toLineStart', true);
  });

  registry.register('editor.action.selectToLineEnd', (ctx) => {
    ctx.editor.navigate('toLineEnd', true);
  });
}
