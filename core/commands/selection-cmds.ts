/**
 * Selection commands: select word, select line, select all.
 */

import type { CommandRegistry } from './registry';

export function registerSelectionCommands(registry: CommandRegistry): void {
  registry.register('editor.action.selectAll', (ctx) => {
    ctx.editor.navigate('wholeDocument', false);
  });

  registry.register('editor.action.selectWord', (ctx) => {
    ctx.editor.navigate('wholeWord', false);
  });

  registry.register('editor.action.selectLine', (ctx) => {
    ctx.editor.navigate('wholeLine', false);
  });
}
