/**
 * Command registry: maps string command IDs to handler functions.
 *
 * Command IDs follow a namespaced convention:
 * editor.action.type, editor.action.addCursorBelow, etc.
 */

import type { EditorViewModel } from '../../view-model/editor-view-model';

/** Arguments a host may pass along with a command. */
export interface CommandArgs {
  /** Text for editor.action.type. */
  text?: string;
  /** Position for editor.action.addCursorAt; clamped into the document. */
  row?: number;
  column?: number;
}

export type CommandHandler = (ctx: CommandContext, args: CommandArgs) => void;

/**
 * Context passed to command handlers.
 */
export interface CommandContext {
  editor: EditorViewModel;
}

export class CommandRegistry {
  private commands: Map<string, CommandHandler> = new Map();

  register(id: string, handler: CommandHandler): void {
    this.commands.set(id, handler);
  }

  execute(id: string, ctx: CommandContext, args: CommandArgs = {}): boolean {
    const handler = this.commands.get(id);
    if (!handler) return false;
    handler(ctx, args);
    return true;
  }

  has(id: string): boolean {
    return this.commands.has(id);
  }

  getAll(): string[] {
    return [...this.commands.keys()];
  }
}
