/**
 * Clipboard commands: copy, cut, paste.
 *
 * The core keeps an in-memory clipboard. A host wires the platform
 * clipboard in by passing its own ClipboardStore to the view model.
 */

import { Selection, index, mergeSelections } from '../cursor/selection';
import type { TextDocument } from '../document/text-document';
import type { CommandRegistry } from './registry';

export interface ClipboardStore {
  read(): string;
  write(text: string): void;
}

export class MemoryClipboard implements ClipboardStore {
  private text = '';

  read(): string {
    return this.text;
  }

  write(text: string): void {
    this.text = text;
  }
}

/** The whole row under `row`, including its line break when one follows. */
function lineSpan(document: TextDocument, row: number): Selection {
  if (row < document.numRows - 1) return new Selection(index(row, 0), index(row + 1, 0));
  return new Selection(index(row, 0), index(row, document.getNumColumns(row)));
}

function hasRange(selections: readonly Selection[]): boolean {
  return selections.some(s => !s.isSingular());
}

export function registerClipboardCommands(registry: CommandRegistry): void {
  registry.register('editor.action.copy', (ctx) => {
    const { editor } = ctx;
    const { document } = editor;
    const selections = document.getSelections();

    if (hasRange(selections)) {
      const texts = selections
        .filter(s => !s.isSingular())
        .map(s => document.getSelectionContent(s));
      editor.clipboard.write(texts.join('\n'));
    } else {
      // No selection: copy the caret lines
      const rows = [...new Set(selections.map(s => s.head.row))].sort((a, b) => a - b);
      editor.clipboard.write(rows.map(row => document.getLine(row) + '\n').join(''));
    }
  });

  registry.register('editor.action.cut', (ctx, args) => {
    const { editor } = ctx;
    const { document } = editor;
    registry.execute('editor.action.copy', ctx, args);

    if (!hasRange(document.getSelections())) {
      // Cut entire lines
      const spans = document.getSelections().map(s => lineSpan(document, s.head.row));
      editor.setSelections(mergeSelections(spans));
    }
    editor.insert('');
  });

  registry.register('editor.action.paste', (ctx) => {
    const { editor } = ctx;
    const text = editor.clipboard.read();
    if (text.length === 0) return;

    // If clipboard has N lines and there are N selections, distribute one line per selection
    const lines = text.split('\n');
    // Copied caret lines end with a line break
    if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
    const count = editor.document.numSelections;
    if (count > 1 && lines.length === count) {
      editor.insertPerSelection(lines);
    } else {
      editor.insert(text);
    }
  });
}
