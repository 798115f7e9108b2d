/**
 * Key events to command IDs.
 *
 * Shift extends (fixes the tail), alt moves by word, the command modifier
 * moves to line edges or selects a whole unit.
 */

export interface KeyEvent {
  key: string;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

export function resolveKeybinding(event: KeyEvent): string | null {
  const meta = event.metaKey || event.ctrlKey; // Cmd on macOS, Ctrl on others
  const shift = event.shiftKey;
  const alt = event.altKey;

  // Undo/Redo
  if (meta && !shift && event.key === 'z') return 'editor.action.undo';
  if (meta && shift && event.key === 'z') return 'editor.action.redo';
  if (meta && event.key === 'y') return 'editor.action.redo';

  // Navigation
  if (event.key === 'ArrowLeft') {
    if (meta && shift) return 'editor.action.selectToLineStart';
    if (meta) return 'editor.action.moveCursorToLineStart';
    if (alt && shift) return 'editor.action.selectWordLeft';
    if (alt) return 'editor.action.moveCursorWordLeft';
    if (shift) return 'editor.action.selectLeft';
    return 'editor.action.moveCursorLeft';
  }
  if (event.key === 'ArrowRight') {
    if (meta && shift) return 'editor.action.selectToLineEnd';
    if (meta) return 'editor.action.moveCursorToLineEnd';
    if (alt && shift) return 'editor.action.selectWordRight';
    if (alt) return 'editor.action.moveCursorWordRight';
    if (shift) return 'editor.action.selectRight';
    return 'editor.action.moveCursorRight';
  }
  if (event.key === 'ArrowUp') {
    if (meta && alt) return 'editor.action.addCursorAbove';
    if (shift) return 'editor.action.selectUp';
    return 'editor.action.moveCursorUp';
  }
  if (event.key === 'ArrowDown') {
    if (meta && alt) return 'editor.action.addCursorBelow';
    if (shift) return 'editor.action.selectDown';
    return 'editor.action.moveCursorDown';
  }

  if (event.key === 'Home') {
    if (shift) return 'editor.action.selectToLineStart';
    return 'editor.action.moveCursorToLineStart';
  }
  if (event.key === 'End') {
    if (shift) return 'editor.action.selectToLineEnd';
    return 'editor.action.moveCursorToLineEnd';
  }

  // Editing
  if (event.key === 'Backspace') return 'editor.action.deleteLeft';
  if (event.key === 'Delete') return 'editor.action.deleteRight';
  if (event.key === 'Enter') return 'editor.action.insertLineBreak';
  if (event.key === 'Tab') return 'editor.action.tab';

  // Selection
  if (meta && event.key === 'a') return 'editor.action.selectAll';
  if (meta && event.key === 'l') return 'editor.action.selectLine';
  if (meta && event.key === 'd') return 'editor.action.selectWord';

  // Clipboard
  if (meta && event.key === 'c') return 'editor.action.copy';
  if (meta && event.key === 'x') return 'editor.action.cut';
  if (meta && event.key === 'v') return 'editor.action.paste';

  return null;
}
