import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { Selection, index } from '../core/cursor/selection';
import { TextDocument } from '../core/document/text-document';
import { EditCode, createTransaction } from '../core/document/transaction';
import { UndoManager } from '../core/history/undo-manager';

function type(um: UndoManager, text: string): void {
  um.performAtSelections((selection, n) => createTransaction(selection, text, n));
}

describe('UndoManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 1));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('edits within the window undo together', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);

    type(um, 'a');
    vi.advanceTimersByTime(100);
    type(um, 'b');
    vi.advanceTimersByTime(100);
    type(um, 'c');

    expect(doc.getText()).toBe('abc');
    expect(um.undoDepth).toBe(1);
    expect(um.undo()).toBe(true);
    expect(doc.getText()).toBe('');
    expect(um.canUndo).toBe(false);
    expect(um.canRedo).toBe(true);
  });

  test('a gap longer than the window starts a new group', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);

    type(um, 'a');
    vi.advanceTimersByTime(500);
    type(um, 'b');

    expect(um.undoDepth).toBe(2);
    um.undo();
    expect(doc.getText()).toBe('a');
  });

  test('window is configurable', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc, { coalesceWindowMs: 50 });

    type(um, 'a');
    vi.advanceTimersByTime(100);
    type(um, 'b');
    expect(um.undoDepth).toBe(2);
  });

  test('beginNewGroup splits a burst', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);

    type(um, 'a');
    um.beginNewGroup();
    type(um, 'b');
    expect(um.undoDepth).toBe(2);
  });

  test('redo replays the group and restores the caret', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);

    type(um, 'a');
    type(um, 'b');
    um.undo();
    expect(doc.getText()).toBe('');
    expect(doc.getSelection(0).toTuple()).toEqual([0, 0, 0, 0]);

    expect(um.redo()).toBe(true);
    expect(doc.getText()).toBe('ab');
    expect(doc.getSelection(0).toTuple()).toEqual([0, 2, 0, 2]);
    expect(um.canRedo).toBe(false);
  });

  test('a new edit clears redo', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);

    type(um, 'a');
    um.undo();
    type(um, 'b');
    expect(doc.getText()).toBe('b');
    expect(um.canRedo).toBe(false);
  });

  test('an edit after undo starts a new group', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);

    type(um, 'a');
    vi.advanceTimersByTime(500);
    type(um, 'b');
    um.undo();
    vi.advanceTimersByTime(10);
    type(um, 'c');

    expect(doc.getText()).toBe('ac');
    expect(um.undoDepth).toBe(2);
    um.undo();
    expect(doc.getText()).toBe('a');
  });

  test('empty history', () => {
    const um = new UndoManager(new TextDocument('abc'));
    expect(um.undo()).toBe(false);
    expect(um.redo()).toBe(false);
  });

  test('maxUndoDepth drops the oldest group', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc, { maxUndoDepth: 2 });

    type(um, 'a');
    um.beginNewGroup();
    type(um, 'b');
    um.beginNewGroup();
    type(um, 'c');

    expect(um.undoDepth).toBe(2);
    um.undo();
    um.undo();
    expect(doc.getText()).toBe('a');
    expect(um.undo()).toBe(false);
  });

  test('no-op edits are not recorded', () => {
    const doc = new TextDocument('abc');
    const um = new UndoManager(doc);
    type(um, EditCode.backspace);
    expect(um.canUndo).toBe(false);
  });

  test('one keystroke at several carets is one group', () => {
    const doc = new TextDocument('abcd');
    doc.setSelections([Selection.caret(index(0, 1)), Selection.caret(index(0, 3))]);
    const um = new UndoManager(doc);

    type(um, 'x');
    expect(doc.getText()).toBe('axbcxd');
    expect(um.undoDepth).toBe(1);

    um.undo();
    expect(doc.getText()).toBe('abcd');
    expect(doc.getSelections().map(s => s.toTuple())).toEqual([[0, 1, 0, 1], [0, 3, 0, 3]]);
  });

  test('undo after the selections were replaced re-anchors every caret', () => {
    const doc = new TextDocument('ab\ncd');
    doc.setSelections([Selection.caret(index(1, 0))]);
    const um = new UndoManager(doc);

    type(um, 'x');
    expect(doc.getText()).toBe('ab\nxcd');
    doc.setSelections([Selection.caret(index(0, 0)), Selection.caret(index(1, 1))]);

    um.undo();
    expect(doc.getText()).toBe('ab\ncd');
    expect(doc.getSelections().map(s => s.toTuple())).toEqual([[0, 0, 0, 0], [1, 0, 1, 0]]);

    um.redo();
    expect(doc.getText()).toBe('ab\nxcd');
    expect(doc.getSelections().map(s => s.toTuple())).toEqual([[0, 0, 0, 0], [1, 1, 1, 1]]);
  });

  test('perform returns the reciprocal', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);
    const r = um.perform(createTransaction(Selection.caret(index(0, 0)), 'hi'));
    expect(r.content).toBe('');
    expect(r.selection.toTuple()).toEqual([0, 0, 0, 2]);
    expect(um.canUndo).toBe(true);
  });

  test('builder may skip selections', () => {
    const doc = new TextDocument('ab');
    doc.setSelections([Selection.caret(index(0, 0)), Selection.caret(index(0, 2))]);
    const um = new UndoManager(doc);
    um.performAtSelections((selection, n) => (n === 1 ? createTransaction(selection, '!', n) : null));
    expect(doc.getText()).toBe('ab!');
  });

  test('clear', () => {
    const doc = new TextDocument();
    const um = new UndoManager(doc);
    type(um, 'a');
    um.clear();
    expect(um.canUndo).toBe(false);
    expect(um.canRedo).toBe(false);
  });
});
