import { describe, expect, test } from 'vitest';
import { Selection, index } from '../core/cursor/selection';
import { TextDocument } from '../core/document/text-document';
import type { DocumentChange } from '../core/document/text-document';
import { EditCode, createTransaction, isNoOp } from '../core/document/transaction';
import { BufferRangeError } from '../core/errors';

function tuples(doc: TextDocument) {
  return doc.getSelections().map(s => s.toTuple());
}

describe('TextDocument', () => {
  describe('content', () => {
    test('constructor splits rows', () => {
      const doc = new TextDocument('abc\ndef');
      expect(doc.numRows).toBe(2);
      expect(doc.getLine(1)).toBe('def');
      expect(tuples(doc)).toEqual([[0, 0, 0, 0]]);
    });

    test('replaceAll resets selections and emits reset', () => {
      const doc = new TextDocument('abc');
      doc.setSelections([Selection.caret(index(0, 2))]);
      const changes: DocumentChange[] = [];
      doc.onChange(c => changes.push(c));

      doc.replaceAll('x\r\ny');
      expect(doc.toState().lines).toEqual(['x', 'y']);
      expect(tuples(doc)).toEqual([[0, 0, 0, 0]]);
      expect(changes).toEqual([{ type: 'reset' }]);
    });

    test('replaceAll with empty text leaves one empty row', () => {
      const doc = new TextDocument('abc');
      doc.replaceAll('');
      expect(doc.numRows).toBe(1);
      expect(doc.getNumColumns(0)).toBe(0);
    });

    test('getCharacter has a virtual newline at row ends and the end', () => {
      const doc = new TextDocument('ab\ncd');
      expect(doc.getCharacter(index(0, 0))).toBe('a');
      expect(doc.getCharacter(index(0, 2))).toBe('\n');
      expect(doc.getCharacter(index(2, 0))).toBe('\n');
      expect(() => doc.getCharacter(index(3, 0))).toThrow(BufferRangeError);
    });

    test('getSelectionContent joins rows', () => {
      const doc = new TextDocument('abc\ndef\nghi');
      expect(doc.getSelectionContent(new Selection(index(0, 1), index(2, 2)))).toBe('bc\ndef\ngh');
      expect(doc.getSelectionContent(new Selection(index(2, 2), index(0, 1)))).toBe('bc\ndef\ngh');
      expect(doc.getSelectionContent(new Selection(index(1, 1), index(1, 3)))).toBe('ef');
    });

    test('getColumnRanges per row', () => {
      const doc = new TextDocument('abc\ndef\nghi');
      expect(doc.getColumnRanges(new Selection(index(2, 2), index(0, 1)))).toEqual([
        { row: 0, start: 1, end: 3 },
        { row: 1, start: 0, end: 3 },
        { row: 2, start: 0, end: 2 },
      ]);
    });

    test('clampIndex', () => {
      const doc = new TextDocument('ab\ncd');
      expect(doc.clampIndex(index(9, 9))).toEqual(index(1, 2));
      expect(doc.clampIndex(index(-1, -3))).toEqual(index(0, 0));
    });
  });

  describe('selections', () => {
    test('setSelections rejects an empty list', () => {
      const doc = new TextDocument('abc');
      expect(() => doc.setSelections([])).toThrow(RangeError);
    });

    test('setSelections rejects out of range selections', () => {
      const doc = new TextDocument('abc');
      expect(() => doc.setSelections([Selection.caret(index(0, 9))])).toThrow(BufferRangeError);
      expect(tuples(doc)).toEqual([[0, 0, 0, 0]]);
    });

    test('addSelection and setSelection', () => {
      const doc = new TextDocument('abc');
      doc.addSelection(Selection.caret(index(0, 2)));
      doc.setSelection(0, Selection.caret(index(0, 1)));
      expect(tuples(doc)).toEqual([[0, 1, 0, 1], [0, 2, 0, 2]]);
      expect(() => doc.setSelection(2, Selection.caret(index(0, 0)))).toThrow(RangeError);
    });
  });

  describe('fulfill', () => {
    test('inserting a newline splits the row', () => {
      const doc = new TextDocument('abc\ndef');
      const r = doc.fulfill(createTransaction(Selection.caret(index(0, 3)), '\n'));

      expect(doc.toState().lines).toEqual(['abc', '', 'def']);
      expect(r.selection.toTuple()).toEqual([0, 3, 1, 0]);
      expect(r.content).toBe('');
      expect(r.direction).toBe('reverse');
    });

    test('reciprocal restores the text', () => {
      const doc = new TextDocument('abc\ndef');
      const r = doc.fulfill(createTransaction(Selection.caret(index(0, 3)), '\n'));
      const back = doc.fulfill(r);

      expect(doc.getText()).toBe('abc\ndef');
      expect(back.direction).toBe('forward');
      expect(back.content).toBe('\n');
      expect(back.selection.toTuple()).toEqual([0, 3, 0, 3]);
    });

    test('siblings are re-anchored and restored by the reciprocal', () => {
      const doc = new TextDocument('hello world');
      doc.setSelections([Selection.caret(index(0, 0)), Selection.caret(index(0, 8))]);

      const r = doc.fulfill(createTransaction(new Selection(index(0, 2), index(0, 5)), 'XY'));
      expect(doc.getText()).toBe('heXY world');
      expect(tuples(doc)).toEqual([[0, 0, 0, 0], [0, 7, 0, 7]]);

      doc.fulfill(r);
      expect(doc.getText()).toBe('hello world');
      expect(tuples(doc)).toEqual([[0, 0, 0, 0], [0, 8, 0, 8]]);
    });

    test('one character at two carets', () => {
      const doc = new TextDocument('abcd');
      doc.setSelections([Selection.caret(index(0, 1)), Selection.caret(index(0, 3))]);
      for (let n = 0; n < doc.numSelections; n++) {
        doc.fulfill(createTransaction(doc.getSelection(n), 'x', n));
      }
      expect(doc.getText()).toBe('axbcxd');
      expect(tuples(doc)).toEqual([[0, 2, 0, 2], [0, 5, 0, 5]]);
    });

    test('backspace at the document start is a no-op', () => {
      const doc = new TextDocument('abc');
      const r = doc.fulfill(createTransaction(doc.getSelection(0), EditCode.backspace, 0));
      expect(doc.getText()).toBe('abc');
      expect(tuples(doc)).toEqual([[0, 0, 0, 0]]);
      expect(isNoOp(r)).toBe(true);
    });

    test('backspace at a row start joins rows', () => {
      const doc = new TextDocument('ab\ncd');
      doc.setSelections([Selection.caret(index(1, 0))]);
      const r = doc.fulfill(createTransaction(doc.getSelection(0), EditCode.backspace, 0));
      expect(doc.getText()).toBe('abcd');
      expect(tuples(doc)).toEqual([[0, 2, 0, 2]]);
      expect(r.content).toBe('\n');
    });

    test('delete at a row end joins rows', () => {
      const doc = new TextDocument('ab\ncd');
      doc.setSelections([Selection.caret(index(0, 2))]);
      doc.fulfill(createTransaction(doc.getSelection(0), EditCode.delete, 0));
      expect(doc.getText()).toBe('abcd');
      expect(tuples(doc)).toEqual([[0, 2, 0, 2]]);
    });

    test('delete at the document end is a no-op', () => {
      const doc = new TextDocument('ab');
      doc.setSelections([Selection.caret(index(0, 2))]);
      const r = doc.fulfill(createTransaction(doc.getSelection(0), EditCode.delete, 0));
      expect(doc.getText()).toBe('ab');
      expect(isNoOp(r)).toBe(true);
    });

    test('tab inserts tabSize spaces', () => {
      const doc = new TextDocument('', { tabSize: 2 });
      doc.fulfill(createTransaction(doc.getSelection(0), EditCode.tab, 0));
      expect(doc.getText()).toBe('  ');
      expect(tuples(doc)).toEqual([[0, 2, 0, 2]]);
    });

    test('undoing through the target selects the restored text', () => {
      const doc = new TextDocument('hello');
      doc.setSelections([new Selection(index(0, 1), index(0, 4))]);
      const r = doc.fulfill(createTransaction(doc.getSelection(0), 'E', 0));
      expect(doc.getText()).toBe('hEo');
      expect(tuples(doc)).toEqual([[0, 2, 0, 2]]);
      expect(r.content).toBe('ell');

      doc.fulfill(r);
      expect(doc.getText()).toBe('hello');
      expect(tuples(doc)).toEqual([[0, 1, 0, 4]]);
    });

    test('out of range selection throws', () => {
      const doc = new TextDocument('abc');
      expect(() => doc.fulfill(createTransaction(Selection.caret(index(5, 0)), 'x'))).toThrow(BufferRangeError);
      expect(() => doc.fulfill(createTransaction(Selection.caret(index(0, 9)), 'x'))).toThrow(BufferRangeError);
      expect(doc.getText()).toBe('abc');
    });

    test('a sibling on the head of a replaced range ends after the restored text', () => {
      const doc = new TextDocument('abcd');
      doc.setSelections([new Selection(index(0, 1), index(0, 3)), Selection.caret(index(0, 1))]);

      const r = doc.fulfill(createTransaction(doc.getSelection(0), 'X', 0));
      expect(doc.getText()).toBe('aXd');
      expect(tuples(doc)).toEqual([[0, 2, 0, 2], [0, 2, 0, 2]]);

      doc.fulfill(r);
      expect(doc.getText()).toBe('abcd');
      expect(tuples(doc)).toEqual([[0, 1, 0, 3], [0, 3, 0, 3]]);
    });

    test('emits a rows change', () => {
      const doc = new TextDocument('abc\ndef');
      const changes: DocumentChange[] = [];
      const unsubscribe = doc.onChange(c => changes.push(c));

      doc.fulfill(createTransaction(Selection.caret(index(0, 3)), '\n'));
      expect(changes).toEqual([{ type: 'rows', row: 0, removed: 1, inserted: 2 }]);

      unsubscribe();
      doc.fulfill(createTransaction(Selection.caret(index(0, 0)), 'x'));
      expect(changes).toHaveLength(1);
    });
  });

  describe('style tokens', () => {
    test('new rows start at token 0', () => {
      expect(new TextDocument('abc').getTokens(0)).toEqual([0, 0, 0]);
    });

    test('inserted characters get token 0', () => {
      const doc = new TextDocument('abcdef');
      doc.applyTokens(new Selection(index(0, 1), index(0, 4)), 7);
      expect(doc.getTokens(0)).toEqual([0, 7, 7, 7, 0, 0]);

      doc.fulfill(createTransaction(Selection.caret(index(0, 2)), 'XY'));
      expect(doc.getText()).toBe('abXYcdef');
      expect(doc.getTokens(0)).toEqual([0, 7, 0, 0, 7, 7, 0, 0]);
    });

    test('tokens follow a row join', () => {
      const doc = new TextDocument('ab\ncd');
      doc.applyTokens(new Selection(index(0, 0), index(1, 2)), 3);
      doc.fulfill(createTransaction(new Selection(index(0, 1), index(1, 1)), ''));
      expect(doc.getText()).toBe('ad');
      expect(doc.getTokens(0)).toEqual([3, 3]);
    });

    test('tokens follow a row split', () => {
      const doc = new TextDocument('abc');
      doc.applyTokens(new Selection(index(0, 0), index(0, 3)), 2);
      doc.fulfill(createTransaction(Selection.caret(index(0, 1)), '\n'));
      expect(doc.getTokens(0)).toEqual([2]);
      expect(doc.getTokens(1)).toEqual([2, 2]);
    });

    test('applyTokens and clearTokens emit style changes', () => {
      const doc = new TextDocument('ab\ncd\nef');
      const changes: DocumentChange[] = [];
      doc.onChange(c => changes.push(c));

      doc.applyTokens(new Selection(index(1, 1), index(0, 1)), 5);
      doc.clearTokens();
      expect(changes).toEqual([
        { type: 'style', fromRow: 0, toRow: 1 },
        { type: 'style', fromRow: 0, toRow: 2 },
      ]);
      expect(doc.getTokens(0)).toEqual([0, 0]);
    });
  });

  describe('state', () => {
    test('toState and restoreState round trip', () => {
      const doc = new TextDocument('ab\ncd');
      doc.setSelections([new Selection(index(1, 2), index(0, 1))]);
      const state = doc.toState();
      expect(state).toEqual({ lines: ['ab', 'cd'], selections: [[1, 2, 0, 1]] });

      const other = new TextDocument();
      other.restoreState(state);
      expect(other.getText()).toBe('ab\ncd');
      expect(tuples(other)).toEqual([[1, 2, 0, 1]]);
    });

    test('restoreState validates before changing anything', () => {
      const doc = new TextDocument('xyz');
      expect(() => doc.restoreState({ lines: ['ab'], selections: [[0, 5, 0, 5]] })).toThrow(BufferRangeError);
      expect(() => doc.restoreState({ lines: [], selections: [[0, 0, 0, 0]] })).toThrow(BufferRangeError);
      expect(() => doc.restoreState({ lines: ['a\nb'], selections: [[0, 0, 0, 0]] })).toThrow(BufferRangeError);
      expect(() => doc.restoreState({ lines: ['ab'], selections: [] })).toThrow(RangeError);
      expect(doc.getText()).toBe('xyz');
    });
  });
});
