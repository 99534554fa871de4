import { describe, it, expect } from 'vitest';
import { cursorInRange, cursorOnLine } from '../src/decorations/cursor';
import { docOf, selectionAt } from './helpers';

describe('cursorInRange', () => {
  it('includes both ends of the range', () => {
    expect(cursorInRange(selectionAt(2), 2, 6)).toBe(true);
    expect(cursorInRange(selectionAt(6), 2, 6)).toBe(true);
  });

  it('is false just outside the range', () => {
    expect(cursorInRange(selectionAt(1), 2, 6)).toBe(false);
    expect(cursorInRange(selectionAt(7), 2, 6)).toBe(false);
  });

  it('checks every selection range', () => {
    expect(cursorInRange(selectionAt(0, 4), 2, 6)).toBe(true);
  });
});

describe('cursorOnLine', () => {
  const doc = docOf('one\ntwo\nthree\nfour');

  it('matches any line covered by the span', () => {
    // `two\nthree` spans lines 2-3
    expect(cursorOnLine(doc, selectionAt(4), 4, 13)).toBe(true);
    expect(cursorOnLine(doc, selectionAt(10), 4, 13)).toBe(true);
  });

  it('matches a head elsewhere on a covered line', () => {
    // span is only `thr`, head at end of line 3
    expect(cursorOnLine(doc, selectionAt(13), 8, 11)).toBe(true);
  });

  it('is false for heads on other lines', () => {
    expect(cursorOnLine(doc, selectionAt(0), 4, 13)).toBe(false);
    expect(cursorOnLine(doc, selectionAt(16), 4, 13)).toBe(false);
  });

  it('treats heads outside the document as on no line', () => {
    expect(cursorOnLine(doc, selectionAt(500), 14, 18)).toBe(false);
  });

  it('clamps a span that runs past the document', () => {
    expect(cursorOnLine(doc, selectionAt(16), 14, 400)).toBe(true);
  });
});
