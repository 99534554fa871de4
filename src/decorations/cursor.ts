import type { EditorSelection, Text } from '@codemirror/state';

/** True iff some selection head lies within `[from, to]`. Used for inline constructs. */
export function cursorInRange(selection: EditorSelection, from: number, to: number): boolean {
  for (const range of selection.ranges) {
    if (range.head >= from && range.head <= to) return true;
  }
  return false;
}

/**
 * True iff some selection head sits on one of the lines spanned by
 * `[from, to]`. Used for line-oriented constructs. A head outside the
 * document is on no line.
 */
export function cursorOnLine(doc: Text, selection: EditorSelection, from: number, to: number): boolean {
  const fromLine = doc.lineAt(Math.max(0, Math.min(from, doc.length))).number;
  const toLine = doc.lineAt(Math.max(0, Math.min(to, doc.length))).number;
  for (const range of selection.ranges) {
    if (range.head < 0 || range.head > doc.length) continue;
    const cursorLine = doc.lineAt(range.head).number;
    if (cursorLine >= fromLine && cursorLine <= toLine) return true;
  }
  return false;
}
