import type { Line, Text } from '@codemirror/state';

/**
 * End position of a block node's actual content.
 *
 * lezer-markdown block nodes (Table, FencedCode, Blockquote, ...) may
 * include the trailing newline in their `to`, placing it at the start of
 * the NEXT line. `doc.lineAt(to)` would then return that line and let
 * decorations leak onto it. When `to` falls exactly on a line start, step
 * back to the end of the previous line.
 */
export function blockEnd(doc: Text, from: number, to: number): number {
  const safeTo = Math.min(to, doc.length);
  if (safeTo > from && doc.lineAt(safeTo).from === safeTo) return safeTo - 1;
  return safeTo;
}

/** Lines covered by a block node, with the trailing-newline convention handled. */
export function blockLines(doc: Text, from: number, to: number): Line[] {
  const first = doc.lineAt(Math.max(0, Math.min(from, doc.length))).number;
  const last = doc.lineAt(Math.max(0, blockEnd(doc, from, to))).number;
  const lines: Line[] = [];
  for (let n = first; n <= last; n++) lines.push(doc.line(n));
  return lines;
}

/** `to` extended over one following space, as hidden markers take it along. */
export function withTrailingSpace(doc: Text, to: number): number {
  return to < doc.length && doc.sliceString(to, to + 1) === ' ' ? to + 1 : to;
}
