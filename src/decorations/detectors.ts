import type { Text } from '@codemirror/state';
import { cursorOnLine } from './cursor';
import { line, syntaxMark, widget, CLASSES, type ClassifyContext, type DecorationRequest } from './types';
import { FrontmatterWidget } from '../widgets/frontmatter';
import { MathWidget } from '../widgets/math';

export interface Span {
  from: number;
  to: number;
}

export interface Frontmatter extends Span {
  /** The YAML between the two fences. */
  yaml: string;
  /** Line number of the closing fence. */
  closeLine: number;
}

const FENCE = /^---[ \t]*$/;

/**
 * YAML frontmatter: a `---` first line and a later `---` line with at least
 * one line between them. Only the very start of the document qualifies;
 * two adjacent fences are thematic breaks.
 */
export function detectFrontmatter(doc: Text): Frontmatter | null {
  if (doc.lines < 3 || !FENCE.test(doc.line(1).text)) return null;
  for (let i = 3; i <= doc.lines; i++) {
    const close = doc.line(i);
    if (!FENCE.test(close.text)) continue;
    return { from: 0, to: close.to, yaml: doc.sliceString(doc.line(2).from, doc.line(i - 1).to), closeLine: i };
  }
  return null;
}

export function frontmatterRequests(fm: Frontmatter, ctx: ClassifyContext): DecorationRequest[] {
  const { doc } = ctx;
  if (ctx.hideSyntax && !cursorOnLine(doc, ctx.selection, fm.from, fm.to)) {
    return [widget(fm.from, fm.to, new FrontmatterWidget(fm.yaml))];
  }
  const open = doc.line(1);
  const close = doc.line(fm.closeLine);
  const requests = [syntaxMark(open.from, open.to), syntaxMark(close.from, close.to)];
  for (let n = 1; n <= fm.closeLine; n++) requests.push(line(doc.line(n).from, CLASSES.frontmatterRaw));
  return requests;
}

const DISPLAY_MATH = /^\$\$[ \t]*\n([\s\S]*?)\n\$\$[ \t]*$/gm;

function covers(outer: Span, inner: Span): boolean {
  return outer.from <= inner.from && outer.to >= inner.to;
}

function overlaps(a: Span, b: Span): boolean {
  return a.from < b.to && a.to > b.from;
}

/**
 * `$$ ... $$` blocks found by scanning the text. A block is skipped when a
 * tree-traversal request already covers it or when it overlaps a span owned
 * by a terminal block construct (fenced code, table, frontmatter).
 */
export function displayMathRequests(
  ctx: ClassifyContext,
  existing: readonly DecorationRequest[],
  claimed: readonly Span[],
): DecorationRequest[] {
  const { doc } = ctx;
  const text = doc.toString();
  const requests: DecorationRequest[] = [];

  for (const match of text.matchAll(DISPLAY_MATH)) {
    const span = { from: match.index ?? 0, to: (match.index ?? 0) + match[0].length };
    if (existing.some(d => d.from !== d.to && covers(d, span))) continue;
    if (claimed.some(c => overlaps(c, span))) continue;

    if (!ctx.hideSyntax || cursorOnLine(doc, ctx.selection, span.from, span.to)) {
      const first = doc.lineAt(span.from);
      const last = doc.lineAt(span.to);
      requests.push(syntaxMark(first.from, first.to));
      if (last.number !== first.number) requests.push(syntaxMark(last.from, last.to));
      continue;
    }
    const latex = match[1].trim();
    if (latex) requests.push(widget(span.from, span.to, new MathWidget(latex, true, ctx.capabilities.typesetter)));
  }
  return requests;
}
