import type { SyntaxNode } from '@lezer/common';
import { cursorInRange } from './cursor';
import { CLASSES, hide, mark, syntaxMark, widget, type Classification, type ClassifyContext, type DecorationRequest } from './types';
import { CodeWidget } from '../widgets/code';
import { MathWidget } from '../widgets/math';

const TERMINAL_NONE: Classification = { requests: [], descend: false };

function revealed(node: SyntaxNode, ctx: ClassifyContext): boolean {
  return !ctx.hideSyntax || cursorInRange(ctx.selection, node.from, node.to);
}

/**
 * Emphasis, strong emphasis and strikethrough: first and last delimiter
 * bound the styled content. Fewer than two delimiters leaves the node raw.
 */
export function classifyDelimited(
  node: SyntaxNode,
  ctx: ClassifyContext,
  markName: 'EmphasisMark' | 'StrikethroughMark',
  className: string,
): Classification {
  const marks = node.getChildren(markName);
  if (marks.length < 2) return TERMINAL_NONE;
  const first = marks[0];
  const last = marks[marks.length - 1];

  const requests: DecorationRequest[] = [mark(first.to, last.from, className)];
  if (revealed(node, ctx)) {
    requests.push(syntaxMark(first.from, first.to), syntaxMark(last.from, last.to));
  } else {
    requests.push(hide(first.from, first.to), hide(last.from, last.to));
  }
  return { requests, descend: false };
}

export function classifyInlineCode(node: SyntaxNode, ctx: ClassifyContext): Classification {
  const marks = node.getChildren('CodeMark');
  if (marks.length < 2) return TERMINAL_NONE;
  const first = marks[0];
  const last = marks[marks.length - 1];

  if (revealed(node, ctx)) {
    return {
      requests: [
        mark(first.to, last.from, CLASSES.code),
        syntaxMark(first.from, first.to),
        syntaxMark(last.from, last.to),
      ],
      descend: false,
    };
  }
  const code = ctx.doc.sliceString(first.to, last.from);
  return {
    requests: [widget(node.from, node.to, new CodeWidget(code, null, false, ctx.capabilities.highlighter))],
    descend: false,
  };
}

export function classifyLink(node: SyntaxNode, ctx: ClassifyContext): Classification {
  const marks = node.getChildren('LinkMark');
  if (marks.length < 2) return TERMINAL_NONE;
  const url = node.getChild('URL');

  const requests: DecorationRequest[] = [
    url
      ? mark(marks[0].to, marks[1].from, CLASSES.linkText, { 'data-url': ctx.doc.sliceString(url.from, url.to) })
      : mark(marks[0].to, marks[1].from, CLASSES.linkText),
  ];
  if (revealed(node, ctx)) {
    for (const m of marks) requests.push(syntaxMark(m.from, m.to));
    if (url) requests.push(mark(url.from, url.to, CLASSES.linkUrl));
  } else {
    // `](url)` or `][label]` goes as one piece.
    requests.push(hide(marks[0].from, marks[0].to), hide(marks[1].from, node.to));
  }
  return { requests, descend: false };
}

export function classifyInlineMath(node: SyntaxNode, ctx: ClassifyContext): Classification {
  const marks = node.getChildren('InlineMathMark');
  if (marks.length < 2) return TERMINAL_NONE;
  const first = marks[0];
  const last = marks[marks.length - 1];

  if (revealed(node, ctx)) {
    return { requests: [syntaxMark(first.from, first.to), syntaxMark(last.from, last.to)], descend: false };
  }
  const latex = ctx.doc.sliceString(first.to, last.from);
  if (!latex.trim()) return TERMINAL_NONE;
  return {
    requests: [widget(node.from, node.to, new MathWidget(latex, false, ctx.capabilities.typesetter))],
    descend: false,
  };
}
