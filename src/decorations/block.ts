import type { SyntaxNode } from '@lezer/common';
import { cursorOnLine } from './cursor';
import { blockEnd, blockLines, withTrailingSpace } from './lines';
import { descendants } from './nodes';
import {
  CLASSES,
  headingClass,
  hide,
  line,
  mark,
  syntaxMark,
  widget,
  type Classification,
  type ClassifyContext,
  type DecorationRequest,
} from './types';
import { CodeWidget } from '../widgets/code';
import { RuleWidget } from '../widgets/rule';
import { TableWidget, parseTable } from '../widgets/table';

function revealed(ctx: ClassifyContext, from: number, to: number): boolean {
  return !ctx.hideSyntax || cursorOnLine(ctx.doc, ctx.selection, from, to);
}

export function classifyHeading(node: SyntaxNode, ctx: ClassifyContext, level: number): Classification {
  const inside = revealed(ctx, node.from, node.to);
  const requests: DecorationRequest[] = [mark(node.from, node.to, headingClass(level))];
  for (const m of node.getChildren('HeaderMark')) {
    requests.push(inside ? syntaxMark(m.from, m.to) : hide(m.from, withTrailingSpace(ctx.doc, m.to)));
  }
  return { requests, descend: false };
}

export function classifyFencedCode(node: SyntaxNode, ctx: ClassifyContext): Classification {
  const { doc } = ctx;
  const end = blockEnd(doc, node.from, node.to);
  const claims = { from: node.from, to: end };
  const marks = node.getChildren('CodeMark');

  if (revealed(ctx, node.from, end)) {
    const lines = blockLines(doc, node.from, node.to);
    const requests: DecorationRequest[] = lines.map((l, i) => {
      let cls: string = CLASSES.codeBlock;
      if (lines.length === 1) cls += ` ${CLASSES.codeBlock}-only`;
      else if (i === 0) cls += ` ${CLASSES.codeBlock}-first`;
      else if (i === lines.length - 1) cls += ` ${CLASSES.codeBlock}-last`;
      return line(l.from, cls);
    });
    for (const m of marks) requests.push(syntaxMark(m.from, doc.lineAt(m.from).to));
    return { requests, descend: false, claims };
  }

  // An unclosed fence stays raw.
  if (marks.length < 2) return { requests: [], descend: false, claims };

  const info = node.getChild('CodeInfo');
  const language = info ? doc.sliceString(info.from, info.to).trim() || null : null;
  const openLine = doc.lineAt(marks[0].from);
  const closeLine = doc.lineAt(marks[marks.length - 1].from);
  const codeFrom = openLine.to + 1;
  const codeTo = closeLine.from;
  let code = codeFrom < codeTo ? doc.sliceString(codeFrom, codeTo) : '';
  if (code.endsWith('\n')) code = code.slice(0, -1);

  return {
    requests: [widget(node.from, end, new CodeWidget(code, language, true, ctx.capabilities.highlighter))],
    descend: false,
    claims,
  };
}

export function classifyBlockquote(node: SyntaxNode, ctx: ClassifyContext): Classification {
  const { doc } = ctx;
  const inside = revealed(ctx, node.from, blockEnd(doc, node.from, node.to));
  const requests: DecorationRequest[] = blockLines(doc, node.from, node.to)
    .map(l => line(l.from, CLASSES.blockquote));
  for (const m of descendants(node, 'QuoteMark')) {
    requests.push(inside ? syntaxMark(m.from, m.to) : hide(m.from, withTrailingSpace(doc, m.to)));
  }
  // Inline content inside the quote is classified on its own.
  return { requests, descend: true };
}

export function classifyHorizontalRule(node: SyntaxNode, ctx: ClassifyContext): Classification {
  // The parser reads the frontmatter fence as a thematic break.
  const fm = ctx.frontmatter;
  if (fm && node.from >= fm.from && node.to <= fm.to) return { requests: [], descend: false };

  const end = blockEnd(ctx.doc, node.from, node.to);
  return {
    requests: [revealed(ctx, node.from, end) ? syntaxMark(node.from, end) : widget(node.from, end, new RuleWidget())],
    descend: false,
  };
}

export function classifyListItem(node: SyntaxNode, ctx: ClassifyContext): Classification {
  if (!revealed(ctx, node.from, blockEnd(ctx.doc, node.from, node.to))) return { requests: [], descend: true };
  return {
    requests: node.getChildren('ListMark').map(m => syntaxMark(m.from, m.to)),
    descend: true,
  };
}

export function classifyTable(node: SyntaxNode, ctx: ClassifyContext): Classification {
  const { doc } = ctx;
  const end = blockEnd(doc, node.from, node.to);
  const claims = { from: node.from, to: end };

  if (revealed(ctx, node.from, end)) {
    return {
      requests: blockLines(doc, node.from, node.to).map(l => line(l.from, CLASSES.tableRaw)),
      descend: false,
      claims,
    };
  }
  const text = doc.sliceString(node.from, end);
  if (!parseTable(text)) return { requests: [], descend: false, claims };
  return { requests: [widget(node.from, end, new TableWidget(text))], descend: false, claims };
}
