import type { EditorSelection, Text } from '@codemirror/state';
import type { Tree } from '@lezer/common';
import type { PreviewWidget } from '../widgets';
import type { RenderCapabilities } from '../widgets/capabilities';

export type DecorationKind =
  /** Style the range without changing the rendered text. */
  | { type: 'mark'; className: string; attributes?: Record<string, string> }
  /** Render nothing in place of the range. */
  | { type: 'hide' }
  /** Render `widget` in place of the range. */
  | { type: 'widget'; widget: PreviewWidget }
  /** Style a whole line; `from === to === line.from`. */
  | { type: 'line'; className: string };

export interface DecorationRequest {
  from: number;
  to: number;
  kind: DecorationKind;
}

/** The inputs of one assembly pass. */
export interface PreviewInputs {
  doc: Text;
  selection: EditorSelection;
  tree: Tree;
}

export interface ClassifyContext {
  doc: Text;
  selection: EditorSelection;
  capabilities: RenderCapabilities;
  /** When false, every construct is treated as if the cursor were inside it. */
  hideSyntax: boolean;
  /** Span of the frontmatter block, if the document opens with one. */
  frontmatter: { from: number; to: number } | null;
}

export interface Classification {
  requests: DecorationRequest[];
  /** Whether traversal continues into the node's children. */
  descend: boolean;
  /** Span owned by a terminal block construct; text detectors stay out of it. */
  claims?: { from: number; to: number };
}

export const CLASSES = {
  syntax: 'cm-md-syntax',
  italic: 'cm-md-italic',
  bold: 'cm-md-bold',
  strikethrough: 'cm-md-strikethrough',
  code: 'cm-md-code',
  codeBlock: 'cm-md-codeblock',
  blockquote: 'cm-md-blockquote',
  linkText: 'cm-md-link-text',
  linkUrl: 'cm-md-link-url',
  tableRaw: 'cm-md-table-raw',
  frontmatterRaw: 'cm-md-frontmatter-raw',
} as const;

export function headingClass(level: number): string {
  return `cm-md-h${level}`;
}

export const mark = (from: number, to: number, className: string, attributes?: Record<string, string>): DecorationRequest =>
  ({ from, to, kind: attributes ? { type: 'mark', className, attributes } : { type: 'mark', className } });

export const syntaxMark = (from: number, to: number): DecorationRequest => mark(from, to, CLASSES.syntax);

export const hide = (from: number, to: number): DecorationRequest => ({ from, to, kind: { type: 'hide' } });

export const widget = (from: number, to: number, w: PreviewWidget): DecorationRequest =>
  ({ from, to, kind: { type: 'widget', widget: w } });

export const line = (pos: number, className: string): DecorationRequest =>
  ({ from: pos, to: pos, kind: { type: 'line', className } });
