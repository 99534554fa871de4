import { EditorSelection, Text } from '@codemirror/state';
import type { DecorationRequest, PreviewInputs } from '../src/decorations/types';
import { markdownParser } from '../src/syntax/inline-math';
import { CodeWidget } from '../src/widgets/code';
import { FrontmatterWidget } from '../src/widgets/frontmatter';
import { MathWidget } from '../src/widgets/math';
import { RuleWidget } from '../src/widgets/rule';
import { TableWidget } from '../src/widgets/table';
import type { PreviewWidget } from '../src/widgets';

export function docOf(source: string): Text {
  return Text.of(source.split('\n'));
}

export function selectionAt(...heads: number[]): EditorSelection {
  return EditorSelection.create(heads.map(h => EditorSelection.cursor(h)));
}

/** Document, cursor(s) and a fresh parse of `source`. */
export function inputs(source: string, ...heads: number[]): PreviewInputs {
  return {
    doc: docOf(source),
    selection: selectionAt(...heads),
    tree: markdownParser.parse(source),
  };
}

function widgetName(w: PreviewWidget): string {
  if (w instanceof CodeWidget) return 'CodeWidget';
  if (w instanceof MathWidget) return 'MathWidget';
  if (w instanceof TableWidget) return 'TableWidget';
  if (w instanceof FrontmatterWidget) return 'FrontmatterWidget';
  if (w instanceof RuleWidget) return 'RuleWidget';
  return 'unknown';
}

/** One line per request, e.g. `hide 0-2` or `line cm-md-blockquote 8`. */
export function summarize(requests: readonly DecorationRequest[]): string[] {
  return requests.map(({ from, to, kind }) => {
    switch (kind.type) {
      case 'mark': return `mark ${kind.className} ${from}-${to}`;
      case 'hide': return `hide ${from}-${to}`;
      case 'widget': return `widget ${widgetName(kind.widget)} ${from}-${to}`;
      case 'line': return `line ${kind.className} ${from}`;
    }
  });
}

/** The widget of the only widget request in `requests`. */
export function onlyWidget(requests: readonly DecorationRequest[]): PreviewWidget {
  const widgets = requests.flatMap(r => (r.kind.type === 'widget' ? [r.kind.widget] : []));
  if (widgets.length !== 1) throw new Error(`expected one widget, found ${widgets.length}`);
  return widgets[0];
}
