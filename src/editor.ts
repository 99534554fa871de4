import { EditorState, Annotation, type Extension, type Transaction } from '@codemirror/state';
import { EditorView, keymap, placeholder, drawSelection } from '@codemirror/view';
import { defaultKeymap, history, historyKeymap, indentWithTab } from '@codemirror/commands';
import { markdown, markdownLanguage } from '@codemirror/lang-markdown';
import { syntaxHighlighting, defaultHighlightStyle } from '@codemirror/language';
import { createTheme } from './theme';
import { livePreview } from './decorations/index';
import { InlineMath } from './syntax/inline-math';
import { normalizeEditorOptions, type EditorOptions } from './config';

// Marks cursor-adjustment transactions so they are not adjusted again.
const cursorAdjust = Annotation.define<boolean>();

const HEADING_PREFIX = /^#{1,6}\s/;

/**
 * Fix: cursor jumps into a heading prefix (###) on click.
 *
 * When ### is hidden and the user clicks the visible heading text, the
 * click resolves correctly. The decoration rebuild then reveals ###,
 * shifting the text right, and a tiny mousemove during the click
 * re-resolves the same coordinates against the new layout, landing the
 * cursor inside the prefix.
 *
 * Returns the position past the prefix to move a pointer-placed cursor
 * to, or `null` when the selection should stay.
 */
export function headingPrefixAdjustment(state: EditorState, transactions: readonly Transaction[]): number | null {
  if (transactions.some(tr => tr.docChanged || tr.annotation(cursorAdjust))) return null;
  if (!transactions.some(tr => tr.isUserEvent('select.pointer'))) return null;

  const sel = state.selection.main;
  if (!sel.empty) return null;

  const line = state.doc.lineAt(sel.from);
  const prefix = HEADING_PREFIX.exec(line.text);
  if (!prefix) return null;
  const prefixEnd = line.from + prefix[0].length;
  return sel.from < prefixEnd ? prefixEnd : null;
}

const cursorRevealFix = EditorView.updateListener.of((update) => {
  if (!update.selectionSet) return;
  const anchor = headingPrefixAdjustment(update.state, update.transactions);
  if (anchor === null) return;
  update.view.dispatch({
    selection: { anchor },
    annotations: cursorAdjust.of(true),
  });
});

/** Everything a live-preview markdown editor needs, without mounting a view. */
export function markdownEditorExtensions(options: EditorOptions = {}): Extension[] {
  const settings = normalizeEditorOptions(options);

  const extensions: Extension[] = [
    // Core
    history(),
    drawSelection(),
    EditorState.allowMultipleSelections.of(true),

    // Markdown with GFM and inline math
    markdown({ base: markdownLanguage, extensions: InlineMath }),
    syntaxHighlighting(defaultHighlightStyle, { fallback: true }),

    createTheme(),
    livePreview({ capabilities: settings.capabilities, hideSyntax: settings.hideSyntax }),
    cursorRevealFix,

    placeholder(settings.placeholder),
    EditorState.tabSize.of(settings.tabSize),
    keymap.of([...defaultKeymap, ...historyKeymap, indentWithTab]),
  ];

  if (settings.lineWrapping) extensions.push(EditorView.lineWrapping);

  const { onChange, onBlur } = settings;
  if (onChange) {
    extensions.push(EditorView.updateListener.of((update) => {
      if (update.docChanged) onChange(update.state.doc.toString());
    }));
  }
  if (onBlur) {
    extensions.push(EditorView.domEventHandlers({
      blur: () => { onBlur(); },
    }));
  }

  return extensions;
}

export interface MarkdownEditor {
  view: EditorView;
  /** Replace the whole document, unless it already holds `content`. */
  setContent(content: string): void;
  getContent(): string;
  focus(): void;
  destroy(): void;
}

export function createEditor(parent: HTMLElement, options: EditorOptions = {}): MarkdownEditor {
  const state = EditorState.create({
    doc: options.content ?? '',
    extensions: markdownEditorExtensions(options),
  });
  const view = new EditorView({ state, parent });

  return {
    view,
    setContent(content) {
      if (view.state.doc.toString() === content) return;
      view.dispatch({ changes: { from: 0, to: view.state.doc.length, insert: content } });
    },
    getContent() {
      return view.state.doc.toString();
    },
    focus() {
      view.focus();
    },
    destroy() {
      view.destroy();
    },
  };
}
