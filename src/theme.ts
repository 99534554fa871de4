import { EditorView } from '@codemirror/view';
import type { Extension } from '@codemirror/state';

/** Base editor chrome. Colours come from `--mdlp-*` custom properties with fallbacks. */
export function createTheme(): Extension {
  return EditorView.theme({
    '&': {
      height: '100%',
      fontSize: 'var(--mdlp-font-size, 16px)',
      color: 'var(--mdlp-foreground, inherit)',
      backgroundColor: 'transparent',
    },
    '&.cm-focused': {
      outline: 'none',
    },
    '.cm-scroller': {
      overflow: 'auto',
      fontFamily: 'var(--mdlp-font-family, inherit)',
      lineHeight: 'var(--mdlp-line-height, 1.7)',
    },
    '.cm-content': {
      caretColor: 'var(--mdlp-foreground, inherit)',
      padding: '0',
    },
    '.cm-line': {
      padding: '0',
    },
    '.cm-activeLine': {
      backgroundColor: 'transparent',
    },
    '.cm-gutters': {
      display: 'none',
    },
    '.cm-placeholder': {
      color: 'var(--mdlp-muted, rgba(128,128,128,0.6))',
      fontStyle: 'italic',
    },
  });
}

/** Styles for every class and widget the live preview emits. */
export const livePreviewTheme: Extension = EditorView.baseTheme({
  '.cm-md-syntax': { color: 'var(--mdlp-muted, #999)' },

  // Headings
  '.cm-md-h1': { fontSize: '1.875rem', fontWeight: '700', lineHeight: '1.3' },
  '.cm-md-h2': { fontSize: '1.5rem', fontWeight: '650', lineHeight: '1.35' },
  '.cm-md-h3': { fontSize: '1.25rem', fontWeight: '600', lineHeight: '1.4' },
  '.cm-md-h4': { fontSize: '1.125rem', fontWeight: '600' },
  '.cm-md-h5': { fontSize: '1rem', fontWeight: '600' },
  '.cm-md-h6': { fontSize: '0.875rem', fontWeight: '600' },

  // Inline styles
  '.cm-md-bold': { fontWeight: '700' },
  '.cm-md-italic': { fontStyle: 'italic' },
  '.cm-md-strikethrough': { textDecoration: 'line-through', opacity: '0.75' },
  '.cm-md-code, .cm-md-code-inline': {
    fontFamily: 'var(--mdlp-mono, monospace)',
    fontSize: '0.9em',
    backgroundColor: 'var(--mdlp-code-background, rgba(128,128,128,0.15))',
    padding: '1px 4px',
    borderRadius: '3px',
  },

  // Links
  '.cm-md-link-text': {
    color: 'var(--mdlp-link, #2563eb)',
    cursor: 'pointer',
  },
  '.cm-md-link-text:hover': { textDecoration: 'underline' },
  '.cm-md-link-url': { color: 'var(--mdlp-muted, #999)', textDecoration: 'underline' },

  // Block-level lines
  '.cm-md-blockquote': {
    borderLeft: '3px solid var(--mdlp-quote-border, #cbd5e1)',
    paddingLeft: '12px',
  },
  '.cm-md-codeblock': {
    backgroundColor: 'var(--mdlp-code-background, rgba(128,128,128,0.1))',
    fontFamily: 'var(--mdlp-mono, monospace)',
    fontSize: '0.9em',
    padding: '0 12px',
  },
  '.cm-md-codeblock-first, .cm-md-codeblock-only': { borderTopLeftRadius: '6px', borderTopRightRadius: '6px' },
  '.cm-md-codeblock-last, .cm-md-codeblock-only': { borderBottomLeftRadius: '6px', borderBottomRightRadius: '6px' },
  '.cm-md-table-raw, .cm-md-frontmatter-raw': {
    fontFamily: 'var(--mdlp-mono, monospace)',
    fontSize: '0.9em',
  },

  // Widgets
  '.cm-md-code-block': {
    display: 'block',
    backgroundColor: 'var(--mdlp-code-background, rgba(128,128,128,0.1))',
    borderRadius: '6px',
    padding: '8px 12px',
  },
  '.cm-md-code-block pre': { margin: '0', fontFamily: 'var(--mdlp-mono, monospace)', fontSize: '0.9em' },
  '.cm-md-code-lang': { display: 'block', fontSize: '0.75em', color: 'var(--mdlp-muted, #999)' },
  '.cm-md-math-display': { display: 'block', textAlign: 'center', padding: '8px 0' },
  '.cm-md-hr-wrap': { padding: '16px 0' },
  '.cm-md-hr': { border: 'none', borderTop: '1px solid var(--mdlp-rule, #d4d4d8)', margin: '0' },
  '.cm-md-table-wrap': { overflowX: 'auto', padding: '8px 0' },
  '.cm-md-table': { borderCollapse: 'collapse' },
  '.cm-md-table th, .cm-md-table td': {
    border: '1px solid var(--mdlp-rule, #d4d4d8)',
    padding: '4px 10px',
  },
  '.cm-md-frontmatter-badge': { padding: '0 0 8px 0' },
  '.cm-md-frontmatter-chip': {
    fontSize: '0.75em',
    textTransform: 'uppercase',
    letterSpacing: '0.05em',
    padding: '2px 8px',
    borderRadius: '999px',
    backgroundColor: 'var(--mdlp-code-background, rgba(128,128,128,0.15))',
  },
  '.cm-md-frontmatter-count': { marginLeft: '8px', fontSize: '0.75em', color: 'var(--mdlp-muted, #999)' },
});
