import hljs from 'highlight.js';
import katex from 'katex';

/** Turns source code into highlighted HTML markup. May throw on unknown languages. */
export interface CodeHighlighter {
  highlight(code: string, language: string | null): string;
}

/** Typesets LaTeX into `target`. May throw on malformed input. */
export interface MathTypesetter {
  render(latex: string, target: HTMLElement, options: { displayMode: boolean }): void;
}

/**
 * Rendering libraries available to widgets. A `null` entry means the
 * capability is unavailable and widgets render plain text instead.
 */
export interface RenderCapabilities {
  highlighter: CodeHighlighter | null;
  typesetter: MathTypesetter | null;
}

export const highlightJsHighlighter: CodeHighlighter = {
  highlight(code, language) {
    const result = language
      ? hljs.highlight(code, { language })
      : hljs.highlightAuto(code);
    return result.value;
  },
};

export const katexTypesetter: MathTypesetter = {
  render(latex, target, { displayMode }) {
    katex.render(latex, target, { displayMode, throwOnError: false });
  },
};

export const defaultCapabilities: RenderCapabilities = {
  highlighter: highlightJsHighlighter,
  typesetter: katexTypesetter,
};

export const noCapabilities: RenderCapabilities = {
  highlighter: null,
  typesetter: null,
};
