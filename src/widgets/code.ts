import { WidgetType } from '@codemirror/view';
import type { CodeHighlighter } from './capabilities';
import { makeLogger } from '../logger';

const log = makeLogger('widgets');

/**
 * Highlighted code shown in place of an inline code span or a fenced block.
 * Without a working highlighter the code is shown as plain text.
 */
export class CodeWidget extends WidgetType {
  constructor(
    readonly code: string,
    readonly language: string | null,
    readonly block: boolean,
    private readonly highlighter: CodeHighlighter | null,
  ) { super(); }

  toDOM(): HTMLElement {
    const codeEl = document.createElement('code');
    if (!this.block) {
      codeEl.className = 'cm-md-code-widget cm-md-code-inline';
      this.fill(codeEl);
      return codeEl;
    }
    this.fill(codeEl);

    const wrapper = document.createElement('div');
    wrapper.className = 'cm-md-code-widget cm-md-code-block';
    if (this.language) {
      const lang = document.createElement('span');
      lang.className = 'cm-md-code-lang';
      lang.textContent = this.language;
      wrapper.appendChild(lang);
    }
    const pre = document.createElement('pre');
    pre.appendChild(codeEl);
    wrapper.appendChild(pre);
    return wrapper;
  }

  private fill(codeEl: HTMLElement) {
    if (!this.highlighter) {
      codeEl.textContent = this.code;
      return;
    }
    try {
      codeEl.innerHTML = this.highlighter.highlight(this.code, this.language);
      codeEl.classList.add('hljs');
    } catch (err) {
      log('highlight failed (language %s): %O', this.language ?? 'auto', err);
      codeEl.textContent = this.code;
    }
  }

  eq(other: CodeWidget) {
    return this.code === other.code
      && this.language === other.language
      && this.block === other.block
      && this.highlighter === other.highlighter;
  }
  ignoreEvent() { return false; }
}
