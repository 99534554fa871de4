import { WidgetType } from '@codemirror/view';
import type { MathTypesetter } from './capabilities';
import { makeLogger } from '../logger';

const log = makeLogger('widgets');

export class MathWidget extends WidgetType {
  constructor(
    readonly latex: string,
    readonly displayMode: boolean,
    private readonly typesetter: MathTypesetter | null,
  ) { super(); }

  toDOM(): HTMLElement {
    const wrap = document.createElement(this.displayMode ? 'div' : 'span');
    wrap.className = this.displayMode
      ? 'cm-md-math-widget cm-md-math-display'
      : 'cm-md-math-widget cm-md-math-inline';

    if (!this.typesetter) {
      wrap.textContent = this.latex;
      return wrap;
    }
    try {
      this.typesetter.render(this.latex, wrap, { displayMode: this.displayMode });
    } catch (err) {
      log('typesetting failed for %j: %O', this.latex, err);
      wrap.replaceChildren();
      wrap.textContent = this.latex;
    }
    // A typesetter that silently produced nothing still leaves the source visible.
    if (!wrap.hasChildNodes()) wrap.textContent = this.latex;
    return wrap;
  }

  eq(other: MathWidget) {
    return this.latex === other.latex
      && this.displayMode === other.displayMode
      && this.typesetter === other.typesetter;
  }
  ignoreEvent() { return false; }
}
