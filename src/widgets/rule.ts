import { WidgetType } from '@codemirror/view';

export class RuleWidget extends WidgetType {
  toDOM(): HTMLElement {
    // Padding rather than margin: CM6 measures offsetHeight, which excludes margin.
    const wrapper = document.createElement('div');
    wrapper.className = 'cm-md-hr-wrap';
    const hr = document.createElement('hr');
    hr.className = 'cm-md-hr';
    wrapper.appendChild(hr);
    return wrapper;
  }
  eq(_other: RuleWidget) { return true; }
  ignoreEvent() { return true; }
}
