import { WidgetType } from '@codemirror/view';

/** Number of `key: value` lines in a YAML body. */
export function countProperties(yaml: string): number {
  let count = 0;
  for (const line of yaml.split('\n')) {
    const t = line.trim();
    if (t && !t.startsWith('#') && t.includes(':')) count++;
  }
  return count;
}

/** Collapsed badge shown in place of a YAML frontmatter block. */
export class FrontmatterWidget extends WidgetType {
  readonly propertyCount: number;

  constructor(readonly yaml: string) {
    super();
    this.propertyCount = countProperties(yaml);
  }

  toDOM(): HTMLElement {
    const badge = document.createElement('div');
    badge.className = 'cm-md-frontmatter-badge';

    const chip = document.createElement('span');
    chip.className = 'cm-md-frontmatter-chip';
    chip.textContent = 'frontmatter';
    badge.appendChild(chip);

    const count = document.createElement('span');
    count.className = 'cm-md-frontmatter-count';
    count.textContent = this.propertyCount > 0
      ? `${this.propertyCount} ${this.propertyCount === 1 ? 'property' : 'properties'}`
      : 'empty';
    badge.appendChild(count);
    return badge;
  }

  eq(other: FrontmatterWidget) { return this.yaml === other.yaml; }
  ignoreEvent() { return false; }
}
