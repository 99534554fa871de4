import { WidgetType } from '@codemirror/view';

export type ColumnAlignment = 'left' | 'center' | 'right';

export interface ParsedTable {
  headers: string[];
  alignments: ColumnAlignment[];
  /** Body rows, each padded with `''` to the header width. */
  rows: string[][];
}

const SEPARATOR_CELL = /^:?-+:?$/;

function parseTableRow(line: string): string[] {
  let trimmed = line.trim();
  if (trimmed.startsWith('|')) trimmed = trimmed.slice(1);
  if (trimmed.endsWith('|')) trimmed = trimmed.slice(0, -1);
  return trimmed.split('|').map(c => c.trim());
}

function alignmentOf(cell: string): ColumnAlignment {
  if (cell.startsWith(':') && cell.endsWith(':')) return 'center';
  if (cell.endsWith(':')) return 'right';
  return 'left';
}

/**
 * Parse pipe-delimited table text on its own, independent of the markdown
 * parser. Returns `null` for fewer than two non-blank lines or a second line
 * that is not a separator row.
 */
export function parseTable(text: string): ParsedTable | null {
  const lines = text.split('\n').filter(l => l.trim().length > 0);
  if (lines.length < 2) return null;
  const headers = parseTableRow(lines[0]);
  const separator = parseTableRow(lines[1]);
  if (!separator.every(cell => SEPARATOR_CELL.test(cell))) return null;

  const alignments = headers.map((_, i) => alignmentOf(separator[i] ?? ''));
  const rows = lines.slice(2).map(line => {
    const cells = parseTableRow(line);
    return headers.map((_, i) => cells[i] ?? '');
  });
  return { headers, alignments, rows };
}

/** Read-only grid rendering of a GFM table. */
export class TableWidget extends WidgetType {
  constructor(readonly text: string) { super(); }

  toDOM(): HTMLElement {
    const parsed = parseTable(this.text);
    if (!parsed) {
      const span = document.createElement('span');
      span.className = 'cm-md-table-fallback';
      span.textContent = this.text;
      return span;
    }

    const wrapper = document.createElement('div');
    wrapper.className = 'cm-md-table-wrap';
    const table = document.createElement('table');
    table.className = 'cm-md-table';

    const headerRow = table.createTHead().insertRow();
    parsed.headers.forEach((h, i) => {
      const th = document.createElement('th');
      th.textContent = h;
      th.style.textAlign = parsed.alignments[i];
      headerRow.appendChild(th);
    });

    if (parsed.rows.length > 0) {
      const tbody = table.createTBody();
      for (const row of parsed.rows) {
        const tr = tbody.insertRow();
        row.forEach((cell, i) => {
          const td = tr.insertCell();
          td.textContent = cell;
          td.style.textAlign = parsed.alignments[i];
        });
      }
    }

    wrapper.appendChild(table);
    return wrapper;
  }

  eq(other: TableWidget) { return this.text === other.text; }
  ignoreEvent() { return false; }
}
