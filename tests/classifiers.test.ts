import { describe, it, expect } from 'vitest';
import { collectDecorations } from '../src/decorations/assemble';
import { noCapabilities } from '../src/widgets/capabilities';
import { CodeWidget } from '../src/widgets/code';
import { MathWidget } from '../src/widgets/math';
import { TableWidget } from '../src/widgets/table';
import { inputs, onlyWidget, summarize } from './helpers';

function decorate(source: string, ...heads: number[]): string[] {
  return summarize(collectDecorations(inputs(source, ...heads), { capabilities: noCapabilities }));
}

describe('headings', () => {
  it('hides the marker and its space away from the cursor', () => {
    expect(decorate('# Title\n\nbody', 13)).toEqual([
      'hide 0-2',
      'mark cm-md-h1 0-7',
    ]);
  });

  it('dims the marker when the cursor is on the line', () => {
    expect(decorate('# Title\n\nbody', 3)).toEqual([
      'mark cm-md-syntax 0-1',
      'mark cm-md-h1 0-7',
    ]);
  });

  it('uses the level in the class', () => {
    expect(decorate('### Deep', 8)).toEqual([
      'mark cm-md-syntax 0-3',
      'mark cm-md-h3 0-8',
    ]);
  });
});

describe('emphasis, strong and strikethrough', () => {
  it('hides single delimiters', () => {
    expect(decorate('*it*\n\nx', 7)).toEqual([
      'hide 0-1',
      'mark cm-md-italic 1-3',
      'hide 3-4',
    ]);
  });

  it('hides strikethrough tildes', () => {
    expect(decorate('~~gone~~\n\nx', 11)).toEqual([
      'hide 0-2',
      'mark cm-md-strikethrough 2-6',
      'hide 6-8',
    ]);
  });

  it('dims delimiters when the cursor touches the node', () => {
    expect(decorate('~~gone~~', 0)).toEqual([
      'mark cm-md-syntax 0-2',
      'mark cm-md-strikethrough 2-6',
      'mark cm-md-syntax 6-8',
    ]);
  });
});

describe('inline code', () => {
  it('replaces the span with a code widget', () => {
    const requests = collectDecorations(inputs('`code`\n\nx', 9), { capabilities: noCapabilities });
    expect(summarize(requests)).toEqual(['widget CodeWidget 0-6']);
    const w = onlyWidget(requests);
    expect(w).toBeInstanceOf(CodeWidget);
    if (w instanceof CodeWidget) {
      expect(w.code).toBe('code');
      expect(w.language).toBeNull();
      expect(w.block).toBe(false);
    }
  });

  it('shows dimmed backticks and styled content inside', () => {
    expect(decorate('`code`', 2)).toEqual([
      'mark cm-md-syntax 0-1',
      'mark cm-md-code 1-5',
      'mark cm-md-syntax 5-6',
    ]);
  });
});

describe('fenced code', () => {
  const source = '```js\nconsole.log(1)\n```\n\ntext';

  it('replaces the block with a highlighted widget', () => {
    const requests = collectDecorations(inputs(source, 30), { capabilities: noCapabilities });
    expect(summarize(requests)).toEqual(['widget CodeWidget 0-24']);
    const w = onlyWidget(requests);
    expect(w).toBeInstanceOf(CodeWidget);
    if (w instanceof CodeWidget) {
      expect(w.code).toBe('console.log(1)');
      expect(w.language).toBe('js');
      expect(w.block).toBe(true);
    }
  });

  it('styles each line and dims the fences while editing', () => {
    expect(decorate(source, 10)).toEqual([
      'line cm-md-codeblock cm-md-codeblock-first 0',
      'mark cm-md-syntax 0-5',
      'line cm-md-codeblock 6',
      'line cm-md-codeblock cm-md-codeblock-last 21',
      'mark cm-md-syntax 21-24',
    ]);
  });

  it('leaves the language null without an info string', () => {
    const requests = collectDecorations(inputs('```\nx\n```\n\nend', 14), { capabilities: noCapabilities });
    const w = onlyWidget(requests);
    expect(w instanceof CodeWidget && w.language).toBeNull();
  });

  it('leaves an unclosed fence raw', () => {
    expect(decorate('```js\nlet a', 999)).toEqual([]);
  });
});

describe('blockquotes', () => {
  const source = '> quote\n> more\n\nafter';

  it('hides quote markers away from the cursor', () => {
    expect(decorate(source, 21)).toEqual([
      'line cm-md-blockquote 0',
      'hide 0-2',
      'line cm-md-blockquote 8',
      'hide 8-10',
    ]);
  });

  it('dims every quote marker when the cursor is inside', () => {
    expect(decorate(source, 3)).toEqual([
      'line cm-md-blockquote 0',
      'mark cm-md-syntax 0-1',
      'line cm-md-blockquote 8',
      'mark cm-md-syntax 8-9',
    ]);
  });

  it('still classifies inline content inside the quote', () => {
    expect(decorate('> **b**\n\nx', 10)).toEqual([
      'line cm-md-blockquote 0',
      'hide 0-2',
      'hide 2-4',
      'mark cm-md-bold 4-5',
      'hide 5-7',
    ]);
  });
});

describe('links', () => {
  const source = '[site](http://a.b)\n\nend';

  it('hides everything but the label away from the cursor', () => {
    const requests = collectDecorations(inputs(source, 23), { capabilities: noCapabilities });
    expect(summarize(requests)).toEqual([
      'hide 0-1',
      'mark cm-md-link-text 1-5',
      'hide 5-18',
    ]);
    const label = requests[1].kind;
    expect(label.type === 'mark' && label.attributes).toEqual({ 'data-url': 'http://a.b' });
  });

  it('dims the brackets and marks the URL inside', () => {
    expect(decorate(source, 3)).toEqual([
      'mark cm-md-syntax 0-1',
      'mark cm-md-link-text 1-5',
      'mark cm-md-syntax 5-6',
      'mark cm-md-syntax 6-7',
      'mark cm-md-link-url 7-17',
      'mark cm-md-syntax 17-18',
    ]);
  });
});

describe('horizontal rules', () => {
  const source = 'a\n\n---\n\nb';

  it('renders a divider away from the cursor', () => {
    expect(decorate(source, 9)).toEqual(['widget RuleWidget 3-6']);
  });

  it('dims the rule when the cursor is on it', () => {
    expect(decorate(source, 4)).toEqual(['mark cm-md-syntax 3-6']);
  });
});

describe('list items', () => {
  it('dims the marker only on the cursor item', () => {
    expect(decorate('- one\n- two', 0)).toEqual(['mark cm-md-syntax 0-1']);
  });

  it('classifies inline content in items', () => {
    expect(decorate('- *a*', 999)).toEqual([
      'hide 2-3',
      'mark cm-md-italic 3-4',
      'hide 4-5',
    ]);
  });
});

describe('tables', () => {
  const source = '| a | b |\n|:--|--:|\n| 1 | 2 |\n\nend';

  it('renders a grid away from the cursor', () => {
    const requests = collectDecorations(inputs(source, 34), { capabilities: noCapabilities });
    expect(summarize(requests)).toEqual(['widget TableWidget 0-29']);
    const w = onlyWidget(requests);
    expect(w instanceof TableWidget && w.text).toBe('| a | b |\n|:--|--:|\n| 1 | 2 |');
  });

  it('styles raw lines while editing', () => {
    expect(decorate(source, 12)).toEqual([
      'line cm-md-table-raw 0',
      'line cm-md-table-raw 10',
      'line cm-md-table-raw 20',
    ]);
  });
});

describe('inline math', () => {
  it('renders a math widget away from the cursor', () => {
    const requests = collectDecorations(inputs('$x^2$\n\nnext', 11), { capabilities: noCapabilities });
    expect(summarize(requests)).toEqual(['widget MathWidget 0-5']);
    const w = onlyWidget(requests);
    expect(w instanceof MathWidget && w.latex).toBe('x^2');
    expect(w instanceof MathWidget && w.displayMode).toBe(false);
  });

  it('dims the dollars inside', () => {
    expect(decorate('$a$ b', 1)).toEqual([
      'mark cm-md-syntax 0-1',
      'mark cm-md-syntax 2-3',
    ]);
  });

  it('skips blank math', () => {
    expect(decorate('$ $\n\nx', 6)).toEqual([]);
  });
});

describe('hideSyntax off', () => {
  it('renders every construct as if the cursor were inside', () => {
    const requests = collectDecorations(inputs('**bold**', 20), { capabilities: noCapabilities, hideSyntax: false });
    expect(summarize(requests)).toEqual([
      'mark cm-md-syntax 0-2',
      'mark cm-md-bold 2-6',
      'mark cm-md-syntax 6-8',
    ]);
  });
});
