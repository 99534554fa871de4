import { describe, it, expect } from 'vitest';
import { Compartment, EditorSelection, EditorState, type Extension } from '@codemirror/state';
import { markdown, markdownLanguage } from '@codemirror/lang-markdown';
import { livePreview, livePreviewField, shouldRebuild } from '../src/decorations/index';
import { livePreviewConfig } from '../src/config';
import { InlineMath, markdownParser } from '../src/syntax/inline-math';
import { defaultCapabilities, noCapabilities } from '../src/widgets/capabilities';
import { docOf, inputs, selectionAt } from './helpers';

function stateOf(doc: string, head: number, ...extra: Extension[]): EditorState {
  return EditorState.create({
    doc,
    selection: EditorSelection.cursor(head),
    extensions: [
      markdown({ base: markdownLanguage, extensions: InlineMath }),
      livePreview({ capabilities: noCapabilities }),
      ...extra,
    ],
  });
}

/** Decorated ranges, replacements and line styles flagged as `point`. */
function ranges(state: EditorState): string[] {
  const out: string[] = [];
  state.field(livePreviewField).between(0, state.doc.length, (from, to, value) => {
    out.push(`${from}-${to}${value.point ? ' point' : ''}`);
  });
  return out;
}

describe('shouldRebuild', () => {
  const base = inputs('a *b*', 0);

  it('is false for unchanged inputs', () => {
    expect(shouldRebuild(base, { ...base })).toBe(false);
  });

  it('compares selections by value', () => {
    expect(shouldRebuild(base, { ...base, selection: selectionAt(0) })).toBe(false);
    expect(shouldRebuild(base, { ...base, selection: selectionAt(3) })).toBe(true);
  });

  it('compares documents and trees by identity', () => {
    expect(shouldRebuild(base, { ...base, doc: docOf('a *b*') })).toBe(true);
    expect(shouldRebuild(base, { ...base, tree: markdownParser.parse('a *b*') })).toBe(true);
  });
});

describe('livePreviewField', () => {
  const source = '**bold**\n\nx';

  it('decorates the initial state', () => {
    expect(ranges(stateOf(source, 0))).toEqual(['0-2', '2-6', '6-8']);
  });

  it('rebuilds when the selection moves', () => {
    const state = stateOf(source, 0);
    const moved = state.update({ selection: { anchor: 11 } }).state;
    expect(ranges(moved)).toEqual(['0-2 point', '2-6', '6-8 point']);
  });

  it('keeps the previous set for a transaction that changes nothing', () => {
    const state = stateOf(source, 0);
    const next = state.update({}).state;
    expect(next.field(livePreviewField)).toBe(state.field(livePreviewField));
  });

  it('follows document edits', () => {
    const state = stateOf(source, 11);
    const edited = state.update({ changes: { from: 0, insert: '# ' } }).state;
    // `# **bold**` is now a heading, which keeps its content raw.
    expect(ranges(edited)).toEqual(['0-2 point', '0-10']);
  });

  it('rebuilds when the configuration changes', () => {
    const conf = new Compartment();
    const state = stateOf(source, 11, conf.of([]));
    expect(ranges(state)).toEqual(['0-2 point', '2-6', '6-8 point']);
    const plain = state.update({ effects: conf.reconfigure(livePreviewConfig.of({ hideSyntax: false })) }).state;
    expect(ranges(plain)).toEqual(['0-2', '2-6', '6-8']);
  });
});

describe('livePreviewConfig', () => {
  it('falls back to the defaults', () => {
    expect(EditorState.create().facet(livePreviewConfig)).toEqual({
      capabilities: defaultCapabilities,
      hideSyntax: true,
    });
  });

  it('lets later contributions win', () => {
    const state = EditorState.create({
      extensions: [
        livePreviewConfig.of({ hideSyntax: false }),
        livePreviewConfig.of({ hideSyntax: true, capabilities: noCapabilities }),
      ],
    });
    expect(state.facet(livePreviewConfig)).toEqual({ capabilities: noCapabilities, hideSyntax: true });
  });
});
