import { StateField, type EditorState, type Extension } from '@codemirror/state';
import { EditorView, type DecorationSet } from '@codemirror/view';
import { syntaxTree } from '@codemirror/language';
import { livePreviewConfig, type LivePreviewConfig } from '../config';
import { livePreviewTheme } from '../theme';
import { rebuild } from './assemble';
import type { PreviewInputs } from './types';

export { rebuild, collectDecorations, compareRequests, isValidRequest, toDecoration } from './assemble';
export type { CollectOptions } from './assemble';
export { cursorInRange, cursorOnLine } from './cursor';
export { constructOf } from './constructs';
export type { Construct } from './constructs';
export { detectFrontmatter } from './detectors';
export type { Frontmatter } from './detectors';
export { CLASSES, headingClass } from './types';
export type { DecorationKind, DecorationRequest, PreviewInputs } from './types';

/**
 * Whether a new pass is needed: the document changed, the selection moved,
 * or a background reparse delivered a new tree. Otherwise the previous
 * collection stays valid.
 */
export function shouldRebuild(previous: PreviewInputs, next: PreviewInputs): boolean {
  return previous.doc !== next.doc
    || !previous.selection.eq(next.selection)
    || previous.tree !== next.tree;
}

function inputsOf(state: EditorState): PreviewInputs {
  return { doc: state.doc, selection: state.selection, tree: syntaxTree(state) };
}

function buildDecorations(state: EditorState): DecorationSet {
  return rebuild(inputsOf(state), state.facet(livePreviewConfig));
}

/**
 * Live preview decorations. A StateField rather than a ViewPlugin so that
 * replacements may span line breaks (fenced code, tables, display math,
 * frontmatter).
 */
export const livePreviewField = StateField.define<DecorationSet>({
  create(state) {
    return buildDecorations(state);
  },
  update(decos, tr) {
    const configChanged = tr.startState.facet(livePreviewConfig) !== tr.state.facet(livePreviewConfig);
    if (configChanged || shouldRebuild(inputsOf(tr.startState), inputsOf(tr.state))) {
      return buildDecorations(tr.state);
    }
    return decos;
  },
  provide: f => EditorView.decorations.from(f),
});

/** Live preview: configuration, the decoration field and its theme. */
export function livePreview(config: LivePreviewConfig = {}): Extension {
  return [livePreviewConfig.of(config), livePreviewField, livePreviewTheme];
}
