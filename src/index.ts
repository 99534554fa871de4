export { createEditor, headingPrefixAdjustment, markdownEditorExtensions } from './editor';
export type { MarkdownEditor } from './editor';
export {
  livePreview,
  livePreviewField,
  shouldRebuild,
  rebuild,
  collectDecorations,
  compareRequests,
  isValidRequest,
  toDecoration,
  cursorInRange,
  cursorOnLine,
  constructOf,
  detectFrontmatter,
  CLASSES,
  headingClass,
} from './decorations/index';
export type {
  CollectOptions,
  Construct,
  DecorationKind,
  DecorationRequest,
  Frontmatter,
  PreviewInputs,
} from './decorations/index';
export { livePreviewConfig, normalizeEditorOptions } from './config';
export type { EditorOptions, LivePreviewConfig, ResolvedEditorOptions, ResolvedLivePreviewConfig } from './config';
export { createTheme, livePreviewTheme } from './theme';
export { InlineMath, markdownParser } from './syntax/inline-math';
export * from './widgets';
export { makeLogger } from './logger';
export type { Logger } from './logger';
