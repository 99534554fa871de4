import type { CodeWidget } from './code';
import type { FrontmatterWidget } from './frontmatter';
import type { MathWidget } from './math';
import type { RuleWidget } from './rule';
import type { TableWidget } from './table';

export { CodeWidget } from './code';
export { MathWidget } from './math';
export { TableWidget, parseTable } from './table';
export type { ColumnAlignment, ParsedTable } from './table';
export { FrontmatterWidget, countProperties } from './frontmatter';
export { RuleWidget } from './rule';
export {
  defaultCapabilities,
  noCapabilities,
  highlightJsHighlighter,
  katexTypesetter,
} from './capabilities';
export type { CodeHighlighter, MathTypesetter, RenderCapabilities } from './capabilities';

export type PreviewWidget = CodeWidget | MathWidget | TableWidget | FrontmatterWidget | RuleWidget;
