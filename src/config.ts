import { Facet, combineConfig } from '@codemirror/state';
import { defaultCapabilities, type RenderCapabilities } from './widgets/capabilities';

export interface LivePreviewConfig {
  /** Rendering libraries handed to widgets. Defaults to highlight.js + KaTeX. */
  capabilities?: RenderCapabilities;
  /**
   * Hide syntax and show widgets away from the cursor. With `false` every
   * construct renders as if the cursor were inside it.
   */
  hideSyntax?: boolean;
}

export type ResolvedLivePreviewConfig = Required<LivePreviewConfig>;

const DEFAULT_CONFIG: ResolvedLivePreviewConfig = {
  capabilities: defaultCapabilities,
  hideSyntax: true,
};

export const livePreviewConfig = Facet.define<LivePreviewConfig, ResolvedLivePreviewConfig>({
  combine: configs => combineConfig<ResolvedLivePreviewConfig>(configs, DEFAULT_CONFIG, {
    // Later contributions win.
    capabilities: (_a: RenderCapabilities, b: RenderCapabilities) => b,
    hideSyntax: (_a: boolean, b: boolean) => b,
  }),
  compare: (a, b) => a.capabilities === b.capabilities && a.hideSyntax === b.hideSyntax,
});

export interface EditorOptions {
  content?: string;
  placeholder?: string;
  tabSize?: number;
  lineWrapping?: boolean;
  capabilities?: RenderCapabilities;
  hideSyntax?: boolean;
  onChange?: (content: string) => void;
  onBlur?: () => void;
}

export interface ResolvedEditorOptions {
  content: string;
  placeholder: string;
  tabSize: number;
  lineWrapping: boolean;
  capabilities: RenderCapabilities;
  hideSyntax: boolean;
  onChange: ((content: string) => void) | null;
  onBlur: (() => void) | null;
}

const DEFAULT_EDITOR_OPTIONS: ResolvedEditorOptions = {
  content: '',
  placeholder: 'Start writing...',
  tabSize: 2,
  lineWrapping: true,
  capabilities: defaultCapabilities,
  hideSyntax: true,
  onChange: null,
  onBlur: null,
};

export function normalizeEditorOptions(options: EditorOptions = {}): ResolvedEditorOptions {
  const rawTabSize = Number(options.tabSize);
  const tabSize = Number.isFinite(rawTabSize)
    ? Math.max(1, Math.min(8, Math.round(rawTabSize)))
    : DEFAULT_EDITOR_OPTIONS.tabSize;

  return {
    content: options.content ?? DEFAULT_EDITOR_OPTIONS.content,
    placeholder: options.placeholder ?? DEFAULT_EDITOR_OPTIONS.placeholder,
    tabSize,
    lineWrapping: options.lineWrapping ?? DEFAULT_EDITOR_OPTIONS.lineWrapping,
    capabilities: options.capabilities ?? DEFAULT_EDITOR_OPTIONS.capabilities,
    hideSyntax: options.hideSyntax ?? DEFAULT_EDITOR_OPTIONS.hideSyntax,
    onChange: options.onChange ?? null,
    onBlur: options.onBlur ?? null,
  };
}
