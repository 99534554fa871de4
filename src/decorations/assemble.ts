import { RangeSetBuilder, type Text } from '@codemirror/state';
import { Decoration, type DecorationSet } from '@codemirror/view';
import type { SyntaxNode } from '@lezer/common';
import { assertNever, constructOf, type Construct } from './constructs';
import { classifyBlockquote, classifyFencedCode, classifyHeading, classifyHorizontalRule, classifyListItem, classifyTable } from './block';
import { classifyDelimited, classifyInlineCode, classifyInlineMath, classifyLink } from './inline';
import { detectFrontmatter, displayMathRequests, frontmatterRequests, type Span } from './detectors';
import { CLASSES, type Classification, type ClassifyContext, type DecorationKind, type DecorationRequest, type PreviewInputs } from './types';
import type { ResolvedLivePreviewConfig } from '../config';
import { defaultCapabilities } from '../widgets/capabilities';
import { makeLogger } from '../logger';

const log = makeLogger('assembler');

function classify(construct: Construct, node: SyntaxNode, ctx: ClassifyContext): Classification {
  switch (construct.kind) {
    case 'heading': return classifyHeading(node, ctx, construct.level);
    case 'emphasis': return classifyDelimited(node, ctx, 'EmphasisMark', CLASSES.italic);
    case 'strong': return classifyDelimited(node, ctx, 'EmphasisMark', CLASSES.bold);
    case 'strikethrough': return classifyDelimited(node, ctx, 'StrikethroughMark', CLASSES.strikethrough);
    case 'inlineCode': return classifyInlineCode(node, ctx);
    case 'fencedCode': return classifyFencedCode(node, ctx);
    case 'blockquote': return classifyBlockquote(node, ctx);
    case 'link': return classifyLink(node, ctx);
    case 'horizontalRule': return classifyHorizontalRule(node, ctx);
    case 'listItem': return classifyListItem(node, ctx);
    case 'table': return classifyTable(node, ctx);
    case 'inlineMath': return classifyInlineMath(node, ctx);
    default: return assertNever(construct);
  }
}

/**
 * Rank of a request kind at equal `from`. Mirrors the host's start sides:
 * line decorations, then replacements, then marks.
 */
function kindRank(kind: DecorationKind): number {
  switch (kind.type) {
    case 'line': return 0;
    case 'hide': return 1;
    case 'widget': return 1;
    case 'mark': return 2;
    default: return assertNever(kind);
  }
}

function kindKey(kind: DecorationKind): string {
  switch (kind.type) {
    case 'line': return `line:${kind.className}`;
    case 'hide': return 'hide';
    case 'widget': return `widget:${kind.widget.constructor.name}`;
    case 'mark': return `mark:${kind.className}:${JSON.stringify(kind.attributes ?? {})}`;
    default: return assertNever(kind);
  }
}

/**
 * Total order of the output: `from` ascending, then line < replace < mark,
 * then `to` ascending, then a key on the kind so equal ranges never tie.
 */
export function compareRequests(a: DecorationRequest, b: DecorationRequest): number {
  if (a.from !== b.from) return a.from - b.from;
  const rank = kindRank(a.kind) - kindRank(b.kind);
  if (rank !== 0) return rank;
  if (a.to !== b.to) return a.to - b.to;
  const ka = kindKey(a.kind);
  const kb = kindKey(b.kind);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Whether `request` can go into the collection for `doc`. Inverted, negative
 * and out-of-bounds ranges fail, as do empty non-line ranges and line
 * requests that are not at a line start.
 */
export function isValidRequest(request: DecorationRequest, doc: Text): boolean {
  const { from, to, kind } = request;
  if (from < 0 || from > to || to > doc.length) return false;
  if (kind.type === 'line') return from === to && doc.lineAt(from).from === from;
  return from < to;
}

function sameRequest(a: DecorationRequest, b: DecorationRequest): boolean {
  if (a.from !== b.from || a.to !== b.to || a.kind.type !== b.kind.type) return false;
  if (a.kind.type === 'widget' && b.kind.type === 'widget') return a.kind.widget.compare(b.kind.widget);
  return kindKey(a.kind) === kindKey(b.kind);
}

export interface CollectOptions {
  capabilities?: ResolvedLivePreviewConfig['capabilities'];
  hideSyntax?: boolean;
}

/**
 * One assembly pass: classify the tree, run the text detectors, then drop,
 * deduplicate and sort. The result is a fresh array every call.
 */
export function collectDecorations(
  { doc, selection, tree }: PreviewInputs,
  options: CollectOptions = {},
): DecorationRequest[] {
  const frontmatter = detectFrontmatter(doc);
  const ctx: ClassifyContext = {
    doc,
    selection,
    capabilities: options.capabilities ?? defaultCapabilities,
    hideSyntax: options.hideSyntax ?? true,
    frontmatter: frontmatter && { from: frontmatter.from, to: frontmatter.to },
  };

  const candidates: DecorationRequest[] = [];
  const claimed: Span[] = frontmatter ? [{ from: frontmatter.from, to: frontmatter.to }] : [];

  tree.iterate({
    enter(ref) {
      if (frontmatter && ref.from >= frontmatter.from && ref.to <= frontmatter.to) return false;
      // A tree from an in-flight reparse may reach past the document; its
      // in-bounds children are still classified.
      if (ref.to > doc.length) return;
      const construct = constructOf(ref.name);
      if (!construct) return;
      const result = classify(construct, ref.node, ctx);
      candidates.push(...result.requests);
      if (result.claims) claimed.push(result.claims);
      return result.descend ? undefined : false;
    },
  });

  candidates.push(...displayMathRequests(ctx, candidates, claimed));
  if (frontmatter) candidates.push(...frontmatterRequests(frontmatter, ctx));

  const valid = candidates.filter(r => isValidRequest(r, doc));
  if (valid.length !== candidates.length) {
    log('dropped %d invalid decoration(s) for a document of length %d', candidates.length - valid.length, doc.length);
  }
  valid.sort(compareRequests);

  const result: DecorationRequest[] = [];
  for (const request of valid) {
    const prev = result[result.length - 1];
    if (prev && sameRequest(prev, request)) continue;
    result.push(request);
  }
  return result;
}

const hiddenReplace = Decoration.replace({});
const classDecorations = new Map<string, Decoration>();

function cachedDecoration(key: string, make: () => Decoration): Decoration {
  let deco = classDecorations.get(key);
  if (!deco) {
    deco = make();
    classDecorations.set(key, deco);
  }
  return deco;
}

export function toDecoration(kind: DecorationKind): Decoration {
  switch (kind.type) {
    case 'hide': return hiddenReplace;
    case 'widget': return Decoration.replace({ widget: kind.widget });
    case 'line': return cachedDecoration(`line:${kind.className}`, () => Decoration.line({ class: kind.className }));
    case 'mark':
      return kind.attributes
        ? Decoration.mark({ class: kind.className, attributes: kind.attributes })
        : cachedDecoration(`mark:${kind.className}`, () => Decoration.mark({ class: kind.className }));
    default: return assertNever(kind);
  }
}

/** Build the immutable decoration collection for one set of inputs. */
export function rebuild(inputs: PreviewInputs, options: CollectOptions = {}): DecorationSet {
  const builder = new RangeSetBuilder<Decoration>();
  for (const { from, to, kind } of collectDecorations(inputs, options)) {
    builder.add(from, to, toDecoration(kind));
  }
  return builder.finish();
}
