/**
 * The markdown constructs that have a dedicated live-preview rule. Display
 * math and frontmatter are absent: the parser does not model them, they come
 * from the text detectors.
 */
export type Construct =
  | { kind: 'heading'; level: 1 | 2 | 3 | 4 | 5 | 6 }
  | { kind: 'emphasis' }
  | { kind: 'strong' }
  | { kind: 'strikethrough' }
  | { kind: 'inlineCode' }
  | { kind: 'fencedCode' }
  | { kind: 'blockquote' }
  | { kind: 'link' }
  | { kind: 'horizontalRule' }
  | { kind: 'listItem' }
  | { kind: 'table' }
  | { kind: 'inlineMath' };

const HEADING_LEVELS = {
  ATXHeading1: 1,
  ATXHeading2: 2,
  ATXHeading3: 3,
  ATXHeading4: 4,
  ATXHeading5: 5,
  ATXHeading6: 6,
} as const;

function isHeadingName(name: string): name is keyof typeof HEADING_LEVELS {
  return Object.prototype.hasOwnProperty.call(HEADING_LEVELS, name);
}

/** Map a syntax node name to its construct, or `null` when it has no rule. */
export function constructOf(nodeName: string): Construct | null {
  if (isHeadingName(nodeName)) return { kind: 'heading', level: HEADING_LEVELS[nodeName] };
  switch (nodeName) {
    case 'Emphasis': return { kind: 'emphasis' };
    case 'StrongEmphasis': return { kind: 'strong' };
    case 'Strikethrough': return { kind: 'strikethrough' };
    case 'InlineCode': return { kind: 'inlineCode' };
    case 'FencedCode': return { kind: 'fencedCode' };
    case 'Blockquote': return { kind: 'blockquote' };
    case 'Link': return { kind: 'link' };
    case 'HorizontalRule': return { kind: 'horizontalRule' };
    case 'ListItem': return { kind: 'listItem' };
    case 'Table': return { kind: 'table' };
    case 'InlineMath': return { kind: 'inlineMath' };
    default: return null;
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled construct: ${JSON.stringify(value)}`);
}
