import type { SyntaxNode } from '@lezer/common';

/**
 * Descendants of `node` named `name`, in document order. Traversal does not
 * enter nested nodes of the same type as `node`, which classify their own
 * markers.
 */
export function descendants(node: SyntaxNode, name: string): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  let atRoot = true;
  node.cursor().iterate((child) => {
    if (atRoot) {
      atRoot = false;
      return;
    }
    if (child.name === node.name) return false;
    if (child.name === name) found.push(child.node);
  });
  return found;
}
