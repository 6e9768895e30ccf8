import type { SemanticNode } from './semantic-node';
import type { SemanticType } from './semantic-type';

/**
 * Called once per node in document (pre-order) order. `ancestors` runs from
 * the root down to the node's parent and is empty for the root.
 */
export type NodeVisitor = (node: SemanticNode, ancestors: readonly SemanticNode[]) => void;

export function walkTree(root: SemanticNode, visit: NodeVisitor): void {
  const ancestors: SemanticNode[] = [];

  const step = (node: SemanticNode): void => {
    visit(node, ancestors);
    ancestors.push(node);
    for (const child of node.children) {
      step(child);
    }
    ancestors.pop();
  };

  step(root);
}

/** The root and every node below it, in document order. */
export function allNodes(root: SemanticNode): SemanticNode[] {
  const nodes: SemanticNode[] = [];
  walkTree(root, node => nodes.push(node));
  return nodes;
}

/** Every node below `root`, excluding `root`. */
export function allDescendants(root: SemanticNode): SemanticNode[] {
  return allNodes(root).slice(1);
}

export function descendantsWithRole(root: SemanticNode, role: SemanticType): SemanticNode[] {
  return allDescendants(root).filter(node => node.role === role);
}

export function firstDescendant(
  root: SemanticNode,
  predicate: (node: SemanticNode) => boolean
): SemanticNode | undefined {
  return allDescendants(root).find(predicate);
}

export function descendantCount(root: SemanticNode): number {
  return allDescendants(root).length;
}

/** Number of levels below `root`; a leaf has depth 0. */
export function subtreeDepth(root: SemanticNode): number {
  return root.children.reduce((deepest, child) => Math.max(deepest, subtreeDepth(child) + 1), 0);
}

/** Ancestors of the node with `nodeId`, root first, or undefined if it is not in the tree. */
export function pathTo(root: SemanticNode, nodeId: string): SemanticNode[] | undefined {
  let found: SemanticNode[] | undefined;
  walkTree(root, (node, ancestors) => {
    if (!found && node.id === nodeId) {
      found = [...ancestors];
    }
  });
  return found;
}

/**
 * Visible text of a subtree: the node's own text alternative if it has one,
 * otherwise the text of every content node below it, joined by spaces.
 */
export function collectText(root: SemanticNode): string {
  const description = root.textDescription;
  if (description) return description;

  const parts: string[] = [];
  walkTree(root, node => {
    if (node.kind === 'content') {
      const text = node.text.trim();
      if (text) parts.push(text);
    }
  });
  return parts.join(' ');
}
