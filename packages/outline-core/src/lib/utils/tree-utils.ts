import { TreeNode } from '../node/tree-node';

/** Ordered identity comparison of two child lists. */
export function nodeArraysAreEqual(
  first: readonly TreeNode[],
  second: readonly TreeNode[],
): boolean {
  if (first.length !== second.length) {
    return false;
  }
  return first.every((node, index) => node === second[index]);
}

export function representedObjects(nodes: readonly TreeNode[]): object[] {
  return nodes.map((node) => node.representedObject);
}

/** Ancestors of `node`, root first, excluding `node` itself. */
export function getAncestorNodes(node: TreeNode): TreeNode[] {
  const ancestors: TreeNode[] = [];
  let current = node.parent;

  while (current) {
    ancestors.unshift(current);
    current = current.parent;
  }

  return ancestors;
}

/** Descendants of `node` in breadth-first order. */
export function getDescendantNodes(node: TreeNode): TreeNode[] {
  const descendants: TreeNode[] = [];
  const queue = [node];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) {
      continue;
    }

    for (const child of current.childNodes) {
      descendants.push(child);
      queue.push(child);
    }
  }

  return descendants;
}

/**
 * Rows an outline view shows under `root`: every child of the root, and the
 * children of each row whose node is expanded. The root itself is not a row.
 */
export function flattenVisibleNodes(
  root: TreeNode,
  isExpanded: (node: TreeNode) => boolean,
): TreeNode[] {
  const result: TreeNode[] = [];
  const processed = new Set<TreeNode>();

  function processNode(node: TreeNode): void {
    if (processed.has(node)) {
      return;
    }
    processed.add(node);

    result.push(node);
    if (isExpanded(node)) {
      node.childNodes.forEach(processNode);
    }
  }

  root.childNodes.forEach(processNode);

  return result;
}

/** Deepest level below `root`, counted from `root` (0 for a lone root). */
export function getMaxDepth(root: TreeNode): number {
  let maxDepth = 0;

  function visit(node: TreeNode, depth: number): void {
    maxDepth = Math.max(maxDepth, depth);
    for (const child of node.childNodes) {
      visit(child, depth + 1);
    }
  }

  visit(root, 0);
  return maxDepth;
}
