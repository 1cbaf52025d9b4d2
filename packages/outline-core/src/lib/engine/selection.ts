import { TreeNode } from '../node/tree-node';
import { getAncestorNodes } from '../utils/tree-utils';

export function isSelectionAllowed(node: TreeNode): boolean {
  return !node.isGroupItem;
}

/** Drops group items, keeping input order. */
export function selectableNodes(nodes: readonly TreeNode[]): TreeNode[] {
  return nodes.filter(isSelectionAllowed);
}

/**
 * Collapses a selection to its topmost nodes: a node is dropped when one of
 * its strict ancestors is also in `nodes`. Input order is kept.
 */
export function normalizeSelectedNodes(nodes: readonly TreeNode[]): TreeNode[] {
  const selected = new Set(nodes);
  return nodes.filter(
    (node) => !getAncestorNodes(node).some((ancestor) => selected.has(ancestor)),
  );
}
