import type { TreeController } from '../engine/tree-controller';
import type { TreeNode } from '../node/tree-node';

/**
 * Supplies the authoritative child list of a node on demand.
 *
 * Answers must be synchronous and must not mutate the tree being rebuilt.
 * Returning `undefined` or an empty list both mean "no children". Children are
 * usually obtained with `node.existingOrNewChildNode(obj)` so that unchanged
 * objects keep their node identity across rebuilds.
 */
export interface TreeControllerDelegate {
  childNodesFor(
    treeController: TreeController,
    node: TreeNode,
  ): readonly TreeNode[] | undefined;
}

export type NodeVisitor = (node: TreeNode) => void;

export type NodePredicate = (node: TreeNode) => boolean;
