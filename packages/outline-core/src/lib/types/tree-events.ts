import type { TreeNode } from '../node/tree-node';

/** Emitted after a rebuild that replaced at least one child list. */
export interface TreeRebuildEvent {
  /** Nodes whose child lists were replaced, in reconciliation (pre-order) order. */
  changedNodes: readonly TreeNode[];
}

export interface TreeStats {
  total: number;
  leaves: number;
  groups: number;
  maxDepth: number;
}
