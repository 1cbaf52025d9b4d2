import type { TreeController } from '../engine/tree-controller';
import { getAncestorNodes } from '../utils/tree-utils';
import { TreeNode } from './tree-node';

/** The nodes from the root of a tree down to a target node, root first. */
export class NodePath {
  readonly components: readonly TreeNode[];

  private constructor(components: readonly TreeNode[]) {
    this.components = Object.freeze([...components]);
  }

  static fromNode(node: TreeNode): NodePath {
    return new NodePath([...getAncestorNodes(node), node]);
  }

  /** Returns `undefined` when the controller's tree has no node for the object. */
  static fromRepresentedObject(
    representedObject: object,
    treeController: TreeController,
  ): NodePath | undefined {
    const node = treeController.nodeInTreeRepresentingObject(representedObject);
    return node ? NodePath.fromNode(node) : undefined;
  }

  get target(): TreeNode {
    return this.components[this.components.length - 1];
  }

  get length(): number {
    return this.components.length;
  }

  includes(node: TreeNode): boolean {
    return this.components.includes(node);
  }

  representedObjects(): object[] {
    return this.components.map((node) => node.representedObject);
  }
}
