import { NodePredicate } from '../types/tree-delegate';
import { TreeIntegrityError } from '../types/tree-errors';

/** Payload of a generic root node; represents no domain object. */
export class TopLevelRepresentedObject {}

/**
 * A tree cell wrapping a represented object for display in an outline view.
 *
 * A node owns its `childNodes`. The parent link is a weak back-reference: it
 * is used for traversal and paths only and never keeps the parent alive.
 * Equality is identity; represented objects are compared with `===`.
 *
 * Nodes are meant to be created, mutated and queried from a single owner.
 */
export class TreeNode {
  private static incrementingId = 0;

  /** The object this node represents. */
  readonly representedObject: object;
  /** Unique within the process, increasing in construction order. */
  readonly uniqueId: number;
  /** Whether rebuilds ask the delegate for this node's children. */
  canHaveChildNodes = false;
  /** Group items are non-selectable headers. */
  isGroupItem = false;
  childNodes: TreeNode[] = [];

  private readonly parentRef: WeakRef<TreeNode> | undefined;

  constructor(representedObject: object, parent?: TreeNode) {
    this.representedObject = representedObject;
    this.parentRef = parent ? new WeakRef(parent) : undefined;
    this.uniqueId = TreeNode.incrementingId;
    TreeNode.incrementingId += 1;
  }

  static genericRootNode(): TreeNode {
    const node = new TreeNode(new TopLevelRepresentedObject());
    node.canHaveChildNodes = true;
    return node;
  }

  get parent(): TreeNode | undefined {
    return this.parentRef?.deref();
  }

  get isRoot(): boolean {
    return this.parent === undefined;
  }

  get numberOfChildNodes(): number {
    return this.childNodes.length;
  }

  get isLeaf(): boolean {
    return this.childNodes.length < 1;
  }

  get level(): number {
    const parent = this.parent;
    return parent ? parent.level + 1 : 0;
  }

  /**
   * Index path from the root: `[0]` for the root, then the position of each
   * node within its parent. Throws a `TreeIntegrityError` when a parent does
   * not list the node among its children.
   */
  get indexPath(): number[] {
    const parent = this.parent;
    if (!parent) {
      return [0];
    }

    const childIndex = parent.indexOfChild(this);
    if (childIndex === undefined) {
      throw new TreeIntegrityError(
        'orphaned-node',
        this.uniqueId,
        `Node ${this.uniqueId} is not a child of its parent ${parent.uniqueId}`,
      );
    }
    return [...parent.indexPath, childIndex];
  }

  get hashKey(): number {
    return this.uniqueId;
  }

  equals(other: TreeNode | undefined): boolean {
    return other !== undefined && other.uniqueId === this.uniqueId;
  }

  /**
   * Returns the child representing `representedObject`, or a new node for it.
   * A new node is not attached; the caller decides where it goes.
   */
  existingOrNewChildNode(representedObject: object): TreeNode {
    return (
      this.childNodeRepresentingObject(representedObject) ??
      this.createChildNode(representedObject)
    );
  }

  /** Creates a disconnected node whose parent is this node. */
  createChildNode(representedObject: object): TreeNode {
    return new TreeNode(representedObject, this);
  }

  childAtIndex(index: number): TreeNode | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.childNodes.length) {
      return undefined;
    }
    return this.childNodes[index];
  }

  indexOfChild(node: TreeNode): number | undefined {
    const index = this.childNodes.indexOf(node);
    return index === -1 ? undefined : index;
  }

  childNodeRepresentingObject(representedObject: object): TreeNode | undefined {
    return this.findNode((node) => node.representedObject === representedObject, false);
  }

  descendantNodeRepresentingObject(representedObject: object): TreeNode | undefined {
    return this.findNode((node) => node.representedObject === representedObject, true);
  }

  descendantNode(test: NodePredicate): TreeNode | undefined {
    return this.findNode(test, true);
  }

  /** True when one of `nodes` is a strict ancestor of this node. */
  hasAncestor(nodes: readonly TreeNode[]): boolean {
    return nodes.some((node) => node.isAncestor(this));
  }

  /** True when this node is a strict ancestor of `node`. */
  isAncestor(node: TreeNode): boolean {
    if (node === this) {
      return false;
    }

    let nomad = node.parent;
    while (nomad) {
      if (nomad === this) {
        return true;
      }
      nomad = nomad.parent;
    }
    return false;
  }

  /**
   * Groups `nodes` by parent, keeping input order within each group.
   * Nodes without a parent are dropped.
   */
  static nodesOrganizedByParent(
    nodes: readonly TreeNode[],
  ): Map<TreeNode, TreeNode[]> {
    const organized = new Map<TreeNode, TreeNode[]>();
    for (const node of nodes) {
      const parent = node.parent;
      if (!parent) {
        continue;
      }

      const siblings = organized.get(parent);
      if (siblings) {
        siblings.push(node);
      } else {
        organized.set(parent, [node]);
      }
    }
    return organized;
  }

  /** Groups `nodes` by parent as ascending sets of child indices. */
  static indexSetsGroupedByParent(
    nodes: readonly TreeNode[],
  ): Map<TreeNode, Set<number>> {
    const indexSets = new Map<TreeNode, Set<number>>();
    for (const [parent, siblings] of TreeNode.nodesOrganizedByParent(nodes)) {
      const indexes: number[] = [];
      for (const sibling of siblings) {
        const index = parent.indexOfChild(sibling);
        if (index !== undefined) {
          indexes.push(index);
        }
      }
      indexSets.set(parent, new Set(indexes.sort((a, b) => a - b)));
    }
    return indexSets;
  }

  private findNode(test: NodePredicate, recursively: boolean): TreeNode | undefined {
    for (const childNode of this.childNodes) {
      if (test(childNode)) {
        return childNode;
      }
      if (recursively) {
        const foundNode = childNode.findNode(test, recursively);
        if (foundNode) {
          return foundNode;
        }
      }
    }
    return undefined;
  }
}
