import { Observable, Subject } from 'rxjs';

import { TreeNode } from '../node/tree-node';
import {
  ResolvedTreeControllerConfig,
  TreeControllerConfig,
  mergeTreeControllerConfig,
} from '../types/tree-config';
import { NodeVisitor, TreeControllerDelegate } from '../types/tree-delegate';
import {
  TreeErrorInfo,
  TreeIntegrityError,
  TreeIntegrityReason,
  formatError,
} from '../types/tree-errors';
import { TreeRebuildEvent, TreeStats } from '../types/tree-events';
import {
  flattenVisibleNodes,
  getMaxDepth,
  nodeArraysAreEqual,
} from '../utils/tree-utils';
import { normalizeSelectedNodes, selectableNodes } from './selection';

/**
 * Owns a root node and keeps the tree below it in line with a delegate.
 *
 * The tree is reconciled once at construction; afterwards it only changes
 * when `rebuild()` is called.
 */
export class TreeController {
  readonly rootNode: TreeNode;

  private readonly delegate: TreeControllerDelegate;
  private config: ResolvedTreeControllerConfig;
  private readonly changesSubject = new Subject<TreeRebuildEvent>();

  /** Emits after each rebuild that replaced at least one child list. */
  readonly changes$: Observable<TreeRebuildEvent> =
    this.changesSubject.asObservable();

  constructor(
    delegate: TreeControllerDelegate,
    rootNode: TreeNode = TreeNode.genericRootNode(),
    config?: TreeControllerConfig,
  ) {
    this.delegate = delegate;
    this.rootNode = rootNode;
    this.config = mergeTreeControllerConfig(config);
    this.rebuild();
  }

  /** Changes only the options given; the others keep their current values. */
  configure(config?: TreeControllerConfig): void {
    this.config = mergeTreeControllerConfig({ ...this.config, ...config });
  }

  get stats(): TreeStats {
    let total = 0;
    let leaves = 0;
    let groups = 0;

    this.visitNodes((node) => {
      total += 1;
      if (node.isLeaf) {
        leaves += 1;
      }
      if (node.isGroupItem) {
        groups += 1;
      }
    });

    return { total, leaves, groups, maxDepth: getMaxDepth(this.rootNode) };
  }

  /**
   * Reconciles every child list against the delegate, starting at the root.
   * Returns true when any child list anywhere in the tree was replaced.
   *
   * Every delegate answer is collected and validated before any child list
   * is assigned; a rebuild that throws leaves the tree as it was.
   */
  rebuild(): boolean {
    const replacements = new Map<TreeNode, TreeNode[]>();
    this.collectChildNodes(this.rootNode, new Set([this.rootNode]), replacements);

    if (replacements.size === 0) {
      return false;
    }

    const changedNodes: TreeNode[] = [];
    for (const [node, childNodes] of replacements) {
      node.childNodes = childNodes;
      changedNodes.push(node);
    }

    this.changesSubject.next({ changedNodes });
    return true;
  }

  /** Pre-order visit of every node, root included. */
  visitNodes(visitor: NodeVisitor): void {
    this.visitNode(this.rootNode, visitor);
  }

  nodeInArrayRepresentingObject(
    nodes: readonly TreeNode[],
    representedObject: object,
    recurse = false,
  ): TreeNode | undefined {
    for (const node of nodes) {
      if (node.representedObject === representedObject) {
        return node;
      }

      if (recurse && node.canHaveChildNodes) {
        const foundNode = this.nodeInArrayRepresentingObject(
          node.childNodes,
          representedObject,
          recurse,
        );
        if (foundNode) {
          return foundNode;
        }
      }
    }
    return undefined;
  }

  nodeInTreeRepresentingObject(representedObject: object): TreeNode | undefined {
    return this.nodeInArrayRepresentingObject(
      [this.rootNode],
      representedObject,
      true,
    );
  }

  /** Drops every node whose ancestor is also in `nodes`. */
  normalizedSelectedNodes(nodes: readonly TreeNode[]): TreeNode[] {
    return normalizeSelectedNodes(nodes);
  }

  selectableNodes(nodes: readonly TreeNode[]): TreeNode[] {
    return selectableNodes(nodes);
  }

  /** Rows below the root, descending only into nodes that are expanded. */
  visibleNodes(isExpanded: (node: TreeNode) => boolean): TreeNode[] {
    return flattenVisibleNodes(this.rootNode, isExpanded);
  }

  dispose(): void {
    this.changesSubject.complete();
  }

  private visitNode(node: TreeNode, visitor: NodeVisitor): void {
    visitor(node);
    node.childNodes.forEach((childNode) => this.visitNode(childNode, visitor));
  }

  /**
   * Walks the tree as the delegate describes it, recording in pre-order the
   * nodes whose answer differs from their current child list.
   */
  private collectChildNodes(
    node: TreeNode,
    seen: Set<TreeNode>,
    replacements: Map<TreeNode, TreeNode[]>,
  ): void {
    if (!node.canHaveChildNodes) {
      return;
    }

    const childNodes = this.delegate.childNodesFor(this, node) ?? [];
    if (this.config.validateChildren) {
      this.validateChildNodes(node, childNodes, seen);
    }

    if (nodeArraysAreEqual(childNodes, node.childNodes)) {
      replacements.delete(node);
    } else {
      replacements.set(node, [...childNodes]);
    }

    for (const childNode of childNodes) {
      this.collectChildNodes(childNode, seen, replacements);
    }
  }

  private validateChildNodes(
    node: TreeNode,
    childNodes: readonly TreeNode[],
    seen: Set<TreeNode>,
  ): void {
    for (const childNode of childNodes) {
      if (childNode.parent !== node) {
        this.fail(
          'foreign-child',
          childNode,
          node,
          `Node ${childNode.uniqueId} was returned as a child of ${node.uniqueId} but belongs to another parent`,
        );
      }
      if (seen.has(childNode)) {
        this.fail(
          'duplicate-node',
          childNode,
          node,
          `Node ${childNode.uniqueId} appears more than once in the tree`,
        );
      }
      seen.add(childNode);
    }
  }

  private fail(
    reason: TreeIntegrityReason,
    childNode: TreeNode,
    parent: TreeNode,
    message: string,
  ): never {
    const error = new TreeIntegrityError(reason, childNode.uniqueId, message);
    const errorInfo: TreeErrorInfo = {
      reason,
      nodeId: childNode.uniqueId,
      parentId: parent.uniqueId,
      error,
      message: formatError(error),
    };

    this.config.onError?.(errorInfo);
    throw error;
  }
}
