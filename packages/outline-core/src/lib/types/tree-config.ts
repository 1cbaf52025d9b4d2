import { TreeErrorInfo } from './tree-errors';

export interface TreeControllerConfig {
  /**
   * Check every delegate answer before applying it: each child must have the
   * reconciled node as its parent, and no node may appear twice in the tree.
   * Defaults to true.
   */
  validateChildren?: boolean;
  /** Optional handler notified of integrity failures before they are thrown. */
  onError?: (error: TreeErrorInfo) => void;
}

export interface ResolvedTreeControllerConfig {
  validateChildren: boolean;
  onError?: (error: TreeErrorInfo) => void;
}

export const DEFAULT_TREE_CONTROLLER_CONFIG: Readonly<ResolvedTreeControllerConfig> =
  Object.freeze({
    validateChildren: true,
  });

export function mergeTreeControllerConfig(
  config: TreeControllerConfig | undefined,
): ResolvedTreeControllerConfig {
  return {
    ...DEFAULT_TREE_CONTROLLER_CONFIG,
    ...config,
    validateChildren:
      config?.validateChildren ?? DEFAULT_TREE_CONTROLLER_CONFIG.validateChildren,
  };
}
