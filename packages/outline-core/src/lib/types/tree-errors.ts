export type TreeIntegrityReason =
  | 'orphaned-node'
  | 'foreign-child'
  | 'duplicate-node';

/**
 * Thrown when the parent/child ownership contract of a tree is broken.
 * Always a programming error in the caller; never retried.
 */
export class TreeIntegrityError extends Error {
  constructor(
    readonly reason: TreeIntegrityReason,
    readonly nodeId: number,
    message: string,
  ) {
    super(message);
    this.name = 'TreeIntegrityError';
  }
}

/** Error information handed to `TreeControllerConfig.onError`. */
export interface TreeErrorInfo {
  reason: TreeIntegrityReason;
  nodeId: number;
  /** Node whose child list was being reconciled, when there is one. */
  parentId?: number;
  error: unknown;
  message?: string;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
