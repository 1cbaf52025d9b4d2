/*
 * Public API Surface of outline-core
 */

// =================== NODES ===================
export * from './lib/node/tree-node';
export * from './lib/node/node-path';

// =================== CONTROLLER ===================
export * from './lib/engine/tree-controller';
export * from './lib/engine/selection';

// =================== TYPES & CONFIGURATION ===================
export * from './lib/types/tree-config';
export * from './lib/types/tree-delegate';
export * from './lib/types/tree-errors';
export * from './lib/types/tree-events';

// =================== UTILITIES ===================
export * from './lib/utils/tree-utils';
