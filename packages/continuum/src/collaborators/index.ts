/**
 * Collaborators
 */

export * from './types.js';
export * from './timeout.js';
export * from './registry.js';
export * from './builtin/index.js';
