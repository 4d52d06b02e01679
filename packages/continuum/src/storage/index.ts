/**
 * Storage Layer Exports
 */

export * from './interface.js';
export * from './blobs.js';
export * from './sqlite/index.js';
export * from './factory.js';
