/**
 * Configuration Exports
 */

export * from './types.js';
export * from './defaults.js';
export * from './validator.js';
export * from './loader.js';
