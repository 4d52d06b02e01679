/**
 * Compression
 *
 * Per-kind compressors, their residual metrics, and the delegation
 * budget shared across delegated calls.
 */

export * from './budget.js';
export * from './context.js';
export * from './types.js';
export * from './dispatch.js';
export * from './compressor/index.js';
export * from './residual/index.js';
