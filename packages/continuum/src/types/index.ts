/**
 * Continuum Type Definitions
 *
 * Entities owned by the continuum store (chunks, kernels, runs,
 * suggestions) and the values that flow through a compressor pipeline.
 */

export * from './media.js';
export * from './chunk.js';
export * from './kernel.js';
export * from './run.js';
export * from './suggestion.js';
export * from './pipeline.js';
