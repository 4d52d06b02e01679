/**
 * Continuum Ring - Semantic Compression Store
 *
 * Compresses media into a tree of semantic chunks, tracks the regions
 * that resist compression as unique kernels, and feeds them to an
 * improvement loop.
 *
 * @packageDocumentation
 */

// Main Continuum class
export { Continuum, type ContinuumOptions } from './continuum.js';

// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Collaborators
export * from './collaborators/index.js';

// Compression
export * from './compression/index.js';

// Orchestrators
export * from './orchestrators/index.js';

// Research
export * from './research/index.js';

// Utilities
export { sha256, hashContent, canonicalJson, hashValue } from './utils/hash.js';
export {
  generateChunkId,
  generateKernelId,
  generateRunId,
  generateSuggestionId,
} from './utils/id-generator.js';
