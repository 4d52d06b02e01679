/**
 * Research Types
 */

import type { CompressionRun, SemanticChunk, UniqueKernel } from '../types/index.js';

export interface ImprovementFilters {
  sourceCompressor?: string;
  /** ISO lower bound on kernel creation */
  since?: string;
  /** ISO upper bound on kernel creation */
  until?: string;
  kernelLimit?: number;
  recentRuns?: number;
}

export interface KernelContextEntry {
  kernel: UniqueKernel;
  /** Kernel chunk followed by its parents up to the root */
  ancestry: SemanticChunk[];
}

/**
 * Bundle handed to the improvement service
 */
export interface ImprovementContext {
  generatedAt: string;
  filters: ImprovementFilters;
  kernels: KernelContextEntry[];
  recentRuns: CompressionRun[];
}
