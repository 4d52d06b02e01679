/**
 * Kernel reduction result
 */

import type { UniqueKernel } from '../types/index.js';

/**
 * Outcome of one re-attempt on a pending kernel
 */
export interface KernelReduction {
  kernel: UniqueKernel;
  /** Attempt count after this attempt */
  attemptCount: number;
  /** New residual; null when no reduction could be attempted */
  residualMetric: number | null;
  /** Chunk of an already compressed kernel over the same residual */
  mergedInto: string | null;
  reason?: string;
}
