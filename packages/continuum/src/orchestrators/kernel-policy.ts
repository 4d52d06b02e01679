/**
 * Unique-kernel transition policy
 *
 * | from    | to               | when                                                  |
 * |---------|------------------|-------------------------------------------------------|
 * | pending | compressed       | merged, or metric < threshold and better than before  |
 * | pending | flagged_research | attempts reached maxAttempts without improvement      |
 * | pending | pending          | otherwise                                             |
 */

import type { KernelPassConfig } from '../config/types.js';
import type { KernelReduction } from '../compression/types.js';
import type { KernelUpdate } from '../types/index.js';

export function isImprovement(reduction: KernelReduction, policy: KernelPassConfig): boolean {
  const next = reduction.residualMetric;
  const previous = reduction.kernel.residualMetric;
  return next !== null && next < policy.improvementThreshold && (previous === null || next < previous);
}

export function decideKernelUpdate(reduction: KernelReduction, policy: KernelPassConfig): KernelUpdate {
  const { attemptCount } = reduction;
  const residualMetric = reduction.residualMetric ?? reduction.kernel.residualMetric;

  if (reduction.mergedInto !== null) {
    return { status: 'compressed', attemptCount, residualMetric, mergedInto: reduction.mergedInto };
  }
  if (isImprovement(reduction, policy)) {
    return { status: 'compressed', attemptCount, residualMetric };
  }
  if (attemptCount >= policy.maxAttempts) {
    return { status: 'flagged_research', attemptCount, residualMetric };
  }
  return { status: 'pending', attemptCount, residualMetric };
}
