/**
 * Delegation Budget
 *
 * Tracks the chain of media kinds from the root compress() call down to
 * the current delegated one. Entering a kind past the maximum depth
 * throws instead of recursing.
 */

import { DelegationDepthExceededError } from '../errors.js';
import type { MediaKind } from '../types/index.js';

export class DelegationBudget {
  private constructor(
    readonly maxDepth: number,
    readonly path: readonly MediaKind[]
  ) {}

  static root(kind: MediaKind, maxDepth: number): DelegationBudget {
    return new DelegationBudget(maxDepth, [kind]);
  }

  /** 0 for the root call */
  get depth(): number {
    return this.path.length - 1;
  }

  get remaining(): number {
    return Math.max(0, this.maxDepth - this.depth);
  }

  /**
   * Budget for a delegated call into `kind`
   */
  enter(kind: MediaKind): DelegationBudget {
    const path = [...this.path, kind];
    if (path.length - 1 > this.maxDepth) {
      throw new DelegationDepthExceededError(path, this.maxDepth);
    }
    return new DelegationBudget(this.maxDepth, path);
  }
}
