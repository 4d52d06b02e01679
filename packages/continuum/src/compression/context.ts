/**
 * Compression Contexts
 *
 * Everything a compressor reaches outside itself arrives through one of
 * these; there is no process-wide store or registry.
 */

import type { CollaboratorRegistry } from '../collaborators/registry.js';
import type { RingConfig } from '../config/types.js';
import type { IBlobStore } from '../storage/blobs.js';
import type { IContinuumStore } from '../storage/interface.js';
import type { MediaKind } from '../types/index.js';
import type { DelegationBudget } from './budget.js';
import type { Compressor } from './compressor/base.js';

/**
 * What the describe/generate/diff/minimize stages need
 */
export interface StageContext {
  config: RingConfig;
  registry: CollaboratorRegistry;
  blobs: IBlobStore;
}

export interface CompressionContext extends StageContext {
  store: IContinuumStore;
  budget: DelegationBudget;
  /** Parent of the root chunk this call produces; set on delegated calls */
  parentId: string | null;
  /** Dispatch for delegated calls */
  compressorFor(kind: MediaKind): Compressor;
}

export interface KernelPassContext extends StageContext {
  store: IContinuumStore;
}
