/**
 * Pipeline Types
 *
 * Intermediate values passed between the describe, generate, diff and
 * minimize stages of a compressor, and what a compress() call returns.
 */

import type { ChunkDraft } from './chunk.js';
import type { KernelCandidate } from './kernel.js';
import type { MediaKind } from './media.js';

/**
 * Durable semantic representation of a media item
 */
export interface Description {
  kind: MediaKind;
  text: string;
  /** True when the describe collaborator was unavailable */
  stub: boolean;
  /** Collaborator name, or 'stub' */
  producedBy: string;
  /** Structured form for the generate stage; never persisted */
  structured?: unknown;
  degradedReason?: string;
}

/**
 * Reconstructed approximation of the original
 */
export type Proximal =
  | { status: 'available'; bytes: Buffer; producedBy: string }
  | { status: 'unavailable'; reason: string };

/**
 * One region of a residual
 */
export interface ResidualRegion {
  index: number;
  /** Region label appended to the chunk key (`r0`, `cell-1-2`, `$.items[0:16]`) */
  label: string;
  /** Distance in [0, 1] */
  metric: number;
  /** Original content of the region, stored behind the chunk's diff ref */
  content: Buffer;
}

/**
 * Structured gap between an original and its proximal
 */
export interface Residual {
  kind: MediaKind;
  /** Overall distance in [0, 1]; 0 for identical, 1 when saturated */
  metric: number;
  /** Set when no proximal existed to compare against */
  saturated: boolean;
  regions: ResidualRegion[];
}

/**
 * Region kept by minimize, ready to become a chunk
 */
export interface MinimizedRegion {
  chunk: ChunkDraft;
  isUnique: boolean;
  residualMetric: number;
}

export interface DroppedDelegation {
  from: MediaKind;
  to: MediaKind;
  /** Depth the dropped call would have run at */
  depth: number;
  reason: string;
}

/**
 * What each stage did, for callers and logs
 */
export interface CompressionTrace {
  kind: MediaKind;
  compressor: string;
  depth: number;
  description: {
    stub: boolean;
    producedBy: string;
    degradedReason?: string;
  };
  proximal: {
    status: Proximal['status'];
    reason?: string;
  };
  residual: {
    metric: number;
    saturated: boolean;
    regionCount: number;
  };
  candidateCount: number;
  delegations: CompressionTrace[];
  droppedDelegations: DroppedDelegation[];
}

/**
 * Chunk tree and kernel candidates produced by one compress() call
 */
export interface CompressionOutput {
  root: ChunkDraft;
  /** Every descendant of root, parents before children */
  children: ChunkDraft[];
  kernels: KernelCandidate[];
  trace: CompressionTrace;
}
