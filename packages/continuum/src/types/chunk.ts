/**
 * Semantic Chunk
 *
 * A unit of compressed content. Chunks form a tree through parentId
 * and are never edited after insert; corrections are new chunks that
 * point at what they correct.
 */

import type { MediaKind } from './media.js';

export interface SemanticChunk {
  /** Unique identifier */
  id: string;
  /** Media kind of the content */
  mediaKind: MediaKind;
  /** Stable label within its media kind */
  chunkKey: string;
  /** Durable semantic representation */
  descriptionText: string;
  /** Whether the description is a degraded stub */
  descriptionStub: boolean;
  /** Opaque pointer to the stored residual */
  diffBlobRef: string | null;
  /** Parent chunk (tree, at most one) */
  parentId: string | null;
  /** Spatial/path tag for future indexing */
  quadPath: string | null;
  /** Run that produced the chunk (null for rows older than the column) */
  runId: string | null;
  /** ISO timestamp of creation */
  createdAt: string;
}

/**
 * Chunk as produced by a compressor, before it is committed
 */
export type ChunkDraft = Omit<SemanticChunk, 'runId' | 'createdAt'>;

/**
 * Query filter for chunks
 */
export interface ChunkQuery {
  mediaKind?: MediaKind;
  /** Only children of this chunk; null selects roots */
  parentId?: string | null;
  runId?: string;
  /** ISO lower bound on createdAt (inclusive) */
  since?: string;
  /** ISO upper bound on createdAt (inclusive) */
  until?: string;
  limit?: number;
  offset?: number;
}
