/**
 * Compression Run
 *
 * Append-only audit record of one pipeline invocation.
 */

import type { ChunkDraft } from './chunk.js';
import type { KernelCandidate } from './kernel.js';

export interface CompressionRun {
  id: string;
  /** External media identifier */
  mediaId: string;
  /** Strategy label, e.g. `ring:video` */
  strategy: string;
  /** Serialized configuration the run used */
  configJson: string;
  /** SHA-256 over the canonical chunk tree */
  outputHash: string;
  rootChunkId: string | null;
  chunkCount: number;
  kernelCount: number;
  createdAt: string;
}

/**
 * Everything one run writes, committed as a single transaction
 */
export interface RunBatch {
  run: Omit<CompressionRun, 'createdAt' | 'chunkCount' | 'kernelCount'>;
  /** Parents must precede their children */
  chunks: ChunkDraft[];
  kernels: KernelCandidate[];
}

export interface RunQuery {
  strategy?: string;
  mediaId?: string;
  since?: string;
  until?: string;
  limit?: number;
}
