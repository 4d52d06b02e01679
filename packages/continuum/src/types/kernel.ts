/**
 * Unique Kernel
 *
 * A chunk flagged as resistant to compression, tracked through the
 * re-attempt lifecycle:
 *
 *   pending ──pass──▶ pending | compressed | flagged_research
 *
 * compressed and flagged_research are terminal.
 */

export const KERNEL_STATUSES = ['pending', 'compressed', 'flagged_research'] as const;

export type KernelStatus = (typeof KERNEL_STATUSES)[number];

export interface UniqueKernel {
  /** Unique identifier */
  id: string;
  /** Originating chunk */
  chunkId: string;
  /** Name of the compressor whose minimize stage flagged the chunk */
  sourceCompressor: string;
  /** Residual in [0, 1]; null until measured */
  residualMetric: number | null;
  /** Number of re-attempt passes that touched this kernel */
  attemptCount: number;
  status: KernelStatus;
  /** Chunk this kernel merged into, when compressed by merge */
  mergedInto: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Kernel as produced by minimize, before it is committed
 */
export interface KernelCandidate {
  id: string;
  chunkId: string;
  sourceCompressor: string;
  residualMetric: number | null;
}

/**
 * Fields a kernel pass may change
 */
export interface KernelUpdate {
  status: KernelStatus;
  attemptCount: number;
  residualMetric: number | null;
  mergedInto?: string | null;
}

/**
 * State observed when the update was computed
 */
export interface KernelExpectation {
  status: KernelStatus;
  attemptCount: number;
}

export type KernelUpdateResult =
  | { applied: true; kernel: UniqueKernel }
  | { applied: false; current: UniqueKernel | null };

/**
 * A compressed kernel found through its chunk's residual blob
 */
export interface CompressedResidual {
  diffBlobRef: string;
  chunkId: string;
  residualMetric: number | null;
}

/**
 * Query filter for kernels
 */
export interface KernelQuery {
  status?: KernelStatus;
  sourceCompressor?: string;
  since?: string;
  until?: string;
  limit?: number;
  /** Creation order; pending batches are read oldest-first */
  order?: 'oldest' | 'newest';
}

export function isKernelStatus(value: unknown): value is KernelStatus {
  return KERNEL_STATUSES.some(status => status === value);
}

export function isTerminalStatus(status: KernelStatus): boolean {
  return status === 'compressed' || status === 'flagged_research';
}
