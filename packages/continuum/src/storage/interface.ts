/**
 * Continuum Store Interface
 *
 * Defines the contract for continuum storage implementations: chunk
 * trees, unique-kernel lifecycle, run audit, research suggestions and
 * metadata.
 */

import type {
  ChunkDraft,
  ChunkQuery,
  CompressedResidual,
  CompressionRun,
  KernelCandidate,
  KernelExpectation,
  KernelQuery,
  KernelUpdate,
  KernelUpdateResult,
  ResearchSuggestion,
  RunBatch,
  RunQuery,
  SemanticChunk,
  SuggestionInput,
  SuggestionQuery,
  SuggestionStatus,
  UniqueKernel,
} from '../types/index.js';

/**
 * Row counts per table
 */
export interface RowCounts {
  chunks: number;
  kernels: number;
  runs: number;
  suggestions: number;
}

/**
 * Chunk write outside a run
 */
export type ChunkInput = ChunkDraft & { runId?: string | null };

/**
 * Run write outside a batch
 */
export type RunInput = Omit<CompressionRun, 'createdAt' | 'chunkCount' | 'kernelCount'> &
  Partial<Pick<CompressionRun, 'chunkCount' | 'kernelCount'>>;

/**
 * Continuum store interface
 *
 * All storage implementations must implement this interface.
 */
export interface IContinuumStore {
  // Lifecycle
  /** Run migrations and record the schema version */
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Writes
  /** Throws IntegrityError on an unknown kind, missing parent or self-parent */
  insertChunk(chunk: ChunkInput): Promise<SemanticChunk>;
  /** New kernels are pending with no attempts */
  insertKernel(kernel: KernelCandidate): Promise<UniqueKernel>;
  /**
   * Conditional on `expected`; reports the current row instead of writing
   * when another writer advanced the kernel first
   */
  updateKernel(id: string, update: KernelUpdate, expected: KernelExpectation): Promise<KernelUpdateResult>;
  recordRun(run: RunInput): Promise<CompressionRun>;
  /** Run, chunk tree and kernels in one transaction */
  commitRun(batch: RunBatch): Promise<CompressionRun>;
  persistSuggestion(input: SuggestionInput): Promise<ResearchSuggestion>;
  updateSuggestionStatus(id: string, status: SuggestionStatus): Promise<ResearchSuggestion | null>;

  // Queries
  getChunk(id: string): Promise<SemanticChunk | null>;
  listChunks(query?: ChunkQuery): Promise<SemanticChunk[]>;
  /** The chunk followed by its parents up to the root */
  getChunkAncestry(id: string): Promise<SemanticChunk[]>;
  getKernel(id: string): Promise<UniqueKernel | null>;
  listKernels(query?: KernelQuery): Promise<UniqueKernel[]>;
  /** Compressed kernels by their chunk's residual blob, oldest first */
  listCompressedByResidual(diffBlobRefs: string[]): Promise<CompressedResidual[]>;
  getRun(id: string): Promise<CompressionRun | null>;
  /** Newest first */
  listRuns(query?: RunQuery): Promise<CompressionRun[]>;
  getSuggestion(id: string): Promise<ResearchSuggestion | null>;
  /** Newest first */
  listSuggestions(query?: SuggestionQuery): Promise<ResearchSuggestion[]>;

  // Metadata
  getMeta(key: string): Promise<string | null>;
  setMeta(key: string, value: string): Promise<void>;
  listMeta(): Promise<Record<string, string>>;
  countRows(): Promise<RowCounts>;

  // Maintenance
  /** Flush the WAL into the main database file */
  checkpoint(): Promise<void>;
  vacuum(): Promise<void>;
}
