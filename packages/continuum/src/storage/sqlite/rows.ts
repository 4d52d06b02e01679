/**
 * Row shapes as stored, and their mapping to domain entities
 */

import { IntegrityError } from '../../errors.js';
import { isKernelStatus, isMediaKind, isSuggestionSource } from '../../types/index.js';
import type {
  CompressedResidual,
  CompressionRun,
  ResearchSuggestion,
  SemanticChunk,
  UniqueKernel,
} from '../../types/index.js';

export interface ChunkRow {
  id: string;
  media_type: string;
  chunk_key: string;
  description_text: string | null;
  description_stub: number;
  diff_blob_ref: string | null;
  parent_id: string | null;
  quad_path: string | null;
  run_id: string | null;
  created_at: string;
}

export interface KernelRow {
  id: string;
  chunk_id: string;
  source_compressor: string;
  residual_metric: number | null;
  attempt_count: number;
  status: string;
  merged_into: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface CompressedResidualRow {
  diff_blob_ref: string;
  chunk_id: string;
  residual_metric: number | null;
}

export interface RunRow {
  id: string;
  media_id: string | null;
  strategy: string;
  config_json: string | null;
  output_hash: string | null;
  root_chunk_id: string | null;
  chunk_count: number;
  kernel_count: number;
  created_at: string;
}

export interface SuggestionRow {
  id: string;
  source: string;
  context_json: string | null;
  recommendation_text: string;
  status: string;
  created_at: string;
  updated_at: string | null;
}

export function toChunk(row: ChunkRow): SemanticChunk {
  if (!isMediaKind(row.media_type)) {
    throw new IntegrityError(`Stored chunk has unknown media type ${row.media_type}`, 'chunk', row.id);
  }
  return {
    id: row.id,
    mediaKind: row.media_type,
    chunkKey: row.chunk_key,
    descriptionText: row.description_text ?? '',
    descriptionStub: row.description_stub === 1,
    diffBlobRef: row.diff_blob_ref,
    parentId: row.parent_id,
    quadPath: row.quad_path,
    runId: row.run_id,
    createdAt: row.created_at,
  };
}

export function toKernel(row: KernelRow): UniqueKernel {
  if (!isKernelStatus(row.status)) {
    throw new IntegrityError(`Stored kernel has unknown status ${row.status}`, 'kernel', row.id);
  }
  return {
    id: row.id,
    chunkId: row.chunk_id,
    sourceCompressor: row.source_compressor,
    residualMetric: row.residual_metric,
    attemptCount: row.attempt_count,
    status: row.status,
    mergedInto: row.merged_into,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? row.created_at,
  };
}

export function toCompressedResidual(row: CompressedResidualRow): CompressedResidual {
  return { diffBlobRef: row.diff_blob_ref, chunkId: row.chunk_id, residualMetric: row.residual_metric };
}

export function toRun(row: RunRow): CompressionRun {
  return {
    id: row.id,
    mediaId: row.media_id ?? '',
    strategy: row.strategy,
    configJson: row.config_json ?? '{}',
    outputHash: row.output_hash ?? '',
    rootChunkId: row.root_chunk_id,
    chunkCount: row.chunk_count,
    kernelCount: row.kernel_count,
    createdAt: row.created_at,
  };
}

export function toSuggestion(row: SuggestionRow): ResearchSuggestion {
  if (!isSuggestionSource(row.source)) {
    throw new IntegrityError(`Stored suggestion has unknown source ${row.source}`, 'suggestion', row.id);
  }
  return {
    id: row.id,
    source: row.source,
    contextJson: row.context_json,
    recommendationText: row.recommendation_text,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? row.created_at,
  };
}
