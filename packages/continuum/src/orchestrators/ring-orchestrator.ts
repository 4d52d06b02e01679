/**
 * Ring Orchestrator
 *
 * Entry point for compression runs and unique-kernel passes. A run
 * compresses one media item through the dispatch table and commits the
 * resulting chunk tree in a single transaction; a pass re-attempts the
 * oldest pending kernels.
 *
 * @module orchestrators/ring-orchestrator
 */

import type { CollaboratorRegistry } from '../collaborators/registry.js';
import { resolveRingConfig } from '../config/defaults.js';
import type { RingConfig, RingConfigOverrides } from '../config/types.js';
import { DelegationBudget } from '../compression/budget.js';
import { DataCompressor } from '../compression/compressor/data.js';
import type { CompressionContext } from '../compression/context.js';
import { createDispatchTable, parseMediaKind } from '../compression/dispatch.js';
import type { DispatchTable } from '../compression/dispatch.js';
import { InvalidTransitionError } from '../errors.js';
import type { IBlobStore } from '../storage/blobs.js';
import type { IContinuumStore } from '../storage/interface.js';
import type {
  ChunkDraft,
  CompressionTrace,
  KernelCandidate,
  MediaItem,
  SemanticChunk,
  UniqueKernel,
} from '../types/index.js';
import { canonicalJson, hashValue } from '../utils/hash.js';
import { generateRunId } from '../utils/id-generator.js';
import { decideKernelUpdate } from './kernel-policy.js';

export interface RingOrchestratorOptions {
  store: IContinuumStore;
  blobs: IBlobStore;
  registry: CollaboratorRegistry;
  config: RingConfig;
  /** Replace compressors per kind */
  compressors?: Partial<DispatchTable>;
}

export interface RingRunResult {
  runId: string;
  rootChunkId: string;
  /** Root first, parents before children */
  chunks: SemanticChunk[];
  kernels: UniqueKernel[];
  outputHash: string;
  trace: CompressionTrace;
}

export interface KernelPassSummary {
  examined: number;
  compressed: number;
  flagged: number;
  pending: number;
  /** Kernels another pass advanced first */
  conflicts: number;
  /** Updates the store rejected as invalid transitions */
  invalid: number;
}

interface CanonicalNode {
  kind: string;
  key: string;
  text: string;
  stub: boolean;
  diff: string | null;
  quad: string | null;
  unique: boolean;
  children: CanonicalNode[];
}

/**
 * Id- and timestamp-free view of a chunk tree, stable across runs of the
 * same input
 */
function canonicalTree(chunks: ChunkDraft[], kernels: KernelCandidate[], rootId: string): CanonicalNode | null {
  const unique = new Set(kernels.map(kernel => kernel.chunkId));
  const byParent = new Map<string, ChunkDraft[]>();
  const byId = new Map<string, ChunkDraft>();
  for (const chunk of chunks) {
    byId.set(chunk.id, chunk);
    if (chunk.parentId !== null) {
      const siblings = byParent.get(chunk.parentId) ?? [];
      siblings.push(chunk);
      byParent.set(chunk.parentId, siblings);
    }
  }

  const build = (chunk: ChunkDraft): CanonicalNode => ({
    kind: chunk.mediaKind,
    key: chunk.chunkKey,
    text: chunk.descriptionText,
    stub: chunk.descriptionStub,
    diff: chunk.diffBlobRef,
    quad: chunk.quadPath,
    unique: unique.has(chunk.id),
    children: (byParent.get(chunk.id) ?? []).map(build),
  });

  const root = byId.get(rootId);
  return root ? build(root) : null;
}

export class RingOrchestrator {
  private readonly store: IContinuumStore;
  private readonly blobs: IBlobStore;
  private readonly registry: CollaboratorRegistry;
  private readonly config: RingConfig;
  private readonly dispatch: DispatchTable;
  private readonly reducer: DataCompressor;

  constructor(options: RingOrchestratorOptions) {
    this.store = options.store;
    this.blobs = options.blobs;
    this.registry = options.registry;
    this.config = options.config;
    this.dispatch = createDispatchTable(options.compressors);
    this.reducer = this.dispatch.data instanceof DataCompressor ? this.dispatch.data : new DataCompressor();
  }

  /**
   * Compress one media item and persist the run. Nothing is written
   * unless the whole tree commits.
   */
  async runRing(media: MediaItem, kind: string, overrides?: RingConfigOverrides): Promise<RingRunResult> {
    const mediaKind = parseMediaKind(kind);
    const config = resolveRingConfig(this.config, overrides);

    const ctx: CompressionContext = {
      config,
      registry: this.registry,
      blobs: this.blobs,
      store: this.store,
      budget: DelegationBudget.root(mediaKind, config.maxDelegationDepth),
      parentId: null,
      compressorFor: target => this.dispatch[target],
    };

    const output = await this.dispatch[mediaKind].compress(media, ctx);
    const drafts = [output.root, ...output.children];
    const outputHash = hashValue(canonicalTree(drafts, output.kernels, output.root.id));

    const run = await this.store.commitRun({
      run: {
        id: generateRunId(),
        mediaId: media.mediaId,
        strategy: `ring:${mediaKind}`,
        configJson: canonicalJson(config),
        outputHash,
        rootChunkId: output.root.id,
      },
      chunks: drafts,
      kernels: output.kernels,
    });

    return {
      runId: run.id,
      rootChunkId: output.root.id,
      chunks: drafts.map(chunk => ({ ...chunk, runId: run.id, createdAt: run.createdAt })),
      kernels: output.kernels.map((kernel): UniqueKernel => ({
        ...kernel,
        attemptCount: 0,
        status: 'pending',
        mergedInto: null,
        createdAt: run.createdAt,
        updatedAt: run.createdAt,
      })),
      outputHash,
      trace: output.trace,
    };
  }

  /**
   * Re-attempt the oldest pending kernels once each
   */
  async runUniqueKernelPass(overrides?: RingConfigOverrides): Promise<KernelPassSummary> {
    const config = resolveRingConfig(this.config, overrides);
    const policy = config.kernelPass;
    const summary: KernelPassSummary = { examined: 0, compressed: 0, flagged: 0, pending: 0, conflicts: 0, invalid: 0 };

    const batch = await this.store.listKernels({ status: 'pending', limit: policy.batchSize, order: 'oldest' });
    summary.examined = batch.length;
    if (batch.length === 0) return summary;

    const reductions = await this.reducer.compressUniqueKernels(batch, {
      config,
      registry: this.registry,
      blobs: this.blobs,
      store: this.store,
    });

    for (const reduction of reductions) {
      const { kernel } = reduction;
      const update = decideKernelUpdate(reduction, policy);

      try {
        const result = await this.store.updateKernel(kernel.id, update, {
          status: kernel.status,
          attemptCount: kernel.attemptCount,
        });
        if (!result.applied) {
          summary.conflicts++;
          console.info(`[continuum] kernel ${kernel.id} advanced by another pass; skipped`);
          continue;
        }
      } catch (err) {
        if (!(err instanceof InvalidTransitionError)) throw err;
        summary.invalid++;
        console.warn(`[continuum] ${err.message}`);
        continue;
      }

      if (update.status === 'compressed') summary.compressed++;
      else if (update.status === 'flagged_research') summary.flagged++;
      else summary.pending++;
    }

    return summary;
  }
}
