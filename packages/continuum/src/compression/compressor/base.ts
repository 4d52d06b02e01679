/**
 * Compressor Base
 *
 * Every media kind runs the same pipeline:
 *
 *   describe → generateProximal → diff → minimize → delegations
 *
 * Variants supply the residual (diff) and may pick different
 * collaborators. Collaborator failures degrade a stage instead of
 * failing the call; only storage and programming errors propagate.
 *
 * @module compression/compressor/base
 */

import { CollaboratorUnavailableError, DelegationDepthExceededError } from '../../errors.js';
import { withTimeout } from '../../collaborators/timeout.js';
import type { DescribeService, GenerateService, SubArtifactExtractor } from '../../collaborators/types.js';
import type {
  ChunkDraft,
  CompressionOutput,
  CompressionTrace,
  Description,
  DroppedDelegation,
  KernelCandidate,
  MediaItem,
  MediaKind,
  MinimizedRegion,
  Proximal,
  Residual,
} from '../../types/index.js';
import { canonicalJson } from '../../utils/hash.js';
import { generateChunkId, generateKernelId } from '../../utils/id-generator.js';
import type { DelegationBudget } from '../budget.js';
import type { CompressionContext, StageContext } from '../context.js';

export function stubDescription(kind: MediaKind, media: MediaItem, reason: string): Description {
  return {
    kind,
    text: `[${kind} stub] ${media.name} (${media.bytes.length} bytes)`,
    stub: true,
    producedBy: 'stub',
    degradedReason: reason,
  };
}

export abstract class Compressor {
  abstract readonly kind: MediaKind;

  /** Recorded as the source of kernels this compressor flags */
  get name(): string {
    return this.kind;
  }

  protected describerFor(ctx: StageContext): DescribeService | null {
    return ctx.registry.describer(this.kind);
  }

  protected generatorFor(ctx: StageContext): GenerateService | null {
    return ctx.registry.generator(this.kind);
  }

  protected extractorFor(ctx: StageContext): SubArtifactExtractor | null {
    return ctx.registry.extractor(this.kind);
  }

  /**
   * Semantic description; a stub when no describer answers
   */
  async describe(media: MediaItem, ctx: StageContext): Promise<Description> {
    const describer = this.describerFor(ctx);
    if (!describer) {
      return stubDescription(this.kind, media, `no ${this.kind} describer available`);
    }

    try {
      const result = await withTimeout(describer.name, ctx.config.collaboratorTimeoutMs, signal =>
        describer.describe(media, this.kind, { signal })
      );
      return {
        kind: this.kind,
        text: result.text,
        stub: false,
        producedBy: describer.name,
        structured: result.structured,
      };
    } catch (err) {
      if (!(err instanceof CollaboratorUnavailableError)) throw err;
      console.warn(`[continuum] ${this.kind} describe degraded to stub: ${err.message}`);
      return stubDescription(this.kind, media, err.message);
    }
  }

  /**
   * Reconstruction from the description, when one can be made
   */
  async generateProximal(description: Description, media: MediaItem, ctx: StageContext): Promise<Proximal> {
    if (description.stub) {
      return { status: 'unavailable', reason: 'description is a stub' };
    }
    const generator = this.generatorFor(ctx);
    if (!generator) {
      return { status: 'unavailable', reason: `no ${this.kind} generator available` };
    }

    try {
      const bytes = await withTimeout(generator.name, ctx.config.collaboratorTimeoutMs, signal =>
        generator.generate(description, media, { signal })
      );
      return { status: 'available', bytes, producedBy: generator.name };
    } catch (err) {
      if (!(err instanceof CollaboratorUnavailableError)) throw err;
      console.warn(`[continuum] ${this.kind} proximal unavailable: ${err.message}`);
      return { status: 'unavailable', reason: err.message };
    }
  }

  /**
   * Residual of the original against the proximal; saturated when there
   * is no proximal
   */
  abstract diff(original: MediaItem, proximal: Proximal, ctx: StageContext): Residual;

  /**
   * Regions with a non-zero residual, as candidate chunks under `rootId`
   */
  async minimize(
    residual: Residual,
    description: Description,
    media: MediaItem,
    rootId: string,
    ctx: StageContext
  ): Promise<MinimizedRegion[]> {
    if (description.stub) return [];

    const kept: MinimizedRegion[] = [];
    for (const region of residual.regions) {
      if (region.metric <= 0) continue;
      const diffBlobRef = await ctx.blobs.put(region.content);
      kept.push({
        chunk: {
          id: generateChunkId(),
          mediaKind: this.kind,
          chunkKey: `${media.name}#${region.label}`,
          descriptionText: `${this.kind} region ${region.label}: residual ${region.metric.toFixed(3)}`,
          descriptionStub: false,
          diffBlobRef,
          parentId: rootId,
          quadPath: region.label,
        },
        isUnique: region.metric >= ctx.config.uniqueThreshold,
        residualMetric: region.metric,
      });
    }
    return kept;
  }

  /**
   * Run the pipeline, then any configured delegations
   */
  async compress(media: MediaItem, ctx: CompressionContext): Promise<CompressionOutput> {
    const description = await this.describe(media, ctx);
    const proximal = await this.generateProximal(description, media, ctx);
    const residual = this.diff(media, proximal, ctx);

    const rootId = generateChunkId();
    const summary = {
      kind: residual.kind,
      metric: residual.metric,
      saturated: residual.saturated,
      regions: residual.regions.map(({ index, label, metric }) => ({ index, label, metric })),
    };
    const root: ChunkDraft = {
      id: rootId,
      mediaKind: this.kind,
      chunkKey: media.name,
      descriptionText: description.text,
      descriptionStub: description.stub,
      diffBlobRef: await ctx.blobs.put(Buffer.from(canonicalJson(summary), 'utf8')),
      parentId: ctx.parentId,
      quadPath: null,
    };

    const regions = await this.minimize(residual, description, media, rootId, ctx);
    const children: ChunkDraft[] = regions.map(region => region.chunk);
    const kernels: KernelCandidate[] = regions
      .filter(region => region.isUnique)
      .map(region => ({
        id: generateKernelId(),
        chunkId: region.chunk.id,
        sourceCompressor: this.name,
        residualMetric: region.residualMetric,
      }));

    const trace: CompressionTrace = {
      kind: this.kind,
      compressor: this.name,
      depth: ctx.budget.depth,
      description: {
        stub: description.stub,
        producedBy: description.producedBy,
        ...(description.degradedReason ? { degradedReason: description.degradedReason } : {}),
      },
      proximal:
        proximal.status === 'available' ? { status: 'available' } : { status: 'unavailable', reason: proximal.reason },
      residual: { metric: residual.metric, saturated: residual.saturated, regionCount: residual.regions.length },
      candidateCount: regions.length,
      delegations: [],
      droppedDelegations: [],
    };

    for (const target of ctx.config.delegates[this.kind] ?? []) {
      await this.delegate(target, media, rootId, ctx, { children, kernels, trace });
    }

    return { root, children, kernels, trace };
  }

  private async delegate(
    target: MediaKind,
    media: MediaItem,
    rootId: string,
    ctx: CompressionContext,
    into: { children: ChunkDraft[]; kernels: KernelCandidate[]; trace: CompressionTrace }
  ): Promise<void> {
    const drop = (reason: string): void => {
      const dropped: DroppedDelegation = { from: this.kind, to: target, depth: ctx.budget.depth + 1, reason };
      into.trace.droppedDelegations.push(dropped);
      console.warn(`[continuum] dropped ${this.kind} → ${target} delegation at depth ${dropped.depth}: ${reason}`);
    };

    let budget: DelegationBudget;
    try {
      budget = ctx.budget.enter(target);
    } catch (err) {
      if (!(err instanceof DelegationDepthExceededError)) throw err;
      drop(err.message);
      return;
    }

    const extractor = this.extractorFor(ctx);
    if (!extractor) {
      drop(`no ${this.kind} extractor available`);
      return;
    }

    let items: MediaItem[];
    try {
      items = await withTimeout(extractor.name, ctx.config.collaboratorTimeoutMs, signal =>
        extractor.extract(media, target, { signal })
      );
    } catch (err) {
      if (!(err instanceof CollaboratorUnavailableError)) throw err;
      drop(err.message);
      return;
    }

    const compressor = ctx.compressorFor(target);
    for (const item of items) {
      const output = await compressor.compress(item, { ...ctx, budget, parentId: rootId });
      into.children.push(output.root, ...output.children);
      into.kernels.push(...output.kernels);
      into.trace.delegations.push(output.trace);
    }
  }
}
