/**
 * Data Compressor
 *
 * JSON documents are compared leaf by leaf, other bytes in fixed
 * windows. Also re-attempts pending unique kernels: a kernel's residual
 * bytes are treated as a data item and pushed through describe,
 * generate and diff again.
 */

import type {
  CompressedResidual,
  MediaItem,
  MediaKind,
  Proximal,
  Residual,
  SemanticChunk,
  UniqueKernel,
} from '../../types/index.js';
import type { KernelPassContext, StageContext } from '../context.js';
import { jsonResidual } from '../residual/json.js';
import type { KernelReduction } from '../types.js';
import { Compressor } from './base.js';

export class DataCompressor extends Compressor {
  override readonly kind: MediaKind = 'data';

  override diff(original: MediaItem, proximal: Proximal, ctx: StageContext): Residual {
    return jsonResidual(this.kind, original.bytes, proximal.status === 'available' ? proximal.bytes : null, {
      itemsPerRegion: ctx.config.regions.dataItemsPerRegion,
      bytesPerRegion: ctx.config.regions.dataBytesPerRegion,
    });
  }

  /**
   * One reduction attempt per kernel. A kernel whose residual blob is
   * shared by an already compressed kernel merges into that kernel's
   * chunk without re-describing.
   */
  async compressUniqueKernels(kernels: UniqueKernel[], ctx: KernelPassContext): Promise<KernelReduction[]> {
    const chunks = new Map<string, SemanticChunk | null>();
    for (const kernel of kernels) {
      chunks.set(kernel.chunkId, await ctx.store.getChunk(kernel.chunkId));
    }
    const compressedByBlob = await this.compressedBlobs([...chunks.values()], ctx);
    const reductions: KernelReduction[] = [];

    for (const kernel of kernels) {
      const attemptCount = kernel.attemptCount + 1;
      const chunk = chunks.get(kernel.chunkId);
      if (!chunk?.diffBlobRef) {
        reductions.push({ kernel, attemptCount, residualMetric: null, mergedInto: null, reason: 'no residual stored' });
        continue;
      }

      const twin = compressedByBlob.get(chunk.diffBlobRef);
      if (twin && twin.chunkId !== chunk.id) {
        reductions.push({ kernel, attemptCount, residualMetric: twin.residualMetric, mergedInto: twin.chunkId });
        continue;
      }

      const bytes = await ctx.blobs.get(chunk.diffBlobRef);
      if (!bytes) {
        reductions.push({ kernel, attemptCount, residualMetric: null, mergedInto: null, reason: 'residual blob missing' });
        continue;
      }

      const item: MediaItem = { mediaId: chunk.id, name: chunk.chunkKey, bytes };
      const description = await this.describe(item, ctx);
      const proximal = await this.generateProximal(description, item, ctx);
      if (proximal.status === 'unavailable') {
        reductions.push({ kernel, attemptCount, residualMetric: null, mergedInto: null, reason: proximal.reason });
        continue;
      }

      const residual = this.diff(item, proximal, ctx);
      reductions.push({ kernel, attemptCount, residualMetric: residual.metric, mergedInto: null });
    }

    return reductions;
  }

  /**
   * First compressed kernel per residual blob, for the batch's blobs only
   */
  private async compressedBlobs(
    chunks: (SemanticChunk | null)[],
    ctx: KernelPassContext
  ): Promise<Map<string, CompressedResidual>> {
    const refs = chunks.flatMap(chunk => (chunk?.diffBlobRef ? [chunk.diffBlobRef] : []));
    const byBlob = new Map<string, CompressedResidual>();
    for (const found of await ctx.store.listCompressedByResidual(refs)) {
      if (!byBlob.has(found.diffBlobRef)) byBlob.set(found.diffBlobRef, found);
    }
    return byBlob;
  }
}
