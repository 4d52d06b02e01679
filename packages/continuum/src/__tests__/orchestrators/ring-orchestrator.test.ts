/**
 * Ring Orchestrator run tests
 *
 * @module __tests__/orchestrators/ring-orchestrator
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import type { CompressionContext } from '../../compression/context.js';
import { DataCompressor } from '../../compression/compressor/data.js';
import { IntegrityError, UnknownMediaKindError } from '../../errors.js';
import { RingOrchestrator } from '../../orchestrators/ring-orchestrator.js';
import { MemoryBlobStore } from '../../storage/blobs.js';
import type { CompressionOutput, CompressionTrace, DroppedDelegation, MediaItem } from '../../types/index.js';
import { FakeExtractor, createHarness, mediaItem } from '../helpers.js';

const RECORDS = '[{"id":1,"v":"a"},{"id":1,"v":"a"},{"id":2,"v":"b"}]';

function allDropped(trace: CompressionTrace): DroppedDelegation[] {
  return [...trace.droppedDelegations, ...trace.delegations.flatMap(allDropped)];
}

/**
 * Emits a chunk whose parent was never produced
 */
class OrphaningCompressor extends DataCompressor {
  override async compress(media: MediaItem, ctx: CompressionContext): Promise<CompressionOutput> {
    const output = await super.compress(media, ctx);
    const orphan = { ...output.root, id: 'chk_orphan', parentId: 'chk_never_written' };
    return { ...output, children: [...output.children, orphan] };
  }
}

class FailingBlobStore extends MemoryBlobStore {
  private writes = 0;

  override async put(bytes: Buffer): Promise<string> {
    this.writes++;
    if (this.writes > 1) throw new Error('disk full');
    return super.put(bytes);
  }
}

describe('RingOrchestrator.runRing', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('persists the run, chunk tree and kernels', async () => {
    const { orchestrator, store } = await createHarness({ config: { regions: { dataItemsPerRegion: 1 } } });
    const result = await orchestrator.runRing(mediaItem('records.json', RECORDS), 'data');

    const run = await store.getRun(result.runId);
    expect(run).toMatchObject({
      mediaId: 'media:records.json',
      strategy: 'ring:data',
      rootChunkId: result.rootChunkId,
      outputHash: result.outputHash,
      chunkCount: 2,
      kernelCount: 1,
    });
    expect(await store.listChunks({ runId: result.runId })).toHaveLength(2);
    expect((await store.listKernels({ status: 'pending' })).map(k => k.id)).toEqual(result.kernels.map(k => k.id));
  });

  it('accepts the media kind case-insensitively', async () => {
    const { orchestrator } = await createHarness();
    const result = await orchestrator.runRing(mediaItem('records.json', RECORDS), ' Data ');

    expect(result.chunks[0]?.mediaKind).toBe('data');
  });

  it('rejects an unknown media kind without writing anything', async () => {
    const { orchestrator, store } = await createHarness();

    await expect(orchestrator.runRing(mediaItem('x', 'y'), 'hologram')).rejects.toThrow(UnknownMediaKindError);
    expect(await store.countRows()).toEqual({ chunks: 0, kernels: 0, runs: 0, suggestions: 0 });
  });

  it('records the configuration the run used', async () => {
    const { orchestrator, store } = await createHarness();
    const result = await orchestrator.runRing(mediaItem('records.json', RECORDS), 'data', { uniqueThreshold: 0.9 });
    const run = await store.getRun(result.runId);
    const config: unknown = JSON.parse(run?.configJson ?? 'null');

    expect(config).toMatchObject({ uniqueThreshold: 0.9, maxDelegationDepth: 3 });
  });

  it('hashes equal inputs to equal output hashes', async () => {
    const { orchestrator } = await createHarness();
    const first = await orchestrator.runRing(mediaItem('records.json', RECORDS), 'data');
    const second = await orchestrator.runRing(mediaItem('records.json', RECORDS), 'data');
    const other = await orchestrator.runRing(mediaItem('records.json', '[1,2,3]'), 'data');

    expect(second.outputHash).toBe(first.outputHash);
    expect(second.rootChunkId).not.toBe(first.rootChunkId);
    expect(other.outputHash).not.toBe(first.outputHash);
  });

  describe('delegation', () => {
    it('places a delegated audio tree under the video root', async () => {
      const demux = new FakeExtractor('demux', () => [mediaItem('soundtrack', 'pcm-samples')]);
      const { orchestrator, store } = await createHarness({ collaborators: { extractors: { video: demux } } });

      const result = await orchestrator.runRing(mediaItem('clip.mp4', 'frames'), 'video');
      const children = await store.listChunks({ parentId: result.rootChunkId });

      expect(children).toHaveLength(1);
      expect(children[0]).toMatchObject({ mediaKind: 'audio', chunkKey: 'soundtrack', descriptionStub: true });
      expect(result.trace.delegations.map(t => [t.kind, t.depth])).toEqual([['audio', 1]]);
      expect(result.chunks).toHaveLength(2);
    });

    it('drops the subtree that would exceed the depth budget', async () => {
      const video = new FakeExtractor('demux', () => [mediaItem('inner-audio', 'pcm')]);
      const audio = new FakeExtractor('spectro', () => [mediaItem('inner-video', 'frames')]);
      const { orchestrator } = await createHarness({
        collaborators: { extractors: { video, audio } },
        config: { delegates: { video: ['audio'], audio: ['video'] } },
      });

      const result = await orchestrator.runRing(mediaItem('clip.mp4', 'frames'), 'video');

      expect(result.chunks.map(c => c.mediaKind)).toEqual(['video', 'audio', 'video', 'audio']);
      expect(allDropped(result.trace).map(d => [d.from, d.to, d.depth])).toEqual([['audio', 'video', 4]]);
      expect(video.calls).toBe(2);
      expect(audio.calls).toBe(1);
    });

    it('leaves no dangling parents', async () => {
      const demux = new FakeExtractor('demux', () => [mediaItem('a1', 'x'), mediaItem('a2', 'y')]);
      const { orchestrator, store } = await createHarness({ collaborators: { extractors: { video: demux } } });
      await orchestrator.runRing(mediaItem('clip.mp4', 'frames'), 'video');
      await orchestrator.runRing(mediaItem('records.json', RECORDS), 'data');

      for (const chunk of await store.listChunks()) {
        if (chunk.parentId !== null) {
          expect(await store.getChunk(chunk.parentId)).not.toBeNull();
        }
      }
    });
  });

  describe('atomicity', () => {
    it('writes nothing when the tree fails integrity checks', async () => {
      const { orchestrator, store } = await createHarness({ compressors: { data: new OrphaningCompressor() } });

      await expect(orchestrator.runRing(mediaItem('records.json', RECORDS), 'data')).rejects.toThrow(IntegrityError);
      expect(await store.countRows()).toEqual({ chunks: 0, kernels: 0, runs: 0, suggestions: 0 });
    });

    it('writes nothing when a stage fails mid-run', async () => {
      const harness = await createHarness();
      const orchestrator = new RingOrchestrator({
        store: harness.store,
        blobs: new FailingBlobStore(),
        registry: harness.registry,
        config: harness.config,
      });

      await expect(orchestrator.runRing(mediaItem('records.json', RECORDS), 'data')).rejects.toThrow('disk full');
      expect(await harness.store.countRows()).toEqual({ chunks: 0, kernels: 0, runs: 0, suggestions: 0 });
    });
  });
});
