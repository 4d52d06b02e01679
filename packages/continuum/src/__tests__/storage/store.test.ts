/**
 * SQLite Continuum Store Tests
 *
 * @module __tests__/storage/store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { IntegrityError, InvalidTransitionError } from '../../errors.js';
import { SQLiteContinuumStore } from '../../storage/sqlite/storage.js';
import type { ChunkDraft, KernelCandidate, KernelUpdate } from '../../types/index.js';

function chunk(id: string, parentId: string | null = null, overrides: Partial<ChunkDraft> = {}): ChunkDraft {
  return {
    id,
    mediaKind: 'data',
    chunkKey: `key-${id}`,
    descriptionText: `chunk ${id}`,
    descriptionStub: false,
    diffBlobRef: null,
    parentId,
    quadPath: null,
    ...overrides,
  };
}

function kernel(id: string, chunkId: string, residualMetric: number | null = 0.8): KernelCandidate {
  return { id, chunkId, sourceCompressor: 'data', residualMetric };
}

describe('SQLiteContinuumStore', () => {
  let store: SQLiteContinuumStore;

  beforeEach(async () => {
    store = new SQLiteContinuumStore(':memory:');
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('chunks', () => {
    it('inserts and reads back a chunk', async () => {
      await store.insertChunk(chunk('root'));
      const stored = await store.getChunk('root');

      expect(stored).toMatchObject({
        id: 'root',
        mediaKind: 'data',
        chunkKey: 'key-root',
        descriptionStub: false,
        parentId: null,
        runId: null,
      });
    });

    it('rejects a missing parent', async () => {
      await expect(store.insertChunk(chunk('child', 'nowhere'))).rejects.toThrow(IntegrityError);
      expect(await store.getChunk('child')).toBeNull();
    });

    it('rejects a self-parent', async () => {
      await expect(store.insertChunk(chunk('loop', 'loop'))).rejects.toThrow(IntegrityError);
    });

    it('rejects a media kind outside the closed set', async () => {
      const bad = Object.assign(chunk('odd'), { mediaKind: 'hologram' });
      await expect(store.insertChunk(bad)).rejects.toThrow(IntegrityError);
    });

    it('rejects a duplicate id', async () => {
      await store.insertChunk(chunk('dup'));
      await expect(store.insertChunk(chunk('dup'))).rejects.toThrow(IntegrityError);
    });

    it('returns the ancestry from the chunk up to the root', async () => {
      await store.insertChunk(chunk('a'));
      await store.insertChunk(chunk('b', 'a'));
      await store.insertChunk(chunk('c', 'b'));

      const ancestry = await store.getChunkAncestry('c');
      expect(ancestry.map(c => c.id)).toEqual(['c', 'b', 'a']);
    });

    it('filters chunks by parent, kind and page', async () => {
      await store.insertChunk(chunk('r'));
      await store.insertChunk(chunk('x', 'r'));
      await store.insertChunk(chunk('y', 'r', { mediaKind: 'audio' }));
      await store.insertChunk(chunk('z', 'r'));

      expect((await store.listChunks({ parentId: null })).map(c => c.id)).toEqual(['r']);
      expect((await store.listChunks({ parentId: 'r', mediaKind: 'data' })).map(c => c.id)).toEqual(['x', 'z']);
      expect((await store.listChunks({ limit: 2, offset: 1 })).map(c => c.id)).toEqual(['x', 'y']);
    });
  });

  describe('kernels', () => {
    beforeEach(async () => {
      await store.insertChunk(chunk('c1'));
    });

    it('creates kernels pending with no attempts', async () => {
      const created = await store.insertKernel(kernel('k1', 'c1'));

      expect(created.status).toBe('pending');
      expect(created.attemptCount).toBe(0);
      expect(await store.getKernel('k1')).toMatchObject({ status: 'pending', attemptCount: 0, residualMetric: 0.8 });
    });

    it('rejects a kernel over a missing chunk', async () => {
      await expect(store.insertKernel(kernel('k1', 'missing'))).rejects.toThrow(IntegrityError);
    });

    it('applies an update whose expectation matches', async () => {
      await store.insertKernel(kernel('k1', 'c1'));
      const result = await store.updateKernel(
        'k1',
        { status: 'pending', attemptCount: 1, residualMetric: 0.6 },
        { status: 'pending', attemptCount: 0 }
      );

      expect(result.applied).toBe(true);
      expect(await store.getKernel('k1')).toMatchObject({ attemptCount: 1, residualMetric: 0.6 });
    });

    it('reports the current row when the expectation is stale', async () => {
      await store.insertKernel(kernel('k1', 'c1'));
      await store.updateKernel(
        'k1',
        { status: 'pending', attemptCount: 1, residualMetric: 0.6 },
        { status: 'pending', attemptCount: 0 }
      );

      const result = await store.updateKernel(
        'k1',
        { status: 'compressed', attemptCount: 1, residualMetric: 0.1 },
        { status: 'pending', attemptCount: 0 }
      );

      expect(result.applied).toBe(false);
      if (!result.applied) {
        expect(result.current).toMatchObject({ status: 'pending', attemptCount: 1 });
      }
    });

    it('reports a missing kernel without writing', async () => {
      const result = await store.updateKernel(
        'ghost',
        { status: 'pending', attemptCount: 1, residualMetric: null },
        { status: 'pending', attemptCount: 0 }
      );
      expect(result).toEqual({ applied: false, current: null });
    });

    it('refuses to decrease the attempt count', async () => {
      await store.insertKernel(kernel('k1', 'c1'));
      await store.updateKernel(
        'k1',
        { status: 'pending', attemptCount: 2, residualMetric: 0.7 },
        { status: 'pending', attemptCount: 0 }
      );

      await expect(
        store.updateKernel(
          'k1',
          { status: 'pending', attemptCount: 1, residualMetric: 0.7 },
          { status: 'pending', attemptCount: 2 }
        )
      ).rejects.toThrow(InvalidTransitionError);
    });

    it('refuses to leave a terminal status', async () => {
      await store.insertKernel(kernel('k1', 'c1'));
      await store.updateKernel(
        'k1',
        { status: 'flagged_research', attemptCount: 1, residualMetric: 0.9 },
        { status: 'pending', attemptCount: 0 }
      );

      await expect(
        store.updateKernel(
          'k1',
          { status: 'pending', attemptCount: 2, residualMetric: 0.9 },
          { status: 'flagged_research', attemptCount: 1 }
        )
      ).rejects.toThrow(InvalidTransitionError);
      expect(await store.getKernel('k1')).toMatchObject({ status: 'flagged_research', attemptCount: 1 });
    });

    it('refuses an unknown status', async () => {
      await store.insertKernel(kernel('k1', 'c1'));
      const update = Object.assign<KernelUpdate, { status: string }>(
        { status: 'pending', attemptCount: 1, residualMetric: null },
        { status: 'archived' }
      );

      await expect(
        store.updateKernel('k1', update, { status: 'pending', attemptCount: 0 })
      ).rejects.toThrow(InvalidTransitionError);
    });

    it('lists pending kernels oldest first up to the limit', async () => {
      await store.insertKernel(kernel('k1', 'c1'));
      await store.insertKernel(kernel('k2', 'c1'));
      await store.insertKernel(kernel('k3', 'c1'));

      const batch = await store.listKernels({ status: 'pending', limit: 2, order: 'oldest' });
      expect(batch.map(k => k.id)).toEqual(['k1', 'k2']);

      const newest = await store.listKernels({ order: 'newest', limit: 1 });
      expect(newest.map(k => k.id)).toEqual(['k3']);
    });

    it('finds compressed kernels only for the requested residual blobs', async () => {
      await store.insertChunk(chunk('shared-a', null, { diffBlobRef: 'blob:sha256:aa' }));
      await store.insertChunk(chunk('shared-b', null, { diffBlobRef: 'blob:sha256:aa' }));
      await store.insertChunk(chunk('other', null, { diffBlobRef: 'blob:sha256:bb' }));
      await store.insertChunk(chunk('open', null, { diffBlobRef: 'blob:sha256:cc' }));
      const compress = { status: 'compressed', attemptCount: 1, residualMetric: 0.2 } satisfies KernelUpdate;
      for (const [id, chunkId] of [['ka', 'shared-a'], ['kb', 'shared-b'], ['ko', 'other']]) {
        await store.insertKernel(kernel(id, chunkId));
        await store.updateKernel(id, compress, { status: 'pending', attemptCount: 0 });
      }
      await store.insertKernel(kernel('kc', 'open'));

      const found = await store.listCompressedByResidual(['blob:sha256:aa', 'blob:sha256:cc', 'blob:sha256:aa']);

      expect(found).toEqual([
        { diffBlobRef: 'blob:sha256:aa', chunkId: 'shared-a', residualMetric: 0.2 },
        { diffBlobRef: 'blob:sha256:aa', chunkId: 'shared-b', residualMetric: 0.2 },
      ]);
      expect(await store.listCompressedByResidual([])).toEqual([]);
    });
  });

  describe('runs', () => {
    it('commits run, chunks and kernels together', async () => {
      const run = await store.commitRun({
        run: {
          id: 'run-1',
          mediaId: 'm1',
          strategy: 'ring:data',
          configJson: '{}',
          outputHash: 'h',
          rootChunkId: 'root',
        },
        chunks: [chunk('root'), chunk('leaf', 'root')],
        kernels: [kernel('k1', 'leaf')],
      });

      expect(run).toMatchObject({ chunkCount: 2, kernelCount: 1 });
      expect((await store.getChunk('leaf'))?.runId).toBe('run-1');
      expect(await store.countRows()).toEqual({ chunks: 2, kernels: 1, runs: 1, suggestions: 0 });
    });

    it('rolls back every row when one chunk fails', async () => {
      await expect(
        store.commitRun({
          run: {
            id: 'run-bad',
            mediaId: 'm1',
            strategy: 'ring:data',
            configJson: '{}',
            outputHash: 'h',
            rootChunkId: 'root',
          },
          chunks: [chunk('root'), chunk('orphan', 'missing-parent')],
          kernels: [],
        })
      ).rejects.toThrow(IntegrityError);

      expect(await store.countRows()).toEqual({ chunks: 0, kernels: 0, runs: 0, suggestions: 0 });
    });

    it('lists runs newest first', async () => {
      await store.recordRun({ id: 'r1', mediaId: 'a', strategy: 'ring:data', configJson: '{}', outputHash: 'x', rootChunkId: null });
      await store.recordRun({ id: 'r2', mediaId: 'b', strategy: 'ring:audio', configJson: '{}', outputHash: 'y', rootChunkId: null });

      expect((await store.listRuns()).map(r => r.id)).toEqual(['r2', 'r1']);
      expect((await store.listRuns({ strategy: 'ring:data' })).map(r => r.id)).toEqual(['r1']);
    });
  });

  describe('suggestions and metadata', () => {
    it('stores suggestion text and context verbatim', async () => {
      const contextJson = '{"kernels":[],"note":"  spaced  "}';
      const saved = await store.persistSuggestion({
        source: 'manual',
        recommendationText: 'Try a finer grid\n',
        contextJson,
      });

      const read = await store.getSuggestion(saved.id);
      expect(read).toMatchObject({
        source: 'manual',
        recommendationText: 'Try a finer grid\n',
        contextJson,
        status: 'pending',
      });
    });

    it('updates only the status of a suggestion', async () => {
      const saved = await store.persistSuggestion({ source: 'cursor', recommendationText: 'Merge kernels' });
      const updated = await store.updateSuggestionStatus(saved.id, 'accepted');

      expect(updated).toMatchObject({ status: 'accepted', recommendationText: 'Merge kernels' });
    });

    it('keeps metadata last-write-wins', async () => {
      await store.setMeta('owner', 'a');
      await store.setMeta('owner', 'b');

      expect(await store.getMeta('owner')).toBe('b');
      expect(await store.listMeta()).toMatchObject({ owner: 'b', schema_version: '2' });
    });
  });

  describe('maintenance', () => {
    it('keeps every row through checkpoint and vacuum', async () => {
      await store.insertChunk(chunk('kept'));
      await store.checkpoint();
      await store.vacuum();

      expect(await store.countRows()).toEqual({ chunks: 1, kernels: 0, runs: 0, suggestions: 0 });
      expect(await store.getChunk('kept')).toMatchObject({ id: 'kept' });
    });
  });
});
