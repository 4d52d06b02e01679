/**
 * Continuum end-to-end tests
 *
 * @module __tests__/integration/continuum
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { DEFAULT_RING_CONFIG } from '../../config/defaults.js';
import type { ContinuumConfig } from '../../config/types.js';
import { Continuum } from '../../continuum.js';
import { CollaboratorUnavailableError, UnknownMediaKindError } from '../../errors.js';
import { FakeImprovementService, mediaItem } from '../helpers.js';

describe('Continuum', () => {
  let dataDir: string;
  let continuum: Continuum | undefined;

  const configFor = (dir: string): ContinuumConfig => ({
    dataDir: dir,
    dbPath: ':memory:',
    verbose: false,
    ring: DEFAULT_RING_CONFIG,
  });

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'continuum-e2e-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await continuum?.close();
    continuum = undefined;
    vi.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('compresses a JSON document with the built-in collaborators', async () => {
    continuum = await Continuum.create({ config: configFor(dataDir) });

    const result = await continuum.runRing(mediaItem('doc.json', '{"a":1,"b":"two"}'), ' DATA ');

    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]?.mediaKind).toBe('data');
    expect(result.chunks[0]?.descriptionText).toBe('json {a: number, b: string}');
    expect(result.kernels).toEqual([]);
    expect(result.trace.residual.metric).toBe(0);

    const stored = await continuum.store.getChunk(result.rootChunkId);
    expect(stored?.runId).toBe(result.runId);
    const runs = await continuum.store.listRuns();
    expect(runs.map(run => run.strategy)).toEqual(['ring:data']);
  });

  it('runs the same media concurrently against a file-backed store', async () => {
    continuum = await Continuum.create({
      config: { ...configFor(dataDir), dbPath: path.join(dataDir, 'continuum.db') },
    });
    const media = mediaItem('blob.bin', Buffer.alloc(32));

    const results = await Promise.all([continuum.runRing(media, 'data'), continuum.runRing(media, 'data')]);

    expect(results[0].outputHash).toBe(results[1].outputHash);
    expect(await continuum.store.countRows()).toEqual({ chunks: 4, kernels: 2, runs: 2, suggestions: 0 });
  });

  it('rejects unknown media kinds before writing anything', async () => {
    continuum = await Continuum.create({ config: configFor(dataDir) });

    await expect(continuum.runRing(mediaItem('x', 'x'), 'smell')).rejects.toBeInstanceOf(UnknownMediaKindError);
    expect(await continuum.store.listRuns()).toEqual([]);
  });

  it('records a stub description when no video collaborator is registered', async () => {
    continuum = await Continuum.create({ config: configFor(dataDir) });

    const result = await continuum.runRing(mediaItem('clip.mp4', Buffer.alloc(8)), 'video');

    expect(result.chunks[0]?.descriptionStub).toBe(true);
    expect(result.chunks[0]?.descriptionText).toBe('[video stub] clip.mp4 (8 bytes)');
    expect(result.trace.droppedDelegations.map(d => d.reason)).toEqual(['no video extractor available']);
  });

  it('requires an improvement service for the improvement loop', async () => {
    continuum = await Continuum.create({ config: configFor(dataDir) });

    await expect(continuum.requestImprovements()).rejects.toBeInstanceOf(CollaboratorUnavailableError);
  });

  it('stores recommendations from the improvement service', async () => {
    const service = new FakeImprovementService('advisor', ['split the audio track', '  ']);
    continuum = await Continuum.create({ config: configFor(dataDir), collaborators: { improvement: service } });

    const suggestions = await continuum.requestImprovements();

    expect(suggestions.map(s => s.recommendationText)).toEqual(['split the audio track']);
    expect(suggestions[0]?.source).toBe('cursor');
    expect(suggestions[0]?.contextJson).toBe(service.received[0]);
  });

  it('exports the context bundle under the data directory', async () => {
    continuum = await Continuum.create({ config: configFor(dataDir) });

    const exported = await continuum.research.exportContext();

    expect(exported.path).toBe(path.join(dataDir, 'research-context.json'));
    const written: unknown = JSON.parse(await fs.readFile(exported.path, 'utf8'));
    expect(written).toMatchObject({ kernels: [], recentRuns: [] });
  });

  it('loads configuration from the project root when none is given', async () => {
    await fs.mkdir(path.join(dataDir, '.continuum'), { recursive: true });
    await fs.writeFile(
      path.join(dataDir, '.continuum', 'config.json'),
      JSON.stringify({ dbPath: ':memory:', ring: { uniqueThreshold: 0.9 } })
    );

    continuum = await Continuum.create({ rootDir: dataDir });

    expect(continuum.config.dbPath).toBe(':memory:');
    expect(continuum.config.ring.uniqueThreshold).toBe(0.9);
    expect(continuum.config.dataDir).toBe(path.join(dataDir, '.continuum'));
  });
});
