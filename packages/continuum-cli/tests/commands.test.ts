/**
 * Commands against a scratch continuum directory
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { Continuum, DEFAULT_RING_CONFIG } from '@continuum/core';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { createProgram, resetContinuumFactory, setContinuumFactory } from '../src/index.js';

describe('continuum commands', () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];

  async function run(...args: string[]): Promise<string> {
    await createProgram().parseAsync(['node', 'continuum', ...args]);
    return stdout.splice(0).join('');
  }

  async function runJson(...args: string[]): Promise<unknown> {
    return JSON.parse(await run(...args, '--format', 'json'));
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'continuum-cli-'));
    stdout = [];
    stderr = [];
    setContinuumFactory((options) =>
      Continuum.create({
        config: {
          dataDir: root,
          dbPath: options.db ?? path.join(root, 'continuum.db'),
          verbose: false,
          ring: DEFAULT_RING_CONFIG,
        },
      })
    );
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    resetContinuumFactory();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it('initializes the store once and keeps an existing config', async () => {
    expect(await runJson('init')).toEqual({
      dataDir: root,
      dbPath: path.join(root, 'continuum.db'),
      configPath: path.join(root, 'config.json'),
      configCreated: true,
      schemaVersion: '2',
    });
    expect(await runJson('init')).toMatchObject({ configCreated: false });
  });

  it('compresses a JSON file and records the run', async () => {
    const file = path.join(root, 'doc.json');
    await fs.writeFile(file, '{"a":1}');

    expect(await runJson('compress', file, '--type', 'data')).toMatchObject({
      mediaKind: 'data',
      description: 'json {a: number}',
      stub: false,
      residualMetric: 0,
      chunkCount: 1,
      kernelCount: 0,
      droppedDelegations: 0,
    });

    const runs = await runJson('query', 'runs');
    expect(runs).toMatchObject([{ mediaId: `file:${file}`, strategy: 'ring:data', chunkCount: 1 }]);
  });

  it('uses the media id given on the command line', async () => {
    const file = path.join(root, 'doc.json');
    await fs.writeFile(file, '[]');

    await run('compress', file, '--type', 'data', '--media-id', 'catalog-7');

    expect(await runJson('query', 'runs')).toMatchObject([{ mediaId: 'catalog-7' }]);
  });

  it('walks an unreconstructable kernel to research', async () => {
    const file = path.join(root, 'blob.bin');
    await fs.writeFile(file, Buffer.from([0xde, 0xad, 0xbe, 0xef]));

    expect(await runJson('compress', file, '-t', 'data')).toMatchObject({ chunkCount: 2, kernelCount: 1 });

    expect(await runJson('kernels', 'pass')).toEqual({
      examined: 1,
      compressed: 0,
      flagged: 0,
      pending: 1,
      conflicts: 0,
      invalid: 0,
    });
    expect(await runJson('kernels', 'pass')).toMatchObject({ examined: 1, flagged: 1, pending: 0 });
    expect(await runJson('kernels', 'pass')).toMatchObject({ examined: 0 });

    const flagged = await runJson('kernels', 'list', '--status', 'flagged_research');
    expect(flagged).toMatchObject([{ status: 'flagged_research', attemptCount: 2, sourceCompressor: 'data' }]);

    const bundle = path.join(root, 'bundle.json');
    expect(await runJson('research', 'context', '--output', bundle)).toEqual({
      path: bundle,
      kernels: 1,
      recentRuns: 1,
    });

    const suggestion = await runJson('research', 'suggest', 'try a wavelet basis', '--context-file', bundle);
    expect(suggestion).toMatchObject({
      source: 'manual',
      recommendationText: 'try a wavelet basis',
      status: 'pending',
      contextJson: await fs.readFile(bundle, 'utf-8'),
    });

    expect(await runJson('query', 'counts')).toEqual({ chunks: 2, kernels: 1, runs: 1, suggestions: 1 });
  });

  it('reports an unknown table without throwing', async () => {
    await run('query', 'nonsense');

    expect(process.exitCode).toBe(1);
    expect(stderr.join('')).toContain("Unknown table 'nonsense'");
  });

  it('reports an unknown media kind', async () => {
    const file = path.join(root, 'x.bin');
    await fs.writeFile(file, 'x');

    await run('compress', file, '--type', 'smell');

    expect(process.exitCode).toBe(1);
    expect(stderr.join('')).toContain('Unknown media kind: smell');
    expect(await runJson('query', 'counts')).toEqual({ chunks: 0, kernels: 0, runs: 0, suggestions: 0 });
  });
});
