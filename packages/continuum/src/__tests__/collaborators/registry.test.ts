/**
 * Collaborator registry tests
 *
 * @module __tests__/collaborators/registry
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { CollaboratorRegistry } from '../../collaborators/registry.js';
import { withTimeout } from '../../collaborators/timeout.js';
import type { DescribeResult, DescribeService } from '../../collaborators/types.js';
import { CollaboratorUnavailableError } from '../../errors.js';
import { FakeDescriber, sleep } from '../helpers.js';

class ThrowingProbe implements DescribeService {
  readonly name = 'broken';

  async probe(): Promise<boolean> {
    throw new Error('connection refused');
  }

  async describe(): Promise<DescribeResult> {
    return { text: 'unreachable' };
  }
}

describe('CollaboratorRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('probes each collaborator once, at creation', async () => {
    const describer = new FakeDescriber('vision');
    const registry = await CollaboratorRegistry.create({ describers: { video: describer } });

    registry.describer('video');
    registry.describer('video');

    expect(describer.probes).toBe(1);
    expect(registry.describer('video')).toBe(describer);
  });

  it('drops collaborators that report unavailable or fail to probe', async () => {
    const registry = await CollaboratorRegistry.create(
      { describers: { video: new FakeDescriber('offline', 'ok', false), audio: new ThrowingProbe() } },
      { includeBuiltins: false }
    );

    expect(registry.describer('video')).toBeNull();
    expect(registry.describer('audio')).toBeNull();
    expect(registry.status()).toEqual([
      { role: 'describe', kind: 'video', name: 'offline', available: false, reason: 'probe reported unavailable' },
      {
        role: 'describe',
        kind: 'audio',
        name: 'broken',
        available: false,
        reason: 'Collaborator broken unavailable: connection refused',
      },
    ]);
  });

  it('fills data and library from the built-ins', async () => {
    const registry = await CollaboratorRegistry.create();

    expect(registry.describer('data')?.name).toBe('builtin-schema');
    expect(registry.generator('data')?.name).toBe('builtin-exemplar');
    expect(registry.describer('library')?.name).toBe('builtin-outline');
    expect(registry.generator('library')?.name).toBe('builtin-skeleton');
    expect(registry.describer('video')).toBeNull();
    expect(registry.improvement()).toBeNull();
  });

  it('lets a supplied collaborator replace a built-in', async () => {
    const custom = new FakeDescriber('custom-data');
    const registry = await CollaboratorRegistry.create({ describers: { data: custom } });

    expect(registry.describer('data')).toBe(custom);
  });
});

describe('withTimeout', () => {
  it('returns the call result', async () => {
    await expect(withTimeout('fast', 100, async () => 42)).resolves.toBe(42);
  });

  it('aborts the call and reports the collaborator unavailable', async () => {
    let aborted = false;
    const call = withTimeout('slow', 20, async signal => {
      signal.addEventListener('abort', () => {
        aborted = true;
      });
      await sleep(5_000, signal);
      return 'late';
    });

    await expect(call).rejects.toThrow(new CollaboratorUnavailableError('slow', 'timed out after 20ms'));
    expect(aborted).toBe(true);
  });

  it('wraps failures of the call', async () => {
    const failure = withTimeout('flaky', 100, async () => {
      throw new Error('bad gateway');
    });

    await expect(failure).rejects.toBeInstanceOf(CollaboratorUnavailableError);
    await expect(failure).rejects.toThrow('Collaborator flaky unavailable: bad gateway');
  });
});
