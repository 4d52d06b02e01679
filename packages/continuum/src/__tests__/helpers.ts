/**
 * Shared fixtures for the continuum test suites
 */

import { CollaboratorRegistry } from '../collaborators/registry.js';
import type { CollaboratorSet } from '../collaborators/registry.js';
import type {
  CallOptions,
  DescribeResult,
  DescribeService,
  GenerateService,
  ImprovementService,
  SubArtifactExtractor,
} from '../collaborators/types.js';
import { DEFAULT_RING_CONFIG, resolveRingConfig } from '../config/defaults.js';
import type { RingConfig, RingConfigOverrides } from '../config/types.js';
import type { DispatchTable } from '../compression/dispatch.js';
import { RingOrchestrator } from '../orchestrators/ring-orchestrator.js';
import { MemoryBlobStore } from '../storage/blobs.js';
import { SQLiteContinuumStore } from '../storage/sqlite/storage.js';
import type { MediaItem, MediaKind } from '../types/index.js';

export function mediaItem(
  name: string,
  content: string | Buffer,
  attributes?: Record<string, string | number | boolean>
): MediaItem {
  return {
    mediaId: `media:${name}`,
    name,
    bytes: typeof content === 'string' ? Buffer.from(content, 'utf8') : content,
    ...(attributes ? { attributes } : {}),
  };
}

/**
 * Resolves after `ms`, or rejects when the signal aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener('abort', () => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    });
  });
}

export class FakeDescriber implements DescribeService {
  calls = 0;
  probes = 0;

  constructor(
    readonly name: string,
    private readonly behaviour: 'ok' | 'fail' | 'hang' = 'ok',
    private readonly available = true
  ) {}

  async probe(): Promise<boolean> {
    this.probes++;
    return this.available;
  }

  async describe(media: MediaItem, kind: MediaKind, options: CallOptions): Promise<DescribeResult> {
    this.calls++;
    if (this.behaviour === 'fail') throw new Error('model offline');
    if (this.behaviour === 'hang') await sleep(60_000, options.signal);
    return { text: `${kind}: ${media.name}`, structured: { original: media.bytes.toString('base64') } };
  }
}

/**
 * Returns the original bytes with `flip` bytes inverted from `offset`
 */
export class EchoGenerator implements GenerateService {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly flip = 0,
    private readonly offset = 0
  ) {}

  async probe(): Promise<boolean> {
    return true;
  }

  async generate(_description: unknown, media: MediaItem): Promise<Buffer> {
    this.calls++;
    const copy = Buffer.from(media.bytes);
    for (let i = this.offset; i < Math.min(copy.length, this.offset + this.flip); i++) {
      copy[i] = 255 - (copy[i] ?? 0);
    }
    return copy;
  }
}

export class FakeExtractor implements SubArtifactExtractor {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly produce: (media: MediaItem, target: MediaKind) => MediaItem[]
  ) {}

  async probe(): Promise<boolean> {
    return true;
  }

  async extract(media: MediaItem, target: MediaKind): Promise<MediaItem[]> {
    this.calls++;
    return this.produce(media, target);
  }
}

export class FakeImprovementService implements ImprovementService {
  readonly received: string[] = [];

  constructor(
    readonly name: string,
    private readonly recommendations: string[]
  ) {}

  async probe(): Promise<boolean> {
    return true;
  }

  async propose(contextJson: string): Promise<string[]> {
    this.received.push(contextJson);
    return this.recommendations;
  }
}

export interface HarnessOptions {
  collaborators?: CollaboratorSet;
  includeBuiltins?: boolean;
  config?: RingConfigOverrides;
  compressors?: Partial<DispatchTable>;
}

export interface Harness {
  store: SQLiteContinuumStore;
  blobs: MemoryBlobStore;
  registry: CollaboratorRegistry;
  config: RingConfig;
  orchestrator: RingOrchestrator;
}

/**
 * In-memory store, blobs and registry wired into an orchestrator
 */
export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const store = new SQLiteContinuumStore(':memory:');
  await store.initialize();
  const blobs = new MemoryBlobStore();
  const registry = await CollaboratorRegistry.create(options.collaborators ?? {}, {
    includeBuiltins: options.includeBuiltins ?? true,
  });
  const config = resolveRingConfig(DEFAULT_RING_CONFIG, options.config);
  const orchestrator = new RingOrchestrator({
    store,
    blobs,
    registry,
    config,
    ...(options.compressors ? { compressors: options.compressors } : {}),
  });
  return { store, blobs, registry, config, orchestrator };
}
