/**
 * Continuum
 *
 * Main entry point for the compression ring. Wires the store, blob
 * store, collaborator registry, orchestrator and research feed for one
 * configuration.
 */

import * as path from 'node:path';

import { CollaboratorRegistry } from './collaborators/registry.js';
import type { CollaboratorSet, RegistryOptions } from './collaborators/registry.js';
import { ConfigLoader } from './config/loader.js';
import type { ContinuumConfig, RingConfigOverrides } from './config/types.js';
import type { DispatchTable } from './compression/dispatch.js';
import { RingOrchestrator } from './orchestrators/ring-orchestrator.js';
import type { KernelPassSummary, RingRunResult } from './orchestrators/ring-orchestrator.js';
import { ImprovementFeed } from './research/feed.js';
import { ResearchService } from './research/service.js';
import type { ImprovementContext, ImprovementFilters } from './research/types.js';
import { FileBlobStore, MemoryBlobStore } from './storage/blobs.js';
import type { IBlobStore } from './storage/blobs.js';
import { createStore } from './storage/factory.js';
import type { IContinuumStore } from './storage/interface.js';
import type { MediaItem, ResearchSuggestion, SuggestionInput } from './types/index.js';

/**
 * Continuum creation options
 */
export interface ContinuumOptions {
  /** Full configuration; loaded from `rootDir` when omitted */
  config?: ContinuumConfig;
  /** Project root for config loading (default: cwd) */
  rootDir?: string;
  collaborators?: CollaboratorSet;
  registryOptions?: RegistryOptions;
  /** Replace compressors per kind */
  compressors?: Partial<DispatchTable>;
  /** Use an existing store instead of opening config.dbPath */
  store?: IContinuumStore;
  blobs?: IBlobStore;
}

export class Continuum {
  readonly feed: ImprovementFeed;
  readonly research: ResearchService;
  readonly orchestrator: RingOrchestrator;

  private constructor(
    readonly config: ContinuumConfig,
    readonly store: IContinuumStore,
    readonly blobs: IBlobStore,
    readonly registry: CollaboratorRegistry,
    compressors?: Partial<DispatchTable>
  ) {
    this.orchestrator = new RingOrchestrator({
      store,
      blobs,
      registry,
      config: config.ring,
      ...(compressors ? { compressors } : {}),
    });
    this.feed = new ImprovementFeed(store, config.ring.research);
    this.research = new ResearchService(this.feed, {
      dataDir: config.dataDir,
      timeoutMs: config.ring.collaboratorTimeoutMs,
    });
  }

  /**
   * Create an initialized instance
   */
  static async create(options: ContinuumOptions = {}): Promise<Continuum> {
    const config =
      options.config ?? (await new ConfigLoader(options.rootDir ? { rootDir: options.rootDir } : {}).getConfig());

    let store = options.store;
    if (store) {
      await store.initialize();
    } else {
      store = await createStore({ dbPath: config.dbPath, verbose: config.verbose });
    }

    const blobs =
      options.blobs ??
      (config.dbPath === ':memory:' ? new MemoryBlobStore() : new FileBlobStore(path.join(config.dataDir, 'blobs')));

    const registry = await CollaboratorRegistry.create(options.collaborators, options.registryOptions);
    return new Continuum(config, store, blobs, registry, options.compressors);
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  // Convenience methods

  async runRing(media: MediaItem, kind: string, overrides?: RingConfigOverrides): Promise<RingRunResult> {
    return this.orchestrator.runRing(media, kind, overrides);
  }

  async runUniqueKernelPass(overrides?: RingConfigOverrides): Promise<KernelPassSummary> {
    return this.orchestrator.runUniqueKernelPass(overrides);
  }

  async buildImprovementContext(filters?: ImprovementFilters): Promise<ImprovementContext> {
    return this.feed.buildImprovementContext(filters);
  }

  async persistSuggestion(input: SuggestionInput): Promise<ResearchSuggestion> {
    return this.feed.persistSuggestion(input);
  }

  async requestImprovements(filters?: ImprovementFilters): Promise<ResearchSuggestion[]> {
    return this.research.requestImprovements(this.registry.improvement(), filters);
  }
}
