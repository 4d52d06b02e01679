/**
 * Improvement Feed
 *
 * Builds research context bundles from flagged kernels and recent
 * runs. Building a bundle never writes; persisting a suggestion is a
 * separate call.
 */

import type { ResearchConfig } from '../config/types.js';
import type { IContinuumStore } from '../storage/interface.js';
import type { ResearchSuggestion, SuggestionInput } from '../types/index.js';
import type { ImprovementContext, ImprovementFilters, KernelContextEntry } from './types.js';

export class ImprovementFeed {
  constructor(
    private readonly store: IContinuumStore,
    private readonly config: ResearchConfig
  ) {}

  async buildImprovementContext(filters: ImprovementFilters = {}): Promise<ImprovementContext> {
    const kernels = await this.store.listKernels({
      status: 'flagged_research',
      ...(filters.sourceCompressor ? { sourceCompressor: filters.sourceCompressor } : {}),
      ...(filters.since ? { since: filters.since } : {}),
      ...(filters.until ? { until: filters.until } : {}),
      limit: filters.kernelLimit ?? this.config.kernelLimit,
      order: 'newest',
    });

    const entries: KernelContextEntry[] = [];
    for (const kernel of kernels) {
      entries.push({ kernel, ancestry: await this.store.getChunkAncestry(kernel.chunkId) });
    }

    const recentRuns = await this.store.listRuns({ limit: filters.recentRuns ?? this.config.recentRuns });

    return {
      generatedAt: new Date().toISOString(),
      filters,
      kernels: entries,
      recentRuns,
    };
  }

  /**
   * Store a suggestion with its text and context snapshot exactly as given
   */
  async persistSuggestion(input: SuggestionInput): Promise<ResearchSuggestion> {
    return this.store.persistSuggestion(input);
  }
}
