/**
 * Research Service
 *
 * Exports context bundles to disk and runs the improvement loop against
 * an external service.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { withTimeout } from '../collaborators/timeout.js';
import type { ImprovementService } from '../collaborators/types.js';
import { CollaboratorUnavailableError } from '../errors.js';
import type { ResearchSuggestion } from '../types/index.js';
import type { ImprovementFeed } from './feed.js';
import type { ImprovementContext, ImprovementFilters } from './types.js';

export interface ResearchServiceOptions {
  /** Default location of exported bundles */
  dataDir: string;
  /** Timeout for the improvement service call */
  timeoutMs: number;
}

export interface ExportResult {
  path: string;
  context: ImprovementContext;
}

export class ResearchService {
  constructor(
    private readonly feed: ImprovementFeed,
    private readonly options: ResearchServiceOptions
  ) {}

  /**
   * Write the current context bundle as JSON
   */
  async exportContext(outputPath?: string, filters: ImprovementFilters = {}): Promise<ExportResult> {
    const target = outputPath ?? path.join(this.options.dataDir, 'research-context.json');
    const context = await this.feed.buildImprovementContext(filters);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, JSON.stringify(context, null, 2), 'utf8');
    return { path: target, context };
  }

  /**
   * Send the bundle to the service and store each recommendation with
   * the exact serialized bundle it answered
   */
  async requestImprovements(
    service: ImprovementService | null,
    filters: ImprovementFilters = {}
  ): Promise<ResearchSuggestion[]> {
    if (!service) {
      throw new CollaboratorUnavailableError('improvement', 'no improvement service available');
    }

    const context = await this.feed.buildImprovementContext(filters);
    const contextJson = JSON.stringify(context);
    const recommendations = await withTimeout(service.name, this.options.timeoutMs, signal =>
      service.propose(contextJson, { signal })
    );

    const suggestions: ResearchSuggestion[] = [];
    for (const text of recommendations) {
      if (text.trim().length === 0) continue;
      suggestions.push(await this.feed.persistSuggestion({ source: 'cursor', recommendationText: text, contextJson }));
    }
    return suggestions;
  }
}
