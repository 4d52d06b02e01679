/**
 * Collaborator Registry
 *
 * Holds the describe, generate and extract collaborators per media kind
 * plus the improvement service. Availability is probed once, when the
 * registry is created; a collaborator that fails its probe is never
 * called.
 */

import { MEDIA_KINDS } from '../types/index.js';
import type { MediaKind } from '../types/index.js';
import { withTimeout } from './timeout.js';
import type {
  Collaborator,
  CollaboratorRole,
  CollaboratorStatus,
  DescribeService,
  GenerateService,
  ImprovementService,
  SubArtifactExtractor,
} from './types.js';
import { createBuiltinCollaborators } from './builtin/index.js';

export interface CollaboratorSet {
  describers?: Partial<Record<MediaKind, DescribeService>>;
  generators?: Partial<Record<MediaKind, GenerateService>>;
  extractors?: Partial<Record<MediaKind, SubArtifactExtractor>>;
  improvement?: ImprovementService;
}

export interface RegistryOptions {
  /** Timeout applied to each probe (default: 5000) */
  probeTimeoutMs?: number;
  /** Fill gaps with the in-process data and library collaborators (default: true) */
  includeBuiltins?: boolean;
}

interface ProbeOutcome {
  available: boolean;
  reason?: string;
}

async function probeOne(collaborator: Collaborator, timeoutMs: number): Promise<ProbeOutcome> {
  try {
    const available = await withTimeout(collaborator.name, timeoutMs, () => collaborator.probe());
    return available ? { available } : { available, reason: 'probe reported unavailable' };
  } catch (err) {
    return { available: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Registry of probed collaborators
 */
export class CollaboratorRegistry {
  private constructor(
    private readonly available: CollaboratorSet,
    private readonly statuses: CollaboratorStatus[]
  ) {}

  /**
   * Probe every collaborator and keep the ones that answered
   */
  static async create(set: CollaboratorSet = {}, options: RegistryOptions = {}): Promise<CollaboratorRegistry> {
    const probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    const merged = options.includeBuiltins === false ? set : withBuiltins(set);

    const statuses: CollaboratorStatus[] = [];
    const available: CollaboratorSet = { describers: {}, generators: {}, extractors: {} };

    const check = async <T extends Collaborator>(
      role: CollaboratorRole,
      kind: MediaKind | null,
      collaborator: T
    ): Promise<T | undefined> => {
      const outcome = await probeOne(collaborator, probeTimeoutMs);
      statuses.push({ role, kind, name: collaborator.name, ...outcome });
      if (!outcome.available) {
        console.warn(`[continuum] ${role} collaborator ${collaborator.name} unavailable: ${outcome.reason ?? 'unknown'}`);
        return undefined;
      }
      return collaborator;
    };

    for (const [kind, describer] of entriesOf(merged.describers)) {
      const ok = await check('describe', kind, describer);
      if (ok && available.describers) available.describers[kind] = ok;
    }
    for (const [kind, generator] of entriesOf(merged.generators)) {
      const ok = await check('generate', kind, generator);
      if (ok && available.generators) available.generators[kind] = ok;
    }
    for (const [kind, extractor] of entriesOf(merged.extractors)) {
      const ok = await check('extract', kind, extractor);
      if (ok && available.extractors) available.extractors[kind] = ok;
    }
    if (merged.improvement) {
      available.improvement = await check('improve', null, merged.improvement);
    }

    return new CollaboratorRegistry(available, statuses);
  }

  describer(kind: MediaKind): DescribeService | null {
    return this.available.describers?.[kind] ?? null;
  }

  generator(kind: MediaKind): GenerateService | null {
    return this.available.generators?.[kind] ?? null;
  }

  extractor(kind: MediaKind): SubArtifactExtractor | null {
    return this.available.extractors?.[kind] ?? null;
  }

  improvement(): ImprovementService | null {
    return this.available.improvement ?? null;
  }

  /**
   * Probe results, in probe order
   */
  status(): CollaboratorStatus[] {
    return [...this.statuses];
  }
}

function withBuiltins(set: CollaboratorSet): CollaboratorSet {
  const builtins = createBuiltinCollaborators();
  return {
    describers: { ...builtins.describers, ...set.describers },
    generators: { ...builtins.generators, ...set.generators },
    extractors: { ...set.extractors },
    ...(set.improvement ? { improvement: set.improvement } : {}),
  };
}

function entriesOf<T>(record: Partial<Record<MediaKind, T>> | undefined): Array<[MediaKind, T]> {
  const entries: Array<[MediaKind, T]> = [];
  if (!record) return entries;
  for (const kind of MEDIA_KINDS) {
    const value = record[kind];
    if (value !== undefined) entries.push([kind, value]);
  }
  return entries;
}
