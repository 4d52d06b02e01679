/**
 * Configuration Defaults
 */

import type { ContinuumConfig, RingConfig, RingConfigOverrides } from './types.js';

export const DEFAULT_RING_CONFIG: RingConfig = {
  maxDelegationDepth: 3,
  collaboratorTimeoutMs: 30_000,
  uniqueThreshold: 0.5,
  regions: {
    videoGrid: 4,
    imageGrid: 1,
    audioSegments: 8,
    libraryLinesPerRegion: 40,
    dataItemsPerRegion: 16,
    dataBytesPerRegion: 4096,
  },
  delegates: {
    video: ['audio'],
  },
  kernelPass: {
    batchSize: 10,
    maxAttempts: 2,
    improvementThreshold: 0.25,
  },
  research: {
    kernelLimit: 20,
    recentRuns: 10,
  },
};

export const DEFAULT_DATA_DIR = '.continuum';

export const DEFAULT_CONFIG: ContinuumConfig = {
  dataDir: DEFAULT_DATA_DIR,
  dbPath: `${DEFAULT_DATA_DIR}/continuum.db`,
  verbose: false,
  ring: DEFAULT_RING_CONFIG,
};

/**
 * Apply per-call overrides on top of a ring configuration
 */
export function resolveRingConfig(base: RingConfig, overrides?: RingConfigOverrides): RingConfig {
  if (!overrides) return base;

  return {
    maxDelegationDepth: overrides.maxDelegationDepth ?? base.maxDelegationDepth,
    collaboratorTimeoutMs: overrides.collaboratorTimeoutMs ?? base.collaboratorTimeoutMs,
    uniqueThreshold: overrides.uniqueThreshold ?? base.uniqueThreshold,
    regions: { ...base.regions, ...overrides.regions },
    delegates: overrides.delegates ? { ...overrides.delegates } : base.delegates,
    kernelPass: { ...base.kernelPass, ...overrides.kernelPass },
    research: { ...base.research, ...overrides.research },
  };
}
