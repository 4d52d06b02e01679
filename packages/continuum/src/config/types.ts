/**
 * Configuration Types
 */

import type { MediaKind } from '../types/media.js';

/**
 * How each compressor partitions a residual into regions
 */
export interface RegionPolicy {
  /** Video frames are split into videoGrid × videoGrid cells */
  videoGrid: number;
  /** Stills run the video pipeline with this grid */
  imageGrid: number;
  /** Number of time segments per audio track */
  audioSegments: number;
  libraryLinesPerRegion: number;
  /** Array items per region for JSON arrays */
  dataItemsPerRegion: number;
  /** Byte window for non-JSON data */
  dataBytesPerRegion: number;
}

export interface KernelPassConfig {
  /** Pending kernels read per pass, oldest first */
  batchSize: number;
  /** Attempts after which an unimproved kernel is flagged for research */
  maxAttempts: number;
  /** A reduction must bring the residual below this to count as compressed */
  improvementThreshold: number;
}

export interface ResearchConfig {
  /** Flagged kernels included in a context bundle */
  kernelLimit: number;
  /** Most recent runs included in a context bundle */
  recentRuns: number;
}

/**
 * Per-run behaviour of the ring
 */
export interface RingConfig {
  maxDelegationDepth: number;
  /** Timeout applied to every describe/generate/extract call */
  collaboratorTimeoutMs: number;
  /** Regions at or above this residual become unique-kernel candidates */
  uniqueThreshold: number;
  regions: RegionPolicy;
  /** Sub-artifact delegation graph; cycles are allowed */
  delegates: Partial<Record<MediaKind, MediaKind[]>>;
  kernelPass: KernelPassConfig;
  research: ResearchConfig;
}

/**
 * Process-level configuration
 */
export interface ContinuumConfig {
  /** Directory holding the database and residual blobs */
  dataDir: string;
  /** SQLite path; ':memory:' for an isolated store */
  dbPath: string;
  /** Log every SQL statement */
  verbose: boolean;
  ring: RingConfig;
}

/**
 * Partial ring configuration accepted per call
 */
export interface RingConfigOverrides {
  maxDelegationDepth?: number;
  collaboratorTimeoutMs?: number;
  uniqueThreshold?: number;
  regions?: Partial<RegionPolicy>;
  delegates?: Partial<Record<MediaKind, MediaKind[]>>;
  kernelPass?: Partial<KernelPassConfig>;
  research?: Partial<ResearchConfig>;
}
