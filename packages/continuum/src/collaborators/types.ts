/**
 * Collaborator Interfaces
 *
 * External services a compressor calls to describe media, reconstruct a
 * proximal from a description, or split media into sub-artifacts. Every
 * call receives an AbortSignal tied to the configured timeout.
 */

import type { Description, MediaItem, MediaKind } from '../types/index.js';

export interface CallOptions {
  signal: AbortSignal;
}

/**
 * Anything the registry can probe
 */
export interface Collaborator {
  /** Name recorded in descriptions and traces */
  readonly name: string;
  /** Consulted once, when the registry is created */
  probe(): Promise<boolean>;
}

export interface DescribeResult {
  text: string;
  /** Structured form for a generator that understands it */
  structured?: unknown;
}

export interface DescribeService extends Collaborator {
  describe(media: MediaItem, kind: MediaKind, options: CallOptions): Promise<DescribeResult>;
}

export interface GenerateService extends Collaborator {
  /** Reconstruct bytes comparable to the original */
  generate(description: Description, media: MediaItem, options: CallOptions): Promise<Buffer>;
}

export interface SubArtifactExtractor extends Collaborator {
  /** Media of kind `target` contained in `media`; empty when there is none */
  extract(media: MediaItem, target: MediaKind, options: CallOptions): Promise<MediaItem[]>;
}

export interface ImprovementService extends Collaborator {
  /** Recommendations for the serialized context bundle */
  propose(contextJson: string, options: CallOptions): Promise<string[]>;
}

export type CollaboratorRole = 'describe' | 'generate' | 'extract' | 'improve';

export interface CollaboratorStatus {
  role: CollaboratorRole;
  /** Media kind served; null for the improvement service */
  kind: MediaKind | null;
  name: string;
  available: boolean;
  reason?: string;
}
