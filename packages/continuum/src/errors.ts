/**
 * Continuum Errors
 *
 * Every failure the ring can surface. Collaborator and delegation errors
 * are recovered inside a compressor; integrity, transition and media
 * kind errors reach the caller.
 */

import type { KernelStatus } from './types/kernel.js';
import type { MediaKind } from './types/media.js';

/**
 * A describe/generate/extract collaborator is missing, failed or timed out
 */
export class CollaboratorUnavailableError extends Error {
  public readonly collaborator: string;
  public readonly errorCause: Error | undefined;

  constructor(collaborator: string, message: string, errorCause?: Error) {
    super(`Collaborator ${collaborator} unavailable: ${message}`);
    this.name = 'CollaboratorUnavailableError';
    this.collaborator = collaborator;
    this.errorCause = errorCause;
  }
}

/**
 * A write would break referential integrity or the media kind set
 */
export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly entity: 'chunk' | 'kernel' | 'run' | 'suggestion',
    public readonly entityId?: string
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/**
 * A kernel update violates the state machine or attempt count monotonicity
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly kernelId: string,
    public readonly fromStatus: KernelStatus,
    public readonly toStatus: string,
    reason: string
  ) {
    super(`Invalid transition for kernel ${kernelId}: ${fromStatus} → ${toStatus} (${reason})`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A delegated compress() call would run deeper than the configured budget
 */
export class DelegationDepthExceededError extends Error {
  constructor(
    public readonly path: readonly MediaKind[],
    public readonly maxDepth: number
  ) {
    super(`Delegation depth ${path.length - 1} exceeds maximum ${maxDepth}: ${path.join(' → ')}`);
    this.name = 'DelegationDepthExceededError';
  }
}

/**
 * The requested media kind is outside the closed set
 */
export class UnknownMediaKindError extends Error {
  constructor(public readonly kind: string) {
    super(`Unknown media kind: ${kind}. Use one of video, audio, library, image, data`);
    this.name = 'UnknownMediaKindError';
  }
}
