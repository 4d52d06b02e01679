/**
 * Config Validator
 *
 * Turns an untyped configuration object (defaults merged with the JSON
 * file and environment overrides) into a typed ContinuumConfig, with an
 * error per offending field.
 */

import { MEDIA_KINDS, isMediaKind, type MediaKind } from '../types/media.js';
import type { ContinuumConfig, RingConfig } from './types.js';

// ============================================================================
// Validation Error Types
// ============================================================================

export interface ConfigValidationError {
  /** Path to the invalid field (e.g. 'ring.kernelPass.maxAttempts') */
  path: string;
  message: string;
  expected?: string;
  actual?: unknown;
  suggestion?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  /** Only present if valid */
  data?: ContinuumConfig;
  /** Only present if invalid */
  errors?: ConfigValidationError[];
}

/**
 * Thrown by the loader when validation fails
 */
export class ConfigValidationException extends Error {
  constructor(
    message: string,
    public readonly errors: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigValidationException';
  }

  formatErrors(): string {
    if (this.errors.length === 0) return 'No errors';

    return this.errors
      .map((e) => {
        let msg = `  - ${e.path}: ${e.message}`;
        if (e.expected) msg += `\n    Expected: ${e.expected}`;
        if (e.actual !== undefined) msg += `\n    Got: ${JSON.stringify(e.actual)}`;
        if (e.suggestion) msg += `\n    Suggestion: ${e.suggestion}`;
        return msg;
      })
      .join('\n\n');
  }
}

// ============================================================================
// Field Readers
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

class FieldReader {
  readonly errors: ConfigValidationError[] = [];

  section(parent: Record<string, unknown>, key: string, path: string): Record<string, unknown> {
    const value = parent[key];
    if (isPlainObject(value)) return value;
    this.errors.push({ path, message: 'Must be an object', expected: 'object', actual: value });
    return {};
  }

  string(parent: Record<string, unknown>, key: string, path: string, fallback: string): string {
    const value = parent[key];
    if (typeof value === 'string' && value.length > 0) return value;
    this.errors.push({ path, message: 'Must be a non-empty string', expected: 'string', actual: value });
    return fallback;
  }

  boolean(parent: Record<string, unknown>, key: string, path: string, fallback: boolean): boolean {
    const value = parent[key];
    if (typeof value === 'boolean') return value;
    this.errors.push({ path, message: 'Must be a boolean', expected: 'true or false', actual: value });
    return fallback;
  }

  number(parent: Record<string, unknown>, key: string, path: string, rule: NumberRule, fallback: number): number {
    const value = parent[key];
    if (typeof value !== 'number' || Number.isNaN(value)) {
      this.errors.push({ path, message: 'Must be a number', expected: 'number', actual: value });
      return fallback;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.errors.push({ path, message: 'Must be an integer', expected: 'integer', actual: value });
      return fallback;
    }
    if (rule.min !== undefined && value < rule.min) {
      this.errors.push({
        path,
        message: `Must be at least ${rule.min}`,
        expected: `>= ${rule.min}`,
        actual: value,
      });
      return fallback;
    }
    if (rule.max !== undefined && value > rule.max) {
      this.errors.push({
        path,
        message: `Must be at most ${rule.max}`,
        expected: `<= ${rule.max}`,
        actual: value,
      });
      return fallback;
    }
    return value;
  }

  delegates(parent: Record<string, unknown>, key: string, path: string): Partial<Record<MediaKind, MediaKind[]>> {
    const value = parent[key];
    const graph: Partial<Record<MediaKind, MediaKind[]>> = {};
    if (!isPlainObject(value)) {
      this.errors.push({ path, message: 'Must be an object of media kind lists', expected: 'object', actual: value });
      return graph;
    }

    for (const [from, targets] of Object.entries(value)) {
      if (!isMediaKind(from)) {
        this.errors.push({
          path: `${path}.${from}`,
          message: `Unknown media kind '${from}'`,
          expected: MEDIA_KINDS.join(', '),
          suggestion: 'Remove the entry or use one of the supported media kinds',
        });
        continue;
      }
      if (!Array.isArray(targets)) {
        this.errors.push({ path: `${path}.${from}`, message: 'Must be an array', expected: 'MediaKind[]', actual: targets });
        continue;
      }
      const kinds: MediaKind[] = [];
      for (const target of targets) {
        if (isMediaKind(target)) {
          kinds.push(target);
        } else {
          this.errors.push({
            path: `${path}.${from}`,
            message: `Unknown media kind '${String(target)}'`,
            expected: MEDIA_KINDS.join(', '),
          });
        }
      }
      graph[from] = kinds;
    }
    return graph;
  }
}

// ============================================================================
// Validation
// ============================================================================

function readRing(reader: FieldReader, raw: Record<string, unknown>, fallback: RingConfig): RingConfig {
  const regions = reader.section(raw, 'regions', 'ring.regions');
  const kernelPass = reader.section(raw, 'kernelPass', 'ring.kernelPass');
  const research = reader.section(raw, 'research', 'ring.research');
  const count = { min: 1, integer: true };
  const unit = { min: 0, max: 1 };

  return {
    maxDelegationDepth: reader.number(raw, 'maxDelegationDepth', 'ring.maxDelegationDepth', { min: 0, integer: true }, fallback.maxDelegationDepth),
    collaboratorTimeoutMs: reader.number(raw, 'collaboratorTimeoutMs', 'ring.collaboratorTimeoutMs', count, fallback.collaboratorTimeoutMs),
    uniqueThreshold: reader.number(raw, 'uniqueThreshold', 'ring.uniqueThreshold', unit, fallback.uniqueThreshold),
    regions: {
      videoGrid: reader.number(regions, 'videoGrid', 'ring.regions.videoGrid', count, fallback.regions.videoGrid),
      imageGrid: reader.number(regions, 'imageGrid', 'ring.regions.imageGrid', count, fallback.regions.imageGrid),
      audioSegments: reader.number(regions, 'audioSegments', 'ring.regions.audioSegments', count, fallback.regions.audioSegments),
      libraryLinesPerRegion: reader.number(regions, 'libraryLinesPerRegion', 'ring.regions.libraryLinesPerRegion', count, fallback.regions.libraryLinesPerRegion),
      dataItemsPerRegion: reader.number(regions, 'dataItemsPerRegion', 'ring.regions.dataItemsPerRegion', count, fallback.regions.dataItemsPerRegion),
      dataBytesPerRegion: reader.number(regions, 'dataBytesPerRegion', 'ring.regions.dataBytesPerRegion', count, fallback.regions.dataBytesPerRegion),
    },
    delegates: reader.delegates(raw, 'delegates', 'ring.delegates'),
    kernelPass: {
      batchSize: reader.number(kernelPass, 'batchSize', 'ring.kernelPass.batchSize', count, fallback.kernelPass.batchSize),
      maxAttempts: reader.number(kernelPass, 'maxAttempts', 'ring.kernelPass.maxAttempts', count, fallback.kernelPass.maxAttempts),
      improvementThreshold: reader.number(kernelPass, 'improvementThreshold', 'ring.kernelPass.improvementThreshold', unit, fallback.kernelPass.improvementThreshold),
    },
    research: {
      kernelLimit: reader.number(research, 'kernelLimit', 'ring.research.kernelLimit', count, fallback.research.kernelLimit),
      recentRuns: reader.number(research, 'recentRuns', 'ring.research.recentRuns', { min: 0, integer: true }, fallback.research.recentRuns),
    },
  };
}

/**
 * Validate a fully merged configuration object
 */
export function validateConfig(raw: unknown, fallback: ContinuumConfig): ConfigValidationResult {
  if (!isPlainObject(raw)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Configuration must be a JSON object', expected: 'object', actual: raw }],
    };
  }

  const reader = new FieldReader();
  const ring = reader.section(raw, 'ring', 'ring');
  const data: ContinuumConfig = {
    dataDir: reader.string(raw, 'dataDir', 'dataDir', fallback.dataDir),
    dbPath: reader.string(raw, 'dbPath', 'dbPath', fallback.dbPath),
    verbose: reader.boolean(raw, 'verbose', 'verbose', fallback.verbose),
    ring: readRing(reader, ring, fallback.ring),
  };

  if (reader.errors.length > 0) {
    return { valid: false, errors: reader.errors };
  }
  return { valid: true, data };
}
