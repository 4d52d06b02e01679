/**
 * ID Generator
 *
 * Generates unique IDs for continuum entities.
 * Uses a combination of timestamp and random bytes.
 */

import { randomBytes } from 'crypto';

function build(prefix: string, randomLength: number): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(randomLength).toString('hex');
  return `${prefix}_${timestamp}_${random}`;
}

/**
 * Generate a unique semantic chunk ID
 * Format: chk_<timestamp>_<random>
 */
export function generateChunkId(): string {
  return build('chk', 6);
}

/**
 * Generate a unique kernel ID
 */
export function generateKernelId(): string {
  return build('ker', 6);
}

/**
 * Generate a unique compression run ID
 */
export function generateRunId(): string {
  return build('run', 4);
}

/**
 * Generate a unique research suggestion ID
 */
export function generateSuggestionId(): string {
  return build('sug', 4);
}
