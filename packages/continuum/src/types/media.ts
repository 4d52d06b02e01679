/**
 * Media Kinds
 *
 * The closed set of media the ring can compress, and the raw media
 * item handed to a compressor.
 */

/**
 * All supported media kinds
 */
export const MEDIA_KINDS = ['video', 'audio', 'library', 'image', 'data'] as const;

/**
 * Discriminator for compressor dispatch
 */
export type MediaKind = (typeof MEDIA_KINDS)[number];

/**
 * Raw media handed to the ring
 */
export interface MediaItem {
  /** External media identifier (path, URL, ingestion key) */
  mediaId: string;
  /** Human-readable name, used as the root chunk key */
  name: string;
  /** Raw content */
  bytes: Buffer;
  /** Free-form hints from ingestion (mime type, duration, ...) */
  attributes?: Record<string, string | number | boolean>;
}

/**
 * Type guard for the closed media kind set
 */
export function isMediaKind(value: unknown): value is MediaKind {
  return MEDIA_KINDS.some(kind => kind === value);
}
