/**
 * Compressor dispatch table
 */

import { UnknownMediaKindError } from '../errors.js';
import { isMediaKind } from '../types/index.js';
import type { MediaKind } from '../types/index.js';
import { AudioCompressor } from './compressor/audio.js';
import type { Compressor } from './compressor/base.js';
import { DataCompressor } from './compressor/data.js';
import { ImageCompressor } from './compressor/image.js';
import { LibraryCompressor } from './compressor/library.js';
import { VideoCompressor } from './compressor/video.js';

export type DispatchTable = Record<MediaKind, Compressor>;

export function createDispatchTable(overrides: Partial<DispatchTable> = {}): DispatchTable {
  return {
    video: overrides.video ?? new VideoCompressor(),
    audio: overrides.audio ?? new AudioCompressor(),
    library: overrides.library ?? new LibraryCompressor(),
    image: overrides.image ?? new ImageCompressor(),
    data: overrides.data ?? new DataCompressor(),
  };
}

/**
 * Narrow a caller-supplied kind to the closed set
 */
export function parseMediaKind(kind: string): MediaKind {
  const normalized = kind.trim().toLowerCase();
  if (!isMediaKind(normalized)) {
    throw new UnknownMediaKindError(kind);
  }
  return normalized;
}
