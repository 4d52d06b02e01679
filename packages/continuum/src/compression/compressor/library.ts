/**
 * Library Compressor
 *
 * Source text compared line by line in fixed windows.
 */

import type { MediaItem, MediaKind, Proximal, Residual } from '../../types/index.js';
import type { StageContext } from '../context.js';
import { lineResidual } from '../residual/lines.js';
import { Compressor } from './base.js';

export class LibraryCompressor extends Compressor {
  override readonly kind: MediaKind = 'library';

  override diff(original: MediaItem, proximal: Proximal, ctx: StageContext): Residual {
    return lineResidual(
      this.kind,
      original.bytes,
      proximal.status === 'available' ? proximal.bytes : null,
      ctx.config.regions.libraryLinesPerRegion
    );
  }
}
