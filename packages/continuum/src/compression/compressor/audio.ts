/**
 * Audio Compressor
 *
 * Residual regions are equal time segments of the sample stream.
 */

import type { MediaItem, MediaKind, Proximal, Residual } from '../../types/index.js';
import type { StageContext } from '../context.js';
import { byteResidual, segmentPlan } from '../residual/bytes.js';
import { Compressor } from './base.js';

export class AudioCompressor extends Compressor {
  override readonly kind: MediaKind = 'audio';

  override diff(original: MediaItem, proximal: Proximal, ctx: StageContext): Residual {
    return byteResidual(
      this.kind,
      original.bytes,
      proximal.status === 'available' ? proximal.bytes : null,
      segmentPlan(original.bytes.length, ctx.config.regions.audioSegments, 'seg')
    );
  }
}
