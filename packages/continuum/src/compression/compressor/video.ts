/**
 * Video Compressor
 *
 * Residual regions are grid cells over the frame. Frame dimensions come
 * from the media item's `width` and `height` attributes; without them
 * the byte stream is cut into grid² segments.
 */

import type { MediaItem, MediaKind, Proximal, Residual } from '../../types/index.js';
import { Compressor } from './base.js';
import type { StageContext } from '../context.js';
import { byteResidual, gridPlan } from '../residual/bytes.js';

function numericAttribute(media: MediaItem, key: string): number | undefined {
  const value = media.attributes?.[key];
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

export class VideoCompressor extends Compressor {
  override readonly kind: MediaKind = 'video';

  protected gridSize(ctx: StageContext): number {
    return ctx.config.regions.videoGrid;
  }

  override diff(original: MediaItem, proximal: Proximal, ctx: StageContext): Residual {
    const plans = gridPlan(
      original.bytes.length,
      this.gridSize(ctx),
      numericAttribute(original, 'width'),
      numericAttribute(original, 'height')
    );
    return byteResidual(
      this.kind,
      original.bytes,
      proximal.status === 'available' ? proximal.bytes : null,
      plans
    );
  }
}
