/**
 * Image Compressor
 *
 * A still is a one-frame video: same pipeline, its own grid, and the
 * video collaborators stand in when no image-specific ones are
 * registered.
 */

import type { DescribeService, GenerateService } from '../../collaborators/types.js';
import type { MediaKind } from '../../types/index.js';
import type { StageContext } from '../context.js';
import { VideoCompressor } from './video.js';

export class ImageCompressor extends VideoCompressor {
  override readonly kind: MediaKind = 'image';

  protected override gridSize(ctx: StageContext): number {
    return ctx.config.regions.imageGrid;
  }

  protected override describerFor(ctx: StageContext): DescribeService | null {
    return ctx.registry.describer('image') ?? ctx.registry.describer('video');
  }

  protected override generatorFor(ctx: StageContext): GenerateService | null {
    return ctx.registry.generator('image') ?? ctx.registry.generator('video');
  }
}
