/**
 * Line residuals for source text
 *
 * Lines are compared by position; a window's metric is the fraction of
 * its original lines the proximal does not reproduce exactly.
 */

import type { MediaKind, Residual, ResidualRegion } from '../../types/index.js';
import { saturatedResidual } from './bytes.js';

export function lineResidual(
  kind: MediaKind,
  original: Buffer,
  proximal: Buffer | null,
  linesPerRegion: number
): Residual {
  if (!proximal) return saturatedResidual(kind, original);

  const source = original.toString('utf8').split('\n');
  const rebuilt = proximal.toString('utf8').split('\n');
  const step = Math.max(1, linesPerRegion);
  const regions: ResidualRegion[] = [];

  for (let start = 0; start < source.length; start += step) {
    const window = source.slice(start, start + step);
    const mismatched = window.filter((line, offset) => rebuilt[start + offset] !== line).length;
    regions.push({
      index: regions.length,
      label: `L${start + 1}-${start + window.length}`,
      metric: mismatched / window.length,
      content: Buffer.from(window.join('\n'), 'utf8'),
    });
  }

  const span = Math.max(source.length, rebuilt.length);
  let mismatched = 0;
  for (let i = 0; i < span; i++) {
    if (source[i] !== rebuilt[i]) mismatched++;
  }

  return { kind, metric: span === 0 ? 0 : mismatched / span, saturated: false, regions };
}
