/**
 * Byte residuals
 *
 * Distance between two byte buffers is the mean absolute difference
 * per byte scaled to [0, 1]. Positions the proximal does not cover count
 * as fully different.
 */

import type { MediaKind, Residual, ResidualRegion } from '../../types/index.js';

export interface Span {
  start: number;
  end: number;
}

/**
 * Named set of byte spans that forms one region
 */
export interface RegionPlan {
  label: string;
  spans: Span[];
}

/**
 * Residual used whenever no proximal exists: one region covering
 * everything, at the maximum distance
 */
export function saturatedResidual(kind: MediaKind, original: Buffer): Residual {
  return {
    kind,
    metric: 1,
    saturated: true,
    regions: [{ index: 0, label: 'all', metric: 1, content: original }],
  };
}

/**
 * Split `length` bytes into `count` contiguous segments
 */
export function segmentPlan(length: number, count: number, prefix = 'seg'): RegionPlan[] {
  const segments = Math.max(1, Math.min(count, length));
  const plans: RegionPlan[] = [];
  if (length === 0) return plans;
  for (let i = 0; i < segments; i++) {
    const start = Math.floor((i * length) / segments);
    const end = Math.floor(((i + 1) * length) / segments);
    plans.push({ label: `${prefix}-${i}`, spans: [{ start, end }] });
  }
  return plans;
}

/**
 * Split `length` bytes into fixed-size windows
 */
export function windowPlan(length: number, size: number, prefix = 'b'): RegionPlan[] {
  const plans: RegionPlan[] = [];
  const step = Math.max(1, size);
  for (let start = 0; start < length; start += step) {
    const end = Math.min(length, start + step);
    plans.push({ label: `${prefix}${start}-${end}`, spans: [{ start, end }] });
  }
  return plans;
}

/**
 * Grid cells over frames of `width × height` bytes, a cell spanning the
 * same rectangle in every frame. Without usable dimensions the buffer is
 * cut into grid² contiguous cells.
 */
export function gridPlan(length: number, grid: number, width?: number, height?: number): RegionPlan[] {
  const cells = Math.max(1, grid);
  if (!width || !height || width * height > length || length === 0) {
    return segmentPlan(length, cells * cells).map((plan, i) => ({
      ...plan,
      label: `cell-${Math.floor(i / cells)}-${i % cells}`,
    }));
  }

  const frameSize = width * height;
  const frames = Math.ceil(length / frameSize);
  const plans: RegionPlan[] = [];

  for (let row = 0; row < cells; row++) {
    const y0 = Math.floor((row * height) / cells);
    const y1 = Math.floor(((row + 1) * height) / cells);
    for (let col = 0; col < cells; col++) {
      const x0 = Math.floor((col * width) / cells);
      const x1 = Math.floor(((col + 1) * width) / cells);
      const spans: Span[] = [];
      for (let frame = 0; frame < frames; frame++) {
        for (let y = y0; y < y1; y++) {
          const base = frame * frameSize + y * width;
          const start = base + x0;
          const end = Math.min(length, base + x1);
          if (start < end) spans.push({ start, end });
        }
      }
      if (spans.length > 0) plans.push({ label: `cell-${row}-${col}`, spans });
    }
  }

  return plans;
}

function byteDistance(a: number, b: number | undefined): number {
  return b === undefined ? 1 : Math.abs(a - b) / 255;
}

/**
 * Residual of `original` against `proximal` over the planned regions
 */
export function byteResidual(
  kind: MediaKind,
  original: Buffer,
  proximal: Buffer | null,
  plans: RegionPlan[]
): Residual {
  if (!proximal) return saturatedResidual(kind, original);
  const rebuilt: Buffer = proximal;

  const regions: ResidualRegion[] = plans.map((plan, index) => {
    let total = 0;
    let count = 0;
    for (const { start, end } of plan.spans) {
      for (let i = start; i < end; i++) {
        total += byteDistance(original[i] ?? 0, i < rebuilt.length ? rebuilt[i] : undefined);
        count++;
      }
    }
    const content = Buffer.concat(plan.spans.map(({ start, end }) => original.subarray(start, end)));
    return { index, label: plan.label, metric: count === 0 ? 0 : total / count, content };
  });

  const span = Math.max(original.length, rebuilt.length);
  let total = 0;
  for (let i = 0; i < span; i++) {
    total += i < original.length ? byteDistance(original[i] ?? 0, i < rebuilt.length ? rebuilt[i] : undefined) : 1;
  }

  return { kind, metric: span === 0 ? 0 : total / span, saturated: false, regions };
}
