/**
 * JSON residuals
 *
 * Documents are compared leaf by leaf: the metric is the share of leaf
 * paths, across both documents, whose values disagree. Regions are the
 * top-level keys of an object or windows of a top-level array. Bytes
 * that are not JSON fall back to byte windows.
 */

import type { MediaKind, Residual, ResidualRegion } from '../../types/index.js';
import { parseJson } from '../../collaborators/builtin/shape.js';
import type { JsonValue } from '../../collaborators/builtin/shape.js';
import { byteResidual, saturatedResidual, windowPlan } from './bytes.js';

export interface JsonRegionPolicy {
  itemsPerRegion: number;
  bytesPerRegion: number;
}

function collectLeaves(value: JsonValue | undefined, path: string, out: Map<string, string>): void {
  if (value === undefined) return;
  if (Array.isArray(value)) {
    if (value.length === 0) out.set(path, '[]');
    value.forEach((item, i) => collectLeaves(item, `${path}[${i}]`, out));
    return;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0) out.set(path, '{}');
    for (const [key, field] of entries) {
      collectLeaves(field, `${path}.${key}`, out);
    }
    return;
  }
  out.set(path, JSON.stringify(value));
}

/**
 * Share of leaf paths whose values differ, in [0, 1]
 */
export function jsonDistance(original: JsonValue | undefined, proximal: JsonValue | undefined): number {
  const left = new Map<string, string>();
  const right = new Map<string, string>();
  collectLeaves(original, '$', left);
  collectLeaves(proximal, '$', right);

  const paths = new Set([...left.keys(), ...right.keys()]);
  if (paths.size === 0) return 0;

  let mismatched = 0;
  for (const path of paths) {
    if (left.get(path) !== right.get(path)) mismatched++;
  }
  return mismatched / paths.size;
}

interface JsonSlice {
  label: string;
  original: JsonValue;
  proximal: JsonValue | undefined;
}

function sliceDocument(original: JsonValue, proximal: JsonValue | undefined, itemsPerRegion: number): JsonSlice[] {
  if (Array.isArray(original)) {
    const step = Math.max(1, itemsPerRegion);
    const slices: JsonSlice[] = [];
    for (let start = 0; start < original.length; start += step) {
      const end = Math.min(original.length, start + step);
      slices.push({
        label: `$[${start}:${end}]`,
        original: original.slice(start, end),
        proximal: Array.isArray(proximal) ? proximal.slice(start, end) : undefined,
      });
    }
    return slices;
  }
  if (original !== null && typeof original === 'object') {
    const counterpart = proximal !== null && typeof proximal === 'object' && !Array.isArray(proximal) ? proximal : undefined;
    return Object.entries(original).map(([key, value]) => ({
      label: `$.${key}`,
      original: value,
      proximal: counterpart?.[key],
    }));
  }
  return [{ label: '$', original, proximal }];
}

export function jsonResidual(
  kind: MediaKind,
  original: Buffer,
  proximal: Buffer | null,
  policy: JsonRegionPolicy
): Residual {
  if (!proximal) return saturatedResidual(kind, original);

  const document = parseJson(original);
  if (document === undefined) {
    return byteResidual(kind, original, proximal, windowPlan(original.length, policy.bytesPerRegion));
  }

  const rebuilt = parseJson(proximal);
  const regions: ResidualRegion[] = sliceDocument(document, rebuilt, policy.itemsPerRegion).map((slice, index) => ({
    index,
    label: slice.label,
    metric: jsonDistance(slice.original, slice.proximal),
    content: Buffer.from(JSON.stringify(slice.original), 'utf8'),
  }));

  return { kind, metric: jsonDistance(document, rebuilt), saturated: false, regions };
}
