/**
 * Residual metric tests
 *
 * @module __tests__/compression/residual
 */

import { describe, it, expect } from 'vitest';

import { byteResidual, gridPlan, saturatedResidual, segmentPlan } from '../../compression/residual/bytes.js';
import { jsonDistance, jsonResidual } from '../../compression/residual/json.js';
import { lineResidual } from '../../compression/residual/lines.js';

const policy = { itemsPerRegion: 2, bytesPerRegion: 4 };

describe('byte residuals', () => {
  it('is zero for identical bytes', () => {
    const bytes = Buffer.from([3, 1, 4, 1, 5]);
    const residual = byteResidual('audio', bytes, Buffer.from(bytes), segmentPlan(bytes.length, 2));

    expect(residual.metric).toBe(0);
    expect(residual.regions.map(r => r.metric)).toEqual([0, 0]);
  });

  it('scores each region by mean absolute difference', () => {
    const residual = byteResidual(
      'audio',
      Buffer.from([0, 0, 0, 0]),
      Buffer.from([0, 0, 255, 255]),
      segmentPlan(4, 2)
    );

    expect(residual.regions.map(r => [r.label, r.metric])).toEqual([
      ['seg-0', 0],
      ['seg-1', 1],
    ]);
    expect(residual.metric).toBe(0.5);
    expect([...(residual.regions[1]?.content ?? [])]).toEqual([0, 0]);
  });

  it('counts bytes the proximal does not cover as fully different', () => {
    const shorter = byteResidual('audio', Buffer.from([10, 10]), Buffer.from([10]), segmentPlan(2, 1));
    const longer = byteResidual('audio', Buffer.from([5]), Buffer.from([5, 9]), segmentPlan(1, 1));

    expect(shorter.regions[0]?.metric).toBe(0.5);
    expect(shorter.metric).toBe(0.5);
    expect(longer.regions[0]?.metric).toBe(0);
    expect(longer.metric).toBe(0.5);
  });

  it('saturates without a proximal', () => {
    const original = Buffer.from('frames');

    expect(byteResidual('video', original, null, segmentPlan(6, 2))).toEqual(saturatedResidual('video', original));
    expect(saturatedResidual('video', original)).toMatchObject({ metric: 1, saturated: true });
  });
});

describe('grid plans', () => {
  it('cuts frames into cells', () => {
    const plans = gridPlan(16, 2, 4, 2);

    expect(plans.map(p => p.label)).toEqual(['cell-0-0', 'cell-0-1', 'cell-1-0', 'cell-1-1']);
    expect(plans[0]?.spans).toEqual([
      { start: 0, end: 2 },
      { start: 8, end: 10 },
    ]);
    expect(plans[3]?.spans).toEqual([
      { start: 6, end: 8 },
      { start: 14, end: 16 },
    ]);
  });

  it('falls back to contiguous cells without frame dimensions', () => {
    const plans = gridPlan(8, 2);

    expect(plans.map(p => [p.label, p.spans])).toEqual([
      ['cell-0-0', [{ start: 0, end: 2 }]],
      ['cell-0-1', [{ start: 2, end: 4 }]],
      ['cell-1-0', [{ start: 4, end: 6 }]],
      ['cell-1-1', [{ start: 6, end: 8 }]],
    ]);
  });
});

describe('line residuals', () => {
  it('compares lines by position within windows', () => {
    const residual = lineResidual('library', Buffer.from('a\nb\nc\nd'), Buffer.from('a\nx\nc'), 2);

    expect(residual.regions.map(r => [r.label, r.metric])).toEqual([
      ['L1-2', 0.5],
      ['L3-4', 0.5],
    ]);
    expect(residual.metric).toBe(0.5);
    expect(residual.regions[1]?.content.toString()).toBe('c\nd');
  });
});

describe('JSON residuals', () => {
  it('splits objects by top-level key', () => {
    const residual = jsonResidual(
      'data',
      Buffer.from('{"a":1,"b":[1,2]}'),
      Buffer.from('{"a":1,"b":[1,1]}'),
      policy
    );

    expect(residual.regions.map(r => [r.label, r.metric])).toEqual([
      ['$.a', 0],
      ['$.b', 0.5],
    ]);
    expect(residual.metric).toBeCloseTo(1 / 3);
    expect(residual.regions[1]?.content.toString()).toBe('[1,2]');
  });

  it('splits arrays into item windows', () => {
    const residual = jsonResidual('data', Buffer.from('[1,2,3]'), Buffer.from('[1,2,4]'), policy);

    expect(residual.regions.map(r => [r.label, r.metric])).toEqual([
      ['$[0:2]', 0],
      ['$[2:3]', 1],
    ]);
  });

  it('treats a non-JSON proximal as missing every leaf', () => {
    const residual = jsonResidual('data', Buffer.from('{"a":1}'), Buffer.from('garbage'), policy);

    expect(residual.metric).toBe(1);
    expect(residual.saturated).toBe(false);
    expect(residual.regions.map(r => r.metric)).toEqual([1]);
  });

  it('falls back to byte windows for non-JSON originals', () => {
    const residual = jsonResidual('data', Buffer.from('hello'), Buffer.from('hello'), policy);

    expect(residual.regions.map(r => r.label)).toEqual(['b0-4', 'b4-5']);
    expect(residual.metric).toBe(0);
  });

  it('measures nothing between two absent documents', () => {
    expect(jsonDistance(undefined, undefined)).toBe(0);
    expect(jsonDistance({ a: [] }, { a: [] })).toBe(0);
    expect(jsonDistance({ a: [] }, { a: {} })).toBe(1);
  });
});
