/**
 * Seam allowance tests
 */

import { afterEach, describe, it, expect } from 'vitest';
import { computeAllowances, offsetOutline } from '../../../src/engine/seamAllowance/seamAllowance';
import { InvalidOffsetError } from '../../../src/engine/errors';
import type { GroupOutline } from '../../../src/types';
import { distanceToRing, pointInRing, signedArea } from '../../../src/utils/geometry2d';
import { createRectRing } from '../../../src/utils/polygonBoolean';
import { clearDebug, getDebug, setDebugTags } from '../../../src/utils/debug';

const options = (distance: number) => ({ distance, miterLimit: 2, tolerance: 1e-6 });

const outline = (outer: GroupOutline['outer'], holes: GroupOutline['holes'] = [], groupId = 0): GroupOutline =>
  ({ groupId, outer, holes });

const lShape = [
  { x: 0, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 1 }, { x: 1, y: 1 }, { x: 1, y: 2 }, { x: 0, y: 2 },
];

// U with a 1-wide, 2-deep slot coming down from the top
const uShape = [
  { x: 0, y: 0 }, { x: 3, y: 0 }, { x: 3, y: 3 }, { x: 2, y: 3 },
  { x: 2, y: 1 }, { x: 1, y: 1 }, { x: 1, y: 3 }, { x: 0, y: 3 },
];

// 2 x 2 chamber inside a 5 x 5 square, opening to the top through a 0.5-wide slot
const keyhole = [
  { x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 5 }, { x: 2.75, y: 5 },
  { x: 2.75, y: 3 }, { x: 3.5, y: 3 }, { x: 3.5, y: 1 }, { x: 1.5, y: 1 },
  { x: 1.5, y: 3 }, { x: 2.25, y: 3 }, { x: 2.25, y: 5 }, { x: 0, y: 5 },
];

describe('offsetOutline', () => {
  afterEach(() => {
    setDebugTags([]);
    clearDebug();
  });

  it('should keep every edge at exactly the allowance distance', () => {
    const triangle = [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 0, y: 3 }];
    const { allowance } = offsetOutline(outline(triangle), options(0.25));
    for (const midpoint of [{ x: 2, y: 0 }, { x: 2, y: 1.5 }, { x: 0, y: 1.5 }]) {
      expect(distanceToRing(midpoint, allowance.outer)).toBeCloseTo(0.25, 9);
    }
    expect(signedArea(allowance.outer)).toBeGreaterThan(0);
  });

  it('should offset a concave corner to the crossing of the moved edges', () => {
    const { allowance } = offsetOutline(outline(lShape), options(0.25));
    // (2 + 2a)^2 minus the unit notch
    expect(allowance.area).toBeCloseTo(5.25, 9);
    expect(allowance.outer).toHaveLength(6);
    expect(allowance.distance).toBe(0.25);
  });

  it('should grow monotonically with the distance', () => {
    const areas = [0.1, 0.2, 0.3].map(d => offsetOutline(outline(lShape), options(d)).allowance.area);
    expect(areas[0]).toBeLessThan(areas[1]);
    expect(areas[1]).toBeLessThan(areas[2]);
  });

  it('should narrow a slot wider than twice the allowance', () => {
    const { allowance } = offsetOutline(outline(uShape), options(0.25));
    // 3.5 x 3.5 minus the remaining 0.5 x 2 slot
    expect(allowance.area).toBeCloseTo(11.25, 9);
    expect(allowance.outer).toHaveLength(8);
  });

  it('should close a slot narrower than twice the allowance', () => {
    const { allowance } = offsetOutline(outline(uShape), options(0.75));
    expect(allowance.area).toBeCloseTo(20.25, 9);
    expect(allowance.outer).toHaveLength(4);
    expect(pointInRing({ x: 1.5, y: 2 }, allowance.outer)).toBe(true);
  });

  it('should drop a pocket sealed off by the allowance and log where it was', () => {
    setDebugTags(['allowance']);
    const { allowance } = offsetOutline(outline(keyhole), options(0.5));

    // The slot closes, leaving a 1 x 1 pocket inside the chamber
    expect(allowance.holes).toEqual([]);
    expect(allowance.area).toBeCloseTo(36, 9);

    const lines = getDebug().split('\n').filter(line => line.includes('dropped pocket'));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[allowance] Group 0: dropped pocket closed off by the offset: ');
    expect(lines[0]).toContain('(2.0000, 1.5000)');
    expect(lines[0]).toContain('(3.0000, 2.5000)');
  });

  it('should shrink holes by the allowance', () => {
    const hole = [...createRectRing(2, 2, 4, 4)].reverse();
    const { allowance, collapsedHoles } = offsetOutline(outline(createRectRing(0, 0, 6, 6), [hole]), options(0.25));
    expect(allowance.holes).toHaveLength(1);
    expect(signedArea(allowance.holes[0])).toBeCloseTo(-2.25, 9);
    expect(allowance.area).toBeCloseTo(42.25 - 2.25, 9);
    expect(collapsedHoles).toEqual([]);
  });

  it('should report a hole the allowance closes up', () => {
    const hole = [...createRectRing(2, 2, 4, 4)].reverse();
    const { allowance, collapsedHoles } = offsetOutline(outline(createRectRing(0, 0, 6, 6), [hole]), options(1));
    expect(allowance.holes).toEqual([]);
    expect(collapsedHoles).toEqual([hole]);
  });

  it('should throw for an outline without area', () => {
    const flat = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }];
    expect(() => offsetOutline(outline(flat), options(0.25))).toThrow(InvalidOffsetError);
  });
});

describe('computeAllowances', () => {
  it('should skip a failing group and keep the others', () => {
    const flat = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }];
    const result = computeAllowances(
      [outline(createRectRing(0, 0, 1, 1), [], 0), outline(flat, [], 1)],
      options(0.25),
    );
    expect(result.allowances.map(a => a.groupId)).toEqual([0]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].groupId).toBe(1);
    expect(result.diagnostics.map(d => d.code)).toEqual(['allowance:invalid-offset']);
  });

  it('should warn about collapsed holes', () => {
    const hole = [...createRectRing(2, 2, 4, 4)].reverse();
    const result = computeAllowances([outline(createRectRing(0, 0, 6, 6), [hole])], options(1));
    expect(result.allowances).toHaveLength(1);
    expect(result.diagnostics.map(d => [d.code, d.severity])).toEqual([['allowance:hole-collapsed', 'warning']]);
  });
});
