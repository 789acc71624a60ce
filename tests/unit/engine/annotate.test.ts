/**
 * Labels, anchors and color naming
 */

import { describe, it, expect } from 'vitest';
import { annotate, toColorLabel, type ColorSampler } from '../../../src/engine/annotate/annotator';
import {
  closestColorName,
  groupDisplayColor,
  hexToRgb,
  hslToRgb,
  rgbToHex,
} from '../../../src/engine/annotate/colors';
import { groupPrefix, labelAnchor, labelPatches } from '../../../src/engine/annotate/labels';
import { detectGroups } from '../../../src/engine/grouping/groupDetector';
import type { Patch, Ring } from '../../../src/types';
import { BoundsOps } from '../../../src/utils/bounds';
import { ringArea } from '../../../src/utils/geometry2d';
import { extract, TEST_TOLERANCE } from '../../fixtures/extract';
import { twoUnderOne } from '../../fixtures/drawings';

function patchFrom(points: Ring, holes: Ring[] = []): Patch {
  return {
    id: 0,
    nodeIds: points.map((_, i) => i),
    edgeIds: points.map((_, i) => i),
    points,
    holes,
    area: ringArea(points) - holes.reduce((sum, h) => sum + ringArea(h), 0),
    bounds: BoundsOps.fromPoints(points),
  };
}

describe('labels', () => {
  it('should letter groups like spreadsheet columns', () => {
    expect([0, 1, 25, 26, 27, 701, 702].map(groupPrefix)).toEqual(['A', 'B', 'Z', 'AA', 'AB', 'ZZ', 'AAA']);
  });

  it('should number patches by sewing position', () => {
    const labels = labelPatches([{ id: 1, patchIds: [2, 4], sewingOrder: [4, 2] }]);
    expect(labels.get(4)).toBe('B1');
    expect(labels.get(2)).toBe('B2');
  });

  it('should anchor a convex patch at its centroid', () => {
    const anchor = labelAnchor(patchFrom([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 2 }, { x: 0, y: 2 }]));
    expect(anchor).toEqual({ x: 1, y: 1 });
  });

  it('should move the anchor inside when the centroid falls in a notch', () => {
    const uShape = [
      { x: 0, y: 0 }, { x: 3, y: 0 }, { x: 3, y: 3 }, { x: 2, y: 3 },
      { x: 2, y: 1 }, { x: 1, y: 1 }, { x: 1, y: 3 }, { x: 0, y: 3 },
    ];
    const anchor = labelAnchor(patchFrom(uShape));
    expect(anchor.x).toBeCloseTo(0.5, 9);
    expect(anchor.y).toBeCloseTo(9.5 / 7, 9);
  });

  it('should move the anchor off a hole', () => {
    const outer = [{ x: 0, y: 0 }, { x: 6, y: 0 }, { x: 6, y: 6 }, { x: 0, y: 6 }];
    const hole = [{ x: 2, y: 2 }, { x: 2, y: 4 }, { x: 5, y: 4 }, { x: 5, y: 2 }];
    const anchor = labelAnchor(patchFrom(outer, [hole]));
    // Crossings at y = 3: 0, 2, 5, 6 -> the left run is wider
    expect(anchor.x).toBeCloseTo(1, 9);
  });
});

describe('colors', () => {
  it('should convert between hex and rgb', () => {
    expect(hexToRgb('#FF8000')).toEqual([255, 128, 0]);
    expect(hexToRgb('00ff7f')).toEqual([0, 255, 127]);
    expect(rgbToHex([255, 128, 0])).toBe('#ff8000');
    expect(() => hexToRgb('red')).toThrow('Not a hex color');
  });

  it('should name exact table colors, first entry on duplicates', () => {
    expect(closestColorName([255, 0, 0])).toBe('red');
    expect(closestColorName([0, 255, 255])).toBe('aqua');
  });

  it('should name the nearest table color', () => {
    expect(closestColorName([250, 5, 5])).toBe('red');
    expect(closestColorName([1, 1, 1])).toBe('black');
  });

  it('should convert primary hues', () => {
    expect(hslToRgb(0, 1, 0.5)).toEqual([255, 0, 0]);
    expect(hslToRgb(120, 1, 0.5)).toEqual([0, 255, 0]);
    expect(hslToRgb(240, 1, 0.5)).toEqual([0, 0, 255]);
  });

  it('should give each group a stable pastel', () => {
    expect(groupDisplayColor(0)).toEqual([232, 176, 176]);
    expect(groupDisplayColor(1)).not.toEqual(groupDisplayColor(0));
    expect(groupDisplayColor(5)).toEqual(groupDisplayColor(5));
  });
});

describe('annotate', () => {
  const { patches, patchesByEdge } = extract(twoUnderOne());
  const { groups } = detectGroups(patches, patchesByEdge, { strategy: 'connected', tolerance: TEST_TOLERANCE });

  it('should label every patch and group', () => {
    const notes = annotate(patches, groups);
    expect([0, 1, 2].map(id => notes.patches.get(id)?.label)).toEqual(['A1', 'A2', 'A3']);
    expect(notes.groups.get(0)?.label).toBe('A');
    expect(notes.patches.get(0)?.anchor).toEqual({ x: 0.5, y: 0.5 });
    expect(notes.patches.get(0)?.color).toBeUndefined();
    expect(notes.groups.get(0)?.color).toBeUndefined();
  });

  it('should take sampled colors and give the group its first patch\'s fabric', () => {
    const sampler: ColorSampler = (_point, patchId) => (patchId === 0 ? [255, 0, 0] : null);
    const notes = annotate(patches, groups, sampler);
    expect(notes.patches.get(0)?.color).toEqual({ color: [255, 0, 0], name: 'red' });
    expect(notes.patches.get(1)?.color).toBeUndefined();
    expect(notes.groups.get(0)?.color).toEqual(toColorLabel([255, 0, 0]));
  });
});
