/**
 * End-to-end pipeline tests
 *
 * Drawings are in inches (unitsPerInch: 1) so expected geometry can be read
 * straight off the fixtures. Every successful run is also put through the
 * allowance and layout validators.
 */

import { describe, it, expect } from 'vitest';
import { runPipeline } from '../../src/engine/Pipeline';
import { toPatternDocument } from '../../src/engine/document';
import { ConfigurationError, OversizedShapeError } from '../../src/engine/errors';
import { distanceToRing } from '../../src/utils/geometry2d';
import type { Segment } from '../../src/types';
import {
  cornerNotch,
  lShapeWithDiagonal,
  rect,
  rightTriangle,
  squareWithDanglingSegment,
  squareWithIsland,
} from '../fixtures/drawings';
import { diagnosticCodes, expectValidPattern } from '../fixtures/assertions';

const INCHES = { unitsPerInch: 1 };

describe('Pipeline', () => {
  describe('three-patch block with a diagonal', () => {
    const result = runPipeline(lShapeWithDiagonal(), INCHES);

    it('should find three patches in one group', () => {
      expect(result.patches).toHaveLength(3);
      expect(result.grouping.groups).toHaveLength(1);
      expect(result.grouping.groups[0].sewingOrder).toEqual([0, 1, 2]);
    });

    it('should start sewing at the patch with the lowest bounding-box origin', () => {
      const first = result.patches[result.grouping.groups[0].sewingOrder[0]];
      expect([first.bounds.minX, first.bounds.minY]).toEqual([0, 0]);
    });

    it('should label patches in sewing order', () => {
      expect([0, 1, 2].map(id => result.annotations.patches.get(id)?.label)).toEqual(['A1', 'A2', 'A3']);
    });

    it('should produce a clean pattern on one page', () => {
      expect(result.diagnostics).toEqual([]);
      expect(result.allowances[0].area).toBeCloseTo(5.25, 9);
      expect(result.pages).toHaveLength(1);
      expectValidPattern(result);
    });
  });

  describe('open paths', () => {
    it('should report a dangling segment and still build the closed region', () => {
      const result = runPipeline(squareWithDanglingSegment(), INCHES);
      expect(diagnosticCodes(result)).toEqual(['graph:open-path']);
      expect(result.diagnostics[0].details.sources).toEqual([4]);
      expect(result.patches).toHaveLength(1);
      expect(result.patches[0].area).toBe(1);
      expect(result.pages).toHaveLength(1);
      expectValidPattern(result);
    });
  });

  describe('seam allowance', () => {
    it('should keep the cutting line a quarter inch off every edge of a triangle', () => {
      const result = runPipeline(rightTriangle(), { ...INCHES, seamAllowance: 0.25 });
      const [allowance] = result.allowances;
      expect(allowance.distance).toBe(0.25);
      for (const midpoint of [{ x: 2, y: 0 }, { x: 2, y: 1.5 }, { x: 0, y: 1.5 }]) {
        expect(distanceToRing(midpoint, allowance.outer)).toBeCloseTo(0.25, 9);
      }
      expectValidPattern(result);
    });

    it('should scale the allowance by the drawing units', () => {
      const result = runPipeline(rect(0, 0, 96, 96));
      expect(result.allowances[0].distance).toBe(24);
      expect(result.allowances[0].area).toBeCloseTo(144 * 144, 6);
    });

    it('should warn when an island\'s allowance overlaps the surrounding piece', () => {
      const result = runPipeline(squareWithIsland(), INCHES);
      expect(result.grouping.groups).toHaveLength(2);
      expect(result.allowances[0].holes).toHaveLength(1);
      expect(diagnosticCodes(result)).toEqual(['allowance:no-overlap']);
      expect(result.diagnostics[0].severity).toBe('warning');
      expect(result.diagnostics[0].details.area).toBeCloseTo(4, 9);
      expectValidPattern(result);
    });

    it('should warn about allowances meeting along a seam between groups', () => {
      const result = runPipeline(cornerNotch(), { ...INCHES, grouping: 'straight-seam' });
      expect(result.grouping.groups).toHaveLength(2);
      expect(diagnosticCodes(result)).toEqual(['allowance:no-overlap']);
    });
  });

  describe('layout', () => {
    it('should spread shapes too large to share a page over several pages', () => {
      // Each allowance is 7 x 5.343: one fits the 7.5 x 10 printable area, two do not
      const segments: Segment[] = [0, 1, 2, 3, 4].flatMap(i => rect(i * 10, 0, 6.5, 4.843));
      const result = runPipeline(segments, INCHES);
      expect(result.pages.length).toBeGreaterThanOrEqual(2);
      expect(result.pages).toHaveLength(5);
      expect(result.pages.map(p => p.placements.length)).toEqual([1, 1, 1, 1, 1]);
      expectValidPattern(result);
    });

    it('should put small shapes on one page with the spacing between them', () => {
      const result = runPipeline(squareWithIsland(), INCHES);
      expect(result.pages).toHaveLength(1);
      const [big, small] = result.pages[0].placements;
      expect(big.x).toBe(0.5);
      expect(small.x).toBe(0.5);
      expect(small.y - (big.y + big.height)).toBeCloseTo(0.1, 9);
    });

    it('should fail for a shape larger than the page', () => {
      expect(() => runPipeline(rect(0, 0, 20, 20), INCHES)).toThrow(OversizedShapeError);
      try {
        runPipeline(rect(0, 0, 20, 20), INCHES);
      } catch (error) {
        if (!(error instanceof OversizedShapeError)) throw error;
        expect(error.details.required).toEqual({ width: 21.5, height: 21.5 });
      }
    });
  });

  it('should reject an invalid configuration before doing any work', () => {
    expect(() => runPipeline(rect(0, 0, 1, 1), { margin: -1 })).toThrow(ConfigurationError);
  });

  it('should give identical output for identical input', () => {
    const first = runPipeline(lShapeWithDiagonal(), INCHES);
    const second = runPipeline(lShapeWithDiagonal(), INCHES);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(JSON.stringify(toPatternDocument(second))).toBe(JSON.stringify(toPatternDocument(first)));
  });

  it('should carry sampled fabric colors through to the document', () => {
    const result = runPipeline(lShapeWithDiagonal(), INCHES, {
      sampler: (_point, patchId) => (patchId === 2 ? [0, 0, 255] : [255, 255, 0]),
    });
    const piece = toPatternDocument(result).pages[0].pieces[0];
    expect(piece.color?.name).toBe('yellow');
    expect(piece.patches.map(p => p.color?.name)).toEqual(['yellow', 'yellow', 'blue']);
  });
});
