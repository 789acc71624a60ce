/**
 * Page layout tests
 */

import { describe, it, expect } from 'vitest';
import { applyTransform, candidateOrientations, layoutShapes, type LayoutOptions } from '../../../src/engine/layout/pageLayout';
import { OversizedShapeError } from '../../../src/engine/errors';
import type { AllowancePolygon } from '../../../src/types';
import { createRectRing } from '../../../src/utils/polygonBoolean';
import { ringArea } from '../../../src/utils/geometry2d';
import { expectPointClose } from '../../fixtures/assertions';

const allowance = (groupId: number, width: number, height: number): AllowancePolygon => {
  const outer = createRectRing(0, 0, width, height);
  return { groupId, distance: 0.25, outer, holes: [], area: ringArea(outer) };
};

const options = (overrides: Partial<LayoutOptions> = {}): LayoutOptions => ({
  pageWidth: 10,
  pageHeight: 10,
  margin: 1,
  spacing: 0.5,
  rotationStep: 90,
  tolerance: 1e-6,
  unitsPerInch: 1,
  ...overrides,
});

describe('candidateOrientations', () => {
  it('should list every multiple of the step, tightest box first', () => {
    const orientations = candidateOrientations(createRectRing(0, 0, 2, 1), 90);
    expect(orientations.map(o => o.rotation)).toEqual([0, 90, 180, 270]);
    expect([orientations[0].width, orientations[0].height]).toEqual([2, 1]);
    expect([orientations[1].width, orientations[1].height]).toEqual([1, 2]);
  });

  it('should offer only the original orientation for a full-turn step', () => {
    expect(candidateOrientations(createRectRing(0, 0, 2, 1), 360)).toHaveLength(1);
  });
});

describe('applyTransform', () => {
  it('should rotate about the origin and then translate', () => {
    expect(applyTransform({ x: 1, y: 0 }, { rotation: 90, dx: 5, dy: 0 })).toEqual({ x: 5, y: 1 });
  });
});

describe('layoutShapes', () => {
  it('should pack the largest shape first and keep the spacing', () => {
    const pages = layoutShapes([allowance(0, 2, 1), allowance(1, 2, 2)], options());
    expect(pages).toHaveLength(1);

    const [small, square] = pages[0].placements;
    expect(square).toMatchObject({ groupId: 1, page: 0, x: 1, y: 1, rotation: 0 });
    expect(small).toMatchObject({ groupId: 0, page: 0, x: 1, y: 3.5, rotation: 0 });
    expect(small.y - (square.y + square.height)).toBe(0.5);
    expect(small.polygon[0]).toEqual({ x: 1, y: 3.5 });
  });

  it('should rotate a shape that only fits turned', () => {
    const pages = layoutShapes([allowance(0, 15, 2)], options({ pageWidth: 10, pageHeight: 20, margin: 0, spacing: 0 }));
    const [placement] = pages[0].placements;
    expect(placement.rotation).toBe(90);
    expect(placement.width).toBe(2);
    expect(placement.height).toBe(15);
    expect(placement.transform).toEqual({ rotation: 90, dx: 2, dy: 0 });
    expectPointClose(placement.polygon[1], { x: 2, y: 15 });
    expectPointClose(applyTransform({ x: 15, y: 2 }, placement.transform), { x: 0, y: 15 });
  });

  it('should open a new page when no page has room', () => {
    const shapes = [allowance(0, 6, 6), allowance(1, 6, 6), allowance(2, 6, 6)];
    const pages = layoutShapes(shapes, options({ spacing: 0.1 }));
    expect(pages.map(p => p.index)).toEqual([0, 1, 2]);
    expect(pages.map(p => p.placements.map(pl => [pl.groupId, pl.x, pl.y]))).toEqual([
      [[0, 1, 1]],
      [[1, 1, 1]],
      [[2, 1, 1]],
    ]);
  });

  it('should report the page size an oversized shape needs', () => {
    expect(() => layoutShapes([allowance(3, 9, 1)], options())).toThrow(OversizedShapeError);
    try {
      layoutShapes([allowance(3, 9, 1)], options());
    } catch (error) {
      expect(error).toBeInstanceOf(OversizedShapeError);
      if (error instanceof OversizedShapeError) {
        expect(error.groupId).toBe(3);
        expect(error.details.required).toEqual({ width: 11, height: 3 });
        expect(error.details.available).toEqual({ width: 10, height: 10 });
      }
    }
  });

  it('should return no pages for no shapes', () => {
    expect(layoutShapes([], options())).toEqual([]);
  });
});
