/**
 * Behaviour when polygon-clipping throws on its input
 *
 * The boolean engine is wrapped so that any geometry with a vertex at (3, 3)
 * makes it throw, the way it does on near-degenerate rings.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import type { AllowancePolygon, GroupOutline, PageLayout, PagePlacement } from '../../../src/types';
import { createRectRing, intersectionArea } from '../../../src/utils/polygonBoolean';
import { checkAllowances } from '../../../src/engine/validators/AllowanceChecker';
import { checkLayout } from '../../../src/engine/validators/LayoutChecker';
import { runPipeline } from '../../../src/engine/Pipeline';
import { clearDebug, getDebug, setDebugTags } from '../../../src/utils/debug';
import { ringArea } from '../../../src/utils/geometry2d';
import { rect } from '../../fixtures/drawings';

vi.mock('polygon-clipping', async importOriginal => {
  const actual = await importOriginal<{ default: typeof import('polygon-clipping') }>();
  const real = actual.default;
  const check = (geoms: unknown[]): void => {
    if (JSON.stringify(geoms).includes('[3,3]')) {
      throw new Error('Unable to complete output ring');
    }
  };
  return {
    default: {
      ...real,
      union: (...geoms: Parameters<typeof real.union>) => {
        check(geoms);
        return real.union(...geoms);
      },
      intersection: (...geoms: Parameters<typeof real.intersection>) => {
        check(geoms);
        return real.intersection(...geoms);
      },
      difference: (...geoms: Parameters<typeof real.difference>) => {
        check(geoms);
        return real.difference(...geoms);
      },
    },
  };
});

const region = (minX: number, minY: number, maxX: number, maxY: number) => ({
  outer: createRectRing(minX, minY, maxX, maxY),
  holes: [],
});

const allowance = (groupId: number, minX: number, minY: number, maxX: number, maxY: number): AllowancePolygon => {
  const outer = createRectRing(minX, minY, maxX, maxY);
  return { groupId, distance: 0.25, outer, holes: [], area: ringArea(outer) };
};

const placement = (groupId: number, minX: number, minY: number, maxX: number, maxY: number): PagePlacement => ({
  groupId,
  page: 0,
  x: minX,
  y: minY,
  rotation: 0,
  transform: { rotation: 0, dx: 0, dy: 0 },
  polygon: createRectRing(minX, minY, maxX, maxY),
  width: maxX - minX,
  height: maxY - minY,
});

describe('polygon-clipping failures', () => {
  afterEach(() => {
    setDebugTags([]);
    clearDebug();
  });

  it('should report an unmeasurable intersection as null and log it', () => {
    setDebugTags(['boolean']);
    expect(intersectionArea(region(3, 3, 5, 5), region(4, 4, 6, 6))).toBeNull();
    expect(getDebug()).toContain('[boolean] Intersection failed: Unable to complete output ring');
  });

  it('should still measure geometry the engine accepts', () => {
    expect(intersectionArea(region(0, 0, 2, 2), region(1, 1, 4, 4))).toBeCloseTo(1, 10);
  });

  it('should turn unmeasurable allowance checks into warnings', () => {
    const outline: GroupOutline = { groupId: 0, outer: createRectRing(3, 3, 4, 4), holes: [] };
    const result = checkAllowances([outline], [allowance(0, 2.5, 2.5, 4.5, 4.5), allowance(1, 3, 3, 5, 5)], 1e-6);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings.map(w => [w.rule, w.details])).toEqual([
      ['allowance:contains-outline', { groupId: 0 }],
      ['allowance:no-overlap', { groupId: 0, otherGroupId: 1 }],
    ]);
  });

  it('should turn an unmeasurable page overlap into a warning', () => {
    const page: PageLayout = {
      index: 0,
      width: 10,
      height: 10,
      margin: 1,
      placements: [placement(0, 1, 1, 3, 3), placement(1, 2, 2, 4, 4)],
    };
    const result = checkLayout([page], { spacing: 0.1, tolerance: 1e-6, expectedGroupIds: [0, 1] });

    expect(result.errors).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].rule).toBe('layout:no-overlap');
    expect(result.warnings[0].details).toEqual({ groupId: 0, otherGroupId: 1, page: 0 });
  });

  it('should skip a group whose outline cannot be built and lay out the rest', () => {
    const result = runPipeline([...rect(0, 0, 1, 1), ...rect(3, 3, 1, 1)], { unitsPerInch: 1 });

    expect(result.grouping.groups).toHaveLength(2);
    expect(result.outlines.map(o => o.groupId)).toEqual([0]);
    expect(result.allowances.map(a => a.groupId)).toEqual([0]);
    expect(result.pages).toHaveLength(1);

    expect(result.diagnostics.map(d => d.code)).toEqual(['group:outline-failed']);
    expect(result.diagnostics[0].severity).toBe('error');
    expect(result.diagnostics[0].details).toEqual({
      groupId: 1,
      patchIds: [1],
      reason: 'Unable to complete output ring',
    });
  });
});
