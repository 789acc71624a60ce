/**
 * Boolean polygon operations utility
 *
 * Wraps the polygon-clipping library to work with our Point rings.
 * Used to merge patch rings into group outlines and to measure overlap
 * between allowance polygons and page placements.
 */

import polygonClipping from 'polygon-clipping';
import type { Pair, Ring as ClipRing, Polygon, MultiPolygon } from 'polygon-clipping';
import type { Point, Ring } from '../types';
import { ensureClockwise, ensureCounterClockwise, ringArea } from './geometry2d';
import { debug } from './debug';

/**
 * A polygon with an outer boundary (counter-clockwise) and holes (clockwise)
 */
export interface Region {
  outer: Ring;
  holes: Ring[];
}

// Convert our Point ring to polygon-clipping format
function toClipRing(points: Ring): ClipRing {
  return points.map((p): Pair => [p.x, p.y]);
}

// Convert a polygon-clipping ring back to Points, dropping the closing vertex
function fromClipRing(ring: ClipRing): Ring {
  const points: Point[] = ring.map(([x, y]) => ({ x, y }));
  const first = points[0];
  const last = points[points.length - 1];
  if (points.length > 1 && first.x === last.x && first.y === last.y) {
    points.pop();
  }
  return points;
}

function toClipPolygon(region: Region): Polygon {
  return [toClipRing(region.outer), ...region.holes.map(toClipRing)];
}

function fromMultiPolygon(result: MultiPolygon): Region[] {
  return result
    .filter(polygon => polygon.length > 0)
    .map(([outer, ...holes]) => ({
      outer: ensureCounterClockwise(fromClipRing(outer)),
      holes: holes.map(h => ensureClockwise(fromClipRing(h))),
    }));
}

/**
 * Net area of a region (outer minus holes)
 */
export function regionArea(region: Region): number {
  return ringArea(region.outer) - region.holes.reduce((sum, h) => sum + ringArea(h), 0);
}

/**
 * Union of any number of regions. Disjoint parts come back as separate
 * regions, largest first.
 */
export function unionRegions(regions: Region[]): Region[] {
  const valid = regions.filter(r => r.outer.length >= 3);
  if (valid.length === 0) return [];
  const [first, ...rest] = valid.map(toClipPolygon);
  const result: MultiPolygon = polygonClipping.union(first, ...rest);
  return fromMultiPolygon(result).sort((a, b) => regionArea(b) - regionArea(a));
}

/**
 * Parts of `base` not covered by any of `cutters`, largest first
 */
export function differenceRegions(base: Region, cutters: Region[]): Region[] {
  if (base.outer.length < 3) return [];
  const valid = cutters.filter(r => r.outer.length >= 3).map(toClipPolygon);
  if (valid.length === 0) return [base];
  const result: MultiPolygon = polygonClipping.difference(toClipPolygon(base), ...valid);
  return fromMultiPolygon(result).sort((a, b) => regionArea(b) - regionArea(a));
}

// Total area of a boolean result, or null when polygon-clipping gives up on the input
function measure(operation: string, run: () => MultiPolygon): number | null {
  try {
    return fromMultiPolygon(run()).reduce((sum, r) => sum + regionArea(r), 0);
  } catch (e) {
    debug('boolean', `${operation} failed: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/**
 * Area of the overlap between two regions, or null if it could not be computed
 */
export function intersectionArea(a: Region, b: Region): number | null {
  if (a.outer.length < 3 || b.outer.length < 3) return 0;
  return measure('Intersection', () => polygonClipping.intersection(toClipPolygon(a), toClipPolygon(b)));
}

/**
 * Area of `a` not covered by `b`, or null if it could not be computed
 */
export function differenceArea(a: Region, b: Region): number | null {
  if (a.outer.length < 3) return 0;
  if (b.outer.length < 3) return regionArea(a);
  const area = measure('Difference', () => polygonClipping.difference(toClipPolygon(a), toClipPolygon(b)));
  if (area !== null && area > 0) {
    debug('allowance', `Difference leaves ${area.toExponential(3)} uncovered`);
  }
  return area;
}

/**
 * Create a rectangular ring from bounds (counter-clockwise)
 */
export function createRectRing(minX: number, minY: number, maxX: number, maxY: number): Ring {
  return [
    { x: minX, y: minY },
    { x: maxX, y: minY },
    { x: maxX, y: maxY },
    { x: minX, y: maxY },
  ];
}
