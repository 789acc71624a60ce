/**
 * Polygon offsetting
 *
 * Every edge of a counter-clockwise ring moves along its outward normal by
 * `distance` (negative moves inward). Where two moved edges meet:
 * - corners opening away from the offset side: the moved edges cross and
 *   their intersection is the new vertex
 * - corners on the offset side: a miter along the bisector, clipped square
 *   to the bisector at miterLimit x |distance| from the original vertex
 *
 * offsetRing() returns that vertex-by-vertex ring. Near tight concave turns
 * it folds over itself, so sweepRing() builds the same boundary as a union
 * of pieces (one quad per edge plus one join per offset-side corner) and lets
 * the boolean engine resolve every fold.
 */

import type { Point, Ring } from '../../types';
import { add, cross, dot, ensureCounterClockwise, normalize, pointInOrOnRing, scale, sub } from '../../utils/geometry2d';
import { differenceRegions, unionRegions, type Region } from '../../utils/polygonBoolean';

const PARALLEL_EPSILON = 1e-12;

interface EdgeFrame {
  direction: Point;
  /** Outward unit normal (right of a counter-clockwise edge) */
  normal: Point;
}

interface Corner {
  /** Offset points replacing the vertex, in ring order */
  points: Point[];
  /** True when the moved edges leave a gap here that a join must fill */
  joined: boolean;
}

function edgeFrames(ring: Ring): EdgeFrame[] {
  return ring.map((p, i) => {
    const direction = normalize(sub(ring[(i + 1) % ring.length], p));
    return { direction, normal: { x: direction.y, y: -direction.x } };
  });
}

function offsetCorners(ring: Ring, distance: number, miterLimit: number): Corner[] {
  const n = ring.length;
  const frames = edgeFrames(ring);
  const sign = distance >= 0 ? 1 : -1;
  const clipDistance = miterLimit * Math.abs(distance);

  return ring.map((curr, i): Corner => {
    const { direction: d1, normal: n1 } = frames[(i - 1 + n) % n];
    const { direction: d2, normal: n2 } = frames[i];
    const turn = cross(d1, d2);
    const cosine = dot(n1, n2);
    const onFirst = add(curr, scale(n1, distance));
    const onSecond = add(curr, scale(n2, distance));

    // Edge doubles back on itself: square cap beyond the tip
    if (1 + cosine < PARALLEL_EPSILON) {
      const reach = scale(d1, clipDistance);
      return { points: [add(onFirst, reach), add(onSecond, reach)], joined: true };
    }

    // Straight through
    if (Math.abs(turn) < PARALLEL_EPSILON) {
      return { points: [onFirst], joined: false };
    }

    const miter = add(curr, scale(add(n1, n2), distance / (1 + cosine)));
    const convex = turn * sign > 0;
    if (!convex) {
      return { points: [miter], joined: false };
    }

    const miterLength = Math.abs(distance) * Math.sqrt(2 / (1 + cosine));
    if (miterLength <= clipDistance) {
      return { points: [miter], joined: true };
    }

    // Clip the miter with a line perpendicular to the bisector
    const bisector = scale(normalize(add(n1, n2)), sign);
    const s1 = (clipDistance - distance * dot(n1, bisector)) / dot(d1, bisector);
    const s2 = (distance * dot(n2, bisector) - clipDistance) / dot(d2, bisector);
    return { points: [add(onFirst, scale(d1, s1)), sub(onSecond, scale(d2, s2))], joined: true };
  });
}

/**
 * Vertex-by-vertex offset of a counter-clockwise ring. May self-overlap.
 */
export function offsetRing(ring: Ring, distance: number, miterLimit: number): Ring {
  return offsetCorners(ring, distance, miterLimit).flatMap(corner => corner.points);
}

/**
 * The band swept by moving the ring's boundary by `distance`: one quad per
 * edge and one join per offset-side corner, each counter-clockwise
 */
export function offsetPieces(ring: Ring, distance: number, miterLimit: number): Ring[] {
  const n = ring.length;
  const frames = edgeFrames(ring);
  const corners = offsetCorners(ring, distance, miterLimit);
  const pieces: Ring[] = [];

  for (let i = 0; i < n; i++) {
    const p = ring[i];
    const q = ring[(i + 1) % n];
    const shift = scale(frames[i].normal, distance);
    pieces.push(ensureCounterClockwise([p, q, add(q, shift), add(p, shift)]));
  }

  corners.forEach((corner, i) => {
    if (!corner.joined) return;
    const c = ring[i];
    const before = add(c, scale(frames[(i - 1 + n) % n].normal, distance));
    const after = add(c, scale(frames[i].normal, distance));
    pieces.push(ensureCounterClockwise([c, before, ...corner.points, after]));
  });

  return pieces;
}

/**
 * Regions bounded by the offset boundary: the ring grown by `distance` when
 * positive, shrunk when negative. Shrinking may leave several parts or none.
 */
export function sweepRing(ring: Ring, distance: number, miterLimit: number): Region[] {
  const band = offsetPieces(ring, distance, miterLimit).map(outer => ({ outer, holes: [] }));
  const base: Region = { outer: ring, holes: [] };
  return distance >= 0
    ? unionRegions([base, ...band])
    : differenceRegions(base, band);
}

/**
 * The largest region whose outer ring holds every vertex of `original`, or null
 */
export function selectEnclosingRegion(regions: Region[], original: Ring, tolerance: number): Region | null {
  return regions.find(region => original.every(p => pointInOrOnRing(p, region.outer, tolerance))) ?? null;
}
