/**
 * 2D vector and polygon math shared by every pipeline stage.
 *
 * Orientation convention: signed area > 0 means counter-clockwise in a
 * y-up frame. Drawings arriving in SVG's y-down frame simply appear mirrored;
 * every stage uses the same sign test so the result is consistent.
 */

import type { Point, Ring } from '../types';

export const add = (a: Point, b: Point): Point => ({ x: a.x + b.x, y: a.y + b.y });

export const sub = (a: Point, b: Point): Point => ({ x: a.x - b.x, y: a.y - b.y });

export const scale = (a: Point, s: number): Point => ({ x: a.x * s, y: a.y * s });

export const dot = (a: Point, b: Point): number => a.x * b.x + a.y * b.y;

export const cross = (a: Point, b: Point): number => a.x * b.y - a.y * b.x;

export const length = (a: Point): number => Math.hypot(a.x, a.y);

export const distance = (a: Point, b: Point): number => Math.hypot(a.x - b.x, a.y - b.y);

export const normalize = (a: Point): Point => {
  const len = length(a);
  return len === 0 ? { x: 0, y: 0 } : { x: a.x / len, y: a.y / len };
};

/**
 * Twice the signed area of triangle abc (positive when c is left of a->b)
 */
export const orient = (a: Point, b: Point, c: Point): number =>
  (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);

/**
 * Signed area via the shoelace formula. Positive for counter-clockwise.
 */
export function signedArea(ring: Ring): number {
  let area = 0;
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const p = ring[i];
    const q = ring[(i + 1) % n];
    area += p.x * q.y - q.x * p.y;
  }
  return area / 2;
}

export function ringArea(ring: Ring): number {
  return Math.abs(signedArea(ring));
}

/**
 * Area centroid of a simple ring. Falls back to the vertex mean for
 * zero-area input.
 */
export function ringCentroid(ring: Ring): Point {
  const a = signedArea(ring);
  if (Math.abs(a) < 1e-12) {
    const sum = ring.reduce((acc, p) => add(acc, p), { x: 0, y: 0 });
    return ring.length === 0 ? sum : scale(sum, 1 / ring.length);
  }
  let cx = 0;
  let cy = 0;
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const p = ring[i];
    const q = ring[(i + 1) % n];
    const f = p.x * q.y - q.x * p.y;
    cx += (p.x + q.x) * f;
    cy += (p.y + q.y) * f;
  }
  return { x: cx / (6 * a), y: cy / (6 * a) };
}

export function ensureCounterClockwise(ring: Ring): Ring {
  return signedArea(ring) < 0 ? [...ring].reverse() : ring;
}

export function ensureClockwise(ring: Ring): Ring {
  return signedArea(ring) > 0 ? [...ring].reverse() : ring;
}

/**
 * Distance from a point to a line segment
 */
export function distanceToSegment(p: Point, a: Point, b: Point): number {
  const d = sub(b, a);
  const lenSq = dot(d, d);
  if (lenSq === 0) return distance(p, a);
  const t = Math.max(0, Math.min(1, dot(sub(p, a), d) / lenSq));
  return distance(p, add(a, scale(d, t)));
}

/**
 * Parameter of the projection of p onto the line a->b (0 at a, 1 at b)
 */
export function projectParam(p: Point, a: Point, b: Point): number {
  const d = sub(b, a);
  const lenSq = dot(d, d);
  return lenSq === 0 ? 0 : dot(sub(p, a), d) / lenSq;
}

/**
 * Proper crossing point of segments ab and cd, or null when they are
 * parallel or do not cross strictly inside both.
 */
export function segmentIntersection(a: Point, b: Point, c: Point, d: Point): { point: Point; t: number; u: number } | null {
  const r = sub(b, a);
  const s = sub(d, c);
  const denom = cross(r, s);
  if (Math.abs(denom) < 1e-15) return null;
  const ac = sub(c, a);
  const t = cross(ac, s) / denom;
  const u = cross(ac, r) / denom;
  if (t <= 0 || t >= 1 || u <= 0 || u >= 1) return null;
  return { point: add(a, scale(r, t)), t, u };
}

/**
 * Ray-casting point-in-polygon test. Points exactly on the boundary may go
 * either way; combine with distanceToRing when that matters.
 */
export function pointInRing(point: Point, ring: Ring): boolean {
  const { x, y } = point;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const xi = ring[i].x, yi = ring[i].y;
    const xj = ring[j].x, yj = ring[j].y;
    const intersect = ((yi > y) !== (yj > y)) &&
      (x < (xj - xi) * (y - yi) / (yj - yi) + xi);
    if (intersect) inside = !inside;
  }
  return inside;
}

export function distanceToRing(point: Point, ring: Ring): number {
  let best = Infinity;
  for (let i = 0; i < ring.length; i++) {
    best = Math.min(best, distanceToSegment(point, ring[i], ring[(i + 1) % ring.length]));
  }
  return best;
}

/**
 * Inside-or-on test with a distance tolerance for the boundary
 */
export function pointInOrOnRing(point: Point, ring: Ring, tolerance: number): boolean {
  return distanceToRing(point, ring) <= tolerance || pointInRing(point, ring);
}

/**
 * Drop vertices whose neighbours make (nearly) a straight line with them.
 * `tolerance` bounds the perpendicular deviation, in drawing units.
 */
export function removeCollinearPoints(ring: Ring, tolerance: number): Ring {
  let points = ring;
  let changed = true;
  while (changed && points.length > 3) {
    changed = false;
    const kept: Point[] = [];
    const n = points.length;
    for (let i = 0; i < n; i++) {
      const prev = kept.length > 0 ? kept[kept.length - 1] : points[(i - 1 + n) % n];
      const curr = points[i];
      const next = points[(i + 1) % n];
      const span = distance(prev, next);
      const deviation = span === 0 ? distance(prev, curr) : Math.abs(orient(prev, next, curr)) / span;
      const backtracks = span > 0 && dot(sub(curr, prev), sub(next, curr)) < 0;
      if (deviation <= tolerance && !backtracks) {
        changed = true;
        continue;
      }
      kept.push(curr);
    }
    if (kept.length < 3) break;
    points = kept;
  }
  return points;
}

/**
 * Rotate about the origin. Quarter turns are exact.
 */
export function rotatePoint(p: Point, degrees: number): Point {
  const turns = ((degrees % 360) + 360) % 360;
  switch (turns) {
    case 0: return { x: p.x, y: p.y };
    case 90: return { x: -p.y, y: p.x };
    case 180: return { x: -p.x, y: -p.y };
    case 270: return { x: p.y, y: -p.x };
  }
  const rad = (turns * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return { x: p.x * cos - p.y * sin, y: p.x * sin + p.y * cos };
}

export function rotateRing(ring: Ring, degrees: number): Ring {
  return ring.map(p => rotatePoint(p, degrees));
}

export function translateRing(ring: Ring, dx: number, dy: number): Ring {
  return ring.map(p => ({ x: p.x + dx, y: p.y + dy }));
}
