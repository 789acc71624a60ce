/**
 * Bounds - 2D axis-aligned bounding box operations
 *
 * All bounding box math goes through this namespace so the packer, the
 * validators and the group ordering agree on one definition.
 */

import type { Bounds2D, Point } from '../types';

// ============================================================================
// CONSTRUCTION
// ============================================================================

const empty = (): Bounds2D => ({ minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity });

/**
 * Bounds of a point list. Empty input gives a zero box at the origin.
 */
const fromPoints = (points: Point[]): Bounds2D => {
  if (points.length === 0) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  }
  const b = empty();
  for (const p of points) {
    if (p.x < b.minX) b.minX = p.x;
    if (p.y < b.minY) b.minY = p.y;
    if (p.x > b.maxX) b.maxX = p.x;
    if (p.y > b.maxY) b.maxY = p.y;
  }
  return b;
};

const union = (a: Bounds2D, b: Bounds2D): Bounds2D => ({
  minX: Math.min(a.minX, b.minX),
  minY: Math.min(a.minY, b.minY),
  maxX: Math.max(a.maxX, b.maxX),
  maxY: Math.max(a.maxY, b.maxY),
});

// ============================================================================
// ACCESSORS
// ============================================================================

const width = (b: Bounds2D): number => b.maxX - b.minX;

const height = (b: Bounds2D): number => b.maxY - b.minY;

const area = (b: Bounds2D): number => width(b) * height(b);

const origin = (b: Bounds2D): Point => ({ x: b.minX, y: b.minY });

// ============================================================================
// PREDICATES
// ============================================================================

/**
 * True when the boxes share interior area. Boxes closer than `tolerance`
 * to touching count as separate.
 */
const overlaps = (a: Bounds2D, b: Bounds2D, tolerance = 0): boolean =>
  a.minX < b.maxX - tolerance &&
  b.minX < a.maxX - tolerance &&
  a.minY < b.maxY - tolerance &&
  b.minY < a.maxY - tolerance;

const contains = (outer: Bounds2D, inner: Bounds2D, tolerance = 0): boolean =>
  inner.minX >= outer.minX - tolerance &&
  inner.minY >= outer.minY - tolerance &&
  inner.maxX <= outer.maxX + tolerance &&
  inner.maxY <= outer.maxY + tolerance;

/**
 * Gap between two boxes along the separating axis (0 when they overlap)
 */
const gap = (a: Bounds2D, b: Bounds2D): number => {
  const dx = Math.max(b.minX - a.maxX, a.minX - b.maxX, 0);
  const dy = Math.max(b.minY - a.maxY, a.minY - b.maxY, 0);
  return Math.max(dx, dy);
};

/**
 * Order boxes by origin: lowest y first, then lowest x
 */
const compareOrigin = (a: Bounds2D, b: Bounds2D, tolerance = 0): number => {
  if (Math.abs(a.minY - b.minY) > tolerance) return a.minY - b.minY;
  if (Math.abs(a.minX - b.minX) > tolerance) return a.minX - b.minX;
  return 0;
};

export const BoundsOps = {
  empty,
  fromPoints,
  union,
  width,
  height,
  area,
  origin,
  overlaps,
  contains,
  gap,
  compareOrigin,
};
