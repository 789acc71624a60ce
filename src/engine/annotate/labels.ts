/**
 * Patch and group labels
 *
 * Groups are lettered like spreadsheet columns (A..Z, AA, AB, ...). A patch
 * label is its group's letters plus its 1-based position in the sewing
 * order, so A1 is sewn first in group A.
 */

import type { Group, Patch, Point } from '../../types';
import { pointInRing, ringCentroid } from '../../utils/geometry2d';

export function groupPrefix(index: number): string {
  let label = '';
  let n = index;
  while (n >= 0) {
    label = String.fromCharCode(65 + (n % 26)) + label;
    n = Math.floor(n / 26) - 1;
  }
  return label;
}

/**
 * patchId -> label for every patch of every group
 */
export function labelPatches(groups: Group[]): Map<number, string> {
  const labels = new Map<number, string>();
  for (const group of groups) {
    const prefix = groupPrefix(group.id);
    group.sewingOrder.forEach((patchId, position) => {
      labels.set(patchId, `${prefix}${position + 1}`);
    });
  }
  return labels;
}

function insidePatch(point: Point, patch: Patch): boolean {
  return pointInRing(point, patch.points) && !patch.holes.some(hole => pointInRing(point, hole));
}

/**
 * Where to print a patch's label: its centroid, or for a patch whose
 * centroid falls outside it, the middle of the widest interior run of the
 * horizontal line through the centroid
 */
export function labelAnchor(patch: Patch): Point {
  const centroid = ringCentroid(patch.points);
  if (insidePatch(centroid, patch)) return centroid;

  const y = centroid.y;
  const crossings: number[] = [];
  for (const ring of [patch.points, ...patch.holes]) {
    for (let i = 0; i < ring.length; i++) {
      const a = ring[i];
      const b = ring[(i + 1) % ring.length];
      if ((a.y > y) !== (b.y > y)) {
        crossings.push(a.x + ((y - a.y) * (b.x - a.x)) / (b.y - a.y));
      }
    }
  }
  crossings.sort((p, q) => p - q);

  let best: Point | null = null;
  let widest = 0;
  for (let i = 0; i + 1 < crossings.length; i += 2) {
    const span = crossings[i + 1] - crossings[i];
    if (span > widest) {
      widest = span;
      best = { x: (crossings[i] + crossings[i + 1]) / 2, y };
    }
  }
  return best ?? centroid;
}
