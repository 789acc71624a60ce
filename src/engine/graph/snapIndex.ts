/**
 * SnapIndex - grid-backed vertex registry with tolerance snapping
 *
 * Points within `tolerance` of an existing vertex resolve to that vertex
 * instead of creating a new one. The grid cell size equals the tolerance, so
 * a lookup only inspects the 3x3 block of cells around the query.
 *
 * Merging rules:
 * - several candidates in range: the nearest wins, lowest id on a tie
 * - the other candidates in range are merged into the winner, so snapping
 *   propagates transitively (A -> B, later B -> C puts A with C)
 * - vertices are never removed; merged ones alias their representative
 */

import type { Point } from '../../types';
import { distance } from '../../utils/geometry2d';

export class SnapIndex {
  private readonly points: Point[] = [];
  private readonly parent: number[] = [];
  private readonly cells = new Map<string, number[]>();
  private mergeCount = 0;

  constructor(readonly tolerance: number) {}

  get size(): number {
    return this.points.length;
  }

  /** Number of vertex-to-vertex merges performed so far */
  get merges(): number {
    return this.mergeCount;
  }

  /**
   * Resolve a point to a vertex id, creating a vertex when nothing is in range.
   * The returned id is always a representative.
   */
  resolve(point: Point): number {
    const candidates = this.candidatesNear(point);

    if (candidates.length === 0) {
      return this.insert(point);
    }

    let best = candidates[0];
    let bestDist = distance(point, this.points[best]);
    for (const id of candidates.slice(1)) {
      const d = distance(point, this.points[id]);
      if (d < bestDist || (d === bestDist && id < best)) {
        best = id;
        bestDist = d;
      }
    }

    const root = this.find(best);
    for (const id of candidates) {
      const other = this.find(id);
      if (other !== root) {
        this.parent[other] = root;
        this.mergeCount++;
      }
    }
    return root;
  }

  /**
   * Representative of a vertex (with path compression)
   */
  find(id: number): number {
    let root = id;
    while (this.parent[root] !== root) root = this.parent[root];
    let cur = id;
    while (this.parent[cur] !== root) {
      const next = this.parent[cur];
      this.parent[cur] = root;
      cur = next;
    }
    return root;
  }

  /** Coordinates of a vertex's representative */
  pointOf(id: number): Point {
    return this.points[this.find(id)];
  }

  /**
   * Representative ids in creation order
   */
  representatives(): number[] {
    const roots: number[] = [];
    for (let i = 0; i < this.points.length; i++) {
      if (this.find(i) === i) roots.push(i);
    }
    return roots;
  }

  private insert(point: Point): number {
    const id = this.points.length;
    this.points.push({ x: point.x, y: point.y });
    this.parent.push(id);
    const key = this.cellKey(this.cellOf(point.x), this.cellOf(point.y));
    const bucket = this.cells.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      this.cells.set(key, [id]);
    }
    return id;
  }

  private candidatesNear(point: Point): number[] {
    const cx = this.cellOf(point.x);
    const cy = this.cellOf(point.y);
    const found: number[] = [];
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        const bucket = this.cells.get(this.cellKey(cx + dx, cy + dy));
        if (!bucket) continue;
        for (const id of bucket) {
          if (distance(point, this.points[id]) <= this.tolerance) {
            found.push(id);
          }
        }
      }
    }
    return found.sort((a, b) => a - b);
  }

  private cellOf(v: number): number {
    return Math.floor(v / this.tolerance);
  }

  private cellKey(cx: number, cy: number): string {
    return `${cx}:${cy}`;
  }
}
