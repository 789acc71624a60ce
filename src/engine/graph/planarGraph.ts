/**
 * Planar Graph Builder
 *
 * Turns an unordered bag of straight segments into a planar graph:
 * 1. Snap every endpoint into a SnapIndex (tolerance merging)
 * 2. Node the segments: split wherever one crosses another or an endpoint
 *    lands on another segment's interior (T-junction)
 * 3. Emit one edge per piece, rejecting zero-length and duplicate pieces
 *
 * The builder is a pure transform: same segments and tolerance in, same
 * node and edge numbering out.
 */

import type { GraphEdge, GraphNode, PlanarGraph, Point, Segment } from '../../types';
import { DegenerateInputError } from '../errors';
import { SnapIndex } from './snapIndex';
import { distanceToSegment, projectParam, segmentIntersection } from '../../utils/geometry2d';
import { debug, formatPoints } from '../../utils/debug';

export interface GraphBuildOptions {
  tolerance: number;
  /** Throw on degenerate segments (default) instead of skipping them */
  strict?: boolean;
}

export interface GraphBuildResult {
  graph: PlanarGraph;
  /** Degenerate segments skipped in lenient mode */
  skipped: DegenerateInputError[];
}

interface WorkingSegment {
  index: number;
  a: number;
  b: number;
  cuts: Set<number>;
}

// =============================================================================
// Build
// =============================================================================

export function buildPlanarGraph(segments: Segment[], options: GraphBuildOptions): GraphBuildResult {
  const { tolerance, strict = true } = options;
  const index = new SnapIndex(tolerance);
  const skipped: DegenerateInputError[] = [];

  const reject = (error: DegenerateInputError): void => {
    if (strict) throw error;
    debug('graph', `Skipping segment ${error.segmentIndex}: ${error.message}`);
    skipped.push(error);
  };

  // Pass 1: snap endpoints in input order
  const raw = segments.map((segment, i) => ({
    index: i,
    a: index.resolve(segment.start),
    b: index.resolve(segment.end),
  }));

  const working: WorkingSegment[] = [];
  for (const seg of raw) {
    const a = index.find(seg.a);
    const b = index.find(seg.b);
    if (a === b) {
      const { start, end } = segments[seg.index];
      reject(new DegenerateInputError('zero-length', seg.index, [start, end]));
      continue;
    }
    working.push({ index: seg.index, a, b, cuts: new Set() });
  }

  // Pass 2: find crossings and T-junctions
  nodeSegments(working, index);

  // Pass 3: cut into edges
  const edges: GraphEdge[] = [];
  const edgeByKey = new Map<string, GraphEdge>();

  for (const seg of working) {
    const a = index.find(seg.a);
    const b = index.find(seg.b);
    const pa = index.pointOf(a);
    const pb = index.pointOf(b);

    const interior = Array.from(seg.cuts, id => index.find(id))
      .filter(id => id !== a && id !== b)
      .map(id => ({ id, t: projectParam(index.pointOf(id), pa, pb) }))
      .sort((p, q) => p.t - q.t || p.id - q.id);

    const chain = [a, ...interior.map(c => c.id), b].filter((id, i, all) => i === 0 || id !== all[i - 1]);
    if (chain.length < 2) {
      reject(new DegenerateInputError('zero-length', seg.index, [pa, pb]));
      continue;
    }

    for (let i = 0; i + 1 < chain.length; i++) {
      const u = chain[i];
      const v = chain[i + 1];
      const key = u < v ? `${u}-${v}` : `${v}-${u}`;
      const existing = edgeByKey.get(key);
      if (existing) {
        reject(new DegenerateInputError('duplicate-edge', seg.index, [index.pointOf(u), index.pointOf(v)], {
          existingSource: existing.source,
        }));
        continue;
      }
      const edge: GraphEdge = { id: edges.length, a: u, b: v, source: seg.index };
      edges.push(edge);
      edgeByKey.set(key, edge);
    }
  }

  const graph = compact(index, edges, tolerance);
  debug('graph', `Built graph: ${segments.length} segments -> ${graph.nodes.length} nodes, ${graph.edges.length} edges (${index.merges} vertex merges)`);
  return { graph, skipped };
}

// =============================================================================
// Noding
// =============================================================================

function nodeSegments(working: WorkingSegment[], index: SnapIndex): void {
  const tol = index.tolerance;
  const boxes = working.map(seg => {
    const p = index.pointOf(seg.a);
    const q = index.pointOf(seg.b);
    return {
      minX: Math.min(p.x, q.x) - tol,
      maxX: Math.max(p.x, q.x) + tol,
      minY: Math.min(p.y, q.y) - tol,
      maxY: Math.max(p.y, q.y) + tol,
    };
  });

  // Sweep along x so only segments with overlapping x-spans are paired
  const order = working.map((_, i) => i).sort((i, j) => boxes[i].minX - boxes[j].minX || i - j);

  for (let oi = 0; oi < order.length; oi++) {
    const i = order[oi];
    for (let oj = oi + 1; oj < order.length; oj++) {
      const j = order[oj];
      if (boxes[j].minX > boxes[i].maxX) break;
      if (boxes[j].minY > boxes[i].maxY || boxes[i].minY > boxes[j].maxY) continue;
      cutPair(working[i], working[j], index);
    }
  }
}

function cutPair(s: WorkingSegment, t: WorkingSegment, index: SnapIndex): void {
  const tol = index.tolerance;
  const ends = (seg: WorkingSegment): [number, number] => [index.find(seg.a), index.find(seg.b)];
  const [sa, sb] = ends(s);
  const [ta, tb] = ends(t);

  const landsOn = (node: number, seg: WorkingSegment, a: number, b: number): boolean => {
    if (node === a || node === b) return false;
    const p = index.pointOf(node);
    const pa = index.pointOf(a);
    const pb = index.pointOf(b);
    if (distanceToSegment(p, pa, pb) > tol) return false;
    const param = projectParam(p, pa, pb);
    if (param <= 0 || param >= 1) return false;
    seg.cuts.add(node);
    return true;
  };

  // T-junctions and collinear overlaps
  let touched = false;
  touched = landsOn(ta, s, sa, sb) || touched;
  touched = landsOn(tb, s, sa, sb) || touched;
  touched = landsOn(sa, t, ta, tb) || touched;
  touched = landsOn(sb, t, ta, tb) || touched;
  if (touched) return;

  if (sa === ta || sa === tb || sb === ta || sb === tb) return;

  const hit = segmentIntersection(index.pointOf(sa), index.pointOf(sb), index.pointOf(ta), index.pointOf(tb));
  if (!hit) return;

  const node = index.resolve(hit.point);
  debug('graph', `Segments ${s.index} and ${t.index} cross at ${formatPoints([hit.point])}`);
  const root = index.find(node);
  if (root !== index.find(s.a) && root !== index.find(s.b)) s.cuts.add(node);
  if (root !== index.find(t.a) && root !== index.find(t.b)) t.cuts.add(node);
}

// =============================================================================
// Compaction
// =============================================================================

/**
 * Renumber representatives densely (creation order) and build incidence lists
 */
function compact(index: SnapIndex, edges: GraphEdge[], tolerance: number): PlanarGraph {
  const roots = index.representatives();
  const newId = new Map<number, number>();
  const nodes: GraphNode[] = roots.map((root, i) => {
    newId.set(root, i);
    const p: Point = index.pointOf(root);
    return { id: i, point: { x: p.x, y: p.y }, edges: [] };
  });

  const lookup = (id: number): number => {
    const mapped = newId.get(index.find(id));
    if (mapped === undefined) {
      throw new Error(`Vertex ${id} has no representative`);
    }
    return mapped;
  };

  const renumbered = edges.map(edge => {
    const a = lookup(edge.a);
    const b = lookup(edge.b);
    nodes[a].edges.push(edge.id);
    nodes[b].edges.push(edge.id);
    return { id: edge.id, a, b, source: edge.source };
  });

  return { nodes, edges: renumbered, tolerance };
}

// =============================================================================
// Queries
// =============================================================================

/**
 * The node at the other end of an edge
 */
export function otherEnd(edge: GraphEdge, nodeId: number): number {
  return edge.a === nodeId ? edge.b : edge.a;
}

/**
 * Edge endpoints as points
 */
export function edgePoints(graph: PlanarGraph, edge: GraphEdge): [Point, Point] {
  return [graph.nodes[edge.a].point, graph.nodes[edge.b].point];
}
