/**
 * Patch Extractor
 *
 * Enumerates the bounded faces of a planar graph with the usual
 * angular face-tracing walk:
 * - every edge becomes two half-edges (2e: a->b, 2e+1: b->a)
 * - outgoing half-edges at each node are sorted by angle
 * - after arriving at v along h, leave along the half-edge immediately
 *   clockwise of h's twin; this keeps the face on the left, so bounded faces
 *   come out counter-clockwise and each component's outer face clockwise
 *
 * Edges that cannot border two faces (dangling chains, bridges between
 * closed regions) are pruned first and reported as one OpenPathError.
 * Components nested inside a face become holes of that face.
 */

import type { Bounds2D, PlanarGraph, Patch, Point, Ring } from '../../types';
import { OpenPathError, type OpenEdgeInfo, type PatternDiagnostic } from '../errors';
import { BoundsOps } from '../../utils/bounds';
import { ensureClockwise, pointInRing, signedArea } from '../../utils/geometry2d';
import { debug, formatPoints } from '../../utils/debug';

export interface PatchExtractionOptions {
  /** Faces with less area than this are discarded (drawing units squared) */
  minArea: number;
}

export interface PatchExtractionResult {
  patches: Patch[];
  /** patchesByEdge[edgeId]: ids of the patches bordering that edge (0, 1 or 2) */
  patchesByEdge: number[][];
  /** Edges excluded because they do not close a region, or null */
  openPath: OpenPathError | null;
  /** Discarded zero-area or below-threshold faces */
  discarded: PatternDiagnostic[];
}

interface TracedFace {
  order: number;
  halfEdges: number[];
  nodeIds: number[];
  ring: Ring;
  area: number;
}

// =============================================================================
// Entry point
// =============================================================================

export function extractPatches(graph: PlanarGraph, options: PatchExtractionOptions): PatchExtractionResult {
  const active = new Array<boolean>(graph.edges.length).fill(true);
  const open: OpenEdgeInfo[] = [];

  let faces = traceFaces(graph, active);
  for (;;) {
    const dangling = pruneDangling(graph, active);
    for (const edgeId of dangling) open.push(openEdgeInfo(graph, edgeId, 'dangling'));
    if (dangling.length > 0) faces = traceFaces(graph, active);

    const bridges = findBridges(graph, active, faces);
    if (bridges.length === 0) break;
    for (const edgeId of bridges) {
      active[edgeId] = false;
      open.push(openEdgeInfo(graph, edgeId, 'bridge'));
    }
    faces = traceFaces(graph, active);
  }

  if (open.length > 0) {
    debug('patches', `Excluded ${open.length} open-path edge(s): ${open.map(e => `#${e.edgeId} (segment ${e.source})`).join(', ')}`);
  }

  const bounded = faces.filter(f => f.area > 0);
  const outlines = faces.filter(f => f.area <= 0);

  const discarded: PatternDiagnostic[] = [];
  const kept = bounded.filter(face => {
    if (face.area >= options.minArea) return true;
    debug('patches', `Discarding degenerate face (area ${face.area.toExponential(3)}): ${formatPoints(face.ring)}`);
    discarded.push({
      code: 'patch:degenerate',
      severity: 'warning',
      message: `Discarded a face with area ${face.area.toExponential(3)} below the ${options.minArea.toExponential(3)} minimum`,
      details: { area: face.area, nodeIds: face.nodeIds, points: face.ring },
    });
    return false;
  });

  const holesByFace = assignHoles(kept, outlines);

  const ordered = kept
    .map(face => ({ face, bounds: BoundsOps.fromPoints(face.ring) }))
    .sort((p, q) => BoundsOps.compareOrigin(p.bounds, q.bounds, graph.tolerance) || p.face.order - q.face.order);

  const patches: Patch[] = ordered.map(({ face, bounds }, id) => toPatch(graph, face, bounds, id, holesByFace.get(face.order) ?? []));

  const patchesByEdge: number[][] = graph.edges.map(() => []);
  for (const patch of patches) {
    for (const edgeId of patch.edgeIds) {
      patchesByEdge[edgeId].push(patch.id);
    }
  }

  debug('patches', `Extracted ${patches.length} patch(es), discarded ${discarded.length}`);

  return {
    patches,
    patchesByEdge,
    openPath: open.length > 0 ? new OpenPathError(open) : null,
    discarded,
  };
}

// =============================================================================
// Face tracing
// =============================================================================

const edgeOf = (h: number): number => h >> 1;
const twin = (h: number): number => h ^ 1;

function origin(graph: PlanarGraph, h: number): number {
  const edge = graph.edges[edgeOf(h)];
  return (h & 1) === 0 ? edge.a : edge.b;
}

function dest(graph: PlanarGraph, h: number): number {
  const edge = graph.edges[edgeOf(h)];
  return (h & 1) === 0 ? edge.b : edge.a;
}

function traceFaces(graph: PlanarGraph, active: boolean[]): TracedFace[] {
  // Outgoing half-edges per node, sorted counter-clockwise by angle
  const outgoing: number[][] = graph.nodes.map(() => []);
  const position = new Map<number, number>();

  for (const node of graph.nodes) {
    const list: Array<{ h: number; angle: number }> = [];
    for (const edgeId of node.edges) {
      if (!active[edgeId]) continue;
      const edge = graph.edges[edgeId];
      const h = edge.a === node.id ? 2 * edgeId : 2 * edgeId + 1;
      const to = graph.nodes[dest(graph, h)].point;
      list.push({ h, angle: Math.atan2(to.y - node.point.y, to.x - node.point.x) });
    }
    list.sort((p, q) => p.angle - q.angle || p.h - q.h);
    outgoing[node.id] = list.map(item => item.h);
    list.forEach((item, i) => position.set(item.h, i));
  }

  const next = (h: number): number => {
    const v = dest(graph, h);
    const around = outgoing[v];
    const i = position.get(twin(h));
    if (i === undefined) {
      throw new Error(`Half-edge ${twin(h)} missing from node ${v}`);
    }
    return around[(i - 1 + around.length) % around.length];
  };

  const visited = new Array<boolean>(graph.edges.length * 2).fill(false);
  const faces: TracedFace[] = [];

  for (let start = 0; start < graph.edges.length * 2; start++) {
    if (!active[edgeOf(start)] || visited[start]) continue;

    const halfEdges: number[] = [];
    let h = start;
    do {
      visited[h] = true;
      halfEdges.push(h);
      h = next(h);
    } while (h !== start);

    const nodeIds = halfEdges.map(e => origin(graph, e));
    const ring = nodeIds.map(id => graph.nodes[id].point);
    faces.push({ order: faces.length, halfEdges, nodeIds, ring, area: signedArea(ring) });
  }

  return faces;
}

// =============================================================================
// Open paths
// =============================================================================

/**
 * Repeatedly remove edges hanging off degree-1 nodes
 */
function pruneDangling(graph: PlanarGraph, active: boolean[]): number[] {
  const degree = graph.nodes.map(node => node.edges.filter(e => active[e]).length);
  const queue = graph.nodes.filter(node => degree[node.id] === 1).map(node => node.id);
  const removed: number[] = [];

  while (queue.length > 0) {
    const nodeId = queue.shift();
    if (nodeId === undefined || degree[nodeId] !== 1) continue;
    const edgeId = graph.nodes[nodeId].edges.find(e => active[e]);
    if (edgeId === undefined) continue;

    active[edgeId] = false;
    removed.push(edgeId);
    const edge = graph.edges[edgeId];
    const other = edge.a === nodeId ? edge.b : edge.a;
    degree[nodeId]--;
    degree[other]--;
    if (degree[other] === 1) queue.push(other);
  }

  return removed.sort((a, b) => a - b);
}

/**
 * Edges whose two sides belong to the same traced face
 */
function findBridges(graph: PlanarGraph, active: boolean[], faces: TracedFace[]): number[] {
  const faceOf = new Array<number>(graph.edges.length * 2).fill(-1);
  for (const face of faces) {
    for (const h of face.halfEdges) faceOf[h] = face.order;
  }
  const bridges: number[] = [];
  for (let e = 0; e < graph.edges.length; e++) {
    if (active[e] && faceOf[2 * e] === faceOf[2 * e + 1]) bridges.push(e);
  }
  return bridges;
}

function openEdgeInfo(graph: PlanarGraph, edgeId: number, kind: OpenEdgeInfo['kind']): OpenEdgeInfo {
  const edge = graph.edges[edgeId];
  return {
    edgeId,
    source: edge.source,
    from: graph.nodes[edge.a].point,
    to: graph.nodes[edge.b].point,
    kind,
  };
}

// =============================================================================
// Holes
// =============================================================================

/**
 * Attach each component outline lying inside a bounded face to the smallest
 * such face. Outlines inside no face bound the unbounded region.
 */
function assignHoles(faces: TracedFace[], outlines: TracedFace[]): Map<number, Ring[]> {
  const holes = new Map<number, Ring[]>();

  for (const outline of outlines) {
    const nodes = new Set(outline.nodeIds);
    const probe = outline.ring[0];
    let host: TracedFace | null = null;

    for (const face of faces) {
      if (face.nodeIds.some(id => nodes.has(id))) continue;
      if (!pointInRing(probe, face.ring)) continue;
      if (!host || face.area < host.area) host = face;
    }

    if (host) {
      const list = holes.get(host.order) ?? [];
      list.push(ensureClockwise(outline.ring));
      holes.set(host.order, list);
      debug('patches', `Island of ${outline.nodeIds.length} node(s) recorded as a hole`);
    }
  }

  return holes;
}

// =============================================================================
// Patch records
// =============================================================================

function toPatch(graph: PlanarGraph, face: TracedFace, bounds: Bounds2D, id: number, holes: Ring[]): Patch {
  // Start the cycle at its lowest node id so the record is canonical
  let start = 0;
  for (let i = 1; i < face.nodeIds.length; i++) {
    if (face.nodeIds[i] < face.nodeIds[start]) start = i;
  }
  const rotate = <T>(items: T[]): T[] => [...items.slice(start), ...items.slice(0, start)];

  const nodeIds = rotate(face.nodeIds);
  const edgeIds = rotate(face.halfEdges.map(edgeOf));
  const points: Point[] = nodeIds.map(n => ({ ...graph.nodes[n].point }));
  const holeArea = holes.reduce((sum, ring) => sum + Math.abs(signedArea(ring)), 0);

  return {
    id,
    nodeIds,
    edgeIds,
    points,
    holes,
    area: face.area - holeArea,
    bounds,
  };
}
