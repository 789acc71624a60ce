/**
 * Group Detector
 *
 * Clusters patches that share edges into sewing units and gives each unit a
 * piecing sequence. Patches arrive sorted by bounding-box origin, so the
 * lowest patch id in any set is also its extremal patch.
 *
 * Strategies:
 * - 'connected': connected components of the patch adjacency graph
 * - 'straight-seam': grow each group from its extremal patch, admitting a
 *   neighbour only when it meets the assembly along one straight seam
 */

import type { Group, GroupingResult, GroupingStrategy, Patch } from '../../types';
import { DisconnectedGroupError } from '../errors';
import { distanceToSegment } from '../../utils/geometry2d';
import { debug } from '../../utils/debug';

export interface GroupDetectionOptions {
  strategy: GroupingStrategy;
  /** Collinearity tolerance for straight seams (drawing units) */
  tolerance: number;
}

/**
 * adjacency[p]: ids of the patches sharing at least one edge with p, ascending
 */
export function buildAdjacency(patches: Patch[], patchesByEdge: number[][]): number[][] {
  const neighbours = patches.map(() => new Set<number>());
  for (const owners of patchesByEdge) {
    if (owners.length !== 2) continue;
    const [p, q] = owners;
    if (p === q) continue;
    neighbours[p].add(q);
    neighbours[q].add(p);
  }
  return neighbours.map(set => Array.from(set).sort((a, b) => a - b));
}

export function detectGroups(
  patches: Patch[],
  patchesByEdge: number[][],
  options: GroupDetectionOptions,
): GroupingResult {
  const adjacency = buildAdjacency(patches, patchesByEdge);

  const groups = options.strategy === 'straight-seam'
    ? growStraightSeamGroups(patches, patchesByEdge, adjacency, options.tolerance)
    : connectedGroups(patches, adjacency);

  const groupIdByPatch = new Array<number>(patches.length).fill(-1);
  for (const group of groups) {
    for (const patchId of group.patchIds) groupIdByPatch[patchId] = group.id;
  }

  debug('groups', `${options.strategy}: ${patches.length} patch(es) -> ${groups.length} group(s)`);
  for (const group of groups) {
    debug('groups', `Group ${group.id}: sewing order ${group.sewingOrder.join(' -> ')}`);
  }

  return { groups, groupIdByPatch };
}

// =============================================================================
// Connected components
// =============================================================================

function connectedGroups(patches: Patch[], adjacency: number[][]): Group[] {
  const parent = patches.map(p => p.id);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  adjacency.forEach((neighbours, p) => {
    for (const q of neighbours) {
      const rp = find(p);
      const rq = find(q);
      // Keep the smaller id as root so roots are the extremal patches
      if (rp < rq) parent[rq] = rp;
      else if (rq < rp) parent[rp] = rq;
    }
  });

  const members = new Map<number, number[]>();
  for (const patch of patches) {
    const root = find(patch.id);
    const list = members.get(root) ?? [];
    list.push(patch.id);
    members.set(root, list);
  }

  // Map iteration follows first insertion, i.e. ascending root id
  return Array.from(members.values()).map((patchIds, id) => ({
    id,
    patchIds,
    sewingOrder: computeSewingOrder(id, patchIds, adjacency),
  }));
}

/**
 * Greedy piecing sequence: start at the extremal patch, then keep appending
 * the smallest-id unsewn patch that touches the assembly.
 * @throws DisconnectedGroupError when some member cannot be reached
 */
export function computeSewingOrder(groupId: number, patchIds: number[], adjacency: number[][]): number[] {
  if (patchIds.length === 0) return [];
  const members = new Set(patchIds);
  const start = Math.min(...patchIds);
  const order = [start];
  const sewn = new Set(order);

  while (order.length < patchIds.length) {
    let nextPatch = -1;
    for (const patchId of order) {
      for (const q of adjacency[patchId]) {
        if (members.has(q) && !sewn.has(q) && (nextPatch < 0 || q < nextPatch)) {
          nextPatch = q;
        }
      }
    }
    if (nextPatch < 0) {
      const remaining = patchIds.filter(p => !sewn.has(p));
      throw new DisconnectedGroupError(groupId, [...order], remaining);
    }
    order.push(nextPatch);
    sewn.add(nextPatch);
  }

  return order;
}

// =============================================================================
// Straight-seam growth
// =============================================================================

function growStraightSeamGroups(
  patches: Patch[],
  patchesByEdge: number[][],
  adjacency: number[][],
  tolerance: number,
): Group[] {
  const assigned = new Array<boolean>(patches.length).fill(false);
  const groups: Group[] = [];

  for (const seed of patches) {
    if (assigned[seed.id]) continue;

    const order = [seed.id];
    const inGroup = new Set(order);
    assigned[seed.id] = true;

    let grew = true;
    while (grew) {
      grew = false;
      const candidates = Array.from(new Set(order.flatMap(p => adjacency[p])))
        .filter(q => !assigned[q])
        .sort((a, b) => a - b);

      for (const q of candidates) {
        if (joinsAlongStraightSeam(patches[q], inGroup, patchesByEdge, tolerance)) {
          order.push(q);
          inGroup.add(q);
          assigned[q] = true;
          grew = true;
          break;
        }
      }
    }

    groups.push({
      id: groups.length,
      patchIds: [...order].sort((a, b) => a - b),
      sewingOrder: order,
    });
  }

  return groups;
}

/**
 * True when the edges `patch` shares with the assembly form one contiguous
 * run along its boundary and that run lies on a single line.
 */
export function joinsAlongStraightSeam(
  patch: Patch,
  assembly: Set<number>,
  patchesByEdge: number[][],
  tolerance: number,
): boolean {
  const n = patch.edgeIds.length;
  const shared = patch.edgeIds.map(edgeId =>
    patchesByEdge[edgeId].some(owner => owner !== patch.id && assembly.has(owner)));

  const sharedCount = shared.filter(Boolean).length;
  if (sharedCount === 0 || sharedCount === n) return false;

  // Exactly one run in the cyclic sequence: exactly one false -> true step
  let runStart = -1;
  let runs = 0;
  for (let i = 0; i < n; i++) {
    if (shared[i] && !shared[(i - 1 + n) % n]) {
      runs++;
      runStart = i;
    }
  }
  if (runs !== 1) return false;

  // Nodes along the run: points[runStart] .. points[runStart + sharedCount]
  const runPoints = Array.from({ length: sharedCount + 1 }, (_, k) => patch.points[(runStart + k) % n]);
  const first = runPoints[0];
  const last = runPoints[runPoints.length - 1];
  return runPoints.every(p => distanceToSegment(p, first, last) <= tolerance);
}
