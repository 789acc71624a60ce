/**
 * Group outlines: the union of each group's patch polygons. Interior seams
 * dissolve; holes survive.
 */

import type { Group, GroupOutline, Patch } from '../../types';
import type { PatternDiagnostic } from '../errors';
import { regionArea, unionRegions, type Region } from '../../utils/polygonBoolean';
import { debug, formatPoints } from '../../utils/debug';

export interface GroupOutlineResult {
  outlines: GroupOutline[];
  diagnostics: PatternDiagnostic[];
}

export function computeGroupOutlines(groups: Group[], patches: Patch[]): GroupOutlineResult {
  const outlines: GroupOutline[] = [];
  const diagnostics: PatternDiagnostic[] = [];

  for (const group of groups) {
    let regions: Region[];
    try {
      regions = unionRegions(group.patchIds.map(id => ({
        outer: patches[id].points,
        holes: patches[id].holes,
      })));
    } catch (e) {
      // The group gets no outline and so no allowance; the other groups go on
      const reason = e instanceof Error ? e.message : String(e);
      debug('groups', `Group ${group.id}: outline union failed: ${reason}`);
      diagnostics.push({
        code: 'group:outline-failed',
        severity: 'error',
        message: `Could not merge the patches of group ${group.id} into an outline: ${reason}`,
        details: { groupId: group.id, patchIds: group.patchIds, reason },
      });
      continue;
    }

    if (regions.length === 0) {
      debug('groups', `Group ${group.id}: union is empty`);
      continue;
    }

    if (regions.length > 1) {
      // Patches that only touch at a vertex union into separate pieces
      const dropped = regions.slice(1);
      debug('groups', `Group ${group.id}: union has ${regions.length} parts, keeping the largest; dropped ${dropped.map(r => formatPoints(r.outer)).join(' | ')}`);
      diagnostics.push({
        code: 'group:multiple-outlines',
        severity: 'warning',
        message: `Group ${group.id} unions into ${regions.length} separate outlines; only the largest is kept`,
        details: { groupId: group.id, droppedAreas: dropped.map(regionArea) },
      });
    }

    const [main] = regions;
    if (main.holes.length > 0) {
      debug('groups', `Group ${group.id}: outline has ${main.holes.length} hole(s)`);
    }
    outlines.push({ groupId: group.id, outer: main.outer, holes: main.holes });
  }

  return { outlines, diagnostics };
}
