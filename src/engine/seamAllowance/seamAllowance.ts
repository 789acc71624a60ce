/**
 * Seam Allowance Engine
 *
 * Grows each group outline outward by the allowance distance and shrinks its
 * holes by the same amount. Groups are independent, so a group whose offset
 * cannot be made simple is reported and skipped without affecting the rest.
 */

import type { AllowancePolygon, GroupOutline, Ring } from '../../types';
import { InvalidOffsetError, type PatternDiagnostic } from '../errors';
import { offsetRing, selectEnclosingRegion, sweepRing } from './offsetRing';
import type { Region } from '../../utils/polygonBoolean';
import {
  ensureClockwise,
  ensureCounterClockwise,
  removeCollinearPoints,
  ringArea,
} from '../../utils/geometry2d';
import { debug, formatPoints } from '../../utils/debug';

export interface AllowanceOptions {
  /** Offset distance in drawing units */
  distance: number;
  miterLimit: number;
  tolerance: number;
}

export interface AllowanceResult {
  /** One entry per successfully offset group, in group order */
  allowances: AllowancePolygon[];
  failures: InvalidOffsetError[];
  diagnostics: PatternDiagnostic[];
}

export function computeAllowances(outlines: GroupOutline[], options: AllowanceOptions): AllowanceResult {
  const allowances: AllowancePolygon[] = [];
  const failures: InvalidOffsetError[] = [];
  const diagnostics: PatternDiagnostic[] = [];

  for (const outline of outlines) {
    try {
      const { allowance, collapsedHoles } = offsetOutline(outline, options);
      allowances.push(allowance);
      for (const hole of collapsedHoles) {
        debug('allowance', `Group ${outline.groupId}: hole closed up by the allowance: ${formatPoints(hole)}`);
        diagnostics.push({
          code: 'allowance:hole-collapsed',
          severity: 'warning',
          message: `A hole in group ${outline.groupId} is narrower than twice the allowance and was filled`,
          details: { groupId: outline.groupId, hole },
        });
      }
    } catch (error) {
      if (!(error instanceof InvalidOffsetError)) throw error;
      debug('allowance', error.message);
      failures.push(error);
      diagnostics.push(error.toDiagnostic());
    }
  }

  debug('allowance', `Offset ${allowances.length} of ${outlines.length} group outline(s) by ${options.distance}`);
  return { allowances, failures, diagnostics };
}

/**
 * Offset a single outline.
 * @throws InvalidOffsetError when no simple polygon encloses the outline
 */
export function offsetOutline(
  outline: GroupOutline,
  options: AllowanceOptions,
): { allowance: AllowancePolygon; collapsedHoles: Ring[] } {
  const { distance, miterLimit, tolerance } = options;
  const outer = removeCollinearPoints(ensureCounterClockwise(outline.outer), tolerance);

  if (outer.length < 3 || ringArea(outer) <= 0) {
    throw new InvalidOffsetError(outline.groupId, 'outline has no area', { points: outline.outer });
  }

  const grown = sweep(outline.groupId, outer, distance, miterLimit);
  const enclosing = selectEnclosingRegion(grown, outer, tolerance);
  if (!enclosing) {
    throw new InvalidOffsetError(outline.groupId, 'no simple polygon of the offset encloses the outline', {
      points: offsetRing(outer, distance, miterLimit),
      regions: grown.length,
    });
  }
  for (const pocket of enclosing.holes) {
    debug('allowance', `Group ${outline.groupId}: dropped pocket closed off by the offset: ${formatPoints(pocket)}`);
  }
  const cut = removeCollinearPoints(enclosing.outer, tolerance);

  const holes: Ring[] = [];
  const collapsedHoles: Ring[] = [];
  for (const hole of outline.holes) {
    const inner = removeCollinearPoints(ensureCounterClockwise(hole), tolerance);
    const parts = inner.length >= 3 ? sweep(outline.groupId, inner, -distance, miterLimit) : [];
    if (parts.length === 0) {
      collapsedHoles.push(hole);
      continue;
    }
    for (const part of parts) {
      holes.push(ensureClockwise(removeCollinearPoints(part.outer, tolerance)));
    }
  }

  const area = ringArea(cut) - holes.reduce((sum, h) => sum + ringArea(h), 0);
  return {
    allowance: { groupId: outline.groupId, distance, outer: cut, holes, area },
    collapsedHoles,
  };
}

function sweep(groupId: number, ring: Ring, distance: number, miterLimit: number): Region[] {
  try {
    return sweepRing(ring, distance, miterLimit);
  } catch (error) {
    // The boolean engine gives up on near-degenerate input
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidOffsetError(groupId, `offset boundary could not be resolved: ${reason}`, { points: ring });
  }
}
