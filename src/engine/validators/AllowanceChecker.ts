/**
 * Allowance Checker - Validates seam allowance polygons against their outlines
 *
 * Rules validated:
 * 1. allowance:contains-outline - Every allowance covers its group outline
 * 2. allowance:no-overlap - Allowances of different groups do not overlap
 *    (warning: groups sewn along a shared seam overlap there by design)
 *
 * Algorithm:
 * 1. Containment: area of (outline - allowance) must vanish
 * 2. Overlap: bounding boxes first, exact polygon intersection for the
 *    pairs whose boxes overlap
 */

import type { AllowancePolygon, GroupOutline, Ring } from '../../types';
import { BoundsOps } from '../../utils/bounds';
import { distance } from '../../utils/geometry2d';
import { differenceArea, intersectionArea } from '../../utils/polygonBoolean';

// =============================================================================
// Types
// =============================================================================

export type AllowanceRuleId = 'allowance:contains-outline' | 'allowance:no-overlap';

export interface AllowanceValidationError {
  rule: AllowanceRuleId;
  severity: 'error' | 'warning';
  message: string;
  details: {
    groupId?: number;
    otherGroupId?: number;
    area?: number;
    [key: string]: unknown;
  };
}

export interface AllowanceCheckResult {
  valid: boolean;
  errors: AllowanceValidationError[];
  warnings: AllowanceValidationError[];
  summary: {
    rulesChecked: AllowanceRuleId[];
    errorCount: number;
    warningCount: number;
    allowanceCount: number;
    pairsChecked: number;
  };
}

const perimeter = (ring: Ring): number =>
  ring.reduce((sum, p, i) => sum + distance(p, ring[(i + 1) % ring.length]), 0);

// =============================================================================
// Allowance Checker Class
// =============================================================================

export class AllowanceChecker {
  private errors: AllowanceValidationError[] = [];
  private warnings: AllowanceValidationError[] = [];
  private rulesChecked = new Set<AllowanceRuleId>();
  private pairsChecked = 0;

  constructor(
    private readonly outlines: GroupOutline[],
    private readonly allowances: AllowancePolygon[],
    private readonly tolerance: number,
  ) {}

  /**
   * Run all allowance checks and return results
   */
  check(): AllowanceCheckResult {
    this.errors = [];
    this.warnings = [];
    this.rulesChecked.clear();
    this.pairsChecked = 0;

    this.checkContainsOutline();
    this.checkNoOverlap();

    return this.buildResult();
  }

  private buildResult(): AllowanceCheckResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      summary: {
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        warningCount: this.warnings.length,
        allowanceCount: this.allowances.length,
        pairsChecked: this.pairsChecked,
      },
    };
  }

  // Area noise allowed along a boundary of the given length
  private areaTolerance(ring: Ring): number {
    return this.tolerance * perimeter(ring);
  }

  // ===========================================================================
  // Rule: allowance:contains-outline
  // ===========================================================================

  private checkContainsOutline(): void {
    this.rulesChecked.add('allowance:contains-outline');

    for (const allowance of this.allowances) {
      const outline = this.outlines.find(o => o.groupId === allowance.groupId);
      if (!outline) continue;

      const uncovered = differenceArea(outline, allowance);
      if (uncovered === null) {
        this.warnings.push({
          rule: 'allowance:contains-outline',
          severity: 'warning',
          message: `Could not verify that the allowance of group ${allowance.groupId} covers its outline`,
          details: { groupId: allowance.groupId },
        });
        continue;
      }
      if (uncovered > this.areaTolerance(outline.outer)) {
        this.errors.push({
          rule: 'allowance:contains-outline',
          severity: 'error',
          message: `Allowance of group ${allowance.groupId} leaves ${uncovered.toExponential(3)} of the outline uncovered`,
          details: { groupId: allowance.groupId, area: uncovered },
        });
      }
    }
  }

  // ===========================================================================
  // Rule: allowance:no-overlap
  // ===========================================================================

  private checkNoOverlap(): void {
    this.rulesChecked.add('allowance:no-overlap');

    const boxes = this.allowances.map(a => BoundsOps.fromPoints(a.outer));
    for (let i = 0; i < this.allowances.length; i++) {
      for (let j = i + 1; j < this.allowances.length; j++) {
        if (!BoundsOps.overlaps(boxes[i], boxes[j], this.tolerance)) continue;
        this.pairsChecked++;

        const a = this.allowances[i];
        const b = this.allowances[j];
        const shared = intersectionArea(a, b);
        if (shared === null) {
          this.warnings.push({
            rule: 'allowance:no-overlap',
            severity: 'warning',
            message: `Could not measure the overlap of the allowances of groups ${a.groupId} and ${b.groupId}`,
            details: { groupId: a.groupId, otherGroupId: b.groupId },
          });
          continue;
        }
        const limit = Math.min(this.areaTolerance(a.outer), this.areaTolerance(b.outer));
        if (shared > limit) {
          this.warnings.push({
            rule: 'allowance:no-overlap',
            severity: 'warning',
            message: `Allowances of groups ${a.groupId} and ${b.groupId} overlap by ${shared.toExponential(3)}`,
            details: { groupId: a.groupId, otherGroupId: b.groupId, area: shared },
          });
        }
      }
    }
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

export function checkAllowances(
  outlines: GroupOutline[],
  allowances: AllowancePolygon[],
  tolerance: number,
): AllowanceCheckResult {
  return new AllowanceChecker(outlines, allowances, tolerance).check();
}

/**
 * Format check results for display
 */
export function formatAllowanceCheckResult(result: AllowanceCheckResult): string {
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('ALLOWANCE CHECK RESULTS');
  lines.push('='.repeat(60));
  lines.push('');
  lines.push(`Status: ${result.valid ? '✓ VALID' : '✗ INVALID'}`);
  lines.push(`Errors: ${result.summary.errorCount}`);
  lines.push(`Warnings: ${result.summary.warningCount}`);
  lines.push(`Allowances Checked: ${result.summary.allowanceCount}`);
  lines.push(`Pairs Checked: ${result.summary.pairsChecked}`);
  lines.push(`Rules Checked: ${result.summary.rulesChecked.length}`);
  lines.push('');

  for (const [title, marker, items] of [['ERRORS', '✗', result.errors], ['WARNINGS', '⚠', result.warnings]] as const) {
    if (items.length === 0) continue;
    lines.push('-'.repeat(60));
    lines.push(title);
    lines.push('-'.repeat(60));
    for (const item of items) {
      lines.push('');
      lines.push(`${marker} [${item.rule}]`);
      lines.push(`  ${item.message}`);
      for (const [key, value] of Object.entries(item.details)) {
        if (value !== undefined) {
          lines.push(`  ${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
        }
      }
    }
    lines.push('');
  }

  lines.push('='.repeat(60));

  return lines.join('\n');
}
