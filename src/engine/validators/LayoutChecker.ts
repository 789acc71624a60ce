/**
 * Layout Checker - Validates page placements
 *
 * Rules validated:
 * 1. layout:within-page - Every placed polygon stays inside the printable
 *    area (page minus margins)
 * 2. layout:no-overlap - No two polygons on the same page intersect; pairs
 *    closer than the configured spacing are warnings
 * 3. layout:all-placed - Every group is placed exactly once
 */

import type { PageLayout, PagePlacement } from '../../types';
import { BoundsOps } from '../../utils/bounds';
import { intersectionArea, type Region } from '../../utils/polygonBoolean';

// =============================================================================
// Types
// =============================================================================

export type LayoutRuleId = 'layout:within-page' | 'layout:no-overlap' | 'layout:all-placed';

export interface LayoutValidationError {
  rule: LayoutRuleId;
  severity: 'error' | 'warning';
  message: string;
  details: {
    groupId?: number;
    otherGroupId?: number;
    page?: number;
    [key: string]: unknown;
  };
}

export interface LayoutCheckResult {
  valid: boolean;
  errors: LayoutValidationError[];
  warnings: LayoutValidationError[];
  summary: {
    rulesChecked: LayoutRuleId[];
    errorCount: number;
    warningCount: number;
    pageCount: number;
    placementCount: number;
    pairsChecked: number;
  };
}

export interface LayoutCheckOptions {
  /** Required gap between shapes (drawing units) */
  spacing: number;
  tolerance: number;
  /** Group ids that must appear exactly once */
  expectedGroupIds: number[];
}

// =============================================================================
// Layout Checker Class
// =============================================================================

export class LayoutChecker {
  private errors: LayoutValidationError[] = [];
  private warnings: LayoutValidationError[] = [];
  private rulesChecked = new Set<LayoutRuleId>();
  private pairsChecked = 0;

  constructor(private readonly pages: PageLayout[], private readonly options: LayoutCheckOptions) {}

  check(): LayoutCheckResult {
    this.errors = [];
    this.warnings = [];
    this.rulesChecked.clear();
    this.pairsChecked = 0;

    this.checkWithinPage();
    this.checkNoOverlap();
    this.checkAllPlaced();

    return this.buildResult();
  }

  private buildResult(): LayoutCheckResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      summary: {
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        warningCount: this.warnings.length,
        pageCount: this.pages.length,
        placementCount: this.pages.reduce((sum, p) => sum + p.placements.length, 0),
        pairsChecked: this.pairsChecked,
      },
    };
  }

  private addError(rule: LayoutRuleId, message: string, details: LayoutValidationError['details']): void {
    this.errors.push({ rule, severity: 'error', message, details });
  }

  // ===========================================================================
  // Rule: layout:within-page
  // ===========================================================================

  private checkWithinPage(): void {
    this.rulesChecked.add('layout:within-page');
    const tol = this.options.tolerance;

    for (const page of this.pages) {
      const printable = {
        minX: page.margin,
        minY: page.margin,
        maxX: page.width - page.margin,
        maxY: page.height - page.margin,
      };
      for (const placement of page.placements) {
        const bounds = BoundsOps.fromPoints(placement.polygon);
        if (!BoundsOps.contains(printable, bounds, tol)) {
          this.addError('layout:within-page', `Group ${placement.groupId} extends past the printable area of page ${page.index}`, {
            groupId: placement.groupId,
            page: page.index,
            bounds,
            printable,
          });
        }
      }
    }
  }

  // ===========================================================================
  // Rule: layout:no-overlap
  // ===========================================================================

  private checkNoOverlap(): void {
    this.rulesChecked.add('layout:no-overlap');
    const { spacing, tolerance } = this.options;

    for (const page of this.pages) {
      const boxes = page.placements.map(p => BoundsOps.fromPoints(p.polygon));
      for (let i = 0; i < page.placements.length; i++) {
        for (let j = i + 1; j < page.placements.length; j++) {
          this.pairsChecked++;
          const a = page.placements[i];
          const b = page.placements[j];

          if (BoundsOps.overlaps(boxes[i], boxes[j], tolerance)) {
            const shared = intersectionArea(polygonRegion(a), polygonRegion(b));
            if (shared === null) {
              this.warnings.push({
                rule: 'layout:no-overlap',
                severity: 'warning',
                message: `Could not measure the overlap of groups ${a.groupId} and ${b.groupId} on page ${page.index}`,
                details: { groupId: a.groupId, otherGroupId: b.groupId, page: page.index },
              });
              continue;
            }
            if (shared > tolerance) {
              this.addError('layout:no-overlap', `Groups ${a.groupId} and ${b.groupId} overlap on page ${page.index}`, {
                groupId: a.groupId,
                otherGroupId: b.groupId,
                page: page.index,
                area: shared,
              });
              continue;
            }
          }

          const gap = BoundsOps.gap(boxes[i], boxes[j]);
          if (gap < spacing - tolerance) {
            this.warnings.push({
              rule: 'layout:no-overlap',
              severity: 'warning',
              message: `Groups ${a.groupId} and ${b.groupId} are ${gap.toFixed(4)} apart on page ${page.index}, closer than the ${spacing} spacing`,
              details: { groupId: a.groupId, otherGroupId: b.groupId, page: page.index, gap },
            });
          }
        }
      }
    }
  }

  // ===========================================================================
  // Rule: layout:all-placed
  // ===========================================================================

  private checkAllPlaced(): void {
    this.rulesChecked.add('layout:all-placed');

    const counts = new Map<number, number>();
    for (const page of this.pages) {
      for (const placement of page.placements) {
        counts.set(placement.groupId, (counts.get(placement.groupId) ?? 0) + 1);
      }
    }

    for (const groupId of this.options.expectedGroupIds) {
      const count = counts.get(groupId) ?? 0;
      if (count !== 1) {
        this.addError('layout:all-placed', `Group ${groupId} is placed ${count} time(s)`, { groupId, count });
      }
    }
    for (const groupId of counts.keys()) {
      if (!this.options.expectedGroupIds.includes(groupId)) {
        this.addError('layout:all-placed', `Placed group ${groupId} is not part of the pattern`, { groupId });
      }
    }
  }
}

function polygonRegion(placement: PagePlacement): Region {
  return { outer: placement.polygon, holes: [] };
}

// =============================================================================
// Convenience Functions
// =============================================================================

export function checkLayout(pages: PageLayout[], options: LayoutCheckOptions): LayoutCheckResult {
  return new LayoutChecker(pages, options).check();
}

/**
 * Format check results for display
 */
export function formatLayoutCheckResult(result: LayoutCheckResult): string {
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('LAYOUT CHECK RESULTS');
  lines.push('='.repeat(60));
  lines.push('');
  lines.push(`Status: ${result.valid ? '✓ VALID' : '✗ INVALID'}`);
  lines.push(`Errors: ${result.summary.errorCount}`);
  lines.push(`Warnings: ${result.summary.warningCount}`);
  lines.push(`Pages: ${result.summary.pageCount}`);
  lines.push(`Placements: ${result.summary.placementCount}`);
  lines.push(`Pairs Checked: ${result.summary.pairsChecked}`);
  lines.push('');

  if (result.errors.length > 0) {
    lines.push('-'.repeat(60));
    lines.push('ERRORS');
    lines.push('-'.repeat(60));
    for (const error of result.errors) {
      lines.push('');
      lines.push(`✗ [${error.rule}]`);
      lines.push(`  ${error.message}`);
    }
    lines.push('');
  }

  if (result.warnings.length > 0) {
    lines.push('-'.repeat(60));
    lines.push('WARNINGS');
    lines.push('-'.repeat(60));
    for (const warning of result.warnings) {
      lines.push('');
      lines.push(`⚠ [${warning.rule}]`);
      lines.push(`  ${warning.message}`);
    }
    lines.push('');
  }

  lines.push('='.repeat(60));

  return lines.join('\n');
}
