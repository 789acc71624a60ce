/**
 * Test Validators
 *
 * Validators are modules (not tests) that perform specific validation checks.
 * They are primarily used by integration tests to validate pipeline outputs.
 *
 * The actual validator implementations live in src/engine/validators/.
 * This module re-exports them and provides a unified validatePattern() function.
 */

export { AllowanceChecker, checkAllowances } from '../../src/engine/validators/AllowanceChecker';
export type { AllowanceCheckResult, AllowanceValidationError, AllowanceRuleId } from '../../src/engine/validators/AllowanceChecker';

export { LayoutChecker, checkLayout } from '../../src/engine/validators/LayoutChecker';
export type { LayoutCheckResult, LayoutValidationError, LayoutRuleId } from '../../src/engine/validators/LayoutChecker';

import type { PatternResult } from '../../src/engine/Pipeline';
import { toDrawingUnits } from '../../src/config/patternConfig';
import { checkAllowances, type AllowanceCheckResult } from '../../src/engine/validators/AllowanceChecker';
import { checkLayout, type LayoutCheckResult } from '../../src/engine/validators/LayoutChecker';

// =============================================================================
// Unified Validation Interface
// =============================================================================

export interface PatternValidationOptions {
  /** Include warnings in valid check (default: false) */
  failOnWarnings?: boolean;
}

export interface PatternValidationResult {
  valid: boolean;
  allowances: AllowanceCheckResult;
  layout: LayoutCheckResult;
  summary: {
    totalErrors: number;
    totalWarnings: number;
    rulesChecked: string[];
  };
}

/**
 * Run all validators on a pipeline result and return combined results.
 */
export function validatePattern(
  result: PatternResult,
  options: PatternValidationOptions = {},
): PatternValidationResult {
  const { config } = result;
  const allowances = checkAllowances(result.outlines, result.allowances, config.tolerance);
  const layout = checkLayout(result.pages, {
    spacing: toDrawingUnits(config, config.spacing),
    tolerance: config.tolerance,
    expectedGroupIds: result.allowances.map(a => a.groupId),
  });

  const totalErrors = allowances.errors.length + layout.errors.length;
  const totalWarnings = allowances.warnings.length + layout.warnings.length;

  return {
    valid: totalErrors === 0 && (!options.failOnWarnings || totalWarnings === 0),
    allowances,
    layout,
    summary: {
      totalErrors,
      totalWarnings,
      rulesChecked: [...allowances.summary.rulesChecked, ...layout.summary.rulesChecked],
    },
  };
}
