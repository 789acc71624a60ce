/**
 * Pattern errors and diagnostics
 *
 * Every failure the pipeline can report is a PatternError with a stable code
 * and a details record carrying enough geometry (coordinates, edge ids,
 * group ids) to find the problem in the source drawing.
 *
 * Fatal errors are thrown. Errors that only affect a local region are turned
 * into diagnostics with toDiagnostic() and returned alongside the results.
 */

import type { Point } from '../types';

export type PatternErrorCode =
  | 'config:invalid'
  | 'input:degenerate'
  | 'graph:open-path'
  | 'group:disconnected'
  | 'allowance:invalid-offset'
  | 'layout:oversized-shape';

export type DiagnosticCode =
  | PatternErrorCode
  | 'patch:degenerate'
  | 'allowance:hole-collapsed'
  | 'allowance:contains-outline'
  | 'allowance:no-overlap'
  | 'group:multiple-outlines'
  | 'group:outline-failed'
  | 'layout:within-page'
  | 'layout:no-overlap'
  | 'layout:all-placed';

export type DiagnosticSeverity = 'error' | 'warning';

export interface PatternDiagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  details: Record<string, unknown>;
}

// =============================================================================
// Base class
// =============================================================================

export abstract class PatternError extends Error {
  abstract readonly code: PatternErrorCode;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  toDiagnostic(severity: DiagnosticSeverity = 'error'): PatternDiagnostic {
    return { code: this.code, severity, message: this.message, details: this.details };
  }
}

// =============================================================================
// Error kinds
// =============================================================================

export class ConfigurationError extends PatternError {
  readonly code = 'config:invalid';
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, { problems });
    this.problems = problems;
  }
}

export type DegenerateReason = 'zero-length' | 'duplicate-edge';

export class DegenerateInputError extends PatternError {
  readonly code = 'input:degenerate';
  readonly reason: DegenerateReason;
  readonly segmentIndex: number;

  constructor(reason: DegenerateReason, segmentIndex: number, points: Point[], extra: Record<string, unknown> = {}) {
    const what = reason === 'zero-length'
      ? 'has zero length after snapping'
      : 'duplicates an existing edge';
    super(`Segment ${segmentIndex} ${what}`, { reason, segmentIndex, points, ...extra });
    this.reason = reason;
    this.segmentIndex = segmentIndex;
  }
}

export interface OpenEdgeInfo {
  edgeId: number;
  source: number;
  from: Point;
  to: Point;
  kind: 'dangling' | 'bridge';
}

export class OpenPathError extends PatternError {
  readonly code = 'graph:open-path';
  readonly edges: OpenEdgeInfo[];

  constructor(edges: OpenEdgeInfo[]) {
    const sources = Array.from(new Set(edges.map(e => e.source))).sort((a, b) => a - b);
    super(
      `Drawing is not fully closed: ${edges.length} edge(s) from segment(s) ${sources.join(', ')} border no patch`,
      { edges, sources },
    );
    this.edges = edges;
  }
}

export class DisconnectedGroupError extends PatternError {
  readonly code = 'group:disconnected';

  constructor(groupId: number, sewn: number[], remaining: number[]) {
    super(
      `Group ${groupId} cannot be sewn in order: patches ${remaining.join(', ')} share no edge with the assembly`,
      { groupId, sewn, remaining },
    );
  }
}

export class InvalidOffsetError extends PatternError {
  readonly code = 'allowance:invalid-offset';
  readonly groupId: number;

  constructor(groupId: number, reason: string, extra: Record<string, unknown> = {}) {
    super(`Seam allowance for group ${groupId} could not be made simple: ${reason}`, { groupId, reason, ...extra });
    this.groupId = groupId;
  }
}

export class OversizedShapeError extends PatternError {
  readonly code = 'layout:oversized-shape';
  readonly groupId: number;

  /**
   * @param required - smallest page (width, height) that would hold the shape, margins included
   */
  constructor(groupId: number, required: { width: number; height: number }, available: { width: number; height: number }) {
    super(
      `Group ${groupId} does not fit on any page in any rotation: needs at least ` +
      `${required.width.toFixed(3)} x ${required.height.toFixed(3)}, page is ` +
      `${available.width.toFixed(3)} x ${available.height.toFixed(3)}`,
      { groupId, required, available },
    );
    this.groupId = groupId;
  }
}

// =============================================================================
// Reporting
// =============================================================================

/**
 * Format a diagnostics batch for display
 */
export function formatDiagnostics(diagnostics: PatternDiagnostic[]): string {
  const errors = diagnostics.filter(d => d.severity === 'error');
  const warnings = diagnostics.filter(d => d.severity === 'warning');
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('PATTERN DIAGNOSTICS');
  lines.push('='.repeat(60));
  lines.push('');
  lines.push(`Status: ${errors.length === 0 ? '✓ CLEAN' : '✗ ISSUES FOUND'}`);
  lines.push(`Errors: ${errors.length}`);
  lines.push(`Warnings: ${warnings.length}`);

  for (const [title, marker, items] of [['ERRORS', '✗', errors], ['WARNINGS', '⚠', warnings]] as const) {
    if (items.length === 0) continue;
    lines.push('');
    lines.push('-'.repeat(60));
    lines.push(title);
    lines.push('-'.repeat(60));
    for (const item of items) {
      lines.push('');
      lines.push(`${marker} [${item.code}]`);
      lines.push(`  ${item.message}`);
      for (const [key, value] of Object.entries(item.details)) {
        if (value !== undefined) {
          lines.push(`  ${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
        }
      }
    }
  }

  lines.push('');
  lines.push('='.repeat(60));
  return lines.join('\n');
}
