/**
 * Pipeline - Main entry point for turning a drawing into a pattern
 *
 * Stages run strictly in order, each consuming only the previous stages'
 * immutable output:
 *   graph + patches -> groups + outlines -> allowances -> page layout
 *
 * Local failures (open paths, a group whose offset fails, degenerate faces)
 * are collected as diagnostics. Structural failures throw, and nothing is
 * returned for that run.
 */

import type {
  AllowancePolygon,
  AnnotationMap,
  GroupOutline,
  GroupingResult,
  PageLayout,
  Patch,
  PlanarGraph,
  Segment,
} from '../types';
import type { PatternDiagnostic } from './errors';
import {
  effectiveMinPatchArea,
  resolveConfig,
  toDrawingUnits,
  type PatternConfig,
  type PatternConfigInput,
} from '../config/patternConfig';
import { buildPlanarGraph } from './graph/planarGraph';
import { extractPatches } from './graph/patchExtractor';
import { detectGroups } from './grouping/groupDetector';
import { computeGroupOutlines } from './grouping/groupOutline';
import { computeAllowances } from './seamAllowance/seamAllowance';
import { layoutShapes } from './layout/pageLayout';
import { annotate, type ColorSampler } from './annotate/annotator';
import { checkAllowances } from './validators/AllowanceChecker';
import { checkLayout } from './validators/LayoutChecker';
import { debug } from '../utils/debug';

// =============================================================================
// Stage results
// =============================================================================

export interface PatchStageResult {
  graph: PlanarGraph;
  patches: Patch[];
  patchesByEdge: number[][];
  diagnostics: PatternDiagnostic[];
}

export interface GroupStageResult {
  grouping: GroupingResult;
  outlines: GroupOutline[];
  diagnostics: PatternDiagnostic[];
}

export interface AllowanceStageResult {
  allowances: AllowancePolygon[];
  diagnostics: PatternDiagnostic[];
}

export interface LayoutStageResult {
  pages: PageLayout[];
  diagnostics: PatternDiagnostic[];
}

export interface PatternResult {
  config: PatternConfig;
  graph: PlanarGraph;
  patches: Patch[];
  patchesByEdge: number[][];
  grouping: GroupingResult;
  outlines: GroupOutline[];
  allowances: AllowancePolygon[];
  pages: PageLayout[];
  annotations: AnnotationMap;
  diagnostics: PatternDiagnostic[];
}

export interface PipelineOptions {
  sampler?: ColorSampler;
}

// =============================================================================
// Stages
// =============================================================================

/**
 * Planar graph and patches
 */
export function runPatchStage(segments: Segment[], config: PatternConfig): PatchStageResult {
  const { graph, skipped } = buildPlanarGraph(segments, {
    tolerance: config.tolerance,
    strict: config.strictInput,
  });
  const extraction = extractPatches(graph, { minArea: effectiveMinPatchArea(config) });

  const diagnostics: PatternDiagnostic[] = [
    ...skipped.map(error => error.toDiagnostic('warning')),
    ...(extraction.openPath ? [extraction.openPath.toDiagnostic()] : []),
    ...extraction.discarded,
  ];

  return {
    graph,
    patches: extraction.patches,
    patchesByEdge: extraction.patchesByEdge,
    diagnostics,
  };
}

/**
 * Groups, sewing order and group outlines
 */
export function runGroupStage(stage: PatchStageResult, config: PatternConfig): GroupStageResult {
  const grouping = detectGroups(stage.patches, stage.patchesByEdge, {
    strategy: config.grouping,
    tolerance: config.tolerance,
  });
  const { outlines, diagnostics } = computeGroupOutlines(grouping.groups, stage.patches);
  return { grouping, outlines, diagnostics };
}

/**
 * Seam allowance per group, verified against the outlines
 */
export function runAllowanceStage(outlines: GroupOutline[], config: PatternConfig): AllowanceStageResult {
  const result = computeAllowances(outlines, {
    distance: toDrawingUnits(config, config.seamAllowance),
    miterLimit: config.miterLimit,
    tolerance: config.tolerance,
  });

  const check = checkAllowances(outlines, result.allowances, config.tolerance);
  const diagnostics: PatternDiagnostic[] = [
    ...result.diagnostics,
    ...[...check.errors, ...check.warnings].map(issue => ({
      code: issue.rule,
      severity: issue.severity,
      message: issue.message,
      details: issue.details,
    })),
  ];

  return { allowances: result.allowances, diagnostics };
}

/**
 * Page layout, verified after packing
 * @throws OversizedShapeError when a shape fits no page
 */
export function runLayoutStage(allowances: AllowancePolygon[], config: PatternConfig): LayoutStageResult {
  const spacing = toDrawingUnits(config, config.spacing);
  const pages = layoutShapes(allowances, {
    pageWidth: toDrawingUnits(config, config.pageWidth),
    pageHeight: toDrawingUnits(config, config.pageHeight),
    margin: toDrawingUnits(config, config.margin),
    spacing,
    rotationStep: config.rotationStep,
    tolerance: config.tolerance,
    unitsPerInch: config.unitsPerInch,
  });

  const check = checkLayout(pages, {
    spacing,
    tolerance: config.tolerance,
    expectedGroupIds: allowances.map(a => a.groupId),
  });
  const diagnostics: PatternDiagnostic[] = [...check.errors, ...check.warnings].map(issue => ({
    code: issue.rule,
    severity: issue.severity,
    message: issue.message,
    details: issue.details,
  }));

  return { pages, diagnostics };
}

// =============================================================================
// Full run
// =============================================================================

export function runPipeline(
  segments: Segment[],
  input: PatternConfigInput | PatternConfig = {},
  options: PipelineOptions = {},
): PatternResult {
  const config = resolveConfig(input);
  debug('pipeline', `Running on ${segments.length} segment(s)`);

  const patchStage = runPatchStage(segments, config);
  const groupStage = runGroupStage(patchStage, config);
  const allowanceStage = runAllowanceStage(groupStage.outlines, config);
  const layoutStage = runLayoutStage(allowanceStage.allowances, config);

  return assembleResult(config, patchStage, groupStage, allowanceStage, layoutStage, options.sampler);
}

/**
 * Combine stage outputs into one result. Diagnostics are listed in stage order.
 */
export function assembleResult(
  config: PatternConfig,
  patchStage: PatchStageResult,
  groupStage: GroupStageResult,
  allowanceStage: AllowanceStageResult,
  layoutStage: LayoutStageResult,
  sampler?: ColorSampler,
): PatternResult {
  const diagnostics = [
    ...patchStage.diagnostics,
    ...groupStage.diagnostics,
    ...allowanceStage.diagnostics,
    ...layoutStage.diagnostics,
  ];

  debug('pipeline', `Done: ${patchStage.patches.length} patch(es), ${groupStage.grouping.groups.length} group(s), ` +
    `${layoutStage.pages.length} page(s), ${diagnostics.length} diagnostic(s)`);

  return {
    config,
    graph: patchStage.graph,
    patches: patchStage.patches,
    patchesByEdge: patchStage.patchesByEdge,
    grouping: groupStage.grouping,
    outlines: groupStage.outlines,
    allowances: allowanceStage.allowances,
    pages: layoutStage.pages,
    annotations: annotate(patchStage.patches, groupStage.grouping.groups, sampler),
    diagnostics,
  };
}
