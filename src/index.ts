/**
 * fpp-patterns - Public API
 *
 * Turns a bag of straight segments into a foundation paper piecing pattern:
 * - runPipeline() for one-shot batch runs
 * - createPatternStore() for interactive use with incremental recompute
 * - toPatternDocument() / toPreviewScene() for the renderers
 */

export type * from './types';

// Configuration
export {
  defaultPatternConfig,
  getPaperSizes,
  paperSizeInInches,
  resolveConfig,
  validateConfig,
  toDrawingUnits,
  effectiveMinPatchArea,
} from './config/patternConfig';
export type { PaperSize, PatternConfig, PatternConfigInput, ConfigValidationResult } from './config/patternConfig';
export { getColors, defaultColors } from './config/colors';
export type { ColorConfig, StrokeStyle } from './config/colors';

// Errors and diagnostics
export {
  PatternError,
  ConfigurationError,
  DegenerateInputError,
  OpenPathError,
  DisconnectedGroupError,
  InvalidOffsetError,
  OversizedShapeError,
  formatDiagnostics,
} from './engine/errors';
export type { PatternDiagnostic, DiagnosticCode, DiagnosticSeverity, PatternErrorCode, OpenEdgeInfo } from './engine/errors';

// Pipeline
export {
  runPipeline,
  runPatchStage,
  runGroupStage,
  runAllowanceStage,
  runLayoutStage,
  assembleResult,
} from './engine/Pipeline';
export type {
  PatternResult,
  PipelineOptions,
  PatchStageResult,
  GroupStageResult,
  AllowanceStageResult,
  LayoutStageResult,
} from './engine/Pipeline';

// Stages
export { buildPlanarGraph } from './engine/graph/planarGraph';
export type { GraphBuildOptions, GraphBuildResult } from './engine/graph/planarGraph';
export { extractPatches } from './engine/graph/patchExtractor';
export type { PatchExtractionOptions, PatchExtractionResult } from './engine/graph/patchExtractor';
export { detectGroups, computeSewingOrder } from './engine/grouping/groupDetector';
export { computeGroupOutlines } from './engine/grouping/groupOutline';
export { computeAllowances, offsetOutline } from './engine/seamAllowance/seamAllowance';
export { layoutShapes, applyTransform } from './engine/layout/pageLayout';
export type { LayoutOptions } from './engine/layout/pageLayout';

// Annotation
export { annotate, toColorLabel } from './engine/annotate/annotator';
export type { ColorSampler } from './engine/annotate/annotator';
export { closestColorName, groupDisplayColor } from './engine/annotate/colors';
export { groupPrefix, labelAnchor } from './engine/annotate/labels';

// Validators
export { checkAllowances, formatAllowanceCheckResult } from './engine/validators/AllowanceChecker';
export type { AllowanceCheckResult } from './engine/validators/AllowanceChecker';
export { checkLayout, formatLayoutCheckResult } from './engine/validators/LayoutChecker';
export type { LayoutCheckResult } from './engine/validators/LayoutChecker';

// Renderer payloads
export { toPatternDocument, toPreviewScene } from './engine/document';
export type { PatternDocument, DocumentPage, DocumentPiece, DocumentPatch, PreviewScene, PreviewPatch, PreviewGroup } from './engine/document';

// Store
export { createPatternStore, recomputeScope } from './store/patternStore';
export type { PatternState, PatternActions, PatternStore, RecomputeScope } from './store/patternStore';

// Logging
export {
  debug,
  enableDebugTag,
  disableDebugTag,
  setDebugTags,
  setDebugSink,
  getDebug,
  clearDebug,
  ALL_DEBUG_TAGS,
} from './utils/debug';
export type { DebugTag } from './utils/debug';
