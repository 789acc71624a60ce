/**
 * Pattern store - holds the drawing, the configuration and the last result,
 * and recomputes only the stages a change invalidates:
 * - seam allowance or miter limit or units: allowances and layout
 * - page size, margin, spacing or rotation step: layout only
 * - anything else, or a new drawing: the whole pipeline
 */

import { createStore } from 'zustand/vanilla';
import type { Segment } from '../types';
import {
  defaultPatternConfig,
  resolveConfig,
  type PatternConfig,
  type PatternConfigInput,
} from '../config/patternConfig';
import { PatternError } from '../engine/errors';
import {
  assembleResult,
  runAllowanceStage,
  runGroupStage,
  runLayoutStage,
  runPatchStage,
  type AllowanceStageResult,
  type GroupStageResult,
  type LayoutStageResult,
  type PatchStageResult,
  type PatternResult,
} from '../engine/Pipeline';
import type { ColorSampler } from '../engine/annotate/annotator';
import { debug } from '../utils/debug';

export type RecomputeScope = 'full' | 'allowance' | 'layout';

interface StageCache {
  patch: PatchStageResult;
  group: GroupStageResult;
  allowance: AllowanceStageResult;
  layout: LayoutStageResult;
}

export interface PatternState {
  segments: Segment[];
  config: PatternConfig;
  sampler: ColorSampler | undefined;
  result: PatternResult | null;
  /** Set when the last recompute failed; result is null then */
  error: PatternError | null;
  /** Scope of the last recompute, null before the first */
  lastRecompute: RecomputeScope | null;
  stages: StageCache | null;
}

export interface PatternActions {
  load: (segments: Segment[], sampler?: ColorSampler) => void;
  setConfig: (changes: PatternConfigInput) => void;
  reset: () => void;
}

export type PatternStore = PatternState & PatternActions;

const ALLOWANCE_KEYS = ['seamAllowance', 'miterLimit', 'unitsPerInch'] as const;
const LAYOUT_KEYS = ['pageWidth', 'pageHeight', 'margin', 'spacing', 'rotationStep'] as const;
const FULL_KEYS = ['tolerance', 'minPatchArea', 'grouping', 'strictInput'] as const;

/**
 * Narrowest recompute that covers the difference between two configs
 */
export function recomputeScope(before: PatternConfig, after: PatternConfig): RecomputeScope | null {
  if (FULL_KEYS.some(key => before[key] !== after[key])) return 'full';
  if (ALLOWANCE_KEYS.some(key => before[key] !== after[key])) return 'allowance';
  if (LAYOUT_KEYS.some(key => before[key] !== after[key])) return 'layout';
  return null;
}

function runStages(
  segments: Segment[],
  config: PatternConfig,
  scope: RecomputeScope,
  cache: StageCache | null,
): StageCache {
  const patch = scope === 'full' || !cache ? runPatchStage(segments, config) : cache.patch;
  const group = scope === 'full' || !cache ? runGroupStage(patch, config) : cache.group;
  const allowance = scope !== 'layout' || !cache ? runAllowanceStage(group.outlines, config) : cache.allowance;
  const layout = runLayoutStage(allowance.allowances, config);
  return { patch, group, allowance, layout };
}

const initialState: PatternState = {
  segments: [],
  config: defaultPatternConfig,
  sampler: undefined,
  result: null,
  error: null,
  lastRecompute: null,
  stages: null,
};

export const createPatternStore = (config: PatternConfigInput = {}) =>
  createStore<PatternStore>()((set, get) => {
    const recompute = (segments: Segment[], next: PatternConfig, scope: RecomputeScope, sampler: ColorSampler | undefined): void => {
      debug('pipeline', `Recompute (${scope})`);
      try {
        const stages = runStages(segments, next, scope, scope === 'full' ? null : get().stages);
        const result = assembleResult(next, stages.patch, stages.group, stages.allowance, stages.layout, sampler);
        set({ segments, config: next, sampler, stages, result, error: null, lastRecompute: scope });
      } catch (error) {
        if (!(error instanceof PatternError)) throw error;
        debug('pipeline', `Recompute failed: ${error.message}`);
        set({ segments, config: next, sampler, stages: null, result: null, error, lastRecompute: scope });
      }
    };

    return {
      ...initialState,
      config: resolveConfig(config),

      load: (segments, sampler) => {
        recompute(segments, get().config, 'full', sampler);
      },

      setConfig: (changes) => {
        const { config: current, segments, sampler, stages } = get();
        const { paperSize, ...rest } = changes;

        let next: PatternConfig;
        try {
          // A preset replaces the current page size unless explicit sizes come with it
          next = paperSize !== undefined
            ? resolveConfig({ ...current, pageWidth: undefined, pageHeight: undefined, ...rest, paperSize })
            : resolveConfig({ ...current, ...rest });
        } catch (error) {
          if (!(error instanceof PatternError)) throw error;
          set({ error, result: null, stages: null });
          return;
        }

        if (!stages && segments.length === 0) {
          set({ config: next, error: null });
          return;
        }

        const scope = stages ? recomputeScope(current, next) : 'full';
        if (scope === null) {
          set({ config: next });
          return;
        }
        recompute(segments, next, scope, sampler);
      },

      reset: () => {
        set({ ...initialState, config: resolveConfig(config) });
      },
    };
  });
