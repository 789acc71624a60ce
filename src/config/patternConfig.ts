/**
 * Pattern configuration: page geometry, seam allowance and tolerances.
 *
 * Lengths the quilter thinks about (page, margin, allowance, spacing) are in
 * inches. The snapping tolerance and minimum patch area live in drawing
 * units because they describe the drawing, not the printout.
 */

import type { GroupingStrategy } from '../types';
import { ConfigurationError } from '../engine/errors';
import paperSizeData from './paperSizes.json';

export interface PaperSize {
  id: string;
  label: string;
  width: number;
  height: number;
  unit: 'in' | 'mm';
}

export interface PatternConfig {
  /** Page width (inches) */
  pageWidth: number;
  /** Page height (inches) */
  pageHeight: number;
  /** Unprintable border on every side (inches) */
  margin: number;
  /** Seam allowance added around each group (inches) */
  seamAllowance: number;
  /** Minimum gap between shapes on a page (inches) */
  spacing: number;
  /** Drawing units per inch (96 for SVG user units) */
  unitsPerInch: number;
  /** Snapping tolerance in drawing units */
  tolerance: number;
  /** Degrees between candidate orientations when packing */
  rotationStep: number;
  /** Convex corners whose miter would exceed miterLimit x allowance are clipped */
  miterLimit: number;
  /** Patches smaller than this (drawing units squared) are discarded */
  minPatchArea?: number;
  grouping: GroupingStrategy;
  /** Throw on zero-length or duplicate segments instead of skipping them */
  strictInput: boolean;
}

export type PatternConfigInput = Partial<PatternConfig> & {
  /** Preset id from paperSizes.json; explicit pageWidth/pageHeight win */
  paperSize?: string;
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export const defaultPatternConfig: PatternConfig = {
  pageWidth: 8.5,
  pageHeight: 11,
  margin: 0.5,
  seamAllowance: 0.25,
  spacing: 0.1,
  unitsPerInch: 96,
  tolerance: 1e-6,
  rotationStep: 90,
  miterLimit: 2,
  grouping: 'connected',
  strictInput: true,
};

const MM_PER_INCH = 25.4;

// =============================================================================
// Paper sizes
// =============================================================================

export function getPaperSizes(): PaperSize[] {
  return paperSizeData.paperSizes.map((size) => ({
    id: size.id,
    label: size.label,
    width: size.width,
    height: size.height,
    unit: size.unit === 'mm' ? 'mm' : 'in',
  }));
}

/**
 * Page dimensions of a preset in inches, or null for an unknown id
 */
export function paperSizeInInches(id: string): { width: number; height: number } | null {
  const size = getPaperSizes().find(s => s.id === id);
  if (!size) return null;
  const factor = size.unit === 'mm' ? 1 / MM_PER_INCH : 1;
  return { width: size.width * factor, height: size.height * factor };
}

// =============================================================================
// Validation
// =============================================================================

const isPositive = (value: number): boolean => Number.isFinite(value) && value > 0;

export function validateConfig(config: PatternConfig): ConfigValidationResult {
  const errors: string[] = [];

  const positive = [
    'pageWidth', 'pageHeight', 'margin', 'seamAllowance', 'unitsPerInch', 'tolerance', 'rotationStep',
  ] as const;
  for (const key of positive) {
    if (!isPositive(config[key])) {
      errors.push(`${key} must be a positive number (got ${config[key]})`);
    }
  }

  if (!Number.isFinite(config.spacing) || config.spacing < 0) {
    errors.push(`spacing must be zero or positive (got ${config.spacing})`);
  }
  if (!Number.isFinite(config.miterLimit) || config.miterLimit < 1) {
    errors.push(`miterLimit must be at least 1 (got ${config.miterLimit})`);
  }
  if (config.rotationStep > 360) {
    errors.push(`rotationStep must not exceed 360 (got ${config.rotationStep})`);
  }
  if (config.minPatchArea !== undefined && (!Number.isFinite(config.minPatchArea) || config.minPatchArea < 0)) {
    errors.push(`minPatchArea must be zero or positive (got ${config.minPatchArea})`);
  }
  if (config.grouping !== 'connected' && config.grouping !== 'straight-seam') {
    errors.push(`grouping must be 'connected' or 'straight-seam' (got ${String(config.grouping)})`);
  }

  // Usable area must hold at least the allowance band of a vanishing shape
  const usableWidth = config.pageWidth - 2 * config.margin;
  const usableHeight = config.pageHeight - 2 * config.margin;
  if (usableWidth <= 0 || usableHeight <= 0) {
    errors.push(`margin ${config.margin} leaves no usable area on a ${config.pageWidth} x ${config.pageHeight} page`);
  } else if (2 * config.seamAllowance >= Math.min(usableWidth, usableHeight)) {
    errors.push(`seamAllowance ${config.seamAllowance} leaves no usable area inside the ${usableWidth} x ${usableHeight} printable region`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Merge input over the defaults and validate.
 * @throws ConfigurationError listing every problem found
 */
export function resolveConfig(input: PatternConfigInput = {}): PatternConfig {
  const { paperSize, ...overrides } = input;
  const preset: Partial<PatternConfig> = {};

  if (paperSize !== undefined) {
    const size = paperSizeInInches(paperSize);
    if (!size) {
      throw new ConfigurationError([`unknown paper size '${paperSize}'`]);
    }
    preset.pageWidth = size.width;
    preset.pageHeight = size.height;
  }

  const base = defaultPatternConfig;
  const config: PatternConfig = {
    pageWidth: overrides.pageWidth ?? preset.pageWidth ?? base.pageWidth,
    pageHeight: overrides.pageHeight ?? preset.pageHeight ?? base.pageHeight,
    margin: overrides.margin ?? base.margin,
    seamAllowance: overrides.seamAllowance ?? base.seamAllowance,
    spacing: overrides.spacing ?? base.spacing,
    unitsPerInch: overrides.unitsPerInch ?? base.unitsPerInch,
    tolerance: overrides.tolerance ?? base.tolerance,
    rotationStep: overrides.rotationStep ?? base.rotationStep,
    miterLimit: overrides.miterLimit ?? base.miterLimit,
    minPatchArea: overrides.minPatchArea ?? base.minPatchArea,
    grouping: overrides.grouping ?? base.grouping,
    strictInput: overrides.strictInput ?? base.strictInput,
  };

  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(result.errors);
  }
  return config;
}

/**
 * Convert an inch measurement to drawing units
 */
export const toDrawingUnits = (config: PatternConfig, inches: number): number => inches * config.unitsPerInch;

/**
 * Effective minimum patch area in drawing units squared
 */
export const effectiveMinPatchArea = (config: PatternConfig): number =>
  config.minPatchArea ?? 100 * config.tolerance * config.tolerance;
