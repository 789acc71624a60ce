/**
 * Renderer payloads
 *
 * The document renderer gets pages of placed pieces in page coordinates; the
 * preview renderer gets the unshifted patch geometry in drawing coordinates.
 * Both carry labels and colors from the annotation maps and the stroke
 * styles from the color config, so renderers need no pipeline knowledge.
 */

import type { Bounds2D, ColorLabel, Point, RGBTuple, Ring } from '../types';
import type { PatternResult } from './Pipeline';
import { getColors, type ColorConfig } from '../config/colors';
import { applyTransform } from './layout/pageLayout';
import { BoundsOps } from '../utils/bounds';

// =============================================================================
// Pattern document
// =============================================================================

export interface DocumentPatch {
  patchId: number;
  label: string;
  /** Sewing line, page coordinates */
  outline: Ring;
  anchor: Point;
  color?: ColorLabel;
}

export interface DocumentPiece {
  groupId: number;
  label: string;
  rotation: number;
  /** Cutting line (seam allowance), page coordinates */
  cutLine: Ring;
  cutHoles: Ring[];
  patches: DocumentPatch[];
  color?: ColorLabel;
}

export interface DocumentPage {
  index: number;
  width: number;
  height: number;
  margin: number;
  pieces: DocumentPiece[];
}

export interface PatternDocument {
  unitsPerInch: number;
  pages: DocumentPage[];
  style: ColorConfig['page'];
}

export function toPatternDocument(result: PatternResult): PatternDocument {
  const { annotations, grouping, patches } = result;
  const allowanceByGroup = new Map(result.allowances.map(a => [a.groupId, a]));

  const pages = result.pages.map((page): DocumentPage => ({
    index: page.index,
    width: page.width,
    height: page.height,
    margin: page.margin,
    pieces: page.placements.map((placement): DocumentPiece => {
      const move = (ring: Ring): Ring => ring.map(p => applyTransform(p, placement.transform));
      const group = grouping.groups[placement.groupId];
      const groupNote = annotations.groups.get(placement.groupId);
      const allowance = allowanceByGroup.get(placement.groupId);

      return {
        groupId: placement.groupId,
        label: groupNote?.label ?? '',
        rotation: placement.rotation,
        cutLine: placement.polygon,
        cutHoles: allowance ? allowance.holes.map(move) : [],
        color: groupNote?.color,
        patches: group.sewingOrder.map((patchId): DocumentPatch => {
          const note = annotations.patches.get(patchId);
          const patch = patches[patchId];
          return {
            patchId,
            label: note?.label ?? '',
            outline: move(patch.points),
            anchor: applyTransform(note?.anchor ?? patch.points[0], placement.transform),
            color: note?.color,
          };
        }),
      };
    }),
  }));

  return { unitsPerInch: result.config.unitsPerInch, pages, style: getColors().page };
}

// =============================================================================
// Preview scene
// =============================================================================

export interface PreviewPatch {
  patchId: number;
  groupId: number;
  label: string;
  points: Ring;
  holes: Ring[];
  anchor: Point;
  /** Sampled fabric color when known, else the group's preview color */
  fill: RGBTuple;
  colorName?: string;
}

export interface PreviewGroup {
  groupId: number;
  label: string;
  outline: Ring;
  holes: Ring[];
  displayColor: RGBTuple;
}

export interface PreviewScene {
  bounds: Bounds2D;
  patches: PreviewPatch[];
  groups: PreviewGroup[];
  style: ColorConfig['preview'];
  fillOpacity: number;
}

export function toPreviewScene(result: PatternResult): PreviewScene {
  const { annotations, grouping } = result;

  const patches = result.patches.map((patch): PreviewPatch => {
    const groupId = grouping.groupIdByPatch[patch.id];
    const note = annotations.patches.get(patch.id);
    const groupNote = annotations.groups.get(groupId);
    return {
      patchId: patch.id,
      groupId,
      label: note?.label ?? '',
      points: patch.points,
      holes: patch.holes,
      anchor: note?.anchor ?? patch.points[0],
      fill: note?.color?.color ?? groupNote?.displayColor ?? [255, 255, 255],
      colorName: note?.color?.name,
    };
  });

  const groups = result.outlines.map((outline): PreviewGroup => {
    const note = annotations.groups.get(outline.groupId);
    return {
      groupId: outline.groupId,
      label: note?.label ?? '',
      outline: outline.outer,
      holes: outline.holes,
      displayColor: note?.displayColor ?? [255, 255, 255],
    };
  });

  const bounds = result.patches.length > 0
    ? result.patches.map(p => p.bounds).reduce(BoundsOps.union)
    : BoundsOps.fromPoints([]);

  return {
    bounds,
    patches,
    groups,
    style: getColors().preview,
    fillOpacity: getColors().opacity.fill,
  };
}
