/**
 * Color/Label Annotator
 *
 * Builds the attribute maps renderers read: a label and anchor per patch, a
 * label and preview color per group, and, when a sampler is supplied, the
 * sampled fabric color with its name. Geometry is never touched.
 */

import type { AnnotationMap, ColorLabel, GroupAnnotation, Group, Patch, PatchAnnotation, Point, RGBTuple } from '../../types';
import { closestColorName, groupDisplayColor } from './colors';
import { groupPrefix, labelAnchor, labelPatches } from './labels';

/**
 * Samples the source drawing's embedded image at a drawing-space point.
 * Returns null where the image has nothing to offer.
 */
export type ColorSampler = (point: Point, patchId: number) => RGBTuple | null;

export function annotate(patches: Patch[], groups: Group[], sampler?: ColorSampler): AnnotationMap {
  const labels = labelPatches(groups);
  const patchNotes = new Map<number, PatchAnnotation>();

  for (const patch of patches) {
    const anchor = labelAnchor(patch);
    const note: PatchAnnotation = {
      patchId: patch.id,
      label: labels.get(patch.id) ?? '',
      anchor,
    };
    const rgb = sampler?.(anchor, patch.id) ?? null;
    if (rgb) {
      note.color = toColorLabel(rgb);
    }
    patchNotes.set(patch.id, note);
  }

  const groupNotes = new Map<number, GroupAnnotation>();
  for (const group of groups) {
    const note: GroupAnnotation = {
      groupId: group.id,
      label: groupPrefix(group.id),
      displayColor: groupDisplayColor(group.id),
    };
    // A group takes the fabric of the first patch sewn
    const first = group.sewingOrder.length > 0 ? patchNotes.get(group.sewingOrder[0]) : undefined;
    if (first?.color) {
      note.color = first.color;
    }
    groupNotes.set(group.id, note);
  }

  return { patches: patchNotes, groups: groupNotes };
}

export function toColorLabel(rgb: RGBTuple): ColorLabel {
  return { color: rgb, name: closestColorName(rgb) };
}
