/**
 * Layout Packer
 *
 * Places every allowance polygon's bounding rectangle on fixed-size pages.
 * Shapes go largest first; each lands on the first page with room for it in
 * any allowed orientation, and a new page opens when none has room.
 *
 * Spacing is enforced by inflating every rectangle by `spacing` on its right
 * and top and growing the usable area by the same amount, so neighbours end
 * up exactly `spacing` apart and nothing crosses into the margin.
 *
 * All positions are in drawing units with the page origin at its corner.
 */

import type { AllowancePolygon, PageLayout, PagePlacement, PlacementTransform, Point, Ring } from '../../types';
import { OversizedShapeError } from '../errors';
import { PageBin } from './rectPacker';
import { BoundsOps } from '../../utils/bounds';
import { rotatePoint, ringArea } from '../../utils/geometry2d';
import { debug } from '../../utils/debug';

export interface LayoutOptions {
  pageWidth: number;
  pageHeight: number;
  margin: number;
  spacing: number;
  /** Degrees between candidate orientations; 360 means no rotation */
  rotationStep: number;
  tolerance: number;
  /** Drawing units per inch, for error reports */
  unitsPerInch: number;
}

interface Orientation {
  rotation: number;
  ring: Ring;
  width: number;
  height: number;
  minX: number;
  minY: number;
}

/**
 * Candidate rotations k x step in [0, 360), tightest bounding box first
 */
export function candidateOrientations(ring: Ring, rotationStep: number): Orientation[] {
  const orientations: Orientation[] = [];
  for (let k = 0; k * rotationStep < 360; k++) {
    const rotation = k * rotationStep;
    const rotated = ring.map(p => rotatePoint(p, rotation));
    const bounds = BoundsOps.fromPoints(rotated);
    orientations.push({
      rotation,
      ring: rotated,
      width: BoundsOps.width(bounds),
      height: BoundsOps.height(bounds),
      minX: bounds.minX,
      minY: bounds.minY,
    });
  }
  return orientations.sort((a, b) => a.width * a.height - b.width * b.height || a.rotation - b.rotation);
}

/**
 * Apply a placement transform to a drawing-space point
 */
export function applyTransform(point: Point, transform: PlacementTransform): Point {
  const rotated = rotatePoint(point, transform.rotation);
  return { x: rotated.x + transform.dx, y: rotated.y + transform.dy };
}

export function layoutShapes(allowances: AllowancePolygon[], options: LayoutOptions): PageLayout[] {
  const { pageWidth, pageHeight, margin, spacing, tolerance } = options;
  const usableWidth = pageWidth - 2 * margin;
  const usableHeight = pageHeight - 2 * margin;

  // Largest first; group id keeps the order total
  const items = allowances
    .map(allowance => ({
      allowance,
      orientations: candidateOrientations(allowance.outer, options.rotationStep),
    }))
    .sort((a, b) => ringArea(b.allowance.outer) - ringArea(a.allowance.outer) || a.allowance.groupId - b.allowance.groupId);

  for (const { allowance, orientations } of items) {
    const fits = orientations.some(o => o.width <= usableWidth + tolerance && o.height <= usableHeight + tolerance);
    if (!fits) {
      const tightest = orientations[0];
      throw new OversizedShapeError(
        allowance.groupId,
        {
          width: (tightest.width + 2 * margin) / options.unitsPerInch,
          height: (tightest.height + 2 * margin) / options.unitsPerInch,
        },
        { width: pageWidth / options.unitsPerInch, height: pageHeight / options.unitsPerInch },
      );
    }
  }

  const bins: PageBin[] = [];
  const pages: PageLayout[] = [];

  for (const { allowance, orientations } of items) {
    const sizes = orientations.map(o => ({ width: o.width + spacing, height: o.height + spacing }));

    let pageIndex = bins.findIndex(bin => bin.findPosition(sizes) !== null);
    if (pageIndex === -1) {
      bins.push(new PageBin(usableWidth + spacing, usableHeight + spacing, tolerance));
      pages.push({ index: pages.length, width: pageWidth, height: pageHeight, margin, placements: [] });
      pageIndex = bins.length - 1;
      debug('layout', `Opened page ${pageIndex}`);
    }

    const bin = bins[pageIndex];
    const position = bin.findPosition(sizes);
    if (!position) {
      throw new Error(`Group ${allowance.groupId} no longer fits page ${pageIndex}`);
    }
    const orientation = orientations[position.candidate];
    const size = sizes[position.candidate];
    bin.place(position.x, position.y, size.width, size.height);

    const x = margin + position.x;
    const y = margin + position.y;
    const transform: PlacementTransform = {
      rotation: orientation.rotation,
      dx: x - orientation.minX,
      dy: y - orientation.minY,
    };
    const placement: PagePlacement = {
      groupId: allowance.groupId,
      page: pageIndex,
      x,
      y,
      rotation: orientation.rotation,
      transform,
      polygon: orientation.ring.map(p => ({ x: p.x + transform.dx, y: p.y + transform.dy })),
      width: orientation.width,
      height: orientation.height,
    };
    pages[pageIndex].placements.push(placement);

    debug('layout', `Group ${allowance.groupId} -> page ${pageIndex} at (${x.toFixed(3)}, ${y.toFixed(3)}), rotated ${orientation.rotation}`);
  }

  for (const page of pages) {
    page.placements.sort((a, b) => a.groupId - b.groupId);
  }

  debug('layout', `Packed ${items.length} shape(s) onto ${pages.length} page(s)`);
  return pages;
}
