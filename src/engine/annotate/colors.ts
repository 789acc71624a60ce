/**
 * Color naming and preview palette
 */

import type { RGBTuple } from '../../types';
import { getColors } from '../../config/colors';
import colorNameData from '../../config/colorNames.json';

interface NamedColor {
  name: string;
  rgb: RGBTuple;
}

/**
 * Parse '#rrggbb' (or 'rrggbb')
 */
export function hexToRgb(hex: string): RGBTuple {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
  if (!match) {
    throw new Error(`Not a hex color: '${hex}'`);
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

export function rgbToHex([r, g, b]: RGBTuple): string {
  return '#' + [r, g, b].map(v => Math.round(v).toString(16).padStart(2, '0')).join('');
}

let namedColors: NamedColor[] | null = null;

function getNamedColors(): NamedColor[] {
  if (!namedColors) {
    namedColors = colorNameData.colors.map(c => ({ name: c.name, rgb: hexToRgb(c.hex) }));
  }
  return namedColors;
}

/**
 * Name of the table color closest to `rgb` (squared RGB distance).
 * An exact match wins outright; on a tie the earlier table entry wins.
 */
export function closestColorName(rgb: RGBTuple): string {
  const table = getNamedColors();
  let best = table[0];
  let bestDistance = Infinity;
  for (const entry of table) {
    const dr = entry.rgb[0] - rgb[0];
    const dg = entry.rgb[1] - rgb[1];
    const db = entry.rgb[2] - rgb[2];
    const d = dr * dr + dg * dg + db * db;
    if (d === 0) return entry.name;
    if (d < bestDistance) {
      best = entry;
      bestDistance = d;
    }
  }
  return best.name;
}

// =============================================================================
// Preview palette
// =============================================================================

const GOLDEN_ANGLE = 137.50776405003785;

/**
 * HSL (h in degrees, s and l in 0..1) to 8-bit RGB
 */
export function hslToRgb(h: number, s: number, l: number): RGBTuple {
  const hue = ((h % 360) + 360) % 360;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = l - c / 2;
  const [r, g, b] =
    hue < 60 ? [c, x, 0] :
    hue < 120 ? [x, c, 0] :
    hue < 180 ? [0, c, x] :
    hue < 240 ? [0, x, c] :
    hue < 300 ? [x, 0, c] :
    [c, 0, x];
  return [Math.round((r + m) * 255), Math.round((g + m) * 255), Math.round((b + m) * 255)];
}

/**
 * Deterministic pastel fill for a group: consecutive ids sit a golden angle
 * apart on the hue wheel
 */
export function groupDisplayColor(groupId: number): RGBTuple {
  const { saturation, lightness, hueOffset } = getColors().groupFill;
  return hslToRgb(hueOffset + groupId * GOLDEN_ANGLE, saturation, lightness);
}
