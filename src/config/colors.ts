/**
 * Centralized color configuration for renderer payloads.
 * Stroke and text colors the document and preview renderers should use live
 * here so every output agrees.
 */

export interface StrokeStyle {
  color: string;
  /** Line width in points */
  width: number;
  /** Dash pattern in points; empty for a solid line */
  dash: number[];
}

export interface ColorConfig {
  // ===== Printed pages =====
  page: {
    cutLine: StrokeStyle;      // Seam allowance outline (cut here)
    seamLine: StrokeStyle;     // Patch boundaries inside a group (sew here)
    margin: StrokeStyle;       // Printable area guide
    label: string;             // Patch and group labels
    colorName: string;         // Fabric color name under a label
  };

  // ===== Preview image =====
  preview: {
    background: string;
    outline: StrokeStyle;      // Patch boundaries
    groupOutline: StrokeStyle; // Group boundaries
    label: string;
  };

  // ===== Group fills (preview) =====
  groupFill: {
    saturation: number;        // 0..1
    lightness: number;         // 0..1, pastel when high
    hueOffset: number;         // Degrees for group 0
  };

  opacity: {
    fill: number;              // 0.6
    faint: number;             // 0.2
  };
}

export const defaultColors: ColorConfig = {
  page: {
    cutLine: { color: '#000000', width: 1, dash: [] },
    seamLine: { color: '#000000', width: 0.5, dash: [4, 2] },
    margin: { color: '#cccccc', width: 0.25, dash: [2, 2] },
    label: '#000000',
    colorName: '#555555',
  },

  preview: {
    background: '#ffffff',
    outline: { color: '#333333', width: 1, dash: [] },
    groupOutline: { color: '#000000', width: 2, dash: [] },
    label: '#222222',
  },

  groupFill: {
    saturation: 0.55,
    lightness: 0.8,
    hueOffset: 0,
  },

  opacity: {
    fill: 0.6,
    faint: 0.2,
  },
};

/**
 * Get colors for the current theme.
 */
export function getColors(): ColorConfig {
  return defaultColors;
}
