/**
 * Run the first pipeline stages on a drawing with test-friendly defaults
 */

import type { PlanarGraph, Segment } from '../../src/types';
import { buildPlanarGraph } from '../../src/engine/graph/planarGraph';
import { extractPatches, type PatchExtractionResult } from '../../src/engine/graph/patchExtractor';

export const TEST_TOLERANCE = 1e-6;

export function extract(segments: Segment[], minArea = 1e-10): PatchExtractionResult & { graph: PlanarGraph } {
  const { graph } = buildPlanarGraph(segments, { tolerance: TEST_TOLERANCE });
  return { graph, ...extractPatches(graph, { minArea }) };
}
