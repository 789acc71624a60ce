/**
 * Core data model for the pattern pipeline.
 *
 * Geometry entities are plain records in indexed arrays. Relationships are
 * id-based: edges point at node ids, patches at node and edge ids, groups at
 * patch ids. Nothing holds an object reference to anything else, so there are
 * no ownership cycles to manage.
 */

// =============================================================================
// Primitives
// =============================================================================

export interface Point {
  x: number;
  y: number;
}

/** A closed ring of points. The closing point is implicit (never repeated). */
export type Ring = Point[];

export interface Bounds2D {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Straight segment as delivered by the drawing parser.
 * `layer` is an optional hint carried through for diagnostics only.
 */
export interface Segment {
  start: Point;
  end: Point;
  layer?: string;
}

// =============================================================================
// Planar graph
// =============================================================================

export interface GraphNode {
  id: number;
  point: Point;
  /** Incident edge ids, ascending */
  edges: number[];
}

export interface GraphEdge {
  id: number;
  a: number;
  b: number;
  /** Index of the input segment this edge was cut from */
  source: number;
}

export interface PlanarGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
  tolerance: number;
}

// =============================================================================
// Patches and groups
// =============================================================================

export interface Patch {
  id: number;
  /** Boundary nodes in counter-clockwise order (positive signed area) */
  nodeIds: number[];
  /** edgeIds[i] joins nodeIds[i] and nodeIds[i + 1] (wrapping) */
  edgeIds: number[];
  points: Ring;
  /** Closed components lying inside this patch, clockwise */
  holes: Ring[];
  area: number;
  bounds: Bounds2D;
}

export type GroupingStrategy = 'connected' | 'straight-seam';

export interface Group {
  id: number;
  /** Member patch ids, ascending */
  patchIds: number[];
  /** Piecing sequence; every entry after the first shares an edge with an earlier one */
  sewingOrder: number[];
}

export interface GroupingResult {
  groups: Group[];
  /** groupIdByPatch[patchId] is the owning group's id */
  groupIdByPatch: number[];
}

/** Union of a group's patches. Holes are kept when present. */
export interface GroupOutline {
  groupId: number;
  outer: Ring;
  holes: Ring[];
}

// =============================================================================
// Seam allowance
// =============================================================================

export interface AllowancePolygon {
  groupId: number;
  /** Offset distance in drawing units */
  distance: number;
  /** The cutting line: outer ring, counter-clockwise */
  outer: Ring;
  /** Group holes shrunk by the allowance, clockwise */
  holes: Ring[];
  area: number;
}

// =============================================================================
// Layout
// =============================================================================

export interface PlacementTransform {
  /** Degrees, counter-clockwise, applied about the drawing origin */
  rotation: number;
  dx: number;
  dy: number;
}

export interface PagePlacement {
  groupId: number;
  page: number;
  /** Page position of the placed shape's bounding-box corner */
  x: number;
  y: number;
  rotation: number;
  transform: PlacementTransform;
  /** Allowance outline in page coordinates */
  polygon: Ring;
  width: number;
  height: number;
}

export interface PageLayout {
  index: number;
  width: number;
  height: number;
  margin: number;
  placements: PagePlacement[];
}

// =============================================================================
// Annotation
// =============================================================================

export type RGBTuple = [number, number, number];

export interface ColorLabel {
  color: RGBTuple;
  name: string;
}

export interface PatchAnnotation {
  patchId: number;
  label: string;
  anchor: Point;
  color?: ColorLabel;
}

export interface GroupAnnotation {
  groupId: number;
  label: string;
  /** Preview fill color */
  displayColor: RGBTuple;
  color?: ColorLabel;
}

export interface AnnotationMap {
  patches: Map<number, PatchAnnotation>;
  groups: Map<number, GroupAnnotation>;
}
