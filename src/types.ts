// =============================================================================
// Geometry primitives
// =============================================================================

export interface Point {
  x: number;
  y: number;
}

/** Panel edges, named as seen on the flat panel (Y down) */
export type EdgeId = 'top' | 'right' | 'bottom' | 'left';

/** Clockwise walk order, starting from the top-left corner */
export const EDGE_ORDER: readonly EdgeId[] = ['top', 'right', 'bottom', 'left'];

// =============================================================================
// Finger joints
// =============================================================================

/**
 * Joint policy for one edge.
 * - flat: straight edge
 * - tab: finger segments recede into the panel body
 * - outer_tab / slot: finger segments protrude away from the panel
 */
export type EdgeMode = 'flat' | 'tab' | 'outer_tab' | 'slot';

export const EDGE_MODES: readonly EdgeMode[] = ['flat', 'tab', 'outer_tab', 'slot'];

/**
 * Portion of an edge that carries the finger pattern, in edge-local
 * coordinates measured from the edge's starting corner along the walk.
 * `start` may be negative: the pattern then begins before the corner and is
 * clipped at the edge ends.
 */
export interface FingerZone {
  start: number;
  length: number;
}

export interface EdgeSpec {
  mode: EdgeMode;
  depth: number;
  zone?: FingerZone;
  skipEnds?: boolean;    // first and last finger stay flat
}

export type EdgeSpecs = Record<EdgeId, EdgeSpec>;

/** A constant-offset stretch of an edge walk */
export interface EdgeRun {
  start: number;
  end: number;
  offset: number;        // signed outward offset (negative = into the panel)
}

// =============================================================================
// Shapes
// =============================================================================

export type ShapeRole = 'cut' | 'engrave';

interface ShapeBase {
  role: ShapeRole;
  strokeWidth: number;
}

export interface RectShape extends ShapeBase {
  kind: 'rect';
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RoundedRectShape extends ShapeBase {
  kind: 'roundedRect';
  x: number;
  y: number;
  width: number;
  height: number;
  radius: number;
}

export interface CircleShape extends ShapeBase {
  kind: 'circle';
  cx: number;
  cy: number;
  r: number;
}

export interface PolylineShape extends ShapeBase {
  kind: 'polyline';
  points: Point[];
  closed: boolean;
}

export type Shape = RectShape | RoundedRectShape | CircleShape | PolylineShape;

/** Advisory text. Never part of the fabricated geometry. */
export interface Annotation {
  text: string;
  x: number;
  y: number;
  size: number;
}

export interface Rect2D {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// =============================================================================
// Nesting
// =============================================================================

export type Rotation = 0 | 90 | 180;

/** A panel document re-read as plain geometry, flush at (0, 0) */
export interface PartGeometry {
  name: string;
  width: number;
  height: number;
  shapes: Shape[];
}

export interface Placement {
  label: string;
  part: PartGeometry;
  rotate?: Rotation;
  x: number;
  y: number;
}

export interface PlacedPart {
  label: string;
  x: number;
  y: number;
  width: number;
  height: number;
  rotate: Rotation;
  shapes: Shape[];
}

export type SheetWarningKind = 'overflow' | 'overlap';

export interface SheetWarning {
  kind: SheetWarningKind;
  message: string;
}

export interface SheetSpec {
  name: string;
  width: number;
  height: number;
}

export interface SheetResult {
  sheet: SheetSpec;
  parts: PlacedPart[];
  shapes: Shape[];
  labels: Annotation[];
  usedWidth: number;
  usedHeight: number;
  warnings: SheetWarning[];
}
