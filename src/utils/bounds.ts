/**
 * Bounds - Consolidated operations for 2D bounding box math
 *
 * This namespace provides THE single way to:
 * - Measure a shape or a shape list
 * - Compare boxes against each other and against a sheet
 *
 * Boxes are accumulated with three's Box2 and handed out as plain Rect2D.
 */

import { Box2, Vector2 } from 'three';
import type { Rect2D, Shape, ShapeRole } from '../types';

// ============================================================================
// MEASUREMENT
// ============================================================================

const shapeBox = (shape: Shape): Box2 => {
  switch (shape.kind) {
    case 'rect':
    case 'roundedRect':
      return new Box2(
        new Vector2(shape.x, shape.y),
        new Vector2(shape.x + shape.width, shape.y + shape.height)
      );
    case 'circle':
      return new Box2(
        new Vector2(shape.cx - shape.r, shape.cy - shape.r),
        new Vector2(shape.cx + shape.r, shape.cy + shape.r)
      );
    case 'polyline':
      return new Box2().setFromPoints(shape.points.map(p => new Vector2(p.x, p.y)));
  }
};

const toRect = (box: Box2): Rect2D => ({
  minX: box.min.x,
  minY: box.min.y,
  maxX: box.max.x,
  maxY: box.max.y,
});

/**
 * Bounding box of one shape
 */
const ofShape = (shape: Shape): Rect2D => toRect(shapeBox(shape));

/**
 * Union bounding box of the shapes with the given role (all roles when
 * omitted). Null when nothing matches.
 */
const ofShapes = (shapes: Shape[], role?: ShapeRole): Rect2D | null => {
  const box = new Box2();
  for (const shape of shapes) {
    if (role && shape.role !== role) continue;
    box.union(shapeBox(shape));
  }
  return box.isEmpty() ? null : toRect(box);
};

/**
 * Union of boxes. Null for an empty list.
 */
const union = (rects: Rect2D[]): Rect2D | null => {
  const box = new Box2();
  for (const rect of rects) {
    box.union(new Box2(new Vector2(rect.minX, rect.minY), new Vector2(rect.maxX, rect.maxY)));
  }
  return box.isEmpty() ? null : toRect(box);
};

// ============================================================================
// ACCESSORS
// ============================================================================

const width = (rect: Rect2D): number => rect.maxX - rect.minX;

const height = (rect: Rect2D): number => rect.maxY - rect.minY;

const fromSize = (x: number, y: number, w: number, h: number): Rect2D => ({
  minX: x,
  minY: y,
  maxX: x + w,
  maxY: y + h,
});

// ============================================================================
// COMPARISON
// ============================================================================

/**
 * True when the interiors overlap; touching edges do not count
 */
const overlaps = (a: Rect2D, b: Rect2D, tolerance: number = 0): boolean =>
  a.minX < b.maxX - tolerance &&
  b.minX < a.maxX - tolerance &&
  a.minY < b.maxY - tolerance &&
  b.minY < a.maxY - tolerance;

/**
 * True when the box reaches past (0, 0)-(sheetWidth, sheetHeight)
 */
const exceeds = (rect: Rect2D, sheetWidth: number, sheetHeight: number, tolerance: number = 1e-6): boolean =>
  rect.minX < -tolerance ||
  rect.minY < -tolerance ||
  rect.maxX > sheetWidth + tolerance ||
  rect.maxY > sheetHeight + tolerance;

// ============================================================================
// EXPORT NAMESPACE
// ============================================================================

export const BoundsOps = {
  // Measurement
  ofShape,
  ofShapes,
  union,

  // Accessors
  width,
  height,
  fromSize,

  // Comparison
  overlaps,
  exceeds,
} as const;
