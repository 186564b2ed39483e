/**
 * Affine transforms over shape lists.
 *
 * Every operator returns new shapes; inputs are never modified. Shape count,
 * order, roles and radii are preserved. Rotations work on a part whose
 * bounding box is (0, 0)-(width, height) and keep the result in the positive
 * quadrant.
 */

import type { Point, Rotation, Shape } from '../types';
import { assertFiniteNumber, assertPositive } from './errors';

const mapShape = (
  shape: Shape,
  mapPoint: (p: Point) => Point,
  mapRect: (x: number, y: number, w: number, h: number) => { x: number; y: number; width: number; height: number }
): Shape => {
  switch (shape.kind) {
    case 'rect':
    case 'roundedRect':
      return { ...shape, ...mapRect(shape.x, shape.y, shape.width, shape.height) };
    case 'circle': {
      const c = mapPoint({ x: shape.cx, y: shape.cy });
      return { ...shape, cx: c.x, cy: c.y };
    }
    case 'polyline':
      return { ...shape, points: shape.points.map(mapPoint) };
  }
};

export const translateShapes = (shapes: Shape[], dx: number, dy: number): Shape[] => {
  assertFiniteNumber(dx, 'translate dx');
  assertFiniteNumber(dy, 'translate dy');
  return shapes.map(shape =>
    mapShape(
      shape,
      p => ({ x: p.x + dx, y: p.y + dy }),
      (x, y, width, height) => ({ x: x + dx, y: y + dy, width, height })
    )
  );
};

/**
 * Quarter turn clockwise (Y down): (x, y) -> (height - y, x).
 * The result spans height x width.
 */
export const rotateShapes90cw = (shapes: Shape[], width: number, height: number): Shape[] => {
  assertPositive(width, 'rotation width');
  assertPositive(height, 'rotation height');
  return shapes.map(shape =>
    mapShape(
      shape,
      p => ({ x: height - p.y, y: p.x }),
      (x, y, w, h) => ({ x: height - y - h, y: x, width: h, height: w })
    )
  );
};

/**
 * Half turn: (x, y) -> (width - x, height - y).
 */
export const rotateShapes180 = (shapes: Shape[], width: number, height: number): Shape[] => {
  assertPositive(width, 'rotation width');
  assertPositive(height, 'rotation height');
  return shapes.map(shape =>
    mapShape(
      shape,
      p => ({ x: width - p.x, y: height - p.y }),
      (x, y, w, h) => ({ x: width - x - w, y: height - y - h, width: w, height: h })
    )
  );
};

export interface RotatedShapes {
  shapes: Shape[];
  width: number;
  height: number;
}

export const rotateShapes = (shapes: Shape[], rotation: Rotation, width: number, height: number): RotatedShapes => {
  switch (rotation) {
    case 0:
      return { shapes: translateShapes(shapes, 0, 0), width, height };
    case 90:
      return { shapes: rotateShapes90cw(shapes, width, height), width: height, height: width };
    case 180:
      return { shapes: rotateShapes180(shapes, width, height), width, height };
  }
};
