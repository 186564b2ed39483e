/**
 * DXF export
 *
 * Converts a sheet document into a minimal layered DXF: millimetre units,
 * one CUT and one ENGRAVE layer, CIRCLE and LWPOLYLINE entities only.
 * SVG is Y-down and DXF is Y-up, so every y becomes sheetHeight - y.
 */

import type { Point, Shape, ShapeRole } from '../types';
import { getColors } from '../config/colors';
import { documentSize, scanElements } from './svgParse';
import { elementToShape } from './geometryExtractor';
import { GeometryError } from './errors';

export const CLOSE_TOLERANCE = 0.01; // mm

export type DxfEntity =
  | { type: 'CIRCLE'; layer: string; cx: number; cy: number; r: number }
  | { type: 'LWPOLYLINE'; layer: string; points: Point[]; closed: boolean };

const layerFor = (role: ShapeRole): string => getColors().roles[role].layer;

const samePoint = (a: Point, b: Point): boolean =>
  Math.abs(a.x - b.x) < CLOSE_TOLERANCE && Math.abs(a.y - b.y) < CLOSE_TOLERANCE;

const rectCorners = (x: number, y: number, w: number, h: number): Point[] => [
  { x, y },
  { x: x + w, y },
  { x: x + w, y: y + h },
  { x, y: y + h },
];

/** Each corner cut straight across at the radius */
const roundedRectCorners = (x: number, y: number, w: number, h: number, r: number): Point[] => [
  { x: x + r, y },
  { x: x + w - r, y },
  { x: x + w, y: y + r },
  { x: x + w, y: y + h - r },
  { x: x + w - r, y: y + h },
  { x: x + r, y: y + h },
  { x, y: y + h - r },
  { x, y: y + r },
];

/**
 * Entity for one shape with the Y axis flipped about `sheetHeight`.
 */
export function shapeToEntity(shape: Shape, sheetHeight: number): DxfEntity | null {
  const layer = layerFor(shape.role);
  const flip = (p: Point): Point => ({ x: p.x, y: sheetHeight - p.y });

  switch (shape.kind) {
    case 'rect':
      return {
        type: 'LWPOLYLINE',
        layer,
        points: rectCorners(shape.x, shape.y, shape.width, shape.height).map(flip),
        closed: true,
      };
    case 'roundedRect':
      return {
        type: 'LWPOLYLINE',
        layer,
        points: roundedRectCorners(shape.x, shape.y, shape.width, shape.height, shape.radius).map(flip),
        closed: true,
      };
    case 'circle':
      return { type: 'CIRCLE', layer, cx: shape.cx, cy: sheetHeight - shape.cy, r: shape.r };
    case 'polyline': {
      if (shape.points.length < 2) return null;
      const points = shape.points.map(flip);
      const coincident = points.length > 2 && samePoint(points[0], points[points.length - 1]);
      const closed = shape.closed || coincident;
      // A closed ring never repeats its first vertex
      if (closed && coincident) points.pop();
      return { type: 'LWPOLYLINE', layer, points, closed };
    }
  }
}

/**
 * Entities of a sheet document in document order. Text is skipped.
 */
export function collectDxfEntities(svg: string): DxfEntity[] {
  const size = documentSize(svg);
  if (!size) {
    throw new GeometryError('sheet document has neither a viewBox nor a height');
  }

  const entities: DxfEntity[] = [];
  for (const element of scanElements(svg)) {
    const shape = elementToShape(element, 0);
    if (!shape) continue;
    const entity = shapeToEntity(shape, size.height);
    if (entity) entities.push(entity);
  }
  return entities;
}

const num = (value: number): string => value.toFixed(4);

export function writeDxf(entities: DxfEntity[]): string {
  const out: string[] = [];
  const w = (code: number, value: string | number): void => {
    out.push(`  ${code}\n${value}\n`);
  };

  // HEADER
  w(0, 'SECTION');
  w(2, 'HEADER');
  w(9, '$INSUNITS');
  w(70, 4); // millimetres
  w(0, 'ENDSEC');

  // TABLES
  const roles = getColors().roles;
  const layers = [roles.cut, roles.engrave];
  w(0, 'SECTION');
  w(2, 'TABLES');
  w(0, 'TABLE');
  w(2, 'LAYER');
  w(70, layers.length);
  for (const layer of layers) {
    w(0, 'LAYER');
    w(2, layer.layer);
    w(70, 0);
    w(62, layer.aci);
    w(6, 'CONTINUOUS');
  }
  w(0, 'ENDTAB');
  w(0, 'ENDSEC');

  // ENTITIES
  w(0, 'SECTION');
  w(2, 'ENTITIES');
  for (const entity of entities) {
    if (entity.type === 'CIRCLE') {
      w(0, 'CIRCLE');
      w(8, entity.layer);
      w(10, num(entity.cx));
      w(20, num(entity.cy));
      w(40, num(entity.r));
    } else {
      w(0, 'LWPOLYLINE');
      w(8, entity.layer);
      w(90, entity.points.length);
      w(70, entity.closed ? 1 : 0);
      for (const p of entity.points) {
        w(10, num(p.x));
        w(20, num(p.y));
      }
    }
  }
  w(0, 'ENDSEC');
  w(0, 'EOF');

  return out.join('');
}

export function svgToDxf(svg: string): string {
  return writeDxf(collectDxfEntities(svg));
}
