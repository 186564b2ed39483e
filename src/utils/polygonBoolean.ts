/**
 * Boolean polygon operations utility
 *
 * Wraps the polygon-clipping library to work with our Point format.
 * Used to measure how much two placed part outlines overlap on a sheet.
 */

import polygonClipping from 'polygon-clipping';
import type { Pair, Ring, Polygon, MultiPolygon } from 'polygon-clipping';
import type { Point } from '../types';

// Convert our Point array to polygon-clipping format
function pathToRing(points: Point[]): Ring {
  return points.map((p): Pair => [p.x, p.y]);
}

// Convert Point array to Polygon format (single ring, no holes)
function pathToPolygon(points: Point[]): Polygon {
  return [pathToRing(points)];
}

/**
 * Compute signed area of a ring using the shoelace formula.
 * Positive for counter-clockwise, negative for clockwise.
 */
function computeRingArea(ring: Ring): number {
  let area = 0;
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += ring[i][0] * ring[j][1];
    area -= ring[j][0] * ring[i][1];
  }
  return area / 2;
}

function multiPolygonArea(multiPolygon: MultiPolygon): number {
  let total = 0;
  for (const polygon of multiPolygon) {
    const [outer, ...holes] = polygon;
    if (!outer) continue;
    total += Math.abs(computeRingArea(outer));
    for (const hole of holes) {
      total -= Math.abs(computeRingArea(hole));
    }
  }
  return total;
}

/**
 * Area shared by two simple polygons. Zero when they only touch.
 */
export function intersectionArea(a: Point[], b: Point[]): number {
  if (a.length < 3 || b.length < 3) {
    return 0;
  }
  return multiPolygonArea(polygonClipping.intersection(pathToPolygon(a), pathToPolygon(b)));
}

/**
 * Create a rectangular polygon from bounds
 */
export function createRectPolygon(minX: number, minY: number, maxX: number, maxY: number): Point[] {
  return [
    { x: minX, y: minY },
    { x: maxX, y: minY },
    { x: maxX, y: maxY },
    { x: minX, y: maxY },
  ];
}
