/**
 * Overlap Checker - Validates that no two placed parts share sheet material
 *
 * Rules validated:
 * 1. overlap:no-part-intersection - Part footprints must not overlap on the sheet
 *
 * Algorithm:
 * 1. Broad phase (AABB): compare placed bounding boxes
 * 2. Narrow phase: intersect the outer cut outlines with polygon-clipping
 *    and measure the shared area
 *
 * Parts touching along an edge are fine; only shared area above the
 * tolerance is reported.
 */

import type { PlacedPart, Point, Rect2D, Shape } from '../types';
import { BoundsOps } from '../utils/bounds';
import { createRectPolygon, intersectionArea } from '../utils/polygonBoolean';

// =============================================================================
// Types
// =============================================================================

export type OverlapRuleId = 'overlap:no-part-intersection';

export interface OverlapValidationError {
  rule: OverlapRuleId;
  severity: 'error' | 'warning';
  message: string;
  details: {
    partA: string;
    partB: string;
    overlapArea: number;
  };
}

export interface OverlapCheckResult {
  valid: boolean;
  errors: OverlapValidationError[];
  summary: {
    rulesChecked: OverlapRuleId[];
    errorCount: number;
    partCount: number;
    pairsChecked: number;
  };
}

// =============================================================================
// Constants
// =============================================================================

const AREA_TOLERANCE = 0.01; // mm²
const CONTAINMENT_TOLERANCE = 0.001; // mm

// =============================================================================
// Footprints
// =============================================================================

interface Footprint {
  label: string;
  box: Rect2D;
  outlines: Point[][];
}

const closedOutline = (shape: Shape): Point[] | null => {
  if (shape.role !== 'cut') return null;
  switch (shape.kind) {
    case 'rect':
    case 'roundedRect':
      return createRectPolygon(shape.x, shape.y, shape.x + shape.width, shape.y + shape.height);
    case 'polyline':
      return shape.closed && shape.points.length >= 3 ? shape.points : null;
    case 'circle':
      return null;
  }
};

const inside = (inner: Rect2D, outer: Rect2D): boolean =>
  inner.minX >= outer.minX - CONTAINMENT_TOLERANCE &&
  inner.minY >= outer.minY - CONTAINMENT_TOLERANCE &&
  inner.maxX <= outer.maxX + CONTAINMENT_TOLERANCE &&
  inner.maxY <= outer.maxY + CONTAINMENT_TOLERANCE;

/**
 * Outer cut outlines of a part: closed cut shapes not enclosed by another
 * closed cut shape's box. A single panel yields its outline; a combined
 * part yields one outline per member.
 */
export function partFootprint(part: PlacedPart): Footprint {
  const candidates: { points: Point[]; box: Rect2D }[] = [];
  for (const shape of part.shapes) {
    const points = closedOutline(shape);
    if (points) candidates.push({ points, box: BoundsOps.ofShape(shape) });
  }

  const outlines = candidates
    .filter((candidate, i) =>
      !candidates.some((other, j) =>
        j !== i &&
        inside(candidate.box, other.box) &&
        // Identical boxes: keep the first
        !(inside(other.box, candidate.box) && j > i)
      )
    )
    .map(candidate => candidate.points);

  const box = BoundsOps.fromSize(part.x, part.y, part.width, part.height);
  return {
    label: part.label,
    box,
    outlines: outlines.length > 0 ? outlines : [createRectPolygon(box.minX, box.minY, box.maxX, box.maxY)],
  };
}

// =============================================================================
// Overlap Checker Class
// =============================================================================

export class OverlapChecker {
  private errors: OverlapValidationError[] = [];
  private pairsChecked = 0;

  constructor(private parts: PlacedPart[]) {}

  check(): OverlapCheckResult {
    this.errors = [];
    this.pairsChecked = 0;

    const footprints = this.parts.map(partFootprint);
    for (let i = 0; i < footprints.length; i++) {
      for (let j = i + 1; j < footprints.length; j++) {
        this.checkPair(footprints[i], footprints[j]);
      }
    }

    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      summary: {
        rulesChecked: ['overlap:no-part-intersection'],
        errorCount: this.errors.length,
        partCount: this.parts.length,
        pairsChecked: this.pairsChecked,
      },
    };
  }

  private checkPair(a: Footprint, b: Footprint): void {
    this.pairsChecked++;

    // Broad phase
    if (!BoundsOps.overlaps(a.box, b.box)) return;

    // Narrow phase
    let area = 0;
    for (const outlineA of a.outlines) {
      for (const outlineB of b.outlines) {
        area += intersectionArea(outlineA, outlineB);
      }
    }

    if (area > AREA_TOLERANCE) {
      this.errors.push({
        rule: 'overlap:no-part-intersection',
        severity: 'error',
        message: `${a.label} overlaps ${b.label} by ${area.toFixed(2)} mm²`,
        details: { partA: a.label, partB: b.label, overlapArea: area },
      });
    }
  }
}

export function checkOverlaps(parts: PlacedPart[]): OverlapCheckResult {
  return new OverlapChecker(parts).check();
}
