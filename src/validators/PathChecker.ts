/**
 * Path Checker - Validates outline geometry constraints
 *
 * Rules validated:
 * 1. path:minimum-points - Outline has at least 3 points
 * 2. path:no-duplicates - No consecutive duplicate points (closing pair included)
 * 3. path:open-ring - The last point does not repeat the first; closure is implicit
 * 4. path:axis-aligned - Every segment shares X or Y between its endpoints
 * 5. path:simple - No two segments cross, touch or fold back onto each other
 *
 * Finger-joint outlines are rectilinear, so rule 4 is checked by default.
 * Outlines with intended diagonals (grille slots, glyph strokes) opt out.
 */

import type { Point } from '../types';

// =============================================================================
// Types
// =============================================================================

export type PathRuleId =
  | 'path:minimum-points'
  | 'path:no-duplicates'
  | 'path:open-ring'
  | 'path:axis-aligned'
  | 'path:simple';

export interface PathSubject {
  id: string;
  points: Point[];
  allowDiagonals?: boolean;
}

export interface PathValidationError {
  rule: PathRuleId;
  severity: 'error' | 'warning';
  message: string;
  details: {
    pathId: string;
    segmentIndex?: number;
    otherSegmentIndex?: number;
    from?: Point;
    to?: Point;
    [key: string]: unknown;
  };
}

export interface PathCheckResult {
  valid: boolean;
  errors: PathValidationError[];
  warnings: PathValidationError[];
  summary: {
    rulesChecked: PathRuleId[];
    errorCount: number;
    warningCount: number;
    pathCount: number;
  };
}

// =============================================================================
// Constants
// =============================================================================

const AXIS_ALIGNMENT_TOLERANCE = 0.001; // mm
const DUPLICATE_TOLERANCE = 0.001; // mm
const COLLINEAR_TOLERANCE = 1e-9; // mm² - cross product magnitude treated as zero

// =============================================================================
// Segment geometry
// =============================================================================

const orientation = (a: Point, b: Point, c: Point): number => {
  const cross = (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
  return Math.abs(cross) < COLLINEAR_TOLERANCE ? 0 : Math.sign(cross);
};

const withinBox = (a: Point, b: Point, p: Point): boolean =>
  p.x >= Math.min(a.x, b.x) - COLLINEAR_TOLERANCE &&
  p.x <= Math.max(a.x, b.x) + COLLINEAR_TOLERANCE &&
  p.y >= Math.min(a.y, b.y) - COLLINEAR_TOLERANCE &&
  p.y <= Math.max(a.y, b.y) + COLLINEAR_TOLERANCE;

/**
 * True when segments p1-p2 and p3-p4 share at least one point.
 */
export function segmentsIntersect(p1: Point, p2: Point, p3: Point, p4: Point): boolean {
  const o1 = orientation(p1, p2, p3);
  const o2 = orientation(p1, p2, p4);
  const o3 = orientation(p3, p4, p1);
  const o4 = orientation(p3, p4, p2);

  if (o1 !== o2 && o3 !== o4) return true;

  // Collinear cases
  if (o1 === 0 && withinBox(p1, p2, p3)) return true;
  if (o2 === 0 && withinBox(p1, p2, p4)) return true;
  if (o3 === 0 && withinBox(p3, p4, p1)) return true;
  if (o4 === 0 && withinBox(p3, p4, p2)) return true;
  return false;
}

// =============================================================================
// Path Checker Class
// =============================================================================

export class PathChecker {
  private errors: PathValidationError[] = [];
  private warnings: PathValidationError[] = [];
  private rulesChecked = new Set<PathRuleId>();

  constructor(private subjects: PathSubject[]) {}

  /**
   * Run all path checks and return results
   */
  check(): PathCheckResult {
    this.errors = [];
    this.warnings = [];
    this.rulesChecked.clear();

    for (const subject of this.subjects) {
      if (!this.checkMinimumPoints(subject)) continue;
      this.checkNoDuplicates(subject);
      this.checkOpenRing(subject);
      if (!subject.allowDiagonals) this.checkAxisAligned(subject);
      this.checkSimple(subject);
    }

    return this.buildResult();
  }

  private buildResult(): PathCheckResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      summary: {
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        warningCount: this.warnings.length,
        pathCount: this.subjects.length,
      },
    };
  }

  private addError(rule: PathRuleId, message: string, details: PathValidationError['details']): void {
    this.rulesChecked.add(rule);
    this.errors.push({ rule, severity: 'error', message, details });
  }

  private addWarning(rule: PathRuleId, message: string, details: PathValidationError['details']): void {
    this.rulesChecked.add(rule);
    this.warnings.push({ rule, severity: 'warning', message, details });
  }

  private markRuleChecked(rule: PathRuleId): void {
    this.rulesChecked.add(rule);
  }

  // ===========================================================================
  // Rule: path:minimum-points
  // ===========================================================================

  private checkMinimumPoints(subject: PathSubject): boolean {
    this.markRuleChecked('path:minimum-points');
    if (subject.points.length < 3) {
      this.addError('path:minimum-points', 'Outline has fewer than 3 points', {
        pathId: subject.id,
        pointCount: subject.points.length,
      });
      return false;
    }
    return true;
  }

  // ===========================================================================
  // Rule: path:no-duplicates
  // ===========================================================================

  private checkNoDuplicates(subject: PathSubject): void {
    this.markRuleChecked('path:no-duplicates');
    const { points } = subject;

    // The closing pair belongs to rule path:open-ring
    for (let i = 0; i < points.length - 1; i++) {
      const from = points[i];
      const to = points[i + 1];
      if (Math.abs(to.x - from.x) < DUPLICATE_TOLERANCE && Math.abs(to.y - from.y) < DUPLICATE_TOLERANCE) {
        this.addWarning('path:no-duplicates', `Duplicate consecutive points in ${subject.id}`, {
          pathId: subject.id,
          segmentIndex: i,
          from: { x: from.x, y: from.y },
        });
      }
    }
  }

  // ===========================================================================
  // Rule: path:open-ring
  // ===========================================================================

  private checkOpenRing(subject: PathSubject): void {
    this.markRuleChecked('path:open-ring');
    const first = subject.points[0];
    const last = subject.points[subject.points.length - 1];
    if (Math.abs(first.x - last.x) < DUPLICATE_TOLERANCE && Math.abs(first.y - last.y) < DUPLICATE_TOLERANCE) {
      this.addError('path:open-ring', `${subject.id} repeats its first point at the end`, {
        pathId: subject.id,
        from: { x: first.x, y: first.y },
      });
    }
  }

  // ===========================================================================
  // Rule: path:axis-aligned
  // ===========================================================================

  private checkAxisAligned(subject: PathSubject): void {
    this.markRuleChecked('path:axis-aligned');
    for (const diagonal of findDiagonalSegments(subject.points)) {
      this.addError('path:axis-aligned', `Diagonal segment detected in ${subject.id}`, {
        pathId: subject.id,
        segmentIndex: diagonal.index,
        from: diagonal.from,
        to: diagonal.to,
        dx: diagonal.dx,
        dy: diagonal.dy,
      });
    }
  }

  // ===========================================================================
  // Rule: path:simple
  // Non-adjacent segments must not meet; adjacent segments must not fold back
  // ===========================================================================

  private checkSimple(subject: PathSubject): void {
    this.markRuleChecked('path:simple');
    const { points } = subject;
    const n = points.length;

    for (let i = 0; i < n; i++) {
      const a = points[i];
      const b = points[(i + 1) % n];
      const c = points[(i + 2) % n];

      const dot = (b.x - a.x) * (c.x - b.x) + (b.y - a.y) * (c.y - b.y);
      if (orientation(a, b, c) === 0 && dot < 0) {
        this.addError('path:simple', `${subject.id} folds back on itself`, {
          pathId: subject.id,
          segmentIndex: i,
          otherSegmentIndex: (i + 1) % n,
          from: { x: a.x, y: a.y },
          to: { x: b.x, y: b.y },
        });
      }

      for (let j = i + 2; j < n; j++) {
        // Segment n-1 closes back onto segment 0
        if (i === 0 && j === n - 1) continue;
        if (segmentsIntersect(a, b, points[j], points[(j + 1) % n])) {
          this.addError('path:simple', `${subject.id} crosses itself`, {
            pathId: subject.id,
            segmentIndex: i,
            otherSegmentIndex: j,
            from: { x: a.x, y: a.y },
            to: { x: b.x, y: b.y },
          });
        }
      }
    }
  }
}

// =============================================================================
// Standalone Path Validation Functions
// =============================================================================

/**
 * Check if a closed path is axis-aligned (no diagonal segments)
 */
export function isPathAxisAligned(points: Point[], tolerance = AXIS_ALIGNMENT_TOLERANCE): boolean {
  return findDiagonalSegments(points, tolerance).length === 0;
}

/**
 * Find all diagonal segments in a closed path
 */
export function findDiagonalSegments(
  points: Point[],
  tolerance = AXIS_ALIGNMENT_TOLERANCE
): { index: number; from: Point; to: Point; dx: number; dy: number }[] {
  const diagonals: { index: number; from: Point; to: Point; dx: number; dy: number }[] = [];

  if (points.length < 2) return diagonals;

  for (let i = 0; i < points.length; i++) {
    const j = (i + 1) % points.length;
    const from = points[i];
    const to = points[j];
    const dx = Math.abs(to.x - from.x);
    const dy = Math.abs(to.y - from.y);

    if (dx > tolerance && dy > tolerance) {
      diagonals.push({ index: i, from, to, dx, dy });
    }
  }

  return diagonals;
}

// =============================================================================
// Convenience Function
// =============================================================================

export function checkPathValidity(subjects: PathSubject[]): PathCheckResult {
  const checker = new PathChecker(subjects);
  return checker.check();
}

/**
 * Format check results for display
 */
export function formatPathCheckResult(result: PathCheckResult): string {
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('PATH VALIDITY CHECK RESULTS');
  lines.push('='.repeat(60));
  lines.push(`Status: ${result.valid ? 'VALID' : 'INVALID'}`);
  lines.push(`Paths: ${result.summary.pathCount}`);
  lines.push(`Errors: ${result.summary.errorCount}`);
  lines.push(`Warnings: ${result.summary.warningCount}`);

  for (const issue of [...result.errors, ...result.warnings]) {
    lines.push('');
    lines.push(`${issue.severity === 'error' ? 'x' : '!'} [${issue.rule}] ${issue.message}`);
    for (const [key, value] of Object.entries(issue.details)) {
      if (value !== undefined) {
        lines.push(`  ${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
      }
    }
  }

  return lines.join('\n');
}
