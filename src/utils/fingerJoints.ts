/**
 * Finger Joint Outline Builder
 *
 * Turns a rectangle plus a joint policy per edge into one closed polygon,
 * walked clockwise from the top-left corner (Y down).
 *
 * Each edge becomes a list of runs (constant outward offset). Inside an edge
 * every run boundary emits two points. Where two edges meet, a single corner
 * point is computed from the last run of the incoming edge and the first run
 * of the outgoing edge, and both edges share that point object.
 */

import type { EdgeId, EdgeRun, EdgeSpec, EdgeSpecs, EdgeMode, Point } from '../types';
import { EDGE_ORDER } from '../types';
import { fingerSegments, signedDepth } from './fingerPoints';
import { GeometryError, assertPositive, assertNonNegative } from './errors';
import { debug } from './debug';

export const EPSILON = 0.001; // mm

interface EdgeFrame {
  origin: Point;     // starting corner of the edge
  dir: Point;        // unit walk direction
  outward: Point;    // unit normal pointing away from the panel
  length: number;
}

const edgeFrames = (width: number, height: number): Record<EdgeId, EdgeFrame> => ({
  top: { origin: { x: 0, y: 0 }, dir: { x: 1, y: 0 }, outward: { x: 0, y: -1 }, length: width },
  right: { origin: { x: width, y: 0 }, dir: { x: 0, y: 1 }, outward: { x: 1, y: 0 }, length: height },
  bottom: { origin: { x: width, y: height }, dir: { x: -1, y: 0 }, outward: { x: 0, y: 1 }, length: width },
  left: { origin: { x: 0, y: height }, dir: { x: 0, y: -1 }, outward: { x: -1, y: 0 }, length: height },
});

const pointOnEdge = (frame: EdgeFrame, t: number, offset: number): Point => ({
  x: frame.origin.x + frame.dir.x * t + frame.outward.x * offset,
  y: frame.origin.y + frame.dir.y * t + frame.outward.y * offset,
});

const nextEdge = (edge: EdgeId): EdgeId => EDGE_ORDER[(EDGE_ORDER.indexOf(edge) + 1) % 4];

const previousEdge = (edge: EdgeId): EdgeId => EDGE_ORDER[(EDGE_ORDER.indexOf(edge) + 3) % 4];

/** Build a per-edge record, visiting edges in walk order */
const perEdge = <T>(fn: (edge: EdgeId) => T): Record<EdgeId, T> => {
  const top = fn('top');
  const right = fn('right');
  const bottom = fn('bottom');
  const left = fn('left');
  return { top, right, bottom, left };
};

// =============================================================================
// Runs
// =============================================================================

/**
 * Describe an edge of the given length as contiguous runs covering [0, length].
 * Adjacent runs with the same offset are merged.
 */
export const edgeRuns = (length: number, spec: EdgeSpec, fingerWidth: number): EdgeRun[] => {
  assertPositive(length, 'edge length');
  assertNonNegative(spec.depth, 'edge depth');

  if (spec.mode === 'flat' || spec.depth === 0) {
    return [{ start: 0, end: length, offset: 0 }];
  }

  const zone = spec.zone ?? { start: 0, length };
  const segments = fingerSegments(zone, fingerWidth);
  const fingerOffset = signedDepth(spec.mode, spec.depth);
  const lastIndex = segments.length - 1;

  const raw: EdgeRun[] = [];
  const push = (start: number, end: number, offset: number): void => {
    const s = Math.max(0, start);
    const e = Math.min(length, end);
    if (e - s > EPSILON) raw.push({ start: s, end: e, offset });
  };

  if (zone.start > 0) push(0, zone.start, 0);
  for (const segment of segments) {
    const skipped = spec.skipEnds === true && (segment.index === 0 || segment.index === lastIndex);
    push(segment.start, segment.end, segment.isFinger && !skipped ? fingerOffset : 0);
  }
  const zoneEnd = zone.start + zone.length;
  if (zoneEnd < length) push(zoneEnd, length, 0);

  if (raw.length === 0) {
    return [{ start: 0, end: length, offset: 0 }];
  }

  // Clipping can leave a hole at either end when the zone lies partly outside
  const runs: EdgeRun[] = [];
  for (const run of raw) {
    const last = runs[runs.length - 1];
    if (last && last.offset === run.offset) {
      last.end = run.end;
    } else {
      runs.push({ ...run });
    }
  }
  runs[0].start = 0;
  runs[runs.length - 1].end = length;
  return runs;
};

// =============================================================================
// Corner stitching
// =============================================================================

/**
 * Shared corner between an edge that ends with `endingOffset` and the next
 * edge that starts with `startingOffset`: the nominal rectangle corner moved
 * along each edge's outward normal by that edge's offset.
 */
export const stitchCorner = (
  width: number,
  height: number,
  ending: EdgeId,
  endingOffset: number,
  startingOffset: number
): Point => {
  const frames = edgeFrames(width, height);
  const starting = nextEdge(ending);
  const corner = frames[starting].origin;
  const a = frames[ending].outward;
  const b = frames[starting].outward;
  return {
    x: corner.x + a.x * endingOffset + b.x * startingOffset,
    y: corner.y + a.y * endingOffset + b.y * startingOffset,
  };
};

// =============================================================================
// Outline
// =============================================================================

const inwardDepth = (runs: EdgeRun[]): number =>
  runs.reduce((deepest, run) => Math.max(deepest, -run.offset), 0);

const validateRect = (width: number, height: number, fingerWidth: number): void => {
  assertPositive(width, 'width');
  assertPositive(height, 'height');
  assertPositive(fingerWidth, 'fingerWidth');
};

/**
 * Walk each edge from its start corner to its end corner. The last point of
 * one edge is the same object as the first point of the next.
 */
export const buildEdgePaths = (
  width: number,
  height: number,
  edges: EdgeSpecs,
  fingerWidth: number
): Record<EdgeId, Point[]> => {
  validateRect(width, height, fingerWidth);

  const frames = edgeFrames(width, height);
  const runs = perEdge(edge => edgeRuns(frames[edge].length, edges[edge], fingerWidth));

  if (inwardDepth(runs.top) + inwardDepth(runs.bottom) >= height) {
    throw new GeometryError(`top and bottom tab depths leave no material in a panel ${height}mm high`);
  }
  if (inwardDepth(runs.left) + inwardDepth(runs.right) >= width) {
    throw new GeometryError(`left and right tab depths leave no material in a panel ${width}mm wide`);
  }

  // corners[edge] = the corner where `edge` starts
  const corners = perEdge(edge => {
    const prev = previousEdge(edge);
    const endingRuns = runs[prev];
    const endingOffset = endingRuns[endingRuns.length - 1].offset;
    const startingOffset = runs[edge][0].offset;
    const corner = stitchCorner(width, height, prev, endingOffset, startingOffset);
    debug('outline', `${prev}->${edge} corner (${corner.x.toFixed(3)}, ${corner.y.toFixed(3)})`);
    return corner;
  });

  return perEdge(edge => {
    const frame = frames[edge];
    const edgeRunList = runs[edge];
    const prev = previousEdge(edge);
    const next = nextEdge(edge);
    const prevRuns = runs[prev];

    // Positions of the corners along this edge
    const startT = -prevRuns[prevRuns.length - 1].offset;
    const endT = frame.length + runs[next][0].offset;

    let lastT = startT;
    const path: Point[] = [corners[edge]];
    for (let i = 0; i < edgeRunList.length - 1; i++) {
      const t = edgeRunList[i].end;
      if (t < lastT - EPSILON) {
        throw new GeometryError(
          `${edge} edge: the ${prev} edge depth (${Math.abs(startT)}mm) overruns the first finger segment`
        );
      }
      lastT = t;
      path.push(pointOnEdge(frame, t, edgeRunList[i].offset));
      path.push(pointOnEdge(frame, t, edgeRunList[i + 1].offset));
    }
    if (endT < lastT - EPSILON) {
      throw new GeometryError(
        `${edge} edge: the ${next} edge depth (${Math.abs(endT - frame.length)}mm) overruns the last finger segment`
      );
    }
    path.push(corners[next]);
    return path;
  });
};

/**
 * Collapse consecutive points closer than `epsilon` and drop a closing point
 * that repeats the first.
 */
export const cleanOutline = (points: Point[], epsilon: number = EPSILON): Point[] => {
  if (points.length === 0) return [];

  const cleaned: Point[] = [points[0]];
  for (let i = 1; i < points.length; i++) {
    const prev = cleaned[cleaned.length - 1];
    const curr = points[i];
    if (Math.abs(curr.x - prev.x) > epsilon || Math.abs(curr.y - prev.y) > epsilon) {
      cleaned.push(curr);
    }
  }

  if (cleaned.length > 1) {
    const first = cleaned[0];
    const last = cleaned[cleaned.length - 1];
    if (Math.abs(first.x - last.x) <= epsilon && Math.abs(first.y - last.y) <= epsilon) {
      cleaned.pop();
    }
  }
  return cleaned;
};

/**
 * Closed clockwise polygon for a rectangle with a joint policy per edge.
 */
export const buildOutline = (
  width: number,
  height: number,
  edges: EdgeSpecs,
  fingerWidth: number
): Point[] => {
  const paths = buildEdgePaths(width, height, edges, fingerWidth);
  const points: Point[] = [];
  for (const edge of EDGE_ORDER) {
    const path = paths[edge];
    // The final point is the next edge's first point
    points.push(...path.slice(0, -1));
  }
  return cleanOutline(points);
};

// =============================================================================
// Grouped-depth convenience
// =============================================================================

export interface FingerOutlineOptions {
  fingerWidth: number;
  top?: EdgeMode;
  right?: EdgeMode;
  bottom?: EdgeMode;
  left?: EdgeMode;
  depth: number;            // fallback for every edge
  topDepth?: number;
  bottomDepth?: number;
  lrDepth?: number;         // left and right edges
  skipLrEnds?: boolean;     // keep the corner fingers of left/right flat
}

/**
 * Edge specs for the grouped form: one depth for top, one for bottom and one
 * shared by left and right.
 */
export const fingerEdgeSpecs = (options: FingerOutlineOptions): EdgeSpecs => {
  const lrDepth = options.lrDepth ?? options.depth;
  return {
    top: { mode: options.top ?? 'flat', depth: options.topDepth ?? options.depth },
    right: { mode: options.right ?? 'flat', depth: lrDepth, skipEnds: options.skipLrEnds },
    bottom: { mode: options.bottom ?? 'flat', depth: options.bottomDepth ?? options.depth },
    left: { mode: options.left ?? 'flat', depth: lrDepth, skipEnds: options.skipLrEnds },
  };
};

export const fingerOutline = (
  width: number,
  height: number,
  options: FingerOutlineOptions
): Point[] => buildOutline(width, height, fingerEdgeSpecs(options), options.fingerWidth);
