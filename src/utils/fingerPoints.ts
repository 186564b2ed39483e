/**
 * Finger Segmentation
 *
 * Splits an edge (or the finger zone of an edge) into an odd number of equal
 * segments. Even segments are fingers, odd segments stay flat, so both ends of
 * a zone are always the same kind and mating edges of the same length share
 * every boundary.
 */

import type { EdgeMode, FingerZone } from '../types';
import { assertPositive, assertFiniteNumber } from './errors';

export const MIN_FINGER_SEGMENTS = 3;

export interface FingerSegment {
  index: number;
  start: number;
  end: number;
  isFinger: boolean;
}

/**
 * Number of segments for a zone of the given length: round(length / fingerWidth),
 * at least 3, bumped to the next odd number.
 */
export const fingerCount = (length: number, fingerWidth: number): number => {
  assertPositive(length, 'finger zone length');
  assertPositive(fingerWidth, 'fingerWidth');

  let count = Math.max(MIN_FINGER_SEGMENTS, Math.round(length / fingerWidth));
  if (count % 2 === 0) count++;
  return count;
};

/**
 * Segment boundaries for a finger zone. Positions are in the same
 * coordinates as `zone.start`; the final boundary is exactly
 * `zone.start + zone.length`.
 */
export const fingerSegments = (zone: FingerZone, fingerWidth: number): FingerSegment[] => {
  assertFiniteNumber(zone.start, 'finger zone start');
  const count = fingerCount(zone.length, fingerWidth);
  const segmentWidth = zone.length / count;
  const zoneEnd = zone.start + zone.length;

  const segments: FingerSegment[] = [];
  for (let i = 0; i < count; i++) {
    segments.push({
      index: i,
      start: zone.start + i * segmentWidth,
      end: i === count - 1 ? zoneEnd : zone.start + (i + 1) * segmentWidth,
      isFinger: i % 2 === 0,
    });
  }
  return segments;
};

/**
 * Interior boundaries of a zone (where the edge steps between finger and flat).
 */
export const fingerTransitions = (zone: FingerZone, fingerWidth: number): number[] =>
  fingerSegments(zone, fingerWidth).slice(1).map(segment => segment.start);

/**
 * Outward offset of a finger segment: tabs recede (negative),
 * outer tabs and slots protrude (positive).
 */
export const signedDepth = (mode: EdgeMode, depth: number): number => {
  switch (mode) {
    case 'tab':
      return -depth;
    case 'outer_tab':
    case 'slot':
      return depth;
    case 'flat':
      return 0;
  }
};
