import { describe, it, expect } from 'vitest';
import {
  MIN_FINGER_SEGMENTS,
  fingerCount,
  fingerSegments,
  fingerTransitions,
  signedDepth,
} from './fingerPoints';
import { GeometryError } from './errors';

describe('Finger Segmentation', () => {
  describe('fingerCount', () => {
    it('rounds length / fingerWidth', () => {
      // 60 / 12 = 5
      expect(fingerCount(60, 12)).toBe(5);
    });

    it('bumps an even count to the next odd number', () => {
      // 120 / 12 = 10 -> 11
      expect(fingerCount(120, 12)).toBe(11);
      // 48 / 12 = 4 -> 5
      expect(fingerCount(48, 12)).toBe(5);
    });

    it('never goes below the minimum', () => {
      expect(fingerCount(10, 12)).toBe(MIN_FINGER_SEGMENTS);
      expect(fingerCount(1, 100)).toBe(MIN_FINGER_SEGMENTS);
    });

    it('rejects non-positive input', () => {
      expect(() => fingerCount(0, 12)).toThrow(GeometryError);
      expect(() => fingerCount(60, 0)).toThrow(GeometryError);
      expect(() => fingerCount(Number.NaN, 12)).toThrow(GeometryError);
    });
  });

  describe('fingerSegments', () => {
    it('splits a zone into equal alternating segments', () => {
      const segments = fingerSegments({ start: 0, length: 60 }, 12);

      expect(segments).toHaveLength(5);
      expect(segments.map(s => s.isFinger)).toEqual([true, false, true, false, true]);
      expect(segments[1].start).toBeCloseTo(12);
      expect(segments[1].end).toBeCloseTo(24);
    });

    it('starts and ends with a finger', () => {
      const segments = fingerSegments({ start: 5, length: 133 }, 12);

      expect(segments[0].isFinger).toBe(true);
      expect(segments[segments.length - 1].isFinger).toBe(true);
    });

    it('ends exactly at the zone end when the zone starts before the edge', () => {
      // 195 / 12 = 16.25 -> 16 -> 17 segments
      const segments = fingerSegments({ start: -8, length: 195 }, 12);

      expect(segments).toHaveLength(17);
      expect(segments[0].start).toBe(-8);
      expect(segments[16].end).toBe(187);
      expect(segments[0].end).toBeCloseTo(-8 + 195 / 17);
    });

    it('rejects a non-finite zone start', () => {
      expect(() => fingerSegments({ start: Number.POSITIVE_INFINITY, length: 60 }, 12)).toThrow(GeometryError);
    });
  });

  describe('fingerTransitions', () => {
    it('lists the interior boundaries', () => {
      const points = fingerTransitions({ start: 0, length: 60 }, 12);

      expect(points).toHaveLength(4);
      points.forEach((p, i) => expect(p).toBeCloseTo(12 * (i + 1)));
    });
  });

  describe('signedDepth', () => {
    it('recedes for tabs and protrudes for outer tabs and slots', () => {
      expect(signedDepth('tab', 3)).toBe(-3);
      expect(signedDepth('outer_tab', 3)).toBe(3);
      expect(signedDepth('slot', 5)).toBe(5);
      expect(signedDepth('flat', 5)).toBe(0);
    });
  });
});
