/**
 * OverlapChecker Unit Tests
 *
 * Tests sheet overlap detection rules:
 * - overlap:no-part-intersection - Placed parts must not share material
 */

import { describe, it, expect } from 'vitest';
import type { PlacedPart, Point, Shape } from '../../../src/types';
import { checkOverlaps, partFootprint } from '../../../src/validators/OverlapChecker';
import { createRectPolygon } from '../../../src/utils/polygonBoolean';

const outline = (points: Point[]): Shape => ({ kind: 'polyline', points, closed: true, role: 'cut', strokeWidth: 0.01 });

const placed = (label: string, x: number, y: number, width: number, height: number, shapes: Shape[]): PlacedPart => ({
  label,
  x,
  y,
  width,
  height,
  rotate: 0,
  shapes,
});

const box = (label: string, x: number, y: number, size: number): PlacedPart =>
  placed(label, x, y, size, size, [outline(createRectPolygon(x, y, x + size, y + size))]);

describe('OverlapChecker', () => {
  describe('partFootprint', () => {
    it('ignores cutouts inside the outline', () => {
      const part = placed('A', 0, 0, 10, 10, [
        outline(createRectPolygon(0, 0, 10, 10)),
        { kind: 'rect', x: 2, y: 2, width: 2, height: 2, role: 'cut', strokeWidth: 0.01 },
        { kind: 'circle', cx: 7, cy: 7, r: 1, role: 'cut', strokeWidth: 0.01 },
      ]);

      expect(partFootprint(part).outlines).toEqual([createRectPolygon(0, 0, 10, 10)]);
    });

    it('keeps one outline per member of a combined part', () => {
      const part = placed('pair', 0, 0, 25, 10, [
        outline(createRectPolygon(0, 0, 10, 10)),
        outline(createRectPolygon(15, 0, 25, 10)),
      ]);

      expect(partFootprint(part).outlines).toHaveLength(2);
    });

    it('keeps the first of two identical outlines', () => {
      const part = placed('twice', 0, 0, 10, 10, [
        outline(createRectPolygon(0, 0, 10, 10)),
        outline(createRectPolygon(0, 0, 10, 10)),
      ]);

      expect(partFootprint(part).outlines).toHaveLength(1);
    });

    it('falls back to the placed box without closed cut shapes', () => {
      const part = placed('holes', 5, 5, 4, 3, [
        { kind: 'circle', cx: 7, cy: 6, r: 1, role: 'cut', strokeWidth: 0.01 },
      ]);

      expect(partFootprint(part).outlines).toEqual([createRectPolygon(5, 5, 9, 8)]);
    });
  });

  describe('checkOverlaps', () => {
    it('passes parts that only touch', () => {
      const result = checkOverlaps([box('A', 0, 0, 10), box('B', 10, 0, 10), box('C', 0, 10, 10)]);

      expect(result.valid).toBe(true);
      expect(result.summary.partCount).toBe(3);
      expect(result.summary.pairsChecked).toBe(3);
    });

    it('reports the shared area', () => {
      const result = checkOverlaps([box('A', 0, 0, 10), box('B', 6, 6, 10)]);

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].message).toBe('A overlaps B by 16.00 mm²');
      expect(result.errors[0].details.overlapArea).toBeCloseTo(16, 5);
    });

    it('lets a part sit inside another part\'s notch', () => {
      // L-shaped part; the small square sits in the missing quarter
      const ell = placed('L', 0, 0, 10, 10, [
        outline([
          { x: 0, y: 0 },
          { x: 10, y: 0 },
          { x: 10, y: 5 },
          { x: 5, y: 5 },
          { x: 5, y: 10 },
          { x: 0, y: 10 },
        ]),
      ]);

      expect(checkOverlaps([ell, box('S', 6, 6, 3)]).valid).toBe(true);
    });
  });
});
