import { describe, it, expect } from 'vitest';
import {
  buildEdgePaths,
  buildOutline,
  cleanOutline,
  edgeRuns,
  fingerEdgeSpecs,
  fingerOutline,
  stitchCorner,
} from '../../../src/utils/fingerJoints';
import type { EdgeSpecs } from '../../../src/types';
import { GeometryError } from '../../../src/utils/errors';
import { permuteEdgeModes } from '../../fixtures/permute';
import { expectPointClose, expectValidOutlines } from '../../fixtures/assertions';

const flatEdges: EdgeSpecs = {
  top: { mode: 'flat', depth: 0 },
  right: { mode: 'flat', depth: 0 },
  bottom: { mode: 'flat', depth: 0 },
  left: { mode: 'flat', depth: 0 },
};

describe('Finger Joint Outline Builder', () => {
  describe('fingerOutline', () => {
    // Tabs top and bottom, outer tabs left and right
    const outline = fingerOutline(120, 60, {
      fingerWidth: 12,
      top: 'tab',
      bottom: 'tab',
      left: 'outer_tab',
      right: 'outer_tab',
      depth: 3,
      lrDepth: 5,
    });

    it('emits two points per finger boundary plus one per corner', () => {
      // 120 -> 11 segments, 60 -> 5 segments: 2 * (11 + 5 + 11 + 5) - 4
      expect(outline).toHaveLength(60);
    });

    it('starts at the stitched top-left corner', () => {
      // Pushed out by the left outer tab, pulled in by the top tab
      expectPointClose(outline[0], { x: -5, y: 3 });
    });

    it('places the other corners where both offsets meet', () => {
      expectPointClose(outline[21], { x: 125, y: 3 });
      expectPointClose(outline[30], { x: 125, y: 57 });
      expectPointClose(outline[51], { x: -5, y: 57 });
    });

    it('steps at the first finger boundary', () => {
      expectPointClose(outline[1], { x: 120 / 11, y: 3 });
      expectPointClose(outline[2], { x: 120 / 11, y: 0 });
    });

    it('passes the path checker', () => {
      expectValidOutlines([{ id: 'scenario', points: outline }]);
    });

    it('defaults every unnamed edge to flat', () => {
      const specs = fingerEdgeSpecs({ fingerWidth: 10, top: 'tab', depth: 3 });

      expect(specs.top).toEqual({ mode: 'tab', depth: 3 });
      expect(specs.right.mode).toBe('flat');
      expect(specs.bottom).toEqual({ mode: 'flat', depth: 3 });
      expect(specs.left.mode).toBe('flat');
    });
  });

  describe('buildOutline', () => {
    it('returns the bare rectangle for flat edges', () => {
      const outline = buildOutline(50, 30, flatEdges, 10);

      expect(outline).toHaveLength(4);
      expectPointClose(outline[0], { x: 0, y: 0 });
      expectPointClose(outline[1], { x: 50, y: 0 });
      expectPointClose(outline[2], { x: 50, y: 30 });
      expectPointClose(outline[3], { x: 0, y: 30 });
    });

    it('rejects non-positive dimensions', () => {
      expect(() => buildOutline(0, 30, flatEdges, 10)).toThrow(GeometryError);
      expect(() => buildOutline(50, -1, flatEdges, 10)).toThrow(GeometryError);
      expect(() => buildOutline(50, 30, flatEdges, 0)).toThrow(GeometryError);
    });

    it('rejects a negative depth', () => {
      expect(() => fingerOutline(120, 60, { fingerWidth: 12, top: 'tab', depth: -1 })).toThrow(GeometryError);
    });

    it('rejects opposite tabs that leave no material', () => {
      expect(() => fingerOutline(100, 10, { fingerWidth: 12, top: 'tab', bottom: 'tab', depth: 5 }))
        .toThrow(/leave no material/);
    });

    it('rejects a corner finger shorter than the adjacent tab depth', () => {
      // Top segments are 10mm; the left tab pulls the corner 15mm in
      expect(() =>
        fingerOutline(30, 100, { fingerWidth: 10, top: 'outer_tab', left: 'tab', depth: 3, lrDepth: 15 })
      ).toThrow(/overruns/);
    });
  });

  describe('edgeRuns', () => {
    it('merges skipped end fingers into the flat neighbours', () => {
      const runs = edgeRuns(60, { mode: 'outer_tab', depth: 5, skipEnds: true }, 12);

      expect(runs).toEqual([
        { start: 0, end: 24, offset: 0 },
        { start: 24, end: 36, offset: 5 },
        { start: 36, end: 60, offset: 0 },
      ]);
    });

    it('clips a zone that starts before the edge', () => {
      // 195 / 12 -> 17 segments, the first and last cut off by the edge ends
      const runs = edgeRuns(179, { mode: 'tab', depth: 3, zone: { start: -8, length: 195 } }, 12);
      const segment = 195 / 17;

      expect(runs).toHaveLength(17);
      expect(runs[0].start).toBe(0);
      expect(runs[0].end).toBeCloseTo(segment - 8);
      expect(runs[0].offset).toBe(-3);
      expect(runs[16].start).toBeCloseTo(16 * segment - 8);
      expect(runs[16].end).toBe(179);
    });

    it('adds flat extensions around an inset zone', () => {
      const runs = edgeRuns(132, { mode: 'outer_tab', depth: 3, zone: { start: 6, length: 120 } }, 12);

      expect(runs).toHaveLength(13);
      expect(runs[0]).toEqual({ start: 0, end: 6, offset: 0 });
      expect(runs[1].offset).toBe(3);
      expect(runs[12].start).toBe(126);
      expect(runs[12].offset).toBe(0);
    });

    it('gives tabs and outer tabs the same boundaries', () => {
      const tab = edgeRuns(120, { mode: 'tab', depth: 3 }, 12);
      const outer = edgeRuns(120, { mode: 'outer_tab', depth: 3 }, 12);

      expect(tab.map(r => r.end)).toEqual(outer.map(r => r.end));
      expect(tab.map(r => Math.abs(r.offset))).toEqual(outer.map(r => r.offset));
      expect(tab.every(r => r.offset <= 0)).toBe(true);
    });
  });

  describe('corner stitching', () => {
    it('moves the corner along both outward normals', () => {
      // Top ends with a 3mm outer tab, right starts 5mm in
      expect(stitchCorner(100, 50, 'top', 3, -5)).toEqual({ x: 95, y: -3 });
    });

    it('shares one point object between adjacent edges', () => {
      const edges = fingerEdgeSpecs({ fingerWidth: 12, top: 'tab', right: 'outer_tab', bottom: 'slot', left: 'tab', depth: 3 });
      const paths = buildEdgePaths(120, 60, edges, 12);

      expect(paths.top[paths.top.length - 1]).toBe(paths.right[0]);
      expect(paths.right[paths.right.length - 1]).toBe(paths.bottom[0]);
      expect(paths.bottom[paths.bottom.length - 1]).toBe(paths.left[0]);
      expect(paths.left[paths.left.length - 1]).toBe(paths.top[0]);
    });
  });

  describe('cleanOutline', () => {
    it('drops near-duplicates and the closing point', () => {
      const cleaned = cleanOutline([
        { x: 0, y: 0 },
        { x: 0, y: 0.0005 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
        { x: 0, y: 0 },
      ]);

      expect(cleaned).toEqual([
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
      ]);
    });
  });

  describe.each(permuteEdgeModes())('%s', (_name, modes) => {
    it.each([
      [120, 60, 12, 3, 5],
      [80, 80, 10, 3, 3],
      [200, 50, 15, 4, 2],
    ])('builds a valid %ix%i outline (fw %i)', (width, height, fingerWidth, depth, lrDepth) => {
      const outline = fingerOutline(width, height, { ...modes, fingerWidth, depth, lrDepth });
      expectValidOutlines([{ id: `${width}x${height}`, points: outline }]);
    });
  });
});
