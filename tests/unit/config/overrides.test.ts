import { describe, it, expect } from 'vitest';
import { applyOverrides } from '../../../src/config/overrides';
import { deriveEnclosure } from '../../../src/config/enclosure';
import { NAS_4BAY } from '../../../src/config/presets';
import { ConfigError } from '../../../src/utils/errors';

describe('Parameter overrides', () => {
  describe('merge', () => {
    it('replaces only the named fields', () => {
      const params = applyOverrides(NAS_4BAY, { layout: { numDrives: 3 }, comb: { toothShift: -4 } });

      expect(params.layout).toEqual({ ...NAS_4BAY.layout, numDrives: 3 });
      expect(params.comb.toothShift).toBe(-4);
      expect(params.materials).toEqual(NAS_4BAY.materials);
      expect(NAS_4BAY.layout.numDrives).toBe(4);
    });

    it('replaces the side hole list', () => {
      const params = applyOverrides(NAS_4BAY, { drive: { sideHoleZ: [30, 90] } });
      expect(params.drive.sideHoleZ).toEqual([30, 90]);
    });

    it('feeds the derived dimensions', () => {
      const cfg = deriveEnclosure('three', applyOverrides(NAS_4BAY, { layout: { numDrives: 3 } }));

      // 3 x 26.11 + 2 x 19 + 2 x 11.5 = 139.33 -> 140
      expect(cfg.interior.x).toBe(140);
    });

    it('accepts an empty object', () => {
      expect(applyOverrides(NAS_4BAY, {})).toEqual(NAS_4BAY);
    });
  });

  describe('validation', () => {
    it.each([
      [[1, 2], 'Override file must be a JSON object'],
      [null, 'Override file must be a JSON object'],
      [{ lid: {} }, 'Unknown parameter group: "lid"'],
      [{ layout: 4 }, 'layout must be an object'],
      [{ layout: { drives: 3 } }, 'Unknown parameter: "layout.drives"'],
      [{ materials: { wall: '3' } }, 'materials.wall must be a finite number, got string'],
      [{ materials: { wall: -3 } }, 'materials.wall must be positive, got -3'],
      [{ fan: { gapBelow: -1 } }, 'fan.gapBelow must not be negative, got -1'],
      [{ layout: { numDrives: 2.5 } }, 'layout.numDrives must be an integer between 1 and 12, got 2.5'],
      [{ materials: { side: 5000 } }, 'materials.side 5000mm exceeds the maximum of 2000mm'],
      [{ drive: { sideHoleZ: [] } }, 'drive.sideHoleZ must be a non-empty array of numbers'],
      [{ drive: { sideHoleZ: [10, 0] } }, 'drive.sideHoleZ[1] must be positive, got 0'],
    ])('rejects %j', (raw, message) => {
      expect(() => applyOverrides(NAS_4BAY, raw)).toThrow(ConfigError);
      expect(() => applyOverrides(NAS_4BAY, raw)).toThrow(message);
    });

    it('allows zero where a gap may close', () => {
      expect(applyOverrides(NAS_4BAY, { fan: { topClearance: 0 } }).fan.topClearance).toBe(0);
    });
  });
});
