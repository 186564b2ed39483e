import { describe, it, expect } from 'vitest';
import { deriveEnclosure } from '../../../src/config/enclosure';
import { DEFAULT_PRESET, NAS_4BAY, getPreset, presetNames } from '../../../src/config/presets';
import { ConfigError, GeometryError } from '../../../src/utils/errors';
import { nas2bay, nas4bay } from '../../fixtures/enclosures';

describe('Enclosure configuration', () => {
  describe('nas-4bay', () => {
    it('sizes the interior around the drives and boards', () => {
      expect(nas4bay.driveGroupW).toBeCloseTo(161.44, 6);
      expect(nas4bay.driveZoneW).toBeCloseTo(184.44, 6);
      expect(nas4bay.interior).toEqual({ x: 185, y: 120 });
      expect(nas4bay.exterior).toEqual({ x: 195, y: 126 });
    });

    it('stacks the components bottom to top', () => {
      const z = nas4bay.z;
      expect(z.bottomTop).toBe(5);
      expect(z.piPcb).toBe(15);
      expect(z.piTop).toBe(33);
      expect(z.hatPcb).toBe(36);
      expect(z.hatTop).toBe(48.25);
      expect(z.driveBottom).toBe(130.25);
      expect(z.driveTop).toBeCloseTo(277.24, 6);
      expect(z.fanBracket).toBeCloseTo(287.24, 6);
      expect(z.fanTop).toBeCloseTo(315.24, 6);
      expect(z.topPanel).toBeCloseTo(320.24, 6);
      expect(z.total).toBeCloseTo(323.24, 6);
    });

    it('derives panel and comb dimensions', () => {
      expect(nas4bay.sideH).toBeCloseTo(315.24, 6);
      expect(nas4bay.sideOverlap).toBe(6);
      expect(nas4bay.bodyW).toBe(179);
      expect(nas4bay.rodInset).toBe(13);
      expect(nas4bay.combBarZ).toBeCloseTo(265.24, 6);
      expect(nas4bay.combToothLen).toBeCloseTo(124.99, 6);
      expect(nas4bay.combTotalH).toBeCloseTo(136.99, 6);
      expect(nas4bay.toothPitch).toBeCloseTo(45.11, 6);
    });
  });

  describe('nas-2bay', () => {
    it('is narrower but keeps the height', () => {
      expect(nas2bay.interior).toEqual({ x: 120, y: 120 });
      expect(nas2bay.exterior.x).toBe(130);
      expect(nas2bay.bodyW).toBe(114);
      expect(nas2bay.z.total).toBeCloseTo(nas4bay.z.total, 6);
    });
  });

  describe('deriveEnclosure', () => {
    it('freezes the result and leaves the preset alone', () => {
      const cfg = deriveEnclosure('copy', NAS_4BAY);

      expect(Object.isFrozen(cfg)).toBe(true);
      expect(Object.isFrozen(cfg.z)).toBe(true);
      expect(Object.isFrozen(cfg.drive.sideHoleZ)).toBe(true);
      expect(Object.isFrozen(NAS_4BAY.drive.sideHoleZ)).toBe(false);
      expect(cfg.drive.sideHoleZ).not.toBe(NAS_4BAY.drive.sideHoleZ);
    });

    it('rejects an enclosure without drives', () => {
      const params = { ...NAS_4BAY, layout: { ...NAS_4BAY.layout, numDrives: 0 } };
      expect(() => deriveEnclosure('empty', params)).toThrow(GeometryError);
    });
  });

  describe('presets', () => {
    it('lists the built-in presets', () => {
      expect(presetNames()).toEqual(['nas-4bay', 'nas-2bay']);
      expect(DEFAULT_PRESET).toBe('nas-4bay');
      expect(getPreset('nas-4bay')).toBe(NAS_4BAY);
    });

    it('names the available presets when one is unknown', () => {
      expect(() => getPreset('nas-9bay')).toThrow(ConfigError);
      expect(() => getPreset('nas-9bay')).toThrow('Unknown preset "nas-9bay". Available: nas-4bay, nas-2bay');
    });
  });
});
