/**
 * Named enclosure presets.
 */

import type { EnclosureParams } from './enclosure';
import { ConfigError } from '../utils/errors';

/** Four 3.5" drives above a single-board computer and SATA HAT */
export const NAS_4BAY: EnclosureParams = {
  materials: { wall: 3, side: 5, bracket: 5 },
  rods: { diameter: 4, hole: 4.5, grommetOd: 10 },
  pi: {
    length: 85,
    width: 56,
    holeSpacingX: 58,
    holeSpacingY: 49,
    holeDia: 2.7,
    holeOffsetX: 3.5,
    holeOffsetY: 3.5,
    standoffH: 10,
    envelopeH: 18,
  },
  hat: { length: 100, width: 56, gapAbovePi: 3, envelopeH: 12.25 },
  drive: {
    length: 146.99,
    width: 101.6,
    thickness: 26.11,
    sideHoleZ: [28.5, 70.5, 130.5],
    sideHoleInset: 6.35,
  },
  fan: {
    size: 80,
    depth: 25,
    holeSpacing: 71.5,
    mountHole: 4.3,
    openingRadius: 37,
    gapBelow: 10,
    topClearance: 5,
  },
  layout: { numDrives: 4, driveGap: 19, driveEdgeMargin: 11.5, cableZoneH: 82 },
  comb: { barH: 12, toothW: 20, screwHeadClearance: 4, toothShift: 7 },
  joints: { fingerWidth: 12, minOverhang: 3 },
};

/** Two drives: narrower case, teeth centred on the drives */
export const NAS_2BAY: EnclosureParams = {
  ...NAS_4BAY,
  layout: { numDrives: 2, driveGap: 19, driveEdgeMargin: 15, cableZoneH: 82 },
  comb: { ...NAS_4BAY.comb, toothShift: 0 },
};

export const PRESETS: Record<string, EnclosureParams> = {
  'nas-4bay': NAS_4BAY,
  'nas-2bay': NAS_2BAY,
};

export const DEFAULT_PRESET = 'nas-4bay';

export const presetNames = (): string[] => Object.keys(PRESETS);

export function getPreset(name: string): EnclosureParams {
  const preset = PRESETS[name];
  if (!preset) {
    throw new ConfigError(`Unknown preset "${name}". Available: ${presetNames().join(', ')}`);
  }
  return preset;
}
