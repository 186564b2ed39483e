/**
 * Parameter override validation and merge.
 *
 * An override file is a JSON object holding a subset of `EnclosureParams`:
 *
 *   { "layout": { "numDrives": 3 }, "comb": { "toothShift": 4 } }
 *
 * Unknown groups or fields, wrong types and out-of-range values throw
 * `ConfigError`. Valid values replace the preset's; everything else is kept.
 */

import type { EnclosureParams } from './enclosure';
import { ConfigError } from '../utils/errors';

type FieldKind = 'positive' | 'nonNegative' | 'finite' | 'integer';

// =============================================================================
// Limits
// =============================================================================

const LIMITS = {
  maxDimension: 2000,
  maxDrives: 12,
} as const;

/** Fields that are not plain positive dimensions */
const FIELD_KINDS: Record<string, FieldKind> = {
  'layout.numDrives': 'integer',
  'comb.toothShift': 'finite',
  'fan.topClearance': 'nonNegative',
  'fan.gapBelow': 'nonNegative',
  'hat.gapAbovePi': 'nonNegative',
  'pi.holeOffsetX': 'nonNegative',
  'pi.holeOffsetY': 'nonNegative',
  'layout.driveEdgeMargin': 'nonNegative',
  'layout.driveGap': 'nonNegative',
  'comb.screwHeadClearance': 'nonNegative',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertNumber(value: unknown, field: string): asserts value is number {
  if (typeof value !== 'number' || !isFinite(value)) {
    throw new ConfigError(`${field} must be a finite number, got ${typeof value}`);
  }
}

function checkField(value: unknown, field: string): number {
  assertNumber(value, field);
  const kind = FIELD_KINDS[field] ?? 'positive';

  switch (kind) {
    case 'positive':
      if (value <= 0) throw new ConfigError(`${field} must be positive, got ${value}`);
      break;
    case 'nonNegative':
      if (value < 0) throw new ConfigError(`${field} must not be negative, got ${value}`);
      break;
    case 'integer':
      if (!Number.isInteger(value) || value < 1 || value > LIMITS.maxDrives) {
        throw new ConfigError(`${field} must be an integer between 1 and ${LIMITS.maxDrives}, got ${value}`);
      }
      break;
    case 'finite':
      break;
  }
  if (Math.abs(value) > LIMITS.maxDimension) {
    throw new ConfigError(`${field} ${value}mm exceeds the maximum of ${LIMITS.maxDimension}mm`);
  }
  return value;
}

function checkNumberList(value: unknown, field: string): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${field} must be a non-empty array of numbers`);
  }
  return value.map((item: unknown, i) => checkField(item, `${field}[${i}]`));
}

/**
 * Validate that `raw` only names known groups and fields of `base`.
 * Returns the group objects keyed by group name.
 */
function readGroups(raw: unknown, base: EnclosureParams): Map<string, Record<string, unknown>> {
  if (!isPlainObject(raw)) {
    throw new ConfigError('Override file must be a JSON object');
  }

  const groups = new Map<string, Record<string, unknown>>();
  for (const [groupName, group] of Object.entries(raw)) {
    if (!Object.prototype.hasOwnProperty.call(base, groupName)) {
      throw new ConfigError(`Unknown parameter group: "${groupName}"`);
    }
    if (!isPlainObject(group)) {
      throw new ConfigError(`${groupName} must be an object`);
    }
    const known = new Set(Object.keys(Reflect.get(base, groupName) ?? {}));
    for (const field of Object.keys(group)) {
      if (!known.has(field)) {
        throw new ConfigError(`Unknown parameter: "${groupName}.${field}"`);
      }
    }
    groups.set(groupName, group);
  }
  return groups;
}

/**
 * Merge a parsed override file into `base`. `base` is not modified.
 */
export function applyOverrides(base: EnclosureParams, raw: unknown): EnclosureParams {
  const groups = readGroups(raw, base);

  const num = (group: string, field: string, fallback: number): number => {
    const value = groups.get(group)?.[field];
    return value === undefined ? fallback : checkField(value, `${group}.${field}`);
  };

  const sideHoles = groups.get('drive')?.sideHoleZ;

  return {
    materials: {
      wall: num('materials', 'wall', base.materials.wall),
      side: num('materials', 'side', base.materials.side),
      bracket: num('materials', 'bracket', base.materials.bracket),
    },
    rods: {
      diameter: num('rods', 'diameter', base.rods.diameter),
      hole: num('rods', 'hole', base.rods.hole),
      grommetOd: num('rods', 'grommetOd', base.rods.grommetOd),
    },
    pi: {
      length: num('pi', 'length', base.pi.length),
      width: num('pi', 'width', base.pi.width),
      holeSpacingX: num('pi', 'holeSpacingX', base.pi.holeSpacingX),
      holeSpacingY: num('pi', 'holeSpacingY', base.pi.holeSpacingY),
      holeDia: num('pi', 'holeDia', base.pi.holeDia),
      holeOffsetX: num('pi', 'holeOffsetX', base.pi.holeOffsetX),
      holeOffsetY: num('pi', 'holeOffsetY', base.pi.holeOffsetY),
      standoffH: num('pi', 'standoffH', base.pi.standoffH),
      envelopeH: num('pi', 'envelopeH', base.pi.envelopeH),
    },
    hat: {
      length: num('hat', 'length', base.hat.length),
      width: num('hat', 'width', base.hat.width),
      gapAbovePi: num('hat', 'gapAbovePi', base.hat.gapAbovePi),
      envelopeH: num('hat', 'envelopeH', base.hat.envelopeH),
    },
    drive: {
      length: num('drive', 'length', base.drive.length),
      width: num('drive', 'width', base.drive.width),
      thickness: num('drive', 'thickness', base.drive.thickness),
      sideHoleZ:
        sideHoles === undefined
          ? [...base.drive.sideHoleZ]
          : checkNumberList(sideHoles, 'drive.sideHoleZ'),
      sideHoleInset: num('drive', 'sideHoleInset', base.drive.sideHoleInset),
    },
    fan: {
      size: num('fan', 'size', base.fan.size),
      depth: num('fan', 'depth', base.fan.depth),
      holeSpacing: num('fan', 'holeSpacing', base.fan.holeSpacing),
      mountHole: num('fan', 'mountHole', base.fan.mountHole),
      openingRadius: num('fan', 'openingRadius', base.fan.openingRadius),
      gapBelow: num('fan', 'gapBelow', base.fan.gapBelow),
      topClearance: num('fan', 'topClearance', base.fan.topClearance),
    },
    layout: {
      numDrives: num('layout', 'numDrives', base.layout.numDrives),
      driveGap: num('layout', 'driveGap', base.layout.driveGap),
      driveEdgeMargin: num('layout', 'driveEdgeMargin', base.layout.driveEdgeMargin),
      cableZoneH: num('layout', 'cableZoneH', base.layout.cableZoneH),
    },
    comb: {
      barH: num('comb', 'barH', base.comb.barH),
      toothW: num('comb', 'toothW', base.comb.toothW),
      screwHeadClearance: num('comb', 'screwHeadClearance', base.comb.screwHeadClearance),
      toothShift: num('comb', 'toothShift', base.comb.toothShift),
    },
    joints: {
      fingerWidth: num('joints', 'fingerWidth', base.joints.fingerWidth),
      minOverhang: num('joints', 'minOverhang', base.joints.minOverhang),
    },
  };
}
