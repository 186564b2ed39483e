/**
 * Enclosure parameters and derived dimensions.
 *
 * `EnclosureParams` holds the raw physical constants, grouped by part.
 * `deriveEnclosure` turns them into a frozen `EnclosureConfig` with every
 * dimension the panel assemblers and sheet recipes read. All values in mm.
 *
 * Coordinates: X runs left to right across the enclosure, Y front to back,
 * Z from the underside of the bottom panel upward.
 */

import { assertPositive } from '../utils/errors';

// =============================================================================
// Raw parameters
// =============================================================================

export type MaterialParams = {
  wall: number;      // front, back and top panels
  side: number;      // left/right sides and bottom panel
  bracket: number;   // comb rails and fan bracket
};

export type RodParams = {
  diameter: number;
  hole: number;        // clearance hole
  grommetOd: number;   // engraved ring around each rod hole
};

export type PiParams = {
  length: number;
  width: number;
  holeSpacingX: number;
  holeSpacingY: number;
  holeDia: number;
  holeOffsetX: number;
  holeOffsetY: number;
  standoffH: number;
  envelopeH: number;   // PCB underside to top of tallest connector
};

export type HatParams = {
  length: number;
  width: number;
  gapAbovePi: number;
  envelopeH: number;
};

export type DriveParams = {
  length: number;        // vertical once mounted
  width: number;         // front to back
  thickness: number;     // horizontal pitch
  sideHoleZ: number[];   // side mounting holes, measured from the connector end
  sideHoleInset: number;
};

export type FanParams = {
  size: number;
  depth: number;
  holeSpacing: number;
  mountHole: number;
  openingRadius: number;
  gapBelow: number;      // airflow gap between drive tops and fan bracket
  topClearance: number;  // fan top to top panel
};

export type LayoutParams = {
  numDrives: number;
  driveGap: number;
  driveEdgeMargin: number;
  cableZoneH: number;
};

export type CombParams = {
  barH: number;
  toothW: number;
  screwHeadClearance: number;
  toothShift: number;   // teeth move this far left of the drive centres
};

export type JointParams = {
  fingerWidth: number;
  minOverhang: number;  // material between a through-slot and the panel edge
};

export interface EnclosureParams {
  materials: MaterialParams;
  rods: RodParams;
  pi: PiParams;
  hat: HatParams;
  drive: DriveParams;
  fan: FanParams;
  layout: LayoutParams;
  comb: CombParams;
  joints: JointParams;
}

// =============================================================================
// Derived configuration
// =============================================================================

export interface ZStack {
  bottomTop: number;     // top face of the bottom panel
  piPcb: number;
  piTop: number;
  hatPcb: number;
  hatTop: number;
  driveBottom: number;
  driveTop: number;
  fanBracket: number;
  fanTop: number;
  topPanel: number;      // underside of the top panel
  total: number;
}

export interface EnclosureConfig extends EnclosureParams {
  name: string;
  driveGroupW: number;
  driveZoneW: number;
  interior: { x: number; y: number };
  exterior: { x: number; y: number };
  z: ZStack;
  sideH: number;          // side panel height, bottom-panel top to top-panel underside
  sideOverlap: number;    // side panel wings past the front/back panels
  bodyW: number;          // front/back panel body between the side-panel inner faces
  rodInset: number;
  combBarZ: number;
  combToothLen: number;
  combTotalH: number;
  toothPitch: number;
}

const ceilTo = (value: number, step: number): number => Math.ceil(value / step) * step;

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
};

const cloneParams = (params: EnclosureParams): EnclosureParams => ({
  materials: { ...params.materials },
  rods: { ...params.rods },
  pi: { ...params.pi },
  hat: { ...params.hat },
  drive: { ...params.drive, sideHoleZ: [...params.drive.sideHoleZ] },
  fan: { ...params.fan },
  layout: { ...params.layout },
  comb: { ...params.comb },
  joints: { ...params.joints },
});

export function deriveEnclosure(name: string, params: EnclosureParams): Readonly<EnclosureConfig> {
  const p = cloneParams(params);
  const { materials, pi, hat, drive, fan, layout, comb, joints } = p;

  assertPositive(layout.numDrives, 'layout.numDrives');
  assertPositive(joints.fingerWidth, 'joints.fingerWidth');

  const driveGroupW = layout.numDrives * drive.thickness + (layout.numDrives - 1) * layout.driveGap;
  const driveZoneW = driveGroupW + 2 * layout.driveEdgeMargin;

  // Y must fit a screw clearance and a rail on each side of the drive
  const interiorX = ceilTo(Math.max(driveZoneW, hat.length + 20, pi.length + 20), 5);
  const interiorY = ceilTo(
    Math.max(2 * comb.screwHeadClearance + 2 * materials.bracket + drive.width, pi.width + 20),
    5
  );

  const bottomTop = materials.side;
  const piPcb = bottomTop + pi.standoffH;
  const piTop = piPcb + pi.envelopeH;
  const hatPcb = piTop + hat.gapAbovePi;
  const hatTop = hatPcb + hat.envelopeH;
  const driveBottom = hatTop + layout.cableZoneH;
  const driveTop = driveBottom + drive.length;
  const fanBracket = driveTop + fan.gapBelow;
  const fanTop = fanBracket + materials.wall + fan.depth;
  const topPanel = fanTop + fan.topClearance;

  const combToothLen = drive.length - comb.barH - 10;

  return deepFreeze({
    ...p,
    name,
    driveGroupW,
    driveZoneW,
    interior: { x: interiorX, y: interiorY },
    exterior: { x: interiorX + 2 * materials.side, y: interiorY + 2 * materials.wall },
    z: {
      bottomTop,
      piPcb,
      piTop,
      hatPcb,
      hatTop,
      driveBottom,
      driveTop,
      fanBracket,
      fanTop,
      topPanel,
      total: topPanel + materials.wall,
    },
    sideH: topPanel - materials.side,
    sideOverlap: joints.minOverhang + materials.wall,
    bodyW: interiorX + 2 * materials.side - 2 * (joints.minOverhang + materials.side),
    rodInset: materials.side + 2 * p.rods.diameter,
    combBarZ: driveTop - comb.barH,
    combToothLen,
    combTotalH: comb.barH + combToothLen,
    toothPitch: drive.thickness + layout.driveGap,
  });
}
