/**
 * Drive comb rail: a bar across the enclosure with one tooth hanging from it
 * per drive. Two identical rails hold the drives front and back; each drive
 * screws to the face of its tooth. Tabs at both bar ends sit in the side
 * panel slots.
 *
 * Layout: x across the drives, y = 0 at the bar top with the teeth below.
 */

import type { Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { PANEL_FILES, TITLE_Y } from './common';

export const RAIL_TAB_HEIGHT = 10;
export const SCREW_HOLE_RADIUS = 1.7;
export const WASHER_RADIUS = 3.5;

// Drives sit this much lower than the tooth tips' reference line
const DRIVE_DROP = 11;
const TOOTH_TIP_RESERVE = 2;

export const railWidth = (cfg: EnclosureConfig): number => cfg.bodyW;

/** Left edge of tooth `i` */
export const toothX = (cfg: EnclosureConfig, i: number): number => {
  const edgeMargin = (railWidth(cfg) - cfg.driveGroupW) / 2;
  const driveCentre = edgeMargin + cfg.drive.thickness / 2 + i * cfg.toothPitch;
  return driveCentre - cfg.comb.toothW / 2 - cfg.comb.toothShift;
};

/** Closed outline, clockwise from the bar's top-left corner */
export const combOutline = (cfg: EnclosureConfig): Point[] => {
  const w = railWidth(cfg);
  const barH = cfg.comb.barH;
  const totalH = cfg.combTotalH;
  const toothW = cfg.comb.toothW;
  const tabLen = cfg.materials.side;
  const tabTop = barH / 2 - RAIL_TAB_HEIGHT / 2;
  const tabBottom = tabTop + RAIL_TAB_HEIGHT;

  const points: Point[] = [
    { x: 0, y: 0 },
    { x: w, y: 0 },
    { x: w, y: tabTop },
    { x: w + tabLen, y: tabTop },
    { x: w + tabLen, y: tabBottom },
    { x: w, y: tabBottom },
    { x: w, y: barH },
  ];

  for (let i = cfg.layout.numDrives - 1; i >= 0; i--) {
    const x = toothX(cfg, i);
    points.push(
      { x: x + toothW, y: barH },
      { x: x + toothW, y: totalH },
      { x, y: totalH },
      { x, y: barH }
    );
  }

  points.push(
    { x: 0, y: barH },
    { x: 0, y: tabBottom },
    { x: -tabLen, y: tabBottom },
    { x: -tabLen, y: tabTop },
    { x: 0, y: tabTop }
  );
  return points;
};

/** y of the drive's connector end on the tooth */
export const driveBottomY = (cfg: EnclosureConfig): number =>
  cfg.combTotalH - TOOTH_TIP_RESERVE + DRIVE_DROP;

export function generateCombRail(cfg: EnclosureConfig): PanelCanvas {
  const w = railWidth(cfg);
  const totalH = cfg.combTotalH;
  const canvas = new PanelCanvas(w + 20, totalH + 20, PANEL_FILES.comb);
  canvas.annotate(
    `DRIVE COMB RAIL (x2) ${w.toFixed(1)}x${totalH.toFixed(1)}mm (${cfg.materials.bracket}mm acrylic)`,
    0,
    TITLE_Y
  );

  canvas.polyline(combOutline(cfg), true);

  const driveY = driveBottomY(cfg);
  const driveL = cfg.drive.length;
  const driveT = cfg.drive.thickness;
  for (let i = 0; i < cfg.layout.numDrives; i++) {
    const x = toothX(cfg, i);
    const cx = x + cfg.comb.toothW / 2;
    for (const z of cfg.drive.sideHoleZ) {
      canvas.circle(cx, driveY - z, SCREW_HOLE_RADIUS);
      canvas.circle(cx, driveY - z, WASHER_RADIUS, 'engrave');
    }
    canvas.rect(cx - driveT / 2, driveY - driveL, driveT, driveL, 'engrave');
    canvas.annotate(`HDD${i + 1}`, x + 1, driveY - driveL / 2);
  }

  return canvas;
}
