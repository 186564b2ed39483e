import type { Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { sidePanelOutline } from '../utils/outlinePresets';
import { fingerSegments } from '../utils/fingerPoints';
import { PANEL_FILES, TITLE_Y, addOutline, sideZToY, spread } from './common';

export type SideId = 'left' | 'right';

export const RAIL_SLOT_HEIGHT = 10.3;
export const SIDE_VENT = { width: 18, height: 2.5, railClearance: 2 };

/** Comb rail centre lines along the enclosure depth (enclosure Y) */
export const railCentres = (cfg: EnclosureConfig): [number, number] => {
  const { wall, bracket } = cfg.materials;
  const clearance = cfg.comb.screwHeadClearance;
  return [
    wall + clearance + bracket / 2,
    cfg.exterior.y - wall - clearance - bracket / 2,
  ];
};

/** Side panel x for an enclosure Y */
const depthToX = (cfg: EnclosureConfig, y: number): number => cfg.sideOverlap + (y - cfg.materials.wall);

/**
 * Through-slots for the front and back panel tabs. They follow the
 * front/back panels' edge fingers over the side height; the first and last
 * fingers are skipped there, so they are skipped here too.
 */
export const frontBackSlots = (cfg: EnclosureConfig, panelWidth: number): { x: number; y: number; width: number; height: number }[] => {
  const slotW = cfg.materials.wall;
  const segments = fingerSegments({ start: 0, length: cfg.sideH }, cfg.joints.fingerWidth);
  const last = segments.length - 1;
  const xs = [cfg.joints.minOverhang, panelWidth - cfg.joints.minOverhang - slotW];

  return xs.flatMap(x =>
    segments
      .filter(segment => segment.isFinger && segment.index !== 0 && segment.index !== last)
      .map(segment => ({ x, y: segment.start, width: slotW, height: segment.end - segment.start }))
  );
};

/** Top-left corners of the vent slots between the two rail slots */
export const sideVentSlots = (cfg: EnclosureConfig): Point[] => {
  const zToY = sideZToY(cfg);
  const [front, back] = railCentres(cfg);
  const half = cfg.materials.bracket / 2;
  const firstX = depthToX(cfg, front) + half + SIDE_VENT.railClearance;
  const lastX = depthToX(cfg, back) - half - SIDE_VENT.railClearance - SIDE_VENT.width;
  const columns = spread(firstX, lastX, 3);

  const rows: number[] = [];
  const cableStart = cfg.z.hatTop + 15;
  const cableEnd = cfg.z.driveBottom - 10;
  if (cableEnd > cableStart) rows.push(...spread(cableStart, cableEnd, 4));
  rows.push(...spread(cfg.z.driveBottom + 20, cfg.z.driveTop - 10, 6));

  return rows.flatMap(z => columns.map(x => ({ x, y: zToY(z) })));
};

export function generateSidePanel(cfg: EnclosureConfig, side: SideId): PanelCanvas {
  const outline = sidePanelOutline(cfg);
  const w = outline.width;
  const h = outline.height;
  const zToY = sideZToY(cfg);

  const canvas = new PanelCanvas(w, h, side === 'left' ? PANEL_FILES.left : PANEL_FILES.right, cfg.materials.side + 3);
  canvas.annotate(`${side.toUpperCase()} SIDE ${w.toFixed(1)}x${h.toFixed(1)}mm (${cfg.materials.side}mm)`, 0, TITLE_Y);
  addOutline(canvas, outline);

  for (const slot of frontBackSlots(cfg, w)) {
    canvas.rect(slot.x, slot.y, slot.width, slot.height);
  }

  // Rail tabs sit at the middle of the comb bar
  const slotW = cfg.materials.bracket;
  const slotY = zToY(cfg.combBarZ + cfg.comb.barH / 2) - RAIL_SLOT_HEIGHT / 2;
  for (const rail of railCentres(cfg)) {
    canvas.rect(depthToX(cfg, rail) - slotW / 2, slotY, slotW, RAIL_SLOT_HEIGHT);
  }

  for (const vent of sideVentSlots(cfg)) {
    canvas.slot(vent.x, vent.y, SIDE_VENT.width, SIDE_VENT.height);
  }

  return canvas;
}
