/**
 * Shared pieces of the panel assemblers: file names, coordinate mapping
 * between enclosure Z and panel Y, and features that several panels share.
 */

import type { Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { fingerSegments } from '../utils/fingerPoints';
import type { OutlinePreset } from '../utils/outlinePresets';

export const PANEL_FILES = {
  bottom: '01_bottom_panel.svg',
  top: '02_top_panel.svg',
  front: '03_front_panel.svg',
  back: '04_back_panel.svg',
  left: '05_left_side_panel.svg',
  right: '06_right_side_panel.svg',
  comb: '07_drive_comb_rail.svg',
  fanBracket: '09_fan_bracket.svg',
} as const;

export type PanelId = keyof typeof PANEL_FILES;

export const TITLE_Y = -3;

/** Whole-millimetre dimension label, e.g. "195x120mm" */
export const dims = (width: number, height: number, digits: number = 0): string =>
  `${width.toFixed(digits)}x${height.toFixed(digits)}mm`;

// =============================================================================
// Z mapping
// =============================================================================

/**
 * Front and back panels: y = 0 at their top edge, which sits one side-panel
 * thickness above the top panel's underside.
 */
export const frontBackZToY = (cfg: EnclosureConfig) => (z: number): number =>
  cfg.z.topPanel - z + cfg.materials.side;

/** Side panels: y = 0 at the top panel's underside */
export const sideZToY = (cfg: EnclosureConfig) => (z: number): number => cfg.z.topPanel - z;

/** `count` values from `start` to `end` inclusive */
export const spread = (start: number, end: number, count: number): number[] => {
  if (count === 1) return [start];
  return Array.from({ length: count }, (_, i) => start + (i * (end - start)) / (count - 1));
};

// =============================================================================
// Shared features
// =============================================================================

export const addOutline = (canvas: PanelCanvas, outline: OutlinePreset): PanelCanvas =>
  canvas.polyline(outline.points, true, 'cut');

/** Vertical rod positions on a top/bottom panel (exterior.x by interior.y) */
export const rodPositions = (cfg: EnclosureConfig): Point[] => {
  const inset = cfg.rodInset;
  const w = cfg.exterior.x;
  const h = cfg.interior.y;
  return [
    { x: inset, y: inset },
    { x: w - inset, y: inset },
    { x: inset, y: h - inset },
    { x: w - inset, y: h - inset },
  ];
};

/** Rod clearance holes with an engraved grommet ring */
export const addRodHoles = (canvas: PanelCanvas, cfg: EnclosureConfig): void => {
  for (const p of rodPositions(cfg)) {
    canvas.circle(p.x, p.y, cfg.rods.hole / 2);
    canvas.circle(p.x, p.y, cfg.rods.grommetOd / 2, 'engrave');
  }
};

/**
 * Through-slots near the left and right edges of a top/bottom panel. They
 * receive the side-panel tabs, so they follow the side panel's finger
 * segments over the interior depth.
 */
export const addTopBottomSideSlots = (canvas: PanelCanvas, cfg: EnclosureConfig): void => {
  const slotW = cfg.materials.side;
  const xs = [cfg.joints.minOverhang, cfg.exterior.x - cfg.joints.minOverhang - slotW];
  const segments = fingerSegments({ start: 0, length: cfg.interior.y }, cfg.joints.fingerWidth);

  for (const x of xs) {
    for (const segment of segments) {
      if (segment.isFinger) canvas.rect(x, segment.start, slotW, segment.end - segment.start);
    }
  }
};
