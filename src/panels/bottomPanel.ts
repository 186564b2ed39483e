import type { Point, Rect2D } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { BoundsOps } from '../utils/bounds';
import { topBottomPanelOutline } from '../utils/outlinePresets';
import { PANEL_FILES, TITLE_Y, addOutline, addRodHoles, addTopBottomSideSlots, dims } from './common';

// Board sits with its long edge front to back, ports toward the front panel
const BOARD_FRONT_CLEARANCE = 2;

const VENT = { width: 22, height: 3, spacing: 5, marginY: 8, sideClearance: 5 };
const HOLE_KEEPOUT = 4;
const SD_KEEPOUT = 2;

// SD slot span along the board's short edge
const SD_SLOT = { from: 22.05, to: 34, width: 14, height: 20, radius: 3 };

export interface BoardPlacement {
  x: number;
  y: number;
  width: number;
  length: number;
}

export const boardPlacement = (cfg: EnclosureConfig): BoardPlacement => ({
  x: (cfg.exterior.x - cfg.pi.width) / 2,
  y: BOARD_FRONT_CLEARANCE,
  width: cfg.pi.width,
  length: cfg.pi.length,
});

/**
 * Mounting holes in panel coordinates. The board's own X runs along its long
 * edge and is reversed so the port end faces the front.
 */
export const boardHoles = (cfg: EnclosureConfig): Point[] => {
  const { holeOffsetX, holeOffsetY, holeSpacingX, holeSpacingY } = cfg.pi;
  const board = boardPlacement(cfg);
  const native: Point[] = [
    { x: holeOffsetX, y: holeOffsetY },
    { x: holeOffsetX + holeSpacingX, y: holeOffsetY },
    { x: holeOffsetX, y: holeOffsetY + holeSpacingY },
    { x: holeOffsetX + holeSpacingX, y: holeOffsetY + holeSpacingY },
  ];
  return native.map(p => ({ x: board.x + p.y, y: board.y + board.length - p.x }));
};

/** SD card access cutout, pushed past the board's back edge for finger reach */
export const sdCutout = (cfg: EnclosureConfig): Rect2D => {
  const board = boardPlacement(cfg);
  const x = board.x + SD_SLOT.from + (SD_SLOT.to - SD_SLOT.from - SD_SLOT.width) / 2;
  const y = board.y + board.length - SD_SLOT.height / 4;
  return BoundsOps.fromSize(x, y, SD_SLOT.width, SD_SLOT.height);
};

const hits = (x: number, y: number, zone: Rect2D): boolean =>
  x < zone.maxX && x + VENT.width > zone.minX && y < zone.maxY && y + VENT.height > zone.minY;

/**
 * Top-left corners of the vent slots: a centred grid clear of the side
 * slots and the front/back edges, minus slots that touch a mounting hole or
 * the SD cutout.
 */
export const bottomVentSlots = (cfg: EnclosureConfig): Point[] => {
  const w = cfg.exterior.x;
  const h = cfg.interior.y;
  const marginX = cfg.joints.minOverhang + cfg.materials.side + VENT.sideClearance;
  const pitchX = VENT.width + VENT.spacing;
  const pitchY = VENT.height + VENT.spacing;
  const spanX = w - 2 * marginX;
  const spanY = h - 2 * VENT.marginY;
  const cols = Math.floor(spanX / pitchX);
  const rows = Math.floor(spanY / pitchY);
  const x0 = marginX + (spanX - (cols * pitchX - VENT.spacing)) / 2;
  const y0 = VENT.marginY + (spanY - (rows * pitchY - VENT.spacing)) / 2;

  const sd = sdCutout(cfg);
  const keepouts: Rect2D[] = [
    ...boardHoles(cfg).map(p => ({
      minX: p.x - HOLE_KEEPOUT,
      minY: p.y - HOLE_KEEPOUT,
      maxX: p.x + HOLE_KEEPOUT,
      maxY: p.y + HOLE_KEEPOUT,
    })),
    {
      minX: sd.minX - SD_KEEPOUT,
      minY: sd.minY - SD_KEEPOUT,
      maxX: sd.maxX + SD_KEEPOUT,
      maxY: sd.maxY + SD_KEEPOUT,
    },
  ];

  const slots: Point[] = [];
  for (let col = 0; col < cols; col++) {
    const x = x0 + col * pitchX;
    for (let row = 0; row < rows; row++) {
      const y = y0 + row * pitchY;
      if (!keepouts.some(zone => hits(x, y, zone))) slots.push({ x, y });
    }
  }
  return slots;
};

export function generateBottomPanel(cfg: EnclosureConfig): PanelCanvas {
  const outline = topBottomPanelOutline(cfg);
  const canvas = new PanelCanvas(outline.width, outline.height, PANEL_FILES.bottom, cfg.materials.side + 3);
  canvas.annotate(`BOTTOM PANEL ${dims(outline.width, outline.height)} (${cfg.materials.side}mm)`, 0, TITLE_Y);

  addOutline(canvas, outline);
  addTopBottomSideSlots(canvas, cfg);
  addRodHoles(canvas, cfg);

  for (const hole of boardHoles(cfg)) {
    canvas.circle(hole.x, hole.y, cfg.pi.holeDia / 2);
  }

  for (const slot of bottomVentSlots(cfg)) {
    canvas.slot(slot.x, slot.y, VENT.width, VENT.height);
  }

  const sd = sdCutout(cfg);
  canvas.roundedRect(sd.minX, sd.minY, SD_SLOT.width, SD_SLOT.height, SD_SLOT.radius);
  canvas.annotate('SD card', sd.minX, sd.minY - 1.5, 2);

  const board = boardPlacement(cfg);
  canvas.rect(board.x, board.y, board.width, board.length, 'engrave');
  canvas.annotate('Pi5 (ports at front)', board.x + 2, board.y + 10);

  return canvas;
}
