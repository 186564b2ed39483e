import type { Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { PANEL_FILES, TITLE_Y, rodPositions } from './common';

// Clearance to the side panels and the front panel
const FIT_CLEARANCE = 2;
const FRONT_OFFSET = 1;

export interface FanBracketSize {
  width: number;
  height: number;
}

export const fanBracketSize = (cfg: EnclosureConfig): FanBracketSize => ({
  width: cfg.bodyW - FIT_CLEARANCE,
  height: cfg.interior.y - FIT_CLEARANCE,
});

/**
 * Rod holes in bracket coordinates. The bracket's left edge sits 1 mm inside
 * the side panel's inner face and its front edge 1 mm behind the front
 * panel, so the rods line up with the top and bottom panel holes.
 */
export const bracketRodHoles = (cfg: EnclosureConfig): Point[] => {
  const ox = cfg.joints.minOverhang + cfg.materials.side + FRONT_OFFSET;
  const oy = FRONT_OFFSET;
  return rodPositions(cfg).map(p => ({ x: p.x - ox, y: p.y - oy }));
};

export function generateFanBracket(cfg: EnclosureConfig): PanelCanvas {
  const { width, height } = fanBracketSize(cfg);
  const canvas = new PanelCanvas(width + 10, height + 10, PANEL_FILES.fanBracket);
  canvas.annotate(`FAN BRACKET ${width.toFixed(0)}x${height.toFixed(0)}mm (${cfg.materials.bracket}mm acrylic)`, 0, TITLE_Y);

  canvas.rect(0, 0, width, height);

  for (const hole of bracketRodHoles(cfg)) {
    canvas.circle(hole.x, hole.y, cfg.rods.hole / 2);
  }

  const cx = width / 2;
  const cy = height / 2;
  canvas.circle(cx, cy, cfg.fan.openingRadius);

  const half = cfg.fan.holeSpacing / 2;
  for (const [dx, dy] of [[-half, -half], [half, -half], [-half, half], [half, half]]) {
    canvas.circle(cx + dx, cy + dy, cfg.fan.mountHole / 2);
  }

  return canvas;
}
