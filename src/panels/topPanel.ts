import type { Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { topBottomPanelOutline } from '../utils/outlinePresets';
import { PANEL_FILES, TITLE_Y, addOutline, addRodHoles, addTopBottomSideSlots, dims } from './common';

/**
 * Grille of concentric rings of arc slots. Every opening stays narrower
 * than a finger.
 */
export const GRILLE = {
  hubRadius: 6,
  slotWidth: 3,     // radial
  ringGap: 4,       // radial material between rings
  spokeGap: 3,      // material between slots along a ring
} as const;

/** Inner radius of every ring that fits inside `outerRadius` */
export const grilleRings = (outerRadius: number): number[] => {
  const pitch = GRILLE.slotWidth + GRILLE.ringGap;
  const rings: number[] = [];
  for (let r = GRILLE.hubRadius; r + GRILLE.slotWidth <= outerRadius; r += pitch) {
    rings.push(r);
  }
  return rings;
};

/**
 * Closed outlines of the arc slots of one ring: outer arc forward, inner arc
 * back, each arc approximated by straight segments.
 */
export const ringSlots = (cx: number, cy: number, innerRadius: number): Point[][] => {
  const outerRadius = innerRadius + GRILLE.slotWidth;
  const midRadius = innerRadius + GRILLE.slotWidth / 2;
  const spokeAngle = GRILLE.spokeGap / midRadius;
  const count = Math.max(4, Math.floor((2 * Math.PI * midRadius) / (3 * GRILLE.slotWidth + GRILLE.spokeGap)));
  const arcAngle = (2 * Math.PI - count * spokeAngle) / count;
  const steps = Math.max(4, Math.floor((arcAngle * midRadius) / 2));

  const slots: Point[][] = [];
  for (let i = 0; i < count; i++) {
    const start = (2 * Math.PI * i) / count + spokeAngle / 2;
    const outer: Point[] = [];
    const inner: Point[] = [];
    for (let step = 0; step <= steps; step++) {
      const a = start + (arcAngle * step) / steps;
      outer.push({ x: cx + outerRadius * Math.cos(a), y: cy + outerRadius * Math.sin(a) });
      inner.push({ x: cx + innerRadius * Math.cos(a), y: cy + innerRadius * Math.sin(a) });
    }
    slots.push([...outer, ...inner.reverse()]);
  }
  return slots;
};

export function generateTopPanel(cfg: EnclosureConfig): PanelCanvas {
  const outline = topBottomPanelOutline(cfg);
  const canvas = new PanelCanvas(outline.width, outline.height, PANEL_FILES.top, cfg.materials.wall + 3);
  canvas.annotate(`TOP PANEL ${dims(outline.width, outline.height)} (${cfg.materials.wall}mm)`, 0, TITLE_Y);

  addOutline(canvas, outline);
  addTopBottomSideSlots(canvas, cfg);
  addRodHoles(canvas, cfg);

  // The fan screws to its bracket, so only the grille is cut here
  const cx = outline.width / 2;
  const cy = outline.height / 2;
  for (const r of grilleRings(cfg.fan.openingRadius)) {
    for (const slot of ringSlots(cx, cy, r)) {
      canvas.polyline(slot, true);
    }
  }

  return canvas;
}
