import type { Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { frontBackPanelOutline } from '../utils/outlinePresets';
import { GeometryError } from '../utils/errors';
import { PANEL_FILES, TITLE_Y, addOutline } from './common';
import glyphTable from './logoGlyphs.json';

export const LOGO_TEXT = 'pi-nas';
const LOGO_SIDE_MARGIN = 10;

// Strokes in a unit cell, y down; each point is [x, y]
const GLYPHS: Record<string, number[][][]> = glyphTable.glyphs;
const { cell, boldOffsets } = glyphTable;

const unitPoint = (pair: number[]): Point => {
  if (pair.length !== 2) {
    throw new GeometryError(`glyph point must be [x, y], got [${pair.join(', ')}]`);
  }
  return { x: pair[0], y: pair[1] };
};

export interface LogoLayout {
  x: number;
  y: number;
  scale: number;
  width: number;
}

export const logoWidth = (text: string): number =>
  text.length * cell.width + (text.length - 1) * cell.gap;

/**
 * Logo centred across the panel with its cell centre a quarter of the way
 * down. Narrow panels shrink it to keep a side margin.
 */
export const logoLayout = (panelWidth: number, panelHeight: number, text: string = LOGO_TEXT): LogoLayout => {
  const natural = logoWidth(text);
  const scale = Math.min(1, (panelWidth - 2 * LOGO_SIDE_MARGIN) / natural);
  const width = natural * scale;
  return {
    x: (panelWidth - width) / 2,
    y: panelHeight * 0.25 - (cell.height * scale) / 2,
    scale,
    width,
  };
};

/**
 * Open engrave strokes for the logo: each glyph stroke is sheared into an
 * italic and drawn once per bold offset, offset across the stroke.
 */
export const logoStrokes = (layout: LogoLayout, text: string = LOGO_TEXT): Point[][] => {
  const { scale } = layout;
  const strokes: Point[][] = [];

  [...text].forEach((ch, index) => {
    const glyph: number[][][] | undefined = GLYPHS[ch];
    if (!glyph) return;
    const originX = layout.x + index * (cell.width + cell.gap) * scale;

    for (const stroke of glyph) {
      const base = stroke.map(unitPoint).map(u => ({
        x: originX + (u.x * cell.width + cell.slant * (1 - u.y) * cell.height) * scale,
        y: layout.y + u.y * cell.height * scale,
      }));
      if (base.length < 2) continue;

      const first = base[0];
      const last = base[base.length - 1];
      const length = Math.hypot(last.x - first.x, last.y - first.y);
      const nx = length > 0 ? -(last.y - first.y) / length : 0;
      const ny = length > 0 ? (last.x - first.x) / length : 0;

      for (const offset of boldOffsets) {
        strokes.push(base.map(p => ({ x: p.x + nx * offset, y: p.y + ny * offset })));
      }
    }
  });

  return strokes;
};

export function generateBackPanel(cfg: EnclosureConfig): PanelCanvas {
  const outline = frontBackPanelOutline(cfg);
  const w = outline.width;
  const h = outline.height;

  const canvas = new PanelCanvas(w, h, PANEL_FILES.back, cfg.materials.side + 3);
  canvas.annotate(`BACK PANEL ${w.toFixed(0)}x${h.toFixed(1)}mm (${cfg.materials.wall}mm)`, 0, TITLE_Y);
  addOutline(canvas, outline);

  for (const stroke of logoStrokes(logoLayout(w, h))) {
    canvas.polyline(stroke, false, 'engrave');
  }

  return canvas;
}
