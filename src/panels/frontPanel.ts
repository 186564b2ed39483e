import type { EnclosureConfig } from '../config/enclosure';
import { PanelCanvas } from '../utils/panelCanvas';
import { frontBackPanelOutline } from '../utils/outlinePresets';
import { PANEL_FILES, TITLE_Y, addOutline, frontBackZToY, spread } from './common';

export interface PortCutout {
  name: string;
  x: number;       // from the board's left edge, seen from outside
  z: number;       // above the PCB underside
  width: number;
  height: number;
}

export const BOARD_PORTS: readonly PortCutout[] = [
  { name: 'GbE', x: 1.25, z: 0.45, width: 17.9, height: 16.5 },
  { name: 'USB3', x: 21.3, z: 1.45, width: 15.6, height: 17.6 },
  { name: 'USB2', x: 39.1, z: 1.45, width: 15.8, height: 17.6 },
  { name: 'HAT', x: 34.6, z: 21.55, width: 20.8, height: 8.1 },
];

const PORT_LIFT = 1;
const PORT_RADIUS = 1.5;

const DC_JACK = { offsetLeft: 17, heightAboveFloor: 15, radius: 4 };

export const FRONT_VENT = { width: 22, height: 2.5, edgeInset: 20, columns: 3 };

/**
 * Vent row heights: one band through the cable zone between the HAT and the
 * drives, one band along the drives.
 */
export const frontVentRows = (cfg: EnclosureConfig): number[] => {
  const rows: number[] = [];
  const cableStart = cfg.z.hatTop + 15;
  const cableEnd = cfg.z.driveBottom - 10;
  if (cableEnd > cableStart) rows.push(...spread(cableStart, cableEnd, 5));
  rows.push(...spread(cfg.z.driveBottom + 15, cfg.z.driveTop - 10, 8));
  return rows;
};

export function generateFrontPanel(cfg: EnclosureConfig): PanelCanvas {
  const outline = frontBackPanelOutline(cfg);
  const w = outline.width;
  const h = outline.height;
  const zToY = frontBackZToY(cfg);

  const canvas = new PanelCanvas(w, h, PANEL_FILES.front, cfg.materials.side + 3);
  canvas.annotate(`FRONT PANEL ${w.toFixed(0)}x${h.toFixed(1)}mm (${cfg.materials.wall}mm)`, 0, TITLE_Y);
  addOutline(canvas, outline);

  // Board centred across the panel
  const boardX = (w - cfg.pi.width) / 2;
  const pcbY = zToY(cfg.z.piPcb);
  for (const port of BOARD_PORTS) {
    const x = boardX + port.x;
    const y = pcbY - port.z - port.height - PORT_LIFT;
    canvas.roundedRect(x, y, port.width, port.height, PORT_RADIUS);
    canvas.annotate(port.name, x, y - 1.5, 2);
  }

  const dcX = boardX - DC_JACK.offsetLeft;
  const dcY = zToY(cfg.materials.side + DC_JACK.heightAboveFloor);
  canvas.circle(dcX, dcY, DC_JACK.radius);
  canvas.annotate('DC 12V', dcX + 6, dcY + 1, 2);

  const columns = spread(FRONT_VENT.edgeInset, w - FRONT_VENT.edgeInset - FRONT_VENT.width, FRONT_VENT.columns);
  for (const z of frontVentRows(cfg)) {
    for (const x of columns) {
      canvas.slot(x, zToY(z), FRONT_VENT.width, FRONT_VENT.height);
    }
  }

  return canvas;
}
