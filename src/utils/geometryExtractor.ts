/**
 * Geometry Extractor
 *
 * Re-reads a panel document as plain shapes for nesting. Text is skipped,
 * engrave shapes are optional, and the footprint comes from cut shapes only,
 * so engraving that runs past the outline never grows a part.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { PartGeometry, Shape } from '../types';
import { getColors, roleForStroke } from '../config/colors';
import { scanElements, numberAttr, parsePathData, type SvgElement } from './svgParse';
import { BoundsOps } from './bounds';
import { translateShapes } from './transforms';
import { EmptyGeometryError } from './errors';
import { debug } from './debug';

export interface ParseOptions {
  keepEngrave?: boolean;
  strokeWidth?: number;
}

export interface ExtractedGeometry {
  contentWidth: number;
  contentHeight: number;
  shapes: Shape[];
}

/**
 * Shape for one element, or null for elements that carry no geometry.
 */
export const elementToShape = (element: SvgElement, strokeWidth: number): Shape | null => {
  const role = roleForStroke(element.attrs.stroke);

  switch (element.tag) {
    case 'rect': {
      const x = numberAttr(element, 'x', 0);
      const y = numberAttr(element, 'y', 0);
      const width = numberAttr(element, 'width');
      const height = numberAttr(element, 'height');
      const radius = numberAttr(element, 'rx', 0);
      return radius > 0
        ? { kind: 'roundedRect', x, y, width, height, radius, role, strokeWidth }
        : { kind: 'rect', x, y, width, height, role, strokeWidth };
    }
    case 'circle':
      return {
        kind: 'circle',
        cx: numberAttr(element, 'cx', 0),
        cy: numberAttr(element, 'cy', 0),
        r: numberAttr(element, 'r'),
        role,
        strokeWidth,
      };
    case 'path': {
      const { points, closed } = parsePathData(element.attrs.d ?? '');
      if (points.length === 0) return null;
      return { kind: 'polyline', points, closed, role, strokeWidth };
    }
    case 'svg':
    case 'text':
      return null;
  }
};

export function parsePanelSVG(svg: string, options: ParseOptions = {}): ExtractedGeometry {
  const keepEngrave = options.keepEngrave ?? false;
  const strokeWidth = options.strokeWidth ?? getColors().strokeWidth.fabrication;

  const shapes: Shape[] = [];
  for (const element of scanElements(svg)) {
    const shape = elementToShape(element, strokeWidth);
    if (!shape) continue;
    if (shape.role === 'engrave' && !keepEngrave) continue;
    shapes.push(shape);
  }

  const box = BoundsOps.ofShapes(shapes, 'cut');
  if (!box) {
    throw new EmptyGeometryError('document has no cut geometry to measure');
  }

  debug('extract', `${shapes.length} shapes, cut box ${BoundsOps.width(box).toFixed(3)} x ${BoundsOps.height(box).toFixed(3)}`);

  return {
    contentWidth: BoundsOps.width(box),
    contentHeight: BoundsOps.height(box),
    shapes: translateShapes(shapes, -box.minX, -box.minY),
  };
}

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

function readPanelDocument(dir: string, fileName: string): string {
  try {
    return readFileSync(join(dir, fileName), 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new EmptyGeometryError(`${fileName}: no such panel document`);
    }
    throw err;
  }
}

export function loadPanelSVG(dir: string, fileName: string, options: ParseOptions = {}): ExtractedGeometry {
  const svg = readPanelDocument(dir, fileName);
  try {
    return parsePanelSVG(svg, options);
  } catch (err) {
    if (err instanceof EmptyGeometryError) {
      throw new EmptyGeometryError(`${fileName}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Name extracted geometry so it can be placed on a sheet.
 */
export const toPart = (name: string, geometry: ExtractedGeometry): PartGeometry => ({
  name,
  width: geometry.contentWidth,
  height: geometry.contentHeight,
  shapes: geometry.shapes,
});
