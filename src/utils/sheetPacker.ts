/**
 * Sheet Packer
 *
 * Places parts on a fabrication sheet from a hand-authored recipe: each part
 * is optionally rotated, then translated to its slot. Parts that reach past
 * the sheet or overlap each other produce warnings; output is produced
 * regardless so the operator can review it.
 */

import type {
  Annotation,
  PartGeometry,
  PlacedPart,
  Placement,
  Rotation,
  Shape,
  SheetResult,
  SheetSpec,
  SheetWarning,
} from '../types';
import { getColors } from '../config/colors';
import { BoundsOps } from './bounds';
import { rotateShapes, translateShapes } from './transforms';
import { annotationToSVG, fmt, shapeToSVG, svgDocument } from './panelCanvas';
import { assertFiniteNumber, assertPositive } from './errors';
import { checkOverlaps } from '../validators/OverlapChecker';
import { debug } from './debug';

export const LABEL_SIZE = 4;
export const LABEL_OFFSET = 2; // mm above the part's slot

export interface PackOptions {
  checkOverlap?: boolean;   // default true
}

/**
 * Rotate a part inside its own box, then move the box to (x, y).
 */
export function placePart(placement: Placement): PlacedPart {
  const { label, part, x, y } = placement;
  const rotate: Rotation = placement.rotate ?? 0;
  assertFiniteNumber(x, `${label} x`);
  assertFiniteNumber(y, `${label} y`);

  const rotated = rotateShapes(part.shapes, rotate, part.width, part.height);
  return {
    label,
    x,
    y,
    width: rotated.width,
    height: rotated.height,
    rotate,
    shapes: translateShapes(rotated.shapes, x, y),
  };
}

export interface PartMember {
  part: PartGeometry;
  rotate?: Rotation;
  x: number;
  y: number;
}

/**
 * Group parts into one part, e.g. two interleaved rails that are then rotated
 * together. The group box runs from (0, 0) to the far edge of its members.
 */
export function combineParts(name: string, members: PartMember[]): PartGeometry {
  const shapes: Shape[] = [];
  let width = 0;
  let height = 0;
  for (const member of members) {
    const placed = placePart({ label: member.part.name, ...member });
    shapes.push(...placed.shapes);
    width = Math.max(width, placed.x + placed.width);
    height = Math.max(height, placed.y + placed.height);
  }
  assertPositive(width, `${name} width`);
  assertPositive(height, `${name} height`);
  return { name, width, height, shapes };
}

export function packSheet(sheet: SheetSpec, placements: Placement[], options: PackOptions = {}): SheetResult {
  assertPositive(sheet.width, `${sheet.name} width`);
  assertPositive(sheet.height, `${sheet.name} height`);

  const parts = placements.map(placePart);
  const shapes = parts.flatMap(part => part.shapes);
  const labels: Annotation[] = parts.map(part => ({
    text: part.label,
    x: part.x,
    y: part.y - LABEL_OFFSET,
    size: LABEL_SIZE,
  }));

  for (const part of parts) {
    debug('nest', `${sheet.name}: ${part.label} at (${fmt(part.x)}, ${fmt(part.y)}) ` +
      `${fmt(part.width)}x${fmt(part.height)} rotate ${part.rotate}`);
  }

  const used = BoundsOps.union(parts.map(part => BoundsOps.fromSize(part.x, part.y, part.width, part.height)));
  const usedWidth = used ? Math.max(0, used.maxX) : 0;
  const usedHeight = used ? Math.max(0, used.maxY) : 0;

  const warnings: SheetWarning[] = [];
  if (used && BoundsOps.exceeds(used, sheet.width, sheet.height)) {
    warnings.push({
      kind: 'overflow',
      message: `Parts don't fit on ${sheet.name} (${fmt(sheet.width)}x${fmt(sheet.height)}mm): ` +
        `need ${fmt(usedWidth)}x${fmt(usedHeight)}mm`,
    });
  }

  if (options.checkOverlap ?? true) {
    for (const error of checkOverlaps(parts).errors) {
      warnings.push({ kind: 'overlap', message: error.message });
    }
  }

  return { sheet, parts, shapes, labels, usedWidth, usedHeight, warnings };
}

/**
 * Sheet document. The drawing covers the declared sheet, grown to the used
 * extent when parts overflow it.
 */
export function sheetToSVG(result: SheetResult, strokeWidth?: number): string {
  const width = Math.max(result.sheet.width, result.usedWidth);
  const height = Math.max(result.sheet.height, result.usedHeight);
  const fill = getColors().annotation.sheet;

  const elements = [
    ...result.labels.map(label => annotationToSVG(label, fill)),
    ...result.shapes.map(shape => shapeToSVG(strokeWidth === undefined ? shape : { ...shape, strokeWidth })),
  ];
  return svgDocument(
    width,
    height,
    elements,
    `Sheet ${result.sheet.name}: ${fmt(result.sheet.width)}x${fmt(result.sheet.height)}mm. Red=cut, Blue=engrave.`
  );
}
