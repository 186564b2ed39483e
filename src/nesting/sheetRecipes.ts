/**
 * Sheet Recipes
 *
 * The two hand-tuned layouts for a P3 sheet: one per material thickness.
 * Parts are read back from their panel documents, so the layouts follow
 * whatever the panel generators produced.
 *
 * 3 mm: front | back (with engraving) | top rotated 90°
 * 5 mm: left | right | combs interleaved and rotated 90°, fan bracket under
 *       them, bottom rotated 90° beside the fan bracket
 */

import type { PartGeometry, Placement, SheetResult, SheetSpec } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { PANEL_FILES } from '../panels/common';
import { loadPanelSVG, parsePanelSVG, toPart, type ExtractedGeometry, type ParseOptions } from '../utils/geometryExtractor';
import { combineParts, packSheet, type PackOptions } from '../utils/sheetPacker';
import { EmptyGeometryError } from '../utils/errors';

export const P3_SHEET: SheetSpec = { name: 'P3', width: 790, height: 384 };

export const PART_GAP = 3; // mm between neighbouring parts

// Second comb rail: turned over and shifted so its teeth fall between the first rail's
export const COMB_INTERLEAVE_DX = 8.5;

// The rotated bottom panel tucks this far back over the fan bracket, clear of the combs
export const BOTTOM_TUCK = 23;

export const SHEET_FILES = { thin: 'sheet_3mm', thick: 'sheet_5mm' } as const;

// =============================================================================
// Part sources
// =============================================================================

/** Reads one panel document as geometry */
export type PartSource = (fileName: string, options: ParseOptions) => ExtractedGeometry;

export const directorySource = (dir: string): PartSource =>
  (fileName, options) => loadPanelSVG(dir, fileName, options);

/** Documents held in memory, keyed by file name */
export const memorySource = (documents: Map<string, string>): PartSource =>
  (fileName, options) => {
    const svg = documents.get(fileName);
    if (svg === undefined) {
      throw new EmptyGeometryError(`${fileName}: no such panel document`);
    }
    return parsePanelSVG(svg, options);
  };

export interface ThinSheetParts {
  front: PartGeometry;
  back: PartGeometry;
  top: PartGeometry;
}

export interface ThickSheetParts {
  bottom: PartGeometry;
  left: PartGeometry;
  right: PartGeometry;
  comb: PartGeometry;
  fanBracket: PartGeometry;
}

export const loadThinSheetParts = (source: PartSource): ThinSheetParts => ({
  front: toPart('front', source(PANEL_FILES.front, {})),
  back: toPart('back', source(PANEL_FILES.back, { keepEngrave: true })),
  top: toPart('top', source(PANEL_FILES.top, {})),
});

export const loadThickSheetParts = (source: PartSource): ThickSheetParts => ({
  bottom: toPart('bottom', source(PANEL_FILES.bottom, {})),
  left: toPart('left', source(PANEL_FILES.left, {})),
  right: toPart('right', source(PANEL_FILES.right, {})),
  comb: toPart('comb', source(PANEL_FILES.comb, {})),
  fanBracket: toPart('fanBracket', source(PANEL_FILES.fanBracket, {})),
});

// =============================================================================
// Layouts
// =============================================================================

export function thinSheetPlacements(parts: ThinSheetParts): Placement[] {
  const { front, back, top } = parts;
  const backX = front.width + PART_GAP;
  const topX = backX + back.width + PART_GAP;
  return [
    { label: 'FRONT (3mm)', part: front, x: 0, y: 0 },
    { label: 'BACK (3mm)', part: back, x: backX, y: 0 },
    { label: 'TOP (3mm, rotated)', part: top, rotate: 90, x: topX, y: 0 },
  ];
}

/**
 * Two comb rails in one part: the second turned 180° and dropped below the
 * first's bar so the teeth interleave.
 */
export const interleavedCombs = (comb: PartGeometry, barHeight: number): PartGeometry =>
  combineParts('combs', [
    { part: comb, x: 0, y: 0 },
    { part: comb, rotate: 180, x: COMB_INTERLEAVE_DX, y: barHeight + PART_GAP },
  ]);

export function thickSheetPlacements(parts: ThickSheetParts, cfg: EnclosureConfig): Placement[] {
  const { bottom, left, right, comb, fanBracket } = parts;
  const rightX = left.width + PART_GAP;
  const column1Width = rightX + right.width;
  const column1Height = Math.max(left.height, right.height);
  const column2X = column1Width + PART_GAP;
  const combs = interleavedCombs(comb, cfg.comb.barH);
  // Rotated 90°, the comb assembly is as wide as it was tall
  const bottomX = Math.max(
    column2X + fanBracket.width + PART_GAP - BOTTOM_TUCK,
    column2X + combs.height + PART_GAP
  );

  return [
    { label: 'LEFT SIDE (5mm)', part: left, x: 0, y: 0 },
    { label: 'RIGHT SIDE (5mm)', part: right, x: rightX, y: 0 },
    {
      label: 'COMB RAILS (5mm, interleaved+90°)',
      part: combs,
      rotate: 90,
      x: column2X,
      y: 0,
    },
    { label: 'FAN BRACKET (5mm)', part: fanBracket, x: column2X, y: column1Height - fanBracket.height },
    {
      label: 'BOTTOM (5mm, 90°)',
      part: bottom,
      rotate: 90,
      x: bottomX,
      y: 0,
    },
  ];
}

export interface NestedSheets {
  thin: SheetResult;
  thick: SheetResult;
}

export function nestSheets(
  source: PartSource,
  cfg: EnclosureConfig,
  sheet: SheetSpec = P3_SHEET,
  options: PackOptions = {}
): NestedSheets {
  return {
    thin: packSheet(sheet, thinSheetPlacements(loadThinSheetParts(source)), options),
    thick: packSheet(sheet, thickSheetPlacements(loadThickSheetParts(source), cfg), options),
  };
}
