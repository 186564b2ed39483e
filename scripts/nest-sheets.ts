/**
 * Nest the panel documents onto the 3 mm and 5 mm sheets and convert each
 * sheet to DXF. Run generate-panels first with the same options.
 *
 * Usage:
 *   npx tsx scripts/nest-sheets.ts [--preset nas-2bay] [--config overrides.json] [--out dir]
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { SheetResult } from '../src/types';
import { SHEET_FILES, directorySource, nestSheets } from '../src/nesting/sheetRecipes';
import { sheetToSVG } from '../src/utils/sheetPacker';
import { svgToDxf } from '../src/utils/dxfExport';
import { fmt } from '../src/utils/panelCanvas';
import { getColors } from '../src/config/colors';
import { loadConfig, runCli } from './cli-helpers';

function writeSheet(dir: string, baseName: string, result: SheetResult): void {
  console.log(`\n=== ${baseName} (${result.sheet.name}: ${fmt(result.sheet.width)}x${fmt(result.sheet.height)}mm) ===`);
  for (const part of result.parts) {
    console.log(`  ${part.label}: ${fmt(part.width)}x${fmt(part.height)}mm at (${fmt(part.x)}, ${fmt(part.y)})`);
  }
  for (const warning of result.warnings) {
    console.warn(`  WARNING: ${warning.message}`);
  }

  const svg = sheetToSVG(result, getColors().strokeWidth.fabrication);
  writeFileSync(join(dir, `${baseName}.svg`), svg, 'utf8');
  writeFileSync(join(dir, `${baseName}.dxf`), svgToDxf(svg), 'utf8');
  console.log(`  ${baseName}.svg, ${baseName}.dxf (used ${fmt(result.usedWidth)}x${fmt(result.usedHeight)}mm)`);
}

runCli('npx tsx scripts/nest-sheets.ts [--preset name] [--config file.json] [--out dir]', args => {
  const cfg = loadConfig(args);
  const sheets = nestSheets(directorySource(args.outDir), cfg);

  writeSheet(args.outDir, SHEET_FILES.thin, sheets.thin);
  writeSheet(args.outDir, SHEET_FILES.thick, sheets.thick);

  console.log('\nDone! Upload the sheet SVGs or DXFs for cutting.');
});
