/**
 * Generate every panel document and the review page.
 *
 * Usage:
 *   npx tsx scripts/generate-panels.ts [--preset nas-2bay] [--config overrides.json] [--out dir]
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { generateAllPanels } from '../src/panels';
import { buildReviewPage, summarize } from '../src/utils/reviewPage';
import { loadConfig, runCli } from './cli-helpers';

const REVIEW_FILE = 'panel_review.html';

runCli('npx tsx scripts/generate-panels.ts [--preset name] [--config file.json] [--out dir]', args => {
  const cfg = loadConfig(args);
  console.log(`\n=== Generating panels (${cfg.name}) ===\n`);
  console.log(`  Exterior ${cfg.exterior.x} x ${cfg.exterior.y} x ${cfg.z.total.toFixed(2)} mm`);

  const panels = generateAllPanels(cfg);
  for (const panel of panels) {
    panel.save(args.outDir);
    console.log(`  ${panel.fileName}`);
  }

  const page = buildReviewPage(
    panels.map(panel => ({ fileName: panel.fileName, svg: panel.toSVG() })),
    summarize(cfg)
  );
  writeFileSync(join(args.outDir, REVIEW_FILE), page, 'utf8');
  console.log(`  ${REVIEW_FILE}`);

  console.log(`\n=== Done! Output: ${args.outDir} ===`);
});
