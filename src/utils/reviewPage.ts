/**
 * Review page: one HTML file that shows every panel document at true scale,
 * with a 100 mm ruler next to each so a printout can be checked.
 */

import type { EnclosureConfig } from '../config/enclosure';

export interface ReviewPanel {
  fileName: string;
  svg: string;
}

export interface ReviewSummary {
  title: string;
  exterior: string;
  interior: string;
  totalHeight: string;
  driveBottom: string;
}

export const summarize = (cfg: EnclosureConfig): ReviewSummary => ({
  title: `${cfg.name} enclosure`,
  exterior: `${cfg.exterior.x.toFixed(0)} x ${cfg.exterior.y.toFixed(0)} x ${cfg.z.total.toFixed(0)} mm`,
  interior: `${cfg.interior.x} x ${cfg.interior.y} mm`,
  totalHeight: `${cfg.z.total.toFixed(1)} mm (${(cfg.z.total / 25.4).toFixed(1)} in)`,
  driveBottom: `${cfg.z.driveBottom.toFixed(1)} mm from bottom`,
});

/** "03_front_panel.svg" → "front panel" */
export const panelHeading = (fileName: string): string =>
  fileName.replace(/\.svg$/, '').replace(/_/g, ' ').replace(/^[\d ]+/, '');

const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const rulerTicks = (): string[] => {
  const lines: string[] = [];
  for (let mm = 0; mm <= 100; mm += 10) {
    const x = 5 + mm;
    const major = mm % 50 === 0;
    lines.push(major
      ? `  <line x1="${x}" y1="2" x2="${x}" y2="10" stroke="#000" stroke-width="0.3"/>`
      : `  <line x1="${x}" y1="4" x2="${x}" y2="8" stroke="#000" stroke-width="0.2"/>`);
    if (major) {
      lines.push(`  <text x="${x}" y="11.5" font-size="2.5" font-family="monospace" ` +
        `text-anchor="middle">${mm === 100 ? '100mm' : mm}</text>`);
    }
  }
  return lines;
};

export const RULER_SVG = [
  '<svg xmlns="http://www.w3.org/2000/svg" class="ruler" width="110mm" height="12mm" viewBox="0 0 110 12">',
  '  <rect x="5" y="2" width="100" height="4" fill="none" stroke="#000" stroke-width="0.3"/>',
  ...rulerTicks(),
  '</svg>',
].join('\n');

const STYLE = `
  body { font-family: system-ui, sans-serif; background: #1a1a2e; color: #eee; margin: 2em; }
  h1 { color: #e94560; }
  .panel { background: #16213e; border: 1px solid #0f3460; border-radius: 8px; padding: 1.5em; margin: 1.5em 0; }
  .panel h2 { color: #e94560; margin-top: 0; }
  .panel svg:not(.ruler) { background: #fff; border: 1px solid #333; display: block; margin: 1em auto; max-width: 100%; height: auto; }
  .summary { background: #0f3460; padding: 1em; border-radius: 8px; margin-bottom: 2em; }
  .summary td, .summary th { padding: 4px 12px; }
  .summary th { text-align: left; color: #e94560; }
  .ruler, .print-note { display: none; }
  @media print {
    body { background: #fff; color: #000; margin: 0; padding: 5mm; }
    h1, .panel h2, .summary th { color: #000; }
    .panel { background: #fff; border: none; padding: 0; margin: 0; page-break-inside: avoid; page-break-after: always; }
    .panel svg:not(.ruler) { border: none; margin: 0; max-width: none; width: auto; height: auto; }
    .summary { background: #fff; border: 1px solid #ccc; }
    .ruler { display: block; margin: 2mm 0; }
    .print-note { display: block; font-size: 9pt; color: #666; margin-bottom: 3mm; }
  }
`;

/** Strip the XML declaration so the document embeds inline */
const inlineSvg = (svg: string): string => svg.replace(/^<\?xml[^>]*\?>\s*/, '');

export function buildReviewPage(panels: ReviewPanel[], summary: ReviewSummary): string {
  const rows: [string, string][] = [
    ['Exterior', summary.exterior],
    ['Interior', summary.interior],
    ['Total Height', summary.totalHeight],
    ['Drive Bottom Z', summary.driveBottom],
    ['Panels', `${panels.length} SVG files`],
  ];

  const parts = [
    '<!DOCTYPE html>',
    '<html><head><meta charset="utf-8">',
    `<title>${escapeHtml(summary.title)} - Panel Review</title>`,
    `<style>${STYLE}</style>`,
    '</head><body>',
    `<h1>${escapeHtml(summary.title)} - Panel Review</h1>`,
    '<p class="print-note">Verify the ruler below measures exactly 100mm. If not, adjust print scale to 100%.</p>',
    RULER_SVG,
    '<div class="summary">',
    '<table>',
    ...rows.map(([label, value]) => `<tr><th>${label}</th><td>${escapeHtml(value)}</td></tr>`),
    '</table>',
    '</div>',
  ];

  const sorted = [...panels].sort((a, b) => a.fileName.localeCompare(b.fileName));
  for (const panel of sorted) {
    parts.push(
      '<div class="panel">',
      `<h2>${escapeHtml(panelHeading(panel.fileName))}</h2>`,
      RULER_SVG,
      inlineSvg(panel.svg).trimEnd(),
      '</div>'
    );
  }

  parts.push('</body></html>');
  return parts.join('\n') + '\n';
}
