import { describe, it, expect } from 'vitest';
import { RULER_SVG, buildReviewPage, panelHeading, summarize, type ReviewSummary } from '../../../src/utils/reviewPage';
import { nas4bay } from '../../fixtures/enclosures';

const summary: ReviewSummary = {
  title: 'Test & Co enclosure',
  exterior: '10 x 20 x 30 mm',
  interior: '5 x 15 mm',
  totalHeight: '30.0 mm (1.2 in)',
  driveBottom: '12.0 mm from bottom',
};

describe('Review page', () => {
  it('derives headings from file names', () => {
    expect(panelHeading('03_front_panel.svg')).toBe('front panel');
    expect(panelHeading('07_drive_comb_rail.svg')).toBe('drive comb rail');
  });

  it('summarizes an enclosure', () => {
    const s = summarize(nas4bay);

    expect(s.title).toBe('nas-4bay enclosure');
    expect(s.exterior).toBe('195 x 126 x 323 mm');
    expect(s.interior).toBe('185 x 120 mm');
    expect(s.totalHeight).toBe('323.2 mm (12.7 in)');
  });

  it('draws a 100mm ruler', () => {
    expect(RULER_SVG.split('\n')[1]).toBe(
      '  <rect x="5" y="2" width="100" height="4" fill="none" stroke="#000" stroke-width="0.3"/>'
    );
    expect(RULER_SVG).toContain('text-anchor="middle">100mm</text>');
  });

  describe('buildReviewPage', () => {
    const page = buildReviewPage(
      [
        { fileName: '02_top_panel.svg', svg: '<?xml version="1.0" encoding="UTF-8"?>\n<svg>TOP</svg>\n' },
        { fileName: '01_bottom_panel.svg', svg: '<svg>BOTTOM</svg>' },
      ],
      summary
    );

    it('escapes the title', () => {
      expect(page).toContain('<title>Test &amp; Co enclosure - Panel Review</title>');
    });

    it('lists the summary rows', () => {
      expect(page).toContain('<tr><th>Exterior</th><td>10 x 20 x 30 mm</td></tr>');
      expect(page).toContain('<tr><th>Panels</th><td>2 SVG files</td></tr>');
    });

    it('orders panels by file name', () => {
      expect(page.indexOf('<h2>bottom panel</h2>')).toBeGreaterThan(0);
      expect(page.indexOf('<h2>bottom panel</h2>')).toBeLessThan(page.indexOf('<h2>top panel</h2>'));
    });

    it('embeds each document inline after its ruler', () => {
      expect(page).toContain(`${RULER_SVG}\n<svg>TOP</svg>\n</div>`);
      expect(page).toContain(`${RULER_SVG}\n<svg>BOTTOM</svg>\n</div>`);
    });

    it('ends the document', () => {
      expect(page.endsWith('</body></html>\n')).toBe(true);
    });
  });
});
