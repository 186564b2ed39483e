import type { EnclosureConfig } from '../config/enclosure';
import type { PanelCanvas } from '../utils/panelCanvas';
import { debug } from '../utils/debug';
import { generateBottomPanel } from './bottomPanel';
import { generateTopPanel } from './topPanel';
import { generateFrontPanel } from './frontPanel';
import { generateBackPanel } from './backPanel';
import { generateSidePanel } from './sidePanel';
import { generateCombRail } from './combRail';
import { generateFanBracket } from './fanBracket';

export { PANEL_FILES, type PanelId } from './common';
export { generateBottomPanel } from './bottomPanel';
export { generateTopPanel } from './topPanel';
export { generateFrontPanel } from './frontPanel';
export { generateBackPanel } from './backPanel';
export { generateSidePanel, type SideId } from './sidePanel';
export { generateCombRail } from './combRail';
export { generateFanBracket } from './fanBracket';

/**
 * Every panel of the enclosure, in file-name order.
 */
export function generateAllPanels(cfg: EnclosureConfig): PanelCanvas[] {
  const panels = [
    generateBottomPanel(cfg),
    generateTopPanel(cfg),
    generateFrontPanel(cfg),
    generateBackPanel(cfg),
    generateSidePanel(cfg, 'left'),
    generateSidePanel(cfg, 'right'),
    generateCombRail(cfg),
    generateFanBracket(cfg),
  ];
  for (const panel of panels) {
    debug('panels', `${cfg.name}: ${panel.fileName} ${panel.width.toFixed(2)}x${panel.height.toFixed(2)}, ` +
      `${panel.getShapes().length} shapes`);
  }
  return panels;
}

/** Panel documents keyed by file name */
export const panelDocuments = (panels: PanelCanvas[]): Map<string, string> =>
  new Map(panels.map(panel => [panel.fileName, panel.toSVG()]));
