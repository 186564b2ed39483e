/**
 * Centralized stroke and layer configuration.
 * Every colour written to a panel document, a sheet or a DXF file comes from here.
 */

import type { ShapeRole } from '../types';

export interface RoleStyle {
  stroke: string;    // SVG stroke colour
  layer: string;     // DXF layer name
  aci: number;       // DXF colour index
}

export interface ColorConfig {
  roles: Record<ShapeRole, RoleStyle>;

  // ===== Annotations =====
  annotation: {
    panel: string;   // panel titles and callouts
    sheet: string;   // part labels on nested sheets
  };

  // ===== Stroke widths (mm) =====
  strokeWidth: {
    panel: number;        // panel documents
    fabrication: number;  // nested sheets sent for cutting
  };
}

// ===== Default Theme =====
export const defaultColors: ColorConfig = {
  roles: {
    cut: { stroke: '#ff0000', layer: 'CUT', aci: 1 },
    engrave: { stroke: '#0000ff', layer: 'ENGRAVE', aci: 5 },
  },

  annotation: {
    panel: '#999',
    sheet: '#cccccc',
  },

  strokeWidth: {
    panel: 0.1,
    fabrication: 0.01,
  },
};

export function getColors(): ColorConfig {
  return defaultColors;
}

/**
 * Role for a stroke colour read back from a document. Only the engrave
 * colour is recognized; everything else is cut.
 */
export function roleForStroke(stroke: string | undefined): ShapeRole {
  if (stroke && stroke.trim().toLowerCase() === defaultColors.roles.engrave.stroke) {
    return 'engrave';
  }
  return 'cut';
}
