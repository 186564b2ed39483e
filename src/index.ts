export * from './types';

// Configuration
export * from './config/enclosure';
export * from './config/presets';
export { applyOverrides } from './config/overrides';
export { getColors, roleForStroke, type ColorConfig, type RoleStyle } from './config/colors';

// Outline builder
export * from './utils/fingerPoints';
export * from './utils/fingerJoints';
export * from './utils/outlinePresets';

// Documents
export { PanelCanvas, fmt, svgDocument, shapeToSVG } from './utils/panelCanvas';
export * from './utils/geometryExtractor';
export * from './utils/transforms';
export { BoundsOps } from './utils/bounds';

// Nesting and export
export * from './utils/sheetPacker';
export * from './nesting/sheetRecipes';
export * from './utils/dxfExport';
export * from './utils/reviewPage';

// Panels
export * from './panels';

// Validators
export * from './validators/PathChecker';
export * from './validators/OverlapChecker';

// Support
export * from './utils/errors';
export * from './utils/debug';
