/**
 * Enclosure panel outlines, expressed as edge specs for the outline builder.
 *
 * - Top/bottom panels span the full exterior width and carry protruding
 *   fingers on their front and back edges.
 * - Front/back panels fit between the side panels. Their top and bottom
 *   notches follow the top/bottom finger pattern, shifted so panel x = 0 sits
 *   at the inner face of the side panel. Their left and right edges carry
 *   outer tabs over the side-panel height, first and last finger skipped.
 * - Side panels carry fingers over the interior depth only, with flat wings
 *   wrapping past the front and back panels.
 */

import type { EdgeSpecs, Point } from '../types';
import type { EnclosureConfig } from '../config/enclosure';
import { buildOutline } from './fingerJoints';

export interface OutlinePreset {
  width: number;
  height: number;
  edges: EdgeSpecs;
  points: Point[];
}

const preset = (width: number, height: number, edges: EdgeSpecs, fingerWidth: number): OutlinePreset => ({
  width,
  height,
  edges,
  points: buildOutline(width, height, edges, fingerWidth),
});

export function topBottomPanelOutline(cfg: EnclosureConfig): OutlinePreset {
  const depth = cfg.materials.wall;
  return preset(
    cfg.exterior.x,
    cfg.interior.y,
    {
      top: { mode: 'outer_tab', depth },
      right: { mode: 'flat', depth: 0 },
      bottom: { mode: 'outer_tab', depth },
      left: { mode: 'flat', depth: 0 },
    },
    cfg.joints.fingerWidth
  );
}

/** Distance from the enclosure's left outer face to a front/back panel's x = 0 */
export const frontBackNotchOffset = (cfg: EnclosureConfig): number =>
  cfg.joints.minOverhang + cfg.materials.side;

export function frontBackPanelOutline(cfg: EnclosureConfig): OutlinePreset {
  const { wall, side } = cfg.materials;
  const notchZone = { start: -frontBackNotchOffset(cfg), length: cfg.exterior.x };
  const height = cfg.sideH + wall + side;

  return preset(
    cfg.bodyW,
    height,
    {
      top: { mode: 'tab', depth: wall, zone: notchZone },
      // Walked downward: flat into the top panel first
      right: { mode: 'outer_tab', depth: side, zone: { start: wall, length: cfg.sideH }, skipEnds: true },
      bottom: { mode: 'tab', depth: side, zone: notchZone },
      // Walked upward: flat into the bottom panel first
      left: { mode: 'outer_tab', depth: side, zone: { start: side, length: cfg.sideH }, skipEnds: true },
    },
    cfg.joints.fingerWidth
  );
}

export function sidePanelOutline(cfg: EnclosureConfig): OutlinePreset {
  const zone = { start: cfg.sideOverlap, length: cfg.interior.y };
  return preset(
    cfg.interior.y + 2 * cfg.sideOverlap,
    cfg.sideH,
    {
      top: { mode: 'outer_tab', depth: cfg.materials.wall, zone },
      right: { mode: 'flat', depth: 0 },
      bottom: { mode: 'outer_tab', depth: cfg.materials.side, zone },
      left: { mode: 'flat', depth: 0 },
    },
    cfg.joints.fingerWidth
  );
}
