/**
 * Minimal SVG reader for the documents this package writes.
 *
 * Panel and sheet documents are flat: one root `<svg>` holding `rect`,
 * `circle`, `path` and `text` elements with plain attributes. A tag scanner
 * covers that; nested groups, transforms and curves are not read.
 */

import type { Point } from '../types';
import { GeometryError } from './errors';

export type SvgTag = 'svg' | 'rect' | 'circle' | 'path' | 'text';

export interface SvgElement {
  tag: SvgTag;
  attrs: Record<string, string>;
}

const ELEMENT_PATTERN = /<(svg|rect|circle|path|text)\b([^>]*)>/g;
const ATTRIBUTE_PATTERN = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const PATH_TOKEN_PATTERN = /[a-zA-Z]|[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g;

const isSvgTag = (tag: string): tag is SvgTag =>
  tag === 'svg' || tag === 'rect' || tag === 'circle' || tag === 'path' || tag === 'text';

export const parseAttributes = (source: string): Record<string, string> => {
  const attrs: Record<string, string> = {};
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    attrs[match[1]] = match[2] ?? match[3] ?? '';
  }
  return attrs;
};

/**
 * Elements in document order. Comments and the XML declaration are skipped.
 */
export const scanElements = (svg: string): SvgElement[] => {
  const body = svg.replace(/<!--[\s\S]*?-->/g, '');
  const elements: SvgElement[] = [];
  for (const match of body.matchAll(ELEMENT_PATTERN)) {
    const tag = match[1];
    if (!isSvgTag(tag)) continue;
    elements.push({ tag, attrs: parseAttributes(match[2].replace(/\/\s*$/, '')) });
  }
  return elements;
};

/**
 * Numeric attribute; a trailing `mm` unit is accepted.
 */
export const numberAttr = (element: SvgElement, name: string, fallback?: number): number => {
  const raw = element.attrs[name];
  if (raw === undefined) {
    if (fallback !== undefined) return fallback;
    throw new GeometryError(`<${element.tag}> is missing the "${name}" attribute`);
  }
  const value = parseFloat(raw.replace(/mm$/, ''));
  if (!isFinite(value)) {
    throw new GeometryError(`<${element.tag}> ${name}="${raw}" is not a number`);
  }
  return value;
};

export interface DocumentSize {
  width: number;
  height: number;
}

/**
 * Drawing size from the root element: the viewBox when it has four numbers,
 * otherwise the width/height attributes.
 */
export const documentSize = (svg: string): DocumentSize | undefined => {
  const root = scanElements(svg).find(element => element.tag === 'svg');
  if (!root) return undefined;

  const viewBox = root.attrs.viewBox?.trim().split(/[\s,]+/).map(Number);
  if (viewBox && viewBox.length === 4 && viewBox.every(isFinite)) {
    return { width: viewBox[2], height: viewBox[3] };
  }
  if (root.attrs.width === undefined || root.attrs.height === undefined) return undefined;
  return { width: numberAttr(root, 'width'), height: numberAttr(root, 'height') };
};

// =============================================================================
// Path data
// =============================================================================

export interface ParsedPath {
  points: Point[];
  closed: boolean;
}

/**
 * Straight-segment path data: M, L, H, V and Z, absolute or relative.
 * Coordinate pairs after a moveto are linetos.
 */
export const parsePathData = (d: string): ParsedPath => {
  const tokens = d.match(PATH_TOKEN_PATTERN) ?? [];
  const points: Point[] = [];
  let closed = false;
  let command = '';
  let x = 0;
  let y = 0;
  let i = 0;

  const next = (): number => {
    const token = tokens[i++];
    const value = Number(token);
    if (token === undefined || !isFinite(value)) {
      throw new GeometryError(`path data "${d}": expected a number after "${command}"`);
    }
    return value;
  };

  while (i < tokens.length) {
    const token = tokens[i];
    if (/^[a-zA-Z]$/.test(token)) {
      command = token;
      i++;
      if (command === 'Z' || command === 'z') {
        closed = true;
        continue;
      }
      if (!'MLHVmlhv'.includes(command)) {
        throw new GeometryError(`path data "${d}": unsupported command "${command}"`);
      }
    } else if (command === '') {
      throw new GeometryError(`path data "${d}" must start with a moveto`);
    }

    const relative = command === command.toLowerCase();
    switch (command.toUpperCase()) {
      case 'M':
      case 'L': {
        const px = next();
        const py = next();
        x = relative ? x + px : px;
        y = relative ? y + py : py;
        // Extra pairs after a moveto are linetos
        if (command === 'M') command = 'L';
        if (command === 'm') command = 'l';
        break;
      }
      case 'H': {
        const px = next();
        x = relative ? x + px : px;
        break;
      }
      case 'V': {
        const py = next();
        y = relative ? y + py : py;
        break;
      }
      default:
        // Numbers after Z without a new command
        throw new GeometryError(`path data "${d}": coordinates after closepath`);
    }
    points.push({ x, y });
  }

  return { points, closed };
};
