/**
 * Panel Canvas
 *
 * Append-only collection of cut and engrave shapes for one panel, serialized
 * once to an SVG document in millimetres. Panel coordinates start at (0, 0);
 * the document adds `margin` on every side and shifts every coordinate by it.
 */

import { writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Annotation, Point, Shape, ShapeRole } from '../types';
import { getColors } from '../config/colors';
import { GeometryError, assertFiniteNumber, assertPositive } from './errors';

// =============================================================================
// Formatting
// =============================================================================

/** Three decimals, trailing zeros and a bare trailing point removed */
export const fmt = (value: number): string => {
  const text = value.toFixed(3).replace(/\.?0+$/, '');
  return text === '-0' ? '0' : text;
};

const escapeText = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export const pathData = (points: Point[], closed: boolean, dx: number = 0, dy: number = 0): string => {
  const [first, ...rest] = points;
  let d = `M ${fmt(first.x + dx)},${fmt(first.y + dy)}`;
  for (const p of rest) {
    d += ` L ${fmt(p.x + dx)},${fmt(p.y + dy)}`;
  }
  return closed ? `${d} Z` : d;
};

/**
 * One SVG element for a shape, translated by (dx, dy).
 */
export const shapeToSVG = (shape: Shape, dx: number = 0, dy: number = 0): string => {
  const stroke = getColors().roles[shape.role].stroke;
  const paint = `fill="none" stroke="${stroke}" stroke-width="${fmt(shape.strokeWidth)}"`;

  switch (shape.kind) {
    case 'rect':
      return `<rect x="${fmt(shape.x + dx)}" y="${fmt(shape.y + dy)}" ` +
        `width="${fmt(shape.width)}" height="${fmt(shape.height)}" ${paint}/>`;
    case 'roundedRect':
      return `<rect x="${fmt(shape.x + dx)}" y="${fmt(shape.y + dy)}" ` +
        `width="${fmt(shape.width)}" height="${fmt(shape.height)}" ` +
        `rx="${fmt(shape.radius)}" ry="${fmt(shape.radius)}" ${paint}/>`;
    case 'circle':
      return `<circle cx="${fmt(shape.cx + dx)}" cy="${fmt(shape.cy + dy)}" r="${fmt(shape.r)}" ${paint}/>`;
    case 'polyline':
      return `<path d="${pathData(shape.points, shape.closed, dx, dy)}" ${paint}/>`;
  }
};

export const annotationToSVG = (
  note: Annotation,
  fill: string,
  dx: number = 0,
  dy: number = 0
): string =>
  `<text x="${fmt(note.x + dx)}" y="${fmt(note.y + dy)}" font-size="${fmt(note.size)}" ` +
  `fill="${fill}" font-family="monospace">${escapeText(note.text)}</text>`;

/**
 * Wrap element lines in a standalone SVG document.
 */
export const svgDocument = (
  width: number,
  height: number,
  elements: string[],
  comment: string = 'Red=cut, Blue=engrave. All dimensions in mm.'
): string => {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(width)}mm" height="${fmt(height)}mm" ` +
      `viewBox="0 0 ${fmt(width)} ${fmt(height)}">`,
    `<!-- ${comment} -->`,
    ...elements.map(element => `  ${element}`),
    '</svg>',
  ];
  return lines.join('\n') + '\n';
};

export const cloneShape = (shape: Shape): Shape =>
  shape.kind === 'polyline'
    ? { ...shape, points: shape.points.map(p => ({ x: p.x, y: p.y })) }
    : { ...shape };

// =============================================================================
// Canvas
// =============================================================================

export class PanelCanvas {
  readonly width: number;
  readonly height: number;
  readonly fileName: string;
  readonly margin: number;
  private readonly strokeWidth: number;
  private readonly shapes: Shape[] = [];
  private readonly annotations: Annotation[] = [];

  constructor(width: number, height: number, fileName: string, margin: number = 5) {
    assertPositive(width, 'canvas width');
    assertPositive(height, 'canvas height');
    assertFiniteNumber(margin, 'canvas margin');
    this.width = width;
    this.height = height;
    this.fileName = fileName;
    this.margin = margin;
    this.strokeWidth = getColors().strokeWidth.panel;
  }

  private add(shape: Shape): this {
    if (shape.kind === 'polyline') Object.freeze(shape.points);
    this.shapes.push(Object.freeze(shape));
    return this;
  }

  rect(x: number, y: number, width: number, height: number, role: ShapeRole = 'cut'): this {
    assertFiniteNumber(x, 'rect x');
    assertFiniteNumber(y, 'rect y');
    assertPositive(width, 'rect width');
    assertPositive(height, 'rect height');
    return this.add({ kind: 'rect', x, y, width, height, role, strokeWidth: this.strokeWidth });
  }

  roundedRect(
    x: number,
    y: number,
    width: number,
    height: number,
    radius: number = 1,
    role: ShapeRole = 'cut'
  ): this {
    assertFiniteNumber(x, 'rect x');
    assertFiniteNumber(y, 'rect y');
    assertPositive(width, 'rect width');
    assertPositive(height, 'rect height');
    assertPositive(radius, 'corner radius');
    return this.add({ kind: 'roundedRect', x, y, width, height, radius, role, strokeWidth: this.strokeWidth });
  }

  /** Rounded rectangle with fully rounded short ends */
  slot(x: number, y: number, width: number, height: number, role: ShapeRole = 'cut'): this {
    return this.roundedRect(x, y, width, height, Math.min(width, height) / 2, role);
  }

  circle(cx: number, cy: number, r: number, role: ShapeRole = 'cut'): this {
    assertFiniteNumber(cx, 'circle cx');
    assertFiniteNumber(cy, 'circle cy');
    assertPositive(r, 'circle radius');
    return this.add({ kind: 'circle', cx, cy, r, role, strokeWidth: this.strokeWidth });
  }

  polyline(points: Point[], closed: boolean = true, role: ShapeRole = 'cut'): this {
    if (points.length < 2) {
      throw new GeometryError(`polyline needs at least 2 points, got ${points.length}`);
    }
    const copy = points.map(p => {
      assertFiniteNumber(p.x, 'point x');
      assertFiniteNumber(p.y, 'point y');
      return { x: p.x, y: p.y };
    });
    return this.add({ kind: 'polyline', points: copy, closed, role, strokeWidth: this.strokeWidth });
  }

  /** Advisory text; never part of the fabricated geometry */
  annotate(text: string, x: number, y: number, size: number = 3): this {
    this.annotations.push(Object.freeze({ text, x, y, size }));
    return this;
  }

  getShapes(): Shape[] {
    return this.shapes.map(cloneShape);
  }

  getAnnotations(): Annotation[] {
    return this.annotations.map(note => ({ ...note }));
  }

  get documentWidth(): number {
    return this.width + 2 * this.margin;
  }

  get documentHeight(): number {
    return this.height + 2 * this.margin;
  }

  toSVG(): string {
    const m = this.margin;
    const fill = getColors().annotation.panel;
    const elements = [
      ...this.annotations.map(note => annotationToSVG(note, fill, m, m)),
      ...this.shapes.map(shape => shapeToSVG(shape, m, m)),
    ];
    return svgDocument(this.documentWidth, this.documentHeight, elements);
  }

  /**
   * Write the document to `dir/fileName`. Returns the written path.
   */
  save(dir: string): string {
    mkdirSync(dir, { recursive: true });
    const path = join(dir, this.fileName);
    writeFileSync(path, this.toSVG(), 'utf8');
    return path;
  }
}
