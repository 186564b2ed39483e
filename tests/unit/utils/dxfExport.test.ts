import { describe, it, expect } from 'vitest';
import type { Shape } from '../../../src/types';
import { collectDxfEntities, shapeToEntity, svgToDxf, writeDxf } from '../../../src/utils/dxfExport';
import { svgDocument } from '../../../src/utils/panelCanvas';
import { GeometryError } from '../../../src/utils/errors';

const cut = { role: 'cut', strokeWidth: 0.01 } as const;

describe('DXF export', () => {
  describe('shapeToEntity', () => {
    it('writes a rectangle as a closed four-point polyline with Y flipped', () => {
      const shape: Shape = { kind: 'rect', x: 1, y: 2, width: 3, height: 4, ...cut };
      expect(shapeToEntity(shape, 10)).toEqual({
        type: 'LWPOLYLINE',
        layer: 'CUT',
        points: [{ x: 1, y: 8 }, { x: 4, y: 8 }, { x: 4, y: 4 }, { x: 1, y: 4 }],
        closed: true,
      });
    });

    it('cuts the corners of a rounded rectangle', () => {
      const shape: Shape = { kind: 'roundedRect', x: 0, y: 0, width: 10, height: 4, radius: 1, ...cut };
      const entity = shapeToEntity(shape, 4);

      expect(entity).toEqual({
        type: 'LWPOLYLINE',
        layer: 'CUT',
        points: [
          { x: 1, y: 4 },
          { x: 9, y: 4 },
          { x: 10, y: 3 },
          { x: 10, y: 1 },
          { x: 9, y: 0 },
          { x: 1, y: 0 },
          { x: 0, y: 1 },
          { x: 0, y: 3 },
        ],
        closed: true,
      });
    });

    it('flips circle centres', () => {
      const shape: Shape = { kind: 'circle', cx: 5, cy: 3, r: 2, role: 'engrave', strokeWidth: 0.01 };
      expect(shapeToEntity(shape, 10)).toEqual({ type: 'CIRCLE', layer: 'ENGRAVE', cx: 5, cy: 7, r: 2 });
    });

    it('closes a polyline that returns to its start and drops the repeat', () => {
      const shape: Shape = {
        kind: 'polyline',
        points: [{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 5 }, { x: 0.005, y: 0 }],
        closed: false,
        ...cut,
      };
      expect(shapeToEntity(shape, 10)).toEqual({
        type: 'LWPOLYLINE',
        layer: 'CUT',
        points: [{ x: 0, y: 10 }, { x: 5, y: 10 }, { x: 5, y: 5 }],
        closed: true,
      });
    });

    it('leaves an open stroke open', () => {
      const shape: Shape = { kind: 'polyline', points: [{ x: 0, y: 0 }, { x: 5, y: 5 }], closed: false, ...cut };
      expect(shapeToEntity(shape, 10)).toMatchObject({ closed: false, points: [{ x: 0, y: 10 }, { x: 5, y: 5 }] });
    });
  });

  describe('writeDxf', () => {
    it('writes the header, both layers and the end marker', () => {
      const dxf = writeDxf([]);

      expect(dxf.startsWith('  0\nSECTION\n  2\nHEADER\n  9\n$INSUNITS\n  70\n4\n  0\nENDSEC\n')).toBe(true);
      expect(dxf).toContain(
        '  0\nTABLE\n  2\nLAYER\n  70\n2\n' +
          '  0\nLAYER\n  2\nCUT\n  70\n0\n  62\n1\n  6\nCONTINUOUS\n' +
          '  0\nLAYER\n  2\nENGRAVE\n  70\n0\n  62\n5\n  6\nCONTINUOUS\n' +
          '  0\nENDTAB\n'
      );
      expect(dxf.endsWith('  0\nSECTION\n  2\nENTITIES\n  0\nENDSEC\n  0\nEOF\n')).toBe(true);
    });

    it('counts vertices after the closing point is dropped', () => {
      const dxf = writeDxf([
        { type: 'LWPOLYLINE', layer: 'CUT', points: [{ x: 0, y: 0 }, { x: 1.5, y: 0 }, { x: 1.5, y: 2 }], closed: true },
      ]);
      expect(dxf).toContain(
        '  0\nLWPOLYLINE\n  8\nCUT\n  90\n3\n  70\n1\n' +
          '  10\n0.0000\n  20\n0.0000\n  10\n1.5000\n  20\n0.0000\n  10\n1.5000\n  20\n2.0000\n'
      );
    });
  });

  describe('svgToDxf', () => {
    const sheet = svgDocument(20, 10, [
      '<text x="0" y="0" font-size="4">LABEL</text>',
      '<rect x="1" y="2" width="3" height="4" fill="none" stroke="#ff0000" stroke-width="0.01"/>',
      '<circle cx="5" cy="3" r="2" fill="none" stroke="#0000ff" stroke-width="0.01"/>',
    ]);

    it('collects one entity per shape and skips text', () => {
      const entities = collectDxfEntities(sheet);
      expect(entities.map(e => e.type)).toEqual(['LWPOLYLINE', 'CIRCLE']);
    });

    it('flips against the document height', () => {
      const dxf = svgToDxf(sheet);
      expect(dxf).toContain('  0\nCIRCLE\n  8\nENGRAVE\n  10\n5.0000\n  20\n7.0000\n  40\n2.0000\n');
      expect(dxf).toContain('  0\nLWPOLYLINE\n  8\nCUT\n  90\n4\n  70\n1\n  10\n1.0000\n  20\n8.0000\n');
    });

    it('puts unrecognized and missing stroke colours on the cut layer', () => {
      const entities = collectDxfEntities(
        svgDocument(20, 10, [
          '<circle cx="5" cy="3" r="2" fill="none" stroke="#00ff00" stroke-width="0.01"/>',
          '<rect x="1" y="2" width="3" height="4" fill="none"/>',
        ])
      );
      expect(entities).toEqual([
        { type: 'CIRCLE', layer: 'CUT', cx: 5, cy: 7, r: 2 },
        {
          type: 'LWPOLYLINE',
          layer: 'CUT',
          points: [{ x: 1, y: 8 }, { x: 4, y: 8 }, { x: 4, y: 4 }, { x: 1, y: 4 }],
          closed: true,
        },
      ]);
    });

    it('needs a document size', () => {
      expect(() => collectDxfEntities('<rect x="0" y="0" width="1" height="1"/>')).toThrow(GeometryError);
    });
  });
});
