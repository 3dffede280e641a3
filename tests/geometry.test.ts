import { describe, expect, it } from 'vitest';
import type { Node, Path } from '../src/types/font';
import { decomposeLayer, pathBounds, pathDirection, pathSegments, reverseNodes, signedArea } from '../src/utils/geometry';
import { buildTestFont, glyph, rect } from './helpers/font-builder';

function rotate(path: Path, degrees: number, cx: number, cy: number): Path {
  const r = (degrees * Math.PI) / 180;
  return {
    nodes: path.nodes.map((node) => ({
      x: cx + (node.x - cx) * Math.cos(r) - (node.y - cy) * Math.sin(r),
      y: cy + (node.x - cx) * Math.sin(r) + (node.y - cy) * Math.cos(r),
      type: node.type,
    })),
  };
}

const square: Path = { nodes: rect(0, 0, 100, 100).nodes };

describe('geometry', () => {
  describe('direction', () => {
    it('should read a counter-clockwise square as positive area', () => {
      expect(signedArea(square.nodes)).toBe(10000);
      expect(pathDirection(square)).toBe('counterclockwise');
    });

    it('should flip direction when nodes are reversed', () => {
      expect(pathDirection({ nodes: reverseNodes(square.nodes) })).toBe('clockwise');
    });

    it('should not depend on the start node', () => {
      for (let shift = 1; shift < square.nodes.length; shift++) {
        const cycled: Path = { nodes: [...square.nodes.slice(shift), ...square.nodes.slice(0, shift)] };
        expect(pathDirection(cycled)).toBe('counterclockwise');
        expect(pathDirection({ nodes: reverseNodes(cycled.nodes) })).toBe('clockwise');
      }
    });

    it('should keep direction under rotation', () => {
      for (const angle of [17, 90, 143, 211, 300]) {
        expect(pathDirection(rotate(square, angle, 37, -12))).toBe('counterclockwise');
      }
    });

    it('should treat a zero-area path as counter-clockwise', () => {
      const flat: Path = {
        nodes: [
          { x: 0, y: 0, type: 'line' },
          { x: 100, y: 0, type: 'line' },
        ],
      };
      expect(pathDirection(flat)).toBe('counterclockwise');
    });
  });

  describe('reverseNodes', () => {
    it('should move segment types to the node that now ends each segment', () => {
      const nodes: Node[] = [
        { x: 0, y: 0, type: 'line' },
        { x: 0, y: 100, type: 'offcurve' },
        { x: 100, y: 100, type: 'offcurve' },
        { x: 100, y: 0, type: 'curve' },
      ];
      expect(reverseNodes(nodes).map((node) => node.type)).toEqual(['line', 'offcurve', 'offcurve', 'curve']);
    });
  });

  describe('pathSegments', () => {
    it('should split a square into four lines', () => {
      const { segments, malformed, zeroLength } = pathSegments(square);
      expect(segments.map((segment) => segment.kind)).toEqual(['line', 'line', 'line', 'line']);
      expect(malformed).toBe(false);
      expect(zeroLength).toBe(0);
    });

    it('should flag a single off-curve before a line as malformed', () => {
      const path: Path = {
        nodes: [
          { x: 0, y: 0, type: 'line' },
          { x: 50, y: 80, type: 'offcurve' },
          { x: 100, y: 0, type: 'line' },
        ],
      };
      const { segments, malformed } = pathSegments(path);
      expect(malformed).toBe(true);
      expect(segments.map((segment) => segment.kind)).toEqual(['line', 'cubic']);
    });

    it('should count segments that collapse to a point', () => {
      const path: Path = {
        nodes: [
          { x: 0, y: 0, type: 'line' },
          { x: 0, y: 0, type: 'line' },
          { x: 100, y: 0, type: 'line' },
          { x: 100, y: 100, type: 'line' },
        ],
      };
      expect(pathSegments(path).zeroLength).toBe(1);
    });
  });

  describe('pathBounds', () => {
    it('should include curve extrema', () => {
      const arch: Path = {
        nodes: [
          { x: 0, y: 0, type: 'line' },
          { x: 0, y: 100, type: 'offcurve' },
          { x: 100, y: 100, type: 'offcurve' },
          { x: 100, y: 0, type: 'curve' },
        ],
      };
      const bounds = pathBounds(arch);
      expect(bounds?.xMin).toBe(0);
      expect(bounds?.xMax).toBe(100);
      expect(bounds?.yMin).toBe(0);
      expect(bounds?.yMax).toBeCloseTo(75);
    });

    it('should return null for an empty path', () => {
      expect(pathBounds({ nodes: [] })).toBeNull();
    });
  });

  describe('decomposeLayer', () => {
    it('should resolve components and keep direction through a mirror', () => {
      const font = buildTestFont({
        glyphs: [
          glyph('bar', undefined, { regular: { width: 100, paths: [rect(0, 0, 40, 100)] } }),
          glyph('mirrored', undefined, {
            regular: { width: 100, components: [{ name: 'bar', transform: [-1, 0, 0, 1, 100, 0] }] },
          }),
        ],
      });
      const layer = font.glyphs.get('mirrored')?.layers.get('regular');
      expect(layer).toBeDefined();
      if (!layer) {
        return;
      }
      const paths = decomposeLayer(font, layer, 'regular');
      expect(paths).toHaveLength(1);
      expect(pathDirection(paths[0])).toBe('counterclockwise');
      expect(pathBounds(paths[0])).toEqual({ xMin: 60, yMin: 0, xMax: 100, yMax: 100 });
    });

    it('should stop expanding a component cycle', () => {
      const font = buildTestFont({
        glyphs: [glyph('loop', undefined, { regular: { width: 100, paths: [rect(0, 0, 10, 10)], components: [{ name: 'loop' }] } })],
      });
      const layer = font.glyphs.get('loop')?.layers.get('regular');
      expect(layer && decomposeLayer(font, layer, 'regular')).toHaveLength(2);
    });

    it('should skip components missing from the master', () => {
      const font = buildTestFont({
        glyphs: [glyph('acute-only', undefined, { regular: { width: 100, components: [{ name: 'acute' }] } })],
      });
      const layer = font.glyphs.get('acute-only')?.layers.get('regular');
      expect(layer && decomposeLayer(font, layer, 'regular')).toEqual([]);
    });
  });
});
