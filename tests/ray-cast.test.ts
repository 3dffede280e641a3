import { describe, expect, it } from 'vitest';
import type { Path } from '../src/types/font';
import {
  castRay,
  classifyTangent,
  dominantStem,
  inkDensity,
  measureAngled,
  measureAtHeight,
  measurePerpendicularStems,
  median,
} from '../src/services/ray-cast';
import { rect, ring } from './helpers/font-builder';

function paths(...input: Array<{ nodes: Path['nodes'] }>): Path[] {
  return input.map((path) => ({ nodes: path.nodes }));
}

const KAPPA = 0.5522847498;

/** Four-cubic approximation of a circle, counter-clockwise from its rightmost point. */
function circle(cx: number, cy: number, r: number): Path {
  const k = r * KAPPA;
  return {
    nodes: [
      { x: cx + r, y: cy, type: 'curve' },
      { x: cx + r, y: cy + k, type: 'offcurve' },
      { x: cx + k, y: cy + r, type: 'offcurve' },
      { x: cx, y: cy + r, type: 'curve' },
      { x: cx - k, y: cy + r, type: 'offcurve' },
      { x: cx - r, y: cy + k, type: 'offcurve' },
      { x: cx - r, y: cy, type: 'curve' },
      { x: cx - r, y: cy - k, type: 'offcurve' },
      { x: cx - k, y: cy - r, type: 'offcurve' },
      { x: cx, y: cy - r, type: 'curve' },
      { x: cx + k, y: cy - r, type: 'offcurve' },
      { x: cx + r, y: cy - k, type: 'offcurve' },
    ],
  };
}

/** Flat base with a single cubic arch peaking at y = 75, x = 50. */
const arch: Path = {
  nodes: [
    { x: 0, y: 0, type: 'line' },
    { x: 0, y: 100, type: 'offcurve' },
    { x: 100, y: 100, type: 'offcurve' },
    { x: 100, y: 0, type: 'curve' },
  ],
};

describe('ray-cast', () => {
  describe('measureAtHeight', () => {
    it('should read one span across a rectangle', () => {
      const result = measureAtHeight(paths(rect(10, 0, 60, 100)), 50, 100);
      expect(result.spans).toEqual([{ entry: 10, exit: 60, thickness: 50 }]);
      expect(result.coverage).toBe(0.5);
    });

    it('should read the walls of a ring as two spans', () => {
      const result = measureAtHeight(paths(...ring(0, 0, 100, 100, 30)), 50, 100);
      expect(result.spans).toEqual([
        { entry: 0, exit: 30, thickness: 30 },
        { entry: 70, exit: 100, thickness: 30 },
      ]);
      expect(result.coverage).toBe(0.6);
    });

    it('should merge overlapping contours of the same direction', () => {
      const result = measureAtHeight(paths(rect(0, 0, 60, 100), rect(40, 0, 100, 100)), 50, 100);
      expect(result.spans).toEqual([{ entry: 0, exit: 100, thickness: 100 }]);
    });

    it('should nudge a ray that runs through nodes', () => {
      const result = measureAtHeight(paths(rect(10, 0, 60, 100)), 0, 100);
      expect(result.spans).toHaveLength(1);
      expect(result.spans[0].thickness).toBe(50);
    });

    it('should follow the chord of a curved outline', () => {
      const outline = [circle(150, 150, 100)];
      for (const y of [120, 170, 200]) {
        const chord = 2 * Math.sqrt(100 ** 2 - (y - 150) ** 2);
        const { spans } = measureAtHeight(outline, y, 300);
        expect(spans).toHaveLength(1);
        expect(Math.abs(spans[0].entry - (150 - chord / 2))).toBeLessThan(0.1);
        expect(Math.abs(spans[0].thickness - chord)).toBeLessThan(0.1);
      }
    });

    it('should cross a single cubic twice below its peak', () => {
      const { spans } = measureAtHeight([arch], 50, 100);
      expect(spans).toHaveLength(1);
      expect(spans[0].entry).toBeCloseTo(11.51, 2);
      expect(spans[0].exit).toBeCloseTo(88.49, 2);
    });

    it('should not count a ray that only touches the top of a curve', () => {
      expect(castRay([arch], { origin: { x: 0, y: 75 }, angle: 0 })).toEqual([]);
      expect(measureAtHeight([arch], 75, 100).coverage).toBe(0);
    });

    it('should find nothing above the outline', () => {
      const result = measureAtHeight(paths(rect(10, 0, 60, 100)), 150, 100);
      expect(result.spans).toEqual([]);
      expect(result.coverage).toBe(0);
    });

    it('should clip coverage to the advance width', () => {
      expect(measureAtHeight(paths(rect(-20, 0, 60, 100)), 50, 100).coverage).toBe(0.6);
    });
  });

  describe('measureAngled', () => {
    it('should measure a vertical ray through a rectangle', () => {
      const spans = measureAngled(paths(rect(0, 0, 100, 100)), { x: 35, y: 50 }, 90);
      expect(spans).toHaveLength(1);
      expect(spans[0].thickness).toBeCloseTo(100);
    });

    it('should measure a slanted stem across its width', () => {
      const stem: Path = {
        nodes: [
          { x: 500, y: 0, type: 'line' },
          { x: 600, y: 0, type: 'line' },
          { x: 100, y: 500, type: 'line' },
          { x: 0, y: 500, type: 'line' },
        ],
      };
      const spans = measureAngled([stem], { x: 275, y: 275 }, 45);
      expect(spans).toHaveLength(1);
      expect(spans[0].entry).toBeCloseTo(-25 * Math.SQRT2, 6);
      expect(spans[0].exit).toBeCloseTo(25 * Math.SQRT2, 6);
      expect(spans[0].thickness).toBeCloseTo(50 * Math.SQRT2, 6);
    });
  });

  describe('inkDensity', () => {
    it('should average coverage over the zone', () => {
      expect(inkDensity(paths(rect(0, 0, 50, 100)), 0, 100, 100, 10)).toBeCloseTo(0.5);
    });

    it('should be zero for an empty zone', () => {
      expect(inkDensity(paths(rect(0, 0, 50, 100)), 0, 0, 100, 10)).toBe(0);
    });
  });

  describe('classifyTangent', () => {
    it('should sort tangents into orientations', () => {
      expect(classifyTangent(90)).toBe('vertical');
      expect(classifyTangent(-90)).toBe('vertical');
      expect(classifyTangent(0)).toBe('horizontal');
      expect(classifyTangent(180)).toBe('horizontal');
      expect(classifyTangent(45)).toBe('diagonal');
    });
  });

  describe('measurePerpendicularStems', () => {
    it('should read both sides of a vertical stem', () => {
      const stems = measurePerpendicularStems(paths(rect(0, 0, 80, 700)), -200, 700);
      expect(stems.map((stem) => [stem.thickness, stem.orientation])).toEqual([
        [80, 'vertical'],
        [80, 'vertical'],
      ]);
    });
  });

  describe('dominantStem', () => {
    it('should return the median of the largest cluster', () => {
      expect(dominantStem([80, 81, 82, 120, 79])).toBe(81);
    });

    it('should return null without values', () => {
      expect(dominantStem([])).toBeNull();
    });
  });

  describe('median', () => {
    it('should average the middle pair of an even list', () => {
      expect(median([4, 1, 3, 2])).toBe(2.5);
      expect(median([])).toBeNull();
    });
  });
});
