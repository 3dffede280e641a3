import { describe, expect, it } from 'vitest';
import { Severity } from '../src/types/findings';
import { DEFAULT_CONFIG } from '../src/services/config';
import { colorAnalyzer, evaluateColor, glyphDensity } from '../src/services/color';
import { buildTestFont, glyph, rect } from './helpers/font-builder';

describe('color', () => {
  describe('evaluateColor', () => {
    it('should pass a density at the expected ratio', () => {
      expect(evaluateColor('o', 0.5, 0.5)).toEqual({ verdict: 'pass', ratioPct: 100 });
    });

    it('should warn just outside the tolerance', () => {
      expect(evaluateColor('o', 0.4375, 0.5)).toMatchObject({ verdict: 'compensation', ratioPct: 87.5, expected: '100% ±10%' });
    });

    it('should fail far outside the tolerance', () => {
      expect(evaluateColor('o', 0.375, 0.5)).toMatchObject({ verdict: 'inconsistent', ratioPct: 75 });
    });

    it('should skip glyphs whose density varies by design', () => {
      expect(evaluateColor('e', 0.375, 0.5).verdict).toBe('unreliable');
    });

    it('should apply a default tolerance to unknown glyphs', () => {
      expect(evaluateColor('eng', 0.5, 0.5).verdict).toBe('pass');
      expect(evaluateColor('eng', 0.4375, 0.5)).toMatchObject({ verdict: 'inconsistent', expected: '100% ±12%' });
    });

    it('should not divide by an empty reference', () => {
      expect(evaluateColor('o', 0.5, 0)).toMatchObject({ verdict: 'unreliable', ratioPct: null });
    });
  });

  it('should average ink over the glyph zone', () => {
    const font = buildTestFont({ glyphs: [glyph('l', 108, { regular: { width: 100, paths: [rect(0, 0, 50, 700)] } })] });
    const target = font.glyphs.get('l');
    expect(target && glyphDensity(font, target, font.masters[0], 10)).toBeCloseTo(0.5);
  });

  it('should report a lowercase glyph much lighter than n', () => {
    const font = buildTestFont({
      glyphs: [
        glyph('n', 110, { regular: { width: 100, paths: [rect(0, 0, 50, 500)] } }),
        glyph('o', 111, { regular: { width: 100, paths: [rect(0, 0, 25, 500)] } }),
      ],
    });
    const findings = colorAnalyzer.run({ font, config: DEFAULT_CONFIG, glyphNames: ['n', 'o'], masterIds: ['regular'] });
    expect(findings).toEqual([
      {
        check: 'color',
        subject: 'o',
        subjectKind: 'glyph',
        masters: ['regular'],
        defect: 'color-inconsistent',
        description: 'Density far from the expected ratio',
        measured: '50% of n',
        threshold: '100% ±10%',
        severity: Severity.Fatal,
      },
    ]);
  });
});
