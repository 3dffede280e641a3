import { describe, expect, it } from 'vitest';
import { Severity } from '../src/types/findings';
import { DEFAULT_CONFIG } from '../src/services/config';
import { measureProportions, proportionsAnalyzer } from '../src/services/proportions';
import type { Font } from '../src/types/font';
import { buildTestFont, glyph } from './helpers/font-builder';

function widths(entries: Array<[string, number, number]>): Font {
  return buildTestFont({ glyphs: entries.map(([name, unicode, width]) => glyph(name, unicode, { regular: { width, paths: [] } })) });
}

function audit(font: Font, glyphNames: string[]) {
  return proportionsAnalyzer.run({ font, config: DEFAULT_CONFIG, glyphNames, masterIds: ['regular'] });
}

describe('proportions', () => {
  describe('measureProportions', () => {
    it('should compare capitals and figures with H', () => {
      const font = widths([
        ['H', 72, 700],
        ['zero', 48, 600],
        ['o', 111, 500],
      ]);
      const proportions = measureProportions(font, font.masters[0], ['H', 'zero', 'o']);
      expect([...proportions]).toEqual([
        ['H', { width: 700, ratio: 100, reference: 'H' }],
        ['zero', { width: 600, ratio: 85.7, reference: 'H' }],
      ]);
    });
  });

  describe('proportionsAnalyzer', () => {
    it('should flag group members away from the median and widths out of range', () => {
      const font = widths([
        ['h', 104, 520],
        ['n', 110, 500],
      ]);
      expect(audit(font, ['h', 'n'])).toEqual([
        {
          check: 'proportions',
          subject: 'n',
          subjectKind: 'glyph',
          masters: ['regular'],
          defect: 'width-group',
          description: 'Arch forms must match: width off the h n group',
          measured: '100% (median 104%)',
          threshold: '±1%',
          severity: Severity.Fatal,
        },
        {
          check: 'proportions',
          subject: 'h',
          subjectKind: 'glyph',
          masters: ['regular'],
          defect: 'width-range',
          description: 'Width outside the usual range for h',
          measured: '104% of n',
          threshold: '99..101%',
          severity: Severity.Warning,
        },
      ]);
    });

    it('should flag both glyphs of a reversed width order', () => {
      const font = widths([
        ['n', 110, 500],
        ['r', 114, 520],
      ]);
      const order = audit(font, ['n', 'r']).filter((finding) => finding.defect === 'width-order');
      expect(order.map((finding) => finding.subject)).toEqual(['n', 'r']);
      expect(order[0]).toMatchObject({ description: 'r is wider than n', measured: 'n 500 / r 520', threshold: 'n ≥ r', severity: Severity.Fatal });
    });

    it('should pass widths inside their ranges', () => {
      const font = widths([
        ['n', 110, 500],
        ['m', 109, 760],
      ]);
      expect(audit(font, ['n', 'm'])).toEqual([]);
    });

    it('should skip glyphs without a reference width', () => {
      expect(audit(widths([['m', 109, 300]]), ['m'])).toEqual([]);
    });
  });
});
