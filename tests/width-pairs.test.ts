import { describe, expect, it } from 'vitest';
import { Severity } from '../src/types/findings';
import { DEFAULT_CONFIG } from '../src/services/config';
import { punctuationAnalyzer, relatedFormsAnalyzer, widthRatio } from '../src/services/width-pairs';
import type { Font } from '../src/types/font';
import { buildTestFont, glyph } from './helpers/font-builder';

function widths(entries: Array<[string, number]>): Font {
  return buildTestFont({ glyphs: entries.map(([name, width]) => glyph(name, undefined, { regular: { width } })) });
}

function context(font: Font, glyphNames: string[]) {
  return { font, config: DEFAULT_CONFIG, glyphNames, masterIds: ['regular'] };
}

describe('width-pairs', () => {
  describe('widthRatio', () => {
    it('should give the first width as a share of the second', () => {
      const font = widths([
        ['endash', 500],
        ['hyphen', 300],
        ['space', 0],
      ]);
      expect(widthRatio(font, 'endash', 'hyphen', font.masters[0])).toBe(166.7);
      expect(widthRatio(font, 'endash', 'space', font.masters[0])).toBeNull();
      expect(widthRatio(font, 'endash', 'emdash', font.masters[0])).toBeNull();
    });
  });

  describe('punctuationAnalyzer', () => {
    it('should flag both sides of a mismatched pair', () => {
      const font = widths([
        ['parenleft', 300],
        ['parenright', 310],
        ['endash', 500],
        ['hyphen', 300],
      ]);
      const findings = punctuationAnalyzer.run(context(font, ['parenleft', 'parenright', 'endash', 'hyphen']));
      expect(findings).toEqual(
        ['parenleft', 'parenright'].map((subject) => ({
          check: 'punctuation',
          subject,
          subjectKind: 'glyph',
          masters: ['regular'],
          defect: 'punctuation-width',
          description: 'Mirrored pair must match in width (parenleft / parenright)',
          measured: '96.8%',
          threshold: '100 ±0.5%',
          severity: Severity.Fatal,
        }))
      );
    });

    it('should hold dashes to a ratio range', () => {
      const font = widths([
        ['endash', 350],
        ['hyphen', 300],
      ]);
      expect(punctuationAnalyzer.run(context(font, ['endash', 'hyphen']))).toMatchObject([
        { subject: 'endash', measured: '116.7%', threshold: '140..280%', severity: Severity.Warning },
        { subject: 'hyphen', measured: '116.7%', threshold: '140..280%', severity: Severity.Warning },
      ]);
    });
  });

  describe('relatedFormsAnalyzer', () => {
    it('should compare rotated figures', () => {
      const font = widths([
        ['six', 560],
        ['nine', 600],
      ]);
      expect(relatedFormsAnalyzer.run(context(font, ['six', 'nine']))).toMatchObject([
        { subject: 'six', defect: 'related-width', measured: '93.3%', threshold: '97..104%', severity: Severity.Fatal },
        { subject: 'nine', defect: 'related-width', measured: '93.3%', threshold: '97..104%', severity: Severity.Fatal },
      ]);
    });

    it('should skip pairs with a glyph out of scope', () => {
      const font = widths([
        ['six', 560],
        ['nine', 600],
      ]);
      expect(relatedFormsAnalyzer.run(context(font, ['six']))).toEqual([]);
    });
  });
});
