import { beforeAll, describe, expect, it } from 'vitest';
import { CHECK_IDS, Severity } from '../src/types/findings';
import { guardEntity, resolveScope } from '../src/services/analyzer';
import { ANALYZERS, runAudit } from '../src/services/audit';
import { UsageError } from '../src/utils/errors';
import { setLogLevel } from '../src/utils/logger';
import { buildTestFont, glyph, master, rect, ring } from './helpers/font-builder';

function sampleFont() {
  return buildTestFont({
    masters: [
      master('regular', { kerning: [{ left: 'A', right: 'V', value: 50 }] }),
      master('bold', { kerning: [{ left: 'A', right: 'V', value: -50 }] }),
    ],
    glyphs: [
      glyph('A', 65, {
        regular: { width: 600, paths: [rect(20, 0, 580, 700)] },
        bold: { width: 600, paths: [rect(20, 0, 580, 700)] },
      }),
      glyph('V', 86, {
        regular: { width: 600, paths: [rect(20, 0, 580, 700)] },
        bold: { width: 600, paths: [rect(20, 0, 580, 700)] },
      }),
      glyph('O', 79, {
        regular: { width: 600, paths: ring(40, 0, 560, 700, 80) },
        bold: { width: 600, paths: [...ring(40, 0, 560, 700, 120)].reverse() },
      }),
    ],
    groups: [
      { name: 'upper', side: 'left', members: ['A', 'V', 'O'] },
      { name: 'upper', side: 'right', members: ['A', 'V', 'O'] },
    ],
  });
}

describe('audit', () => {
  beforeAll(() => {
    setLogLevel('silent');
  });

  describe('resolveScope', () => {
    it('should default to every glyph and master in font order', () => {
      expect(resolveScope(sampleFont())).toEqual({ glyphNames: ['A', 'V', 'O'], masterIds: ['regular', 'bold'] });
    });

    it('should keep font order for subsets', () => {
      expect(resolveScope(sampleFont(), { glyphNames: ['O', 'A'], masterIds: ['bold'] })).toEqual({ glyphNames: ['A', 'O'], masterIds: ['bold'] });
    });

    it('should reject unknown masters, unknown glyphs and empty subsets', () => {
      const font = sampleFont();
      expect(() => resolveScope(font, { masterIds: ['black'] })).toThrow(UsageError);
      expect(() => resolveScope(font, { masterIds: ['black'] })).toThrow('Unknown master id(s): black');
      expect(() => resolveScope(font, { glyphNames: ['Q'] })).toThrow('Unknown glyph name(s): Q');
      expect(() => resolveScope(font, { glyphNames: [] })).toThrow('Glyph subset is empty');
      expect(() => resolveScope(font, { masterIds: [] })).toThrow('Master subset is empty');
    });
  });

  describe('guardEntity', () => {
    it('should turn a failure into an unreliable finding', () => {
      const findings = guardEntity('spacing', { subject: 'O', kind: 'glyph' }, ['regular'], () => {
        throw new Error('bad outline');
      });
      expect(findings).toEqual([
        {
          check: 'spacing',
          subject: 'O',
          subjectKind: 'glyph',
          masters: ['regular'],
          defect: 'analysis-error',
          description: 'Analysis aborted: bad outline',
          severity: Severity.Unreliable,
        },
      ]);
    });
  });

  describe('runAudit', () => {
    it('should run every check in a fixed order', () => {
      expect(ANALYZERS.map((analyzer) => analyzer.id)).toEqual([...CHECK_IDS]);
      const { report } = runAudit(sampleFont());
      const headings = report.split('\n').filter((line) => line.startsWith('## '));
      expect(headings).toEqual([
        '## Interpolation compatibility',
        '## Kerning consistency',
        '## Spacing',
        '## Stem consistency',
        '## Colour (ink density)',
        '## Overshoots',
        '## Width proportions',
        '## Diagonal stems',
        '## Junction thinning',
        '## Related forms',
        '## Punctuation widths',
      ]);
    });

    it('should label glyphs and pairs with their worst severity', () => {
      const { labels } = runAudit(sampleFont(), { checks: ['compatibility', 'kerning'] });
      expect(labels).toEqual([
        { subject: 'A', kind: 'glyph', severity: Severity.Pass },
        { subject: 'O', kind: 'glyph', severity: Severity.Fatal },
        { subject: 'V', kind: 'glyph', severity: Severity.Pass },
        { subject: 'A|V', kind: 'pair', severity: Severity.Fatal },
      ]);
    });

    it('should report letters outside kerning groups', () => {
      const font = buildTestFont({ glyphs: [glyph('A', 65, { regular: { width: 600, paths: [rect(20, 0, 580, 700)] } })] });
      const { labels } = runAudit(font, { checks: ['kerning'] });
      expect(labels).toEqual([{ subject: 'A', kind: 'glyph', severity: Severity.Warning }]);
    });

    it('should only run the selected checks', () => {
      const { findings, report } = runAudit(sampleFont(), { checks: ['kerning'] });
      expect(findings.map((finding) => finding.defect)).toEqual(['sign-change']);
      expect(report.startsWith('## Kerning consistency\n')).toBe(true);
    });

    it('should produce the same output twice', () => {
      const font = sampleFont();
      expect(runAudit(font)).toEqual(runAudit(font));
    });

    it('should reject an empty check selection', () => {
      expect(() => runAudit(sampleFont(), { checks: [] })).toThrow(UsageError);
    });
  });
});
