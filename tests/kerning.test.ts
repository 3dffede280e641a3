import { describe, expect, it } from 'vitest';
import { Severity } from '../src/types/findings';
import { DEFAULT_CONFIG } from '../src/services/config';
import { checkKerningPair, fallbackPair, findGroupOrphans, kerningAnalyzer, kerningKeys } from '../src/services/kerning';
import { buildTestFont, glyph, master, rect } from './helpers/font-builder';

const LETTERS = [
  glyph('A', 65, { regular: { width: 600, paths: [rect(0, 0, 600, 700)] } }),
  glyph('V', 86, { regular: { width: 600, paths: [rect(0, 0, 600, 700)] } }),
  glyph('T', 84, { regular: { width: 600, paths: [rect(0, 0, 600, 700)] } }),
  glyph('o', 111, { regular: { width: 500, paths: [rect(0, 0, 500, 500)] } }),
];

function pairFindings(font: ReturnType<typeof buildTestFont>, key: string) {
  return checkKerningPair(font, key, font.masters, DEFAULT_CONFIG);
}

describe('kerning', () => {
  it('should report a pair that changes sign between masters', () => {
    const font = buildTestFont({
      masters: [
        master('regular', { kerning: [{ left: 'A', right: 'V', value: 50 }] }),
        master('bold', { kerning: [{ left: 'A', right: 'V', value: -50 }] }),
      ],
      glyphs: LETTERS,
    });
    expect(pairFindings(font, 'A|V')).toEqual([
      {
        check: 'kerning',
        subject: 'A|V',
        subjectKind: 'pair',
        masters: ['regular', 'bold'],
        defect: 'sign-change',
        description: 'Kerning value changes sign between masters',
        measured: '50 / -50',
        threshold: 'same sign',
        severity: Severity.Fatal,
      },
    ]);
  });

  it('should report a pair missing from a master without a sign change', () => {
    const font = buildTestFont({
      masters: [master('regular', { kerning: [{ left: 'T', right: 'o', value: -80 }] }), master('bold')],
      glyphs: LETTERS,
    });
    expect(pairFindings(font, 'T|o')).toMatchObject([{ defect: 'missing-pair', masters: ['bold'], measured: 'only in regular', severity: Severity.Fatal }]);
  });

  it('should not report a pair that is zero in one master', () => {
    const font = buildTestFont({
      masters: [
        master('regular', { kerning: [{ left: 'T', right: 'o', value: -80 }] }),
        master('bold', { kerning: [{ left: 'T', right: 'o', value: 0 }] }),
      ],
      glyphs: LETTERS,
    });
    expect(pairFindings(font, 'T|o')).toEqual([]);
  });

  it('should report values above the outlier threshold', () => {
    const font = buildTestFont({
      masters: [master('regular', { kerning: [{ left: 'T', right: 'o', value: -450 }] })],
      glyphs: LETTERS,
    });
    expect(pairFindings(font, 'T|o')).toMatchObject([{ defect: 'outlier', measured: -450, threshold: '±400', severity: Severity.Warning }]);
  });

  it('should report an exception equal to its group pair', () => {
    const font = buildTestFont({
      masters: [
        master('regular', {
          kerning: [
            { left: 'T', right: 'o', value: -80 },
            { left: 'T', right: '@round', value: -80 },
          ],
        }),
      ],
      glyphs: LETTERS,
      groups: [{ name: 'round', side: 'right', members: ['o'] }],
    });
    expect(pairFindings(font, 'T|o')).toMatchObject([
      { defect: 'redundant-exception', description: 'Exception repeats T|@round and can be removed', threshold: 'differs from -80' },
    ]);
  });

  it('should report references to unknown glyphs or groups only', () => {
    const font = buildTestFont({
      masters: [master('regular', { kerning: [{ left: 'A', right: '@ghost', value: -60 }] }), master('bold')],
      glyphs: LETTERS,
    });
    expect(pairFindings(font, 'A|@ghost')).toMatchObject([{ defect: 'dangling-reference', severity: Severity.Unreliable }]);
  });

  describe('fallbackPair', () => {
    it('should prefer glyph-group, then group-glyph, then group-group', () => {
      const font = buildTestFont({
        masters: [
          master('regular', {
            kerning: [
              { left: '@T_left', right: '@round', value: -30 },
              { left: '@T_left', right: 'o', value: -40 },
              { left: 'T', right: '@round', value: -50 },
            ],
          }),
        ],
        glyphs: LETTERS,
        groups: [
          { name: 'round', side: 'right', members: ['o'] },
          { name: 'T_left', side: 'left', members: ['T'] },
        ],
      });
      const regular = font.masters[0];
      const exception = { left: { kind: 'glyph' as const, name: 'T' }, right: { kind: 'glyph' as const, name: 'o' }, value: -70 };
      expect(fallbackPair(font, regular, exception)?.value).toBe(-50);
    });
  });

  describe('findGroupOrphans', () => {
    it('should report letters outside kerning groups', () => {
      const font = buildTestFont({
        glyphs: LETTERS,
        groups: [
          { name: 'A', side: 'left', members: ['A', 'V', 'T'] },
          { name: 'A', side: 'right', members: ['A', 'V', 'T'] },
          { name: 'o', side: 'left', members: ['o'] },
        ],
      });
      expect(findGroupOrphans(font, ['A', 'V', 'T', 'o'], ['regular'])).toMatchObject([
        { subject: 'o', subjectKind: 'glyph', defect: 'group-orphan', measured: 'right', severity: Severity.Warning },
      ]);
    });

    it('should report every letter of a font without groups', () => {
      const font = buildTestFont({ glyphs: LETTERS });
      expect(findGroupOrphans(font, ['A'], ['regular'])).toEqual([
        {
          check: 'kerning',
          subject: 'A',
          subjectKind: 'glyph',
          masters: ['regular'],
          defect: 'group-orphan',
          description: 'Letter has no left or right kerning group',
          measured: 'left, right',
          threshold: 'left and right group',
          severity: Severity.Warning,
        },
      ]);
      expect(findGroupOrphans(font, ['A', 'V', 'T', 'o'], ['regular']).map((finding) => finding.subject)).toEqual(['A', 'V', 'T', 'o']);
    });
  });

  describe('kerningAnalyzer', () => {
    it('should use the union of pair keys across the requested masters', () => {
      const font = buildTestFont({
        masters: [
          master('regular', { kerning: [{ left: 'A', right: 'V', value: -40 }] }),
          master('bold', { kerning: [{ left: 'T', right: 'o', value: -90 }] }),
        ],
        glyphs: LETTERS,
      });
      expect(kerningKeys(font, ['regular', 'bold'])).toEqual(['A|V', 'T|o']);
      const context = { font, config: DEFAULT_CONFIG, glyphNames: ['A', 'V', 'T', 'o'], masterIds: ['regular', 'bold'] };
      expect(kerningAnalyzer.subjects(context)).toEqual([
        { subject: 'A|V', kind: 'pair' },
        { subject: 'T|o', kind: 'pair' },
      ]);
      expect(kerningAnalyzer.run(context).map((finding) => [finding.subject, finding.defect, finding.masters])).toEqual([
        ['A|V', 'missing-pair', ['bold']],
        ['T|o', 'missing-pair', ['regular']],
        ['A', 'group-orphan', ['regular', 'bold']],
        ['V', 'group-orphan', ['regular', 'bold']],
        ['T', 'group-orphan', ['regular', 'bold']],
        ['o', 'group-orphan', ['regular', 'bold']],
      ]);
    });
  });
});
