import type { Font, Master } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { classifyGlyph } from '../utils/unicode-utils';
import { glyphSubjects, guardEntity, mastersInScope, round, type Analyzer, type AuditContext } from './analyzer';
import { DIAGONAL_TABLE } from './patterns';
import { measureGlyphStems } from './stems';

/**
 * Perpendicular thickness of a diagonal stroke. Steep diagonals read as
 * vertical stems, shallow ones as horizontal.
 */
export function diagonalStem(font: Font, glyphName: string, master: Master): number | null {
  const glyph = font.glyphs.get(glyphName);
  const stems = glyph ? measureGlyphStems(font, glyph, master) : null;
  return stems ? (stems.vertical.dominant ?? stems.horizontal.dominant) : null;
}

function referenceStem(font: Font, name: 'n' | 'H', master: Master): number | null {
  const glyph = font.glyphs.get(name);
  return glyph ? (measureGlyphStems(font, glyph, master)?.vertical.dominant ?? null) : null;
}

function ratioFinding(name: string, masterId: string, stem: number, reference: number, referenceName: string): Finding | null {
  const base = { check: 'diagonals' as const, subject: name, subjectKind: 'glyph' as const, masters: [masterId] };
  const ratio = round((stem / reference) * 100);
  if (DIAGONAL_TABLE.unreliable.includes(name)) {
    return {
      ...base,
      defect: 'diagonal-unreliable',
      description: 'Crossing strokes; diagonal measurement unreliable',
      measured: `${stem} (${ratio}% of ${referenceName})`,
      severity: Severity.Unreliable,
    };
  }
  // thin references turn unit rounding into large ratio swings
  if (reference < DIAGONAL_TABLE.minReference) {
    return null;
  }
  const range = DIAGONAL_TABLE.ranges[name];
  if (!range || (ratio >= range[0] && ratio <= range[1])) {
    return null;
  }
  return {
    ...base,
    defect: 'diagonal-ratio',
    description: `Diagonal weight outside the usual ratio to ${referenceName}`,
    measured: `${stem} (${ratio}% of ${referenceName})`,
    threshold: `${range[0]}..${range[1]}%`,
    severity: Severity.Warning,
  };
}

function groupFindings(stems: ReadonlyMap<string, number>, masterId: string): Finding[] {
  const findings: Finding[] = [];
  for (const group of DIAGONAL_TABLE.groups) {
    const members = group.members.filter((name) => stems.has(name) && !DIAGONAL_TABLE.unreliable.includes(name));
    if (members.length < 2) {
      continue;
    }
    const values = members.map((name) => stems.get(name) ?? 0);
    const spread = Math.max(...values) - Math.min(...values);
    const average = values.reduce((sum, value) => sum + value, 0) / values.length;
    const spreadPct = average > 0 ? round((spread / average) * 100) : 0;
    if (spread <= DIAGONAL_TABLE.minSpread || spreadPct <= group.tolerance) {
      continue;
    }
    for (const name of members) {
      findings.push({
        check: 'diagonals',
        subject: name,
        subjectKind: 'glyph',
        masters: [masterId],
        defect: 'diagonal-group',
        description: `${group.note}: diagonal weights differ across ${group.name}`,
        measured: `${stems.get(name)} (spread ${spreadPct}%)`,
        threshold: `${group.tolerance}%`,
        severity: Severity.Fatal,
      });
    }
  }
  return findings;
}

function analyzeDiagonals(context: AuditContext): Finding[] {
  const { font, glyphNames } = context;
  const findings: Finding[] = [];

  for (const master of mastersInScope(context)) {
    const references = { n: referenceStem(font, 'n', master), H: referenceStem(font, 'H', master) };
    if (references.n === null && references.H === null) {
      continue;
    }

    const stems = new Map<string, number>();
    for (const name of glyphNames.filter((n) => DIAGONAL_TABLE.glyphs.includes(n))) {
      const glyph = font.glyphs.get(name);
      if (!glyph) {
        continue;
      }
      findings.push(
        ...guardEntity('diagonals', { subject: name, kind: 'glyph' }, [master.id], () => {
          const stem = diagonalStem(font, name, master);
          if (stem === null) {
            return [];
          }
          stems.set(name, stem);
          const referenceName = classifyGlyph(glyph) === 'uppercase' ? 'H' : 'n';
          const reference = references[referenceName];
          const finding = reference ? ratioFinding(name, master.id, stem, reference, referenceName) : null;
          return finding ? [finding] : [];
        })
      );
    }
    findings.push(...groupFindings(stems, master.id));
  }
  return findings;
}

export const diagonalsAnalyzer: Analyzer = {
  id: 'diagonals',
  title: 'Diagonal stems',
  subjects: glyphSubjects,
  run: analyzeDiagonals,
};
