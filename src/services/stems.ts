import type { Font, Glyph, Master } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { decomposeLayer, unionBounds } from '../utils/geometry';
import { baseGlyphName, classifyGlyph, referenceGlyphName, type GlyphCase } from '../utils/unicode-utils';
import { glyphSubjects, guardEntity, type Analyzer, type AuditContext } from './analyzer';
import { dominantStem, measurePerpendicularStems, type StemMeasurement } from './ray-cast';
import { STEM_TABLE } from './patterns';

export type Verdict = 'pass' | 'compensation' | 'unreliable' | 'inconsistent';

export const VERDICT_SEVERITY: Record<Verdict, Severity> = {
  pass: Severity.Pass,
  compensation: Severity.Warning,
  unreliable: Severity.Unreliable,
  inconsistent: Severity.Fatal,
};

export interface StemStats {
  dominant: number | null;
  min: number | null;
  max: number | null;
}

export interface GlyphStems {
  vertical: StemStats;
  horizontal: StemStats;
  measurements: StemMeasurement[];
}

export interface StemEvaluation {
  verdict: Verdict;
  deviation: number;
  expected?: string;
  note?: string;
}

function stats(values: number[]): StemStats {
  return {
    dominant: dominantStem(values),
    min: values.length > 0 ? Math.min(...values) : null,
    max: values.length > 0 ? Math.max(...values) : null,
  };
}

/** Lowercase is read from descender to x-height so dots and accents stay out. */
export function measureGlyphStems(font: Font, glyph: Glyph, master: Master): GlyphStems | null {
  const layer = glyph.layers.get(master.id);
  if (!layer) {
    return null;
  }
  const paths = decomposeLayer(font, layer, master.id);
  if (!unionBounds(paths)) {
    return null;
  }
  const yMax = classifyGlyph(glyph) === 'lowercase' ? master.metrics.xHeight : master.metrics.capHeight;
  const measurements = measurePerpendicularStems(paths, master.metrics.descender, yMax);
  return {
    vertical: stats(measurements.filter((m) => m.orientation === 'vertical').map((m) => m.thickness)),
    horizontal: stats(measurements.filter((m) => m.orientation === 'horizontal').map((m) => m.thickness)),
    measurements,
  };
}

/**
 * Judges a stem against the reference stem. Tolerances grow with weight by
 * max(1, reference / 100); above 120 units some constructions stop being
 * measurable.
 */
export function evaluateStem(glyphName: string, measured: number, reference: number): StemEvaluation {
  const base = baseGlyphName(glyphName);
  const pattern = STEM_TABLE.patterns[base];
  const deviation = Math.round(measured - reference);
  const factor = Math.max(1, reference / 100);

  const heavyNote = STEM_TABLE.heavyUnreliable[base];
  if (reference > 120 && heavyNote !== undefined) {
    return { verdict: 'unreliable', deviation, note: heavyNote };
  }

  if (!pattern) {
    const limit = Math.max(3, Math.round(3 * factor));
    return Math.abs(deviation) <= limit
      ? { verdict: 'pass', deviation }
      : { verdict: 'inconsistent', deviation, expected: `±${limit}`, note: 'No pattern for this glyph' };
  }

  if (pattern.unreliable) {
    return { verdict: 'unreliable', deviation, note: pattern.note ?? 'Measurement unreliable' };
  }

  if (pattern.range) {
    let lo = Math.round(pattern.range[0] * factor);
    const hi = Math.round(pattern.range[1] * factor);
    // heavy weights may reverse the compensation
    if (factor > 1.2 && pattern.range[0] >= 0) {
      lo = -Math.max(1, Math.floor(Math.abs(hi) / 2));
    }
    return lo <= deviation && deviation <= hi
      ? { verdict: 'compensation', deviation, expected: `${lo}..${hi}`, note: pattern.note ?? 'Expected optical compensation' }
      : { verdict: 'inconsistent', deviation, expected: `${lo}..${hi}`, note: pattern.note };
  }

  if (pattern.maxDev !== undefined) {
    const limit = Math.max(pattern.maxDev, Math.round(pattern.maxDev * factor));
    return Math.abs(deviation) <= limit ? { verdict: 'pass', deviation } : { verdict: 'inconsistent', deviation, expected: `±${limit}` };
  }

  return { verdict: 'pass', deviation };
}

function analyzeStems(context: AuditContext): Finding[] {
  const { font, glyphNames, masterIds } = context;
  const findings: Finding[] = [];

  for (const master of font.masters.filter((m) => masterIds.includes(m.id))) {
    const references = new Map<GlyphCase, number | null>();
    const referenceFor = (glyphCase: GlyphCase): number | null => {
      if (!references.has(glyphCase)) {
        const reference = font.glyphs.get(referenceGlyphName(glyphCase));
        references.set(glyphCase, reference ? (measureGlyphStems(font, reference, master)?.vertical.dominant ?? null) : null);
      }
      return references.get(glyphCase) ?? null;
    };

    for (const name of glyphNames) {
      const glyph = font.glyphs.get(name);
      const glyphCase = glyph ? classifyGlyph(glyph) : null;
      if (!glyph || !glyphCase || name === referenceGlyphName(glyphCase)) {
        continue;
      }
      findings.push(
        ...guardEntity('stems', { subject: name, kind: 'glyph' }, [master.id], () => {
          const reference = referenceFor(glyphCase);
          const measured = measureGlyphStems(font, glyph, master)?.vertical.dominant ?? null;
          if (reference === null || measured === null) {
            return [];
          }
          const evaluation = evaluateStem(name, measured, reference);
          if (evaluation.verdict === 'pass') {
            return [];
          }
          return [
            {
              check: 'stems',
              subject: name,
              subjectKind: 'glyph',
              masters: [master.id],
              defect: `stem-${evaluation.verdict}`,
              description: evaluation.note ?? `Stem deviates from ${referenceGlyphName(glyphCase)}`,
              measured: `${measured} (${evaluation.deviation >= 0 ? '+' : ''}${evaluation.deviation} vs ${reference})`,
              threshold: evaluation.expected,
              severity: VERDICT_SEVERITY[evaluation.verdict],
            },
          ];
        })
      );
    }
  }
  return findings;
}

export const stemAnalyzer: Analyzer = {
  id: 'stems',
  title: 'Stem consistency',
  subjects: glyphSubjects,
  run: analyzeStems,
};
