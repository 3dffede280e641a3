import type { Font, Glyph, Master } from '../types/font';
import type { Finding } from '../types/findings';
import { decomposeLayer } from '../utils/geometry';
import { baseGlyphName, classifyGlyph, glyphZone, referenceGlyphName, type GlyphCase } from '../utils/unicode-utils';
import { glyphSubjects, guardEntity, round, type Analyzer, type AuditContext } from './analyzer';
import { inkDensity } from './ray-cast';
import { COLOR_TABLE } from './patterns';
import { VERDICT_SEVERITY, type Verdict } from './stems';

const UNKNOWN_GLYPH_TOLERANCE = 12;

export interface ColorEvaluation {
  verdict: Verdict;
  ratioPct: number | null;
  expected?: string;
  note?: string;
}

export function glyphDensity(font: Font, glyph: Glyph, master: Master, resolution: number): number | null {
  const layer = glyph.layers.get(master.id);
  if (!layer || (layer.paths.length === 0 && layer.components.length === 0)) {
    return null;
  }
  const zone = glyphZone(classifyGlyph(glyph), master);
  return inkDensity(decomposeLayer(font, layer, master.id), zone.bottom, zone.height, layer.width, resolution);
}

/** Density as a percentage of the reference glyph's, against the colour table. */
export function evaluateColor(glyphName: string, density: number, referenceDensity: number): ColorEvaluation {
  if (referenceDensity <= 0) {
    return { verdict: 'unreliable', ratioPct: null, note: 'Reference density is zero' };
  }
  const ratioPct = (density / referenceDensity) * 100;
  const pattern = COLOR_TABLE.patterns[baseGlyphName(glyphName)];

  if (!pattern) {
    return Math.abs(ratioPct - 100) <= UNKNOWN_GLYPH_TOLERANCE
      ? { verdict: 'pass', ratioPct }
      : { verdict: 'inconsistent', ratioPct, expected: `100% ±${UNKNOWN_GLYPH_TOLERANCE}%`, note: 'No pattern for this glyph' };
  }
  if (pattern.unreliable || pattern.expected === undefined || pattern.maxDev === undefined) {
    return { verdict: 'unreliable', ratioPct, note: pattern.note ?? 'Measurement unreliable' };
  }

  const expected = `${pattern.expected}% ±${pattern.maxDev}%`;
  const deviation = Math.abs(ratioPct - pattern.expected);
  if (deviation <= pattern.maxDev) {
    return { verdict: 'pass', ratioPct };
  }
  return deviation <= pattern.maxDev * 1.5
    ? { verdict: 'compensation', ratioPct, expected, note: 'Density slightly off the expected ratio' }
    : { verdict: 'inconsistent', ratioPct, expected, note: 'Density far from the expected ratio' };
}

function analyzeColor(context: AuditContext): Finding[] {
  const { font, glyphNames, masterIds, config } = context;
  const findings: Finding[] = [];

  for (const master of font.masters.filter((m) => masterIds.includes(m.id))) {
    const references = new Map<GlyphCase, number | null>();
    const referenceFor = (glyphCase: GlyphCase): number | null => {
      if (!references.has(glyphCase)) {
        const reference = font.glyphs.get(referenceGlyphName(glyphCase));
        references.set(glyphCase, reference ? glyphDensity(font, reference, master, config.densityResolution) : null);
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
        ...guardEntity('color', { subject: name, kind: 'glyph' }, [master.id], () => {
          const reference = referenceFor(glyphCase);
          const density = glyphDensity(font, glyph, master, config.densityResolution);
          if (reference === null || density === null) {
            return [];
          }
          const evaluation = evaluateColor(name, density, reference);
          if (evaluation.verdict === 'pass') {
            return [];
          }
          return [
            {
              check: 'color',
              subject: name,
              subjectKind: 'glyph',
              masters: [master.id],
              defect: `color-${evaluation.verdict}`,
              description: evaluation.note ?? 'Ink density off the reference',
              measured: evaluation.ratioPct === null ? round(density, 4) : `${round(evaluation.ratioPct)}% of ${referenceGlyphName(glyphCase)}`,
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

export const colorAnalyzer: Analyzer = {
  id: 'color',
  title: 'Colour (ink density)',
  subjects: glyphSubjects,
  run: analyzeColor,
};
