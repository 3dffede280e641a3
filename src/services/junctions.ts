import type { Font, Master, Path } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { decomposeLayer } from '../utils/geometry';
import { glyphSubjects, guardEntity, mastersInScope, round, type Analyzer, type AuditContext } from './analyzer';
import { JUNCTION_TABLE } from './patterns';
import { measureAtHeight } from './ray-cast';

export interface JunctionThinning {
  /** Average stem thickness between 20% and 60% of the zone */
  midStem: number;
  /** Thinnest reading between 65% and 95% of the zone */
  junctionMin: number;
  junctionY: number;
  /** junctionMin as a percentage of midStem */
  thinning: number;
}

/**
 * Follows the stem nearest `xRatio` of the width with horizontal rays from
 * the baseline to `zoneTop` and compares the stem where it meets the arch or
 * bowl with the stem lower down.
 */
export function measureJunctionThinning(paths: readonly Path[], width: number, xRatio: number, zoneTop: number, steps = 30): JunctionThinning | null {
  const target = width * xRatio;
  const profile: Array<{ y: number; thickness: number }> = [];

  for (let i = 0; i <= steps; i++) {
    const y = (i * zoneTop) / steps;
    const spans = measureAtHeight(paths, y, width).spans.filter((span) => span.thickness >= 3 && span.entry >= -5 && span.exit <= width + 5);
    let best: number | null = null;
    let bestDistance = Infinity;
    for (const span of spans) {
      const distance = Math.abs((span.entry + span.exit) / 2 - target);
      if (distance < bestDistance) {
        bestDistance = distance;
        best = span.thickness;
      }
    }
    if (best !== null) {
      profile.push({ y: Math.round(y), thickness: round(best) });
    }
  }
  if (profile.length < 5) {
    return null;
  }

  const middle = profile.filter(({ y }) => y >= zoneTop * 0.2 && y <= zoneTop * 0.6);
  const upper = profile.filter(({ y }) => y >= zoneTop * 0.65 && y <= zoneTop * 0.95);
  if (middle.length === 0 || upper.length === 0) {
    return null;
  }
  const midStem = middle.reduce((sum, { thickness }) => sum + thickness, 0) / middle.length;
  if (midStem < 5) {
    return null;
  }
  const thinnest = upper.reduce((acc, reading) => (reading.thickness < acc.thickness ? reading : acc), upper[0]);

  return {
    midStem: round(midStem),
    junctionMin: thinnest.thickness,
    junctionY: thinnest.y,
    thinning: round((thinnest.thickness / midStem) * 100),
  };
}

function glyphThinning(font: Font, name: string, master: Master): JunctionThinning | null {
  const layer = font.glyphs.get(name)?.layers.get(master.id);
  const xRatio = JUNCTION_TABLE.glyphs[name];
  if (!layer || xRatio === undefined) {
    return null;
  }
  return measureJunctionThinning(decomposeLayer(font, layer, master.id), layer.width, xRatio, master.metrics.xHeight);
}

/**
 * Only group spreads are flagged: how much a junction thins is a design
 * choice, but related forms should thin alike.
 */
function analyzeJunctions(context: AuditContext): Finding[] {
  const { font, glyphNames } = context;
  const findings: Finding[] = [];

  for (const master of mastersInScope(context)) {
    const thinning = new Map<string, number>();
    for (const name of glyphNames.filter((n) => JUNCTION_TABLE.glyphs[n] !== undefined)) {
      findings.push(
        ...guardEntity('junctions', { subject: name, kind: 'glyph' }, [master.id], () => {
          const measured = glyphThinning(font, name, master);
          if (measured) {
            thinning.set(name, measured.thinning);
          }
          return [];
        })
      );
    }

    for (const group of JUNCTION_TABLE.groups) {
      const members = group.members.filter((name) => thinning.has(name));
      if (members.length < 2) {
        continue;
      }
      const values = members.map((name) => thinning.get(name) ?? 0);
      const spread = round(Math.max(...values) - Math.min(...values));
      if (spread <= group.tolerance) {
        continue;
      }
      for (const name of members) {
        findings.push({
          check: 'junctions',
          subject: name,
          subjectKind: 'glyph',
          masters: [master.id],
          defect: 'junction-thinning',
          description: `${group.note}; thinning differs across the ${group.name} group`,
          measured: `${thinning.get(name)}% (spread ${spread})`,
          threshold: `±${group.tolerance}`,
          severity: Severity.Fatal,
        });
      }
    }
  }
  return findings;
}

export const junctionsAnalyzer: Analyzer = {
  id: 'junctions',
  title: 'Junction thinning',
  subjects: glyphSubjects,
  run: analyzeJunctions,
};
