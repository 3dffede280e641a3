import type { Font, Glyph, Master, Path } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { decomposeLayer, isOnCurve, unionBounds, type Bounds } from '../utils/geometry';
import { baseGlyphName, classifyGlyph } from '../utils/unicode-utils';
import { glyphSubjects, guardEntity, mastersInScope, round, type Analyzer, type AuditContext } from './analyzer';
import { OVERSHOOT_TABLE } from './patterns';

/** Below this many units an edge counts as sitting on its zone line. */
const MIN_OVERSHOOT = 0.5;

export interface Overshoot {
  zoneTop: number;
  top: number;
  bottom: number;
  /** Percentages of the zone height */
  topPct: number;
  bottomPct: number;
}

function inkBounds(font: Font, glyph: Glyph, master: Master): { paths: Path[]; bounds: Bounds; width: number } | null {
  const layer = glyph.layers.get(master.id);
  if (!layer) {
    return null;
  }
  const paths = decomposeLayer(font, layer, master.id);
  const bounds = unionBounds(paths);
  if (!bounds || bounds.xMax === bounds.xMin) {
    return null;
  }
  return { paths, bounds, width: layer.width };
}

/**
 * Top of the figure zone: the lowest top among the flat-topped reference
 * figures, since a flag or apex may rise above the zone in any one of them.
 */
export function figureZoneTop(font: Font, master: Master): number {
  const tops = OVERSHOOT_TABLE.figureReferences
    .map((name) => font.glyphs.get(name))
    .map((glyph) => (glyph ? inkBounds(font, glyph, master) : null))
    .filter((ink): ink is NonNullable<typeof ink> => ink !== null && ink.bounds.yMax > ink.bounds.yMin)
    .map((ink) => ink.bounds.yMax);
  return tops.length > 0 ? Math.min(...tops) : master.metrics.capHeight;
}

export function measureOvershoot(bounds: Bounds, zoneTop: number): Overshoot {
  const top = bounds.yMax - zoneTop;
  const bottom = -bounds.yMin;
  return {
    zoneTop,
    top,
    bottom,
    topPct: zoneTop > 0 ? (top / zoneTop) * 100 : 0,
    bottomPct: zoneTop > 0 ? (bottom / zoneTop) * 100 : 0,
  };
}

/**
 * A vertex is pointed when the on-curve nodes near the top (or bottom) of the
 * outline span less than `thresholdRatio` of the advance width. A flat or
 * truncated vertex needs no overshoot.
 */
export function isPointedVertex(paths: readonly Path[], bounds: Bounds, width: number, atTop: boolean, thresholdRatio = 0.05): boolean {
  if (width <= 0) {
    return false;
  }
  const target = atTop ? bounds.yMax : bounds.yMin;
  const tolerance = Math.max(20, (bounds.yMax - bounds.yMin) * 0.03);
  const xs = paths.flatMap((path) => path.nodes.filter((node) => isOnCurve(node) && Math.abs(node.y - target) < tolerance).map((node) => node.x));
  if (xs.length === 0) {
    return false;
  }
  return Math.max(...xs) - Math.min(...xs) < width * thresholdRatio;
}

/** Problems with one glyph's overshoot; empty when it passes. */
export function overshootIssues(name: string, paths: readonly Path[], bounds: Bounds, width: number, overshoot: Overshoot, maxPct: number): string[] {
  const base = baseGlyphName(name);
  const shape = OVERSHOOT_TABLE.shapes[base];
  const issues: string[] = [];

  if (shape === 'round' || shape === 'round-bottom') {
    if (overshoot.bottom < MIN_OVERSHOOT) {
      issues.push('no bottom overshoot');
    } else if (overshoot.bottomPct > maxPct) {
      issues.push(`excessive bottom overshoot (${overshoot.bottomPct.toFixed(1)}%)`);
    }
    if (shape === 'round') {
      if (overshoot.top < MIN_OVERSHOOT) {
        issues.push('no top overshoot');
      } else if (overshoot.topPct > maxPct) {
        issues.push(`excessive top overshoot (${overshoot.topPct.toFixed(1)}%)`);
      }
    }
  } else if (shape === 'pointed') {
    if (OVERSHOOT_TABLE.apexTop.includes(base) && overshoot.top < MIN_OVERSHOOT && isPointedVertex(paths, bounds, width, true)) {
      issues.push('pointed apex has no top overshoot');
    }
    if (OVERSHOOT_TABLE.vertexBottom.includes(base) && overshoot.bottom < MIN_OVERSHOOT && isPointedVertex(paths, bounds, width, false)) {
      issues.push('pointed vertex has no bottom overshoot');
    }
  }
  return issues;
}

function analyzeOvershoots(context: AuditContext): Finding[] {
  const { font, glyphNames } = context;
  const findings: Finding[] = [];

  for (const master of mastersInScope(context)) {
    const figureTop = figureZoneTop(font, master);

    for (const name of glyphNames) {
      const glyph = font.glyphs.get(name);
      if (!glyph || OVERSHOOT_TABLE.shapes[baseGlyphName(name)] === undefined) {
        continue;
      }
      findings.push(
        ...guardEntity('overshoot', { subject: name, kind: 'glyph' }, [master.id], () => {
          const ink = inkBounds(font, glyph, master);
          if (!ink) {
            return [];
          }
          const glyphCase = classifyGlyph(glyph);
          const zoneTop = glyphCase === 'figure' ? figureTop : glyphCase === 'lowercase' ? master.metrics.xHeight : master.metrics.capHeight;
          // the x-height is shorter, so the same overshoot reads as a larger share
          const maxPct = glyphCase === 'lowercase' ? 4 : 3;
          const overshoot = measureOvershoot(ink.bounds, zoneTop);
          const issues = overshootIssues(name, ink.paths, ink.bounds, ink.width, overshoot, maxPct);
          if (issues.length === 0) {
            return [];
          }
          return [
            {
              check: 'overshoot',
              subject: name,
              subjectKind: 'glyph',
              masters: [master.id],
              defect: 'overshoot',
              description: issues.join('; '),
              measured: `top ${round(overshoot.top)} / bottom ${round(overshoot.bottom)}`,
              threshold: `${MIN_OVERSHOOT}..${maxPct}% of ${round(zoneTop)}`,
              severity: Severity.Fatal,
            },
          ];
        })
      );
    }
  }
  return findings;
}

export const overshootAnalyzer: Analyzer = {
  id: 'overshoot',
  title: 'Overshoots',
  subjects: glyphSubjects,
  run: analyzeOvershoots,
};
