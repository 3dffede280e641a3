import type { Font, Glyph, Master } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { decomposeLayer } from '../utils/geometry';
import { classifyGlyph, glyphZone, referenceGlyphName, type GlyphCase } from '../utils/unicode-utils';
import type { AuditConfig } from './config';
import { glyphSubjects, guardEntity, round, type Analyzer, type AuditContext } from './analyzer';
import { measureAtHeight, median } from './ray-cast';

export interface Sidebearings {
  left: number;
  right: number;
  /** Stem thicknesses crossed in the sampled band */
  stems: number[];
}

/**
 * Left/right sidebearings read at the band heights of the glyph's zone;
 * each side takes the smallest gap found. Null when the band holds no ink.
 */
export function measureSidebearings(font: Font, glyph: Glyph, master: Master, config: AuditConfig): Sidebearings | null {
  const layer = glyph.layers.get(master.id);
  if (!layer) {
    return null;
  }
  const paths = decomposeLayer(font, layer, master.id);
  const zone = glyphZone(classifyGlyph(glyph), master);

  let left = Infinity;
  let right = Infinity;
  const stems: number[] = [];
  for (const fraction of config.sidebearingBand) {
    const { spans } = measureAtHeight(paths, zone.bottom + fraction * zone.height, layer.width);
    if (spans.length === 0) {
      continue;
    }
    left = Math.min(left, spans[0].entry);
    right = Math.min(right, layer.width - spans[spans.length - 1].exit);
    stems.push(...spans.map((span) => span.thickness));
  }

  return Number.isFinite(left) && Number.isFinite(right) ? { left, right, stems } : null;
}

/** Median stem of the straight reference glyph at mid-zone, or null when it cannot be read. */
export function referenceStem(font: Font, master: Master, glyphCase: GlyphCase | null): number | null {
  const reference = font.glyphs.get(referenceGlyphName(glyphCase));
  const layer = reference?.layers.get(master.id);
  if (!reference || !layer) {
    return null;
  }
  const zone = glyphZone(glyphCase, master);
  const { spans } = measureAtHeight(decomposeLayer(font, layer, master.id), zone.bottom + zone.height / 2, layer.width);
  return median(spans.map((span) => span.thickness));
}

export function spacingTolerance(stem: number | null, config: AuditConfig): number {
  return stem === null ? config.minSpacingTolerance : Math.max(config.minSpacingTolerance, config.stemToleranceRatio * stem);
}

/** Within tolerance passes, up to twice the tolerance is minor, beyond that significant. */
export function deviationSeverity(deviation: number, tolerance: number): Severity {
  if (deviation <= tolerance) {
    return Severity.Pass;
  }
  return deviation <= 2 * tolerance ? Severity.Warning : Severity.Fatal;
}

interface MasterMeasurements {
  master: Master;
  sidebearings: Map<string, Sidebearings>;
  stems: Map<GlyphCase | 'other', number | null>;
}

function measureMaster(context: AuditContext, master: Master, names: readonly string[], findings: Finding[]): MasterMeasurements {
  const { font, config } = context;
  const sidebearings = new Map<string, Sidebearings>();
  for (const name of names) {
    const glyph = font.glyphs.get(name);
    if (!glyph) {
      continue;
    }
    const layerFindings = guardEntity('spacing', { subject: name, kind: 'glyph' }, [master.id], () => {
      const measured = measureSidebearings(font, glyph, master, config);
      if (measured) {
        sidebearings.set(name, measured);
        return [];
      }
      const layer = glyph.layers.get(master.id);
      if (!layer || (layer.paths.length === 0 && layer.components.length === 0)) {
        // missing or empty layers are reported by the compatibility check
        return [];
      }
      return [
        {
          check: 'spacing',
          subject: name,
          subjectKind: 'glyph',
          masters: [master.id],
          defect: 'no-ink-in-band',
          description: 'No ink at the sampled heights; sidebearings unknown',
          severity: Severity.Unreliable,
        },
      ];
    });
    findings.push(...layerFindings);
  }
  return { master, sidebearings, stems: new Map() };
}

function toleranceFor(context: AuditContext, measurements: MasterMeasurements, glyph: Glyph): number {
  const glyphCase = classifyGlyph(glyph);
  const key = glyphCase ?? 'other';
  if (!measurements.stems.has(key)) {
    measurements.stems.set(key, referenceStem(context.font, measurements.master, glyphCase));
  }
  const stem = measurements.stems.get(key) ?? median(measurements.sidebearings.get(glyph.name)?.stems ?? []);
  return spacingTolerance(stem, context.config);
}

function checkGroups(context: AuditContext, measurements: MasterMeasurements): Finding[] {
  const findings: Finding[] = [];
  const { master, sidebearings } = measurements;
  for (const group of context.config.spacingGroups) {
    const members = group.members.filter((name) => sidebearings.has(name));
    if (members.length < 2) {
      continue;
    }
    const values = members.map((name) => sidebearings.get(name)?.[group.side] ?? 0);
    const groupMedian = median(values) ?? 0;
    members.forEach((name, index) => {
      const glyph = context.font.glyphs.get(name);
      if (!glyph) {
        return;
      }
      const tolerance = toleranceFor(context, measurements, glyph);
      const deviation = Math.abs(values[index] - groupMedian);
      const severity = deviationSeverity(deviation, tolerance);
      if (severity === Severity.Pass) {
        return;
      }
      findings.push({
        check: 'spacing',
        subject: name,
        subjectKind: 'glyph',
        masters: [master.id],
        defect: `${group.side}-group`,
        description: `${group.side === 'left' ? 'Left' : 'Right'} sidebearing off the ${group.name} group`,
        measured: `${round(values[index])} (median ${round(groupMedian)})`,
        threshold: `±${round(tolerance)}`,
        severity,
      });
    });
  }
  return findings;
}

function checkSymmetry(context: AuditContext, measurements: MasterMeasurements): Finding[] {
  const findings: Finding[] = [];
  for (const name of context.config.symmetricGlyphs) {
    const measured = measurements.sidebearings.get(name);
    const glyph = context.font.glyphs.get(name);
    if (!measured || !glyph) {
      continue;
    }
    const tolerance = toleranceFor(context, measurements, glyph);
    const severity = deviationSeverity(Math.abs(measured.left - measured.right), tolerance);
    if (severity === Severity.Pass) {
      continue;
    }
    findings.push({
      check: 'spacing',
      subject: name,
      subjectKind: 'glyph',
      masters: [measurements.master.id],
      defect: 'asymmetric',
      description: 'Symmetric glyph has unequal sidebearings',
      measured: `${round(measured.left)} / ${round(measured.right)}`,
      threshold: `±${round(tolerance)}`,
      severity,
    });
  }
  return findings;
}

function ratioLabel(straight: string, roundName: string): string {
  return `${straight}/${roundName}`;
}

function checkRatios(context: AuditContext, all: readonly MasterMeasurements[]): Finding[] {
  const findings: Finding[] = [];
  const [low, high] = context.config.referenceRatioBand;

  for (const { straight, round: roundName } of context.config.ratioPairs) {
    const ratios: Array<{ master: string; ratio: number }> = [];
    for (const { master, sidebearings } of all) {
      const straightSb = sidebearings.get(straight);
      const roundSb = sidebearings.get(roundName);
      if (!straightSb || !roundSb) {
        continue;
      }
      if (roundSb.left <= 0) {
        findings.push({
          check: 'spacing',
          subject: straight,
          subjectKind: 'glyph',
          masters: [master.id],
          defect: 'reference-ratio',
          description: `${ratioLabel(straight, roundName)} ratio undefined: ${roundName} has no positive left sidebearing`,
          measured: round(roundSb.left),
          threshold: '> 0',
          severity: Severity.Unreliable,
        });
        continue;
      }
      const ratio = straightSb.left / roundSb.left;
      ratios.push({ master: master.id, ratio });
      if (ratio < low || ratio > high) {
        findings.push({
          check: 'spacing',
          subject: straight,
          subjectKind: 'glyph',
          masters: [master.id],
          defect: 'reference-ratio',
          description: `${ratioLabel(straight, roundName)} sidebearing ratio out of range`,
          measured: round(ratio, 2),
          threshold: `${low}–${high}`,
          severity: Severity.Warning,
        });
      }
    }

    if (ratios.length < 2) {
      continue;
    }
    for (const { master, ratio } of ratios) {
      const others = median(ratios.filter((entry) => entry.master !== master).map((entry) => entry.ratio));
      if (others === null || others === 0) {
        continue;
      }
      const drift = Math.abs(ratio - others) / others;
      if (drift > context.config.ratioDriftTolerance) {
        findings.push({
          check: 'spacing',
          subject: straight,
          subjectKind: 'glyph',
          masters: [master],
          defect: 'ratio-drift',
          description: `${ratioLabel(straight, roundName)} ratio drifts from the other masters`,
          measured: `${round(ratio, 2)} vs ${round(others, 2)}`,
          threshold: `±${round(context.config.ratioDriftTolerance * 100)}%`,
          severity: Severity.Warning,
        });
      }
    }
  }
  return findings;
}

/** Glyphs any spacing rule looks at, limited to the requested scope. */
function spacingGlyphs(context: AuditContext): string[] {
  const wanted = new Set<string>([
    ...context.config.spacingGroups.flatMap((group) => group.members),
    ...context.config.symmetricGlyphs,
    ...context.config.ratioPairs.flatMap((pair) => [pair.straight, pair.round]),
  ]);
  return context.glyphNames.filter((name) => wanted.has(name));
}

export function analyzeSpacing(context: AuditContext): Finding[] {
  const names = spacingGlyphs(context);
  const findings: Finding[] = [];
  const all = context.font.masters
    .filter((master) => context.masterIds.includes(master.id))
    .map((master) => measureMaster(context, master, names, findings));

  for (const measurements of all) {
    findings.push(...checkGroups(context, measurements), ...checkSymmetry(context, measurements));
  }
  findings.push(...checkRatios(context, all));
  return findings;
}

export const spacingAnalyzer: Analyzer = {
  id: 'spacing',
  title: 'Spacing',
  subjects: glyphSubjects,
  run: analyzeSpacing,
};
