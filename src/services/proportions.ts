import type { Font, Master } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { classifyGlyph } from '../utils/unicode-utils';
import { advanceWidth, glyphSubjects, mastersInScope, round, type Analyzer, type AuditContext } from './analyzer';
import { PROPORTION_TABLE } from './patterns';

export interface Proportion {
  width: number;
  /** Width as a percentage of the reference, one decimal */
  ratio: number;
  reference: 'n' | 'H';
}

/** Advance widths relative to n (lowercase and unclassified) or H (uppercase and figures). */
export function measureProportions(font: Font, master: Master, glyphNames: readonly string[]): Map<string, Proportion> {
  const references = { n: advanceWidth(font, 'n', master.id) ?? 0, H: advanceWidth(font, 'H', master.id) ?? 0 };
  const proportions = new Map<string, Proportion>();
  for (const name of glyphNames) {
    const glyph = font.glyphs.get(name);
    const width = advanceWidth(font, name, master.id);
    if (!glyph || width === null) {
      continue;
    }
    const glyphCase = classifyGlyph(glyph);
    const reference = glyphCase === 'uppercase' || glyphCase === 'figure' ? 'H' : 'n';
    const referenceWidth = references[reference];
    if (referenceWidth <= 0) {
      continue;
    }
    proportions.set(name, { width, ratio: round((width / referenceWidth) * 100), reference });
  }
  return proportions;
}

function upperMedian(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

function groupFindings(proportions: ReadonlyMap<string, Proportion>, masterId: string): Finding[] {
  const findings: Finding[] = [];
  for (const group of PROPORTION_TABLE.groups) {
    const members = group.members.flatMap((name) => {
      const proportion = proportions.get(name);
      return proportion ? [{ name, ratio: proportion.ratio }] : [];
    });
    if (members.length < 2) {
      continue;
    }
    const ratios = members.map((member) => member.ratio);
    const spread = round(Math.max(...ratios) - Math.min(...ratios));
    if (spread <= group.tolerance) {
      continue;
    }
    const middle = upperMedian(ratios);
    for (const member of members.filter((m) => Math.abs(m.ratio - middle) > group.tolerance)) {
      findings.push({
        check: 'proportions',
        subject: member.name,
        subjectKind: 'glyph',
        masters: [masterId],
        defect: 'width-group',
        description: `${group.note}: width off the ${group.name} group`,
        measured: `${member.ratio}% (median ${middle}%)`,
        threshold: `±${group.tolerance}%`,
        severity: Severity.Fatal,
      });
    }
  }
  return findings;
}

function orderFindings(proportions: ReadonlyMap<string, Proportion>, masterId: string): Finding[] {
  const findings: Finding[] = [];
  for (const { wider, narrower } of PROPORTION_TABLE.order) {
    const a = proportions.get(wider);
    const b = proportions.get(narrower);
    if (!a || !b || a.width >= b.width) {
      continue;
    }
    for (const subject of [wider, narrower]) {
      findings.push({
        check: 'proportions',
        subject,
        subjectKind: 'glyph',
        masters: [masterId],
        defect: 'width-order',
        description: `${narrower} is wider than ${wider}`,
        measured: `${wider} ${round(a.width)} / ${narrower} ${round(b.width)}`,
        threshold: `${wider} ≥ ${narrower}`,
        severity: Severity.Fatal,
      });
    }
  }
  return findings;
}

function rangeFindings(proportions: ReadonlyMap<string, Proportion>, masterId: string): Finding[] {
  const findings: Finding[] = [];
  for (const [name, proportion] of proportions) {
    const range = PROPORTION_TABLE.ranges[name];
    if (!range || (proportion.ratio >= range[0] && proportion.ratio <= range[1])) {
      continue;
    }
    findings.push({
      check: 'proportions',
      subject: name,
      subjectKind: 'glyph',
      masters: [masterId],
      defect: 'width-range',
      description: `Width outside the usual range for ${name}`,
      measured: `${proportion.ratio}% of ${proportion.reference}`,
      threshold: `${range[0]}..${range[1]}%`,
      severity: Severity.Warning,
    });
  }
  return findings;
}

function analyzeProportions(context: AuditContext): Finding[] {
  const { font, glyphNames } = context;
  return mastersInScope(context).flatMap((master) => {
    const proportions = measureProportions(font, master, glyphNames);
    return [...groupFindings(proportions, master.id), ...orderFindings(proportions, master.id), ...rangeFindings(proportions, master.id)];
  });
}

export const proportionsAnalyzer: Analyzer = {
  id: 'proportions',
  title: 'Width proportions',
  subjects: glyphSubjects,
  run: analyzeProportions,
};
