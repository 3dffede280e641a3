import type { Font, Master } from '../types/font';
import { Severity, type CheckId, type Finding } from '../types/findings';
import { advanceWidth, glyphSubjects, mastersInScope, round, type Analyzer, type AuditContext } from './analyzer';
import { WIDTH_PAIR_TABLE, type WidthRatioRule } from './patterns';

interface PairRule {
  a: string;
  b: string;
  severity: 'fatal' | 'warning';
  note: string;
  /** Returns the threshold text when the ratio breaks the rule */
  violation(ratio: number): string | null;
}

/** Width of `a` as a percentage of `b`, or null when either layer is missing or `b` has no width. */
export function widthRatio(font: Font, a: string, b: string, master: Master): number | null {
  const widthA = advanceWidth(font, a, master.id);
  const widthB = advanceWidth(font, b, master.id);
  if (widthA === null || widthB === null || widthB === 0) {
    return null;
  }
  return round((widthA / widthB) * 100);
}

function rangeRule(rule: WidthRatioRule): PairRule {
  const [low, high] = rule.range;
  return {
    ...rule,
    violation: (ratio) => (ratio < low || ratio > high ? `${low}..${high}%` : null),
  };
}

function pairFindings(check: CheckId, defect: string, rules: readonly PairRule[], context: AuditContext): Finding[] {
  const { font, glyphNames } = context;
  const findings: Finding[] = [];
  for (const master of mastersInScope(context)) {
    for (const rule of rules) {
      if (!glyphNames.includes(rule.a) || !glyphNames.includes(rule.b)) {
        continue;
      }
      const ratio = widthRatio(font, rule.a, rule.b, master);
      const threshold = ratio === null ? null : rule.violation(ratio);
      if (threshold === null) {
        continue;
      }
      for (const subject of [rule.a, rule.b]) {
        findings.push({
          check,
          subject,
          subjectKind: 'glyph',
          masters: [master.id],
          defect,
          description: `${rule.note} (${rule.a} / ${rule.b})`,
          measured: `${ratio}%`,
          threshold,
          severity: rule.severity === 'fatal' ? Severity.Fatal : Severity.Warning,
        });
      }
    }
  }
  return findings;
}

const RELATED_FORM_RULES = WIDTH_PAIR_TABLE.relatedForms.map(rangeRule);

const PUNCTUATION_RULES: PairRule[] = [
  ...WIDTH_PAIR_TABLE.punctuationMatch.map((rule) => ({
    ...rule,
    violation: (ratio: number) => (Math.abs(ratio - 100) > rule.tolerance ? `100 ±${rule.tolerance}%` : null),
  })),
  ...WIDTH_PAIR_TABLE.punctuationRatio.map(rangeRule),
];

export const relatedFormsAnalyzer: Analyzer = {
  id: 'related-forms',
  title: 'Related forms',
  subjects: glyphSubjects,
  run: (context) => pairFindings('related-forms', 'related-width', RELATED_FORM_RULES, context),
};

export const punctuationAnalyzer: Analyzer = {
  id: 'punctuation',
  title: 'Punctuation widths',
  subjects: glyphSubjects,
  run: (context) => pairFindings('punctuation', 'punctuation-width', PUNCTUATION_RULES, context),
};
