import { Severity, worstSeverity, type Finding, type SeverityLabel, type SubjectKind } from '../types/findings';
import type { Subject } from './analyzer';

function labelKey(subject: string, kind: SubjectKind): string {
  return `${kind}:${subject}`;
}

/**
 * One label per analysed glyph or pair: the worst severity among its findings,
 * pass when it has none. Subjects that only appear in findings are labelled too.
 */
export function severityLabels(subjects: readonly Subject[], findings: readonly Finding[]): SeverityLabel[] {
  const labels = new Map<string, SeverityLabel>();
  for (const { subject, kind } of subjects) {
    labels.set(labelKey(subject, kind), { subject, kind, severity: Severity.Pass });
  }
  for (const finding of findings) {
    const key = labelKey(finding.subject, finding.subjectKind);
    const current = labels.get(key);
    labels.set(key, {
      subject: finding.subject,
      kind: finding.subjectKind,
      severity: current ? worstSeverity(current.severity, finding.severity) : finding.severity,
    });
  }
  return [...labels.values()].sort((a, b) => {
    if (a.kind !== b.kind) {
      return a.kind < b.kind ? -1 : 1;
    }
    return a.subject < b.subject ? -1 : a.subject > b.subject ? 1 : 0;
  });
}
