import { SEVERITY_NAMES, Severity, type CheckId, type Finding } from '../types/findings';

export interface ReportSection {
  id: CheckId;
  title: string;
}

const COLUMNS = ['Subject', 'Masters', 'Defect', 'Description', 'Measured', 'Threshold', 'Severity'];

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareFindings(a: Finding, b: Finding): number {
  return (
    compareText(a.subject, b.subject) ||
    compareText(a.masters.join(','), b.masters.join(',')) ||
    compareText(a.defect, b.defect) ||
    compareText(a.description, b.description) ||
    a.severity - b.severity
  );
}

function cell(value: string | number | undefined): string {
  return value === undefined ? '' : String(value).replace(/\|/g, '\\|');
}

function row(values: readonly string[]): string {
  return `| ${values.join(' | ')} |`;
}

function summary(findings: readonly Finding[]): string {
  const counts = [Severity.Fatal, Severity.Unreliable, Severity.Warning]
    .map((severity) => ({ severity, count: findings.filter((finding) => finding.severity === severity).length }))
    .filter(({ count }) => count > 0)
    .map(({ severity, count }) => `${count} ${SEVERITY_NAMES[severity]}`);
  return `${findings.length} issue(s): ${counts.join(', ')}`;
}

function renderSection(section: ReportSection, findings: readonly Finding[]): string {
  const lines = [`## ${section.title}`, ''];
  if (findings.length === 0) {
    lines.push('No issues found.');
    return lines.join('\n');
  }
  lines.push(row(COLUMNS), row(COLUMNS.map(() => '---')));
  for (const finding of [...findings].sort(compareFindings)) {
    lines.push(
      row([
        cell(finding.subject),
        cell(finding.masters.join(', ')),
        cell(finding.defect),
        cell(finding.description),
        cell(finding.measured),
        cell(finding.threshold),
        SEVERITY_NAMES[finding.severity],
      ])
    );
  }
  lines.push('', summary(findings));
  return lines.join('\n');
}

/**
 * Markdown tables, one per section in the given order. Passing findings are
 * left out; the same findings always render to the same text.
 */
export function renderReport(findings: readonly Finding[], sections: readonly ReportSection[]): string {
  return sections
    .map((section) =>
      renderSection(
        section,
        findings.filter((finding) => finding.check === section.id && finding.severity !== Severity.Pass)
      )
    )
    .join('\n\n');
}
