import type { Font } from '../types/font';
import type { CheckId, Finding, SeverityLabel } from '../types/findings';
import { UsageError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { resolveScope, type Analyzer, type AuditContext, type ScopeRequest } from './analyzer';
import { DEFAULT_CONFIG, type AuditConfig } from './config';
import { compatibilityAnalyzer } from './compatibility';
import { kerningAnalyzer } from './kerning';
import { spacingAnalyzer } from './spacing';
import { stemAnalyzer } from './stems';
import { colorAnalyzer } from './color';
import { overshootAnalyzer } from './overshoot';
import { proportionsAnalyzer } from './proportions';
import { diagonalsAnalyzer } from './diagonals';
import { junctionsAnalyzer } from './junctions';
import { punctuationAnalyzer, relatedFormsAnalyzer } from './width-pairs';
import { severityLabels } from './severity';
import { renderReport } from './report';

const logger = createLogger('audit');

/** Run order, which is also the order of the report sections. */
export const ANALYZERS: readonly Analyzer[] = [
  compatibilityAnalyzer,
  kerningAnalyzer,
  spacingAnalyzer,
  stemAnalyzer,
  colorAnalyzer,
  overshootAnalyzer,
  proportionsAnalyzer,
  diagonalsAnalyzer,
  junctionsAnalyzer,
  relatedFormsAnalyzer,
  punctuationAnalyzer,
];

export interface AuditOptions extends ScopeRequest {
  checks?: readonly CheckId[];
  config?: AuditConfig;
}

export interface AuditResult {
  findings: Finding[];
  labels: SeverityLabel[];
  report: string;
}

function selectAnalyzers(checks: readonly CheckId[] | undefined): Analyzer[] {
  if (checks === undefined) {
    return [...ANALYZERS];
  }
  if (checks.length === 0) {
    throw new UsageError('Check selection is empty');
  }
  return ANALYZERS.filter((analyzer) => checks.includes(analyzer.id));
}

export function runAudit(font: Font, options: AuditOptions = {}): AuditResult {
  const scope = resolveScope(font, options);
  const analyzers = selectAnalyzers(options.checks);
  const context: AuditContext = { ...scope, font, config: options.config ?? DEFAULT_CONFIG };

  const findings: Finding[] = [];
  const subjects = analyzers.flatMap((analyzer) => {
    const found = analyzer.run(context);
    logger.debug(`${analyzer.id}: ${found.length} finding(s)`);
    findings.push(...found);
    return analyzer.subjects(context);
  });

  return {
    findings,
    labels: severityLabels(subjects, findings),
    report: renderReport(findings, analyzers),
  };
}
