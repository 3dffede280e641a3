/**
 * Label codes the host applies to a glyph or pair. The gap at 2 mirrors the
 * host's colour palette, where index 2 is not used by the audit.
 */
export const Severity = {
  Fatal: 0,
  Unreliable: 1,
  Warning: 3,
  Pass: 4,
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

export const SEVERITY_NAMES: Record<Severity, string> = {
  0: 'fatal',
  1: 'unreliable',
  3: 'warning',
  4: 'pass',
};

/** Every check, in run order. */
export const CHECK_IDS = [
  'compatibility',
  'kerning',
  'spacing',
  'stems',
  'color',
  'overshoot',
  'proportions',
  'diagonals',
  'junctions',
  'related-forms',
  'punctuation',
] as const;

export type CheckId = (typeof CHECK_IDS)[number];

export type SubjectKind = 'glyph' | 'pair';

export interface Finding {
  check: CheckId;
  /** Glyph name, or "left|right" for a kerning pair */
  subject: string;
  subjectKind: SubjectKind;
  masters: string[];
  defect: string;
  description: string;
  measured?: string | number;
  threshold?: string | number;
  severity: Severity;
}

export type CompatibilityStatus = 'compatible' | 'partial' | 'incompatible';

export interface GlyphCompatibility {
  glyph: string;
  status: CompatibilityStatus;
  findings: Finding[];
}

export interface SeverityLabel {
  subject: string;
  kind: SubjectKind;
  severity: Severity;
}

/** Lower code wins: fatal beats everything */
export function worstSeverity(a: Severity, b: Severity): Severity {
  return a < b ? a : b;
}
