import type { Font, Master } from '../types/font';
import { Severity, type CheckId, type Finding, type SubjectKind } from '../types/findings';
import type { AuditConfig } from './config';
import { UsageError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('analyzer');

export interface AuditScope {
  glyphNames: string[];
  masterIds: string[];
}

export interface AuditContext extends AuditScope {
  font: Font;
  config: AuditConfig;
}

export interface Subject {
  subject: string;
  kind: SubjectKind;
}

/** One kind of check. Analyzers run in a fixed order and never throw for a single entity. */
export interface Analyzer {
  id: CheckId;
  title: string;
  subjects(context: AuditContext): Subject[];
  run(context: AuditContext): Finding[];
}

export interface ScopeRequest {
  glyphNames?: readonly string[];
  masterIds?: readonly string[];
}

/** Validates requested subsets; absent means everything, in font order. */
export function resolveScope(font: Font, request: ScopeRequest = {}): AuditScope {
  const knownMasters = font.masters.map((master) => master.id);
  let masterIds = knownMasters;
  if (request.masterIds !== undefined) {
    if (request.masterIds.length === 0) {
      throw new UsageError('Master subset is empty');
    }
    const unknown = request.masterIds.filter((id) => !knownMasters.includes(id));
    if (unknown.length > 0) {
      throw new UsageError(`Unknown master id(s): ${unknown.join(', ')}`);
    }
    masterIds = knownMasters.filter((id) => request.masterIds?.includes(id));
  }

  let glyphNames = [...font.glyphs.keys()];
  if (request.glyphNames !== undefined) {
    if (request.glyphNames.length === 0) {
      throw new UsageError('Glyph subset is empty');
    }
    const unknown = request.glyphNames.filter((name) => !font.glyphs.has(name));
    if (unknown.length > 0) {
      throw new UsageError(`Unknown glyph name(s): ${unknown.join(', ')}`);
    }
    glyphNames = glyphNames.filter((name) => request.glyphNames?.includes(name));
  }

  return { glyphNames, masterIds };
}

/**
 * Runs the checks for one glyph or pair. An unexpected failure is logged and
 * becomes an unreliable finding so the rest of the audit carries on.
 */
export function guardEntity(check: CheckId, subject: Subject, masters: string[], work: () => Finding[]): Finding[] {
  try {
    return work();
  } catch (error) {
    logger.error(`${check} failed for ${subject.subject}:`, error);
    return [
      {
        check,
        subject: subject.subject,
        subjectKind: subject.kind,
        masters,
        defect: 'analysis-error',
        description: `Analysis aborted: ${describeError(error)}`,
        severity: Severity.Unreliable,
      },
    ];
  }
}

export function glyphSubjects(context: AuditContext): Subject[] {
  return context.glyphNames.map((name) => ({ subject: name, kind: 'glyph' }));
}

export function mastersInScope({ font, masterIds }: AuditContext): Master[] {
  return font.masters.filter((master) => masterIds.includes(master.id));
}

/** Advance width of a glyph in one master, or null when the glyph or its layer is missing. */
export function advanceWidth(font: Font, glyphName: string, masterId: string): number | null {
  return font.glyphs.get(glyphName)?.layers.get(masterId)?.width ?? null;
}

export function round(value: number, digits = 1): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
