import type { Font, KerningKey, KerningPair, KerningSide, Master } from '../types/font';
import { keyToString, pairKey } from '../types/font';
import { Severity, type Finding } from '../types/findings';
import { isLetter } from '../utils/unicode-utils';
import type { AuditConfig } from './config';
import { guardEntity, round, type Analyzer, type AuditContext, type Subject } from './analyzer';

function groupOf(font: Font, glyphName: string, side: KerningSide): string | null {
  const groups = font.groups
    .filter((group) => group.side === side && group.members.includes(glyphName))
    .map((group) => group.name)
    .sort();
  return groups[0] ?? null;
}

function keyExists(font: Font, key: KerningKey, side: KerningSide): boolean {
  if (key.kind === 'glyph') {
    return font.glyphs.has(key.name);
  }
  return font.groups.some((group) => group.name === key.name && group.side === side);
}

/**
 * The pair a glyph-level exception overrides: glyph+group, group+glyph,
 * then group+group, the first one defined in the master.
 */
export function fallbackPair(font: Font, master: Master, pair: KerningPair): KerningPair | null {
  const leftGroup = pair.left.kind === 'glyph' ? groupOf(font, pair.left.name, 'left') : null;
  const rightGroup = pair.right.kind === 'glyph' ? groupOf(font, pair.right.name, 'right') : null;

  const candidates: Array<[KerningKey, KerningKey]> = [];
  if (rightGroup) {
    candidates.push([pair.left, { kind: 'group', name: rightGroup }]);
  }
  if (leftGroup) {
    candidates.push([{ kind: 'group', name: leftGroup }, pair.right]);
  }
  if (leftGroup && rightGroup) {
    candidates.push([
      { kind: 'group', name: leftGroup },
      { kind: 'group', name: rightGroup },
    ]);
  }

  for (const [left, right] of candidates) {
    const found = master.kerning.get(pairKey(left, right));
    if (found) {
      return found;
    }
  }
  return null;
}

function scopedMasters(font: Font, masterIds: readonly string[]): Master[] {
  return font.masters.filter((master) => masterIds.includes(master.id));
}

export function kerningKeys(font: Font, masterIds: readonly string[]): string[] {
  const keys = new Set<string>();
  for (const master of scopedMasters(font, masterIds)) {
    for (const key of master.kerning.keys()) {
      keys.add(key);
    }
  }
  return [...keys].sort();
}

/** Cross-master checks for one pair key. */
export function checkKerningPair(font: Font, key: string, masters: readonly Master[], config: AuditConfig): Finding[] {
  const present = masters.filter((master) => master.kerning.has(key));
  const absent = masters.filter((master) => !master.kerning.has(key));
  const first = present.map((master) => master.kerning.get(key)).find((pair): pair is KerningPair => pair !== undefined);
  if (!first) {
    return [];
  }

  const base = { check: 'kerning' as const, subject: key, subjectKind: 'pair' as const };
  const missingSides = [
    keyExists(font, first.left, 'left') ? null : keyToString(first.left),
    keyExists(font, first.right, 'right') ? null : keyToString(first.right),
  ].filter((side): side is string => side !== null);
  if (missingSides.length > 0) {
    return [
      {
        ...base,
        masters: present.map((master) => master.id),
        defect: 'dangling-reference',
        description: `Pair references unknown glyph or group ${missingSides.join(', ')}`,
        severity: Severity.Unreliable,
      },
    ];
  }

  const findings: Finding[] = [];
  if (absent.length > 0) {
    findings.push({
      ...base,
      masters: absent.map((master) => master.id),
      defect: 'missing-pair',
      description: 'Pair missing; interpolates toward zero',
      measured: `only in ${present.map((master) => master.id).join(', ')}`,
      threshold: 'all masters',
      severity: Severity.Fatal,
    });
  }

  const values = present.map((master) => master.kerning.get(key)?.value ?? 0);
  if (values.some((value) => value < 0) && values.some((value) => value > 0)) {
    findings.push({
      ...base,
      masters: present.map((master) => master.id),
      defect: 'sign-change',
      description: 'Kerning value changes sign between masters',
      measured: values.join(' / '),
      threshold: 'same sign',
      severity: Severity.Fatal,
    });
  }

  const limit = config.kerningOutlierRatio * font.unitsPerEm;
  const isException = first.left.kind === 'glyph' || first.right.kind === 'glyph';
  present.forEach((master, index) => {
    const value = values[index];
    if (Math.abs(value) > limit) {
      findings.push({
        ...base,
        masters: [master.id],
        defect: 'outlier',
        description: 'Kerning value is unusually large',
        measured: value,
        threshold: `±${round(limit)}`,
        severity: Severity.Warning,
      });
    }

    if (isException) {
      const fallback = fallbackPair(font, master, first);
      if (fallback && Math.abs(fallback.value - value) <= config.kerningEpsilon) {
        findings.push({
          ...base,
          masters: [master.id],
          defect: 'redundant-exception',
          description: `Exception repeats ${pairKey(fallback.left, fallback.right)} and can be removed`,
          measured: value,
          threshold: `differs from ${fallback.value}`,
          severity: Severity.Warning,
        });
      }
    }
  });

  return findings;
}

/** Letters outside any left or right kerning group. */
export function findGroupOrphans(font: Font, glyphNames: readonly string[], masterIds: string[]): Finding[] {
  const findings: Finding[] = [];
  for (const name of glyphNames) {
    const glyph = font.glyphs.get(name);
    if (!glyph || !isLetter(glyph)) {
      continue;
    }
    const missing = (['left', 'right'] as const).filter((side) => groupOf(font, name, side) === null);
    if (missing.length > 0) {
      findings.push({
        check: 'kerning',
        subject: name,
        subjectKind: 'glyph',
        masters: masterIds,
        defect: 'group-orphan',
        description: `Letter has no ${missing.join(' or ')} kerning group`,
        measured: missing.join(', '),
        threshold: 'left and right group',
        severity: Severity.Warning,
      });
    }
  }
  return findings;
}

export const kerningAnalyzer: Analyzer = {
  id: 'kerning',
  title: 'Kerning consistency',
  subjects({ font, masterIds }: AuditContext): Subject[] {
    return kerningKeys(font, masterIds).map((key) => ({ subject: key, kind: 'pair' }));
  },
  run({ font, glyphNames, masterIds, config }) {
    const masters = scopedMasters(font, masterIds);
    const pairFindings = kerningKeys(font, masterIds).flatMap((key) =>
      guardEntity('kerning', { subject: key, kind: 'pair' }, masterIds, () => checkKerningPair(font, key, masters, config))
    );
    return [...pairFindings, ...findGroupOrphans(font, glyphNames, masterIds)];
  },
};
