import type { Font, Glyph, Layer, Path } from '../types/font';
import { Severity, type CompatibilityStatus, type Finding, type GlyphCompatibility } from '../types/findings';
import {
  boundsCenter,
  distance,
  firstOnCurveIndex,
  nodeTypeSequence,
  pathBounds,
  pathDirection,
  pathSegments,
  type Bounds,
} from '../utils/geometry';
import type { AuditConfig } from './config';
import { glyphSubjects, guardEntity, round, type Analyzer } from './analyzer';

const STATUS_RANK: Record<CompatibilityStatus, number> = {
  compatible: 0,
  partial: 1,
  incompatible: 2,
};

/** Commutative and associative, so pair results can be merged in any order. */
export function worstStatus(a: CompatibilityStatus, b: CompatibilityStatus): CompatibilityStatus {
  return STATUS_RANK[a] >= STATUS_RANK[b] ? a : b;
}

export function compatibilityStatus(findings: readonly Finding[]): CompatibilityStatus {
  return findings.reduce<CompatibilityStatus>((status, finding) => {
    if (finding.severity === Severity.Fatal) {
      return worstStatus(status, 'incompatible');
    }
    if (finding.severity === Severity.Unreliable) {
      return worstStatus(status, 'partial');
    }
    return status;
  }, 'compatible');
}

interface PathShape {
  center: { x: number; y: number } | null;
  size: { w: number; h: number };
}

function shapeOf(path: Path, layer: Layer, unitsPerEm: number): PathShape {
  const bounds: Bounds | null = pathBounds(path);
  if (!bounds) {
    return { center: null, size: { w: 0, h: 0 } };
  }
  const scale = layer.width > 0 ? layer.width : unitsPerEm;
  const center = boundsCenter(bounds);
  return {
    center: { x: center.x / scale, y: center.y / unitsPerEm },
    size: { w: (bounds.xMax - bounds.xMin) / scale, h: (bounds.yMax - bounds.yMin) / unitsPerEm },
  };
}

/**
 * Pairs every path of `a` with a path of `b` by greedy minimum distance
 * between width-normalised bounding-box centres. Box size breaks near ties
 * between concentric contours such as a bowl and its counter.
 */
export function matchPaths(a: Layer, b: Layer, unitsPerEm: number): number[] {
  const shapesA = a.paths.map((path) => shapeOf(path, a, unitsPerEm));
  const shapesB = b.paths.map((path) => shapeOf(path, b, unitsPerEm));

  const candidates: Array<{ i: number; j: number; cost: number }> = [];
  shapesA.forEach((sa, i) => {
    shapesB.forEach((sb, j) => {
      if (!sa.center || !sb.center) {
        return;
      }
      const centerCost = Math.hypot(sa.center.x - sb.center.x, sa.center.y - sb.center.y);
      const sizeCost = Math.hypot(sa.size.w - sb.size.w, sa.size.h - sb.size.h);
      candidates.push({ i, j, cost: centerCost + 0.5 * sizeCost });
    });
  });
  candidates.sort((x, y) => x.cost - y.cost || x.i - y.i || x.j - y.j);

  const assignment: number[] = new Array<number>(shapesA.length).fill(-1);
  const taken = new Set<number>();
  for (const { i, j } of candidates) {
    if (assignment[i] === -1 && !taken.has(j)) {
      assignment[i] = j;
      taken.add(j);
    }
  }
  // paths without geometry fall back to drawing order
  const free = shapesB.map((_, j) => j).filter((j) => !taken.has(j));
  return assignment.map((j) => (j === -1 ? (free.shift() ?? -1) : j));
}

function isEmptyLayer(layer: Layer): boolean {
  return layer.paths.length === 0 && layer.components.length === 0;
}

function sameMultiset(a: readonly string[], b: readonly string[]): boolean {
  const sortedA = [...a].sort();
  const sortedB = [...b].sort();
  return sortedA.length === sortedB.length && sortedA.every((value, index) => value === sortedB[index]);
}

function layerDefects(glyph: string, masterId: string, layer: Layer): Finding[] {
  const findings: Finding[] = [];
  const base = { check: 'compatibility' as const, subject: glyph, subjectKind: 'glyph' as const, masters: [masterId], severity: Severity.Unreliable };
  layer.paths.forEach((path, index) => {
    if (path.nodes.length === 0) {
      findings.push({ ...base, defect: 'empty-path', description: `Path ${index} has no nodes` });
      return;
    }
    const { malformed, zeroLength } = pathSegments(path);
    if (malformed) {
      findings.push({ ...base, defect: 'malformed-path', description: `Path ${index} has an invalid off-curve sequence` });
    }
    if (zeroLength > 0) {
      findings.push({ ...base, defect: 'zero-length-segment', description: `Path ${index} has ${zeroLength} zero-length segment(s)`, measured: zeroLength, threshold: 0 });
    }
  });
  return findings;
}

/** Structural diff of two layers of one glyph. */
export function compareLayers(glyph: string, masterA: string, a: Layer, masterB: string, b: Layer, unitsPerEm: number, config: AuditConfig): Finding[] {
  const masters = [masterA, masterB];
  const fatal = (defect: string, description: string, measured?: string | number, threshold?: string | number): Finding => ({
    check: 'compatibility',
    subject: glyph,
    subjectKind: 'glyph',
    masters,
    defect,
    description,
    measured,
    threshold,
    severity: Severity.Fatal,
  });

  const emptyA = isEmptyLayer(a);
  const emptyB = isEmptyLayer(b);
  if (emptyA !== emptyB) {
    return [
      {
        check: 'compatibility',
        subject: glyph,
        subjectKind: 'glyph',
        masters,
        defect: 'partially-drawn',
        description: `Drawn in ${emptyA ? masterB : masterA} but empty in ${emptyA ? masterA : masterB}`,
        severity: Severity.Unreliable,
      },
    ];
  }

  const findings: Finding[] = [];

  if (a.paths.length !== b.paths.length) {
    findings.push(fatal('path-count', `Path count differs`, `${a.paths.length} / ${b.paths.length}`, 'equal'));
  } else if (a.paths.length > 0) {
    const mapping = matchPaths(a, b, unitsPerEm);
    if (mapping.some((j, i) => j !== i)) {
      findings.push(fatal('path-order', 'Paths are drawn in a different order', mapping.map((j, i) => `${i}→${j}`).join(' '), 'same order'));
    }

    const startThreshold = Math.max(config.startNodeWidthRatio * Math.max(a.width, b.width), config.startNodeMinDistance);
    mapping.forEach((j, i) => {
      const pathA = a.paths[i];
      const pathB = b.paths[j];
      if (!pathA || !pathB) {
        return;
      }
      const label = i === j ? `Path ${i}` : `Path ${i} (↔ ${j})`;
      if (pathA.nodes.length !== pathB.nodes.length) {
        findings.push(fatal('node-count', `${label} node count differs`, `${pathA.nodes.length} / ${pathB.nodes.length}`, 'equal'));
      } else if (nodeTypeSequence(pathA).join(',') !== nodeTypeSequence(pathB).join(',')) {
        findings.push(fatal('node-types', `${label} node types differ`, undefined, 'same sequence'));
      }

      const dirA = pathDirection(pathA);
      const dirB = pathDirection(pathB);
      if (dirA !== dirB) {
        findings.push(fatal('direction', `${label} direction differs`, `${dirA} / ${dirB}`, 'same direction'));
      }

      const startA = firstOnCurveIndex(pathA);
      const startB = firstOnCurveIndex(pathB);
      if (startA >= 0 && startB >= 0) {
        const gap = distance(pathA.nodes[startA], pathB.nodes[startB]);
        if (gap > startThreshold) {
          findings.push(fatal('start-node', `${label} starts at a different node`, round(gap), `≤ ${round(startThreshold)}`));
        }
      }
    });
  }

  const componentsA = a.components.map((component) => component.glyphName);
  const componentsB = b.components.map((component) => component.glyphName);
  if (!sameMultiset(componentsA, componentsB)) {
    findings.push(fatal('components', 'Components differ', `[${[...componentsA].sort().join(', ')}] / [${[...componentsB].sort().join(', ')}]`, 'same components'));
  }

  const anchorsA = [...new Set(a.anchors.map((anchor) => anchor.name))].sort();
  const anchorsB = [...new Set(b.anchors.map((anchor) => anchor.name))].sort();
  if (anchorsA.join(',') !== anchorsB.join(',')) {
    findings.push(fatal('anchors', 'Anchors differ', `[${anchorsA.join(', ')}] / [${anchorsB.join(', ')}]`, 'same anchors'));
  }

  return findings;
}

/**
 * Compares every pair of the glyph's layers among `masterIds`. The glyph's
 * status is the worst status seen over all pairs.
 */
export function checkGlyphCompatibility(font: Font, glyph: Glyph, masterIds: readonly string[], config: AuditConfig): GlyphCompatibility {
  const known = new Set(font.masters.map((master) => master.id));
  const orphanLayers = [...glyph.layers.keys()].filter((id) => !known.has(id));
  if (orphanLayers.length > 0) {
    const findings: Finding[] = [
      {
        check: 'compatibility',
        subject: glyph.name,
        subjectKind: 'glyph',
        masters: orphanLayers,
        defect: 'corrupt-glyph',
        description: `Layer(s) reference unknown master(s): ${orphanLayers.join(', ')}`,
        severity: Severity.Unreliable,
      },
    ];
    return { glyph: glyph.name, status: 'partial', findings };
  }

  const findings: Finding[] = [];
  const present: Array<{ id: string; layer: Layer }> = [];
  for (const id of masterIds) {
    const layer = glyph.layers.get(id);
    if (!layer) {
      findings.push({
        check: 'compatibility',
        subject: glyph.name,
        subjectKind: 'glyph',
        masters: [id],
        defect: 'missing-layer',
        description: `No layer for master ${id}`,
        severity: Severity.Unreliable,
      });
      continue;
    }
    present.push({ id, layer });
    findings.push(...layerDefects(glyph.name, id, layer));
  }

  for (let i = 0; i < present.length; i++) {
    for (let j = i + 1; j < present.length; j++) {
      findings.push(...compareLayers(glyph.name, present[i].id, present[i].layer, present[j].id, present[j].layer, font.unitsPerEm, config));
    }
  }

  return { glyph: glyph.name, status: compatibilityStatus(findings), findings };
}

export const compatibilityAnalyzer: Analyzer = {
  id: 'compatibility',
  title: 'Interpolation compatibility',
  subjects: glyphSubjects,
  run({ font, glyphNames, masterIds, config }) {
    return glyphNames.flatMap((name) => {
      const glyph = font.glyphs.get(name);
      if (!glyph) {
        return [];
      }
      return guardEntity('compatibility', { subject: name, kind: 'glyph' }, masterIds, () => checkGlyphCompatibility(font, glyph, masterIds, config).findings);
    });
  },
};
