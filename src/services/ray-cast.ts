import type { Path, Point } from '../types/font';
import { pathSegments, type Segment } from '../utils/geometry';

/** A straight line through `origin`, `angle` degrees counter-clockwise from +x. */
export interface Ray {
  origin: Point;
  angle: number;
}

export interface RayHit {
  /** Signed distance from the ray origin along the ray direction */
  position: number;
  point: Point;
  /** Direction the outline crosses the ray, used for non-zero winding */
  crossing: 1 | -1;
}

export interface Span {
  entry: number;
  exit: number;
  thickness: number;
}

export interface HeightMeasurement {
  y: number;
  hits: RayHit[];
  spans: Span[];
  coverage: number;
}

export type StemOrientation = 'vertical' | 'horizontal' | 'diagonal';

export interface StemMeasurement {
  x: number;
  y: number;
  tangent: number;
  thickness: number;
  orientation: StemOrientation;
}

const TANGENT_EPSILON = 1e-7;
const NUDGE = 1e-3;
const MAX_NUDGES = 16;

interface Frame {
  origin: Point;
  cos: number;
  sin: number;
}

function toFrame(p: Point, frame: Frame): Point {
  const dx = p.x - frame.origin.x;
  const dy = p.y - frame.origin.y;
  return { x: dx * frame.cos + dy * frame.sin, y: -dx * frame.sin + dy * frame.cos };
}

function fromFrame(p: Point, frame: Frame): Point {
  return {
    x: frame.origin.x + p.x * frame.cos - p.y * frame.sin,
    y: frame.origin.y + p.x * frame.sin + p.y * frame.cos,
  };
}

function segmentInFrame(segment: Segment, frame: Frame): Segment {
  if (segment.kind === 'line') {
    return { kind: 'line', p0: toFrame(segment.p0, frame), p1: toFrame(segment.p1, frame) };
  }
  return {
    kind: 'cubic',
    p0: toFrame(segment.p0, frame),
    p1: toFrame(segment.p1, frame),
    p2: toFrame(segment.p2, frame),
    p3: toFrame(segment.p3, frame),
  };
}

function solveQuadratic(a: number, b: number, c: number): number[] {
  if (Math.abs(a) < 1e-12) {
    return Math.abs(b) < 1e-12 ? [] : [-c / b];
  }
  const disc = b * b - 4 * a * c;
  if (disc < 0) {
    return [];
  }
  const sq = Math.sqrt(disc);
  return [(-b + sq) / (2 * a), (-b - sq) / (2 * a)];
}

/** Real roots of a·t³ + b·t² + c·t + d, polished with Newton steps. */
function solveCubic(a: number, b: number, c: number, d: number): number[] {
  const scale = Math.max(Math.abs(b), Math.abs(c), Math.abs(d), 1);
  let roots: number[];
  if (Math.abs(a) < 1e-12 * scale) {
    roots = solveQuadratic(b, c, d);
  } else {
    const A = b / a;
    const B = c / a;
    const C = d / a;
    const Q = (3 * B - A * A) / 9;
    const R = (9 * A * B - 27 * C - 2 * A * A * A) / 54;
    const D = Q * Q * Q + R * R;
    if (D >= 0) {
      const sqrtD = Math.sqrt(D);
      const S = Math.cbrt(R + sqrtD);
      const T = Math.cbrt(R - sqrtD);
      roots = [-A / 3 + S + T];
      if (Math.abs(S - T) < 1e-12) {
        roots.push(-A / 3 - (S + T) / 2);
      }
    } else {
      const theta = Math.acos(R / Math.sqrt(-Q * Q * Q));
      const m = 2 * Math.sqrt(-Q);
      roots = [0, 2, 4].map((k) => m * Math.cos((theta + k * Math.PI) / 3) - A / 3);
    }
  }

  return roots.map((root) => {
    let t = root;
    for (let i = 0; i < 2; i++) {
      const f = ((a * t + b) * t + c) * t + d;
      const df = (3 * a * t + 2 * b) * t + c;
      if (Math.abs(df) < 1e-12) {
        break;
      }
      t -= f / df;
    }
    return t;
  });
}

function lineHits(p0: Point, p1: Point, level: number): Array<{ x: number; crossing: 1 | -1 }> {
  const y0 = p0.y - level;
  const y1 = p1.y - level;
  if ((y0 < 0 && y1 > 0) || (y0 > 0 && y1 < 0)) {
    const t = y0 / (y0 - y1);
    return [{ x: p0.x + t * (p1.x - p0.x), crossing: y1 > y0 ? 1 : -1 }];
  }
  return [];
}

function cubicHits(p0: Point, p1: Point, p2: Point, p3: Point, level: number): Array<{ x: number; crossing: 1 | -1 }> {
  const a = -p0.y + 3 * p1.y - 3 * p2.y + p3.y;
  const b = 3 * p0.y - 6 * p1.y + 3 * p2.y;
  const c = -3 * p0.y + 3 * p1.y;
  const d = p0.y - level;

  const hits: Array<{ x: number; crossing: 1 | -1 }> = [];
  const seen: number[] = [];
  for (const t of solveCubic(a, b, c, d)) {
    if (t <= 0 || t >= 1 || seen.some((s) => Math.abs(s - t) < 1e-9)) {
      continue;
    }
    seen.push(t);
    const dy = (3 * a * t + 2 * b) * t + c;
    if (Math.abs(dy) < 1e-9) {
      // touches the ray without crossing
      continue;
    }
    const mt = 1 - t;
    const x = mt * mt * mt * p0.x + 3 * mt * mt * t * p1.x + 3 * mt * t * t * p2.x + t * t * t * p3.x;
    hits.push({ x, crossing: dy > 0 ? 1 : -1 });
  }
  return hits;
}

function segmentEnds(segment: Segment): Point[] {
  return segment.kind === 'line' ? [segment.p0, segment.p1] : [segment.p0, segment.p3];
}

/**
 * Every crossing between the ray and the outlines, ordered along the ray.
 * When an on-curve node sits on the ray, the ray is shifted by a small
 * offset along its normal so no node is counted twice.
 */
export function castRay(paths: readonly Path[], ray: Ray): RayHit[] {
  const radians = (ray.angle * Math.PI) / 180;
  const frame: Frame = { origin: ray.origin, cos: Math.cos(radians), sin: Math.sin(radians) };
  const segments = paths.flatMap((path) => pathSegments(path).segments).map((segment) => segmentInFrame(segment, frame));

  let level = 0;
  for (let i = 0; i < MAX_NUDGES; i++) {
    const touching = segments.some((segment) => segmentEnds(segment).some((p) => Math.abs(p.y - level) < TANGENT_EPSILON));
    if (!touching) {
      break;
    }
    level += NUDGE;
  }

  const hits: RayHit[] = [];
  for (const segment of segments) {
    const found = segment.kind === 'line' ? lineHits(segment.p0, segment.p1, level) : cubicHits(segment.p0, segment.p1, segment.p2, segment.p3, level);
    for (const { x, crossing } of found) {
      hits.push({ position: x, point: fromFrame({ x, y: level }, frame), crossing });
    }
  }

  return hits.sort((a, b) => a.position - b.position || a.crossing - b.crossing);
}

/** Entry/exit pairs under the non-zero winding rule. An unterminated run is dropped. */
export function insideSpans(hits: readonly RayHit[]): Span[] {
  const spans: Span[] = [];
  let winding = 0;
  let entry = 0;
  for (const hit of hits) {
    const before = winding;
    winding += hit.crossing;
    if (before === 0 && winding !== 0) {
      entry = hit.position;
    } else if (before !== 0 && winding === 0) {
      spans.push({ entry, exit: hit.position, thickness: hit.position - entry });
    }
  }
  return spans;
}

export function horizontalRay(y: number): Ray {
  return { origin: { x: 0, y }, angle: 0 };
}

/** Stems crossed by a horizontal ray and the share of the advance width they cover. */
export function measureAtHeight(paths: readonly Path[], y: number, width: number): HeightMeasurement {
  const hits = castRay(paths, horizontalRay(y));
  const spans = insideSpans(hits);
  let filled = 0;
  for (const span of spans) {
    filled += Math.max(0, Math.min(span.exit, width) - Math.max(span.entry, 0));
  }
  return { y, hits, spans, coverage: width > 0 ? filled / width : 0 };
}

/** Spans along a ray at any angle, for diagonal stems. */
export function measureAngled(paths: readonly Path[], origin: Point, angle: number): Span[] {
  return insideSpans(castRay(paths, { origin, angle }));
}

/** Scanline average of coverage over a horizontal zone. */
export function inkDensity(paths: readonly Path[], zoneBottom: number, zoneHeight: number, width: number, resolution: number): number {
  if (zoneHeight <= 0 || width <= 0 || resolution <= 0) {
    return 0;
  }
  let filled = 0;
  let total = 0;
  for (let y = zoneBottom + resolution / 2; y < zoneBottom + zoneHeight; y += resolution) {
    filled += measureAtHeight(paths, y, width).coverage * width;
    total += width;
  }
  return total > 0 ? filled / total : 0;
}

function normalizeAngle(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

export function classifyTangent(tangent: number): StemOrientation {
  const norm = normalizeAngle(tangent);
  if ((norm >= 60 && norm <= 120) || (norm >= 240 && norm <= 300)) {
    return 'vertical';
  }
  if (norm <= 30 || (norm >= 150 && norm <= 210) || norm >= 330) {
    return 'horizontal';
  }
  return 'diagonal';
}

interface SamplePoint {
  point: Point;
  tangent: number;
}

function angleOf(from: Point, to: Point): number | null {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (Math.abs(dx) < 1e-9 && Math.abs(dy) < 1e-9) {
    return null;
  }
  return (Math.atan2(dy, dx) * 180) / Math.PI;
}

/**
 * Points where a stem can be read: the middle of every straight segment,
 * and smooth on-curve nodes (incoming and outgoing tangents within 10°).
 */
function stemSamplePoints(path: Path): SamplePoint[] {
  const samples: SamplePoint[] = [];
  const { segments } = pathSegments(path);
  segments.forEach((segment, index) => {
    if (segment.kind === 'line') {
      const tangent = angleOf(segment.p0, segment.p1);
      if (tangent !== null) {
        samples.push({ point: { x: (segment.p0.x + segment.p1.x) / 2, y: (segment.p0.y + segment.p1.y) / 2 }, tangent });
      }
      return;
    }
    const next = segments[(index + 1) % segments.length];
    const incoming = angleOf(segment.p2, segment.p3) ?? angleOf(segment.p0, segment.p3);
    const outgoing = next.kind === 'line' ? angleOf(next.p0, next.p1) : angleOf(next.p0, next.p1) ?? angleOf(next.p0, next.p3);
    if (incoming === null || outgoing === null) {
      return;
    }
    const turn = Math.abs(normalizeAngle(outgoing - incoming + 180) - 180);
    if (turn <= 10) {
      samples.push({ point: segment.p3, tangent: outgoing });
    }
  });
  return samples;
}

/**
 * Stem thickness read perpendicular to the outline. The thickness is the ink
 * span that starts or ends at the sample point; points outside [yMin, yMax]
 * and readings above `maxThickness` are skipped.
 */
export function measurePerpendicularStems(paths: readonly Path[], yMin: number, yMax: number, maxThickness = 300): StemMeasurement[] {
  const measurements: StemMeasurement[] = [];
  for (const path of paths) {
    for (const { point, tangent } of stemSamplePoints(path)) {
      if (point.y < yMin || point.y > yMax) {
        continue;
      }
      const spans = measureAngled(paths, point, tangent + 90);
      const span = spans.find((s) => Math.abs(s.entry) < 0.5 || Math.abs(s.exit) < 0.5);
      if (!span || span.thickness <= 0.5 || span.thickness > maxThickness) {
        continue;
      }
      measurements.push({
        x: Math.round(point.x),
        y: Math.round(point.y),
        tangent: Math.round(tangent),
        thickness: Math.round(span.thickness),
        orientation: classifyTangent(tangent),
      });
    }
  }
  return measurements;
}

/**
 * Most frequent thickness: values are grouped within `tolerance` of each
 * group's first member and the median of the largest group is returned.
 */
export function dominantStem(values: readonly number[], tolerance = 3): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const groups: number[][] = [[sorted[0]]];
  for (const value of sorted.slice(1)) {
    const current = groups[groups.length - 1];
    if (value - current[0] <= tolerance) {
      current.push(value);
    } else {
      groups.push([value]);
    }
  }
  const best = groups.reduce((acc, group) => (group.length > acc.length ? group : acc), groups[0]);
  return Math.round(best[Math.floor(best.length / 2)]);
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
