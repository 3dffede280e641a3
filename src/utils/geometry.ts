import type { Font, Layer, Node, NodeType, Path, Point, Transform } from '../types/font';

export interface Bounds {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

export type Direction = 'clockwise' | 'counterclockwise';

export type Segment =
  | { kind: 'line'; p0: Point; p1: Point }
  | { kind: 'cubic'; p0: Point; p1: Point; p2: Point; p3: Point };

export interface SegmentSet {
  segments: Segment[];
  /** An off-curve run that is neither empty before a line nor two long before a curve */
  malformed: boolean;
  zeroLength: number;
}

const COINCIDENT = 1e-9;

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

function samePoint(a: Point, b: Point): boolean {
  return Math.abs(a.x - b.x) < COINCIDENT && Math.abs(a.y - b.y) < COINCIDENT;
}

/** Shoelace area of the node polygon, off-curve points included. Positive is counter-clockwise (y up). */
export function signedArea(nodes: readonly Point[]): number {
  let sum = 0;
  for (let i = 0; i < nodes.length; i++) {
    const a = nodes[i];
    const b = nodes[(i + 1) % nodes.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
}

export function pathDirection(path: Path): Direction {
  return signedArea(path.nodes) < 0 ? 'clockwise' : 'counterclockwise';
}

export function isOnCurve(node: Node): boolean {
  return node.type !== 'offcurve';
}

export function firstOnCurveIndex(path: Path): number {
  return path.nodes.findIndex(isOnCurve);
}

/** Node types in traversal order, starting at the first on-curve node. */
export function nodeTypeSequence(path: Path): NodeType[] {
  const start = Math.max(0, firstOnCurveIndex(path));
  const count = path.nodes.length;
  const types: NodeType[] = [];
  for (let i = 0; i < count; i++) {
    types.push(path.nodes[(start + i) % count].type);
  }
  return types;
}

function raiseQuadratic(p0: Point, q: Point, p3: Point): Segment {
  return {
    kind: 'cubic',
    p0,
    p1: { x: p0.x + (2 / 3) * (q.x - p0.x), y: p0.y + (2 / 3) * (q.y - p0.y) },
    p2: { x: p3.x + (2 / 3) * (q.x - p3.x), y: p3.y + (2 / 3) * (q.y - p3.y) },
    p3,
  };
}

/**
 * Splits a closed path into drawable segments. Each on-curve node ends the
 * segment that starts at the previous on-curve node; the off-curve nodes
 * between them decide the segment kind.
 */
export function pathSegments(path: Path): SegmentSet {
  const nodes = path.nodes;
  const onCurve: number[] = [];
  nodes.forEach((node, index) => {
    if (isOnCurve(node)) {
      onCurve.push(index);
    }
  });

  if (onCurve.length === 0) {
    return { segments: [], malformed: nodes.length > 0, zeroLength: 0 };
  }

  const segments: Segment[] = [];
  let malformed = false;
  let zeroLength = 0;

  for (let k = 0; k < onCurve.length; k++) {
    const endIndex = onCurve[k];
    const startIndex = onCurve[(k - 1 + onCurve.length) % onCurve.length];
    const end = nodes[endIndex];
    const start = nodes[startIndex];

    const controls: Point[] = [];
    for (let i = (startIndex + 1) % nodes.length; i !== endIndex; i = (i + 1) % nodes.length) {
      controls.push(nodes[i]);
    }

    let segment: Segment;
    if (end.type === 'curve' && controls.length === 2) {
      segment = { kind: 'cubic', p0: start, p1: controls[0], p2: controls[1], p3: end };
    } else if (end.type === 'line' && controls.length === 0) {
      segment = { kind: 'line', p0: start, p1: end };
    } else {
      malformed = true;
      segment = controls.length === 1 ? raiseQuadratic(start, controls[0], end) : { kind: 'line', p0: start, p1: end };
    }

    const points = segment.kind === 'line' ? [segment.p0, segment.p1] : [segment.p0, segment.p1, segment.p2, segment.p3];
    if (points.every((p) => samePoint(p, points[0]))) {
      zeroLength++;
    }
    segments.push(segment);
  }

  return { segments, malformed, zeroLength };
}

function cubicAt(a: number, b: number, c: number, d: number, t: number): number {
  const mt = 1 - t;
  return mt * mt * mt * a + 3 * mt * mt * t * b + 3 * mt * t * t * c + t * t * t * d;
}

/** Parameters in (0, 1) where the derivative of a one-dimensional cubic is zero. */
function cubicExtrema(a: number, b: number, c: number, d: number): number[] {
  // derivative / 3 = qa·t² + qb·t + qc
  const qa = -a + 3 * b - 3 * c + d;
  const qb = 2 * (a - 2 * b + c);
  const qc = b - a;
  const roots: number[] = [];
  if (Math.abs(qa) < 1e-12) {
    if (Math.abs(qb) > 1e-12) {
      roots.push(-qc / qb);
    }
  } else {
    const disc = qb * qb - 4 * qa * qc;
    if (disc >= 0) {
      const sq = Math.sqrt(disc);
      roots.push((-qb + sq) / (2 * qa), (-qb - sq) / (2 * qa));
    }
  }
  return roots.filter((t) => t > 0 && t < 1);
}

function extend(bounds: Bounds | null, p: Point): Bounds {
  if (!bounds) {
    return { xMin: p.x, yMin: p.y, xMax: p.x, yMax: p.y };
  }
  return {
    xMin: Math.min(bounds.xMin, p.x),
    yMin: Math.min(bounds.yMin, p.y),
    xMax: Math.max(bounds.xMax, p.x),
    yMax: Math.max(bounds.yMax, p.y),
  };
}

/** Tight bounds of the outline (curve extrema included), or null for an empty path. */
export function pathBounds(path: Path): Bounds | null {
  const { segments } = pathSegments(path);
  if (segments.length === 0) {
    return path.nodes.reduce<Bounds | null>((acc, node) => extend(acc, node), null);
  }

  let bounds: Bounds | null = null;
  for (const segment of segments) {
    if (segment.kind === 'line') {
      bounds = extend(extend(bounds, segment.p0), segment.p1);
      continue;
    }
    const { p0, p1, p2, p3 } = segment;
    bounds = extend(extend(bounds, p0), p3);
    const ts = [...cubicExtrema(p0.x, p1.x, p2.x, p3.x), ...cubicExtrema(p0.y, p1.y, p2.y, p3.y)];
    for (const t of ts) {
      bounds = extend(bounds, { x: cubicAt(p0.x, p1.x, p2.x, p3.x, t), y: cubicAt(p0.y, p1.y, p2.y, p3.y, t) });
    }
  }
  return bounds;
}

export function unionBounds(paths: readonly Path[]): Bounds | null {
  let result: Bounds | null = null;
  for (const path of paths) {
    const b = pathBounds(path);
    if (b) {
      result = extend(extend(result, { x: b.xMin, y: b.yMin }), { x: b.xMax, y: b.yMax });
    }
  }
  return result;
}

export function boundsCenter(bounds: Bounds): Point {
  return { x: (bounds.xMin + bounds.xMax) / 2, y: (bounds.yMin + bounds.yMax) / 2 };
}

export function applyTransform(point: Point, [a, b, c, d, tx, ty]: Transform): Point {
  return { x: a * point.x + c * point.y + tx, y: b * point.x + d * point.y + ty };
}

function transformPath(path: Path, transform: Transform): Path {
  // a mirroring transform reverses winding; reversing the nodes keeps the direction
  const mirrored = transform[0] * transform[3] - transform[1] * transform[2] < 0;
  const nodes = path.nodes.map((node) => ({ ...applyTransform(node, transform), type: node.type }));
  return { nodes: mirrored ? reverseNodes(nodes) : nodes };
}

/** Reverses traversal while keeping every on-curve node's segment kind attached to the right segment. */
export function reverseNodes(nodes: readonly Node[]): Node[] {
  const count = nodes.length;
  if (count === 0) {
    return [];
  }
  const reversed: Node[] = [];
  for (let i = count - 1; i >= 0; i--) {
    const node = nodes[i];
    if (node.type === 'offcurve') {
      reversed.push(node);
      continue;
    }
    // the segment now ending at this node used to start at it; its kind is carried by the next on-curve node
    let j = (i + 1) % count;
    while (nodes[j].type === 'offcurve' && j !== i) {
      j = (j + 1) % count;
    }
    reversed.push({ x: node.x, y: node.y, type: nodes[j].type });
  }
  return reversed;
}

const MAX_COMPONENT_DEPTH = 5;

/**
 * Flattens a layer into plain paths: its own outlines plus every component
 * resolved in the same master. Unresolvable or cyclic references are skipped.
 */
export function decomposeLayer(font: Font, layer: Layer, masterId: string, visited: ReadonlySet<string> = new Set()): Path[] {
  const paths: Path[] = [...layer.paths];
  if (visited.size >= MAX_COMPONENT_DEPTH) {
    return paths;
  }
  for (const component of layer.components) {
    if (visited.has(component.glyphName)) {
      continue;
    }
    const base = font.glyphs.get(component.glyphName)?.layers.get(masterId);
    if (!base) {
      continue;
    }
    const nested = decomposeLayer(font, base, masterId, new Set([...visited, component.glyphName]));
    paths.push(...nested.map((path) => transformPath(path, component.transform)));
  }
  return paths;
}
