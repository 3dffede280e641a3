export type NodeType = 'line' | 'curve' | 'offcurve';

export interface Point {
  x: number;
  y: number;
}

export interface Node extends Point {
  readonly type: NodeType;
}

export interface Path {
  readonly nodes: readonly Node[];
}

/** Affine matrix [a, b, c, d, tx, ty]: x' = a·x + c·y + tx, y' = b·x + d·y + ty */
export type Transform = readonly [number, number, number, number, number, number];

export interface Component {
  readonly glyphName: string;
  readonly transform: Transform;
}

export interface Anchor extends Point {
  readonly name: string;
}

export interface Layer {
  readonly width: number;
  readonly paths: readonly Path[];
  readonly components: readonly Component[];
  readonly anchors: readonly Anchor[];
}

export interface Glyph {
  readonly name: string;
  readonly unicode?: number;
  /** Broad class such as "Letter", "Number", "Mark", "Punctuation" */
  readonly category?: string;
  /** "Uppercase", "Lowercase", "Decimal Digit", ... */
  readonly subCategory?: string;
  readonly layers: ReadonlyMap<string, Layer>;
}

export type KerningSide = 'left' | 'right';

export interface KerningKey {
  readonly kind: 'glyph' | 'group';
  readonly name: string;
}

export interface KerningPair {
  readonly left: KerningKey;
  readonly right: KerningKey;
  readonly value: number;
}

export interface KerningGroup {
  readonly name: string;
  readonly side: KerningSide;
  readonly members: readonly string[];
}

export interface VerticalMetrics {
  readonly xHeight: number;
  readonly capHeight: number;
  readonly ascender: number;
  readonly descender: number;
}

export interface Master {
  readonly id: string;
  readonly name: string;
  readonly axes: readonly number[];
  readonly metrics: VerticalMetrics;
  readonly kerning: ReadonlyMap<string, KerningPair>;
}

export interface Font {
  readonly unitsPerEm: number;
  readonly masters: readonly Master[];
  readonly glyphs: ReadonlyMap<string, Glyph>;
  readonly groups: readonly KerningGroup[];
}

export function keyToString(key: KerningKey): string {
  return key.kind === 'group' ? `@${key.name}` : key.name;
}

export function parseKerningKey(raw: string): KerningKey {
  return raw.startsWith('@') ? { kind: 'group', name: raw.slice(1) } : { kind: 'glyph', name: raw };
}

export function pairKey(left: KerningKey, right: KerningKey): string {
  return `${keyToString(left)}|${keyToString(right)}`;
}
