import type { Font } from '../../src/types/font';
import type { FontSnapshotInput } from '../../src/types/snapshot';
import { parseFontSnapshot } from '../../src/services/snapshot';

type GlyphInput = FontSnapshotInput['glyphs'][number];
type MasterInput = FontSnapshotInput['masters'][number];
export type LayerInput = GlyphInput['layers'][string];
export type PathInput = NonNullable<LayerInput['paths']>[number];

/** Axis-aligned rectangle, counter-clockwise unless `clockwise` is set. */
export function rect(x0: number, y0: number, x1: number, y1: number, clockwise = false): PathInput {
  const corners = [
    { x: x0, y: y0 },
    { x: x1, y: y0 },
    { x: x1, y: y1 },
    { x: x0, y: y1 },
  ];
  const ordered = clockwise ? [corners[0], corners[3], corners[2], corners[1]] : corners;
  return { nodes: ordered.map((corner) => ({ ...corner, type: 'line' as const })) };
}

/** Outer contour with a clockwise counter inset by `inset` on every side. */
export function ring(x0: number, y0: number, x1: number, y1: number, inset: number): PathInput[] {
  return [rect(x0, y0, x1, y1), rect(x0 + inset, y0 + inset, x1 - inset, y1 - inset, true)];
}

export function master(id: string, overrides: Partial<MasterInput> = {}): MasterInput {
  return { id, xHeight: 500, capHeight: 700, ascender: 800, descender: -200, ...overrides };
}

export function glyph(name: string, unicode: number | undefined, layers: Record<string, LayerInput>): GlyphInput {
  return { name, unicode, layers };
}

export function buildTestFont(input: Partial<FontSnapshotInput> & Pick<FontSnapshotInput, 'glyphs'>): Font {
  return parseFontSnapshot({ unitsPerEm: 1000, masters: [master('regular')], ...input });
}
