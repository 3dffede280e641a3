import fs from 'fs-extra';
import * as opentype from 'opentype.js';
import * as path from 'path';
import type { Font, Glyph, KerningPair, Layer, Master, Node, Path } from '../types/font';
import { pairKey } from '../types/font';
import { categoryFromCodepoint } from '../utils/unicode-utils';
import { UsageError, describeError } from '../utils/errors';

interface ParsedMaster {
  master: Master;
  unitsPerEm: number;
  glyphs: Map<string, { unicode?: number; layer: Layer }>;
}

function samePosition(a: { x: number; y: number }, b: { x: number; y: number }): boolean {
  return Math.abs(a.x - b.x) < 1e-9 && Math.abs(a.y - b.y) < 1e-9;
}

/**
 * Converts drawing commands into closed node loops. The start point of each
 * contour becomes its closing node unless the last segment already lands on it.
 * Commands come from `getPath`, which is y-down; y is flipped back here.
 */
export function commandsToPaths(commands: readonly opentype.PathCommand[]): Path[] {
  const paths: Path[] = [];
  let nodes: Node[] = [];
  let start: { x: number; y: number } | null = null;
  let current: { x: number; y: number } | null = null;

  const close = () => {
    if (start && nodes.length > 0) {
      const last = nodes[nodes.length - 1];
      if (!samePosition(last, start)) {
        nodes.push({ x: start.x, y: start.y, type: 'line' });
      }
      paths.push({ nodes });
    }
    nodes = [];
    start = null;
  };

  for (const command of commands) {
    switch (command.type) {
      case 'M':
        close();
        start = { x: command.x, y: -command.y };
        current = start;
        break;
      case 'L':
        current = { x: command.x, y: -command.y };
        nodes.push({ ...current, type: 'line' });
        break;
      case 'C':
        nodes.push({ x: command.x1, y: -command.y1, type: 'offcurve' });
        nodes.push({ x: command.x2, y: -command.y2, type: 'offcurve' });
        current = { x: command.x, y: -command.y };
        nodes.push({ ...current, type: 'curve' });
        break;
      case 'Q': {
        const from = current ?? { x: command.x, y: -command.y };
        const control = { x: command.x1, y: -command.y1 };
        const to = { x: command.x, y: -command.y };
        nodes.push({ x: from.x + (2 / 3) * (control.x - from.x), y: from.y + (2 / 3) * (control.y - from.y), type: 'offcurve' });
        nodes.push({ x: to.x + (2 / 3) * (control.x - to.x), y: to.y + (2 / 3) * (control.y - to.y), type: 'offcurve' });
        nodes.push({ ...to, type: 'curve' });
        current = to;
        break;
      }
      case 'Z':
        close();
        break;
    }
  }
  close();
  return paths;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

async function parseBinaryFont(fontPath: string): Promise<ParsedMaster> {
  const fontBuffer = await fs.readFile(fontPath);
  const font = opentype.parse(fontBuffer.buffer.slice(fontBuffer.byteOffset, fontBuffer.byteOffset + fontBuffer.byteLength));

  const glyphs = new Map<string, { unicode?: number; layer: Layer }>();
  const names: string[] = [];
  for (let i = 0; i < font.glyphs.length; i++) {
    const glyph = font.glyphs.get(i);
    const name = glyph.name || `glyph${i}`;
    names.push(name);
    const outline = glyph.getPath(0, 0, font.unitsPerEm);
    glyphs.set(name, {
      unicode: glyph.unicode,
      layer: {
        width: glyph.advanceWidth ?? 0,
        paths: commandsToPaths(outline.commands),
        components: [],
        anchors: [],
      },
    });
  }

  const os2 = font.tables.os2;
  const kerning = new Map<string, KerningPair>();
  for (const [indices, value] of Object.entries(font.kerningPairs ?? {})) {
    const [leftIndex, rightIndex] = indices.split(',').map(Number);
    const leftName = names[leftIndex];
    const rightName = names[rightIndex];
    if (leftName === undefined || rightName === undefined || value === 0) {
      continue;
    }
    const left = { kind: 'glyph' as const, name: leftName };
    const right = { kind: 'glyph' as const, name: rightName };
    kerning.set(pairKey(left, right), { left, right, value });
  }

  const id = path.basename(fontPath, path.extname(fontPath));
  return {
    unitsPerEm: font.unitsPerEm,
    glyphs,
    master: {
      id,
      name: font.names.fontSubfamily?.en || id,
      axes: [],
      metrics: {
        xHeight: numberOr(os2?.sxHeight, Math.round(font.unitsPerEm * 0.5)),
        capHeight: numberOr(os2?.sCapHeight, Math.round(font.unitsPerEm * 0.7)),
        ascender: font.ascender,
        descender: font.descender,
      },
      kerning,
    },
  };
}

/**
 * Reads compiled fonts as masters of one family. Glyphs are matched by name;
 * a glyph absent from one file simply has no layer for that master.
 */
export async function loadBinaryFonts(fontPaths: readonly string[]): Promise<Font> {
  const parsed: ParsedMaster[] = [];
  for (const fontPath of fontPaths) {
    try {
      parsed.push(await parseBinaryFont(fontPath));
    } catch (error) {
      throw new UsageError(`Error reading font ${fontPath}: ${describeError(error)}`);
    }
  }

  const ids = new Set<string>();
  for (const { master } of parsed) {
    if (ids.has(master.id)) {
      throw new UsageError(`Two fonts map to master id "${master.id}"; rename one of the files`);
    }
    ids.add(master.id);
  }

  const glyphs = new Map<string, Glyph>();
  for (const { master, glyphs: masterGlyphs } of parsed) {
    for (const [name, { unicode, layer }] of masterGlyphs) {
      const existing = glyphs.get(name);
      const layers = new Map(existing?.layers ?? []);
      layers.set(master.id, layer);
      const codepoint = existing?.unicode ?? unicode;
      glyphs.set(name, {
        name,
        unicode: codepoint,
        ...(codepoint !== undefined ? categoryFromCodepoint(codepoint) : {}),
        layers,
      });
    }
  }

  return {
    unitsPerEm: parsed[0].unitsPerEm,
    masters: parsed.map(({ master }) => master),
    glyphs,
    groups: [],
  };
}
