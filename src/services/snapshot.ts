import type { Font, Glyph, KerningPair, Layer, Master } from '../types/font';
import { parseKerningKey, pairKey } from '../types/font';
import { FontSnapshotSchema, type FontSnapshot, type LayerSnapshot } from '../types/snapshot';
import { UsageError } from '../utils/errors';

function buildLayer(layer: LayerSnapshot): Layer {
  return {
    width: layer.width,
    paths: layer.paths.map((path) => ({ nodes: path.nodes.map((node) => ({ x: node.x, y: node.y, type: node.type })) })),
    components: layer.components.map((component) => ({ glyphName: component.name, transform: component.transform })),
    anchors: layer.anchors.map((anchor) => ({ name: anchor.name, x: anchor.x, y: anchor.y })),
  };
}

/**
 * Turns a validated snapshot into the immutable model. Layers keyed by an
 * unknown master are kept so the compatibility check can report them.
 */
export function buildFont(snapshot: FontSnapshot): Font {
  const masters: Master[] = [];
  const masterIds = new Set<string>();
  for (const master of snapshot.masters) {
    if (masterIds.has(master.id)) {
      throw new UsageError(`Duplicate master id "${master.id}"`);
    }
    masterIds.add(master.id);

    const kerning = new Map<string, KerningPair>();
    for (const entry of master.kerning) {
      const left = parseKerningKey(entry.left);
      const right = parseKerningKey(entry.right);
      kerning.set(pairKey(left, right), { left, right, value: entry.value });
    }

    masters.push({
      id: master.id,
      name: master.name ?? master.id,
      axes: master.axes,
      metrics: {
        xHeight: master.xHeight,
        capHeight: master.capHeight,
        ascender: master.ascender,
        descender: master.descender,
      },
      kerning,
    });
  }

  const glyphs = new Map<string, Glyph>();
  for (const glyph of snapshot.glyphs) {
    if (glyphs.has(glyph.name)) {
      throw new UsageError(`Duplicate glyph name "${glyph.name}"`);
    }
    const layers = new Map<string, Layer>();
    for (const [masterId, layer] of Object.entries(glyph.layers)) {
      layers.set(masterId, buildLayer(layer));
    }
    glyphs.set(glyph.name, {
      name: glyph.name,
      unicode: glyph.unicode,
      category: glyph.category,
      subCategory: glyph.subCategory,
      layers,
    });
  }

  return {
    unitsPerEm: snapshot.unitsPerEm,
    masters,
    glyphs,
    groups: snapshot.groups.map((group) => ({ name: group.name, side: group.side, members: [...group.members] })),
  };
}

export function parseFontSnapshot(raw: unknown): Font {
  const parsed = FontSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new UsageError(`Invalid font snapshot: ${issues.join('; ')}`);
  }
  return buildFont(parsed.data);
}
