import { z } from 'zod';

export const NodeSchema = z.object({
  x: z.number(),
  y: z.number(),
  type: z.enum(['line', 'curve', 'offcurve']),
});

export const LayerSchema = z.object({
  width: z.number().nonnegative(),
  paths: z.array(z.object({ nodes: z.array(NodeSchema) })).default([]),
  components: z
    .array(
      z.object({
        name: z.string(),
        transform: z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]).default([1, 0, 0, 1, 0, 0]),
      })
    )
    .default([]),
  anchors: z.array(z.object({ name: z.string(), x: z.number(), y: z.number() })).default([]),
});

export const GlyphSchema = z.object({
  name: z.string().min(1),
  unicode: z.number().int().nonnegative().optional(),
  category: z.string().optional(),
  subCategory: z.string().optional(),
  layers: z.record(LayerSchema),
});

export const KerningEntrySchema = z.object({
  left: z.string().min(1),
  right: z.string().min(1),
  value: z.number(),
});

export const MasterSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  axes: z.array(z.number()).default([]),
  xHeight: z.number(),
  capHeight: z.number(),
  ascender: z.number(),
  descender: z.number(),
  kerning: z.array(KerningEntrySchema).default([]),
});

export const GroupSchema = z.object({
  name: z.string().min(1),
  side: z.enum(['left', 'right']),
  members: z.array(z.string()),
});

export const FontSnapshotSchema = z.object({
  unitsPerEm: z.number().int().positive(),
  masters: z.array(MasterSchema).min(1),
  glyphs: z.array(GlyphSchema),
  groups: z.array(GroupSchema).default([]),
});

export type FontSnapshot = z.infer<typeof FontSnapshotSchema>;
export type FontSnapshotInput = z.input<typeof FontSnapshotSchema>;
export type LayerSnapshot = z.infer<typeof LayerSchema>;
