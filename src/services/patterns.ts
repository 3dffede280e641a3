import { z } from 'zod';
import stemPatternsJson from '../data/stem-patterns.json';
import colorPatternsJson from '../data/color-patterns.json';
import overshootJson from '../data/overshoot.json';
import proportionsJson from '../data/proportions.json';
import diagonalsJson from '../data/diagonals.json';
import junctionsJson from '../data/junctions.json';
import widthPairsJson from '../data/width-pairs.json';

/**
 * Expected deviations from the straight reference glyph (n for lowercase,
 * H for uppercase and figures), from measurements of professional text
 * faces. `maxDev` is a symmetric tolerance in units, `range` a signed
 * window for optical compensation, `unreliable` marks shapes the ray
 * measurement cannot read.
 */
const StemPatternSchema = z.object({
  maxDev: z.number().optional(),
  range: z.tuple([z.number(), z.number()]).optional(),
  unreliable: z.boolean().optional(),
  note: z.string().optional(),
});

const StemTableSchema = z.object({
  patterns: z.record(StemPatternSchema),
  heavyUnreliable: z.record(z.string()),
});

/** Ink density as a percentage of the reference glyph's. */
const ColorPatternSchema = z.object({
  expected: z.number().optional(),
  maxDev: z.number().optional(),
  unreliable: z.boolean().optional(),
  note: z.string().optional(),
});

const ColorTableSchema = z.object({
  patterns: z.record(ColorPatternSchema),
});

const rangeSchema = z.tuple([z.number(), z.number()]);

/** Glyphs that should stay within `tolerance` of each other. */
const toleranceGroupSchema = z.object({
  name: z.string(),
  members: z.array(z.string()).min(2),
  tolerance: z.number().nonnegative(),
  note: z.string(),
});

const OvershootTableSchema = z.object({
  shapes: z.record(z.enum(['round', 'round-bottom', 'pointed'])),
  apexTop: z.array(z.string()),
  vertexBottom: z.array(z.string()),
  figureReferences: z.array(z.string()),
});

/** Advance widths as a percentage of n (lowercase) or H (uppercase and figures). */
const ProportionTableSchema = z.object({
  groups: z.array(toleranceGroupSchema),
  order: z.array(z.object({ wider: z.string(), narrower: z.string() })),
  ranges: z.record(rangeSchema),
});

/** Diagonal stems as a percentage of the straight reference stem. */
const DiagonalTableSchema = z.object({
  glyphs: z.array(z.string()),
  groups: z.array(toleranceGroupSchema),
  ranges: z.record(rangeSchema),
  unreliable: z.array(z.string()),
  minSpread: z.number().nonnegative(),
  minReference: z.number().nonnegative(),
});

/** Stem position to follow, as a share of the advance width. */
const JunctionTableSchema = z.object({
  glyphs: z.record(z.number().min(0).max(1)),
  groups: z.array(toleranceGroupSchema),
});

const pairSeveritySchema = z.enum(['fatal', 'warning']);

const widthRatioSchema = z.object({
  a: z.string(),
  b: z.string(),
  range: rangeSchema,
  severity: pairSeveritySchema,
  note: z.string(),
});

const WidthPairTableSchema = z.object({
  relatedForms: z.array(widthRatioSchema),
  punctuationMatch: z.array(
    z.object({
      a: z.string(),
      b: z.string(),
      tolerance: z.number().nonnegative(),
      severity: pairSeveritySchema,
      note: z.string(),
    })
  ),
  punctuationRatio: z.array(widthRatioSchema),
});

export type WidthRatioRule = z.infer<typeof widthRatioSchema>;

export const STEM_TABLE = StemTableSchema.parse(stemPatternsJson);
export const COLOR_TABLE = ColorTableSchema.parse(colorPatternsJson);
export const OVERSHOOT_TABLE = OvershootTableSchema.parse(overshootJson);
export const PROPORTION_TABLE = ProportionTableSchema.parse(proportionsJson);
export const DIAGONAL_TABLE = DiagonalTableSchema.parse(diagonalsJson);
export const JUNCTION_TABLE = JunctionTableSchema.parse(junctionsJson);
export const WIDTH_PAIR_TABLE = WidthPairTableSchema.parse(widthPairsJson);
