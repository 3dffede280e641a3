import type { Font } from '../types/font';
import { UsageError } from '../utils/errors';
import { decomposeLayer } from '../utils/geometry';
import { classifyGlyph, glyphZone } from '../utils/unicode-utils';
import { round } from './analyzer';
import type { AuditConfig } from './config';
import { measureAtHeight } from './ray-cast';
import { measureSidebearings, type Sidebearings } from './spacing';
import { measureGlyphStems, type StemStats } from './stems';

export interface HeightReport {
  y: number;
  spans: Array<{ entry: number; exit: number; thickness: number }>;
  coverage: number;
}

export interface MasterMeasurement {
  master: string;
  width: number;
  heights: HeightReport[];
  sidebearings: Pick<Sidebearings, 'left' | 'right'> | null;
  verticalStem: StemStats | null;
  horizontalStem: StemStats | null;
}

/**
 * Ray-cast readings of one glyph. Heights default to the spacing band of the
 * glyph's zone.
 */
export function measureGlyph(font: Font, glyphName: string, config: AuditConfig, masterId?: string, heights?: readonly number[]): MasterMeasurement[] {
  const glyph = font.glyphs.get(glyphName);
  if (!glyph) {
    throw new UsageError(`Unknown glyph name(s): ${glyphName}`);
  }
  if (masterId !== undefined && !font.masters.some((master) => master.id === masterId)) {
    throw new UsageError(`Unknown master id(s): ${masterId}`);
  }

  const results: MasterMeasurement[] = [];
  for (const master of font.masters) {
    const layer = glyph.layers.get(master.id);
    if ((masterId !== undefined && master.id !== masterId) || !layer) {
      continue;
    }
    const paths = decomposeLayer(font, layer, master.id);
    const zone = glyphZone(classifyGlyph(glyph), master);
    const sampleHeights = heights ?? config.sidebearingBand.map((fraction) => zone.bottom + fraction * zone.height);
    const sidebearings = measureSidebearings(font, glyph, master, config);
    const stems = measureGlyphStems(font, glyph, master);

    results.push({
      master: master.id,
      width: layer.width,
      heights: sampleHeights.map((y) => {
        const measurement = measureAtHeight(paths, y, layer.width);
        return {
          y: round(y),
          spans: measurement.spans.map((span) => ({ entry: round(span.entry), exit: round(span.exit), thickness: round(span.thickness) })),
          coverage: round(measurement.coverage, 3),
        };
      }),
      sidebearings: sidebearings ? { left: round(sidebearings.left), right: round(sidebearings.right) } : null,
      verticalStem: stems?.vertical ?? null,
      horizontalStem: stems?.horizontal ?? null,
    });
  }
  return results;
}
