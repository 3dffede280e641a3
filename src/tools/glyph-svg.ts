import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadFontSources } from '../services/file-handler';
import { UsageError } from '../utils/errors';
import { decomposeLayer } from '../utils/geometry';
import { pathDataToSVG, pathsToPathData } from '../utils/svg-utils';
import { errorResult, sourcesSchema, textResult } from './responses';

const glyphSvgSchema = z.object({
  sources: sourcesSchema,
  glyphName: z.string().describe('Glyph to draw'),
  masterId: z.string().optional().describe('Master to draw (default: first master)'),
});

export function registerGlyphSvgTool(server: McpServer): void {
  server.tool('glyph-svg', 'Render the decomposed outline of a glyph layer as SVG', glyphSvgSchema.shape, async ({ sources, glyphName, masterId }) => {
    try {
      const font = await loadFontSources(sources);
      const glyph = font.glyphs.get(glyphName);
      if (!glyph) {
        throw new UsageError(`Unknown glyph name(s): ${glyphName}`);
      }
      const master = masterId === undefined ? font.masters[0] : font.masters.find((candidate) => candidate.id === masterId);
      if (!master) {
        throw new UsageError(`Unknown master id(s): ${masterId}`);
      }
      const layer = glyph.layers.get(master.id);
      if (!layer) {
        return textResult(`❌ Glyph ${glyphName} has no layer for master ${master.id}`);
      }

      const pathData = pathsToPathData(decomposeLayer(font, layer, master.id));
      return textResult(pathDataToSVG(pathData, layer.width, master.metrics));
    } catch (error) {
      return errorResult('glyph-svg', error);
    }
  });
}
