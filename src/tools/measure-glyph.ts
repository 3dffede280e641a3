import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AuditConfig } from '../services/config';
import { loadFontSources } from '../services/file-handler';
import { measureGlyph } from '../services/measure';
import { errorResult, sourcesSchema, textResult } from './responses';

const measureGlyphSchema = z.object({
  sources: sourcesSchema,
  glyphName: z.string().describe('Glyph to measure'),
  masterId: z.string().optional().describe('Master to measure (default: all)'),
  heights: z.array(z.number()).optional().describe('Heights in font units for horizontal rays (default: 25/50/75% of the zone)'),
});

export function registerMeasureGlyphTool(server: McpServer, config: AuditConfig): void {
  server.tool(
    'measure-glyph',
    'Cast horizontal rays through a glyph and report ink spans, coverage, sidebearings and dominant stems',
    measureGlyphSchema.shape,
    async ({ sources, glyphName, masterId, heights }) => {
      try {
        const font = await loadFontSources(sources);
        const measurements = measureGlyph(font, glyphName, config, masterId, heights);

        if (measurements.length === 0) {
          return textResult(`❌ Glyph ${glyphName} has no layer to measure`);
        }

        return textResult(`📏 ${glyphName}\n\n${JSON.stringify(measurements, null, 2)}`);
      } catch (error) {
        return errorResult('measure-glyph', error);
      }
    }
  );
}
