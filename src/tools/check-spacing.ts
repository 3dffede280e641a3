import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { resolveAuditConfig, type AuditConfig } from '../services/config';
import { loadFontSources } from '../services/file-handler';
import { runAudit } from '../services/audit';
import { createLogger } from '../utils/logger';
import { errorResult, glyphNamesSchema, masterIdsSchema, sourcesSchema, textResult } from './responses';

const logger = createLogger('check-spacing');

const checkSpacingSchema = z.object({
  sources: sourcesSchema,
  glyphNames: glyphNamesSchema,
  masterIds: masterIdsSchema,
  stemToleranceRatio: z.number().optional().describe('Tolerance as a share of the reference stem (default: 0.1)'),
  minSpacingTolerance: z.number().optional().describe('Smallest tolerance in font units (default: 5)'),
  referenceRatioBand: z.tuple([z.number(), z.number()]).optional().describe('Accepted straight/round sidebearing ratio (default: [1.2, 2.0])'),
});

export function registerCheckSpacingTool(server: McpServer, config: AuditConfig): void {
  server.tool(
    'check-spacing',
    'Compare sidebearings within spacing groups, symmetric glyphs and straight/round ratios',
    checkSpacingSchema.shape,
    async ({ sources, glyphNames, masterIds, stemToleranceRatio, minSpacingTolerance, referenceRatioBand }) => {
      try {
        const tuned = resolveAuditConfig({ stemToleranceRatio, minSpacingTolerance, referenceRatioBand }, config);
        const font = await loadFontSources(sources);
        const { findings, report } = runAudit(font, { glyphNames, masterIds, checks: ['spacing'], config: tuned });
        logger.info(`${sources.join(', ')}: ${findings.length} finding(s)`);
        return textResult(report);
      } catch (error) {
        return errorResult('check-spacing', error);
      }
    }
  );
}
