import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AuditConfig } from '../services/config';
import { loadFontSources } from '../services/file-handler';
import { runAudit } from '../services/audit';
import { CHECK_IDS, SEVERITY_NAMES } from '../types/findings';
import { createLogger } from '../utils/logger';
import { errorResult, glyphNamesSchema, masterIdsSchema, sourcesSchema, textResult } from './responses';

const logger = createLogger('audit-font');

const auditFontSchema = z.object({
  sources: sourcesSchema,
  glyphNames: glyphNamesSchema,
  masterIds: masterIdsSchema,
  checks: z
    .array(z.enum(CHECK_IDS))
    .optional()
    .describe('Checks to run (default: all)'),
});

export function registerAuditFontTool(server: McpServer, config: AuditConfig): void {
  server.tool(
    'audit-font',
    'Run every consistency check and return the report plus one severity label per glyph and kerning pair',
    auditFontSchema.shape,
    async ({ sources, glyphNames, masterIds, checks }) => {
      try {
        const font = await loadFontSources(sources);
        logger.info(`Auditing ${sources.join(', ')}: ${font.masters.length} master(s), ${font.glyphs.size} glyph(s)`);
        const { findings, labels, report } = runAudit(font, { glyphNames, masterIds, checks, config });
        logger.info(`${findings.length} finding(s), ${labels.length} label(s)`);

        const labelJson = JSON.stringify(
          labels.map((label) => ({ ...label, name: SEVERITY_NAMES[label.severity] })),
          null,
          2
        );

        return textResult(`${report}\n\n🏷️ Labels:\n${labelJson}`);
      } catch (error) {
        return errorResult('audit-font', error);
      }
    }
  );
}
