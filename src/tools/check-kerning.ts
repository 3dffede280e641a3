import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AuditConfig } from '../services/config';
import { loadFontSources } from '../services/file-handler';
import { runAudit } from '../services/audit';
import { createLogger } from '../utils/logger';
import { errorResult, masterIdsSchema, sourcesSchema, textResult } from './responses';

const logger = createLogger('check-kerning');

const checkKerningSchema = z.object({
  sources: sourcesSchema,
  masterIds: masterIdsSchema,
});

export function registerCheckKerningTool(server: McpServer, config: AuditConfig): void {
  server.tool(
    'check-kerning',
    'Find kerning pairs missing from masters, changing sign, unusually large or redundant, and letters outside kerning groups',
    checkKerningSchema.shape,
    async ({ sources, masterIds }) => {
      try {
        const font = await loadFontSources(sources);
        const { findings, report } = runAudit(font, { masterIds, checks: ['kerning'], config });
        logger.info(`${sources.join(', ')}: ${findings.length} finding(s)`);
        return textResult(report);
      } catch (error) {
        return errorResult('check-kerning', error);
      }
    }
  );
}
