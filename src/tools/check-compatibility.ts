import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AuditConfig } from '../services/config';
import { loadFontSources } from '../services/file-handler';
import { runAudit } from '../services/audit';
import { compatibilityStatus } from '../services/compatibility';
import { createLogger } from '../utils/logger';
import { errorResult, glyphNamesSchema, masterIdsSchema, sourcesSchema, textResult } from './responses';

const logger = createLogger('check-compatibility');

const checkCompatibilitySchema = z.object({
  sources: sourcesSchema,
  glyphNames: glyphNamesSchema,
  masterIds: masterIdsSchema,
});

const STATUS_ICONS = {
  compatible: '✅',
  partial: '⚠️',
  incompatible: '❌',
} as const;

export function registerCheckCompatibilityTool(server: McpServer, config: AuditConfig): void {
  server.tool(
    'check-compatibility',
    'Check that every glyph has interpolation-compatible outlines across masters',
    checkCompatibilitySchema.shape,
    async ({ sources, glyphNames, masterIds }) => {
      try {
        const font = await loadFontSources(sources);
        const { findings, labels, report } = runAudit(font, { glyphNames, masterIds, checks: ['compatibility'], config });
        logger.info(`${sources.join(', ')}: ${labels.length} glyph(s), ${findings.length} finding(s)`);

        const statuses = labels.map((label) => {
          const status = compatibilityStatus(findings.filter((finding) => finding.subject === label.subject));
          return { glyph: label.subject, status };
        });
        const incompatible = statuses.filter(({ status }) => status !== 'compatible');
        const statusList =
          incompatible.length === 0
            ? '✅ All glyphs compatible'
            : incompatible.map(({ glyph, status }) => `${STATUS_ICONS[status]} ${glyph}: ${status}`).join('\n');

        return textResult(`${report}\n\n📊 Status (${statuses.length - incompatible.length}/${statuses.length} compatible):\n${statusList}`);
      } catch (error) {
        return errorResult('check-compatibility', error);
      }
    }
  );
}
