import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import fs from 'fs-extra';
import * as path from 'path';
import { findFontSources } from '../services/file-handler';
import { errorResult, textResult } from './responses';

const listFontSourcesSchema = z.object({
  directory: z.string().describe('Directory to explore'),
});

export function registerListFontSourcesTool(server: McpServer): void {
  server.tool('list-font-sources', 'List font snapshots (.json) and compiled fonts in a directory', listFontSourcesSchema.shape, async ({ directory }) => {
    try {
      if (!(await fs.pathExists(directory))) {
        return textResult(`❌ Directory ${directory} does not exist`);
      }

      const sources = await findFontSources(directory);

      if (sources.length === 0) {
        return textResult(`No font sources found in ${directory}`);
      }

      const fileList = sources.map((file) => `• ${path.basename(file)} (${path.relative(directory, file)})`).join('\n');

      return textResult(`📁 Font sources found in ${directory}:\n\n${fileList}\n\nTotal: ${sources.length} files`);
    } catch (error) {
      return errorResult('list-font-sources', error);
    }
  });
}
