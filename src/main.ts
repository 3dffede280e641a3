#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadAuditConfig } from './services/config';
import { registerAllTools } from './tools';
import { createLogger } from './utils/logger';

const logger = createLogger('server');

async function main() {
  const config = await loadAuditConfig(process.env.OUTLINE_AUDIT_CONFIG);

  const server = new McpServer({
    name: 'Outline-Audit',
    version: '0.1.0',
    description: 'MCP server for checking interpolation compatibility, kerning and spacing of multi-master fonts',
  });

  registerAllTools(server, config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Listening on stdio');
}

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

main().catch((error: unknown) => {
  logger.error('Startup failed:', error);
  process.exit(1);
});
