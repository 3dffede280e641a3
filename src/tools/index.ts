import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AuditConfig } from '../services/config';
import { registerListFontSourcesTool } from './list-font-sources';
import { registerCheckCompatibilityTool } from './check-compatibility';
import { registerCheckKerningTool } from './check-kerning';
import { registerCheckSpacingTool } from './check-spacing';
import { registerMeasureGlyphTool } from './measure-glyph';
import { registerAuditFontTool } from './audit-font';
import { registerGlyphSvgTool } from './glyph-svg';

export function registerAllTools(server: McpServer, config: AuditConfig): void {
  registerListFontSourcesTool(server);
  registerCheckCompatibilityTool(server, config);
  registerCheckKerningTool(server, config);
  registerCheckSpacingTool(server, config);
  registerMeasureGlyphTool(server, config);
  registerAuditFontTool(server, config);
  registerGlyphSvgTool(server);
}
