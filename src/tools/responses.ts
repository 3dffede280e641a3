import { z } from 'zod';
import { UsageError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('tools');

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const sourcesSchema = z.array(z.string()).min(1).describe('One .json snapshot, or one .ttf/.otf/.woff file per master');
export const glyphNamesSchema = z.array(z.string()).optional().describe('Glyphs to analyse (default: all)');
export const masterIdsSchema = z.array(z.string()).optional().describe('Masters to analyse (default: all)');

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(tool: string, error: unknown): ToolResult {
  if (error instanceof UsageError) {
    logger.warn(`${tool}: ${error.message}`);
    return { content: [{ type: 'text', text: `❌ ${error.message}` }], isError: true };
  }
  logger.error(`${tool} failed:`, error);
  return { content: [{ type: 'text', text: `❌ Error: ${describeError(error)}` }] };
}
