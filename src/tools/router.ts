/**
 * @fileoverview Tool routing
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { isSlateTool } from './definitions.js';
import { handleSlateTool, type ToolContext, type ToolResponse } from './handlers.js';

/**
 * Routes a tool call to its handler. Unknown names are a protocol error,
 * not an in-character answer.
 */
export async function routeToolRequest(
  name: string,
  args: Record<string, unknown>,
  context: ToolContext
): Promise<ToolResponse> {
  logger.debug(`Routing tool request: ${name}`, { args });

  if (!isSlateTool(name)) {
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
  return handleSlateTool(context, name, args);
}
