export { slateTools, getTools, isSlateTool } from './definitions.js';
export type { SlateToolName } from './definitions.js';
export { handleSlateTool } from './handlers.js';
export type { ToolContext, ToolResponse } from './handlers.js';
export { routeToolRequest } from './router.js';
