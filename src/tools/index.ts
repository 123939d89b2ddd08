/**
 * Tool Backend Exports
 *
 * Tools live on MCP servers; this layer connects to them and builds the
 * catalog the model sees.
 */

export { AUTH_INFO_KEY, ToolError } from './types.js';
export type { MCPSession } from './types.js';

export { buildToolCatalog, toToolDefinitions, errorResult } from './catalog.js';
export type { ToolCatalog, ListingFailure } from './catalog.js';

export {
  createMCPToolBackend,
  connectMCPServer,
  connectMCPServers,
  closeBackends,
  toToolResult,
} from './mcp/client.js';
