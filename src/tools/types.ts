/**
 * Tool Backend Types
 *
 * SCOPE: internal types for the MCP backends and the tool catalog
 */

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';

/**
 * Reserved argument key carrying the caller's credential on the wire.
 * Never part of a tool's advertised input schema.
 */
export const AUTH_INFO_KEY = '__auth_info';

/**
 * The slice of an MCP client session a backend needs
 */
export type MCPSession = Pick<Client, 'listTools' | 'callTool' | 'close'>;

/**
 * Tool error for controlled failures
 */
export class ToolError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}
