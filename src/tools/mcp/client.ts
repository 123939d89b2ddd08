/**
 * MCP Client
 *
 * One MCP client session per configured server, opened at process start.
 * Servers are either spawned over stdio or reached over streamable HTTP.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';

import type { MCPServerConfig } from '@/lib/config.js';
import { createLogger, errorMessage } from '@/lib/logger.js';
import type { ToolBackend, ToolInfo, ToolResult } from '@/types/index.js';

import { AUTH_INFO_KEY, ToolError, type MCPSession } from '../types.js';

const log = createLogger('mcp');

const CLIENT_INFO = { name: 'calendar-agent', version: '1.0.0' };

const callToolResultSchema = z.object({
  content: z
    .array(
      z
        .object({ type: z.string(), text: z.string().optional() })
        .passthrough()
    )
    .default([]),
  structuredContent: z.unknown().optional(),
  isError: z.boolean().optional(),
});

/**
 * Normalize a raw MCP tool result
 */
export function toToolResult(raw: unknown): ToolResult {
  const parsed = callToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolError(
      'INVALID_RESULT',
      `Malformed tool result: ${parsed.error.message}`
    );
  }

  const { content, structuredContent, isError } = parsed.data;
  return {
    content: content.map((part) =>
      part.text !== undefined
        ? { type: part.type, text: part.text }
        : { type: part.type }
    ),
    ...(structuredContent !== undefined &&
      structuredContent !== null && { structuredContent }),
    ...(isError !== undefined && { isError }),
  };
}

/**
 * Wrap a connected session as a ToolBackend
 */
export function createMCPToolBackend(
  name: string,
  session: MCPSession
): ToolBackend {
  return {
    name,

    async listTools(): Promise<ToolInfo[]> {
      const { tools } = await session.listTools();
      return tools.map((tool) => ({
        name: tool.name,
        description: tool.description ?? '',
        inputSchema: { ...tool.inputSchema },
      }));
    },

    async callTool(
      toolName: string,
      args: Record<string, unknown>,
      credentials?: Record<string, unknown>
    ): Promise<ToolResult> {
      // Credentials go on a copy so the model-visible arguments stay clean
      const wireArgs = credentials
        ? { ...args, [AUTH_INFO_KEY]: credentials }
        : args;

      const raw = await session.callTool({
        name: toolName,
        arguments: wireArgs,
      });
      return toToolResult(raw);
    },

    async close(): Promise<void> {
      await session.close();
    },
  };
}

function createTransport(config: MCPServerConfig): Transport {
  if ('command' in config) {
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      ...(config.env && {
        env: { ...getDefaultEnvironment(), ...config.env },
      }),
    });
  }
  return new StreamableHTTPClientTransport(new URL(config.url));
}

/**
 * Connect to a single MCP server
 */
export async function connectMCPServer(
  name: string,
  config: MCPServerConfig
): Promise<ToolBackend> {
  const client = new Client(CLIENT_INFO);
  await client.connect(createTransport(config));
  log.info(`Connected to MCP server ${name}`);
  return createMCPToolBackend(name, client);
}

/**
 * Connect to every configured server. A server that cannot be reached is
 * logged and left out.
 */
export async function connectMCPServers(
  servers: Record<string, MCPServerConfig>
): Promise<Map<string, ToolBackend>> {
  const backends = new Map<string, ToolBackend>();

  for (const [name, config] of Object.entries(servers)) {
    try {
      backends.set(name, await connectMCPServer(name, config));
    } catch (error) {
      log.error(`Failed to connect to MCP server ${name}: ${errorMessage(error)}`);
    }
  }

  return backends;
}

/**
 * Close every backend; failures are logged
 */
export async function closeBackends(
  backends: ReadonlyMap<string, ToolBackend>
): Promise<void> {
  for (const backend of backends.values()) {
    try {
      await backend.close();
    } catch (error) {
      log.warn(`Failed to close ${backend.name}: ${errorMessage(error)}`);
    }
  }
}
