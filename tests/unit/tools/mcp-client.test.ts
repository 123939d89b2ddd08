/**
 * MCP Client Unit Tests
 *
 * Sessions are plain doubles; the SDK transports are mocked so nothing is
 * spawned or dialed.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  AUTH_INFO_KEY,
  ToolError,
  closeBackends,
  connectMCPServers,
  createMCPToolBackend,
  toToolResult,
} from '@/tools/index.js';

import { createFakeBackend, testCredential } from '../../mocks/index.js';

const mocks = vi.hoisted(() => ({
  Client: vi.fn(),
  connect: vi.fn(),
  StdioClientTransport: vi.fn(),
  StreamableHTTPClientTransport: vi.fn(),
}));

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: mocks.Client,
}));

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  StdioClientTransport: mocks.StdioClientTransport,
  getDefaultEnvironment: () => ({ PATH: '/usr/bin' }),
}));

vi.mock('@modelcontextprotocol/sdk/client/streamableHttp.js', () => ({
  StreamableHTTPClientTransport: mocks.StreamableHTTPClientTransport,
}));

function createSession() {
  return {
    listTools: vi.fn(),
    callTool: vi.fn(),
    close: vi.fn(),
  };
}

describe('MCP Client', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.Client.mockImplementation(function () {
      return { connect: mocks.connect };
    });
    mocks.StdioClientTransport.mockImplementation(function () {
      return { kind: 'stdio' };
    });
    mocks.StreamableHTTPClientTransport.mockImplementation(function () {
      return { kind: 'http' };
    });
  });

  describe('toToolResult()', () => {
    it('should keep text parts, structured content and the error flag', () => {
      expect(
        toToolResult({
          content: [
            { type: 'text', text: 'Two events', annotations: { audience: [] } },
            { type: 'image', data: 'AAAA', mimeType: 'image/png' },
          ],
          structuredContent: { events: [] },
          isError: false,
        })
      ).toEqual({
        content: [{ type: 'text', text: 'Two events' }, { type: 'image' }],
        structuredContent: { events: [] },
        isError: false,
      });
    });

    it('should drop null structured content and default missing content', () => {
      expect(toToolResult({ structuredContent: null })).toEqual({ content: [] });
    });

    it('should reject a result that is not a tool result', () => {
      expect(() => toToolResult({ content: 'nope' })).toThrow(ToolError);
      expect(() => toToolResult(null)).toThrow('Malformed tool result');
    });
  });

  describe('createMCPToolBackend()', () => {
    it('should list tools with their input schemas', async () => {
      const session = createSession();
      session.listTools.mockResolvedValueOnce({
        tools: [
          {
            name: 'list_events',
            description: 'List events',
            inputSchema: {
              type: 'object',
              properties: { day: { type: 'string' } },
            },
          },
          { name: 'get_reminders', inputSchema: { type: 'object' } },
        ],
      });

      const tools = await createMCPToolBackend('calendar', session).listTools();

      expect(tools).toEqual([
        {
          name: 'list_events',
          description: 'List events',
          inputSchema: {
            type: 'object',
            properties: { day: { type: 'string' } },
          },
        },
        {
          name: 'get_reminders',
          description: '',
          inputSchema: { type: 'object' },
        },
      ]);
    });

    it('should send the arguments untouched without credentials', async () => {
      const session = createSession();
      session.callTool.mockResolvedValueOnce({
        content: [{ type: 'text', text: 'ok' }],
      });
      const args = { day: 'today' };

      const result = await createMCPToolBackend('calendar', session).callTool(
        'list_events',
        args
      );

      expect(result).toEqual({ content: [{ type: 'text', text: 'ok' }] });
      expect(session.callTool).toHaveBeenCalledWith({
        name: 'list_events',
        arguments: { day: 'today' },
      });
    });

    it('should add credentials under the reserved key on a copy', async () => {
      const session = createSession();
      session.callTool.mockResolvedValueOnce({ content: [] });
      const args = { day: 'today' };

      await createMCPToolBackend('calendar', session).callTool(
        'list_events',
        args,
        { ...testCredential }
      );

      expect(session.callTool).toHaveBeenCalledWith({
        name: 'list_events',
        arguments: { day: 'today', [AUTH_INFO_KEY]: testCredential },
      });
      expect(args).toEqual({ day: 'today' });
    });

    it('should close the session', async () => {
      const session = createSession();

      await createMCPToolBackend('calendar', session).close();

      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('connectMCPServers()', () => {
    it('should connect over stdio and streamable HTTP', async () => {
      mocks.connect.mockResolvedValue(undefined);

      const backends = await connectMCPServers({
        calendar: { command: 'calendar-mcp', args: ['--stdio'], env: { TZ: 'UTC' } },
        reminders: { url: 'https://reminders.example.com/mcp' },
      });

      expect([...backends.keys()]).toEqual(['calendar', 'reminders']);
      expect(mocks.Client).toHaveBeenCalledWith({
        name: 'calendar-agent',
        version: '1.0.0',
      });
      expect(mocks.StdioClientTransport).toHaveBeenCalledWith({
        command: 'calendar-mcp',
        args: ['--stdio'],
        env: { PATH: '/usr/bin', TZ: 'UTC' },
      });
      expect(mocks.StreamableHTTPClientTransport).toHaveBeenCalledWith(
        new URL('https://reminders.example.com/mcp')
      );
      expect(mocks.connect).toHaveBeenNthCalledWith(1, { kind: 'stdio' });
      expect(mocks.connect).toHaveBeenNthCalledWith(2, { kind: 'http' });
    });

    it('should leave out a server that cannot be reached', async () => {
      mocks.connect
        .mockRejectedValueOnce(new Error('spawn calendar-mcp ENOENT'))
        .mockResolvedValueOnce(undefined);

      const backends = await connectMCPServers({
        calendar: { command: 'calendar-mcp', args: [] },
        reminders: { url: 'https://reminders.example.com/mcp' },
      });

      expect([...backends.keys()]).toEqual(['reminders']);
    });
  });

  describe('closeBackends()', () => {
    it('should close every backend even when one fails', async () => {
      const first = createFakeBackend('first', []);
      const second = createFakeBackend('second', []);
      first.close.mockRejectedValueOnce(new Error('already closed'));

      await closeBackends(
        new Map([
          ['first', first],
          ['second', second],
        ])
      );

      expect(first.close).toHaveBeenCalledTimes(1);
      expect(second.close).toHaveBeenCalledTimes(1);
    });
  });
});
