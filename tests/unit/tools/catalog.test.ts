/**
 * Tool Catalog Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  buildToolCatalog,
  errorResult,
  toToolDefinitions,
} from '@/tools/catalog.js';
import type { ToolBackend } from '@/types/index.js';

import { createFakeBackend, toolInfo } from '../../mocks/index.js';

function backendsOf(...backends: ToolBackend[]) {
  return new Map(backends.map((backend) => [backend.name, backend]));
}

describe('Tool Catalog', () => {
  describe('errorResult()', () => {
    it('should build a single-text error result', () => {
      expect(errorResult('Error: Tool x not available')).toEqual({
        content: [{ type: 'text', text: 'Error: Tool x not available' }],
        isError: true,
      });
    });
  });

  describe('buildToolCatalog()', () => {
    it('should key every tool by name with its backend', async () => {
      const catalog = await buildToolCatalog(
        backendsOf(
          createFakeBackend('calendar', [toolInfo('list_events')]),
          createFakeBackend('reminders', [toolInfo('get_reminders')])
        )
      );

      expect([...catalog.entries.entries()]).toEqual([
        ['list_events', { ...toolInfo('list_events'), backend: 'calendar' }],
        ['get_reminders', { ...toolInfo('get_reminders'), backend: 'reminders' }],
      ]);
      expect(catalog.failures).toEqual([]);
    });

    it('should resolve a name collision to the backend registered last', async () => {
      const catalog = await buildToolCatalog(
        backendsOf(
          createFakeBackend('first', [toolInfo('list_events', 'old')]),
          createFakeBackend('second', [toolInfo('list_events', 'new')])
        )
      );

      expect(catalog.entries.size).toBe(1);
      expect(catalog.entries.get('list_events')).toMatchObject({
        backend: 'second',
        description: 'new',
      });
    });

    it('should record a listing failure and continue', async () => {
      const broken = createFakeBackend('broken', []);
      broken.listTools.mockRejectedValueOnce(new Error('server exited'));

      const catalog = await buildToolCatalog(
        backendsOf(broken, createFakeBackend('calendar', [toolInfo('list_events')]))
      );

      expect([...catalog.entries.keys()]).toEqual(['list_events']);
      expect(catalog.failures).toEqual([
        {
          backend: 'broken',
          result: errorResult('Error listing tools: server exited'),
        },
      ]);
    });
  });

  describe('toToolDefinitions()', () => {
    it('should produce function definitions', () => {
      expect(
        toToolDefinitions([{ ...toolInfo('list_events'), backend: 'calendar' }])
      ).toEqual([
        {
          type: 'function',
          function: {
            name: 'list_events',
            description: 'list_events tool',
            parameters: { type: 'object', properties: {} },
          },
        },
      ]);
    });
  });
});
