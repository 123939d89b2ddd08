/**
 * Tool Call Assembly Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  createToolCallAssembler,
  parseToolCall,
} from '@/orchestrator/tool-calls.js';

describe('Tool Calls', () => {
  describe('parseToolCall()', () => {
    const pending = { index: 0, id: 'call_1', name: 'list_events' };

    it('should parse an object', () => {
      expect(
        parseToolCall({ ...pending, rawArguments: '{"day":"today"}' })
      ).toEqual({
        kind: 'parsed',
        ...pending,
        rawArguments: '{"day":"today"}',
        arguments: { day: 'today' },
      });
    });

    it('should treat blank text as an empty object', () => {
      expect(parseToolCall({ ...pending, rawArguments: '  ' })).toMatchObject({
        kind: 'parsed',
        arguments: {},
      });
    });

    it('should mark invalid JSON as malformed with the parser message', () => {
      const call = parseToolCall({ ...pending, rawArguments: '{"day":' });

      expect(call.kind).toBe('malformed');
      if (call.kind !== 'malformed') return;
      expect(call.error).not.toBe('');
      expect(call.rawArguments).toBe('{"day":');
    });

    it.each(['[1,2]', '"today"', '42', 'null'])(
      'should mark %s as malformed',
      (rawArguments) => {
        expect(parseToolCall({ ...pending, rawArguments })).toMatchObject({
          kind: 'malformed',
          error: 'Tool arguments must be a JSON object',
        });
      }
    );
  });

  describe('createToolCallAssembler()', () => {
    it('should start empty', () => {
      const assembler = createToolCallAssembler();

      expect(assembler.size).toBe(0);
      expect(assembler.finish()).toEqual([]);
    });

    it('should concatenate argument fragments per index', () => {
      const assembler = createToolCallAssembler();
      assembler.add({ index: 0, id: 'call_1', name: 'list_events' });
      assembler.add({ index: 0, arguments: '{"day"' });
      assembler.add({ index: 0, arguments: ':"today"}' });

      expect(assembler.size).toBe(1);
      expect(assembler.finish()).toEqual([
        {
          kind: 'parsed',
          index: 0,
          id: 'call_1',
          name: 'list_events',
          rawArguments: '{"day":"today"}',
          arguments: { day: 'today' },
        },
      ]);
    });

    it('should take id and name from a later fragment', () => {
      const assembler = createToolCallAssembler();
      assembler.add({ index: 0, arguments: '{}' });
      assembler.add({ index: 0, id: 'call_late', name: 'get_reminders' });

      expect(assembler.finish()[0]).toMatchObject({
        id: 'call_late',
        name: 'get_reminders',
      });
    });

    it('should return calls in index order regardless of arrival', () => {
      const assembler = createToolCallAssembler();
      assembler.add({ index: 2, id: 'c', name: 'third' });
      assembler.add({ index: 0, id: 'a', name: 'first' });
      assembler.add({ index: 1, id: 'b', name: 'second', arguments: null });

      expect(assembler.finish().map((call) => call.id)).toEqual([
        'a',
        'b',
        'c',
      ]);
    });

    it('should skip indices that never arrived', () => {
      const assembler = createToolCallAssembler();
      assembler.add({ index: 3, id: 'd', name: 'fourth' });

      expect(assembler.size).toBe(1);
      expect(assembler.finish().map((call) => call.index)).toEqual([3]);
    });
  });
});
