/**
 * Tool Call Assembly
 *
 * Streamed tool calls arrive as fragments correlated only by `index`.
 * Argument fragments are concatenated in arrival order; id and name come
 * from whichever fragment carries them.
 */

import { errorMessage } from '@/lib/logger.js';
import type { ToolCall } from '@/types/index.js';

export interface ToolCallFragment {
  index: number;
  id?: string | null;
  name?: string | null;
  arguments?: string | null;
}

interface PendingToolCall {
  index: number;
  id: string;
  name: string;
  rawArguments: string;
}

export interface ToolCallAssembler {
  add(fragment: ToolCallFragment): void;
  readonly size: number;
  /** Assembled calls in index order, parsed */
  finish(): ToolCall[];
}

/**
 * Parse assembled argument text. Empty text is an empty object;
 * anything that is not a JSON object is malformed.
 */
export function parseToolCall(pending: PendingToolCall): ToolCall {
  const { index, id, name, rawArguments } = pending;

  if (rawArguments.trim() === '') {
    return { kind: 'parsed', index, id, name, rawArguments, arguments: {} };
  }

  let value: unknown;
  try {
    value = JSON.parse(rawArguments);
  } catch (error) {
    return {
      kind: 'malformed',
      index,
      id,
      name,
      rawArguments,
      error: errorMessage(error),
    };
  }

  if (!isPlainObject(value)) {
    return {
      kind: 'malformed',
      index,
      id,
      name,
      rawArguments,
      error: 'Tool arguments must be a JSON object',
    };
  }

  return { kind: 'parsed', index, id, name, rawArguments, arguments: value };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createToolCallAssembler(): ToolCallAssembler {
  // Sparse until every index has been seen
  const pending: Array<PendingToolCall | undefined> = [];

  return {
    add(fragment: ToolCallFragment): void {
      let call = pending[fragment.index];
      if (!call) {
        call = { index: fragment.index, id: '', name: '', rawArguments: '' };
        pending[fragment.index] = call;
      }
      if (fragment.id) {
        call.id = fragment.id;
      }
      if (fragment.name) {
        call.name = fragment.name;
      }
      if (fragment.arguments) {
        call.rawArguments += fragment.arguments;
      }
    },

    get size(): number {
      return pending.filter((call) => call !== undefined).length;
    },

    finish(): ToolCall[] {
      return pending
        .filter((call): call is PendingToolCall => call !== undefined)
        .map(parseToolCall);
    },
  };
}
