/**
 * Stream Guard
 *
 * Turns an exception thrown while iterating an event stream into one
 * terminal event, so consumers only ever branch on event types.
 */

import { APIConnectionTimeoutError, APIUserAbortError } from 'openai';

import { errorMessage } from '@/lib/logger.js';
import type {
  ErrorEvent,
  StreamEvent,
  TimeoutEvent,
} from '@/types/index.js';

import { CompletionError } from './errors.js';

function isTimeout(error: unknown): boolean {
  return (
    error instanceof APIConnectionTimeoutError ||
    error instanceof APIUserAbortError ||
    (error instanceof Error && error.name === 'AbortError')
  );
}

export function toTerminalEvent(error: unknown): ErrorEvent | TimeoutEvent {
  const cause = error instanceof CompletionError ? error.cause : error;

  if (isTimeout(cause)) {
    return { type: 'timeout', message: errorMessage(error) };
  }

  const code =
    error instanceof CompletionError ? error.code : 'INTERNAL_ERROR';
  return { type: 'error', code, message: errorMessage(error) };
}

export async function* guardStream(
  source: AsyncIterable<StreamEvent>
): AsyncGenerator<StreamEvent> {
  try {
    yield* source;
  } catch (error) {
    yield toTerminalEvent(error);
  }
}
