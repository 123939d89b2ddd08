/**
 * Test Utilities
 * Common helpers for writing tests
 */

import type { Context, Next } from 'hono';

import type { ActorContext } from '@/types/index.js';

/**
 * Drain an event stream into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Async iterable over fixed items
 */
export async function* fromItems<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

/**
 * Async iterable that yields `items` then throws `error`
 */
export async function* failingAfter<T>(
  items: readonly T[],
  error: Error
): AsyncGenerator<T> {
  yield* fromItems(items);
  throw error;
}

/**
 * Middleware that installs a fixed actor, standing in for session lookup
 */
export function actorMiddleware(actor: ActorContext) {
  return async (c: Context, next: Next) => {
    c.set('actor', actor);
    c.set('requestId', actor.requestId);
    await next();
  };
}

export function createTestActor(
  overrides: Partial<ActorContext> = {}
): ActorContext {
  return {
    type: 'user',
    userId: 'user-123',
    requestId: 'req-123',
    ...overrides,
  };
}

/**
 * Event names of an SSE body, in order
 */
export function sseEventNames(body: string): string[] {
  return body
    .split('\n')
    .filter((line) => line.startsWith('event: '))
    .map((line) => line.slice('event: '.length));
}
