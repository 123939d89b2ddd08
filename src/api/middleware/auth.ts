/**
 * Session Middleware
 * Constructs ActorContext from the bearer session token
 *
 * A missing, expired or forged token is not an error here: the caller is
 * anonymous, and anonymous callers have no stored credential.
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { VaultService } from '@/services/vault.service.js';
import type { ActorContext } from '@/types/index.js';
import { ANONYMOUS_USER_ID } from '@/types/index.js';

/**
 * Session middleware dependencies
 */
interface SessionMiddlewareDeps {
  vault: Pick<VaultService, 'verifySessionToken'>;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice(7).trim();
  return token === '' ? null : token;
}

/**
 * Resolve the caller and attach actor + requestId to the context
 */
export function createSessionMiddleware(deps: SessionMiddlewareDeps) {
  const { vault } = deps;

  return async function sessionMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const token = bearerToken(c.req.header('Authorization'));
    const claims = token ? vault.verifySessionToken(token) : null;

    const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
    const userAgent = c.req.header('user-agent');

    const actor: ActorContext = {
      type: claims ? 'user' : 'anonymous',
      userId: claims ? claims.sub : ANONYMOUS_USER_ID,
      requestId,
      ...(ip !== undefined && { ip }),
      ...(userAgent !== undefined && { userAgent }),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}

/**
 * Create public middleware for routes that don't look at the caller
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return async function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      userId: ANONYMOUS_USER_ID,
      requestId,
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}
