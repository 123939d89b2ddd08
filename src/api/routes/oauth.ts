/**
 * OAuth Routes
 *
 * Browser-facing authorization flow plus the code-for-token exchange:
 *   GET  /authorize      client → provider consent screen
 *   GET  /auth/callback  provider → client, with a one-time exchange code
 *   POST /token          exchange code → session token
 */

import { Hono } from 'hono';
import { z } from 'zod';

import { createLogger } from '@/lib/logger.js';
import type { VaultService } from '@/services/vault.service.js';

import { errorResponse } from '../utils/response.js';

const log = createLogger('oauth');

interface OAuthRoutesDeps {
  vault: Pick<
    VaultService,
    | 'beginAuthorization'
    | 'completeAuthorization'
    | 'tradeExchangeCode'
    | 'sessionTtlSeconds'
  >;
}

const authorizeQuerySchema = z.object({
  redirect_uri: z.string().url(),
  state: z.string().optional(),
  client_id: z.string().optional(),
});

/**
 * Create OAuth routes
 */
export function createOAuthRoutes(deps: OAuthRoutesDeps): Hono {
  const { vault } = deps;
  const app = new Hono();

  /**
   * GET /authorize
   * Redirects to the provider's consent screen
   */
  app.get('/authorize', (c) => {
    const requestId = c.get('requestId');
    const parsed = authorizeQuerySchema.safeParse(c.req.query());

    if (!parsed.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'Missing or invalid redirect_uri',
        },
        requestId
      );
    }

    const { redirect_uri, state, client_id } = parsed.data;
    const url = vault.beginAuthorization({
      redirectUri: redirect_uri,
      ...(state !== undefined && { state }),
      ...(client_id !== undefined && { clientId: client_id }),
    });

    return c.redirect(url, 302);
  });

  /**
   * GET /auth/callback
   * Provider redirect target; hands the client a one-time exchange code
   */
  app.get('/auth/callback', async (c) => {
    const requestId = c.get('requestId');
    const code = c.req.query('code');

    if (!code) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Missing code' },
        requestId
      );
    }

    const result = await vault.completeAuthorization(
      code,
      c.req.query('state')
    );
    if (!result.success) {
      log.warn(`Authorization callback failed: ${result.error.message}`);
      return errorResponse(c, result.error, requestId);
    }

    return c.redirect(result.data.redirectUrl, 302);
  });

  /**
   * POST /token
   * Form field `code`; each exchange code works once
   */
  app.post('/token', async (c) => {
    const requestId = c.get('requestId');
    const body = await c.req.parseBody();
    const code = body['code'];

    if (typeof code !== 'string' || code === '') {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Missing code' },
        requestId
      );
    }

    const sessionToken = await vault.tradeExchangeCode(code);
    if (sessionToken === null) {
      return errorResponse(
        c,
        { code: 'INVALID_GRANT', message: 'Invalid code' },
        requestId
      );
    }

    return c.json({
      access_token: sessionToken,
      token_type: 'Bearer',
      expires_in: vault.sessionTtlSeconds,
    });
  });

  return app;
}
