/**
 * OAuth Routes Unit Tests
 *
 * A real vault over the in-memory store; the provider accepts any code.
 */

import { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';

import { createPublicMiddleware } from '@/api/middleware/auth.js';
import { createOAuthRoutes } from '@/api/routes/oauth.js';
import {
  createVaultService,
  type VaultService,
  type VaultStore,
} from '@/services/vault.service.js';

import {
  createFakeOAuthProvider,
  createMemoryVaultStore,
  createUnavailableVaultStore,
  type MemoryVaultStore,
} from '../../mocks/index.js';

const tokenSchema = z.object({
  access_token: z.string(),
  token_type: z.literal('Bearer'),
  expires_in: z.number(),
});

describe('OAuth Routes', () => {
  let store: MemoryVaultStore;
  let oauthProvider: ReturnType<typeof createFakeOAuthProvider>;
  let vault: VaultService;
  let app: Hono;

  function createOAuthApp(vaultService: VaultService) {
    const oauthApp = new Hono();
    oauthApp.use('*', createPublicMiddleware());
    oauthApp.route('/', createOAuthRoutes({ vault: vaultService }));
    return oauthApp;
  }

  function createVault(vaultStore: VaultStore = store) {
    let nextId = 0;
    const ids = ['user-1', 'code-1'];
    return createVaultService({
      store: vaultStore,
      oauthProvider,
      config: {
        jwtSecret: 'test-secret',
        issuer: 'https://agent.example.com',
        sessionTtlSeconds: 3600,
        exchangeCodeTtlSeconds: 300,
      },
      generateId: () => ids[nextId++] ?? `id-${nextId}`,
    });
  }

  async function authorizeState(query: string): Promise<string> {
    const res = await app.request(`/authorize?${query}`);
    const location = res.headers.get('Location') ?? '';
    return new URL(location).searchParams.get('state') ?? '';
  }

  function tokenRequest(code?: string) {
    return app.request('/token', {
      method: 'POST',
      body: new URLSearchParams(code !== undefined ? { code } : {}),
    });
  }

  beforeEach(() => {
    store = createMemoryVaultStore();
    oauthProvider = createFakeOAuthProvider();
    vault = createVault();
    app = createOAuthApp(vault);
  });

  describe('GET /authorize', () => {
    it('should redirect to the provider with the caller parameters in state', async () => {
      const res = await app.request(
        '/authorize?redirect_uri=https%3A%2F%2Fcli.example%2Fcb&state=s1&client_id=client-x'
      );

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toMatch(
        /^https:\/\/accounts\.example\.com\/o\/oauth2\/auth\?state=/
      );
      expect(oauthProvider.authorizationUrl).toHaveBeenCalledTimes(1);
    });

    it('should reject a missing redirect_uri', async () => {
      const res = await app.request('/authorize?state=s1');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Missing or invalid redirect_uri',
        },
      });
    });

    it('should reject a redirect_uri that is not a URL', async () => {
      const res = await app.request('/authorize?redirect_uri=not-a-url');

      expect(res.status).toBe(400);
    });
  });

  describe('GET /auth/callback', () => {
    it('should redirect back to the caller with a one-time code and its state', async () => {
      const state = await authorizeState(
        'redirect_uri=https%3A%2F%2Fcli.example%2Fcb&state=s1'
      );

      const res = await app.request(
        `/auth/callback?code=provider-code&state=${state}`
      );

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(
        'https://cli.example/cb?code=auth_code_code-1&state=s1'
      );
    });

    it('should reject a callback without code', async () => {
      const res = await app.request('/auth/callback?state=abc');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'Missing code' },
      });
    });

    it('should reject undecodable state', async () => {
      const res = await app.request('/auth/callback?code=provider-code&state=junk');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_STATE' },
      });
    });

    it('should report a failed provider exchange as a bad gateway', async () => {
      oauthProvider.exchangeCode.mockRejectedValueOnce(new Error('invalid_grant'));
      const state = await authorizeState(
        'redirect_uri=https%3A%2F%2Fcli.example%2Fcb'
      );

      const res = await app.request(
        `/auth/callback?code=provider-code&state=${state}`
      );

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({
        error: { code: 'OAUTH_PROVIDER_ERROR', message: 'invalid_grant' },
      });
    });

    it('should report an unreachable store as unavailable', async () => {
      app = createOAuthApp(createVault(createUnavailableVaultStore()));
      const state = await authorizeState(
        'redirect_uri=https%3A%2F%2Fcli.example%2Fcb'
      );

      const res = await app.request(
        `/auth/callback?code=provider-code&state=${state}`
      );

      expect(res.status).toBe(503);
    });
  });

  describe('POST /token', () => {
    it('should trade an exchange code for a session token exactly once', async () => {
      const state = await authorizeState(
        'redirect_uri=https%3A%2F%2Fcli.example%2Fcb'
      );
      await app.request(`/auth/callback?code=provider-code&state=${state}`);

      const first = await tokenRequest('auth_code_code-1');

      expect(first.status).toBe(200);
      const body = tokenSchema.parse(await first.json());
      expect(body.expires_in).toBe(3600);
      expect(vault.verifySessionToken(body.access_token)?.sub).toBe('user-1');

      const second = await tokenRequest('auth_code_code-1');
      expect(second.status).toBe(400);
      expect(await second.json()).toMatchObject({
        error: { code: 'INVALID_GRANT', message: 'Invalid code' },
      });
    });

    it('should reject an unknown code', async () => {
      const res = await tokenRequest('auth_code_unknown');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_GRANT' },
      });
    });

    it('should reject a request without code', async () => {
      const res = await tokenRequest();

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'Missing code' },
      });
    });
  });
});
