/**
 * Google OAuth Provider Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  CALENDAR_SCOPES,
  GOOGLE_TOKEN_URI,
  createGoogleOAuthProvider,
} from '@/services/oauth.provider.js';

const mocks = vi.hoisted(() => ({
  OAuth2Client: vi.fn(),
  generateAuthUrl: vi.fn(),
  getToken: vi.fn(),
}));

vi.mock('google-auth-library', () => ({
  OAuth2Client: mocks.OAuth2Client,
}));

describe('Google OAuth Provider', () => {
  const config = {
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    redirectUri: 'https://agent.example.com/auth/callback',
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.OAuth2Client.mockImplementation(function () {
      return {
        generateAuthUrl: mocks.generateAuthUrl,
        getToken: mocks.getToken,
      };
    });
  });

  it('should configure the client with the callback URL', () => {
    createGoogleOAuthProvider(config);

    expect(mocks.OAuth2Client).toHaveBeenCalledWith(config);
  });

  it('should request offline access with consent on every run', () => {
    mocks.generateAuthUrl.mockReturnValueOnce('https://accounts.example.com/auth');

    const url = createGoogleOAuthProvider(config).authorizationUrl('encoded-state');

    expect(url).toBe('https://accounts.example.com/auth');
    expect(mocks.generateAuthUrl).toHaveBeenCalledWith({
      access_type: 'offline',
      include_granted_scopes: true,
      scope: CALENDAR_SCOPES,
      state: 'encoded-state',
      prompt: 'consent',
    });
  });

  it('should map the token response to a credential record', async () => {
    mocks.getToken.mockResolvedValueOnce({
      tokens: {
        access_token: 'test-access-token',
        refresh_token: 'test-refresh-token',
        scope: 'openid https://www.googleapis.com/auth/calendar.events',
      },
    });

    const credential = await createGoogleOAuthProvider(config).exchangeCode(
      'provider-code'
    );

    expect(mocks.getToken).toHaveBeenCalledWith('provider-code');
    expect(credential).toEqual({
      token: 'test-access-token',
      refresh_token: 'test-refresh-token',
      token_uri: GOOGLE_TOKEN_URI,
      client_id: 'test-client-id',
      client_secret: 'test-client-secret',
      scopes: ['openid', 'https://www.googleapis.com/auth/calendar.events'],
    });
  });

  it('should fall back to the requested scopes and a null refresh token', async () => {
    mocks.getToken.mockResolvedValueOnce({
      tokens: { access_token: 'test-access-token' },
    });

    const credential = await createGoogleOAuthProvider({
      ...config,
      scopes: ['scope-a'],
    }).exchangeCode('provider-code');

    expect(credential.refresh_token).toBeNull();
    expect(credential.scopes).toEqual(['scope-a']);
  });

  it('should fail when no access token is issued', async () => {
    mocks.getToken.mockResolvedValueOnce({ tokens: {} });

    await expect(
      createGoogleOAuthProvider(config).exchangeCode('provider-code')
    ).rejects.toThrow('Token response did not include an access token');
  });
});
