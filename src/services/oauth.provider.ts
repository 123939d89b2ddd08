/**
 * Google OAuth Provider
 * Implements OAuthProvider for the calendar scopes
 */

import { OAuth2Client } from 'google-auth-library';

import type { CredentialRecord } from '@/types/index.js';

import type { OAuthProvider } from './vault.service.js';

export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

export const CALENDAR_SCOPES = [
  'https://www.googleapis.com/auth/calendar.events',
];

export interface GoogleOAuthConfig {
  clientId: string;
  clientSecret: string;
  /** This server's callback, e.g. https://agent.example.com/auth/callback */
  redirectUri: string;
  scopes?: string[];
}

export function createGoogleOAuthProvider(
  config: GoogleOAuthConfig
): OAuthProvider {
  const scopes = config.scopes ?? CALENDAR_SCOPES;
  const client = new OAuth2Client({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    redirectUri: config.redirectUri,
  });

  return {
    authorizationUrl(state: string): string {
      return client.generateAuthUrl({
        access_type: 'offline',
        include_granted_scopes: true,
        scope: scopes,
        state,
        // Consent on every run, otherwise no refresh token is issued
        prompt: 'consent',
      });
    },

    async exchangeCode(code: string): Promise<CredentialRecord> {
      const { tokens } = await client.getToken(code);

      if (!tokens.access_token) {
        throw new Error('Token response did not include an access token');
      }

      return {
        token: tokens.access_token,
        refresh_token: tokens.refresh_token ?? null,
        token_uri: GOOGLE_TOKEN_URI,
        client_id: config.clientId,
        client_secret: config.clientSecret,
        scopes: tokens.scope ? tokens.scope.split(' ') : [...scopes],
      };
    },
  };
}
