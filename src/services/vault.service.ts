/**
 * VaultService Implementation
 *
 * Purpose: session tokens, per-user third-party credentials and the
 * one-time exchange codes that turn a browser redirect into a session.
 * Owns: credential:<user_id>, exchange_code:<code>
 * Dependencies: VaultStore (Redis), OAuthProvider
 *
 * Read paths never throw: a missing, expired, malformed or unreachable
 * entry comes back as null.
 */

import jwt from 'jsonwebtoken';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import { createLogger, errorMessage } from '@/lib/logger.js';
import type {
  AuthorizationState,
  BeginAuthorizationParams,
  CompleteAuthorizationOutput,
  CredentialRecord,
  Result,
  SessionClaims,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

const log = createLogger('vault');

const JWT_ALGORITHM = 'HS256';

export const CREDENTIAL_KEY_PREFIX = 'credential:';
export const EXCHANGE_CODE_KEY_PREFIX = 'exchange_code:';
export const EXCHANGE_CODE_PREFIX = 'auth_code_';

/**
 * Key-value storage with TTL
 * Single-key operations only; atomicity is the store's
 */
export interface VaultStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Read and delete in one step */
  getAndDelete(key: string): Promise<string | null>;
}

/**
 * External authorization provider (authorization + token endpoints)
 */
export interface OAuthProvider {
  /** Browser URL for the consent screen, carrying `state` */
  authorizationUrl(state: string): string;

  /** Server-to-server code-for-token exchange */
  exchangeCode(code: string): Promise<CredentialRecord>;
}

export interface VaultConfig {
  jwtSecret: string;
  /** `iss` claim; the server's public URL */
  issuer: string;
  sessionTtlSeconds: number;
  exchangeCodeTtlSeconds: number;
}

export interface VaultServiceDeps {
  store: VaultStore;
  oauthProvider: OAuthProvider;
  config: VaultConfig;
  /** Clock in milliseconds */
  now?: () => number;
  generateId?: () => string;
}

export interface VaultService {
  readonly sessionTtlSeconds: number;

  issueSessionToken(userId: string): string;
  verifySessionToken(token: string): SessionClaims | null;

  storeCredential(userId: string, record: CredentialRecord): Promise<boolean>;
  getCredential(userId: string): Promise<CredentialRecord | null>;

  beginAuthorization(params: BeginAuthorizationParams): string;
  completeAuthorization(
    code: string | null | undefined,
    state: string | null | undefined
  ): Promise<Result<CompleteAuthorizationOutput>>;
  tradeExchangeCode(code: string | null | undefined): Promise<string | null>;
}

const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  iss: z.string(),
  iat: z.number(),
  exp: z.number(),
});

export const credentialRecordSchema = z.object({
  token: z.string().min(1),
  refresh_token: z.string().nullable(),
  token_uri: z.string(),
  client_id: z.string(),
  client_secret: z.string(),
  scopes: z.array(z.string()),
});

const authorizationStateSchema = z.object({
  cli_redirect_uri: z.string().url(),
  cli_state: z.string().nullable().default(null),
  original_client_id: z.string().nullable().default(null),
});

export function credentialKey(userId: string): string {
  return `${CREDENTIAL_KEY_PREFIX}${userId}`;
}

export function exchangeCodeKey(code: string): string {
  return `${EXCHANGE_CODE_KEY_PREFIX}${code}`;
}

/**
 * URL-safe base64 of the JSON, padding kept so strict decoders accept it
 */
export function encodeAuthorizationState(state: AuthorizationState): string {
  return Buffer.from(JSON.stringify(state), 'utf8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

export function decodeAuthorizationState(
  encoded: string
): AuthorizationState | null {
  try {
    const json = Buffer.from(encoded, 'base64url').toString('utf8');
    const parsed = authorizationStateSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function parseCredentialRecord(raw: string): CredentialRecord | null {
  try {
    const parsed = credentialRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Create VaultService instance
 */
export function createVaultService(deps: VaultServiceDeps): VaultService {
  const { store, oauthProvider, config } = deps;
  const now = deps.now ?? Date.now;
  const generateId = deps.generateId ?? (() => nanoid());

  function nowSeconds(): number {
    return Math.floor(now() / 1000);
  }

  function issueSessionToken(userId: string): string {
    const iat = nowSeconds();
    const claims: SessionClaims = {
      sub: userId,
      iss: config.issuer,
      iat,
      exp: iat + config.sessionTtlSeconds,
    };
    return jwt.sign(claims, config.jwtSecret, { algorithm: JWT_ALGORITHM });
  }

  return {
    sessionTtlSeconds: config.sessionTtlSeconds,

    issueSessionToken,

    /**
     * Signature, issuer and expiry check
     */
    verifySessionToken(token: string): SessionClaims | null {
      try {
        const decoded = jwt.verify(token, config.jwtSecret, {
          algorithms: [JWT_ALGORITHM],
          issuer: config.issuer,
          clockTimestamp: nowSeconds(),
        });
        const parsed = sessionClaimsSchema.safeParse(decoded);
        return parsed.success ? parsed.data : null;
      } catch (error) {
        log.debug(`Rejected session token: ${errorMessage(error)}`);
        return null;
      }
    },

    /**
     * Store (or overwrite) a user's credential; refreshes the TTL
     */
    async storeCredential(
      userId: string,
      record: CredentialRecord
    ): Promise<boolean> {
      try {
        await store.set(
          credentialKey(userId),
          JSON.stringify(record),
          config.sessionTtlSeconds
        );
        return true;
      } catch (error) {
        log.error(`Failed to store credential: ${errorMessage(error)}`);
        return false;
      }
    },

    /**
     * Absent means "not yet authorized" or "authorization expired"
     */
    async getCredential(userId: string): Promise<CredentialRecord | null> {
      let raw: string | null;
      try {
        raw = await store.get(credentialKey(userId));
      } catch (error) {
        log.error(`Credential store unavailable: ${errorMessage(error)}`);
        return null;
      }

      if (raw === null) {
        return null;
      }

      const record = parseCredentialRecord(raw);
      if (record === null) {
        log.warn(`Discarding unreadable credential record for ${userId}`);
      }
      return record;
    },

    beginAuthorization(params: BeginAuthorizationParams): string {
      const state: AuthorizationState = {
        cli_redirect_uri: params.redirectUri,
        cli_state: params.state ?? null,
        original_client_id: params.clientId ?? null,
      };
      return oauthProvider.authorizationUrl(encodeAuthorizationState(state));
    },

    /**
     * Provider callback: credential in, exchange code out
     */
    async completeAuthorization(
      code: string | null | undefined,
      state: string | null | undefined
    ): Promise<Result<CompleteAuthorizationOutput>> {
      if (code === null || code === undefined || code === '') {
        return failure('VALIDATION_ERROR', 'Missing code');
      }

      const returnTo = decodeAuthorizationState(state ?? '');
      if (returnTo === null) {
        return failure('INVALID_STATE', 'Invalid or missing state parameter');
      }

      let credential: CredentialRecord;
      try {
        credential = await oauthProvider.exchangeCode(code);
      } catch (error) {
        log.error(`Authorization code exchange failed: ${errorMessage(error)}`);
        return failure('OAUTH_PROVIDER_ERROR', errorMessage(error));
      }

      // Every completed authorization gets a fresh identity
      const userId = generateId();

      try {
        await store.set(
          credentialKey(userId),
          JSON.stringify(credential),
          config.sessionTtlSeconds
        );

        const sessionToken = issueSessionToken(userId);
        const exchangeCode = `${EXCHANGE_CODE_PREFIX}${generateId()}`;
        await store.set(
          exchangeCodeKey(exchangeCode),
          sessionToken,
          config.exchangeCodeTtlSeconds
        );

        const redirect = new URL(returnTo.cli_redirect_uri);
        redirect.searchParams.set('code', exchangeCode);
        if (returnTo.cli_state !== null) {
          redirect.searchParams.set('state', returnTo.cli_state);
        }

        log.info(`Authorization completed for ${userId}`);
        return success({ redirectUrl: redirect.toString(), userId });
      } catch (error) {
        log.error(`Failed to persist authorization: ${errorMessage(error)}`);
        return failure('STORE_UNAVAILABLE', 'Failed to persist authorization');
      }
    },

    /**
     * One-time trade; a consumed or unknown code is null
     */
    async tradeExchangeCode(
      code: string | null | undefined
    ): Promise<string | null> {
      if (code === null || code === undefined || code === '') {
        return null;
      }

      try {
        return await store.getAndDelete(exchangeCodeKey(code));
      } catch (error) {
        log.error(`Exchange code store unavailable: ${errorMessage(error)}`);
        return null;
      }
    },
  };
}
