/**
 * Auth & Vault Types
 *
 * SCOPE: caller identity, session tokens, stored third-party credentials
 */

/**
 * Actor Context - who is calling the agent
 * Built by the session middleware for every request
 */
export interface ActorContext {
  type: 'user' | 'anonymous';
  /** Vault-issued identity; 'anonymous' when no valid session token */
  userId: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

export const ANONYMOUS_USER_ID = 'anonymous';

/**
 * Claims carried by a vault-issued session token
 */
export interface SessionClaims {
  sub: string;
  iss: string;
  iat: number;
  exp: number;
}

/**
 * Third-party OAuth credential stored per user.
 * Field names follow the authorized-user format the calendar tool server
 * reads, since the record is forwarded to it verbatim.
 */
export interface CredentialRecord {
  token: string;
  refresh_token: string | null;
  token_uri: string;
  client_id: string;
  client_secret: string;
  scopes: string[];
}

/**
 * Caller's return information, carried through the provider's `state`
 */
export interface AuthorizationState {
  cli_redirect_uri: string;
  cli_state: string | null;
  original_client_id: string | null;
}

export interface BeginAuthorizationParams {
  redirectUri: string;
  state?: string | null;
  clientId?: string | null;
}

export interface CompleteAuthorizationOutput {
  /** Where the browser is sent next: the caller's URI with code and state */
  redirectUrl: string;
  userId: string;
}
