/**
 * Service Layer Exports
 *
 * Services own state: the vault owns credentials and exchange codes in
 * Redis, the task service owns tasks in process memory.
 */

// VaultService
export type {
  VaultService,
  VaultServiceDeps,
  VaultStore,
  VaultConfig,
  OAuthProvider,
} from './vault.service.js';
export {
  createVaultService,
  credentialKey,
  exchangeCodeKey,
  encodeAuthorizationState,
  decodeAuthorizationState,
  CREDENTIAL_KEY_PREFIX,
  EXCHANGE_CODE_KEY_PREFIX,
  EXCHANGE_CODE_PREFIX,
} from './vault.service.js';
export { createVaultStore } from './vault.store.js';
export {
  createGoogleOAuthProvider,
  CALENDAR_SCOPES,
  GOOGLE_TOKEN_URI,
} from './oauth.provider.js';
export type { GoogleOAuthConfig } from './oauth.provider.js';

// TaskService
export type { TaskService, TaskEventListener } from './task.service.js';
export { createTaskService } from './task.service.js';
