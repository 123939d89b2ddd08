/**
 * API Layer Exports
 *
 * API layer is thin - delegates to the vault, the task bridge and the task
 * store for all behavior.
 */

export { createApp } from './app.js';
export type { ErrorResponse, SuccessResponse } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
