/**
 * Orchestrator Errors
 */

import type { ErrorCode } from '@/types/index.js';

/**
 * Chat completion failed after every attempt
 */
export class CompletionError extends Error {
  public readonly code: ErrorCode = 'LLM_CHAT_COMPLETION_ERROR';

  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CompletionError';
  }
}

export class UnsupportedOperationError extends Error {
  public readonly code: ErrorCode = 'UNSUPPORTED_OPERATION';

  constructor(operation: string) {
    super(`Operation not supported: ${operation}`);
    this.name = 'UnsupportedOperationError';
  }
}
