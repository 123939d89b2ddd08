/**
 * Token Counter
 * Advisory token estimates for function-calling output
 */

import { encoding_for_model, type Tiktoken } from '@dqbd/tiktoken';

import { createLogger, errorMessage } from '@/lib/logger.js';

const log = createLogger('tokens');

export interface TokenCounter {
  count(text: string): number;
}

/**
 * Rough estimate when no encoder is available
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * tiktoken-backed counter; the encoder is created on first use
 */
export function createTiktokenCounter(): TokenCounter {
  let encoder: Tiktoken | null = null;
  let unavailable = false;

  function getEncoder(): Tiktoken | null {
    if (encoder === null && !unavailable) {
      try {
        encoder = encoding_for_model('gpt-4o');
      } catch (error) {
        unavailable = true;
        log.warn(`tiktoken unavailable, estimating: ${errorMessage(error)}`);
      }
    }
    return encoder;
  }

  return {
    count(text: string): number {
      if (text === '') {
        return 0;
      }
      const enc = getEncoder();
      return enc ? enc.encode(text).length : estimateTokens(text);
    },
  };
}
