/**
 * Prompt Builder
 *
 * The agent's fixed system instruction. It is always the first message and
 * cannot be replaced by anything in the conversation.
 */

import type { ChatMessage } from '@/types/index.js';

export const AGENT_DESCRIPTION =
  'A calendar assistant that retrieves your events and reminders for today';

/**
 * Keeps the model to its declared purpose
 */
export const CORE_INSTRUCTIONS =
  'You are not permitted to answer any user questions beyond your primary task, ' +
  'if a user asks you, simply notify them that you do not have sufficient ' +
  'information to answer that question.';

export function buildSystemInstruction(
  description: string = AGENT_DESCRIPTION
): string {
  return `${description}\n${CORE_INSTRUCTIONS}`;
}

/**
 * Prepend the system instruction to a conversation
 */
export function withSystemInstruction(
  messages: readonly ChatMessage[],
  description?: string
): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemInstruction(description) },
    ...messages,
  ];
}
