/**
 * AI Orchestrator Exports
 *
 * The orchestrator turns a conversational turn into task events:
 * - Chat provider (OpenAI-compatible, streamed or single round trip)
 * - Tool loop (one model turn, tool dispatch with credential side channel)
 * - Task bridge (task status and artifacts)
 */

export { createOpenAIChatProvider, RETRY_DELAY_MS } from './chat-provider.js';
export type { ChatProviderConfig } from './chat-provider.js';
export { CompletionError, UnsupportedOperationError } from './errors.js';
export {
  AGENT_DESCRIPTION,
  CORE_INSTRUCTIONS,
  buildSystemInstruction,
  withSystemInstruction,
} from './prompt-builder.js';
export { guardStream, toTerminalEvent } from './stream-guard.js';
export { createTiktokenCounter, estimateTokens } from './token-counter.js';
export type { TokenCounter } from './token-counter.js';
export { createToolCallAssembler, parseToolCall } from './tool-calls.js';
export type { ToolCallAssembler, ToolCallFragment } from './tool-calls.js';
export { createToolLoop } from './tool-loop.js';
export type { ToolLoop, ToolLoopConfig, ToolLoopDeps } from './tool-loop.js';
export {
  createTaskBridge,
  historyToMessages,
  WORKING_MESSAGE,
  AUTH_MISSING_MESSAGE,
  NO_RESULT_MESSAGE,
  TEXT_ARTIFACT_NAME,
  DATA_ARTIFACT_NAME,
} from './task-bridge.js';
export type { TaskBridge, TaskBridgeDeps } from './task-bridge.js';
export {
  agentTextMessage,
  createTaskUpdater,
  newTask,
} from './task-updater.js';
export type { TaskUpdater, TaskUpdaterOptions } from './task-updater.js';
