/**
 * Core type definitions
 * Shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  ActorContext,
  SessionClaims,
  CredentialRecord,
  AuthorizationState,
  BeginAuthorizationParams,
  CompleteAuthorizationOutput,
} from './auth.js';
export { ANONYMOUS_USER_ID } from './auth.js';
export type {
  AssistantToolCall,
  ChatMessage,
  ToolDefinition,
  ToolChoice,
  ResponseFormat,
  ReasoningEffort,
  ChatCompletionRequest,
  ParsedToolCall,
  MalformedToolCall,
  ToolCall,
  TokenUsage,
  ContentEvent,
  FunctionCallingEvent,
  DataEvent,
  DoneEvent,
  ErrorEvent,
  TimeoutEvent,
  StreamEvent,
  TerminalStreamEvent,
  ChatProvider,
  CredentialPayload,
} from './orchestrator.js';
export type {
  ToolInfo,
  ToolContentPart,
  ToolResult,
  ToolBackend,
  ToolBackendMap,
  ToolCatalogEntry,
} from './tool.js';
export type {
  TaskState,
  Part,
  TaskMessage,
  TaskStatus,
  Artifact,
  Task,
  TaskEvent,
  TaskEventBus,
  ExecutionRequest,
} from './task.js';
export { TERMINAL_TASK_STATES } from './task.js';
