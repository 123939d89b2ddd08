/**
 * Orchestrator Domain Types
 *
 * SCOPE: chat messages, completion requests, tool calls, stream events
 */

import type { ToolResult } from './tool.js';

// ─────────────────────────────────────────────────────────────
// CONVERSATION
// ─────────────────────────────────────────────────────────────

/**
 * Tool call as recorded in an assistant message (OpenAI wire shape)
 */
export interface AssistantToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

/**
 * Conversation message; order is the model's context
 */
export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: AssistantToolCall[];
    }
  | { role: 'tool'; tool_call_id: string; content: string };

/**
 * Tool definition in function-calling format
 */
export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>; // JSON Schema
  };
}

export type ToolChoice =
  | 'none'
  | 'auto'
  | 'required'
  | { type: 'function'; function: { name: string } };

export type ResponseFormat =
  | { type: 'text' }
  | { type: 'json_object' }
  | {
      type: 'json_schema';
      json_schema: {
        name: string;
        description?: string;
        schema?: Record<string, unknown>;
        strict?: boolean | null;
      };
    };

export type ReasoningEffort = 'low' | 'medium' | 'high';

/**
 * One completion request against a chat provider
 */
export interface ChatCompletionRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  /** Defaults to 'auto' when tools are present */
  toolChoice?: ToolChoice;
  parallelToolCalls?: boolean;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stop?: string | string[];
  responseFormat?: ResponseFormat;
  reasoningEffort?: ReasoningEffort;
  /** Additional attempts after the first one fails */
  retry?: number;
}

// ─────────────────────────────────────────────────────────────
// TOOL CALLS
// ─────────────────────────────────────────────────────────────

interface ToolCallBase {
  /** Position reported by the vendor stream; the only correlation key */
  index: number;
  id: string;
  name: string;
  /** Argument text exactly as assembled from the fragments */
  rawArguments: string;
}

export interface ParsedToolCall extends ToolCallBase {
  kind: 'parsed';
  arguments: Record<string, unknown>;
}

export interface MalformedToolCall extends ToolCallBase {
  kind: 'malformed';
  error: string;
}

/**
 * A fully assembled tool call; malformed arguments are fatal to that call only
 */
export type ToolCall = ParsedToolCall | MalformedToolCall;

// ─────────────────────────────────────────────────────────────
// STREAM EVENTS
// ─────────────────────────────────────────────────────────────

export interface TokenUsage {
  inputTokens: number | null;
  outputTokens: number | null;
}

export interface ContentEvent {
  type: 'content';
  text: string;
}

export interface FunctionCallingEvent {
  type: 'function_calling';
  calls: ToolCall[];
  /** Estimated cost of the calls; advisory */
  outputTokens: number;
}

export interface DataEvent {
  type: 'data';
  /** Tool name, or backend name when listing that backend's tools failed */
  toolName: string;
  /** Call being resolved; null for listing failures */
  toolCallId: string | null;
  result: ToolResult;
}

export interface DoneEvent {
  type: 'done';
  content?: string;
  usage?: TokenUsage;
}

export interface ErrorEvent {
  type: 'error';
  code: string;
  message: string;
}

export interface TimeoutEvent {
  type: 'timeout';
  message: string;
}

export type StreamEvent =
  | ContentEvent
  | FunctionCallingEvent
  | DataEvent
  | DoneEvent
  | ErrorEvent
  | TimeoutEvent;

/**
 * Events that end a stream
 */
export type TerminalStreamEvent = DoneEvent | ErrorEvent | TimeoutEvent;

// ─────────────────────────────────────────────────────────────
// PROVIDER / LOOP CONTRACTS
// ─────────────────────────────────────────────────────────────

/**
 * Chat provider: both modes yield the same event vocabulary
 */
export interface ChatProvider {
  /** Single round trip, synthesized into events */
  complete(request: ChatCompletionRequest): AsyncIterable<StreamEvent>;

  /** Incremental chunks */
  stream(request: ChatCompletionRequest): AsyncIterable<StreamEvent>;
}

/**
 * Opaque credential payload handed to tool backends
 */
export type CredentialPayload = Record<string, unknown>;
