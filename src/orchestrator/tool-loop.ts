/**
 * Tool Loop Implementation
 *
 * One orchestration pass: advertise every backend's tools, run a single
 * model turn, then dispatch the requested calls in order. Tool results are
 * emitted as data events; there is no second model turn.
 *
 * Only CompletionError escapes. Listing and dispatch problems become
 * error results.
 */

import { createLogger, errorMessage } from '@/lib/logger.js';
import {
  buildToolCatalog,
  errorResult,
  toToolDefinitions,
} from '@/tools/catalog.js';
import type {
  AssistantToolCall,
  ChatCompletionRequest,
  ChatMessage,
  ChatProvider,
  CredentialPayload,
  ReasoningEffort,
  StreamEvent,
  ToolBackendMap,
  ToolCall,
  ToolCatalogEntry,
  ToolResult,
} from '@/types/index.js';

import { withSystemInstruction } from './prompt-builder.js';

const log = createLogger('tool-loop');

/**
 * Tool Loop configuration
 */
export interface ToolLoopConfig {
  /** Stream the model turn (default) or use a single round trip */
  streaming: boolean;

  /** Additional chat completion attempts */
  retry: number;

  temperature?: number;
  reasoningEffort?: ReasoningEffort;

  /** Agent description at the head of the system instruction */
  description?: string;
}

/**
 * Tool Loop interface
 */
export interface ToolLoop {
  /**
   * Run one pass. Each call returns a fresh, single-use sequence.
   * Credentials are handed to backends only, never to the model.
   */
  run(
    messages: readonly ChatMessage[],
    credentials?: CredentialPayload
  ): AsyncIterable<StreamEvent>;
}

/**
 * Dependencies for tool loop
 */
export interface ToolLoopDeps {
  chatProvider: ChatProvider;
  backends: ToolBackendMap;
  config: ToolLoopConfig;
}

function toAssistantToolCall(call: ToolCall): AssistantToolCall {
  return {
    id: call.id,
    type: 'function',
    function: {
      name: call.name,
      arguments:
        call.kind === 'parsed'
          ? JSON.stringify(call.arguments)
          : call.rawArguments,
    },
  };
}

/**
 * Create a tool loop instance
 */
export function createToolLoop(deps: ToolLoopDeps): ToolLoop {
  const { chatProvider, backends, config } = deps;

  async function dispatch(
    call: ToolCall,
    catalog: ReadonlyMap<string, ToolCatalogEntry>,
    credentials: CredentialPayload | undefined
  ): Promise<ToolResult> {
    if (call.kind === 'malformed') {
      log.warn(`Malformed arguments for ${call.name}: ${call.error}`);
      return errorResult(
        `Error: Invalid arguments for tool ${call.name}: ${call.error}`
      );
    }

    const entry = catalog.get(call.name);
    const backend = entry ? backends.get(entry.backend) : undefined;
    if (!backend) {
      log.warn(`Model requested unknown tool ${call.name}`);
      return errorResult(`Error: Tool ${call.name} not available`);
    }

    try {
      return await backend.callTool(call.name, call.arguments, credentials);
    } catch (error) {
      log.error(
        `Tool ${call.name} on ${backend.name} failed: ${errorMessage(error)}`
      );
      return errorResult(
        `Error calling tool ${call.name}: ${errorMessage(error)}`
      );
    }
  }

  return {
    async *run(
      messages: readonly ChatMessage[],
      credentials?: CredentialPayload
    ): AsyncGenerator<StreamEvent> {
      const conversation = withSystemInstruction(messages, config.description);

      const catalog = await buildToolCatalog(backends);
      for (const failure of catalog.failures) {
        yield {
          type: 'data',
          toolName: failure.backend,
          toolCallId: null,
          result: failure.result,
        };
      }

      const tools = toToolDefinitions(catalog.entries.values());
      log.debug(`Advertising ${tools.length} tool(s)`);

      const request: ChatCompletionRequest = {
        messages: conversation,
        ...(tools.length > 0 && {
          tools,
          toolChoice: 'auto' as const,
          parallelToolCalls: true,
        }),
        ...(config.temperature !== undefined && {
          temperature: config.temperature,
        }),
        ...(config.reasoningEffort && {
          reasoningEffort: config.reasoningEffort,
        }),
        retry: config.retry,
      };

      const turn = config.streaming
        ? chatProvider.stream(request)
        : chatProvider.complete(request);

      let calls: ToolCall[] = [];
      for await (const event of turn) {
        if (event.type === 'done') {
          break;
        }
        if (event.type === 'function_calling') {
          calls = event.calls;
        }
        yield event;
        if (event.type === 'error' || event.type === 'timeout') {
          return;
        }
      }

      if (calls.length > 0) {
        conversation.push({
          role: 'assistant',
          content: null,
          tool_calls: calls.map(toAssistantToolCall),
        });
      }

      for (const call of calls) {
        const result = await dispatch(call, catalog.entries, credentials);
        yield {
          type: 'data',
          toolName: call.name,
          toolCallId: call.id,
          result,
        };
      }

      yield { type: 'done' };
    },
  };
}
