/**
 * Chat Provider Implementation
 *
 * Wraps the OpenAI SDK (or any OpenAI-compatible endpoint) and reports both
 * request modes as the same event sequence:
 *   content* → function_calling? → done
 *
 * An attempt that fails before yielding anything is retried from scratch;
 * one that fails after output, or exhaustion, throws CompletionError.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsBase,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { createLogger, errorMessage } from '@/lib/logger.js';
import type {
  ChatCompletionRequest,
  ChatMessage,
  ChatProvider,
  StreamEvent,
  TokenUsage,
  ToolCall,
} from '@/types/index.js';

import { CompletionError } from './errors.js';
import { createTiktokenCounter, type TokenCounter } from './token-counter.js';
import { createToolCallAssembler, parseToolCall } from './tool-calls.js';

const log = createLogger('chat-provider');

/** Base cost of a function-calling turn, on top of the argument tokens */
const FUNCTION_CALLING_BASE_TOKENS = 10;

/** Backoff step; retry k waits RETRY_DELAY_MS * (k + 1) */
export const RETRY_DELAY_MS = 500;

export interface ChatProviderConfig {
  apiKey: string;
  /** Base URL override for OpenAI-compatible gateways */
  baseURL?: string;
  model: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  tokenCounter?: TokenCounter;
  delay?: (ms: number) => Promise<void>;
}

type RequestParams = Omit<ChatCompletionCreateParamsBase, 'stream'>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toOpenAIMessage(msg: ChatMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: msg.content,
        ...(msg.tool_calls &&
          msg.tool_calls.length > 0 && {
            tool_calls: msg.tool_calls.map((tc) => ({
              id: tc.id,
              type: 'function' as const,
              function: {
                name: tc.function.name,
                arguments: tc.function.arguments,
              },
            })),
          }),
      };
    case 'tool':
      return {
        role: 'tool',
        content: msg.content,
        tool_call_id: msg.tool_call_id,
      };
  }
}

/**
 * Create a chat provider for an OpenAI-compatible API
 */
export function createOpenAIChatProvider(
  config: ChatProviderConfig
): ChatProvider {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    ...(config.baseURL && { baseURL: config.baseURL }),
    timeout: config.timeout ?? 120000,
    // Retries are ours, see withRetry
    maxRetries: 0,
  });
  const tokenCounter = config.tokenCounter ?? createTiktokenCounter();
  const delay = config.delay ?? sleep;

  function buildParams(request: ChatCompletionRequest): RequestParams {
    const hasTools = request.tools !== undefined && request.tools.length > 0;

    return {
      model: config.model,
      messages: request.messages.map(toOpenAIMessage),
      ...(hasTools && {
        tools: request.tools,
        tool_choice: request.toolChoice ?? 'auto',
        ...(request.parallelToolCalls !== undefined && {
          parallel_tool_calls: request.parallelToolCalls,
        }),
      }),
      ...(request.temperature !== undefined && {
        temperature: request.temperature,
      }),
      ...(request.topP !== undefined && { top_p: request.topP }),
      ...(request.maxTokens !== undefined && {
        max_tokens: request.maxTokens,
      }),
      ...(request.stop !== undefined && { stop: request.stop }),
      ...(request.responseFormat && {
        response_format: request.responseFormat,
      }),
      ...(request.reasoningEffort && {
        reasoning_effort: request.reasoningEffort,
      }),
    };
  }

  /**
   * Trailing events shared by both modes
   */
  function* finish(
    text: string,
    calls: ToolCall[],
    usage: TokenUsage
  ): Generator<StreamEvent> {
    if (calls.length > 0) {
      const outputTokens = calls.reduce(
        (total, call) => total + tokenCounter.count(call.rawArguments),
        FUNCTION_CALLING_BASE_TOKENS
      );
      yield { type: 'function_calling', calls, outputTokens };
    }

    yield {
      type: 'done',
      ...(text !== '' && { content: text }),
      usage,
    };
  }

  async function* withRetry(
    request: ChatCompletionRequest,
    attempt: (request: ChatCompletionRequest) => AsyncGenerator<StreamEvent>
  ): AsyncGenerator<StreamEvent> {
    const retry = Math.max(0, request.retry ?? 0);
    let lastError: unknown;

    for (let k = 0; k <= retry; k++) {
      // Output already forwarded cannot be merged with a retry's output
      let emitted = false;
      try {
        for await (const event of attempt(request)) {
          emitted = true;
          yield event;
        }
        return;
      } catch (error) {
        lastError = error;
        log.warn(
          `Chat completion attempt ${k + 1}/${retry + 1} failed: ${errorMessage(error)}`
        );
        if (emitted) {
          throw new CompletionError(
            `Chat completion failed after partial output: ${errorMessage(error)}`,
            k + 1,
            { cause: error }
          );
        }
        if (k < retry) {
          await delay(RETRY_DELAY_MS * (k + 1));
        }
      }
    }

    throw new CompletionError(
      `Chat completion failed after ${retry + 1} attempt(s): ${errorMessage(lastError)}`,
      retry + 1,
      { cause: lastError }
    );
  }

  async function* streamAttempt(
    request: ChatCompletionRequest
  ): AsyncGenerator<StreamEvent> {
    const stream = await openai.chat.completions.create({
      ...buildParams(request),
      stream: true,
      stream_options: { include_usage: true },
    });

    let text = '';
    const assembler = createToolCallAssembler();
    let usage: TokenUsage = { inputTokens: null, outputTokens: null };

    for await (const chunk of stream) {
      if (chunk.usage) {
        usage = {
          inputTokens: chunk.usage.prompt_tokens,
          outputTokens: chunk.usage.completion_tokens,
        };
      }

      // The usage-only chunk has no choices
      const choice = chunk.choices[0];
      if (!choice) {
        continue;
      }

      const delta = choice.delta;
      if (delta.content) {
        text += delta.content;
        yield { type: 'content', text: delta.content };
      }

      for (const fragment of delta.tool_calls ?? []) {
        assembler.add({
          index: fragment.index,
          id: fragment.id,
          name: fragment.function?.name,
          arguments: fragment.function?.arguments,
        });
      }
    }

    yield* finish(text, assembler.finish(), usage);
  }

  async function* completeAttempt(
    request: ChatCompletionRequest
  ): AsyncGenerator<StreamEvent> {
    const response: ChatCompletion = await openai.chat.completions.create({
      ...buildParams(request),
      stream: false,
    });

    const message = response.choices[0]?.message;
    const content = message?.content ?? '';
    const calls: ToolCall[] = [];

    const format = request.responseFormat;
    if (content !== '') {
      if (format?.type === 'json_schema') {
        calls.push(
          parseToolCall({
            index: 0,
            id: response.id,
            name: format.json_schema.name,
            rawArguments: content,
          })
        );
      } else {
        yield { type: 'content', text: content };
      }
    }

    for (const tc of message?.tool_calls ?? []) {
      calls.push(
        parseToolCall({
          index: calls.length,
          id: tc.id,
          name: tc.function.name,
          rawArguments: tc.function.arguments,
        })
      );
    }

    yield* finish(content, calls, {
      inputTokens: response.usage?.prompt_tokens ?? null,
      outputTokens: response.usage?.completion_tokens ?? null,
    });
  }

  return {
    complete(request: ChatCompletionRequest): AsyncIterable<StreamEvent> {
      return withRetry(request, completeAttempt);
    },

    stream(request: ChatCompletionRequest): AsyncIterable<StreamEvent> {
      return withRetry(request, streamAttempt);
    },
  };
}
