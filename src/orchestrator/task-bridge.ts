/**
 * Task Bridge
 *
 * Runs one inbound turn through the tool loop and reports it as task
 * events: submitted → working → completed | failed.
 *
 * A turn that fails for any reason ends the task as failed. A turn that
 * produced no tool results publishes no terminal status of its own.
 */

import { nanoid } from 'nanoid';

import { createLogger, errorMessage } from '@/lib/logger.js';
import type { VaultService } from '@/services/vault.service.js';
import type {
  ChatMessage,
  ExecutionRequest,
  Task,
  TaskEventBus,
  TaskMessage,
  ToolResult,
} from '@/types/index.js';
import { ANONYMOUS_USER_ID } from '@/types/index.js';

import { UnsupportedOperationError } from './errors.js';
import { guardStream } from './stream-guard.js';
import type { ToolLoop } from './tool-loop.js';
import {
  createTaskUpdater,
  newTask,
  type TaskUpdater,
} from './task-updater.js';

const log = createLogger('task-bridge');

export const WORKING_MESSAGE =
  "I'm retrieving your calendar events and reminders...";

export const AUTH_MISSING_MESSAGE =
  'Authentication missing or expired. Please run the client with --profile to login.';

export const NO_RESULT_MESSAGE = 'No result from tool';

export const TEXT_ARTIFACT_NAME = 'Text Response';
export const DATA_ARTIFACT_NAME = 'Calendar Events Data';

export interface TaskBridgeDeps {
  vault: Pick<VaultService, 'getCredential'>;
  toolLoop: ToolLoop;
  generateId?: () => string;
  now?: () => Date;
}

export interface TaskBridge {
  /** Context ids with a turn in progress */
  readonly activeContexts: ReadonlySet<string>;

  execute(request: ExecutionRequest, bus: TaskEventBus): Promise<void>;

  /**
   * Always throws UnsupportedOperationError; running work is not interrupted
   */
  cancel(request: Pick<ExecutionRequest, 'contextId'>): Promise<void>;
}

function messageText(message: TaskMessage, separator: string): string {
  return message.parts
    .flatMap((part) => (part.kind === 'text' ? [part.text] : []))
    .join(separator);
}

/**
 * Task history as model conversation; empty messages are dropped
 */
export function historyToMessages(
  history: readonly TaskMessage[]
): ChatMessage[] {
  const messages: ChatMessage[] = [];

  for (const message of history) {
    const content = messageText(message, ' ');
    if (content.trim() === '') {
      continue;
    }
    messages.push(
      message.role === 'agent'
        ? { role: 'assistant', content }
        : { role: 'user', content }
    );
  }

  return messages;
}

function toolResultText(result: ToolResult): string {
  return result.content
    .flatMap((part) =>
      part.type === 'text' && part.text !== undefined ? [part.text] : []
    )
    .join(' ');
}

/**
 * Publish the artifact for one tool result and return its summary line
 */
async function reportToolResult(
  updater: TaskUpdater,
  toolName: string,
  result: ToolResult
): Promise<string> {
  const structured = result.structuredContent;
  if (structured !== undefined && structured !== null) {
    await updater.addArtifact(DATA_ARTIFACT_NAME, [
      { kind: 'data', data: { [toolName]: structured } },
    ]);
    return `Retrieved calendar events: ${JSON.stringify(structured)}`;
  }

  const text = toolResultText(result);
  if (text.trim() === '') {
    return NO_RESULT_MESSAGE;
  }

  await updater.addArtifact(TEXT_ARTIFACT_NAME, [
    { kind: 'text', text: `${toolName}: ${text}` },
  ]);
  return text.trim();
}

/**
 * Create a task bridge instance
 */
export function createTaskBridge(deps: TaskBridgeDeps): TaskBridge {
  const { vault, toolLoop } = deps;
  const generateId = deps.generateId ?? (() => nanoid());
  const now = deps.now ?? (() => new Date());
  const activeContexts = new Set<string>();

  async function runTurn(
    request: ExecutionRequest,
    task: Task,
    updater: TaskUpdater
  ): Promise<void> {
    const userId = request.principal || ANONYMOUS_USER_ID;
    log.debug(`Task ${task.id} for ${userId}`);

    await updater.updateStatus('working', WORKING_MESSAGE);

    const credential = await vault.getCredential(userId);
    if (!credential) {
      log.warn(`No credentials found for user ${userId}`);
      await updater.updateStatus('failed', AUTH_MISSING_MESSAGE);
      return;
    }

    const messages = historyToMessages(task.history);
    const input = request.message ? messageText(request.message, '\n') : '';
    if (messages.length === 0 && input.trim() !== '') {
      messages.push({ role: 'user', content: input });
    }

    const summaries: string[] = [];

    for await (const event of guardStream(
      toolLoop.run(messages, { ...credential })
    )) {
      switch (event.type) {
        case 'content':
          if (event.text !== '') {
            await updater.updateStatus('working', event.text);
            await updater.addArtifact(TEXT_ARTIFACT_NAME, [
              { kind: 'text', text: event.text },
            ]);
          }
          break;
        case 'data':
          summaries.push(
            await reportToolResult(updater, event.toolName, event.result)
          );
          break;
        case 'error':
        case 'timeout':
          log.error(`Task ${task.id} failed: ${event.message}`);
          await updater.updateStatus('failed', event.message);
          return;
        case 'function_calling':
        case 'done':
          break;
      }
    }

    // Without tool results the turn ends on what content already published
    if (summaries.length > 0) {
      await updater.updateStatus('completed', summaries.join('\n'));
    }
  }

  return {
    activeContexts,

    async execute(request: ExecutionRequest, bus: TaskEventBus): Promise<void> {
      const task =
        request.task ??
        (request.message
          ? newTask(request.message, request.contextId, generateId, now)
          : undefined);
      if (!task) {
        log.error('No task available and no message to create task from');
        return;
      }
      if (!request.task) {
        try {
          await bus.publish({ kind: 'task', task });
        } catch (error) {
          log.error(`Task ${task.id} not published: ${errorMessage(error)}`);
          return;
        }
      }

      const updater = createTaskUpdater(bus, task, { generateId, now });
      activeContexts.add(task.contextId);

      try {
        await runTurn(request, task, updater);
      } catch (error) {
        log.error(`Task ${task.id} crashed: ${errorMessage(error)}`);
        if (!updater.finished) {
          await updater
            .updateStatus('failed', errorMessage(error))
            .catch((publishError: unknown) => {
              log.error(
                `Task ${task.id} failure status not published: ${errorMessage(publishError)}`
              );
            });
        }
      } finally {
        activeContexts.delete(task.contextId);
      }
    },

    cancel(request: Pick<ExecutionRequest, 'contextId'>): Promise<void> {
      if (activeContexts.delete(request.contextId)) {
        log.info(
          `Cancellation requested for active context ${request.contextId}`
        );
      } else {
        log.debug(
          `Cancellation requested for inactive context ${request.contextId}`
        );
      }
      return Promise.reject(new UnsupportedOperationError('cancel'));
    },
  };
}
