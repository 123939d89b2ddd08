/**
 * Task Updater
 * Publishes status and artifact events for one task
 */

import { nanoid } from 'nanoid';

import { createLogger } from '@/lib/logger.js';
import type {
  Part,
  Task,
  TaskEventBus,
  TaskMessage,
  TaskState,
} from '@/types/index.js';
import { TERMINAL_TASK_STATES } from '@/types/index.js';

const log = createLogger('task-updater');

export interface TaskUpdaterOptions {
  generateId?: () => string;
  now?: () => Date;
}

export interface TaskUpdater {
  /** True once a terminal status has been published */
  readonly finished: boolean;

  updateStatus(state: TaskState, text?: string): Promise<void>;
  addArtifact(name: string, parts: Part[]): Promise<void>;
}

export function agentTextMessage(
  text: string,
  contextId: string,
  taskId: string,
  generateId: () => string = () => nanoid()
): TaskMessage {
  return {
    messageId: generateId(),
    role: 'agent',
    parts: [{ kind: 'text', text }],
    taskId,
    contextId,
  };
}

/**
 * New task for a first inbound message
 */
export function newTask(
  message: TaskMessage,
  contextId: string,
  generateId: () => string = () => nanoid(),
  now: () => Date = () => new Date()
): Task {
  const id = message.taskId ?? generateId();
  const resolvedContextId = message.contextId ?? contextId;

  return {
    id,
    contextId: resolvedContextId,
    status: { state: 'submitted', timestamp: now().toISOString() },
    history: [{ ...message, taskId: id, contextId: resolvedContextId }],
    artifacts: [],
  };
}

export function createTaskUpdater(
  bus: TaskEventBus,
  task: Pick<Task, 'id' | 'contextId'>,
  options: TaskUpdaterOptions = {}
): TaskUpdater {
  const generateId = options.generateId ?? (() => nanoid());
  const now = options.now ?? (() => new Date());
  let finished = false;

  return {
    get finished(): boolean {
      return finished;
    },

    async updateStatus(state: TaskState, text?: string): Promise<void> {
      if (finished) {
        log.warn(`Ignoring ${state} for finished task ${task.id}`);
        return;
      }

      const final = TERMINAL_TASK_STATES.includes(state);
      if (final) {
        finished = true;
      }

      await bus.publish({
        kind: 'status-update',
        taskId: task.id,
        contextId: task.contextId,
        status: {
          state,
          ...(text !== undefined && {
            message: agentTextMessage(
              text,
              task.contextId,
              task.id,
              generateId
            ),
          }),
          timestamp: now().toISOString(),
        },
        final,
      });
    },

    async addArtifact(name: string, parts: Part[]): Promise<void> {
      await bus.publish({
        kind: 'artifact-update',
        taskId: task.id,
        contextId: task.contextId,
        artifact: { artifactId: generateId(), name, parts },
      });
    },
  };
}
