/**
 * TaskService Implementation
 *
 * Purpose: in-memory task store for the HTTP task API. Applies the events
 * the task bridge publishes and fans them out to per-request listeners.
 * Owns: tasks (process memory only)
 */

import { createLogger } from '@/lib/logger.js';
import type {
  Task,
  TaskEvent,
  TaskEventBus,
  TaskMessage,
} from '@/types/index.js';
import { TERMINAL_TASK_STATES } from '@/types/index.js';

const log = createLogger('tasks');

export type TaskEventListener = (event: TaskEvent) => void | Promise<void>;

export interface TaskService {
  getTask(taskId: string): Task | null;

  /** Record a follow-up user message on an existing task */
  appendMessage(taskId: string, message: TaskMessage): Task | null;

  /**
   * Event bus that updates the store, then notifies `listener`
   */
  createEventBus(listener?: TaskEventListener): TaskEventBus;
}

export function createTaskService(): TaskService {
  const tasks = new Map<string, Task>();

  function apply(event: TaskEvent): void {
    if (event.kind === 'task') {
      tasks.set(event.task.id, structuredClone(event.task));
      return;
    }

    const task = tasks.get(event.taskId);
    if (!task) {
      log.warn(`Dropping ${event.kind} for unknown task ${event.taskId}`);
      return;
    }

    switch (event.kind) {
      case 'status-update': {
        task.status = structuredClone(event.status);
        // The agent's final word for the turn becomes part of the history
        if (
          event.status.message &&
          TERMINAL_TASK_STATES.includes(event.status.state)
        ) {
          task.history.push(structuredClone(event.status.message));
        }
        return;
      }
      case 'artifact-update':
        task.artifacts.push(structuredClone(event.artifact));
        return;
    }
  }

  return {
    getTask(taskId: string): Task | null {
      const task = tasks.get(taskId);
      return task ? structuredClone(task) : null;
    },

    appendMessage(taskId: string, message: TaskMessage): Task | null {
      const task = tasks.get(taskId);
      if (!task) {
        return null;
      }
      task.history.push(structuredClone(message));
      return structuredClone(task);
    },

    createEventBus(listener?: TaskEventListener): TaskEventBus {
      return {
        async publish(event: TaskEvent): Promise<void> {
          apply(event);
          if (listener) {
            await listener(event);
          }
        },
      };
    },
  };
}
