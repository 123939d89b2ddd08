/**
 * Task Routes
 *
 * Minimal JSON task API driving the task bridge. One POST is one turn;
 * follow-up turns name the task they continue.
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { TaskBridge } from '@/orchestrator/task-bridge.js';
import { UnsupportedOperationError } from '@/orchestrator/errors.js';
import type { TaskService } from '@/services/task.service.js';
import type {
  ActorContext,
  ExecutionRequest,
  TaskEvent,
  TaskMessage,
} from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

/**
 * Message max length
 */
const MAX_MESSAGE_LENGTH = 32000;

interface TaskRoutesDeps {
  taskBridge: Pick<TaskBridge, 'execute' | 'cancel'>;
  taskService: TaskService;
}

const sendMessageSchema = z.object({
  message: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH),
  taskId: z.string().min(1).optional(),
  contextId: z.string().min(1).optional(),
});

type SendMessageBody = z.infer<typeof sendMessageSchema>;

function principalOf(actor: ActorContext): string | null {
  return actor.type === 'user' ? actor.userId : null;
}

function taskIdOf(event: TaskEvent): string {
  return event.kind === 'task' ? event.task.id : event.taskId;
}

/**
 * Create task routes
 */
export function createTaskRoutes(deps: TaskRoutesDeps): Hono {
  const { taskBridge, taskService } = deps;
  const app = new Hono();

  /**
   * Turn a request body into an execution request.
   * null when the body names a task that does not exist.
   */
  function toExecutionRequest(
    body: SendMessageBody,
    actor: ActorContext
  ): ExecutionRequest | null {
    const message: TaskMessage = {
      messageId: nanoid(),
      role: 'user',
      parts: [{ kind: 'text', text: body.message }],
    };

    if (body.taskId !== undefined) {
      const existing = taskService.getTask(body.taskId);
      if (!existing) {
        return null;
      }
      const followUp: TaskMessage = {
        ...message,
        taskId: existing.id,
        contextId: existing.contextId,
      };
      const task = taskService.appendMessage(existing.id, followUp);
      if (!task) {
        return null;
      }
      return {
        contextId: task.contextId,
        task,
        message: followUp,
        principal: principalOf(actor),
      };
    }

    const contextId = body.contextId ?? nanoid();
    return {
      contextId,
      message: { ...message, contextId },
      principal: principalOf(actor),
    };
  }

  async function readBody(
    json: () => Promise<unknown>
  ): Promise<SendMessageBody | null> {
    let raw: unknown;
    try {
      raw = await json();
    } catch {
      return null;
    }
    const parsed = sendMessageSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  /**
   * POST /tasks
   * Run one turn and return the resulting task
   */
  app.post('/tasks', async (c) => {
    const actor = c.get('actor');
    const requestId = c.get('requestId');

    const body = await readBody(() => c.req.json());
    if (!body) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: `message is required and must be at most ${MAX_MESSAGE_LENGTH} characters`,
        },
        requestId
      );
    }

    const request = toExecutionRequest(body, actor);
    if (!request) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Task not found' },
        requestId
      );
    }

    let taskId = request.task?.id ?? null;
    const bus = taskService.createEventBus((event) => {
      taskId ??= taskIdOf(event);
    });

    await taskBridge.execute(request, bus);

    const task = taskId !== null ? taskService.getTask(taskId) : null;
    if (!task) {
      return errorResponse(
        c,
        { code: 'INTERNAL_ERROR', message: 'Task was not created' },
        requestId
      );
    }

    return successResponse(c, task, requestId);
  });

  /**
   * POST /tasks/stream
   * Run one turn, streaming task events as SSE
   */
  app.post('/tasks/stream', async (c) => {
    const actor = c.get('actor');
    const requestId = c.get('requestId');

    const body = await readBody(() => c.req.json());
    if (!body) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: `message is required and must be at most ${MAX_MESSAGE_LENGTH} characters`,
        },
        requestId
      );
    }

    const request = toExecutionRequest(body, actor);
    if (!request) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Task not found' },
        requestId
      );
    }

    return streamSSE(c, async (stream) => {
      const bus = taskService.createEventBus(async (event) => {
        await stream.writeSSE({
          data: JSON.stringify(event),
          event: event.kind,
        });
      });
      await taskBridge.execute(request, bus);
    });
  });

  /**
   * GET /tasks/:id
   */
  app.get('/tasks/:id', (c) => {
    const requestId = c.get('requestId');
    const task = taskService.getTask(c.req.param('id'));

    if (!task) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Task not found' },
        requestId
      );
    }

    return successResponse(c, task, requestId);
  });

  /**
   * POST /tasks/:id/cancel
   * Running turns cannot be interrupted
   */
  app.post('/tasks/:id/cancel', async (c) => {
    const requestId = c.get('requestId');
    const task = taskService.getTask(c.req.param('id'));

    if (!task) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Task not found' },
        requestId
      );
    }

    try {
      await taskBridge.cancel({ contextId: task.contextId });
    } catch (error) {
      if (error instanceof UnsupportedOperationError) {
        return errorResponse(
          c,
          { code: error.code, message: error.message },
          requestId
        );
      }
      throw error;
    }

    return successResponse(c, taskService.getTask(task.id), requestId);
  });

  return app;
}
