/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { createLogger } from '@/lib/logger.js';
import type { TaskBridge } from '@/orchestrator/task-bridge.js';
import type { TaskService } from '@/services/task.service.js';
import type { VaultService } from '@/services/vault.service.js';
import type { ToolBackendMap } from '@/types/index.js';

import {
  createPublicMiddleware,
  createSessionMiddleware,
} from './middleware/auth.js';
import { createAgentCardRoutes } from './routes/agent-card.js';
import { createHealthRoutes } from './routes/health.js';
import { createOAuthRoutes } from './routes/oauth.js';
import { createTaskRoutes } from './routes/tasks.js';

const httpLog = createLogger('http');

/**
 * App configuration
 */
interface AppConfig {
  vault: VaultService;
  taskBridge: Pick<TaskBridge, 'execute' | 'cancel'>;
  taskService: TaskService;
  backends: ToolBackendMap;
  serviceName: string;
  agentId: string;
  agentName: string;
  appUrl: string;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { vault, taskBridge, taskService, backends, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger((message, ...rest) => httpLog.info(message, ...rest)));
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (caller identity not needed)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.use('/.well-known/*', publicMiddleware);
  app.use('/authorize', publicMiddleware);
  app.use('/auth/*', publicMiddleware);
  app.use('/token', publicMiddleware);

  app.route(
    '/api/v1',
    createHealthRoutes({ serviceName: config.serviceName, backends })
  );
  app.route(
    '/',
    createAgentCardRoutes({
      agentId: config.agentId,
      agentName: config.agentName,
      appUrl: config.appUrl,
    })
  );
  app.route('/', createOAuthRoutes({ vault }));

  // Task routes resolve the caller from the session token
  const sessionMiddleware = createSessionMiddleware({ vault });
  app.use('/api/v1/tasks/*', sessionMiddleware);
  app.use('/api/v1/tasks', sessionMiddleware);
  app.route('/api/v1', createTaskRoutes({ taskBridge, taskService }));

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    httpLog.error('Unhandled error:', err);
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
