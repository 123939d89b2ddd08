/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { ToolBackendMap } from '@/types/index.js';

interface HealthRoutesDeps {
  serviceName: string;
  backends: ToolBackendMap;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const { serviceName, backends } = deps;
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: serviceName,
      toolBackends: [...backends.keys()],
      timestamp: new Date().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
