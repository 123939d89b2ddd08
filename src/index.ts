/**
 * Calendar Agent Entry Point
 *
 * Wires together configuration, the vault, the MCP backends and the
 * orchestrator, then starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import {
  createLogger,
  createRedis,
  errorMessage,
  loadConfig,
  type AppConfig,
} from './lib/index.js';
import {
  createOpenAIChatProvider,
  createTaskBridge,
  createToolLoop,
} from './orchestrator/index.js';
import {
  createGoogleOAuthProvider,
  createTaskService,
  createVaultService,
  createVaultStore,
} from './services/index.js';
import { closeBackends, connectMCPServers } from './tools/index.js';

const log = createLogger('server');

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    log.error(errorMessage(error));
    process.exit(1);
  }
}

const config = loadConfigOrExit();

// Vault: Redis-backed credentials, Google as the authorization provider
const redis = createRedis(config.redis);
const vault = createVaultService({
  store: createVaultStore(redis),
  oauthProvider: createGoogleOAuthProvider({
    clientId: config.google.clientId,
    clientSecret: config.google.clientSecret,
    redirectUri: `${config.appUrl}/auth/callback`,
  }),
  config: {
    jwtSecret: config.vault.jwtSecret,
    issuer: config.appUrl,
    sessionTtlSeconds: config.vault.sessionTtlSeconds,
    exchangeCodeTtlSeconds: config.vault.exchangeCodeTtlSeconds,
  },
});

// Tool backends are connected once and read-only afterwards
const backends = await connectMCPServers(config.mcpServers);
if (backends.size === 0) {
  log.warn('No MCP servers connected; the agent has no tools');
}

const chatProvider = createOpenAIChatProvider({
  apiKey: config.llm.apiKey,
  ...(config.llm.baseURL !== undefined && { baseURL: config.llm.baseURL }),
  model: config.llm.model,
});

const toolLoop = createToolLoop({
  chatProvider,
  backends,
  config: {
    streaming: config.llm.streaming,
    retry: config.llm.retry,
  },
});

const taskBridge = createTaskBridge({ vault, toolLoop });
const taskService = createTaskService();

const app = createApp({
  vault,
  taskBridge,
  taskService,
  backends,
  serviceName: config.serviceName,
  agentId: config.agentId,
  agentName: config.agentName,
  appUrl: config.appUrl,
  allowedOrigins: config.allowedOrigins,
});

const server = serve({
  fetch: app.fetch,
  hostname: config.host,
  port: config.port,
});

log.info(
  `${config.agentName} listening on http://${config.host}:${config.port}`
);
log.info(`Public URL: ${config.appUrl}`);

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info(`${signal} received, shutting down`);

  server.close();
  await closeBackends(backends);
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    });
  });
}

export { app };
