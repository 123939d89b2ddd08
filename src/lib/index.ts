/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createRedis } from './redis.js';
export type { RedisConfig } from './redis.js';
export { loadConfig, mcpServerConfigSchema, mcpServersSchema } from './config.js';
export type { AppConfig, MCPServerConfig } from './config.js';
export {
  createLogger,
  configureLogging,
  errorMessage,
} from './logger.js';
export type { Logger, LogLevel } from './logger.js';
