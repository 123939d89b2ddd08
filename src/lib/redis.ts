/**
 * Upstash Redis Client
 * Backing store for the credential vault
 *
 * The client is constructed explicitly at startup and passed down; nothing
 * holds a module-level instance.
 */

import { Redis } from '@upstash/redis';

export interface RedisConfig {
  url: string;
  token: string;
}

/**
 * Create a Redis client.
 * Values are returned exactly as stored; callers own (de)serialization.
 */
export function createRedis(config: RedisConfig): Redis {
  if (config.url.trim() === '') {
    throw new Error('UPSTASH_REDIS_URL is required');
  }
  if (config.token.trim() === '') {
    throw new Error('UPSTASH_REDIS_TOKEN is required');
  }

  return new Redis({
    url: config.url,
    token: config.token,
    automaticDeserialization: false,
  });
}
