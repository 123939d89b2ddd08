/**
 * VaultService Store Adapter
 * Implements VaultStore using Upstash Redis
 */

import type { Redis } from '@upstash/redis';

import type { VaultStore } from './vault.service.js';

export function createVaultStore(redis: Redis): VaultStore {
  return {
    async get(key: string): Promise<string | null> {
      return redis.get<string>(key);
    },

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
      await redis.set(key, value, { ex: ttlSeconds });
    },

    async getAndDelete(key: string): Promise<string | null> {
      return redis.getdel<string>(key);
    },
  };
}
