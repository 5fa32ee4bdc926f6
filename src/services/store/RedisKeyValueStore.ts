// src/services/store/RedisKeyValueStore.ts

import Redis from 'ioredis';
import { createLogger } from '../../utils/logger';
import { KeyValueStore } from './KeyValueStore';

const logger = createLogger('redis-store');

/**
 * Redis-backed store. Failures are logged and rethrown so callers never
 * mistake a lost write for a saved one.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(private redis: Redis) {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (error) {
      logger.error('[RedisKeyValueStore] Error reading key', { key, error: describe(error) });
      throw error;
    }
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.set(key, value, 'EX', ttlSeconds);
    } catch (error) {
      logger.error('[RedisKeyValueStore] Error writing key', { key, error: describe(error) });
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.redis.del(key);
    } catch (error) {
      logger.error('[RedisKeyValueStore] Error deleting key', { key, error: describe(error) });
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await this.redis.exists(key)) > 0;
    } catch (error) {
      logger.error('[RedisKeyValueStore] Error checking key', { key, error: describe(error) });
      throw error;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
