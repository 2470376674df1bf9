import { checkRedisConnection, createRedisClient, shutdownRedis, toKeyValueClient } from '../infra/redis/client.js';
import { logger } from '../utils/logger.js';
import { MemoryHistoryStore } from './memoryHistoryStore.js';
import { RedisHistoryStore } from './redisHistoryStore.js';
import type { HistoryStore } from './types.js';

export type { HistoryStore, KeyValueClient } from './types.js';
export { MemoryHistoryStore } from './memoryHistoryStore.js';
export { RedisHistoryStore } from './redisHistoryStore.js';

/**
 * Redis-backed history when REDIS_URL is set and answers at boot, in-memory otherwise.
 * `close` releases the Redis connection, if one was opened.
 */
export async function createHistoryStore(redisUrl: string): Promise<{ store: HistoryStore; close: () => Promise<void> }> {
  const memory = new MemoryHistoryStore();
  if (!redisUrl) {
    logger.info('history_backend_memory', { reason: 'REDIS_URL not set' });
    return { store: memory, close: async () => {} };
  }

  const redis = createRedisClient(redisUrl);
  const check = await checkRedisConnection(redis);
  if (!check.ok) {
    logger.warn('history_backend_memory', { reason: 'redis_unreachable', error: check.error });
    redis.disconnect();
    return { store: memory, close: async () => {} };
  }

  logger.info('history_backend_redis');
  return {
    store: new RedisHistoryStore(toKeyValueClient(redis), memory),
    close: () => shutdownRedis(redis),
  };
}
