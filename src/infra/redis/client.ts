import { Redis } from 'ioredis';
import { config } from '../../config/index.js';
import type { KeyValueClient } from '../../history/types.js';
import { logger } from '../../utils/logger.js';

/**
 * Redis client for session history.
 *
 * - commandTimeout keeps a stalled server from hanging a history read
 * - retryStrategy backs off up to 3s between reconnects
 * - maxRetriesPerRequest: 1 so a dead server fails fast into the in-memory fallback
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    commandTimeout: config.redisCommandTimeoutMs,
    maxRetriesPerRequest: 1,
    retryStrategy(times: number) {
      return Math.min(times * 100, 3000);
    },
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    logger.warn('redis_error', { err: err.message });
  });
  redis.on('connect', () => {
    logger.info('redis_connected');
  });
  redis.on('reconnecting', () => {
    logger.info('redis_reconnecting');
  });

  return redis;
}

/** Narrows the ioredis surface to the commands the history store issues. */
export function toKeyValueClient(redis: Redis): KeyValueClient {
  return {
    hgetall: key => redis.hgetall(key),
    hget: (key, field) => redis.hget(key, field),
    hset: (key, field, value) => redis.hset(key, field, value),
    hincrby: (key, field, increment) => redis.hincrby(key, field, increment),
    expire: (key, seconds) => redis.expire(key, seconds),
    lpush: (key, value) => redis.lpush(key, value),
    ltrim: (key, start, stop) => redis.ltrim(key, start, stop),
    lrange: (key, start, stop) => redis.lrange(key, start, stop),
    del: (...keys) => redis.del(...keys),
    ping: () => redis.ping(),
  };
}

/**
 * Connects and pings once at boot. A server that is unreachable now is not used
 * for the lifetime of the process; history stays in memory.
 */
export async function checkRedisConnection(redis: Redis): Promise<{ ok: boolean; error?: string }> {
  try {
    await redis.connect();
    const pong = await redis.ping();
    return { ok: pong === 'PONG' };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

export async function shutdownRedis(redis: Redis): Promise<void> {
  try {
    await redis.quit();
  } catch (err) {
    logger.warn('redis_quit_failed', { err: String(err) });
    redis.disconnect();
  }
}
