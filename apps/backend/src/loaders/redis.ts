import { Redis } from 'ioredis';
import { logger } from '../lib/logger.js';

/**
 * Create the process's Redis client.
 *
 * Every key the client touches is prefixed with `<namespace>:`. The client
 * connects lazily; call `connect()` before handing it to the cache service so
 * a bad URL fails at startup instead of on the first request.
 *
 * @param url - Redis connection URL
 * @param namespace - Key namespace, e.g. `everly`
 */
export function createRedisClient(url: string, namespace: string): Redis {
  const instance = new Redis(url, {
    keyPrefix: `${namespace}:`,
    lazyConnect: true,
    maxRetriesPerRequest: 3
  });

  instance.on('connect', () => logger.info('Redis connected'));
  instance.on('error', (error: Error) => logger.error({ error }, 'Redis error'));

  return instance;
}

export async function disconnectRedis(client: Redis): Promise<void> {
  await client.quit();
}
