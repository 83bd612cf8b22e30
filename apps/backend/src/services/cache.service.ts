import type { Redis as RedisClient } from 'ioredis';
import type { ICacheService, ILogger } from '@everly/types';

/**
 * CacheService
 *
 * Redis-backed implementation of `ICacheService`. Values are stored as JSON
 * strings; tags are Redis sets holding the keys written with that tag, so a
 * single `invalidate(tag)` drops a whole group such as every cached diary list
 * of one user. Namespacing is left to the client's `keyPrefix`.
 */
export class CacheService implements ICacheService {
  private static readonly TAG_PREFIX = 'tag:';

  /**
   * Create a cache service instance.
   *
   * @param redis - Redis client for key-value access
   * @param logger - Logger for invalidation diagnostics
   */
  constructor(
    private readonly redis: RedisClient,
    private readonly logger: ILogger
  ) {}

  /**
   * Retrieve a cached value by key.
   *
   * @param key - Cache key to retrieve
   * @returns Parsed value if found and not expired, null otherwise
   */
  async get<T>(key: string): Promise<T | null> {
    const cached = await this.redis.get(key);
    if (cached === null) {
      return null;
    }
    const parsed: T = JSON.parse(cached);
    return parsed;
  }

  /**
   * Store a value in cache with optional TTL and tags.
   *
   * @param key - Cache key to store under
   * @param value - Value to cache (must be JSON-serializable)
   * @param ttlSeconds - Optional time-to-live in seconds
   * @param tags - Optional tags for group invalidation
   */
  async set<T>(key: string, value: T, ttlSeconds?: number, tags?: string[]): Promise<void> {
    const serialized = JSON.stringify(value);

    if (ttlSeconds) {
      await this.redis.set(key, serialized, 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, serialized);
    }

    for (const tag of tags ?? []) {
      await this.redis.sadd(`${CacheService.TAG_PREFIX}${tag}`, key);
    }
  }

  /**
   * Invalidate all cache entries with a specific tag.
   *
   * @param tag - Tag to match for invalidation
   */
  async invalidate(tag: string): Promise<void> {
    const tagKey = `${CacheService.TAG_PREFIX}${tag}`;
    const members = await this.redis.smembers(tagKey);
    if (members.length > 0) {
      await this.redis.del(...members);
    }
    await this.redis.del(tagKey);
    this.logger.debug({ tag, keys: members.length }, 'Cache invalidated');
  }

  /**
   * Check that Redis answers.
   */
  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn({ error }, 'Redis ping failed');
      return false;
    }
  }
}
