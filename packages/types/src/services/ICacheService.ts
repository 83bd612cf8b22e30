/**
 * Cache handle shared by the process and lent to modules.
 *
 * Backed by Redis when `REDIS_URL` is configured. The cache is optional
 * infrastructure: modules must keep working, uncached, when the handle is
 * absent.
 */
export interface ICacheService {
    /**
     * Read a cached value.
     *
     * @param key - Cache key
     * @returns Parsed value, or null when missing or expired
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a JSON-serializable value.
     *
     * @param key - Cache key
     * @param value - Value to store
     * @param ttlSeconds - Optional time to live
     * @param tags - Optional tags for group invalidation via {@link invalidate}
     */
    set<T>(key: string, value: T, ttlSeconds?: number, tags?: string[]): Promise<void>;

    /**
     * Delete every entry stored with `tag`.
     *
     * @param tag - Tag given to {@link set}
     */
    invalidate(tag: string): Promise<void>;

    /**
     * Check that the cache server answers.
     */
    ping(): Promise<boolean>;
}
