import type { ICacheService } from '@everly/types';

/**
 * In-memory ICacheService for tests.
 *
 * Keeps values as JSON strings so cached objects come back as copies, the
 * same way the Redis-backed service behaves. TTLs are recorded but never
 * expire entries.
 */
export class InMemoryCacheService implements ICacheService {
    public readonly entries = new Map<string, string>();
    public readonly ttls = new Map<string, number>();
    private readonly tags = new Map<string, Set<string>>();
    public healthy = true;

    async get<T>(key: string): Promise<T | null> {
        const raw = this.entries.get(key);
        if (raw === undefined) {
            return null;
        }
        const parsed: T = JSON.parse(raw);
        return parsed;
    }

    async set<T>(key: string, value: T, ttlSeconds?: number, tags: string[] = []): Promise<void> {
        this.entries.set(key, JSON.stringify(value));
        if (ttlSeconds) {
            this.ttls.set(key, ttlSeconds);
        }
        for (const tag of tags) {
            const keys = this.tags.get(tag) ?? new Set<string>();
            keys.add(key);
            this.tags.set(tag, keys);
        }
    }

    async invalidate(tag: string): Promise<void> {
        for (const key of this.tags.get(tag) ?? []) {
            this.entries.delete(key);
        }
        this.tags.delete(tag);
    }

    async ping(): Promise<boolean> {
        return this.healthy;
    }
}
