/**
 * In-Memory Cache Adapter
 *
 * Process-local cache with TTL expiry. Values are returned by reference.
 */

import { ICachePort } from '../../domain/ports/ICachePort';

interface CacheEntry<V> {
    value: V;
    expiresAt: number | null; // null = no expiry
}

export class InMemoryCacheAdapter<V> implements ICachePort<V> {
    private cache: Map<string, CacheEntry<V>> = new Map();

    constructor(private readonly now: () => number = Date.now) { }

    async get(key: string): Promise<V | null> {
        const entry = this.cache.get(key);

        if (!entry) {
            return null;
        }

        if (entry.expiresAt !== null && this.now() > entry.expiresAt) {
            this.cache.delete(key);
            return null;
        }

        return entry.value;
    }

    async set(key: string, value: V, ttlSeconds?: number): Promise<void> {
        const expiresAt = ttlSeconds ? this.now() + (ttlSeconds * 1000) : null;
        this.cache.set(key, { value, expiresAt });
    }

    async delete(key: string): Promise<void> {
        this.cache.delete(key);
    }

    async has(key: string): Promise<boolean> {
        return (await this.get(key)) !== null;
    }

    async clear(): Promise<void> {
        this.cache.clear();
    }

    size(): number {
        return this.cache.size;
    }

    /**
     * Removes expired entries. Returns how many were removed.
     */
    cleanup(): number {
        const now = this.now();
        let cleaned = 0;

        for (const [key, entry] of this.cache.entries()) {
            if (entry.expiresAt !== null && now > entry.expiresAt) {
                this.cache.delete(key);
                cleaned++;
            }
        }

        return cleaned;
    }
}
