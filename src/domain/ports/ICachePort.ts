import { ProviderName } from '../entities/Capability';
import { VoiceFilter } from '../entities/Voice';

/**
 * Key/value cache with optional expiry. Used for voice catalogues, which
 * change rarely but cost a vendor round-trip to fetch.
 */
export interface ICachePort<V> {
    /** Resolves to null when the key is absent or expired. */
    get(key: string): Promise<V | null>;

    /** Without a TTL the entry never expires. */
    set(key: string, value: V, ttlSeconds?: number): Promise<void>;

    delete(key: string): Promise<void>;

    has(key: string): Promise<boolean>;

    clear(): Promise<void>;
}

export const VOICE_CACHE_TTL_SECONDS = 300;

/**
 * One entry per provider and filter; `{}` and no filter share a key.
 */
export function voiceCacheKey(provider: ProviderName, filter?: VoiceFilter): string {
    return `voices:${provider}:${JSON.stringify(filter ?? {})}`;
}
