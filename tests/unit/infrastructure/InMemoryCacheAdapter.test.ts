import { InMemoryCacheAdapter } from '../../../src/infrastructure/cache/InMemoryCacheAdapter';

describe('InMemoryCacheAdapter', () => {
    let now: number;
    let cache: InMemoryCacheAdapter<string[]>;

    beforeEach(() => {
        now = 1_000_000;
        cache = new InMemoryCacheAdapter<string[]>(() => now);
    });

    describe('get/set', () => {
        it('should store and retrieve values', async () => {
            await cache.set('voices', ['a', 'b']);

            expect(await cache.get('voices')).toEqual(['a', 'b']);
        });

        it('should return null for non-existent keys', async () => {
            expect(await cache.get('missing')).toBeNull();
        });

        it('should overwrite existing values', async () => {
            await cache.set('voices', ['a']);
            await cache.set('voices', ['b']);

            expect(await cache.get('voices')).toEqual(['b']);
        });
    });

    describe('TTL', () => {
        it('should expire values after TTL', async () => {
            await cache.set('voices', ['a'], 60);

            now += 60_000;
            expect(await cache.get('voices')).toEqual(['a']);

            now += 1;
            expect(await cache.get('voices')).toBeNull();
            expect(cache.size()).toBe(0);
        });

        it('should keep values without TTL', async () => {
            await cache.set('voices', ['a']);

            now += 365 * 24 * 3600 * 1000;
            expect(await cache.has('voices')).toBe(true);
        });

        it('should remove expired entries on cleanup', async () => {
            await cache.set('short', ['a'], 1);
            await cache.set('long', ['b'], 100);

            now += 2000;

            expect(cache.cleanup()).toBe(1);
            expect(cache.size()).toBe(1);
        });
    });

    describe('delete/clear', () => {
        it('should delete a single key', async () => {
            await cache.set('a', ['1']);
            await cache.set('b', ['2']);

            await cache.delete('a');

            expect(await cache.has('a')).toBe(false);
            expect(await cache.has('b')).toBe(true);
        });

        it('should clear everything', async () => {
            await cache.set('a', ['1']);
            await cache.set('b', ['2']);

            await cache.clear();

            expect(cache.size()).toBe(0);
        });
    });
});
