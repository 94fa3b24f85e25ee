import { describe, it, expect } from 'vitest';
import { cacheEquals, cacheHashCode, isCache, requireCacheId } from './cache-identity.js';
import { MemoryCache } from './stores/memory-cache.js';
import { LruEvictionCache } from './decorators/lru-eviction-cache.js';
import { StampedeGuardCache } from './decorators/stampede-guard-cache.js';
import { KeyedMap } from './keyed-map.js';
import type { Cache } from './interfaces/cache.interface.js';
import { CacheConfigurationError, ERROR_CODES } from '../errors/cache-error.js';
import { hashString } from '../utils/hash.js';

describe('cache identity', () => {
	it('should treat caches with the same id as equal across wrapping', async () => {
		const plain = new MemoryCache('users');
		const wrapped = new StampedeGuardCache(
			new LruEvictionCache(new MemoryCache('users'))
		);
		await plain.putObject('k', 'v');

		expect(plain.equals(wrapped)).toBe(true);
		expect(wrapped.equals(plain)).toBe(true);
		expect(plain.hashCode()).toBe(wrapped.hashCode());
	});

	it('should never equate caches with different ids', () => {
		expect(new MemoryCache('users').equals(new MemoryCache('orders'))).toBe(false);
	});

	it('should hash to the string hash of the id', () => {
		expect(cacheHashCode(new MemoryCache('users'))).toBe(hashString('users'));
	});

	it('should not equal values that are not caches', () => {
		expect(cacheEquals(new MemoryCache('users'), 'users')).toBe(false);
		expect(cacheEquals(new MemoryCache('users'), null)).toBe(false);
	});

	it('should let a cache act as a key', () => {
		const owners = new KeyedMap<Cache, string>();
		owners.set(new MemoryCache('users'), 'user-mapper');

		expect(owners.get(new LruEvictionCache(new MemoryCache('users')))).toBe(
			'user-mapper'
		);
	});

	it('should fail equality and hashing without an id', () => {
		const anonymous = new MemoryCache();

		expect(() => anonymous.equals(new MemoryCache('users'))).toThrow(
			CacheConfigurationError
		);
		expect(() => anonymous.hashCode()).toThrow('Cache instances require an ID.');
	});

	it('should treat an empty id as missing', () => {
		try {
			requireCacheId(new MemoryCache(''));
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(CacheConfigurationError);
			if (error instanceof CacheConfigurationError) {
				expect(error.code).toBe(ERROR_CODES.MISSING_CACHE_ID);
			}
		}
	});

	it('should fail through decorators that wrap an anonymous store', () => {
		const wrapped = new LruEvictionCache(new MemoryCache());

		expect(() => wrapped.hashCode()).toThrow(CacheConfigurationError);
	});

	it('should recognise caches structurally', () => {
		expect(isCache(new MemoryCache('users'))).toBe(true);
		expect(isCache({ getId: () => 'x' })).toBe(false);
	});
});
