/**
 * @fileoverview Absent-value sentinel returned by cache reads
 *
 * `null` and `undefined` are legal cached values (a query that found
 * nothing is still a result worth caching), so absence is reported with a
 * registered symbol instead.
 */

/**
 * Returned by getObject/removeObject when the key is not resident.
 * Registered with Symbol.for() so separately loaded copies of this module agree.
 */
export const CACHE_MISS = Symbol.for('query-cache-miss');

export type CacheMiss = typeof CACHE_MISS;

/**
 * A cached value of type T, or the miss sentinel
 */
export type CacheResult<T> = T | CacheMiss;

/**
 * @example
 * ```typescript
 * const rows = await cache.getObject(key);
 * if (isCacheMiss(rows)) {
 *   await cache.putObject(key, await runQuery());
 * }
 * ```
 */
export function isCacheMiss<T>(value: CacheResult<T>): value is CacheMiss {
	return value === CACHE_MISS;
}

export function isCacheHit<T>(value: CacheResult<T>): value is T {
	return value !== CACHE_MISS;
}
