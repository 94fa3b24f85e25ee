/**
 * @fileoverview The contract shared by every cache store and decorator
 */

import type { CacheResult } from '../cache-sentinel.js';
import type { CacheKeyValue, HashableKey } from '../cache-key.js';

/**
 * A cache store or a decorator around one
 *
 * Decorators hold a `Cache` delegate and are themselves a `Cache`, so they
 * stack in any order. Caches compare equal by id alone (see
 * cacheEquals), which also makes a cache usable as a HashableKey.
 *
 * Operations are asynchronous so stores backed by I/O can implement the
 * same contract. The in-memory store never blocks.
 */
export interface Cache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	extends HashableKey {
	/**
	 * Identifier assigned when the chain is assembled. Decorators report
	 * their delegate's id.
	 */
	getId(): string | undefined;

	/**
	 * Number of resident entries in the underlying store
	 */
	getSize(): Promise<number>;

	/**
	 * Store or overwrite a value. `null` is a legal value.
	 */
	putObject(key: K, value: V): Promise<void>;

	/**
	 * Read a value, or CACHE_MISS when the key is not resident
	 */
	getObject(key: K): Promise<CacheResult<V>>;

	/**
	 * Remove a key and return its previous value, or CACHE_MISS
	 */
	removeObject(key: K): Promise<CacheResult<V>>;

	/**
	 * Remove every entry and reset decorator bookkeeping
	 */
	clear(): Promise<void>;
}

/**
 * Decorator that bounds the number of resident keys
 */
export interface BoundedCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	extends Cache<K, V> {
	/**
	 * Change the bound. Intended for assembly time, not live traffic.
	 */
	setSize(size: number): void;
	getMaxSize(): number;
}
