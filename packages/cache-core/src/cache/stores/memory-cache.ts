/**
 * @fileoverview Unbounded in-memory cache store
 */

import type { Cache } from '../interfaces/cache.interface.js';
import type { CacheResult } from '../cache-sentinel.js';
import type { CacheKeyValue } from '../cache-key.js';
import { KeyedMap } from '../keyed-map.js';
import { cacheEquals, cacheHashCode } from '../cache-identity.js';

/**
 * Base store for a cache chain: a key table with no bound and no locking.
 *
 * Not safe for interleaved mutation by concurrent callers. Wrap it in
 * SynchronizedCache or StampedeGuardCache (or synchronize externally)
 * before sharing it.
 */
export class MemoryCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	implements Cache<K, V>
{
	private readonly entries = new KeyedMap<K, V>();

	constructor(private readonly id?: string) {}

	getId(): string | undefined {
		return this.id;
	}

	async getSize(): Promise<number> {
		return this.entries.size;
	}

	async putObject(key: K, value: V): Promise<void> {
		this.entries.set(key, value);
	}

	async getObject(key: K): Promise<CacheResult<V>> {
		return this.entries.get(key);
	}

	async removeObject(key: K): Promise<CacheResult<V>> {
		return this.entries.delete(key);
	}

	async clear(): Promise<void> {
		this.entries.clear();
	}

	equals(other: unknown): boolean {
		return cacheEquals(this, other);
	}

	hashCode(): number {
		return cacheHashCode(this);
	}
}
