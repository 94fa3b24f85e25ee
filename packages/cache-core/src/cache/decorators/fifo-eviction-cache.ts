/**
 * @fileoverview Insertion-order (first in, first out) eviction decorator
 */

import type { BoundedCache, Cache } from '../interfaces/cache.interface.js';
import type { CacheResult } from '../cache-sentinel.js';
import { describeKey, type CacheKeyValue } from '../cache-key.js';
import { cacheEquals, cacheHashCode } from '../cache-identity.js';
import { assertEvictionSize, DEFAULT_EVICTION_SIZE } from './eviction-bounds.js';
import { getLogger } from '../../logger/index.js';

/**
 * Bounds a delegate to `size` insertions, evicting the earliest inserted
 * key. Reads never change the order.
 *
 * Every put appends to the queue, including re-puts of a resident key, so
 * the queue may hold duplicates and a re-put key is evicted when its
 * oldest occurrence reaches the head.
 *
 * Not safe for interleaved mutation on its own; wrap in SynchronizedCache
 * when sharing.
 */
export class FifoEvictionCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	implements BoundedCache<K, V>
{
	private readonly keyList: K[] = [];
	private maxSize = DEFAULT_EVICTION_SIZE;
	private readonly logger = getLogger('FifoEvictionCache');

	constructor(
		private readonly delegate: Cache<K, V>,
		size: number = DEFAULT_EVICTION_SIZE
	) {
		this.setSize(size);
	}

	setSize(size: number): void {
		assertEvictionSize(size);
		this.maxSize = size;
	}

	getMaxSize(): number {
		return this.maxSize;
	}

	getId(): string | undefined {
		return this.delegate.getId();
	}

	getSize(): Promise<number> {
		return this.delegate.getSize();
	}

	async putObject(key: K, value: V): Promise<void> {
		await this.cycleKeyList(key);
		await this.delegate.putObject(key, value);
	}

	getObject(key: K): Promise<CacheResult<V>> {
		return this.delegate.getObject(key);
	}

	removeObject(key: K): Promise<CacheResult<V>> {
		return this.delegate.removeObject(key);
	}

	async clear(): Promise<void> {
		await this.delegate.clear();
		this.keyList.length = 0;
	}

	equals(other: unknown): boolean {
		return cacheEquals(this, other);
	}

	hashCode(): number {
		return cacheHashCode(this);
	}

	private async cycleKeyList(key: K): Promise<void> {
		this.keyList.push(key);
		if (this.keyList.length <= this.maxSize) return;

		const oldestKey = this.keyList.shift();
		if (oldestKey === undefined) return;
		this.logger.debug(
			`Evicting earliest inserted key ${describeKey(oldestKey)} from ${this.getId()}`
		);
		await this.delegate.removeObject(oldestKey);
	}
}
