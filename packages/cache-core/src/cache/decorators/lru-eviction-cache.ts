/**
 * @fileoverview Least-recently-used eviction decorator
 */

import type { BoundedCache, Cache } from '../interfaces/cache.interface.js';
import type { CacheResult } from '../cache-sentinel.js';
import { describeKey, type CacheKeyValue } from '../cache-key.js';
import { KeyedMap } from '../keyed-map.js';
import { cacheEquals, cacheHashCode } from '../cache-identity.js';
import { assertEvictionSize, DEFAULT_EVICTION_SIZE } from './eviction-bounds.js';
import { getLogger } from '../../logger/index.js';

/**
 * Bounds a delegate to `size` keys, evicting the least recently used key
 * when a put pushes the tracked key count past the bound.
 *
 * Reads touch the key in the recency order before consulting the delegate,
 * so a key this decorator still tracks is refreshed even when the delegate
 * no longer holds its value. The tracked keys are therefore not guaranteed
 * to be a subset of the delegate's resident keys; getSize() always asks
 * the delegate.
 *
 * Not safe for interleaved mutation on its own: the put-then-evict
 * sequence spans awaits. Wrap in SynchronizedCache when sharing.
 */
export class LruEvictionCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	implements BoundedCache<K, V>
{
	private keyOrder = new KeyedMap<K, true>();
	private maxSize = DEFAULT_EVICTION_SIZE;
	private readonly logger = getLogger('LruEvictionCache');

	constructor(
		private readonly delegate: Cache<K, V>,
		size: number = DEFAULT_EVICTION_SIZE
	) {
		this.setSize(size);
	}

	/**
	 * Set the bound and reset the recency order
	 */
	setSize(size: number): void {
		assertEvictionSize(size);
		this.maxSize = size;
		this.keyOrder = new KeyedMap<K, true>();
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
		await this.delegate.putObject(key, value);
		await this.cycleKeyList(key);
	}

	async getObject(key: K): Promise<CacheResult<V>> {
		// touch, whether or not the delegate still has the value
		this.keyOrder.touch(key);
		return this.delegate.getObject(key);
	}

	removeObject(key: K): Promise<CacheResult<V>> {
		return this.delegate.removeObject(key);
	}

	async clear(): Promise<void> {
		await this.delegate.clear();
		this.keyOrder.clear();
	}

	equals(other: unknown): boolean {
		return cacheEquals(this, other);
	}

	hashCode(): number {
		return cacheHashCode(this);
	}

	private async cycleKeyList(key: K): Promise<void> {
		if (!this.keyOrder.touch(key)) {
			this.keyOrder.set(key, true);
		}
		if (this.keyOrder.size <= this.maxSize) return;

		const eldest = this.keyOrder.oldest();
		if (!eldest) return;

		const [eldestKey] = eldest;
		this.keyOrder.delete(eldestKey);
		this.logger.debug(
			`Evicting least recently used key ${describeKey(eldestKey)} from ${this.getId()}`
		);
		await this.delegate.removeObject(eldestKey);
	}
}
