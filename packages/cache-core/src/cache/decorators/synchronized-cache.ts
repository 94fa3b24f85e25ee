/**
 * @fileoverview Decorator that runs every delegate operation one at a time
 */

import type { Cache } from '../interfaces/cache.interface.js';
import type { CacheResult } from '../cache-sentinel.js';
import type { CacheKeyValue } from '../cache-key.js';
import { cacheEquals, cacheHashCode } from '../cache-identity.js';
import { KeyLock } from '../../utils/key-lock.js';
import { createLockOwner } from '../../utils/lock-owner.js';

/**
 * Queues every operation behind a single FIFO lock so the delegate never
 * sees two operations interleave across their awaits. Wrap eviction
 * decorators in this before sharing them between concurrent callers.
 */
export class SynchronizedCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	implements Cache<K, V>
{
	private readonly mutex = new KeyLock();

	constructor(private readonly delegate: Cache<K, V>) {}

	getId(): string | undefined {
		return this.delegate.getId();
	}

	getSize(): Promise<number> {
		return this.exclusive(() => this.delegate.getSize());
	}

	putObject(key: K, value: V): Promise<void> {
		return this.exclusive(() => this.delegate.putObject(key, value));
	}

	getObject(key: K): Promise<CacheResult<V>> {
		return this.exclusive(() => this.delegate.getObject(key));
	}

	removeObject(key: K): Promise<CacheResult<V>> {
		return this.exclusive(() => this.delegate.removeObject(key));
	}

	clear(): Promise<void> {
		return this.exclusive(() => this.delegate.clear());
	}

	equals(other: unknown): boolean {
		return cacheEquals(this, other);
	}

	hashCode(): number {
		return cacheHashCode(this);
	}

	private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
		const owner = createLockOwner(false);
		await this.mutex.acquire(owner);
		try {
			return await operation();
		} finally {
			this.mutex.release(owner);
		}
	}
}
