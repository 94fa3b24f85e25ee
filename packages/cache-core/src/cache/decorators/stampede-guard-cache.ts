/**
 * @fileoverview Per-key locking decorator that lets a single caller fill a
 * missing entry while other callers for the same key wait
 *
 * Protocol for callers:
 * ```typescript
 * const rows = await cache.getObject(key); // holds the key's lock on a miss
 * if (isCacheMiss(rows)) {
 *   try {
 *     await cache.putObject(key, await runQuery()); // releases the lock
 *   } catch (error) {
 *     await cache.removeObject(key); // releases without storing
 *     throw error;
 *   }
 * }
 * ```
 */

import type { Cache } from '../interfaces/cache.interface.js';
import { CACHE_MISS, isCacheHit, isCacheMiss, type CacheResult } from '../cache-sentinel.js';
import { describeKey, type CacheKeyValue } from '../cache-key.js';
import { KeyedMap } from '../keyed-map.js';
import { cacheEquals, cacheHashCode } from '../cache-identity.js';
import {
	KeyLock,
	LockInterruptedError,
	LockTimeoutError,
	MAX_LOCK_TIMEOUT
} from '../../utils/key-lock.js';
import { currentLockOwner } from '../../utils/lock-owner.js';
import {
	CacheConfigurationError,
	CacheLockError,
	ERROR_CODES
} from '../../errors/cache-error.js';
import { getLogger } from '../../logger/index.js';

export interface StampedeGuardOptions {
	/**
	 * Maximum wait for a key's lock in milliseconds, at most
	 * MAX_LOCK_TIMEOUT; 0 waits indefinitely
	 * @default 0
	 */
	timeout?: number;

	/**
	 * Aborting interrupts every pending and future blocked wait with a
	 * CacheLockError (reason 'interrupted')
	 */
	signal?: AbortSignal;
}

/**
 * Serializes, per key, the window between a failed lookup and the put that
 * fills it.
 *
 * - getObject acquires the key's lock. A hit releases it at once; a miss
 *   returns CACHE_MISS and keeps it until the same owner calls putObject
 *   or removeObject.
 * - removeObject only releases the lock. It never removes data from the
 *   delegate.
 * - clear clears the delegate and leaves lock state alone, since a filler
 *   in flight still expects to release its lock.
 *
 * Locks are created on first use and never removed, so the lock table
 * grows with the number of distinct keys seen. Removing idle locks would
 * race with a waiter about to acquire one; bounding the table would need
 * reference-counted entries.
 *
 * Ownership follows lock owner scopes (see runWithLockOwner). This
 * decorator prevents duplicate fills; it does not serialize access to the
 * delegate for different keys.
 */
export class StampedeGuardCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	implements Cache<K, V>
{
	private timeout = 0;
	private readonly signal: AbortSignal | undefined;
	private readonly locks = new KeyedMap<K, KeyLock>();
	private readonly logger = getLogger('StampedeGuardCache');

	constructor(
		private readonly delegate: Cache<K, V>,
		options: StampedeGuardOptions = {}
	) {
		this.setTimeout(options.timeout ?? 0);
		this.signal = options.signal;
	}

	getTimeout(): number {
		return this.timeout;
	}

	setTimeout(timeout: number): void {
		if (!Number.isFinite(timeout) || timeout < 0 || timeout > MAX_LOCK_TIMEOUT) {
			throw new CacheConfigurationError(
				`Lock timeout must be between 0 and ${MAX_LOCK_TIMEOUT} milliseconds, got ${timeout}`,
				ERROR_CODES.INVALID_LOCK_TIMEOUT,
				{ operation: 'setTimeout', details: { timeout } }
			);
		}
		this.timeout = timeout;
	}

	/**
	 * Number of per-key locks created so far
	 */
	getLockCount(): number {
		return this.locks.size;
	}

	getId(): string | undefined {
		return this.delegate.getId();
	}

	getSize(): Promise<number> {
		return this.delegate.getSize();
	}

	async putObject(key: K, value: V): Promise<void> {
		try {
			await this.delegate.putObject(key, value);
		} finally {
			this.releaseLock(key);
		}
	}

	async getObject(key: K): Promise<CacheResult<V>> {
		await this.acquireLock(key);

		let value: CacheResult<V>;
		try {
			value = await this.delegate.getObject(key);
		} catch (error) {
			this.releaseLock(key);
			throw error;
		}

		if (isCacheHit(value)) {
			this.releaseLock(key);
		}
		return value;
	}

	/**
	 * Release the key's lock without storing a value
	 */
	async removeObject(key: K): Promise<CacheResult<V>> {
		this.releaseLock(key);
		return CACHE_MISS;
	}

	async clear(): Promise<void> {
		await this.delegate.clear();
	}

	equals(other: unknown): boolean {
		return cacheEquals(this, other);
	}

	hashCode(): number {
		return cacheHashCode(this);
	}

	private getLockForKey(key: K): KeyLock {
		let lock = this.locks.get(key);
		if (isCacheMiss(lock)) {
			lock = new KeyLock();
			this.locks.set(key, lock);
		}
		return lock;
	}

	private async acquireLock(key: K): Promise<void> {
		const lock = this.getLockForKey(key);
		if (lock.isLocked()) {
			this.logger.debug(
				`Waiting for lock on key ${describeKey(key)} at the cache ${this.getId()}`
			);
		}

		try {
			await lock.acquire(currentLockOwner(), {
				timeout: this.timeout,
				signal: this.signal
			});
		} catch (error) {
			if (error instanceof LockTimeoutError) {
				this.logger.warn(
					`Lock wait for key ${describeKey(key)} timed out after ${this.timeout}ms`
				);
				throw new CacheLockError(describeKey(key), this.getId(), 'timeout', this.timeout);
			}
			if (error instanceof LockInterruptedError) {
				throw new CacheLockError(
					describeKey(key),
					this.getId(),
					'interrupted',
					this.timeout,
					error.cause
				);
			}
			throw error;
		}
	}

	private releaseLock(key: K): void {
		const lock = this.locks.get(key);
		if (isCacheMiss(lock)) return;
		lock.release(currentLockOwner());
	}
}
