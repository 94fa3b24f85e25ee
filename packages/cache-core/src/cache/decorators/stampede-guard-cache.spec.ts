import { describe, it, expect, beforeEach } from 'vitest';
import { StampedeGuardCache } from './stampede-guard-cache.js';
import { MemoryCache } from '../stores/memory-cache.js';
import { CACHE_MISS, isCacheHit, type CacheResult } from '../cache-sentinel.js';
import type { Cache } from '../interfaces/cache.interface.js';
import { runWithLockOwner } from '../../utils/lock-owner.js';
import { MAX_LOCK_TIMEOUT } from '../../utils/key-lock.js';
import {
	CacheConfigurationError,
	CacheLockError,
	ERROR_CODES
} from '../../errors/cache-error.js';
import {
	RecordingCache,
	advanceTime,
	flushMicrotasks,
	setupFakeTimers
} from '../../../tests/test-helpers/index.js';

describe('StampedeGuardCache', () => {
	let delegate: RecordingCache<string, string>;
	let guard: StampedeGuardCache<string, string>;

	beforeEach(() => {
		delegate = new RecordingCache<string, string>('users');
		guard = new StampedeGuardCache(delegate);
	});

	describe('hits', () => {
		it('should return a resident value and release the lock at once', async () => {
			await delegate.putObject('k', 'v');

			expect(await guard.getObject('k')).toBe('v');
			// a second read would block if the lock were still held
			expect(await guard.getObject('k')).toBe('v');
		});

		it('should treat a cached null as a hit', async () => {
			const nullable = new StampedeGuardCache(
				new MemoryCache<string, string | null>('users')
			);
			await nullable.putObject('k', null);

			expect(await nullable.getObject('k')).toBeNull();
			expect(await nullable.getObject('k')).toBeNull();
		});
	});

	describe('misses', () => {
		it('should let one caller fill while the other waits for the value', async () => {
			const first = await guard.getObject('k');
			expect(first).toBe(CACHE_MISS);

			let second: CacheResult<string> | undefined;
			const secondDone = guard.getObject('k').then((value) => {
				second = value;
			});
			await flushMicrotasks();
			expect(second).toBeUndefined();

			await guard.putObject('k', 'computed');
			await secondDone;

			expect(second).toBe('computed');
		});

		it('should let a waiter proceed with a miss when the filler gives up', async () => {
			expect(await guard.getObject('k')).toBe(CACHE_MISS);

			let second: CacheResult<string> | undefined;
			const secondDone = guard.getObject('k').then((value) => {
				second = value;
			});
			await flushMicrotasks();
			expect(second).toBeUndefined();

			await guard.removeObject('k');
			await secondDone;

			expect(second).toBe(CACHE_MISS);
			// the waiter now holds the lock and fills it
			await guard.putObject('k', 'retry');
			expect(await guard.getObject('k')).toBe('retry');
		});

		it('should keep other keys independent', async () => {
			expect(await guard.getObject('a')).toBe(CACHE_MISS);

			expect(await guard.getObject('b')).toBe(CACHE_MISS);

			await guard.putObject('a', 'A');
			await guard.putObject('b', 'B');
		});

		it('should compute the value once for many concurrent scoped callers', async () => {
			let computations = 0;
			const readThrough = (cache: Cache<string, string>) =>
				runWithLockOwner(async () => {
					const cached = await cache.getObject('report');
					if (isCacheHit(cached)) return cached;
					computations++;
					await new Promise((resolve) => setTimeout(resolve, 5));
					await cache.putObject('report', 'rows');
					return 'rows';
				});

			const results = await Promise.all(
				Array.from({ length: 5 }, () => readThrough(guard))
			);

			expect(results).toEqual(['rows', 'rows', 'rows', 'rows', 'rows']);
			expect(computations).toBe(1);
		});
	});

	describe('ownership', () => {
		it('should ignore a put from an owner that does not hold the lock', async () => {
			let releaseFiller: () => void = () => {};
			const fillerMayPut = new Promise<void>((resolve) => {
				releaseFiller = resolve;
			});

			const filler = runWithLockOwner(async () => {
				expect(await guard.getObject('k')).toBe(CACHE_MISS);
				await fillerMayPut;
				await guard.putObject('k', 'from-filler');
			});
			await flushMicrotasks();

			// a different owner writes the key; the filler's lock must survive
			await runWithLockOwner(() => guard.putObject('k', 'from-stranger'));

			let reader: CacheResult<string> | undefined;
			const readerDone = runWithLockOwner(async () => {
				reader = await guard.getObject('k');
			});
			await flushMicrotasks();
			expect(reader).toBeUndefined();

			releaseFiller();
			await filler;
			await readerDone;

			expect(reader).toBe('from-filler');
		});

		it('should be reentrant within one scope', async () => {
			await runWithLockOwner(async () => {
				expect(await guard.getObject('k')).toBe(CACHE_MISS);
				expect(await guard.getObject('k')).toBe(CACHE_MISS);
				await guard.putObject('k', 'v');
				await guard.putObject('k', 'v');
			});

			expect(await guard.getObject('k')).toBe('v');
		});
	});

	describe('removeObject', () => {
		it('should not raise or touch data when no lock is held', async () => {
			await delegate.putObject('k', 'v');

			expect(await guard.removeObject('k')).toBe(CACHE_MISS);
			expect(await guard.removeObject('never-seen')).toBe(CACHE_MISS);

			expect(await delegate.getObject('k')).toBe('v');
			expect(delegate.removedKeys).toEqual([]);
		});

		it('should never remove data from the delegate', async () => {
			await guard.getObject('k');
			await guard.putObject('k', 'v');

			await guard.removeObject('k');

			expect(await guard.getObject('k')).toBe('v');
		});
	});

	describe('clear', () => {
		it('should clear the delegate', async () => {
			await guard.getObject('k');
			await guard.putObject('k', 'v');

			await guard.clear();

			expect(await guard.getSize()).toBe(0);
		});

		it('should leave a held lock in place', async () => {
			expect(await guard.getObject('k')).toBe(CACHE_MISS);
			await guard.clear();

			let second: CacheResult<string> | undefined;
			const secondDone = guard.getObject('k').then((value) => {
				second = value;
			});
			await flushMicrotasks();
			expect(second).toBeUndefined();

			await guard.putObject('k', 'v');
			await secondDone;
			expect(second).toBe('v');
		});
	});

	describe('lock table', () => {
		it('should keep one lock per distinct key for the process lifetime', async () => {
			for (const key of ['a', 'b', 'a']) {
				await guard.getObject(key);
				await guard.putObject(key, key);
			}

			expect(guard.getLockCount()).toBe(2);

			await guard.clear();
			expect(guard.getLockCount()).toBe(2);
		});
	});

	describe('delegate failures', () => {
		it('should release the lock when the delegate read throws', async () => {
			let reads = 0;
			const flaky = new StampedeGuardCache<string, string>({
				getId: () => 'users',
				getSize: async () => 0,
				getObject: async () => {
					reads++;
					if (reads === 1) {
						throw new Error('read timed out');
					}
					return CACHE_MISS;
				},
				putObject: async () => {},
				removeObject: async () => CACHE_MISS,
				clear: async () => {},
				equals: () => false,
				hashCode: () => 0
			});

			await expect(flaky.getObject('k')).rejects.toThrow('read timed out');

			// lock is free again: the next read reaches the delegate
			expect(await flaky.getObject('k')).toBe(CACHE_MISS);
			expect(reads).toBe(2);
		});

		it('should release the lock when the delegate put throws', async () => {
			const failing = new StampedeGuardCache<string, string>({
				getId: () => 'users',
				getSize: async () => 0,
				getObject: async () => CACHE_MISS,
				putObject: async () => {
					throw new Error('disk full');
				},
				removeObject: async () => CACHE_MISS,
				clear: async () => {},
				equals: () => false,
				hashCode: () => 0
			});

			expect(await failing.getObject('k')).toBe(CACHE_MISS);
			await expect(failing.putObject('k', 'v')).rejects.toThrow('disk full');

			// lock is free again: the next read completes instead of blocking
			expect(await failing.getObject('k')).toBe(CACHE_MISS);
		});
	});

	describe('timeout configuration', () => {
		it('should default to waiting indefinitely', () => {
			expect(guard.getTimeout()).toBe(0);
		});

		it('should accept a timeout through options and the setter', () => {
			const configured = new StampedeGuardCache(delegate, { timeout: 25 });
			expect(configured.getTimeout()).toBe(25);

			configured.setTimeout(75);
			expect(configured.getTimeout()).toBe(75);
		});

		it('should accept the longest timer delay', () => {
			guard.setTimeout(MAX_LOCK_TIMEOUT);
			expect(guard.getTimeout()).toBe(2_147_483_647);
		});

		it('should reject a timeout a timer cannot hold', () => {
			expect(() => guard.setTimeout(2 ** 31)).toThrow(
				'Lock timeout must be between 0 and 2147483647 milliseconds, got 2147483648'
			);
			expect(() => new StampedeGuardCache(delegate, { timeout: 2 ** 31 })).toThrow(
				CacheConfigurationError
			);
			expect(guard.getTimeout()).toBe(0);
		});

		it.each([-1, 2 ** 31, Number.POSITIVE_INFINITY, Number.NaN])(
			'should reject a timeout of %s',
			(timeout) => {
				try {
					guard.setTimeout(timeout);
					expect.unreachable();
				} catch (error) {
					expect(error).toBeInstanceOf(CacheConfigurationError);
					if (error instanceof CacheConfigurationError) {
						expect(error.code).toBe(ERROR_CODES.INVALID_LOCK_TIMEOUT);
					}
				}
			}
		);
	});

	describe('lock timeouts', () => {
		setupFakeTimers();

		it('should fail a blocked read once the timeout elapses', async () => {
			guard.setTimeout(50);
			expect(await guard.getObject('k')).toBe(CACHE_MISS);

			const blocked = guard.getObject('k');
			const failure = expect(blocked).rejects.toThrow(
				"Couldn't get a lock in 50ms for the key k at the cache users"
			);
			await advanceTime(49);
			await advanceTime(1);
			await failure;
		});

		it('should report key, cache id and reason on the error', async () => {
			guard.setTimeout(50);
			await guard.getObject('k');

			const blocked = guard.getObject('k').catch((error: unknown) => error);
			await advanceTime(50);
			const error = await blocked;

			expect(error).toBeInstanceOf(CacheLockError);
			if (error instanceof CacheLockError) {
				expect(error.key).toBe('k');
				expect(error.cacheId).toBe('users');
				expect(error.reason).toBe('timeout');
				expect(error.code).toBe(ERROR_CODES.CACHE_LOCK_ERROR);
			}
		});

		it('should not fail a waiter that is released in time', async () => {
			guard.setTimeout(50);
			await guard.getObject('k');
			const waiting = guard.getObject('k');

			await advanceTime(30);
			await guard.putObject('k', 'v');

			expect(await waiting).toBe('v');
		});
	});

	describe('interruption', () => {
		it('should fail pending waits when the signal aborts', async () => {
			const controller = new AbortController();
			const interruptible = new StampedeGuardCache(delegate, {
				signal: controller.signal
			});
			await interruptible.getObject('k');

			const blocked = interruptible.getObject('k').catch((error: unknown) => error);
			await flushMicrotasks();
			const reason = new Error('shutting down');
			controller.abort(reason);
			const error = await blocked;

			expect(error).toBeInstanceOf(CacheLockError);
			if (error instanceof CacheLockError) {
				expect(error.reason).toBe('interrupted');
				expect(error.cause).toBe(reason);
				expect(error.message).toBe(
					'Got interrupted while trying to acquire lock for key k at the cache users'
				);
			}
		});
	});
});
