/**
 * @fileoverview Exclusive async lock with owner checks, FIFO hand-off,
 * optional timeout and abort support
 */

import type { LockOwner } from './lock-owner.js';

/**
 * Longest delay a timer can hold; Node fires larger delays after 1ms
 */
export const MAX_LOCK_TIMEOUT = 2_147_483_647;

export interface LockAcquireOptions {
	/**
	 * Maximum wait in milliseconds, at most MAX_LOCK_TIMEOUT. 0 (the
	 * default) waits indefinitely.
	 */
	timeout?: number;

	/**
	 * Aborting rejects every pending wait with LockInterruptedError
	 */
	signal?: AbortSignal;
}

/**
 * The wait for a held lock exceeded its timeout
 */
export class LockTimeoutError extends Error {
	constructor(public readonly timeout: number) {
		super(`Lock not acquired within ${timeout}ms`);
		this.name = 'LockTimeoutError';
		Object.setPrototypeOf(this, LockTimeoutError.prototype);
	}
}

/**
 * The wait for a held lock was aborted
 */
export class LockInterruptedError extends Error {
	constructor(reason: unknown) {
		super('Lock wait interrupted', { cause: reason });
		this.name = 'LockInterruptedError';
		Object.setPrototypeOf(this, LockInterruptedError.prototype);
	}
}

interface Waiter {
	owner: LockOwner;
	resolve: () => void;
	reject: (error: Error) => void;
	timeoutId?: NodeJS.Timeout;
	signal?: AbortSignal;
	onAbort?: () => void;
}

/**
 * A single exclusive lock
 *
 * Release is checked against the owner: releasing a lock you do not hold
 * is a no-op, never an error. A reentrant owner may acquire a lock it
 * holds again and must release it as many times.
 *
 * @example
 * ```typescript
 * const owner = createLockOwner();
 * await lock.acquire(owner, { timeout: 50 });
 * try {
 *   // critical section
 * } finally {
 *   lock.release(owner);
 * }
 * ```
 */
export class KeyLock {
	private holder: LockOwner | undefined;
	private holdCount = 0;
	private readonly waiters: Waiter[] = [];

	isLocked(): boolean {
		return this.holder !== undefined;
	}

	isHeldBy(owner: LockOwner): boolean {
		return this.holder === owner;
	}

	getHoldCount(): number {
		return this.holdCount;
	}

	getWaitCount(): number {
		return this.waiters.length;
	}

	/**
	 * Resolve once `owner` holds the lock
	 *
	 * @throws {LockTimeoutError} when a positive timeout elapses first
	 * @throws {LockInterruptedError} when the signal aborts first
	 */
	acquire(owner: LockOwner, options: LockAcquireOptions = {}): Promise<void> {
		if (this.holder === undefined) {
			this.holder = owner;
			this.holdCount = 1;
			return Promise.resolve();
		}

		if (this.holder === owner && owner.reentrant) {
			this.holdCount++;
			return Promise.resolve();
		}

		const { timeout = 0, signal } = options;
		if (signal?.aborted) {
			return Promise.reject(new LockInterruptedError(signal.reason));
		}

		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = { owner, resolve, reject, signal };

			if (timeout > 0) {
				waiter.timeoutId = setTimeout(() => {
					this.dropWaiter(waiter);
					reject(new LockTimeoutError(timeout));
				}, timeout);
			}

			if (signal) {
				waiter.onAbort = () => {
					this.dropWaiter(waiter);
					reject(new LockInterruptedError(signal.reason));
				};
				signal.addEventListener('abort', waiter.onAbort, { once: true });
			}

			this.waiters.push(waiter);
		});
	}

	/**
	 * Release one hold if `owner` holds the lock. When the last hold goes,
	 * the longest waiting owner takes the lock.
	 *
	 * @returns whether `owner` held the lock
	 */
	release(owner: LockOwner): boolean {
		if (this.holder !== owner) {
			return false;
		}

		this.holdCount--;
		if (this.holdCount > 0) {
			return true;
		}

		this.holder = undefined;
		const next = this.waiters.shift();
		if (next) {
			this.detach(next);
			this.holder = next.owner;
			this.holdCount = 1;
			next.resolve();
		}
		return true;
	}

	private dropWaiter(waiter: Waiter): void {
		const index = this.waiters.indexOf(waiter);
		if (index >= 0) {
			this.waiters.splice(index, 1);
		}
		this.detach(waiter);
	}

	private detach(waiter: Waiter): void {
		if (waiter.timeoutId !== undefined) {
			clearTimeout(waiter.timeoutId);
		}
		if (waiter.signal && waiter.onAbort) {
			waiter.signal.removeEventListener('abort', waiter.onAbort);
		}
	}
}
