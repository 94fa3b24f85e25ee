/**
 * @fileoverview Lock ownership scopes for async callers
 *
 * An owner plays the role a thread plays for a blocking lock: the identity
 * a release is checked against. Code inside runWithLockOwner() gets its
 * own owner for the whole async call tree, so a put made after a miss
 * releases only the lock that same flow acquired.
 *
 * Calls made outside any scope share UNSCOPED_LOCK_OWNER. It is never
 * reentrant, so unscoped callers still exclude one another, but any
 * unscoped release frees a lock held by any unscoped caller.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LockOwner {
	readonly id: number;
	/** Whether this owner may re-acquire a lock it already holds */
	readonly reentrant: boolean;
}

export const UNSCOPED_LOCK_OWNER: LockOwner = Object.freeze({
	id: 0,
	reentrant: false
});

const ownerStorage = new AsyncLocalStorage<LockOwner>();
let ownerSequence = 0;

/**
 * A fresh owner, distinct from every other
 */
export function createLockOwner(reentrant = true): LockOwner {
	return { id: ++ownerSequence, reentrant };
}

/**
 * Run `fn` (and everything it awaits) as a new reentrant lock owner
 *
 * @example
 * ```typescript
 * await runWithLockOwner(async () => {
 *   const rows = await cache.getObject(key);
 *   if (isCacheMiss(rows)) {
 *     await cache.putObject(key, await runQuery());
 *   }
 * });
 * ```
 */
export function runWithLockOwner<T>(fn: () => T): T {
	return ownerStorage.run(createLockOwner(), fn);
}

export function currentLockOwner(): LockOwner {
	return ownerStorage.getStore() ?? UNSCOPED_LOCK_OWNER;
}
