export { hashString } from './hash.js';
export {
	KeyLock,
	LockInterruptedError,
	LockTimeoutError,
	MAX_LOCK_TIMEOUT,
	type LockAcquireOptions
} from './key-lock.js';
export {
	UNSCOPED_LOCK_OWNER,
	createLockOwner,
	currentLockOwner,
	runWithLockOwner,
	type LockOwner
} from './lock-owner.js';
