export {
	CacheError,
	CacheLockError,
	CacheConfigurationError,
	ERROR_CODES,
	type CacheLockFailureReason,
	type ErrorCode,
	type ErrorContext,
	type SerializedCacheError
} from './cache-error.js';
