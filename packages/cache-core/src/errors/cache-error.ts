/**
 * @fileoverview Error hierarchy for the cache core
 *
 * Every error raised by a cache or decorator extends CacheError so callers
 * can branch on `code` instead of parsing messages.
 */

/**
 * Error codes raised by the cache core
 */
export const ERROR_CODES = {
	CACHE_LOCK_ERROR: 'CACHE_LOCK_ERROR',
	MISSING_CACHE_ID: 'MISSING_CACHE_ID',
	INVALID_CACHE_SIZE: 'INVALID_CACHE_SIZE',
	INVALID_LOCK_TIMEOUT: 'INVALID_LOCK_TIMEOUT',
	INVALID_CACHE_CONFIGURATION: 'INVALID_CACHE_CONFIGURATION',
	IMMUTABLE_CACHE_KEY: 'IMMUTABLE_CACHE_KEY'
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Structured context attached to every CacheError
 */
export interface ErrorContext {
	/** Operation that failed (e.g. 'getObject', 'setSize') */
	operation?: string;
	/** Cache id or key the failure relates to */
	resource?: string;
	/** Additional machine-readable details */
	details?: Record<string, unknown>;
	/** Message suitable for end users */
	userMessage?: string;
}

/**
 * JSON shape produced by CacheError.toJSON()
 */
export interface SerializedCacheError {
	name: string;
	code: ErrorCode;
	message: string;
	context: ErrorContext;
	cause?: { name: string; message: string };
}

/**
 * Base error for the cache core
 *
 * @example
 * ```typescript
 * throw new CacheError('Cache instances require an ID.', ERROR_CODES.MISSING_CACHE_ID, {
 *   operation: 'equals'
 * });
 * ```
 */
export class CacheError extends Error {
	public readonly code: ErrorCode;
	public readonly context: ErrorContext;

	constructor(
		message: string,
		code: ErrorCode,
		context: ErrorContext = {},
		cause?: unknown
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = 'CacheError';
		this.code = code;
		this.context = context;

		// Maintain prototype chain for instanceof checks
		Object.setPrototypeOf(this, CacheError.prototype);
	}

	/**
	 * Message intended for end users, falling back to the technical message
	 */
	getUserMessage(): string {
		return this.context.userMessage ?? this.message;
	}

	toJSON(): SerializedCacheError {
		const json: SerializedCacheError = {
			name: this.name,
			code: this.code,
			message: this.message,
			context: this.context
		};
		if (this.cause instanceof Error) {
			json.cause = { name: this.cause.name, message: this.cause.message };
		}
		return json;
	}

	toString(): string {
		const operation = this.context.operation
			? ` (operation: ${this.context.operation})`
			: '';
		return `${this.name}[${this.code}]: ${this.message}${operation}`;
	}
}

/**
 * Why a lock could not be obtained
 */
export type CacheLockFailureReason = 'timeout' | 'interrupted';

/**
 * Raised by the stampede guard when exclusive access to a key could not be
 * obtained, either because the wait exceeded the configured timeout or
 * because the wait was interrupted.
 */
export class CacheLockError extends CacheError {
	public readonly key: string;
	public readonly cacheId: string | undefined;
	public readonly reason: CacheLockFailureReason;
	public readonly timeout: number;

	constructor(
		key: string,
		cacheId: string | undefined,
		reason: CacheLockFailureReason,
		timeout: number,
		cause?: unknown
	) {
		super(
			reason === 'timeout'
				? `Couldn't get a lock in ${timeout}ms for the key ${key} at the cache ${cacheId}`
				: `Got interrupted while trying to acquire lock for key ${key} at the cache ${cacheId}`,
			ERROR_CODES.CACHE_LOCK_ERROR,
			{
				operation: 'acquireLock',
				resource: cacheId,
				details: { key, reason, timeout },
				userMessage: `Could not obtain exclusive access to cache entry ${key}`
			},
			cause
		);

		this.key = key;
		this.cacheId = cacheId;
		this.reason = reason;
		this.timeout = timeout;
		this.name = 'CacheLockError';

		Object.setPrototypeOf(this, CacheLockError.prototype);
	}
}

/**
 * Raised when a cache chain is assembled or configured incorrectly.
 * Indicates a programming error rather than a recoverable condition.
 */
export class CacheConfigurationError extends CacheError {
	constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
		super(message, code, context);
		this.name = 'CacheConfigurationError';

		Object.setPrototypeOf(this, CacheConfigurationError.prototype);
	}
}
