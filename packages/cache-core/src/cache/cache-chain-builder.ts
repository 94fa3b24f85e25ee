/**
 * @fileoverview Validated assembly of a decorated cache chain
 *
 * @example
 * ```typescript
 * const cache = buildCacheChain<CacheKey, Row[]>({
 *   id: 'users',
 *   eviction: 'fifo',
 *   size: 256,
 *   blocking: true,
 *   timeout: 5000
 * });
 * ```
 */

import { z } from 'zod';
import type { Cache } from './interfaces/cache.interface.js';
import type { CacheKeyValue } from './cache-key.js';
import { MemoryCache } from './stores/memory-cache.js';
import {
	DEFAULT_EVICTION_SIZE,
	FifoEvictionCache,
	InstrumentedCache,
	LruEvictionCache,
	StampedeGuardCache,
	SynchronizedCache
} from './decorators/index.js';
import {
	CacheConfigurationError,
	ERROR_CODES
} from '../errors/cache-error.js';
import { getLogger } from '../logger/index.js';
import { MAX_LOCK_TIMEOUT } from '../utils/key-lock.js';

const CacheChainSettingsSchema = z
	.object({
		id: z.string().min(1, 'Cache id must not be empty'),
		eviction: z.enum(['lru', 'fifo', 'none']).default('lru'),
		size: z
			.number()
			.int('Eviction size must be an integer')
			.positive('Eviction size must be positive')
			.default(DEFAULT_EVICTION_SIZE),
		blocking: z.boolean().default(false),
		timeout: z
			.number()
			.int('Lock timeout must be an integer')
			.nonnegative('Lock timeout must not be negative')
			.max(MAX_LOCK_TIMEOUT, `Lock timeout must not exceed ${MAX_LOCK_TIMEOUT}ms`)
			.default(0),
		synchronized: z.boolean().default(true),
		instrumented: z.boolean().default(false)
	})
	.strict();

/**
 * Settings as written by a caller; omitted fields take their defaults
 */
export type CacheChainSettings = z.input<typeof CacheChainSettingsSchema>;

/**
 * Settings with every default applied
 */
export type ResolvedCacheChainSettings = z.output<typeof CacheChainSettingsSchema>;

export type EvictionPolicy = ResolvedCacheChainSettings['eviction'];

export interface CacheChainOptions<K extends CacheKeyValue, V> {
	/** Base store factory; defaults to an unbounded MemoryCache */
	store?: (id: string) => Cache<K, V>;
	/** Passed to the stampede guard when `blocking` is set */
	signal?: AbortSignal;
}

const logger = getLogger('CacheChainBuilder');

/**
 * Validate raw settings (for example parsed from a config file) and apply
 * defaults
 */
export function parseCacheChainSettings(input: unknown): ResolvedCacheChainSettings {
	const result = CacheChainSettingsSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
			return `${path}: ${issue.message}`;
		});
		throw new CacheConfigurationError(
			`Invalid cache chain settings: ${issues.join('; ')}`,
			ERROR_CODES.INVALID_CACHE_CONFIGURATION,
			{
				operation: 'buildCacheChain',
				details: {
					paths: result.error.issues.map((issue) => issue.path.join('.')),
					issues
				}
			}
		);
	}
	return result.data;
}

/**
 * Assemble store, eviction, serialization, instrumentation and stampede
 * guard, innermost first. Layers switched off in the settings are left out.
 */
export function buildCacheChain<K extends CacheKeyValue = CacheKeyValue, V = unknown>(
	settings: CacheChainSettings,
	options: CacheChainOptions<K, V> = {}
): Cache<K, V> {
	const resolved = parseCacheChainSettings(settings);
	const layers: string[] = [];

	let cache: Cache<K, V> = options.store
		? options.store(resolved.id)
		: new MemoryCache<K, V>(resolved.id);
	layers.push(cache.constructor.name);

	switch (resolved.eviction) {
		case 'lru':
			cache = new LruEvictionCache(cache, resolved.size);
			layers.push(`LruEvictionCache(${resolved.size})`);
			break;
		case 'fifo':
			cache = new FifoEvictionCache(cache, resolved.size);
			layers.push(`FifoEvictionCache(${resolved.size})`);
			break;
		case 'none':
			break;
	}

	if (resolved.synchronized) {
		cache = new SynchronizedCache(cache);
		layers.push('SynchronizedCache');
	}

	if (resolved.instrumented) {
		cache = new InstrumentedCache(cache);
		layers.push('InstrumentedCache');
	}

	if (resolved.blocking) {
		cache = new StampedeGuardCache(cache, {
			timeout: resolved.timeout,
			signal: options.signal
		});
		layers.push(`StampedeGuardCache(${resolved.timeout}ms)`);
	}

	logger.debug(`Built cache ${resolved.id}: ${layers.join(' -> ')}`);
	return cache;
}
