/**
 * @fileoverview Id-based equality shared by every cache implementation
 */

import type { Cache } from './interfaces/cache.interface.js';
import {
	CacheConfigurationError,
	ERROR_CODES
} from '../errors/cache-error.js';
import { hashString } from '../utils/hash.js';

type Identified = Pick<Cache, 'getId'>;

export function isCache(value: unknown): value is Cache {
	return (
		typeof value === 'object' &&
		value !== null &&
		'getId' in value &&
		typeof value.getId === 'function' &&
		'getObject' in value &&
		typeof value.getObject === 'function' &&
		'putObject' in value &&
		typeof value.putObject === 'function'
	);
}

/**
 * The cache's id, or a CacheConfigurationError when none was assigned
 */
export function requireCacheId(cache: Identified, operation = 'getId'): string {
	const id = cache.getId();
	if (id === undefined || id === '') {
		throw new CacheConfigurationError(
			'Cache instances require an ID.',
			ERROR_CODES.MISSING_CACHE_ID,
			{ operation }
		);
	}
	return id;
}

/**
 * Two caches are equal iff their ids are equal, whatever their kind or
 * decorator wrapping
 */
export function cacheEquals(cache: Identified, other: unknown): boolean {
	const id = requireCacheId(cache, 'equals');
	if (cache === other) return true;
	if (!isCache(other)) return false;
	return id === other.getId();
}

export function cacheHashCode(cache: Identified): number {
	return hashString(requireCacheId(cache, 'hashCode'));
}
