/**
 * @fileoverview Default bound and bound validation for eviction decorators
 */

import {
	CacheConfigurationError,
	ERROR_CODES
} from '../../errors/cache-error.js';

/**
 * Bound applied by eviction decorators when none is configured
 */
export const DEFAULT_EVICTION_SIZE = 1024;

export function assertEvictionSize(size: number): void {
	if (!Number.isInteger(size) || size <= 0) {
		throw new CacheConfigurationError(
			`Eviction size must be a positive integer, got ${size}`,
			ERROR_CODES.INVALID_CACHE_SIZE,
			{ operation: 'setSize', details: { size } }
		);
	}
}
