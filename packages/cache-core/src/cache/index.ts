/**
 * @fileoverview Cache stores, decorators and keys
 */

export type { Cache, BoundedCache } from './interfaces/cache.interface.js';

export {
	CACHE_MISS,
	isCacheHit,
	isCacheMiss,
	type CacheMiss,
	type CacheResult
} from './cache-sentinel.js';

export {
	CacheKey,
	describeKey,
	isHashableKey,
	type CacheKeyPart,
	type CacheKeyValue,
	type HashableKey,
	type PrimitiveKey
} from './cache-key.js';

export { KeyedMap } from './keyed-map.js';

export {
	cacheEquals,
	cacheHashCode,
	isCache,
	requireCacheId
} from './cache-identity.js';

export { MemoryCache } from './stores/memory-cache.js';

export * from './decorators/index.js';

export {
	buildCacheChain,
	parseCacheChainSettings,
	type CacheChainOptions,
	type CacheChainSettings,
	type EvictionPolicy,
	type ResolvedCacheChainSettings
} from './cache-chain-builder.js';
