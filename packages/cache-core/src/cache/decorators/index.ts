export { LruEvictionCache } from './lru-eviction-cache.js';
export { FifoEvictionCache } from './fifo-eviction-cache.js';
export {
	StampedeGuardCache,
	type StampedeGuardOptions
} from './stampede-guard-cache.js';
export { SynchronizedCache } from './synchronized-cache.js';
export { InstrumentedCache, type CacheStats } from './instrumented-cache.js';
export { DEFAULT_EVICTION_SIZE } from './eviction-bounds.js';
