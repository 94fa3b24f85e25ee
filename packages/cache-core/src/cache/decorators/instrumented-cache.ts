/**
 * @fileoverview Decorator that tracks the hit ratio of reads
 */

import type { Cache } from '../interfaces/cache.interface.js';
import { isCacheHit, type CacheResult } from '../cache-sentinel.js';
import type { CacheKeyValue } from '../cache-key.js';
import { cacheEquals, cacheHashCode } from '../cache-identity.js';
import { getLogger } from '../../logger/index.js';

export interface CacheStats {
	requests: number;
	hits: number;
	misses: number;
	/** hits / requests, or 0 before the first read */
	hitRatio: number;
}

/**
 * Counts reads and hits and logs the running hit ratio at debug level
 */
export class InstrumentedCache<K extends CacheKeyValue = CacheKeyValue, V = unknown>
	implements Cache<K, V>
{
	private requests = 0;
	private hits = 0;
	private readonly logger = getLogger('InstrumentedCache');

	constructor(private readonly delegate: Cache<K, V>) {}

	getId(): string | undefined {
		return this.delegate.getId();
	}

	getSize(): Promise<number> {
		return this.delegate.getSize();
	}

	putObject(key: K, value: V): Promise<void> {
		return this.delegate.putObject(key, value);
	}

	async getObject(key: K): Promise<CacheResult<V>> {
		this.requests++;
		const value = await this.delegate.getObject(key);
		if (isCacheHit(value)) {
			this.hits++;
		}
		this.logger.debug(`Hit ratio [${this.getId()}]: ${this.getHitRatio()}`);
		return value;
	}

	removeObject(key: K): Promise<CacheResult<V>> {
		return this.delegate.removeObject(key);
	}

	clear(): Promise<void> {
		return this.delegate.clear();
	}

	getHitRatio(): number {
		return this.requests === 0 ? 0 : this.hits / this.requests;
	}

	getStats(): CacheStats {
		return {
			requests: this.requests,
			hits: this.hits,
			misses: this.requests - this.hits,
			hitRatio: this.getHitRatio()
		};
	}

	equals(other: unknown): boolean {
		return cacheEquals(this, other);
	}

	hashCode(): number {
		return cacheHashCode(this);
	}
}
