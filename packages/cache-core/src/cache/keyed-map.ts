/**
 * @fileoverview Insertion-ordered hash table keyed by value equality
 *
 * A plain Map compares object keys by reference, which would treat two
 * equal query fingerprints as different entries. KeyedMap buckets
 * HashableKey objects by hashCode() and resolves them with equals();
 * primitive keys go straight into a Map.
 *
 * Ordering is oldest-first. `set` on an existing key keeps its position,
 * `touch` moves it to the newest position.
 */

import { CACHE_MISS, type CacheResult } from './cache-sentinel.js';
import {
	isHashableKey,
	type CacheKeyValue,
	type HashableKey,
	type PrimitiveKey
} from './cache-key.js';

interface Slot<K, V> {
	readonly key: K;
	value: V;
}

type ResolvedKey =
	| { kind: 'hashable'; key: HashableKey; hash: number }
	| { kind: 'primitive'; key: PrimitiveKey };

function resolve(key: CacheKeyValue): ResolvedKey {
	if (isHashableKey(key)) {
		return { kind: 'hashable', key, hash: key.hashCode() };
	}
	return { kind: 'primitive', key };
}

export class KeyedMap<K extends CacheKeyValue, V> {
	private readonly primitives = new Map<PrimitiveKey, Slot<K, V>>();
	private readonly buckets = new Map<number, Slot<K, V>[]>();
	private readonly order = new Set<Slot<K, V>>();

	get size(): number {
		return this.order.size;
	}

	has(key: K): boolean {
		return this.find(key) !== undefined;
	}

	get(key: K): CacheResult<V> {
		const slot = this.find(key);
		return slot ? slot.value : CACHE_MISS;
	}

	set(key: K, value: V): this {
		const existing = this.find(key);
		if (existing) {
			existing.value = value;
			return this;
		}

		const slot: Slot<K, V> = { key, value };
		const resolved = resolve(key);
		if (resolved.kind === 'primitive') {
			this.primitives.set(resolved.key, slot);
		} else {
			const bucket = this.buckets.get(resolved.hash);
			if (bucket) {
				bucket.push(slot);
			} else {
				this.buckets.set(resolved.hash, [slot]);
			}
		}
		this.order.add(slot);
		return this;
	}

	/**
	 * Remove a key, returning its value or CACHE_MISS
	 */
	delete(key: K): CacheResult<V> {
		const resolved = resolve(key);
		let slot: Slot<K, V> | undefined;

		if (resolved.kind === 'primitive') {
			slot = this.primitives.get(resolved.key);
			this.primitives.delete(resolved.key);
		} else {
			const bucket = this.buckets.get(resolved.hash);
			const index = bucket ? this.indexIn(bucket, resolved.key) : -1;
			if (bucket && index >= 0) {
				slot = bucket[index];
				bucket.splice(index, 1);
				if (bucket.length === 0) {
					this.buckets.delete(resolved.hash);
				}
			}
		}

		if (!slot) return CACHE_MISS;
		this.order.delete(slot);
		return slot.value;
	}

	/**
	 * Move an existing key to the newest position. Absent keys are ignored.
	 *
	 * @returns whether the key was present
	 */
	touch(key: K): boolean {
		const slot = this.find(key);
		if (!slot) return false;
		this.order.delete(slot);
		this.order.add(slot);
		return true;
	}

	/**
	 * Oldest entry (least recently inserted or touched)
	 */
	oldest(): [K, V] | undefined {
		const first = this.order.values().next();
		if (first.done) return undefined;
		return [first.value.key, first.value.value];
	}

	clear(): void {
		this.primitives.clear();
		this.buckets.clear();
		this.order.clear();
	}

	*keys(): IterableIterator<K> {
		for (const slot of this.order) {
			yield slot.key;
		}
	}

	*entries(): IterableIterator<[K, V]> {
		for (const slot of this.order) {
			yield [slot.key, slot.value];
		}
	}

	private find(key: K): Slot<K, V> | undefined {
		const resolved = resolve(key);
		if (resolved.kind === 'primitive') {
			return this.primitives.get(resolved.key);
		}
		const bucket = this.buckets.get(resolved.hash);
		if (!bucket) return undefined;
		const index = this.indexIn(bucket, resolved.key);
		return index >= 0 ? bucket[index] : undefined;
	}

	private indexIn(bucket: Slot<K, V>[], key: HashableKey): number {
		return bucket.findIndex((slot) => key.equals(slot.key));
	}
}
