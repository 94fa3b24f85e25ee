/**
 * @fileoverview Cache key types and the composite CacheKey
 *
 * Keys are compared by value, never by reference. Primitive keys use
 * SameValueZero (the semantics of Map); object keys must implement
 * HashableKey so the key table can bucket by hash and compare by equals.
 */

import { CacheError, ERROR_CODES } from '../errors/cache-error.js';
import { hashString } from '../utils/hash.js';

/**
 * Object key with value-based equality
 *
 * Implementations must keep the pair consistent: equal keys return equal
 * hash codes, and neither result changes while the key is stored.
 */
export interface HashableKey {
	equals(other: unknown): boolean;
	hashCode(): number;
}

export type PrimitiveKey = string | number | bigint | boolean | null | undefined;

/**
 * Anything accepted as a cache key
 */
export type CacheKeyValue = PrimitiveKey | HashableKey;

/**
 * A component folded into a CacheKey. Lists are compared element-wise.
 */
export type CacheKeyPart = PrimitiveKey | HashableKey | readonly CacheKeyPart[];

export function isHashableKey(value: unknown): value is HashableKey {
	return (
		typeof value === 'object' &&
		value !== null &&
		'equals' in value &&
		typeof value.equals === 'function' &&
		'hashCode' in value &&
		typeof value.hashCode === 'function'
	);
}

function isPartList(part: CacheKeyPart): part is readonly CacheKeyPart[] {
	return Array.isArray(part);
}

/**
 * Render a key for log lines and error messages
 */
export function describeKey(key: CacheKeyPart): string {
	if (isPartList(key)) {
		return `[${key.map(describeKey).join(',')}]`;
	}
	return String(key);
}

function hashPart(part: CacheKeyPart): number {
	if (part === null) return 1;
	if (part === undefined) return 0;
	if (isPartList(part)) {
		let hash = 1;
		for (const item of part) {
			hash = (Math.imul(31, hash) + hashPart(item)) | 0;
		}
		return hash;
	}
	if (isHashableKey(part)) return part.hashCode() | 0;

	switch (typeof part) {
		case 'string':
			return hashString(part);
		case 'boolean':
			return part ? 1231 : 1237;
		case 'bigint':
			return hashString(`${part}n`);
		default:
			// String(-0) is '0', keeping 0 and -0 in one bucket
			return hashString(String(part));
	}
}

function partsEqual(a: CacheKeyPart, b: CacheKeyPart): boolean {
	if (isPartList(a)) {
		return (
			isPartList(b) &&
			a.length === b.length &&
			a.every((item, index) => partsEqual(item, b[index]))
		);
	}
	if (isHashableKey(a)) return a.equals(b);
	return a === b || Object.is(a, b);
}

const DEFAULT_MULTIPLIER = 37;
const DEFAULT_HASHCODE = 17;

/**
 * Composite key built by folding parts (statement id, parameters, paging
 * bounds, ...) into a running hash and checksum.
 *
 * @example
 * ```typescript
 * const key = new CacheKey()
 *   .update('selectUser')
 *   .update([42])
 *   .update(0)
 *   .update(100);
 * await cache.putObject(key, rows);
 * ```
 */
export class CacheKey implements HashableKey {
	/**
	 * Shared empty key. Any update throws.
	 */
	static readonly NULL_KEY: CacheKey = new CacheKey().seal();

	private hash = DEFAULT_HASHCODE;
	private checksum = 0;
	private count = 0;
	private readonly parts: CacheKeyPart[] = [];
	private sealed = false;

	constructor(parts: readonly CacheKeyPart[] = []) {
		this.updateAll(parts);
	}

	update(part: CacheKeyPart): this {
		if (this.sealed) {
			throw new CacheError(
				'Not allowed to update a null cache key instance.',
				ERROR_CODES.IMMUTABLE_CACHE_KEY,
				{ operation: 'update' }
			);
		}

		const baseHash = hashPart(part);
		this.count++;
		this.checksum = (this.checksum + baseHash) | 0;
		this.hash =
			(Math.imul(DEFAULT_MULTIPLIER, this.hash) +
				Math.imul(baseHash, this.count)) |
			0;
		this.parts.push(part);
		return this;
	}

	updateAll(parts: readonly CacheKeyPart[]): this {
		for (const part of parts) {
			this.update(part);
		}
		return this;
	}

	getUpdateCount(): number {
		return this.count;
	}

	equals(other: unknown): boolean {
		if (this === other) return true;
		if (!(other instanceof CacheKey)) return false;
		if (
			this.hash !== other.hash ||
			this.checksum !== other.checksum ||
			this.count !== other.count
		) {
			return false;
		}
		return this.parts.every((part, index) =>
			partsEqual(part, other.parts[index])
		);
	}

	hashCode(): number {
		return this.hash;
	}

	/**
	 * Mutable copy with the same parts
	 */
	clone(): CacheKey {
		return new CacheKey(this.parts);
	}

	toString(): string {
		const rendered = this.parts.map((part) => `:${describeKey(part)}`).join('');
		return `${this.hash}:${this.checksum}${rendered}`;
	}

	private seal(): this {
		this.sealed = true;
		return this;
	}
}
