/**
 * @fileoverview 32-bit string hashing used for cache identity and keys
 */

/**
 * Polynomial (base 31) hash of a string, wrapped to a signed 32-bit integer
 */
export function hashString(value: string): number {
	let hash = 0;
	for (let i = 0; i < value.length; i++) {
		hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
	}
	return hash;
}
