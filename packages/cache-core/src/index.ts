/**
 * @fileoverview Public entry point of @query-cache/core
 *
 * In-memory query result caching: an unbounded store, LRU and FIFO
 * eviction, and a per-key stampede guard, composed as decorators.
 */

export * from './cache/index.js';
export * from './errors/index.js';
export * from './logger/index.js';
export * from './utils/index.js';
