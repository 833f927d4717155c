/**
 * Record Processing Module
 *
 * Exports normalization, deduplication and assembly functions.
 */

export * from './normalize.js';
export * from './dedup.js';
export * from './assemble.js';
