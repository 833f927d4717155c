/**
 * Text Enrichment Module
 */

export * from './extract.js';
