/**
 * Services export
 */

export * from './writer-index.js';
export * from './upstream-resolver.js';
export * from './writer-policy.js';
export * from './lineage-path-enumerator.js';
export * from './row-shaper.js';
export * from './layer-expansion.js';
export * from './script-inventory.js';
export * from './target-resolver.js';
