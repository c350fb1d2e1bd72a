/**
 * Main types export for the pipeline lineage tracer
 */

// Common types
export * from './common.js';

// Lineage types
export * from './lineage.js';

// Extraction types
export * from './extraction.js';

// Error handling types
export * from './error-handling.js';
