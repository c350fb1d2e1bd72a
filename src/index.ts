/**
 * Pipeline lineage tracer
 *
 * Main entry point for the library
 */

// Export all types
export * from './types/index.js';

// Export all interfaces
export * from './interfaces/index.js';

// Export configuration
export * from './config/index.js';

// Export extractors
export * from './extractors/index.js';

// Export repository
export * from './repository/index.js';

// Export services
export * from './services/index.js';

// Export orchestrator
export * from './orchestrator/index.js';

// Export utilities
export * from './utils/table-identity.js';
export * from './utils/logger.js';
export * from './utils/csv.js';

export { main } from './cli/lineage-tracer.js';
