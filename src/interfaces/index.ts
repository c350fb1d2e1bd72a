/**
 * Interfaces export
 */

export * from './services.js';
export * from './orchestrator.js';
