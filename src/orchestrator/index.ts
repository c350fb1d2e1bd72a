/**
 * Orchestrator export
 */

export * from './lineage-tracer-orchestrator.js';
