/**
 * Common types for the pipeline lineage tracer
 */

/**
 * Canonical table identity: `schema.table` or a bare name, lower-cased
 */
export type TableName = string;

/**
 * Script location relative to the corpus root, `/`-separated
 */
export type ScriptPath = string;

/**
 * Extraction rule a writer's upstream set is computed with
 */
export type WriterKind = 'pipeline_script' | 'view_definition' | 'sas_program';

/**
 * Log severity, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * How upstream sets of several writers of the same table are combined
 */
export type WriterPolicyName = 'union' | 'intersection';
