/**
 * Lineage types for the pipeline lineage tracer
 */

import { ScriptPath, TableName, WriterKind } from './common.js';
import { ErrorCategory } from './error-handling.js';

/**
 * A script (or view definition) believed to produce a table
 */
export interface Writer {
  scriptPath: ScriptPath;
  kind: WriterKind;
}

/**
 * Ordered chain `[target, layer1, ..., source]`. A table appears at most once,
 * except that a cycle cut ends the chain with the table that recurred.
 */
export type LineagePath = TableName[];

/**
 * Shaped form of one lineage path
 */
export interface LineageRow {
  target: TableName;
  /** Intermediate tables, `Layer 1` first */
  layers: TableName[];
  source: TableName;
}

/**
 * Flat record keyed by output column name
 */
export type LineageRecord = Record<string, string>;

/**
 * Why enumeration of a target stopped early
 */
export type TruncationReason = 'max_paths' | 'max_depth' | 'time_budget';

/**
 * Limits applied to a single target's enumeration
 */
export interface EnumerationLimits {
  maxPathsPerTarget: number;
  maxDepth: number;
  /** 0 disables the wall-clock budget */
  timeBudgetMs: number;
}

export const DEFAULT_ENUMERATION_LIMITS: EnumerationLimits = {
  maxPathsPerTarget: 10000,
  maxDepth: 64,
  timeBudgetMs: 0
};

/**
 * A branch cut because the table recurred in its own ancestor chain
 */
export interface CycleWarning {
  table: TableName;
  /** Ancestors from the target down, followed by the recurring table */
  chain: TableName[];
}

/**
 * A table produced by more than one writer
 */
export interface AmbiguousWriterNotice {
  table: TableName;
  writers: Writer[];
}

/**
 * Writers and combined upstream set resolved for one table
 */
export interface ResolvedUpstreams {
  table: TableName;
  writers: Writer[];
  upstreams: TableName[];
}

/**
 * Result of enumerating one target
 */
export interface EnumerationResult {
  target: TableName;
  paths: LineagePath[];
  truncated: boolean;
  truncationReasons: TruncationReason[];
  cycles: CycleWarning[];
  ambiguousWriters: AmbiguousWriterNotice[];
}

/**
 * Non-fatal condition recorded during a run
 */
export interface LineageDiagnostic {
  category: ErrorCategory;
  message: string;
  table?: TableName;
  scriptPath?: ScriptPath;
}

/**
 * Lineage of one requested target
 */
export interface TargetLineage {
  target: TableName;
  result: EnumerationResult;
  rows: LineageRow[];
}

/**
 * Everything produced by one `trace` run
 */
export interface LineageRunReport {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  indexedTables: number;
  scannedFiles: number;
  targets: TargetLineage[];
  rows: LineageRow[];
  columns: string[];
  diagnostics: LineageDiagnostic[];
}

/**
 * One script → written table pair
 */
export interface ScriptTargetPair {
  script: ScriptPath;
  table: TableName;
}

/**
 * Table usage of a single script
 */
export interface ScriptTableSummary {
  script: ScriptPath;
  inputs: TableName[];
  intermediates: TableName[];
  outputs: TableName[];
}
