/**
 * Service interfaces for the pipeline lineage tracer
 */

import {
  EnumerationLimits,
  EnumerationResult,
  LineagePath,
  LineageRecord,
  LineageRow,
  TableName,
  Writer,
  WriterPolicyName
} from '../types/index.js';

/**
 * Writer Index interface
 * Answers "which scripts write table T?"; read-only once built
 */
export interface IWriterIndex {
  /** Indexed table names, sorted */
  tables(): TableName[];
  /** Writers registered while indexing, without re-checks */
  registeredWriters(table: TableName): Writer[];
  /** Confirmed writers, with the textual re-check and on-demand fallback */
  writersFor(table: TableName): Writer[];
  readonly size: number;
  readonly scannedFiles: number;
}

/**
 * Upstream Resolver interface
 * Tables a writer reads
 */
export interface IUpstreamResolver {
  upstreamsOf(writer: Writer): Set<TableName>;
}

/**
 * Writer Resolution Policy interface
 * Combines the upstream sets of the writers of one table
 */
export interface IWriterResolutionPolicy {
  readonly name: WriterPolicyName;
  combine(upstreamSets: Set<TableName>[]): Set<TableName>;
}

/**
 * Lineage Path Enumerator interface
 */
export interface ILineagePathEnumerator {
  enumeratePaths(target: TableName, limits?: Partial<EnumerationLimits>): EnumerationResult;
}

/**
 * Path-to-Row Shaper interface
 */
export interface IRowShaper {
  shape(target: TableName, paths: LineagePath[]): LineageRow[];
  columnsFor(rows: LineageRow[]): string[];
  toRecord(row: LineageRow): LineageRecord;
}

/**
 * Outcome of target expansion
 */
export interface TargetSelection {
  /** Canonical targets in request order, without duplicates */
  targets: TableName[];
  /** Requested bare names that matched no indexed table */
  unmatched: string[];
}

/**
 * Target Resolver interface
 * Turns requested target strings into canonical table names
 */
export interface ITargetResolver {
  resolveTargets(rawTargets: string[]): TargetSelection;
}
