/**
 * Extraction types for dialect-specific table detection
 */

import { TableName, WriterKind } from './common.js';

/**
 * Tables a script reads and writes, as detected from its text
 */
export interface TableUsage {
  reads: Set<TableName>;
  writes: Set<TableName>;
}

/**
 * Pure text → tables rule for one source dialect
 */
export interface DialectExtractor {
  readonly name: string;
  /** Lower-cased file extensions including the dot */
  readonly extensions: readonly string[];
  readonly writerKind: WriterKind;
  /**
   * Table names may be assembled from macro variables, so the source text
   * need not contain them literally
   */
  readonly expandsMacros: boolean;
  analyse(text: string): TableUsage;
  extractWrittenTables(text: string): Set<TableName>;
  extractReadTables(text: string): Set<TableName>;
}
