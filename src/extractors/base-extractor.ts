/**
 * Shared behaviour of the dialect extractors
 */

import { TableName, WriterKind } from '../types/common.js';
import { DialectExtractor, TableUsage } from '../types/extraction.js';

export function emptyUsage(): TableUsage {
  return { reads: new Set(), writes: new Set() };
}

/**
 * Extractors implement `analyse`; the read and write views derive from it
 */
export abstract class BaseDialectExtractor implements DialectExtractor {
  abstract readonly name: string;
  abstract readonly extensions: readonly string[];
  abstract readonly writerKind: WriterKind;
  readonly expandsMacros: boolean = false;

  abstract analyse(text: string): TableUsage;

  extractWrittenTables(text: string): Set<TableName> {
    return this.analyse(text).writes;
  }

  extractReadTables(text: string): Set<TableName> {
    return this.analyse(text).reads;
  }
}
