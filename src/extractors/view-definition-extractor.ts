/**
 * View definition extractor
 *
 * A `.sql` file producing `CREATE [OR REPLACE] VIEW schema.view` writes that
 * view and reads every qualified table after FROM or JOIN.
 */

import { TableName, WriterKind } from '../types/common.js';
import { TableUsage } from '../types/extraction.js';
import { qualifyTableName } from '../utils/table-identity.js';
import { BaseDialectExtractor } from './base-extractor.js';

const RE_CREATE_VIEW = /\bcreate\s+(?:or\s+replace\s+)?view\s+(?:if\s+not\s+exists\s+)?([a-z0-9_]+(?:\.[a-z0-9_]+)?)\b/g;
const RE_FROM_JOIN = /\b(?:from|join)\s+([a-z0-9_]+)\.([a-z0-9_]+)\b/g;

/**
 * Names of the views a SQL text creates; unqualified names are dropped
 */
export function parseViewNames(text: string): Set<TableName> {
  const views = new Set<TableName>();
  for (const match of text.toLowerCase().matchAll(RE_CREATE_VIEW)) {
    if (match[1].includes('.')) views.add(match[1]);
  }
  return views;
}

export class ViewDefinitionExtractor extends BaseDialectExtractor {
  readonly name = 'view-definition';
  readonly extensions: readonly string[] = ['.sql'];
  readonly writerKind: WriterKind = 'view_definition';

  analyse(text: string): TableUsage {
    const reads = new Set<TableName>();
    for (const match of text.toLowerCase().matchAll(RE_FROM_JOIN)) {
      reads.add(qualifyTableName(match[1], match[2]));
    }
    return { reads, writes: parseViewNames(text) };
  }
}
