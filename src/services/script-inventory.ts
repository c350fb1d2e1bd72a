/**
 * Script inventory
 *
 * Per-script views of the corpus: which tables each script produces, and how
 * each script's tables split into inputs, intermediates and outputs.
 */

import { ExtractorRegistry } from '../extractors/extractor-registry.js';
import { ICorpusRepository } from '../repository/corpus-repository.js';
import { ScriptPath, ScriptTableSummary, ScriptTargetPair, TableName, TableUsage } from '../types/index.js';
import { CsvRecord } from '../utils/csv.js';
import { Logger, defaultLogger } from '../utils/logger.js';

export const SCRIPT_COLUMN = 'script name';
export const TARGET_TABLE_COLUMN = 'target table';

function usageOf(path: ScriptPath, text: string, registry: ExtractorRegistry): TableUsage {
  const usage: TableUsage = { reads: new Set(), writes: new Set() };
  for (const extractor of registry.forFile(path)) {
    const found = extractor.analyse(text);
    for (const table of found.reads) usage.reads.add(table);
    for (const table of found.writes) usage.writes.add(table);
  }
  return usage;
}

function sorted(tables: Iterable<TableName>): TableName[] {
  return [...tables].sort();
}

/**
 * One pair per table each script writes, sorted by script then table
 */
export function buildScriptTargetMapping(
  repository: ICorpusRepository,
  registry: ExtractorRegistry,
  logger: Logger = defaultLogger.child('script-mapping')
): ScriptTargetPair[] {
  const pairs: ScriptTargetPair[] = [];

  for (const script of repository.listSourceFiles()) {
    const text = repository.readText(script);
    if (text === undefined) continue;

    const written = new Set<TableName>();
    for (const extractor of registry.forFile(script)) {
      for (const table of extractor.extractWrittenTables(text)) written.add(table);
    }
    if (written.size === 0) {
      logger.debug('No targets detected', { script });
      continue;
    }
    for (const table of written) pairs.push({ script, table });
  }

  pairs.sort((a, b) => (a.script === b.script ? compare(a.table, b.table) : compare(a.script, b.script)));
  logger.info('Script to target mapping built', { pairs: pairs.length });
  return pairs;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function mappingRecords(pairs: ScriptTargetPair[]): CsvRecord[] {
  return pairs.map((pair) => ({ [SCRIPT_COLUMN]: pair.script, [TARGET_TABLE_COLUMN]: pair.table }));
}

/**
 * Inputs (read only), intermediates (read and written) and outputs (written only) per script
 */
export function inspectScripts(repository: ICorpusRepository, registry: ExtractorRegistry): ScriptTableSummary[] {
  const summaries: ScriptTableSummary[] = [];
  for (const script of repository.listSourceFiles()) {
    const text = repository.readText(script);
    if (text === undefined) continue;
    const { reads, writes } = usageOf(script, text, registry);
    summaries.push({
      script,
      inputs: sorted([...reads].filter((table) => !writes.has(table))),
      intermediates: sorted([...reads].filter((table) => writes.has(table))),
      outputs: sorted([...writes].filter((table) => !reads.has(table))),
    });
  }
  return summaries;
}

function tableList(title: string, tables: TableName[]): string[] {
  return [`${title}:`, ...(tables.length > 0 ? tables.map((table) => `    - ${table}`) : ['    (none)'])];
}

export function formatInspection(summaries: ScriptTableSummary[]): string {
  if (summaries.length === 0) return 'No source files found.\n';
  const lines: string[] = [];
  for (const summary of summaries) {
    lines.push(`=== ${summary.script} ===`);
    lines.push(...tableList('Input Tables', summary.inputs));
    lines.push(...tableList('Intermediate Tables', summary.intermediates));
    lines.push(...tableList('Output Tables', summary.outputs));
    lines.push('');
  }
  return `${lines.join('\n')}\n`;
}
