/**
 * Lineage generators for property-based testing
 */

import fc from 'fast-check';
import { IUpstreamResolver, IWriterIndex } from '../../interfaces/services.js';
import { LineageRow, TableName, Writer } from '../../types/index.js';

// ==================== Writer graphs ====================

/**
 * Table → one entry per writer, each listing the tables that writer reads.
 * Tables without an entry have no writer.
 */
export type WriterGraph = Record<TableName, TableName[][]>;

export const tableNamesFor = (count: number): TableName[] =>
  Array.from({ length: count }, (_, i) => `db.t${i}`);

/**
 * Qualified identifier in mixed case, e.g. `Stg_A.Orders_1`
 */
export const tableIdentifierGenerator = (): fc.Arbitrary<string> => {
  const part = fc
    .tuple(
      fc.constantFrom('a', 'B', 'c', 'D', 'stg', 'Rpt', 'dw'),
      fc.stringOf(fc.constantFrom('a', 'b', 'X', 'y', '_', '1', '2'), { maxLength: 6 })
    )
    .map(([head, tail]) => `${head}${tail}`);
  return fc.tuple(part, part).map(([schema, table]) => `${schema}.${table}_t`);
};

const writersGenerator = (candidates: TableName[]): fc.Arbitrary<TableName[][] | undefined> =>
  fc.option(
    fc.array(fc.subarray(candidates, { maxLength: Math.min(3, candidates.length) }), { minLength: 1, maxLength: 2 }),
    { nil: undefined }
  );

function toGraph(tables: TableName[], entries: Array<TableName[][] | undefined>): WriterGraph {
  const graph: WriterGraph = {};
  entries.forEach((writers, i) => {
    if (writers) graph[tables[i]] = writers;
  });
  return graph;
}

const entriesGenerator = (tables: TableName[]): fc.Arbitrary<Array<TableName[][] | undefined>> =>
  fc.array(writersGenerator(tables), { minLength: tables.length, maxLength: tables.length });

/**
 * Any graph over `db.t0 .. db.tN`, self-references and cycles included
 */
export const writerGraphGenerator = (maxTables: number = 6): fc.Arbitrary<WriterGraph> =>
  fc.integer({ min: 1, max: maxTables }).chain((count) => {
    const tables = tableNamesFor(count);
    return entriesGenerator(tables).map((entries) => toGraph(tables, entries));
  });

/**
 * Graph where `db.tI` only reads tables with a higher index
 */
export const acyclicWriterGraphGenerator = (maxTables: number = 6): fc.Arbitrary<WriterGraph> =>
  fc.integer({ min: 1, max: maxTables }).chain((count) => {
    const tables = tableNamesFor(count);
    return entriesGenerator(tables).map((entries) =>
      toGraph(
        tables,
        entries.map((writers, i) => writers?.map((reads) => reads.filter((table) => tables.indexOf(table) > i)))
      )
    );
  });

/**
 * Tables any writer of `table` reads
 */
export function upstreamsInGraph(graph: WriterGraph, table: TableName): Set<TableName> {
  return new Set((graph[table] ?? []).flat());
}

// ==================== Graph-backed fakes ====================

/**
 * Writer index over a WriterGraph; writer `i` of table `t` is script `t#i`
 */
export class GraphWriterIndex implements IWriterIndex {
  readonly scannedFiles: number;
  private readonly graph: WriterGraph;

  constructor(graph: WriterGraph) {
    this.graph = graph;
    this.scannedFiles = Object.values(graph).reduce((total, writers) => total + writers.length, 0);
  }

  get size(): number {
    return Object.keys(this.graph).length;
  }

  tables(): TableName[] {
    return Object.keys(this.graph).sort();
  }

  registeredWriters(table: TableName): Writer[] {
    return this.writersFor(table);
  }

  writersFor(table: TableName): Writer[] {
    return (this.graph[table] ?? []).map((_, i): Writer => ({ scriptPath: `${table}#${i}`, kind: 'pipeline_script' }));
  }
}

export class GraphUpstreamResolver implements IUpstreamResolver {
  calls = 0;
  private readonly graph: WriterGraph;
  private readonly onCall?: () => void;

  constructor(graph: WriterGraph, onCall?: () => void) {
    this.graph = graph;
    this.onCall = onCall;
  }

  upstreamsOf(writer: Writer): Set<TableName> {
    this.calls++;
    this.onCall?.();
    const separator = writer.scriptPath.lastIndexOf('#');
    const table = writer.scriptPath.slice(0, separator);
    const index = Number(writer.scriptPath.slice(separator + 1));
    return new Set(this.graph[table]?.[index] ?? []);
  }
}

// ==================== Corpus text ====================

/**
 * Spark job declaring `outputs` in its header and reading `reads`
 */
export function pipelineScript(outputs: TableName[], reads: TableName[] = []): string {
  return [
    '#####################################',
    '# Purpose : generated job',
    '# Output table(s):',
    ...outputs.map((table) => `#   ${table}`),
    '#',
    '#####################################',
    'from pyspark.sql import SparkSession',
    'spark = SparkSession.builder.getOrCreate()',
    ...reads.map((table, i) => `df${i} = spark.table('${table}')`),
    '',
  ].join('\n');
}

/**
 * One script per writer of a WriterGraph
 */
export function corpusFromGraph(graph: WriterGraph): Record<string, string> {
  const files: Record<string, string> = {};
  for (const [table, writers] of Object.entries(graph)) {
    writers.forEach((reads, i) => {
      files[`jobs/${table.replace('.', '_')}_${i}.py`] = pipelineScript([table], reads);
    });
  }
  return files;
}

// ==================== Rows ====================

export const lineageRowGenerator = (): fc.Arbitrary<LineageRow> => {
  const table = fc.integer({ min: 0, max: 7 }).map((i) => `db.t${i}`);
  return fc.record({
    target: table,
    layers: fc.array(table, { maxLength: 4 }),
    source: table,
  });
};
