/**
 * Writer Index
 *
 * Maps a canonical table name to the scripts that write it. Built once from the
 * corpus and read-only afterwards; lookups re-check each registered writer
 * against the script text and fall back to a direct re-scan when the index
 * holds nothing usable for a table.
 */

import { IWriterIndex } from '../interfaces/services.js';
import { ICorpusRepository } from '../repository/corpus-repository.js';
import { ExtractorRegistry } from '../extractors/extractor-registry.js';
import { ScriptPath, TableName, Writer } from '../types/index.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { bareTableName, tableNamePattern, toTableKey } from '../utils/table-identity.js';

// ==================== Construction ====================

/**
 * Append-only accumulator used while indexing
 */
export class WriterIndexBuilder {
  private entries: Map<TableName, Writer[]> = new Map();

  register(table: TableName, writer: Writer): void {
    const key = toTableKey(table);
    const writers = this.entries.get(key) ?? [];
    if (!writers.some((w) => sameWriter(w, writer))) {
      writers.push({ ...writer });
    }
    this.entries.set(key, writers);
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): ReadonlyMap<TableName, readonly Writer[]> {
    const copy = new Map<TableName, readonly Writer[]>();
    for (const key of [...this.entries.keys()].sort()) {
      copy.set(key, sortWriters(this.entries.get(key) ?? []));
    }
    return copy;
  }
}

function sameWriter(a: Writer, b: Writer): boolean {
  return a.scriptPath === b.scriptPath && a.kind === b.kind;
}

function sortWriters(writers: readonly Writer[]): Writer[] {
  return [...writers].sort((a, b) =>
    a.scriptPath === b.scriptPath ? a.kind.localeCompare(b.kind) : a.scriptPath < b.scriptPath ? -1 : 1
  );
}

// ==================== Index ====================

export class WriterIndex implements IWriterIndex {
  private readonly entries: ReadonlyMap<TableName, readonly Writer[]>;
  private readonly repository: ICorpusRepository;
  private readonly registry: ExtractorRegistry;
  private readonly logger: Logger;
  readonly scannedFiles: number;

  private loweredText: Map<ScriptPath, string | undefined> = new Map();
  private confirmed: Map<TableName, Writer[]> = new Map();

  private constructor(
    entries: ReadonlyMap<TableName, readonly Writer[]>,
    repository: ICorpusRepository,
    registry: ExtractorRegistry,
    scannedFiles: number,
    logger: Logger
  ) {
    this.entries = entries;
    this.repository = repository;
    this.registry = registry;
    this.scannedFiles = scannedFiles;
    this.logger = logger;
  }

  /**
   * Scan every source file once and register the tables it writes
   */
  static fromCorpus(
    repository: ICorpusRepository,
    registry: ExtractorRegistry,
    logger: Logger = defaultLogger.child('writer-index')
  ): WriterIndex {
    const builder = new WriterIndexBuilder();
    let scanned = 0;

    for (const path of repository.listSourceFiles()) {
      const text = repository.readText(path);
      if (text === undefined) continue;
      scanned++;

      for (const extractor of registry.forFile(path)) {
        const written = extractor.extractWrittenTables(text);
        if (written.size > 0) {
          logger.debug('Writer found', { path, kind: extractor.writerKind, tables: [...written].sort() });
        }
        for (const table of written) {
          builder.register(table, { scriptPath: path, kind: extractor.writerKind });
        }
      }
    }

    logger.info('Indexing done', { scannedFiles: scanned, tables: builder.size });
    return new WriterIndex(builder.snapshot(), repository, registry, scanned, logger);
  }

  get size(): number {
    return this.entries.size;
  }

  tables(): TableName[] {
    return [...this.entries.keys()];
  }

  registeredWriters(table: TableName): Writer[] {
    return [...(this.entries.get(toTableKey(table)) ?? [])];
  }

  writersFor(table: TableName): Writer[] {
    const key = toTableKey(table);
    const cached = this.confirmed.get(key);
    if (cached) return [...cached];

    const registered = this.entries.get(key) ?? [];
    let writers = registered.filter((writer) => this.mentions(writer.scriptPath, key, this.expandsMacros(writer)));

    if (writers.length === 0) {
      if (registered.length > 0) {
        this.logger.debug('Registered writers failed the text re-check; re-scanning', { table: key });
      }
      writers = this.rescan(key);
    }

    const result = sortWriters(writers);
    this.confirmed.set(key, result);
    this.logger.debug('Writers resolved', { table: key, writers: result.length });
    return [...result];
  }

  /**
   * Parse every file that mentions the table and keep those whose extractors
   * report writing it
   */
  private rescan(table: TableName): Writer[] {
    const found: Writer[] = [];
    for (const path of this.repository.listSourceFiles()) {
      for (const extractor of this.registry.forFile(path)) {
        if (!this.mentions(path, table, extractor.expandsMacros)) continue;
        const text = this.repository.readText(path);
        if (text === undefined) continue;
        if (extractor.extractWrittenTables(text).has(table)) {
          found.push({ scriptPath: path, kind: extractor.writerKind });
        }
      }
    }
    return found;
  }

  /**
   * Whether the script text contains the table's literal name. Scripts that
   * assemble names from macro variables only need to contain the table part.
   */
  private mentions(path: ScriptPath, table: TableName, allowBareMatch: boolean): boolean {
    const text = this.lowered(path);
    if (text === undefined) return false;
    if (tableNamePattern(table).test(text)) return true;
    return allowBareMatch && tableNamePattern(bareTableName(table)).test(text);
  }

  private expandsMacros(writer: Writer): boolean {
    return this.registry.forKind(writer.kind)?.expandsMacros ?? false;
  }

  private lowered(path: ScriptPath): string | undefined {
    if (!this.loweredText.has(path)) {
      this.loweredText.set(path, this.repository.readText(path)?.toLowerCase());
    }
    return this.loweredText.get(path);
  }
}
