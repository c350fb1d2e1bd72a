/**
 * Upstream Resolver
 * Reads a writer's script and asks the extractor for its kind which tables it reads
 */

import { IUpstreamResolver } from '../interfaces/services.js';
import { ICorpusRepository } from '../repository/corpus-repository.js';
import { ExtractorRegistry } from '../extractors/extractor-registry.js';
import { TableName, Writer } from '../types/index.js';
import { Logger, defaultLogger } from '../utils/logger.js';

export class UpstreamResolver implements IUpstreamResolver {
  private readonly repository: ICorpusRepository;
  private readonly registry: ExtractorRegistry;
  private readonly logger: Logger;
  private cache: Map<string, ReadonlySet<TableName>> = new Map();

  constructor(
    repository: ICorpusRepository,
    registry: ExtractorRegistry,
    logger: Logger = defaultLogger.child('upstreams')
  ) {
    this.repository = repository;
    this.registry = registry;
    this.logger = logger;
  }

  /**
   * Tables read by the writer's script; empty when the script cannot be read
   * or no extractor handles the writer's kind
   */
  upstreamsOf(writer: Writer): Set<TableName> {
    const key = `${writer.kind}:${writer.scriptPath}`;
    let upstreams = this.cache.get(key);
    if (!upstreams) {
      upstreams = this.extract(writer);
      this.cache.set(key, upstreams);
    }
    return new Set(upstreams);
  }

  get cachedWriters(): number {
    return this.cache.size;
  }

  private extract(writer: Writer): ReadonlySet<TableName> {
    const extractor = this.registry.forKind(writer.kind);
    if (!extractor) {
      this.logger.warn('No extractor registered for writer kind', { ...writer });
      return new Set();
    }

    const text = this.repository.readText(writer.scriptPath);
    if (text === undefined) {
      this.logger.warn('Writer script could not be read; treating its upstreams as empty', { ...writer });
      return new Set();
    }

    const upstreams = extractor.extractReadTables(text);
    this.logger.debug('Upstreams extracted', { ...writer, upstreams: [...upstreams].sort() });
    return upstreams;
  }
}
