/**
 * Lineage Tracer Orchestrator
 * Central coordinator for one corpus: builds the writer index once, then
 * resolves, enumerates and shapes the requested targets
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ErrorCategory,
  ERROR_HANDLERS,
  LineageDiagnostic,
  LineageRow,
  LineageRunReport,
  ScriptTableSummary,
  ScriptTargetPair,
  TargetLineage
} from '../types/index.js';
import { ILineageTracerOrchestrator, IWriterResolutionPolicy } from '../interfaces/index.js';
import { ICorpusRepository } from '../repository/index.js';
import { ExtractorRegistry } from '../extractors/index.js';
import { DEFAULT_TRACER_CONFIG, TracerConfig } from '../config/index.js';
import {
  LineagePathEnumerator,
  LineageRowShaper,
  TargetResolver,
  UpstreamResolver,
  UpstreamUnionCache,
  WriterIndex,
  buildScriptTargetMapping,
  createWriterPolicy,
  expandLayers,
  inspectScripts
} from '../services/index.js';
import { Logger, defaultLogger } from '../utils/logger.js';

export interface LineageTracerDependencies {
  repository: ICorpusRepository;
  registry?: ExtractorRegistry;
  config?: TracerConfig;
  logger?: Logger;
  /** Overrides the policy named in the configuration */
  policy?: IWriterResolutionPolicy;
  clock?: () => number;
}

export class LineageTracerOrchestrator implements ILineageTracerOrchestrator {
  private readonly repository: ICorpusRepository;
  private readonly registry: ExtractorRegistry;
  private readonly config: TracerConfig;
  private readonly logger: Logger;
  private readonly policy: IWriterResolutionPolicy;
  private readonly clock?: () => number;
  private readonly shaper = new LineageRowShaper();
  private writerIndex?: WriterIndex;

  constructor(deps: LineageTracerDependencies) {
    this.repository = deps.repository;
    this.config = deps.config ?? DEFAULT_TRACER_CONFIG;
    this.logger = deps.logger ?? defaultLogger.child('tracer');
    this.registry = deps.registry ?? ExtractorRegistry.withDefaults(this.logger);
    this.policy = deps.policy ?? createWriterPolicy(this.config.writerPolicy);
    this.clock = deps.clock;
  }

  /**
   * Writer index for the corpus, built on first use
   */
  getWriterIndex(): WriterIndex {
    if (!this.writerIndex) {
      this.writerIndex = WriterIndex.fromCorpus(this.repository, this.registry, this.logger.child('writer-index'));
    }
    return this.writerIndex;
  }

  /**
   * Full lineage of the requested targets, grouped by target in request order.
   * Throws TargetSelectionError when no target survives expansion.
   */
  trace(rawTargets: string[]): LineageRunReport {
    const startedAt = new Date();
    const runId = uuidv4();
    const logger = this.logger.child(runId.slice(0, 8));
    const diagnostics: LineageDiagnostic[] = [];

    const writerIndex = this.getWriterIndex();
    const selection = new TargetResolver(writerIndex, logger).resolveTargets(rawTargets);
    for (const name of selection.unmatched) {
      diagnostics.push({
        category: ErrorCategory.UNRESOLVABLE_IDENTIFIER,
        message: `No indexed table matches bare target ${name}`,
        table: name,
      });
    }

    const enumerator = new LineagePathEnumerator({
      writerIndex,
      upstreamResolver: new UpstreamResolver(this.repository, this.registry, logger.child('upstreams')),
      policy: this.policy,
      limits: {
        maxPathsPerTarget: this.config.maxPathsPerTarget,
        maxDepth: this.config.maxDepth,
        timeBudgetMs: this.config.timeBudgetMs,
      },
      cache: new UpstreamUnionCache(),
      logger: logger.child('enumerator'),
      clock: this.clock,
    });

    const targets: TargetLineage[] = [];
    for (const target of selection.targets) {
      logger.info('Lineage started', { target });
      const result = enumerator.enumeratePaths(target);
      const rows = this.shaper.shape(target, result.paths);
      targets.push({ target, result, rows });
      diagnostics.push(...this.diagnosticsFor(target, result, enumerator));
      logger.info('Lineage done', { target, paths: result.paths.length, truncated: result.truncated });
    }

    for (const scriptPath of this.repository.unreadableFiles()) {
      diagnostics.push({
        category: ErrorCategory.UNREADABLE_SOURCE,
        message: ERROR_HANDLERS[ErrorCategory.UNREADABLE_SOURCE].userMessage,
        scriptPath,
      });
    }

    let rows: LineageRow[] = targets.flatMap((entry) => entry.rows);
    if (this.config.expandLayers) {
      const before = rows.length;
      rows = expandLayers(rows);
      logger.info('Layers promoted to targets', { rows: before, expandedRows: rows.length });
    }

    return {
      runId,
      startedAt,
      completedAt: new Date(),
      indexedTables: writerIndex.size,
      scannedFiles: writerIndex.scannedFiles,
      targets,
      rows,
      columns: this.shaper.columnsFor(rows),
      diagnostics,
    };
  }

  mapScripts(): ScriptTargetPair[] {
    return buildScriptTargetMapping(this.repository, this.registry, this.logger.child('script-mapping'));
  }

  inspect(): ScriptTableSummary[] {
    return inspectScripts(this.repository, this.registry);
  }

  getShaper(): LineageRowShaper {
    return this.shaper;
  }

  private diagnosticsFor(
    target: string,
    result: TargetLineage['result'],
    enumerator: LineagePathEnumerator
  ): LineageDiagnostic[] {
    const diagnostics: LineageDiagnostic[] = [];

    if (enumerator.resolve(target).writers.length === 0) {
      diagnostics.push({
        category: ErrorCategory.MISSING_WRITER,
        message: `Target ${target} has no writer and is reported as its own source`,
        table: target,
      });
    }
    for (const notice of result.ambiguousWriters) {
      diagnostics.push({
        category: ErrorCategory.AMBIGUOUS_WRITER,
        message: `${notice.table} has ${notice.writers.length} writers: ${notice.writers.map((w) => w.scriptPath).join(', ')}`,
        table: notice.table,
      });
    }
    for (const cycle of result.cycles) {
      diagnostics.push({
        category: ErrorCategory.CYCLE_DETECTED,
        message: `Cycle cut at ${cycle.table}: ${cycle.chain.join(' -> ')}`,
        table: cycle.table,
      });
    }
    if (result.truncated) {
      diagnostics.push({
        category: ErrorCategory.PATH_BUDGET_EXCEEDED,
        message: `Lineage of ${target} truncated (${result.truncationReasons.join(', ')})`,
        table: target,
      });
    }
    return diagnostics;
  }
}
