/**
 * Lineage Path Enumerator
 *
 * Depth-first walk from a target table down the writer graph, producing every
 * distinct path `[target, layer1, ..., source]`. A table that recurs in its own
 * ancestor chain ends its branch as a one-element path. Upstream sets are
 * resolved once per table and reused by every target the enumerator serves.
 * Path count, depth and wall-clock budgets stop a target early; the result is
 * then flagged as truncated.
 */

import {
  ILineagePathEnumerator,
  IUpstreamResolver,
  IWriterIndex,
  IWriterResolutionPolicy
} from '../interfaces/services.js';
import {
  AmbiguousWriterNotice,
  CycleWarning,
  DEFAULT_ENUMERATION_LIMITS,
  EnumerationLimits,
  EnumerationResult,
  ErrorCategory,
  ERROR_HANDLERS,
  LineagePath,
  ResolvedUpstreams,
  TableName,
  TruncationReason
} from '../types/index.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { toTableKey } from '../utils/table-identity.js';
import { UnionWriterPolicy } from './writer-policy.js';

// ==================== Upstream cache ====================

/**
 * Resolved upstreams per table. Entries are written once; a value computed
 * twice for the same key is discarded in favour of the first.
 */
export class UpstreamUnionCache {
  private entries: Map<TableName, ResolvedUpstreams> = new Map();

  getOrCompute(table: TableName, compute: () => ResolvedUpstreams): ResolvedUpstreams {
    const existing = this.entries.get(table);
    if (existing) return existing;
    const computed = compute();
    const raced = this.entries.get(table);
    if (raced) return raced;
    this.entries.set(table, computed);
    return computed;
  }

  has(table: TableName): boolean {
    return this.entries.has(table);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ==================== Enumerator ====================

/**
 * Overlay the finite fields of `overrides` on `base`; missing or undefined
 * fields keep the base value
 */
export function mergeLimits(base: EnumerationLimits, overrides: Partial<EnumerationLimits> = {}): EnumerationLimits {
  const pick = (value: number | undefined, fallback: number): number =>
    value !== undefined && Number.isFinite(value) ? value : fallback;
  return {
    maxPathsPerTarget: pick(overrides.maxPathsPerTarget, base.maxPathsPerTarget),
    maxDepth: pick(overrides.maxDepth, base.maxDepth),
    timeBudgetMs: pick(overrides.timeBudgetMs, base.timeBudgetMs),
  };
}

export interface PathEnumeratorDependencies {
  writerIndex: IWriterIndex;
  upstreamResolver: IUpstreamResolver;
  policy?: IWriterResolutionPolicy;
  limits?: Partial<EnumerationLimits>;
  cache?: UpstreamUnionCache;
  logger?: Logger;
  /** Milliseconds since some fixed point; Date.now by default */
  clock?: () => number;
}

interface WalkState {
  target: TableName;
  limits: EnumerationLimits;
  deadline?: number;
  emitted: number;
  stopped: boolean;
  truncationReasons: Set<TruncationReason>;
  cycles: CycleWarning[];
  ambiguousWriters: Map<TableName, AmbiguousWriterNotice>;
}

export class LineagePathEnumerator implements ILineagePathEnumerator {
  private readonly writerIndex: IWriterIndex;
  private readonly upstreamResolver: IUpstreamResolver;
  private readonly policy: IWriterResolutionPolicy;
  private readonly limits: EnumerationLimits;
  private readonly cache: UpstreamUnionCache;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(deps: PathEnumeratorDependencies) {
    this.writerIndex = deps.writerIndex;
    this.upstreamResolver = deps.upstreamResolver;
    this.policy = deps.policy ?? new UnionWriterPolicy();
    this.limits = mergeLimits(DEFAULT_ENUMERATION_LIMITS, deps.limits);
    this.cache = deps.cache ?? new UpstreamUnionCache();
    this.logger = deps.logger ?? defaultLogger.child('enumerator');
    this.clock = deps.clock ?? Date.now;
  }

  enumeratePaths(target: TableName, limits: Partial<EnumerationLimits> = {}): EnumerationResult {
    const effective = mergeLimits(this.limits, limits);
    const key = toTableKey(target);
    const state: WalkState = {
      target: key,
      limits: effective,
      deadline: effective.timeBudgetMs > 0 ? this.clock() + effective.timeBudgetMs : undefined,
      emitted: 0,
      stopped: false,
      truncationReasons: new Set(),
      cycles: [],
      ambiguousWriters: new Map(),
    };

    let paths = this.walk(key, [], state);
    if (paths.length === 0) {
      // every branch was stopped before reaching a terminal
      paths = [[key]];
    }

    const truncationReasons = [...state.truncationReasons].sort();
    for (const reason of truncationReasons) {
      this.logger.warn(ERROR_HANDLERS[ErrorCategory.PATH_BUDGET_EXCEEDED].userMessage, {
        target: key,
        reason,
        paths: paths.length,
      });
    }

    return {
      target: key,
      paths,
      truncated: truncationReasons.length > 0,
      truncationReasons,
      cycles: state.cycles,
      ambiguousWriters: [...state.ambiguousWriters.values()].sort((a, b) => (a.table < b.table ? -1 : 1)),
    };
  }

  /**
   * Resolved writers and combined upstreams of a table, through the shared cache
   */
  resolve(table: TableName): ResolvedUpstreams {
    const key = toTableKey(table);
    return this.cache.getOrCompute(key, () => {
      const writers = this.writerIndex.writersFor(key);
      if (writers.length === 0) {
        this.logger.debug(ERROR_HANDLERS[ErrorCategory.MISSING_WRITER].userMessage, { table: key });
        return { table: key, writers, upstreams: [] };
      }
      const combined = this.policy.combine(writers.map((writer) => this.upstreamResolver.upstreamsOf(writer)));
      return { table: key, writers, upstreams: [...combined].sort() };
    });
  }

  private walk(table: TableName, ancestors: TableName[], state: WalkState): LineagePath[] {
    if (ancestors.includes(table)) {
      const chain = [...ancestors, table];
      state.cycles.push({ table, chain });
      this.logger.warn(ERROR_HANDLERS[ErrorCategory.CYCLE_DETECTED].userMessage, {
        target: state.target,
        table,
        chain: chain.join(' -> '),
      });
      return this.leaf(table, state);
    }

    if (this.exhausted(state)) return [];

    const resolved = this.resolve(table);
    if (resolved.writers.length > 1 && !state.ambiguousWriters.has(table)) {
      state.ambiguousWriters.set(table, { table, writers: resolved.writers });
      this.logger.info(ERROR_HANDLERS[ErrorCategory.AMBIGUOUS_WRITER].userMessage, {
        table,
        writers: resolved.writers.map((writer) => writer.scriptPath),
        policy: this.policy.name,
      });
    }

    if (resolved.writers.length === 0 || resolved.upstreams.length === 0) {
      return this.leaf(table, state);
    }

    if (ancestors.length + 1 >= state.limits.maxDepth) {
      state.truncationReasons.add('max_depth');
      return this.leaf(table, state);
    }

    const chain = [...ancestors, table];
    const paths: LineagePath[] = [];
    for (const upstream of resolved.upstreams) {
      if (state.stopped) break;
      for (const subPath of this.walk(upstream, chain, state)) {
        paths.push([table, ...subPath]);
      }
    }
    return paths;
  }

  /**
   * A branch ending at `table`, unless the path budget is spent
   */
  private leaf(table: TableName, state: WalkState): LineagePath[] {
    if (state.stopped) return [];
    if (state.emitted >= state.limits.maxPathsPerTarget) {
      state.truncationReasons.add('max_paths');
      state.stopped = true;
      return [];
    }
    state.emitted++;
    return [[table]];
  }

  private exhausted(state: WalkState): boolean {
    if (state.stopped) return true;
    if (state.deadline !== undefined && this.clock() > state.deadline) {
      state.truncationReasons.add('time_budget');
      state.stopped = true;
    }
    return state.stopped;
  }
}
