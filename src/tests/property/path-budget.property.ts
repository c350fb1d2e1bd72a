/**
 * **Feature: pipeline-lineage-tracer, Property 3: Path Budgets**
 *
 * For any writer graph, a path limit keeps the first paths of the unlimited
 * run and flags the result only when paths were dropped; a depth limit bounds
 * the length of every path.
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { GraphUpstreamResolver, GraphWriterIndex, WriterGraph, writerGraphGenerator } from '../generators/index.js';
import { LineagePathEnumerator } from '../../services/lineage-path-enumerator.js';
import { Logger } from '../../utils/logger.js';

const propertyConfig = {
  numRuns: 100,
  verbose: true
};

const enumeratorFor = (graph: WriterGraph): LineagePathEnumerator =>
  new LineagePathEnumerator({
    writerIndex: new GraphWriterIndex(graph),
    upstreamResolver: new GraphUpstreamResolver(graph),
    logger: new Logger('property', [])
  });

describe('Property 3: Path Budgets', () => {
  it('should keep the first paths of the unlimited run', () => {
    fc.assert(
      fc.property(writerGraphGenerator(5), fc.integer({ min: 1, max: 6 }), (graph: WriterGraph, limit: number) => {
        const full = enumeratorFor(graph).enumeratePaths('db.t0');
        const limited = enumeratorFor(graph).enumeratePaths('db.t0', { maxPathsPerTarget: limit });

        if (full.paths.length <= limit) {
          return !limited.truncated && JSON.stringify(limited.paths) === JSON.stringify(full.paths);
        }
        return (
          limited.truncated &&
          limited.truncationReasons.includes('max_paths') &&
          JSON.stringify(limited.paths) === JSON.stringify(full.paths.slice(0, limit))
        );
      }),
      propertyConfig
    );
  });

  it('should bound every path by the depth limit', () => {
    fc.assert(
      fc.property(writerGraphGenerator(5), fc.integer({ min: 1, max: 4 }), (graph: WriterGraph, depth: number) => {
        const result = enumeratorFor(graph).enumeratePaths('db.t0', { maxDepth: depth });
        return result.paths.length > 0 && result.paths.every((path) => path.length <= depth);
      }),
      propertyConfig
    );
  });
});
