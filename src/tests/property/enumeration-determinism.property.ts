/**
 * **Feature: pipeline-lineage-tracer, Property 2: Enumeration Determinism**
 *
 * For any corpus, tracing the same targets twice yields identical rows, and
 * tracing through script text yields the paths of the writer graph the
 * scripts were generated from.
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import {
  GraphUpstreamResolver,
  GraphWriterIndex,
  WriterGraph,
  corpusFromGraph,
  tableNamesFor,
  writerGraphGenerator
} from '../generators/index.js';
import { LineagePathEnumerator } from '../../services/lineage-path-enumerator.js';
import { LineageTracerOrchestrator } from '../../orchestrator/lineage-tracer-orchestrator.js';
import { InMemoryCorpusRepository } from '../../repository/corpus-repository.js';
import { Logger } from '../../utils/logger.js';

const propertyConfig = {
  numRuns: 100,
  verbose: true
};

const silent = new Logger('property', []);

describe('Property 2: Enumeration Determinism', () => {
  it('should produce identical reports for repeated runs', () => {
    fc.assert(
      fc.property(writerGraphGenerator(5), (graph: WriterGraph) => {
        const files = corpusFromGraph(graph);
        const targets = tableNamesFor(5);

        const first = new LineageTracerOrchestrator({
          repository: new InMemoryCorpusRepository(files),
          logger: silent
        }).trace(targets);
        const second = new LineageTracerOrchestrator({
          repository: new InMemoryCorpusRepository(files),
          logger: silent
        }).trace(targets);

        return (
          JSON.stringify(first.rows) === JSON.stringify(second.rows) &&
          JSON.stringify(first.diagnostics) === JSON.stringify(second.diagnostics)
        );
      }),
      propertyConfig
    );
  });

  it('should recover the writer graph from generated scripts', () => {
    fc.assert(
      fc.property(writerGraphGenerator(5), (graph: WriterGraph) => {
        const orchestrator = new LineageTracerOrchestrator({
          repository: new InMemoryCorpusRepository(corpusFromGraph(graph)),
          logger: silent
        });
        const fromGraph = new LineagePathEnumerator({
          writerIndex: new GraphWriterIndex(graph),
          upstreamResolver: new GraphUpstreamResolver(graph),
          logger: silent
        });

        const report = orchestrator.trace(tableNamesFor(5));
        return report.targets.every(
          (entry) => JSON.stringify(entry.result.paths) === JSON.stringify(fromGraph.enumeratePaths(entry.target).paths)
        );
      }),
      propertyConfig
    );
  });
});
