/**
 * Unit tests for the lineage tracer orchestrator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LineageTracerOrchestrator } from '../../../orchestrator/lineage-tracer-orchestrator.js';
import { InMemoryCorpusRepository } from '../../../repository/corpus-repository.js';
import { DEFAULT_TRACER_CONFIG, parseTracerConfig } from '../../../config/environment.js';
import { ErrorCategory, TargetSelectionError } from '../../../types/index.js';
import { InMemorySink, Logger } from '../../../utils/logger.js';
import { pipelineScript } from '../../generators/lineage.generator.js';

const SALES_CORPUS: Record<string, string> = {
  'etl/load_report.py': pipelineScript(['rpt.sales_report'], ['base.sales', 'base.customers']),
  'etl/load_base_sales.py': pipelineScript(['base.sales'], ['stg.sales_raw']),
  'etl/load_base_customers.py': pipelineScript(['base.customers']),
  'views/v_sales.sql': [
    'CREATE OR REPLACE VIEW rpt.v_sales AS',
    'SELECT * FROM rpt.sales_report r',
    'JOIN base.customers c ON r.customer_id = c.id'
  ].join('\n')
};

describe('LineageTracerOrchestrator', () => {
  let sink: InMemorySink;
  let logger: Logger;

  beforeEach(() => {
    sink = new InMemorySink();
    logger = new Logger('test', [sink]);
  });

  const orchestratorFor = (
    files: Record<string, string>,
    config = DEFAULT_TRACER_CONFIG,
    unreadable: string[] = []
  ): LineageTracerOrchestrator =>
    new LineageTracerOrchestrator({
      repository: new InMemoryCorpusRepository(files, { unreadable }),
      config,
      logger
    });

  describe('trace', () => {
    it('should trace every requested target in request order', () => {
      const report = orchestratorFor(SALES_CORPUS).trace(['rpt.v_sales', 'sales_report']);

      expect(report.targets.map((entry) => entry.target)).toEqual(['rpt.v_sales', 'rpt.sales_report']);
      expect(report.rows).toEqual([
        { target: 'rpt.v_sales', layers: [], source: 'base.customers' },
        { target: 'rpt.v_sales', layers: ['rpt.sales_report'], source: 'base.customers' },
        { target: 'rpt.v_sales', layers: ['rpt.sales_report', 'base.sales'], source: 'stg.sales_raw' },
        { target: 'rpt.sales_report', layers: [], source: 'base.customers' },
        { target: 'rpt.sales_report', layers: ['base.sales'], source: 'stg.sales_raw' }
      ]);
      expect(report.columns).toEqual(['Target Table', 'Layer 1', 'Layer 2', 'Source Table']);
      expect(report.diagnostics).toEqual([]);
    });

    it('should describe the run', () => {
      const report = orchestratorFor(SALES_CORPUS).trace(['rpt.v_sales']);

      expect(report.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(report.indexedTables).toBe(4);
      expect(report.scannedFiles).toBe(4);
      expect(report.completedAt.getTime()).toBeGreaterThanOrEqual(report.startedAt.getTime());
    });

    it('should promote layers when configured', () => {
      const config = parseTracerConfig({ expandLayers: true });
      const report = orchestratorFor(SALES_CORPUS, config).trace(['rpt.v_sales', 'rpt.sales_report']);

      expect(report.rows).toHaveLength(6);
      expect(report.rows[5]).toEqual({ target: 'base.sales', layers: [], source: 'stg.sales_raw' });
    });

    it('should report a target without writers as its own source', () => {
      const report = orchestratorFor(SALES_CORPUS).trace(['src.unknown']);

      expect(report.rows).toEqual([{ target: 'src.unknown', layers: [], source: 'src.unknown' }]);
      expect(report.columns).toEqual(['Target Table', 'Source Table']);
      expect(report.diagnostics.map((diagnostic) => diagnostic.category)).toEqual([ErrorCategory.MISSING_WRITER]);
    });

    it('should note bare targets nothing matches', () => {
      const report = orchestratorFor(SALES_CORPUS).trace(['rpt.v_sales', 'ghost']);

      expect(report.targets).toHaveLength(1);
      expect(report.diagnostics).toEqual([
        {
          category: ErrorCategory.UNRESOLVABLE_IDENTIFIER,
          message: 'No indexed table matches bare target ghost',
          table: 'ghost'
        }
      ]);
    });

    it('should fail when no target survives', () => {
      expect(() => orchestratorFor(SALES_CORPUS).trace(['ghost'])).toThrow(TargetSelectionError);
    });

    it('should cut cycles and report them', () => {
      const report = orchestratorFor({
        'jobs/a.py': pipelineScript(['cyc.a'], ['cyc.b']),
        'jobs/b.py': pipelineScript(['cyc.b'], ['cyc.a'])
      }).trace(['cyc.a']);

      expect(report.rows).toEqual([{ target: 'cyc.a', layers: ['cyc.b'], source: 'cyc.a' }]);
      expect(report.diagnostics).toEqual([
        { category: ErrorCategory.CYCLE_DETECTED, message: 'Cycle cut at cyc.a: cyc.a -> cyc.b -> cyc.a', table: 'cyc.a' }
      ]);
    });

    it('should combine the inputs of several writers', () => {
      const files = {
        'jobs/one.py': pipelineScript(['dw.t'], ['x.one']),
        'jobs/two.py': pipelineScript(['dw.t'], ['x.two'])
      };

      const report = orchestratorFor(files).trace(['dw.t']);
      expect(report.rows.map((row) => row.source)).toEqual(['x.one', 'x.two']);
      expect(report.diagnostics).toEqual([
        {
          category: ErrorCategory.AMBIGUOUS_WRITER,
          message: 'dw.t has 2 writers: jobs/one.py, jobs/two.py',
          table: 'dw.t'
        }
      ]);

      const strict = orchestratorFor(files, parseTracerConfig({ writerPolicy: 'intersection' })).trace(['dw.t']);
      expect(strict.rows).toEqual([{ target: 'dw.t', layers: [], source: 'dw.t' }]);
    });

    it('should report truncated targets', () => {
      const report = orchestratorFor(SALES_CORPUS, parseTracerConfig({ maxPathsPerTarget: 1 })).trace(['rpt.v_sales']);

      expect(report.rows).toEqual([{ target: 'rpt.v_sales', layers: [], source: 'base.customers' }]);
      expect(report.targets[0].result.truncationReasons).toEqual(['max_paths']);
      expect(report.diagnostics).toEqual([
        {
          category: ErrorCategory.PATH_BUDGET_EXCEEDED,
          message: 'Lineage of rpt.v_sales truncated (max_paths)',
          table: 'rpt.v_sales'
        }
      ]);
    });

    it('should list unreadable files', () => {
      const report = orchestratorFor(SALES_CORPUS, DEFAULT_TRACER_CONFIG, ['etl/broken.py']).trace(['rpt.sales_report']);

      expect(report.diagnostics).toEqual([
        {
          category: ErrorCategory.UNREADABLE_SOURCE,
          message: 'A source file could not be read and was skipped.',
          scriptPath: 'etl/broken.py'
        }
      ]);
    });

    it('should build the writer index once', () => {
      const orchestrator = orchestratorFor(SALES_CORPUS);
      orchestrator.trace(['rpt.v_sales']);
      orchestrator.trace(['rpt.sales_report']);

      expect(sink.read().filter((event) => event.message === 'Indexing done')).toHaveLength(1);
    });
  });

  describe('script views', () => {
    it('should map scripts to the tables they write', () => {
      expect(orchestratorFor(SALES_CORPUS).mapScripts()).toEqual([
        { script: 'etl/load_base_customers.py', table: 'base.customers' },
        { script: 'etl/load_base_sales.py', table: 'base.sales' },
        { script: 'etl/load_report.py', table: 'rpt.sales_report' },
        { script: 'views/v_sales.sql', table: 'rpt.v_sales' }
      ]);
    });

    it('should inspect view definitions', () => {
      const summary = orchestratorFor(SALES_CORPUS)
        .inspect()
        .find((entry) => entry.script === 'views/v_sales.sql');

      expect(summary).toEqual({
        script: 'views/v_sales.sql',
        inputs: ['base.customers', 'rpt.sales_report'],
        intermediates: [],
        outputs: ['rpt.v_sales']
      });
    });
  });
});
