/**
 * Command line interface
 *
 *   lineage-tracer trace --root <dir> --targets a,b [--out file] [...]
 *   lineage-tracer expand --input <csv> --out <csv>
 *   lineage-tracer map-scripts --root <dir> [--out file]
 *   lineage-tracer inspect --root <dir>
 */

import { parseArgs } from 'node:util';
import { loadTracerConfig, TracerConfig, TracerConfigInput } from '../config/index.js';
import { FileSystemCorpusRepository } from '../repository/index.js';
import { LineageTracerOrchestrator } from '../orchestrator/index.js';
import {
  LineageRowShaper,
  SCRIPT_COLUMN,
  TARGET_TABLE_COLUMN,
  expandLayers,
  formatInspection,
  mappingRecords,
  rowsFromRecords,
  splitTargetList
} from '../services/index.js';
import { isFatalError, logError } from '../types/index.js';
import { readCsvFile, writeCsvFile } from '../utils/csv.js';
import { ConsoleSink, Logger, LoggerSink } from '../utils/logger.js';

export const USAGE = `Usage: lineage-tracer <command> [options]

Commands:
  trace        --root <dir> --targets <a,b> [--out <file>] [--max-paths <n>]
               [--max-depth <n>] [--time-budget-ms <n>] [--writer-policy union|intersection]
               [--expand-layers] [--extensions <.py,.sql,.sas>] [--log-level <level>]
  expand       --input <csv> --out <csv>
  map-scripts  --root <dir> [--out <file>] [--extensions <list>] [--log-level <level>]
  inspect      --root <dir> [--extensions <list>] [--log-level <level>]
`;

const DEFAULT_MAPPING_OUTPUT = 'script_target_mapping.csv';

export interface CliIO {
  /** Command output */
  stdout: (text: string) => void;
  /** Where log events go; stderr by default */
  sinks?: LoggerSink[];
  env?: NodeJS.ProcessEnv;
}

const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
};

const OPTIONS = {
  root: { type: 'string' },
  targets: { type: 'string' },
  out: { type: 'string' },
  input: { type: 'string' },
  'max-paths': { type: 'string' },
  'max-depth': { type: 'string' },
  'time-budget-ms': { type: 'string' },
  'writer-policy': { type: 'string' },
  'expand-layers': { type: 'boolean' },
  extensions: { type: 'string' },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
}

type ParsedOptions = ReturnType<typeof parseCommandLine>['values'];

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Run one command; resolves to the process exit status
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let logger = new Logger('lineage', io.sinks ?? [new ConsoleSink()]);

  try {
    const { values, positionals } = parseCommandLine(argv);
    const [command] = positionals;

    if (values.help || command === undefined) {
      io.stdout(USAGE);
      return values.help ? 0 : 1;
    }

    const config = loadTracerConfig(configOverrides(values), io.env ?? process.env);
    logger = new Logger('lineage', io.sinks ?? [new ConsoleSink()], config.logLevel);

    switch (command) {
      case 'trace':
        await runTrace(values, config, logger, io);
        return 0;
      case 'expand':
        await runExpand(values, logger);
        return 0;
      case 'map-scripts':
        await runMapScripts(values, config, logger);
        return 0;
      case 'inspect':
        runInspect(values, config, logger, io);
        return 0;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError || isArgumentError(error)) {
      io.stdout(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
      return 1;
    }
    logError(error, {}, logger);
    return isFatalError(error) ? 2 : 1;
  }
}

function isArgumentError(error: unknown): boolean {
  return error instanceof TypeError && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS');
}

function configOverrides(values: ParsedOptions): TracerConfigInput {
  return {
    maxPathsPerTarget: values['max-paths'],
    maxDepth: values['max-depth'],
    timeBudgetMs: values['time-budget-ms'],
    writerPolicy: values['writer-policy'],
    logLevel: values['log-level'],
    fileExtensions: values.extensions,
    outputPath: values.out,
    expandLayers: values['expand-layers'],
  };
}

function required(values: ParsedOptions, name: 'root' | 'targets' | 'input' | 'out'): string {
  const value = values[name];
  if (value === undefined || value.trim() === '') {
    throw new UsageError(`Missing required option --${name}`);
  }
  return value;
}

// ==================== Commands ====================

async function runTrace(values: ParsedOptions, config: TracerConfig, logger: Logger, io: CliIO): Promise<void> {
  const repository = FileSystemCorpusRepository.load(required(values, 'root'), config.fileExtensions, logger.child('corpus'));
  const orchestrator = new LineageTracerOrchestrator({ repository, config, logger });

  const report = orchestrator.trace(splitTargetList(required(values, 'targets')));
  const shaper = orchestrator.getShaper();
  await writeCsvFile(config.outputPath, report.columns, report.rows.map((row) => shaper.toRecord(row)));

  logger.info('Wrote lineage rows', { rows: report.rows.length, path: config.outputPath, runId: report.runId });
  io.stdout(
    `Traced ${report.targets.length} target(s) into ${report.rows.length} row(s): ${config.outputPath}\n`
  );
}

async function runExpand(values: ParsedOptions, logger: Logger): Promise<void> {
  const input = required(values, 'input');
  const output = required(values, 'out');
  const shaper = new LineageRowShaper();

  const { header, records } = await readCsvFile(input);
  const rows = expandLayers(rowsFromRecords(header, records));
  await writeCsvFile(output, shaper.columnsFor(rows), rows.map((row) => shaper.toRecord(row)));

  logger.info('Expanded lineage rows', { input, output, rows: records.length, expandedRows: rows.length });
}

async function runMapScripts(values: ParsedOptions, config: TracerConfig, logger: Logger): Promise<void> {
  const repository = FileSystemCorpusRepository.load(required(values, 'root'), config.fileExtensions, logger.child('corpus'));
  const pairs = new LineageTracerOrchestrator({ repository, config, logger }).mapScripts();
  const output = values.out ?? DEFAULT_MAPPING_OUTPUT;
  if (pairs.length === 0) {
    logger.warn('No mappings to write; the CSV will only contain the header', { path: output });
  }
  await writeCsvFile(output, [SCRIPT_COLUMN, TARGET_TABLE_COLUMN], mappingRecords(pairs));
  logger.info('Wrote script to target mapping', { pairs: pairs.length, path: output });
}

function runInspect(values: ParsedOptions, config: TracerConfig, logger: Logger, io: CliIO): void {
  const repository = FileSystemCorpusRepository.load(required(values, 'root'), config.fileExtensions, logger.child('corpus'));
  io.stdout(formatInspection(new LineageTracerOrchestrator({ repository, config, logger }).inspect()));
}
