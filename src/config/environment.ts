/**
 * Tracer configuration
 *
 * Values come from defaults, then `LINEAGE_*` environment variables, then
 * explicit overrides (CLI flags), and are validated as a whole.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/error-handling.js';
import { EnumerationLimits } from '../types/lineage.js';
import { LogLevel, WriterPolicyName } from '../types/common.js';

export interface TracerConfig extends EnumerationLimits {
  writerPolicy: WriterPolicyName;
  logLevel: LogLevel;
  /** Lower-cased, each with a leading dot */
  fileExtensions: string[];
  outputPath: string;
  expandLayers: boolean;
}

export const DEFAULT_TRACER_CONFIG: TracerConfig = {
  maxPathsPerTarget: 10000,
  maxDepth: 64,
  timeBudgetMs: 0,
  writerPolicy: 'union',
  logLevel: 'info',
  fileExtensions: ['.py', '.sql', '.sas'],
  outputPath: 'lineage.csv',
  expandLayers: false,
};

const booleanFlag = z.union([
  z.boolean(),
  z.string().transform((raw) => ['true', '1', 'yes'].includes(raw.trim().toLowerCase())),
]);

const extensionList = z.union([
  z.array(z.string()),
  z.string().transform((raw) => raw.split(',')),
]).transform((items) =>
  items
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0)
    .map((item) => (item.startsWith('.') ? item : `.${item}`))
).pipe(z.array(z.string()).min(1, 'at least one file extension is required'));

const tracerConfigSchema = z.object({
  maxPathsPerTarget: z.coerce.number().int().min(1),
  maxDepth: z.coerce.number().int().min(1),
  timeBudgetMs: z.coerce.number().int().min(0),
  writerPolicy: z.enum(['union', 'intersection']),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  fileExtensions: extensionList,
  outputPath: z.string().trim().min(1),
  expandLayers: booleanFlag,
});

/**
 * Unvalidated configuration; any field may still be a raw string
 */
export type TracerConfigInput = {
  [K in keyof TracerConfig]?: TracerConfig[K] | string;
};

const ENV_KEYS: Record<keyof TracerConfig, string> = {
  maxPathsPerTarget: 'LINEAGE_MAX_PATHS',
  maxDepth: 'LINEAGE_MAX_DEPTH',
  timeBudgetMs: 'LINEAGE_TIME_BUDGET_MS',
  writerPolicy: 'LINEAGE_WRITER_POLICY',
  logLevel: 'LINEAGE_LOG_LEVEL',
  fileExtensions: 'LINEAGE_EXTENSIONS',
  outputPath: 'LINEAGE_OUTPUT',
  expandLayers: 'LINEAGE_EXPAND_LAYERS',
};

/**
 * Read the `LINEAGE_*` variables that are set
 */
export function readEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): TracerConfigInput {
  const overrides: TracerConfigInput = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const raw = env[key];
    if (raw !== undefined && raw.trim() !== '' && isConfigField(field)) {
      setField(overrides, field, raw);
    }
  }
  return overrides;
}

function isConfigField(field: string): field is keyof TracerConfig {
  return field in ENV_KEYS;
}

function setField<K extends keyof TracerConfig>(target: TracerConfigInput, field: K, value: TracerConfigInput[K]): void {
  target[field] = value;
}

/**
 * Validate a partial configuration layered over the defaults
 */
export function parseTracerConfig(input: TracerConfigInput = {}): TracerConfig {
  const parsed = tracerConfigSchema.safeParse({ ...DEFAULT_TRACER_CONFIG, ...input });
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Defaults, then environment, then overrides
 */
export function loadTracerConfig(
  overrides: TracerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): TracerConfig {
  const merged = readEnvironmentOverrides(env);
  for (const field of Object.keys(ENV_KEYS)) {
    if (isConfigField(field) && overrides[field] !== undefined) {
      setField(merged, field, overrides[field]);
    }
  }
  return parseTracerConfig(merged);
}
