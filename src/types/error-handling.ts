/**
 * Error Handling Types and Infrastructure for the pipeline lineage tracer
 *
 * Provides:
 * - Error categories for every condition met while tracing lineage
 * - Per-category messages, codes, severity and fatality
 * - Error classes for the fatal conditions
 * - Correlation ids and structured error logging
 */

import { LogLevel } from './common.js';
import { Logger, defaultLogger } from '../utils/logger.js';

// ==================== Error Category Enum ====================

/**
 * Error category enum for categorizing lineage conditions
 */
export enum ErrorCategory {
  /** A token could not be resolved to a table name */
  UNRESOLVABLE_IDENTIFIER = 'UNRESOLVABLE_IDENTIFIER',
  /** A table has no known writer and is treated as a source */
  MISSING_WRITER = 'MISSING_WRITER',
  /** A table has several writers; their upstreams are combined */
  AMBIGUOUS_WRITER = 'AMBIGUOUS_WRITER',
  /** A table recurred in its own ancestor chain */
  CYCLE_DETECTED = 'CYCLE_DETECTED',
  /** Enumeration of a target hit its path, depth or time budget */
  PATH_BUDGET_EXCEEDED = 'PATH_BUDGET_EXCEEDED',
  /** A source file could not be read */
  UNREADABLE_SOURCE = 'UNREADABLE_SOURCE',
  /** Corpus root is missing or holds no source files */
  EMPTY_CORPUS = 'EMPTY_CORPUS',
  /** No target survived expansion */
  NO_TARGETS = 'NO_TARGETS',
  /** Configuration failed validation */
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  /** Caller passed inconsistent input */
  INVALID_INPUT = 'INVALID_INPUT',
  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Response Interface ====================

/**
 * Structured description of an error, safe to print
 */
export interface ErrorResponse {
  category: ErrorCategory;
  userMessage: string;
  /** Technical details (for logging) */
  technicalDetails?: string;
  /** Whether the whole run must stop */
  fatal: boolean;
  severity: LogLevel;
  errorCode: string;
  timestamp?: Date;
  correlationId?: string;
}

// ==================== Error Handlers ====================

/**
 * Default responses for each category
 */
export const ERROR_HANDLERS: Record<ErrorCategory, Omit<ErrorResponse, 'technicalDetails' | 'timestamp' | 'correlationId'>> = {
  [ErrorCategory.UNRESOLVABLE_IDENTIFIER]: {
    category: ErrorCategory.UNRESOLVABLE_IDENTIFIER,
    userMessage: 'A table reference could not be resolved and was ignored.',
    fatal: false,
    severity: 'debug',
    errorCode: 'ERR_UNRESOLVABLE_IDENTIFIER',
  },
  [ErrorCategory.MISSING_WRITER]: {
    category: ErrorCategory.MISSING_WRITER,
    userMessage: 'No script writes this table; it is reported as a source.',
    fatal: false,
    severity: 'debug',
    errorCode: 'ERR_MISSING_WRITER',
  },
  [ErrorCategory.AMBIGUOUS_WRITER]: {
    category: ErrorCategory.AMBIGUOUS_WRITER,
    userMessage: 'Several scripts write this table; their inputs were combined.',
    fatal: false,
    severity: 'info',
    errorCode: 'ERR_AMBIGUOUS_WRITER',
  },
  [ErrorCategory.CYCLE_DETECTED]: {
    category: ErrorCategory.CYCLE_DETECTED,
    userMessage: 'A dependency cycle was found; the branch was cut.',
    fatal: false,
    severity: 'warn',
    errorCode: 'ERR_CYCLE',
  },
  [ErrorCategory.PATH_BUDGET_EXCEEDED]: {
    category: ErrorCategory.PATH_BUDGET_EXCEEDED,
    userMessage: 'Lineage for this target was truncated by the configured budget.',
    fatal: false,
    severity: 'warn',
    errorCode: 'ERR_PATH_BUDGET',
  },
  [ErrorCategory.UNREADABLE_SOURCE]: {
    category: ErrorCategory.UNREADABLE_SOURCE,
    userMessage: 'A source file could not be read and was skipped.',
    fatal: false,
    severity: 'warn',
    errorCode: 'ERR_UNREADABLE_SOURCE',
  },
  [ErrorCategory.EMPTY_CORPUS]: {
    category: ErrorCategory.EMPTY_CORPUS,
    userMessage: 'The corpus root does not exist or contains no source files.',
    fatal: true,
    severity: 'error',
    errorCode: 'ERR_EMPTY_CORPUS',
  },
  [ErrorCategory.NO_TARGETS]: {
    category: ErrorCategory.NO_TARGETS,
    userMessage: 'No valid targets to process. Provide names like schema.table, or bare names present in the writer index.',
    fatal: true,
    severity: 'error',
    errorCode: 'ERR_NO_TARGETS',
  },
  [ErrorCategory.INVALID_CONFIGURATION]: {
    category: ErrorCategory.INVALID_CONFIGURATION,
    userMessage: 'The configuration is invalid.',
    fatal: true,
    severity: 'error',
    errorCode: 'ERR_CONFIGURATION',
  },
  [ErrorCategory.INVALID_INPUT]: {
    category: ErrorCategory.INVALID_INPUT,
    userMessage: 'The input is inconsistent.',
    fatal: false,
    severity: 'error',
    errorCode: 'ERR_INVALID_INPUT',
  },
  [ErrorCategory.UNKNOWN]: {
    category: ErrorCategory.UNKNOWN,
    userMessage: 'Something unexpected happened.',
    fatal: false,
    severity: 'error',
    errorCode: 'ERR_UNKNOWN',
  },
};

// ==================== Custom Error Classes ====================

/**
 * Base error class for lineage errors
 */
export class LineageError extends Error {
  public readonly category: ErrorCategory;
  public readonly fatal: boolean;
  public readonly correlationId: string;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    correlationId?: string
  ) {
    super(message);
    this.name = 'LineageError';
    this.category = category;
    this.fatal = ERROR_HANDLERS[category].fatal;
    this.correlationId = correlationId || generateCorrelationId();
    this.timestamp = new Date();
  }

  /**
   * Convert to ErrorResponse for display
   */
  toErrorResponse(): ErrorResponse {
    const handler = ERROR_HANDLERS[this.category];
    return {
      ...handler,
      technicalDetails: this.message,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }
}

/**
 * Corpus root missing, not a directory, or empty
 */
export class CorpusError extends LineageError {
  public readonly root: string;

  constructor(root: string, message: string, correlationId?: string) {
    super(message, ErrorCategory.EMPTY_CORPUS, correlationId);
    this.name = 'CorpusError';
    this.root = root;
  }
}

/**
 * Target list empty after expansion
 */
export class TargetSelectionError extends LineageError {
  public readonly requested: string[];

  constructor(requested: string[], message: string, correlationId?: string) {
    super(message, ErrorCategory.NO_TARGETS, correlationId);
    this.name = 'TargetSelectionError';
    this.requested = requested;
  }
}

/**
 * Configuration failed schema validation
 */
export class ConfigurationError extends LineageError {
  public readonly issues: string[];

  constructor(issues: string[], correlationId?: string) {
    super(`Invalid configuration: ${issues.join('; ')}`, ErrorCategory.INVALID_CONFIGURATION, correlationId);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A lineage path does not start at the target it was shaped for
 */
export class PathShapeError extends LineageError {
  public readonly target: string;

  constructor(target: string, message: string, correlationId?: string) {
    super(message, ErrorCategory.INVALID_INPUT, correlationId);
    this.name = 'PathShapeError';
    this.target = target;
  }
}

// ==================== Utility Functions ====================

/**
 * Generate a correlation ID for error tracking
 */
export function generateCorrelationId(): string {
  return `err-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Categorize an error based on its type and message
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof LineageError) {
    return error.category;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('enoent') || message.includes('eacces') || message.includes('eisdir')) {
      return ErrorCategory.UNREADABLE_SOURCE;
    }
    if (message.includes('invalid') || message.includes('validation')) {
      return ErrorCategory.INVALID_INPUT;
    }
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Create an ErrorResponse from any error
 */
export function createErrorResponse(
  error: unknown,
  correlationId?: string
): ErrorResponse {
  if (error instanceof LineageError) {
    return error.toErrorResponse();
  }

  const category = categorizeError(error);
  const handler = ERROR_HANDLERS[category];
  const technicalDetails = error instanceof Error ? error.message : String(error);

  return {
    ...handler,
    technicalDetails,
    timestamp: new Date(),
    correlationId: correlationId || generateCorrelationId(),
  };
}

/**
 * Whether an error must abort the whole run
 */
export function isFatalError(error: unknown): boolean {
  return createErrorResponse(error).fatal;
}

/**
 * Log an error with its category, code and correlation id
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {},
  logger: Logger = defaultLogger
): void {
  const errorResponse = createErrorResponse(error);

  logger.error(errorResponse.userMessage, {
    category: errorResponse.category,
    errorCode: errorResponse.errorCode,
    correlationId: errorResponse.correlationId,
    technicalDetails: errorResponse.technicalDetails,
    ...context,
  });
}
