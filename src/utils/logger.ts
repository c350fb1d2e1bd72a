/**
 * Namespaced logger with pluggable sinks
 */

import { LogLevel, LOG_LEVELS } from '../types/common.js';

export type LogContext = Record<string, unknown>;

export interface LogEvent {
  level: LogLevel;
  namespace: string;
  message: string;
  context?: LogContext;
  createdAt: string;
}

export interface LoggerSink {
  emit(event: LogEvent): void;
}

/**
 * Writes one line per event to stderr so stdout stays free for command output
 */
export class ConsoleSink implements LoggerSink {
  emit(event: LogEvent): void {
    const context = event.context && Object.keys(event.context).length > 0
      ? ` ${JSON.stringify(event.context)}`
      : '';
    console.error(`${event.createdAt} ${event.level.toUpperCase()} [${event.namespace}] ${event.message}${context}`);
  }
}

export class InMemorySink implements LoggerSink {
  private events: LogEvent[] = [];

  emit(event: LogEvent): void {
    this.events.push(event);
  }

  read(): readonly LogEvent[] {
    return this.events;
  }

  clear(): void {
    this.events = [];
  }
}

export class Logger {
  private readonly namespace: string;
  private readonly sinks: LoggerSink[];
  private minLevel: LogLevel;

  constructor(namespace: string = 'lineage', sinks: LoggerSink[] = [new ConsoleSink()], minLevel: LogLevel = 'info') {
    this.namespace = namespace;
    this.sinks = sinks;
    this.minLevel = minLevel;
  }

  /**
   * Logger sharing this one's sinks and level under another namespace
   */
  child(namespace: string): Logger {
    return new Logger(`${this.namespace}:${namespace}`, this.sinks, this.minLevel);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  debug(message: string, context?: LogContext): void { this.emit('debug', message, context); }
  info(message: string, context?: LogContext): void { this.emit('info', message, context); }
  warn(message: string, context?: LogContext): void { this.emit('warn', message, context); }
  error(message: string, context?: LogContext): void { this.emit('error', message, context); }

  log(level: LogLevel, message: string, context?: LogContext): void {
    this.emit(level, message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return;
    const event: LogEvent = {
      level,
      namespace: this.namespace,
      message,
      context,
      createdAt: new Date().toISOString(),
    };
    for (const sink of this.sinks) sink.emit(event);
  }
}

export const defaultLogger = new Logger();
