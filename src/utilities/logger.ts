/**
 * Structured Logger with Multiple Sinks
 *
 * Leveled logging for trace-digest. Diagnostics go to stderr so that
 * command output on stdout stays clean.
 *
 * Sinks:
 * - console: Human-readable lines on stderr (default)
 * - memory: Ring buffer for tests and programmatic access
 * - file: Append JSON lines to a log file
 *
 * Usage:
 *   import { createComponentLogger } from '../utilities/logger.js';
 *   const log = createComponentLogger('TraceStore');
 *   log.warn('Skipping duplicate trace file', { fileName });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink, one line per entry on stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.level.toUpperCase()}]`;
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    // eslint-disable-next-line no-console
    console.error(`${prefix} ${entry.message}${dataStr}`);
  }
}

/** Memory sink, ring buffer for programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink, appends JSON lines; disables itself after the first failure */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;
  private disabled = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (this.disabled) return;

    try {
      if (!this.initialized) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.initialized = true;
      }
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
    } catch (err) {
      this.disabled = true;
      // eslint-disable-next-line no-console
      console.error(`[WARN] Log file ${this.filePath} disabled: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // A failing sink must not break the operation being logged
        // eslint-disable-next-line no-console
        console.error(`[WARN] Log sink failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Global logger instance. Defaults to the console sink at 'info' level.
 * Call `configureLogger()` early in startup to customize.
 */
export let logger = new StructuredLogger();

/**
 * Reconfigure the global logger. Component loggers created afterwards
 * pick up the new configuration.
 */
export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

/**
 * Create a logger for a specific component (adds component name to context).
 *
 * Example:
 *   const log = createComponentLogger('SummaryCommand');
 *   log.info('Summary written', { path });
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
