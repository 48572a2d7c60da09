/**
 * Centralized Error Types
 *
 * Typed, categorized errors for loading and rendering trace runs.
 *
 * Error Categories:
 * - NOT_FOUND: the run has no discoverable trace files (fatal)
 * - PARSE: one trace file is malformed (recovered as a degraded record)
 * - ENCODING: content is not valid text (recovered with a visible marker)
 * - IO: an output document could not be written (reported per file)
 * - VALIDATION: invalid invocation or configuration
 *
 * @example
 * ```typescript
 * throw new RunNotFoundError('runs/2025-01-01_a1c0', 'directory does not exist');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Run location missing or empty */
  NOT_FOUND = 'NOT_FOUND',

  /** Malformed trace content */
  PARSE = 'PARSE',

  /** Content could not be decoded as text */
  ENCODING = 'ENCODING',

  /** Filesystem read/write failures */
  IO = 'IO',

  /** Invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Unexpected internal failures */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all trace-digest errors.
 */
export class TraceDigestError extends Error {
  readonly category: ErrorCategory;

  /** Whether processing can continue past this error */
  readonly recoverable: boolean;

  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TraceDigestError';
    this.category = category;
    this.recoverable = recoverable;
    this.context = context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * The run location has no discoverable trace files.
 */
export class RunNotFoundError extends TraceDigestError {
  readonly runPath: string;

  constructor(runPath: string, reason: string, cause?: unknown) {
    super(`Run not found: ${runPath} (${reason})`, ErrorCategory.NOT_FOUND, false, { runPath }, cause);
    this.name = 'RunNotFoundError';
    this.runPath = runPath;
  }
}

/**
 * One trace file could not be parsed.
 */
export class RecordParseError extends TraceDigestError {
  readonly fileName: string;

  constructor(fileName: string, message: string, cause?: unknown) {
    super(message, ErrorCategory.PARSE, true, { fileName }, cause);
    this.name = 'RecordParseError';
    this.fileName = fileName;
  }
}

/**
 * Trace content is not valid UTF-8 text.
 */
export class EncodingError extends TraceDigestError {
  readonly fileName: string;

  constructor(fileName: string, cause?: unknown) {
    super(`${fileName} is not valid UTF-8 text`, ErrorCategory.ENCODING, true, { fileName }, cause);
    this.name = 'EncodingError';
    this.fileName = fileName;
  }
}

/**
 * An output document could not be written.
 */
export class WriteError extends TraceDigestError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to write ${filePath}${detail}`, ErrorCategory.IO, true, { filePath }, cause);
    this.name = 'WriteError';
    this.filePath = filePath;
  }
}

/**
 * A parsed record could not be rendered.
 */
export class RenderError extends TraceDigestError {
  readonly fileName: string;

  constructor(fileName: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to render ${fileName}${detail}`, ErrorCategory.INTERNAL, true, { fileName }, cause);
    this.name = 'RenderError';
    this.fileName = fileName;
  }
}

/**
 * Invalid invocation or configuration.
 */
export class ConfigError extends TraceDigestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, context);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Read the errno code of a Node.js system error.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap an unknown error as a TraceDigestError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): TraceDigestError {
  if (error instanceof TraceDigestError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const code = errorCode(err);
  const category = code !== undefined && code.startsWith('E') ? ErrorCategory.IO : ErrorCategory.INTERNAL;

  return new TraceDigestError(err.message, category, false, context, err);
}

export function isTraceDigestError(error: unknown): error is TraceDigestError {
  return error instanceof TraceDigestError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof TraceDigestError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof TraceDigestError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
