/**
 * Trace Digest Types
 *
 * Data model shared by the loader, analyzers, views and renderers.
 */

// =============================================================================
// TRACE RECORDS
// =============================================================================

/**
 * Agent methods that produce trace records.
 */
export type MethodName = 'observe' | 'plan' | 'act' | 'unknown';

/** Methods in display order. */
export const METHOD_ORDER: readonly MethodName[] = ['observe', 'plan', 'act', 'unknown'];

/**
 * Normalized message role.
 */
export type MessageRole = 'system' | 'user' | 'other';

/**
 * One message of the request conversation.
 */
export interface TraceMessage {
  role: MessageRole;
  /** Role string as written in the trace file */
  sourceRole: string;
  content: string;
}

/**
 * Token usage reported by the model provider.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Kinds of per-file load failures.
 */
export type RecordErrorKind = 'read' | 'encoding' | 'parse';

/**
 * Error marker carried by a degraded record.
 */
export interface RecordError {
  kind: RecordErrorKind;
  message: string;
}

/**
 * One parsed trace file (one LLM invocation).
 */
export interface TraceRecord {
  /** Numeric suffix of the trace file name */
  sequenceNumber: number;
  /** File name the record was loaded from */
  fileName: string;
  methodName: MethodName;
  /** Method name as written in the trace file, if any */
  rawMethodName?: string;
  messages: TraceMessage[];
  response: string[];
  /** 0 when the duration is missing */
  durationSeconds: number;
  durationMissing: boolean;
  /** Opaque payload, displayed but never interpreted */
  retrieveResult?: unknown;
  model?: string;
  usage?: TokenUsage;
  /** Cost in USD as recorded by the producer */
  cost?: number;
  /** Normalization notes for fields that had an unexpected shape */
  issues: string[];
  /** Present only on degraded records */
  error?: RecordError;
}

/**
 * Failure reported for one trace file.
 */
export interface LoadFailure {
  fileName: string;
  sequenceNumber: number;
  kind: RecordErrorKind | 'duplicate';
  message: string;
}

/**
 * Result of loading a run.
 */
export interface LoadedRun {
  /** Absolute path of the run directory */
  runPath: string;
  runName: string;
  /** Directory the trace files were read from */
  traceDir: string;
  records: TraceRecord[];
  failures: LoadFailure[];
}

// =============================================================================
// ANALYSIS
// =============================================================================

/**
 * A run of consecutive records forming one observe→plan→act iteration.
 */
export interface Cycle {
  /** 1-based */
  index: number;
  records: readonly TraceRecord[];
  /** Sum of known durations */
  totalDurationSeconds: number;
  hasMissingDuration: boolean;
  partial: boolean;
  /** Methods a complete cycle would have but this one lacks */
  missingMethods: MethodName[];
}

/**
 * Aggregate statistics for one method, or for the whole run.
 */
export interface MethodStatistics {
  count: number;
  /** Records with a known duration */
  timedCount: number;
  missingDurationCount: number;
  totalDurationSeconds: number;
  /** null when no record has a known duration */
  minDurationSeconds: number | null;
  maxDurationSeconds: number | null;
  meanDurationSeconds: number | null;
  recordsWithUsage: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  costUsd: number;
}

export interface RunStatistics {
  /** Methods with at least one record, in METHOD_ORDER */
  perMethod: Array<{ method: MethodName; stats: MethodStatistics }>;
  overall: MethodStatistics;
}

// =============================================================================
// VIEWS
// =============================================================================

/**
 * One row of the timeline table.
 */
export interface TimelineEntry {
  sequenceNumber: number;
  methodName: MethodName;
  durationSeconds: number;
  durationMissing: boolean;
  preview: string;
  degraded: boolean;
}

/**
 * Compact line describing one record inside a cycle.
 */
export interface CycleStep {
  sequenceNumber: number;
  methodName: MethodName;
  durationSeconds: number;
  durationMissing: boolean;
  preview: string;
}

export interface CycleView {
  index: number;
  partial: boolean;
  missingMethods: MethodName[];
  totalDurationSeconds: number;
  hasMissingDuration: boolean;
  steps: CycleStep[];
}
