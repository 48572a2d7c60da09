/**
 * trace-digest library
 *
 * Loads web-agent API trace runs and renders per-record documents and
 * run summaries.
 */

// Types
export * from './types.js';

// Errors
export * from './errors/index.js';

// Parsing and loading
export {
  parseSequenceNumber,
  decodeTraceBytes,
  parseTraceDocument,
  normalizeTraceRecord,
  normalizeMethodName,
  createDegradedRecord,
  errorMarker,
  type RecordSource,
} from './parser/trace-parser.js';
export { TraceStore, loadRun, countTraceFiles, type TraceStoreOptions } from './store/trace-store.js';

// Analyzers
export * from './analyzer/index.js';

// Views
export * from './views/index.js';

// Output
export * from './output/index.js';

// Costs
export * from './costs/index.js';

// Commands and config
export * from './commands/index.js';
export * from './config/index.js';
export { DEFAULT_CONFIG } from './defaults.js';
export { runCli, parseArgs, helpText, VERSION, type CLIArgs, type CommandName } from './cli.js';
