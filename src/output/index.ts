/**
 * Output exports
 */

export { RecordFormatter, formatRecord, recordFileName, NO_RESPONSE_MARKER, type RecordFormatterOptions } from './record-formatter.js';
export { SummaryRenderer, renderSummary } from './summary-renderer.js';
export { JSONExporter, createJSONExporter, SUMMARY_JSON_VERSION, type SummaryExport } from './json-exporter.js';
export { TerminalRenderer, createTerminalRenderer } from './terminal-renderer.js';
export { writeDocument, tryWriteDocument, type WriteOutcome } from './document-writer.js';
export { fencedBlock, tableCell, tableRow, formatSeconds, durationLabel, detectLanguage, type BlockLanguage } from './markdown.js';
