/**
 * `summary` command: the run-level report.
 */

import { join } from 'node:path';
import { createJSONExporter } from '../output/json-exporter.js';
import { tryWriteDocument } from '../output/document-writer.js';
import { renderSummary } from '../output/summary-renderer.js';
import { loadRun } from '../store/trace-store.js';
import type { WriteError } from '../errors/index.js';
import { createComponentLogger } from '../utilities/logger.js';
import { createSummaryView } from '../views/summary-view.js';
import type { SummaryOptions, SummaryResult } from './types.js';

/**
 * Path of the JSON export belonging to a Markdown summary.
 */
export function jsonPathFor(summaryPath: string): string {
  return summaryPath.replace(/\.md$/i, '') + '.json';
}

/**
 * Load a run, render its summary and write it, replacing an older one.
 *
 * @throws RunNotFoundError when the run has no trace files
 */
export async function summarizeRun(runPath: string, options: SummaryOptions): Promise<SummaryResult> {
  const { config } = options;
  const log = options.logger ?? createComponentLogger('SummaryCommand');

  const run = await loadRun(runPath, {
    traceDirName: config.traceDirName,
    traceFilePrefix: config.traceFilePrefix,
    logger: log,
  });

  const view = createSummaryView(run, {
    timelinePreviewChars: config.timelinePreviewChars,
    cyclePreviewChars: config.cyclePreviewChars,
  }).generate();
  const content = renderSummary(view);

  const summaryPath = options.outputFile ?? join(run.runPath, config.summaryFileName);
  const writeFailures: WriteError[] = [];

  const outcome = await tryWriteDocument(summaryPath, content);
  if (!outcome.ok) {
    log.error('Failed to write summary', { path: summaryPath, error: outcome.error.message });
    writeFailures.push(outcome.error);
  }

  let jsonPath: string | undefined;
  if (options.json) {
    jsonPath = jsonPathFor(summaryPath);
    const jsonOutcome = await tryWriteDocument(jsonPath, createJSONExporter().export(view));
    if (!jsonOutcome.ok) {
      log.error('Failed to write summary JSON', { path: jsonPath, error: jsonOutcome.error.message });
      writeFailures.push(jsonOutcome.error);
    }
  }

  return { run, summaryPath, jsonPath, content, writeFailures };
}
