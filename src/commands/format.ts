/**
 * `format` command: one Markdown document per parsed trace record.
 */

import { join } from 'node:path';
import { RecordFormatter, recordFileName } from '../output/record-formatter.js';
import { tryWriteDocument } from '../output/document-writer.js';
import { loadRun } from '../store/trace-store.js';
import { RenderError, type WriteError } from '../errors/index.js';
import { createComponentLogger } from '../utilities/logger.js';
import type { FormatOptions, FormatResult, FormattedDocument } from './types.js';

/**
 * Format every record of a run. Degraded records get no document; write
 * and render failures are collected and do not stop the batch.
 *
 * @throws RunNotFoundError when the run has no trace files
 */
export async function formatRun(runPath: string, options: FormatOptions): Promise<FormatResult> {
  const { config } = options;
  const log = options.logger ?? createComponentLogger('FormatCommand');

  const run = await loadRun(runPath, {
    traceDirName: config.traceDirName,
    traceFilePrefix: config.traceFilePrefix,
    logger: log,
  });
  const outputDir = options.outputDir ?? join(run.runPath, config.formattedDirName);
  const formatter = new RecordFormatter({ prettyPrintJson: config.prettyPrintJson });

  const documents: FormattedDocument[] = [];
  const renderFailures: RenderError[] = [];
  const writeFailures: WriteError[] = [];

  for (const record of run.records) {
    if (record.error) continue;

    let content: string;
    try {
      content = formatter.format(record);
    } catch (err) {
      const failure = new RenderError(record.fileName, err);
      log.error('Failed to render trace', { fileName: record.fileName, error: failure.message });
      renderFailures.push(failure);
      continue;
    }

    const outcome = await tryWriteDocument(join(outputDir, recordFileName(record)), content);
    if (outcome.ok) {
      documents.push({
        sequenceNumber: record.sequenceNumber,
        path: outcome.path,
        durationSeconds: record.durationSeconds,
        durationMissing: record.durationMissing,
      });
    } else {
      log.error('Failed to write formatted trace', { path: outcome.path, error: outcome.error.message });
      writeFailures.push(outcome.error);
    }
  }

  log.debug('Format complete', {
    outputDir,
    documents: documents.length,
    renderFailures: renderFailures.length,
    writeFailures: writeFailures.length,
  });
  return { run, outputDir, documents, renderFailures, writeFailures };
}
