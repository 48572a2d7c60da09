/**
 * Command option and result types.
 */

import type { ResolvedConfig } from '../config/schema.js';
import type { RenderError, WriteError } from '../errors/index.js';
import type { LoadedRun } from '../types.js';
import type { StructuredLogger } from '../utilities/logger.js';

export interface CommandOptions {
  config: ResolvedConfig;
  logger?: StructuredLogger;
}

export interface FormatOptions extends CommandOptions {
  /** Defaults to `<run>/<formattedDirName>` */
  outputDir?: string;
}

export interface FormattedDocument {
  sequenceNumber: number;
  path: string;
  durationSeconds: number;
  durationMissing: boolean;
}

export interface FormatResult {
  run: LoadedRun;
  outputDir: string;
  documents: FormattedDocument[];
  /** Records whose document could not be produced */
  renderFailures: RenderError[];
  writeFailures: WriteError[];
}

export interface SummaryOptions extends CommandOptions {
  /** Defaults to `<run>/<summaryFileName>` */
  outputFile?: string;
  /** Also write a JSON export next to the Markdown summary */
  json?: boolean;
}

export interface SummaryResult {
  run: LoadedRun;
  summaryPath: string;
  jsonPath?: string;
  /** The rendered Markdown document */
  content: string;
  writeFailures: WriteError[];
}
