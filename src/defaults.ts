/**
 * Default configuration values.
 */

import type { ResolvedConfig } from './config/schema.js';

export const DEFAULT_CONFIG: ResolvedConfig = {
  traceDirName: 'api_trace',
  traceFilePrefix: 'api_trace_',
  formattedDirName: 'api_trace_formatted',
  summaryFileName: 'api_summary.md',
  timelinePreviewChars: 60,
  cyclePreviewChars: 200,
  prettyPrintJson: true,
  logLevel: 'info',
};
