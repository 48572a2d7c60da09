/**
 * JSON Exporter
 *
 * Machine-readable counterpart of the Markdown summary.
 */

import type { SummaryViewData } from '../views/summary-view.js';

export const SUMMARY_JSON_VERSION = 1;

export interface SummaryExport extends SummaryViewData {
  version: number;
}

/**
 * Exports summary view data as JSON.
 */
export class JSONExporter {
  toObject(data: SummaryViewData): SummaryExport {
    return { version: SUMMARY_JSON_VERSION, ...data };
  }

  export(data: SummaryViewData): string {
    return JSON.stringify(this.toObject(data), null, 2) + '\n';
  }
}

/**
 * Factory function.
 */
export function createJSONExporter(): JSONExporter {
  return new JSONExporter();
}
