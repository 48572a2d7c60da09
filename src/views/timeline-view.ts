/**
 * Timeline View
 *
 * One entry per record, in sequence order.
 */

import { labeledPreview } from '../analyzer/previews.js';
import type { TimelineEntry, TraceRecord } from '../types.js';

export interface TimelineViewData {
  entries: TimelineEntry[];
}

/**
 * Generates timeline view data.
 */
export class TimelineView {
  private records: readonly TraceRecord[];
  private previewChars: number;

  constructor(records: readonly TraceRecord[], previewChars: number) {
    this.records = records;
    this.previewChars = previewChars;
  }

  generate(): TimelineViewData {
    return {
      entries: this.records.map((record) => ({
        sequenceNumber: record.sequenceNumber,
        methodName: record.methodName,
        durationSeconds: record.durationSeconds,
        durationMissing: record.durationMissing,
        preview: labeledPreview(record, this.previewChars),
        degraded: record.error !== undefined,
      })),
    };
  }
}

/**
 * Factory function.
 */
export function createTimelineView(records: readonly TraceRecord[], previewChars: number): TimelineView {
  return new TimelineView(records, previewChars);
}
