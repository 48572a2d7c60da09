/**
 * Summary View
 *
 * Assembles everything the run summary shows: header, timeline,
 * statistics, cycles and load failures.
 */

import { groupCycles } from '../analyzer/cycle-grouper.js';
import { contentPreview } from '../analyzer/previews.js';
import { StatisticsAggregator } from '../analyzer/statistics.js';
import { countTraceFiles } from '../store/trace-store.js';
import type { CycleView, LoadFailure, LoadedRun, RunStatistics, TimelineEntry } from '../types.js';
import { createTimelineView } from './timeline-view.js';

export interface SummaryViewOptions {
  timelinePreviewChars: number;
  cyclePreviewChars: number;
  aggregator?: StatisticsAggregator;
}

/**
 * Summary view data.
 */
export interface SummaryViewData {
  header: {
    runName: string;
    traceFileCount: number;
    failedFileCount: number;
  };
  timeline: TimelineEntry[];
  statistics: RunStatistics;
  /** True when any record carries token usage or cost */
  hasUsage: boolean;
  cycles: CycleView[];
  failures: LoadFailure[];
}

/**
 * Generates summary view data.
 */
export class SummaryView {
  private run: LoadedRun;
  private options: SummaryViewOptions;

  constructor(run: LoadedRun, options: SummaryViewOptions) {
    this.run = run;
    this.options = options;
  }

  generate(): SummaryViewData {
    const { records, failures } = this.run;
    const aggregator = this.options.aggregator ?? new StatisticsAggregator();
    const statistics = aggregator.compute(records);

    const cycles = groupCycles(records).map((cycle) => ({
      index: cycle.index,
      partial: cycle.partial,
      missingMethods: cycle.missingMethods,
      totalDurationSeconds: cycle.totalDurationSeconds,
      hasMissingDuration: cycle.hasMissingDuration,
      steps: cycle.records.map((record) => ({
        sequenceNumber: record.sequenceNumber,
        methodName: record.methodName,
        durationSeconds: record.durationSeconds,
        durationMissing: record.durationMissing,
        preview: contentPreview(record, this.options.cyclePreviewChars),
      })),
    }));

    return {
      header: {
        runName: this.run.runName,
        traceFileCount: countTraceFiles(this.run),
        failedFileCount: failures.length,
      },
      timeline: createTimelineView(records, this.options.timelinePreviewChars).generate().entries,
      statistics,
      hasUsage: statistics.overall.recordsWithUsage > 0,
      cycles,
      failures,
    };
  }
}

/**
 * Factory function.
 */
export function createSummaryView(run: LoadedRun, options: SummaryViewOptions): SummaryView {
  return new SummaryView(run, options);
}
