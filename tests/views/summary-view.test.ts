/**
 * Summary View Tests
 */

import { describe, it, expect } from 'vitest';
import { createSummaryView } from '../../src/views/summary-view.js';
import { createTimelineView } from '../../src/views/timeline-view.js';
import type { LoadedRun } from '../../src/types.js';
import { makeRecord } from '../helpers/fixtures.js';

describe('TimelineView', () => {
  it('has one entry per record with a truncated labeled preview', () => {
    const { entries } = createTimelineView(
      [makeRecord(1, 'observe', 1.5, { response: ['x'.repeat(100)] }), makeRecord(2, 'plan', null)],
      20,
    ).generate();

    expect(entries).toEqual([
      {
        sequenceNumber: 1,
        methodName: 'observe',
        durationSeconds: 1.5,
        durationMissing: false,
        preview: `Observed: ${'x'.repeat(17)}...`,
        degraded: false,
      },
      {
        sequenceNumber: 2,
        methodName: 'plan',
        durationSeconds: 0,
        durationMissing: true,
        preview: 'Plan: plan output 2',
        degraded: false,
      },
    ]);
  });
});

describe('SummaryView', () => {
  const run: LoadedRun = {
    runPath: '/runs/r1',
    runName: 'r1',
    traceDir: '/runs/r1/api_trace',
    records: [makeRecord(1, 'observe', 3), makeRecord(2, 'plan', 2), makeRecord(3, 'observe', 1)],
    failures: [],
  };

  it('assembles header, cycles and statistics', () => {
    const data = createSummaryView(run, { timelinePreviewChars: 60, cyclePreviewChars: 200 }).generate();

    expect(data.header).toEqual({ runName: 'r1', traceFileCount: 3, failedFileCount: 0 });
    expect(data.timeline).toHaveLength(3);
    expect(data.hasUsage).toBe(false);
    expect(data.statistics.overall.totalDurationSeconds).toBe(6);
    expect(data.cycles.map((c) => [c.index, c.partial, c.missingMethods, c.totalDurationSeconds])).toEqual([
      [1, true, ['act'], 5],
      [2, true, ['plan', 'act'], 1],
    ]);
    expect(data.cycles[0].steps[1]).toEqual({
      sequenceNumber: 2,
      methodName: 'plan',
      durationSeconds: 2,
      durationMissing: false,
      preview: 'plan output 2',
    });
  });
});
