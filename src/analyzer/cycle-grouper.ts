/**
 * Cycle Grouper
 *
 * Partitions the ordered record sequence into observe→plan→act cycles.
 * Pure: no I/O, input is never mutated.
 */

import type { Cycle, MethodName, TraceRecord } from '../types.js';

const CYCLE_METHODS: readonly MethodName[] = ['observe', 'plan', 'act'];

/**
 * Build a Cycle value from its member records.
 */
export function createCycle(index: number, records: readonly TraceRecord[]): Cycle {
  const methods = new Set(records.map((r) => r.methodName));
  const missingMethods = CYCLE_METHODS.filter((m) => !methods.has(m));

  let totalDurationSeconds = 0;
  let hasMissingDuration = false;
  for (const record of records) {
    if (record.durationMissing) {
      hasMissingDuration = true;
    } else {
      totalDurationSeconds += record.durationSeconds;
    }
  }

  return {
    index,
    records,
    totalDurationSeconds,
    hasMissingDuration,
    // observe always opens a cycle, so a cycle holding one starts with it
    partial: missingMethods.length > 0,
    missingMethods,
  };
}

/**
 * Group records into cycles.
 *
 * The first record always opens cycle 1. Every `observe` record opens a new
 * cycle once the current one holds a record; any other method, `unknown`
 * included, joins the current cycle.
 */
export function groupCycles(records: readonly TraceRecord[]): Cycle[] {
  const groups = records.reduce<TraceRecord[][]>((acc, record) => {
    if (acc.length === 0 || record.methodName === 'observe') {
      acc.push([record]);
    } else {
      acc[acc.length - 1].push(record);
    }
    return acc;
  }, []);

  return groups.map((group, i) => createCycle(i + 1, group));
}
