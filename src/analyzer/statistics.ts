/**
 * Statistics Aggregator
 *
 * Per-method and overall call counts, durations, token usage and cost.
 *
 * Records with a missing duration count toward `count` but are left out of
 * the total, min, max and mean. The overall row is built from the
 * per-method rows, so its count and total duration equal their sums.
 */

import { modelRegistry, type ModelRegistry } from '../costs/index.js';
import {
  METHOD_ORDER,
  type MethodName,
  type MethodStatistics,
  type RunStatistics,
  type TraceRecord,
} from '../types.js';

function emptyStatistics(): MethodStatistics {
  return {
    count: 0,
    timedCount: 0,
    missingDurationCount: 0,
    totalDurationSeconds: 0,
    minDurationSeconds: null,
    maxDurationSeconds: null,
    meanDurationSeconds: null,
    recordsWithUsage: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    costUsd: 0,
  };
}

function min(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

function max(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function withMean(stats: MethodStatistics): MethodStatistics {
  return {
    ...stats,
    meanDurationSeconds: stats.timedCount > 0 ? stats.totalDurationSeconds / stats.timedCount : null,
  };
}

/**
 * Computes RunStatistics from a record sequence.
 */
export class StatisticsAggregator {
  private readonly registry: ModelRegistry;

  constructor(registry: ModelRegistry = modelRegistry) {
    this.registry = registry;
  }

  /**
   * Cost of one record: the recorded cost when positive, otherwise derived
   * from its token usage. Records without usage cost nothing.
   */
  recordCost(record: TraceRecord): number {
    if (record.cost !== undefined && record.cost > 0) return record.cost;
    if (!record.usage) return record.cost ?? 0;
    return this.registry.calculateCost(record.model, record.usage);
  }

  compute(records: readonly TraceRecord[]): RunStatistics {
    const byMethod = new Map<MethodName, MethodStatistics>();

    for (const record of records) {
      const stats = byMethod.get(record.methodName) ?? emptyStatistics();
      stats.count += 1;

      if (record.durationMissing) {
        stats.missingDurationCount += 1;
      } else {
        stats.timedCount += 1;
        stats.totalDurationSeconds += record.durationSeconds;
        stats.minDurationSeconds = min(stats.minDurationSeconds, record.durationSeconds);
        stats.maxDurationSeconds = max(stats.maxDurationSeconds, record.durationSeconds);
      }

      if (record.usage || record.cost !== undefined) {
        stats.recordsWithUsage += 1;
        stats.promptTokens += record.usage?.promptTokens ?? 0;
        stats.completionTokens += record.usage?.completionTokens ?? 0;
        stats.totalTokens += record.usage?.totalTokens ?? 0;
        stats.costUsd += this.recordCost(record);
      }

      byMethod.set(record.methodName, stats);
    }

    const perMethod: RunStatistics['perMethod'] = [];
    for (const method of METHOD_ORDER) {
      const stats = byMethod.get(method);
      if (stats) perMethod.push({ method, stats: withMean(stats) });
    }

    const overall = perMethod.reduce<MethodStatistics>(
      (acc, { stats }) => ({
        count: acc.count + stats.count,
        timedCount: acc.timedCount + stats.timedCount,
        missingDurationCount: acc.missingDurationCount + stats.missingDurationCount,
        totalDurationSeconds: acc.totalDurationSeconds + stats.totalDurationSeconds,
        minDurationSeconds: min(acc.minDurationSeconds, stats.minDurationSeconds),
        maxDurationSeconds: max(acc.maxDurationSeconds, stats.maxDurationSeconds),
        meanDurationSeconds: null,
        recordsWithUsage: acc.recordsWithUsage + stats.recordsWithUsage,
        promptTokens: acc.promptTokens + stats.promptTokens,
        completionTokens: acc.completionTokens + stats.completionTokens,
        totalTokens: acc.totalTokens + stats.totalTokens,
        costUsd: acc.costUsd + stats.costUsd,
      }),
      emptyStatistics(),
    );

    return { perMethod, overall: withMean(overall) };
  }
}

/**
 * Compute statistics with the default pricing registry.
 */
export function computeStatistics(records: readonly TraceRecord[]): RunStatistics {
  return new StatisticsAggregator().compute(records);
}
