/**
 * Summary Renderer
 *
 * Renders SummaryViewData as the run-level Markdown report. Output depends
 * only on the view data (no clock, no environment), so regenerating from
 * the same records gives the same bytes.
 */

import { formatCost } from '../costs/index.js';
import type { CycleView, LoadFailure, MethodStatistics, TimelineEntry } from '../types.js';
import type { SummaryViewData } from '../views/summary-view.js';
import { durationLabel, formatSeconds, tableRow } from './markdown.js';

function statisticsRow(label: string, stats: MethodStatistics): string {
  return tableRow([
    label,
    stats.count,
    stats.timedCount,
    formatSeconds(stats.totalDurationSeconds),
    formatSeconds(stats.minDurationSeconds),
    formatSeconds(stats.maxDurationSeconds),
    formatSeconds(stats.meanDurationSeconds),
  ]);
}

function usageRow(label: string, stats: MethodStatistics): string {
  return tableRow([
    label,
    stats.recordsWithUsage,
    stats.promptTokens.toLocaleString('en-US'),
    stats.completionTokens.toLocaleString('en-US'),
    stats.totalTokens.toLocaleString('en-US'),
    formatCost(stats.costUsd),
  ]);
}

/**
 * Renders the run summary document.
 */
export class SummaryRenderer {
  render(data: SummaryViewData): string {
    const sections = [
      this.renderHeader(data),
      this.renderTimeline(data.timeline),
      this.renderStatistics(data),
    ];
    if (data.hasUsage) {
      sections.push(this.renderUsage(data));
    }
    sections.push(this.renderCycles(data.cycles));
    if (data.failures.length > 0) {
      sections.push(this.renderFailures(data.failures));
    }
    return sections.join('\n\n') + '\n';
  }

  private renderHeader(data: SummaryViewData): string {
    return [
      '# Agent Trace Summary',
      '',
      `- **Run**: ${data.header.runName}`,
      `- **Trace files**: ${data.header.traceFileCount}`,
      `- **Failed files**: ${data.header.failedFileCount}`,
    ].join('\n');
  }

  private renderTimeline(entries: TimelineEntry[]): string {
    const lines = [
      '## Timeline',
      '',
      '| # | Method | Duration (s) | Preview |',
      '|---|--------|--------------|---------|',
    ];
    for (const entry of entries) {
      lines.push(
        tableRow([
          entry.sequenceNumber,
          entry.methodName,
          entry.durationMissing ? 'missing' : formatSeconds(entry.durationSeconds),
          entry.degraded ? `⚠ ${entry.preview}` : entry.preview,
        ]),
      );
    }
    return lines.join('\n');
  }

  private renderStatistics(data: SummaryViewData): string {
    const { perMethod, overall } = data.statistics;
    const lines = [
      '## Method Statistics',
      '',
      '| Method | Calls | Timed | Total (s) | Min (s) | Max (s) | Mean (s) |',
      '|--------|-------|-------|-----------|---------|---------|----------|',
    ];
    for (const { method, stats } of perMethod) {
      lines.push(statisticsRow(method, stats));
    }
    lines.push(statisticsRow('overall', overall));
    lines.push('');
    lines.push(`**Total duration**: ${formatSeconds(overall.totalDurationSeconds)}s`);
    if (overall.missingDurationCount > 0) {
      lines.push('');
      lines.push(
        `_${overall.missingDurationCount} record(s) without a duration are counted in Calls but excluded from the duration columns._`,
      );
    }
    return lines.join('\n');
  }

  private renderUsage(data: SummaryViewData): string {
    const { perMethod, overall } = data.statistics;
    const lines = [
      '## Token Usage',
      '',
      '| Method | Calls with usage | Prompt | Completion | Total | Cost |',
      '|--------|------------------|--------|------------|-------|------|',
    ];
    for (const { method, stats } of perMethod) {
      lines.push(usageRow(method, stats));
    }
    lines.push(usageRow('overall', overall));
    return lines.join('\n');
  }

  private renderCycles(cycles: CycleView[]): string {
    const parts = ['## Cycles'];
    for (const cycle of cycles) {
      const marker = cycle.partial ? ` (partial: missing ${cycle.missingMethods.join(', ')})` : '';
      const duration = `${formatSeconds(cycle.totalDurationSeconds)}s${cycle.hasMissingDuration ? ' (some durations missing)' : ''}`;

      const lines = [`### Cycle ${cycle.index}${marker}`, '', `Duration: ${duration}`, ''];
      for (const step of cycle.steps) {
        lines.push(
          `- **${step.methodName.toUpperCase()}** (#${step.sequenceNumber}, ${durationLabel(step.durationSeconds, step.durationMissing)}): ${step.preview}`,
        );
      }
      parts.push(lines.join('\n'));
    }
    return parts.join('\n\n');
  }

  private renderFailures(failures: LoadFailure[]): string {
    const lines = ['## Failed Files', ''];
    for (const failure of failures) {
      lines.push(`- \`${failure.fileName}\` (${failure.kind}): ${failure.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * Render a summary document.
 */
export function renderSummary(data: SummaryViewData): string {
  return new SummaryRenderer().render(data);
}
