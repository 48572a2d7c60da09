/**
 * Terminal Renderer
 *
 * Renders command results for the terminal with colors and formatting.
 */

import { basename } from 'node:path';
import chalk from 'chalk';
import type { FormatResult, SummaryResult } from '../commands/types.js';
import type { LoadFailure } from '../types.js';
import type { TraceDigestError } from '../errors/index.js';
import { countTraceFiles } from '../store/trace-store.js';

/**
 * Terminal renderer for command results.
 */
export class TerminalRenderer {
  renderFormatResult(result: FormatResult): string {
    const lines: string[] = [];
    const total = result.run.records.length;

    lines.push(chalk.cyan(`Found ${total} API trace file(s) in ${result.run.traceDir}`));
    lines.push(chalk.dim(`Output: ${result.outputDir}`));
    lines.push('');

    for (const doc of result.documents) {
      const time = doc.durationMissing ? 'time missing' : `${doc.durationSeconds.toFixed(2)}s`;
      lines.push(`${chalk.green('✓')} ${basename(doc.path)} ${chalk.dim(`(${time})`)}`);
    }
    const outputFailures = [...result.renderFailures, ...result.writeFailures];
    lines.push(...this.renderFailures(result.run.failures, outputFailures));

    lines.push('');
    const summary = `Formatted ${result.documents.length} of ${total} trace file(s)`;
    lines.push(this.hasProblems(result.run.failures, outputFailures) ? chalk.yellow(summary) : chalk.green(summary));

    return lines.join('\n');
  }

  renderSummaryResult(result: SummaryResult): string {
    const lines: string[] = [];
    const summaryFailed = result.writeFailures.some((f) => f.filePath === result.summaryPath);

    lines.push(
      this.box([
        `Run: ${chalk.cyan(result.run.runName)}`,
        `Trace files: ${countTraceFiles(result.run)} | Failed: ${result.run.failures.length}`,
      ]),
    );
    lines.push('');

    if (!summaryFailed) {
      lines.push(`${chalk.green('✓')} Summary written: ${result.summaryPath}`);
    }
    if (result.jsonPath && !result.writeFailures.some((f) => f.filePath === result.jsonPath)) {
      lines.push(`${chalk.green('✓')} JSON written: ${result.jsonPath}`);
    }
    lines.push(...this.renderFailures(result.run.failures, result.writeFailures));

    return lines.join('\n');
  }

  renderError(message: string): string {
    return `${chalk.red('✗')} ${message}`;
  }

  renderWarning(message: string): string {
    return `${chalk.yellow('⚠')} ${message}`;
  }

  private renderFailures(loadFailures: LoadFailure[], outputFailures: TraceDigestError[]): string[] {
    const lines: string[] = [];
    for (const failure of loadFailures) {
      lines.push(`${chalk.red('✗')} ${failure.fileName} ${chalk.dim(`(${failure.kind})`)}: ${failure.message}`);
    }
    for (const failure of outputFailures) {
      lines.push(`${chalk.red('✗')} ${failure.message}`);
    }
    return lines;
  }

  private hasProblems(loadFailures: LoadFailure[], outputFailures: TraceDigestError[]): boolean {
    return loadFailures.length > 0 || outputFailures.length > 0;
  }

  private box(lines: string[]): string {
    const width = Math.max(...lines.map((l) => this.stripAnsi(l).length)) + 4;
    const top = '┌' + '─'.repeat(width - 2) + '┐';
    const bottom = '└' + '─'.repeat(width - 2) + '┘';

    const boxed = lines.map((l) => {
      const padding = width - 4 - this.stripAnsi(l).length;
      return '│ ' + l + ' '.repeat(padding) + ' │';
    });

    return [top, ...boxed, bottom].join('\n');
  }

  private stripAnsi(str: string): string {
    // eslint-disable-next-line no-control-regex
    return str.replace(/\x1B\[[0-9;]*[mK]/g, '');
  }
}

/**
 * Factory function.
 */
export function createTerminalRenderer(): TerminalRenderer {
  return new TerminalRenderer();
}
