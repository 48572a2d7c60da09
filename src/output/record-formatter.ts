/**
 * Record Formatter
 *
 * Renders one TraceRecord as a self-contained Markdown document:
 * title, metadata, request messages by role, response, then optional
 * retrieve result and parse notes.
 */

import { errorMarker } from '../parser/trace-parser.js';
import type { MessageRole, TraceMessage, TraceRecord } from '../types.js';
import { detectLanguage, durationLabel, fencedBlock } from './markdown.js';
import { formatCost } from '../costs/index.js';

export interface RecordFormatterOptions {
  /** Re-indent message content that is a JSON object or array */
  prettyPrintJson: boolean;
}

export const NO_RESPONSE_MARKER = '_No response recorded._';

const ROLE_HEADINGS: Record<MessageRole, string> = {
  system: 'System Prompt',
  user: 'User Input',
  other: 'Other Messages',
};

/**
 * Output file name for a record, e.g. `api_trace_3_act.md`.
 */
export function recordFileName(record: TraceRecord): string {
  const stem = record.fileName.replace(/\.json$/i, '');
  return `${stem}_${record.methodName}.md`;
}

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Formats trace records as Markdown.
 */
export class RecordFormatter {
  private readonly options: RecordFormatterOptions;

  constructor(options: RecordFormatterOptions) {
    this.options = options;
  }

  format(record: TraceRecord): string {
    const sections = [
      `# Trace ${record.sequenceNumber}: ${record.methodName}`,
      this.renderMetadata(record),
      this.renderRequest(record),
      this.renderResponse(record),
    ];

    if (record.retrieveResult !== undefined) {
      sections.push(`## Retrieve Result\n\n${this.renderRetrieveResult(record.retrieveResult)}`);
    }
    if (record.issues.length > 0) {
      sections.push(`## Parse Issues\n\n${record.issues.map((issue) => `- ${issue}`).join('\n')}`);
    }
    if (record.error) {
      sections.push(`## Load Error\n\n${errorMarker(record.error)}`);
    }

    return sections.join('\n\n') + '\n';
  }

  private renderMetadata(record: TraceRecord): string {
    const method =
      record.rawMethodName !== undefined && record.rawMethodName !== record.methodName
        ? `${record.methodName} (recorded as "${record.rawMethodName}")`
        : record.methodName;

    const lines = [
      `- **Method**: ${method}`,
      `- **Sequence**: ${record.sequenceNumber}`,
      `- **Source file**: ${record.fileName}`,
      `- **Execution time**: ${durationLabel(record.durationSeconds, record.durationMissing)}`,
    ];
    if (record.model) {
      lines.push(`- **Model**: ${record.model}`);
    }
    if (record.usage) {
      const { promptTokens, completionTokens, totalTokens } = record.usage;
      lines.push(
        `- **Tokens**: ${formatCount(promptTokens)} prompt / ${formatCount(completionTokens)} completion / ${formatCount(totalTokens)} total`,
      );
    }
    if (record.cost !== undefined) {
      lines.push(`- **Cost**: ${formatCost(record.cost)}`);
    }
    return lines.join('\n');
  }

  /**
   * One sub-section per role, in order of first appearance.
   */
  private renderRequest(record: TraceRecord): string {
    if (record.messages.length === 0) {
      return '## Request\n\n_No request messages recorded._';
    }

    const byRole = new Map<MessageRole, TraceMessage[]>();
    for (const message of record.messages) {
      const group = byRole.get(message.role) ?? [];
      group.push(message);
      byRole.set(message.role, group);
    }

    const parts = ['## Request'];
    for (const [role, messages] of byRole) {
      parts.push(`### ${ROLE_HEADINGS[role]}`);
      messages.forEach((message, i) => {
        if (messages.length > 1 || role === 'other') {
          const source = role === 'other' ? ` (${message.sourceRole})` : '';
          parts.push(`#### Message ${i + 1}${source}`);
        }
        parts.push(this.renderContent(message));
      });
    }
    return parts.join('\n\n');
  }

  private renderContent(message: TraceMessage): string {
    if (message.content === '') {
      return '_Empty message._';
    }
    // System prompts are shown exactly as sent
    if (message.role === 'system') {
      return fencedBlock(message.content, 'text');
    }

    const language = detectLanguage(message.content);
    if (language === 'json' && this.options.prettyPrintJson) {
      // detectLanguage parsed the trimmed text; BOM and NBSP are not JSON whitespace
      const parsed: unknown = JSON.parse(message.content.trim());
      return fencedBlock(JSON.stringify(parsed, null, 2), 'json');
    }
    return fencedBlock(message.content, language);
  }

  private renderResponse(record: TraceRecord): string {
    if (record.response.length === 0) {
      return `## Response\n\n${NO_RESPONSE_MARKER}`;
    }
    if (record.response.length === 1) {
      return `## Response\n\n${fencedBlock(record.response[0])}`;
    }
    const parts = ['## Response'];
    record.response.forEach((text, i) => {
      parts.push(`### Response ${i + 1}`, fencedBlock(text));
    });
    return parts.join('\n\n');
  }

  private renderRetrieveResult(value: unknown): string {
    if (typeof value === 'string') {
      return fencedBlock(value);
    }
    return fencedBlock(JSON.stringify(value, null, 2) ?? String(value), 'json');
  }
}

/**
 * Format one record.
 */
export function formatRecord(record: TraceRecord, options: RecordFormatterOptions): string {
  return new RecordFormatter(options).format(record);
}
