/**
 * Short, single-line previews of a record's content for the summary.
 */

import { errorMarker } from '../parser/trace-parser.js';
import type { MethodName, TraceRecord } from '../types.js';

const METHOD_LABELS: Record<MethodName, string> = {
  observe: 'Observed',
  plan: 'Plan',
  act: 'Action',
  unknown: '',
};

export const NO_RESPONSE_PREVIEW = 'No response';

/**
 * Truncate a string with ellipsis; the result is at most `maxLen` code
 * points long and never splits a surrogate pair.
 */
export function truncate(str: string, maxLen: number): string {
  const chars = Array.from(str);
  if (chars.length <= maxLen) return str;
  return chars.slice(0, Math.max(0, maxLen - 3)).join('') + '...';
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Readable text of one response string. JSON responses that carry an
 * `observations` list show the first observation; other JSON is compacted.
 */
export function describeResponse(text: string): string {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return text;
  }

  if (isRecord(data) && Array.isArray(data.observations) && data.observations.length > 0) {
    const first: unknown = data.observations[0];
    return typeof first === 'string' ? first : JSON.stringify(first);
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Preview of what the record produced, falling back to its user input.
 */
export function contentPreview(record: TraceRecord, maxChars: number): string {
  if (record.error) {
    return truncate(errorMarker(record.error), maxChars);
  }

  if (record.response.length > 0) {
    return truncate(collapseWhitespace(describeResponse(record.response[0])), maxChars);
  }

  const userInput = record.messages.find((m) => m.role === 'user' && m.content.trim() !== '');
  if (userInput) {
    return truncate(`${NO_RESPONSE_PREVIEW}; input: ${collapseWhitespace(userInput.content)}`, maxChars);
  }
  return NO_RESPONSE_PREVIEW;
}

/**
 * Content preview prefixed with the method label (e.g. "Plan: ...").
 */
export function labeledPreview(record: TraceRecord, maxChars: number): string {
  const label = record.error ? '' : METHOD_LABELS[record.methodName];
  const preview = contentPreview(record, maxChars);
  return label ? `${label}: ${preview}` : preview;
}
