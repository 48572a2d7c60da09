/**
 * Trace File Parser
 *
 * Turns the raw bytes of one `api_trace_<n>.json` file into a TraceRecord.
 * Input is loosely structured: every field is optional and may have an
 * unexpected shape. Recoverable oddities are normalized and noted in
 * `record.issues`; unrecoverable content raises RecordParseError or
 * EncodingError so the loader can substitute a degraded record.
 */

import { z } from 'zod';
import { EncodingError, RecordParseError } from '../errors/index.js';
import type {
  MessageRole,
  MethodName,
  RecordError,
  TokenUsage,
  TraceMessage,
  TraceRecord,
} from '../types.js';

// =============================================================================
// RAW SCHEMAS
// =============================================================================

const TraceFileSchema = z
  .object({
    request: z.unknown().optional(),
    response: z.unknown().optional(),
    method_name: z.unknown().optional(),
    retrieve_result: z.unknown().optional(),
    time: z.unknown().optional(),
    usage: z.unknown().optional(),
    cost: z.unknown().optional(),
    model: z.unknown().optional(),
  })
  .passthrough();

const MessageSchema = z
  .object({
    role: z.string().optional(),
    content: z.unknown().optional(),
  })
  .passthrough();

const TextPartSchema = z.object({ type: z.literal('text'), text: z.string() }).passthrough();

const UsageSchema = z
  .object({
    prompt_tokens: z.number().nonnegative().optional(),
    completion_tokens: z.number().nonnegative().optional(),
    total_tokens: z.number().nonnegative().optional(),
  })
  .passthrough();

// =============================================================================
// FILE NAMES
// =============================================================================

export interface RecordSource {
  sequenceNumber: number;
  fileName: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Longest digit run that always converts to an exact integer */
const MAX_SEQUENCE_DIGITS = String(Number.MAX_SAFE_INTEGER).length - 1;

/**
 * Extract the sequence number from a trace file name, or null when the
 * name is not `<prefix><digits>.json` or the number is too large to hold
 * exactly.
 */
export function parseSequenceNumber(fileName: string, prefix: string): number | null {
  const match = new RegExp(`^${escapeRegExp(prefix)}(\\d+)\\.json$`).exec(fileName);
  if (!match) return null;
  const digits = match[1].replace(/^0+(?=\d)/, '');
  if (digits.length > MAX_SEQUENCE_DIGITS) return null;
  return Number.parseInt(digits, 10);
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * Decode file bytes as strict UTF-8. A leading BOM is dropped.
 */
export function decodeTraceBytes(fileName: string, bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new EncodingError(fileName, err);
  }
}

/**
 * Parse a decoded trace document.
 */
export function parseTraceDocument(text: string, source: RecordSource): TraceRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new RecordParseError(source.fileName, `Invalid JSON: ${detail}`, err);
  }
  return normalizeTraceRecord(raw, source);
}

// =============================================================================
// NORMALIZATION
// =============================================================================

const METHOD_ALIASES: Record<string, MethodName> = {
  observe: 'observe',
  perceive: 'observe',
  plan: 'plan',
  act: 'act',
};

export function normalizeMethodName(value: unknown): MethodName {
  if (typeof value !== 'string') return 'unknown';
  return METHOD_ALIASES[value.trim().toLowerCase()] ?? 'unknown';
}

function normalizeRole(role: string): MessageRole {
  switch (role.trim().toLowerCase()) {
    case 'system':
      return 'system';
    case 'user':
      return 'user';
    default:
      return 'other';
  }
}

function stringify(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? String(value);
}

function normalizeContent(content: unknown, label: string, issues: string[]): string {
  if (typeof content === 'string') {
    return content;
  }
  if (content === undefined || content === null) {
    issues.push(`${label} has no content`);
    return '';
  }
  if (Array.isArray(content)) {
    return content
      .map((part) => {
        const text = TextPartSchema.safeParse(part);
        if (text.success) return text.data.text;
        if (typeof part === 'string') return part;
        issues.push(`${label} has a non-text content part`);
        return stringify(part);
      })
      .join('\n');
  }
  issues.push(`${label} content is ${typeof content}, shown as JSON`);
  return stringify(content);
}

/**
 * Pick the conversation out of the request. The producer writes a list
 * holding one conversation; a flat message list is accepted as well.
 */
function selectConversation(request: unknown, issues: string[]): unknown[] {
  if (request === undefined || request === null) {
    issues.push('request is missing');
    return [];
  }
  if (!Array.isArray(request)) {
    issues.push('request is not a list');
    return [];
  }
  if (request.length === 0) {
    return [];
  }
  if (!Array.isArray(request[0])) {
    return request;
  }
  if (request.length > 1) {
    issues.push(`request holds ${request.length} conversations; only the first is shown`);
  }
  return request[0];
}

function normalizeMessages(request: unknown, issues: string[]): TraceMessage[] {
  const messages: TraceMessage[] = [];
  selectConversation(request, issues).forEach((entry, i) => {
    const label = `message ${i + 1}`;
    const parsed = MessageSchema.safeParse(entry);
    if (!parsed.success) {
      issues.push(`${label} is not a role/content object`);
      return;
    }
    const sourceRole = parsed.data.role ?? 'unknown';
    messages.push({
      role: normalizeRole(sourceRole),
      sourceRole,
      content: normalizeContent(parsed.data.content, label, issues),
    });
  });
  return messages;
}

function normalizeResponse(response: unknown, issues: string[]): string[] {
  if (response === undefined || response === null) {
    issues.push('response is missing');
    return [];
  }
  if (typeof response === 'string') {
    return [response];
  }
  if (!Array.isArray(response)) {
    issues.push('response is not a list');
    return [stringify(response)];
  }
  return response.map((item, i) => {
    if (typeof item === 'string') return item;
    issues.push(`response item ${i + 1} is not a string, shown as JSON`);
    return stringify(item);
  });
}

function normalizeDuration(time: unknown, issues: string[]): number | null {
  if (time === undefined || time === null) {
    return null;
  }
  const value = typeof time === 'string' && time.trim() !== '' ? Number(time) : time;
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    if (typeof time === 'string') issues.push('time was given as a string');
    return value;
  }
  issues.push(`time has an invalid value (${JSON.stringify(time)})`);
  return null;
}

function normalizeUsage(usage: unknown, issues: string[]): TokenUsage | undefined {
  if (usage === undefined || usage === null) return undefined;
  const parsed = UsageSchema.safeParse(usage);
  if (!parsed.success) {
    issues.push('usage has an unexpected shape');
    return undefined;
  }
  const { prompt_tokens, completion_tokens, total_tokens } = parsed.data;
  if (prompt_tokens === undefined && completion_tokens === undefined && total_tokens === undefined) {
    return undefined;
  }
  const promptTokens = prompt_tokens ?? 0;
  const completionTokens = completion_tokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: total_tokens ?? promptTokens + completionTokens,
  };
}

/**
 * Normalize an already-parsed JSON value into a TraceRecord.
 */
export function normalizeTraceRecord(raw: unknown, source: RecordSource): TraceRecord {
  const parsed = TraceFileSchema.safeParse(raw);
  if (!parsed.success) {
    const kind = Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw;
    throw new RecordParseError(source.fileName, `Expected a JSON object, got ${kind}`);
  }

  const data = parsed.data;
  const issues: string[] = [];

  const methodName = normalizeMethodName(data.method_name);
  const rawMethodName = typeof data.method_name === 'string' ? data.method_name : undefined;
  if (data.method_name === undefined) {
    issues.push('method_name is missing');
  } else if (methodName === 'unknown') {
    issues.push(`method_name ${JSON.stringify(data.method_name)} is not a known agent method`);
  }

  const duration = normalizeDuration(data.time, issues);
  const usage = normalizeUsage(data.usage, issues);

  const record: TraceRecord = {
    sequenceNumber: source.sequenceNumber,
    fileName: source.fileName,
    methodName,
    messages: normalizeMessages(data.request, issues),
    response: normalizeResponse(data.response, issues),
    durationSeconds: duration ?? 0,
    durationMissing: duration === null,
    issues,
  };

  if (rawMethodName !== undefined) record.rawMethodName = rawMethodName;
  if (data.retrieve_result !== undefined && data.retrieve_result !== null) {
    record.retrieveResult = data.retrieve_result;
  }
  if (typeof data.model === 'string' && data.model !== '') record.model = data.model;
  if (usage) record.usage = usage;
  if (typeof data.cost === 'number' && Number.isFinite(data.cost) && data.cost >= 0) {
    record.cost = data.cost;
  }

  return record;
}

/**
 * Placeholder for a file that could not be read, decoded or parsed.
 */
export function createDegradedRecord(source: RecordSource, error: RecordError): TraceRecord {
  return {
    sequenceNumber: source.sequenceNumber,
    fileName: source.fileName,
    methodName: 'unknown',
    messages: [],
    response: [],
    durationSeconds: 0,
    durationMissing: true,
    issues: [],
    error,
  };
}

/**
 * Visible marker shown in place of content that could not be read.
 */
export function errorMarker(error: RecordError): string {
  switch (error.kind) {
    case 'encoding':
      return `[unreadable content: ${error.message}]`;
    case 'read':
      return `[unreadable file: ${error.message}]`;
    default:
      return `[unparseable trace: ${error.message}]`;
  }
}
