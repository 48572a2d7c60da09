/**
 * Shared test fixtures: in-memory records and on-disk runs.
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEFAULT_CONFIG } from '../../src/defaults.js';
import type { ResolvedConfig } from '../../src/config/schema.js';
import type { MethodName, TraceRecord } from '../../src/types.js';
import { MemorySink, StructuredLogger } from '../../src/utilities/logger.js';

export function makeRecord(
  sequenceNumber: number,
  methodName: MethodName,
  durationSeconds: number | null,
  overrides: Partial<TraceRecord> = {},
): TraceRecord {
  return {
    sequenceNumber,
    fileName: `api_trace_${sequenceNumber}.json`,
    methodName,
    rawMethodName: methodName,
    messages: [],
    response: [`${methodName} output ${sequenceNumber}`],
    durationSeconds: durationSeconds ?? 0,
    durationMissing: durationSeconds === null,
    issues: [],
    ...overrides,
  };
}

/**
 * Trace file content as the agent writes it.
 */
export function traceJson(
  methodName: string,
  time: number,
  response: string[] = [`${methodName} result`],
  extra: Record<string, unknown> = {},
): string {
  return JSON.stringify({
    request: [
      [
        { role: 'system', content: `You are the ${methodName} module.` },
        { role: 'user', content: `<html><body>${methodName} page</body></html>` },
      ],
    ],
    response,
    method_name: methodName,
    retrieve_result: null,
    time,
    ...extra,
  });
}

export async function createTempDir(label: string): Promise<string> {
  const dir = join(tmpdir(), `trace-digest-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a run directory with an `api_trace/` folder holding the given files.
 */
export async function writeRun(
  runDir: string,
  files: Record<string, string | Uint8Array>,
): Promise<string> {
  const traceDir = join(runDir, 'api_trace');
  await mkdir(traceDir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(traceDir, name), content);
  }
  return traceDir;
}

export function testConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

export function silentLogger(): { logger: StructuredLogger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: new StructuredLogger({ level: 'debug', sinks: [sink] }), sink };
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*[mK]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
