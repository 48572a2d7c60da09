/**
 * Format Command Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { formatRun } from '../../src/commands/format.js';
import { RenderError, RunNotFoundError } from '../../src/errors/index.js';
import { RecordFormatter } from '../../src/output/record-formatter.js';
import { createTempDir, removeDir, silentLogger, testConfig, traceJson, writeRun } from '../helpers/fixtures.js';

describe('formatRun', () => {
  let runDir: string;
  const options = () => ({ config: testConfig(), logger: silentLogger().logger });

  beforeEach(async () => {
    runDir = await createTempDir('format');
    await writeRun(runDir, {
      'api_trace_1.json': traceJson('observe', 50, ['{"observations": ["Search box visible"]}']),
      'api_trace_2.json': '{"method_name": "plan", ',
      'api_trace_3.json': traceJson('act', 5, ['click(12)']),
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(runDir);
  });

  it('writes one document per parsed trace file', async () => {
    const result = await formatRun(runDir, options());
    const outputDir = join(runDir, 'api_trace_formatted');

    expect(result.outputDir).toBe(outputDir);
    expect(result.documents.map((d) => d.sequenceNumber)).toEqual([1, 3]);
    expect(result.writeFailures).toEqual([]);
    expect(result.run.failures.map((f) => f.fileName)).toEqual(['api_trace_2.json']);
    expect((await readdir(outputDir)).sort()).toEqual(['api_trace_1_observe.md', 'api_trace_3_act.md']);

    const act = await readFile(join(outputDir, 'api_trace_3_act.md'), 'utf-8');
    expect(act.startsWith('# Trace 3: act\n\n- **Method**: act\n- **Sequence**: 3\n')).toBe(true);
    expect(act).toContain('## Response\n\n```text\nclick(12)\n```\n');
  });

  it('writes to a custom output directory', async () => {
    const outputDir = join(runDir, 'out', 'docs');
    const result = await formatRun(runDir, { ...options(), outputDir });

    expect(result.documents.map((d) => d.path)).toEqual([
      join(outputDir, 'api_trace_1_observe.md'),
      join(outputDir, 'api_trace_3_act.md'),
    ]);
  });

  it('produces identical documents when run again', async () => {
    await formatRun(runDir, options());
    const path = join(runDir, 'api_trace_formatted', 'api_trace_1_observe.md');
    const first = await readFile(path, 'utf-8');

    await formatRun(runDir, options());

    expect(await readFile(path, 'utf-8')).toBe(first);
  });

  it('continues past a document that cannot be written', async () => {
    await mkdir(join(runDir, 'api_trace_formatted', 'api_trace_1_observe.md'), { recursive: true });

    const result = await formatRun(runDir, options());

    expect(result.documents.map((d) => d.sequenceNumber)).toEqual([3]);
    expect(result.writeFailures.map((f) => f.filePath)).toEqual([
      join(runDir, 'api_trace_formatted', 'api_trace_1_observe.md'),
    ]);
  });

  it('formats a message whose JSON follows a byte order mark', async () => {
    await writeRun(runDir, {
      'api_trace_4.json': JSON.stringify({
        request: [[{ role: 'user', content: '\uFEFF{"goal":"buy"}' }]],
        response: ['ok'],
        method_name: 'plan',
        time: 1,
      }),
    });

    const result = await formatRun(runDir, options());

    expect(result.documents.map((d) => d.sequenceNumber)).toEqual([1, 3, 4]);
    const plan = await readFile(join(runDir, 'api_trace_formatted', 'api_trace_4_plan.md'), 'utf-8');
    expect(plan).toContain('```json\n{\n  "goal": "buy"\n}\n```');
  });

  it('continues past a record that cannot be rendered', async () => {
    const original = RecordFormatter.prototype.format;
    const formatter = new RecordFormatter({ prettyPrintJson: true });
    vi.spyOn(RecordFormatter.prototype, 'format').mockImplementation((record) => {
      if (record.sequenceNumber === 1) throw new Error('bad content');
      return original.call(formatter, record);
    });

    const result = await formatRun(runDir, options());

    expect(result.documents.map((d) => d.sequenceNumber)).toEqual([3]);
    expect(result.renderFailures).toHaveLength(1);
    expect(result.renderFailures[0]).toBeInstanceOf(RenderError);
    expect(result.renderFailures[0].message).toBe('Failed to render api_trace_1.json: bad content');
  });

  it('rejects a run without trace files', async () => {
    await expect(formatRun(join(runDir, 'missing'), options())).rejects.toThrow(RunNotFoundError);
  });
});
