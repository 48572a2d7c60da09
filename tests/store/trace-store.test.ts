/**
 * Trace Store Tests
 *
 * Discovery, ordering and per-file failure handling against real
 * run directories in a temp folder.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, symlink, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { TraceStore, loadRun } from '../../src/store/trace-store.js';
import { RunNotFoundError } from '../../src/errors/index.js';
import { createTempDir, removeDir, silentLogger, traceJson, writeRun } from '../helpers/fixtures.js';

describe('TraceStore', () => {
  let runDir: string;
  let store: TraceStore;
  let sink: ReturnType<typeof silentLogger>['sink'];

  beforeEach(async () => {
    runDir = await createTempDir('store');
    const silent = silentLogger();
    sink = silent.sink;
    store = new TraceStore({ traceDirName: 'api_trace', traceFilePrefix: 'api_trace_', logger: silent.logger });
  });

  afterEach(async () => {
    await removeDir(runDir);
  });

  it('loads every trace file of a run in sequence order', async () => {
    const traceDir = await writeRun(runDir, {
      'api_trace_1.json': traceJson('observe', 50),
      'api_trace_2.json': traceJson('plan', 20),
      'api_trace_3.json': traceJson('act', 5),
      'notes.txt': 'not a trace',
    });

    const run = await store.load(runDir);

    expect(run.runPath).toBe(runDir);
    expect(run.runName).toBe(basename(runDir));
    expect(run.traceDir).toBe(traceDir);
    expect(run.records.map((r) => [r.sequenceNumber, r.methodName, r.durationSeconds])).toEqual([
      [1, 'observe', 50],
      [2, 'plan', 20],
      [3, 'act', 5],
    ]);
    expect(run.failures).toEqual([]);
  });

  it('reads trace files placed directly in the run directory', async () => {
    await writeFile(join(runDir, 'api_trace_1.json'), traceJson('observe', 1));
    await writeFile(join(runDir, 'api_trace_2.json'), traceJson('plan', 2));

    const run = await store.load(runDir);

    expect(run.traceDir).toBe(runDir);
    expect(run.records).toHaveLength(2);
  });

  it('orders by number, not by name, and tolerates gaps', async () => {
    await writeRun(runDir, {
      'api_trace_10.json': traceJson('act', 1),
      'api_trace_5.json': traceJson('plan', 1),
      'api_trace_1.json': traceJson('observe', 1),
    });

    const run = await store.load(runDir);

    expect(run.records.map((r) => r.sequenceNumber)).toEqual([1, 5, 10]);
    expect(run.failures).toEqual([]);
  });

  it('substitutes a degraded record for invalid JSON and keeps going', async () => {
    await writeRun(runDir, {
      'api_trace_1.json': traceJson('observe', 50),
      'api_trace_2.json': '{"method_name": "plan", ',
      'api_trace_3.json': traceJson('act', 5),
    });

    const run = await store.load(runDir);

    expect(run.records).toHaveLength(3);
    expect(run.records[0].error).toBeUndefined();
    expect(run.records[1].error?.kind).toBe('parse');
    expect(run.records[1].methodName).toBe('unknown');
    expect(run.records[2].methodName).toBe('act');

    expect(run.failures).toHaveLength(1);
    expect(run.failures[0].fileName).toBe('api_trace_2.json');
    expect(run.failures[0].sequenceNumber).toBe(2);
    expect(run.failures[0].kind).toBe('parse');
    expect(run.failures[0].message).toMatch(/^Invalid JSON: /);

    expect(sink.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual(['Trace file degraded']);
  });

  it('reports content that is not valid UTF-8', async () => {
    await writeRun(runDir, {
      'api_trace_1.json': traceJson('observe', 1),
      'api_trace_2.json': new Uint8Array([0x7b, 0x22, 0xff, 0x22, 0x7d]),
    });

    const run = await store.load(runDir);

    expect(run.records[1].error).toEqual({ kind: 'encoding', message: 'content is not valid UTF-8' });
    expect(run.failures).toEqual([
      { fileName: 'api_trace_2.json', sequenceNumber: 2, kind: 'encoding', message: 'content is not valid UTF-8' },
    ]);
  });

  it('loads the first of two files with the same sequence number', async () => {
    await writeRun(runDir, {
      'api_trace_1.json': traceJson('observe', 1),
      'api_trace_2.json': traceJson('act', 2),
      'api_trace_02.json': traceJson('plan', 3),
    });

    const run = await store.load(runDir);

    expect(run.records.map((r) => r.fileName)).toEqual(['api_trace_1.json', 'api_trace_02.json']);
    expect(run.failures).toEqual([
      {
        fileName: 'api_trace_2.json',
        sequenceNumber: 2,
        kind: 'duplicate',
        message: 'sequence number 2 already loaded from api_trace_02.json',
      },
    ]);
  });

  it('ignores directories that look like trace files', async () => {
    const traceDir = await writeRun(runDir, { 'api_trace_1.json': traceJson('observe', 1) });
    await mkdir(join(traceDir, 'api_trace_2.json'));

    const run = await store.load(runDir);

    expect(run.records).toHaveLength(1);
    expect(run.failures).toEqual([]);
  });

  it('follows symlinked trace files and reports dangling links', async () => {
    const traceDir = await writeRun(runDir, { 'api_trace_1.json': traceJson('observe', 1) });
    await writeFile(join(runDir, 'plan.json'), traceJson('plan', 2));
    await symlink(join(runDir, 'plan.json'), join(traceDir, 'api_trace_2.json'));
    await symlink(join(runDir, 'gone.json'), join(traceDir, 'api_trace_3.json'));

    const run = await store.load(runDir);

    expect(run.records.map((r) => [r.sequenceNumber, r.methodName])).toEqual([
      [1, 'observe'],
      [2, 'plan'],
      [3, 'unknown'],
    ]);
    expect(run.failures.map((f) => [f.fileName, f.kind])).toEqual([['api_trace_3.json', 'read']]);
  });

  describe('missing runs', () => {
    it('rejects a path that does not exist', async () => {
      const missing = join(runDir, 'nope');
      await expect(store.load(missing)).rejects.toThrow(RunNotFoundError);
      await expect(store.load(missing)).rejects.toThrow(`Run not found: ${missing} (not an existing directory)`);
    });

    it('rejects a file path', async () => {
      const file = join(runDir, 'file.txt');
      await writeFile(file, 'x');
      await expect(store.load(file)).rejects.toThrow(RunNotFoundError);
    });

    it('rejects a run without trace files', async () => {
      const traceDir = await writeRun(runDir, { 'readme.md': '# run' });
      await expect(store.load(runDir)).rejects.toThrow(
        `Run not found: ${runDir} (no api_trace_<n>.json files in ${traceDir})`,
      );
    });
  });
});

describe('loadRun', () => {
  let runDir: string;

  beforeEach(async () => {
    runDir = await createTempDir('load-run');
  });

  afterEach(async () => {
    await removeDir(runDir);
  });

  it('honours a custom directory and prefix', async () => {
    await mkdir(join(runDir, 'calls'));
    await writeFile(join(runDir, 'calls', 'call_7.json'), traceJson('plan', 1.5));

    const run = await loadRun(runDir, {
      traceDirName: 'calls',
      traceFilePrefix: 'call_',
      logger: silentLogger().logger,
    });

    expect(run.records.map((r) => [r.sequenceNumber, r.fileName])).toEqual([[7, 'call_7.json']]);
  });
});
