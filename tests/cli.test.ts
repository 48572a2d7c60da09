/**
 * CLI Tests
 *
 * Argument parsing and end-to-end runs of both commands against temp runs.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, VERSION, helpText, parseArgs, runCli } from '../src/cli.js';
import { ConfigError } from '../src/errors/index.js';
import { configureLogger } from '../src/utilities/logger.js';
import { createTempDir, removeDir, stripAnsi, traceJson, writeRun } from './helpers/fixtures.js';

describe('parseArgs', () => {
  it('parses a command and run path', () => {
    expect(parseArgs(['format', 'runs/a'])).toEqual({
      help: false,
      version: false,
      debug: false,
      json: false,
      command: 'format',
      runPath: 'runs/a',
    });
  });

  it('parses summary options in any position', () => {
    expect(parseArgs(['--debug', 'summary', '-o', 'out.md', 'runs/a', '--json'])).toEqual({
      help: false,
      version: false,
      debug: true,
      json: true,
      command: 'summary',
      runPath: 'runs/a',
      output: 'out.md',
    });
  });

  it('parses help and version flags', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--version']).version).toBe(true);
  });

  it('rejects invalid invocations', () => {
    expect(() => parseArgs(['--bogus'])).toThrow(ConfigError);
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['format', 'a', '--output'])).toThrow('--output requires a path');
    expect(() => parseArgs(['format', 'a', '-o', '--debug'])).toThrow('-o requires a path');
    expect(() => parseArgs(['build', 'a'])).toThrow('Unknown command: build');
    expect(() => parseArgs(['format', 'a', 'b'])).toThrow('Unexpected argument: b');
    expect(() => parseArgs(['format', 'a', '--json'])).toThrow('--json is only available for the summary command');
  });
});

describe('runCli', () => {
  let dir: string;
  let runDir: string;
  let output: string[];
  const print = (text: string) => {
    output.push(stripAnsi(text));
  };

  beforeEach(async () => {
    dir = await createTempDir('cli');
    runDir = join(dir, 'run-1');
    await writeRun(runDir, {
      'api_trace_1.json': traceJson('observe', 50),
      'api_trace_2.json': traceJson('plan', 20),
      'api_trace_3.json': '{ broken',
    });
    output = [];
    vi.stubEnv('XDG_CONFIG_HOME', join(dir, 'config'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    configureLogger({ level: 'info' });
    await removeDir(dir);
  });

  it('prints help', async () => {
    expect(await runCli(['--help'], { print, cwd: dir })).toBe(EXIT_OK);
    expect(output).toEqual([helpText()]);
  });

  it('prints the version', async () => {
    expect(await runCli(['-v'], { print, cwd: dir })).toBe(EXIT_OK);
    expect(output).toEqual([VERSION]);
  });

  it('exits with a usage error for bad arguments', async () => {
    expect(await runCli(['--bogus'], { print, cwd: dir })).toBe(EXIT_USAGE);
    expect(output).toEqual(['✗ ConfigError: Unknown option: --bogus', 'Run "trace-digest --help" for usage.']);
  });

  it('requires a command and a run path', async () => {
    expect(await runCli([], { print, cwd: dir })).toBe(EXIT_USAGE);
    expect(output[0]).toBe('✗ No command given');

    output = [];
    expect(await runCli(['summary'], { print, cwd: dir })).toBe(EXIT_USAGE);
    expect(output[0]).toBe('✗ summary requires a run path');
  });

  it('formats a run and reports the broken file', async () => {
    expect(await runCli(['format', runDir], { print, cwd: dir })).toBe(EXIT_OK);

    expect((await readdir(join(runDir, 'api_trace_formatted'))).sort()).toEqual([
      'api_trace_1_observe.md',
      'api_trace_2_plan.md',
    ]);
    const lines = output[0].split('\n');
    expect(lines[0]).toBe(`Found 3 API trace file(s) in ${join(runDir, 'api_trace')}`);
    expect(lines[lines.length - 1]).toBe('Formatted 2 of 3 trace file(s)');
  });

  it('writes the summary and its JSON export', async () => {
    expect(await runCli(['summary', runDir, '--json'], { print, cwd: dir })).toBe(EXIT_OK);

    const summary = await readFile(join(runDir, 'api_summary.md'), 'utf-8');
    expect(summary).toContain('- **Trace files**: 3\n- **Failed files**: 1\n');
    expect(JSON.parse(await readFile(join(runDir, 'api_summary.json'), 'utf-8'))).toMatchObject({ version: 1 });
    expect(output[0]).toContain(`✓ Summary written: ${join(runDir, 'api_summary.md')}`);
  });

  it('honours project config', async () => {
    await mkdir(join(dir, '.trace-digest'));
    await writeFile(join(dir, '.trace-digest', 'config.json'), JSON.stringify({ summaryFileName: 'digest.md' }));

    expect(await runCli(['summary', runDir], { print, cwd: dir })).toBe(EXIT_OK);
    expect(await readdir(runDir)).toContain('digest.md');
  });

  it('fails when the run does not exist', async () => {
    const missing = join(dir, 'nope');
    expect(await runCli(['summary', missing], { print, cwd: dir })).toBe(EXIT_FAILURE);
    expect(output).toEqual([`✗ RunNotFoundError: Run not found: ${missing} (not an existing directory)`]);
  });

  it('fails when the summary cannot be written', async () => {
    await mkdir(join(runDir, 'api_summary.md'));
    expect(await runCli(['summary', runDir], { print, cwd: dir })).toBe(EXIT_FAILURE);
  });
});
