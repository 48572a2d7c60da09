/**
 * Trace Store Loader
 *
 * Discovers the `api_trace_<n>.json` files of one run and parses them into
 * an ordered record sequence. Individual bad files become degraded records
 * and are listed in `failures`; only a run without any trace file is fatal.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { EncodingError, RecordParseError, RunNotFoundError, errorCode } from '../errors/index.js';
import {
  createDegradedRecord,
  decodeTraceBytes,
  parseSequenceNumber,
  parseTraceDocument,
  type RecordSource,
} from '../parser/trace-parser.js';
import type { LoadFailure, LoadedRun, RecordError, TraceRecord } from '../types.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';

export interface TraceStoreOptions {
  /** Sub-directory of the run holding the trace files */
  traceDirName: string;
  /** File name prefix before the sequence number */
  traceFilePrefix: string;
  logger?: StructuredLogger;
}

interface TraceFile extends RecordSource {
  path: string;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') return false;
    throw err;
  }
}

/**
 * Loads all trace records of one run.
 */
export class TraceStore {
  private readonly options: TraceStoreOptions;
  private readonly log: StructuredLogger;

  constructor(options: TraceStoreOptions) {
    this.options = options;
    this.log = options.logger ?? createComponentLogger('TraceStore');
  }

  /**
   * Load and parse every trace file of the run, ordered by sequence number.
   *
   * @throws RunNotFoundError when the run has no discoverable trace files
   */
  async load(runPath: string): Promise<LoadedRun> {
    const absoluteRunPath = resolve(runPath);
    const traceDir = await this.resolveTraceDir(absoluteRunPath);
    const files = await this.discover(absoluteRunPath, traceDir);

    const records: TraceRecord[] = [];
    const failures: LoadFailure[] = [];
    let previous: TraceFile | undefined;

    for (const file of files) {
      if (previous && previous.sequenceNumber === file.sequenceNumber) {
        failures.push({
          fileName: file.fileName,
          sequenceNumber: file.sequenceNumber,
          kind: 'duplicate',
          message: `sequence number ${file.sequenceNumber} already loaded from ${previous.fileName}`,
        });
        this.log.warn('Duplicate trace sequence number', { fileName: file.fileName });
        continue;
      }
      previous = file;

      const record = await this.loadFile(file);
      if (record.error) {
        failures.push({
          fileName: file.fileName,
          sequenceNumber: file.sequenceNumber,
          kind: record.error.kind,
          message: record.error.message,
        });
        this.log.warn('Trace file degraded', { fileName: file.fileName, reason: record.error.message });
      }
      records.push(record);
    }

    this.log.debug('Run loaded', { traceDir, records: records.length, failures: failures.length });

    return {
      runPath: absoluteRunPath,
      runName: basename(absoluteRunPath),
      traceDir,
      records,
      failures,
    };
  }

  /**
   * Use `<run>/<traceDirName>` when present, otherwise the run directory.
   */
  private async resolveTraceDir(runPath: string): Promise<string> {
    let runIsDirectory: boolean;
    try {
      runIsDirectory = await isDirectory(runPath);
    } catch (err) {
      throw new RunNotFoundError(runPath, 'run directory is unreadable', err);
    }
    if (!runIsDirectory) {
      throw new RunNotFoundError(runPath, 'not an existing directory');
    }

    const nested = join(runPath, this.options.traceDirName);
    try {
      return (await isDirectory(nested)) ? nested : runPath;
    } catch (err) {
      throw new RunNotFoundError(runPath, `${nested} is unreadable`, err);
    }
  }

  /**
   * List trace files sorted by sequence number, then by name so that
   * duplicates resolve the same way on every platform.
   */
  private async discover(runPath: string, traceDir: string): Promise<TraceFile[]> {
    const entries = await readdir(traceDir, { withFileTypes: true }).catch((err: unknown) => {
      throw new RunNotFoundError(runPath, `cannot list ${traceDir}`, err);
    });

    const files: TraceFile[] = [];
    for (const entry of entries) {
      // A dangling or non-file link fails in loadFile and is reported there
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      const sequenceNumber = parseSequenceNumber(entry.name, this.options.traceFilePrefix);
      if (sequenceNumber === null) {
        this.log.trace('Ignoring non-trace file', { fileName: entry.name });
        continue;
      }
      files.push({ sequenceNumber, fileName: entry.name, path: join(traceDir, entry.name) });
    }

    if (files.length === 0) {
      throw new RunNotFoundError(
        runPath,
        `no ${this.options.traceFilePrefix}<n>.json files in ${traceDir}`,
      );
    }

    return files.sort(
      (a, b) =>
        a.sequenceNumber - b.sequenceNumber ||
        (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0),
    );
  }

  private async loadFile(file: TraceFile): Promise<TraceRecord> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(file.path);
    } catch (err) {
      return this.degrade(file, 'read', err instanceof Error ? err.message : String(err));
    }

    try {
      return parseTraceDocument(decodeTraceBytes(file.fileName, bytes), file);
    } catch (err) {
      if (err instanceof EncodingError) {
        return this.degrade(file, 'encoding', 'content is not valid UTF-8');
      }
      if (err instanceof RecordParseError) {
        return this.degrade(file, 'parse', err.message);
      }
      throw err;
    }
  }

  private degrade(file: TraceFile, kind: RecordError['kind'], message: string): TraceRecord {
    return createDegradedRecord(
      { sequenceNumber: file.sequenceNumber, fileName: file.fileName },
      { kind, message },
    );
  }
}

/**
 * Trace files discovered for a run. Duplicates produced no record but were
 * found on disk.
 */
export function countTraceFiles(run: LoadedRun): number {
  return run.records.length + run.failures.filter((f) => f.kind === 'duplicate').length;
}

/**
 * Load one run.
 */
export function loadRun(runPath: string, options: TraceStoreOptions): Promise<LoadedRun> {
  return new TraceStore(options).load(runPath);
}
