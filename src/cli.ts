/**
 * CLI Argument Parsing, Help and Dispatch
 *
 * Two commands, each taking one run directory:
 *   trace-digest format  <run-path> [--output <dir>]
 *   trace-digest summary <run-path> [--output <file>] [--json]
 */

import { formatRun } from './commands/format.js';
import { summarizeRun } from './commands/summary.js';
import { loadConfig } from './config/config-manager.js';
import { ConfigError, RunNotFoundError, formatError, formatErrorForLog } from './errors/index.js';
import { createTerminalRenderer } from './output/terminal-renderer.js';
import {
  ConsoleSink,
  FileSink,
  configureLogger,
  createComponentLogger,
  type LogSink,
} from './utilities/logger.js';

export const VERSION = '1.0.0';

export type CommandName = 'format' | 'summary';

const COMMANDS: readonly CommandName[] = ['format', 'summary'];

/** Process exit codes */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  command?: CommandName;
  runPath?: string;
  /** Output directory (format) or file (summary) */
  output?: string;
  /** summary only: also write a JSON export */
  json: boolean;
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws ConfigError on unknown options, commands or stray arguments
 */
export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    json: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--json') {
      result.json = true;
    } else if (arg === '--output' || arg === '-o') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new ConfigError(`${arg} requires a path`);
      }
      result.output = value;
      i++;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else if (result.command === undefined) {
      if (!isCommandName(arg)) {
        throw new ConfigError(`Unknown command: ${arg}`, { command: arg });
      }
      result.command = arg;
    } else if (result.runPath === undefined) {
      result.runPath = arg;
    } else {
      throw new ConfigError(`Unexpected argument: ${arg}`);
    }
  }

  if (result.json && result.command === 'format') {
    throw new ConfigError('--json is only available for the summary command');
  }

  return result;
}

/**
 * Help text.
 */
export function helpText(): string {
  return `trace-digest ${VERSION}

Render and summarize API traces recorded by the web agent.

USAGE
  trace-digest format  <run-path> [--output <dir>]
  trace-digest summary <run-path> [--output <file>] [--json]

COMMANDS
  format    Write one Markdown document per trace file
            (default: <run-path>/api_trace_formatted/)
  summary   Write the run summary: timeline, method statistics, cycles
            (default: <run-path>/api_summary.md)

OPTIONS
  -o, --output <path>   Output directory (format) or file (summary)
  --json                summary: also write the summary as JSON
  --debug               Verbose logging
  -h, --help            Show this help
  -v, --version         Show version

CONFIG
  ~/.config/trace-digest/config.json, .trace-digest/config.json

EXIT STATUS
  0 success (failed trace files are reported as warnings)
  1 run not found or unreadable, or the summary could not be written
  2 invalid arguments`;
}

export interface CliIO {
  /** Receives command output; defaults to stdout */
  print?: (text: string) => void;
  /** Directory used to find project config; defaults to process.cwd() */
  cwd?: string;
}

function defaultPrint(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = {}): Promise<number> {
  const print = io.print ?? defaultPrint;
  const renderer = createTerminalRenderer();

  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    print(renderer.renderError(formatError(err)));
    print('Run "trace-digest --help" for usage.');
    return EXIT_USAGE;
  }

  if (args.help) {
    print(helpText());
    return EXIT_OK;
  }
  if (args.version) {
    print(VERSION);
    return EXIT_OK;
  }
  if (args.command === undefined || args.runPath === undefined) {
    print(renderer.renderError(args.command ? `${args.command} requires a run path` : 'No command given'));
    print('Run "trace-digest --help" for usage.');
    return EXIT_USAGE;
  }

  const { config, warnings } = loadConfig({
    cwd: io.cwd,
    overrides: args.debug ? { logLevel: 'debug' } : {},
  });
  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logFile) sinks.push(new FileSink(config.logFile));
  configureLogger({ level: config.logLevel, sinks });

  const log = createComponentLogger('cli');
  for (const warning of warnings) {
    log.warn(warning);
  }

  try {
    if (args.command === 'format') {
      const result = await formatRun(args.runPath, { config, outputDir: args.output, logger: log });
      print(renderer.renderFormatResult(result));
      return EXIT_OK;
    }

    const result = await summarizeRun(args.runPath, {
      config,
      outputFile: args.output,
      json: args.json,
      logger: log,
    });
    print(renderer.renderSummaryResult(result));
    return result.writeFailures.some((f) => f.filePath === result.summaryPath) ? EXIT_FAILURE : EXIT_OK;
  } catch (err) {
    if (!(err instanceof RunNotFoundError)) {
      log.error(formatErrorForLog(err));
    }
    print(renderer.renderError(formatError(err)));
    return EXIT_FAILURE;
  }
}
