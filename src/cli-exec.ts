#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main() and parseArgs() for the treelox binary.
 * With a script path, runs the file once; without one, starts the REPL.
 */

import * as fs from 'fs/promises';
import { run } from './runtime/index.js';
import {
  collectDiagnostics,
  determineExitCode,
  EXIT_CODES,
  formatError,
  readVersion,
} from './cli-shared.js';
import { loadConfig, type CliConfig } from './cli-config.js';
import { runRepl } from './cli-repl.js';

export const USAGE = 'Usage: treelox [script]';

const HELP_TEXT = `${USAGE}

  treelox                 Start an interactive session
  treelox <script>        Run a script file
  treelox --help          Show this help message
  treelox --version       Show version information

Configuration is read from treelox.yaml in the current directory,
or from the file named by TREELOX_CONFIG.`;

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'run'; file: string }
  | { mode: 'repl' }
  | { mode: 'help' | 'version' };

/** Bad command line; reported with exit code 64 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Streams and process state the CLI runs against */
export interface CliIO {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
  readonly error: NodeJS.WritableStream;
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws UsageError for unknown options or more than one script
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  for (const arg of argv) {
    if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (argv.length > 1) {
    throw new UsageError(USAGE);
  }

  const file = argv[0];
  return file === undefined ? { mode: 'repl' } : { mode: 'run', file };
}

/**
 * Run a script file once.
 * @returns exit code for the run
 * @throws Error when the file cannot be read
 */
export async function runFile(
  file: string,
  config: CliConfig,
  io: CliIO
): Promise<number> {
  const source = await fs.readFile(file, 'utf-8');

  const result = run(source, {
    maxCallDepth: config.maxCallDepth,
    numberPrecision: config.numberPrecision,
    callbacks: {
      onPrint: (text) => {
        io.output.write(`${text}\n`);
      },
    },
  });

  for (const diagnostic of collectDiagnostics(result)) {
    io.error.write(`${diagnostic}\n`);
  }

  return determineExitCode(result);
}

const processIO: CliIO = {
  input: process.stdin,
  output: process.stdout,
  error: process.stderr,
  cwd: process.cwd(),
  env: process.env,
};

/**
 * Entry point for the treelox binary.
 *
 * Writes printed values to io.output and diagnostics to io.error.
 * @returns process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  io: CliIO = processIO
): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        io.output.write(`${HELP_TEXT}\n`);
        return EXIT_CODES.OK;

      case 'version':
        io.output.write(`${await readVersion()}\n`);
        return EXIT_CODES.OK;

      case 'run':
        return await runFile(parsed.file, loadConfig(io.cwd, io.env), io);

      case 'repl':
        await runRepl({
          input: io.input,
          output: io.output,
          error: io.error,
          config: loadConfig(io.cwd, io.env),
        });
        return EXIT_CODES.OK;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.error.write(`${err.message}\n`);
      return EXIT_CODES.USAGE;
    }
    const error = err instanceof Error ? err : new Error(String(err));
    io.error.write(`${formatError(error)}\n`);
    return EXIT_CODES.HOST_ERROR;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_CODES.HOST_ERROR;
    }
  );
}
