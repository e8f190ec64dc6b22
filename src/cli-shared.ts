/**
 * CLI Shared Utilities
 * Diagnostic formatting and exit codes for the command-line tools
 */

import * as fs from 'fs/promises';
import type { RunResult } from './runtime/index.js';
import { describeToken, ParseError, RuntimeError } from './types.js';
import { LexerError } from './lexer/errors.js';

/** Process exit codes */
export const EXIT_CODES = {
  OK: 0,
  /** I/O, configuration or other host-level failure */
  HOST_ERROR: 1,
  USAGE: 64,
  /** Lexical or parse error */
  STATIC_ERROR: 65,
  RUNTIME_ERROR: 70,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Format a diagnostic as `[line N] Error<where>: <message>`.
 *
 * `<where>` is ` at end` or ` at '<lexeme>'` for parse errors and empty
 * for lexical and runtime errors.
 */
export function formatDiagnostic(
  err: LexerError | ParseError | RuntimeError
): string {
  const { message } = err.toData();

  if (err instanceof LexerError) {
    return `[line ${err.location.line}] Error: ${message}`;
  }

  if (err instanceof ParseError) {
    return `[line ${err.token.span.start.line}] Error${describeToken(err.token)}: ${message}`;
  }

  const line = err.token?.span.start.line;
  return line === undefined
    ? `Error: ${message}`
    : `[line ${line}] Error: ${message}`;
}

/**
 * Diagnostics to report for a run, in order. Lexical errors come first;
 * parse errors only appear when lexing succeeded.
 */
export function collectDiagnostics(result: RunResult): string[] {
  if (result.lexErrors.length > 0) {
    return result.lexErrors.map(formatDiagnostic);
  }
  if (result.parseErrors.length > 0) {
    return result.parseErrors.map(formatDiagnostic);
  }
  if (result.runtimeError) {
    return [formatDiagnostic(result.runtimeError)];
  }
  return [];
}

/**
 * Determine exit code from a run result
 */
export function determineExitCode(result: RunResult): ExitCode {
  switch (result.status) {
    case 'ok':
      return EXIT_CODES.OK;
    case 'lex-error':
    case 'parse-error':
      return EXIT_CODES.STATIC_ERROR;
    case 'runtime-error':
      return EXIT_CODES.RUNTIME_ERROR;
  }
}

/**
 * Format a host-level error for stderr output
 */
export function formatError(err: Error): string {
  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Read the package version from package.json beside the source tree.
 */
export async function readVersion(): Promise<string> {
  const packageJsonUrl = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    await fs.readFile(packageJsonUrl, 'utf-8')
  );

  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}
