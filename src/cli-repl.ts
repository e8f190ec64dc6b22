/**
 * Interactive read-eval-print loop.
 * Each line runs against one persistent runtime context, so definitions
 * survive between lines. Diagnostics never end the session.
 */

import * as readline from 'node:readline';
import { createRuntimeContext, run } from './runtime/index.js';
import { collectDiagnostics } from './cli-shared.js';
import type { CliConfig } from './cli-config.js';

export interface ReplOptions {
  readonly input: NodeJS.ReadableStream;
  /** Receives prompts and printed values */
  readonly output: NodeJS.WritableStream;
  /** Receives diagnostics */
  readonly error: NodeJS.WritableStream;
  readonly config: CliConfig;
}

/**
 * Run the REPL until the input ends.
 * Resolves once the input stream closes.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { input, output, error, config } = options;

  const ctx = createRuntimeContext({
    maxCallDepth: config.maxCallDepth,
    numberPrecision: config.numberPrecision,
    callbacks: {
      onPrint: (text) => {
        output.write(`${text}\n`);
      },
    },
  });

  const rl = readline.createInterface({
    input,
    output,
    prompt: config.prompt,
    terminal: false,
  });

  rl.prompt();

  for await (const line of rl) {
    const result = run(line, ctx);
    for (const diagnostic of collectDiagnostics(result)) {
      error.write(`${diagnostic}\n`);
    }
    rl.prompt();
  }
}
