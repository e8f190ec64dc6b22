/**
 * Test utilities for interpreter tests
 */

import {
  createRuntimeContext,
  createStepper,
  parseSource,
  run,
  type RunResult,
  type RuntimeContext,
  type RuntimeOptions,
  type StatementNode,
  type StepResult,
} from '../../src/index.js';

/** Options for test execution */
export interface TestOptions extends Omit<RuntimeOptions, 'callbacks'> {
  /** Lines handed to read_input(), in order; null once exhausted */
  input?: string[];
}

export interface CapturedRun {
  readonly output: string[];
  readonly result: RunResult;
}

/** Build runtime options that record printed text into `output` */
function captureOptions(
  output: string[],
  options: TestOptions
): RuntimeOptions {
  const { input = [], ...rest } = options;
  const pending = [...input];
  return {
    ...rest,
    callbacks: {
      onPrint: (text) => {
        output.push(text);
      },
      readLine: () => pending.shift() ?? null,
    },
  };
}

/** Run source and return printed lines alongside the run result */
export function runCapture(
  source: string,
  options: TestOptions = {}
): CapturedRun {
  const output: string[] = [];
  const result = run(source, captureOptions(output, options));
  return { output, result };
}

/**
 * Run source that must succeed and return its printed lines.
 * @throws the first diagnostic when the run fails
 */
export function runOutput(source: string, options: TestOptions = {}): string[] {
  const { output, result } = runCapture(source, options);
  const failure =
    result.lexErrors[0] ?? result.parseErrors[0] ?? result.runtimeError;
  if (failure) throw failure;
  return output;
}

/** Create a context that records printed text, for multi-run tests */
export function captureContext(options: TestOptions = {}): {
  ctx: RuntimeContext;
  output: string[];
} {
  const output: string[] = [];
  return {
    ctx: createRuntimeContext(captureOptions(output, options)),
    output,
  };
}

/**
 * Parse source that must be free of lexical and syntax errors.
 * @throws the first diagnostic otherwise
 */
export function parseStatements(source: string): StatementNode[] {
  const result = parseSource(source);
  const failure = result.lexErrors[0] ?? result.errors[0];
  if (failure) throw failure;

  const statements: StatementNode[] = [];
  for (const entry of result.statements) {
    if (entry.ok) statements.push(entry.statement);
  }
  return statements;
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: TestOptions = {}
): { steps: StepResult[]; output: string[] } {
  const { ctx, output } = captureContext(options);
  const stepper = createStepper(parseStatements(source), ctx);
  const steps: StepResult[] = [];

  while (!stepper.done) {
    steps.push(stepper.step());
  }

  return { steps, output };
}
