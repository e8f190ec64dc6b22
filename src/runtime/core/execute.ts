/**
 * Script Execution
 *
 * Public API for executing parsed programs.
 * Provides full execution, step-by-step execution and the one-call
 * source runner used by the CLI.
 */

import type { LexerError } from '../../lexer/index.js';
import { parse } from '../../parser/index.js';
import { tokenize } from '../../lexer/index.js';
import type { ParseError, StatementNode } from '../../types.js';
import { RuntimeError } from '../../types.js';
import { createRuntimeContext } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import { ReturnSignal } from './signals.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  RuntimeOptions,
  StepResult,
} from './types.js';

/**
 * Execute a parsed program against a context.
 * Runtime errors propagate to the caller; a top-level `return` ends the
 * program early and is reported as `completed: false`.
 *
 * @param statements Successfully parsed statements (from parse())
 * @param context The runtime context (from createRuntimeContext())
 */
export function execute(
  statements: readonly StatementNode[],
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(statements, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between steps.
 */
export function createStepper(
  statements: readonly StatementNode[],
  context: RuntimeContext
): ExecutionStepper {
  const evaluator = getEvaluator(context);
  const total = statements.length;
  let index = 0;
  let isDone = total === 0;
  let completed = true;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { done: true, index, total };
      }

      const startTime = Date.now();
      const environment = context.environment;
      const depth = context.callStack.length;
      context.observability.onStepStart?.({ index, total });

      try {
        evaluator.executeStatement(stmt);
      } catch (error) {
        // Unwinding from host stack exhaustion can skip cleanup
        context.environment = environment;
        context.callStack.length = depth;

        // Top-level return ends the program quietly
        if (error instanceof ReturnSignal) {
          completed = false;
          isDone = true;
          return { done: true, index, total };
        }

        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }

      context.observability.onStepEnd?.({
        index,
        total,
        durationMs: Date.now() - startTime,
      });

      index++;
      isDone = index >= total;

      return { done: isDone, index: index - 1, total };
    },

    getResult(): ExecutionResult {
      return { completed };
    },
  };
}

// ============================================================
// SOURCE RUNNER
// ============================================================

export type RunStatus = 'ok' | 'lex-error' | 'parse-error' | 'runtime-error';

export interface RunResult {
  readonly status: RunStatus;
  readonly lexErrors: LexerError[];
  readonly parseErrors: ParseError[];
  readonly runtimeError: RuntimeError | null;
}

/**
 * Lex, parse and execute source text.
 *
 * Lexical errors stop before parsing. Any parse error stops before
 * execution, so no statement of a failed unit runs. A runtime error
 * halts the program and is returned, not thrown.
 *
 * @param source Program text
 * @param target Options for a fresh context, or an existing context to
 *   keep definitions across runs (REPL)
 */
export function run(
  source: string,
  target: RuntimeOptions | RuntimeContext = {}
): RunResult {
  const { tokens, errors: lexErrors } = tokenize(source);
  if (lexErrors.length > 0) {
    return { status: 'lex-error', lexErrors, parseErrors: [], runtimeError: null };
  }

  const parsed = parse(tokens);
  if (!parsed.success) {
    return {
      status: 'parse-error',
      lexErrors,
      parseErrors: parsed.errors,
      runtimeError: null,
    };
  }

  const statements: StatementNode[] = [];
  for (const result of parsed.statements) {
    if (result.ok) statements.push(result.statement);
  }

  const context = isRuntimeContext(target)
    ? target
    : createRuntimeContext(target);

  try {
    execute(statements, context);
  } catch (error) {
    if (error instanceof RuntimeError) {
      return {
        status: 'runtime-error',
        lexErrors,
        parseErrors: [],
        runtimeError: error,
      };
    }
    throw error;
  }

  return { status: 'ok', lexErrors, parseErrors: [], runtimeError: null };
}

function isRuntimeContext(
  value: RuntimeOptions | RuntimeContext
): value is RuntimeContext {
  return 'globals' in value && 'environment' in value;
}
