/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { CallFrame } from '../../types.js';
import type { HostFunctionDefinition } from './callable.js';
import type { Environment } from './environment.js';
import type { LoxValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with the rendered text of every `print` statement */
  onPrint: (text: string) => void;
  /**
   * Read one line of input including its trailing newline.
   * Returns null at end of input.
   */
  readLine: () => string | null;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement completes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before any callable is invoked */
  onCallStart?: (event: CallStartEvent) => void;
  /** Called after a callable returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a runtime error escapes the program */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a function call */
export interface CallStartEvent {
  /** Function name */
  name: string;
  /** Arguments passed to function */
  args: LoxValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  /** Function name */
  name: string;
  /** Return value */
  value: LoxValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/**
 * Interpreter state threaded through evaluation: the long-lived global
 * scope paired with the scope currently executing.
 */
export interface RuntimeContext {
  /** Global scope, created once per context */
  readonly globals: Environment;
  /** Active scope; swapped as blocks and calls are entered */
  environment: Environment;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Active invocations, innermost last */
  readonly callStack: CallFrame[];
  /** Invocations deeper than this raise a stack overflow error; Infinity for none */
  readonly maxCallDepth: number;
  /** Decimals used when printing numbers */
  readonly numberPrecision: number;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Host functions, installed as globals beside the built-ins */
  functions?: Record<string, HostFunctionDefinition>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Maximum call depth (default: no limit) */
  maxCallDepth?: number;
  /** Decimals used when printing numbers (default 2) */
  numberPrecision?: number;
}

/** Result of executing a statement list */
export interface ExecutionResult {
  /** False when a top-level `return` ended the program early */
  completed: boolean;
}

/** Result of a single step execution */
export interface StepResult {
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement just executed (0-based) */
  index: number;
  /** Total number of statements */
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Index of the next statement (0-based) */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** The runtime context (for inspecting globals between steps) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Get final result (only valid after done=true) */
  getResult(): ExecutionResult;
}
