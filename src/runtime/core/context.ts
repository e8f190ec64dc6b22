/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import type { CallFrame, RuntimeError } from '../../types.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import { readStdinLine } from '../ext/stdin.js';
import { nativeFunction } from './callable.js';
import { Environment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import { DEFAULT_NUMBER_PRECISION } from './values.js';

/** No limit: recursion depth is bounded by the host stack */
export const DEFAULT_MAX_CALL_DEPTH = Number.POSITIVE_INFINITY;

/** A positive integer, or Infinity for no limit */
export function isValidCallDepth(value: number): boolean {
  return (
    value === Number.POSITIVE_INFINITY ||
    (Number.isInteger(value) && value >= 1)
  );
}

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (text) => {
    console.log(text);
  },
  readLine: readStdinLine,
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the runtime.
 *
 * @throws TypeError for an invalid maxCallDepth, numberPrecision or host
 * function arity
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!isValidCallDepth(maxCallDepth)) {
    throw new TypeError('maxCallDepth must be a positive integer');
  }

  const numberPrecision = options.numberPrecision ?? DEFAULT_NUMBER_PRECISION;
  if (
    !Number.isInteger(numberPrecision) ||
    numberPrecision < 0 ||
    numberPrecision > 20
  ) {
    throw new TypeError('numberPrecision must be an integer from 0 to 20');
  }

  const globals = new Environment();

  // Set built-in functions
  for (const callable of BUILTIN_FUNCTIONS) {
    globals.define(callable.name, callable);
  }

  // Set custom functions (can override built-ins)
  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      globals.define(name, nativeFunction(name, definition.arity, definition.fn));
    }
  }

  return {
    globals,
    environment: globals,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    callStack: [],
    maxCallDepth,
    numberPrecision,
  };
}

/**
 * Extract the call stack recorded on a runtime error.
 * Returns an empty array for errors raised outside any function.
 */
export function getCallStack(error: RuntimeError): readonly CallFrame[] {
  return error.callStack ? [...error.callStack] : [];
}

/**
 * Push frame onto call stack before function execution.
 * @returns false when the frame would exceed maxCallDepth (not pushed)
 */
export function pushCallFrame(ctx: RuntimeContext, frame: CallFrame): boolean {
  if (ctx.callStack.length >= ctx.maxCallDepth) {
    return false;
  }
  ctx.callStack.push(frame);
  return true;
}

/**
 * Pop frame from call stack after function returns.
 */
export function popCallFrame(ctx: RuntimeContext): void {
  if (ctx.callStack.length > 0) {
    ctx.callStack.pop();
  }
}
