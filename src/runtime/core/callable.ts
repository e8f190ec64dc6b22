/**
 * Callable Types
 *
 * Unified representation for the two kinds of callable values:
 * - LoxFunction: closures created by `fun` declarations
 * - NativeFunction: host-provided functions (clock, read_input and
 *   anything passed to createRuntimeContext)
 *
 * Both kinds share one invocation contract: a fixed arity checked by the
 * caller, then a call with exactly that many arguments.
 */

import type {
  FunctionStmtNode,
  SourceLocation,
  StatementNode,
} from '../../types.js';
import type { Environment } from './environment.js';
import type { RuntimeContext } from './types.js';
import type { LoxValue } from './values.js';

/**
 * Native function signature.
 * Receives exactly `arity` arguments; may throw RuntimeError.
 */
export type NativeFn = (
  args: LoxValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => LoxValue;

/** User-defined function closed over its declaring scope */
export interface LoxFunction {
  readonly kind: 'function';
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly StatementNode[];
  /** Scope active when the declaration executed */
  readonly closure: Environment;
}

/** Host-implemented function */
export interface NativeFunction {
  readonly kind: 'native';
  readonly name: string;
  readonly arity: number;
  readonly fn: NativeFn;
}

export type LoxCallable = LoxFunction | NativeFunction;

/**
 * Host function registration passed through RuntimeOptions.functions.
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext({
 *   functions: {
 *     double: { arity: 1, fn: ([n]) => (typeof n === 'number' ? n * 2 : null) },
 *   },
 * });
 * ```
 */
export interface HostFunctionDefinition {
  readonly arity: number;
  readonly fn: NativeFn;
  /** Human-readable description (documentation only) */
  readonly description?: string;
}

/** Type guard for callable values */
export function isCallable(value: LoxValue): value is LoxCallable {
  return typeof value === 'object' && value !== null;
}

export function isNativeFunction(value: LoxValue): value is NativeFunction {
  return isCallable(value) && value.kind === 'native';
}

/** Number of arguments a callable accepts */
export function getArity(callable: LoxCallable): number {
  return callable.kind === 'function'
    ? callable.params.length
    : callable.arity;
}

/** Capture a function declaration over the scope it is executed in */
export function createFunction(
  declaration: FunctionStmtNode,
  closure: Environment
): LoxFunction {
  return {
    kind: 'function',
    name: declaration.name.lexeme,
    params: declaration.params.map((param) => param.lexeme),
    body: declaration.body,
    closure,
  };
}

/**
 * Wrap a host implementation as a callable value.
 * @throws TypeError when arity is not a non-negative integer
 */
export function nativeFunction(
  name: string,
  arity: number,
  fn: NativeFn
): NativeFunction {
  if (!Number.isInteger(arity) || arity < 0) {
    throw new TypeError(
      `Function '${name}' must declare a non-negative integer arity`
    );
  }
  return { kind: 'native', name, arity, fn };
}
