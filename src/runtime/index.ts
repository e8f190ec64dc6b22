/**
 * Runtime
 *
 * Public API for executing programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: LoxValue, truthiness, equality, formatting
 *   - environment.ts: Chained variable scopes
 *   - callable.ts: Callable types and type guards
 *   - signals.ts: Control flow signals (BreakSignal, ReturnSignal)
 *   - context.ts: Runtime context factory and call stack
 *   - execute.ts: Program execution (execute, createStepper, run)
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Native functions (clock, read_input)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CallStartEvent,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES AND SCOPES
// ============================================================

export {
  DEFAULT_NUMBER_PRECISION,
  formatValue,
  inferType,
  isEqual,
  isTruthy,
  type LoxTypeName,
  type LoxValue,
} from './core/values.js';

export { Environment, type Lookup } from './core/environment.js';

// ============================================================
// CALLABLE TYPES AND GUARDS
// ============================================================

export {
  createFunction,
  getArity,
  isCallable,
  isNativeFunction,
  nativeFunction,
  type HostFunctionDefinition,
  type LoxCallable,
  type LoxFunction,
  type NativeFn,
  type NativeFunction,
} from './core/callable.js';

// ============================================================
// CONTROL FLOW
// ============================================================

export { BreakSignal, ReturnSignal } from './core/signals.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export {
  createRuntimeContext,
  DEFAULT_MAX_CALL_DEPTH,
  getCallStack,
  isValidCallDepth,
  popCallFrame,
  pushCallFrame,
} from './core/context.js';

export {
  createStepper,
  execute,
  run,
  type RunResult,
  type RunStatus,
} from './core/execute.js';
