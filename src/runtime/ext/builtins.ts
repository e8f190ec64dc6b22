/**
 * Built-in Functions
 *
 * Native functions installed in every global scope. Host applications
 * add their own through RuntimeOptions.functions.
 *
 * @internal - Not part of public API
 */

import { nativeFunction, type NativeFunction } from '../core/callable.js';
import { RuntimeError } from '../../types.js';

/** Seconds since the Unix epoch, with millisecond resolution */
const clock = nativeFunction('clock', 0, () => Date.now() / 1000);

/**
 * One line from standard input including its newline; "" at end of input.
 */
const readInput = nativeFunction('read_input', 0, (_args, ctx) => {
  let line: string | null;
  try {
    line = ctx.callbacks.readLine();
  } catch (err) {
    throw new RuntimeError('LOX-R008', undefined, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return line ?? '';
});

export const BUILTIN_FUNCTIONS: readonly NativeFunction[] = [clock, readInput];
