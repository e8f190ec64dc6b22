/**
 * Control Flow Signals
 *
 * Signals thrown to unwind the evaluator for `break` and `return`.
 * They are not diagnostics: loops catch BreakSignal, calls catch
 * ReturnSignal, and neither is ever reported as an error.
 */

import type { Token } from '../../types.js';
import type { LoxValue } from './values.js';

/** Signal thrown by `break` to exit the nearest loop */
export class BreakSignal extends Error {
  constructor(public readonly keyword: Token) {
    super('break');
    this.name = 'BreakSignal';
  }
}

/** Signal thrown by `return` to exit the nearest function call */
export class ReturnSignal extends Error {
  constructor(
    public readonly value: LoxValue,
    public readonly keyword: Token
  ) {
    super('return');
    this.name = 'ReturnSignal';
  }
}
