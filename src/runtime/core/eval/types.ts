/**
 * Evaluator mixin plumbing
 *
 * @internal
 */

import type { EvaluatorBase } from './base.js';

/**
 * Constructor type accepted and returned by every mixin factory.
 * The `any[]` rest parameter is what TypeScript requires of a mixin
 * constructor signature.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> =
  new (...args: any[]) => TBase;
