/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Shared utilities and dispatch stubs
 * 2. CoreMixin - Literals, grouping, expression and print statements
 * 3. ExpressionsMixin - Binary, unary, logical and ternary operators
 * 4. VariablesMixin - var declarations, reads and assignment
 * 5. ControlFlowMixin - Blocks, if, while, break and return
 * 6. ClosuresMixin - Function declarations, calls and invocation
 *
 * Each mixin handles the node types it owns and defers every other
 * node to the mixin below it.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { VariablesMixin } from './mixins/variables.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { ClosuresMixin } from './mixins/closures.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = ClosuresMixin(
  ControlFlowMixin(VariablesMixin(ExpressionsMixin(CoreMixin(EvaluatorBase))))
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Cache eviction happens automatically when the RuntimeContext is
 * garbage collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
