/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities, context access and the dispatch hooks that
 * mixins override.
 *
 * Every mixin overrides evaluateExpression and/or executeStatement,
 * handles the node types it owns and defers the rest to super. A node
 * that reaches this class was not claimed by any mixin.
 *
 * @internal
 */

import type {
  ExpressionNode,
  StatementNode,
  Token,
} from '../../../types.js';
import { RuntimeError } from '../../../types.js';
import type { LoxCallable } from '../callable.js';
import type { Environment } from '../environment.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 */
export class EvaluatorBase {
  constructor(public ctx: RuntimeContext) {}

  /**
   * Require a number operand.
   * @throws RuntimeError (Operand must be a number) anchored at the operator
   */
  checkNumberOperand(operator: Token, operand: LoxValue): number {
    if (typeof operand === 'number') return operand;
    throw new RuntimeError('LOX-R004', operator);
  }

  /**
   * Require two number operands.
   * @throws RuntimeError (Operands must be numbers) anchored at the operator
   */
  checkNumberOperands(
    operator: Token,
    left: LoxValue,
    right: LoxValue
  ): [number, number] {
    if (typeof left === 'number' && typeof right === 'number') {
      return [left, right];
    }
    throw new RuntimeError('LOX-R003', operator);
  }

  /**
   * Run a callback with a different active scope, restoring the previous
   * scope on every exit path.
   */
  withEnvironment<T>(environment: Environment, fn: () => T): T {
    const saved = this.ctx.environment;
    this.ctx.environment = environment;
    try {
      return fn();
    } finally {
      this.ctx.environment = saved;
    }
  }

  /**
   * Evaluate an expression.
   *
   * NOTE: Stub implementation - the node handlers live in the mixins.
   */
  evaluateExpression(node: ExpressionNode): LoxValue {
    throw new Error(
      `evaluateExpression requires full Evaluator composition (${node.type})`
    );
  }

  /**
   * Execute a statement.
   *
   * NOTE: Stub implementation - the node handlers live in the mixins.
   */
  executeStatement(node: StatementNode): void {
    throw new Error(
      `executeStatement requires full Evaluator composition (${node.type})`
    );
  }

  /**
   * Execute statements in the given scope.
   *
   * NOTE: Stub implementation - actual implementation requires ControlFlowMixin.
   */
  executeBlock(
    _statements: readonly StatementNode[],
    _environment: Environment
  ): void {
    throw new Error(
      'executeBlock requires full Evaluator composition with ControlFlowMixin'
    );
  }

  /**
   * Invoke a callable with already-evaluated, arity-checked arguments.
   *
   * NOTE: Stub implementation - actual implementation requires ClosuresMixin.
   */
  invokeCallable(
    _callee: LoxCallable,
    _args: LoxValue[],
    _paren: Token
  ): LoxValue {
    throw new Error(
      'invokeCallable requires full Evaluator composition with ClosuresMixin'
    );
  }
}
