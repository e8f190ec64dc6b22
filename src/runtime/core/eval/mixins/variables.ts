/**
 * VariablesMixin: Variable Declaration, Resolution and Assignment
 *
 * Reads walk the scope chain from the active environment outward.
 * Assignment evaluates its value first, then updates the innermost
 * existing binding and yields the value.
 *
 * Error Handling:
 * - Unbound name (read or assignment): Undefined variable
 * - Declared without initializer and never assigned: Uninitialized variable
 *
 * @internal
 */

import type {
  AssignExprNode,
  ExpressionNode,
  StatementNode,
  VarStmtNode,
} from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createVariablesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class VariablesEvaluator extends Base {
    override evaluateExpression(node: ExpressionNode): LoxValue {
      switch (node.type) {
        case 'VariableExpr':
          return this.ctx.environment.get(node.name);
        case 'AssignExpr':
          return this.evaluateAssign(node);
        default:
          return super.evaluateExpression(node);
      }
    }

    override executeStatement(node: StatementNode): void {
      if (node.type === 'VarStmt') {
        this.executeVar(node);
        return;
      }
      super.executeStatement(node);
    }

    protected evaluateAssign(node: AssignExprNode): LoxValue {
      const value = this.evaluateExpression(node.value);
      this.ctx.environment.assign(node.name, value);
      return value;
    }

    /** Declare in the active scope; no initializer leaves it uninitialized */
    protected executeVar(node: VarStmtNode): void {
      const value = node.initializer
        ? this.evaluateExpression(node.initializer)
        : undefined;
      this.ctx.environment.define(node.name.lexeme, value);
    }
  };
}

export const VariablesMixin = createVariablesMixin;
