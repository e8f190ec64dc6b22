/**
 * CoreMixin: Literals, Grouping, Expression and Print Statements
 *
 * Innermost mixin. Handles the leaf expression forms and the two
 * statements that only evaluate an expression.
 *
 * Methods added:
 * - evaluateExpression: LiteralExpr, GroupingExpr
 * - executeStatement: ExpressionStmt, PrintStmt
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import { formatValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createCoreMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class CoreEvaluator extends Base {
    override evaluateExpression(node: ExpressionNode): LoxValue {
      switch (node.type) {
        case 'LiteralExpr':
          return node.value;
        case 'GroupingExpr':
          return this.evaluateExpression(node.expression);
        default:
          return super.evaluateExpression(node);
      }
    }

    override executeStatement(node: StatementNode): void {
      switch (node.type) {
        case 'ExpressionStmt':
          this.evaluateExpression(node.expression);
          return;
        case 'PrintStmt': {
          const value = this.evaluateExpression(node.expression);
          this.ctx.callbacks.onPrint(
            formatValue(value, this.ctx.numberPrecision)
          );
          return;
        }
        default:
          super.executeStatement(node);
      }
    }
  };
}

export const CoreMixin = createCoreMixin;
