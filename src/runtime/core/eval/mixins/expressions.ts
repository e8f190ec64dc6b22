/**
 * ExpressionsMixin: Operators
 *
 * Handles arithmetic, comparison, equality, the comma operator, unary
 * operators, short-circuit logic and the ternary conditional.
 *
 * Error Handling:
 * - Comparison and arithmetic on non-numbers: Operands must be numbers
 * - Unary minus on a non-number: Operand must be a number
 * - `+` on anything but numbers or a string with a string/number:
 *   Operands must be two numbers or two strings
 *
 * Equality never fails.
 *
 * @internal
 */

import type {
  BinaryExprNode,
  ExpressionNode,
  LogicalExprNode,
  TernaryExprNode,
  UnaryExprNode,
} from '../../../../types.js';
import { RuntimeError, TOKEN_TYPES } from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import { isEqual, isTruthy, stringifyOperand } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function isConcatOperand(value: LoxValue): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

function createExpressionsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ExpressionsEvaluator extends Base {
    override evaluateExpression(node: ExpressionNode): LoxValue {
      switch (node.type) {
        case 'BinaryExpr':
          return this.evaluateBinary(node);
        case 'UnaryExpr':
          return this.evaluateUnary(node);
        case 'LogicalExpr':
          return this.evaluateLogical(node);
        case 'TernaryExpr':
          return this.evaluateTernary(node);
        default:
          return super.evaluateExpression(node);
      }
    }

    /**
     * Both operands are evaluated left to right before the operator
     * applies. The comma operator yields the right operand.
     */
    protected evaluateBinary(node: BinaryExprNode): LoxValue {
      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);
      const operator = node.operator;

      switch (operator.type) {
        case TOKEN_TYPES.COMMA:
          return right;
        case TOKEN_TYPES.EQUAL_EQUAL:
          return isEqual(left, right);
        case TOKEN_TYPES.BANG_EQUAL:
          return !isEqual(left, right);
        case TOKEN_TYPES.PLUS:
          return this.evaluatePlus(node, left, right);
        case TOKEN_TYPES.GREATER: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a > b;
        }
        case TOKEN_TYPES.GREATER_EQUAL: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a >= b;
        }
        case TOKEN_TYPES.LESS: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a < b;
        }
        case TOKEN_TYPES.LESS_EQUAL: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a <= b;
        }
        case TOKEN_TYPES.MINUS: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a - b;
        }
        case TOKEN_TYPES.STAR: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a * b;
        }
        case TOKEN_TYPES.SLASH: {
          const [a, b] = this.checkNumberOperands(operator, left, right);
          return a / b;
        }
        default:
          throw new Error(`Unknown binary operator: ${operator.lexeme}`);
      }
    }

    /** Number addition, or concatenation when either side is a string */
    protected evaluatePlus(
      node: BinaryExprNode,
      left: LoxValue,
      right: LoxValue
    ): LoxValue {
      if (typeof left === 'number' && typeof right === 'number') {
        return left + right;
      }
      if (
        isConcatOperand(left) &&
        isConcatOperand(right) &&
        (typeof left === 'string' || typeof right === 'string')
      ) {
        return stringifyOperand(left) + stringifyOperand(right);
      }
      throw new RuntimeError('LOX-R005', node.operator);
    }

    protected evaluateUnary(node: UnaryExprNode): LoxValue {
      const operand = this.evaluateExpression(node.operand);

      if (node.operator.type === TOKEN_TYPES.BANG) {
        return !isTruthy(operand);
      }
      return -this.checkNumberOperand(node.operator, operand);
    }

    /** `or` yields the left operand when truthy, `and` when falsy */
    protected evaluateLogical(node: LogicalExprNode): LoxValue {
      const left = this.evaluateExpression(node.left);

      if (node.operator.type === TOKEN_TYPES.OR) {
        if (isTruthy(left)) return left;
      } else if (!isTruthy(left)) {
        return left;
      }

      return this.evaluateExpression(node.right);
    }

    protected evaluateTernary(node: TernaryExprNode): LoxValue {
      return isTruthy(this.evaluateExpression(node.condition))
        ? this.evaluateExpression(node.thenBranch)
        : this.evaluateExpression(node.elseBranch);
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;
