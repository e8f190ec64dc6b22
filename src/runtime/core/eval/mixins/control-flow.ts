/**
 * ControlFlowMixin: Blocks, Conditionals, Loops and Jumps
 *
 * Signal discipline:
 * - Blocks and `if` intercept nothing.
 * - `while` intercepts BreakSignal from its body and stops looping.
 *   ReturnSignal and RuntimeError pass through.
 * - `break` and `return` throw their signals; ReturnSignal is caught by
 *   the nearest function invocation (ClosuresMixin).
 *
 * @internal
 */

import type {
  BlockStmtNode,
  IfStmtNode,
  ReturnStmtNode,
  StatementNode,
  WhileStmtNode,
} from '../../../../types.js';
import { Environment } from '../../environment.js';
import { BreakSignal, ReturnSignal } from '../../signals.js';
import { isTruthy } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createControlFlowMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ControlFlowEvaluator extends Base {
    override executeStatement(node: StatementNode): void {
      switch (node.type) {
        case 'BlockStmt':
          this.executeBlockStatement(node);
          return;
        case 'IfStmt':
          this.executeIf(node);
          return;
        case 'WhileStmt':
          this.executeWhile(node);
          return;
        case 'BreakStmt':
          throw new BreakSignal(node.keyword);
        case 'ReturnStmt':
          this.executeReturn(node);
          return;
        default:
          super.executeStatement(node);
      }
    }

    /**
     * Execute statements with the given scope active. The previous scope
     * is restored however the statements exit.
     */
    override executeBlock(
      statements: readonly StatementNode[],
      environment: Environment
    ): void {
      this.withEnvironment(environment, () => {
        for (const statement of statements) {
          this.executeStatement(statement);
        }
      });
    }

    /** Every block opens a child of the active scope */
    protected executeBlockStatement(node: BlockStmtNode): void {
      this.executeBlock(
        node.statements,
        new Environment(this.ctx.environment)
      );
    }

    protected executeIf(node: IfStmtNode): void {
      if (isTruthy(this.evaluateExpression(node.condition))) {
        this.executeStatement(node.thenBranch);
      } else if (node.elseBranch) {
        this.executeStatement(node.elseBranch);
      }
    }

    protected executeWhile(node: WhileStmtNode): void {
      while (isTruthy(this.evaluateExpression(node.condition))) {
        try {
          this.executeStatement(node.body);
        } catch (e) {
          if (e instanceof BreakSignal) return;
          throw e;
        }
      }
    }

    /** Bare `return;` yields nil */
    protected executeReturn(node: ReturnStmtNode): void {
      const value = node.value ? this.evaluateExpression(node.value) : null;
      throw new ReturnSignal(value, node.keyword);
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;
