/**
 * ClosuresMixin: Function Declarations, Calls and Invocation
 *
 * A `fun` declaration binds its name in the active scope, then captures
 * that scope, so the body can see its own name and recursion works.
 * A call evaluates the callee, then every argument left to right, then
 * checks callability and arity before invoking.
 *
 * Invocation pushes a call frame (capped only when maxCallDepth is set), opens a scope
 * enclosed by the closure's captured scope, binds parameters by position
 * and runs the body. ReturnSignal is intercepted here and becomes the
 * call's value; completing normally yields nil.
 *
 * Error Handling:
 * - Callee not callable: Can only call functions and classes
 * - Argument count differs from arity: Expected N arguments but got M
 * - Call depth exceeded (configured limit or host stack): Stack overflow
 * - Native function threw a non-diagnostic error: Native function failed
 *
 * @internal
 */

import type {
  CallExprNode,
  ExpressionNode,
  FunctionStmtNode,
  StatementNode,
  Token,
} from '../../../../types.js';
import { LoxError, RuntimeError } from '../../../../types.js';
import {
  createFunction,
  getArity,
  isCallable,
  type LoxCallable,
  type LoxFunction,
  type NativeFunction,
} from '../../callable.js';
import { popCallFrame, pushCallFrame } from '../../context.js';
import { Environment } from '../../environment.js';
import { ReturnSignal } from '../../signals.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createClosuresMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ClosuresEvaluator extends Base {
    override evaluateExpression(node: ExpressionNode): LoxValue {
      if (node.type === 'CallExpr') {
        return this.evaluateCall(node);
      }
      return super.evaluateExpression(node);
    }

    override executeStatement(node: StatementNode): void {
      if (node.type === 'FunctionStmt') {
        this.executeFunctionDeclaration(node);
        return;
      }
      super.executeStatement(node);
    }

    protected executeFunctionDeclaration(node: FunctionStmtNode): void {
      const environment = this.ctx.environment;
      environment.define(node.name.lexeme, createFunction(node, environment));
    }

    protected evaluateCall(node: CallExprNode): LoxValue {
      const callee = this.evaluateExpression(node.callee);
      const args = node.args.map((arg) => this.evaluateExpression(arg));

      if (!isCallable(callee)) {
        throw new RuntimeError('LOX-R006', node.paren);
      }

      const arity = getArity(callee);
      if (args.length !== arity) {
        throw new RuntimeError('LOX-R007', node.paren, {
          expected: arity,
          actual: args.length,
        });
      }

      return this.invokeCallable(callee, args, node.paren);
    }

    override invokeCallable(
      callee: LoxCallable,
      args: LoxValue[],
      paren: Token
    ): LoxValue {
      const frame = { functionName: callee.name, location: paren.span.start };
      if (!pushCallFrame(this.ctx, frame)) {
        const overflow = new RuntimeError('LOX-R009', paren);
        overflow.callStack = [...this.ctx.callStack];
        throw overflow;
      }

      this.ctx.observability.onCallStart?.({ name: callee.name, args });
      const startTime = Date.now();

      try {
        const value =
          callee.kind === 'function'
            ? this.invokeFunction(callee, args)
            : this.invokeNative(callee, args, paren);

        this.ctx.observability.onFunctionReturn?.({
          name: callee.name,
          value,
          durationMs: Date.now() - startTime,
        });

        return value;
      } catch (err) {
        // Host stack exhausted
        if (err instanceof RangeError) {
          const overflow = new RuntimeError('LOX-R009', paren);
          overflow.callStack = [...this.ctx.callStack];
          throw overflow;
        }
        if (err instanceof RuntimeError && err.callStack === undefined) {
          err.callStack = [...this.ctx.callStack];
        }
        throw err;
      } finally {
        popCallFrame(this.ctx);
      }
    }

    protected invokeFunction(fn: LoxFunction, args: LoxValue[]): LoxValue {
      const environment = new Environment(fn.closure);
      fn.params.forEach((param, i) => {
        environment.define(param, args[i] ?? null);
      });

      try {
        this.executeBlock(fn.body, environment);
      } catch (e) {
        if (e instanceof ReturnSignal) return e.value;
        throw e;
      }

      return null;
    }

    /**
     * Native errors without a source position are re-anchored at the
     * call's closing paren.
     */
    protected invokeNative(
      fn: NativeFunction,
      args: LoxValue[],
      paren: Token
    ): LoxValue {
      try {
        return fn.fn(args, this.ctx, paren.span.start);
      } catch (err) {
        if (err instanceof RuntimeError) {
          if (err.token) throw err;
          throw new RuntimeError(err.errorId, paren, err.context ?? {});
        }
        if (err instanceof LoxError || err instanceof RangeError) throw err;
        throw new RuntimeError('LOX-R010', paren, {
          name: fn.name,
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    }
  };
}

export const ClosuresMixin = createClosuresMixin;
