/**
 * Parser Extension: Function Parsing
 * Function declarations and call expressions
 */

import { Parser } from './parser.js';
import type {
  CallExprNode,
  ExpressionNode,
  FunctionStmtNode,
  StatementNode,
  Token,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  report,
  spanFrom,
} from './state.js';

/** Upper bound on arguments per call and parameters per function */
export const MAX_ARITY = 255;

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunction(): FunctionStmtNode;
    parseParameters(): Token[];
    parseCall(): ExpressionNode;
    finishCall(callee: ExpressionNode): CallExprNode;
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseFunction = function (this: Parser): FunctionStmtNode {
  const start = advance(this.state).span.start; // consume 'fun'
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expect function name.'
  );

  expect(
    this.state,
    TOKEN_TYPES.LEFT_PAREN,
    "Expect '(' after function name."
  );
  const params = this.parseParameters();
  expect(this.state, TOKEN_TYPES.LEFT_BRACE, "Expect '{' before function body.");

  // break cannot reach a loop outside the function
  const savedLoopDepth = this.state.loopDepth;
  this.state.loopDepth = 0;
  let body: StatementNode[];
  try {
    body = this.parseBlockStatements();
  } finally {
    this.state.loopDepth = savedLoopDepth;
  }

  return {
    type: 'FunctionStmt',
    name,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

/** Parameter names up to and including the closing paren */
Parser.prototype.parseParameters = function (this: Parser): Token[] {
  const params: Token[] = [];

  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    do {
      if (params.length >= MAX_ARITY) {
        report(
          this.state,
          new ParseError('LOX-P004', current(this.state), {
            limit: MAX_ARITY,
            kind: 'parameters',
          })
        );
      }
      params.push(
        expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expect parameter name.')
      );
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expect ')' after parameters.");
  return params;
};

// ============================================================
// CALLS
// ============================================================

/** primary ( "(" arguments? ")" )* */
Parser.prototype.parseCall = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  while (match(this.state, TOKEN_TYPES.LEFT_PAREN)) {
    expr = this.finishCall(expr);
  }

  return expr;
};

/**
 * Arguments are parsed at assignment level, so a bare comma separates
 * arguments rather than acting as the comma operator.
 */
Parser.prototype.finishCall = function (
  this: Parser,
  callee: ExpressionNode
): CallExprNode {
  const args: ExpressionNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    do {
      if (args.length >= MAX_ARITY) {
        report(
          this.state,
          new ParseError('LOX-P004', current(this.state), {
            limit: MAX_ARITY,
            kind: 'arguments',
          })
        );
      }
      args.push(this.parseAssignment());
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  const paren = expect(
    this.state,
    TOKEN_TYPES.RIGHT_PAREN,
    "Expect ')' after arguments."
  );

  return {
    type: 'CallExpr',
    callee,
    paren,
    args,
    span: spanFrom(this.state, callee.span.start),
  };
};
