/**
 * Parser Extension: Expression Parsing
 * Precedence chain from comma down to primary
 */

import { Parser } from './parser.js';
import type {
  BinaryExprNode,
  ExpressionNode,
  LogicalExprNode,
  TokenType,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  previous,
  report,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseComma(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseTernary(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseFactor(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseBinaryLevel(
      types: TokenType[],
      operand: () => ExpressionNode
    ): ExpressionNode;
    parseMissingLeftOperand(): void;
  }
}

const EQUALITY_OPS: TokenType[] = [
  TOKEN_TYPES.BANG_EQUAL,
  TOKEN_TYPES.EQUAL_EQUAL,
];

const COMPARISON_OPS: TokenType[] = [
  TOKEN_TYPES.GREATER,
  TOKEN_TYPES.GREATER_EQUAL,
  TOKEN_TYPES.LESS,
  TOKEN_TYPES.LESS_EQUAL,
];

const TERM_OPS: TokenType[] = [TOKEN_TYPES.MINUS, TOKEN_TYPES.PLUS];

const FACTOR_OPS: TokenType[] = [TOKEN_TYPES.SLASH, TOKEN_TYPES.STAR];

// ============================================================
// EXPRESSION PARSING
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseComma();
};

/** The comma operator: a BinaryExpr whose operator is the COMMA token */
Parser.prototype.parseComma = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel([TOKEN_TYPES.COMMA], () =>
    this.parseAssignment()
  );
};

Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const expr = this.parseTernary();

  if (match(this.state, TOKEN_TYPES.EQUAL)) {
    const equals = previous(this.state);
    const value = this.parseAssignment();

    if (expr.type === 'VariableExpr') {
      return {
        type: 'AssignExpr',
        name: expr.name,
        value,
        span: spanFrom(this.state, start),
      };
    }

    report(this.state, new ParseError('LOX-P003', equals));
  }

  return expr;
};

Parser.prototype.parseTernary = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const condition = this.parseLogicalOr();

  if (!match(this.state, TOKEN_TYPES.QUESTION)) return condition;

  const thenBranch = this.parseExpression();
  expect(
    this.state,
    TOKEN_TYPES.COLON,
    "Expect ':' after then branch of conditional expression."
  );
  const elseBranch = this.parseTernary();

  return {
    type: 'TernaryExpr',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseLogicalAnd();

  while (check(this.state, TOKEN_TYPES.OR)) {
    const operator = advance(this.state);
    const right = this.parseLogicalAnd();
    const node: LogicalExprNode = {
      type: 'LogicalExpr',
      left,
      operator,
      right,
      span: spanFrom(this.state, start),
    };
    left = node;
  }

  return left;
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseEquality();

  while (check(this.state, TOKEN_TYPES.AND)) {
    const operator = advance(this.state);
    const right = this.parseEquality();
    const node: LogicalExprNode = {
      type: 'LogicalExpr',
      left,
      operator,
      right,
      span: spanFrom(this.state, start),
    };
    left = node;
  }

  return left;
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseTerm());
};

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(TERM_OPS, () => this.parseFactor());
};

Parser.prototype.parseFactor = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(FACTOR_OPS, () => this.parseUnary());
};

/** Left-associative loop shared by every binary precedence level */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  types: TokenType[],
  operand: () => ExpressionNode
): ExpressionNode {
  const start = current(this.state).span.start;
  let left = operand();

  while (check(this.state, ...types)) {
    const operator = advance(this.state);
    const right = operand();
    const node: BinaryExprNode = {
      type: 'BinaryExpr',
      left,
      operator,
      right,
      span: spanFrom(this.state, start),
    };
    left = node;
  }

  return left;
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.BANG, TOKEN_TYPES.MINUS)) {
    const operator = advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'UnaryExpr',
      operator,
      operand,
      span: spanFrom(this.state, operator.span.start),
    };
  }
  return this.parseCall();
};

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { type: 'LiteralExpr', value: false, span };
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return { type: 'LiteralExpr', value: true, span };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'LiteralExpr', value: null, span };
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'LiteralExpr', value: token.literal, span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'VariableExpr', name: token, span };
    case TOKEN_TYPES.LEFT_PAREN: {
      advance(this.state);
      const expression = this.parseExpression();
      expect(
        this.state,
        TOKEN_TYPES.RIGHT_PAREN,
        "Expect ')' after expression."
      );
      return {
        type: 'GroupingExpr',
        expression,
        span: spanFrom(this.state, span.start),
      };
    }
  }

  this.parseMissingLeftOperand();
  throw new ParseError('LOX-P001', token);
};

/**
 * Error production for a binary operator with no left operand. The right
 * operand is parsed at the operator's own level so the token position
 * stays consistent, then the error is raised at the operator. Errors in
 * the right operand itself are discarded.
 */
Parser.prototype.parseMissingLeftOperand = function (this: Parser): void {
  const operator = current(this.state);

  let operand: (() => ExpressionNode) | null = null;
  if (check(this.state, ...EQUALITY_OPS)) {
    operand = () => this.parseComparison();
  } else if (check(this.state, ...COMPARISON_OPS)) {
    operand = () => this.parseTerm();
  } else if (check(this.state, TOKEN_TYPES.PLUS)) {
    operand = () => this.parseFactor();
  } else if (check(this.state, ...FACTOR_OPS)) {
    operand = () => this.parseUnary();
  }

  if (!operand) return;

  advance(this.state);
  const errorCount = this.state.errors.length;
  try {
    operand();
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
  }
  this.state.errors.length = errorCount;
  throw new ParseError('LOX-P002', operator);
};
