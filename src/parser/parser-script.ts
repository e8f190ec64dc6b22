/**
 * Parser Extension: Script Parsing
 * Program loop, panic-mode recovery, declarations and simple statements
 */

import { Parser } from './parser.js';
import type {
  ExpressionStmtNode,
  PrintStmtNode,
  StatementNode,
  StatementResult,
  VarStmtNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  match,
  previous,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): StatementResult[];
    parseDeclaration(): StatementNode;
    parseVarDeclaration(): VarStmtNode;
    parseStatement(): StatementNode;
    parsePrintStatement(): PrintStmtNode;
    parseExpressionStatement(): ExpressionStmtNode;
    synchronize(insideBlock?: boolean): void;
  }
}

/** Tokens that begin a statement; recovery stops in front of them */
const STATEMENT_STARTS = [
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.RETURN,
];

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): StatementResult[] {
  const results: StatementResult[] = [];

  while (!isAtEnd(this.state)) {
    const errorCount = this.state.errors.length;

    try {
      const statement = this.parseDeclaration();
      // A declaration with a reported (non-thrown) error still fails
      const reported = this.state.errors[errorCount];
      results.push(
        reported ? { ok: false, error: reported } : { ok: true, statement }
      );
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      this.state.errors.push(err);
      results.push({ ok: false, error: this.state.errors[errorCount] ?? err });
      this.synchronize();
    }
  }

  return results;
};

/**
 * Discard tokens until a statement boundary: just past a semicolon, or
 * in front of a token that starts a declaration or statement. Inside a
 * block the closing brace is also a boundary and is never consumed.
 */
Parser.prototype.synchronize = function (
  this: Parser,
  insideBlock = false
): void {
  const atBrace = (): boolean =>
    insideBlock && check(this.state, TOKEN_TYPES.RIGHT_BRACE);

  if (!atBrace()) advance(this.state);

  while (!isAtEnd(this.state)) {
    if (previous(this.state).type === TOKEN_TYPES.SEMICOLON) return;
    if (check(this.state, ...STATEMENT_STARTS) || atBrace()) return;
    advance(this.state);
  }
};

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseDeclaration = function (this: Parser): StatementNode {
  if (check(this.state, TOKEN_TYPES.FUN)) return this.parseFunction();
  if (check(this.state, TOKEN_TYPES.VAR)) return this.parseVarDeclaration();
  return this.parseStatement();
};

Parser.prototype.parseVarDeclaration = function (this: Parser): VarStmtNode {
  const start = advance(this.state).span.start; // consume 'var'
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expect variable name.'
  );

  const initializer = match(this.state, TOKEN_TYPES.EQUAL)
    ? this.parseExpression()
    : null;

  expect(
    this.state,
    TOKEN_TYPES.SEMICOLON,
    "Expect ';' after variable declaration."
  );

  return {
    type: 'VarStmt',
    name,
    initializer,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.PRINT:
      return this.parsePrintStatement();
    case TOKEN_TYPES.LEFT_BRACE:
      return this.parseBlock();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.BREAK:
      return this.parseBreak();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    default:
      return this.parseExpressionStatement();
  }
};

Parser.prototype.parsePrintStatement = function (this: Parser): PrintStmtNode {
  const start = advance(this.state).span.start; // consume 'print'
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expect ';' after value.");

  return {
    type: 'PrintStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expect ';' after expression.");

  return {
    type: 'ExpressionStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};
