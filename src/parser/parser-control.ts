/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops, break and return
 */

import { Parser } from './parser.js';
import type {
  BlockStmtNode,
  BreakStmtNode,
  ExpressionNode,
  IfStmtNode,
  ReturnStmtNode,
  StatementNode,
  WhileStmtNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  match,
  report,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockStmtNode;
    parseBlockStatements(): StatementNode[];
    parseIf(): IfStmtNode;
    parseWhile(): WhileStmtNode;
    parseFor(): StatementNode;
    parseLoopBody(): StatementNode;
    parseBreak(): BreakStmtNode;
    parseReturn(): ReturnStmtNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockStmtNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume {
  const statements = this.parseBlockStatements();

  return {
    type: 'BlockStmt',
    statements,
    span: spanFrom(this.state, start),
  };
};

/** Declarations up to and including the closing brace */
Parser.prototype.parseBlockStatements = function (
  this: Parser
): StatementNode[] {
  const statements: StatementNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RIGHT_BRACE) && !isAtEnd(this.state)) {
    try {
      statements.push(this.parseDeclaration());
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      // Recover here so the closing brace still ends this block
      report(this.state, err);
      this.synchronize(true);
    }
  }

  expect(this.state, TOKEN_TYPES.RIGHT_BRACE, "Expect '}' after block.");
  return statements;
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): IfStmtNode {
  const start = advance(this.state).span.start; // consume 'if'
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, "Expect '(' after 'if'.");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expect ')' after if condition.");

  const thenBranch = this.parseStatement();
  const elseBranch = match(this.state, TOKEN_TYPES.ELSE)
    ? this.parseStatement()
    : null;

  return {
    type: 'IfStmt',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

/** Parse a loop body with the loop depth raised, restoring it on every exit */
Parser.prototype.parseLoopBody = function (this: Parser): StatementNode {
  this.state.loopDepth++;
  try {
    return this.parseStatement();
  } finally {
    this.state.loopDepth--;
  }
};

Parser.prototype.parseWhile = function (this: Parser): WhileStmtNode {
  const start = advance(this.state).span.start; // consume 'while'
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, "Expect '(' after 'while'.");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expect ')' after condition.");

  const body = this.parseLoopBody();

  return {
    type: 'WhileStmt',
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

/**
 * for (init; cond; incr) body
 * desugars to { init; while (cond) { body; incr; } }
 */
Parser.prototype.parseFor = function (this: Parser): StatementNode {
  const start = advance(this.state).span.start; // consume 'for'
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, "Expect '(' after 'for'.");

  let initializer: StatementNode | null;
  if (match(this.state, TOKEN_TYPES.SEMICOLON)) {
    initializer = null;
  } else if (check(this.state, TOKEN_TYPES.VAR)) {
    initializer = this.parseVarDeclaration();
  } else {
    initializer = this.parseExpressionStatement();
  }

  let condition: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.SEMICOLON)) {
    condition = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expect ';' after loop condition.");

  let increment: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    increment = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expect ')' after for clauses.");

  let body = this.parseLoopBody();
  const span = spanFrom(this.state, start);

  if (increment) {
    body = {
      type: 'BlockStmt',
      statements: [
        body,
        { type: 'ExpressionStmt', expression: increment, span: increment.span },
      ],
      span: body.span,
    };
  }

  const loop: WhileStmtNode = {
    type: 'WhileStmt',
    condition: condition ?? {
      type: 'LiteralExpr',
      value: true,
      span: { start, end: start },
    },
    body,
    span,
  };

  if (!initializer) return loop;

  return {
    type: 'BlockStmt',
    statements: [initializer, loop],
    span,
  };
};

// ============================================================
// JUMPS
// ============================================================

Parser.prototype.parseBreak = function (this: Parser): BreakStmtNode {
  const keyword = advance(this.state);

  if (this.state.loopDepth === 0) {
    report(this.state, new ParseError('LOX-P006', keyword));
  }

  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expect ';' after 'break'.");

  return {
    type: 'BreakStmt',
    keyword,
    span: spanFrom(this.state, keyword.span.start),
  };
};

Parser.prototype.parseReturn = function (this: Parser): ReturnStmtNode {
  const keyword = advance(this.state);

  const value = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? null
    : this.parseExpression();

  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expect ';' after return value.");

  return {
    type: 'ReturnStmt',
    keyword,
    value,
    span: spanFrom(this.state, keyword.span.start),
  };
};
