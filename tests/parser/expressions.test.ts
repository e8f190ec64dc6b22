/**
 * Parser Tests: expressions and precedence
 */

import { describe, expect, it } from 'vitest';
import { parseStatements } from '../helpers/runtime.js';

/** Parse `source;` as an expression statement and return its expression */
function expression(source: string): unknown {
  const [stmt] = parseStatements(`${source};`);
  expect(stmt?.type).toBe('ExpressionStmt');
  return stmt?.type === 'ExpressionStmt' ? stmt.expression : undefined;
}

describe('Parser: expressions', () => {
  it('binds factor tighter than term', () => {
    expect(expression('1 + 2 * 3')).toMatchObject({
      type: 'BinaryExpr',
      operator: { lexeme: '+' },
      left: { type: 'LiteralExpr', value: 1 },
      right: {
        type: 'BinaryExpr',
        operator: { lexeme: '*' },
        left: { value: 2 },
        right: { value: 3 },
      },
    });
  });

  it('groups with parentheses', () => {
    expect(expression('(1 + 2) * 3')).toMatchObject({
      type: 'BinaryExpr',
      operator: { lexeme: '*' },
      left: { type: 'GroupingExpr', expression: { type: 'BinaryExpr' } },
    });
  });

  it('is left-associative for subtraction', () => {
    expect(expression('5 - 2 - 1')).toMatchObject({
      operator: { lexeme: '-' },
      left: { type: 'BinaryExpr', left: { value: 5 }, right: { value: 2 } },
      right: { value: 1 },
    });
  });

  it('is right-associative for assignment', () => {
    expect(expression('a = b = 1')).toMatchObject({
      type: 'AssignExpr',
      name: { lexeme: 'a' },
      value: { type: 'AssignExpr', name: { lexeme: 'b' } },
    });
  });

  it('nests conditional expressions in the else branch', () => {
    expect(expression('a ? b : c ? d : e')).toMatchObject({
      type: 'TernaryExpr',
      condition: { name: { lexeme: 'a' } },
      thenBranch: { name: { lexeme: 'b' } },
      elseBranch: {
        type: 'TernaryExpr',
        condition: { name: { lexeme: 'c' } },
      },
    });
  });

  it('builds a comma expression with the lowest precedence', () => {
    expect(expression('a = 1, 2')).toMatchObject({
      type: 'BinaryExpr',
      operator: { lexeme: ',' },
      left: { type: 'AssignExpr' },
      right: { value: 2 },
    });
  });

  it('gives and higher precedence than or', () => {
    expect(expression('a or b and c')).toMatchObject({
      type: 'LogicalExpr',
      operator: { lexeme: 'or' },
      right: { type: 'LogicalExpr', operator: { lexeme: 'and' } },
    });
  });

  it('parses nested unary operators', () => {
    expect(expression('!-x')).toMatchObject({
      type: 'UnaryExpr',
      operator: { lexeme: '!' },
      operand: { type: 'UnaryExpr', operator: { lexeme: '-' } },
    });
  });

  describe('calls', () => {
    it('parses chained calls', () => {
      expect(expression('f(1)(2)')).toMatchObject({
        type: 'CallExpr',
        args: [{ value: 2 }],
        callee: { type: 'CallExpr', args: [{ value: 1 }] },
      });
    });

    it('keeps the closing paren for error locations', () => {
      expect(expression('f(\n1\n)')).toMatchObject({
        paren: { lexeme: ')', span: { start: { line: 3 } } },
      });
    });

    it('parses each argument at assignment level', () => {
      expect(expression('f(a = 1, b)')).toMatchObject({
        type: 'CallExpr',
        args: [{ type: 'AssignExpr' }, { type: 'VariableExpr' }],
      });
    });

    it('needs parentheses for a comma expression argument', () => {
      expect(expression('f((1, 2))')).toMatchObject({
        args: [{ type: 'GroupingExpr', expression: { type: 'BinaryExpr' } }],
      });
    });
  });
});
