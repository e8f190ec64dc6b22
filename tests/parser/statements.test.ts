/**
 * Parser Tests: statements and desugaring
 */

import { describe, expect, it } from 'vitest';
import { parseSource } from '../../src/index.js';
import { parseStatements } from '../helpers/runtime.js';

describe('Parser: statements', () => {
  it('produces one result per top-level declaration', () => {
    const result = parseSource('var a = 1; print a; { a = 2; }');
    expect(result.success).toBe(true);
    expect(result.statements.map((s) => s.ok && s.statement.type)).toEqual([
      'VarStmt',
      'PrintStmt',
      'BlockStmt',
    ]);
  });

  it('parses a var declaration without initializer', () => {
    const [stmt] = parseStatements('var a;');
    expect(stmt).toMatchObject({
      type: 'VarStmt',
      name: { lexeme: 'a' },
      initializer: null,
    });
  });

  it('parses if with else', () => {
    const [stmt] = parseStatements('if (a) print 1; else print 2;');
    expect(stmt).toMatchObject({
      type: 'IfStmt',
      condition: { type: 'VariableExpr' },
      thenBranch: { type: 'PrintStmt' },
      elseBranch: { type: 'PrintStmt' },
    });
  });

  it('binds a dangling else to the nearest if', () => {
    const [stmt] = parseStatements('if (a) if (b) print 1; else print 2;');
    expect(stmt).toMatchObject({
      type: 'IfStmt',
      elseBranch: null,
      thenBranch: { type: 'IfStmt', elseBranch: { type: 'PrintStmt' } },
    });
  });

  it('parses function declarations', () => {
    const [stmt] = parseStatements('fun add(a, b) { return a + b; }');
    expect(stmt).toMatchObject({
      type: 'FunctionStmt',
      name: { lexeme: 'add' },
      params: [{ lexeme: 'a' }, { lexeme: 'b' }],
      body: [{ type: 'ReturnStmt', value: { type: 'BinaryExpr' } }],
    });
  });

  it('parses a bare return with a null value', () => {
    const [stmt] = parseStatements('fun f() { return; }');
    expect(stmt).toMatchObject({
      type: 'FunctionStmt',
      body: [{ type: 'ReturnStmt', value: null }],
    });
  });

  describe('for loops', () => {
    it('desugars into a block holding the initializer and a while loop', () => {
      const [stmt] = parseStatements(
        'for (var i = 0; i < 3; i = i + 1) print i;'
      );
      expect(stmt).toMatchObject({
        type: 'BlockStmt',
        statements: [
          { type: 'VarStmt', name: { lexeme: 'i' } },
          {
            type: 'WhileStmt',
            condition: { type: 'BinaryExpr', operator: { lexeme: '<' } },
            body: {
              type: 'BlockStmt',
              statements: [
                { type: 'PrintStmt' },
                {
                  type: 'ExpressionStmt',
                  expression: { type: 'AssignExpr', name: { lexeme: 'i' } },
                },
              ],
            },
          },
        ],
      });
    });

    it('uses a true condition when the clause is empty', () => {
      const [stmt] = parseStatements('for (;;) break;');
      expect(stmt).toMatchObject({
        type: 'WhileStmt',
        condition: { type: 'LiteralExpr', value: true },
        body: { type: 'BreakStmt' },
      });
    });

    it('accepts an expression initializer', () => {
      const [stmt] = parseStatements('for (i = 0; i < 1;) print i;');
      expect(stmt).toMatchObject({
        type: 'BlockStmt',
        statements: [
          { type: 'ExpressionStmt' },
          { type: 'WhileStmt', body: { type: 'PrintStmt' } },
        ],
      });
    });
  });

  describe('break', () => {
    it('accepts break inside a loop body', () => {
      const result = parseSource('while (true) { if (x) break; }');
      expect(result.errors).toEqual([]);
    });

    it('rejects break outside of a loop', () => {
      const result = parseSource('break;');
      expect(result.success).toBe(false);
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        "Can't use 'break' outside of a loop.",
      ]);
      expect(result.statements[0]).toMatchObject({ ok: false });
    });

    it('rejects break in a function declared inside a loop', () => {
      const result = parseSource('while (true) { fun f() { break; } }');
      expect(result.errors.map((e) => e.errorId)).toEqual(['LOX-P006']);
    });

    it('restores loop depth after an error inside a loop body', () => {
      const result = parseSource('while (true) print ;\nbreak;');
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        'Expect expression.',
        "Can't use 'break' outside of a loop.",
      ]);
    });

    it('allows break after a nested function inside a loop', () => {
      const result = parseSource('while (true) { fun f() {} break; }');
      expect(result.errors).toEqual([]);
    });
  });
});
