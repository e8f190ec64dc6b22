/**
 * Parser Tests: syntax errors and recovery
 */

import { describe, expect, it } from 'vitest';
import {
  MAX_ARITY,
  ParseError,
  TOKEN_TYPES,
  parseSource,
} from '../../src/index.js';

function messages(source: string): string[] {
  return parseSource(source).errors.map((e) => e.toData().message);
}

describe('Parser: errors', () => {
  it('reports a missing expression at the offending token', () => {
    const [error] = parseSource('print 1 - ;').errors;
    expect(error).toBeInstanceOf(ParseError);
    expect(error?.toData().message).toBe('Expect expression.');
    expect(error?.token.lexeme).toBe(';');
  });

  it('anchors errors at end of input on the EOF token', () => {
    const [error] = parseSource('print 1').errors;
    expect(error?.toData().message).toBe("Expect ';' after value.");
    expect(error?.token.type).toBe(TOKEN_TYPES.EOF);
  });

  it('reports a binary operator with no left operand', () => {
    const [error] = parseSource('print + 1;').errors;
    expect(error?.toData().message).toBe('Missing left-hand operand.');
    expect(error?.token.lexeme).toBe('+');
    expect(messages('print + 1;')).toHaveLength(1);
  });

  it('reports a missing left operand even when the right one is missing too', () => {
    const [error, ...rest] = parseSource('print + ;').errors;
    expect(error?.toData().message).toBe('Missing left-hand operand.');
    expect(error?.token.lexeme).toBe('+');
    expect(rest).toEqual([]);
  });

  it('consumes the right operand of a headless equality', () => {
    expect(messages('print == 1 + 2; print 3;')).toEqual([
      'Missing left-hand operand.',
    ]);
  });

  it('reports an invalid assignment target at the equals sign', () => {
    const result = parseSource('a + b = 1;');
    expect(result.errors.map((e) => e.toData().message)).toEqual([
      'Invalid assignment target.',
    ]);
    expect(result.errors[0]?.token.lexeme).toBe('=');
    expect(result.statements[0]).toMatchObject({ ok: false });
  });

  it('reports a missing closing paren', () => {
    expect(messages('print (1 + 2;')).toEqual(["Expect ')' after expression."]);
  });

  it('reports a missing colon in a conditional expression', () => {
    expect(messages('print a ? b;')).toEqual([
      "Expect ':' after then branch of conditional expression.",
    ]);
  });

  it('reports an unterminated block', () => {
    expect(messages('{ print 1;')).toEqual(["Expect '}' after block."]);
  });

  describe('recovery', () => {
    it('continues after a statement boundary and reports every error', () => {
      const result = parseSource('print ;\nvar = 2;\nprint 3;');
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        'Expect expression.',
        'Expect variable name.',
      ]);
      expect(result.statements.map((s) => s.ok)).toEqual([false, false, true]);
    });

    it('resumes at a keyword that starts a statement', () => {
      const result = parseSource('var = 1 print a;');
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        'Expect variable name.',
      ]);
      expect(result.errors[0]?.token.lexeme).toBe('=');
      expect(result.statements.map((s) => s.ok)).toEqual([false, true]);
    });

    it('reports one error for a malformed statement inside a block', () => {
      const result = parseSource('{ var = 1; print 2; }');
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        'Expect variable name.',
      ]);
      expect(result.errors[0]?.token.lexeme).toBe('=');
      expect(result.statements.map((s) => s.ok)).toEqual([false]);
    });

    it('reports one error for a malformed statement in a function body', () => {
      const result = parseSource('fun f() { var = 1; } print 3;');
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        'Expect variable name.',
      ]);
      expect(result.statements.map((s) => s.ok)).toEqual([false, true]);
    });

    it('stops recovering at the closing brace of a block', () => {
      expect(messages('{ var = 1 } print 2;')).toEqual([
        'Expect variable name.',
      ]);
      expect(messages('{ print } print 2;')).toEqual(['Expect expression.']);
    });

    it('marks the whole parse as failed when any declaration failed', () => {
      const result = parseSource('print 1; print ;');
      expect(result.success).toBe(false);
      expect(result.statements[0]).toMatchObject({ ok: true });
    });
  });

  describe('arity limit', () => {
    const names = (prefix: string, count: number): string =>
      Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(', ');

    it('accepts exactly the maximum number of arguments', () => {
      expect(MAX_ARITY).toBe(255);
      expect(messages(`f(${names('a', 255)});`)).toEqual([]);
    });

    it('reports the first argument past the limit without stopping', () => {
      const result = parseSource(`f(${names('a', 256)});`);
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        "Can't have more than 255 arguments.",
      ]);
      expect(result.errors[0]?.token.lexeme).toBe('a255');
    });

    it('reports too many parameters', () => {
      const result = parseSource(`fun f(${names('p', 256)}) {}`);
      expect(result.errors.map((e) => e.toData().message)).toEqual([
        "Can't have more than 255 parameters.",
      ]);
      expect(result.errors[0]?.token.lexeme).toBe('p255');
    });
  });
});
