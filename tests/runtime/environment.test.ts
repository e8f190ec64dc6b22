/**
 * Runtime Tests: Environment
 */

import { describe, expect, it } from 'vitest';
import {
  Environment,
  RuntimeError,
  TOKEN_TYPES,
  type Token,
} from '../../src/index.js';

function ident(lexeme: string): Token {
  const start = { line: 4, column: 2, offset: 10 };
  return {
    type: TOKEN_TYPES.IDENTIFIER,
    lexeme,
    literal: null,
    span: { start, end: { ...start, offset: start.offset + lexeme.length } },
  };
}

describe('Environment', () => {
  it('reads a defined value', () => {
    const env = new Environment();
    env.define('a', 1);
    expect(env.get(ident('a'))).toBe(1);
  });

  it('redefines in the same scope', () => {
    const env = new Environment();
    env.define('a', 1);
    env.define('a', 'two');
    expect(env.get(ident('a'))).toBe('two');
  });

  it('resolves names through enclosing scopes', () => {
    const outer = new Environment();
    outer.define('a', true);
    const inner = new Environment(new Environment(outer));
    expect(inner.get(ident('a'))).toBe(true);
  });

  it('shadows without touching the outer binding', () => {
    const outer = new Environment();
    outer.define('a', 1);
    const inner = new Environment(outer);
    inner.define('a', 2);
    expect(inner.get(ident('a'))).toBe(2);
    expect(outer.get(ident('a'))).toBe(1);
  });

  it('assigns to the innermost existing binding', () => {
    const outer = new Environment();
    outer.define('a', 1);
    const inner = new Environment(outer);
    inner.assign(ident('a'), 5);
    expect(outer.get(ident('a'))).toBe(5);
    expect(inner.has('a')).toBe(false);
  });

  it('stores nil as a real value', () => {
    const env = new Environment();
    env.define('a', null);
    expect(env.get(ident('a'))).toBeNull();
  });

  it('rejects reads of unknown names', () => {
    const env = new Environment();
    expect(() => env.get(ident('missing'))).toThrow(
      "Undefined variable 'missing'. at 4:2"
    );
  });

  it('rejects reads of declared but unassigned names', () => {
    const env = new Environment();
    env.define('a', undefined);
    expect(() => env.get(ident('a'))).toThrow(RuntimeError);
    expect(() => env.get(ident('a'))).toThrow("Uninitialized variable 'a'.");
  });

  it('never creates a binding on assignment', () => {
    const env = new Environment();
    expect(() => env.assign(ident('b'), 1)).toThrow("Undefined variable 'b'.");
    expect(env.lookup('b')).toEqual({ found: false });
  });

  it('lists names in definition order', () => {
    const env = new Environment();
    env.define('z', 1);
    env.define('a', 2);
    expect(env.names()).toEqual(['z', 'a']);
  });
});
