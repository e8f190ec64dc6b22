/**
 * Language Tests: expressions and operators
 */

import { describe, expect, it } from 'vitest';
import { runCapture, runOutput } from '../helpers/runtime.js';

function errorOf(source: string): string | undefined {
  return runCapture(source).result.runtimeError?.toData().message;
}

describe('Language: expressions', () => {
  describe('arithmetic', () => {
    it('follows precedence', () => {
      expect(runOutput('print 1 + 2 * 3;')).toEqual(['7.00']);
      expect(runOutput('print (1 + 2) * 3;')).toEqual(['9.00']);
    });

    it('evaluates the same expression identically twice', () => {
      expect(runOutput('var a = 3; print a / 4 - 1; print a / 4 - 1;')).toEqual(
        ['-0.25', '-0.25']
      );
    });

    it('negates numbers', () => {
      expect(runOutput('print -(2 - 5);')).toEqual(['3.00']);
    });

    it('prints large numbers without an exponent', () => {
      expect(runOutput('print 1000000000000000000000;')).toEqual([
        '1000000000000000000000.00',
      ]);
    });

    it('divides by zero into infinity', () => {
      expect(runOutput('print 1 / 0 > 1000;')).toEqual(['true']);
    });

    it('rejects non-numbers', () => {
      expect(errorOf('print 1 - "a";')).toBe('Operands must be numbers.');
      expect(errorOf('print nil * 2;')).toBe('Operands must be numbers.');
      expect(errorOf('print -true;')).toBe('Operand must be a number.');
    });
  });

  describe('addition and concatenation', () => {
    it('concatenates strings', () => {
      expect(runOutput('print "tree" + "lox";')).toEqual(['treelox']);
    });

    it('stringifies a number next to a string', () => {
      expect(runOutput('print 1 + "a";')).toEqual(['1a']);
      expect(runOutput('print "v" + 2.5;')).toEqual(['v2.5']);
    });

    it('rejects other combinations', () => {
      expect(errorOf('print true + 1;')).toBe(
        'Operands must be two numbers or two strings.'
      );
      expect(errorOf('print "a" + nil;')).toBe(
        'Operands must be two numbers or two strings.'
      );
    });
  });

  describe('comparison and equality', () => {
    it('compares numbers', () => {
      expect(runOutput('print 1 < 2; print 2 <= 2; print 3 > 4; print 3 >= 4;'))
        .toEqual(['true', 'true', 'false', 'false']);
    });

    it('rejects comparing strings', () => {
      expect(errorOf('print "a" < "b";')).toBe('Operands must be numbers.');
    });

    it('is total across kinds', () => {
      expect(runOutput('print "a" == 1; print nil == nil; print 1 != "1";'))
        .toEqual(['false', 'true', 'true']);
    });

    it('never equates functions, even with themselves', () => {
      expect(runOutput('fun f() {} print f == f;')).toEqual(['false']);
    });
  });

  describe('logic', () => {
    it('negates by truthiness', () => {
      expect(runOutput('print !nil; print !0; print !"";')).toEqual([
        'true',
        'false',
        'false',
      ]);
    });

    it('returns operands rather than booleans', () => {
      expect(runOutput('print nil or "x"; print 0 and "y"; print false and 1;'))
        .toEqual(['x', 'y', 'false']);
    });

    it('short-circuits the right operand', () => {
      expect(runOutput('print true or missing; print nil and missing;')).toEqual(
        ['true', 'nil']
      );
    });
  });

  describe('conditional and comma', () => {
    it('evaluates only the chosen branch', () => {
      expect(runOutput('print true ? "yes" : missing;')).toEqual(['yes']);
      expect(runOutput('print nil ? missing : "no";')).toEqual(['no']);
    });

    it('chains to the right', () => {
      expect(runOutput('var n = 0; print n > 0 ? "pos" : n < 0 ? "neg" : "zero";'))
        .toEqual(['zero']);
    });

    it('yields the right operand after evaluating the left', () => {
      expect(runOutput('var a = 1; print (a = 5, a + 1); print a;')).toEqual([
        '6.00',
        '5.00',
      ]);
    });
  });

  describe('assignment', () => {
    it('is an expression yielding the assigned value', () => {
      expect(runOutput('var a; var b; a = b = 3; print a; print b;')).toEqual([
        '3.00',
        '3.00',
      ]);
    });

    it('requires a declared name', () => {
      expect(errorOf('undeclared = 1;')).toBe(
        "Undefined variable 'undeclared'."
      );
    });
  });

  describe('print', () => {
    it('renders every kind of value', () => {
      expect(
        runOutput('fun f() {} print nil; print true; print "s"; print f; print clock;')
      ).toEqual(['nil', 'true', 's', '<fn f>', '<fn clock>']);
    });

    it('uses the configured number precision', () => {
      expect(runOutput('print 1 / 3;', { numberPrecision: 4 })).toEqual([
        '0.3333',
      ]);
    });
  });
});
