/**
 * Runtime Tests: values, truthiness, equality and formatting
 */

import { describe, expect, it } from 'vitest';
import {
  Environment,
  formatValue,
  inferType,
  isEqual,
  isTruthy,
  nativeFunction,
  type LoxFunction,
} from '../../src/index.js';

const native = nativeFunction('id', 1, ([value]) => value ?? null);

const userFn: LoxFunction = {
  kind: 'function',
  name: 'make',
  params: [],
  body: [],
  closure: new Environment(),
};

describe('values', () => {
  describe('isTruthy', () => {
    it('treats only nil and false as falsy', () => {
      expect(isTruthy(null)).toBe(false);
      expect(isTruthy(false)).toBe(false);
      expect(isTruthy(true)).toBe(true);
      expect(isTruthy(0)).toBe(true);
      expect(isTruthy('')).toBe(true);
      expect(isTruthy(native)).toBe(true);
    });
  });

  describe('isEqual', () => {
    it('compares scalars of the same kind by value', () => {
      expect(isEqual(1, 1)).toBe(true);
      expect(isEqual('a', 'a')).toBe(true);
      expect(isEqual(true, false)).toBe(false);
    });

    it('is false across kinds instead of failing', () => {
      expect(isEqual('a', 1)).toBe(false);
      expect(isEqual('1', 1)).toBe(false);
      expect(isEqual(0, false)).toBe(false);
    });

    it('matches nil only with nil', () => {
      expect(isEqual(null, null)).toBe(true);
      expect(isEqual(null, false)).toBe(false);
      expect(isEqual(0, null)).toBe(false);
    });

    it('never equates callables', () => {
      expect(isEqual(native, native)).toBe(false);
    });
  });

  describe('formatValue', () => {
    it('prints numbers with two decimals by default', () => {
      expect(formatValue(7)).toBe('7.00');
      expect(formatValue(-0.125)).toBe('-0.13');
    });

    it('honors a custom precision', () => {
      expect(formatValue(2.5, 0)).toBe('3');
      expect(formatValue(1, 3)).toBe('1.000');
    });

    it('keeps fixed-point form for magnitudes from 1e21', () => {
      expect(formatValue(1e21)).toBe('1000000000000000000000.00');
      expect(formatValue(2 ** 70)).toBe('1180591620717411303424.00');
      expect(formatValue(-1e21, 0)).toBe('-1000000000000000000000');
    });

    it('prints other values', () => {
      expect(formatValue(null)).toBe('nil');
      expect(formatValue(true)).toBe('true');
      expect(formatValue('raw text')).toBe('raw text');
      expect(formatValue(userFn)).toBe('<fn make>');
      expect(formatValue(native)).toBe('<fn id>');
    });
  });

  it('names value types', () => {
    expect([null, 'a', 1, false, userFn].map(inferType)).toEqual([
      'nil',
      'string',
      'number',
      'bool',
      'callable',
    ]);
  });
});
