/**
 * Runtime Values
 *
 * The value domain of the interpreter, truthiness, equality and
 * textual rendering.
 */

import type { LoxCallable } from './callable.js';

/** Runtime value. `null` is nil. */
export type LoxValue = string | number | boolean | null | LoxCallable;

export type LoxTypeName = 'string' | 'number' | 'bool' | 'nil' | 'callable';

/** Default number of decimals when printing a number */
export const DEFAULT_NUMBER_PRECISION = 2;

/** Infer the type name of a value */
export function inferType(value: LoxValue): LoxTypeName {
  if (value === null) return 'nil';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'bool';
  return 'callable';
}

/** Only nil and false are falsy */
export function isTruthy(value: LoxValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  return true;
}

/**
 * Total equality: nil equals only nil, scalars of the same kind compare
 * by value, anything else (including callables) is unequal.
 */
export function isEqual(a: LoxValue, b: LoxValue): boolean {
  if (a === null || b === null) return a === b;
  if (typeof a === 'object' || typeof b === 'object') return false;
  return a === b;
}

/** Render a value for `print` */
export function formatValue(
  value: LoxValue,
  precision = DEFAULT_NUMBER_PRECISION
): string {
  if (value === null) return 'nil';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return formatNumber(value, precision);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return `<fn ${value.name}>`;
}

/**
 * Fixed-point rendering. toFixed switches to exponent form from 1e21,
 * where every double is an integer, so those go through BigInt.
 */
function formatNumber(value: number, precision: number): string {
  if (!Number.isFinite(value) || Math.abs(value) < 1e21) {
    return value.toFixed(precision);
  }
  const digits = BigInt(value).toString();
  return precision > 0 ? `${digits}.${'0'.repeat(precision)}` : digits;
}

/**
 * Render a number operand of string concatenation: shortest form,
 * no fixed decimals (`1 + "a"` is `"1a"`).
 */
export function stringifyOperand(value: string | number): string {
  return typeof value === 'string' ? value : String(value);
}
