/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Operators that become a two-character token when followed by `=` */
export const EQUAL_SUFFIXED: Record<string, [TokenType, TokenType]> = {
  '!': [TOKEN_TYPES.BANG, TOKEN_TYPES.BANG_EQUAL],
  '=': [TOKEN_TYPES.EQUAL, TOKEN_TYPES.EQUAL_EQUAL],
  '<': [TOKEN_TYPES.LESS, TOKEN_TYPES.LESS_EQUAL],
  '>': [TOKEN_TYPES.GREATER, TOKEN_TYPES.GREATER_EQUAL],
};

/** Single-character operator lookup table (`/` is handled with comments) */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LEFT_PAREN,
  ')': TOKEN_TYPES.RIGHT_PAREN,
  '{': TOKEN_TYPES.LEFT_BRACE,
  '}': TOKEN_TYPES.RIGHT_BRACE,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  '-': TOKEN_TYPES.MINUS,
  '+': TOKEN_TYPES.PLUS,
  ';': TOKEN_TYPES.SEMICOLON,
  '*': TOKEN_TYPES.STAR,
  '?': TOKEN_TYPES.QUESTION,
  ':': TOKEN_TYPES.COLON,
};

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['and', TOKEN_TYPES.AND],
  ['break', TOKEN_TYPES.BREAK],
  ['class', TOKEN_TYPES.CLASS],
  ['else', TOKEN_TYPES.ELSE],
  ['false', TOKEN_TYPES.FALSE],
  ['for', TOKEN_TYPES.FOR],
  ['fun', TOKEN_TYPES.FUN],
  ['if', TOKEN_TYPES.IF],
  ['nil', TOKEN_TYPES.NIL],
  ['or', TOKEN_TYPES.OR],
  ['print', TOKEN_TYPES.PRINT],
  ['return', TOKEN_TYPES.RETURN],
  ['super', TOKEN_TYPES.SUPER],
  ['this', TOKEN_TYPES.THIS],
  ['true', TOKEN_TYPES.TRUE],
  ['var', TOKEN_TYPES.VAR],
  ['while', TOKEN_TYPES.WHILE],
]);
