/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  SourceLocation,
  Token,
  TokenLiteral,
  TokenType,
} from '../types.js';
import { currentLocation, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

/** Build a token whose lexeme is the source text from start to the cursor */
export function makeToken(
  state: LexerState,
  type: TokenType,
  start: SourceLocation,
  literal: TokenLiteral = null
): Token {
  const end = currentLocation(state);
  return {
    type,
    lexeme: state.source.slice(start.offset, end.offset),
    literal,
    span: { start, end },
  };
}
