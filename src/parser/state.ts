/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Every error reported so far, thrown or not */
  readonly errors: ParseError[];
  /** Number of enclosing while/for bodies at the current position */
  loopDepth: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return {
    tokens,
    pos: 0,
    errors: [],
    loopDepth: 0,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** Most recently consumed token (the current one before any advance) */
export function previous(state: ParserState): Token {
  return state.tokens[state.pos - 1] ?? current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the current token if it has one of the given types */
export function match(state: ParserState, ...types: TokenType[]): boolean {
  if (!check(state, ...types)) return false;
  advance(state);
  return true;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  throw new ParseError('LOX-P005', current(state), { message });
}

/**
 * Record an error without unwinding. The enclosing declaration still
 * counts as failed.
 */
export function report(state: ParserState, error: ParseError): void {
  state.errors.push(error);
}

// ============================================================
// SPAN HELPERS
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from a start location to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, previous(state).span.end);
}
