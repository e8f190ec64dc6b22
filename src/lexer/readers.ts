/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a double-quoted string. Newlines are kept verbatim; there are no
 * escape sequences. An unterminated string consumes the rest of the input
 * and reports the line it started on.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  while (!isAtEnd(state) && peek(state) !== '"') {
    advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('LOX-L001', start);
  }

  advance(state); // consume closing "

  const value = state.source.slice(start.offset + 1, state.pos - 1);
  return makeToken(state, TOKEN_TYPES.STRING, start, value);
}

/** Digits, then a fraction only when a digit follows the dot */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);

  while (isDigit(peek(state))) {
    advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state); // consume .
    while (isDigit(peek(state))) {
      advance(state);
    }
  }

  const text = state.source.slice(start.offset, state.pos);
  return makeToken(state, TOKEN_TYPES.NUMBER, start, Number(text));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);

  while (isIdentifierChar(peek(state))) {
    advance(state);
  }

  const text = state.source.slice(start.offset, state.pos);
  return makeToken(state, KEYWORDS.get(text) ?? TOKEN_TYPES.IDENTIFIER, start);
}

/** Skip `//` to end of line (the newline itself is left for whitespace) */
export function skipLineComment(state: LexerState): void {
  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
}

/** Skip `/* ... *\/`; reaching end of input first ends the comment */
export function skipBlockComment(state: LexerState): void {
  advance(state); // consume /
  advance(state); // consume *

  while (!isAtEnd(state)) {
    if (peek(state) === '*' && peek(state, 1) === '/') {
      advance(state);
      advance(state);
      return;
    }
    advance(state);
  }
}
