/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { EQUAL_SUFFIXED, SINGLE_CHAR_OPERATORS } from './operators.js';
import {
  readIdentifier,
  readNumber,
  readString,
  skipBlockComment,
  skipLineComment,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  match,
  peek,
} from './state.js';

export interface TokenizeResult {
  /** Always terminated by a single EOF token */
  readonly tokens: Token[];
  readonly errors: LexerError[];
}

/** Skip whitespace and comments until the next significant character */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '/' && peek(state, 1) === '/') {
      skipLineComment(state);
    } else if (ch === '/' && peek(state, 1) === '*') {
      skipBlockComment(state);
    } else {
      return;
    }
  }
}

/**
 * Scan one token. Throws LexerError for malformed input, leaving the
 * cursor past the offending text so scanning can resume.
 */
export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  const start = currentLocation(state);

  if (isAtEnd(state)) {
    return makeToken(state, TOKEN_TYPES.EOF, start);
  }

  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  advance(state);

  const pair = EQUAL_SUFFIXED[ch];
  if (pair) {
    const [single, double] = pair;
    return makeToken(state, match(state, '=') ? double : single, start);
  }

  if (ch === '/') {
    return makeToken(state, TOKEN_TYPES.SLASH, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return makeToken(state, singleCharType, start);
  }

  // Characters outside the BMP span two code units
  const character = String.fromCodePoint(
    state.source.codePointAt(start.offset) ?? 0
  );
  for (let unit = 1; unit < character.length; unit++) {
    advance(state);
  }
  throw new LexerError('LOX-L002', start, { character });
}

/**
 * Scan the whole source. Lexical errors are collected and scanning
 * continues, so every error in the input is reported.
 */
export function tokenize(source: string): TokenizeResult {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  const errors: LexerError[] = [];

  for (;;) {
    let token: Token;
    try {
      token = nextToken(state);
    } catch (err) {
      if (err instanceof LexerError) {
        errors.push(err);
        continue;
      }
      throw err;
    }

    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return { tokens, errors };
}
