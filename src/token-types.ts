import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Single-character tokens
  LEFT_PAREN: 'LEFT_PAREN', // (
  RIGHT_PAREN: 'RIGHT_PAREN', // )
  LEFT_BRACE: 'LEFT_BRACE', // {
  RIGHT_BRACE: 'RIGHT_BRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *
  QUESTION: 'QUESTION', // ? (ternary)
  COLON: 'COLON', // : (ternary)

  // One or two character tokens
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  BREAK: 'BREAK',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FOR: 'FOR',
  FUN: 'FUN',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Scalar carried by STRING (unquoted text) and NUMBER tokens */
export type TokenLiteral = string | number | null;

export interface Token {
  readonly type: TokenType;
  /** Exact source slice the token was scanned from */
  readonly lexeme: string;
  readonly literal: TokenLiteral;
  readonly span: SourceSpan;
}
