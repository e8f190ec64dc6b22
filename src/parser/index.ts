/**
 * Parser
 * Main entry point and re-exports
 */

import { tokenize, type LexerError } from '../lexer/index.js';
import type { ParseResult, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token sequence into one result per top-level declaration.
 *
 * Never throws on syntax errors: each failed declaration is reported and
 * parsing resumes at the next statement boundary.
 *
 * @example
 * ```typescript
 * const result = parse(tokenize(source).tokens);
 * if (!result.success) {
 *   console.log('Errors:', result.errors);
 * }
 * ```
 */
export function parse(tokens: Token[]): ParseResult {
  const parser = new Parser(tokens);
  const statements = parser.parse();

  return {
    statements,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

export interface ParseSourceResult extends ParseResult {
  readonly tokens: Token[];
  readonly lexErrors: LexerError[];
}

/**
 * Tokenize and parse source text in one step. The parser runs even when
 * the lexer reported errors; callers decide whether to use the result.
 */
export function parseSource(source: string): ParseSourceResult {
  const { tokens, errors: lexErrors } = tokenize(source);
  return { ...parse(tokens), tokens, lexErrors };
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

export { MAX_ARITY } from './parser-functions.js';
