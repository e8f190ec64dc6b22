/**
 * treelox
 * Exports lexer, parser, runtime, and AST types
 */

export {
  KEYWORDS,
  LexerError,
  nextToken,
  tokenize,
  type TokenizeResult,
} from './lexer/index.js';
export {
  MAX_ARITY,
  parse,
  parseSource,
  Parser,
  type ParseSourceResult,
} from './parser/index.js';
export * from './runtime/index.js';

// ============================================================
// SHARED MODEL AND ERROR TAXONOMY
// ============================================================
export * from './types.js';
