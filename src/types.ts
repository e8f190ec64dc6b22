/**
 * Shared Types
 * Re-exports the token vocabulary, AST nodes and error hierarchy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';

export {
  TOKEN_TYPES,
  type Token,
  type TokenLiteral,
  type TokenType,
} from './token-types.js';

export type * from './ast-nodes.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

export {
  describeToken,
  LoxError,
  ParseError,
  RuntimeError,
  type CallFrame,
  type LoxErrorData,
} from './error-classes.js';

// ============================================================
// PARSE RESULTS
// ============================================================

import type { StatementNode } from './ast-nodes.js';
import type { ParseError } from './error-classes.js';

/** Outcome of parsing one top-level declaration */
export type StatementResult =
  | { readonly ok: true; readonly statement: StatementNode }
  | { readonly ok: false; readonly error: ParseError };

export interface ParseResult {
  /** One entry per top-level declaration, in source order */
  readonly statements: StatementResult[];
  readonly errors: ParseError[];
  /** True when no declaration failed */
  readonly success: boolean;
}
