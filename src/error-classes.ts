/**
 * Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import type { Token } from './token-types.js';
import { TOKEN_TYPES } from './token-types.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// CALL FRAME
// ============================================================

/** One active function invocation, innermost last */
export interface CallFrame {
  /** Location of the call's closing paren */
  readonly location: SourceLocation;
  readonly functionName: string;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LoxErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Look up a definition and check it belongs to the expected category.
 * @throws TypeError for unknown IDs or IDs from another category
 */
function lookupDefinition(
  errorId: string,
  category: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all interpreter diagnostics.
 * Provides structured data for host applications to format as needed.
 */
export class LoxError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LoxErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LoxError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LoxErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LoxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Where-clause of a diagnostic line: " at end" for EOF,
 * " at 'lexeme'" for any other token.
 */
export function describeToken(token: Token): string {
  return token.type === TOKEN_TYPES.EOF ? ' at end' : ` at '${token.lexeme}'`;
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors, anchored at the offending token */
export class ParseError extends LoxError {
  readonly token: Token;

  constructor(
    errorId: string,
    token: Token,
    context: Record<string, unknown> = {}
  ) {
    const definition = lookupDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location: token.span.start,
      context,
    });
    this.name = 'ParseError';
    this.token = token;
  }
}

/**
 * Runtime execution errors.
 * The token is absent only for failures raised outside any call site.
 */
export class RuntimeError extends LoxError {
  readonly token: Token | undefined;
  /** Invocations active where the error was raised, innermost last */
  callStack: readonly CallFrame[] | undefined;

  constructor(
    errorId: string,
    token?: Token,
    context: Record<string, unknown> = {}
  ) {
    const definition = lookupDefinition(errorId, 'runtime');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location: token?.span.start,
      context,
    });
    this.name = 'RuntimeError';
    this.token = token;
    this.callStack = undefined;
  }
}
