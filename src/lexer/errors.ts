/**
 * Lexer Errors
 */

import { ERROR_REGISTRY, LoxError } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends LoxError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);

    if (!definition || definition.category !== 'lexer') {
      throw new TypeError(`Unknown lexer error ID: ${errorId}`);
    }

    super({
      errorId,
      message: definition.messageTemplate,
      location,
      context,
    });

    this.name = 'LexerError';
    this.location = location;
  }
}
