/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ParseError, StatementResult, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into statement results.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program loop, recovery, declarations, simple statements
 * - parser-control.ts: Blocks, if, while, for, break, return
 * - parser-functions.ts: Function declarations and call expressions
 * - parser-expr.ts: Precedence chain and primary expressions
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const statements = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse every top-level declaration, recovering after errors.
   */
  parse(): StatementResult[] {
    return this.parseProgram();
  }

  /**
   * Get collected errors.
   */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
