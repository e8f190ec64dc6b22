/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LOX-{category}{3-digit} (e.g., LOX-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (LOX-L0xx)
  {
    errorId: 'LOX-L001',
    category: 'lexer',
    description: 'Unterminated string',
    messageTemplate: 'Unterminated string',
  },
  {
    errorId: 'LOX-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character',
  },

  // Parse Errors (LOX-P0xx)
  {
    errorId: 'LOX-P001',
    category: 'parse',
    description: 'Expression expected',
    messageTemplate: 'Expect expression.',
  },
  {
    errorId: 'LOX-P002',
    category: 'parse',
    description: 'Binary operator without left operand',
    messageTemplate: 'Missing left-hand operand.',
  },
  {
    errorId: 'LOX-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target.',
  },
  {
    errorId: 'LOX-P004',
    category: 'parse',
    description: 'Too many arguments or parameters',
    messageTemplate: "Can't have more than {limit} {kind}.",
  },
  {
    errorId: 'LOX-P005',
    category: 'parse',
    description: 'Expected token missing',
    messageTemplate: '{message}',
  },
  {
    errorId: 'LOX-P006',
    category: 'parse',
    description: 'break outside of loop',
    messageTemplate: "Can't use 'break' outside of a loop.",
  },

  // Runtime Errors (LOX-R0xx)
  {
    errorId: 'LOX-R001',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: "Undefined variable '{name}'.",
  },
  {
    errorId: 'LOX-R002',
    category: 'runtime',
    description: 'Uninitialized variable',
    messageTemplate: "Uninitialized variable '{name}'.",
  },
  {
    errorId: 'LOX-R003',
    category: 'runtime',
    description: 'Operands must be numbers',
    messageTemplate: 'Operands must be numbers.',
  },
  {
    errorId: 'LOX-R004',
    category: 'runtime',
    description: 'Operand must be a number',
    messageTemplate: 'Operand must be a number.',
  },
  {
    errorId: 'LOX-R005',
    category: 'runtime',
    description: 'Invalid operands for +',
    messageTemplate: 'Operands must be two numbers or two strings.',
  },
  {
    errorId: 'LOX-R006',
    category: 'runtime',
    description: 'Callee is not callable',
    messageTemplate: 'Can only call functions and classes.',
  },
  {
    errorId: 'LOX-R007',
    category: 'runtime',
    description: 'Argument count mismatch',
    messageTemplate: 'Expected {expected} arguments but got {actual}.',
  },
  {
    errorId: 'LOX-R008',
    category: 'runtime',
    description: 'Input read failure',
    messageTemplate: 'Error reading from stdin.',
  },
  {
    errorId: 'LOX-R009',
    category: 'runtime',
    description: 'Call depth exceeded',
    messageTemplate: 'Stack overflow.',
  },
  {
    errorId: 'LOX-R010',
    category: 'runtime',
    description: 'Native function failure',
    messageTemplate: "Native function '{name}' failed: {reason}",
  },
];

/** Immutable error registry. */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} with context values.
 * Missing placeholders render as empty strings. An unclosed brace returns
 * the template unchanged.
 *
 * @example
 * renderMessage("Undefined variable '{name}'.", { name: "x" })
 * // Returns: "Undefined variable 'x'."
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
