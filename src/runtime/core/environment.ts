/**
 * Environment
 *
 * Chained variable scopes. A slot holding `undefined` is declared but
 * not yet assigned. Closures keep their defining environment reachable
 * by holding a reference to it.
 */

import type { Token } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { LoxValue } from './values.js';

/** Result of resolving a name through the scope chain */
export type Lookup =
  | { readonly found: false }
  | { readonly found: true; readonly value: LoxValue | undefined };

export class Environment {
  private readonly values = new Map<string, LoxValue | undefined>();

  constructor(readonly enclosing: Environment | null = null) {}

  /** Bind in this scope only; redefinition overwrites */
  define(name: string, value: LoxValue | undefined): void {
    this.values.set(name, value);
  }

  /** True when this scope (not an enclosing one) binds the name */
  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Resolve a name outward through the chain */
  lookup(name: string): Lookup {
    for (let env: Environment | null = this; env; env = env.enclosing) {
      if (env.values.has(name)) {
        return { found: true, value: env.values.get(name) };
      }
    }
    return { found: false };
  }

  /**
   * Read a variable.
   * @throws RuntimeError when the name is unbound or still uninitialized
   */
  get(name: Token): LoxValue {
    const result = this.lookup(name.lexeme);
    if (!result.found) {
      throw new RuntimeError('LOX-R001', name, { name: name.lexeme });
    }
    if (result.value === undefined) {
      throw new RuntimeError('LOX-R002', name, { name: name.lexeme });
    }
    return result.value;
  }

  /**
   * Update the innermost existing binding. Never creates a binding.
   * @throws RuntimeError when no scope in the chain binds the name
   */
  assign(name: Token, value: LoxValue): void {
    for (let env: Environment | null = this; env; env = env.enclosing) {
      if (env.values.has(name.lexeme)) {
        env.values.set(name.lexeme, value);
        return;
      }
    }
    throw new RuntimeError('LOX-R001', name, { name: name.lexeme });
  }

  /** Names bound in this scope, in definition order */
  names(): string[] {
    return [...this.values.keys()];
  }
}
