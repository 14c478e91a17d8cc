/**
 * Environment
 *
 * Lexical scope chain. Each scope owns its bindings and the set of names
 * declared constant; parents are shared references.
 */

import type { SourceLocation } from '../../types.js';
import { ERROR_IDS, runtimeError } from '../../types.js';
import type { NativeCallable } from './callable.js';
import type { ScrawlValue } from './values.js';

/** Named native functions installed into the global scope */
export type BuiltinRegistry = Readonly<Record<string, NativeCallable>>;

export class Environment {
  private readonly variables = new Map<string, ScrawlValue>();
  private readonly constants = new Set<string>();

  constructor(readonly parent: Environment | null = null) {}

  /**
   * Bind `name` in this scope.
   * Shadowing a binding from a parent scope is allowed.
   */
  declare(
    name: string,
    value: ScrawlValue,
    constant = false,
    location?: SourceLocation
  ): ScrawlValue {
    if (this.variables.has(name)) {
      throw runtimeError(ERROR_IDS.REDECLARE_VARIABLE, { name }, location);
    }
    this.variables.set(name, value);
    if (constant) this.constants.add(name);
    return value;
  }

  /** Update the nearest binding of `name` */
  assign(
    name: string,
    value: ScrawlValue,
    location?: SourceLocation
  ): ScrawlValue {
    const scope = this.resolve(name, location);
    if (scope.constants.has(name)) {
      throw runtimeError(ERROR_IDS.REASSIGN_CONSTANT, { name }, location);
    }
    scope.variables.set(name, value);
    return value;
  }

  lookup(name: string, location?: SourceLocation): ScrawlValue {
    const scope = this.resolve(name, location);
    const value = scope.variables.get(name);
    return value === undefined ? null : value;
  }

  /** Nearest scope that declares `name` */
  resolve(name: string, location?: SourceLocation): Environment {
    let scope: Environment | null = this;
    while (scope !== null) {
      if (scope.variables.has(name)) return scope;
      scope = scope.parent;
    }
    throw runtimeError(ERROR_IDS.VARIABLE_NOT_FOUND, { name }, location);
  }

  /** Whether this scope itself declares `name` */
  has(name: string): boolean {
    return this.variables.has(name);
  }

  isConstant(name: string): boolean {
    return this.constants.has(name);
  }

  child(): Environment {
    return new Environment(this);
  }

  /** Own bindings in declaration order */
  entries(): IterableIterator<[string, ScrawlValue]> {
    return this.variables.entries();
  }
}

/**
 * Root scope seeded with the constants true, false and null, followed by
 * the built-in registry. Every seeded name is constant.
 */
export function createGlobalEnvironment(
  builtins: BuiltinRegistry = {}
): Environment {
  const env = new Environment();
  env.declare('true', true, true);
  env.declare('false', false, true);
  env.declare('null', null, true);
  for (const [name, fn] of Object.entries(builtins)) {
    env.declare(name, fn, true);
  }
  return env;
}
