/**
 * Callable Types
 *
 * Function values:
 * - ScriptCallable: declared with `fn` in source
 * - NativeCallable: supplied by the host or the built-in registry
 *
 * Public API for host applications.
 */

import type { StatementNode } from '../../types.js';
import type { Environment } from './environment.js';
import type { ScrawlValue } from './values.js';

/** Native function signature: positional arguments and the calling scope */
export type NativeFn = (args: ScrawlValue[], env: Environment) => ScrawlValue;

interface CallableBase {
  readonly __type: 'callable';
  readonly name: string;
}

/**
 * Function declared in source.
 * `definingScope` is shared, not copied: bindings added to it later
 * (including the function's own name) are visible to the body.
 */
export interface ScriptCallable extends CallableBase {
  readonly kind: 'script';
  readonly params: readonly string[];
  readonly body: readonly StatementNode[];
  readonly definingScope: Environment;
}

export interface NativeCallable extends CallableBase {
  readonly kind: 'native';
  readonly fn: NativeFn;
}

export type ScrawlCallable = ScriptCallable | NativeCallable;

export function isCallable(
  value: ScrawlValue | undefined
): value is ScrawlCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__type' in value &&
    value.__type === 'callable'
  );
}

export function isScriptCallable(
  value: ScrawlValue | undefined
): value is ScriptCallable {
  return isCallable(value) && value.kind === 'script';
}

export function isNativeCallable(
  value: ScrawlValue | undefined
): value is NativeCallable {
  return isCallable(value) && value.kind === 'native';
}

/**
 * Wrap a host function as a callable value.
 *
 * @example
 * const double = native('double', ([n]) => (typeof n === 'bigint' ? n * 2n : null));
 */
export function native(name: string, fn: NativeFn): NativeCallable {
  return Object.freeze({ __type: 'callable', kind: 'native', name, fn });
}

export function scriptCallable(
  name: string,
  params: readonly string[],
  body: readonly StatementNode[],
  definingScope: Environment
): ScriptCallable {
  return Object.freeze({
    __type: 'callable',
    kind: 'script',
    name,
    params,
    body,
    definingScope,
  });
}
