/**
 * Built-in Functions
 *
 * Default native registry for the global scope. Hosts can pass their own
 * registry to createRuntimeContext or createGlobalEnvironment instead.
 */

import { native } from '../core/callable.js';
import type { BuiltinRegistry } from '../core/environment.js';
import type { RuntimeCallbacks } from '../core/types.js';

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

/**
 * print(...values) sends each argument to onLog and returns null.
 * time() is a placeholder that always returns 0.
 */
export function createBuiltins(callbacks: RuntimeCallbacks): BuiltinRegistry {
  return {
    print: native('print', (args) => {
      for (const arg of args) {
        callbacks.onLog(arg);
      }
      return null;
    }),
    time: native('time', () => 0n),
  };
}
