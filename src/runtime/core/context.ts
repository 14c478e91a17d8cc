/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for execution.
 * Public API for host applications.
 */

import { createBuiltins } from '../ext/builtins.js';
import { createGlobalEnvironment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import { formatValue } from './values.js';

export const DEFAULT_MAX_CALL_DEPTH = 1000;

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (value) => {
    console.log(formatValue(value));
  },
};

/**
 * Create a runtime context.
 * This is the main entry point for configuring the runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new Error(
      `maxCallDepth must be a positive integer, got ${maxCallDepth}`
    );
  }

  if (options.environment !== undefined && options.builtins !== undefined) {
    throw new Error(
      'builtins cannot be combined with environment; declare them in the supplied scope'
    );
  }

  const callbacks: RuntimeCallbacks = {
    ...defaultCallbacks,
    ...options.callbacks,
  };

  const global =
    options.environment ??
    createGlobalEnvironment(options.builtins ?? createBuiltins(callbacks));
  const seeded = new Set<string>();
  for (const [name] of global.entries()) {
    seeded.add(name);
  }

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      global.declare(name, value);
    }
  }

  return {
    global,
    seeded,
    callbacks,
    observability: options.observability ?? {},
    maxCallDepth,
    callDepth: 0,
  };
}
