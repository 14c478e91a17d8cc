/**
 * Evaluation Public API
 *
 * Functional wrapper around the class-based Evaluator.
 */

import type { ASTNode } from '../../../types.js';
import { createRuntimeContext } from '../context.js';
import type { Environment } from '../environment.js';
import type { RuntimeContext } from '../types.js';
import type { ScrawlValue } from '../values.js';
import { getEvaluator } from './evaluator.js';

/**
 * Default contexts for evaluate() calls made without one.
 * Entries go away with their Environment.
 */
const defaultContexts = new WeakMap<Environment, RuntimeContext>();

/**
 * Context that wraps `env` as its global scope, created on first use.
 */
export function getDefaultContext(env: Environment): RuntimeContext {
  let ctx = defaultContexts.get(env);
  if (!ctx) {
    ctx = createRuntimeContext({ environment: env });
    defaultContexts.set(env, ctx);
  }
  return ctx;
}

/**
 * Evaluate a node against `env`.
 *
 * Without a context, the default one for `env` is used.
 */
export function evaluate(
  node: ASTNode,
  env: Environment,
  ctx: RuntimeContext = getDefaultContext(env)
): ScrawlValue {
  return getEvaluator(ctx).evaluate(node, env);
}

export { getEvaluator } from './evaluator.js';
