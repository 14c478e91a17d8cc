/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Shared utilities and dispatch stubs
 * 2. CoreMixin - Node dispatch, statement sequences
 * 3. LiteralsMixin - Numbers, object literals
 * 4. VariablesMixin - Lookup, assignment, declarations
 * 5. ClosuresMixin - Function declarations and calls
 * 6. ExpressionsMixin - Binary arithmetic
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import type { RuntimeContext } from '../types.js';

export const Evaluator = ExpressionsMixin(
  ClosuresMixin(VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase))))
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 * Entries go away with their RuntimeContext.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
