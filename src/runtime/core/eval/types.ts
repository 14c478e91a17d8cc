/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Mixins receive a base constructor and return an extended constructor.
 *
 * @internal
 */

import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 *
 * `any[]` is the form TypeScript requires for a mixin constructor.
 */
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  new (...args: any[]) => TBase;
