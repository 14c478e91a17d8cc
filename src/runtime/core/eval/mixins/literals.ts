/**
 * LiteralsMixin: Numbers and Object Literals
 *
 * Error Handling:
 * - Non-ASCII numeric text throws InvalidNumericLiteral
 * - Values outside the signed 64-bit range throw IntegerOverflow
 *
 * @internal
 */

import type {
  NumericLiteralNode,
  ObjectLiteralNode,
} from '../../../../types.js';
import type { Environment } from '../../environment.js';
import { parseIntegerLiteral } from '../../integers.js';
import { createDict, type ScrawlValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createLiteralsMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class LiteralsEvaluator extends Base {
    protected override evaluateNumericLiteral(
      node: NumericLiteralNode
    ): ScrawlValue {
      return parseIntegerLiteral(node.value, this.getNodeLocation(node));
    }

    /**
     * Properties in source order. Shorthand keys resolve as variables;
     * a repeated key keeps its first position and its last value.
     */
    protected override evaluateObjectLiteral(
      node: ObjectLiteralNode,
      env: Environment
    ): ScrawlValue {
      const entries: [string, ScrawlValue][] = [];
      for (const property of node.properties) {
        const value =
          property.value === null
            ? env.lookup(property.key, this.getNodeLocation(property))
            : this.evaluate(property.value, env);
        entries.push([property.key, value]);
      }
      return createDict(entries);
    }
  };
}

export const LiteralsMixin = createLiteralsMixin;
