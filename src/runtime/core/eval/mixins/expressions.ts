/**
 * ExpressionsMixin: Binary Arithmetic
 *
 * Both operands are always evaluated, left first. Arithmetic applies only
 * when both are numbers; any other pairing yields null.
 *
 * Error Handling:
 * - Zero divisor for / or % throws DivisionByZero
 * - Results outside the signed 64-bit range throw IntegerOverflow
 * - Unknown operators throw InvalidOperator
 *
 * @internal
 */

import type { BinaryExprNode } from '../../../../types.js';
import type { Environment } from '../../environment.js';
import { applyOperator } from '../../integers.js';
import { isNumber, type ScrawlValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createExpressionsMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class ExpressionsEvaluator extends Base {
    protected override evaluateBinaryExpr(
      node: BinaryExprNode,
      env: Environment
    ): ScrawlValue {
      const left = this.evaluate(node.left, env);
      const right = this.evaluate(node.right, env);

      if (!isNumber(left) || !isNumber(right)) {
        return null;
      }

      return applyOperator(
        node.operator,
        left,
        right,
        this.getNodeLocation(node)
      );
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;
