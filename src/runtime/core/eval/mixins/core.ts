/**
 * CoreMixin: Main Dispatch
 *
 * Entry points for evaluation. Dispatches on node type to the specialized
 * evaluators of the other mixins.
 *
 * Error Handling:
 * - Node types with no evaluation rule throw UnexpectedStatement
 *
 * @internal
 */

import type { ASTNode, StatementNode } from '../../../../types.js';
import { ERROR_IDS, runtimeError } from '../../../../types.js';
import type { Environment } from '../../environment.js';
import type { ScrawlValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

/**
 * CoreMixin implementation.
 *
 * Depends on:
 * - LiteralsMixin: evaluateNumericLiteral(), evaluateObjectLiteral()
 * - VariablesMixin: evaluateIdentifier(), evaluateAssignment(), evaluateVarDeclaration()
 * - ClosuresMixin: evaluateFnDeclaration(), evaluateCallExpr()
 * - ExpressionsMixin: evaluateBinaryExpr()
 */
function createCoreMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class CoreEvaluator extends Base {
    /** Evaluate any node against `env` */
    override evaluate(node: ASTNode, env: Environment): ScrawlValue {
      switch (node.type) {
        case 'Program':
          return this.evaluateStatements(node.body, env);
        case 'Comment':
          return null;
        case 'NumericLiteral':
          return this.evaluateNumericLiteral(node);
        case 'ObjectLiteral':
          return this.evaluateObjectLiteral(node, env);
        case 'Identifier':
          return this.evaluateIdentifier(node, env);
        case 'AssignmentExpr':
          return this.evaluateAssignment(node, env);
        case 'VarDeclaration':
          return this.evaluateVarDeclaration(node, env);
        case 'FnDeclaration':
          return this.evaluateFnDeclaration(node, env);
        case 'CallExpr':
          return this.evaluateCallExpr(node, env);
        case 'BinaryExpr':
          return this.evaluateBinaryExpr(node, env);
        case 'MemberExpr':
        case 'Property':
          throw runtimeError(
            ERROR_IDS.UNEXPECTED_STATEMENT,
            { nodeType: node.type },
            this.getNodeLocation(node)
          );
      }
    }

    /**
     * Statements in order against one scope.
     * Comments leave the running result untouched; empty bodies give null.
     */
    protected override evaluateStatements(
      statements: readonly StatementNode[],
      env: Environment
    ): ScrawlValue {
      let last: ScrawlValue = null;
      for (const statement of statements) {
        const value = this.evaluate(statement, env);
        if (statement.type !== 'Comment') last = value;
      }
      return last;
    }
  };
}

export const CoreMixin = createCoreMixin;
