/**
 * VariablesMixin: Lookup, Assignment and Declaration
 *
 * Error Handling:
 * - Unknown names throw VariableNotFound
 * - Assigning to a non-identifier throws InvalidAssignment
 * - Redeclaring in one scope throws RedeclareVariable
 * - Assigning to a constant throws ReassignConstant
 *
 * @internal
 */

import type {
  AssignmentExprNode,
  IdentifierNode,
  VarDeclarationNode,
} from '../../../../types.js';
import { ERROR_IDS, runtimeError } from '../../../../types.js';
import type { Environment } from '../../environment.js';
import type { ScrawlValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createVariablesMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class VariablesEvaluator extends Base {
    protected override evaluateIdentifier(
      node: IdentifierNode,
      env: Environment
    ): ScrawlValue {
      return env.lookup(node.name, this.getNodeLocation(node));
    }

    /** The target is checked before the right-hand side runs */
    protected override evaluateAssignment(
      node: AssignmentExprNode,
      env: Environment
    ): ScrawlValue {
      const { assignee } = node;

      if (assignee.type !== 'Identifier') {
        throw runtimeError(
          ERROR_IDS.INVALID_ASSIGNMENT,
          { nodeType: assignee.type },
          this.getNodeLocation(assignee)
        );
      }

      const value = this.evaluate(node.value, env);
      return env.assign(assignee.name, value, this.getNodeLocation(node));
    }

    protected override evaluateVarDeclaration(
      node: VarDeclarationNode,
      env: Environment
    ): ScrawlValue {
      const value =
        node.value === null ? null : this.evaluate(node.value, env);

      env.declare(
        node.identifier,
        value,
        node.constant,
        this.getNodeLocation(node)
      );
      this.emitDeclare(node.identifier, value, node.constant);
      return value;
    }
  };
}

export const VariablesMixin = createVariablesMixin;
