/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins.
 *
 * @internal
 */

import type {
  AssignmentExprNode,
  ASTNode,
  BinaryExprNode,
  CallExprNode,
  FnDeclarationNode,
  IdentifierNode,
  NumericLiteralNode,
  ObjectLiteralNode,
  SourceLocation,
  StatementNode,
  VarDeclarationNode,
} from '../../../types.js';
import type { Environment } from '../environment.js';
import type { RuntimeContext } from '../types.js';
import type { ScrawlValue } from '../values.js';

function requiresComposition(method: string, mixin: string): never {
  throw new Error(
    `${method} requires full Evaluator composition with ${mixin}`
  );
}

/**
 * Base class for the evaluator.
 *
 * The evaluate* stubs let each mixin call methods provided by the others.
 * Each is replaced by the mixin named in its error once the Evaluator is
 * composed.
 */
export class EvaluatorBase {
  constructor(protected ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  protected getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  protected emitDeclare(
    name: string,
    value: ScrawlValue,
    constant: boolean
  ): void {
    this.ctx.observability.onDeclare?.({ name, value, constant });
  }

  evaluate(_node: ASTNode, _env: Environment): ScrawlValue {
    return requiresComposition('evaluate', 'CoreMixin');
  }

  protected evaluateStatements(
    _statements: readonly StatementNode[],
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateStatements', 'CoreMixin');
  }

  protected evaluateNumericLiteral(_node: NumericLiteralNode): ScrawlValue {
    return requiresComposition('evaluateNumericLiteral', 'LiteralsMixin');
  }

  protected evaluateObjectLiteral(
    _node: ObjectLiteralNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateObjectLiteral', 'LiteralsMixin');
  }

  protected evaluateIdentifier(
    _node: IdentifierNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateIdentifier', 'VariablesMixin');
  }

  protected evaluateAssignment(
    _node: AssignmentExprNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateAssignment', 'VariablesMixin');
  }

  protected evaluateVarDeclaration(
    _node: VarDeclarationNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateVarDeclaration', 'VariablesMixin');
  }

  protected evaluateFnDeclaration(
    _node: FnDeclarationNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateFnDeclaration', 'ClosuresMixin');
  }

  protected evaluateCallExpr(
    _node: CallExprNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateCallExpr', 'ClosuresMixin');
  }

  protected evaluateBinaryExpr(
    _node: BinaryExprNode,
    _env: Environment
  ): ScrawlValue {
    return requiresComposition('evaluateBinaryExpr', 'ExpressionsMixin');
  }
}
