/**
 * ClosuresMixin: Function Declaration and Invocation
 *
 * Script functions capture their defining scope by reference and run each
 * call in a fresh child of it. Native functions receive the caller's scope.
 *
 * Error Handling:
 * - Calling a non-function throws ValueNotAFunction
 * - Wrong argument count for a script function throws ArityMismatch
 * - Nesting beyond maxCallDepth throws CallDepthExceeded
 *
 * @internal
 */

import type {
  CallExprNode,
  FnDeclarationNode,
  SourceLocation,
} from '../../../../types.js';
import { ERROR_IDS, RuntimeError, runtimeError } from '../../../../types.js';
import {
  isCallable,
  scriptCallable,
  type NativeCallable,
  type ScriptCallable,
} from '../../callable.js';
import type { Environment } from '../../environment.js';
import { formatValue, type ScrawlValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createClosuresMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class ClosuresEvaluator extends Base {
    /** Binds the function as a constant and returns it */
    protected override evaluateFnDeclaration(
      node: FnDeclarationNode,
      env: Environment
    ): ScrawlValue {
      const fn = scriptCallable(node.name, node.parameters, node.body, env);
      env.declare(node.name, fn, true, this.getNodeLocation(node));
      this.emitDeclare(node.name, fn, true);
      return fn;
    }

    /** Arguments left to right, then the caller */
    protected override evaluateCallExpr(
      node: CallExprNode,
      env: Environment
    ): ScrawlValue {
      const args = node.args.map((arg) => this.evaluate(arg, env));
      const callee = this.evaluate(node.caller, env);
      const location = this.getNodeLocation(node);

      if (!isCallable(callee)) {
        throw runtimeError(
          ERROR_IDS.VALUE_NOT_A_FUNCTION,
          { value: formatValue(callee) },
          location
        );
      }

      const startTime = performance.now();
      const value =
        callee.kind === 'native'
          ? this.invokeNative(callee, args, env, location)
          : this.invokeScript(callee, args, location);

      this.ctx.observability.onFunctionReturn?.({
        name: callee.name,
        value,
        durationMs: performance.now() - startTime,
      });
      return value;
    }

    protected invokeNative(
      callee: NativeCallable,
      args: ScrawlValue[],
      env: Environment,
      location: SourceLocation | undefined
    ): ScrawlValue {
      this.ctx.observability.onHostCall?.({ name: callee.name, args });
      try {
        return callee.fn(args, env);
      } catch (error) {
        if (error instanceof RuntimeError) {
          throw error.withLocation(location);
        }
        throw error;
      }
    }

    protected invokeScript(
      callee: ScriptCallable,
      args: ScrawlValue[],
      location: SourceLocation | undefined
    ): ScrawlValue {
      if (args.length !== callee.params.length) {
        throw runtimeError(
          ERROR_IDS.ARITY_MISMATCH,
          {
            name: callee.name,
            expected: callee.params.length,
            actual: args.length,
          },
          location
        );
      }

      if (this.ctx.callDepth >= this.ctx.maxCallDepth) {
        throw runtimeError(
          ERROR_IDS.CALL_DEPTH_EXCEEDED,
          { limit: this.ctx.maxCallDepth, name: callee.name },
          location
        );
      }

      const scope = callee.definingScope.child();
      callee.params.forEach((param, i) => {
        scope.declare(param, args[i] ?? null, false, location);
      });

      this.ctx.callDepth++;
      try {
        return this.evaluateStatements(callee.body, scope);
      } finally {
        this.ctx.callDepth--;
      }
    }
  };
}

export const ClosuresMixin = createClosuresMixin;
