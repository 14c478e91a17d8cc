/**
 * Program Execution
 *
 * Public API for executing parsed programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { getEvaluator } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { ScrawlValue } from './values.js';

/**
 * Execute a parsed program against the context's global scope.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value and the user-made global bindings
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(program, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to inspect state between top-level statements.
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = program.body;
  const total = statements.length;
  const evaluator = getEvaluator(context);
  let index = 0;
  let lastValue: ScrawlValue = null;
  let isDone = total === 0;

  const collectVariables = (): Record<string, ScrawlValue> => {
    const bindings: [string, ScrawlValue][] = [];
    for (const [name, value] of context.global.entries()) {
      if (!context.seeded.has(name)) bindings.push([name, value]);
    }
    return Object.fromEntries(bindings);
  };

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const value = evaluator.evaluate(stmt, context.global);
        if (stmt.type !== 'Comment') lastValue = value;

        context.observability.onStepEnd?.({
          index,
          total,
          value,
          durationMs: Date.now() - startTime,
        });

        index++;
        isDone = index >= total;

        return { value, done: isDone, index: index - 1, total };
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return { value: lastValue, variables: collectVariables() };
    },
  };
}
