/**
 * Scrawl Runtime
 *
 * Public API for evaluating programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: ScrawlValue and value utilities
 *   - callable.ts: Function values and type guards
 *   - integers.ts: Signed 64-bit arithmetic
 *   - environment.ts: Scope chain
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator
 * - ext/: Built-in function registry
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  DeclareEvent,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES AND CALLABLES
// ============================================================

export {
  createDict,
  formatValue,
  inferType,
  isDict,
  isNumber,
  type ScrawlDict,
  type ScrawlTypeName,
  type ScrawlValue,
} from './core/values.js';
export {
  isCallable,
  isNativeCallable,
  isScriptCallable,
  native,
  type NativeCallable,
  type NativeFn,
  type ScrawlCallable,
  type ScriptCallable,
} from './core/callable.js';
export {
  applyOperator,
  checkRange,
  INT64_MAX,
  INT64_MIN,
  parseIntegerLiteral,
} from './core/integers.js';

// ============================================================
// SCOPES, CONTEXT AND EXECUTION
// ============================================================

export {
  createGlobalEnvironment,
  Environment,
  type BuiltinRegistry,
} from './core/environment.js';
export {
  createRuntimeContext,
  DEFAULT_MAX_CALL_DEPTH,
} from './core/context.js';
export { createStepper, execute } from './core/execute.js';
export {
  evaluate,
  getDefaultContext,
  getEvaluator,
} from './core/eval/index.js';
export { createBuiltins } from './ext/builtins.js';
