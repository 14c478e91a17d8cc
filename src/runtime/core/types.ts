/**
 * Runtime Types
 * Context, options, callbacks, and execution results
 */

import type { BuiltinRegistry, Environment } from './environment.js';
import type { ScrawlValue } from './values.js';

/** I/O callbacks */
export interface RuntimeCallbacks {
  /** Called by print for each argument */
  onLog: (value: ScrawlValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called when let, const or fn binds a name */
  onDeclare?: (event: DeclareEvent) => void;
  /** Called before a native function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after any function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  /** Value produced by the statement */
  value: ScrawlValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

export interface DeclareEvent {
  name: string;
  value: ScrawlValue;
  constant: boolean;
}

/** Event emitted before a native function call */
export interface HostCallEvent {
  name: string;
  args: ScrawlValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  name: string;
  value: ScrawlValue;
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where the error occurred */
  index?: number | undefined;
}

/** State shared by every evaluation against one global scope */
export interface RuntimeContext {
  /** Root scope; persists across executions */
  readonly global: Environment;
  /** Names bound before any user code ran (constants, built-ins) */
  readonly seeded: ReadonlySet<string>;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  /** Nested script-function calls allowed before CallDepthExceeded */
  readonly maxCallDepth: number;
  /** Script-function calls currently on the stack */
  callDepth: number;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Native functions for the global scope (default: print and time) */
  builtins?: BuiltinRegistry | undefined;
  /** Initial variables, declared mutable in the global scope */
  variables?: Record<string, ScrawlValue> | undefined;
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  observability?: ObservabilityCallbacks | undefined;
  /** Default 1000 */
  maxCallDepth?: number | undefined;
  /**
   * Use an existing scope as the global scope instead of creating one.
   * Built-ins then come from that scope, so `print` logs through whatever
   * callbacks it was built with. Cannot be combined with `builtins`.
   */
  environment?: Environment | undefined;
}

/** Result of program execution */
export interface ExecutionResult {
  /** Value of the last non-comment statement */
  value: ScrawlValue;
  /** Global bindings made by user code, in declaration order */
  variables: Record<string, ScrawlValue>;
}

/** Result of a single step execution */
export interface StepResult {
  value: ScrawlValue;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement just executed */
  index: number;
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  readonly done: boolean;
  /** Index of the next statement (0-based) */
  readonly index: number;
  readonly total: number;
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Final result; statements not yet stepped are not run */
  getResult(): ExecutionResult;
}
