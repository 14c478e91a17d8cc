/**
 * Scrawl Module
 * Exports lexer, parser, runtime, and AST types
 */

import { parse, type ParserOptions } from './parser/index.js';
import { createRuntimeContext } from './runtime/core/context.js';
import { execute } from './runtime/core/execute.js';
import type {
  ExecutionResult,
  RuntimeContext,
  RuntimeOptions,
} from './runtime/core/types.js';

export { tokenize } from './lexer/index.js';
export { parse, Parser, type ParserOptions } from './parser/index.js';
export * from './runtime/index.js';

// ============================================================
// AST AND TOKENS
// ============================================================

export type * from './ast-nodes.js';
export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================

export {
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorId,
  type ErrorRegistry,
} from './error-registry.js';
export {
  createError,
  LexerError,
  ParseError,
  RuntimeError,
  ScrawlError,
  type ScrawlErrorData,
} from './error-classes.js';

// ============================================================
// CONVENIENCE
// ============================================================

export interface RunOptions extends RuntimeOptions, ParserOptions {
  /** Evaluate against an existing context; runtime options are then ignored */
  context?: RuntimeContext | undefined;
}

/**
 * Parse and execute source in one call.
 *
 * @example
 * ```typescript
 * const { value } = run('fn add(x, y) { x + y } add(3, 4)');
 * // value === 7n
 * ```
 */
export function run(source: string, options: RunOptions = {}): ExecutionResult {
  const program = parse(source, options);
  const context = options.context ?? createRuntimeContext(options);
  return execute(program, context);
}
