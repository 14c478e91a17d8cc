/**
 * Scrawl Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ProgramNode } from '../types.js';
import { Parser, type ParserOptions } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';

/**
 * Parse source into a Program.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('let x = 5 + (4 / 3);');
 * ```
 */
export function parse(source: string, options?: ParserOptions): ProgramNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, options);
  return parser.parse();
}

export { Parser, type ParserOptions };
export type { ParserState } from './state.js';
