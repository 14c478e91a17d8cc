/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

export interface ParserOptions {
  /** Reject statements that omit their terminating `;` (default false) */
  requireSemicolons?: boolean | undefined;
}

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, statements, declarations
 * - parser-expr.ts: Precedence chain from assignment down to primary
 * - parser-literals.ts: Object literals
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize('let x = 1;'));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[], options?: ParserOptions) {
    this.state = createParserState(tokens, {
      requireSemicolons: options?.requireSemicolons,
    });
  }

  parse(): ProgramNode {
    return this.parseProgram();
  }
}
