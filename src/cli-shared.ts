/**
 * CLI Shared Utilities
 * Argument parsing and formatting for the scrawl binary
 */

import type { ProgramNode } from './types.js';
import { LexerError, ParseError, RuntimeError, ScrawlError } from './types.js';
import { formatValue, type ScrawlValue } from './runtime/index.js';

export type CliCommand =
  | { mode: 'repl' }
  | { mode: 'eval'; source: string }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command.
 * --help and --version win in any position; other flags are rejected.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  for (const arg of argv) {
    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  const [source, ...rest] = argv;
  if (source === undefined) {
    return { mode: 'repl' };
  }
  if (rest.length > 0) {
    throw new Error(
      `Expected a single source argument, got ${argv.length} (quote the program)`
    );
  }
  return { mode: 'eval', source };
}

/**
 * Convert execution result to human-readable string
 */
export function formatOutput(value: ScrawlValue): string {
  return formatValue(value);
}

/** Parsed program as indented JSON */
export function formatAst(program: ProgramNode): string {
  return JSON.stringify(program, null, 2);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (!(err instanceof ScrawlError)) {
    return err.message;
  }

  const { message } = err.toData();
  const label =
    err instanceof LexerError
      ? 'Lexer error'
      : err instanceof ParseError
        ? 'Parse error'
        : err instanceof RuntimeError
          ? 'Runtime error'
          : 'Error';

  if (err.location) {
    const { line, column } = err.location;
    return `${label} at line ${line}, column ${column}: ${message} [${err.errorId}]`;
  }
  return `${label}: ${message} [${err.errorId}]`;
}
