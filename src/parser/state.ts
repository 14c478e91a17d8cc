/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { ERROR_IDS, parseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Every statement except comments and functions must end with `;` */
  readonly requireSemicolons: boolean;
}

export interface ParserStateOptions {
  requireSemicolons?: boolean | undefined;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    requireSemicolons: options.requireSemicolons ?? false,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** End of the most recently consumed token */
export function previousEnd(state: ParserState): SourceLocation {
  const token = state.tokens[state.pos - 1] ?? current(state);
  return token.span.end;
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type.
 * Reaching EOF instead is UnexpectedEnd; any other token is ExpectedToken.
 * @internal
 */
export function expect(
  state: ParserState,
  type: string,
  context: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  if (token.type === TOKEN_TYPES.EOF) {
    throw parseError(
      ERROR_IDS.UNEXPECTED_END,
      { expected: type },
      token.span.start
    );
  }
  throw parseError(
    ERROR_IDS.EXPECTED_TOKEN,
    { expected: type, actual: token.type, context },
    token.span.start
  );
}

// ============================================================
// SPAN HELPERS
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
