/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

/**
 * Scanner position over the source's code points.
 * `pos` and `column` count code points, so astral characters occupy one slot.
 */
export interface LexerState {
  readonly chars: readonly string[];
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    chars: Array.from(source),
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.chars[state.pos + offset] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.chars[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}
