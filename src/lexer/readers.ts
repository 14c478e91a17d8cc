/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { isIdentifierChar, isNumeric, makeToken } from './helpers.js';
import { lookupKeyword } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Maximal run of numeric characters. No sign, decimal point or exponent. */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isNumeric(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state);

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = lookupKeyword(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}

/** `// text` up to, not including, the newline */
export function readLineComment(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume /
  advance(state); // consume /

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '\n') {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.COMMENT, value, start, currentLocation(state));
}

/**
 * `/* text *\/` ending at the first `*\/`. Block comments do not nest.
 * An unterminated comment runs to end of input.
 */
export function readBlockComment(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume /
  advance(state); // consume *

  let value = '';
  while (!isAtEnd(state)) {
    if (peek(state) === '*' && peek(state, 1) === '/') {
      advance(state);
      advance(state);
      break;
    }
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.COMMENT, value, start, currentLocation(state));
}
