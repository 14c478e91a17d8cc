/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const NUMERIC = /^\p{N}$/u;
const ALPHABETIC = /^\p{Alphabetic}$/u;
const WHITESPACE = /^\s$/u;

export function isNumeric(ch: string): boolean {
  return NUMERIC.test(ch);
}

export function isAlphabetic(ch: string): boolean {
  return ALPHABETIC.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return isAlphabetic(ch);
}

/** Identifiers continue with letters and underscores; digits end them */
export function isIdentifierChar(ch: string): boolean {
  return isAlphabetic(ch) || ch === '_';
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, currentLocation(state));
}
