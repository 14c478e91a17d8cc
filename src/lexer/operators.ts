/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character punctuation lookup table ('/' is handled by the tokenizer) */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ':': TOKEN_TYPES.COLON,
  ';': TOKEN_TYPES.SEMICOLON,
  ',': TOKEN_TYPES.COMMA,
  '=': TOKEN_TYPES.EQUALS,
  '.': TOKEN_TYPES.DOT,
  '+': TOKEN_TYPES.BINARY_OPERATOR,
  '-': TOKEN_TYPES.BINARY_OPERATOR,
  '*': TOKEN_TYPES.BINARY_OPERATOR,
  '%': TOKEN_TYPES.BINARY_OPERATOR,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  let: TOKEN_TYPES.LET,
  const: TOKEN_TYPES.CONST,
  fn: TOKEN_TYPES.FN,
  struct: TOKEN_TYPES.STRUCT,
  enum: TOKEN_TYPES.ENUM,
  return: TOKEN_TYPES.RETURN,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
};

export function lookupKeyword(word: string): TokenType | undefined {
  return Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined;
}
