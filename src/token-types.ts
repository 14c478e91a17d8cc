import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  NUMBER: 'NUMBER',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Operators
  BINARY_OPERATOR: 'BINARY_OPERATOR', // + - * / %
  EQUALS: 'EQUALS', // =
  DOT: 'DOT', // .
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;
  COMMA: 'COMMA', // ,

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Keywords
  LET: 'LET',
  CONST: 'CONST',
  FN: 'FN',

  // Reserved keywords (no grammar yet)
  STRUCT: 'STRUCT',
  ENUM: 'ENUM',
  RETURN: 'RETURN',
  IF: 'IF',
  ELSE: 'ELSE',

  // Special
  COMMENT: 'COMMENT',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}
