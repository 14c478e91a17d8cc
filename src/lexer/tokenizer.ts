/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { ERROR_IDS, lexerError, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isIdentifierStart,
  isNumeric,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import {
  readBlockComment,
  readIdentifier,
  readLineComment,
  readNumber,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Slash: comment or division
  if (ch === '/') {
    const next = peek(state, 1);
    if (next === '/') return readLineComment(state);
    if (next === '*') return readBlockComment(state);
    return advanceAndMakeToken(
      state,
      1,
      TOKEN_TYPES.BINARY_OPERATOR,
      ch,
      start
    );
  }

  if (isNumeric(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw lexerError(ERROR_IDS.UNEXPECTED_CHARACTER, { char: ch }, start);
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
