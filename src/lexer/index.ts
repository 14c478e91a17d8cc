/**
 * Scrawl Lexer
 * Converts source text into tokens
 */

export { LexerError } from '../types.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
