/**
 * Parser Extension: Literal Parsing
 * Object literals
 */

import { Parser } from './parser.js';
import type { ObjectLiteralNode, PropertyNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  expect,
  makeSpan,
  previousEnd,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseObjectLiteral(): ObjectLiteralNode;
    parseProperty(): PropertyNode;
  }
}

/**
 * { key: expr, shorthand, nested: { a: 1 }, }
 * Trailing comma allowed.
 */
Parser.prototype.parseObjectLiteral = function (
  this: Parser
): ObjectLiteralNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE, 'Object literal').span
    .start;
  const properties: PropertyNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
    properties.push(this.parseProperty());
  }

  expect(this.state, TOKEN_TYPES.RBRACE, 'Object literal');

  return {
    type: 'ObjectLiteral',
    properties,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/**
 * One entry plus the comma that separates it from the next.
 */
Parser.prototype.parseProperty = function (this: Parser): PropertyNode {
  const keyToken = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Object key');
  const key = keyToken.value;

  // Shorthand: { key, ... } or { key }
  if (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    return { type: 'Property', key, value: null, span: keyToken.span };
  }
  if (check(this.state, TOKEN_TYPES.RBRACE)) {
    return { type: 'Property', key, value: null, span: keyToken.span };
  }

  expect(this.state, TOKEN_TYPES.COLON, 'Object property');
  const value = this.parseExpression();
  const span = makeSpan(keyToken.span.start, previousEnd(this.state));

  if (!check(this.state, TOKEN_TYPES.RBRACE)) {
    expect(this.state, TOKEN_TYPES.COMMA, 'Object property');
  }

  return { type: 'Property', key, value, span };
};

