/**
 * Parser Extension: Expression Parsing
 * Precedence chain, lowest to highest:
 * assignment, object-or-additive, additive, multiplicative, call-member,
 * member, primary
 */

import { Parser } from './parser.js';
import type {
  BinaryExprNode,
  CallExprNode,
  ExpressionNode,
  MemberExprNode,
} from '../types.js';
import { ERROR_IDS, parseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  previousEnd,
} from './state.js';

const ADDITIVE_OPERATORS: readonly string[] = ['+', '-'];
const MULTIPLICATIVE_OPERATORS: readonly string[] = ['*', '/', '%'];

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseObjectOrAdditive(): ExpressionNode;
    parseBinaryLevel(
      operators: readonly string[],
      operand: () => ExpressionNode
    ): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseCallMember(): ExpressionNode;
    parseArgs(): ExpressionNode[];
    parseMember(): ExpressionNode;
    parsePrimary(): ExpressionNode;
  }
}

// ============================================================
// ASSIGNMENT
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAssignment();
};

/** Right-associative: a = b = 1 assigns b first */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const assignee = this.parseObjectOrAdditive();

  if (!check(this.state, TOKEN_TYPES.EQUALS)) {
    return assignee;
  }

  advance(this.state);
  const value = this.parseAssignment();

  return {
    type: 'AssignmentExpr',
    assignee,
    value,
    span: makeSpan(assignee.span.start, previousEnd(this.state)),
  };
};

Parser.prototype.parseObjectOrAdditive = function (
  this: Parser
): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    return this.parseObjectLiteral();
  }
  return this.parseAdditive();
};

// ============================================================
// ARITHMETIC
// ============================================================

/** Left-associative binary level over `operand` */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: readonly string[],
  operand: () => ExpressionNode
): ExpressionNode {
  let left = operand();

  while (
    check(this.state, TOKEN_TYPES.BINARY_OPERATOR) &&
    operators.includes(current(this.state).value)
  ) {
    const operator = advance(this.state).value;
    const right = operand();
    const node: BinaryExprNode = {
      type: 'BinaryExpr',
      left,
      right,
      operator,
      span: makeSpan(left.span.start, previousEnd(this.state)),
    };
    left = node;
  }

  return left;
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(ADDITIVE_OPERATORS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return this.parseBinaryLevel(MULTIPLICATIVE_OPERATORS, () =>
    this.parseCallMember()
  );
};

// ============================================================
// CALLS AND MEMBER ACCESS
// ============================================================

/** member followed by any number of argument lists: f(1)(2) */
Parser.prototype.parseCallMember = function (this: Parser): ExpressionNode {
  let caller = this.parseMember();

  while (check(this.state, TOKEN_TYPES.LPAREN)) {
    const args = this.parseArgs();
    const node: CallExprNode = {
      type: 'CallExpr',
      caller,
      args,
      span: makeSpan(caller.span.start, previousEnd(this.state)),
    };
    caller = node;
  }

  return caller;
};

/** ( expr, expr ) */
Parser.prototype.parseArgs = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, 'Argument list');
  const args: ExpressionNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseAssignment());
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      args.push(this.parseAssignment());
    }
  }

  expect(this.state, TOKEN_TYPES.RPAREN, 'Argument list');
  return args;
};

/** obj.name and obj[expr] */
Parser.prototype.parseMember = function (this: Parser): ExpressionNode {
  let object = this.parsePrimary();

  while (check(this.state, TOKEN_TYPES.DOT, TOKEN_TYPES.LBRACKET)) {
    const operator = advance(this.state);
    let property: ExpressionNode;
    let computed: boolean;

    if (operator.type === TOKEN_TYPES.DOT) {
      if (!check(this.state, TOKEN_TYPES.IDENTIFIER)) {
        throw parseError(
          ERROR_IDS.DOT_WITHOUT_IDENTIFIER,
          {},
          current(this.state).span.start
        );
      }
      property = this.parsePrimary();
      computed = false;
    } else {
      property = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, 'Computed member access');
      computed = true;
    }

    const node: MemberExprNode = {
      type: 'MemberExpr',
      object,
      property,
      computed,
      span: makeSpan(object.span.start, previousEnd(this.state)),
    };
    object = node;
  }

  return object;
};

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };

    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'NumericLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.LPAREN: {
      // Grouping leaves no node of its own
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, 'Grouped expression');
      return inner;
    }

    case TOKEN_TYPES.EOF:
      throw parseError(
        ERROR_IDS.UNEXPECTED_END,
        { expected: 'expression' },
        token.span.start
      );

    default:
      throw parseError(
        ERROR_IDS.UNSUPPORTED_TOKEN_TYPE,
        { type: token.type, value: token.value },
        token.span.start
      );
  }
};
