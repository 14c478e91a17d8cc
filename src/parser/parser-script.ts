/**
 * Parser Extension: Script Parsing
 * Program, statements, and declarations
 */

import { Parser } from './parser.js';
import type {
  CommentNode,
  FnDeclarationNode,
  ProgramNode,
  StatementNode,
  VarDeclarationNode,
} from '../types.js';
import { ERROR_IDS, parseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  previousEnd,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatement(): StatementNode;
    parseStatementList(closer: string | null): StatementNode[];
    terminateStatement(statement: StatementNode): void;
    parseVarDeclaration(): VarDeclarationNode;
    parseFnDeclaration(): FnDeclarationNode;
    parseComment(): CommentNode;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const body = this.parseStatementList(null);

  return {
    type: 'Program',
    body,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Statements up to `closer` (not consumed) or EOF.
 */
Parser.prototype.parseStatementList = function (
  this: Parser,
  closer: string | null
): StatementNode[] {
  const statements: StatementNode[] = [];

  while (
    !isAtEnd(this.state) &&
    (closer === null || !check(this.state, closer))
  ) {
    const statement = this.parseStatement();
    statements.push(statement);
    this.terminateStatement(statement);
  }

  return statements;
};

/**
 * Consume the `;` after a statement.
 *
 * Comments and function declarations never need one. In lenient mode the
 * terminator may also be left out before `}`, a comment, or EOF.
 */
Parser.prototype.terminateStatement = function (
  this: Parser,
  statement: StatementNode
): void {
  if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
    advance(this.state);
    return;
  }
  if (statement.type === 'Comment' || statement.type === 'FnDeclaration') {
    return;
  }
  if (
    !this.state.requireSemicolons &&
    check(
      this.state,
      TOKEN_TYPES.RBRACE,
      TOKEN_TYPES.COMMENT,
      TOKEN_TYPES.EOF
    )
  ) {
    return;
  }
  expect(this.state, TOKEN_TYPES.SEMICOLON, 'Statement');
};

// ============================================================
// STATEMENT PARSING
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.LET:
    case TOKEN_TYPES.CONST:
      return this.parseVarDeclaration();
    case TOKEN_TYPES.FN:
      return this.parseFnDeclaration();
    case TOKEN_TYPES.COMMENT:
      return this.parseComment();
    default:
      return this.parseExpression();
  }
};

Parser.prototype.parseComment = function (this: Parser): CommentNode {
  const token = advance(this.state);
  return { type: 'Comment', value: token.value, span: token.span };
};

/**
 * let name; | let name = expr | const name = expr
 */
Parser.prototype.parseVarDeclaration = function (
  this: Parser
): VarDeclarationNode {
  const keyword = advance(this.state);
  const constant = keyword.type === TOKEN_TYPES.CONST;
  const identifier = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Variable declaration'
  ).value;

  // The terminator is left for terminateStatement
  if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
    if (constant) {
      throw parseError(
        ERROR_IDS.CONST_VALUE_REQUIRED,
        { name: identifier },
        current(this.state).span.start
      );
    }
    return {
      type: 'VarDeclaration',
      constant,
      identifier,
      value: null,
      span: makeSpan(keyword.span.start, previousEnd(this.state)),
    };
  }

  expect(this.state, TOKEN_TYPES.EQUALS, 'Variable declaration');
  const value = this.parseExpression();

  return {
    type: 'VarDeclaration',
    constant,
    identifier,
    value,
    span: makeSpan(keyword.span.start, previousEnd(this.state)),
  };
};

/**
 * fn name(a, b) { statements }
 */
Parser.prototype.parseFnDeclaration = function (
  this: Parser
): FnDeclarationNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Function declaration'
  ).value;

  const parameters = this.parseArgs().map((arg) => {
    if (arg.type !== 'Identifier') {
      throw parseError(
        ERROR_IDS.PARAMETER_NOT_IDENTIFIER,
        { name, nodeType: arg.type },
        arg.span.start
      );
    }
    return arg.name;
  });

  expect(this.state, TOKEN_TYPES.LBRACE, 'Function body');
  const body = this.parseStatementList(TOKEN_TYPES.RBRACE);
  expect(this.state, TOKEN_TYPES.RBRACE, 'Function body');

  return {
    type: 'FnDeclaration',
    name,
    parameters,
    body,
    isConst: false,
    span: makeSpan(keyword.span.start, previousEnd(this.state)),
  };
};
