/**
 * Scrawl Parser Tests
 * AST shapes for each grammar rule
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/index.js';
import { firstStatement } from '../helpers/runtime.js';

const num = (value: string) => ({ type: 'NumericLiteral', value });
const id = (name: string) => ({ type: 'Identifier', name });

describe('Parser', () => {
  describe('program', () => {
    it('parses an empty program', () => {
      expect(parse('')).toMatchObject({ type: 'Program', body: [] });
    });

    it('spans the whole input', () => {
      expect(parse('let x = 5;').span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 11, offset: 10 },
      });
    });

    it('keeps statements in order', () => {
      const program = parse('let a = 1; a; // done');
      expect(program.body.map((s) => s.type)).toEqual([
        'VarDeclaration',
        'Identifier',
        'Comment',
      ]);
    });
  });

  describe('precedence', () => {
    it('groups by parentheses and binds % tighter than +', () => {
      expect(firstStatement('45 + (foo + 4) % bar')).toMatchObject({
        type: 'BinaryExpr',
        operator: '+',
        left: num('45'),
        right: {
          type: 'BinaryExpr',
          operator: '%',
          left: {
            type: 'BinaryExpr',
            operator: '+',
            left: id('foo'),
            right: num('4'),
          },
          right: id('bar'),
        },
      });
    });

    it('associates additive operators to the left', () => {
      expect(firstStatement('1 - 2 - 3')).toMatchObject({
        type: 'BinaryExpr',
        operator: '-',
        left: {
          type: 'BinaryExpr',
          operator: '-',
          left: num('1'),
          right: num('2'),
        },
        right: num('3'),
      });
    });

    it('binds * tighter than -', () => {
      expect(firstStatement('1 - 2 * 3')).toMatchObject({
        operator: '-',
        left: num('1'),
        right: { operator: '*', left: num('2'), right: num('3') },
      });
    });

    it('associates assignment to the right', () => {
      expect(firstStatement('a = b = 1')).toMatchObject({
        type: 'AssignmentExpr',
        assignee: id('a'),
        value: { type: 'AssignmentExpr', assignee: id('b'), value: num('1') },
      });
    });
  });

  describe('declarations', () => {
    it('parses let with an initializer', () => {
      expect(firstStatement('let x = 5;')).toEqual({
        type: 'VarDeclaration',
        constant: false,
        identifier: 'x',
        value: {
          type: 'NumericLiteral',
          value: '5',
          span: {
            start: { line: 1, column: 9, offset: 8 },
            end: { line: 1, column: 10, offset: 9 },
          },
        },
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 10, offset: 9 },
        },
      });
    });

    it('parses let without an initializer', () => {
      expect(firstStatement('let x;')).toMatchObject({
        type: 'VarDeclaration',
        constant: false,
        identifier: 'x',
        value: null,
      });
    });

    it('parses const with an initializer', () => {
      expect(firstStatement('const foo = 6;')).toMatchObject({
        type: 'VarDeclaration',
        constant: true,
        identifier: 'foo',
        value: num('6'),
      });
    });

    it('parses a function declaration', () => {
      expect(
        firstStatement('fn add(x, y) { let result = x + y; result }')
      ).toMatchObject({
        type: 'FnDeclaration',
        name: 'add',
        parameters: ['x', 'y'],
        isConst: false,
        body: [
          {
            type: 'VarDeclaration',
            identifier: 'result',
            value: { type: 'BinaryExpr', left: id('x'), right: id('y') },
          },
          id('result'),
        ],
      });
    });

    it('parses a function with no parameters and an empty body', () => {
      expect(firstStatement('fn noop() {}')).toMatchObject({
        type: 'FnDeclaration',
        name: 'noop',
        parameters: [],
        body: [],
      });
    });
  });

  describe('object literals', () => {
    it('parses keyed, shorthand and nested entries', () => {
      expect(firstStatement('{ x: 100, y, baz: { z: true } }')).toMatchObject({
        type: 'ObjectLiteral',
        properties: [
          { type: 'Property', key: 'x', value: num('100') },
          { type: 'Property', key: 'y', value: null },
          {
            type: 'Property',
            key: 'baz',
            value: {
              type: 'ObjectLiteral',
              properties: [{ key: 'z', value: id('true') }],
            },
          },
        ],
      });
    });

    it('accepts a trailing comma', () => {
      expect(firstStatement('{ x: 1, y, }')).toMatchObject({
        type: 'ObjectLiteral',
        properties: [
          { key: 'x', value: num('1') },
          { key: 'y', value: null },
        ],
      });
    });

    it('parses an empty object', () => {
      expect(firstStatement('{}')).toMatchObject({
        type: 'ObjectLiteral',
        properties: [],
      });
    });

    it('parses an object as an initializer', () => {
      expect(firstStatement('let p = { a: 1 };')).toMatchObject({
        type: 'VarDeclaration',
        value: { type: 'ObjectLiteral', properties: [{ key: 'a' }] },
      });
    });
  });

  describe('calls and member access', () => {
    it('chains calls', () => {
      expect(firstStatement('f(1, 2)(3)')).toMatchObject({
        type: 'CallExpr',
        caller: {
          type: 'CallExpr',
          caller: id('f'),
          args: [num('1'), num('2')],
        },
        args: [num('3')],
      });
    });

    it('parses arguments as full expressions', () => {
      expect(firstStatement('f(a = 1, 2 * 3)')).toMatchObject({
        type: 'CallExpr',
        args: [
          { type: 'AssignmentExpr', assignee: id('a') },
          { type: 'BinaryExpr', operator: '*' },
        ],
      });
    });

    it('parses dotted member access', () => {
      expect(firstStatement('a.b.c')).toMatchObject({
        type: 'MemberExpr',
        computed: false,
        object: {
          type: 'MemberExpr',
          object: id('a'),
          property: id('b'),
          computed: false,
        },
        property: id('c'),
      });
    });

    it('parses computed member access', () => {
      expect(firstStatement('a[1 + 2]')).toMatchObject({
        type: 'MemberExpr',
        object: id('a'),
        property: { type: 'BinaryExpr', operator: '+' },
        computed: true,
      });
    });

    it('calls the result of member access', () => {
      expect(firstStatement('a.b(1)')).toMatchObject({
        type: 'CallExpr',
        caller: { type: 'MemberExpr', property: id('b') },
        args: [num('1')],
      });
    });
  });

  describe('statement termination', () => {
    it('allows a missing semicolon at end of input', () => {
      expect(parse('let x = 1').body).toHaveLength(1);
    });

    it('allows a missing semicolon before a closing brace', () => {
      expect(firstStatement('fn f() { 1 }')).toMatchObject({
        body: [num('1')],
      });
    });

    it('allows a missing semicolon before a comment', () => {
      const program = parse('let x = 1 // one\nx');
      expect(program.body).toMatchObject([
        { type: 'VarDeclaration' },
        { type: 'Comment', value: ' one' },
        id('x'),
      ]);
    });

    it('needs no semicolon after a function declaration', () => {
      const program = parse('fn f() { 1; } f();', {
        requireSemicolons: true,
      });
      expect(program.body.map((s) => s.type)).toEqual([
        'FnDeclaration',
        'CallExpr',
      ]);
    });

    it('accepts semicolons in strict mode', () => {
      const program = parse('let x = 1; /* c */ x;', {
        requireSemicolons: true,
      });
      expect(program.body.map((s) => s.type)).toEqual([
        'VarDeclaration',
        'Comment',
        'Identifier',
      ]);
    });
  });
});
