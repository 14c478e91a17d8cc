/**
 * Scrawl Parser Error Tests
 */

import { describe, expect, it } from 'vitest';
import { LexerError, parse, ParseError } from '../../src/index.js';
import { catchError } from '../helpers/runtime.js';

function parseError(source: string, requireSemicolons = false) {
  return catchError(() => parse(source, { requireSemicolons }));
}

describe('Parser Errors', () => {
  describe('ConstValueRequired', () => {
    it('rejects const without an initializer', () => {
      const err = parseError('const foo;');

      expect(err).toBeInstanceOf(ParseError);
      expect(err.errorId).toBe('SCRAWL-P005');
      expect(err.kind).toBe('ConstValueRequired');
      expect(err.message).toBe(
        'A value is required for const assignment at 1:10'
      );
    });
  });

  describe('ExpectedToken', () => {
    it('requires an identifier after let', () => {
      const err = parseError('let = 5');

      expect(err.errorId).toBe('SCRAWL-P001');
      expect(err.message).toBe(
        'Variable declaration: expected IDENTIFIER, got EQUALS at 1:5'
      );
      expect(err.context).toEqual({
        expected: 'IDENTIFIER',
        actual: 'EQUALS',
        context: 'Variable declaration',
      });
    });

    it('rejects two expressions without a separator', () => {
      const err = parseError('1 2');
      expect(err.message).toBe(
        'Statement: expected SEMICOLON, got NUMBER at 1:3'
      );
    });

    it('requires commas between object entries', () => {
      const err = parseError('{ a: 1 b: 2 }');
      expect(err.message).toBe(
        'Object property: expected COMMA, got IDENTIFIER at 1:8'
      );
    });

    it('requires identifier object keys', () => {
      const err = parseError('{ 1: 2 }');
      expect(err.message).toBe(
        'Object key: expected IDENTIFIER, got NUMBER at 1:3'
      );
    });

    it('requires a body after function parameters', () => {
      const err = parseError('fn f() 1');
      expect(err.message).toBe(
        'Function body: expected LBRACE, got NUMBER at 1:8'
      );
    });
  });

  describe('UnexpectedEnd', () => {
    it('reports a missing operand', () => {
      const err = parseError('1 +');

      expect(err.errorId).toBe('SCRAWL-P002');
      expect(err.kind).toBe('UnexpectedEnd');
      expect(err.message).toBe(
        'Expected expression, but reached end of input at 1:4'
      );
    });

    it('reports an unclosed parenthesis', () => {
      const err = parseError('(1 + 2');
      expect(err.message).toBe(
        'Expected RPAREN, but reached end of input at 1:7'
      );
    });

    it('reports an unclosed function body', () => {
      const err = parseError('fn f() { 1');
      expect(err.message).toBe(
        'Expected RBRACE, but reached end of input at 1:11'
      );
    });

    it('reports a missing semicolon at end of input in strict mode', () => {
      const err = parseError('let x = 1', true);
      expect(err.message).toBe(
        'Expected SEMICOLON, but reached end of input at 1:10'
      );
    });
  });

  describe('UnsupportedTokenType', () => {
    it('rejects a token that cannot start an expression', () => {
      const err = parseError('}');

      expect(err.errorId).toBe('SCRAWL-P003');
      expect(err.message).toBe('Unsupported token type RBRACE (}) at 1:1');
    });

    it('rejects reserved keywords', () => {
      const err = parseError('if');
      expect(err.message).toBe('Unsupported token type IF (if) at 1:1');
    });
  });

  describe('NoDotOperatorWithoutRhsIdentifier', () => {
    it('rejects a number after a dot', () => {
      const err = parseError('a.5');

      expect(err.errorId).toBe('SCRAWL-P004');
      expect(err.message).toBe(
        'Dot operator requires an identifier on the right-hand side at 1:3'
      );
    });
  });

  describe('ExpectedParameterToBeIdentifier', () => {
    it('rejects a literal parameter', () => {
      const err = parseError('fn f(1) {}');

      expect(err.errorId).toBe('SCRAWL-P006');
      expect(err.message).toBe(
        "Parameter of function 'f' must be an identifier, got NumericLiteral at 1:6"
      );
    });
  });

  describe('lexer errors', () => {
    it('propagates unchanged', () => {
      const err = parseError('let x = 1 # 2');

      expect(err).toBeInstanceOf(LexerError);
      expect(err.errorId).toBe('SCRAWL-L001');
      expect(err.location).toEqual({ line: 1, column: 11, offset: 10 });
    });
  });
});
