/**
 * CLI argument parsing and formatting
 */

import { describe, expect, it } from 'vitest';
import {
  formatAst,
  formatError,
  formatOutput,
  parseCliArgs,
} from '../../src/cli-shared.js';
import {
  createDict,
  LexerError,
  native,
  parse,
  ParseError,
  RuntimeError,
} from '../../src/index.js';

describe('parseCliArgs', () => {
  it('starts the read loop without arguments', () => {
    expect(parseCliArgs([])).toEqual({ mode: 'repl' });
  });

  it('evaluates a single source argument', () => {
    expect(parseCliArgs(['1 + 2'])).toEqual({ mode: 'eval', source: '1 + 2' });
  });

  it('lets --help and --version win anywhere', () => {
    expect(parseCliArgs(['1', '--help'])).toEqual({ mode: 'help' });
    expect(parseCliArgs(['--bogus', '--version'])).toEqual({
      mode: 'version',
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['-x'])).toThrow('Unknown option: -x');
  });

  it('rejects more than one source argument', () => {
    expect(() => parseCliArgs(['let', 'x'])).toThrow(
      'Expected a single source argument, got 2 (quote the program)'
    );
  });
});

describe('formatOutput', () => {
  it('renders values', () => {
    expect(formatOutput(null)).toBe('null');
    expect(formatOutput(-3n)).toBe('-3');
    expect(formatOutput(createDict([['a', createDict([])]]))).toBe(
      '{ a: {} }'
    );
    expect(formatOutput(native('time', () => 0n))).toBe('<native fn time>');
  });
});

describe('formatAst', () => {
  it('renders the tree as indented JSON', () => {
    const program = parse('x');
    expect(formatAst(program)).toBe(JSON.stringify(program, null, 2));
    expect(formatAst(program).split('\n')[1]).toBe('  "type": "Program",');
  });
});

describe('formatError', () => {
  const at = { line: 2, column: 4, offset: 9 };

  it('labels each category with its location and ID', () => {
    expect(
      formatError(new LexerError('SCRAWL-L001', 'Unexpected character: #', at))
    ).toBe(
      'Lexer error at line 2, column 4: Unexpected character: # [SCRAWL-L001]'
    );
    expect(
      formatError(new ParseError('SCRAWL-P004', 'Dot operator', at))
    ).toBe('Parse error at line 2, column 4: Dot operator [SCRAWL-P004]');
  });

  it('omits the location when there is none', () => {
    expect(
      formatError(new RuntimeError('SCRAWL-R003', 'Cannot resolve x'))
    ).toBe('Runtime error: Cannot resolve x [SCRAWL-R003]');
  });

  it('passes other errors through', () => {
    expect(formatError(new Error('Unknown option: -x'))).toBe(
      'Unknown option: -x'
    );
  });
});
