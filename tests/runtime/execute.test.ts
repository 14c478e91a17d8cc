/**
 * Program execution and stepping
 */

import { describe, expect, it } from 'vitest';
import {
  createGlobalEnvironment,
  createRuntimeContext,
  createStepper,
  execute,
  parse,
  run as runSource,
} from '../../src/index.js';
import { run, runFull, runStepped } from '../helpers/runtime.js';

describe('execute', () => {
  it('returns the value of the last statement', () => {
    expect(run('1; 2; 3')).toBe(3n);
  });

  it('returns null for an empty program', () => {
    expect(runFull('')).toEqual({ value: null, variables: {} });
  });

  it('reports user bindings but not seeded names', () => {
    const result = runFull('let a = 1; const b = 2; fn f() { a }');

    expect(Object.keys(result.variables)).toEqual(['a', 'b', 'f']);
    expect(result.variables['a']).toBe(1n);
    expect(result.variables['b']).toBe(2n);
    expect(result.variables['true']).toBeUndefined();
    expect(result.variables['print']).toBeUndefined();
  });

  it('includes host variables, which are mutable', () => {
    const result = runFull('count = count + 1', { variables: { count: 4n } });
    expect(result).toEqual({ value: 5n, variables: { count: 5n } });
  });

  it('keeps bindings across executions on one context', () => {
    const ctx = createRuntimeContext();
    execute(parse('let total = 10'), ctx);

    expect(execute(parse('total * 2'), ctx).value).toBe(20n);
  });

  it('runs against a supplied global scope', () => {
    const env = createGlobalEnvironment();
    env.declare('seed', 3n);
    const ctx = createRuntimeContext({ environment: env });

    const result = execute(parse('let grown = seed + 1'), ctx);

    expect(result.variables).toEqual({ grown: 4n });
    expect(env.lookup('grown')).toBe(4n);
  });

  it('rejects builtins alongside a supplied global scope', () => {
    expect(() =>
      createRuntimeContext({
        environment: createGlobalEnvironment(),
        builtins: {},
      })
    ).toThrow(
      'builtins cannot be combined with environment; declare them in the supplied scope'
    );
  });

  it('rejects a non-positive maxCallDepth', () => {
    expect(() => createRuntimeContext({ maxCallDepth: 0 })).toThrow(
      'maxCallDepth must be a positive integer, got 0'
    );
  });
});

describe('createStepper', () => {
  it('steps one top-level statement at a time', () => {
    expect(runStepped('let a = 1; a + 1')).toEqual([
      { value: 1n, done: false, index: 0, total: 2 },
      { value: 2n, done: true, index: 1, total: 2 },
    ]);
  });

  it('starts done for an empty program', () => {
    const stepper = createStepper(parse(''), createRuntimeContext());

    expect(stepper.done).toBe(true);
    expect(stepper.step()).toEqual({
      value: null,
      done: true,
      index: 0,
      total: 0,
    });
  });

  it('exposes progress between steps', () => {
    const ctx = createRuntimeContext();
    const stepper = createStepper(parse('let a = 1; let b = 2; a + b'), ctx);

    stepper.step();

    expect(stepper.index).toBe(1);
    expect(stepper.total).toBe(3);
    expect(stepper.context).toBe(ctx);
    expect(stepper.getResult()).toEqual({ value: 1n, variables: { a: 1n } });
  });

  it('stays on the failing statement', () => {
    const stepper = createStepper(
      parse('1; missing; 3'),
      createRuntimeContext()
    );
    stepper.step();

    expect(() => stepper.step()).toThrow('Cannot resolve missing');
    expect(stepper.index).toBe(1);
    expect(stepper.done).toBe(false);
  });
});

describe('run', () => {
  it('parses and executes in one call', () => {
    expect(runSource('fn add(x, y) { x + y } add(3, 4)').value).toBe(7n);
  });

  it('passes parser options through', () => {
    expect(() => runSource('1', { requireSemicolons: true })).toThrow(
      'Expected SEMICOLON, but reached end of input at 1:2'
    );
  });

  it('reuses a given context', () => {
    const context = createRuntimeContext();
    runSource('let kept = 1;', { context });

    expect(runSource('kept + 1', { context })).toEqual({
      value: 2n,
      variables: { kept: 1n },
    });
  });
});
