/**
 * Direct node evaluation
 */

import { describe, expect, it } from 'vitest';
import {
  createGlobalEnvironment,
  createRuntimeContext,
  evaluate,
  getDefaultContext,
  getEvaluator,
  parse,
} from '../../src/index.js';
import { catchError, firstStatement } from '../helpers/runtime.js';

describe('evaluate', () => {
  it('evaluates a node against a given scope', () => {
    const env = createGlobalEnvironment();
    env.declare('foo', 41n);

    expect(evaluate(firstStatement('foo + 1'), env)).toBe(42n);
  });

  it('gives the same value when a node is evaluated twice', () => {
    const env = createGlobalEnvironment();
    env.declare('foo', 7n);
    const node = firstStatement('foo');

    expect(evaluate(node, env)).toBe(7n);
    expect(evaluate(node, env)).toBe(7n);
  });

  it('evaluates a whole program to its last statement', () => {
    const env = createGlobalEnvironment();
    expect(evaluate(parse('let a = 2; a * 3'), env)).toBe(6n);
    expect(env.lookup('a')).toBe(2n);
  });

  it('evaluates an empty program to null', () => {
    expect(evaluate(parse(''), createGlobalEnvironment())).toBe(null);
  });

  it('evaluates in a child scope without touching the parent', () => {
    const env = createGlobalEnvironment();
    const scope = env.child();

    evaluate(firstStatement('let inner = 1'), scope);

    expect(scope.has('inner')).toBe(true);
    expect(env.has('inner')).toBe(false);
  });

  it('rejects member access', () => {
    const env = createGlobalEnvironment();
    env.declare('p', null);
    const err = catchError(() => evaluate(firstStatement('p[0]'), env));

    expect(err.errorId).toBe('SCRAWL-R009');
    expect(err.context).toEqual({ nodeType: 'MemberExpr' });
  });

  it('rejects a bare property node', () => {
    const node = firstStatement('{ a: 1 }');
    if (node.type !== 'ObjectLiteral') throw new Error('Expected object');
    const [property] = node.properties;
    if (!property) throw new Error('Expected property');

    const err = catchError(() =>
      evaluate(property, createGlobalEnvironment())
    );

    expect(err.message).toBe(
      'Unexpected statement: Property cannot be evaluated at 1:3'
    );
  });

  it('reuses one default context per scope', () => {
    const env = createGlobalEnvironment();
    const ctx = getDefaultContext(env);

    evaluate(firstStatement('let a = 1'), env);
    evaluate(firstStatement('a'), env);

    expect(getDefaultContext(env)).toBe(ctx);
    expect(ctx.global).toBe(env);
    expect(getDefaultContext(createGlobalEnvironment())).not.toBe(ctx);
  });

  it('reuses one evaluator per context', () => {
    const ctx = createRuntimeContext();
    expect(getEvaluator(ctx)).toBe(getEvaluator(ctx));
    expect(getEvaluator(createRuntimeContext())).not.toBe(getEvaluator(ctx));
  });
});
