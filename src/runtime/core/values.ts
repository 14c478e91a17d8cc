/**
 * Value Types and Utilities
 *
 * Core value types: null, boolean, number (signed 64-bit bigint), object,
 * and callables. Public API for host applications.
 */

import type { ScrawlCallable } from './callable.js';
import { isCallable } from './callable.js';

/** Frozen object value, keys in insertion order */
export interface ScrawlDict {
  readonly [key: string]: ScrawlValue;
}

export type ScrawlValue =
  | null
  | boolean
  | bigint
  | ScrawlDict
  | ScrawlCallable;

export type ScrawlTypeName =
  | 'null'
  | 'boolean'
  | 'number'
  | 'object'
  | 'function';

/** Type guard for numbers */
export function isNumber(value: ScrawlValue | undefined): value is bigint {
  return typeof value === 'bigint';
}

/** Type guard for objects (callables are not objects) */
export function isDict(value: ScrawlValue | undefined): value is ScrawlDict {
  return typeof value === 'object' && value !== null && !isCallable(value);
}

export function inferType(value: ScrawlValue): ScrawlTypeName {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'bigint') return 'number';
  if (isCallable(value)) return 'function';
  return 'object';
}

/**
 * Build a frozen object from entries. Later duplicates overwrite earlier
 * ones but keep the first key's position.
 */
export function createDict(
  entries: Iterable<readonly [string, ScrawlValue]>
): ScrawlDict {
  const fields = new Map<string, ScrawlValue>(entries);
  return Object.freeze(Object.fromEntries(fields));
}

/**
 * Format a value for display.
 *
 * @example
 * formatValue(createDict([['x', 1n], ['y', null]]))
 * // '{ x: 1, y: null }'
 */
export function formatValue(value: ScrawlValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (isCallable(value)) {
    return value.kind === 'native'
      ? `<native fn ${value.name}>`
      : `<fn ${value.name}(${value.params.join(', ')})>`;
  }
  const fields = Object.entries(value);
  if (fields.length === 0) return '{}';
  const body = fields
    .map(([key, field]) => `${key}: ${formatValue(field)}`)
    .join(', ');
  return `{ ${body} }`;
}
