/**
 * Integer Arithmetic
 *
 * Numbers are bigints constrained to the signed 64-bit range. Literal text
 * is parsed on evaluation and every result is range-checked.
 */

import type { SourceLocation } from '../../types.js';
import { ERROR_IDS, runtimeError } from '../../types.js';

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const DECIMAL_DIGITS = /^[0-9]+$/;

/** Throws IntegerOverflow when value is outside the signed 64-bit range */
export function checkRange(value: bigint, location?: SourceLocation): bigint {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw runtimeError(
      ERROR_IDS.INTEGER_OVERFLOW,
      { value: value.toString() },
      location
    );
  }
  return value;
}

/**
 * Parse numeric literal text.
 * The lexer accepts any Unicode numeric run; only ASCII digits form a value.
 */
export function parseIntegerLiteral(
  text: string,
  location?: SourceLocation
): bigint {
  if (!DECIMAL_DIGITS.test(text)) {
    throw runtimeError(ERROR_IDS.INVALID_NUMERIC_LITERAL, { text }, location);
  }
  return checkRange(BigInt(text), location);
}

/**
 * Apply a binary operator.
 * Division truncates toward zero and the remainder takes the dividend's sign.
 */
export function applyOperator(
  operator: string,
  left: bigint,
  right: bigint,
  location?: SourceLocation
): bigint {
  switch (operator) {
    case '+':
      return checkRange(left + right, location);
    case '-':
      return checkRange(left - right, location);
    case '*':
      return checkRange(left * right, location);
    case '/':
    case '%':
      if (right === 0n) {
        throw runtimeError(
          ERROR_IDS.DIVISION_BY_ZERO,
          { left: left.toString(), operator },
          location
        );
      }
      return checkRange(
        operator === '/' ? left / right : left % right,
        location
      );
    default:
      throw runtimeError(ERROR_IDS.INVALID_OPERATOR, { operator }, location);
  }
}
