/**
 * Scrawl Error Classes and Factory
 * Structured error types with registry-based error IDs
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ScrawlErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Scrawl errors.
 * Provides structured data for host applications to format as needed.
 */
export class ScrawlError extends Error {
  readonly errorId: string;
  /** Registry kind name (e.g., VariableNotFound) */
  readonly kind: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ScrawlErrorData) {
    const definition = lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ScrawlError';
    this.errorId = data.errorId;
    this.kind = definition.kind;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ScrawlErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ScrawlErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors */
export class LexerError extends ScrawlError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Parse-time errors */
export class ParseError extends ScrawlError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

/** Environment and evaluation errors */
export class RuntimeError extends ScrawlError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Copy of this error pinned to a location, unless it already has one */
  withLocation(location: SourceLocation | undefined): RuntimeError {
    if (this.location !== undefined || location === undefined) return this;
    return new RuntimeError(
      this.errorId,
      this.toData().message,
      location,
      this.context
    );
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

function render(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = lookupDefinition(errorId, category);
  return renderMessage(definition.messageTemplate, context);
}

/** Build a LexerError with its registry message */
export function lexerError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): LexerError {
  const message = render(errorId, 'lexer', context);
  return new LexerError(errorId, message, location, context);
}

/** Build a ParseError with its registry message */
export function parseError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): ParseError {
  const message = render(errorId, 'parse', context);
  return new ParseError(errorId, message, location, context);
}

/** Build a RuntimeError with its registry message */
export function runtimeError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): RuntimeError {
  const message = render(errorId, 'runtime', context);
  return new RuntimeError(errorId, message, location, context);
}

/**
 * Create an error from the registry.
 *
 * Renders the message template with `context` and returns the class that
 * matches the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('SCRAWL-R003', { name: 'foo' }, location)
 * // RuntimeError: "Cannot resolve foo since it does not exist at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): ScrawlError {
  switch (lookupDefinition(errorId).category) {
    case 'lexer':
      return lexerError(
        errorId,
        context,
        location ?? { line: 1, column: 1, offset: 0 }
      );
    case 'parse':
      return parseError(errorId, context, location);
    case 'runtime':
      return runtimeError(errorId, context, location);
  }
}
