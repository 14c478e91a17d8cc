/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SCRAWL-{category}{3-digit} (e.g., SCRAWL-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Stable kind name hosts can branch on (e.g., RedeclareVariable) */
  readonly kind: string;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR IDS
// ============================================================

export const ERROR_IDS = {
  // Lexer
  UNEXPECTED_CHARACTER: 'SCRAWL-L001',

  // Parser
  EXPECTED_TOKEN: 'SCRAWL-P001',
  UNEXPECTED_END: 'SCRAWL-P002',
  UNSUPPORTED_TOKEN_TYPE: 'SCRAWL-P003',
  DOT_WITHOUT_IDENTIFIER: 'SCRAWL-P004',
  CONST_VALUE_REQUIRED: 'SCRAWL-P005',
  PARAMETER_NOT_IDENTIFIER: 'SCRAWL-P006',

  // Environment
  REDECLARE_VARIABLE: 'SCRAWL-R001',
  REASSIGN_CONSTANT: 'SCRAWL-R002',
  VARIABLE_NOT_FOUND: 'SCRAWL-R003',

  // Evaluator
  INVALID_ASSIGNMENT: 'SCRAWL-R004',
  INVALID_OPERATOR: 'SCRAWL-R005',
  VALUE_NOT_A_FUNCTION: 'SCRAWL-R006',
  ARITY_MISMATCH: 'SCRAWL-R007',
  DIVISION_BY_ZERO: 'SCRAWL-R008',
  UNEXPECTED_STATEMENT: 'SCRAWL-R009',
  INTEGER_OVERFLOW: 'SCRAWL-R010',
  INVALID_NUMERIC_LITERAL: 'SCRAWL-R011',
  CALL_DEPTH_EXCEEDED: 'SCRAWL-R012',
} as const;

export type ErrorId = (typeof ERROR_IDS)[keyof typeof ERROR_IDS];

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (SCRAWL-L0xx)
  {
    errorId: ERROR_IDS.UNEXPECTED_CHARACTER,
    category: 'lexer',
    kind: 'UnexpectedCharacter',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of any token.',
    resolution:
      'Remove the character. Strings, decimals and most punctuation are not part of the language.',
  },

  // Parse Errors (SCRAWL-P0xx)
  {
    errorId: ERROR_IDS.EXPECTED_TOKEN,
    category: 'parse',
    kind: 'ExpectedToken',
    description: 'Expected a different token',
    messageTemplate: '{context}: expected {expected}, got {actual}',
  },
  {
    errorId: ERROR_IDS.UNEXPECTED_END,
    category: 'parse',
    kind: 'UnexpectedEnd',
    description: 'Unexpected end of input',
    messageTemplate: 'Expected {expected}, but reached end of input',
    resolution: 'Complete the expression or close the open delimiter.',
  },
  {
    errorId: ERROR_IDS.UNSUPPORTED_TOKEN_TYPE,
    category: 'parse',
    kind: 'UnsupportedTokenType',
    description: 'Token cannot start an expression',
    messageTemplate: 'Unsupported token type {type} ({value})',
    cause:
      'Only identifiers, numbers and parenthesised expressions start an expression. Reserved keywords have no grammar.',
  },
  {
    errorId: ERROR_IDS.DOT_WITHOUT_IDENTIFIER,
    category: 'parse',
    kind: 'NoDotOperatorWithoutRhsIdentifier',
    description: 'Dot operator without identifier',
    messageTemplate: 'Dot operator requires an identifier on the right-hand side',
    resolution: 'Use obj.name, or obj[expr] for computed access.',
  },
  {
    errorId: ERROR_IDS.CONST_VALUE_REQUIRED,
    category: 'parse',
    kind: 'ConstValueRequired',
    description: 'Constant without initializer',
    messageTemplate: 'A value is required for const assignment',
    resolution: "Give the constant an initializer or declare it with 'let'.",
  },
  {
    errorId: ERROR_IDS.PARAMETER_NOT_IDENTIFIER,
    category: 'parse',
    kind: 'ExpectedParameterToBeIdentifier',
    description: 'Function parameter is not an identifier',
    messageTemplate: "Parameter of function '{name}' must be an identifier, got {nodeType}",
  },

  // Runtime Errors (SCRAWL-R0xx)
  {
    errorId: ERROR_IDS.REDECLARE_VARIABLE,
    category: 'runtime',
    kind: 'RedeclareVariable',
    description: 'Variable declared twice in one scope',
    messageTemplate: 'Cannot redeclare variable {name}',
    resolution: 'Assign with name = value, or declare it inside a function to shadow it.',
  },
  {
    errorId: ERROR_IDS.REASSIGN_CONSTANT,
    category: 'runtime',
    kind: 'ReassignConstant',
    description: 'Assignment to a constant',
    messageTemplate: 'Cannot reassign to constant {name}',
  },
  {
    errorId: ERROR_IDS.VARIABLE_NOT_FOUND,
    category: 'runtime',
    kind: 'VariableNotFound',
    description: 'Undefined variable',
    messageTemplate: 'Cannot resolve {name} since it does not exist',
  },
  {
    errorId: ERROR_IDS.INVALID_ASSIGNMENT,
    category: 'runtime',
    kind: 'InvalidAssignment',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target {nodeType}',
    cause: 'Only a bare identifier can be assigned to.',
  },
  {
    errorId: ERROR_IDS.INVALID_OPERATOR,
    category: 'runtime',
    kind: 'InvalidOperator',
    description: 'Unsupported binary operator',
    messageTemplate: 'Unsupported binary operator {operator}',
  },
  {
    errorId: ERROR_IDS.VALUE_NOT_A_FUNCTION,
    category: 'runtime',
    kind: 'ValueNotAFunction',
    description: 'Called value is not a function',
    messageTemplate: 'Value {value} is not a function',
  },
  {
    errorId: ERROR_IDS.ARITY_MISMATCH,
    category: 'runtime',
    kind: 'ArityMismatch',
    description: 'Wrong number of arguments',
    messageTemplate: 'Function {name} expects {expected} argument(s), got {actual}',
  },
  {
    errorId: ERROR_IDS.DIVISION_BY_ZERO,
    category: 'runtime',
    kind: 'DivisionByZero',
    description: 'Division or modulo by zero',
    messageTemplate: 'Division by zero ({left} {operator} 0)',
  },
  {
    errorId: ERROR_IDS.UNEXPECTED_STATEMENT,
    category: 'runtime',
    kind: 'UnexpectedStatement',
    description: 'Node type cannot be evaluated',
    messageTemplate: 'Unexpected statement: {nodeType} cannot be evaluated',
    cause: 'Member access is parsed but has no evaluation rule.',
  },
  {
    errorId: ERROR_IDS.INTEGER_OVERFLOW,
    category: 'runtime',
    kind: 'IntegerOverflow',
    description: 'Integer outside the signed 64-bit range',
    messageTemplate: 'Integer overflow: {value} is outside the signed 64-bit range',
  },
  {
    errorId: ERROR_IDS.INVALID_NUMERIC_LITERAL,
    category: 'runtime',
    kind: 'InvalidNumericLiteral',
    description: 'Numeric literal is not a decimal integer',
    messageTemplate: "Invalid numeric literal '{text}'",
    cause: 'The literal uses numeric characters that are not ASCII decimal digits.',
  },
  {
    errorId: ERROR_IDS.CALL_DEPTH_EXCEEDED,
    category: 'runtime',
    kind: 'CallDepthExceeded',
    description: 'Maximum call depth exceeded',
    messageTemplate: 'Maximum call depth of {limit} exceeded calling {name}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string and non-string values go
 * through String(). Unclosed braces are left as written.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "IDENTIFIER", actual: "NUMBER"})
 * // Returns: "Expected IDENTIFIER, got NUMBER"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{([^{}]*)\}/g, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}
