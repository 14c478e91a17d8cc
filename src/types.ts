/**
 * Scrawl AST Types
 * Shared type surface for lexer, parser and runtime.
 *
 * Re-exports from the per-concern modules so internal code has a single
 * import point.
 */

export type { SourceLocation, SourceSpan } from './source-location.js';

export { TOKEN_TYPES } from './token-types.js';
export type { Token, TokenType } from './token-types.js';

export type {
  ASTNode,
  AssignmentExprNode,
  BinaryExprNode,
  BinaryOp,
  CallExprNode,
  CommentNode,
  ExpressionNode,
  FnDeclarationNode,
  IdentifierNode,
  MemberExprNode,
  NodeType,
  NumericLiteralNode,
  ObjectLiteralNode,
  ProgramNode,
  PropertyNode,
  StatementNode,
  VarDeclarationNode,
} from './ast-nodes.js';

export {
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export type {
  ErrorCategory,
  ErrorDefinition,
  ErrorId,
  ErrorRegistry,
} from './error-registry.js';

export {
  createError,
  lexerError,
  LexerError,
  parseError,
  ParseError,
  runtimeError,
  RuntimeError,
  ScrawlError,
} from './error-classes.js';
export type { ScrawlErrorData } from './error-classes.js';
