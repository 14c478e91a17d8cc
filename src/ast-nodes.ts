import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly body: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

/** Line or block comment kept in the tree; text excludes the delimiters */
export interface CommentNode extends BaseNode {
  readonly type: 'Comment';
  readonly value: string;
}

/**
 * Variable declaration: let name; / let name = expr; / const name = expr;
 * `value` is null only for `let` without initializer.
 */
export interface VarDeclarationNode extends BaseNode {
  readonly type: 'VarDeclaration';
  readonly constant: boolean;
  readonly identifier: string;
  readonly value: ExpressionNode | null;
}

/**
 * Function declaration: fn name(a, b) { statements }
 * The result of a call is the value of the last body statement.
 */
export interface FnDeclarationNode extends BaseNode {
  readonly type: 'FnDeclaration';
  readonly name: string;
  readonly parameters: string[];
  readonly body: StatementNode[];
  readonly isConst: boolean;
}

export type StatementNode =
  | VarDeclarationNode
  | FnDeclarationNode
  | CommentNode
  | ExpressionNode;

// ============================================================
// EXPRESSIONS
// ============================================================

/** Integer literal; digits are kept as written until evaluation */
export interface NumericLiteralNode extends BaseNode {
  readonly type: 'NumericLiteral';
  readonly value: string;
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

/**
 * Object literal entry. A null value is shorthand ({ foo }) and resolves
 * `key` as a variable at evaluation time.
 */
export interface PropertyNode extends BaseNode {
  readonly type: 'Property';
  readonly key: string;
  readonly value: ExpressionNode | null;
}

/** Object literal: { x: 1, y, z: { w: 2 }, } */
export interface ObjectLiteralNode extends BaseNode {
  readonly type: 'ObjectLiteral';
  readonly properties: PropertyNode[];
}

/** Assignment: assignee = value (right-associative) */
export interface AssignmentExprNode extends BaseNode {
  readonly type: 'AssignmentExpr';
  readonly assignee: ExpressionNode;
  readonly value: ExpressionNode;
}

/**
 * Member access: obj.prop or obj[expr].
 * Parsed but not evaluated.
 */
export interface MemberExprNode extends BaseNode {
  readonly type: 'MemberExpr';
  readonly object: ExpressionNode;
  readonly property: ExpressionNode;
  readonly computed: boolean;
}

export interface CallExprNode extends BaseNode {
  readonly type: 'CallExpr';
  readonly caller: ExpressionNode;
  readonly args: ExpressionNode[];
}

export type BinaryOp = '+' | '-' | '*' | '/' | '%';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
  /** Operator text as lexed; see BinaryOp for the supported set */
  readonly operator: string;
}

export type ExpressionNode =
  | NumericLiteralNode
  | IdentifierNode
  | ObjectLiteralNode
  | AssignmentExprNode
  | MemberExprNode
  | CallExprNode
  | BinaryExprNode;

// ============================================================
// UNION OF ALL NODES
// ============================================================

export type ASTNode = ProgramNode | StatementNode | PropertyNode;

export type NodeType = ASTNode['type'];
