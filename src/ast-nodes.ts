import type { SourceSpan } from './source-location.js';
import type { Token } from './token-types.js';

interface BaseNode {
  readonly span: SourceSpan;
}

/** Scalar that can appear literally in source */
export type LiteralValue = string | number | boolean | null;

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | TernaryExprNode
  | BinaryExprNode
  | LogicalExprNode
  | CallExprNode
  | GroupingExprNode
  | LiteralExprNode
  | UnaryExprNode
  | VariableExprNode
  | AssignExprNode;

/** cond ? then : else */
export interface TernaryExprNode extends BaseNode {
  readonly type: 'TernaryExpr';
  readonly condition: ExpressionNode;
  readonly thenBranch: ExpressionNode;
  readonly elseBranch: ExpressionNode;
}

/**
 * Arithmetic, comparison, equality and the comma operator.
 * The operator token is kept for error locations.
 */
export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly left: ExpressionNode;
  readonly operator: Token;
  readonly right: ExpressionNode;
}

/** Short-circuiting `and` / `or` */
export interface LogicalExprNode extends BaseNode {
  readonly type: 'LogicalExpr';
  readonly left: ExpressionNode;
  readonly operator: Token;
  readonly right: ExpressionNode;
}

export interface CallExprNode extends BaseNode {
  readonly type: 'CallExpr';
  readonly callee: ExpressionNode;
  /** Closing paren, used to locate arity and callee errors */
  readonly paren: Token;
  readonly args: ExpressionNode[];
}

export interface GroupingExprNode extends BaseNode {
  readonly type: 'GroupingExpr';
  readonly expression: ExpressionNode;
}

export interface LiteralExprNode extends BaseNode {
  readonly type: 'LiteralExpr';
  readonly value: LiteralValue;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly operator: Token;
  readonly operand: ExpressionNode;
}

export interface VariableExprNode extends BaseNode {
  readonly type: 'VariableExpr';
  readonly name: Token;
}

export interface AssignExprNode extends BaseNode {
  readonly type: 'AssignExpr';
  readonly name: Token;
  readonly value: ExpressionNode;
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | BlockStmtNode
  | ExpressionStmtNode
  | PrintStmtNode
  | VarStmtNode
  | IfStmtNode
  | WhileStmtNode
  | FunctionStmtNode
  | ReturnStmtNode
  | BreakStmtNode;

export interface BlockStmtNode extends BaseNode {
  readonly type: 'BlockStmt';
  readonly statements: StatementNode[];
}

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExpressionNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExpressionNode;
}

export interface VarStmtNode extends BaseNode {
  readonly type: 'VarStmt';
  readonly name: Token;
  /** null = declared without initializer */
  readonly initializer: ExpressionNode | null;
}

export interface IfStmtNode extends BaseNode {
  readonly type: 'IfStmt';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode;
  readonly elseBranch: StatementNode | null;
}

/**
 * Also the runtime form of `for`, which the parser desugars into
 * Block[initializer, While(cond, Block[body, increment])].
 */
export interface WhileStmtNode extends BaseNode {
  readonly type: 'WhileStmt';
  readonly condition: ExpressionNode;
  readonly body: StatementNode;
}

export interface FunctionStmtNode extends BaseNode {
  readonly type: 'FunctionStmt';
  readonly name: Token;
  readonly params: Token[];
  readonly body: StatementNode[];
}

export interface ReturnStmtNode extends BaseNode {
  readonly type: 'ReturnStmt';
  readonly keyword: Token;
  /** null = bare `return;` (yields nil) */
  readonly value: ExpressionNode | null;
}

export interface BreakStmtNode extends BaseNode {
  readonly type: 'BreakStmt';
  readonly keyword: Token;
}

// ============================================================
// UTILITY TYPES
// ============================================================

export type ASTNode = ExpressionNode | StatementNode;

export type NodeType = ASTNode['type'];
