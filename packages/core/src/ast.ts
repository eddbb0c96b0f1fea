/**
 * Flo Language AST Node Definitions
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Type annotations (carried for formatting, ignored at run time) ---
export interface SimpleType extends BaseNode {
  kind: "SimpleType";
  name: string;
}

export interface GenericType extends BaseNode {
  kind: "GenericType";
  name: string;
  args: TypeExpr[];
}

export interface FunctionType extends BaseNode {
  kind: "FunctionType";
  params: TypeExpr[];
  returns?: TypeExpr;
}

export type TypeExpr = SimpleType | GenericType | FunctionType;

// --- Literals ---
export interface IntLiteral extends BaseNode {
  kind: "IntLiteral";
  value: bigint;
}

export interface FloatLiteral extends BaseNode {
  kind: "FloatLiteral";
  value: number;
}

export interface StringLiteral extends BaseNode {
  kind: "StringLiteral";
  value: string;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export interface NilLiteral extends BaseNode {
  kind: "NilLiteral";
}

export type Literal = IntLiteral | FloatLiteral | StringLiteral | BoolLiteral | NilLiteral;

// --- Names ---
export interface VarRef extends BaseNode {
  kind: "VarRef";
  name: string;
}

export interface Assignment extends BaseNode {
  kind: "Assignment";
  name: string;
  value: Expr;
}

// --- Operators ---
export type BinaryOp =
  | "+" | "-" | "*" | "/" | "%"
  | "==" | "!=" | "<" | ">" | "<=" | ">="
  | "&&" | "||"
  | "|>" | "<|";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type UnaryOp = "-" | "!" | "+";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

// --- Access ---
export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: Expr;
  args: Expr[];
}

export interface IndexExpr extends BaseNode {
  kind: "IndexExpr";
  target: Expr;
  index: Expr;
}

export interface AttrExpr extends BaseNode {
  kind: "AttrExpr";
  target: Expr;
  name: string;
}

export interface OptionalChainExpr extends BaseNode {
  kind: "OptionalChainExpr";
  target: Expr;
  name: string;
}

// --- Collections ---
export interface ListExpr extends BaseNode {
  kind: "ListExpr";
  elements: Expr[];
}

export interface MapEntry extends BaseNode {
  kind: "MapEntry";
  key: string;
  value: Expr;
}

export interface MapExpr extends BaseNode {
  kind: "MapExpr";
  entries: MapEntry[];
}

// --- Control flow ---
export interface ElifClause extends BaseNode {
  kind: "ElifClause";
  cond: Expr;
  body: Stmt[];
}

export interface IfExpr extends BaseNode {
  kind: "IfExpr";
  cond: Expr;
  then: Stmt[];
  elifs: ElifClause[];
  else?: Stmt[];
}

export interface MatchArm extends BaseNode {
  kind: "MatchArm";
  pattern: Pattern;
  body: Expr;
}

export interface MatchExpr extends BaseNode {
  kind: "MatchExpr";
  subject: Expr;
  arms: MatchArm[];
}

export interface ForExpr extends BaseNode {
  kind: "ForExpr";
  binding: string;
  iterable: Expr;
  body: Stmt[];
}

export interface WhileExpr extends BaseNode {
  kind: "WhileExpr";
  cond: Expr;
  body: Stmt[];
}

export interface RescueClause extends BaseNode {
  kind: "RescueClause";
  binding: string;
  body: Stmt[];
}

export interface AttemptExpr extends BaseNode {
  kind: "AttemptExpr";
  body: Stmt[];
  rescue?: RescueClause;
  finally?: Stmt[];
}

// --- Functions ---
export interface Param extends BaseNode {
  kind: "Param";
  name: string;
  type?: TypeExpr;
}

export interface FnExpr extends BaseNode {
  kind: "FnExpr";
  params: Param[];
  returnType?: TypeExpr;
  body: Stmt[];
}

// --- Concurrency ---
export interface StrandExpr extends BaseNode {
  kind: "StrandExpr";
  body: Stmt[];
}

export interface AwaitExpr extends BaseNode {
  kind: "AwaitExpr";
  operand: Expr;
}

// --- Option / Result constructors ---
export interface SomeExpr extends BaseNode {
  kind: "SomeExpr";
  value: Expr;
}

export interface NoneExpr extends BaseNode {
  kind: "NoneExpr";
}

export interface OkExpr extends BaseNode {
  kind: "OkExpr";
  value: Expr;
}

export interface ErrExpr extends BaseNode {
  kind: "ErrExpr";
  value: Expr;
}

export type Expr =
  | Literal
  | VarRef
  | Assignment
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | IndexExpr
  | AttrExpr
  | OptionalChainExpr
  | ListExpr
  | MapExpr
  | IfExpr
  | MatchExpr
  | ForExpr
  | WhileExpr
  | AttemptExpr
  | FnExpr
  | StrandExpr
  | AwaitExpr
  | SomeExpr
  | NoneExpr
  | OkExpr
  | ErrExpr;

// --- Patterns ---
export interface LiteralPattern extends BaseNode {
  kind: "LiteralPattern";
  literal: Literal;
}

export interface VarPattern extends BaseNode {
  kind: "VarPattern";
  name: string;
}

export interface WildcardPattern extends BaseNode {
  kind: "WildcardPattern";
}

export interface OptionPattern extends BaseNode {
  kind: "OptionPattern";
  variant: "Some" | "None";
  inner?: Pattern;
}

export interface ResultPattern extends BaseNode {
  kind: "ResultPattern";
  variant: "Ok" | "Err";
  inner?: Pattern;
}

export interface ListPattern extends BaseNode {
  kind: "ListPattern";
  elements: Pattern[];
}

export type Pattern =
  | LiteralPattern
  | VarPattern
  | WildcardPattern
  | OptionPattern
  | ResultPattern
  | ListPattern;

// --- Statements ---
export interface LetDecl extends BaseNode {
  kind: "LetDecl";
  name: string;
  type?: TypeExpr;
  value: Expr;
}

export interface VarDecl extends BaseNode {
  kind: "VarDecl";
  name: string;
  type?: TypeExpr;
  value: Expr;
}

export interface ConstDecl extends BaseNode {
  kind: "ConstDecl";
  name: string;
  type?: TypeExpr;
  value: Expr;
}

export interface FnDecl extends BaseNode {
  kind: "FnDecl";
  name: string;
  params: Param[];
  returnType?: TypeExpr;
  body: Stmt[];
}

export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value?: Expr;
}

export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expr: Expr;
}

export interface ImportDecl extends BaseNode {
  kind: "ImportDecl";
  name: string;
  path: string;
  version?: string;
  alias?: string;
}

export interface CapabilityRequest extends BaseNode {
  kind: "CapabilityRequest";
  capability: string;
  typeName: string;
}

export type Stmt =
  | LetDecl
  | VarDecl
  | ConstDecl
  | FnDecl
  | ReturnStmt
  | ExprStmt
  | ImportDecl
  | CapabilityRequest;

// --- Module ---
export interface Module extends BaseNode {
  kind: "Module";
  statements: Stmt[];
}
