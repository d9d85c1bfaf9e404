// AST node definitions for the contract language.
// The parser produces these as a strict tree; later stages attach information through
// overlay maps keyed by node identity and never mutate the nodes.

import type { IntrinsicName } from "./token"
import type { IntKind } from "./types"

export interface Span {
	readonly line: number
	readonly column: number
	readonly endLine: number
	readonly endColumn: number
}

// --- Top-level declarations ---

export interface SourceFile {
	readonly kind: "SourceFile"
	readonly contracts: ContractDecl[]
	readonly structs: StructDecl[]
	readonly interfaces: InterfaceDecl[]
	readonly span: Span
}

export interface ContractDecl {
	readonly kind: "ContractDecl"
	readonly name: string
	readonly implements: string[]
	readonly state: StateVarDecl[]
	readonly structs: StructDecl[]
	readonly consts: ConstDecl[]
	readonly events: EventDecl[]
	readonly modifiers: ModifierDecl[]
	readonly functions: FunctionDecl[]
	readonly span: Span
}

export interface StructDecl {
	readonly kind: "StructDecl"
	readonly name: string
	readonly fields: FieldDef[]
	readonly span: Span
}

export interface FieldDef {
	readonly name: string
	readonly typeNode: TypeNode
	readonly span: Span
}

export interface StateVarDecl {
	readonly kind: "StateVarDecl"
	readonly name: string
	readonly typeNode: TypeNode
	readonly init: Expr | null
	readonly span: Span
}

export interface ConstDecl {
	readonly kind: "ConstDecl"
	readonly name: string
	readonly typeNode: TypeNode
	readonly value: Expr
	readonly span: Span
}

export interface EventDecl {
	readonly kind: "EventDecl"
	readonly name: string
	readonly fields: ParamDef[]
	readonly span: Span
}

export interface ModifierDecl {
	readonly kind: "ModifierDecl"
	readonly name: string
	readonly body: Block
	readonly span: Span
}

export type Visibility = "public" | "private"

export interface FunctionDecl {
	readonly kind: "FunctionDecl"
	readonly name: string
	readonly visibility: Visibility
	readonly params: ParamDef[]
	readonly returnType: TypeNode | null
	readonly modifiers: ModifierRef[]
	readonly body: Block
	readonly span: Span
}

export interface ModifierRef {
	readonly name: string
	readonly span: Span
}

export interface InterfaceDecl {
	readonly kind: "InterfaceDecl"
	readonly name: string
	readonly functions: FunctionSig[]
	readonly span: Span
}

export interface FunctionSig {
	readonly name: string
	readonly params: ParamDef[]
	readonly returnType: TypeNode | null
	readonly span: Span
}

export interface ParamDef {
	readonly kind: "ParamDef"
	readonly name: string
	readonly typeNode: TypeNode
	readonly span: Span
}

// --- Type nodes (syntax-level, before resolution) ---

export type TypeNode =
	| PrimitiveTypeNode
	| MapTypeNode
	| VecTypeNode
	| ArrayTypeNode
	| TupleTypeNode
	| OptionTypeNode
	| ResultTypeNode
	| NamedTypeNode

export interface PrimitiveTypeNode {
	readonly kind: "PrimitiveType"
	readonly name: IntKind | "bool" | "address" | "string" | "bytes"
	readonly span: Span
}

export interface MapTypeNode {
	readonly kind: "MapType"
	readonly key: TypeNode
	readonly value: TypeNode
	readonly span: Span
}

export interface VecTypeNode {
	readonly kind: "VecType"
	readonly element: TypeNode
	readonly span: Span
}

export interface ArrayTypeNode {
	readonly kind: "ArrayType"
	readonly element: TypeNode
	readonly size: number
	readonly span: Span
}

export interface TupleTypeNode {
	readonly kind: "TupleType"
	readonly elements: TypeNode[]
	readonly span: Span
}

export interface OptionTypeNode {
	readonly kind: "OptionType"
	readonly inner: TypeNode
	readonly span: Span
}

export interface ResultTypeNode {
	readonly kind: "ResultType"
	readonly ok: TypeNode
	readonly err: TypeNode
	readonly span: Span
}

export interface NamedTypeNode {
	readonly kind: "NamedType"
	readonly name: string
	readonly span: Span
}

// --- Statements ---

export type Stmt =
	| LetStmt
	| AssignStmt
	| ExprStmt
	| IfStmt
	| WhileStmt
	| ForRangeStmt
	| ForEachStmt
	| MatchStmt
	| RequireStmt
	| EmitStmt
	| ReturnStmt
	| PlaceholderStmt
	| Block

export interface Block {
	readonly kind: "Block"
	readonly stmts: Stmt[]
	readonly span: Span
}

export interface LetStmt {
	readonly kind: "LetStmt"
	readonly name: string
	readonly mutable: boolean
	readonly typeNode: TypeNode | null
	readonly init: Expr
	readonly span: Span
}

export type AssignOp = "=" | "+=" | "-=" | "*=" | "/="

export interface AssignStmt {
	readonly kind: "AssignStmt"
	readonly target: Expr
	readonly op: AssignOp
	readonly value: Expr
	readonly span: Span
}

export interface ExprStmt {
	readonly kind: "ExprStmt"
	readonly expr: Expr
	readonly span: Span
}

export interface IfStmt {
	readonly kind: "IfStmt"
	readonly condition: Expr
	readonly then: Block
	readonly else_: Block | IfStmt | null
	readonly span: Span
}

export interface WhileStmt {
	readonly kind: "WhileStmt"
	readonly condition: Expr
	readonly body: Block
	readonly span: Span
}

export interface ForRangeStmt {
	readonly kind: "ForRangeStmt"
	readonly variable: string
	readonly start: Expr
	readonly end: Expr
	readonly body: Block
	readonly span: Span
}

export interface ForEachStmt {
	readonly kind: "ForEachStmt"
	readonly variable: string
	readonly iterable: Expr
	readonly body: Block
	readonly span: Span
}

export interface MatchStmt {
	readonly kind: "MatchStmt"
	readonly subject: Expr
	readonly arms: MatchStmtArm[]
	readonly span: Span
}

export interface MatchStmtArm {
	readonly patterns: Pattern[]
	readonly body: Block
	readonly span: Span
}

export type Pattern =
	| { readonly kind: "WildcardPattern"; readonly span: Span }
	| { readonly kind: "LiteralPattern"; readonly value: IntLiteral | BoolLiteral | StringLiteral }

export interface RequireStmt {
	readonly kind: "RequireStmt"
	readonly condition: Expr
	readonly message: string | null
	readonly span: Span
}

export interface EmitStmt {
	readonly kind: "EmitStmt"
	readonly event: string
	readonly args: Expr[]
	readonly span: Span
}

export interface ReturnStmt {
	readonly kind: "ReturnStmt"
	readonly value: Expr | null
	readonly span: Span
}

/** `_;` inside a modifier body: where the modified function's body goes. */
export interface PlaceholderStmt {
	readonly kind: "PlaceholderStmt"
	readonly span: Span
}

// --- Expressions ---

export type Expr =
	| IntLiteral
	| BoolLiteral
	| StringLiteral
	| BytesLiteral
	| Ident
	| IntrinsicExpr
	| UnaryExpr
	| BinaryExpr
	| TernaryExpr
	| CallExpr
	| MethodCallExpr
	| FieldAccess
	| IndexAccess
	| StructLiteral
	| ArrayLiteral
	| TupleLiteral
	| LambdaExpr
	| MatchExpr
	| ConstructorExpr
	| GroupExpr

export interface IntLiteral {
	readonly kind: "IntLiteral"
	readonly value: bigint
	/** Explicit width suffix, e.g. the `u8` in `255u8`. */
	readonly suffix: IntKind | null
	readonly span: Span
}

export interface BoolLiteral {
	readonly kind: "BoolLiteral"
	readonly value: boolean
	readonly span: Span
}

export interface StringLiteral {
	readonly kind: "StringLiteral"
	readonly value: string
	readonly span: Span
}

export interface BytesLiteral {
	readonly kind: "BytesLiteral"
	readonly value: string
	readonly span: Span
}

export interface Ident {
	readonly kind: "Ident"
	readonly name: string
	readonly span: Span
}

export interface IntrinsicExpr {
	readonly kind: "IntrinsicExpr"
	readonly name: IntrinsicName
	readonly span: Span
}

export type UnaryOp = "-" | "!"

export interface UnaryExpr {
	readonly kind: "UnaryExpr"
	readonly op: UnaryOp
	readonly operand: Expr
	readonly span: Span
}

export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "==" | "!=" | "<" | ">" | "<=" | ">=" | "&&" | "||"

export interface BinaryExpr {
	readonly kind: "BinaryExpr"
	readonly op: BinaryOp
	readonly left: Expr
	readonly right: Expr
	readonly span: Span
}

export interface TernaryExpr {
	readonly kind: "TernaryExpr"
	readonly condition: Expr
	readonly then: Expr
	readonly else_: Expr
	readonly span: Span
}

/** Calls a contract function, a local lambda, or an integer conversion such as `u64(x)`. */
export interface CallExpr {
	readonly kind: "CallExpr"
	readonly callee: string
	readonly args: Expr[]
	readonly span: Span
}

export interface MethodCallExpr {
	readonly kind: "MethodCallExpr"
	readonly receiver: Expr
	readonly method: string
	readonly args: Expr[]
	readonly span: Span
}

export interface FieldAccess {
	readonly kind: "FieldAccess"
	readonly object: Expr
	/** A struct field name, or a tuple position such as "0". */
	readonly field: string
	readonly span: Span
}

export interface IndexAccess {
	readonly kind: "IndexAccess"
	readonly object: Expr
	readonly index: Expr
	readonly span: Span
}

export interface StructLiteral {
	readonly kind: "StructLiteral"
	readonly typeName: string
	readonly fields: StructFieldInit[]
	readonly span: Span
}

export interface StructFieldInit {
	readonly name: string
	readonly value: Expr
	readonly span: Span
}

export interface ArrayLiteral {
	readonly kind: "ArrayLiteral"
	readonly elements: Expr[]
	readonly span: Span
}

export interface TupleLiteral {
	readonly kind: "TupleLiteral"
	readonly elements: Expr[]
	readonly span: Span
}

export interface LambdaExpr {
	readonly kind: "LambdaExpr"
	readonly params: ParamDef[]
	readonly body: Expr
	readonly span: Span
}

export interface MatchExpr {
	readonly kind: "MatchExpr"
	readonly subject: Expr
	readonly arms: MatchExprArm[]
	readonly span: Span
}

export interface MatchExprArm {
	readonly patterns: Pattern[]
	readonly value: Expr
	readonly span: Span
}

/** `Some(x)`, `None`, `Ok(x)`, `Err(e)`. */
export interface ConstructorExpr {
	readonly kind: "ConstructorExpr"
	readonly ctor: "Some" | "None" | "Ok" | "Err"
	readonly arg: Expr | null
	readonly span: Span
}

export interface GroupExpr {
	readonly kind: "GroupExpr"
	readonly expr: Expr
	readonly span: Span
}

/** Nodes that introduce a named binding the analyzer records. */
export type DeclNode = LetStmt | ForRangeStmt | ForEachStmt | ParamDef
