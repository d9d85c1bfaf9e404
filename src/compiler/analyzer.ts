// Semantic analyzer. Per contract, two passes: collect declarations, then type-check bodies.
// Results are overlay maps keyed by AST node identity; the AST itself is never touched.

import type {
	Block,
	CallExpr,
	ContractDecl,
	DeclNode,
	Expr,
	FunctionDecl,
	Ident,
	InterfaceDecl,
	LetStmt,
	MatchExpr,
	MatchStmt,
	MethodCallExpr,
	ModifierDecl,
	ParamDef,
	Pattern,
	SourceFile,
	Span,
	Stmt,
	StructDecl,
	TypeNode,
} from "./ast"
import { applyArith, compare, convertInt, isArithOp, isCompareOp, negate } from "./arith"
import { type DiagnosticCode, DiagnosticList } from "./errors"
import { type ScopeId, ScopeArena, type SymbolInfo } from "./scopes"
import {
	ADDRESS,
	BOOL,
	BYTES,
	ERROR,
	type IntKind,
	STRING,
	type SemType,
	type StructType,
	U64,
	VOID,
	containsType,
	fitsInt,
	intType,
	isIntKind,
	isSigned,
	isUnsignedInt,
	typeEq,
	typeToString,
} from "./types"

// --- Public interfaces ---

export type CallTarget =
	| { readonly kind: "function"; readonly name: string }
	| { readonly kind: "conversion"; readonly to: IntKind }
	| { readonly kind: "lambda"; readonly symbol: SymbolInfo }

export interface ParamInfo {
	readonly name: string
	readonly type: SemType
}

export interface FunctionInfo {
	readonly name: string
	readonly visibility: "public" | "private"
	readonly params: readonly ParamInfo[]
	readonly returnType: SemType
	readonly decl: FunctionDecl
}

export interface EventInfo {
	readonly name: string
	readonly fields: readonly ParamInfo[]
}

export interface StateVarInfo {
	readonly name: string
	readonly type: SemType
	readonly symbol: SymbolInfo
}

export interface ContractInfo {
	readonly name: string
	/** Every struct visible in the contract, top-level ones first, in declaration order. */
	readonly structs: ReadonlyMap<string, StructType>
	readonly state: readonly StateVarInfo[]
	readonly consts: ReadonlyMap<string, SymbolInfo>
	readonly events: ReadonlyMap<string, EventInfo>
	readonly functions: ReadonlyMap<string, FunctionInfo>
	readonly modifiers: ReadonlyMap<string, ModifierDecl>
}

export interface ContractAnalysis {
	readonly contract: ContractDecl
	readonly info: ContractInfo
	readonly types: ReadonlyMap<Expr, SemType>
	readonly references: ReadonlyMap<Ident, SymbolInfo>
	readonly calls: ReadonlyMap<CallExpr, CallTarget>
	readonly declarations: ReadonlyMap<DeclNode, SymbolInfo>
	readonly diagnostics: DiagnosticList
}

export interface FileAnalysis {
	readonly file: SourceFile
	readonly contracts: readonly ContractAnalysis[]
	/** Diagnostics from top-level structs and interfaces; they fail every contract. */
	readonly diagnostics: DiagnosticList
}

interface InterfaceInfo {
	readonly name: string
	readonly functions: readonly {
		readonly name: string
		readonly params: readonly SemType[]
		readonly returnType: SemType
	}[]
}

// --- Entry point ---

export function analyze(file: SourceFile): FileAnalysis {
	const diagnostics = new DiagnosticList()
	const structs = resolveStructs(file.structs, new Map(), diagnostics)
	const interfaces = resolveInterfaces(file.interfaces, structs, diagnostics)
	const seen = new Set<string>()
	const contracts = file.contracts.map((c) => {
		const analysis = new ContractAnalyzer(c, structs, interfaces).analyze()
		if (seen.has(c.name)) {
			analysis.diagnostics.add(
				"semantic",
				"DuplicateDeclaration",
				c.span,
				`contract '${c.name}' is already declared`,
			)
		}
		seen.add(c.name)
		return analysis
	})
	return { file, contracts, diagnostics }
}

// --- Type resolution ---

type StructLookup = (name: string, span: Span) => SemType

function resolveTypeNode(
	node: TypeNode,
	lookup: StructLookup,
	diagnostics: DiagnosticList,
): SemType {
	const resolve = (n: TypeNode) => resolveTypeNode(n, lookup, diagnostics)
	switch (node.kind) {
		case "PrimitiveType":
			switch (node.name) {
				case "bool":
					return BOOL
				case "address":
					return ADDRESS
				case "string":
					return STRING
				case "bytes":
					return BYTES
				default:
					return intType(node.name)
			}
		case "MapType": {
			const key = resolve(node.key)
			const value = resolve(node.value)
			if (!isMapKeyType(key)) {
				diagnostics.add(
					"semantic",
					"InvalidType",
					node.key.span,
					`map keys must be an integer, bool, address, string or bytes, found ${typeToString(key)}`,
				)
			}
			if (containsType(value, (t) => t.kind === "map")) {
				diagnostics.add("semantic", "InvalidType", node.value.span, "map values cannot contain maps")
			}
			return { kind: "map", key, value }
		}
		case "VecType":
			return { kind: "vector", element: resolve(node.element) }
		case "ArrayType":
			if (node.size <= 0) {
				diagnostics.add("semantic", "InvalidType", node.span, "array length must be positive")
			}
			return { kind: "array", element: resolve(node.element), size: node.size }
		case "TupleType":
			return { kind: "tuple", elements: node.elements.map(resolve) }
		case "OptionType":
			return { kind: "option", inner: resolve(node.inner) }
		case "ResultType":
			return { kind: "result", ok: resolve(node.ok), err: resolve(node.err) }
		case "NamedType":
			return lookup(node.name, node.span)
	}
}

function isMapKeyType(t: SemType): boolean {
	return (
		t.kind === "int" ||
		t.kind === "bool" ||
		t.kind === "address" ||
		t.kind === "string" ||
		t.kind === "bytes" ||
		t.kind === "error"
	)
}

/** Resolves struct declarations on top of `base`, rejecting duplicates and recursion. */
function resolveStructs(
	decls: readonly StructDecl[],
	base: ReadonlyMap<string, StructType>,
	diagnostics: DiagnosticList,
): Map<string, StructType> {
	const resolved = new Map<string, StructType>(base)
	const pending = new Map<string, StructDecl>()
	for (const decl of decls) {
		if (resolved.has(decl.name) || pending.has(decl.name)) {
			diagnostics.add(
				"semantic",
				"DuplicateDeclaration",
				decl.span,
				`struct '${decl.name}' is already declared`,
			)
			continue
		}
		pending.set(decl.name, decl)
	}

	const inProgress = new Set<string>()
	const resolveOne = (decl: StructDecl): SemType => {
		const done = resolved.get(decl.name)
		if (done) return done
		if (inProgress.has(decl.name)) {
			diagnostics.add(
				"semantic",
				"InvalidType",
				decl.span,
				`struct '${decl.name}' contains itself`,
			)
			return ERROR
		}
		inProgress.add(decl.name)
		const names = new Set<string>()
		const fields = decl.fields.map((f) => {
			if (names.has(f.name)) {
				diagnostics.add(
					"semantic",
					"DuplicateDeclaration",
					f.span,
					`field '${f.name}' is already declared in struct '${decl.name}'`,
				)
			}
			names.add(f.name)
			const type = resolveTypeNode(f.typeNode, lookup, diagnostics)
			if (containsType(type, (t) => t.kind === "map")) {
				diagnostics.add(
					"semantic",
					"InvalidType",
					f.typeNode.span,
					"map types are only allowed as state variable types",
				)
			}
			return { name: f.name, type }
		})
		inProgress.delete(decl.name)
		const type: StructType = { kind: "struct", name: decl.name, fields }
		resolved.set(decl.name, type)
		return type
	}

	const lookup: StructLookup = (name, span) => {
		const done = resolved.get(name)
		if (done) return done
		const decl = pending.get(name)
		if (decl) return resolveOne(decl)
		diagnostics.add("semantic", "UndefinedSymbol", span, `unknown type '${name}'`)
		return ERROR
	}

	for (const decl of pending.values()) resolveOne(decl)
	return resolved
}

function resolveInterfaces(
	decls: readonly InterfaceDecl[],
	structs: ReadonlyMap<string, StructType>,
	diagnostics: DiagnosticList,
): Map<string, InterfaceInfo> {
	const lookup: StructLookup = (name, span) => {
		const found = structs.get(name)
		if (found) return found
		diagnostics.add("semantic", "UndefinedSymbol", span, `unknown type '${name}'`)
		return ERROR
	}
	const interfaces = new Map<string, InterfaceInfo>()
	for (const decl of decls) {
		if (interfaces.has(decl.name)) {
			diagnostics.add(
				"semantic",
				"DuplicateDeclaration",
				decl.span,
				`interface '${decl.name}' is already declared`,
			)
			continue
		}
		interfaces.set(decl.name, {
			name: decl.name,
			functions: decl.functions.map((sig) => ({
				name: sig.name,
				params: sig.params.map((p) => resolveTypeNode(p.typeNode, lookup, diagnostics)),
				returnType: sig.returnType ? resolveTypeNode(sig.returnType, lookup, diagnostics) : VOID,
			})),
		})
	}
	return interfaces
}

// --- Analyzer ---

type BodyMode = "function" | "modifier" | "initializer" | "const"

interface BodyContext {
	readonly mode: BodyMode
	readonly returnType: SemType
}

class ContractAnalyzer {
	private diagnostics = new DiagnosticList()
	private scopes = new ScopeArena()
	private contractScope: ScopeId
	private types = new Map<Expr, SemType>()
	private references = new Map<Ident, SymbolInfo>()
	private calls = new Map<CallExpr, CallTarget>()
	private declarations = new Map<DeclNode, SymbolInfo>()
	private structs = new Map<string, StructType>()
	private state: StateVarInfo[] = []
	private consts = new Map<string, SymbolInfo>()
	private events = new Map<string, { name: string; fields: ParamInfo[] }>()
	private functions = new Map<string, FunctionInfo>()
	private modifiers = new Map<string, ModifierDecl>()
	private ctx: BodyContext = { mode: "function", returnType: VOID }

	constructor(
		private readonly contract: ContractDecl,
		private readonly fileStructs: ReadonlyMap<string, StructType>,
		private readonly interfaces: ReadonlyMap<string, InterfaceInfo>,
	) {
		this.contractScope = this.scopes.push(null)
	}

	analyze(): ContractAnalysis {
		this.pass1()
		this.pass2()
		return {
			contract: this.contract,
			info: {
				name: this.contract.name,
				structs: this.structs,
				state: this.state,
				consts: this.consts,
				events: this.events,
				functions: this.functions,
				modifiers: this.modifiers,
			},
			types: this.types,
			references: this.references,
			calls: this.calls,
			declarations: this.declarations,
			diagnostics: this.diagnostics,
		}
	}

	private error(code: DiagnosticCode, message: string, span: Span, hint?: string): void {
		this.diagnostics.add("semantic", code, span, message, hint)
	}

	private resolveType(node: TypeNode): SemType {
		return resolveTypeNode(
			node,
			(name, span) => {
				const found = this.structs.get(name)
				if (found) return found
				this.error("UndefinedSymbol", `unknown type '${name}'`, span)
				return ERROR
			},
			this.diagnostics,
		)
	}

	/** Resolves a type that may not contain maps (everything except state variables). */
	private resolveValueType(node: TypeNode): SemType {
		const type = this.resolveType(node)
		if (containsType(type, (t) => t.kind === "map")) {
			this.error("InvalidType", "map types are only allowed as state variable types", node.span)
			return ERROR
		}
		return type
	}

	// --- Pass 1: collect declarations ---

	private pass1(): void {
		const c = this.contract

		for (const [name, type] of resolveStructs(c.structs, this.fileStructs, this.diagnostics)) {
			this.structs.set(name, type)
		}

		for (const decl of c.consts) {
			const type = this.resolveType(decl.typeNode)
			if (type.kind !== "int" && type.kind !== "bool" && type.kind !== "error") {
				this.error(
					"InvalidType",
					`constants must be an integer or bool, found ${typeToString(type)}`,
					decl.typeNode.span,
				)
			}
			const value = this.checkConstInit(decl.value, type)
			const { duplicate, symbol } = this.scopes.declare(
				this.contractScope,
				decl.name,
				type,
				"const",
				false,
				value ?? undefined,
			)
			if (duplicate) {
				this.error("DuplicateDeclaration", `'${decl.name}' is already declared`, decl.span)
			} else {
				this.consts.set(decl.name, symbol)
			}
		}

		for (const decl of c.state) {
			const type = this.resolveType(decl.typeNode)
			const { duplicate, symbol } = this.scopes.declare(
				this.contractScope,
				decl.name,
				type,
				"state",
				true,
			)
			if (duplicate) {
				this.error("DuplicateDeclaration", `'${decl.name}' is already declared`, decl.span)
				continue
			}
			this.state.push({ name: decl.name, type, symbol })
		}

		for (const decl of c.events) {
			if (this.events.has(decl.name)) {
				this.error("DuplicateDeclaration", `event '${decl.name}' is already declared`, decl.span)
				continue
			}
			this.checkDistinctNames(decl.fields, "event field")
			this.events.set(decl.name, {
				name: decl.name,
				fields: decl.fields.map((f) => ({ name: f.name, type: this.resolveValueType(f.typeNode) })),
			})
		}

		for (const decl of c.modifiers) {
			if (this.modifiers.has(decl.name)) {
				this.error(
					"DuplicateDeclaration",
					`modifier '${decl.name}' is already declared`,
					decl.span,
				)
				continue
			}
			this.modifiers.set(decl.name, decl)
		}

		for (const decl of c.functions) {
			if (this.functions.has(decl.name)) {
				this.error(
					"DuplicateDeclaration",
					`function '${decl.name}' is already declared`,
					decl.span,
				)
				continue
			}
			this.functions.set(decl.name, {
				name: decl.name,
				visibility: decl.visibility,
				params: decl.params.map((p) => ({ name: p.name, type: this.resolveValueType(p.typeNode) })),
				returnType: decl.returnType ? this.resolveValueType(decl.returnType) : VOID,
				decl,
			})
		}
	}

	private checkDistinctNames(params: readonly ParamDef[], what: string): void {
		const seen = new Set<string>()
		for (const p of params) {
			if (seen.has(p.name)) {
				this.error("DuplicateDeclaration", `${what} '${p.name}' is already declared`, p.span)
			}
			seen.add(p.name)
		}
	}

	// --- Pass 2: check bodies ---

	private pass2(): void {
		const c = this.contract

		for (const decl of c.state) {
			if (!decl.init) continue
			const info = this.state.find((s) => s.name === decl.name)
			if (!info) continue
			this.ctx = { mode: "initializer", returnType: VOID }
			const scope = this.scopes.push(this.contractScope)
			this.expectType(this.checkExpr(decl.init, scope, info.type), info.type, decl.init.span)
		}

		for (const decl of c.modifiers) {
			this.checkModifier(decl)
		}

		for (const decl of c.functions) {
			const info = this.functions.get(decl.name)
			if (info && info.decl === decl) this.checkFunction(info)
		}

		for (const name of c.implements) {
			this.checkImplements(name)
		}
	}

	private checkConstInit(expr: Expr, type: SemType): bigint | boolean | null {
		this.ctx = { mode: "const", returnType: VOID }
		const scope = this.scopes.push(this.contractScope)
		this.expectType(this.checkExpr(expr, scope, type), type, expr.span)
		const value = this.evalConst(expr)
		if (value === null) {
			this.error(
				"InvalidInitializer",
				"constant initializer must be a compile-time constant expression",
				expr.span,
			)
		}
		return value
	}

	/** Evaluates an already-checked constant expression; null if it is not constant or traps. */
	private evalConst(expr: Expr): bigint | boolean | null {
		switch (expr.kind) {
			case "IntLiteral":
			case "BoolLiteral":
				return expr.value
			case "GroupExpr":
				return this.evalConst(expr.expr)
			case "Ident": {
				const symbol = this.references.get(expr)
				return symbol?.constValue ?? null
			}
			case "UnaryExpr": {
				const operand = this.evalConst(expr.operand)
				if (expr.op === "!") return typeof operand === "boolean" ? !operand : null
				const type = this.types.get(expr)
				if (typeof operand !== "bigint" || type?.kind !== "int") return null
				const result = negate(operand, type.int)
				return this.constResult(result, expr.span)
			}
			case "BinaryExpr": {
				const left = this.evalConst(expr.left)
				const right = this.evalConst(expr.right)
				if (left === null || right === null) return null
				if (typeof left === "boolean" && typeof right === "boolean") {
					if (expr.op === "&&") return left && right
					if (expr.op === "||") return left || right
					if (expr.op === "==") return left === right
					if (expr.op === "!=") return left !== right
					return null
				}
				if (typeof left !== "bigint" || typeof right !== "bigint") return null
				if (isCompareOp(expr.op)) return compare(expr.op, left, right)
				const type = this.types.get(expr)
				if (!isArithOp(expr.op) || type?.kind !== "int") return null
				return this.constResult(applyArith(expr.op, left, right, type.int), expr.span)
			}
			case "TernaryExpr": {
				const cond = this.evalConst(expr.condition)
				if (typeof cond !== "boolean") return null
				return this.evalConst(cond ? expr.then : expr.else_)
			}
			case "CallExpr": {
				const target = this.calls.get(expr)
				const arg = expr.args[0]
				if (target?.kind !== "conversion" || !arg) return null
				const value = this.evalConst(arg)
				if (typeof value !== "bigint") return null
				return this.constResult(convertInt(value, target.to), expr.span)
			}
			default:
				return null
		}
	}

	private constResult(
		result: ReturnType<typeof applyArith>,
		span: Span,
	): bigint | null {
		if (result.ok) return result.value
		this.error("InvalidInitializer", `constant expression traps: ${result.trap}`, span)
		return null
	}

	private checkModifier(decl: ModifierDecl): void {
		this.ctx = { mode: "modifier", returnType: VOID }
		const placeholders = decl.body.stmts.filter((s) => s.kind === "PlaceholderStmt").length
		if (placeholders !== 1) {
			this.error(
				"InvalidModifier",
				`modifier '${decl.name}' must contain exactly one '_;' at the top level of its body, found ${placeholders}`,
				decl.span,
			)
		}
		const scope = this.scopes.push(this.contractScope)
		this.checkStmts(decl.body.stmts, scope, true)
	}

	private checkFunction(info: FunctionInfo): void {
		const decl = info.decl
		this.ctx = { mode: "function", returnType: info.returnType }

		for (const ref of decl.modifiers) {
			if (!this.modifiers.has(ref.name)) {
				this.error("InvalidModifier", `unknown modifier '${ref.name}'`, ref.span)
			}
		}

		// Parameters and the body's top-level statements share the function scope
		const scope = this.scopes.push(this.contractScope)
		decl.params.forEach((p, i) => {
			const type = info.params[i]?.type ?? ERROR
			this.declare(scope, p, p.name, type, "param", false)
		})

		const returns = this.checkStmts(decl.body.stmts, scope, false)
		if (info.returnType.kind !== "void" && !returns) {
			this.error(
				"MissingReturn",
				`function '${decl.name}' must return ${typeToString(info.returnType)} on every path`,
				decl.span,
			)
		}
	}

	private checkImplements(name: string): void {
		const iface = this.interfaces.get(name)
		if (!iface) {
			this.error("UndefinedSymbol", `unknown interface '${name}'`, this.contract.span)
			return
		}
		for (const sig of iface.functions) {
			const fn = this.functions.get(sig.name)
			const matches =
				fn !== undefined &&
				fn.visibility === "public" &&
				fn.params.length === sig.params.length &&
				fn.params.every((p, i) => typeEq(p.type, sig.params[i]!)) &&
				typeEq(fn.returnType, sig.returnType)
			if (!matches) {
				const params = sig.params.map(typeToString).join(", ")
				const ret = sig.returnType.kind === "void" ? "" : ` -> ${typeToString(sig.returnType)}`
				this.error(
					"InterfaceMismatch",
					`contract '${this.contract.name}' does not implement 'public fn ${sig.name}(${params})${ret}' from interface '${name}'`,
					fn?.decl.span ?? this.contract.span,
				)
			}
		}
	}

	private declare(
		scope: ScopeId,
		node: DeclNode,
		name: string,
		type: SemType,
		kind: "param" | "local" | "loop",
		mutable: boolean,
	): void {
		const { symbol, duplicate } = this.scopes.declare(scope, name, type, kind, mutable)
		if (duplicate) {
			this.error("DuplicateDeclaration", `'${name}' is already declared in this scope`, node.span)
		}
		this.declarations.set(node, symbol)
	}

	// --- Statements ---

	/**
	 * Checks statements in `scope`; returns whether the sequence always returns.
	 * Statements after one that always returns are reported once as unreachable.
	 */
	private checkStmts(stmts: readonly Stmt[], scope: ScopeId, topOfModifier: boolean): boolean {
		let returns = false
		let warned = false
		for (const stmt of stmts) {
			if (returns && !warned) {
				this.diagnostics.warn("semantic", "UnreachableCode", stmt.span, "unreachable code")
				warned = true
			}
			if (stmt.kind === "PlaceholderStmt") {
				if (!topOfModifier) {
					this.error(
						"InvalidModifier",
						"'_;' is only allowed at the top level of a modifier body",
						stmt.span,
					)
				}
				continue
			}
			if (this.checkStmt(stmt, scope)) returns = true
		}
		return returns
	}

	private checkBlock(block: Block, parent: ScopeId): boolean {
		return this.checkStmts(block.stmts, this.scopes.push(parent), false)
	}

	/** Returns whether the statement always returns (or never completes). */
	private checkStmt(stmt: Stmt, scope: ScopeId): boolean {
		switch (stmt.kind) {
			case "LetStmt":
				this.checkLet(stmt, scope)
				return false

			case "AssignStmt": {
				const targetType = this.checkPlace(stmt.target, scope)
				const valueType = this.checkExpr(stmt.value, scope, targetType)
				if (stmt.op !== "=" && targetType.kind !== "int" && targetType.kind !== "error") {
					this.error(
						"TypeMismatch",
						`'${stmt.op}' needs an integer target, found ${typeToString(targetType)}`,
						stmt.span,
					)
					return false
				}
				this.expectType(valueType, targetType, stmt.value.span)
				return false
			}

			case "ExprStmt":
				this.checkExpr(stmt.expr, scope)
				return false

			case "IfStmt": {
				this.expectCondition(this.checkExpr(stmt.condition, scope, BOOL), stmt.condition.span)
				const thenReturns = this.checkBlock(stmt.then, scope)
				if (!stmt.else_) return false
				const elseReturns =
					stmt.else_.kind === "Block"
						? this.checkBlock(stmt.else_, scope)
						: this.checkStmt(stmt.else_, scope)
				return thenReturns && elseReturns
			}

			case "WhileStmt": {
				this.expectCondition(this.checkExpr(stmt.condition, scope, BOOL), stmt.condition.span)
				this.checkBlock(stmt.body, scope)
				// `while true` only ends through a return
				return isLiteralTrue(stmt.condition)
			}

			case "ForRangeStmt": {
				let startType: SemType
				let endType: SemType
				if (isUntypedIntLiteral(stmt.start)) {
					endType = this.checkExpr(stmt.end, scope)
					startType = this.checkExpr(stmt.start, scope, endType)
				} else {
					startType = this.checkExpr(stmt.start, scope)
					endType = this.checkExpr(stmt.end, scope, startType)
				}
				if (startType.kind !== "int" && startType.kind !== "error") {
					this.error(
						"TypeMismatch",
						`range bounds must be integers, found ${typeToString(startType)}`,
						stmt.start.span,
					)
				} else {
					this.expectType(endType, startType, stmt.end.span)
				}
				const bodyScope = this.scopes.push(scope)
				this.declare(bodyScope, stmt, stmt.variable, startType, "loop", false)
				this.checkStmts(stmt.body.stmts, bodyScope, false)
				return false
			}

			case "ForEachStmt": {
				const iterType = this.checkExpr(stmt.iterable, scope)
				let element: SemType = ERROR
				if (iterType.kind === "vector" || iterType.kind === "array") {
					element = iterType.element
				} else if (iterType.kind !== "error") {
					this.error(
						"TypeMismatch",
						`cannot iterate over ${typeToString(iterType)}, expected a vector or array`,
						stmt.iterable.span,
					)
				}
				const bodyScope = this.scopes.push(scope)
				this.declare(bodyScope, stmt, stmt.variable, element, "loop", false)
				this.checkStmts(stmt.body.stmts, bodyScope, false)
				return false
			}

			case "MatchStmt":
				return this.checkMatchStmt(stmt, scope)

			case "RequireStmt":
				this.expectCondition(this.checkExpr(stmt.condition, scope, BOOL), stmt.condition.span)
				return false

			case "EmitStmt": {
				const event = this.events.get(stmt.event)
				if (!event) {
					for (const arg of stmt.args) this.checkExpr(arg, scope)
					this.error("UndefinedSymbol", `undefined event '${stmt.event}'`, stmt.span)
					return false
				}
				this.checkArgs(`event '${event.name}'`, event.fields, stmt.args, scope, stmt.span)
				return false
			}

			case "ReturnStmt": {
				if (this.ctx.mode === "modifier") {
					this.error("InvalidModifier", "'return' is not allowed in a modifier", stmt.span)
					if (stmt.value) this.checkExpr(stmt.value, scope)
					return true
				}
				const expected = this.ctx.returnType
				if (!stmt.value) {
					if (expected.kind !== "void" && expected.kind !== "error") {
						this.error(
							"TypeMismatch",
							`return type mismatch: expected ${typeToString(expected)}, found nothing`,
							stmt.span,
						)
					}
					return true
				}
				const found = this.checkExpr(stmt.value, scope, expected)
				if (expected.kind === "void") {
					this.error(
						"TypeMismatch",
						`return type mismatch: function returns nothing, found ${typeToString(found)}`,
						stmt.span,
					)
				} else if (!typeEq(found, expected)) {
					this.error(
						"TypeMismatch",
						`return type mismatch: expected ${typeToString(expected)}, found ${typeToString(found)}`,
						stmt.span,
					)
				}
				return true
			}

			case "PlaceholderStmt":
				this.error(
					"InvalidModifier",
					"'_;' is only allowed at the top level of a modifier body",
					stmt.span,
				)
				return false

			case "Block":
				return this.checkBlock(stmt, scope)
		}
	}

	private checkLet(stmt: LetStmt, scope: ScopeId): void {
		const declared = stmt.typeNode ? this.resolveValueType(stmt.typeNode) : null
		const initType = this.checkExpr(stmt.init, scope, declared ?? undefined)
		let type = declared ?? initType
		if (initType.kind === "void") {
			this.error("TypeMismatch", "expression has no value", stmt.init.span)
			type = ERROR
		} else if (declared) {
			this.expectType(initType, declared, stmt.init.span)
		}
		this.declare(scope, stmt, stmt.name, type, "local", stmt.mutable)
	}

	private checkMatchStmt(stmt: MatchStmt, scope: ScopeId): boolean {
		const subject = this.checkMatchSubject(stmt.subject, scope)
		let allReturn = stmt.arms.length > 0
		for (const arm of stmt.arms) {
			this.checkPatterns(arm.patterns, subject, scope)
			if (!this.checkBlock(arm.body, scope)) allReturn = false
		}
		const exhaustive = this.checkExhaustive(stmt.arms, subject, stmt.span)
		return exhaustive && allReturn
	}

	// --- Expressions ---

	private checkExpr(expr: Expr, scope: ScopeId, hint?: SemType): SemType {
		const type = this.inferExpr(expr, scope, hint)
		this.types.set(expr, type)
		return type
	}

	private inferExpr(expr: Expr, scope: ScopeId, hint: SemType | undefined): SemType {
		switch (expr.kind) {
			case "IntLiteral": {
				const kind = expr.suffix ?? (hint?.kind === "int" ? hint.int : "u64")
				if (!fitsInt(expr.value, kind)) {
					this.error(
						"TypeMismatch",
						`integer literal ${expr.value} does not fit in ${kind}`,
						expr.span,
					)
				}
				return intType(kind)
			}

			case "BoolLiteral":
				return BOOL

			case "StringLiteral":
				return STRING

			case "BytesLiteral":
				return BYTES

			case "Ident":
				return this.checkIdent(expr, scope)

			case "IntrinsicExpr":
				return expr.name === "msg_sender" ? ADDRESS : U64

			case "UnaryExpr": {
				if (expr.op === "!") {
					const operand = this.checkExpr(expr.operand, scope, BOOL)
					this.expectType(operand, BOOL, expr.operand.span)
					return BOOL
				}
				const inner = expr.operand
				if (inner.kind === "IntLiteral") {
					// Negative literal: the range check applies to the negated value
					const kind = inner.suffix ?? (hint?.kind === "int" ? hint.int : "i64")
					this.types.set(inner, intType(kind))
					if (!isSigned(kind) || !fitsInt(-inner.value, kind)) {
						this.error(
							"TypeMismatch",
							`integer literal -${inner.value} does not fit in ${kind}`,
							expr.span,
						)
					}
					return intType(kind)
				}
				const operand = this.checkExpr(inner, scope, hint)
				if (operand.kind === "error") return ERROR
				if (operand.kind !== "int" || !isSigned(operand.int)) {
					this.error(
						"TypeMismatch",
						`cannot negate a value of type ${typeToString(operand)}`,
						expr.span,
						operand.kind === "int" ? "only signed integers can be negated" : undefined,
					)
					return ERROR
				}
				return operand
			}

			case "BinaryExpr":
				return this.checkBinary(expr, scope, hint)

			case "TernaryExpr": {
				this.expectCondition(this.checkExpr(expr.condition, scope, BOOL), expr.condition.span)
				const then = this.checkExpr(expr.then, scope, hint)
				const else_ = this.checkExpr(expr.else_, scope, then.kind === "error" ? hint : then)
				this.expectType(else_, then, expr.else_.span)
				return then
			}

			case "CallExpr":
				return this.checkCall(expr, scope)

			case "MethodCallExpr":
				return this.checkMethodCall(expr, scope)

			case "FieldAccess": {
				const object = this.checkExpr(expr.object, scope)
				return this.fieldType(object, expr.field, expr.span)
			}

			case "IndexAccess": {
				const object = this.checkExpr(expr.object, scope)
				return this.checkIndex(object, expr.index, scope)
			}

			case "StructLiteral": {
				const struct = this.structs.get(expr.typeName)
				if (!struct) {
					for (const f of expr.fields) this.checkExpr(f.value, scope)
					this.error("UndefinedSymbol", `unknown struct '${expr.typeName}'`, expr.span)
					return ERROR
				}
				const seen = new Set<string>()
				for (const init of expr.fields) {
					const field = struct.fields.find((f) => f.name === init.name)
					const valueType = this.checkExpr(init.value, scope, field?.type)
					if (!field) {
						this.error(
							"UndefinedSymbol",
							`struct '${struct.name}' has no field '${init.name}'`,
							init.span,
						)
						continue
					}
					if (seen.has(init.name)) {
						this.error(
							"DuplicateDeclaration",
							`field '${init.name}' is given more than once`,
							init.span,
						)
					}
					seen.add(init.name)
					this.expectType(valueType, field.type, init.value.span)
				}
				for (const field of struct.fields) {
					if (!seen.has(field.name)) {
						this.error(
							"TypeMismatch",
							`missing field '${field.name}' in '${struct.name}' literal`,
							expr.span,
						)
					}
				}
				return struct
			}

			case "ArrayLiteral": {
				const elementHint =
					hint?.kind === "vector" || hint?.kind === "array" ? hint.element : undefined
				let element: SemType | undefined = elementHint
				for (const e of expr.elements) {
					const t = this.checkExpr(e, scope, element)
					if (element === undefined) element = t
					else this.expectType(t, element, e.span)
				}
				if (element === undefined) {
					this.error(
						"TypeMismatch",
						"cannot infer the element type of an empty array literal",
						expr.span,
						"add a type annotation, e.g. let xs: vec<u64> = [];",
					)
					return ERROR
				}
				if (hint?.kind === "array" && hint.size === expr.elements.length) {
					return { kind: "array", element, size: hint.size }
				}
				return { kind: "vector", element }
			}

			case "TupleLiteral": {
				const hints = hint?.kind === "tuple" ? hint.elements : []
				return {
					kind: "tuple",
					elements: expr.elements.map((e, i) => this.checkExpr(e, scope, hints[i])),
				}
			}

			case "LambdaExpr": {
				const lambdaScope = this.scopes.push(scope, true)
				const params = expr.params.map((p) => {
					const type = this.resolveValueType(p.typeNode)
					this.declare(lambdaScope, p, p.name, type, "param", false)
					return type
				})
				const ret = this.checkExpr(expr.body, lambdaScope)
				if (ret.kind === "void") {
					this.error("InvalidLambda", "a lambda must produce a value", expr.body.span)
				}
				return { kind: "fn", params, ret }
			}

			case "MatchExpr":
				return this.checkMatchExpr(expr, scope, hint)

			case "ConstructorExpr":
				return this.checkConstructor(expr.ctor, expr.arg, scope, hint, expr.span)

			case "GroupExpr":
				return this.checkExpr(expr.expr, scope, hint)
		}
	}

	private checkIdent(expr: Ident, scope: ScopeId): SemType {
		const found = this.scopes.lookup(scope, expr.name)
		if (!found) {
			const hint = this.functions.has(expr.name) ? `call it: ${expr.name}(...)` : undefined
			this.error("UndefinedSymbol", `undefined name '${expr.name}'`, expr.span, hint)
			return ERROR
		}
		const { symbol, crossedLambda } = found
		this.references.set(expr, symbol)
		if (symbol.kind === "state" && (this.ctx.mode === "initializer" || this.ctx.mode === "const")) {
			this.error(
				"InvalidInitializer",
				`initializers cannot read state variable '${expr.name}'`,
				expr.span,
			)
		}
		if (crossedLambda && (symbol.kind === "state" || symbol.mutable)) {
			this.error(
				"InvalidLambda",
				`a lambda cannot capture ${symbol.kind === "state" ? "state variable" : "mutable binding"} '${expr.name}'`,
				expr.span,
			)
		}
		return symbol.type
	}

	private checkBinary(
		expr: Extract<Expr, { kind: "BinaryExpr" }>,
		scope: ScopeId,
		hint: SemType | undefined,
	): SemType {
		if (expr.op === "&&" || expr.op === "||") {
			const left = this.checkExpr(expr.left, scope, BOOL)
			const right = this.checkExpr(expr.right, scope, BOOL)
			this.expectOperand(expr.op, left, BOOL, expr.left.span)
			this.expectOperand(expr.op, right, BOOL, expr.right.span)
			return BOOL
		}

		const arithmetic = isArithOp(expr.op)
		const operandHint = arithmetic ? hint : undefined
		let left: SemType
		let right: SemType
		// An unsuffixed literal on the left takes its width from the right operand
		if (isUntypedIntLiteral(expr.left) && !isUntypedIntLiteral(expr.right)) {
			right = this.checkExpr(expr.right, scope, operandHint)
			left = this.checkExpr(expr.left, scope, right)
		} else {
			left = this.checkExpr(expr.left, scope, operandHint)
			right = this.checkExpr(expr.right, scope, left)
		}

		if (left.kind === "error" || right.kind === "error") {
			return arithmetic ? (left.kind === "error" ? right : left) : BOOL
		}

		if (!typeEq(left, right)) {
			const conversion =
				left.kind === "int" && right.kind === "int"
					? `convert explicitly, e.g. ${left.int}(value)`
					: undefined
			this.error(
				"TypeMismatch",
				`mismatched types in '${expr.op}': ${typeToString(left)} and ${typeToString(right)}`,
				expr.span,
				conversion,
			)
			return arithmetic ? ERROR : BOOL
		}

		if (arithmetic || expr.op === "<" || expr.op === ">" || expr.op === "<=" || expr.op === ">=") {
			if (left.kind !== "int") {
				this.error(
					"TypeMismatch",
					`'${expr.op}' needs integer operands, found ${typeToString(left)}`,
					expr.span,
				)
				return arithmetic ? ERROR : BOOL
			}
			return arithmetic ? left : BOOL
		}

		// == and !=
		if (left.kind === "fn" || left.kind === "map") {
			this.error("TypeMismatch", `values of type ${typeToString(left)} cannot be compared`, expr.span)
		}
		return BOOL
	}

	private checkCall(expr: CallExpr, scope: ScopeId): SemType {
		const local = this.scopes.lookup(scope, expr.callee)
		if (local && local.symbol.type.kind === "fn") {
			const fnType = local.symbol.type
			this.calls.set(expr, { kind: "lambda", symbol: local.symbol })
			this.checkArgs(
				`'${expr.callee}'`,
				fnType.params.map((type, i) => ({ name: `${i}`, type })),
				expr.args,
				scope,
				expr.span,
			)
			return fnType.ret
		}

		const fn = this.functions.get(expr.callee)
		if (fn) {
			this.calls.set(expr, { kind: "function", name: fn.name })
			if (this.ctx.mode === "initializer" || this.ctx.mode === "const") {
				this.error(
					"InvalidInitializer",
					`initializers cannot call function '${fn.name}'`,
					expr.span,
				)
			}
			if (this.scopes.insideLambda(scope)) {
				this.error("InvalidLambda", `a lambda cannot call contract function '${fn.name}'`, expr.span)
			}
			this.checkArgs(`'${fn.name}'`, fn.params, expr.args, scope, expr.span)
			return fn.returnType
		}

		if (isIntKind(expr.callee)) {
			const to = expr.callee
			this.calls.set(expr, { kind: "conversion", to })
			if (expr.args.length !== 1) {
				for (const arg of expr.args) this.checkExpr(arg, scope)
				this.error(
					"ArityMismatch",
					`'${to}' expects 1 argument(s), got ${expr.args.length}`,
					expr.span,
				)
				return intType(to)
			}
			const arg = expr.args[0]!
			const argType = this.checkExpr(arg, scope)
			if (argType.kind !== "int" && argType.kind !== "error") {
				this.error(
					"TypeMismatch",
					`cannot convert ${typeToString(argType)} to ${to}`,
					arg.span,
				)
			}
			return intType(to)
		}

		for (const arg of expr.args) this.checkExpr(arg, scope)
		this.error("UndefinedSymbol", `undefined function '${expr.callee}'`, expr.span)
		return ERROR
	}

	private checkArgs(
		what: string,
		params: readonly ParamInfo[],
		args: readonly Expr[],
		scope: ScopeId,
		span: Span,
	): void {
		if (args.length !== params.length) {
			for (const arg of args) this.checkExpr(arg, scope)
			this.error(
				"ArityMismatch",
				`${what} expects ${params.length} argument(s), got ${args.length}`,
				span,
			)
			return
		}
		args.forEach((arg, i) => {
			const expected = params[i]!.type
			const found = this.checkExpr(arg, scope, expected)
			if (!typeEq(found, expected)) {
				this.error(
					"TypeMismatch",
					`argument ${i + 1} of ${what}: expected ${typeToString(expected)}, found ${typeToString(found)}`,
					arg.span,
				)
			}
		})
	}

	private checkMethodCall(expr: MethodCallExpr, scope: ScopeId): SemType {
		const receiver = this.checkExpr(expr.receiver, scope)
		if (receiver.kind === "error") {
			for (const arg of expr.args) this.checkExpr(arg, scope)
			return ERROR
		}

		const sig = methodSignature(receiver, expr.method)
		if (!sig) {
			for (const arg of expr.args) this.checkExpr(arg, scope)
			this.error(
				"UndefinedSymbol",
				`no method '${expr.method}' on type ${typeToString(receiver)}`,
				expr.span,
			)
			return ERROR
		}
		if (sig.mutates) {
			this.checkMutableRoot(expr.receiver)
		}
		this.checkArgs(
			`'${expr.method}'`,
			sig.params.map((type, i) => ({ name: `${i}`, type })),
			expr.args,
			scope,
			expr.span,
		)
		return sig.ret
	}

	private fieldType(object: SemType, field: string, span: Span): SemType {
		if (object.kind === "error") return ERROR
		if (object.kind === "struct") {
			const found = object.fields.find((f) => f.name === field)
			if (found) return found.type
		}
		if (object.kind === "tuple" && /^[0-9]+$/.test(field)) {
			const element = object.elements[Number(field)]
			if (element) return element
		}
		this.error("UndefinedSymbol", `no field '${field}' on type ${typeToString(object)}`, span)
		return ERROR
	}

	private checkIndex(object: SemType, index: Expr, scope: ScopeId): SemType {
		if (object.kind === "map") {
			const indexType = this.checkExpr(index, scope, object.key)
			this.expectType(indexType, object.key, index.span)
			return object.value
		}
		if (object.kind === "vector" || object.kind === "array") {
			const indexType = this.checkExpr(index, scope, U64)
			if (!isUnsignedInt(indexType) && indexType.kind !== "error") {
				this.error(
					"TypeMismatch",
					`index must be an unsigned integer, found ${typeToString(indexType)}`,
					index.span,
				)
			}
			return object.element
		}
		this.checkExpr(index, scope)
		if (object.kind !== "error") {
			this.error("TypeMismatch", `cannot index into ${typeToString(object)}`, index.span)
		}
		return ERROR
	}

	private checkMatchSubject(subject: Expr, scope: ScopeId): SemType {
		const type = this.checkExpr(subject, scope)
		if (
			type.kind !== "int" &&
			type.kind !== "bool" &&
			type.kind !== "string" &&
			type.kind !== "error"
		) {
			this.error(
				"TypeMismatch",
				`cannot match on ${typeToString(type)}, expected an integer, bool or string`,
				subject.span,
			)
			return ERROR
		}
		return type
	}

	private checkPatterns(patterns: readonly Pattern[], subject: SemType, scope: ScopeId): void {
		for (const pattern of patterns) {
			if (pattern.kind === "WildcardPattern") continue
			const type = this.checkExpr(pattern.value, scope, subject)
			this.expectType(type, subject, pattern.value.span)
		}
	}

	private checkExhaustive(
		arms: readonly { readonly patterns: readonly Pattern[] }[],
		subject: SemType,
		span: Span,
	): boolean {
		const patterns = arms.flatMap((a) => a.patterns)
		if (patterns.some((p) => p.kind === "WildcardPattern")) return true
		if (subject.kind === "bool") {
			const values = new Set(
				patterns.flatMap((p) =>
					p.kind === "LiteralPattern" && p.value.kind === "BoolLiteral" ? [p.value.value] : [],
				),
			)
			if (values.has(true) && values.has(false)) return true
		}
		if (subject.kind === "error") return true
		this.error(
			"NonExhaustiveMatch",
			"match is not exhaustive",
			span,
			"add a wildcard arm: _ => ...",
		)
		return false
	}

	private checkMatchExpr(expr: MatchExpr, scope: ScopeId, hint: SemType | undefined): SemType {
		const subject = this.checkMatchSubject(expr.subject, scope)
		let result: SemType | undefined
		for (const arm of expr.arms) {
			this.checkPatterns(arm.patterns, subject, scope)
			const t = this.checkExpr(arm.value, scope, result ?? hint)
			if (result === undefined) result = t
			else this.expectType(t, result, arm.value.span)
		}
		this.checkExhaustive(expr.arms, subject, expr.span)
		return result ?? ERROR
	}

	private checkConstructor(
		ctor: "Some" | "None" | "Ok" | "Err",
		arg: Expr | null,
		scope: ScopeId,
		hint: SemType | undefined,
		span: Span,
	): SemType {
		switch (ctor) {
			case "Some": {
				const inner = arg
					? this.checkExpr(arg, scope, hint?.kind === "option" ? hint.inner : undefined)
					: ERROR
				return { kind: "option", inner }
			}
			case "None":
				if (hint?.kind === "option") return hint
				this.error(
					"TypeMismatch",
					"cannot infer the type of 'None'",
					span,
					"add a type annotation, e.g. let x: Option<u64> = None;",
				)
				return ERROR
			case "Ok":
			case "Err": {
				if (hint?.kind !== "result") {
					if (arg) this.checkExpr(arg, scope)
					this.error(
						"TypeMismatch",
						`cannot infer the type of '${ctor}(...)'`,
						span,
						"add a type annotation, e.g. let r: Result<u64, string> = Ok(1);",
					)
					return ERROR
				}
				const expected = ctor === "Ok" ? hint.ok : hint.err
				if (arg) this.expectType(this.checkExpr(arg, scope, expected), expected, arg.span)
				return hint
			}
		}
	}

	// --- Places and mutability ---

	/** Checks an assignment target and returns its type. */
	private checkPlace(target: Expr, scope: ScopeId): SemType {
		if (target.kind !== "Ident" && target.kind !== "FieldAccess" && target.kind !== "IndexAccess") {
			this.checkExpr(target, scope)
			this.error("ImmutableAssignment", "invalid assignment target", target.span)
			return ERROR
		}
		const type = this.checkExpr(target, scope)
		this.checkMutableRoot(target)
		return type
	}

	private checkMutableRoot(place: Expr): void {
		const root = placeRoot(place)
		if (!root) {
			this.error("ImmutableAssignment", "cannot modify a temporary value", place.span)
			return
		}
		const symbol = this.references.get(root)
		if (!symbol || symbol.mutable) return
		const what =
			symbol.kind === "const"
				? "constant"
				: symbol.kind === "param"
					? "parameter"
					: symbol.kind === "loop"
						? "loop variable"
						: "immutable binding"
		this.error(
			"ImmutableAssignment",
			`cannot assign to ${what} '${symbol.name}'`,
			place.span,
			symbol.kind === "local" ? `declare it with 'let mut ${symbol.name}'` : undefined,
		)
	}

	// --- Helpers ---

	private expectType(found: SemType, expected: SemType, span: Span): void {
		if (found.kind === "void" && expected.kind !== "void") {
			this.error("TypeMismatch", "expression has no value", span)
			return
		}
		if (!typeEq(found, expected)) {
			const hint =
				found.kind === "int" && expected.kind === "int"
					? `convert explicitly: ${expected.int}(value)`
					: undefined
			this.error(
				"TypeMismatch",
				`mismatched types: expected ${typeToString(expected)}, found ${typeToString(found)}`,
				span,
				hint,
			)
		}
	}

	private expectOperand(op: string, found: SemType, expected: SemType, span: Span): void {
		if (!typeEq(found, expected)) {
			this.error(
				"TypeMismatch",
				`'${op}' needs ${typeToString(expected)} operands, found ${typeToString(found)}`,
				span,
			)
		}
	}

	private expectCondition(found: SemType, span: Span): void {
		if (!typeEq(found, BOOL)) {
			this.error("TypeMismatch", `condition must be bool, found ${typeToString(found)}`, span)
		}
	}
}

// --- Method table ---

interface MethodSig {
	readonly params: readonly SemType[]
	readonly ret: SemType
	readonly mutates: boolean
}

export function methodSignature(receiver: SemType, method: string): MethodSig | null {
	switch (receiver.kind) {
		case "vector":
			if (method === "len") return { params: [], ret: U64, mutates: false }
			if (method === "push") return { params: [receiver.element], ret: VOID, mutates: true }
			return null
		case "array":
		case "string":
		case "bytes":
			return method === "len" ? { params: [], ret: U64, mutates: false } : null
		case "map":
			if (method === "contains") return { params: [receiver.key], ret: BOOL, mutates: false }
			if (method === "remove") return { params: [receiver.key], ret: VOID, mutates: true }
			return null
		case "option":
			if (method === "is_some" || method === "is_none") {
				return { params: [], ret: BOOL, mutates: false }
			}
			if (method === "unwrap_or") {
				return { params: [receiver.inner], ret: receiver.inner, mutates: false }
			}
			return null
		case "result":
			if (method === "is_ok" || method === "is_err") {
				return { params: [], ret: BOOL, mutates: false }
			}
			if (method === "unwrap_or") return { params: [receiver.ok], ret: receiver.ok, mutates: false }
			return null
		default:
			return null
	}
}

// --- Syntactic helpers shared with later stages ---

/** The identifier a place expression (`a`, `a.b`, `a[i].c`) is rooted at. */
export function placeRoot(expr: Expr): Ident | null {
	switch (expr.kind) {
		case "Ident":
			return expr
		case "FieldAccess":
			return placeRoot(expr.object)
		case "IndexAccess":
			return placeRoot(expr.object)
		case "GroupExpr":
			return placeRoot(expr.expr)
		default:
			return null
	}
}

function isUntypedIntLiteral(expr: Expr): boolean {
	if (expr.kind === "IntLiteral") return expr.suffix === null
	if (expr.kind === "GroupExpr") return isUntypedIntLiteral(expr.expr)
	if (expr.kind === "UnaryExpr" && expr.op === "-") return isUntypedIntLiteral(expr.operand)
	return false
}

function isLiteralTrue(expr: Expr): boolean {
	if (expr.kind === "GroupExpr") return isLiteralTrue(expr.expr)
	return expr.kind === "BoolLiteral" && expr.value
}
