// AST optimizer. Runs the rule set over a checked contract until nothing changes.
// Nodes are rebuilt rather than mutated; the overlay maps are copied and extended
// so every new node carries the type (and call target) of the node it replaces.

import type { CallTarget, ContractAnalysis, ContractInfo, FunctionInfo } from "./analyzer"
import { placeRoot } from "./analyzer"
import { applyArith, compare, convertInt, isArithOp, isCompareOp, negate } from "./arith"
import type {
	Block,
	BoolLiteral,
	CallExpr,
	ContractDecl,
	DeclNode,
	Expr,
	Ident,
	IfStmt,
	IntLiteral,
	ModifierDecl,
	Pattern,
	Span,
	Stmt,
	StringLiteral,
} from "./ast"
import { InternalCompilerError } from "./errors"
import type { SymbolInfo } from "./scopes"
import { type SemType, typeToString } from "./types"

export const DEFAULT_MAX_ITERATIONS = 32

export interface OptimizeOptions {
	readonly maxIterations?: number
}

export interface OptimizerStats {
	/** Passes run, including the final pass that changed nothing. */
	iterations: number
	folded: number
	simplified: number
	eliminated: number
	propagated: number
}

export interface OptimizeResult {
	readonly analysis: ContractAnalysis
	readonly stats: OptimizerStats
}

interface Overlays {
	readonly types: Map<Expr, SemType>
	readonly references: Map<Ident, SymbolInfo>
	readonly calls: Map<CallExpr, CallTarget>
	readonly declarations: Map<DeclNode, SymbolInfo>
}

type Literal = IntLiteral | BoolLiteral

export function optimize(analysis: ContractAnalysis, options: OptimizeOptions = {}): OptimizeResult {
	const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
	const overlays: Overlays = {
		types: new Map(analysis.types),
		references: new Map(analysis.references),
		calls: new Map(analysis.calls),
		declarations: new Map(analysis.declarations),
	}
	const stats: OptimizerStats = {
		iterations: 0,
		folded: 0,
		simplified: 0,
		eliminated: 0,
		propagated: 0,
	}

	let contract = analysis.contract
	for (let i = 1; ; i++) {
		if (i > maxIterations) {
			throw new InternalCompilerError(
				`optimizer did not reach a fixed point in contract '${contract.name}' within ${maxIterations} iterations`,
			)
		}
		stats.iterations = i
		const before = stats.folded + stats.simplified + stats.eliminated + stats.propagated
		contract = new Pass(overlays, stats, propagationCandidates(contract, overlays)).contract(
			contract,
		)
		const after = stats.folded + stats.simplified + stats.eliminated + stats.propagated
		if (after === before) break
	}

	return {
		analysis: {
			...analysis,
			contract,
			info: rebindInfo(analysis.info, contract),
			types: overlays.types,
			references: overlays.references,
			calls: overlays.calls,
			declarations: overlays.declarations,
		},
		stats,
	}
}

/** Points the info table at the rebuilt function and modifier declarations. */
function rebindInfo(info: ContractInfo, contract: ContractDecl): ContractInfo {
	const functions = new Map<string, FunctionInfo>()
	for (const [name, fn] of info.functions) {
		const decl = contract.functions.find((f) => f.name === name)
		functions.set(name, decl ? { ...fn, decl } : fn)
	}
	const modifiers = new Map<string, ModifierDecl>()
	for (const [name, m] of info.modifiers) {
		modifiers.set(name, contract.modifiers.find((d) => d.name === name) ?? m)
	}
	return { ...info, functions, modifiers }
}

/**
 * Locals initialised to a literal and never assigned afterwards. Contract constants are
 * handled separately through their recorded value.
 */
function propagationCandidates(contract: ContractDecl, overlays: Overlays): Map<SymbolInfo, Literal> {
	const assigned = new Set<SymbolInfo>()
	const literals = new Map<SymbolInfo, Literal>()

	const markRoot = (place: Expr): void => {
		const root = placeRoot(place)
		const symbol = root ? overlays.references.get(root) : undefined
		if (symbol) assigned.add(symbol)
	}
	const visitExpr = (expr: Expr): void => {
		forEachChildExpr(expr, visitExpr)
		if (expr.kind === "MethodCallExpr" && (expr.method === "push" || expr.method === "remove")) {
			markRoot(expr.receiver)
		}
	}
	const visit = (stmt: Stmt): void => {
		switch (stmt.kind) {
			case "LetStmt": {
				visitExpr(stmt.init)
				const symbol = overlays.declarations.get(stmt)
				if (symbol && (stmt.init.kind === "IntLiteral" || stmt.init.kind === "BoolLiteral")) {
					literals.set(symbol, stmt.init)
				}
				return
			}
			case "AssignStmt":
				markRoot(stmt.target)
				visitExpr(stmt.target)
				visitExpr(stmt.value)
				return
			default:
				forEachChildStmt(stmt, visit, visitExpr)
		}
	}
	for (const m of contract.modifiers) m.body.stmts.forEach(visit)
	for (const fn of contract.functions) fn.body.stmts.forEach(visit)

	for (const symbol of assigned) literals.delete(symbol)
	return literals
}

class Pass {
	constructor(
		private readonly o: Overlays,
		private readonly stats: OptimizerStats,
		private readonly literals: ReadonlyMap<SymbolInfo, Literal>,
	) {}

	contract(c: ContractDecl): ContractDecl {
		const state = c.state.map((s) => {
			if (!s.init) return s
			const init = this.expr(s.init)
			return init === s.init ? s : { ...s, init }
		})
		const modifiers = c.modifiers.map((m) => {
			const body = this.block(m.body)
			return body === m.body ? m : { ...m, body }
		})
		const functions = c.functions.map((f) => {
			const body = this.block(f.body)
			return body === f.body ? f : { ...f, body }
		})
		return { ...c, state, modifiers, functions }
	}

	// --- Statements ---

	private block(block: Block): Block {
		const stmts = this.stmts(block.stmts)
		return stmts === block.stmts ? block : { ...block, stmts }
	}

	/** Rewrites a statement list; returns the same array when nothing changed. */
	private stmts(list: Stmt[]): Stmt[] {
		const out: Stmt[] = []
		let changed = false
		for (const stmt of list) {
			const next = this.stmt(stmt)
			if (next.length !== 1 || next[0] !== stmt) changed = true
			out.push(...next)
		}
		const ret = out.findIndex((s) => s.kind === "ReturnStmt")
		if (ret >= 0 && ret < out.length - 1) {
			out.length = ret + 1
			this.stats.eliminated++
			changed = true
		}
		return changed ? out : list
	}

	private stmt(stmt: Stmt): Stmt[] {
		switch (stmt.kind) {
			case "LetStmt": {
				const init = this.expr(stmt.init)
				if (init === stmt.init) return [stmt]
				return [this.rebuiltDecl(stmt, { ...stmt, init })]
			}

			case "AssignStmt": {
				const target = this.expr(stmt.target)
				const value = this.expr(stmt.value)
				if (target === stmt.target && value === stmt.value) return [stmt]
				return [{ ...stmt, target, value }]
			}

			case "ExprStmt": {
				const expr = this.expr(stmt.expr)
				return expr === stmt.expr ? [stmt] : [{ ...stmt, expr }]
			}

			case "IfStmt": {
				const condition = this.expr(stmt.condition)
				if (condition.kind === "BoolLiteral") {
					this.stats.eliminated++
					if (condition.value) return this.inline(this.block(stmt.then))
					if (!stmt.else_) return []
					if (stmt.else_.kind === "IfStmt") return this.stmt(stmt.else_)
					return this.inline(this.block(stmt.else_))
				}
				const then = this.block(stmt.then)
				const else_ = stmt.else_
					? stmt.else_.kind === "Block"
						? this.block(stmt.else_)
						: this.singleIf(stmt.else_)
					: null
				if (condition === stmt.condition && then === stmt.then && else_ === stmt.else_) {
					return [stmt]
				}
				return [{ ...stmt, condition, then, else_ }]
			}

			case "WhileStmt": {
				const condition = this.expr(stmt.condition)
				if (condition.kind === "BoolLiteral" && !condition.value) {
					this.stats.eliminated++
					return []
				}
				const body = this.block(stmt.body)
				if (condition === stmt.condition && body === stmt.body) return [stmt]
				return [{ ...stmt, condition, body }]
			}

			case "ForRangeStmt": {
				const start = this.expr(stmt.start)
				const end = this.expr(stmt.end)
				const body = this.block(stmt.body)
				if (start === stmt.start && end === stmt.end && body === stmt.body) return [stmt]
				return [this.rebuiltDecl(stmt, { ...stmt, start, end, body })]
			}

			case "ForEachStmt": {
				const iterable = this.expr(stmt.iterable)
				const body = this.block(stmt.body)
				if (iterable === stmt.iterable && body === stmt.body) return [stmt]
				return [this.rebuiltDecl(stmt, { ...stmt, iterable, body })]
			}

			case "MatchStmt": {
				const subject = this.expr(stmt.subject)
				if (isLiteral(subject)) {
					const arm = stmt.arms.find((a) => a.patterns.some((p) => patternMatches(p, subject)))
					if (arm) {
						this.stats.eliminated++
						return [this.block(arm.body)]
					}
				}
				let changed = subject !== stmt.subject
				const arms = stmt.arms.map((arm) => {
					const body = this.block(arm.body)
					if (body === arm.body) return arm
					changed = true
					return { ...arm, body }
				})
				return changed ? [{ ...stmt, subject, arms }] : [stmt]
			}

			case "RequireStmt": {
				const condition = this.expr(stmt.condition)
				if (condition.kind === "BoolLiteral" && condition.value) {
					this.stats.eliminated++
					return []
				}
				return condition === stmt.condition ? [stmt] : [{ ...stmt, condition }]
			}

			case "EmitStmt": {
				const args = this.exprs(stmt.args)
				return args === stmt.args ? [stmt] : [{ ...stmt, args }]
			}

			case "ReturnStmt": {
				if (!stmt.value) return [stmt]
				const value = this.expr(stmt.value)
				return value === stmt.value ? [stmt] : [{ ...stmt, value }]
			}

			case "PlaceholderStmt":
				return [stmt]

			case "Block":
				return [this.block(stmt)]
		}
	}

	/** An `else if` that is not constant stays an IfStmt; a constant one becomes a block. */
	private singleIf(stmt: IfStmt): Block | IfStmt {
		const next = this.stmt(stmt)
		const only = next[0]
		if (next.length === 1 && only && (only.kind === "IfStmt" || only.kind === "Block")) return only
		return { kind: "Block", stmts: next, span: stmt.span }
	}

	/** The statements of a taken branch, kept in their own block when they declare locals. */
	private inline(block: Block): Stmt[] {
		return block.stmts.some((s) => s.kind === "LetStmt") ? [block] : block.stmts
	}

	private rebuiltDecl<T extends DeclNode>(old: T, next: T): T {
		const symbol = this.o.declarations.get(old)
		if (symbol) this.o.declarations.set(next, symbol)
		return next
	}

	// --- Expressions ---

	private exprs(list: Expr[]): Expr[] {
		const out = list.map((e) => this.expr(e))
		return out.every((e, i) => e === list[i]) ? list : out
	}

	private expr(expr: Expr): Expr {
		const rebuilt = this.children(expr)
		const next = this.rewrite(rebuilt)
		if (next !== rebuilt) this.assertTypePreserved(rebuilt, next)
		return next
	}

	/** Rewrites sub-expressions, returning `expr` itself when none changed. */
	private children(expr: Expr): Expr {
		switch (expr.kind) {
			case "UnaryExpr": {
				const operand = this.expr(expr.operand)
				return operand === expr.operand ? expr : this.copy(expr, { ...expr, operand })
			}
			case "BinaryExpr": {
				const left = this.expr(expr.left)
				const right = this.expr(expr.right)
				if (left === expr.left && right === expr.right) return expr
				return this.copy(expr, { ...expr, left, right })
			}
			case "TernaryExpr": {
				const condition = this.expr(expr.condition)
				const then = this.expr(expr.then)
				const else_ = this.expr(expr.else_)
				if (condition === expr.condition && then === expr.then && else_ === expr.else_) return expr
				return this.copy(expr, { ...expr, condition, then, else_ })
			}
			case "CallExpr": {
				const args = this.exprs(expr.args)
				return args === expr.args ? expr : this.copy(expr, { ...expr, args })
			}
			case "MethodCallExpr": {
				const receiver = this.expr(expr.receiver)
				const args = this.exprs(expr.args)
				if (receiver === expr.receiver && args === expr.args) return expr
				return this.copy(expr, { ...expr, receiver, args })
			}
			case "FieldAccess": {
				const object = this.expr(expr.object)
				return object === expr.object ? expr : this.copy(expr, { ...expr, object })
			}
			case "IndexAccess": {
				const object = this.expr(expr.object)
				const index = this.expr(expr.index)
				if (object === expr.object && index === expr.index) return expr
				return this.copy(expr, { ...expr, object, index })
			}
			case "StructLiteral": {
				let changed = false
				const fields = expr.fields.map((f) => {
					const value = this.expr(f.value)
					if (value === f.value) return f
					changed = true
					return { ...f, value }
				})
				return changed ? this.copy(expr, { ...expr, fields }) : expr
			}
			case "ArrayLiteral":
			case "TupleLiteral": {
				const elements = this.exprs(expr.elements)
				return elements === expr.elements ? expr : this.copy(expr, { ...expr, elements })
			}
			case "LambdaExpr": {
				const body = this.expr(expr.body)
				return body === expr.body ? expr : this.copy(expr, { ...expr, body })
			}
			case "MatchExpr": {
				const subject = this.expr(expr.subject)
				let changed = subject !== expr.subject
				const arms = expr.arms.map((arm) => {
					const value = this.expr(arm.value)
					if (value === arm.value) return arm
					changed = true
					return { ...arm, value }
				})
				return changed ? this.copy(expr, { ...expr, subject, arms }) : expr
			}
			case "ConstructorExpr": {
				if (!expr.arg) return expr
				const arg = this.expr(expr.arg)
				return arg === expr.arg ? expr : this.copy(expr, { ...expr, arg })
			}
			case "GroupExpr": {
				const inner = this.expr(expr.expr)
				return inner === expr.expr ? expr : this.copy(expr, { ...expr, expr: inner })
			}
			default:
				return expr
		}
	}

	/** Applies the first rule that matches at the root of `expr`. */
	private rewrite(expr: Expr): Expr {
		switch (expr.kind) {
			case "Ident": {
				const symbol = this.o.references.get(expr)
				if (!symbol) return expr
				if (symbol.constValue !== undefined) {
					this.stats.propagated++
					return this.literal(symbol.constValue, symbol.type, expr.span)
				}
				const literal = this.literals.get(symbol)
				if (literal) {
					this.stats.propagated++
					return this.literal(literal.value, symbol.type, expr.span)
				}
				return expr
			}

			case "GroupExpr":
				this.stats.simplified++
				return expr.expr

			case "UnaryExpr": {
				const operand = expr.operand
				if (expr.op === "!") {
					if (operand.kind === "BoolLiteral") {
						this.stats.folded++
						return this.literal(!operand.value, this.typeOf(expr), expr.span)
					}
					if (operand.kind === "UnaryExpr" && operand.op === "!") {
						this.stats.simplified++
						return operand.operand
					}
					return expr
				}
				const type = this.typeOf(expr)
				if (operand.kind === "IntLiteral" && type.kind === "int") {
					const result = negate(operand.value, type.int)
					if (result.ok) {
						this.stats.folded++
						return this.literal(result.value, type, expr.span)
					}
				}
				return expr
			}

			case "BinaryExpr":
				return this.rewriteBinary(expr)

			case "TernaryExpr":
				if (expr.condition.kind === "BoolLiteral") {
					this.stats.simplified++
					return expr.condition.value ? expr.then : expr.else_
				}
				return expr

			case "MatchExpr": {
				const subject = expr.subject
				if (!isLiteral(subject)) return expr
				const arm = expr.arms.find((a) => a.patterns.some((p) => patternMatches(p, subject)))
				if (!arm) return expr
				this.stats.simplified++
				return arm.value
			}

			case "CallExpr": {
				const target = this.o.calls.get(expr)
				const arg = expr.args[0]
				if (target?.kind !== "conversion" || arg?.kind !== "IntLiteral") return expr
				const result = convertInt(arg.value, target.to)
				if (!result.ok) return expr
				this.stats.folded++
				return this.literal(result.value, this.typeOf(expr), expr.span)
			}

			default:
				return expr
		}
	}

	private rewriteBinary(expr: Extract<Expr, { kind: "BinaryExpr" }>): Expr {
		const { op, left, right } = expr
		const type = this.typeOf(expr)

		// Folding
		if (left.kind === "IntLiteral" && right.kind === "IntLiteral") {
			if (isArithOp(op) && type.kind === "int") {
				const result = applyArith(op, left.value, right.value, type.int)
				if (!result.ok) return expr
				this.stats.folded++
				return this.literal(result.value, type, expr.span)
			}
			if (isCompareOp(op)) {
				this.stats.folded++
				return this.literal(compare(op, left.value, right.value), type, expr.span)
			}
		}
		if (left.kind === "BoolLiteral" && right.kind === "BoolLiteral") {
			const folded =
				op === "&&"
					? left.value && right.value
					: op === "||"
						? left.value || right.value
						: op === "=="
							? left.value === right.value
							: op === "!="
								? left.value !== right.value
								: null
			if (folded !== null) {
				this.stats.folded++
				return this.literal(folded, type, expr.span)
			}
		}

		// Boolean identities
		if (op === "&&" || op === "||") {
			const absorbing = op === "||"
			if (left.kind === "BoolLiteral") {
				this.stats.simplified++
				return left.value === absorbing ? left : right
			}
			if (right.kind === "BoolLiteral" && right.value !== absorbing) {
				this.stats.simplified++
				return left
			}
			return expr
		}

		// Arithmetic identities
		const isZero = (e: Expr) => e.kind === "IntLiteral" && e.value === 0n
		const isOne = (e: Expr) => e.kind === "IntLiteral" && e.value === 1n
		switch (op) {
			case "+":
				if (isZero(right)) return this.simplified(left)
				if (isZero(left)) return this.simplified(right)
				break
			case "-":
				if (isZero(right)) return this.simplified(left)
				break
			case "*":
				if (isOne(right)) return this.simplified(left)
				if (isOne(left)) return this.simplified(right)
				if (isZero(right) && isTrivial(left)) return this.simplified(right)
				if (isZero(left) && isTrivial(right)) return this.simplified(left)
				break
			case "/":
				if (isOne(right)) return this.simplified(left)
				break
			default:
				break
		}
		return expr
	}

	private simplified(expr: Expr): Expr {
		this.stats.simplified++
		return expr
	}

	// --- Node helpers ---

	private typeOf(expr: Expr): SemType {
		const type = this.o.types.get(expr)
		if (!type) {
			throw new InternalCompilerError(`expression at ${spanText(expr.span)} has no resolved type`)
		}
		return type
	}

	/** Registers a rebuilt node under the overlays of the node it replaces. */
	private copy<T extends Expr>(old: T, next: T): T {
		const type = this.o.types.get(old)
		if (type) this.o.types.set(next, type)
		if (old.kind === "CallExpr" && next.kind === "CallExpr") {
			const target = this.o.calls.get(old)
			if (target) this.o.calls.set(next, target)
		}
		return next
	}

	private literal(value: bigint | boolean, type: SemType, span: Span): Literal {
		const node: Literal =
			typeof value === "bigint"
				? { kind: "IntLiteral", value, suffix: null, span }
				: { kind: "BoolLiteral", value, span }
		this.o.types.set(node, type)
		return node
	}

	private assertTypePreserved(before: Expr, after: Expr): void {
		const a = this.typeOf(before)
		const b = this.typeOf(after)
		if (typeToString(a) !== typeToString(b)) {
			throw new InternalCompilerError(
				`rewrite at ${spanText(before.span)} changed the type from ${typeToString(a)} to ${typeToString(b)}`,
			)
		}
	}
}

// --- Helpers ---

function spanText(span: Span): string {
	return `${span.line}:${span.column}`
}

function isLiteral(expr: Expr): expr is IntLiteral | BoolLiteral | StringLiteral {
	return expr.kind === "IntLiteral" || expr.kind === "BoolLiteral" || expr.kind === "StringLiteral"
}

function patternMatches(pattern: Pattern, subject: IntLiteral | BoolLiteral | StringLiteral): boolean {
	if (pattern.kind === "WildcardPattern") return true
	return pattern.value.kind === subject.kind && pattern.value.value === subject.value
}

/** Expressions that can neither trap nor have effects. */
function isTrivial(expr: Expr): boolean {
	switch (expr.kind) {
		case "IntLiteral":
		case "BoolLiteral":
		case "StringLiteral":
		case "BytesLiteral":
		case "Ident":
		case "IntrinsicExpr":
			return true
		case "GroupExpr":
			return isTrivial(expr.expr)
		case "FieldAccess":
			return isTrivial(expr.object)
		default:
			return false
	}
}

/** Calls `fn` on each direct sub-expression. */
export function forEachChildExpr(expr: Expr, fn: (e: Expr) => void): void {
	switch (expr.kind) {
		case "UnaryExpr":
			fn(expr.operand)
			return
		case "BinaryExpr":
			fn(expr.left)
			fn(expr.right)
			return
		case "TernaryExpr":
			fn(expr.condition)
			fn(expr.then)
			fn(expr.else_)
			return
		case "CallExpr":
			expr.args.forEach(fn)
			return
		case "MethodCallExpr":
			fn(expr.receiver)
			expr.args.forEach(fn)
			return
		case "FieldAccess":
			fn(expr.object)
			return
		case "IndexAccess":
			fn(expr.object)
			fn(expr.index)
			return
		case "StructLiteral":
			for (const f of expr.fields) fn(f.value)
			return
		case "ArrayLiteral":
		case "TupleLiteral":
			expr.elements.forEach(fn)
			return
		case "LambdaExpr":
			fn(expr.body)
			return
		case "MatchExpr":
			fn(expr.subject)
			for (const arm of expr.arms) fn(arm.value)
			return
		case "ConstructorExpr":
			if (expr.arg) fn(expr.arg)
			return
		case "GroupExpr":
			fn(expr.expr)
			return
		default:
			return
	}
}

/** Calls `onStmt` on each nested statement and `onExpr` on each direct expression. */
export function forEachChildStmt(
	stmt: Stmt,
	onStmt: (s: Stmt) => void,
	onExpr: (e: Expr) => void,
): void {
	switch (stmt.kind) {
		case "LetStmt":
			onExpr(stmt.init)
			return
		case "AssignStmt":
			onExpr(stmt.target)
			onExpr(stmt.value)
			return
		case "ExprStmt":
			onExpr(stmt.expr)
			return
		case "IfStmt":
			onExpr(stmt.condition)
			onStmt(stmt.then)
			if (stmt.else_) onStmt(stmt.else_)
			return
		case "WhileStmt":
			onExpr(stmt.condition)
			onStmt(stmt.body)
			return
		case "ForRangeStmt":
			onExpr(stmt.start)
			onExpr(stmt.end)
			onStmt(stmt.body)
			return
		case "ForEachStmt":
			onExpr(stmt.iterable)
			onStmt(stmt.body)
			return
		case "MatchStmt":
			onExpr(stmt.subject)
			for (const arm of stmt.arms) onStmt(arm.body)
			return
		case "RequireStmt":
			onExpr(stmt.condition)
			return
		case "EmitStmt":
			stmt.args.forEach(onExpr)
			return
		case "ReturnStmt":
			if (stmt.value) onExpr(stmt.value)
			return
		case "Block":
			stmt.stmts.forEach(onStmt)
			return
		case "PlaceholderStmt":
			return
	}
}
