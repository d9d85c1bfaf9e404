// Generation shared by the Move targets. Subclasses decide how state is stored and reached,
// how the module initializes, and which framework modules back maps, events and the clock.

import type { ContractAnalysis, FunctionInfo } from "../analyzer"
import type { Block, Expr, FunctionDecl, IfStmt, IntrinsicExpr, Pattern, Stmt } from "../ast"
import { InternalCompilerError } from "../errors"
import { expandModifiers, toPascalCase, toSnakeCase } from "../lowering"
import { forEachChildExpr } from "../optimizer"
import { type SemType, isSigned, typeToString } from "../types"
import { Generator, type TargetId, escapeString, intLiteralText, isSimple } from "./target"

export type MoveUse = "signer" | "string" | "vector" | "option" | "table" | "event" | "timestamp" | "block"

const USE_ORDER: readonly MoveUse[] = [
	"signer",
	"string",
	"vector",
	"option",
	"table",
	"event",
	"timestamp",
	"block",
]

const MOVE_KEYWORDS = new Set([
	"abort",
	"acquires",
	"as",
	"break",
	"const",
	"continue",
	"copy",
	"else",
	"enum",
	"friend",
	"fun",
	"has",
	"if",
	"invariant",
	"let",
	"loop",
	"match",
	"module",
	"move",
	"mut",
	"native",
	"public",
	"return",
	"script",
	"spec",
	"struct",
	"type",
	"use",
	"while",
])

/** Where an expression's value lives: a named place, a reference expression, or a plain value. */
interface Path {
	readonly text: string
	readonly kind: "place" | "ref" | "value"
}

export abstract class MoveGenerator extends Generator {
	protected readonly snake: string
	protected readonly stateStruct: string
	private readonly uses = new Set<MoveUse>()

	constructor(analysis: ContractAnalysis, target: TargetId) {
		super(analysis, target)
		this.snake = toSnakeCase(analysis.info.name)
		this.stateStruct = `${toPascalCase(analysis.info.name)}State`
	}

	protected get artifactPath(): string {
		return `${this.target}/${this.snake}.move`
	}

	// --- Target hooks ---

	protected abstract get moduleAddress(): string
	protected abstract useLine(use: MoveUse): string | null
	/** Function names the generated module defines itself. */
	protected abstract get reservedFunctions(): readonly string[]
	/** Local names bound by generated code. */
	protected abstract get reservedLocals(): readonly string[]
	protected abstract emitStateStruct(): void
	protected abstract emitInit(): void
	protected abstract emitWrapper(fn: FunctionDecl, info: FunctionInfo): void
	protected abstract emitHelpers(): void
	/** Extra trailing parameters of every `_impl` function, starting with ", ". */
	protected abstract get implExtraParams(): string
	protected abstract get implExtraArgs(): string
	protected abstract intrinsic(expr: IntrinsicExpr): string
	protected abstract mapRead(map: string, key: string, value: SemType): string
	protected abstract mapWrite(map: string, key: string, value: string): string
	protected abstract mapRemove(map: string, key: string): string
	protected abstract structKeyword(): string
	protected abstract get eventAbilities(): string
	protected abstract letKeyword(mutable: boolean): string
	/** The empty table for a map state variable. */
	protected abstract newTable(): string

	protected need(use: MoveUse): void {
		this.uses.add(use)
	}

	// --- Module layout ---

	protected emit(): void {
		this.checkNames()
		const w = this.w
		w.line(`module ${this.moduleAddress}::${this.snake} {`)
		w.indent()
		const usesAt = w.mark()

		const codes = this.errors.codes
		if (codes.length > 0) w.blank()
		for (const code of codes) w.line(`const ${code.constName}: u64 = ${code.code};`)

		const consts = [...this.analysis.info.consts.values()].filter((c) => /^[A-Z]/.test(c.name))
		if (consts.length > 0) w.blank()
		for (const c of consts) {
			if (c.constValue === undefined) continue
			w.line(`const ${c.name}: ${this.ty(c.type, this.analysis.contract.span)} = ${c.constValue};`)
		}

		for (const struct of this.analysis.info.structs.values()) {
			w.blank()
			w.block(`${this.structKeyword()} ${struct.name} has copy, drop, store`, () => {
				for (const f of struct.fields) w.line(`${f.name}: ${this.ty(f.type, this.analysis.contract.span)},`)
			})
		}

		for (const event of this.analysis.info.events.values()) {
			w.blank()
			this.eventAttribute()
			w.block(`${this.structKeyword()} ${event.name} has ${this.eventAbilities}`, () => {
				for (const f of event.fields) w.line(`${f.name}: ${this.ty(f.type, this.analysis.contract.span)},`)
			})
		}

		w.blank()
		this.emitStateStruct()
		w.blank()
		this.emitInit()

		for (const fn of this.analysis.contract.functions) {
			if (fn.visibility !== "public") continue
			w.blank()
			this.emitWrapper(fn, this.infoOf(fn))
		}
		for (const fn of this.analysis.contract.functions) {
			w.blank()
			this.emitImpl(fn)
		}
		this.emitHelpers()

		w.dedent()
		w.line("}")

		const lines = USE_ORDER.filter((u) => this.uses.has(u)).flatMap((u) => {
			const line = this.useLine(u)
			return line ? [line] : []
		})
		if (lines.length > 0) w.insert(usesAt, [...lines, ""])
	}

	protected eventAttribute(): void {}

	private checkNames(): void {
		const functions = this.analysis.info.functions
		for (const fn of this.analysis.contract.functions) {
			if (this.reservedFunctions.includes(fn.name)) {
				this.fail(
					"TargetConstraintViolation",
					fn.span,
					`function name '${fn.name}' collides with a function the ${this.target} module defines`,
				)
			}
			if (functions.has(`${fn.name}_impl`)) {
				this.fail(
					"TargetConstraintViolation",
					fn.span,
					`function '${fn.name}_impl' collides with the generated helper for '${fn.name}'`,
				)
			}
		}
	}

	protected infoOf(fn: FunctionDecl): FunctionInfo {
		const info = this.analysis.info.functions.get(fn.name)
		if (!info) throw new InternalCompilerError(`no signature for '${fn.name}'`)
		return info
	}

	/** `, name: T` for each parameter. */
	protected paramList(fn: FunctionDecl, info: FunctionInfo): string {
		return info.params
			.map((p, i) => `, ${this.local(p.name)}: ${this.ty(p.type, fn.params[i]?.span ?? fn.span)}`)
			.join("")
	}

	protected argList(fn: FunctionDecl): string {
		return fn.params.map((p) => `, ${this.local(p.name)}`).join("")
	}

	protected returnSuffix(fn: FunctionDecl, info: FunctionInfo): string {
		return info.returnType.kind === "void" ? "" : `: ${this.ty(info.returnType, fn.span)}`
	}

	/** The state fields in declaration order, each paired with its initial value. */
	protected initialFields(): { name: string; value: string }[] {
		return this.analysis.contract.state.map((decl) => {
			const info = this.analysis.info.state.find((s) => s.name === decl.name)
			if (!info) throw new InternalCompilerError(`no type for state variable '${decl.name}'`)
			if (info.type.kind === "map") return { name: decl.name, value: this.newTable() }
			return { name: decl.name, value: decl.init ? this.value(decl.init) : this.zero(info.type, decl.span) }
		})
	}

	/** True when any state initializer reads `msg_sender`. */
	protected initUsesSender(): boolean {
		const visit = (e: Expr): boolean => {
			if (e.kind === "IntrinsicExpr" && e.name === "msg_sender") return true
			let found = false
			forEachChildExpr(e, (child) => {
				found ||= visit(child)
			})
			return found
		}
		return this.analysis.contract.state.some((d) => d.init !== null && visit(d.init))
	}

	protected emitStateFields(): void {
		for (const s of this.analysis.info.state) {
			const decl = this.analysis.contract.state.find((d) => d.name === s.name)
			const span = decl?.span ?? this.analysis.contract.span
			if (s.type.kind === "map") {
				this.need("table")
				this.w.line(`${s.name}: Table<${this.ty(s.type.key, span)}, ${this.ty(s.type.value, span)}>,`)
				continue
			}
			this.w.line(`${s.name}: ${this.ty(s.type, span)},`)
		}
	}

	private emitImpl(fn: FunctionDecl): void {
		const info = this.infoOf(fn)
		this.resetTemps()
		const body = expandModifiers(fn, this.analysis.info.modifiers)
		const header = `fun ${fn.name}_impl(state: &mut ${this.stateStruct}, sender: address${this.paramList(fn, info)}${this.implExtraParams})${this.returnSuffix(fn, info)}`
		this.w.block(header, () => {
			const last = body.stmts[body.stmts.length - 1]
			if (last?.kind !== "ReturnStmt") {
				this.stmts(body.stmts, false)
				return
			}
			this.stmts(body.stmts.slice(0, -1), true)
			if (last.value) this.w.line(this.value(last.value))
		})
	}

	// --- Types and values ---

	protected local(name: string): string {
		return MOVE_KEYWORDS.has(name) || this.reservedLocals.includes(name) ? `${name}_` : name
	}

	protected ty(type: SemType, span: Expr["span"]): string {
		switch (type.kind) {
			case "int":
				if (isSigned(type.int)) {
					this.unsupported(span, `signed integer type ${type.int} is not supported on ${this.target}`)
				}
				return type.int
			case "bool":
				return "bool"
			case "address":
				return "address"
			case "string":
				this.need("string")
				return "String"
			case "bytes":
				return "vector<u8>"
			case "vector":
			case "array":
				return `vector<${this.ty(type.element, span)}>`
			case "struct":
				return type.name
			case "option":
				this.need("option")
				return `Option<${this.ty(type.inner, span)}>`
			case "map":
				this.unsupported(span, "maps are only supported as state variables")
				return "u64"
			case "tuple":
			case "result":
			case "fn":
				this.unsupported(span, `${typeToString(type)} values are not supported on ${this.target}`)
				return "u64"
			case "void":
			case "error":
				throw new InternalCompilerError(`no Move spelling for ${typeToString(type)}`)
		}
	}

	protected zero(type: SemType, span: Expr["span"]): string {
		switch (type.kind) {
			case "int":
				return "0"
			case "bool":
				return "false"
			case "address":
				return "@0x0"
			case "string":
				this.need("string")
				return 'string::utf8(b"")'
			case "bytes":
			case "vector":
				return "vector[]"
			case "array":
				return `vector[${Array.from({ length: type.size }, () => this.zero(type.element, span)).join(", ")}]`
			case "struct":
				return `${type.name} { ${type.fields.map((f) => `${f.name}: ${this.zero(f.type, span)}`).join(", ")} }`
			case "option":
				this.need("option")
				return "option::none()"
			default:
				this.ty(type, span)
				return "0"
		}
	}

	protected bytesLiteral(value: string): string {
		const printable = [...value].every((ch) => {
			const c = ch.codePointAt(0) ?? 0
			return (c >= 0x20 && c < 0x7f) || ch === "\n" || ch === "\t" || ch === "\0"
		})
		if (printable) return `b"${escapeString(value)}"`
		const hex = [...new TextEncoder().encode(value)].map((b) => b.toString(16).padStart(2, "0")).join("")
		return `x"${hex}"`
	}

	// --- Statements ---

	/** `followed` is set when more lines come after the list in the same block. */
	private stmts(list: readonly Stmt[], followed: boolean): void {
		list.forEach((stmt, i) => this.stmt(stmt, followed || i < list.length - 1))
	}

	private stmt(stmt: Stmt, followed: boolean): void {
		const w = this.w
		const end = followed ? "};" : "}"
		switch (stmt.kind) {
			case "LetStmt": {
				const symbol = this.analysis.declarations.get(stmt)
				if (!symbol) throw new InternalCompilerError(`no symbol for '${stmt.name}'`)
				w.line(
					`${this.letKeyword(stmt.mutable)} ${this.bindingName(symbol, stmt.name)}: ${this.ty(symbol.type, stmt.span)} = ${this.value(stmt.init)};`,
				)
				return
			}

			case "AssignStmt":
				this.assign(stmt.target, stmt.op, stmt.value)
				return

			case "ExprStmt":
				this.exprStmt(stmt.expr)
				return

			case "IfStmt":
				this.ifChain(stmt, "if", end)
				return

			case "WhileStmt": {
				const cond = stmt.condition
				const header = cond.kind === "BoolLiteral" && cond.value ? "loop" : `while (${this.value(cond)})`
				w.block(header, () => this.stmts(stmt.body.stmts, false), end)
				return
			}

			case "ForRangeStmt": {
				const symbol = this.analysis.declarations.get(stmt)
				if (!symbol) throw new InternalCompilerError(`no symbol for '${stmt.variable}'`)
				const i = this.bindingName(symbol, stmt.variable)
				const bound = this.fresh("end")
				w.block(
					"",
					() => {
						w.line(`${this.letKeyword(true)} ${i}: ${this.ty(symbol.type, stmt.span)} = ${this.value(stmt.start)};`)
						w.line(`let ${bound} = ${this.value(stmt.end)};`)
						w.block(`while (${i} < ${bound})`, () => this.loopBody(stmt.body, `${i} = ${i} + 1;`), "}")
					},
					end,
				)
				return
			}

			case "ForEachStmt": {
				const items = this.fresh("items")
				const index = this.fresh("i")
				const count = this.fresh("n")
				w.block(
					"",
					() => {
						this.need("vector")
						w.line(`let ${items} = ${this.value(stmt.iterable)};`)
						w.line(`${this.letKeyword(true)} ${index} = 0;`)
						w.line(`let ${count} = vector::length(&${items});`)
						w.block(
							`while (${index} < ${count})`,
							() => {
								w.line(`let ${this.declaredName(stmt, stmt.variable)} = *vector::borrow(&${items}, ${index});`)
								this.loopBody(stmt.body, `${index} = ${index} + 1;`)
							},
							"}",
						)
					},
					end,
				)
				return
			}

			case "MatchStmt": {
				const subject = this.fresh("m")
				w.block(
					"",
					() => {
						w.line(`let ${subject} = ${this.value(stmt.subject)};`)
						stmt.arms.forEach((arm, i) => {
							const isLast = i === stmt.arms.length - 1
							const open = i === 0 ? "" : "} else "
							if (isLast && (i > 0 || this.isWildcard(arm.patterns))) {
								w.line(i === 0 ? "{" : "} else {")
							} else {
								w.line(`${open}if (${this.matches(subject, arm.patterns)}) {`)
							}
							w.indent()
							this.stmts(arm.body.stmts, false)
							w.dedent()
						})
						w.line("}")
					},
					end,
				)
				return
			}

			case "RequireStmt": {
				const code = this.errors.intern(stmt.message)
				w.line(`assert!(${this.value(stmt.condition)}, ${code.constName});`)
				return
			}

			case "EmitStmt": {
				const event = this.analysis.info.events.get(stmt.event)
				if (!event) throw new InternalCompilerError(`unknown event '${stmt.event}'`)
				this.need("event")
				const fields = event.fields.map((f, i) => {
					const arg = stmt.args[i]
					return `${f.name}: ${arg ? this.value(arg) : this.zero(f.type, stmt.span)}`
				})
				w.line(`event::emit(${event.name} { ${fields.join(", ")} });`)
				return
			}

			case "ReturnStmt": {
				const text = stmt.value ? `return ${this.value(stmt.value)}` : "return"
				w.line(followed ? `${text};` : text)
				return
			}

			case "Block":
				w.block("", () => this.stmts(stmt.stmts, false), end)
				return

			case "PlaceholderStmt":
				throw new InternalCompilerError("unexpanded modifier placeholder")
		}
	}

	/** A loop body followed by the counter step, which is left out when the body always returns. */
	private loopBody(body: Block, step: string): void {
		const last = body.stmts[body.stmts.length - 1]
		if (last?.kind === "ReturnStmt") {
			this.stmts(body.stmts, false)
			return
		}
		this.stmts(body.stmts, true)
		this.w.line(step)
	}

	private ifChain(stmt: IfStmt, keyword: string, end: string): void {
		const w = this.w
		w.line(`${keyword} (${this.value(stmt.condition)}) {`)
		w.indent()
		this.stmts(stmt.then.stmts, false)
		w.dedent()
		const else_ = stmt.else_
		if (!else_) {
			w.line(end)
		} else if (else_.kind === "IfStmt") {
			this.ifChain(else_, "} else if", end)
		} else {
			w.line("} else {")
			w.indent()
			this.stmts(else_.stmts, false)
			w.dedent()
			w.line(end)
		}
	}

	private isWildcard(patterns: readonly Pattern[]): boolean {
		return patterns.some((p) => p.kind === "WildcardPattern")
	}

	private matches(subject: string, patterns: readonly Pattern[]): string {
		return patterns
			.map((p) => {
				if (p.kind === "WildcardPattern") return "true"
				return `${subject} == ${this.value(p.value)}`
			})
			.join(" || ")
	}

	private exprStmt(expr: Expr): void {
		const w = this.w
		if (expr.kind === "MethodCallExpr") {
			const arg = expr.args[0]
			if (expr.method === "remove" && expr.receiver.kind === "Ident" && arg) {
				w.line(`${this.mapRemove(expr.receiver.name, this.bind(arg, "k"))};`)
				return
			}
			if (expr.method === "push" && arg) {
				const value = this.bind(arg, "v")
				this.need("vector")
				w.line(`vector::push_back(${this.ref(this.path(expr.receiver, true), true)}, ${value});`)
				return
			}
		}
		const text = this.value(expr)
		w.line(this.typeOf(expr).kind === "void" ? `${text};` : `let _ = ${text};`)
	}

	/** Evaluates `expr` into a temporary unless it is cheap and stateless. */
	private bind(expr: Expr, prefix: string): string {
		if (isSimple(expr, (e) => this.isStateRef(e))) return this.value(expr)
		const temp = this.fresh(prefix)
		this.w.line(`let ${temp} = ${this.value(expr)};`)
		return temp
	}

	private assign(target: Expr, op: string, value: Expr): void {
		const w = this.w
		const map = this.mapPlace(target)
		if (map) {
			const name = map.map.name
			const key = this.bind(map.entry.index, "k")
			const valueType = map.map.type.kind === "map" ? map.map.type.value : this.typeOf(map.entry)
			if (!map.nested) {
				const next =
					op === "="
						? this.bind(value, "v")
						: this.bindText(`${this.mapRead(name, key, valueType)} ${op.slice(0, 1)} ${this.operand(value)}`)
				w.line(`${this.mapWrite(name, key, next)};`)
				return
			}
			const rhs = this.bind(value, "v")
			const entry = this.fresh("e")
			w.line(`${this.letKeyword(true)} ${entry} = ${this.mapRead(name, key, valueType)};`)
			const lhs = this.lvalue(this.path(target, true, { node: map.entry, text: entry }))
			const current = this.read(this.path(target, false, { node: map.entry, text: entry }))
			w.line(op === "=" ? `${lhs} = ${rhs};` : `${lhs} = ${current} ${op.slice(0, 1)} ${rhs};`)
			w.line(`${this.mapWrite(name, key, entry)};`)
			return
		}
		if (op === "=") {
			const rhs = this.value(value)
			w.line(`${this.lvalue(this.path(target, true))} = ${rhs};`)
			return
		}
		const next = this.bindText(`${this.read(this.path(target, false))} ${op.slice(0, 1)} ${this.operand(value)}`)
		w.line(`${this.lvalue(this.path(target, true))} = ${next};`)
	}

	private bindText(text: string): string {
		const temp = this.fresh("v")
		this.w.line(`let ${temp} = ${text};`)
		return temp
	}

	// --- Places ---

	private path(expr: Expr, mutable: boolean, subst?: { node: Expr; text: string }): Path {
		if (subst && expr === subst.node) return { text: subst.text, kind: "place" }
		switch (expr.kind) {
			case "Ident": {
				const symbol = this.symbolOf(expr)
				if (symbol.kind === "state") return { text: `state.${expr.name}`, kind: "place" }
				return { text: this.bindingName(symbol, expr.name), kind: "place" }
			}
			case "GroupExpr":
				return this.path(expr.expr, mutable, subst)
			case "FieldAccess": {
				const object = this.path(expr.object, mutable, subst)
				if (object.kind === "value") {
					const temp = this.fresh("s")
					return { text: `{ let ${temp} = ${object.text}; ${temp}.${expr.field} }`, kind: "value" }
				}
				return { text: `${object.text}.${expr.field}`, kind: "place" }
			}
			case "IndexAccess": {
				const objectType = this.typeOf(expr.object)
				if (objectType.kind === "map") {
					if (expr.object.kind !== "Ident") throw new InternalCompilerError("map index on a non-state expression")
					return { text: this.mapRead(expr.object.name, this.value(expr.index), objectType.value), kind: "value" }
				}
				this.need("vector")
				const index = this.value(expr.index)
				const object = this.path(expr.object, mutable, subst)
				if (object.kind === "value") {
					const temp = this.fresh("s")
					return { text: `{ let ${temp} = ${object.text}; *vector::borrow(&${temp}, ${index}) }`, kind: "value" }
				}
				const borrow = mutable ? "borrow_mut" : "borrow"
				return { text: `vector::${borrow}(${this.ref(object, mutable)}, ${index})`, kind: "ref" }
			}
			default:
				return { text: this.value(expr), kind: "value" }
		}
	}

	private ref(path: Path, mutable: boolean): string {
		switch (path.kind) {
			case "place":
				return mutable ? `&mut ${path.text}` : `&${path.text}`
			case "ref":
				return path.text
			case "value":
				throw new InternalCompilerError(`cannot borrow the value ${path.text}`)
		}
	}

	private read(path: Path): string {
		return path.kind === "ref" ? `*${path.text}` : path.text
	}

	private lvalue(path: Path): string {
		if (path.kind === "value") throw new InternalCompilerError(`cannot assign to ${path.text}`)
		return path.kind === "ref" ? `*${path.text}` : path.text
	}

	/** A borrow of `expr` for read-only framework calls, copying plain values into a block first. */
	private withRef(expr: Expr, use: (ref: string) => string): string {
		const path = this.path(expr, false)
		if (path.kind !== "value") return use(this.ref(path, false))
		const temp = this.fresh("r")
		return `{ let ${temp} = ${path.text}; ${use(`&${temp}`)} }`
	}

	// --- Expressions ---

	private operand(expr: Expr): string {
		const text = this.value(expr)
		return expr.kind === "BinaryExpr" ? `(${text})` : text
	}

	protected value(expr: Expr): string {
		const kind = expr.kind
		switch (expr.kind) {
			case "IntLiteral":
				return intLiteralText(expr.value)
			case "BoolLiteral":
				return `${expr.value}`
			case "StringLiteral":
				this.need("string")
				return `string::utf8(${this.bytesLiteral(expr.value)})`
			case "BytesLiteral":
				return this.bytesLiteral(expr.value)

			case "Ident": {
				const symbol = this.symbolOf(expr)
				if (symbol.kind === "const" && symbol.constValue !== undefined) return `${symbol.constValue}`
				if (symbol.kind === "state" && symbol.type.kind === "map") {
					this.unsupported(expr.span, `map '${expr.name}' can only be indexed or used with contains/remove`)
				}
				return this.read(this.path(expr, false))
			}

			case "IntrinsicExpr":
				return this.intrinsic(expr)

			case "UnaryExpr":
				if (expr.op === "-") {
					this.unsupported(expr.span, `negation is not supported on ${this.target}`)
				}
				return `${expr.op}${this.operand(expr.operand)}`

			case "BinaryExpr":
				return `${this.operand(expr.left)} ${expr.op} ${this.operand(expr.right)}`

			case "TernaryExpr":
				return `(if (${this.value(expr.condition)}) ${this.value(expr.then)} else ${this.value(expr.else_)})`

			case "CallExpr":
				return this.call(expr)

			case "MethodCallExpr":
				return this.method(expr)

			case "FieldAccess":
			case "IndexAccess":
				return this.read(this.path(expr, false))

			case "StructLiteral":
				return `${expr.typeName} { ${expr.fields.map((f) => `${f.name}: ${this.value(f.value)}`).join(", ")} }`

			case "ArrayLiteral":
				return `vector[${expr.elements.map((e) => this.value(e)).join(", ")}]`

			case "TupleLiteral":
				this.unsupported(expr.span, `tuples are not supported on ${this.target}`)
				return "0"

			case "LambdaExpr":
				this.unsupported(expr.span, `lambdas are not supported on ${this.target}`)
				return "0"

			case "MatchExpr": {
				const subject = this.fresh("m")
				const arms = expr.arms
				let chain = ""
				arms.forEach((arm, i) => {
					const isLast = i === arms.length - 1
					if (isLast && (i > 0 || this.isWildcard(arm.patterns))) {
						chain += this.value(arm.value)
					} else {
						chain += `if (${this.matches(subject, arm.patterns)}) ${this.value(arm.value)} else `
					}
				})
				return `{ let ${subject} = ${this.value(expr.subject)}; ${chain} }`
			}

			case "ConstructorExpr":
				switch (expr.ctor) {
					case "Some":
						this.need("option")
						return `option::some(${expr.arg ? this.value(expr.arg) : ""})`
					case "None":
						this.need("option")
						return "option::none()"
					case "Ok":
					case "Err":
						this.unsupported(expr.span, `result values are not supported on ${this.target}`)
						return "0"
				}
				break

			case "GroupExpr":
				return `(${this.value(expr.expr)})`
		}
		throw new InternalCompilerError(`cannot generate ${kind}`)
	}

	private call(expr: Extract<Expr, { kind: "CallExpr" }>): string {
		const target = this.analysis.calls.get(expr)
		if (!target) throw new InternalCompilerError(`unresolved call to '${expr.callee}'`)
		switch (target.kind) {
			case "conversion": {
				const arg = expr.args[0]
				if (!arg) throw new InternalCompilerError("conversion without an argument")
				this.ty(this.typeOf(expr), expr.span)
				return `(${this.operand(arg)} as ${target.to})`
			}
			case "lambda":
				this.unsupported(expr.span, `lambdas are not supported on ${this.target}`)
				return "0"
			case "function": {
				// Arguments that read state are bound first: `state` is lent to the callee.
				const lets: string[] = []
				const args = expr.args.map((a) => {
					if (isSimple(a, (e) => this.isStateRef(e))) return this.value(a)
					const temp = this.fresh("a")
					lets.push(`let ${temp} = ${this.value(a)};`)
					return temp
				})
				const call = `${target.name}_impl(state, sender${args.map((a) => `, ${a}`).join("")}${this.implExtraArgs})`
				return lets.length > 0 ? `{ ${lets.join(" ")} ${call} }` : call
			}
		}
	}

	private method(expr: Extract<Expr, { kind: "MethodCallExpr" }>): string {
		const receiverType = this.typeOf(expr.receiver)
		const arg = expr.args[0]
		switch (expr.method) {
			case "len":
				if (receiverType.kind === "string") {
					this.need("string")
					return this.withRef(expr.receiver, (r) => `string::length(${r})`)
				}
				this.need("vector")
				return this.withRef(expr.receiver, (r) => `vector::length(${r})`)
			case "push":
				if (!arg) break
				this.need("vector")
				return `vector::push_back(${this.ref(this.path(expr.receiver, true), true)}, ${this.value(arg)})`
			case "contains":
				if (expr.receiver.kind !== "Ident" || !arg) break
				this.need("table")
				return `table::contains(&state.${expr.receiver.name}, ${this.value(arg)})`
			case "remove":
				if (expr.receiver.kind !== "Ident" || !arg) break
				return this.mapRemove(expr.receiver.name, this.value(arg))
			case "is_some":
			case "is_none":
				this.need("option")
				return this.withRef(expr.receiver, (r) => `option::${expr.method}(${r})`)
			case "unwrap_or": {
				if (!arg) break
				this.need("option")
				const fallback = this.value(arg)
				return this.withRef(expr.receiver, (r) => `option::get_with_default(${r}, ${fallback})`)
			}
			case "is_ok":
			case "is_err":
				this.unsupported(expr.span, `result values are not supported on ${this.target}`)
				return "false"
		}
		throw new InternalCompilerError(`no method '${expr.method}' on ${typeToString(receiverType)}`)
	}
}
