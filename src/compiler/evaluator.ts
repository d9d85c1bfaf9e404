// Reference interpreter for checked contracts. It runs a ContractAnalysis (before or after
// optimization) with the trap semantics every target shares, so tests can compare the
// behaviour of two ASTs without generating code.

import type { ContractAnalysis, FunctionInfo } from "./analyzer"
import { applyArith, compare, convertInt, isArithOp, isCompareOp, negate } from "./arith"
import type { ArithResult, TrapReason } from "./arith"
import type { Block, DeclNode, Expr, LambdaExpr, Pattern, Stmt } from "./ast"
import { InternalCompilerError } from "./errors"
import { expandModifiers } from "./lowering"
import type { SymbolInfo } from "./scopes"
import type { SemType } from "./types"

export type Value =
	| { readonly kind: "int"; readonly value: bigint }
	| { readonly kind: "bool"; readonly value: boolean }
	| { readonly kind: "address"; readonly value: string }
	| { readonly kind: "string"; readonly value: string }
	| { readonly kind: "bytes"; readonly value: string }
	| { readonly kind: "vector"; readonly items: readonly Value[] }
	| { readonly kind: "array"; readonly items: readonly Value[] }
	| { readonly kind: "tuple"; readonly items: readonly Value[] }
	| { readonly kind: "struct"; readonly name: string; readonly fields: ReadonlyMap<string, Value> }
	| { readonly kind: "option"; readonly value: Value | null }
	| { readonly kind: "result"; readonly ok: boolean; readonly value: Value }
	| { readonly kind: "map"; readonly entries: ReadonlyMap<string, MapEntry> }
	| { readonly kind: "fn"; readonly lambda: LambdaExpr; readonly captured: ReadonlyMap<SymbolInfo, Value> }
	| { readonly kind: "void" }

export interface MapEntry {
	readonly key: Value
	readonly value: Value
}

export interface ExecEnv {
	readonly sender: string
	readonly blockHeight: bigint
	readonly timestamp: bigint
}

export interface EmittedEvent {
	readonly name: string
	readonly args: readonly Value[]
}

export type ExecTrap = TrapReason | "index out of bounds" | "call depth exceeded" | "step limit exceeded"

export type CallOutcome =
	| { readonly status: "ok"; readonly value: Value; readonly events: readonly EmittedEvent[] }
	| { readonly status: "revert"; readonly message: string }
	| { readonly status: "trap"; readonly reason: ExecTrap }

export interface EvaluatorOptions {
	readonly maxSteps?: number
	readonly maxCallDepth?: number
}

export const VOID_VALUE: Value = { kind: "void" }

/** Raised inside the interpreter and caught at the call boundary. */
class Abort extends Error {
	constructor(readonly outcome: Exclude<CallOutcome, { status: "ok" }>) {
		super(outcome.status === "revert" ? outcome.message : outcome.reason)
		this.name = "Abort"
	}
}

type Frame = Map<SymbolInfo, Value>

type Completion = { readonly returned: false } | { readonly returned: true; readonly value: Value }

const NORMAL: Completion = { returned: false }

export type DeployOutcome =
	| { readonly status: "ok"; readonly instance: ContractInstance }
	| Exclude<CallOutcome, { status: "ok" }>

/** Runs the state initializers and returns a live instance. */
export function deploy(
	analysis: ContractAnalysis,
	env: ExecEnv,
	options: EvaluatorOptions = {},
): DeployOutcome {
	const instance = new ContractInstance(analysis, options)
	const failure = instance.initialize(env)
	return failure ?? { status: "ok", instance }
}

export class ContractInstance {
	private storage = new Map<SymbolInfo, Value>()
	private events: EmittedEvent[] = []
	private env: ExecEnv = { sender: "0x0", blockHeight: 0n, timestamp: 0n }
	private steps = 0
	private depth = 0
	private bodies = new Map<string, Block>()
	private readonly maxSteps: number
	private readonly maxCallDepth: number

	constructor(
		private readonly analysis: ContractAnalysis,
		options: EvaluatorOptions,
	) {
		this.maxSteps = options.maxSteps ?? 100_000
		this.maxCallDepth = options.maxCallDepth ?? 256
	}

	/** @internal Used by deploy(). */
	initialize(env: ExecEnv): Exclude<CallOutcome, { status: "ok" }> | null {
		return this.guard(env, () => {
			for (const decl of this.analysis.contract.state) {
				const info = this.analysis.info.state.find((s) => s.name === decl.name)
				if (!info) continue
				const value = decl.init ? this.eval(decl.init, new Map()) : zeroValue(info.type)
				this.storage.set(info.symbol, value)
			}
			return VOID_VALUE
		}).failure
	}

	/** Calls a public function. State changes and events are discarded when the call fails. */
	call(name: string, args: readonly Value[], env: ExecEnv): CallOutcome {
		const fn = this.analysis.info.functions.get(name)
		if (!fn || fn.visibility !== "public") {
			throw new RangeError(`contract '${this.analysis.info.name}' has no public function '${name}'`)
		}
		if (args.length !== fn.params.length) {
			throw new RangeError(`'${name}' expects ${fn.params.length} argument(s), got ${args.length}`)
		}
		const snapshot = new Map(this.storage)
		this.events = []
		const { value, failure } = this.guard(env, () => this.invoke(fn, args))
		if (failure) {
			this.storage = snapshot
			return failure
		}
		return { status: "ok", value, events: this.events }
	}

	/** Current value of a state variable. */
	read(name: string): Value | undefined {
		const info = this.analysis.info.state.find((s) => s.name === name)
		return info ? this.storage.get(info.symbol) : undefined
	}

	private guard(
		env: ExecEnv,
		run: () => Value,
	): { value: Value; failure: Exclude<CallOutcome, { status: "ok" }> | null } {
		this.env = env
		this.steps = 0
		this.depth = 0
		try {
			return { value: run(), failure: null }
		} catch (err) {
			if (err instanceof Abort) return { value: VOID_VALUE, failure: err.outcome }
			throw err
		}
	}

	private trap(reason: ExecTrap): never {
		throw new Abort({ status: "trap", reason })
	}

	private checked(result: ArithResult): bigint {
		if (!result.ok) this.trap(result.trap)
		return result.value
	}

	private tick(): void {
		if (++this.steps > this.maxSteps) this.trap("step limit exceeded")
	}

	private invoke(fn: FunctionInfo, args: readonly Value[]): Value {
		if (++this.depth > this.maxCallDepth) this.trap("call depth exceeded")
		let body = this.bodies.get(fn.name)
		if (!body) {
			body = expandModifiers(fn.decl, this.analysis.info.modifiers)
			this.bodies.set(fn.name, body)
		}
		const frame: Frame = new Map()
		fn.decl.params.forEach((p, i) => {
			const symbol = this.analysis.declarations.get(p)
			const arg = args[i]
			if (symbol && arg) frame.set(symbol, arg)
		})
		const completion = this.execBlock(body, frame)
		this.depth--
		return completion.returned ? completion.value : VOID_VALUE
	}

	// --- Statements ---

	private execBlock(block: Block, frame: Frame): Completion {
		for (const stmt of block.stmts) {
			const completion = this.exec(stmt, frame)
			if (completion.returned) return completion
		}
		return NORMAL
	}

	private exec(stmt: Stmt, frame: Frame): Completion {
		this.tick()
		switch (stmt.kind) {
			case "LetStmt":
				frame.set(this.declared(stmt), this.eval(stmt.init, frame))
				return NORMAL

			case "AssignStmt": {
				const value = this.eval(stmt.value, frame)
				if (stmt.op === "=") {
					this.update(stmt.target, frame, () => value)
					return NORMAL
				}
				const type = this.typeOf(stmt.target)
				if (type.kind !== "int") throw new InternalCompilerError(`'${stmt.op}' on a non-integer`)
				const op = stmt.op === "+=" ? "+" : stmt.op === "-=" ? "-" : stmt.op === "*=" ? "*" : "/"
				this.update(stmt.target, frame, (old) => ({
					kind: "int",
					value: this.checked(applyArith(op, asInt(old), asInt(value), type.int)),
				}))
				return NORMAL
			}

			case "ExprStmt":
				this.eval(stmt.expr, frame)
				return NORMAL

			case "IfStmt":
				if (asBool(this.eval(stmt.condition, frame))) return this.execBlock(stmt.then, frame)
				if (!stmt.else_) return NORMAL
				return stmt.else_.kind === "Block"
					? this.execBlock(stmt.else_, frame)
					: this.exec(stmt.else_, frame)

			case "WhileStmt":
				while (asBool(this.eval(stmt.condition, frame))) {
					const completion = this.execBlock(stmt.body, frame)
					if (completion.returned) return completion
					this.tick()
				}
				return NORMAL

			case "ForRangeStmt": {
				const start = asInt(this.eval(stmt.start, frame))
				const end = asInt(this.eval(stmt.end, frame))
				const symbol = this.declared(stmt)
				for (let i = start; i < end; i++) {
					frame.set(symbol, { kind: "int", value: i })
					const completion = this.execBlock(stmt.body, frame)
					if (completion.returned) return completion
					this.tick()
				}
				return NORMAL
			}

			case "ForEachStmt": {
				const symbol = this.declared(stmt)
				for (const item of asItems(this.eval(stmt.iterable, frame))) {
					frame.set(symbol, item)
					const completion = this.execBlock(stmt.body, frame)
					if (completion.returned) return completion
					this.tick()
				}
				return NORMAL
			}

			case "MatchStmt": {
				const subject = this.eval(stmt.subject, frame)
				const arm = stmt.arms.find((a) => a.patterns.some((p) => this.matches(p, subject, frame)))
				return arm ? this.execBlock(arm.body, frame) : NORMAL
			}

			case "RequireStmt":
				if (!asBool(this.eval(stmt.condition, frame))) {
					throw new Abort({ status: "revert", message: stmt.message ?? "requirement failed" })
				}
				return NORMAL

			case "EmitStmt":
				this.events.push({ name: stmt.event, args: stmt.args.map((a) => this.eval(a, frame)) })
				return NORMAL

			case "ReturnStmt":
				return { returned: true, value: stmt.value ? this.eval(stmt.value, frame) : VOID_VALUE }

			case "PlaceholderStmt":
				throw new InternalCompilerError("unexpanded modifier placeholder")

			case "Block":
				return this.execBlock(stmt, frame)
		}
	}

	private declared(node: DeclNode): SymbolInfo {
		const symbol = this.analysis.declarations.get(node)
		if (!symbol) throw new InternalCompilerError(`binding at ${node.span.line}:${node.span.column} has no symbol`)
		return symbol
	}

	// --- Places ---

	private update(place: Expr, frame: Frame, fn: (old: Value) => Value): void {
		switch (place.kind) {
			case "Ident": {
				const symbol = this.symbolOf(place)
				const store = symbol.kind === "state" ? this.storage : frame
				const old = store.get(symbol)
				if (!old) throw new InternalCompilerError(`'${symbol.name}' is not initialised`)
				store.set(symbol, fn(old))
				return
			}
			case "GroupExpr":
				this.update(place.expr, frame, fn)
				return
			case "FieldAccess":
				this.update(place.object, frame, (obj) => {
					if (obj.kind === "struct") {
						const fields = new Map(obj.fields)
						fields.set(place.field, fn(fieldOf(obj, place.field)))
						return { ...obj, fields }
					}
					if (obj.kind === "tuple") {
						const items = [...obj.items]
						const index = Number(place.field)
						items[index] = fn(fieldOf(obj, place.field))
						return { ...obj, items }
					}
					throw new InternalCompilerError(`cannot assign to a field of ${obj.kind}`)
				})
				return
			case "IndexAccess": {
				const index = this.eval(place.index, frame)
				const valueType = this.typeOf(place)
				this.update(place.object, frame, (obj) => {
					if (obj.kind === "map") {
						const key = valueKey(index)
						const entries = new Map(obj.entries)
						const old = obj.entries.get(key)?.value ?? zeroValue(valueType)
						entries.set(key, { key: index, value: fn(old) })
						return { kind: "map", entries }
					}
					const items = [...asItems(obj)]
					const i = this.boundedIndex(index, items.length)
					items[i] = fn(items[i] ?? VOID_VALUE)
					return obj.kind === "array" ? { kind: "array", items } : { kind: "vector", items }
				})
				return
			}
			default:
				throw new InternalCompilerError(`${place.kind} is not an assignable place`)
		}
	}

	private boundedIndex(index: Value, length: number): number {
		const i = asInt(index)
		if (i < 0n || i >= BigInt(length)) this.trap("index out of bounds")
		return Number(i)
	}

	// --- Expressions ---

	private typeOf(expr: Expr): SemType {
		const type = this.analysis.types.get(expr)
		if (!type) {
			throw new InternalCompilerError(
				`expression at ${expr.span.line}:${expr.span.column} has no resolved type`,
			)
		}
		return type
	}

	private symbolOf(ident: Extract<Expr, { kind: "Ident" }>): SymbolInfo {
		const symbol = this.analysis.references.get(ident)
		if (!symbol) throw new InternalCompilerError(`unresolved name '${ident.name}'`)
		return symbol
	}

	private eval(expr: Expr, frame: Frame): Value {
		switch (expr.kind) {
			case "IntLiteral":
				return { kind: "int", value: expr.value }
			case "BoolLiteral":
				return { kind: "bool", value: expr.value }
			case "StringLiteral":
				return { kind: "string", value: expr.value }
			case "BytesLiteral":
				return { kind: "bytes", value: expr.value }

			case "Ident": {
				const symbol = this.symbolOf(expr)
				if (symbol.constValue !== undefined) return literalValue(symbol.constValue)
				const value = symbol.kind === "state" ? this.storage.get(symbol) : frame.get(symbol)
				if (!value) throw new InternalCompilerError(`'${symbol.name}' is not initialised`)
				return value
			}

			case "IntrinsicExpr":
				switch (expr.name) {
					case "msg_sender":
						return { kind: "address", value: this.env.sender }
					case "block_height":
						return { kind: "int", value: this.env.blockHeight }
					case "block_timestamp":
						return { kind: "int", value: this.env.timestamp }
				}
				break

			case "UnaryExpr": {
				const operand = this.eval(expr.operand, frame)
				if (expr.op === "!") return { kind: "bool", value: !asBool(operand) }
				const type = this.typeOf(expr)
				if (type.kind !== "int") throw new InternalCompilerError("negation of a non-integer")
				return { kind: "int", value: this.checked(negate(asInt(operand), type.int)) }
			}

			case "BinaryExpr": {
				if (expr.op === "&&") {
					return asBool(this.eval(expr.left, frame)) ? this.eval(expr.right, frame) : bool(false)
				}
				if (expr.op === "||") {
					return asBool(this.eval(expr.left, frame)) ? bool(true) : this.eval(expr.right, frame)
				}
				const left = this.eval(expr.left, frame)
				const right = this.eval(expr.right, frame)
				if (expr.op === "==") return bool(valueEquals(left, right))
				if (expr.op === "!=") return bool(!valueEquals(left, right))
				if (isCompareOp(expr.op)) return bool(compare(expr.op, asInt(left), asInt(right)))
				const type = this.typeOf(expr)
				if (!isArithOp(expr.op) || type.kind !== "int") {
					throw new InternalCompilerError(`'${expr.op}' on a non-integer`)
				}
				return {
					kind: "int",
					value: this.checked(applyArith(expr.op, asInt(left), asInt(right), type.int)),
				}
			}

			case "TernaryExpr":
				return asBool(this.eval(expr.condition, frame))
					? this.eval(expr.then, frame)
					: this.eval(expr.else_, frame)

			case "CallExpr": {
				const target = this.analysis.calls.get(expr)
				if (!target) throw new InternalCompilerError(`unresolved call to '${expr.callee}'`)
				const args = expr.args.map((a) => this.eval(a, frame))
				switch (target.kind) {
					case "conversion":
						return { kind: "int", value: this.checked(convertInt(asInt(args[0] ?? VOID_VALUE), target.to)) }
					case "function": {
						const fn = this.analysis.info.functions.get(target.name)
						if (!fn) throw new InternalCompilerError(`unknown function '${target.name}'`)
						return this.invoke(fn, args)
					}
					case "lambda": {
						const callee = frame.get(target.symbol)
						if (callee?.kind !== "fn") throw new InternalCompilerError(`'${expr.callee}' is not a lambda`)
						const inner: Frame = new Map(callee.captured)
						callee.lambda.params.forEach((p, i) => {
							const arg = args[i]
							if (arg) inner.set(this.declared(p), arg)
						})
						return this.eval(callee.lambda.body, inner)
					}
				}
				break
			}

			case "MethodCallExpr":
				return this.evalMethod(expr, frame)

			case "FieldAccess":
				return fieldOf(this.eval(expr.object, frame), expr.field)

			case "IndexAccess": {
				const object = this.eval(expr.object, frame)
				const index = this.eval(expr.index, frame)
				if (object.kind === "map") {
					return object.entries.get(valueKey(index))?.value ?? zeroValue(this.typeOf(expr))
				}
				const items = asItems(object)
				return items[this.boundedIndex(index, items.length)] ?? VOID_VALUE
			}

			case "StructLiteral": {
				const type = this.typeOf(expr)
				if (type.kind !== "struct") throw new InternalCompilerError("struct literal of a non-struct")
				const given = new Map(expr.fields.map((f) => [f.name, f.value]))
				const fields = new Map<string, Value>()
				for (const field of type.fields) {
					const init = given.get(field.name)
					fields.set(field.name, init ? this.eval(init, frame) : zeroValue(field.type))
				}
				return { kind: "struct", name: type.name, fields }
			}

			case "ArrayLiteral": {
				const items = expr.elements.map((e) => this.eval(e, frame))
				return this.typeOf(expr).kind === "array" ? { kind: "array", items } : { kind: "vector", items }
			}

			case "TupleLiteral":
				return { kind: "tuple", items: expr.elements.map((e) => this.eval(e, frame)) }

			case "LambdaExpr":
				return { kind: "fn", lambda: expr, captured: new Map(frame) }

			case "MatchExpr": {
				const subject = this.eval(expr.subject, frame)
				const arm = expr.arms.find((a) => a.patterns.some((p) => this.matches(p, subject, frame)))
				if (!arm) throw new InternalCompilerError("no match arm applies")
				return this.eval(arm.value, frame)
			}

			case "ConstructorExpr": {
				const arg = expr.arg ? this.eval(expr.arg, frame) : VOID_VALUE
				switch (expr.ctor) {
					case "Some":
						return { kind: "option", value: arg }
					case "None":
						return { kind: "option", value: null }
					case "Ok":
						return { kind: "result", ok: true, value: arg }
					case "Err":
						return { kind: "result", ok: false, value: arg }
				}
				break
			}

			case "GroupExpr":
				return this.eval(expr.expr, frame)
		}
		throw new InternalCompilerError(`cannot evaluate ${expr.kind}`)
	}

	private evalMethod(expr: Extract<Expr, { kind: "MethodCallExpr" }>, frame: Frame): Value {
		const args = expr.args.map((a) => this.eval(a, frame))
		const arg = args[0] ?? VOID_VALUE
		if (expr.method === "push") {
			this.update(expr.receiver, frame, (old) => ({ kind: "vector", items: [...asItems(old), arg] }))
			return VOID_VALUE
		}
		if (expr.method === "remove") {
			this.update(expr.receiver, frame, (old) => {
				if (old.kind !== "map") throw new InternalCompilerError("remove on a non-map")
				const entries = new Map(old.entries)
				entries.delete(valueKey(arg))
				return { kind: "map", entries }
			})
			return VOID_VALUE
		}

		const receiver = this.eval(expr.receiver, frame)
		switch (expr.method) {
			case "len":
				if (receiver.kind === "string") {
					return { kind: "int", value: BigInt(new TextEncoder().encode(receiver.value).length) }
				}
				if (receiver.kind === "bytes") return { kind: "int", value: BigInt(receiver.value.length) }
				return { kind: "int", value: BigInt(asItems(receiver).length) }
			case "contains":
				if (receiver.kind !== "map") break
				return bool(receiver.entries.has(valueKey(arg)))
			case "is_some":
			case "is_none":
				if (receiver.kind !== "option") break
				return bool((receiver.value !== null) === (expr.method === "is_some"))
			case "is_ok":
			case "is_err":
				if (receiver.kind !== "result") break
				return bool(receiver.ok === (expr.method === "is_ok"))
			case "unwrap_or":
				if (receiver.kind === "option") return receiver.value ?? arg
				if (receiver.kind === "result") return receiver.ok ? receiver.value : arg
				break
		}
		throw new InternalCompilerError(`no method '${expr.method}' on ${receiver.kind}`)
	}

	private matches(pattern: Pattern, subject: Value, frame: Frame): boolean {
		if (pattern.kind === "WildcardPattern") return true
		return valueEquals(this.eval(pattern.value, frame), subject)
	}
}

// --- Value helpers ---

function bool(value: boolean): Value {
	return { kind: "bool", value }
}

function literalValue(value: bigint | boolean): Value {
	return typeof value === "bigint" ? { kind: "int", value } : { kind: "bool", value }
}

function asInt(v: Value): bigint {
	if (v.kind !== "int") throw new InternalCompilerError(`expected an integer, found ${v.kind}`)
	return v.value
}

function asBool(v: Value): boolean {
	if (v.kind !== "bool") throw new InternalCompilerError(`expected a bool, found ${v.kind}`)
	return v.value
}

function asItems(v: Value): readonly Value[] {
	if (v.kind === "vector" || v.kind === "array" || v.kind === "tuple") return v.items
	throw new InternalCompilerError(`expected a sequence, found ${v.kind}`)
}

function fieldOf(v: Value, field: string): Value {
	if (v.kind === "struct") {
		const found = v.fields.get(field)
		if (found) return found
	}
	if (v.kind === "tuple") {
		const found = v.items[Number(field)]
		if (found) return found
	}
	throw new InternalCompilerError(`no field '${field}' on ${v.kind}`)
}

/** Identity of a map key. Keys are always primitive values. */
export function valueKey(v: Value): string {
	switch (v.kind) {
		case "int":
			return `int:${v.value}`
		case "bool":
			return `bool:${v.value}`
		case "address":
		case "string":
		case "bytes":
			return `${v.kind}:${v.value}`
		default:
			throw new InternalCompilerError(`${v.kind} cannot be a map key`)
	}
}

export function valueEquals(a: Value, b: Value): boolean {
	switch (a.kind) {
		case "int":
		case "bool":
		case "address":
		case "string":
		case "bytes":
			return b.kind === a.kind && a.value === b.value
		case "vector":
		case "array":
		case "tuple":
			return (
				b.kind === a.kind &&
				a.items.length === b.items.length &&
				a.items.every((item, i) => valueEquals(item, b.items[i]!))
			)
		case "struct":
			if (b.kind !== "struct" || a.name !== b.name) return false
			for (const [name, value] of a.fields) {
				const other = b.fields.get(name)
				if (!other || !valueEquals(value, other)) return false
			}
			return true
		case "option":
			if (b.kind !== "option") return false
			if (a.value === null || b.value === null) return a.value === b.value
			return valueEquals(a.value, b.value)
		case "result":
			return b.kind === "result" && a.ok === b.ok && valueEquals(a.value, b.value)
		case "map":
			if (b.kind !== "map" || a.entries.size !== b.entries.size) return false
			for (const [key, entry] of a.entries) {
				const other = b.entries.get(key)
				if (!other || !valueEquals(entry.value, other.value)) return false
			}
			return true
		case "fn":
			return b.kind === "fn" && a.lambda === b.lambda
		case "void":
			return b.kind === "void"
	}
}

/** The default every target gives an unset value of this type. */
export function zeroValue(type: SemType): Value {
	switch (type.kind) {
		case "int":
			return { kind: "int", value: 0n }
		case "bool":
			return { kind: "bool", value: false }
		case "address":
			return { kind: "address", value: "0x0" }
		case "string":
			return { kind: "string", value: "" }
		case "bytes":
			return { kind: "bytes", value: "" }
		case "vector":
			return { kind: "vector", items: [] }
		case "array":
			return { kind: "array", items: Array.from({ length: type.size }, () => zeroValue(type.element)) }
		case "tuple":
			return { kind: "tuple", items: type.elements.map(zeroValue) }
		case "struct":
			return {
				kind: "struct",
				name: type.name,
				fields: new Map(type.fields.map((f) => [f.name, zeroValue(f.type)])),
			}
		case "option":
			return { kind: "option", value: null }
		case "result":
			return { kind: "result", ok: true, value: zeroValue(type.ok) }
		case "map":
			return { kind: "map", entries: new Map() }
		case "void":
			return VOID_VALUE
		case "fn":
		case "error":
			throw new InternalCompilerError(`no default value for ${type.kind}`)
	}
}
