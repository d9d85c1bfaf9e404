// Rust/Anchor generator for the account-model ledger.
// State lives in one `#[account]` record; every function body becomes a `<name>_impl`
// helper taking `&mut <Contract>State` and the signer's key.

import type { ContractAnalysis } from "../analyzer"
import { type ArithOp, applyArith, isArithOp } from "../arith"
import type { BinaryExpr, Block, Expr, FunctionDecl, IfStmt, Pattern, Stmt } from "../ast"
import { InternalCompilerError } from "../errors"
import { expandModifiers, toPascalCase, toSnakeCase } from "../lowering"
import type { SymbolInfo } from "../scopes"
import { type SemType, containsType, typeToString } from "../types"
import {
	Generator,
	type MapPlace,
	type Target,
	escapeString,
	intLiteralText,
	isSimple,
} from "./target"

export type MapPolicy = "bounded" | "reject"

export interface SolanaOptions {
	/** How `map<K, V>` state is stored. `bounded` keeps a capped vector of entries. */
	readonly mapPolicy?: MapPolicy
	readonly mapCapacity?: number
	/** `#[max_len]` given to strings, byte strings and vectors in account data. */
	readonly maxLength?: number
}

export const DEFAULT_MAP_CAPACITY = 64
export const DEFAULT_MAX_LENGTH = 64

const PROGRAM_ID = "11111111111111111111111111111111"

const CHECKED_METHODS: Record<ArithOp, string> = {
	"+": "checked_add",
	"-": "checked_sub",
	"*": "checked_mul",
	"/": "checked_div",
	"%": "checked_rem",
}

const RUST_RESERVED = new Set([
	"as",
	"async",
	"await",
	"break",
	"crate",
	"dyn",
	"enum",
	"extern",
	"impl",
	"loop",
	"mod",
	"move",
	"ref",
	"self",
	"Self",
	"static",
	"super",
	"trait",
	"type",
	"unsafe",
	"use",
	"where",
	// bound by every generated function
	"ctx",
	"sender",
	"state",
])

export function createSolanaTarget(options: SolanaOptions = {}): Target {
	const resolved: Required<SolanaOptions> = {
		mapPolicy: options.mapPolicy ?? "bounded",
		mapCapacity: options.mapCapacity ?? DEFAULT_MAP_CAPACITY,
		maxLength: options.maxLength ?? DEFAULT_MAX_LENGTH,
	}
	return {
		id: "solana",
		generate: (analysis) => new SolanaGenerator(analysis, resolved).run(),
	}
}

class SolanaGenerator extends Generator {
	private readonly snake: string
	private readonly stateStruct: string
	private inLambda = false

	constructor(
		analysis: ContractAnalysis,
		private readonly options: Required<SolanaOptions>,
	) {
		super(analysis, "solana")
		this.snake = toSnakeCase(analysis.info.name)
		this.stateStruct = `${toPascalCase(analysis.info.name)}State`
	}

	protected get artifactPath(): string {
		return `solana/${this.snake}.rs`
	}

	private get maps(): { name: string; key: SemType; value: SemType }[] {
		return this.analysis.info.state.flatMap((s) =>
			s.type.kind === "map" ? [{ name: s.name, key: s.type.key, value: s.type.value }] : [],
		)
	}

	protected emit(): void {
		this.checkNames()
		const w = this.w
		w.line("// Arithmetic traps on overflow only with overflow-checks = true in the release profile.")
		w.line("use anchor_lang::prelude::*;")
		w.blank()
		w.line(`declare_id!("${PROGRAM_ID}");`)

		if (this.analysis.info.consts.size > 0) w.blank()
		for (const symbol of this.analysis.info.consts.values()) {
			if (symbol.constValue === undefined) continue
			w.line(`pub const ${symbol.name}: ${this.rust(symbol.type, this.analysis.contract.span)} = ${symbol.constValue};`)
		}

		w.blank()
		w.line("#[program]")
		w.block(`pub mod ${this.snake}`, () => {
			w.line("use super::*;")
			w.blank()
			this.emitInitInstruction()
			for (const fn of this.analysis.contract.functions) {
				if (fn.visibility !== "public") continue
				w.blank()
				this.emitInstruction(fn)
			}
		})

		for (const fn of this.analysis.contract.functions) {
			w.blank()
			this.emitImpl(fn)
		}

		for (const map of this.maps) this.emitMapHelpers(map.name, map.key, map.value)

		this.emitAccounts()
		this.emitStateStruct()
		this.emitStructs()
		this.emitEvents()
		this.emitErrors()
	}

	private checkNames(): void {
		const functions = this.analysis.info.functions
		for (const fn of this.analysis.contract.functions) {
			if (fn.name === "init_state") {
				this.fail(
					"TargetConstraintViolation",
					fn.span,
					"function name 'init_state' collides with the generated initialization instruction",
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

	// --- Types ---

	private rust(type: SemType, span: Expr["span"]): string {
		switch (type.kind) {
			case "int":
				if (type.int === "u256") {
					this.unsupported(span, "u256 is not supported on solana")
				}
				return type.int
			case "bool":
				return "bool"
			case "address":
				return "Pubkey"
			case "string":
				return "String"
			case "bytes":
				return "Vec<u8>"
			case "vector":
				return `Vec<${this.rust(type.element, span)}>`
			case "array":
				return `[${this.rust(type.element, span)}; ${type.size}]`
			case "tuple":
				return type.elements.length === 1
					? `(${this.rust(type.elements[0]!, span)},)`
					: `(${type.elements.map((t) => this.rust(t, span)).join(", ")})`
			case "struct":
				return type.name
			case "option":
				return `Option<${this.rust(type.inner, span)}>`
			case "result":
				return `std::result::Result<${this.rust(type.ok, span)}, ${this.rust(type.err, span)}>`
			case "map":
				this.unsupported(span, "maps are only supported as state variables")
				return "()"
			case "fn":
			case "void":
			case "error":
				throw new InternalCompilerError(`no Rust spelling for ${typeToString(type)}`)
		}
	}

	private isCopy(type: SemType): boolean {
		switch (type.kind) {
			case "int":
			case "bool":
			case "address":
			case "fn":
				return true
			case "array":
				return this.isCopy(type.element)
			case "tuple":
				return type.elements.every((t) => this.isCopy(t))
			case "option":
				return this.isCopy(type.inner)
			case "result":
				return this.isCopy(type.ok) && this.isCopy(type.err)
			default:
				return false
		}
	}

	/** The `#[max_len(..)]` attribute InitSpace needs for a field of this type, if any. */
	private maxLen(type: SemType): string | null {
		const lengths = (t: SemType): number[] => {
			switch (t.kind) {
				case "string":
				case "bytes":
					return [this.options.maxLength]
				case "vector":
					return [this.options.maxLength, ...lengths(t.element)]
				case "array":
					return lengths(t.element)
				case "option":
					return lengths(t.inner)
				default:
					return []
			}
		}
		const found = lengths(type)
		return found.length > 0 ? `#[max_len(${found.join(", ")})]` : null
	}

	protected local(name: string): string {
		return RUST_RESERVED.has(name) ? `${name}_` : name
	}

	// --- Program module ---

	private emitInitInstruction(): void {
		const w = this.w
		w.block("pub fn init_state(ctx: Context<InitStateAccounts>) -> Result<()>", () => {
			w.line("let sender = ctx.accounts.signer.key();")
			w.line("let state = &mut ctx.accounts.state;")
			for (const decl of this.analysis.contract.state) {
				if (!decl.init) continue
				w.line(`state.${decl.name} = ${this.value(decl.init)};`)
			}
			w.line("Ok(())")
		})
	}

	private emitInstruction(fn: FunctionDecl): void {
		const info = this.analysis.info.functions.get(fn.name)
		if (!info) throw new InternalCompilerError(`no signature for '${fn.name}'`)
		const params = fn.params.map((p, i) => `, ${this.local(p.name)}: ${this.rust(info.params[i]?.type ?? { kind: "error" }, p.span)}`)
		const ret = info.returnType.kind === "void" ? "()" : this.rust(info.returnType, fn.span)
		const args = fn.params.map((p) => `, ${this.local(p.name)}`).join("")
		this.w.block(
			`pub fn ${fn.name}(ctx: Context<${toPascalCase(fn.name)}Accounts>${params.join("")}) -> Result<${ret}>`,
			() => {
				this.w.line("let sender = ctx.accounts.signer.key();")
				this.w.line(`${fn.name}_impl(&mut ctx.accounts.state, sender${args})`)
			},
		)
	}

	private emitImpl(fn: FunctionDecl): void {
		const info = this.analysis.info.functions.get(fn.name)
		if (!info) throw new InternalCompilerError(`no signature for '${fn.name}'`)
		this.resetTemps()
		const params = fn.params
			.map((p, i) => `, ${this.local(p.name)}: ${this.rust(info.params[i]?.type ?? { kind: "error" }, p.span)}`)
			.join("")
		const ret = info.returnType.kind === "void" ? "()" : this.rust(info.returnType, fn.span)
		const body = expandModifiers(fn, this.analysis.info.modifiers)
		this.w.block(
			`fn ${fn.name}_impl(state: &mut ${this.stateStruct}, sender: Pubkey${params}) -> Result<${ret}>`,
			() => {
				this.stmts(body.stmts)
				const last = body.stmts[body.stmts.length - 1]
				if (info.returnType.kind === "void" && last?.kind !== "ReturnStmt") this.w.line("Ok(())")
			},
		)
	}

	// --- Maps ---

	private entryStruct(name: string): string {
		return `${toPascalCase(name)}Entry`
	}

	private emitMapHelpers(name: string, key: SemType, value: SemType): void {
		const w = this.w
		const span = this.analysis.contract.span
		const k = this.rust(key, span)
		const v = this.rust(value, span)
		const s = this.stateStruct
		if (this.options.mapPolicy === "reject") return

		w.blank()
		w.block(`fn ${name}_get(state: &${s}, key: &${k}) -> ${v}`, () => {
			w.line(`state.${name}.iter().find(|e| &e.key == key).map(|e| e.value.clone()).unwrap_or_default()`)
		})
		w.blank()
		w.block(`fn ${name}_set(state: &mut ${s}, key: ${k}, value: ${v}) -> Result<()>`, () => {
			w.block(`if let Some(entry) = state.${name}.iter_mut().find(|e| e.key == key)`, () => {
				w.line("entry.value = value;")
				w.line("return Ok(());")
			})
			w.line(
				`require!(state.${name}.len() < ${this.options.mapCapacity}, ErrorCode::MapCapacityExceeded);`,
			)
			w.line(`state.${name}.push(${this.entryStruct(name)} { key, value });`)
			w.line("Ok(())")
		})
		w.blank()
		w.block(`fn ${name}_contains(state: &${s}, key: &${k}) -> bool`, () => {
			w.line(`state.${name}.iter().any(|e| &e.key == key)`)
		})
		w.blank()
		w.block(`fn ${name}_remove(state: &mut ${s}, key: &${k})`, () => {
			w.line(`state.${name}.retain(|e| &e.key != key);`)
		})
	}

	// --- Account data and declarations ---

	private emitAccounts(): void {
		const w = this.w
		w.blank()
		w.line("#[derive(Accounts)]")
		w.block("pub struct InitStateAccounts<'info>", () => {
			w.line(`#[account(init, payer = signer, space = 8 + ${this.stateStruct}::INIT_SPACE)]`)
			w.line(`pub state: Account<'info, ${this.stateStruct}>,`)
			w.line("#[account(mut)]")
			w.line("pub signer: Signer<'info>,")
			w.line("pub system_program: Program<'info, System>,")
		})
		for (const fn of this.analysis.contract.functions) {
			if (fn.visibility !== "public") continue
			w.blank()
			w.line("#[derive(Accounts)]")
			w.block(`pub struct ${toPascalCase(fn.name)}Accounts<'info>`, () => {
				w.line("#[account(mut)]")
				w.line(`pub state: Account<'info, ${this.stateStruct}>,`)
				w.line("pub signer: Signer<'info>,")
			})
		}
	}

	private emitStateStruct(): void {
		const w = this.w
		const span = this.analysis.contract.span
		const mapBounded = this.options.mapPolicy === "bounded"
		w.blank()
		w.line("#[account]")
		w.line("#[derive(InitSpace)]")
		w.block(`pub struct ${this.stateStruct}`, () => {
			for (const s of this.analysis.info.state) {
				const decl = this.analysis.contract.state.find((d) => d.name === s.name)
				const where = decl?.span ?? span
				if (s.type.kind === "map") {
					if (!mapBounded) {
						this.fail(
							"TargetConstraintViolation",
							where,
							`map state variable '${s.name}' is not allowed under the 'reject' map policy`,
							"use the 'bounded' map policy or a vec of structs",
						)
						continue
					}
					w.line(`#[max_len(${this.options.mapCapacity})]`)
					w.line(`pub ${s.name}: Vec<${this.entryStruct(s.name)}>,`)
					continue
				}
				if (containsType(s.type, (t) => t.kind === "result" || t.kind === "tuple")) {
					this.fail(
						"TargetConstraintViolation",
						where,
						`state variable '${s.name}' of type ${typeToString(s.type)} cannot be stored in account data`,
					)
				}
				const attr = this.maxLen(s.type)
				if (attr) w.line(attr)
				w.line(`pub ${s.name}: ${this.rust(s.type, where)},`)
			}
		})
		if (!mapBounded) return
		for (const map of this.maps) {
			w.blank()
			w.line("#[derive(AnchorSerialize, AnchorDeserialize, Clone, InitSpace)]")
			w.block(`pub struct ${this.entryStruct(map.name)}`, () => {
				const keyAttr = this.maxLen(map.key)
				if (keyAttr) w.line(keyAttr)
				w.line(`pub key: ${this.rust(map.key, span)},`)
				const valueAttr = this.maxLen(map.value)
				if (valueAttr) w.line(valueAttr)
				w.line(`pub value: ${this.rust(map.value, span)},`)
			})
		}
	}

	private emitStructs(): void {
		const w = this.w
		const span = this.analysis.contract.span
		for (const struct of this.analysis.info.structs.values()) {
			const hasResult = struct.fields.some((f) => containsType(f.type, (t) => t.kind === "result"))
			const hasTuple = struct.fields.some((f) => containsType(f.type, (t) => t.kind === "tuple"))
			const derives = ["AnchorSerialize", "AnchorDeserialize", "Clone"]
			if (!hasResult) derives.push("Default")
			derives.push("PartialEq")
			if (!hasResult && !hasTuple) derives.push("InitSpace")
			w.blank()
			w.line(`#[derive(${derives.join(", ")})]`)
			w.block(`pub struct ${struct.name}`, () => {
				for (const f of struct.fields) {
					const attr = this.maxLen(f.type)
					if (attr) w.line(attr)
					w.line(`pub ${f.name}: ${this.rust(f.type, span)},`)
				}
			})
		}
	}

	private emitEvents(): void {
		const w = this.w
		const span = this.analysis.contract.span
		for (const event of this.analysis.info.events.values()) {
			w.blank()
			w.line("#[event]")
			w.block(`pub struct ${event.name}`, () => {
				for (const f of event.fields) w.line(`pub ${f.name}: ${this.rust(f.type, span)},`)
			})
		}
	}

	private emitErrors(): void {
		const w = this.w
		const codes = this.errors.codes
		const needsCapacity = this.options.mapPolicy === "bounded" && this.maps.length > 0
		if (codes.length === 0 && !needsCapacity) return
		w.blank()
		w.line("#[error_code]")
		w.block("pub enum ErrorCode", () => {
			for (const code of codes) {
				w.line(`#[msg("${escapeString(code.message)}")]`)
				w.line(`${code.variant},`)
			}
			if (needsCapacity) {
				w.line('#[msg("map capacity exceeded")]')
				w.line("MapCapacityExceeded,")
			}
		})
	}

	// --- Statements ---

	private stmts(list: readonly Stmt[]): void {
		for (const stmt of list) this.stmt(stmt)
	}

	private body(block: Block): void {
		this.stmts(block.stmts)
	}

	private stmt(stmt: Stmt): void {
		const w = this.w
		switch (stmt.kind) {
			case "LetStmt": {
				const symbol = this.analysis.declarations.get(stmt)
				if (!symbol) throw new InternalCompilerError(`no symbol for '${stmt.name}'`)
				const mut = stmt.mutable ? "mut " : ""
				const annotation =
					symbol.type.kind === "fn" ? "" : `: ${this.rust(symbol.type, stmt.span)}`
				w.line(`let ${mut}${this.bindingName(symbol, stmt.name)}${annotation} = ${this.value(stmt.init)};`)
				return
			}

			case "AssignStmt":
				this.assign(stmt.target, stmt.op, stmt.value)
				return

			case "ExprStmt": {
				const expr = stmt.expr
				if (expr.kind === "MethodCallExpr" && expr.method === "push") {
					const arg = expr.args[0]
					if (arg && !isSimple(arg, (e) => this.isStateRef(e))) {
						const temp = this.fresh("v")
						w.line(`let ${temp} = ${this.value(arg)};`)
						w.line(`${this.place(expr.receiver)}.push(${temp});`)
						return
					}
				}
				w.line(`${this.value(expr)};`)
				return
			}

			case "IfStmt":
				this.ifChain(stmt, "")
				return

			case "WhileStmt": {
				const cond = stmt.condition
				const header = cond.kind === "BoolLiteral" && cond.value ? "loop" : `while ${this.value(cond)}`
				w.block(header, () => this.body(stmt.body))
				return
			}

			case "ForRangeStmt":
				w.block(
					`for ${this.declaredName(stmt, stmt.variable)} in ${this.value(stmt.start)}..${this.value(stmt.end)}`,
					() => this.body(stmt.body),
				)
				return

			case "ForEachStmt":
				w.block(`for ${this.declaredName(stmt, stmt.variable)} in ${this.value(stmt.iterable)}`, () =>
					this.body(stmt.body),
				)
				return

			case "MatchStmt":
				w.block(`match ${this.scrutinee(stmt.subject)}`, () => {
					for (const arm of stmt.arms) {
						w.block(`${this.patterns(arm.patterns)} =>`, () => this.body(arm.body))
					}
				})
				return

			case "RequireStmt": {
				const code = this.errors.intern(stmt.message)
				w.line(`require!(${this.value(stmt.condition)}, ErrorCode::${code.variant});`)
				return
			}

			case "EmitStmt": {
				const event = this.analysis.info.events.get(stmt.event)
				if (!event) throw new InternalCompilerError(`unknown event '${stmt.event}'`)
				const fields = event.fields.map((f, i) => {
					const arg = stmt.args[i]
					return `${f.name}: ${arg ? this.value(arg) : "Default::default()"}`
				})
				w.line(`emit!(${event.name} { ${fields.join(", ")} });`)
				return
			}

			case "ReturnStmt":
				w.line(stmt.value ? `return Ok(${this.value(stmt.value)});` : "return Ok(());")
				return

			case "Block":
				w.block("", () => this.body(stmt))
				return

			case "PlaceholderStmt":
				throw new InternalCompilerError("unexpanded modifier placeholder")
		}
	}

	private ifChain(stmt: IfStmt, prefix: string): void {
		const w = this.w
		w.line(`${prefix}if ${this.value(stmt.condition)} {`)
		w.indent()
		this.body(stmt.then)
		w.dedent()
		const else_ = stmt.else_
		if (!else_) {
			w.line("}")
		} else if (else_.kind === "IfStmt") {
			this.ifChainContinued(else_)
		} else {
			w.line("} else {")
			w.indent()
			this.body(else_)
			w.dedent()
			w.line("}")
		}
	}

	private ifChainContinued(stmt: IfStmt): void {
		const w = this.w
		w.line(`} else if ${this.value(stmt.condition)} {`)
		w.indent()
		this.body(stmt.then)
		w.dedent()
		const else_ = stmt.else_
		if (!else_) {
			w.line("}")
		} else if (else_.kind === "IfStmt") {
			this.ifChainContinued(else_)
		} else {
			w.line("} else {")
			w.indent()
			this.body(else_)
			w.dedent()
			w.line("}")
		}
	}

	private assign(target: Expr, op: string, value: Expr): void {
		const w = this.w
		const map = this.mapPlace(target)
		if (!map) {
			w.line(`${this.place(target)} ${op} ${this.value(value)};`)
			return
		}
		if (this.options.mapPolicy === "reject") return

		const key = this.keyTemp(map)
		let rhs = this.value(value)
		if (!isSimple(value, (e) => this.isStateRef(e))) {
			const temp = this.fresh("v")
			w.line(`let ${temp} = ${rhs};`)
			rhs = temp
		}
		const name = map.map.name
		if (!map.nested) {
			if (op === "=") {
				w.line(`${name}_set(state, ${key}, ${rhs})?;`)
				return
			}
			const next = this.fresh("v")
			w.line(`let ${next} = ${name}_get(state, &${key}) ${op.slice(0, 1)} ${rhs};`)
			w.line(`${name}_set(state, ${key}, ${next})?;`)
			return
		}
		const entry = this.fresh("e")
		w.line(`let mut ${entry} = ${name}_get(state, &${key});`)
		w.line(`${this.place(target, { node: map.entry, text: entry })} ${op} ${rhs};`)
		w.line(`${name}_set(state, ${key}, ${entry})?;`)
	}

	/** Binds a non-trivial map key to a temporary so it is evaluated once. */
	private keyTemp(map: MapPlace): string {
		const index = map.entry.index
		if (isSimple(index, (e) => this.isStateRef(e))) return this.value(index)
		const temp = this.fresh("k")
		this.w.line(`let ${temp} = ${this.value(index)};`)
		return temp
	}

	// --- Expressions ---

	/** An expression in place position: no clone, usable as an assignment or borrow target. */
	private place(expr: Expr, subst?: { node: Expr; text: string }): string {
		if (subst && expr === subst.node) return subst.text
		switch (expr.kind) {
			case "Ident": {
				const symbol = this.symbolOf(expr)
				return symbol.kind === "state" ? `state.${expr.name}` : this.name(symbol, expr.name)
			}
			case "FieldAccess":
				return `${this.place(expr.object, subst)}.${expr.field}`
			case "IndexAccess": {
				const objectType = this.typeOf(expr.object)
				if (objectType.kind === "map") return this.mapRead(expr)
				return `${this.place(expr.object, subst)}[${this.usize(expr.index)}]`
			}
			case "GroupExpr":
				return this.place(expr.expr, subst)
			default:
				return this.value(expr)
		}
	}

	private name(symbol: SymbolInfo, name: string): string {
		return symbol.kind === "const" ? name : this.bindingName(symbol, name)
	}

	private usize(index: Expr): string {
		const type = this.typeOf(index)
		const wide = type.kind === "int" && (type.int === "u128" || type.int === "u256")
		return wide ? `usize::try_from(${this.value(index)}).unwrap()` : `${this.operand(index)} as usize`
	}

	private mapRead(expr: Extract<Expr, { kind: "IndexAccess" }>): string {
		if (expr.object.kind !== "Ident") {
			throw new InternalCompilerError("map index on a non-state expression")
		}
		return `${expr.object.name}_get(state, &${this.operand(expr.index)})`
	}

	/** Wraps compound expressions in parentheses. */
	private operand(expr: Expr): string {
		const text = this.value(expr)
		const compound = expr.kind === "BinaryExpr" || expr.kind === "TernaryExpr" || expr.kind === "MatchExpr"
		return compound ? `(${text})` : text
	}

	private cloned(expr: Expr, text: string): string {
		return this.isCopy(this.typeOf(expr)) ? text : `${text}.clone()`
	}

	private scrutinee(subject: Expr): string {
		const text = this.value(subject)
		return this.typeOf(subject).kind === "string" ? `${text}.as_str()` : text
	}

	private patterns(patterns: readonly Pattern[]): string {
		return patterns
			.map((p) => {
				if (p.kind === "WildcardPattern") return "_"
				const v = p.value
				if (v.kind === "StringLiteral") return `"${escapeString(v.value)}"`
				return `${v.value}`
			})
			.join(" | ")
	}

	/** An expression in value position. */
	private value(expr: Expr): string {
		switch (expr.kind) {
			case "IntLiteral":
				return intLiteralText(expr.value)
			case "BoolLiteral":
				return `${expr.value}`
			case "StringLiteral":
				return `String::from("${escapeString(expr.value)}")`
			case "BytesLiteral":
				return `b"${escapeString(expr.value)}".to_vec()`

			case "Ident": {
				const symbol = this.symbolOf(expr)
				if (symbol.kind === "state" && symbol.type.kind === "map") {
					this.unsupported(expr.span, `map '${expr.name}' can only be indexed or used with contains/remove`)
				}
				return this.cloned(expr, this.place(expr))
			}

			case "IntrinsicExpr":
				switch (expr.name) {
					case "msg_sender":
						return "sender"
					case "block_height":
						if (this.inLambda) this.unsupported(expr.span, "block_height cannot be read inside a lambda on solana")
						return "Clock::get()?.slot"
					case "block_timestamp":
						if (this.inLambda) {
							this.unsupported(expr.span, "block_timestamp cannot be read inside a lambda on solana")
						}
						return "(Clock::get()?.unix_timestamp as u64)"
				}
				break

			case "UnaryExpr":
				return `${expr.op}${this.operand(expr.operand)}`

			case "BinaryExpr":
				return this.constantTrap(expr) ?? `${this.operand(expr.left)} ${expr.op} ${this.operand(expr.right)}`

			case "TernaryExpr":
				return `if ${this.value(expr.condition)} { ${this.value(expr.then)} } else { ${this.value(expr.else_)} }`

			case "CallExpr": {
				const target = this.analysis.calls.get(expr)
				if (!target) throw new InternalCompilerError(`unresolved call to '${expr.callee}'`)
				switch (target.kind) {
					case "conversion": {
						const arg = expr.args[0]
						if (!arg) throw new InternalCompilerError("conversion without an argument")
						this.rust(this.typeOf(expr), expr.span)
						return `${target.to}::try_from(${this.suffixed(arg)}).unwrap()`
					}
					case "function": {
						// Arguments that read state are bound first: the call borrows state mutably
						const temps: string[] = []
						const args = expr.args.map((a) => {
							if (isSimple(a, (e) => this.isStateRef(e))) return `, ${this.value(a)}`
							const temp = this.fresh("a")
							temps.push(`let ${temp} = ${this.value(a)};`)
							return `, ${temp}`
						})
						const call = `${target.name}_impl(state, sender${args.join("")})?`
						return temps.length === 0 ? call : `{ ${temps.join(" ")} ${call} }`
					}
					case "lambda":
						return `${this.bindingName(target.symbol, expr.callee)}(${expr.args.map((a) => this.value(a)).join(", ")})`
				}
				break
			}

			case "MethodCallExpr":
				return this.method(expr)

			case "FieldAccess":
			case "IndexAccess":
				return this.cloned(expr, this.place(expr))

			case "StructLiteral":
				return `${expr.typeName} { ${expr.fields.map((f) => `${f.name}: ${this.value(f.value)}`).join(", ")} }`

			case "ArrayLiteral": {
				const items = expr.elements.map((e) => this.value(e)).join(", ")
				return this.typeOf(expr).kind === "array" ? `[${items}]` : `vec![${items}]`
			}

			case "TupleLiteral": {
				const items = expr.elements.map((e) => this.value(e))
				return items.length === 1 ? `(${items[0]},)` : `(${items.join(", ")})`
			}

			case "LambdaExpr": {
				const params = expr.params.map((p) => {
					const symbol = this.analysis.declarations.get(p)
					const type = symbol ? this.rust(symbol.type, p.span) : "_"
					return `${this.local(p.name)}: ${type}`
				})
				const outer = this.inLambda
				this.inLambda = true
				const body = this.value(expr.body)
				this.inLambda = outer
				return `|${params.join(", ")}| ${body}`
			}

			case "MatchExpr": {
				const arms = expr.arms.map((a) => `${this.patterns(a.patterns)} => ${this.value(a.value)}`)
				return `match ${this.scrutinee(expr.subject)} { ${arms.join(", ")} }`
			}

			case "ConstructorExpr":
				if (expr.ctor === "None") return "None"
				return `${expr.ctor}(${expr.arg ? this.value(expr.arg) : ""})`

			case "GroupExpr":
				return `(${this.value(expr.expr)})`
		}
		throw new InternalCompilerError(`cannot generate ${expr.kind}`)
	}

	/** Integer literals get an explicit suffix where Rust cannot infer their width. */
	/** Literal arithmetic that always traps, as a checked call rustc accepts and that panics at run time. */
	private constantTrap(expr: BinaryExpr): string | null {
		const { op, left, right } = expr
		const type = this.typeOf(expr)
		if (!isArithOp(op) || type.kind !== "int") return null
		if (left.kind !== "IntLiteral" || right.kind !== "IntLiteral") return null
		if (applyArith(op, left.value, right.value, type.int).ok) return null
		return `${this.suffixed(left)}.${CHECKED_METHODS[op]}(${this.suffixed(right)}).unwrap()`
	}

	private suffixed(expr: Expr): string {
		const type = this.typeOf(expr)
		if (expr.kind === "IntLiteral" && type.kind === "int") {
			return expr.value < 0n ? `(${expr.value}${type.int})` : `${expr.value}${type.int}`
		}
		return this.value(expr)
	}

	private method(expr: Extract<Expr, { kind: "MethodCallExpr" }>): string {
		const receiverType = this.typeOf(expr.receiver)
		const arg = expr.args[0]
		switch (expr.method) {
			case "len":
				return `(${this.place(expr.receiver)}.len() as u64)`
			case "push":
				return `${this.place(expr.receiver)}.push(${arg ? this.value(arg) : ""})`
			case "contains":
			case "remove": {
				if (receiverType.kind !== "map" || expr.receiver.kind !== "Ident" || !arg) break
				return `${expr.receiver.name}_${expr.method}(state, &${this.operand(arg)})`
			}
			case "is_some":
			case "is_none":
			case "is_ok":
			case "is_err":
				return `${this.place(expr.receiver)}.${expr.method}()`
			case "unwrap_or":
				return `${this.value(expr.receiver)}.unwrap_or(${arg ? this.value(arg) : ""})`
		}
		throw new InternalCompilerError(`no method '${expr.method}' on ${typeToString(receiverType)}`)
	}
}
