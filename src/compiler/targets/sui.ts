// Sui Move (2024 edition): state is one shared object created in `init`, maps are
// `sui::table` tables behind two generated helpers, and every call carries the TxContext.

import type { ContractAnalysis, FunctionInfo } from "../analyzer"
import type { FunctionDecl, IntrinsicExpr } from "../ast"
import type { SemType } from "../types"
import { type MoveUse, MoveGenerator } from "./move"
import type { Target } from "./target"

// vector, option, object, transfer and tx_context are in scope by default
const USE_LINES: Record<MoveUse, string | null> = {
	signer: null,
	string: "use std::string::{Self, String};",
	vector: null,
	option: null,
	table: "use sui::table::{Self, Table};",
	event: "use sui::event;",
	timestamp: null,
	block: null,
}

export function createSuiTarget(): Target {
	return {
		id: "sui",
		generate: (analysis) => new SuiGenerator(analysis).run(),
	}
}

class SuiGenerator extends MoveGenerator {
	constructor(analysis: ContractAnalysis) {
		super(analysis, "sui")
	}

	protected get moduleAddress(): string {
		return this.snake
	}

	protected useLine(use: MoveUse): string | null {
		return USE_LINES[use]
	}

	protected get reservedFunctions(): readonly string[] {
		return ["init", "init_module", "init_state", "table_get_or", "table_set"]
	}

	protected get reservedLocals(): readonly string[] {
		return ["state", "sender", "ctx"]
	}

	protected get implExtraParams(): string {
		return ", ctx: &TxContext"
	}

	protected get implExtraArgs(): string {
		return ", ctx"
	}

	protected structKeyword(): string {
		return "public struct"
	}

	protected get eventAbilities(): string {
		return "copy, drop"
	}

	protected letKeyword(mutable: boolean): string {
		return mutable ? "let mut" : "let"
	}

	protected newTable(): string {
		this.need("table")
		return "table::new(ctx)"
	}

	protected emitStateStruct(): void {
		this.w.block(`public struct ${this.stateStruct} has key`, () => {
			this.w.line("id: UID,")
			this.emitStateFields()
		})
	}

	protected emitInit(): void {
		const w = this.w
		w.block("fun init(ctx: &mut TxContext)", () => {
			if (this.initUsesSender()) w.line("let sender = tx_context::sender(ctx);")
			const fields = this.initialFields()
			w.line(`let state = ${this.stateStruct} {`)
			w.indent()
			w.line("id: object::new(ctx),")
			for (const f of fields) w.line(`${f.name}: ${f.value},`)
			w.dedent()
			w.line("};")
			w.line("transfer::share_object(state);")
		})
	}

	protected emitWrapper(fn: FunctionDecl, info: FunctionInfo): void {
		const header = `public fun ${fn.name}(state: &mut ${this.stateStruct}${this.paramList(fn, info)}, ctx: &mut TxContext)${this.returnSuffix(fn, info)}`
		this.w.block(header, () => {
			this.w.line("let sender = tx_context::sender(ctx);")
			this.w.line(`${fn.name}_impl(state, sender${this.argList(fn)}, ctx)`)
		})
	}

	protected emitHelpers(): void {
		if (!this.analysis.info.state.some((s) => s.type.kind === "map")) return
		const w = this.w
		w.blank()
		w.block(
			"fun table_get_or<K: copy + drop + store, V: copy + drop + store>(t: &Table<K, V>, key: K, default: V): V",
			() => {
				w.line("if (table::contains(t, key)) *table::borrow(t, key) else default")
			},
		)
		w.blank()
		w.block("fun table_set<K: copy + drop + store, V: drop + store>(t: &mut Table<K, V>, key: K, value: V)", () => {
			w.line("if (table::contains(t, key)) {")
			w.indent()
			w.line("*table::borrow_mut(t, key) = value;")
			w.dedent()
			w.line("} else {")
			w.indent()
			w.line("table::add(t, key, value);")
			w.dedent()
			w.line("}")
		})
	}

	protected intrinsic(expr: IntrinsicExpr): string {
		switch (expr.name) {
			case "msg_sender":
				return "sender"
			case "block_height":
				this.unsupported(expr.span, "block_height has no equivalent on sui")
				return "0"
			case "block_timestamp":
				return "(tx_context::epoch_timestamp_ms(ctx) / 1000)"
		}
	}

	protected mapRead(map: string, key: string, value: SemType): string {
		this.need("table")
		return `table_get_or(&state.${map}, ${key}, ${this.zero(value, this.analysis.contract.span)})`
	}

	protected mapWrite(map: string, key: string, value: string): string {
		this.need("table")
		return `table_set(&mut state.${map}, ${key}, ${value})`
	}

	protected mapRemove(map: string, key: string): string {
		this.need("table")
		return `if (table::contains(&state.${map}, ${key})) { table::remove(&mut state.${map}, ${key}); }`
	}
}
