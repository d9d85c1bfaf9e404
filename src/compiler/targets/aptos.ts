// Aptos Move: state is a resource published under the deployer's address by `init_module`,
// maps are `aptos_std::table` tables, events use the module event API.

import type { ContractAnalysis, FunctionInfo } from "../analyzer"
import type { FunctionDecl, IntrinsicExpr } from "../ast"
import type { SemType } from "../types"
import { type MoveUse, MoveGenerator } from "./move"
import type { Target } from "./target"

const USE_LINES: Record<MoveUse, string> = {
	signer: "use std::signer;",
	string: "use std::string::{Self, String};",
	vector: "use std::vector;",
	option: "use std::option::{Self, Option};",
	table: "use aptos_std::table::{Self, Table};",
	event: "use aptos_framework::event;",
	timestamp: "use aptos_framework::timestamp;",
	block: "use aptos_framework::block;",
}

const ENTRY_PARAM_KINDS = new Set<SemType["kind"]>(["int", "bool", "address", "string", "bytes", "vector", "option"])

export function createAptosTarget(): Target {
	return {
		id: "aptos",
		generate: (analysis) => new AptosGenerator(analysis).run(),
	}
}

class AptosGenerator extends MoveGenerator {
	constructor(analysis: ContractAnalysis) {
		super(analysis, "aptos")
	}

	protected get moduleAddress(): string {
		return "deployer"
	}

	protected useLine(use: MoveUse): string {
		return USE_LINES[use]
	}

	protected get reservedFunctions(): readonly string[] {
		return ["init", "init_module", "init_state"]
	}

	protected get reservedLocals(): readonly string[] {
		return ["state", "sender", "account", "deployer"]
	}

	protected get implExtraParams(): string {
		return ""
	}

	protected get implExtraArgs(): string {
		return ""
	}

	protected structKeyword(): string {
		return "struct"
	}

	protected get eventAbilities(): string {
		return "drop, store"
	}

	protected eventAttribute(): void {
		this.w.line("#[event]")
	}

	protected letKeyword(): string {
		return "let"
	}

	protected newTable(): string {
		this.need("table")
		return "table::new()"
	}

	protected emitStateStruct(): void {
		this.w.block(`struct ${this.stateStruct} has key`, () => this.emitStateFields())
	}

	protected emitInit(): void {
		const w = this.w
		w.block("fun init_module(deployer: &signer)", () => {
			if (this.initUsesSender()) {
				this.need("signer")
				w.line("let sender = signer::address_of(deployer);")
			}
			const fields = this.initialFields()
			w.line(`move_to(deployer, ${this.stateStruct} {`)
			w.indent()
			for (const f of fields) w.line(`${f.name}: ${f.value},`)
			w.dedent()
			w.line("});")
		})
	}

	protected emitWrapper(fn: FunctionDecl, info: FunctionInfo): void {
		this.need("signer")
		const entry = info.returnType.kind === "void" && info.params.every((p) => ENTRY_PARAM_KINDS.has(p.type.kind))
		const header = `public ${entry ? "entry " : ""}fun ${fn.name}(account: &signer${this.paramList(fn, info)})${this.returnSuffix(fn, info)} acquires ${this.stateStruct}`
		this.w.block(header, () => {
			this.w.line(`let state = borrow_global_mut<${this.stateStruct}>(@deployer);`)
			this.w.line(`${fn.name}_impl(state, signer::address_of(account)${this.argList(fn)})`)
		})
	}

	protected emitHelpers(): void {}

	protected intrinsic(expr: IntrinsicExpr): string {
		switch (expr.name) {
			case "msg_sender":
				return "sender"
			case "block_height":
				this.need("block")
				return "block::get_current_block_height()"
			case "block_timestamp":
				this.need("timestamp")
				return "timestamp::now_seconds()"
		}
	}

	protected mapRead(map: string, key: string, value: SemType): string {
		this.need("table")
		const fallback = this.fresh("d")
		const zero = this.zero(value, this.analysis.contract.span)
		return `{ let ${fallback} = ${zero}; *table::borrow_with_default(&state.${map}, ${key}, &${fallback}) }`
	}

	protected mapWrite(map: string, key: string, value: string): string {
		this.need("table")
		return `table::upsert(&mut state.${map}, ${key}, ${value})`
	}

	protected mapRemove(map: string, key: string): string {
		this.need("table")
		return `if (table::contains(&state.${map}, ${key})) { table::remove(&mut state.${map}, ${key}); }`
	}
}
