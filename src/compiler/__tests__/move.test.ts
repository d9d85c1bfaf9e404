import { describe, expect, it } from "vitest"
import type { ContractAnalysis } from "../analyzer"
import { analyze } from "../analyzer"
import { Lexer } from "../lexer"
import { parse } from "../parser"
import type { GenerateResult, TargetId } from "../targets"
import { createTarget } from "../targets"

const COUNTER = `
contract Counter {
	state {
		count: u64 = 0;
		owner: address = msg_sender;
		balances: map<address, u64>;
	}
	event Bumped(by: u64);
	public fn bump(by: u64) {
		require(msg_sender == owner, "not owner");
		count += by;
		emit Bumped(by);
	}
	public fn credit(who: address, amount: u64) { balances[who] += amount; }
	public fn get(who: address) -> u64 { return balances[who]; }
}
`

const TALLY = `
contract Tally {
	state { total: u64 = 0; }
	modifier bump { let amount = total + 7; require(amount > 0, "zero"); _; }
	public fn add(amount: u64) bump { total = total + amount; }
}
`

function analyzeSource(source: string): ContractAnalysis {
	const { file } = parse(new Lexer(source).tokenize())
	const analysis = analyze(file).contracts[0]
	if (!analysis) throw new Error("no contract")
	const errors = analysis.diagnostics.errors.map((d) => d.message)
	if (errors.length > 0) throw new Error(`analysis failed: ${errors.join("; ")}`)
	return analysis
}

function generate(target: TargetId, source: string): GenerateResult {
	return createTarget(target).generate(analyzeSource(source))
}

function lines(target: TargetId, source: string): string[] {
	const result = generate(target, source)
	if (!result.artifact) throw new Error(result.diagnostics.map((d) => d.message).join("; "))
	return result.artifact.text.split("\n").map((l) => l.trim())
}

/** The lines of the block opened by `header`, header and closing brace included. */
function blockAt(out: string[], header: string, length: number): string[] {
	const start = out.indexOf(header)
	if (start < 0) throw new Error(`no line '${header}'`)
	return out.slice(start, start + length)
}

describe("aptos target", () => {
	it("publishes a module under the deployer address", () => {
		const result = generate("aptos", COUNTER)
		expect(result.artifact?.path).toBe("aptos/counter.move")
		expect(lines("aptos", COUNTER).slice(0, 7)).toEqual([
			"module deployer::counter {",
			"use std::signer;",
			"use aptos_std::table::{Self, Table};",
			"use aptos_framework::event;",
			"",
			"const E_NOT_OWNER: u64 = 1;",
			"",
		])
	})

	it("declares events and the state resource", () => {
		const out = lines("aptos", COUNTER)
		expect(blockAt(out, "struct Bumped has drop, store {", 3)).toEqual([
			"struct Bumped has drop, store {",
			"by: u64,",
			"}",
		])
		expect(out[out.indexOf("struct Bumped has drop, store {") - 1]).toBe("#[event]")
		expect(blockAt(out, "struct CounterState has key {", 5)).toEqual([
			"struct CounterState has key {",
			"count: u64,",
			"owner: address,",
			"balances: Table<address, u64>,",
			"}",
		])
	})

	it("moves the initial state to the deployer in init_module", () => {
		expect(blockAt(lines("aptos", COUNTER), "fun init_module(deployer: &signer) {", 8)).toEqual([
			"fun init_module(deployer: &signer) {",
			"let sender = signer::address_of(deployer);",
			"move_to(deployer, CounterState {",
			"count: 0,",
			"owner: sender,",
			"balances: table::new(),",
			"});",
			"}",
		])
	})

	it("makes void functions with plain parameters entry functions", () => {
		const out = lines("aptos", COUNTER)
		expect(blockAt(out, "public entry fun bump(account: &signer, by: u64) acquires CounterState {", 4)).toEqual([
			"public entry fun bump(account: &signer, by: u64) acquires CounterState {",
			"let state = borrow_global_mut<CounterState>(@deployer);",
			"bump_impl(state, signer::address_of(account), by)",
			"}",
		])
		expect(out).toContain("public fun get(account: &signer, who: address): u64 acquires CounterState {")
	})

	it("asserts requirements with error constants", () => {
		expect(blockAt(lines("aptos", COUNTER), "fun bump_impl(state: &mut CounterState, sender: address, by: u64) {", 6)).toEqual([
			"fun bump_impl(state: &mut CounterState, sender: address, by: u64) {",
			"assert!(sender == state.owner, E_NOT_OWNER);",
			"let __v0 = state.count + by;",
			"state.count = __v0;",
			"event::emit(Bumped { by: by });",
			"}",
		])
	})

	it("reads maps with a zero default and writes them with upsert", () => {
		const out = lines("aptos", COUNTER)
		expect(
			blockAt(out, "fun credit_impl(state: &mut CounterState, sender: address, who: address, amount: u64) {", 4),
		).toEqual([
			"fun credit_impl(state: &mut CounterState, sender: address, who: address, amount: u64) {",
			"let __v1 = { let __d0 = 0; *table::borrow_with_default(&state.balances, who, &__d0) } + amount;",
			"table::upsert(&mut state.balances, who, __v1);",
			"}",
		])
		expect(blockAt(out, "fun get_impl(state: &mut CounterState, sender: address, who: address): u64 {", 3)).toEqual([
			"fun get_impl(state: &mut CounterState, sender: address, who: address): u64 {",
			"{ let __d0 = 0; *table::borrow_with_default(&state.balances, who, &__d0) }",
			"}",
		])
	})

	it("rejects signed integers", () => {
		const result = generate("aptos", "contract C { public fn f(a: i64) -> i64 { return a; } }")
		expect(result.artifact).toBeNull()
		expect(new Set(result.diagnostics.map((d) => d.message))).toEqual(
			new Set(["signed integer type i64 is not supported on aptos"]),
		)
		expect(result.diagnostics.every((d) => d.code === "UnsupportedConstruct" && d.target === "aptos")).toBe(true)
	})

	it("rejects functions named after module initializers", () => {
		const result = generate("aptos", "contract C { public fn init_module() {} }")
		expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
			["TargetConstraintViolation", "function name 'init_module' collides with a function the aptos module defines"],
		])
	})

	it("reads the block height from the framework", () => {
		const out = lines("aptos", "contract C { public fn h() -> u64 { return block_height; } }")
		expect(out).toContain("use aptos_framework::block;")
		expect(out).toContain("block::get_current_block_height()")
	})
})

describe("sui target", () => {
	it("names the module after the contract and imports only what it uses", () => {
		const result = generate("sui", COUNTER)
		expect(result.artifact?.path).toBe("sui/counter.move")
		expect(lines("sui", COUNTER).slice(0, 6)).toEqual([
			"module counter::counter {",
			"use sui::table::{Self, Table};",
			"use sui::event;",
			"",
			"const E_NOT_OWNER: u64 = 1;",
			"",
		])
	})

	it("shares the state object from init", () => {
		const out = lines("sui", COUNTER)
		expect(blockAt(out, "public struct CounterState has key {", 6)).toEqual([
			"public struct CounterState has key {",
			"id: UID,",
			"count: u64,",
			"owner: address,",
			"balances: Table<address, u64>,",
			"}",
		])
		expect(blockAt(out, "fun init(ctx: &mut TxContext) {", 10)).toEqual([
			"fun init(ctx: &mut TxContext) {",
			"let sender = tx_context::sender(ctx);",
			"let state = CounterState {",
			"id: object::new(ctx),",
			"count: 0,",
			"owner: sender,",
			"balances: table::new(ctx),",
			"};",
			"transfer::share_object(state);",
			"}",
		])
	})

	it("passes the shared object and context to every public function", () => {
		expect(
			blockAt(lines("sui", COUNTER), "public fun bump(state: &mut CounterState, by: u64, ctx: &mut TxContext) {", 4),
		).toEqual([
			"public fun bump(state: &mut CounterState, by: u64, ctx: &mut TxContext) {",
			"let sender = tx_context::sender(ctx);",
			"bump_impl(state, sender, by, ctx)",
			"}",
		])
	})

	it("declares copyable events without an attribute", () => {
		const out = lines("sui", COUNTER)
		const at = out.indexOf("public struct Bumped has copy, drop {")
		expect(at).toBeGreaterThan(0)
		expect(out[at - 1]).toBe("")
	})

	it("goes through generated table helpers", () => {
		const out = lines("sui", COUNTER)
		expect(
			blockAt(
				out,
				"fun credit_impl(state: &mut CounterState, sender: address, who: address, amount: u64, ctx: &TxContext) {",
				4,
			),
		).toEqual([
			"fun credit_impl(state: &mut CounterState, sender: address, who: address, amount: u64, ctx: &TxContext) {",
			"let __v0 = table_get_or(&state.balances, who, 0) + amount;",
			"table_set(&mut state.balances, who, __v0);",
			"}",
		])
		expect(out).toContain(
			"fun table_get_or<K: copy + drop + store, V: copy + drop + store>(t: &Table<K, V>, key: K, default: V): V {",
		)
		expect(out).toContain("table::add(t, key, value);")
	})

	it("leaves out the table helpers when there are no maps", () => {
		const out = lines("sui", "contract C { state { n: u64; } public fn f() { n = 1; } }")
		expect(out.some((l) => l.startsWith("fun table_get_or"))).toBe(false)
		expect(out).toContain("state.n = 1;")
	})

	it("declares mutable locals with let mut", () => {
		const out = lines("sui", "contract C { public fn f() -> u64 { let mut x = 1; x = 2; return x; } }")
		expect(out).toContain("let mut x: u64 = 1;")
		expect(out).toContain("x = 2;")
	})

	it("renames parameters that collide with generated names", () => {
		expect(lines("sui", "contract C { public fn f(ctx: u64) -> u64 { return ctx; } }")).toContain(
			"public fun f(state: &mut CState, ctx_: u64, ctx: &mut TxContext): u64 {",
		)
	})

	it("has no block height", () => {
		const result = generate("sui", "contract C { public fn h() -> u64 { return block_height; } }")
		expect(result.artifact).toBeNull()
		expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
			["UnsupportedConstruct", "block_height has no equivalent on sui"],
		])
	})

	it("converts the epoch timestamp to seconds", () => {
		const out = lines("sui", "contract C { public fn t() -> u64 { return block_timestamp; } }")
		expect(out).toContain("(tx_context::epoch_timestamp_ms(ctx) / 1000)")
	})
})

describe("move targets", () => {
	it.each([
		["aptos", "fun add_impl(state: &mut TallyState, sender: address, amount: u64) {"],
		["sui", "fun add_impl(state: &mut TallyState, sender: address, amount: u64, ctx: &TxContext) {"],
	] as const)("keeps modifier locals apart from parameters on %s", (target, header) => {
		expect(blockAt(lines(target, TALLY), header, 7)).toEqual([
			header,
			"let __m0_amount: u64 = state.total + 7;",
			"assert!(__m0_amount > 0, E_ZERO);",
			"{",
			"state.total = state.total + amount;",
			"}",
			"}",
		])
	})
})
