import { readFileSync } from "node:fs"
import { describe, expect, it } from "vitest"
import { analyze } from "../analyzer"
import type { ContractInstance, EvaluatorOptions, ExecEnv, Value } from "../evaluator"
import { deploy } from "../evaluator"
import { Lexer } from "../lexer"
import { parse } from "../parser"

const ALICE = "0xa11ce"
const BOB = "0xb0b"
const CAROL = "0xca401"

function env(sender: string, timestamp = 1_000n): ExecEnv {
	return { sender, blockHeight: 7n, timestamp }
}

function int(value: bigint): Value {
	return { kind: "int", value }
}

function address(value: string): Value {
	return { kind: "address", value }
}

function instantiate(source: string, options?: EvaluatorOptions, sender = ALICE): ContractInstance {
	const { file } = parse(new Lexer(source).tokenize())
	const analysis = analyze(file).contracts[0]
	if (!analysis) throw new Error("no contract")
	const errors = analysis.diagnostics.errors.map((d) => d.message)
	if (errors.length > 0) throw new Error(`analysis failed: ${errors.join("; ")}`)
	const deployed = deploy(analysis, env(sender), options)
	if (deployed.status !== "ok") throw new Error(`deploy failed: ${deployed.status}`)
	return deployed.instance
}

function contract(body: string, options?: EvaluatorOptions): ContractInstance {
	return instantiate(`contract C {\n${body}\n}`, options)
}

describe("evaluator", () => {
	describe("example token", () => {
		const source = readFileSync(new URL("../../../examples/token.ccdsl", import.meta.url), "utf-8")

		it("runs initializers with the deployment environment", () => {
			const token = instantiate(source)
			expect(token.read("owner")).toEqual(address(ALICE))
			expect(token.read("created_at")).toEqual(int(1_000n))
			expect(token.read("total_supply")).toEqual(int(0n))
		})

		it("mints and emits an event", () => {
			const token = instantiate(source)
			const outcome = token.call("mint", [address(BOB), int(500n)], env(ALICE))
			expect(outcome).toEqual({
				status: "ok",
				value: { kind: "void" },
				events: [{ name: "Mint", args: [address(BOB), int(500n)] }],
			})
			expect(token.read("total_supply")).toEqual(int(500n))
			expect(token.call("balance_of", [address(BOB)], env(CAROL))).toMatchObject({
				status: "ok",
				value: int(500n),
			})
		})

		it("reverts with the modifier's message for a non-owner", () => {
			const token = instantiate(source)
			expect(token.call("mint", [address(BOB), int(1n)], env(BOB))).toEqual({
				status: "revert",
				message: "not owner",
			})
			expect(token.read("total_supply")).toEqual(int(0n))
		})

		it("transfers between accounts", () => {
			const token = instantiate(source)
			token.call("mint", [address(BOB), int(500n)], env(ALICE))
			const outcome = token.call("transfer", [address(CAROL), int(200n)], env(BOB))
			expect(outcome).toMatchObject({
				status: "ok",
				events: [{ name: "Transfer", args: [address(BOB), address(CAROL), int(200n)] }],
			})
			expect(token.call("balance_of", [address(BOB)], env(BOB))).toMatchObject({ value: int(300n) })
			expect(token.call("balance_of", [address(CAROL)], env(BOB))).toMatchObject({ value: int(200n) })
		})

		it("rejects transfers above the balance", () => {
			const token = instantiate(source)
			expect(token.call("transfer", [address(CAROL), int(1n)], env(BOB))).toEqual({
				status: "revert",
				message: "insufficient balance",
			})
		})

		it("blocks transfers while paused", () => {
			const token = instantiate(source)
			token.call("mint", [address(BOB), int(10n)], env(ALICE))
			token.call("set_paused", [{ kind: "bool", value: true }], env(ALICE))
			expect(token.call("transfer", [address(CAROL), int(1n)], env(BOB))).toEqual({
				status: "revert",
				message: "paused",
			})
		})

		it("enforces the supply cap", () => {
			const token = instantiate(source)
			expect(token.call("mint", [address(BOB), int(1_000_000_001n)], env(ALICE))).toEqual({
				status: "revert",
				message: "supply cap exceeded",
			})
		})

		it("traps when the supply check itself overflows", () => {
			const token = instantiate(source)
			token.call("mint", [address(BOB), int(1n)], env(ALICE))
			expect(token.call("mint", [address(BOB), int(18_446_744_073_709_551_615n)], env(ALICE))).toEqual({
				status: "trap",
				reason: "overflow",
			})
		})

		it("evaluates a match expression", () => {
			const token = instantiate(source)
			expect(token.call("fee_for", [int(0n)], env(BOB))).toMatchObject({ value: int(0n) })
			expect(token.call("fee_for", [int(250n)], env(BOB))).toMatchObject({ value: int(3n) })
		})

		it("defaults missing map entries to zero", () => {
			const token = instantiate(source)
			expect(token.call("balance_of", [address(CAROL)], env(BOB))).toMatchObject({ value: int(0n) })
		})
	})

	describe("traps", () => {
		it("traps on overflow at the operand width", () => {
			const c = contract("public fn add(a: u8, b: u8) -> u8 { return a + b; }")
			expect(c.call("add", [int(200n), int(100n)], env(ALICE))).toEqual({ status: "trap", reason: "overflow" })
			expect(c.call("add", [int(200n), int(55n)], env(ALICE))).toMatchObject({ value: int(255n) })
		})

		it("traps on division by zero", () => {
			const c = contract("public fn div(a: u64, b: u64) -> u64 { return a / b; }")
			expect(c.call("div", [int(1n), int(0n)], env(ALICE))).toEqual({
				status: "trap",
				reason: "division by zero",
			})
		})

		it("traps on out-of-range conversions", () => {
			const c = contract("public fn narrow(a: u64) -> u8 { return u8(a); }")
			expect(c.call("narrow", [int(256n)], env(ALICE))).toEqual({
				status: "trap",
				reason: "conversion out of range",
			})
		})

		it("traps on an index past the end", () => {
			const c = contract("public fn at(i: u64) -> u64 { let xs = [1, 2, 3]; return xs[i]; }")
			expect(c.call("at", [int(2n)], env(ALICE))).toMatchObject({ value: int(3n) })
			expect(c.call("at", [int(3n)], env(ALICE))).toEqual({ status: "trap", reason: "index out of bounds" })
		})

		it("stops a loop that never ends", () => {
			const c = contract("public fn spin() { while true { } }", { maxSteps: 100 })
			expect(c.call("spin", [], env(ALICE))).toEqual({ status: "trap", reason: "step limit exceeded" })
		})

		it("stops unbounded recursion", () => {
			const c = contract("public fn down(n: u64) -> u64 { return down(n + 1); }", { maxCallDepth: 10 })
			expect(c.call("down", [int(0n)], env(ALICE))).toEqual({ status: "trap", reason: "call depth exceeded" })
		})
	})

	describe("calls", () => {
		it("rolls back state when a call reverts", () => {
			const c = contract('state { n: u64; } public fn bump() { n += 1; require(false, "no"); }')
			expect(c.call("bump", [], env(ALICE))).toEqual({ status: "revert", message: "no" })
			expect(c.read("n")).toEqual(int(0n))
		})

		it("uses a default message for a bare require", () => {
			const c = contract("public fn f() { require(false); }")
			expect(c.call("f", [], env(ALICE))).toEqual({ status: "revert", message: "requirement failed" })
		})

		it("runs modifiers outermost first", () => {
			const c = contract(`
				event Step(n: u64);
				modifier a { emit Step(1); _; }
				modifier b { emit Step(2); _; }
				public fn f() a b { emit Step(3); }
			`)
			const outcome = c.call("f", [], env(ALICE))
			if (outcome.status !== "ok") throw new Error(`call failed: ${outcome.status}`)
			expect(outcome.events.map((e) => e.args)).toEqual([[int(1n)], [int(2n)], [int(3n)]])
		})

		it("returns from inside a modifier-wrapped body", () => {
			const c = contract(`
				state { after: bool; }
				modifier m { _; after = true; }
				public fn f() -> u64 m { return 4; }
			`)
			expect(c.call("f", [], env(ALICE))).toMatchObject({ value: int(4n) })
			expect(c.read("after")).toEqual({ kind: "bool", value: false })
		})

		it("runs loops and lambdas", () => {
			const c = contract(`
				public fn sum(n: u64) -> u64 {
					let double = |x: u64| x * 2;
					let mut total = 0;
					for i in 0..n { total += double(i); }
					return total;
				}
			`)
			expect(c.call("sum", [int(5n)], env(ALICE))).toMatchObject({ value: int(20n) })
		})

		it("exposes the call environment through intrinsics", () => {
			const c = contract("public fn now() -> u64 { return block_timestamp + block_height; }")
			expect(c.call("now", [], env(ALICE, 50n))).toMatchObject({ value: int(57n) })
		})

		it("rejects calls to private functions", () => {
			const c = contract("fn hidden() {}")
			expect(() => c.call("hidden", [], env(ALICE))).toThrow(RangeError)
		})
	})
})
