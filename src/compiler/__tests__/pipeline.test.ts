import { readFileSync } from "node:fs"
import { describe, expect, it } from "vitest"
import { createCompileLog } from "../compile-log"
import type { ContractJob, TargetResult } from "../pipeline"
import { optimize } from "../optimizer"
import { check, compile } from "../pipeline"
import { TARGET_IDS, createTarget } from "../targets"

const TOKEN = readFileSync(new URL("../../../examples/token.ccdsl", import.meta.url), "utf-8")

const SIGNED = `
contract Signed {
	state { delta: i64; }
	public fn set(d: i64) { delta = d; }
}
`

/** Throws when an AST node appears among its own ancestors. */
function assertTree(node: object, ancestors: Set<object> = new Set()): void {
	if (ancestors.has(node)) throw new Error("node is its own ancestor")
	ancestors.add(node)
	const children: unknown[] = Object.values(node)
	for (const child of children) {
		const items = Array.isArray(child) ? child : [child]
		for (const item of items) {
			if (typeof item === "object" && item !== null) assertTree(item, ancestors)
		}
	}
	ancestors.delete(node)
}

function onlyJob(jobs: readonly ContractJob[]): ContractJob {
	const [job, ...rest] = jobs
	if (!job || rest.length > 0) throw new Error(`expected one job, got ${jobs.length}`)
	return job
}

function textOf(result: TargetResult): string {
	if (result.status !== "generated") throw new Error(`${result.target} failed`)
	return result.artifact.text
}

describe("compile", () => {
	it("generates the example for every target", () => {
		const result = compile(TOKEN, TARGET_IDS)
		const job = onlyJob(result.jobs)
		expect(job.contract).toBe("TokenVault")
		expect(job.stage).toBe("optimized")
		expect(job.targets.map((t) => [t.target, t.status])).toEqual([
			["solana", "generated"],
			["aptos", "generated"],
			["sui", "generated"],
		])
		expect(job.targets.map((t) => (t.status === "generated" ? t.artifact.path : null))).toEqual([
			"solana/token_vault.rs",
			"aptos/token_vault.move",
			"sui/token_vault.move",
		])
		expect(result.diagnostics.filter((d) => d.severity === "error")).toEqual([])
	})

	it("produces identical output for identical input", () => {
		const first = onlyJob(compile(TOKEN, TARGET_IDS).jobs).targets.map(textOf)
		const second = onlyJob(compile(TOKEN, TARGET_IDS).jobs).targets.map(textOf)
		expect(second).toEqual(first)
	})

	it("isolates a failing target from the others", () => {
		const result = compile(SIGNED, TARGET_IDS)
		const job = onlyJob(result.jobs)
		expect(job.targets.map((t) => t.status)).toEqual(["generated", "failed", "failed"])
		const failed = result.diagnostics.map((d) => [d.target, d.code])
		expect(failed.length).toBeGreaterThan(0)
		expect(new Set(failed.map(([target]) => target))).toEqual(new Set(["aptos", "sui"]))
		expect(failed.every(([, code]) => code === "UnsupportedConstruct")).toBe(true)
	})

	it("generates optimized code", () => {
		const job = onlyJob(compile("contract C { public fn f() -> u64 { return 2 + 3; } }", ["solana"]).jobs)
		const [solana] = job.targets
		if (!solana) throw new Error("no target result")
		expect(textOf(solana).split("\n").map((l) => l.trim())).toContain("return Ok(5);")
		expect(job.stats).toEqual({ iterations: 2, folded: 1, simplified: 0, eliminated: 0, propagated: 0 })
	})

	it("fails only the contract with semantic errors", () => {
		const result = compile(
			`
			contract Bad { public fn f() -> u64 { return true; } }
			contract Good { public fn g() -> u64 { return 1; } }
			`,
			["sui"],
		)
		expect(result.jobs.map((j) => [j.contract, j.stage, j.targets.length])).toEqual([
			["Bad", "failed", 0],
			["Good", "optimized", 1],
		])
		expect(result.diagnostics.map((d) => d.message)).toEqual(["return type mismatch: expected u64, found bool"])
	})

	it("fails every contract on a file-level semantic error", () => {
		const result = compile(
			`
			struct A { b: B }
			struct B { a: A }
			contract C { public fn f() {} }
			`,
			["solana"],
		)
		expect(result.jobs.map((j) => [j.contract, j.stage])).toEqual([["C", "failed"]])
		expect(result.diagnostics.map((d) => d.message)).toEqual(["struct 'A' contains itself"])
	})

	it("rejects a contract declared twice", () => {
		const result = compile("contract A { public fn f() {} }\ncontract A { public fn g() {} }", ["solana"])
		expect(result.jobs.map((j) => [j.contract, j.stage])).toEqual([
			["A", "optimized"],
			["A", "failed"],
		])
		expect(result.diagnostics.map((d) => [d.code, d.span.line, d.message])).toEqual([
			["DuplicateDeclaration", 2, "contract 'A' is already declared"],
		])
	})

	it("fails a target whose artifact path another contract already produced", () => {
		const result = compile(
			"contract TokenV2 { public fn f() {} }\ncontract Token_V2 { public fn f() {} }",
			["solana", "sui"],
		)
		expect(result.jobs.map((j) => j.targets.map((t) => t.status))).toEqual([
			["generated", "generated"],
			["failed", "failed"],
		])
		expect(result.diagnostics.map((d) => [d.code, d.target, d.message])).toEqual([
			["TargetConstraintViolation", "solana", "artifact path 'solana/token_v2.rs' is already used by contract 'TokenV2'"],
			["TargetConstraintViolation", "sui", "artifact path 'sui/token_v2.move' is already used by contract 'TokenV2'"],
		])
	})

	it("runs no jobs when the source does not parse", () => {
		const result = compile("contract C { public fn f( }", TARGET_IDS)
		expect(result.jobs).toEqual([])
		expect(result.diagnostics.length).toBeGreaterThan(0)
		expect(result.diagnostics.every((d) => d.kind === "parse" || d.kind === "lex")).toBe(true)
	})

	it("reports an optimizer that does not converge as an internal error", () => {
		const result = compile("contract C { fn f() -> u64 { return 1 + 2; } }", ["solana"], {
			optimizer: { maxIterations: 1 },
		})
		const job = onlyJob(result.jobs)
		expect(job.stage).toBe("failed")
		expect(job.diagnostics).toMatchObject([
			{
				kind: "internal",
				code: "InternalInvariantViolation",
				message:
					"internal compiler error: optimizer did not reach a fixed point in contract 'C' within 1 iterations",
			},
		])
	})

	it("records each stage in the compile log", () => {
		const log = createCompileLog()
		compile("contract C { public fn f() -> u64 { return 1 + 2; } }", ["solana"], { log })
		expect(log.getMessages()).toEqual([
			{ type: "stage", contract: "C", stage: "parsed" },
			{ type: "stage", contract: "C", stage: "analyzed" },
			{ type: "stage", contract: "C", stage: "optimized" },
			{
				type: "optimizer",
				contract: "C",
				stats: { iterations: 2, folded: 1, simplified: 0, eliminated: 0, propagated: 0 },
			},
			{ type: "target", contract: "C", target: "solana", outcome: "generated", diagnostics: 0 },
		])
	})

	it("passes solana options through", () => {
		const result = compile(TOKEN, ["solana"], { solana: { mapPolicy: "reject" } })
		const [solana] = onlyJob(result.jobs).targets
		expect(solana?.status).toBe("failed")
		expect(result.diagnostics.filter((d) => d.severity === "error").map((d) => d.message)).toEqual([
			"map state variable 'balances' is not allowed under the 'reject' map policy",
		])
	})
})

describe("check", () => {
	const source = "contract C {\n\tpublic fn f(a: u64) -> bool {\n\t\treturn a + 1 > 2;\n\t}\n}"

	it("analyzes without generating", () => {
		const result = check(source)
		expect(result.diagnostics).toEqual([])
		expect(result.contracts.map((c) => c.info.name)).toEqual(["C"])
	})

	it("finds the type of the innermost expression at a position", () => {
		const result = check(source)
		expect(result.typeAt(3, 10)).toEqual({ kind: "int", int: "u64" })
		expect(result.typeAt(3, 14)).toEqual({ kind: "int", int: "u64" })
		expect(result.typeAt(3, 16)).toEqual({ kind: "bool" })
		expect(result.typeAt(1, 1)).toBeNull()
	})

	it("returns semantic diagnostics", () => {
		const result = check("contract C { public fn f() { x = 1; } }")
		expect(result.diagnostics.length).toBeGreaterThan(0)
		expect(new Set(result.diagnostics.map((d) => d.kind))).toEqual(new Set(["semantic"]))
	})
})

describe("AST invariants", () => {
	it("keeps the parsed and optimized trees acyclic", () => {
		const [analysis] = check(TOKEN).contracts
		if (!analysis) throw new Error("no contract")
		expect(() => assertTree(analysis.contract)).not.toThrow()
		expect(() => assertTree(optimize(analysis).analysis.contract)).not.toThrow()
	})

	it("does not modify the tree during code generation", () => {
		const [analysis] = check(TOKEN).contracts
		if (!analysis) throw new Error("no contract")
		const optimized = optimize(analysis).analysis
		const before = structuredClone(optimized.contract)
		for (const id of TARGET_IDS) createTarget(id).generate(optimized)
		expect(optimized.contract).toEqual(before)
	})
})
