import { describe, expect, it } from "vitest"
import type { ContractAnalysis } from "../analyzer"
import { analyze } from "../analyzer"
import type { Expr, Stmt } from "../ast"
import { InternalCompilerError } from "../errors"
import { Lexer } from "../lexer"
import type { OptimizeOptions } from "../optimizer"
import { optimize } from "../optimizer"
import { parse } from "../parser"

function analyzeContract(body: string): ContractAnalysis {
	const { file } = parse(new Lexer(`contract C {\n${body}\n}`).tokenize())
	const analysis = analyze(file).contracts[0]
	if (!analysis) throw new Error("no contract")
	const errors = analysis.diagnostics.errors.map((d) => d.message)
	if (errors.length > 0) throw new Error(`analysis failed: ${errors.join("; ")}`)
	return analysis
}

function optimizeContract(body: string, options?: OptimizeOptions) {
	const before = analyzeContract(body)
	return { before, ...optimize(before, options) }
}

function bodyOf(analysis: ContractAnalysis, name = "f"): Stmt[] {
	const fn = analysis.contract.functions.find((f) => f.name === name)
	if (!fn) throw new Error(`no function ${name}`)
	return fn.body.stmts
}

function returnedExpr(analysis: ContractAnalysis, name = "f"): Expr {
	const stmts = bodyOf(analysis, name)
	const last = stmts[stmts.length - 1]
	if (last?.kind !== "ReturnStmt" || !last.value) throw new Error("function does not end in a value return")
	return last.value
}

/** Compact rendering for asserting on rewritten expressions. */
function show(expr: Expr): string {
	switch (expr.kind) {
		case "IntLiteral":
		case "BoolLiteral":
			return `${expr.value}`
		case "Ident":
			return expr.name
		case "UnaryExpr":
			return `${expr.op}${show(expr.operand)}`
		case "BinaryExpr":
			return `(${show(expr.left)} ${expr.op} ${show(expr.right)})`
		case "GroupExpr":
			return `[${show(expr.expr)}]`
		case "CallExpr":
			return `${expr.callee}(${expr.args.map(show).join(", ")})`
		default:
			return expr.kind
	}
}

describe("optimizer", () => {
	describe("simplification", () => {
		it("rewrites multiplication of a variable by zero to zero", () => {
			const { analysis, stats } = optimizeContract("fn f(amount: u64) -> u64 { return amount * 0; }")
			expect(show(returnedExpr(analysis))).toBe("0")
			expect(stats).toEqual({ iterations: 2, folded: 0, simplified: 1, eliminated: 0, propagated: 0 })
		})

		it("keeps multiplication by zero when the other side can trap", () => {
			const { analysis } = optimizeContract(
				"fn g() -> u64 { return 1; } fn f() -> u64 { return g() * 0; }",
			)
			expect(show(returnedExpr(analysis))).toBe("(g() * 0)")
		})

		it("drops a true left operand of &&", () => {
			const { analysis } = optimizeContract("fn f(x: bool) -> bool { return true && x; }")
			expect(show(returnedExpr(analysis))).toBe("x")
		})

		it("short-circuits a true left operand of ||", () => {
			const { analysis } = optimizeContract("fn f(x: bool) -> bool { return true || x; }")
			expect(show(returnedExpr(analysis))).toBe("true")
		})

		it("removes additive and multiplicative identities", () => {
			const { analysis } = optimizeContract("fn f(a: u64) -> u64 { return (a + 0) * 1 / 1; }")
			expect(show(returnedExpr(analysis))).toBe("a")
		})

		it("removes double negation", () => {
			const { analysis } = optimizeContract("fn f(x: bool) -> bool { return !!x; }")
			expect(show(returnedExpr(analysis))).toBe("x")
		})

		it("selects the branch of a constant ternary", () => {
			const { analysis } = optimizeContract("fn f(a: u64, b: u64) -> u64 { return false ? a : b; }")
			expect(show(returnedExpr(analysis))).toBe("b")
		})

		it("selects the arm of a match on a literal", () => {
			const { analysis } = optimizeContract("fn f() -> u64 { return match 2 { 1 => 10, 2 => 20, _ => 0 }; }")
			expect(show(returnedExpr(analysis))).toBe("20")
		})
	})

	describe("constant folding", () => {
		it("folds nested arithmetic in one pass", () => {
			const { analysis, stats } = optimizeContract("fn f() -> u64 { return 2 + 3 * 4; }")
			expect(show(returnedExpr(analysis))).toBe("14")
			expect(stats.folded).toBe(2)
			expect(stats.iterations).toBe(2)
		})

		it("folds comparisons to booleans", () => {
			const { analysis } = optimizeContract("fn f() -> bool { return 3 < 2; }")
			expect(show(returnedExpr(analysis))).toBe("false")
		})

		it("leaves an overflowing operation for the runtime to trap", () => {
			const { analysis, stats } = optimizeContract("fn f() -> u8 { return 200u8 + 100u8; }")
			expect(show(returnedExpr(analysis))).toBe("(200 + 100)")
			expect(stats).toEqual({ iterations: 1, folded: 0, simplified: 0, eliminated: 0, propagated: 0 })
		})

		it("folds up to the edge of the type's range", () => {
			const { analysis } = optimizeContract("fn f() -> u8 { return 200u8 + 55u8; }")
			expect(show(returnedExpr(analysis))).toBe("255")
		})

		it.each([
			["fn f() -> u8 { return 0u8 - 1u8; }", "(0 - 1)"],
			["fn f() -> i8 { return 127i8 + 1i8; }", "(127 + 1)"],
			["fn f() -> i8 { return -128i8 - 1i8; }", "(-128 - 1)"],
			["fn f() -> i8 { return -128i8 / -1i8; }", "(-128 / -1)"],
			["fn f() -> i8 { return -128i8 % -1i8; }", "(-128 % -1)"],
			["fn f() -> i8 { return -127i8 - 1i8; }", "-128"],
			["fn f() -> i8 { return -127i8 % -1i8; }", "0"],
			["fn f() -> u8 { return u8(256); }", "u8(256)"],
		])("rewrites %s to %s at the width's boundary", (body, expected) => {
			const { analysis } = optimizeContract(body)
			expect(show(returnedExpr(analysis))).toBe(expected)
		})

		it("leaves division by zero in place", () => {
			const { analysis } = optimizeContract("fn f() -> u64 { return 1 / 0; }")
			expect(show(returnedExpr(analysis))).toBe("(1 / 0)")
		})

		it("folds integer conversions that fit", () => {
			const { analysis } = optimizeContract("fn f() -> u8 { return u8(7); }")
			expect(show(returnedExpr(analysis))).toBe("7")
		})

		it("registers a type for every node it creates", () => {
			const { analysis } = optimizeContract("fn f() -> u32 { return 2u32 * 21u32; }")
			const value = returnedExpr(analysis)
			expect(analysis.types.get(value)).toEqual({ kind: "int", int: "u32" })
		})
	})

	describe("propagation", () => {
		it("substitutes contract constants", () => {
			const { analysis, stats } = optimizeContract("const K: u64 = 5; fn f() -> u64 { return K + 1; }")
			expect(show(returnedExpr(analysis))).toBe("6")
			expect(stats.propagated).toBe(1)
			expect(stats.folded).toBe(1)
		})

		it("substitutes locals bound to a literal and never reassigned", () => {
			const { analysis } = optimizeContract("fn f() -> u64 { let a = 2; return a * 3; }")
			expect(show(returnedExpr(analysis))).toBe("6")
			expect(bodyOf(analysis).map((s) => s.kind)).toEqual(["LetStmt", "ReturnStmt"])
		})

		it("leaves reassigned locals alone", () => {
			const { analysis } = optimizeContract("fn f() -> u64 { let mut a = 2; a = 5; return a; }")
			expect(show(returnedExpr(analysis))).toBe("a")
		})
	})

	describe("dead code", () => {
		it("removes an if whose condition is false", () => {
			const { analysis, stats } = optimizeContract(
				"fn f(a: u64) -> u64 { if false { return 1; } return a; }",
			)
			expect(bodyOf(analysis).map((s) => s.kind)).toEqual(["ReturnStmt"])
			expect(stats.eliminated).toBe(1)
		})

		it("inlines the taken branch of a constant if", () => {
			const { analysis } = optimizeContract(
				"state { n: u64; } fn f() { if 1 < 2 { n = 1; } else { n = 2; } }",
			)
			const stmts = bodyOf(analysis)
			expect(stmts).toHaveLength(1)
			expect(stmts[0]).toMatchObject({ kind: "AssignStmt", value: { kind: "IntLiteral", value: 1n } })
		})

		it("removes statements after a return", () => {
			const { analysis } = optimizeContract("fn f() -> u64 { return 1; let x = 2; }")
			expect(bodyOf(analysis).map((s) => s.kind)).toEqual(["ReturnStmt"])
		})

		it("removes loops that never run and requirements that always hold", () => {
			const { analysis } = optimizeContract("fn f() { while false { } require(true); }")
			expect(bodyOf(analysis)).toEqual([])
		})
	})

	describe("fixed point", () => {
		it("is idempotent", () => {
			const first = optimizeContract(
				"const K: u64 = 3; fn f(a: u64) -> u64 { if K > 2 { return a * 1; } return 0; }",
			)
			const second = optimize(first.analysis)
			expect(second.stats).toEqual({ iterations: 1, folded: 0, simplified: 0, eliminated: 0, propagated: 0 })
			expect(second.analysis.contract.functions[0]).toBe(first.analysis.contract.functions[0])
		})

		it("throws an internal error when the iteration limit is reached", () => {
			const before = analyzeContract("fn f() -> u64 { return 1 + 2; }")
			expect(() => optimize(before, { maxIterations: 1 })).toThrow(InternalCompilerError)
			expect(() => optimize(before, { maxIterations: 1 })).toThrow(
				"optimizer did not reach a fixed point in contract 'C' within 1 iterations",
			)
		})

		it("finishes in one pass when there is nothing to do", () => {
			const { stats } = optimizeContract("fn f(a: u64) -> u64 { return a; }", { maxIterations: 1 })
			expect(stats.iterations).toBe(1)
		})

		it("does not modify its input", () => {
			const { before, analysis } = optimizeContract("fn f() -> u64 { return 1 + 2; }")
			expect(show(returnedExpr(before))).toBe("(1 + 2)")
			expect(show(returnedExpr(analysis))).toBe("3")
			expect(before.contract).not.toBe(analysis.contract)
		})

		it("points function info at the rebuilt declarations", () => {
			const { analysis } = optimizeContract("fn f() -> u64 { return 1 + 2; }")
			expect(analysis.info.functions.get("f")?.decl).toBe(analysis.contract.functions[0])
		})
	})
})
