import fc from "fast-check"
import { describe, expect, it } from "vitest"
import type { ContractAnalysis } from "../analyzer"
import { analyze } from "../analyzer"
import type { CallOutcome, ExecEnv, Value } from "../evaluator"
import { deploy } from "../evaluator"
import { Lexer } from "../lexer"
import { optimize } from "../optimizer"
import { parse } from "../parser"
import { check, compile } from "../pipeline"
import { TARGET_IDS } from "../targets"

const ENV: ExecEnv = { sender: "0xa11ce", blockHeight: 3n, timestamp: 100n }

const U64_MAX = 18_446_744_073_709_551_615n

/** u64 expressions over `a`, `b` and the local `c`. */
const exprArb: fc.Arbitrary<string> = fc.letrec<{ expr: string }>((tie) => ({
	expr: fc.oneof(
		{ depthSize: "small", withCrossShrink: true },
		fc.constantFrom("a", "b", "c"),
		fc.constantFrom("0", "1", "2", "7", "100", `${U64_MAX}`),
		fc
			.tuple(tie("expr"), fc.constantFrom("+", "-", "*", "/", "%"), tie("expr"))
			.map(([l, op, r]) => `(${l} ${op} ${r})`),
		fc
			.tuple(tie("expr"), fc.constantFrom("<", "<=", "==", "!="), tie("expr"), tie("expr"), tie("expr"))
			.map(([l, cmp, r, t, e]) => `(${l} ${cmp} ${r} ? ${t} : ${e})`),
		fc
			.tuple(fc.constantFrom("true", "false"), fc.constantFrom("&&", "||"), tie("expr"), tie("expr"))
			.map(([lit, op, t, e]) => `(${lit} ${op} ${t} > 0 ? ${t} : ${e})`),
	),
})).expr

const operandArb = fc.bigInt({ min: 0n, max: U64_MAX })

function program(expr: string, local: string): string {
	return `contract C {\n\tpublic fn f(a: u64, b: u64) -> u64 {\n\t\tlet c = ${local};\n\t\treturn ${expr};\n\t}\n}`
}

function analyzeSource(source: string): ContractAnalysis | null {
	const { file, diagnostics } = parse(new Lexer(source).tokenize())
	if (diagnostics.hasErrors()) return null
	const analysis = analyze(file).contracts[0]
	if (!analysis || analysis.diagnostics.hasErrors()) return null
	return analysis
}

function run(analysis: ContractAnalysis, a: bigint, b: bigint): CallOutcome {
	const deployed = deploy(analysis, ENV)
	if (deployed.status !== "ok") throw new Error(`deploy failed: ${deployed.status}`)
	const args: Value[] = [
		{ kind: "int", value: a },
		{ kind: "int", value: b },
	]
	return deployed.instance.call("f", args, ENV)
}

describe("adversarial inputs", () => {
	it("lexer never throws on arbitrary strings", () => {
		fc.assert(
			fc.property(fc.string(), (input) => {
				const lexer = new Lexer(input)
				const tokens = lexer.tokenize()
				expect(tokens.length).toBeGreaterThan(0)
			}),
		)
	})

	it("lexer never throws on control characters and astral code points", () => {
		fc.assert(
			fc.property(
				fc.array(fc.oneof(fc.integer({ min: 0, max: 0x1f }), fc.integer({ min: 0x1f600, max: 0x1f64f })), {
					maxLength: 40,
				}),
				(codes) => {
					const input = `contract C { ${String.fromCodePoint(...codes)} }`
					expect(() => new Lexer(input).tokenize()).not.toThrow()
				},
			),
		)
	})

	it("parser reports problems instead of throwing", () => {
		fc.assert(
			fc.property(fc.string(), (input) => {
				expect(() => parse(new Lexer(input).tokenize())).not.toThrow()
			}),
		)
	})

	it("parser and analyzer survive token soup inside a contract", () => {
		const pieces = fc.constantFrom(
			"fn",
			"public",
			"let",
			"mut",
			"return",
			"state",
			"{",
			"}",
			"(",
			")",
			";",
			":",
			"->",
			"=",
			"+=",
			"u64",
			"map<",
			">",
			"x",
			"1",
			'"s"',
			"if",
			"else",
			"match",
			"=>",
			"_",
			"|",
			",",
			"require",
			"emit",
		)
		fc.assert(
			fc.property(fc.array(pieces, { maxLength: 30 }), (parts) => {
				const source = `contract C { ${parts.join(" ")} }`
				expect(() => check(source)).not.toThrow()
			}),
		)
	})

	it("generated programs compile for every target without internal errors", () => {
		fc.assert(
			fc.property(exprArb, fc.constantFrom("0", "5"), (expr, local) => {
				const result = compile(program(expr, local), TARGET_IDS)
				expect(result.diagnostics.filter((d) => d.kind === "internal")).toEqual([])
			}),
			{ numRuns: 60 },
		)
	})
})

describe("optimizer preserves behaviour", () => {
	it("returns the same outcome before and after optimization", () => {
		fc.assert(
			fc.property(exprArb, fc.constantFrom("0", "1", "9"), operandArb, operandArb, (expr, local, a, b) => {
				const analysis = analyzeSource(program(expr, local))
				fc.pre(analysis !== null)
				if (!analysis) return
				const optimized = optimize(analysis).analysis
				expect(run(optimized, a, b)).toEqual(run(analysis, a, b))
			}),
			{ numRuns: 200 },
		)
	})

	it("keeps traps the optimizer cannot prove away", () => {
		const analysis = analyzeSource(program("((a - b) * 0)", "0"))
		if (!analysis) throw new Error("analysis failed")
		const optimized = optimize(analysis).analysis
		expect(run(optimized, 1n, 2n)).toEqual({ status: "trap", reason: "overflow" })
		expect(run(optimized, 2n, 1n)).toMatchObject({ status: "ok", value: { kind: "int", value: 0n } })
	})
})
