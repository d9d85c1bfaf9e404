import { readFileSync } from "node:fs"
import { describe, expect, it } from "vitest"
import type { ContractAnalysis, FileAnalysis } from "../analyzer"
import { analyze } from "../analyzer"
import type { Expr } from "../ast"
import { Lexer } from "../lexer"
import { parse } from "../parser"
import { typeToString } from "../types"

function analyzeSource(source: string): FileAnalysis {
	const tokens = new Lexer(source).tokenize()
	const { file, diagnostics } = parse(tokens)
	if (diagnostics.hasErrors()) {
		throw new Error(`parse failed: ${diagnostics.errors.map((d) => d.message).join("; ")}`)
	}
	return analyze(file)
}

function analyzeContract(body: string): ContractAnalysis {
	const contract = analyzeSource(`contract C {\n${body}\n}`).contracts[0]
	if (!contract) throw new Error("no contract analyzed")
	return contract
}

function errorCodes(body: string): string[] {
	return analyzeContract(body).diagnostics.errors.map((d) => d.code)
}

function errorMessages(body: string): string[] {
	return analyzeContract(body).diagnostics.errors.map((d) => d.message)
}

function expectValid(body: string): ContractAnalysis {
	const result = analyzeContract(body)
	const messages = result.diagnostics.errors.map((d) => d.message)
	expect(messages).toEqual([])
	return result
}

function findExpr(analysis: ContractAnalysis, pred: (e: Expr) => boolean): Expr {
	for (const expr of analysis.types.keys()) {
		if (pred(expr)) return expr
	}
	throw new Error("expression not found")
}

describe("analyzer", () => {
	it("accepts the bundled example contract", () => {
		const source = readFileSync(new URL("../../../examples/token.ccdsl", import.meta.url), "utf-8")
		const result = analyzeSource(source)
		expect(result.diagnostics.errors).toEqual([])
		expect(result.contracts.map((c) => c.diagnostics.errors)).toEqual([[]])
	})

	describe("declarations", () => {
		it("collects state, constants, events and function signatures", () => {
			const { info } = expectValid(`
				state { owner: address = msg_sender; count: u32 = 0; }
				const LIMIT: u64 = 2 * 3 + 1;
				event Bumped(by: u32);
				public fn bump(by: u32) -> u32 { count += by; emit Bumped(by); return count; }
			`)
			expect(info.state.map((s) => `${s.name}: ${typeToString(s.type)}`)).toEqual([
				"owner: address",
				"count: u32",
			])
			expect(info.consts.get("LIMIT")?.constValue).toBe(7n)
			expect(info.events.get("Bumped")?.fields.map((f) => f.name)).toEqual(["by"])
			const bump = info.functions.get("bump")
			expect(bump?.visibility).toBe("public")
			expect(bump && typeToString(bump.returnType)).toBe("u32")
		})

		it("rejects duplicate functions", () => {
			expect(errorMessages("fn f() {} fn f() {}")).toEqual(["function 'f' is already declared"])
		})

		it("rejects duplicate locals in one scope but allows shadowing in a nested block", () => {
			expect(errorMessages("fn f() { let a = 1; let a = 2; }")).toEqual([
				"'a' is already declared in this scope",
			])
			expectValid("fn f() { let a = 1; { let a = true; } }")
		})

		it("rejects a map whose values contain maps", () => {
			expect(errorMessages("state { m: map<u64, map<u64, u64>>; }")).toEqual([
				"map values cannot contain maps",
			])
		})

		it("rejects map types outside state", () => {
			expect(errorMessages("fn f() { let x: map<u64, u64> = 1; }")).toEqual([
				"map types are only allowed as state variable types",
			])
		})

		it("reports a struct that contains itself once at file level", () => {
			const result = analyzeSource("struct A { b: B } struct B { a: A } contract C {}")
			expect(result.diagnostics.errors.map((d) => d.message)).toEqual(["struct 'A' contains itself"])
		})

		it("checks interface conformance", () => {
			const result = analyzeSource(`
				interface Getter { fn get() -> u64; }
				contract C implements Getter { public fn get() -> bool { return true; } }
			`)
			const errors = result.contracts[0]!.diagnostics.errors
			expect(errors.map((d) => d.code)).toEqual(["InterfaceMismatch"])
			expect(errors[0]!.message).toBe(
				"contract 'C' does not implement 'public fn get() -> u64' from interface 'Getter'",
			)
		})

		it("requires interface functions to be public", () => {
			const result = analyzeSource(`
				interface Getter { fn get() -> u64; }
				contract C implements Getter { fn get() -> u64 { return 1; } }
			`)
			expect(result.contracts[0]!.diagnostics.errors.map((d) => d.code)).toEqual(["InterfaceMismatch"])
		})
	})

	describe("initializers and constants", () => {
		it("rejects initializers that read state", () => {
			expect(errorMessages("state { a: u64 = 1; b: u64 = a; }")).toEqual([
				"initializers cannot read state variable 'a'",
			])
		})

		it("rejects initializers that call functions", () => {
			expect(errorMessages("state { a: u64 = g(); } fn g() -> u64 { return 1; }")).toEqual([
				"initializers cannot call function 'g'",
			])
		})

		it("allows intrinsics in initializers", () => {
			expectValid("state { at: u64 = block_timestamp; who: address = msg_sender(); }")
		})

		it("reports a constant expression that overflows", () => {
			expect(errorMessages("const X: u8 = 200 + 100;")).toEqual([
				"constant expression traps: overflow",
				"constant initializer must be a compile-time constant expression",
			])
		})

		it("folds constants that refer to earlier constants", () => {
			const { info } = expectValid("const A: u64 = 10; const B: u64 = A * A;")
			expect(info.consts.get("B")?.constValue).toBe(100n)
		})

		it("rejects assignment to a constant", () => {
			expect(errorMessages("const A: u64 = 1; fn f() { A = 2; }")).toEqual([
				"cannot assign to constant 'A'",
			])
		})
	})

	describe("type checking", () => {
		it("rejects returning a string from a u64 function", () => {
			const result = analyzeContract('fn f() -> u64 { return "x"; }')
			expect(result.diagnostics.errors.map((d) => d.code)).toEqual(["TypeMismatch"])
			expect(result.diagnostics.errors[0]!.message).toBe("return type mismatch: expected u64, found string")
		})

		it("reports mismatched integer widths with a conversion hint", () => {
			const errors = analyzeContract("fn f(a: u8, b: u64) -> u64 { return a + b; }").diagnostics.errors
			expect(errors).toHaveLength(1)
			expect(errors[0]).toMatchObject({
				code: "TypeMismatch",
				message: "mismatched types in '+': u8 and u64",
				hint: "convert explicitly, e.g. u8(value)",
			})
		})

		it("gives an unsuffixed literal the width of the other operand", () => {
			const analysis = expectValid("fn f(a: u8) -> u8 { return 1 + a; }")
			const literal = findExpr(analysis, (e) => e.kind === "IntLiteral")
			expect(analysis.types.get(literal)).toEqual({ kind: "int", int: "u8" })
		})

		it("defaults an unconstrained literal to u64", () => {
			const analysis = expectValid("fn f() { let x = 5; }")
			const literal = findExpr(analysis, (e) => e.kind === "IntLiteral")
			expect(analysis.types.get(literal)).toEqual({ kind: "int", int: "u64" })
		})

		it("range-checks literals against their type", () => {
			expect(errorMessages("fn f() { let x: u8 = 256; }")).toEqual(["integer literal 256 does not fit in u8"])
			expect(errorMessages("fn f() { let x: u8 = -1; }")).toEqual(["integer literal -1 does not fit in u8"])
			expectValid("fn f() { let x: i8 = -128; }")
		})

		it("requires bool conditions", () => {
			expect(errorMessages("fn f() { if 1 { } }")).toEqual(["condition must be bool, found u64"])
		})

		it("reports calls to unknown methods", () => {
			expect(errorMessages("fn f(s: string) -> u64 { return s.size(); }")).toEqual([
				"no method 'size' on type string",
			])
		})

		it("reports tuple positions that do not exist", () => {
			expect(errorMessages("fn f(p: (u64, bool)) -> u64 { return p.2; }")).toEqual([
				"no field '2' on type (u64, bool)",
			])
		})

		it("requires a type annotation for None", () => {
			expect(errorMessages("fn f() { let x = None; }")).toEqual(["cannot infer the type of 'None'"])
			expectValid("fn f() { let x: Option<u64> = None; }")
		})

		it("reports missing struct fields", () => {
			const result = analyzeSource(`
				struct P { x: u64, y: u64 }
				contract C { fn f() { let p = P { x: 1 }; } }
			`)
			expect(result.contracts[0]!.diagnostics.errors.map((d) => d.message)).toEqual([
				"missing field 'y' in 'P' literal",
			])
		})

		it("types map indexing by the value type", () => {
			expectValid(`
				state { balances: map<address, u64>; }
				fn get(who: address) -> u64 { return balances[who]; }
			`)
		})
	})

	describe("names and calls", () => {
		it("reports an undefined name once", () => {
			expect(errorCodes("fn f() -> u64 { return y; }")).toEqual(["UndefinedSymbol"])
		})

		it("suggests calling a function used as a value", () => {
			const errors = analyzeContract("fn g() -> u64 { return 1; } fn f() -> u64 { return g; }").diagnostics.errors
			expect(errors[0]).toMatchObject({ code: "UndefinedSymbol", hint: "call it: g(...)" })
		})

		it("checks call arity", () => {
			expect(errorMessages("fn g(a: u64) {} fn f() { g(); }")).toEqual(["'g' expects 1 argument(s), got 0"])
		})

		it("checks event arguments", () => {
			expect(errorCodes("event E(a: u64); fn f() { emit E(true); }")).toEqual(["TypeMismatch"])
			expect(errorMessages("fn f() { emit Missing(); }")).toEqual(["undefined event 'Missing'"])
		})
	})

	describe("mutability", () => {
		it("rejects assignment to an immutable local with a hint", () => {
			const errors = analyzeContract("fn f() { let x = 1; x = 2; }").diagnostics.errors
			expect(errors).toHaveLength(1)
			expect(errors[0]).toMatchObject({
				code: "ImmutableAssignment",
				message: "cannot assign to immutable binding 'x'",
				hint: "declare it with 'let mut x'",
			})
		})

		it("rejects assignment to a parameter", () => {
			expect(errorMessages("fn f(a: u64) { a += 1; }")).toEqual(["cannot assign to parameter 'a'"])
		})

		it("allows assignment to state and mutable locals", () => {
			expectValid("state { n: u64; } fn f() { let mut x = 1; x += n; n = x; }")
		})
	})

	describe("control flow", () => {
		it("requires a return on every path", () => {
			expect(errorMessages("fn f(a: bool) -> u64 { if a { return 1; } }")).toEqual([
				"function 'f' must return u64 on every path",
			])
			expectValid("fn f(a: bool) -> u64 { if a { return 1; } else { return 2; } }")
		})

		it("treats an exhaustive match whose arms all return as returning", () => {
			expectValid("fn f(a: u64) -> u64 { match a { 1 => { return 1; } _ => { return 2; } } }")
		})

		it("requires exhaustive matches", () => {
			expect(errorCodes("fn f(a: u64) -> u64 { return match a { 1 => 2 }; }")).toEqual(["NonExhaustiveMatch"])
			expectValid("fn f(b: bool) -> u64 { return match b { true => 1, false => 0 }; }")
		})

		it("warns once about unreachable code", () => {
			const { diagnostics } = analyzeContract("fn f() -> u64 { return 1; let x = 2; let y = 3; }")
			expect(diagnostics.errors).toEqual([])
			expect(diagnostics.warnings.map((d) => d.code)).toEqual(["UnreachableCode"])
		})
	})

	describe("modifiers", () => {
		it("requires exactly one placeholder", () => {
			expect(errorMessages("modifier m { require(true); }")).toEqual([
				"modifier 'm' must contain exactly one '_;' at the top level of its body, found 0",
			])
		})

		it("rejects return inside a modifier", () => {
			expect(errorMessages("modifier m { _; return; }")).toEqual(["'return' is not allowed in a modifier"])
		})

		it("rejects unknown modifiers on functions", () => {
			expect(errorMessages("fn f() nope {}")).toEqual(["unknown modifier 'nope'"])
		})
	})

	describe("lambdas", () => {
		it("types a lambda and its call", () => {
			const analysis = expectValid("fn f() -> u64 { let add = |a: u64, b: u64| a + b; return add(1, 2); }")
			const lambda = findExpr(analysis, (e) => e.kind === "LambdaExpr")
			expect(typeToString(analysis.types.get(lambda) ?? { kind: "void" })).toBe("fn(u64, u64) -> u64")
		})

		it("rejects capturing a mutable binding", () => {
			expect(
				errorMessages("fn f() -> u64 { let mut n = 1; let g = |x: u64| x + n; return g(2); }"),
			).toEqual(["a lambda cannot capture mutable binding 'n'"])
		})

		it("rejects calling a contract function from a lambda", () => {
			expect(
				errorCodes("fn h() -> u64 { return 1; } fn f() -> u64 { let g = |x: u64| x + h(); return g(1); }"),
			).toEqual(["InvalidLambda"])
		})
	})
})
