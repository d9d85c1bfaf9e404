import { describe, expect, it } from "vitest"
import { Lexer, splitIntLiteral } from "../lexer"
import { TokenKind } from "../token"

function tokenKinds(source: string): TokenKind[] {
	return new Lexer(source)
		.tokenize()
		.filter((t) => t.kind !== TokenKind.EOF)
		.map((t) => t.kind)
}

function tokenValues(source: string): string[] {
	return new Lexer(source)
		.tokenize()
		.filter((t) => t.kind !== TokenKind.EOF)
		.map((t) => t.value)
}

describe("Lexer", () => {
	it("tokenizes a contract header", () => {
		expect(tokenKinds("contract Vault implements Token {")).toEqual([
			TokenKind.Contract,
			TokenKind.Ident,
			TokenKind.Implements,
			TokenKind.Ident,
			TokenKind.LBrace,
		])
	})

	it("tokenizes a function signature with a return type and modifier", () => {
		expect(tokenKinds("public fn get(who: address) -> u64 onlyOwner {")).toEqual([
			TokenKind.Public,
			TokenKind.Fn,
			TokenKind.Ident,
			TokenKind.LParen,
			TokenKind.Ident,
			TokenKind.Colon,
			TokenKind.Ident,
			TokenKind.RParen,
			TokenKind.Arrow,
			TokenKind.Ident,
			TokenKind.Ident,
			TokenKind.LBrace,
		])
	})

	it("tokenizes compound assignment operators", () => {
		expect(tokenKinds("a += 1; b -= 2; c *= 3; d /= 4;")).toEqual([
			TokenKind.Ident,
			TokenKind.PlusAssign,
			TokenKind.Int,
			TokenKind.Semicolon,
			TokenKind.Ident,
			TokenKind.MinusAssign,
			TokenKind.Int,
			TokenKind.Semicolon,
			TokenKind.Ident,
			TokenKind.StarAssign,
			TokenKind.Int,
			TokenKind.Semicolon,
			TokenKind.Ident,
			TokenKind.SlashAssign,
			TokenKind.Int,
			TokenKind.Semicolon,
		])
	})

	it("distinguishes two-character operators from their prefixes", () => {
		expect(tokenKinds("== = != ! <= < >= > && || | -> => ..")).toEqual([
			TokenKind.Eq,
			TokenKind.Assign,
			TokenKind.NotEq,
			TokenKind.Not,
			TokenKind.LtEq,
			TokenKind.Lt,
			TokenKind.GtEq,
			TokenKind.Gt,
			TokenKind.And,
			TokenKind.Or,
			TokenKind.Pipe,
			TokenKind.Arrow,
			TokenKind.FatArrow,
			TokenKind.DotDot,
		])
	})

	it("reads a range without mistaking the dots for a decimal point", () => {
		expect(tokenKinds("0..10")).toEqual([TokenKind.Int, TokenKind.DotDot, TokenKind.Int])
	})

	it("keeps integer width suffixes on the literal", () => {
		expect(tokenValues("255u8 1_000u64 0xffu16")).toEqual(["255u8", "1_000u64", "0xffu16"])
	})

	it("recognizes intrinsics and the wildcard", () => {
		expect(tokenKinds("msg_sender block_height block_timestamp _ _x")).toEqual([
			TokenKind.Intrinsic,
			TokenKind.Intrinsic,
			TokenKind.Intrinsic,
			TokenKind.Underscore,
			TokenKind.Ident,
		])
	})

	it("recognizes type and value constructor keywords", () => {
		expect(tokenKinds("map vec Option Result Some None Ok Err")).toEqual([
			TokenKind.Map,
			TokenKind.Vec,
			TokenKind.Option,
			TokenKind.Result,
			TokenKind.Some,
			TokenKind.None,
			TokenKind.Ok,
			TokenKind.Err,
		])
	})

	it("decodes string escapes", () => {
		const tokens = new Lexer('"a\\n\\t\\"b\\\\"').tokenize()
		expect(tokens[0]!.kind).toBe(TokenKind.String)
		expect(tokens[0]!.value).toBe('a\n\t"b\\')
	})

	it("reads byte string literals", () => {
		const tokens = new Lexer('b"abc"').tokenize()
		expect(tokens[0]!.kind).toBe(TokenKind.Bytes)
		expect(tokens[0]!.value).toBe("abc")
		expect(tokens[0]!.length).toBe(6)
	})

	it("skips line and block comments", () => {
		expect(tokenValues("a // comment\n/* block\ncomment */ b")).toEqual(["a", "b"])
	})

	it("tracks line and column", () => {
		const tokens = new Lexer("let x\n  = 5;").tokenize()
		expect(tokens[0]).toMatchObject({ line: 1, column: 1, length: 3 })
		expect(tokens[1]).toMatchObject({ line: 1, column: 5, length: 1 })
		expect(tokens[2]).toMatchObject({ line: 2, column: 3 })
		expect(tokens[3]).toMatchObject({ line: 2, column: 5, value: "5" })
	})

	it("ends with an EOF token", () => {
		const tokens = new Lexer("").tokenize()
		expect(tokens).toHaveLength(1)
		expect(tokens[0]!.kind).toBe(TokenKind.EOF)
	})
})

describe("Lexer diagnostics", () => {
	it("reports an unknown character and continues after it", () => {
		const lexer = new Lexer("a @ b")
		const values = lexer
			.tokenize()
			.filter((t) => t.kind !== TokenKind.EOF)
			.map((t) => t.value)
		expect(values).toEqual(["a", "b"])
		expect(lexer.diagnostics.errors).toHaveLength(1)
		expect(lexer.diagnostics.errors[0]).toMatchObject({
			kind: "lex",
			code: "UnknownCharacter",
			span: { line: 1, column: 3 },
		})
	})

	it("reports an unterminated string", () => {
		const lexer = new Lexer('"abc\nx')
		lexer.tokenize()
		expect(lexer.diagnostics.errors.map((d) => d.code)).toEqual(["UnterminatedString"])
	})

	it("reports an unterminated block comment at its start", () => {
		const lexer = new Lexer("x /* never\nclosed")
		const tokens = lexer.tokenize()
		expect(tokens.map((t) => t.value)).toEqual(["x", ""])
		expect(lexer.diagnostics.errors.map((d) => [d.code, d.span.line, d.span.column, d.message])).toEqual([
			["UnterminatedComment", 1, 3, "unterminated block comment"],
		])
	})

	it("reports an invalid integer suffix", () => {
		const lexer = new Lexer("10u7")
		const tokens = lexer.tokenize()
		expect(tokens[0]!.value).toBe("10")
		expect(lexer.diagnostics.errors[0]!.code).toBe("InvalidLiteral")
	})

	it("reports a hex literal without digits", () => {
		const lexer = new Lexer("0x")
		lexer.tokenize()
		expect(lexer.diagnostics.errors[0]!.message).toBe("hex literal has no digits")
	})

	it("rejects non-ASCII byte strings", () => {
		const lexer = new Lexer('b"é"')
		lexer.tokenize()
		expect(lexer.diagnostics.errors[0]!.message).toBe("byte string literals must be ASCII")
	})
})

describe("splitIntLiteral", () => {
	it("splits value and suffix", () => {
		expect(splitIntLiteral("1_000u64")).toEqual({ value: 1000n, suffix: "u64" })
		expect(splitIntLiteral("0xff")).toEqual({ value: 255n, suffix: null })
		expect(splitIntLiteral("42i8")).toEqual({ value: 42n, suffix: "i8" })
	})

	it("handles values beyond the safe integer range", () => {
		expect(splitIntLiteral("340282366920938463463374607431768211455u128").value).toBe(
			340282366920938463463374607431768211455n,
		)
	})
})
